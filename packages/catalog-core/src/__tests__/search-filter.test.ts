import { describe, expect, it } from "vitest";
import { clampSelection, filterItems } from "../search-filter.js";

const items = [
  { name: "System", description: "System tools" },
  { name: "Update", description: "Refresh package lists" },
  { name: "Browser", description: "Install a web browser" },
];

describe("filterItems", () => {
  it("matches names case-insensitively", () => {
    expect(filterItems(items, "upd").map((i) => i.name)).toEqual(["Update"]);
    expect(filterItems(items, "UPD").map((i) => i.name)).toEqual(["Update"]);
  });

  it("matches descriptions", () => {
    expect(filterItems(items, "PACKAGE").map((i) => i.name)).toEqual([
      "Update",
    ]);
  });

  it("keeps the original order", () => {
    expect(filterItems(items, "s").map((i) => i.name)).toEqual([
      "System",
      "Update",
      "Browser",
    ]);
  });

  it("returns a copy of everything for an empty query", () => {
    const result = filterItems(items, "");

    expect(result).toEqual(items);
    expect(result).not.toBe(items);
  });

  it("returns nothing when no item matches", () => {
    expect(filterItems(items, "zzz")).toEqual([]);
  });

  it("only keeps items containing the query", () => {
    for (const query of ["e", "er", "tool", "web", "x"]) {
      for (const item of filterItems(items, query)) {
        const text = `${item.name}\n${item.description}`.toLowerCase();
        expect(text).toContain(query);
      }
    }
  });
});

describe("clampSelection", () => {
  it("is undefined for an empty list", () => {
    expect(clampSelection(0, 0)).toBeUndefined();
    expect(clampSelection(undefined, 0)).toBeUndefined();
  });

  it("keeps an index inside the list", () => {
    expect(clampSelection(2, 3)).toBe(2);
  });

  it("falls back to 0 outside the list", () => {
    expect(clampSelection(3, 3)).toBe(0);
    expect(clampSelection(-1, 3)).toBe(0);
    expect(clampSelection(undefined, 3)).toBe(0);
  });
});
