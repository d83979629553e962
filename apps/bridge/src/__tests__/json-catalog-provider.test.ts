import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it } from "@effect/vitest";
import { CatalogProvider, getNode } from "@taskdeck/catalog-core";
import { Effect } from "effect";
import { afterEach, beforeEach, expect } from "vitest";
import { makeJsonCatalogProviderLive } from "../providers/json-catalog-provider.js";

const document = {
  categories: [
    {
      name: "System",
      entries: [
        {
          id: "update",
          name: "Update",
          command: "echo ok",
          preconditions: [
            { kind: "env-equals", name: "TASKDECK_TEST_DISTRO", value: "debian" },
          ],
        },
        {
          id: "packages",
          name: "Packages",
          entries: [
            {
              id: "dnf",
              name: "Dnf",
              command: "dnf check-update",
              preconditions: [
                { kind: "env-equals", name: "TASKDECK_TEST_DISTRO", value: "fedora" },
              ],
            },
          ],
        },
        { id: "cleanup", name: "Cleanup", script: { file: "scripts/cleanup.sh" } },
      ],
    },
  ],
};

describe("JsonCatalogProvider", () => {
  let dir = "";
  let catalogPath = "";

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "taskdeck-provider-"));
    catalogPath = path.join(dir, "catalog.json");
    fs.writeFileSync(catalogPath, JSON.stringify(document));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const load = (validate: boolean, env: NodeJS.ProcessEnv = {}) =>
    Effect.gen(function* () {
      const provider = yield* CatalogProvider;
      return yield* provider.getCatalog(validate);
    }).pipe(
      Effect.provide(
        makeJsonCatalogProviderLive({ catalogPath, environment: { env } }),
      ),
    );

  it.effect("serves every entry without validation", () =>
    Effect.gen(function* () {
      const snapshot = yield* load(false);

      expect(snapshot.categories).toEqual([{ name: "System", rootId: "0" }]);
      expect(getNode(snapshot, "0")?.children).toEqual([
        "update",
        "packages",
        "cleanup",
      ]);
      expect(getNode(snapshot, "packages")?.children).toEqual(["dnf"]);
    }),
  );

  it.effect("resolves scripts next to the catalog file", () =>
    Effect.gen(function* () {
      const snapshot = yield* load(false);
      const file = path.join(dir, "scripts", "cleanup.sh");

      expect(getNode(snapshot, "cleanup")?.command).toEqual({
        type: "local-file",
        executable: "sh",
        args: [file],
        file,
      });
    }),
  );

  it.effect("drops entries whose preconditions fail when validating", () =>
    Effect.gen(function* () {
      const snapshot = yield* load(true, { TASKDECK_TEST_DISTRO: "debian" });

      expect(getNode(snapshot, "0")?.children).toEqual(["update", "cleanup"]);
      expect(getNode(snapshot, "packages")).toBeUndefined();
      expect(getNode(snapshot, "dnf")).toBeUndefined();
    }),
  );

  it.effect("keeps the directory that still has a matching entry", () =>
    Effect.gen(function* () {
      const snapshot = yield* load(true, { TASKDECK_TEST_DISTRO: "fedora" });

      expect(getNode(snapshot, "0")?.children).toEqual(["packages", "cleanup"]);
    }),
  );

  it.effect("fails with CatalogLoadError for a missing file", () =>
    Effect.gen(function* () {
      fs.rmSync(catalogPath);
      const error = yield* Effect.flip(load(false));

      expect(error._tag).toBe("CatalogLoadError");
      expect(error.message.startsWith(`Failed to read catalog ${catalogPath}:`)).toBe(
        true,
      );
    }),
  );

  it.effect("fails with CatalogLoadError for invalid JSON", () =>
    Effect.gen(function* () {
      fs.writeFileSync(catalogPath, "{");
      const error = yield* Effect.flip(load(false));

      expect(error.message.startsWith(`Catalog ${catalogPath} is not valid JSON:`)).toBe(
        true,
      );
    }),
  );

  it.effect("fails with CatalogLoadError for a document that does not match", () =>
    Effect.gen(function* () {
      fs.writeFileSync(
        catalogPath,
        JSON.stringify({ categories: [{ name: "System", entries: [{ description: "x" }] }] }),
      );
      const error = yield* Effect.flip(load(false));

      expect(error.message).toBe(
        `Invalid catalog document ${catalogPath}: categories.0.entries.0.name: Required`,
      );
    }),
  );

  it.effect("fails with CatalogLoadError for duplicate ids", () =>
    Effect.gen(function* () {
      fs.writeFileSync(
        catalogPath,
        JSON.stringify({
          categories: [
            {
              name: "System",
              entries: [
                { id: "same", name: "One", command: "true" },
                { id: "same", name: "Two", command: "true" },
              ],
            },
          ],
        }),
      );
      const error = yield* Effect.flip(load(false));

      expect(error.message).toBe(
        `Invalid catalog ${catalogPath}: Duplicate node id: same`,
      );
    }),
  );
});
