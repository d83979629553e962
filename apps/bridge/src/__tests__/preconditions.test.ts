import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { CatalogEntrySchema } from "@taskdeck/catalog-protocol";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import {
  checkPrecondition,
  commandExists,
  meetsPreconditions,
} from "../providers/preconditions.js";

describe("preconditions", () => {
  let binDir = "";

  beforeAll(() => {
    binDir = fs.mkdtempSync(path.join(os.tmpdir(), "taskdeck-bin-"));
    fs.writeFileSync(path.join(binDir, "fake-tool"), "#!/bin/sh\n", {
      mode: 0o755,
    });
    fs.writeFileSync(path.join(binDir, "not-executable"), "data", {
      mode: 0o644,
    });
  });

  afterAll(() => {
    fs.rmSync(binDir, { recursive: true, force: true });
  });

  describe("commandExists", () => {
    it("finds executables on PATH", () => {
      const env = { PATH: ["/nonexistent", binDir].join(path.delimiter) };

      expect(commandExists("fake-tool", env)).toBe(true);
      expect(commandExists("missing-tool", env)).toBe(false);
    });

    it("skips files without the executable bit", () => {
      expect(commandExists("not-executable", { PATH: binDir })).toBe(false);
    });

    it("checks paths directly", () => {
      expect(commandExists(path.join(binDir, "fake-tool"), {})).toBe(true);
      expect(commandExists(path.join(binDir, "missing-tool"), {})).toBe(false);
    });

    it("finds nothing without PATH", () => {
      expect(commandExists("fake-tool", {})).toBe(false);
    });
  });

  describe("checkPrecondition", () => {
    it("compares environment variables exactly", () => {
      const environment = { env: { SESSION: "wayland" } };

      expect(
        checkPrecondition(
          { kind: "env-equals", name: "SESSION", value: "wayland" },
          environment,
        ),
      ).toBe(true);
      expect(
        checkPrecondition(
          { kind: "env-equals", name: "SESSION", value: "x11" },
          environment,
        ),
      ).toBe(false);
      expect(
        checkPrecondition(
          { kind: "env-equals", name: "UNSET", value: "" },
          environment,
        ),
      ).toBe(false);
    });

    it("checks file existence", () => {
      const environment = { env: {} };

      expect(
        checkPrecondition({ kind: "file-exists", value: binDir }, environment),
      ).toBe(true);
      expect(
        checkPrecondition(
          { kind: "file-exists", value: path.join(binDir, "absent") },
          environment,
        ),
      ).toBe(false);
    });
  });

  describe("meetsPreconditions", () => {
    it("requires every precondition of an entry", () => {
      const include = meetsPreconditions({
        env: { PATH: binDir, SESSION: "wayland" },
      });
      const entry = (preconditions: unknown[]) =>
        CatalogEntrySchema.parse({ name: "Entry", command: "true", preconditions });

      expect(include(entry([]))).toBe(true);
      expect(
        include(
          entry([
            { kind: "command-exists", value: "fake-tool" },
            { kind: "env-equals", name: "SESSION", value: "wayland" },
          ]),
        ),
      ).toBe(true);
      expect(
        include(
          entry([
            { kind: "command-exists", value: "fake-tool" },
            { kind: "env-equals", name: "SESSION", value: "x11" },
          ]),
        ),
      ).toBe(false);
    });
  });
});
