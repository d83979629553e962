import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it } from "@effect/vitest";
import { Effect } from "effect";
import { afterAll, beforeAll, expect } from "vitest";
import { renderPreview } from "../preview.js";
import { node } from "./fixtures.js";

describe("renderPreview", () => {
  let scriptDir = "";

  beforeAll(() => {
    scriptDir = fs.mkdtempSync(path.join(os.tmpdir(), "taskdeck-preview-"));
    fs.writeFileSync(path.join(scriptDir, "hello.sh"), "echo hello\n");
  });

  afterAll(() => {
    fs.rmSync(scriptDir, { recursive: true, force: true });
  });

  it.effect("shows a raw command and its description", () =>
    Effect.gen(function* () {
      const text = yield* renderPreview(
        node({
          id: "update",
          name: "Update",
          description: "Refresh package lists",
          command: { type: "raw", command: "echo ok" },
        }),
      );

      expect(text).toBe(
        "Raw Command:\necho ok\n\nDescription:\nRefresh package lists",
      );
    }),
  );

  it.live("shows the script source and how it runs", () =>
    Effect.gen(function* () {
      const file = path.join(scriptDir, "hello.sh");
      const text = yield* renderPreview(
        node({
          id: "hello",
          name: "Hello",
          description: "Greets",
          command: { type: "local-file", executable: "sh", args: [file], file },
        }),
      );

      expect(text).toBe(
        [
          "Script Preview:",
          "echo hello",
          "",
          "",
          "Execution Info:",
          "Executable: sh",
          `Arguments: ${file}`,
          `Script File: ${file}`,
          "",
          "Description:",
          "Greets",
        ].join("\n"),
      );
    }),
  );

  it.live("notes a script that cannot be read", () =>
    Effect.gen(function* () {
      const file = path.join(scriptDir, "missing.sh");
      const text = yield* renderPreview(
        node({
          id: "missing",
          name: "Missing",
          command: { type: "local-file", executable: "bash", args: [], file },
        }),
      );

      expect(text.split("\n").slice(0, 2)).toEqual([
        "Script Preview:",
        `Could not read script file: ${file}`,
      ]);
    }),
  );

  it.effect("describes directories", () =>
    Effect.gen(function* () {
      const text = yield* renderPreview(
        node({ id: "system", name: "System", description: "System tools" }),
      );

      expect(text).toBe("Directory: System\n\nDescription:\nSystem tools");
    }),
  );
});
