import * as fs from "node:fs/promises";
import type { CatalogNode } from "@taskdeck/catalog-protocol";
import { Effect } from "effect";

/**
 * Read-only description of what executing a node would do
 */
export const renderPreview = (node: CatalogNode): Effect.Effect<string> => {
  const command = node.command;

  switch (command.type) {
    case "raw":
      return Effect.succeed(
        `Raw Command:\n${command.command}\n\nDescription:\n${node.description}`,
      );

    case "local-file":
      return Effect.tryPromise(() => fs.readFile(command.file, "utf-8")).pipe(
        Effect.catchAll(() =>
          Effect.succeed(`Could not read script file: ${command.file}`),
        ),
        Effect.map((content) => {
          const executionInfo = [
            `Executable: ${command.executable}`,
            `Arguments: ${command.args.join(" ")}`,
            `Script File: ${command.file}`,
          ].join("\n");
          return `Script Preview:\n${content}\n\nExecution Info:\n${executionInfo}\n\nDescription:\n${node.description}`;
        }),
      );

    case "none":
      return Effect.succeed(
        `Directory: ${node.name}\n\nDescription:\n${node.description}`,
      );
  }
};
