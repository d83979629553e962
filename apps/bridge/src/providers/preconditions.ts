import * as fs from "node:fs";
import * as path from "node:path";
import type { CatalogEntry, Precondition } from "@taskdeck/catalog-protocol";

export interface PreconditionEnvironment {
  env: NodeJS.ProcessEnv;
  /** Checked with fs.existsSync unless replaced */
  fileExists?: (file: string) => boolean;
}

function isExecutable(file: string): boolean {
  try {
    fs.accessSync(file, fs.constants.X_OK);
    return fs.statSync(file).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve a command the way a shell would: a path is checked directly,
 * a bare name is looked up on PATH.
 */
export function commandExists(
  command: string,
  env: NodeJS.ProcessEnv,
): boolean {
  if (command.includes("/")) {
    return isExecutable(command);
  }
  const dirs = (env.PATH ?? "").split(path.delimiter).filter(Boolean);
  return dirs.some((dir) => isExecutable(path.join(dir, command)));
}

export function checkPrecondition(
  precondition: Precondition,
  environment: PreconditionEnvironment,
): boolean {
  switch (precondition.kind) {
    case "command-exists":
      return commandExists(precondition.value, environment.env);
    case "file-exists":
      return (environment.fileExists ?? fs.existsSync)(precondition.value);
    case "env-equals":
      return environment.env[precondition.name] === precondition.value;
  }
}

/**
 * Entry filter used when the catalog is loaded with validation
 */
export function meetsPreconditions(environment: PreconditionEnvironment) {
  return (entry: CatalogEntry): boolean =>
    entry.preconditions.every((precondition) =>
      checkPrecondition(precondition, environment),
    );
}
