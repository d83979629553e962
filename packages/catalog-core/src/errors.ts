import { Data } from "effect";

/**
 * Unknown category or node id. Caller-input error, raised before any dispatch.
 */
export class NotFoundError extends Data.TaggedError("NotFound")<{
  message: string;
  kind: "category" | "node";
  key: string;
}> {}

/**
 * A grouping node was submitted for execution
 */
export class NotExecutableError extends Data.TaggedError("NotExecutable")<{
  message: string;
  nodeId: string;
}> {}

/**
 * The process could not be started (missing executable, permissions, bad cwd)
 */
export class SpawnFailureError extends Data.TaggedError("SpawnFailure")<{
  message: string;
  executable: string;
}> {}

/**
 * The process ran but did not exit with status 0
 */
export class NonZeroExitError extends Data.TaggedError("NonZeroExit")<{
  message: string;
  exitCode?: number;
  stderr: string;
  output: string;
}> {}

/**
 * The catalog provider could not produce a snapshot
 */
export class CatalogLoadError extends Data.TaggedError("CatalogLoadError")<{
  message: string;
  cause?: unknown;
}> {}

/**
 * Node arena is inconsistent (duplicate ids, dangling children)
 */
export class InvalidCatalogError extends Data.TaggedError(
  "InvalidCatalogError",
)<{
  message: string;
}> {}
