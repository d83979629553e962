/**
 * Catalog Protocol Types
 *
 * Shared type definitions for communication between:
 * - The catalog core (navigation, selection, execution)
 * - The bridge process
 * - Front-ends driving a session over the bridge
 */

/**
 * Opaque node identifier, unique within one loaded snapshot
 */
export type NodeId = string;

/**
 * A shell command passed to `sh -c` as a single string
 */
export interface RawCommand {
  readonly type: "raw";
  readonly command: string;
}

/**
 * A script on disk, run by `executable` from the script's own directory
 */
export interface LocalFileCommand {
  readonly type: "local-file";
  readonly executable: string;
  readonly args: readonly string[];
  /** Absolute path of the script source */
  readonly file: string;
}

/**
 * Marks a grouping node. Never executable.
 */
export interface NoCommand {
  readonly type: "none";
}

export type CommandSpec = RawCommand | LocalFileCommand | NoCommand;

export type ExecutableCommand = RawCommand | LocalFileCommand;

export type CommandType = CommandSpec["type"];

/**
 * One entry of a category tree. Children are referenced by id only.
 */
export interface CatalogNode {
  readonly id: NodeId;
  readonly name: string;
  readonly description: string;
  /** Free-form task list tags */
  readonly tags: readonly string[];
  readonly multiSelect: boolean;
  /** Ordered child ids; empty for a leaf */
  readonly children: readonly NodeId[];
  readonly command: CommandSpec;
}

/**
 * A named top-level tree of the catalog (a "tab")
 */
export interface CatalogCategory {
  readonly name: string;
  readonly rootId: NodeId;
}

/**
 * Outcome of one execution, delivered through the result channel
 */
export interface ExecutionResult {
  requestId: string;
  category: string;
  nodeId: NodeId;
  name: string;
  success: boolean;
  /** Stdout, else stderr, else a fixed success placeholder */
  output: string;
  /** Stderr (or the spawn error) when the execution failed */
  error?: string;
  exitCode?: number;
}

/**
 * One visible row of the current navigation level
 */
export interface ItemView {
  id: NodeId;
  name: string;
  description: string;
  tags: string[];
  hasChildren: boolean;
  isMultiSelected: boolean;
  commandType: CommandType;
}

/**
 * Everything a front-end needs to render one tick
 */
export interface ViewState {
  category: string;
  breadcrumb: string[];
  atRoot: boolean;
  query: string;
  selectedIndex: number | undefined;
  items: ItemView[];
  selectionCount: number;
  executing: boolean;
}

/**
 * How the busy indicator reacts to observed results
 * - pending: stays on until every submitted request has been observed
 * - first-result: drops as soon as any result is observed
 */
export type BusyIndicatorMode = "pending" | "first-result";

/**
 * Host description reported by the bridge
 */
export interface SystemInfo {
  system?: string;
  distribution?: string;
  architecture?: string;
}

// ============================================================
// Bridge wire messages
// ============================================================

export type RpcErrorCode =
  | "NotFound"
  | "NotExecutable"
  | "InvalidInput"
  | "ProcedureNotFound"
  | "CatalogLoadError"
  | "InternalError";

export type RpcProcedureType = "query" | "mutation";

/**
 * Request line sent by a front-end
 */
export interface RpcRequest {
  id: string;
  type: RpcProcedureType;
  path: string[];
  input?: unknown;
}

/**
 * Response line written by the bridge
 */
export interface RpcResponse {
  id: string;
  success: boolean;
  data?: unknown;
  error?: {
    message: string;
    code: RpcErrorCode;
  };
}
