/**
 * Catalog Protocol Package
 *
 * Shared types and schemas for the taskdeck core, bridge and front-ends.
 */

export {
  BusyIndicatorModeSchema,
  CatalogCategorySchema,
  CatalogDocumentSchema,
  CatalogEntrySchema,
  PreconditionSchema,
  RpcRequestSchema,
  ScriptSpecSchema,
  TaskListSchema,
} from "./schemas.js";
export type {
  CatalogCategoryDocument,
  CatalogDocument,
  CatalogEntry,
  CatalogEntryInput,
  Precondition,
  ScriptSpec,
  ScriptSpecInput,
} from "./schemas.js";
export type {
  BusyIndicatorMode,
  CatalogCategory,
  CatalogNode,
  CommandSpec,
  CommandType,
  ExecutableCommand,
  ExecutionResult,
  ItemView,
  LocalFileCommand,
  NodeId,
  NoCommand,
  RawCommand,
  RpcErrorCode,
  RpcProcedureType,
  RpcRequest,
  RpcResponse,
  SystemInfo,
  ViewState,
} from "./types.js";
