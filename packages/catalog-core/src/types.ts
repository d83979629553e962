import type { ExecutableCommand, NodeId } from "@taskdeck/catalog-protocol";

/**
 * A request accepted by the coordinator. The command is resolved at
 * submission, so a grouping node can never be represented here.
 */
export interface ExecutionRequest {
  requestId: string;
  category: string;
  nodeId: NodeId;
  name: string;
  command: ExecutableCommand;
}

/**
 * Lifecycle of one request: queued (idle) → dispatched → completed
 */
export type RequestStatus = "queued" | "dispatched" | "completed";
