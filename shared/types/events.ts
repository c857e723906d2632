/**
 * Broadcast events delivered on the `/ws` endpoint as `{ type, payload }`.
 *
 * Delivery is at-most-once. LEDGER_UPDATE and OPTIMIZATION_AVAILABLE are
 * change notifications only: subscribers re-fetch the row by id.
 */

export const BROADCAST_EVENT_TYPES = [
  "FLOW_STARTED",
  "NODE_STARTED",
  "NODE_COMPLETED",
  "FLOW_COMPLETED",
  "FLOW_FAILED",
  "LEDGER_UPDATE",
  "OPTIMIZATION_AVAILABLE",
] as const;

export type BroadcastEventType = (typeof BROADCAST_EVENT_TYPES)[number];

export interface FlowStartedPayload {
  flowId: number;
  /** ISO 8601 */
  timestamp: string;
}

export interface NodeStartedPayload {
  flowId: number;
  nodeId: string;
  label: string;
  timestamp: string;
}

export interface NodeCompletedPayload {
  flowId: number;
  nodeId: string;
  inputTokens: number;
  outputTokens: number;
  cost: number;
  timestamp: string;
}

export interface FlowCompletedPayload {
  flowId: number;
  timestamp: string;
  executionTimeMs: number;
}

export interface FlowFailedPayload {
  flowId: number;
  timestamp: string;
  error: string;
}

export interface LedgerUpdatePayload {
  entryId: number;
}

export interface OptimizationAvailablePayload {
  optimizationId: number;
}

export interface BroadcastPayloadMap {
  FLOW_STARTED: FlowStartedPayload;
  NODE_STARTED: NodeStartedPayload;
  NODE_COMPLETED: NodeCompletedPayload;
  FLOW_COMPLETED: FlowCompletedPayload;
  FLOW_FAILED: FlowFailedPayload;
  LEDGER_UPDATE: LedgerUpdatePayload;
  OPTIMIZATION_AVAILABLE: OptimizationAvailablePayload;
}

export type BroadcastEvent = {
  [K in BroadcastEventType]: { type: K; payload: BroadcastPayloadMap[K] };
}[BroadcastEventType];
