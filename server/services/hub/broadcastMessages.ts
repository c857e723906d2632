/**
 * Builders for the events flow execution publishes on the broadcast endpoint.
 * Each result has already passed the same schema `POST /api/events` applies.
 * The callers are flow runners outside this package, paired with HubSignaler.
 */

import type { BroadcastEvent, BroadcastEventType } from "../../../shared/types/events.js";
import {
  FlowCompletedEventSchema,
  FlowFailedEventSchema,
  FlowStartedEventSchema,
  LedgerUpdateEventSchema,
  NodeCompletedEventSchema,
  NodeStartedEventSchema,
  OptimizationAvailableEventSchema,
} from "../../schemas/events.js";

export type BroadcastEventOf<T extends BroadcastEventType> = Extract<BroadcastEvent, { type: T }>;

export interface NodeUsage {
  inputTokens: number;
  outputTokens: number;
  cost: number;
}

function now(): string {
  return new Date().toISOString();
}

export function flowStarted(flowId: number): BroadcastEventOf<"FLOW_STARTED"> {
  return FlowStartedEventSchema.parse({
    type: "FLOW_STARTED",
    payload: { flowId, timestamp: now() },
  });
}

export function nodeStarted(
  flowId: number,
  nodeId: string,
  label: string
): BroadcastEventOf<"NODE_STARTED"> {
  return NodeStartedEventSchema.parse({
    type: "NODE_STARTED",
    payload: { flowId, nodeId, label, timestamp: now() },
  });
}

export function nodeCompleted(
  flowId: number,
  nodeId: string,
  usage: NodeUsage
): BroadcastEventOf<"NODE_COMPLETED"> {
  return NodeCompletedEventSchema.parse({
    type: "NODE_COMPLETED",
    payload: {
      flowId,
      nodeId,
      inputTokens: usage.inputTokens,
      outputTokens: usage.outputTokens,
      cost: usage.cost,
      timestamp: now(),
    },
  });
}

export function flowCompleted(
  flowId: number,
  executionTimeMs: number
): BroadcastEventOf<"FLOW_COMPLETED"> {
  return FlowCompletedEventSchema.parse({
    type: "FLOW_COMPLETED",
    payload: { flowId, timestamp: now(), executionTimeMs },
  });
}

export function flowFailed(flowId: number, error: string): BroadcastEventOf<"FLOW_FAILED"> {
  return FlowFailedEventSchema.parse({
    type: "FLOW_FAILED",
    payload: { flowId, timestamp: now(), error },
  });
}

/** Change notification only; subscribers re-fetch the entry. */
export function ledgerUpdate(entryId: number): BroadcastEventOf<"LEDGER_UPDATE"> {
  return LedgerUpdateEventSchema.parse({ type: "LEDGER_UPDATE", payload: { entryId } });
}

export function optimizationAvailable(
  optimizationId: number
): BroadcastEventOf<"OPTIMIZATION_AVAILABLE"> {
  return OptimizationAvailableEventSchema.parse({
    type: "OPTIMIZATION_AVAILABLE",
    payload: { optimizationId },
  });
}
