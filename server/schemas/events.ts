/**
 * Zod schemas for broadcast events accepted on `POST /api/events` and
 * produced by the message builders.
 */

import { z } from "zod";
import type { BroadcastEvent } from "../../shared/types/events.js";

const timestamp = z.string().datetime({ offset: true });
const flowId = z.number().int().nonnegative();

export const FlowStartedEventSchema = z.object({
  type: z.literal("FLOW_STARTED"),
  payload: z.object({ flowId, timestamp }),
});

export const NodeStartedEventSchema = z.object({
  type: z.literal("NODE_STARTED"),
  payload: z.object({ flowId, nodeId: z.string().min(1), label: z.string(), timestamp }),
});

export const NodeCompletedEventSchema = z.object({
  type: z.literal("NODE_COMPLETED"),
  payload: z.object({
    flowId,
    nodeId: z.string().min(1),
    inputTokens: z.number().int().nonnegative(),
    outputTokens: z.number().int().nonnegative(),
    cost: z.number().nonnegative(),
    timestamp,
  }),
});

export const FlowCompletedEventSchema = z.object({
  type: z.literal("FLOW_COMPLETED"),
  payload: z.object({ flowId, timestamp, executionTimeMs: z.number().int().nonnegative() }),
});

export const FlowFailedEventSchema = z.object({
  type: z.literal("FLOW_FAILED"),
  payload: z.object({ flowId, timestamp, error: z.string() }),
});

export const LedgerUpdateEventSchema = z.object({
  type: z.literal("LEDGER_UPDATE"),
  payload: z.object({ entryId: z.number().int().nonnegative() }),
});

export const OptimizationAvailableEventSchema = z.object({
  type: z.literal("OPTIMIZATION_AVAILABLE"),
  payload: z.object({ optimizationId: z.number().int().nonnegative() }),
});

export const BroadcastEventSchema = z.discriminatedUnion("type", [
  FlowStartedEventSchema,
  NodeStartedEventSchema,
  NodeCompletedEventSchema,
  FlowCompletedEventSchema,
  FlowFailedEventSchema,
  LedgerUpdateEventSchema,
  OptimizationAvailableEventSchema,
]);

export function parseBroadcastEvent(input: unknown): BroadcastEvent {
  return BroadcastEventSchema.parse(input);
}
