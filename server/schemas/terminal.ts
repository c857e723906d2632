/**
 * Zod schemas for frames and bodies arriving at the terminal endpoints.
 */

import { z } from "zod";
import type { TerminalControlFrame } from "../../shared/types/terminal.js";

export const InputFrameSchema = z.object({
  type: z.literal("input"),
  data: z.string().default(""),
});

/** Dimensions are range-checked by the session, which ignores bad values. */
export const ResizeFrameSchema = z.object({
  type: z.literal("resize"),
  rows: z.number().default(0),
  cols: z.number().default(0),
});

/** Anything other than "enable" disables the watcher. */
export const PromptWatcherFrameSchema = z.object({
  type: z.literal("prompt_watcher"),
  data: z
    .string()
    .default("disable")
    .transform((value): "enable" | "disable" => (value === "enable" ? "enable" : "disable")),
});

export const TerminalControlFrameSchema = z.discriminatedUnion("type", [
  InputFrameSchema,
  ResizeFrameSchema,
  PromptWatcherFrameSchema,
]);

/**
 * Parse an inbound text frame as a control frame. Returns null for anything
 * that is not one (non-JSON, unknown type, wrong shape); callers write such
 * frames to the shell as raw input.
 */
export function parseControlFrame(text: string): TerminalControlFrame | null {
  if (!text.trimStart().startsWith("{")) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }

  const result = TerminalControlFrameSchema.safeParse(json);
  return result.success ? result.data : null;
}

export const CommandInjectionSchema = z.object({
  sessionId: z.string().optional(),
  command: z.string().optional(),
});

export type CommandInjectionBody = z.infer<typeof CommandInjectionSchema>;
