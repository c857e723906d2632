/**
 * Wire protocol for the terminal endpoint (`/ws/pty`).
 *
 * Client → server frames are either raw keystrokes or one of the JSON control
 * frames below. Server → client frames are raw shell output, never framed.
 */

export type PromptWatcherToggle = "enable" | "disable";

/** Control frames a terminal client may send. */
export type TerminalControlFrame =
  | { type: "input"; data: string }
  | { type: "resize"; rows: number; cols: number }
  | { type: "prompt_watcher"; data: PromptWatcherToggle };

export type TerminalControlFrameType = TerminalControlFrame["type"];

/**
 * Close codes used on both endpoints. 1xxx codes are RFC 6455; 4xxx are
 * application codes.
 */
export const CLOSE_CODES = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  NO_STATUS: 1005,
  ABNORMAL: 1006,
  POLICY_VIOLATION: 1008,
  INTERNAL_ERROR: 1011,
  SERVICE_RESTART: 1012,
  TRY_AGAIN_LATER: 1013,
  PROCESS_EXITED: 4001,
  SPAWN_FAILED: 4002,
} as const;

export type CloseCode = (typeof CLOSE_CODES)[keyof typeof CLOSE_CODES];

/** Close codes after which a client should schedule a reconnection. */
export const RETRYABLE_CLOSE_CODES: ReadonlySet<number> = new Set<number>([
  CLOSE_CODES.GOING_AWAY,
  CLOSE_CODES.NO_STATUS,
  CLOSE_CODES.ABNORMAL,
  CLOSE_CODES.INTERNAL_ERROR,
  CLOSE_CODES.SERVICE_RESTART,
  CLOSE_CODES.TRY_AGAIN_LATER,
]);

export function isRetryableCloseCode(code: number): boolean {
  return RETRYABLE_CLOSE_CODES.has(code);
}

// ============================================================================
// Prompt detection
// ============================================================================

/**
 * - `acknowledge`: send a bare carriage return
 * - `affirm`: send `y` followed by a carriage return
 */
export type PromptResponseType = "none" | "acknowledge" | "affirm";

export type PromptConfidence = "none" | "low" | "medium" | "high";

export type PromptDetectionPass = "yes-no" | "menu" | "none";

export interface PromptDetectionResult {
  waiting: boolean;
  responseType: PromptResponseType;
  confidence: PromptConfidence;
  /** Which pass produced the result */
  pass: PromptDetectionPass;
  /** Matched text, for debugging */
  matchedText?: string;
}

export const PROMPT_RESPONSES: Record<Exclude<PromptResponseType, "none">, string> = {
  acknowledge: "\r",
  affirm: "y\r",
};

// ============================================================================
// Client connection state
// ============================================================================

export type ConnectionState = "disconnected" | "connecting" | "connected" | "reconnecting" | "failed";

/** Public view of a live terminal session, as served by `GET /api/sessions`. */
export interface TerminalSessionInfo {
  sessionId: string;
  pid: number;
  rows: number;
  cols: number;
  promptWatcherEnabled: boolean;
  createdAt: number;
  shell: string;
}
