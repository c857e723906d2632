import type { PromptDetectionResult } from "../../../shared/types/terminal.js";
import {
  DEFAULT_PROMPT_PATTERNS,
  detectPrompt,
  type PromptPatternConfig,
} from "../../../shared/utils/promptDetector.js";

export const PROMPT_DEBOUNCE_MS = 500;
export const PROMPT_BUFFER_LIMIT = 3000;

export interface PromptWatcherOptions {
  debounceMs?: number;
  /** Characters of recent output kept for detection */
  bufferLimit?: number;
  patterns?: PromptPatternConfig;
  onDetect: (result: PromptDetectionResult) => void;
}

/**
 * Keeps the tail of terminal output and classifies it once output has been
 * quiet for `debounceMs`. Every chunk restarts the quiet period.
 */
export class PromptWatcher {
  private buffer = "";
  private timer: ReturnType<typeof setTimeout> | null = null;

  private readonly debounceMs: number;
  private readonly bufferLimit: number;
  private readonly patterns: PromptPatternConfig;
  private readonly onDetect: (result: PromptDetectionResult) => void;

  constructor(options: PromptWatcherOptions) {
    this.debounceMs = options.debounceMs ?? PROMPT_DEBOUNCE_MS;
    this.bufferLimit = options.bufferLimit ?? PROMPT_BUFFER_LIMIT;
    this.patterns = options.patterns ?? DEFAULT_PROMPT_PATTERNS;
    this.onDetect = options.onDetect;
  }

  push(chunk: string): void {
    if (!chunk) return;

    this.buffer += chunk;
    if (this.buffer.length > this.bufferLimit) {
      this.buffer = this.buffer.slice(-this.bufferLimit);
    }

    this.cancelTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.onDetect(detectPrompt(this.buffer, this.patterns));
    }, this.debounceMs);
  }

  /** Forget accumulated output so an answered prompt cannot match again. */
  clear(): void {
    this.buffer = "";
    this.cancelTimer();
  }

  getBuffer(): string {
    return this.buffer;
  }

  isPending(): boolean {
    return this.timer !== null;
  }

  dispose(): void {
    this.clear();
  }

  private cancelTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
