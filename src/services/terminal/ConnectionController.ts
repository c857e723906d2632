import {
  CLOSE_CODES,
  PROMPT_RESPONSES,
  isRetryableCloseCode,
  type ConnectionState,
  type PromptDetectionResult,
  type TerminalControlFrame,
} from "../../../shared/types/terminal.js";
import {
  shouldAutoRespond,
  type PromptPatternConfig,
} from "../../../shared/utils/promptDetector.js";
import { logDebug, logInfo, logWarn } from "../../utils/logger.js";
import { DEFAULT_BACKOFF_POLICY, computeBackoffDelay } from "./backoff.js";
import { PromptWatcher } from "./PromptWatcher.js";

export interface TransportHandlers {
  onOpen: () => void;
  onMessage: (data: string) => void;
  onClose: (code: number, reason: string) => void;
  onError: (error: Error) => void;
}

export interface Transport {
  send(data: string): void;
  close(code?: number, reason?: string): void;
  isOpen(): boolean;
}

/** Opens a connection to `url`. Handlers fire only after the factory returns. */
export type TransportFactory = (url: string, handlers: TransportHandlers) => Transport;

export interface ConnectionControllerOptions {
  url: string;
  transport: TransportFactory;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  debounceMs?: number;
  bufferLimit?: number;
  rows?: number;
  cols?: number;
  promptWatcher?: boolean;
  patterns?: PromptPatternConfig;
  onOutput?: (data: string) => void;
  onStateChange?: (state: ConnectionState, previous: ConnectionState) => void;
  onAutoResponse?: (result: PromptDetectionResult, response: string) => void;
}

/**
 * Client side of the terminal endpoint: connects, reconnects with capped
 * exponential backoff after retryable closes, and answers confirmation
 * prompts when the prompt watcher is on.
 *
 * States: disconnected → connecting → connected, then on a retryable close
 * reconnecting → connected, or failed once attempts run out. Only `retry()`
 * leaves failed.
 */
export class ConnectionController {
  private state: ConnectionState = "disconnected";
  private attempt = 0;
  private transport: Transport | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private disposed = false;

  private rows: number;
  private cols: number;
  private promptWatcherEnabled: boolean;

  private readonly url: string;
  private readonly transportFactory: TransportFactory;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly watcher: PromptWatcher;
  private readonly onOutput?: (data: string) => void;
  private readonly onStateChange?: (state: ConnectionState, previous: ConnectionState) => void;
  private readonly onAutoResponse?: (result: PromptDetectionResult, response: string) => void;

  constructor(options: ConnectionControllerOptions) {
    this.url = options.url;
    this.transportFactory = options.transport;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_BACKOFF_POLICY.maxAttempts;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BACKOFF_POLICY.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_BACKOFF_POLICY.maxDelayMs;
    this.rows = options.rows ?? 24;
    this.cols = options.cols ?? 80;
    this.promptWatcherEnabled = options.promptWatcher ?? false;
    this.onOutput = options.onOutput;
    this.onStateChange = options.onStateChange;
    this.onAutoResponse = options.onAutoResponse;

    this.watcher = new PromptWatcher({
      debounceMs: options.debounceMs,
      bufferLimit: options.bufferLimit,
      patterns: options.patterns,
      onDetect: (result) => this.handleDetection(result),
    });
  }

  getState(): ConnectionState {
    return this.state;
  }

  getAttempt(): number {
    return this.attempt;
  }

  isPromptWatcherEnabled(): boolean {
    return this.promptWatcherEnabled;
  }

  connect(): void {
    if (this.disposed) {
      throw new Error("ConnectionController has been disposed");
    }
    if (this.state !== "disconnected") {
      return;
    }
    this.openTransport("connecting");
  }

  /** Manual recovery from `failed`; starts again from attempt 0. */
  retry(): void {
    if (this.disposed || this.state !== "failed") {
      return;
    }
    this.attempt = 0;
    this.openTransport("connecting");
  }

  /** User-initiated close. No reconnection follows. */
  disconnect(): void {
    this.cancelReconnect();
    this.watcher.clear();

    const transport = this.transport;
    this.transport = null;
    transport?.close(CLOSE_CODES.NORMAL, "client closed");

    this.attempt = 0;
    this.setState("disconnected");
  }

  sendInput(data: string): void {
    if (!data) return;
    this.sendFrame({ type: "input", data });
  }

  resize(rows: number, cols: number): void {
    this.rows = rows;
    this.cols = cols;
    this.sendFrame({ type: "resize", rows, cols });
  }

  setPromptWatcher(enabled: boolean): void {
    if (this.promptWatcherEnabled === enabled) {
      return;
    }
    this.promptWatcherEnabled = enabled;
    if (!enabled) {
      this.watcher.clear();
    }
    this.sendFrame({ type: "prompt_watcher", data: enabled ? "enable" : "disable" });
  }

  dispose(): void {
    if (this.disposed) return;
    this.disconnect();
    this.watcher.dispose();
    this.disposed = true;
  }

  private openTransport(next: "connecting" | "reconnecting"): void {
    this.setState(next);

    const transport = this.transportFactory(this.url, {
      onOpen: () => {
        if (this.transport === transport) this.handleOpen();
      },
      onMessage: (data) => {
        if (this.transport === transport) this.handleMessage(data);
      },
      onClose: (code, reason) => {
        if (this.transport !== transport) return;
        this.transport = null;
        this.handleClose(code, reason);
      },
      onError: (error) => {
        if (this.transport === transport) {
          logDebug("Terminal transport error", { url: this.url, error: error.message });
        }
      },
    });
    this.transport = transport;
  }

  private handleOpen(): void {
    this.attempt = 0;
    this.setState("connected");
    logInfo("Terminal connected", { url: this.url });

    this.sendFrame({ type: "resize", rows: this.rows, cols: this.cols });
    if (this.promptWatcherEnabled) {
      this.sendFrame({ type: "prompt_watcher", data: "enable" });
    }
  }

  private handleMessage(data: string): void {
    this.onOutput?.(data);
    this.watcher.push(data);
  }

  private handleClose(code: number, reason: string): void {
    this.watcher.clear();

    if (!isRetryableCloseCode(code)) {
      logInfo("Terminal connection closed", { code, reason });
      this.attempt = 0;
      this.setState("disconnected");
      return;
    }

    const delay = computeBackoffDelay(this.attempt, this.baseDelayMs, this.maxDelayMs);
    this.attempt++;

    if (this.attempt >= this.maxAttempts) {
      logWarn("Terminal reconnection attempts exhausted", { code, attempts: this.attempt });
      this.setState("failed");
      return;
    }

    logInfo("Terminal connection lost, reconnecting", { code, reason, delay, attempt: this.attempt });
    this.setState("reconnecting");
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.openTransport("reconnecting");
    }, delay);
  }

  private handleDetection(result: PromptDetectionResult): void {
    if (!this.promptWatcherEnabled || !shouldAutoRespond(result)) {
      return;
    }
    if (result.responseType === "none") {
      return;
    }

    const response = PROMPT_RESPONSES[result.responseType];
    if (!this.sendFrame({ type: "input", data: response })) {
      return;
    }

    logDebug("Answered confirmation prompt", {
      responseType: result.responseType,
      confidence: result.confidence,
    });
    this.watcher.clear();
    this.onAutoResponse?.(result, response);
  }

  private sendFrame(frame: TerminalControlFrame): boolean {
    const transport = this.transport;
    if (this.state !== "connected" || !transport || !transport.isOpen()) {
      return false;
    }
    transport.send(JSON.stringify(frame));
    return true;
  }

  private cancelReconnect(): void {
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private setState(next: ConnectionState): void {
    if (this.state === next) return;
    const previous = this.state;
    this.state = next;
    this.onStateChange?.(next, previous);
  }
}
