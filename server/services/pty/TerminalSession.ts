import { CLOSE_CODES, type TerminalSessionInfo } from "../../../shared/types/terminal.js";
import { parseControlFrame } from "../../schemas/terminal.js";
import { ProcessError } from "../../utils/errorTypes.js";
import { logDebug, logError, logInfo, logWarn } from "../../utils/logger.js";
import type { SocketConnection } from "../SocketConnection.js";
import { ShellInputPump } from "./shellInput.js";
import { MAX_COLS, MAX_ROWS, type Disposable, type ProcessAdapter } from "./types.js";

export const BACKPRESSURE_POLL_MS = 50;

export interface TerminalSessionOptions {
  sessionId: string;
  connection: SocketConnection;
  adapter: ProcessAdapter;
  shell: string;
  /** Pause the shell once the socket buffers more than this */
  highWatermarkBytes: number;
  /** Resume once the socket buffer drains to this */
  lowWatermarkBytes: number;
  /** Called once, after the adapter is closed and before the socket is */
  onClosed?: (session: TerminalSession) => void;
}

export function formatWelcome(shell: string): string {
  return `\x1b[32m✓ Connected to terminal\x1b[0m (Shell: ${shell})\r\n`;
}

export function formatSpawnFailure(shell: string, message: string): string {
  return (
    `\x1b[31m✗ Failed to start terminal\x1b[0m\r\n` +
    `\r\n` +
    `${message}\r\n` +
    `\r\n` +
    `\x1b[33mTroubleshooting:\x1b[0m\r\n` +
    `  • Check that ${shell} is installed and on PATH\r\n` +
    `  • Check the configured root directory exists\r\n` +
    `  • Run \`shellcast config show\` to review the shell settings\r\n`
  );
}

/**
 * One connection bridged to one shell.
 *
 * Shell output is forwarded to the socket unmodified. Inbound frames are
 * control frames when they parse as one and raw keystrokes otherwise.
 * Teardown (socket close, socket error, shell exit, or explicit close) is
 * synchronous and happens once.
 */
export class TerminalSession {
  readonly sessionId: string;
  readonly shell: string;
  readonly createdAt = Date.now();

  private readonly connection: SocketConnection;
  private readonly adapter: ProcessAdapter;
  private readonly highWatermark: number;
  private readonly lowWatermark: number;
  private readonly onClosed?: (session: TerminalSession) => void;
  private readonly input: ShellInputPump;
  private readonly disposables: Disposable[] = [];

  private promptWatcherEnabled = false;
  private started = false;
  private closed = false;
  private outputPaused = false;
  private pausePollTimer: NodeJS.Timeout | null = null;

  private lastWriteErrorLogTime = 0;
  private suppressedWriteErrorCount = 0;

  constructor(options: TerminalSessionOptions) {
    this.sessionId = options.sessionId;
    this.shell = options.shell;
    this.connection = options.connection;
    this.adapter = options.adapter;
    this.highWatermark = options.highWatermarkBytes;
    this.lowWatermark = options.lowWatermarkBytes;
    this.onClosed = options.onClosed;

    this.input = new ShellInputPump({
      write: (chunk) => this.adapter.write(chunk),
      onError: (error) => this.logWriteError(error, { operation: "write(input)" }),
    });
  }

  /** Greet the client and start both pumps. */
  start(): void {
    if (this.started || this.closed) {
      return;
    }
    this.started = true;

    if (!this.connection.isOpen()) {
      this.close(CLOSE_CODES.NORMAL, "connection closed before start");
      return;
    }

    this.disposables.push(
      this.adapter.onData((data) => this.forwardOutput(data)),
      this.adapter.onExit(({ exitCode, signal }) => {
        logInfo("Shell process exited", { sessionId: this.sessionId, exitCode, signal });
        this.close(CLOSE_CODES.PROCESS_EXITED, "process exited");
      }),
      this.connection.onMessage((data, isBinary) => this.handleFrame(data, isBinary)),
      this.connection.onClose((code) => {
        logDebug("Terminal connection closed by peer", { sessionId: this.sessionId, code });
        this.close(CLOSE_CODES.NORMAL, "");
      }),
      this.connection.onError((error) => {
        logWarn("Terminal connection error", {
          sessionId: this.sessionId,
          error: error.message,
        });
        this.close(CLOSE_CODES.INTERNAL_ERROR, "connection error");
      })
    );

    this.connection.send(formatWelcome(this.shell));
  }

  isClosed(): boolean {
    return this.closed;
  }

  isPromptWatcherEnabled(): boolean {
    return this.promptWatcherEnabled;
  }

  isOutputPaused(): boolean {
    return this.outputPaused;
  }

  setPromptWatcher(enabled: boolean): void {
    if (this.promptWatcherEnabled === enabled) {
      return;
    }
    this.promptWatcherEnabled = enabled;
    logDebug("Prompt watcher toggled", { sessionId: this.sessionId, enabled });
  }

  /** Keystrokes to the shell, in order. */
  write(data: string): void {
    if (this.closed || data.length === 0) {
      return;
    }
    this.input.push(data);
  }

  /** Type a command into the shell as if the user had entered it. */
  writeCommand(command: string): void {
    this.write(`${command}\n`);
  }

  resize(rows: number, cols: number): void {
    if (this.closed) {
      return;
    }

    if (
      !Number.isFinite(cols) ||
      !Number.isFinite(rows) ||
      cols <= 0 ||
      rows <= 0 ||
      cols !== Math.floor(cols) ||
      rows !== Math.floor(rows)
    ) {
      logWarn("Invalid terminal dimensions", { sessionId: this.sessionId, rows, cols });
      return;
    }

    const nextCols = Math.min(cols, MAX_COLS);
    const nextRows = Math.min(rows, MAX_ROWS);
    if (this.adapter.cols === nextCols && this.adapter.rows === nextRows) {
      return;
    }

    try {
      this.adapter.resize(nextRows, nextCols);
    } catch (error) {
      if (error instanceof ProcessError && error.fatal) {
        logError("Terminal resize through wrong adapter", error, { sessionId: this.sessionId });
        this.close(CLOSE_CODES.INTERNAL_ERROR, "internal error");
        return;
      }
      logWarn("Failed to resize terminal", {
        sessionId: this.sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  getInfo(): TerminalSessionInfo {
    return {
      sessionId: this.sessionId,
      pid: this.adapter.pid,
      rows: this.adapter.rows,
      cols: this.adapter.cols,
      promptWatcherEnabled: this.promptWatcherEnabled,
      createdAt: this.createdAt,
      shell: this.shell,
    };
  }

  /**
   * Stop both pumps, release the shell, deregister, then close the socket.
   * Safe to call more than once.
   */
  close(code: number = CLOSE_CODES.NORMAL, reason = ""): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    this.stopPausePoll();
    this.input.stop();
    for (const disposable of this.disposables.splice(0)) {
      disposable.dispose();
    }

    this.adapter.close();
    this.onClosed?.(this);

    if (this.connection.isOpen()) {
      this.connection.close(code, reason);
    }

    logInfo("PTY session closed", { sessionId: this.sessionId, code, reason });
  }

  private handleFrame(data: string, isBinary: boolean): void {
    if (isBinary) {
      this.write(data);
      return;
    }

    const frame = parseControlFrame(data);
    if (!frame) {
      this.write(data);
      return;
    }

    switch (frame.type) {
      case "input":
        this.write(frame.data);
        break;
      case "resize":
        this.resize(frame.rows, frame.cols);
        break;
      case "prompt_watcher":
        this.setPromptWatcher(frame.data === "enable");
        break;
    }
  }

  private forwardOutput(data: string): void {
    if (this.closed) {
      return;
    }

    this.connection.send(data, (error) => {
      if (error) {
        this.logWriteError(error, { operation: "send(output)" });
        this.close(CLOSE_CODES.INTERNAL_ERROR, "write failed");
        return;
      }
      this.maybeResumeOutput();
    });

    if (this.closed) {
      return;
    }

    if (!this.outputPaused && this.connection.bufferedAmount() > this.highWatermark) {
      this.outputPaused = true;
      this.adapter.pause();
      logDebug("Paused shell output", {
        sessionId: this.sessionId,
        bufferedAmount: this.connection.bufferedAmount(),
      });
      this.startPausePoll();
    }
  }

  private maybeResumeOutput(): void {
    if (this.closed || !this.outputPaused) {
      return;
    }
    if (this.connection.bufferedAmount() > this.lowWatermark) {
      return;
    }

    this.outputPaused = false;
    this.stopPausePoll();
    this.adapter.resume();
    logDebug("Resumed shell output", { sessionId: this.sessionId });
  }

  private startPausePoll(): void {
    if (this.pausePollTimer) {
      return;
    }
    this.pausePollTimer = setInterval(() => this.maybeResumeOutput(), BACKPRESSURE_POLL_MS);
  }

  private stopPausePoll(): void {
    if (this.pausePollTimer) {
      clearInterval(this.pausePollTimer);
      this.pausePollTimer = null;
    }
  }

  private logWriteError(error: unknown, context: { operation: string }): void {
    const now = Date.now();
    const THROTTLE_MS = 5000;
    if (now - this.lastWriteErrorLogTime < THROTTLE_MS) {
      this.suppressedWriteErrorCount++;
      return;
    }

    const suppressed = this.suppressedWriteErrorCount;
    this.suppressedWriteErrorCount = 0;
    this.lastWriteErrorLogTime = now;

    logError(`PTY ${context.operation} failed`, error, {
      sessionId: this.sessionId,
      suppressed,
    });
  }
}
