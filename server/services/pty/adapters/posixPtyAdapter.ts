import * as pty from "node-pty";
import type { IPty } from "node-pty";
import { ProcessError } from "../../../utils/errorTypes.js";
import { logDebug } from "../../../utils/logger.js";
import type {
  Disposable,
  ProcessAdapter,
  ProcessExitEvent,
  ProcessSpawnOptions,
} from "../types.js";

/**
 * POSIX pseudo-terminal (openpty/forkpty through node-pty).
 */
export class PosixPtyAdapter implements ProcessAdapter {
  readonly platform = "posix" as const;

  private alive = true;
  private closed = false;
  private readonly listeners: Disposable[] = [];

  constructor(private readonly ptyProcess: IPty) {
    this.listeners.push(
      ptyProcess.onExit(() => {
        this.alive = false;
      })
    );
  }

  static spawn(options: ProcessSpawnOptions): PosixPtyAdapter {
    try {
      const ptyProcess = pty.spawn(options.shell, options.args, {
        name: "xterm-256color",
        cols: options.cols,
        rows: options.rows,
        cwd: options.cwd,
        env: options.env,
      });
      return new PosixPtyAdapter(ptyProcess);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new ProcessError(
        `Failed to spawn terminal: ${errorMessage}`,
        { shell: options.shell, cwd: options.cwd },
        error instanceof Error ? error : undefined
      );
    }
  }

  get pid(): number {
    return this.ptyProcess.pid;
  }

  get cols(): number {
    return this.ptyProcess.cols;
  }

  get rows(): number {
    return this.ptyProcess.rows;
  }

  onData(listener: (data: string) => void): Disposable {
    const disposable = this.ptyProcess.onData(listener);
    this.listeners.push(disposable);
    return disposable;
  }

  onExit(listener: (event: ProcessExitEvent) => void): Disposable {
    const disposable = this.ptyProcess.onExit(({ exitCode, signal }) => {
      listener({ exitCode, signal });
    });
    this.listeners.push(disposable);
    return disposable;
  }

  write(data: string): void {
    if (this.closed) {
      throw new ProcessError("Write to closed terminal", { pid: this.pid });
    }
    this.ptyProcess.write(data);
  }

  resize(rows: number, cols: number): void {
    if (process.platform === "win32") {
      throw new ProcessError(
        "POSIX pty adapter used on Windows",
        { platform: process.platform },
        undefined,
        true
      );
    }
    this.ptyProcess.resize(cols, rows);
  }

  pause(): void {
    this.ptyProcess.pause();
  }

  resume(): void {
    this.ptyProcess.resume();
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const listener of this.listeners.splice(0)) {
      listener.dispose();
    }

    if (this.alive) {
      try {
        this.ptyProcess.kill();
      } catch (error) {
        logDebug("PTY kill failed, process already gone", {
          pid: this.pid,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    this.alive = false;
  }

  isAlive(): boolean {
    return this.alive;
  }
}

export function createPosixPtyAdapter(options: ProcessSpawnOptions): ProcessAdapter {
  return PosixPtyAdapter.spawn(options);
}
