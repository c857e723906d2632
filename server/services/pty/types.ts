export interface Disposable {
  dispose(): void;
}

export type AdapterPlatform = "posix" | "windows";

export interface ProcessExitEvent {
  exitCode: number;
  signal?: number;
}

export interface ProcessSpawnOptions {
  shell: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
  cols: number;
  rows: number;
}

/**
 * A shell running behind a pseudo-terminal.
 *
 * Output is push-based: `onData` delivers chunks in emission order and
 * `onExit` marks end of stream. Implementations are platform specific and
 * exactly one is bound per process (see adapters/index.ts).
 */
export interface ProcessAdapter {
  readonly platform: AdapterPlatform;
  readonly pid: number;
  readonly cols: number;
  readonly rows: number;

  onData(listener: (data: string) => void): Disposable;
  onExit(listener: (event: ProcessExitEvent) => void): Disposable;

  write(data: string): void;

  /**
   * Throws a fatal ProcessError when called on an adapter built for another
   * platform than the running one.
   */
  resize(rows: number, cols: number): void;

  /** Stop reading from the pty (output backpressure) */
  pause(): void;
  resume(): void;

  /** Kill the child and release its handles. Idempotent. */
  close(): void;
  isAlive(): boolean;
}

export type ProcessAdapterFactory = (options: ProcessSpawnOptions) => ProcessAdapter;

export const MAX_COLS = 500;
export const MAX_ROWS = 200;
