import { randomUUID } from "crypto";
import type { TerminalSessionInfo } from "../../../shared/types/terminal.js";
import type { ShellcastConfig } from "../../store.js";
import { SessionNotFoundError } from "../../utils/errorTypes.js";
import { logInfo } from "../../utils/logger.js";
import type { SocketConnection } from "../SocketConnection.js";
import { createProcessAdapter } from "./adapters/index.js";
import { buildShellEnv, resolveShell, type ShellResolveOptions } from "./terminalShell.js";
import { TerminalSession } from "./TerminalSession.js";
import type { ProcessAdapterFactory } from "./types.js";

export interface SessionRegistryOptions {
  /** Read on every spawn so shell settings changes apply to new sessions */
  getConfig: () => ShellcastConfig;
  adapterFactory?: ProcessAdapterFactory;
  generateId?: () => string;
  shellOptions?: ShellResolveOptions;
}

export interface SessionSize {
  rows: number;
  cols: number;
}

/**
 * Owns the map of live terminal sessions. Sessions enter through `create`
 * and leave only through their own teardown; nothing else touches the map.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, TerminalSession>();
  private readonly getConfig: () => ShellcastConfig;
  private readonly adapterFactory: ProcessAdapterFactory;
  private readonly generateId: () => string;
  private readonly shellOptions: ShellResolveOptions;

  constructor(options: SessionRegistryOptions) {
    this.getConfig = options.getConfig;
    this.adapterFactory = options.adapterFactory ?? createProcessAdapter;
    this.generateId = options.generateId ?? randomUUID;
    this.shellOptions = options.shellOptions ?? {};
  }

  /**
   * Spawn a shell for `connection` and start pumping. Throws ProcessError when
   * the shell cannot be started; nothing is registered in that case.
   */
  create(connection: SocketConnection, size?: SessionSize): TerminalSession {
    const config = this.getConfig();
    const resolved = resolveShell(config.shell, this.shellOptions);

    const adapter = this.adapterFactory({
      shell: resolved.shell,
      args: resolved.args,
      cwd: resolved.cwd,
      env: buildShellEnv(this.shellOptions.env),
      cols: size?.cols ?? config.terminal.defaultCols,
      rows: size?.rows ?? config.terminal.defaultRows,
    });

    const session = new TerminalSession({
      sessionId: this.generateId(),
      connection,
      adapter,
      shell: resolved.shell,
      highWatermarkBytes: config.terminal.highWatermarkBytes,
      lowWatermarkBytes: config.terminal.lowWatermarkBytes,
      onClosed: (closed) => {
        this.sessions.delete(closed.sessionId);
      },
    });

    this.sessions.set(session.sessionId, session);
    logInfo("PTY session created", {
      sessionId: session.sessionId,
      shell: resolved.shell,
      pid: adapter.pid,
    });
    session.start();

    return session;
  }

  /** Undefined once a session has been torn down. */
  get(sessionId: string): TerminalSession | undefined {
    return this.sessions.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  require(sessionId: string): TerminalSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  /** Out-of-band injection; throws SessionNotFoundError for unknown or closed ids. */
  writeCommand(sessionId: string, command: string): void {
    this.require(sessionId).writeCommand(command);
  }

  list(): TerminalSessionInfo[] {
    return Array.from(this.sessions.values(), (session) => session.getInfo());
  }

  size(): number {
    return this.sessions.size;
  }

  closeAll(code: number, reason: string): void {
    for (const session of Array.from(this.sessions.values())) {
      session.close(code, reason);
    }
  }
}
