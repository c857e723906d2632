import { randomUUID } from "crypto";
import http from "http";
import type { AddressInfo } from "net";
import type { Duplex } from "stream";
import { WebSocketServer } from "ws";
import { CLOSE_CODES } from "../../shared/types/terminal.js";
import { logBuffer as defaultLogBuffer, type LogBuffer } from "../services/LogBuffer.js";
import { wrapWebSocket, type SocketConnection } from "../services/SocketConnection.js";
import { Hub } from "../services/hub/Hub.js";
import { HubClient } from "../services/hub/HubClient.js";
import { SessionRegistry, type SessionSize } from "../services/pty/SessionRegistry.js";
import { formatSpawnFailure } from "../services/pty/TerminalSession.js";
import type { ProcessAdapterFactory } from "../services/pty/types.js";
import type { ShellcastConfig } from "../store.js";
import { ProcessError, getUserMessage } from "../utils/errorTypes.js";
import { logError, logInfo, logWarn } from "../utils/logger.js";
import { evaluateCors } from "./cors.js";
import { isOriginAllowed } from "./originPolicy.js";
import { dispatchRequest, errorToResult, parseRequest } from "./router.js";
import { createAllRoutes } from "./routes/index.js";
import type { RouteHandler, RouteResult } from "./types.js";

export const TERMINAL_PATH = "/ws/pty";
export const BROADCAST_PATH = "/ws";

export interface ShellcastServerOptions {
  /** Read for every new terminal session; server settings are read once */
  getConfig: () => ShellcastConfig;
  adapterFactory?: ProcessAdapterFactory;
  logBuffer?: LogBuffer;
}

/** What `handleUpgrade` needs from the raw socket to turn a request away. */
export interface UpgradeSocket {
  write(chunk: string): unknown;
  destroy(): unknown;
}

export function rejectUpgrade(socket: UpgradeSocket, status: number): void {
  const reason = http.STATUS_CODES[status] ?? "Error";
  socket.write(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

/** Optional `?rows=&cols=` on the terminal endpoint. */
export function parseInitialSize(params: URLSearchParams): SessionSize | undefined {
  const rows = Number(params.get("rows"));
  const cols = Number(params.get("cols"));
  if (Number.isInteger(rows) && Number.isInteger(cols) && rows > 0 && cols > 0) {
    return { rows, cols };
  }
  return undefined;
}

/**
 * HTTP routes plus the two WebSocket endpoints: `/ws/pty` bridges one
 * connection to one shell, `/ws` subscribes to broadcast events.
 */
export class ShellcastServer {
  readonly registry: SessionRegistry;
  readonly hub = new Hub();

  private readonly config: ShellcastConfig;
  private readonly routes: RouteHandler[];
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly startedAt = Date.now();
  private server: http.Server | null = null;

  constructor(options: ShellcastServerOptions) {
    this.config = options.getConfig();
    this.registry = new SessionRegistry({
      getConfig: options.getConfig,
      adapterFactory: options.adapterFactory,
    });
    this.routes = createAllRoutes({
      registry: this.registry,
      hub: this.hub,
      logBuffer: options.logBuffer ?? defaultLogBuffer,
      startedAt: this.startedAt,
    });
  }

  start(): Promise<AddressInfo> {
    const { host, port } = this.config.server;

    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((error) => {
          logError("HTTP request failed", error, { url: req.url });
          if (!res.headersSent) {
            this.sendJson(res, 500, { error: getUserMessage(error) }, {});
          } else {
            res.end();
          }
        });
      });

      server.on("upgrade", (req, socket, head) => this.handleUpgrade(req, socket, head));
      server.once("error", reject);

      server.listen(port, host, () => {
        server.off("error", reject);
        this.server = server;

        const address = server.address();
        if (!address || typeof address === "string") {
          reject(new Error("Server is not listening on a TCP port"));
          return;
        }
        logInfo("Shellcast server listening", { host: address.address, port: address.port });
        resolve(address);
      });
    });
  }

  /** Close every session and subscriber with 1001, then stop listening. */
  stop(): Promise<void> {
    this.registry.closeAll(CLOSE_CODES.GOING_AWAY, "server shutting down");
    this.hub.closeAll(CLOSE_CODES.GOING_AWAY, "server shutting down");

    return new Promise((resolve, reject) => {
      this.wss.close();
      const server = this.server;
      this.server = null;
      if (!server) {
        resolve();
        return;
      }
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logInfo("Shellcast server stopped");
        resolve();
      });
      server.closeAllConnections();
    });
  }

  /**
   * Spawn a shell for a newly upgraded terminal connection. A spawn failure
   * is written to the client once and the connection closed with 4002.
   */
  acceptTerminal(connection: SocketConnection, size?: SessionSize): void {
    try {
      this.registry.create(connection, size);
    } catch (error) {
      logError("Failed to start terminal session", error);
      const shell =
        error instanceof ProcessError && typeof error.context?.shell === "string"
          ? error.context.shell
          : "the configured shell";
      if (connection.isOpen()) {
        connection.send(formatSpawnFailure(shell, getUserMessage(error)));
        connection.close(CLOSE_CODES.SPAWN_FAILED, "spawn failed");
      }
    }
  }

  acceptSubscriber(connection: SocketConnection): HubClient {
    const client = new HubClient({
      id: randomUUID(),
      connection,
      hub: this.hub,
      queueCapacity: this.config.hub.queueCapacity,
      pingIntervalMs: this.config.hub.pingIntervalMs,
    });
    client.start();
    return client;
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const cors = evaluateCors(
      req.method ?? "GET",
      req.headers.origin,
      this.config.server.allowedOrigins
    );
    if (cors.response) {
      if (cors.response.status === 403) {
        logWarn("Rejected request from disallowed origin", { origin: req.headers.origin });
      }
      this.sendResult(res, cors.response, cors.headers);
      return;
    }

    let result: RouteResult;
    try {
      const parsed = await parseRequest(req);
      result = await dispatchRequest(this.routes, parsed);
    } catch (error) {
      result = errorToResult(error);
    }

    this.sendResult(res, result, cors.headers);
  }

  private handleUpgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer): void {
    const url = new URL(req.url ?? "/", "http://localhost");
    const endpoint =
      url.pathname === TERMINAL_PATH
        ? "terminal"
        : url.pathname === BROADCAST_PATH
          ? "broadcast"
          : null;

    if (!endpoint) {
      rejectUpgrade(socket, 404);
      return;
    }

    if (!isOriginAllowed(req.headers.origin, this.config.server.allowedOrigins)) {
      logWarn("Rejected WebSocket upgrade from disallowed origin", {
        origin: req.headers.origin,
        path: url.pathname,
      });
      rejectUpgrade(socket, 403);
      return;
    }

    this.wss.handleUpgrade(req, socket, head, (ws) => {
      const connection = wrapWebSocket(ws);
      if (endpoint === "terminal") {
        this.acceptTerminal(connection, parseInitialSize(url.searchParams));
      } else {
        this.acceptSubscriber(connection);
      }
    });
  }

  private sendResult(
    res: http.ServerResponse,
    result: RouteResult,
    headers: Record<string, string>
  ): void {
    if (result.status === 204) {
      res.writeHead(204, headers);
      res.end();
      return;
    }
    this.sendJson(res, result.status, result.body, headers);
  }

  private sendJson(
    res: http.ServerResponse,
    status: number,
    body: unknown,
    headers: Record<string, string>
  ): void {
    res.writeHead(status, { "Content-Type": "application/json", ...headers });
    res.end(JSON.stringify(body));
  }
}
