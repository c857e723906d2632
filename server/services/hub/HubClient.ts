import { CLOSE_CODES } from "../../../shared/types/terminal.js";
import { logDebug, logError, logWarn } from "../../utils/logger.js";
import type { SocketConnection } from "../SocketConnection.js";
import type { Disposable } from "../pty/types.js";
import { BoundedQueue } from "./BoundedQueue.js";

/** The side of the hub a client talks to. */
export interface HubMembership {
  register(client: HubClient): void;
  unregister(client: HubClient): void;
}

export interface HubClientOptions {
  id: string;
  connection: SocketConnection;
  hub: HubMembership;
  queueCapacity: number;
  pingIntervalMs: number;
}

/**
 * One broadcast subscriber. The write pump drains the outbound queue to the
 * socket in order; the read side only tracks liveness.
 */
export class HubClient {
  readonly id: string;

  private readonly connection: SocketConnection;
  private readonly hub: HubMembership;
  private readonly queue: BoundedQueue<string>;
  private readonly pingIntervalMs: number;
  private readonly disposables: Disposable[] = [];

  private pingTimer: NodeJS.Timeout | null = null;
  private awaitingPong = false;
  private started = false;
  private closed = false;

  constructor(options: HubClientOptions) {
    this.id = options.id;
    this.connection = options.connection;
    this.hub = options.hub;
    this.queue = new BoundedQueue<string>(options.queueCapacity);
    this.pingIntervalMs = options.pingIntervalMs;
  }

  start(): void {
    if (this.started || this.closed) {
      return;
    }
    this.started = true;

    this.disposables.push(
      this.connection.onMessage((data) => {
        logDebug("Ignoring inbound frame on broadcast connection", {
          clientId: this.id,
          length: data.length,
        });
      }),
      this.connection.onPong(() => {
        this.awaitingPong = false;
      }),
      this.connection.onClose((code) => {
        logDebug("Broadcast connection closed", { clientId: this.id, code });
        this.teardown();
      }),
      this.connection.onError((error) => {
        logWarn("Broadcast connection error", { clientId: this.id, error: error.message });
        this.close(CLOSE_CODES.INTERNAL_ERROR, "connection error");
      })
    );

    if (this.pingIntervalMs > 0) {
      this.pingTimer = setInterval(() => this.heartbeat(), this.pingIntervalMs);
    }

    this.hub.register(this);
    this.writePump().catch((error) => {
      logError("Broadcast write pump failed", error, { clientId: this.id });
      this.close(CLOSE_CODES.INTERNAL_ERROR, "internal error");
    });
  }

  /** Non-blocking; false means the queue is full or already closed. */
  enqueue(message: string): boolean {
    return this.queue.offer(message);
  }

  /**
   * Called by the hub when the client leaves the subscriber set. An overflowed
   * client is disconnected at once, since its pending send may never complete;
   * otherwise the write pump closes the socket once the queue is drained.
   */
  detach(overflowed: boolean): void {
    this.queue.close();
    if (overflowed) {
      this.dropSlowSubscriber();
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  pendingMessages(): number {
    return this.queue.size();
  }

  close(code: number, reason: string): void {
    if (this.connection.isOpen()) {
      this.connection.close(code, reason);
    }
    this.teardown();
  }

  private async writePump(): Promise<void> {
    for (;;) {
      const message = await this.queue.take();
      if (message === null) {
        break;
      }
      if (this.closed) {
        return;
      }

      const error = await this.write(message);
      if (this.closed) {
        return;
      }
      if (error) {
        logWarn("Broadcast write failed", { clientId: this.id, error: error.message });
        this.close(CLOSE_CODES.INTERNAL_ERROR, "write failed");
        return;
      }
    }

    this.close(CLOSE_CODES.NORMAL, "");
  }

  private dropSlowSubscriber(): void {
    if (this.closed) {
      return;
    }
    const bufferedAmount = this.connection.bufferedAmount();
    logWarn("Dropping slow broadcast subscriber", { clientId: this.id, bufferedAmount });

    // A close frame would queue behind the unsent backlog
    if (bufferedAmount > 0) {
      this.connection.terminate();
      this.teardown();
      return;
    }
    this.close(CLOSE_CODES.TRY_AGAIN_LATER, "subscriber too slow");
  }

  private write(message: string): Promise<Error | undefined> {
    return new Promise((resolve) => {
      if (!this.connection.isOpen()) {
        resolve(new Error("connection not open"));
        return;
      }
      this.connection.send(message, (error) => resolve(error));
    });
  }

  private heartbeat(): void {
    if (this.closed) {
      return;
    }
    if (this.awaitingPong) {
      logDebug("Broadcast subscriber missed pong, terminating", { clientId: this.id });
      this.connection.terminate();
      this.teardown();
      return;
    }
    this.awaitingPong = true;
    this.connection.ping();
  }

  private teardown(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    for (const disposable of this.disposables.splice(0)) {
      disposable.dispose();
    }

    this.queue.close();
    this.hub.unregister(this);
  }
}
