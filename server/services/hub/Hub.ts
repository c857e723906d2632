import type { BroadcastEvent } from "../../../shared/types/events.js";
import { CLOSE_CODES } from "../../../shared/types/terminal.js";
import { logDebug, logInfo, logWarn } from "../../utils/logger.js";
import type { HubClient, HubMembership } from "./HubClient.js";

type HubRequest =
  | { kind: "register"; client: HubClient }
  | { kind: "unregister"; client: HubClient }
  | { kind: "broadcast"; message: string; resolve: (delivered: number) => void }
  | { kind: "unicast"; client: HubClient; message: string; resolve: (sent: boolean) => void }
  | { kind: "shutdown"; code: number; reason: string };

/**
 * Owns the broadcast subscriber set.
 *
 * Every mutation arrives as a request and requests are handled one at a time
 * in arrival order. Requests raised while one is being handled (a client
 * unregistering as it is evicted, say) queue behind it, so the set is never
 * changed under an iteration.
 */
export class Hub implements HubMembership {
  private readonly clients = new Set<HubClient>();
  private readonly requests: HubRequest[] = [];
  private draining = false;
  private shutDown = false;

  register(client: HubClient): void {
    this.submit({ kind: "register", client });
  }

  unregister(client: HubClient): void {
    this.submit({ kind: "unregister", client });
  }

  /**
   * Queue `event` for every current subscriber. Resolves with the number of
   * subscribers it was queued for; subscribers with a full queue are dropped.
   */
  broadcast(event: BroadcastEvent): Promise<number> {
    const message = JSON.stringify(event);
    return new Promise((resolve) => {
      this.submit({ kind: "broadcast", message, resolve });
    });
  }

  /** Unicast with the same overflow policy as `broadcast`. */
  sendToClient(client: HubClient, event: BroadcastEvent): Promise<boolean> {
    const message = JSON.stringify(event);
    return new Promise((resolve) => {
      this.submit({ kind: "unicast", client, message, resolve });
    });
  }

  /** Close every subscriber and refuse new ones. */
  closeAll(code: number, reason: string): void {
    this.submit({ kind: "shutdown", code, reason });
  }

  has(client: HubClient): boolean {
    return this.clients.has(client);
  }

  size(): number {
    return this.clients.size;
  }

  private submit(request: HubRequest): void {
    this.requests.push(request);
    if (this.draining) {
      return;
    }

    this.draining = true;
    try {
      let next = this.requests.shift();
      while (next) {
        this.handle(next);
        next = this.requests.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private handle(request: HubRequest): void {
    switch (request.kind) {
      case "register":
        if (this.shutDown) {
          request.client.close(CLOSE_CODES.GOING_AWAY, "server shutting down");
          return;
        }
        this.clients.add(request.client);
        logDebug("Broadcast subscriber registered", {
          clientId: request.client.id,
          subscribers: this.clients.size,
        });
        return;

      case "unregister":
        if (this.clients.delete(request.client)) {
          request.client.detach(false);
          logDebug("Broadcast subscriber unregistered", {
            clientId: request.client.id,
            subscribers: this.clients.size,
          });
        }
        return;

      case "broadcast": {
        let delivered = 0;
        for (const client of Array.from(this.clients)) {
          if (client.enqueue(request.message)) {
            delivered++;
          } else {
            this.evict(client);
          }
        }
        request.resolve(delivered);
        return;
      }

      case "unicast": {
        if (!this.clients.has(request.client)) {
          request.resolve(false);
          return;
        }
        const sent = request.client.enqueue(request.message);
        if (!sent) {
          this.evict(request.client);
        }
        request.resolve(sent);
        return;
      }

      case "shutdown": {
        this.shutDown = true;
        const clients = Array.from(this.clients);
        this.clients.clear();
        for (const client of clients) {
          client.close(request.code, request.reason);
        }
        logInfo("Broadcast hub closed", { subscribers: clients.length });
        return;
      }
    }
  }

  private evict(client: HubClient): void {
    this.clients.delete(client);
    client.detach(true);
    logWarn("Evicted broadcast subscriber with a full queue", {
      clientId: client.id,
      subscribers: this.clients.size,
    });
  }
}
