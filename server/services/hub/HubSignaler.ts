import type { BroadcastEvent } from "../../../shared/types/events.js";
import { logError } from "../../utils/logger.js";
import type { Hub } from "./Hub.js";

/** What flow execution code needs from the broadcast side. */
export interface FlowSignaler {
  signal(event: BroadcastEvent): void;
}

/**
 * Fire-and-forget publishing for flow execution. Failures are logged, never
 * thrown back into the flow. The flow runner lives outside this package and
 * receives one of these from whoever embeds `ShellcastServer` (`server.hub`).
 */
export class HubSignaler implements FlowSignaler {
  constructor(private readonly hub: Hub) {}

  signal(event: BroadcastEvent): void {
    try {
      this.hub.broadcast(event).catch((error: unknown) => {
        logError("Failed to broadcast event", error, { type: event.type });
      });
    } catch (error) {
      logError("Failed to broadcast event", error, { type: event.type });
    }
  }
}
