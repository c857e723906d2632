/**
 * Event Routes
 *
 * Endpoints:
 *   POST /api/events   Validate a broadcast event and fan it out to subscribers
 */

import { BroadcastEventSchema } from "../../schemas/events.js";
import { ValidationError } from "../../utils/errorTypes.js";
import { json } from "../router.js";
import type { RouteContext, RouteHandler } from "../types.js";

export function createEventRoutes(ctx: RouteContext): RouteHandler[] {
  return [
    {
      method: "POST",
      pattern: /^\/api\/events$/,
      handler: async (req) => {
        const parsed = BroadcastEventSchema.safeParse(req.body);
        if (!parsed.success) {
          throw new ValidationError("Invalid broadcast event", { issues: parsed.error.issues });
        }

        const delivered = await ctx.hub.broadcast(parsed.data);
        return json(202, { delivered });
      },
    },
  ];
}
