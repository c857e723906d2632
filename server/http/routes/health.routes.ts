/**
 * Health Routes
 *
 * Endpoints:
 *   GET /api/health   Liveness plus session and subscriber counts
 */

import { json } from "../router.js";
import type { RouteContext, RouteHandler } from "../types.js";

export function createHealthRoutes(ctx: RouteContext): RouteHandler[] {
  return [
    {
      method: "GET",
      pattern: /^\/api\/health$/,
      handler: () =>
        json(200, {
          status: "ok",
          sessions: ctx.registry.size(),
          subscribers: ctx.hub.size(),
          uptimeMs: Date.now() - ctx.startedAt,
        }),
    },
  ];
}
