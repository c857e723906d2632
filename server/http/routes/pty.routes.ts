/**
 * PTY Routes
 *
 * Endpoints:
 *   GET  /api/sessions      Public state of every live terminal session
 *   POST /api/pty/command   Type a command into a session, as its user would
 */

import { CommandInjectionSchema } from "../../schemas/terminal.js";
import { ValidationError } from "../../utils/errorTypes.js";
import { logInfo } from "../../utils/logger.js";
import { json } from "../router.js";
import type { RouteContext, RouteHandler } from "../types.js";

export function createPtyRoutes(ctx: RouteContext): RouteHandler[] {
  return [
    {
      method: "GET",
      pattern: /^\/api\/sessions$/,
      handler: () => json(200, { sessions: ctx.registry.list() }),
    },

    {
      method: "POST",
      pattern: /^\/api\/pty\/command$/,
      handler: (req) => {
        const parsed = CommandInjectionSchema.safeParse(req.body);
        if (!parsed.success) {
          throw new ValidationError("Invalid request body", { issues: parsed.error.issues });
        }

        const { sessionId, command } = parsed.data;
        if (!command) {
          return json(400, { error: "Command is required" });
        }
        if (!sessionId) {
          return json(400, { error: "sessionId is required" });
        }

        // SessionNotFoundError maps to 404
        ctx.registry.writeCommand(sessionId, command);
        logInfo("Injected command into PTY session", { sessionId, length: command.length });

        return json(200, { message: "Command injected successfully" });
      },
    },
  ];
}
