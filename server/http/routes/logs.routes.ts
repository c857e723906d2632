/**
 * Log Routes
 *
 * Endpoints:
 *   GET /api/logs?level=warn,error&search=text&source=TerminalSession&since=<ms>
 *       Recent server log entries, oldest first
 */

import { LOG_LEVELS, type LogLevel } from "../../services/LogBuffer.js";
import { ValidationError } from "../../utils/errorTypes.js";
import { json } from "../router.js";
import type { RouteContext, RouteHandler } from "../types.js";

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLevels(value: string | undefined): LogLevel[] {
  if (!value) return [];
  return value
    .split(",")
    .map((part) => part.trim().toLowerCase())
    .filter(isLogLevel);
}

export function parseSince(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const since = Number(value);
  if (!Number.isFinite(since) || since < 0) {
    throw new ValidationError("since must be a non-negative timestamp in milliseconds", {
      since: value,
    });
  }
  return since;
}

export function createLogRoutes(ctx: RouteContext): RouteHandler[] {
  return [
    {
      method: "GET",
      pattern: /^\/api\/logs$/,
      handler: (req) => {
        const entries = ctx.logBuffer.query({
          levels: parseLevels(req.query.level),
          source: req.query.source || undefined,
          search: req.query.search || undefined,
          since: parseSince(req.query.since),
        });
        return json(200, { entries });
      },
    },
  ];
}
