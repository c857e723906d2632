import type { LogBuffer } from "../services/LogBuffer.js";
import type { Hub } from "../services/hub/Hub.js";
import type { SessionRegistry } from "../services/pty/SessionRegistry.js";

/**
 * Parsed HTTP request with extracted parameters
 */
export interface ParsedRequest {
  method: string;
  path: string;
  params: Record<string, string>;
  query: Record<string, string>;
  body: unknown;
}

export interface RouteResult {
  status: number;
  body: unknown;
}

/**
 * Route handler definition
 */
export interface RouteHandler {
  method: string;
  pattern: RegExp;
  handler: (req: ParsedRequest) => RouteResult | Promise<RouteResult>;
}

/**
 * Context provided to route factory functions
 */
export interface RouteContext {
  registry: SessionRegistry;
  hub: Hub;
  logBuffer: LogBuffer;
  startedAt: number;
}

export type RouteFactory = (ctx: RouteContext) => RouteHandler[];
