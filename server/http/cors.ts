import { isOriginAllowed } from "./originPolicy.js";
import type { RouteResult } from "./types.js";

export const CORS_ALLOW_METHODS = "GET, POST, OPTIONS";
export const CORS_ALLOW_HEADERS = "Content-Type";

export interface CorsDecision {
  headers: Record<string, string>;
  /** Set when the request is answered without reaching a route */
  response?: RouteResult;
}

export function evaluateCors(
  method: string,
  origin: string | undefined,
  allowedOrigins: readonly string[]
): CorsDecision {
  if (!isOriginAllowed(origin, allowedOrigins)) {
    return { headers: {}, response: { status: 403, body: { error: "Origin not allowed" } } };
  }

  const headers: Record<string, string> = {};
  if (origin) {
    headers["Access-Control-Allow-Origin"] = origin;
    headers["Access-Control-Allow-Methods"] = CORS_ALLOW_METHODS;
    headers["Access-Control-Allow-Headers"] = CORS_ALLOW_HEADERS;
    headers.Vary = "Origin";
  }

  if (method === "OPTIONS") {
    return { headers, response: { status: 204, body: null } };
  }

  return { headers };
}
