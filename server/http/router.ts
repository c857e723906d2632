import type { IncomingMessage } from "http";
import type { Readable } from "stream";
import {
  PayloadTooLargeError,
  SessionNotFoundError,
  ValidationError,
  getUserMessage,
} from "../utils/errorTypes.js";
import { logError } from "../utils/logger.js";
import type { ParsedRequest, RouteHandler, RouteResult } from "./types.js";

export const MAX_BODY_BYTES = 1024 * 1024;

export function json(status: number, body: unknown): RouteResult {
  return { status, body };
}

export function errorToResult(error: unknown): RouteResult {
  if (error instanceof ValidationError) {
    return json(400, { error: error.message });
  }
  if (error instanceof SessionNotFoundError) {
    return json(404, { error: error.message });
  }
  if (error instanceof PayloadTooLargeError) {
    return json(413, { error: error.message });
  }

  logError("Unhandled route error", error);
  return json(500, { error: getUserMessage(error) });
}

/**
 * Run the first route whose method and pattern match. Named groups in the
 * pattern become `req.params`.
 */
export async function dispatchRequest(
  routes: readonly RouteHandler[],
  req: ParsedRequest
): Promise<RouteResult> {
  for (const route of routes) {
    if (route.method !== req.method) continue;

    const match = req.path.match(route.pattern);
    if (!match) continue;

    try {
      return await route.handler({ ...req, params: match.groups ?? {} });
    } catch (error) {
      return errorToResult(error);
    }
  }

  return json(404, { error: `Route not found: ${req.method} ${req.path}` });
}

/**
 * Read a JSON body. Empty bodies parse as `{}`; malformed JSON is a
 * ValidationError and bodies over `limitBytes` a PayloadTooLargeError.
 */
export async function readJsonBody(
  stream: Readable,
  limitBytes: number = MAX_BODY_BYTES
): Promise<unknown> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of stream) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buffer.length;
    if (total > limitBytes) {
      throw new PayloadTooLargeError(limitBytes);
    }
    chunks.push(buffer);
  }

  const text = Buffer.concat(chunks).toString("utf8").trim();
  if (!text) {
    return {};
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ValidationError(
      "Invalid JSON body",
      undefined,
      error instanceof Error ? error : undefined
    );
  }
}

export async function parseRequest(req: IncomingMessage): Promise<ParsedRequest> {
  const url = new URL(req.url ?? "/", "http://localhost");
  const method = req.method ?? "GET";

  return {
    method,
    path: url.pathname,
    params: {},
    query: Object.fromEntries(url.searchParams),
    body: method === "GET" || method === "HEAD" ? {} : await readJsonBody(req),
  };
}
