import { Readable } from "stream";
import { describe, expect, it } from "vitest";
import {
  PayloadTooLargeError,
  ProcessError,
  SessionNotFoundError,
  ValidationError,
} from "../../utils/errorTypes.js";
import { dispatchRequest, errorToResult, json, readJsonBody } from "../router.js";
import type { ParsedRequest, RouteHandler } from "../types.js";

function request(method: string, path: string, body: unknown = {}): ParsedRequest {
  return { method, path, params: {}, query: {}, body };
}

describe("dispatchRequest", () => {
  const routes: RouteHandler[] = [
    {
      method: "GET",
      pattern: /^\/api\/items\/(?<id>[^/]+)$/,
      handler: (req) => json(200, { id: req.params.id }),
    },
    {
      method: "POST",
      pattern: /^\/api\/items$/,
      handler: () => {
        throw new ValidationError("name is required");
      },
    },
    {
      method: "GET",
      pattern: /^\/api\/crash$/,
      handler: async () => {
        throw new Error("disk on fire");
      },
    },
  ];

  it("should pass named groups as params", async () => {
    expect(await dispatchRequest(routes, request("GET", "/api/items/42"))).toEqual({
      status: 200,
      body: { id: "42" },
    });
  });

  it("should match on method as well as path", async () => {
    expect(await dispatchRequest(routes, request("DELETE", "/api/items/42"))).toEqual({
      status: 404,
      body: { error: "Route not found: DELETE /api/items/42" },
    });
  });

  it("should map thrown errors to status codes", async () => {
    expect(await dispatchRequest(routes, request("POST", "/api/items"))).toEqual({
      status: 400,
      body: { error: "name is required" },
    });
    expect(await dispatchRequest(routes, request("GET", "/api/crash"))).toEqual({
      status: 500,
      body: { error: "disk on fire" },
    });
  });
});

describe("errorToResult", () => {
  it("should map each error class to its status", () => {
    expect(errorToResult(new SessionNotFoundError("s1"))).toEqual({
      status: 404,
      body: { error: "PTY session not found" },
    });
    expect(errorToResult(new PayloadTooLargeError(10))).toEqual({
      status: 413,
      body: { error: "Request body too large" },
    });
    expect(errorToResult(new ProcessError("spawn failed")).status).toBe(500);
    expect(errorToResult("plain string")).toEqual({
      status: 500,
      body: { error: "plain string" },
    });
  });
});

describe("readJsonBody", () => {
  it("should parse JSON split across chunks", async () => {
    const body = await readJsonBody(Readable.from([Buffer.from('{"command":'), Buffer.from('"ls"}')]));
    expect(body).toEqual({ command: "ls" });
  });

  it("should treat an empty body as an empty object", async () => {
    expect(await readJsonBody(Readable.from([]))).toEqual({});
  });

  it("should reject malformed JSON", async () => {
    await expect(readJsonBody(Readable.from([Buffer.from("{nope")]))).rejects.toThrow(
      ValidationError
    );
  });

  it("should reject bodies over the limit", async () => {
    const stream = Readable.from([Buffer.alloc(6, "a"), Buffer.alloc(6, "a")]);
    await expect(readJsonBody(stream, 10)).rejects.toThrow(PayloadTooLargeError);
  });
});
