import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeAdapter, FakeConnection } from "../../services/__tests__/helpers/fakes.js";
import { LogBuffer } from "../../services/LogBuffer.js";
import { Hub } from "../../services/hub/Hub.js";
import { HubClient } from "../../services/hub/HubClient.js";
import { SessionRegistry } from "../../services/pty/SessionRegistry.js";
import { normalizeConfig } from "../../store.js";
import { dispatchRequest } from "../router.js";
import { createAllRoutes } from "../routes/index.js";
import { parseLevels, parseSince } from "../routes/logs.routes.js";
import type { ParsedRequest, RouteHandler } from "../types.js";

function post(path: string, body: unknown): ParsedRequest {
  return { method: "POST", path, params: {}, query: {}, body };
}

function get(path: string, query: Record<string, string> = {}): ParsedRequest {
  return { method: "GET", path, params: {}, query, body: {} };
}

describe("routes", () => {
  let adapters: FakeAdapter[];
  let registry: SessionRegistry;
  let hub: Hub;
  let logBuffer: LogBuffer;
  let routes: RouteHandler[];

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-01T10:00:00.000Z"));

    adapters = [];
    let nextId = 1;
    registry = new SessionRegistry({
      getConfig: () => normalizeConfig({}),
      adapterFactory: () => {
        const adapter = new FakeAdapter();
        adapters.push(adapter);
        return adapter;
      },
      generateId: () => `sess-${nextId++}`,
      shellOptions: {
        platform: "linux",
        env: { SHELL: "/bin/bash" },
        homeDir: "/home/dev",
        isDirectory: () => false,
      },
    });
    hub = new Hub();
    logBuffer = new LogBuffer();
    routes = createAllRoutes({
      registry,
      hub,
      logBuffer,
      startedAt: Date.now() - 1500,
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("GET /api/health", () => {
    it("should report counts and uptime", async () => {
      registry.create(new FakeConnection());
      new HubClient({
        id: "c1",
        connection: new FakeConnection(),
        hub,
        queueCapacity: 4,
        pingIntervalMs: 0,
      }).start();

      expect(await dispatchRequest(routes, get("/api/health"))).toEqual({
        status: 200,
        body: { status: "ok", sessions: 1, subscribers: 1, uptimeMs: 1500 },
      });
    });
  });

  describe("GET /api/sessions", () => {
    it("should list live sessions", async () => {
      registry.create(new FakeConnection());

      expect(await dispatchRequest(routes, get("/api/sessions"))).toEqual({
        status: 200,
        body: {
          sessions: [
            {
              sessionId: "sess-1",
              pid: 4242,
              rows: 24,
              cols: 80,
              promptWatcherEnabled: false,
              createdAt: Date.parse("2026-03-01T10:00:00.000Z"),
              shell: "/bin/bash",
            },
          ],
        },
      });
    });
  });

  describe("POST /api/pty/command", () => {
    it("should inject the command followed by a newline", async () => {
      registry.create(new FakeConnection());

      const result = await dispatchRequest(
        routes,
        post("/api/pty/command", { sessionId: "sess-1", command: "npm test" })
      );

      expect(result).toEqual({ status: 200, body: { message: "Command injected successfully" } });
      expect(adapters[0].written).toEqual(["npm test\n"]);
    });

    it("should require a command", async () => {
      expect(
        await dispatchRequest(routes, post("/api/pty/command", { sessionId: "sess-1", command: "" }))
      ).toEqual({ status: 400, body: { error: "Command is required" } });
    });

    it("should check the command before the session id", async () => {
      expect(await dispatchRequest(routes, post("/api/pty/command", {}))).toEqual({
        status: 400,
        body: { error: "Command is required" },
      });
    });

    it("should require a session id", async () => {
      expect(
        await dispatchRequest(routes, post("/api/pty/command", { command: "ls" }))
      ).toEqual({ status: 400, body: { error: "sessionId is required" } });
    });

    it("should answer 404 for an unknown session", async () => {
      expect(
        await dispatchRequest(
          routes,
          post("/api/pty/command", { sessionId: "missing", command: "ls" })
        )
      ).toEqual({ status: 404, body: { error: "PTY session not found" } });
    });

    it("should answer 404 once the session has closed", async () => {
      const connection = new FakeConnection();
      registry.create(connection);
      connection.peerClose();

      const result = await dispatchRequest(
        routes,
        post("/api/pty/command", { sessionId: "sess-1", command: "ls" })
      );

      expect(result.status).toBe(404);
      expect(adapters[0].written).toEqual([]);
    });

    it("should answer 400 for fields of the wrong type", async () => {
      const result = await dispatchRequest(
        routes,
        post("/api/pty/command", { sessionId: "sess-1", command: ["ls"] })
      );
      expect(result).toEqual({ status: 400, body: { error: "Invalid request body" } });
    });
  });

  describe("POST /api/events", () => {
    it("should broadcast a valid event and report deliveries", async () => {
      const connection = new FakeConnection();
      new HubClient({ id: "c1", connection, hub, queueCapacity: 4, pingIntervalMs: 0 }).start();

      const result = await dispatchRequest(
        routes,
        post("/api/events", { type: "LEDGER_UPDATE", payload: { entryId: 3 } })
      );

      expect(result).toEqual({ status: 202, body: { delivered: 1 } });
    });

    it("should reject an invalid event", async () => {
      const result = await dispatchRequest(
        routes,
        post("/api/events", { type: "LEDGER_UPDATE", payload: { entryId: "three" } })
      );
      expect(result).toEqual({ status: 400, body: { error: "Invalid broadcast event" } });
    });
  });

  describe("GET /api/logs", () => {
    it("should filter entries by level and search text", async () => {
      logBuffer.push({ timestamp: 1, level: "info", message: "session created" });
      logBuffer.push({ timestamp: 2, level: "warn", message: "session slow" });
      logBuffer.push({ timestamp: 3, level: "error", message: "hub failed" });

      const result = await dispatchRequest(
        routes,
        get("/api/logs", { level: "warn,error", search: "session" })
      );

      expect(result.status).toBe(200);
      expect(result.body).toEqual({
        entries: [expect.objectContaining({ level: "warn", message: "session slow" })],
      });
    });

    it("should filter entries by source and start time", async () => {
      logBuffer.push({ timestamp: 100, level: "info", message: "spawned", source: "SessionRegistry" });
      logBuffer.push({ timestamp: 200, level: "info", message: "closed", source: "TerminalSession" });
      logBuffer.push({ timestamp: 300, level: "info", message: "spawned", source: "SessionRegistry" });

      const result = await dispatchRequest(
        routes,
        get("/api/logs", { source: "SessionRegistry", since: "150" })
      );

      expect(result.status).toBe(200);
      expect(result.body).toEqual({
        entries: [expect.objectContaining({ timestamp: 300, message: "spawned" })],
      });
    });

    it("should answer 400 for a malformed start time", async () => {
      const result = await dispatchRequest(routes, get("/api/logs", { since: "yesterday" }));

      expect(result).toEqual({
        status: 400,
        body: { error: "since must be a non-negative timestamp in milliseconds" },
      });
    });
  });
});

describe("parseLevels", () => {
  it("should keep known levels only", () => {
    expect(parseLevels("Warn, error,verbose,")).toEqual(["warn", "error"]);
    expect(parseLevels(undefined)).toEqual([]);
  });
});

describe("parseSince", () => {
  it("should accept epoch milliseconds and ignore an empty value", () => {
    expect(parseSince("1700000000000")).toBe(1700000000000);
    expect(parseSince("")).toBeUndefined();
    expect(parseSince(undefined)).toBeUndefined();
  });

  it("should reject negative or non-numeric values", () => {
    expect(() => parseSince("-1")).toThrow("since must be a non-negative timestamp in milliseconds");
    expect(() => parseSince("soon")).toThrow("since must be a non-negative timestamp in milliseconds");
  });
});
