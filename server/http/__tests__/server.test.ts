import { describe, expect, it, vi } from "vitest";
import { FakeAdapter, FakeConnection } from "../../services/__tests__/helpers/fakes.js";
import { normalizeConfig } from "../../store.js";
import { ProcessError } from "../../utils/errorTypes.js";
import { ShellcastServer, parseInitialSize, rejectUpgrade } from "../server.js";

describe("ShellcastServer", () => {
  it("should close the connection with 4002 and explain when the shell fails to spawn", () => {
    const server = new ShellcastServer({
      getConfig: () => normalizeConfig({}),
      adapterFactory: () => {
        throw new ProcessError("Failed to spawn terminal: ENOENT", { shell: "/bin/fish" });
      },
    });
    const connection = new FakeConnection();

    server.acceptTerminal(connection);

    expect(connection.sent).toHaveLength(1);
    expect(connection.sent[0]).toContain("Failed to spawn terminal: ENOENT\r\n");
    expect(connection.sent[0]).toContain("Check that /bin/fish is installed and on PATH");
    expect(connection.closedWith).toEqual({ code: 4002, reason: "spawn failed" });
    expect(server.registry.size()).toBe(0);
  });

  it("should start a session for an accepted terminal connection", () => {
    const adapter = new FakeAdapter();
    const server = new ShellcastServer({
      getConfig: () => normalizeConfig({}),
      adapterFactory: () => adapter,
    });

    server.acceptTerminal(new FakeConnection(), { rows: 40, cols: 100 });

    expect(server.registry.size()).toBe(1);
  });

  it("should register broadcast subscribers with the hub", () => {
    const server = new ShellcastServer({ getConfig: () => normalizeConfig({}) });

    const client = server.acceptSubscriber(new FakeConnection());

    expect(server.hub.has(client)).toBe(true);
  });

  it("should close sessions and subscribers with 1001 on stop", async () => {
    const server = new ShellcastServer({
      getConfig: () => normalizeConfig({}),
      adapterFactory: () => new FakeAdapter(),
    });
    const terminal = new FakeConnection();
    const subscriber = new FakeConnection();
    server.acceptTerminal(terminal);
    server.acceptSubscriber(subscriber);

    await server.stop();

    expect(terminal.closedWith).toEqual({ code: 1001, reason: "server shutting down" });
    expect(subscriber.closedWith).toEqual({ code: 1001, reason: "server shutting down" });
    expect(server.registry.size()).toBe(0);
    expect(server.hub.size()).toBe(0);
  });
});

describe("rejectUpgrade", () => {
  it("should write a bare HTTP status line and destroy the socket", () => {
    const socket = { write: vi.fn(), destroy: vi.fn() };

    rejectUpgrade(socket, 403);

    expect(socket.write).toHaveBeenCalledWith(
      "HTTP/1.1 403 Forbidden\r\nConnection: close\r\nContent-Length: 0\r\n\r\n"
    );
    expect(socket.destroy).toHaveBeenCalledTimes(1);
  });
});

describe("parseInitialSize", () => {
  it("should read positive integer dimensions", () => {
    expect(parseInitialSize(new URLSearchParams("rows=40&cols=120"))).toEqual({
      rows: 40,
      cols: 120,
    });
  });

  it("should ignore missing or invalid dimensions", () => {
    expect(parseInitialSize(new URLSearchParams(""))).toBeUndefined();
    expect(parseInitialSize(new URLSearchParams("rows=0&cols=80"))).toBeUndefined();
    expect(parseInitialSize(new URLSearchParams("rows=24.5&cols=80"))).toBeUndefined();
  });
});
