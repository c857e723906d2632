import { afterEach, describe, expect, it, vi } from "vitest";
import { FakeAdapter, FakeConnection } from "../../__tests__/helpers/fakes.js";
import { ProcessError } from "../../../utils/errorTypes.js";
import { TerminalSession, formatSpawnFailure, formatWelcome } from "../TerminalSession.js";

function createSession(options: { start?: boolean } = {}) {
  const connection = new FakeConnection();
  const adapter = new FakeAdapter();
  const onClosed = vi.fn<(session: TerminalSession) => void>();
  const session = new TerminalSession({
    sessionId: "s1",
    connection,
    adapter,
    shell: "/bin/bash",
    highWatermarkBytes: 1000,
    lowWatermarkBytes: 100,
    onClosed,
  });
  if (options.start !== false) {
    session.start();
  }
  return { session, connection, adapter, onClosed };
}

describe("TerminalSession", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe("output", () => {
    it("should greet the client before any shell output", () => {
      const { connection } = createSession();
      expect(connection.sent).toEqual([
        "\x1b[32m✓ Connected to terminal\x1b[0m (Shell: /bin/bash)\r\n",
      ]);
    });

    it("should forward shell output unmodified and in order", () => {
      const { connection, adapter } = createSession();
      const chunks = ["\x1b[1;32muser@host\x1b[0m:~$ ", "ls\r\n", "a.txt  b.txt\r\n"];

      for (const chunk of chunks) {
        adapter.emitData(chunk);
      }

      expect(connection.sent.slice(1)).toEqual(chunks);
      expect(connection.sent.slice(1).join("")).toBe(chunks.join(""));
    });

    it("should pause the shell above the high watermark and resume on the next drained send", () => {
      const { session, connection, adapter } = createSession();

      connection.buffered = 2000;
      adapter.emitData("flood");
      expect(adapter.paused).toBe(true);
      expect(session.isOutputPaused()).toBe(true);

      connection.buffered = 50;
      adapter.emitData("more");
      expect(adapter.paused).toBe(false);
      expect(session.isOutputPaused()).toBe(false);
    });

    it("should resume from the poll once the socket drains", async () => {
      vi.useFakeTimers();
      const { connection, adapter } = createSession();

      connection.buffered = 5000;
      adapter.emitData("flood");
      expect(adapter.pauseCount).toBe(1);

      connection.buffered = 500;
      await vi.advanceTimersByTimeAsync(60);
      expect(adapter.paused).toBe(true);

      connection.buffered = 0;
      await vi.advanceTimersByTimeAsync(60);
      expect(adapter.paused).toBe(false);
    });

    it("should tear down when a send fails", () => {
      const { connection, adapter, onClosed } = createSession();
      connection.sendError = new Error("EPIPE");

      adapter.emitData("x");

      expect(connection.closedWith).toEqual({ code: 1011, reason: "write failed" });
      expect(adapter.closeCount).toBe(1);
      expect(onClosed).toHaveBeenCalledTimes(1);
    });
  });

  describe("input frames", () => {
    it("should write raw keystrokes to the shell", () => {
      const { connection, adapter } = createSession();
      connection.receive("ls\r");
      expect(adapter.written).toEqual(["ls\r"]);
    });

    it("should feed a long paste to the shell in chunks and drop the rest on close", async () => {
      vi.useFakeTimers();
      const { session, connection, adapter } = createSession();

      connection.receive("a".repeat(200));
      expect(adapter.written).toEqual(["a".repeat(64)]);

      await vi.advanceTimersByTimeAsync(3);
      expect(adapter.written).toEqual(["a".repeat(64), "a".repeat(64)]);

      session.close();
      await vi.advanceTimersByTimeAsync(20);
      expect(adapter.written).toHaveLength(2);
    });

    it("should unwrap input control frames", () => {
      const { connection, adapter } = createSession();
      connection.receive(JSON.stringify({ type: "input", data: "pwd\r" }));
      expect(adapter.written).toEqual(["pwd\r"]);
    });

    it("should write malformed JSON as raw input", () => {
      const { connection, adapter } = createSession();
      connection.receive('{"type": "input", ');
      expect(adapter.written).toEqual(['{"type": "input", ']);
    });

    it("should write frames with an unknown type as raw input", () => {
      const { connection, adapter } = createSession();
      const frame = '{"type":"bogus","data":"x"}';
      connection.receive(frame);
      expect(adapter.written).toEqual([frame]);
    });

    it("should treat binary frames as raw input", () => {
      const { connection, adapter } = createSession();
      const frame = '{"type":"resize","rows":10,"cols":10}';
      connection.receive(frame, true);
      expect(adapter.written).toEqual([frame]);
      expect(adapter.resizes).toEqual([]);
    });
  });

  describe("resize", () => {
    it("should resize the shell from a resize frame", () => {
      const { session, connection, adapter } = createSession();
      connection.receive(JSON.stringify({ type: "resize", rows: 40, cols: 120 }));
      expect(adapter.resizes).toEqual([[40, 120]]);
      expect(session.getInfo()).toMatchObject({ rows: 40, cols: 120 });
    });

    it("should ignore invalid dimensions without writing them to the shell", () => {
      const { connection, adapter } = createSession();
      connection.receive(JSON.stringify({ type: "resize", rows: 0, cols: 80 }));
      connection.receive(JSON.stringify({ type: "resize", rows: 24, cols: 2.5 }));
      connection.receive(JSON.stringify({ type: "resize", rows: -3, cols: 80 }));
      connection.receive(JSON.stringify({ type: "resize" }));
      expect(adapter.resizes).toEqual([]);
      expect(adapter.written).toEqual([]);
    });

    it("should cap oversized dimensions", () => {
      const { session, adapter } = createSession();
      session.resize(1000, 1000);
      expect(adapter.resizes).toEqual([[200, 500]]);
    });

    it("should skip a resize to the current dimensions", () => {
      const { session, adapter } = createSession();
      session.resize(24, 80);
      expect(adapter.resizes).toEqual([]);
    });

    it("should close the session on a fatal adapter error", () => {
      const { session, connection, adapter } = createSession();
      adapter.resizeError = new ProcessError("wrong adapter", undefined, undefined, true);

      session.resize(30, 100);

      expect(session.isClosed()).toBe(true);
      expect(connection.closedWith).toEqual({ code: 1011, reason: "internal error" });
    });

    it("should keep the session open on a recoverable resize error", () => {
      const { session, adapter } = createSession();
      adapter.resizeError = new Error("ioctl failed");

      session.resize(30, 100);

      expect(session.isClosed()).toBe(false);
    });
  });

  describe("prompt watcher", () => {
    it("should default to disabled", () => {
      expect(createSession().session.isPromptWatcherEnabled()).toBe(false);
    });

    it("should follow enable and disable frames", () => {
      const { session, connection } = createSession();
      connection.receive(JSON.stringify({ type: "prompt_watcher", data: "enable" }));
      expect(session.isPromptWatcherEnabled()).toBe(true);
      connection.receive(JSON.stringify({ type: "prompt_watcher", data: "disable" }));
      expect(session.isPromptWatcherEnabled()).toBe(false);
    });

    it("should treat an unrecognized toggle value as disable", () => {
      const { session, connection } = createSession();
      session.setPromptWatcher(true);
      connection.receive(JSON.stringify({ type: "prompt_watcher", data: "maybe" }));
      expect(session.isPromptWatcherEnabled()).toBe(false);
    });

    it("should leave everything else untouched when toggled off and back on", () => {
      const { session, connection, adapter } = createSession();
      connection.receive(JSON.stringify({ type: "prompt_watcher", data: "enable" }));
      const sentBefore = [...connection.sent];

      connection.receive(JSON.stringify({ type: "prompt_watcher", data: "disable" }));
      connection.receive(JSON.stringify({ type: "prompt_watcher", data: "enable" }));

      expect(session.isPromptWatcherEnabled()).toBe(true);
      expect(connection.sent).toEqual(sentBefore);
      expect(adapter.written).toEqual([]);
      expect(adapter.resizes).toEqual([]);
      expect(adapter.closeCount).toBe(0);
      expect(connection.open).toBe(true);
    });
  });

  describe("commands", () => {
    it("should append a newline to injected commands", () => {
      const { session, adapter } = createSession();
      session.writeCommand("echo hi");
      expect(adapter.written).toEqual(["echo hi\n"]);
    });

    it("should drop writes after close", () => {
      const { session, adapter } = createSession();
      session.close();
      session.writeCommand("ls");
      expect(adapter.written).toEqual([]);
    });
  });

  describe("teardown", () => {
    it("should close the shell before deregistering when the peer hangs up", () => {
      const { connection, adapter, onClosed } = createSession();
      onClosed.mockImplementation(() => {
        expect(adapter.closeCount).toBe(1);
      });

      connection.peerClose(1001);

      expect(onClosed).toHaveBeenCalledTimes(1);
      expect(connection.closedWith).toBeNull();
      expect(connection.listenerCount()).toBe(0);
      expect(adapter.isAlive()).toBe(false);
    });

    it("should close the socket with 4001 when the shell exits", () => {
      const { connection, adapter, onClosed } = createSession();
      adapter.exit(0);
      expect(connection.closedWith).toEqual({ code: 4001, reason: "process exited" });
      expect(adapter.closeCount).toBe(1);
      expect(onClosed).toHaveBeenCalledTimes(1);
    });

    it("should close with 1011 on a connection error", () => {
      const { connection } = createSession();
      connection.emitError(new Error("ECONNRESET"));
      expect(connection.closedWith).toEqual({ code: 1011, reason: "connection error" });
    });

    it("should be idempotent", () => {
      const { session, adapter, onClosed } = createSession();
      session.close();
      session.close();
      expect(adapter.closeCount).toBe(1);
      expect(onClosed).toHaveBeenCalledTimes(1);
    });

    it("should tear down at once when the connection closed before start", () => {
      const { session, connection, adapter, onClosed } = createSession({ start: false });
      connection.open = false;

      session.start();

      expect(session.isClosed()).toBe(true);
      expect(connection.sent).toEqual([]);
      expect(adapter.closeCount).toBe(1);
      expect(onClosed).toHaveBeenCalledTimes(1);
    });
  });

  describe("messages", () => {
    it("should format the welcome line", () => {
      expect(formatWelcome("cmd.exe")).toBe(
        "\x1b[32m✓ Connected to terminal\x1b[0m (Shell: cmd.exe)\r\n"
      );
    });

    it("should include the error and the shell in the spawn failure text", () => {
      const text = formatSpawnFailure("wsl.exe", "Failed to start wsl.exe terminal: not found");
      expect(text.startsWith("\x1b[31m✗ Failed to start terminal\x1b[0m\r\n")).toBe(true);
      expect(text).toContain("Failed to start wsl.exe terminal: not found\r\n");
      expect(text).toContain("Check that wsl.exe is installed and on PATH");
    });
  });
});
