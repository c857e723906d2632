import { WebSocket, type RawData } from "ws";
import { rawDataToString } from "../../shared/utils/rawData.js";
import type { Disposable } from "./pty/types.js";

/**
 * The slice of a WebSocket that terminal sessions and hub clients use.
 * Keeps both independent of `ws` so tests can drive them with in-process fakes.
 */
export interface SocketConnection {
  isOpen(): boolean;
  /** Bytes queued by the socket but not yet handed to the OS */
  bufferedAmount(): number;
  send(data: string, callback?: (error?: Error) => void): void;
  close(code: number, reason: string): void;
  /** Drop the connection without a closing handshake */
  terminate(): void;
  ping(): void;

  onMessage(listener: (data: string, isBinary: boolean) => void): Disposable;
  onClose(listener: (code: number, reason: string) => void): Disposable;
  onError(listener: (error: Error) => void): Disposable;
  onPong(listener: () => void): Disposable;
}

export function wrapWebSocket(ws: WebSocket): SocketConnection {
  return {
    isOpen: () => ws.readyState === WebSocket.OPEN,
    bufferedAmount: () => ws.bufferedAmount,
    send: (data, callback) => {
      ws.send(data, (error) => callback?.(error));
    },
    close: (code, reason) => {
      ws.close(code, reason);
    },
    terminate: () => {
      ws.terminate();
    },
    ping: () => {
      ws.ping();
    },

    onMessage: (listener) => {
      const handler = (data: RawData, isBinary: boolean) => {
        listener(rawDataToString(data), isBinary);
      };
      ws.on("message", handler);
      return { dispose: () => ws.off("message", handler) };
    },
    onClose: (listener) => {
      const handler = (code: number, reason: Buffer) => {
        listener(code, reason.toString("utf8"));
      };
      ws.on("close", handler);
      return { dispose: () => ws.off("close", handler) };
    },
    onError: (listener) => {
      ws.on("error", listener);
      return { dispose: () => ws.off("error", listener) };
    },
    onPong: (listener) => {
      ws.on("pong", listener);
      return { dispose: () => ws.off("pong", listener) };
    },
  };
}
