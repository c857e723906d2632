import WebSocket from "ws";
import { rawDataToString } from "../../shared/utils/rawData.js";
import type { Transport, TransportFactory } from "../services/terminal/ConnectionController.js";

export interface WsTransportOptions {
  /** Sent as the Origin header; the server allows requests without one */
  origin?: string;
}

/** `ConnectionController` transport for Node.js, backed by `ws`. */
export function createWsTransport(options: WsTransportOptions = {}): TransportFactory {
  return (url, handlers): Transport => {
    const ws = new WebSocket(url, options.origin ? { origin: options.origin } : undefined);

    ws.on("open", () => handlers.onOpen());
    ws.on("message", (data) => handlers.onMessage(rawDataToString(data)));
    ws.on("close", (code, reason) => handlers.onClose(code, reason.toString("utf8")));
    ws.on("error", (error) => handlers.onError(error));

    return {
      send: (data) => {
        ws.send(data);
      },
      close: (code, reason) => {
        ws.close(code, reason);
      },
      isOpen: () => ws.readyState === WebSocket.OPEN,
    };
  };
}
