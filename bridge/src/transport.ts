import WebSocket from "ws";
import { toError } from "./errors";
import type { RawFrame } from "./message-codec";

/**
 * Message-framed duplex the connection runs over. The default is a `ws`
 * client socket; tests supply an in-process fake.
 */
export interface GatewayTransport {
  send(data: string, callback: (error?: Error) => void): void;
  onOpen(listener: () => void): void;
  onMessage(listener: (data: RawFrame) => void): void;
  onClose(listener: (code: number, reason: string) => void): void;
  onError(listener: (error: Error) => void): void;
  /** Detaches every listener and closes the socket. Settles once it is closed. */
  dispose(graceful: boolean): Promise<void>;
}

export type TransportFactory = (url: string) => GatewayTransport;

// A peer that never answers the close handshake is terminated after this.
const CLOSE_TIMEOUT_MS = 2000;

export const createWebSocketTransport: TransportFactory = (url) => {
  const ws = new WebSocket(url);

  return {
    send(data, callback) {
      try {
        ws.send(data, callback);
      } catch (error) {
        callback(toError(error));
      }
    },
    onOpen(listener) {
      ws.on("open", () => listener());
    },
    onMessage(listener) {
      ws.on("message", (data) => listener(data));
    },
    onClose(listener) {
      ws.on("close", (code, reason) => listener(code, reason.toString()));
    },
    onError(listener) {
      ws.on("error", (error) => listener(error));
    },
    dispose(graceful) {
      ws.removeAllListeners();
      // Closing a socket that is still connecting emits "error".
      ws.on("error", (error) => {
        console.warn(`[gateway] discarded socket: ${error.message}`);
      });
      if (ws.readyState === WebSocket.CLOSED) {
        return Promise.resolve();
      }
      return new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          ws.terminate();
          resolve();
        }, CLOSE_TIMEOUT_MS);
        ws.once("close", () => {
          clearTimeout(timer);
          resolve();
        });
        if (graceful && ws.readyState === WebSocket.OPEN) {
          ws.close(1000, "client disconnect");
        } else {
          ws.terminate();
        }
      });
    },
  };
};
