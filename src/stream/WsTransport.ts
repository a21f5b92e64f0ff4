import WebSocket from "ws";
import { IStreamTransport } from "../types/stream.types";
import { logger } from "../utils/logger";

/** IStreamTransport over a `ws` client socket. */
export class WsTransport implements IStreamTransport {
  private ws: WebSocket;

  constructor(readonly url: string) {
    this.ws = new WebSocket(url);
  }

  onOpen(cb: () => void): void {
    this.ws.on("open", cb);
  }

  onMessage(cb: (text: string) => void): void {
    this.ws.on("message", (data: WebSocket.RawData) => cb(data.toString()));
  }

  onClose(cb: (code: number, reason: string) => void): void {
    this.ws.on("close", (code: number, reason: Buffer) => cb(code, reason.toString()));
  }

  onError(cb: (err: Error) => void): void {
    this.ws.on("error", cb);
  }

  send(text: string): void {
    this.ws.send(text);
  }

  close(): void {
    this.ws.removeAllListeners();
    // closing while CONNECTING emits an error event
    this.ws.on("error", (err: Error) => logger.debug(`[WS] error after close: ${err.message}`));
    if (
      this.ws.readyState === WebSocket.OPEN ||
      this.ws.readyState === WebSocket.CONNECTING
    ) {
      this.ws.close();
    }
  }

  isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }
}

export const wsTransportFactory = (url: string): IStreamTransport => new WsTransport(url);
