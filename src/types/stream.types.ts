export type StreamState =
  | "disconnected"
  | "connecting"
  | "authenticating"
  | "connected"
  | "subscribed"
  | "listening"
  | "reconnecting";

export type ChannelKind = "ticker" | "orderbook" | "trades" | "liquidation" | "account" | "orders";

export interface IChannelArg {
  channel: string;
  instId?: string;
  instType?: string;
  ccy?: string;
}

export interface IStreamMessage {
  channel: string;
  instId: string;
  /** "snapshot" | "update" on depth channels. */
  action?: string;
  data: unknown[];
}

export type StreamHandler = (message: IStreamMessage) => void | Promise<void>;

export interface IStreamCredentials {
  apiKey: string;
  secretKey: string;
  passphrase: string;
}

/**
 * Minimal duplex text transport; ws in production, a fake in tests.
 */
export interface IStreamTransport {
  onOpen(cb: () => void): void;
  onMessage(cb: (text: string) => void): void;
  onClose(cb: (code: number, reason: string) => void): void;
  onError(cb: (err: Error) => void): void;
  send(text: string): void;
  close(): void;
  isOpen(): boolean;
}

export type TransportFactory = (url: string) => IStreamTransport;

export interface IStreamOptions {
  publicUrl: string;
  privateUrl: string;
  reconnectDelayMs: number;
  receiveTimeoutMs: number;
  authTimeoutMs: number;
}
