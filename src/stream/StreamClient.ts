import { DEFAULT_STREAM_OPTIONS } from "../config/defaults";
import {
  ChannelKind,
  IChannelArg,
  IStreamCredentials,
  IStreamMessage,
  IStreamOptions,
  IStreamTransport,
  StreamHandler,
  StreamState,
  TransportFactory,
} from "../types/stream.types";
import { KEEPALIVE_PING, KEEPALIVE_PONG } from "../utils/constants";
import { AuthenticationError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { signWsLogin } from "../utils/signing";
import { isRecord } from "./okxMessages";

const CHANNEL_ROUTES: Record<string, ChannelKind> = {
  tickers: "ticker",
  books: "orderbook",
  books5: "orderbook",
  "books-l2-tbt": "orderbook",
  "books50-l2-tbt": "orderbook",
  trades: "trades",
  "liquidation-orders": "liquidation",
  account: "account",
  orders: "orders",
};

const CHANNEL_KINDS: readonly ChannelKind[] = [
  "ticker",
  "orderbook",
  "trades",
  "liquidation",
  "account",
  "orders",
];

export function routeChannel(channel: string): ChannelKind | undefined {
  return CHANNEL_ROUTES[channel];
}

function argKey(arg: IChannelArg): string {
  return `${arg.channel}|${arg.instId ?? ""}|${arg.instType ?? ""}|${arg.ccy ?? ""}`;
}

interface IPendingLogin {
  resolve: () => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * OKX v5 WebSocket session.
 *
 * disconnected -> connecting -> authenticating (private only) -> connected
 *   -> subscribed -> listening -> reconnecting -> ...
 *
 * Inbound data messages go through a single promise chain, so handlers see
 * messages in arrival order and one message's handlers run one after another.
 */
export class StreamClient {
  private options: IStreamOptions;
  private state: StreamState = "disconnected";
  private transport: IStreamTransport | null = null;
  private isPrivate = false;
  private running = false;
  private subscriptions: Map<string, IChannelArg> = new Map();
  private handlers: Map<ChannelKind, StreamHandler[]> = new Map();
  private receiveTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private pendingLogin: IPendingLogin | null = null;
  private dispatchChain: Promise<void> = Promise.resolve();
  private listeners: (() => void)[] = [];
  private messageCount = 0;
  private reconnectCount = 0;

  constructor(
    private transportFactory: TransportFactory,
    options: Partial<IStreamOptions> = {},
    private credentials?: IStreamCredentials,
    private clock: () => number = Date.now
  ) {
    this.options = { ...DEFAULT_STREAM_OPTIONS, ...options };
    for (const kind of CHANNEL_KINDS) {
      this.handlers.set(kind, []);
    }
  }

  // ==================== LIFECYCLE ====================

  /**
   * Open the transport and, for the private endpoint, log in.
   * Rejects with AuthenticationError if the login is refused or times out.
   */
  async connect(isPrivate = false): Promise<void> {
    if (isPrivate && !this.credentials) {
      throw new AuthenticationError("Private channel requested without API credentials");
    }
    this.isPrivate = isPrivate;
    this.running = true;

    try {
      await this.establish();
    } catch (err) {
      this.running = false;
      this.state = "disconnected";
      throw err;
    }
    logger.success(`[Stream] Connected (${isPrivate ? "private" : "public"})`);

    // Channels requested before the first connection
    const pending = [...this.subscriptions.values()];
    if (pending.length > 0) {
      this.sendOp("subscribe", pending);
      this.state = "subscribed";
    }
  }

  private async establish(): Promise<void> {
    const url = this.isPrivate ? this.options.privateUrl : this.options.publicUrl;
    this.state = "connecting";
    logger.info(`[Stream] Connecting to ${url}`);

    const transport = this.transportFactory(url);
    this.transport = transport;
    const opened = new Promise<void>((resolve, reject) => {
      transport.onOpen(() => resolve());
      transport.onError((err) => reject(err));
      transport.onClose((code, reason) =>
        reject(new Error(`Connection closed before open (code=${code}, reason=${reason})`))
      );
    });
    transport.onMessage((text) => this.handleRaw(transport, text));
    transport.onClose((code, reason) => this.handleClose(transport, code, reason));
    transport.onError((err) => logger.error("[Stream] Transport error", err));

    try {
      await opened;
      if (this.isPrivate) {
        this.state = "authenticating";
        await this.login(transport);
      }
    } catch (err) {
      this.clearPendingLogin();
      if (this.transport === transport) this.transport = null;
      transport.close();
      throw err;
    }

    this.state = "connected";
    this.armReceiveTimer();
  }

  private login(transport: IStreamTransport): Promise<void> {
    const creds = this.credentials;
    if (!creds) {
      return Promise.reject(new AuthenticationError("Missing API credentials"));
    }
    const timestamp = this.clock().toString();
    const sign = signWsLogin(creds.secretKey, timestamp);

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingLogin = null;
        reject(new AuthenticationError(`Login timed out after ${this.options.authTimeoutMs}ms`));
      }, this.options.authTimeoutMs);
      this.pendingLogin = { resolve, reject, timer };

      transport.send(
        JSON.stringify({
          op: "login",
          args: [{ apiKey: creds.apiKey, passphrase: creds.passphrase, timestamp, sign }],
        })
      );
    });
  }

  private settleLogin(err: Error | null): void {
    const pending = this.pendingLogin;
    if (!pending) return;
    this.pendingLogin = null;
    clearTimeout(pending.timer);
    if (err) pending.reject(err);
    else pending.resolve();
  }

  private clearPendingLogin(): void {
    if (this.pendingLogin) {
      clearTimeout(this.pendingLogin.timer);
      this.pendingLogin = null;
    }
  }

  /**
   * Resolves when close() is called. Dropped connections are retried
   * underneath, including failed re-logins.
   */
  listen(): Promise<void> {
    if (!this.running) return Promise.resolve();
    if (this.state === "connected" || this.state === "subscribed") {
      this.state = "listening";
    }
    return new Promise<void>((resolve) => {
      this.listeners.push(resolve);
    });
  }

  close(): void {
    this.running = false;
    this.clearReceiveTimer();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.settleLogin(new AuthenticationError("Client closed during login"));
    if (this.transport) {
      this.transport.close();
      this.transport = null;
    }
    this.state = "disconnected";
    this.finishListeners();
    logger.info("[Stream] Closed");
  }

  private finishListeners(): void {
    const listeners = this.listeners;
    this.listeners = [];
    for (const resolve of listeners) resolve();
  }

  // ==================== SUBSCRIPTIONS ====================

  subscribe(args: IChannelArg[]): void {
    const fresh: IChannelArg[] = [];
    for (const arg of args) {
      const key = argKey(arg);
      if (!this.subscriptions.has(key)) {
        this.subscriptions.set(key, { ...arg });
        fresh.push(arg);
      }
    }
    if (fresh.length === 0) return;
    this.sendOp("subscribe", fresh);
    if (this.state === "connected") this.state = "subscribed";
  }

  unsubscribe(args: IChannelArg[]): void {
    const removed = args.filter((arg) => this.subscriptions.delete(argKey(arg)));
    if (removed.length > 0) this.sendOp("unsubscribe", removed);
  }

  /** Drop and re-request channels, which makes OKX send a fresh snapshot. */
  resubscribe(args: IChannelArg[]): void {
    this.unsubscribe(args);
    this.subscribe(args);
  }

  private sendOp(op: "subscribe" | "unsubscribe", args: IChannelArg[]): void {
    const transport = this.transport;
    if (!transport || !transport.isOpen()) {
      logger.debug(`[Stream] ${op} deferred until connected (${args.length} channels)`);
      return;
    }
    transport.send(JSON.stringify({ op, args }));
    logger.info(`[Stream] ${op}: ${args.map((a) => `${a.channel}:${a.instId ?? "*"}`).join(", ")}`);
  }

  getSubscriptions(): IChannelArg[] {
    return [...this.subscriptions.values()].map((arg) => ({ ...arg }));
  }

  // ==================== HANDLERS ====================

  on(kind: ChannelKind, handler: StreamHandler): void {
    this.handlers.get(kind)?.push(handler);
  }

  /** Resolves once every message received so far has been dispatched. */
  idle(): Promise<void> {
    return this.dispatchChain;
  }

  private handleRaw(transport: IStreamTransport, text: string): void {
    if (transport !== this.transport) return;
    this.armReceiveTimer();
    if (text === KEEPALIVE_PONG) return;

    let msg: unknown;
    try {
      msg = JSON.parse(text);
    } catch (err) {
      logger.warning(`[Stream] Unparseable message (${errorMessage(err)}): ${text.slice(0, 200)}`);
      return;
    }
    if (!isRecord(msg)) return;

    if (typeof msg.event === "string") {
      this.handleEvent(msg.event, msg);
      return;
    }

    const arg = msg.arg;
    if (!isRecord(arg) || typeof arg.channel !== "string" || !Array.isArray(msg.data)) {
      return;
    }
    const kind = routeChannel(arg.channel);
    if (!kind) {
      logger.debug(`[Stream] No route for channel ${arg.channel}`);
      return;
    }

    this.messageCount++;
    const message: IStreamMessage = {
      channel: arg.channel,
      instId: typeof arg.instId === "string" ? arg.instId : "",
      action: typeof msg.action === "string" ? msg.action : undefined,
      data: msg.data,
    };
    this.dispatchChain = this.dispatchChain.then(() => this.dispatch(kind, message));
  }

  private async dispatch(kind: ChannelKind, message: IStreamMessage): Promise<void> {
    for (const handler of this.handlers.get(kind) ?? []) {
      try {
        await handler(message);
      } catch (err) {
        logger.error(`[Stream] ${kind} handler failed`, err);
      }
    }
  }

  private handleEvent(event: string, msg: Record<string, unknown>): void {
    const code = typeof msg.code === "string" ? msg.code : "";
    const text = typeof msg.msg === "string" ? msg.msg : "";

    switch (event) {
      case "login":
        if (code === "0") {
          logger.success("[Stream] Login accepted");
          this.settleLogin(null);
        } else {
          this.settleLogin(new AuthenticationError(`Login rejected (code=${code}, msg=${text})`));
        }
        break;
      case "error":
        logger.error(`[Stream] Exchange error (code=${code}, msg=${text})`);
        this.settleLogin(new AuthenticationError(`Login failed (code=${code}, msg=${text})`));
        break;
      case "subscribe":
      case "unsubscribe":
        logger.debug(`[Stream] ${event} acknowledged: ${JSON.stringify(msg.arg)}`);
        break;
      default:
        logger.debug(`[Stream] Event ${event}`);
    }
  }

  // ==================== KEEPALIVE / RECONNECT ====================

  private armReceiveTimer(): void {
    this.clearReceiveTimer();
    if (!this.running) return;
    this.receiveTimer = setTimeout(() => this.onReceiveTimeout(), this.options.receiveTimeoutMs);
  }

  private clearReceiveTimer(): void {
    if (this.receiveTimer) {
      clearTimeout(this.receiveTimer);
      this.receiveTimer = null;
    }
  }

  private onReceiveTimeout(): void {
    this.receiveTimer = null;
    const transport = this.transport;
    if (!this.running || !transport || !transport.isOpen()) return;
    logger.debug(`[Stream] No message for ${this.options.receiveTimeoutMs}ms, sending ping`);
    transport.send(KEEPALIVE_PING);
    this.armReceiveTimer();
  }

  private handleClose(transport: IStreamTransport, code: number, reason: string): void {
    if (transport !== this.transport) return;
    this.clearReceiveTimer();
    this.settleLogin(new AuthenticationError(`Connection closed during login (code=${code})`));
    this.transport = null;

    if (!this.running) {
      this.state = "disconnected";
      return;
    }
    // During connecting/authenticating the pending connect() sees the failure
    if (this.state === "connected" || this.state === "subscribed" || this.state === "listening") {
      logger.warning(`[Stream] Connection lost (code=${code}, reason=${reason})`);
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    this.state = "reconnecting";
    if (this.reconnectTimer) return;
    logger.info(`[Stream] Reconnecting in ${this.options.reconnectDelayMs}ms`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnect().catch((err) => logger.error("[Stream] Reconnect crashed", err));
    }, this.options.reconnectDelayMs);
  }

  private async reconnect(): Promise<void> {
    if (!this.running) return;
    try {
      await this.establish();
    } catch (err) {
      logger.error("[Stream] Reconnect failed", err);
      if (this.running) this.scheduleReconnect();
      return;
    }

    if (!this.running) return;
    const replay = [...this.subscriptions.values()];
    if (replay.length > 0) {
      this.sendOp("subscribe", replay);
    }
    this.reconnectCount++;
    this.state = "listening";
    logger.success(`[Stream] Reconnected, replayed ${replay.length} subscriptions`);
  }

  // ==================== STATUS ====================

  getState(): StreamState {
    return this.state;
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): { state: StreamState; messages: number; reconnects: number; subscriptions: number } {
    return {
      state: this.state,
      messages: this.messageCount,
      reconnects: this.reconnectCount,
      subscriptions: this.subscriptions.size,
    };
  }
}
