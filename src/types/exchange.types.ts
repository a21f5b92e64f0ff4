import { ITradeEvent, IPriceLevel, BookSideName } from "./orderbook.types";
import { ISignal } from "./strategy.types";

export type OrderSide = "buy" | "sell";
export type OrderType = "market" | "limit" | "post_only" | "ioc" | "fok";

export interface IOrderRequest {
  instrument: string;
  side: OrderSide;
  type: OrderType;
  size: number;
  price?: number;
  clientOrderId?: string;
}

/** An immediate fill reported with the order acknowledgement. */
export interface IOrderFill {
  price: number;
  size: number;
  realizedPnl: number;
}

export type PlaceOrderResult =
  | { ok: true; orderId: string; fill?: IOrderFill }
  | { ok: false; error: string };

export interface IBalance {
  total: number;
  available: number;
}

export interface IPosition {
  instrument: string;
  side: "long" | "short" | "net";
  size: number;
  avgPrice: number;
  markPrice: number;
  notional: number;
  unrealizedPnl: number;
}

/**
 * Order routing and account queries. The core calls this only after risk
 * approval and treats any failure as "signal not executed".
 */
export interface IExecutionClient {
  placeOrder(order: IOrderRequest): Promise<PlaceOrderResult>;
  cancelAll(instrument: string): Promise<number>;
  getBalance(): Promise<IBalance>;
  getPositions(): Promise<IPosition[]>;
  /** Rolling average REST latency in milliseconds. */
  getAvgLatencyMs(): number;
}

export interface IExecutionOutcome {
  signal: ISignal;
  executed: boolean;
  orderIds: string[];
  /** Orders that filled on placement; resting quotes are not counted. */
  fills: number;
  realizedPnl: number;
  error?: string;
  latencyMs: number;
}

/**
 * Best-effort archival. Recording never blocks and never throws into the core.
 */
export interface IStorageSink {
  recordLevels(instrument: string, side: BookSideName, levels: readonly IPriceLevel[], timestamp: number): void;
  recordTrade(trade: ITradeEvent): void;
  recordSignal(signal: ISignal, outcome: SignalOutcome): void;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export type SignalOutcome = "rejected" | "executed" | "failed";
