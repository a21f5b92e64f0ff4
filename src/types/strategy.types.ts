import { IMicrostructureSnapshot } from "./market.types";
import { ITradeEvent } from "./orderbook.types";
import type { OrderBookReplica } from "../orderbook/OrderBookReplica";

export const TACTIC_KINDS = ["front_running", "wall_riding", "spread_capturing"] as const;

export type TacticKind = (typeof TACTIC_KINDS)[number];

export type SignalAction = "buy" | "sell" | "market_make";
export type SignalOrderType = "market" | "limit" | "post_only";

export interface ISignal {
  readonly id: string;
  readonly strategy: TacticKind;
  readonly instrument: string;
  readonly action: SignalAction;
  readonly orderType: SignalOrderType;
  readonly price: number;
  readonly size: number;
  readonly confidence: number;
  readonly reason: string;
  readonly timestamp: number;
  /** Present on two-sided market-making signals. */
  readonly quote?: Readonly<{ bid: number; ask: number }>;
}

export interface ITacticContext {
  instrument: string;
  book: OrderBookReplica;
  features: IMicrostructureSnapshot;
  now: number;
}

/**
 * A tactic reacts to three event kinds. Hooks it does not use return [].
 */
export interface ITactic {
  readonly kind: TacticKind;
  onMarketData(ctx: ITacticContext): ISignal[];
  onOrderBook(ctx: ITacticContext): ISignal[];
  onTrade(ctx: ITacticContext, trade: ITradeEvent): ISignal[];
}

export interface ITacticStats {
  enabled: boolean;
  generated: number;
  executed: number;
  executionRate: number;
}

export interface IFrontRunningOptions {
  largeTradeThreshold: number;
  depthDropThreshold: number;
  historySize: number;
  positionSize: number;
}

export interface IWallRidingOptions {
  wallDepthThreshold: number;
  scanLevels: number;
  persistenceMs: number;
  absenceGraceMs: number;
  tickSize: number;
  positionSize: number;
  confidence: number;
}

export interface ISpreadCapturingOptions {
  minSpreadBps: number;
  maxSpreadBps: number;
  positionSize: number;
  confidence: number;
}
