import { ILiquidityVoid, IWallDescriptor } from "./orderbook.types";

export type SpreadStatus = "normal" | "wide" | "extreme";
export type OfiTrend = "rising" | "falling" | "stable";

/** One recorded top-of-book observation. */
export interface IBookSample {
  timestamp: number;
  bestBidSize: number;
  bestAskSize: number;
  bidDepth5: number;
  askDepth5: number;
}

export interface IPressureIndex {
  buyPressure: number;
  sellPressure: number;
  netPressure: number;
  imbalance: number;
}

export interface ISpoofingSignal {
  side: "bid";
  price: number;
  previousSize: number;
  currentSize: number;
}

export interface IMicrostructureSnapshot {
  readonly instrument: string;
  readonly timestamp: number;
  readonly bestBid: number;
  readonly bestAsk: number;
  readonly bestBidSize: number;
  readonly bestAskSize: number;
  readonly mid: number;
  readonly wmp: number;
  readonly spread: number;
  readonly spreadBps: number;
  readonly spreadStatus: SpreadStatus;
  readonly ofi1s: number;
  readonly ofi5s: number;
  readonly ofiTrend: OfiTrend;
  readonly bidDepth5: number;
  readonly askDepth5: number;
  readonly pressure: Readonly<IPressureIndex>;
  readonly liquidityVoids: readonly ILiquidityVoid[];
  readonly wall: IWallDescriptor | null;
  readonly liquiditySqueeze: boolean;
  readonly buySellRatio1s: number;
  readonly updateCount: number;
  readonly errorCount: number;
  readonly consistent: boolean;
}

export type GamblerPattern =
  | "panic_selling"
  | "fomo_buying"
  | "chasing_rally"
  | "panic_covering";

export interface IGamblerBehavior {
  panicSelling: boolean;
  fomoBuying: boolean;
  chasingRally: boolean;
  panicCovering: boolean;
  reasons: GamblerPattern[];
}

export interface IFeatureOptions {
  historySize: number;
  trendWindow: number;
  voidGapThreshold: number;
  voidScanLevels: number;
  wallMinDepth: number;
  wallScanLevels: number;
  squeezeThreshold: number;
}
