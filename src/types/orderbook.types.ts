export type BookSideName = "bid" | "ask";

export interface IPriceLevel {
  readonly price: number;
  readonly size: number;
  readonly orderCount: number;
}

/** OKX depth level: [price, size, deprecated, orderCount], all strings. */
export type WireLevel = readonly (string | number)[];

export interface ITopOfBook {
  price: number;
  size: number;
}

export type BookFailureReason = "checksum_mismatch" | "crossed_book";

export type BookUpdateResult =
  | { ok: true; checksum: number }
  | { ok: false; reason: BookFailureReason; expected?: number; actual: number };

export type VoidDirection = BookSideName | "both";

export interface ILiquidityVoid {
  side: BookSideName;
  start: number;
  end: number;
}

export interface IWallDescriptor {
  side: BookSideName;
  price: number;
  depth: number;
}

export interface IBookSummary {
  instrument: string;
  bestBid: ITopOfBook | null;
  bestAsk: ITopOfBook | null;
  mid: number;
  wmp: number;
  spread: number;
  spreadBps: number;
  bidLevels: number;
  askLevels: number;
  sequence: number;
  checksum: number | null;
  updateCount: number;
  errorCount: number;
  consistent: boolean;
}

export type TradeSide = "buy" | "sell";

export interface ITradeEvent {
  readonly instrument: string;
  readonly price: number;
  readonly size: number;
  readonly side: TradeSide;
  readonly timestamp: number;
  readonly tradeId: string;
}
