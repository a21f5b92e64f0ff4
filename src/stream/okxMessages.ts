import { ITradeEvent, TradeSide, WireLevel } from "../types/orderbook.types";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function isWireLevel(value: unknown): value is WireLevel {
  return (
    Array.isArray(value) &&
    value.every((x) => typeof x === "string" || typeof x === "number")
  );
}

function parseLevels(value: unknown): WireLevel[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isWireLevel);
}

export interface IOkxBookData {
  bids: WireLevel[];
  asks: WireLevel[];
  checksum?: number;
  seqId?: number;
  prevSeqId?: number;
  ts: number;
}

/** One element of a books/books-l2-tbt `data` array. */
export function parseBookData(raw: unknown): IOkxBookData | null {
  if (!isRecord(raw)) return null;
  if (!Array.isArray(raw.bids) && !Array.isArray(raw.asks)) return null;
  return {
    bids: parseLevels(raw.bids),
    asks: parseLevels(raw.asks),
    checksum: toNumber(raw.checksum),
    seqId: toNumber(raw.seqId),
    prevSeqId: toNumber(raw.prevSeqId),
    ts: toNumber(raw.ts) ?? 0,
  };
}

/** One element of a `trades` data array. */
export function parseTrade(raw: unknown, fallbackInstId: string): ITradeEvent | null {
  if (!isRecord(raw)) return null;
  const price = toNumber(raw.px);
  const size = toNumber(raw.sz);
  const side: TradeSide | null = raw.side === "buy" || raw.side === "sell" ? raw.side : null;
  if (price === undefined || size === undefined || side === null) return null;
  return {
    instrument: typeof raw.instId === "string" ? raw.instId : fallbackInstId,
    price,
    size,
    side,
    timestamp: toNumber(raw.ts) ?? 0,
    tradeId: typeof raw.tradeId === "string" ? raw.tradeId : String(raw.tradeId ?? ""),
  };
}

export interface IOkxOrderUpdate {
  instrument: string;
  orderId: string;
  state: string;
  side: string;
  fillPnl?: number;
}

/** One element of an `orders` data array. */
export function parseOrderUpdate(raw: unknown): IOkxOrderUpdate | null {
  if (!isRecord(raw) || typeof raw.instId !== "string" || typeof raw.ordId !== "string") {
    return null;
  }
  return {
    instrument: raw.instId,
    orderId: raw.ordId,
    state: typeof raw.state === "string" ? raw.state : "",
    side: typeof raw.side === "string" ? raw.side : "",
    fillPnl: toNumber(raw.fillPnl),
  };
}
