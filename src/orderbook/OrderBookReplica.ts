import {
  BookSideName,
  BookUpdateResult,
  IBookSummary,
  ILiquidityVoid,
  IPriceLevel,
  ITopOfBook,
  IWallDescriptor,
  VoidDirection,
  WireLevel,
} from "../types/orderbook.types";
import { CHECKSUM_DEPTH } from "../utils/constants";
import { logger } from "../utils/logger";
import { computeBookChecksum, normalizeChecksum } from "./checksum";

/**
 * Parse an OKX depth level. Four-element levels carry the order count at
 * index 3 (index 2 is deprecated); three-element levels at index 2.
 */
export function parseWireLevel(level: WireLevel): IPriceLevel | null {
  if (level.length < 2) return null;
  const price = Number(level[0]);
  const size = Number(level[1]);
  if (!Number.isFinite(price) || !Number.isFinite(size) || price <= 0 || size < 0) {
    return null;
  }
  const rawCount = level.length >= 4 ? level[3] : level.length === 3 ? level[2] : 0;
  const orderCount = Number(rawCount);
  return {
    price,
    size,
    orderCount: Number.isFinite(orderCount) && orderCount >= 0 ? Math.trunc(orderCount) : 0,
  };
}

/**
 * One side of the book: price -> level, plus a price array kept sorted in
 * priority order (bids descending, asks ascending).
 */
export class BookSide {
  private levels: Map<number, IPriceLevel> = new Map();
  private prices: number[] = [];

  constructor(readonly side: BookSideName) {}

  private outranks(a: number, b: number): boolean {
    return this.side === "bid" ? a > b : a < b;
  }

  // First index whose price does not outrank `price`
  private search(price: number): number {
    let lo = 0;
    let hi = this.prices.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.outranks(this.prices[mid], price)) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  set(level: IPriceLevel): void {
    if (!this.levels.has(level.price)) {
      this.prices.splice(this.search(level.price), 0, level.price);
    }
    this.levels.set(level.price, level);
  }

  remove(price: number): boolean {
    if (!this.levels.delete(price)) return false;
    const idx = this.search(price);
    if (this.prices[idx] === price) this.prices.splice(idx, 1);
    return true;
  }

  clear(): void {
    this.levels.clear();
    this.prices = [];
  }

  best(): IPriceLevel | null {
    if (this.prices.length === 0) return null;
    return this.levels.get(this.prices[0]) ?? null;
  }

  top(n: number): IPriceLevel[] {
    const out: IPriceLevel[] = [];
    for (const price of this.prices.slice(0, Math.max(0, n))) {
      const level = this.levels.get(price);
      if (level) out.push(level);
    }
    return out;
  }

  get(price: number): IPriceLevel | undefined {
    return this.levels.get(price);
  }

  depth(n: number): number {
    return this.top(n).reduce((total, l) => total + l.size, 0);
  }

  get size(): number {
    return this.prices.length;
  }
}

/**
 * Local replica of one instrument's order book, kept in sync with the
 * exchange feed by snapshots and deltas, each verified by CRC32 checksum.
 *
 * A failed verification still commits the state but clears `consistent`;
 * only a snapshot whose checksum matches restores it.
 */
export class OrderBookReplica {
  private bids = new BookSide("bid");
  private asks = new BookSide("ask");
  private sequence = -1;
  private lastChecksum: number | null = null;
  private updateCount = 0;
  private errorCount = 0;
  private consistent = false;

  constructor(readonly instrument: string) {}

  applySnapshot(
    bids: readonly WireLevel[],
    asks: readonly WireLevel[],
    checksum?: number,
    seqId?: number
  ): BookUpdateResult {
    this.bids.clear();
    this.asks.clear();
    this.applyLevels(this.bids, bids);
    this.applyLevels(this.asks, asks);
    if (seqId !== undefined) this.sequence = seqId;

    const result = this.verify(checksum);
    if (result.ok) {
      this.consistent = true;
      logger.debug(
        `[Book] ${this.instrument} snapshot: ${this.bids.size} bids / ${this.asks.size} asks`
      );
    } else {
      this.recordFailure("snapshot", result);
    }
    return result;
  }

  applyDelta(
    bids: readonly WireLevel[],
    asks: readonly WireLevel[],
    checksum?: number,
    seqId?: number
  ): BookUpdateResult {
    this.applyLevels(this.bids, bids);
    this.applyLevels(this.asks, asks);
    if (seqId !== undefined) this.sequence = seqId;

    const result = this.verify(checksum);
    if (!result.ok) this.recordFailure("delta", result);
    return result;
  }

  private applyLevels(side: BookSide, levels: readonly WireLevel[]): void {
    for (const raw of levels) {
      const level = parseWireLevel(raw);
      if (!level) {
        logger.warning(`[Book] ${this.instrument} skipped malformed ${side.side} level ${JSON.stringify(raw)}`);
        continue;
      }
      if (level.size === 0) side.remove(level.price);
      else side.set(level);
    }
  }

  private verify(expected: number | undefined): BookUpdateResult {
    const actual = this.computeChecksum();
    if (expected !== undefined && normalizeChecksum(expected) !== actual) {
      return { ok: false, reason: "checksum_mismatch", expected: normalizeChecksum(expected), actual };
    }
    if (this.isCrossed()) {
      return { ok: false, reason: "crossed_book", actual };
    }
    this.lastChecksum = actual;
    this.updateCount++;
    return { ok: true, checksum: actual };
  }

  private recordFailure(kind: "snapshot" | "delta", result: BookUpdateResult): void {
    if (result.ok) return;
    this.consistent = false;
    this.errorCount++;
    if (result.reason === "checksum_mismatch") {
      logger.warning(
        `[Book] ${this.instrument} ${kind} checksum mismatch: computed=${result.actual} received=${result.expected}`
      );
    } else {
      logger.warning(`[Book] ${this.instrument} ${kind} produced a crossed book`);
    }
  }

  private isCrossed(): boolean {
    const bid = this.bids.best();
    const ask = this.asks.best();
    return bid !== null && ask !== null && bid.price >= ask.price;
  }

  computeChecksum(): number {
    return computeBookChecksum(this.bids.top(CHECKSUM_DEPTH), this.asks.top(CHECKSUM_DEPTH));
  }

  // ==================== QUERIES ====================

  bestBid(): ITopOfBook | null {
    const level = this.bids.best();
    return level ? { price: level.price, size: level.size } : null;
  }

  bestAsk(): ITopOfBook | null {
    const level = this.asks.best();
    return level ? { price: level.price, size: level.size } : null;
  }

  getBids(n = 10): IPriceLevel[] {
    return this.bids.top(n);
  }

  getAsks(n = 10): IPriceLevel[] {
    return this.asks.top(n);
  }

  bidDepth(n = 5): number {
    return this.bids.depth(n);
  }

  askDepth(n = 5): number {
    return this.asks.depth(n);
  }

  midPrice(): number {
    const bid = this.bids.best();
    const ask = this.asks.best();
    if (bid && ask) return (bid.price + ask.price) / 2;
    if (bid) return bid.price;
    if (ask) return ask.price;
    return 0;
  }

  /**
   * Each side's price weighted by the opposite side's size, so the result
   * leans toward the thinner side.
   */
  weightedMidPrice(): number {
    const bid = this.bids.best();
    const ask = this.asks.best();
    if (!bid || !ask) return this.midPrice();
    const total = bid.size + ask.size;
    if (total === 0) return this.midPrice();
    return (bid.price * ask.size + ask.price * bid.size) / total;
  }

  spread(): number {
    const bid = this.bids.best();
    const ask = this.asks.best();
    return bid && ask ? ask.price - bid.price : 0;
  }

  spreadBps(): number {
    const mid = this.midPrice();
    return mid === 0 ? 0 : (this.spread() / mid) * 10_000;
  }

  detectLiquidityVoid(
    direction: VoidDirection = "both",
    gapThreshold = 0.002,
    scanLevels = 50
  ): ILiquidityVoid[] {
    const voids: ILiquidityVoid[] = [];

    if (direction === "ask" || direction === "both") {
      const asks = this.asks.top(scanLevels);
      for (let i = 0; i < asks.length - 1; i++) {
        const cur = asks[i].price;
        const next = asks[i + 1].price;
        if ((next - cur) / cur > gapThreshold) {
          voids.push({ side: "ask", start: cur, end: next });
        }
      }
    }

    if (direction === "bid" || direction === "both") {
      const bids = this.bids.top(scanLevels);
      for (let i = 0; i < bids.length - 1; i++) {
        const cur = bids[i].price;
        const next = bids[i + 1].price;
        if ((cur - next) / cur > gapThreshold) {
          voids.push({ side: "bid", start: next, end: cur });
        }
      }
    }

    return voids;
  }

  /** First level at or above `minDepth`: bids first, then asks. */
  detectWall(minDepth = 100, scanLevels = 20): IWallDescriptor | null {
    for (const level of this.bids.top(scanLevels)) {
      if (level.size >= minDepth) return { side: "bid", price: level.price, depth: level.size };
    }
    for (const level of this.asks.top(scanLevels)) {
      if (level.size >= minDepth) return { side: "ask", price: level.price, depth: level.size };
    }
    return null;
  }

  isConsistent(): boolean {
    return this.consistent;
  }

  getSequence(): number {
    return this.sequence;
  }

  getChecksum(): number | null {
    return this.lastChecksum;
  }

  getUpdateCount(): number {
    return this.updateCount;
  }

  getErrorCount(): number {
    return this.errorCount;
  }

  isEmpty(): boolean {
    return this.bids.size === 0 && this.asks.size === 0;
  }

  summary(): IBookSummary {
    return {
      instrument: this.instrument,
      bestBid: this.bestBid(),
      bestAsk: this.bestAsk(),
      mid: this.midPrice(),
      wmp: this.weightedMidPrice(),
      spread: this.spread(),
      spreadBps: this.spreadBps(),
      bidLevels: this.bids.size,
      askLevels: this.asks.size,
      sequence: this.sequence,
      checksum: this.lastChecksum,
      updateCount: this.updateCount,
      errorCount: this.errorCount,
      consistent: this.consistent,
    };
  }
}
