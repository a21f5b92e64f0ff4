import { DEFAULT_FEATURE_OPTIONS } from "../config/defaults";
import {
  IBookSample,
  IFeatureOptions,
  IMicrostructureSnapshot,
  IPressureIndex,
  ISpoofingSignal,
  OfiTrend,
  SpreadStatus,
} from "../types/market.types";
import { OrderBookReplica } from "../orderbook/OrderBookReplica";
import { TradeTape } from "../orderbook/TradeTape";
import { RingBuffer, trendSlope } from "../utils/mathUtils";

const TREND_EPSILON = 0.01;
const SPOOF_MIN_SAMPLES = 5;
const SPOOF_MIN_SIZE = 10;
const SPOOF_COLLAPSE_RATIO = 0.3;

/**
 * Microstructure features for one instrument.
 *
 * `update()` records a top-of-book sample and appends to the bounded
 * OFI/spread/depth histories. `snapshot()` only reads, so two calls with no
 * write in between return identical values. Time windows are anchored at the
 * latest recorded sample, not the wall clock.
 */
export class FeatureExtractor {
  private options: IFeatureOptions;
  private samples: RingBuffer<IBookSample>;
  private ofiHistory: RingBuffer<number>;
  private spreadHistory: RingBuffer<number>;
  private depthHistory: RingBuffer<{ bid: number; ask: number }>;

  constructor(
    private book: OrderBookReplica,
    private tape: TradeTape,
    options: Partial<IFeatureOptions> = {},
    private clock: () => number = Date.now
  ) {
    this.options = { ...DEFAULT_FEATURE_OPTIONS, ...options };
    this.samples = new RingBuffer(this.options.historySize);
    this.ofiHistory = new RingBuffer(this.options.historySize);
    this.spreadHistory = new RingBuffer(this.options.historySize);
    this.depthHistory = new RingBuffer(this.options.historySize);
  }

  get instrument(): string {
    return this.book.instrument;
  }

  update(): IMicrostructureSnapshot {
    const bidDepth5 = this.book.bidDepth(5);
    const askDepth5 = this.book.askDepth(5);
    this.samples.push({
      timestamp: this.clock(),
      bestBidSize: this.book.bestBid()?.size ?? 0,
      bestAskSize: this.book.bestAsk()?.size ?? 0,
      bidDepth5,
      askDepth5,
    });
    this.ofiHistory.push(this.ofi(1_000));
    this.spreadHistory.push(this.book.spreadBps());
    this.depthHistory.push({ bid: bidDepth5, ask: askDepth5 });
    return this.snapshot();
  }

  snapshot(): IMicrostructureSnapshot {
    const bid = this.book.bestBid();
    const ask = this.book.bestAsk();
    const ofi1s = this.ofi(1_000);
    const bidDepth5 = this.book.bidDepth(5);
    const askDepth5 = this.book.askDepth(5);
    const voids = this.book.detectLiquidityVoid(
      "both",
      this.options.voidGapThreshold,
      this.options.voidScanLevels
    );
    const wall = this.book.detectWall(this.options.wallMinDepth, this.options.wallScanLevels);

    return Object.freeze({
      instrument: this.book.instrument,
      timestamp: this.samples.at(-1)?.timestamp ?? 0,
      bestBid: bid?.price ?? 0,
      bestAsk: ask?.price ?? 0,
      bestBidSize: bid?.size ?? 0,
      bestAskSize: ask?.size ?? 0,
      mid: this.book.midPrice(),
      wmp: this.book.weightedMidPrice(),
      spread: this.book.spread(),
      spreadBps: this.book.spreadBps(),
      spreadStatus: this.spreadStatus(),
      ofi1s,
      ofi5s: this.ofi(5_000),
      ofiTrend: this.ofiTrend(this.options.trendWindow),
      bidDepth5,
      askDepth5,
      pressure: Object.freeze(this.pressureIndex()),
      liquidityVoids: Object.freeze(voids.map((v) => Object.freeze(v))),
      wall: wall ? Object.freeze(wall) : null,
      liquiditySqueeze: this.detectLiquiditySqueeze(this.options.squeezeThreshold),
      buySellRatio1s: this.buySellRatio(1_000),
      updateCount: this.book.getUpdateCount(),
      errorCount: this.book.getErrorCount(),
      consistent: this.book.isConsistent(),
    });
  }

  /**
   * Change in best-bid size minus change in best-ask size across recorded
   * samples within `windowMs` of the latest one.
   */
  ofi(windowMs: number): number {
    const last = this.samples.at(-1);
    if (!last) return 0;
    const cutoff = last.timestamp - windowMs;
    const inWindow = this.samples.toArray().filter((s) => s.timestamp >= cutoff);
    if (inWindow.length < 2) return 0;
    const first = inWindow[0];
    return (last.bestBidSize - first.bestBidSize) - (last.bestAskSize - first.bestAskSize);
  }

  ofiTrend(window = this.options.trendWindow): OfiTrend {
    if (this.ofiHistory.length < window) return "stable";
    const slope = trendSlope(this.ofiHistory.last(window));
    if (slope > TREND_EPSILON) return "rising";
    if (slope < -TREND_EPSILON) return "falling";
    return "stable";
  }

  spreadStatus(): SpreadStatus {
    const bps = this.book.spreadBps();
    if (bps > 50) return "extreme";
    if (bps > 20) return "wide";
    return "normal";
  }

  detectLiquiditySqueeze(threshold = this.options.squeezeThreshold): boolean {
    const bidDepth = this.book.bidDepth(5);
    const askDepth = this.book.askDepth(5);
    const total = bidDepth + askDepth;
    if (total === 0) return false;
    return Math.abs(bidDepth - askDepth) / total > threshold;
  }

  /**
   * A large best bid that was there one sample ago and has mostly vanished.
   */
  detectSpoofing(): ISpoofingSignal | null {
    if (this.samples.length < SPOOF_MIN_SAMPLES) return null;
    const previous = this.samples.at(-2);
    const bid = this.book.bestBid();
    if (!previous || !bid) return null;

    const previousSize = previous.bestBidSize;
    if (previousSize > SPOOF_MIN_SIZE && bid.size < previousSize * SPOOF_COLLAPSE_RATIO) {
      return { side: "bid", price: bid.price, previousSize, currentSize: bid.size };
    }
    return null;
  }

  pressureIndex(): IPressureIndex {
    const ofi = this.ofi(1_000);
    const buyPressure = Math.max(0, ofi);
    const sellPressure = Math.max(0, -ofi);
    const depth = this.book.bidDepth(5) + this.book.askDepth(5);
    return {
      buyPressure,
      sellPressure,
      netPressure: buyPressure - sellPressure,
      imbalance: depth === 0 ? 0 : ofi / depth,
    };
  }

  /** Share of traded volume that was buyer-initiated; 0.5 with no prints. */
  buySellRatio(windowMs = 1_000): number {
    const trades = this.tape.recent(windowMs);
    let buy = 0;
    let total = 0;
    for (const t of trades) {
      total += t.size;
      if (t.side === "buy") buy += t.size;
    }
    return total === 0 ? 0.5 : buy / total;
  }

  getSpreadHistory(): number[] {
    return this.spreadHistory.toArray();
  }

  getDepthHistory(): { bid: number; ask: number }[] {
    return this.depthHistory.toArray();
  }

  getSampleCount(): number {
    return this.samples.length;
  }
}
