import { DEFAULT_FRONT_RUNNING } from "../config/defaults";
import { ITradeEvent } from "../types/orderbook.types";
import {
  IFrontRunningOptions,
  ISignal,
  ITactic,
  ITacticContext,
} from "../types/strategy.types";
import { mean, RingBuffer } from "../utils/mathUtils";
import { logger } from "../utils/logger";
import { createSignal } from "./createSignal";

interface IDepthHistory {
  bid: RingBuffer<number>;
  ask: RingBuffer<number>;
}

/**
 * A large aggressive trade that lands while the side it hits has thinned
 * out signals a cascade. Trade ahead of it, away from the shrinking side.
 */
export class FrontRunningTactic implements ITactic {
  readonly kind = "front_running" as const;
  private options: IFrontRunningOptions;
  private history: Map<string, IDepthHistory> = new Map();

  constructor(options: Partial<IFrontRunningOptions> = {}) {
    this.options = { ...DEFAULT_FRONT_RUNNING, ...options };
  }

  onMarketData(): ISignal[] {
    return [];
  }

  onOrderBook(ctx: ITacticContext): ISignal[] {
    const h = this.historyFor(ctx.instrument);
    h.bid.push(ctx.book.bestBid()?.size ?? 0);
    h.ask.push(ctx.book.bestAsk()?.size ?? 0);
    return [];
  }

  onTrade(ctx: ITacticContext, trade: ITradeEvent): ISignal[] {
    if (trade.size < this.options.largeTradeThreshold) return [];

    // A sell hits the bids; a buy lifts the asks
    const hitsBids = trade.side === "sell";
    const h = this.historyFor(ctx.instrument);
    const samples = (hitsBids ? h.bid : h.ask).toArray();
    const top = hitsBids ? ctx.book.bestBid() : ctx.book.bestAsk();
    if (!top || samples.length === 0) return [];

    const reference = mean(samples);
    if (reference <= 0) return [];
    const drop = (reference - top.size) / reference;
    if (drop < this.options.depthDropThreshold) return [];

    const action = hitsBids ? "sell" : "buy";
    logger.info(
      `[FrontRun] ${ctx.instrument} large ${trade.side} ${trade.size} with ${hitsBids ? "bid" : "ask"} depth down ${(drop * 100).toFixed(0)}%`
    );
    return [
      createSignal({
        strategy: this.kind,
        instrument: ctx.instrument,
        action,
        orderType: "market",
        price: top.price,
        size: this.options.positionSize,
        confidence: 0.6 + 0.3 * Math.min(1, drop),
        reason: `large ${trade.side} ${trade.size} into ${hitsBids ? "bid" : "ask"} depth drop ${(drop * 100).toFixed(1)}%`,
        timestamp: ctx.now,
      }),
    ];
  }

  private historyFor(instrument: string): IDepthHistory {
    let h = this.history.get(instrument);
    if (!h) {
      h = {
        bid: new RingBuffer<number>(this.options.historySize),
        ask: new RingBuffer<number>(this.options.historySize),
      };
      this.history.set(instrument, h);
    }
    return h;
  }
}
