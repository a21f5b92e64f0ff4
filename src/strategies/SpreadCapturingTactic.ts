import { DEFAULT_SPREAD_CAPTURING } from "../config/defaults";
import {
  ISignal,
  ISpreadCapturingOptions,
  ITactic,
  ITacticContext,
} from "../types/strategy.types";
import { createSignal } from "./createSignal";

/**
 * Quotes both sides at the touch when the spread is wide enough to pay
 * but not so wide that the book is broken.
 */
export class SpreadCapturingTactic implements ITactic {
  readonly kind = "spread_capturing" as const;
  private options: ISpreadCapturingOptions;

  constructor(options: Partial<ISpreadCapturingOptions> = {}) {
    this.options = { ...DEFAULT_SPREAD_CAPTURING, ...options };
  }

  onMarketData(): ISignal[] {
    return [];
  }

  onTrade(): ISignal[] {
    return [];
  }

  onOrderBook(ctx: ITacticContext): ISignal[] {
    const bid = ctx.book.bestBid();
    const ask = ctx.book.bestAsk();
    if (!bid || !ask) return [];

    const spreadBps = ctx.book.spreadBps();
    if (spreadBps < this.options.minSpreadBps || spreadBps > this.options.maxSpreadBps) {
      return [];
    }

    return [
      createSignal({
        strategy: this.kind,
        instrument: ctx.instrument,
        action: "market_make",
        orderType: "post_only",
        price: ask.price,
        size: this.options.positionSize,
        confidence: this.options.confidence,
        reason: `spread ${spreadBps.toFixed(1)}bps`,
        timestamp: ctx.now,
        quote: { bid: bid.price, ask: ask.price },
      }),
    ];
  }
}
