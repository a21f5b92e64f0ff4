import { ITradeEvent } from "../types/orderbook.types";
import { DEFAULT_TAPE_CAPACITY } from "../config/defaults";
import { RingBuffer } from "../utils/mathUtils";

/** Bounded rolling tape of public trades; the oldest print is evicted first. */
export class TradeTape {
  private trades: RingBuffer<ITradeEvent>;

  constructor(readonly instrument: string, capacity = DEFAULT_TAPE_CAPACITY) {
    this.trades = new RingBuffer(capacity);
  }

  append(trade: ITradeEvent): ITradeEvent {
    const frozen = Object.freeze({ ...trade });
    this.trades.push(frozen);
    return frozen;
  }

  latest(): ITradeEvent | undefined {
    return this.trades.at(-1);
  }

  /** Trades within `windowMs` of the most recent print. */
  recent(windowMs: number): ITradeEvent[] {
    const last = this.latest();
    if (!last) return [];
    const cutoff = last.timestamp - windowMs;
    return this.trades.toArray().filter((t) => t.timestamp >= cutoff);
  }

  all(): ITradeEvent[] {
    return this.trades.toArray();
  }

  get length(): number {
    return this.trades.length;
  }

  get capacity(): number {
    return this.trades.capacity;
  }
}
