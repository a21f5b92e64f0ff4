import { DEFAULT_TAPE_CAPACITY } from "../config/defaults";
import { FeatureExtractor } from "../features/FeatureExtractor";
import { IFeatureOptions } from "../types/market.types";
import { OrderBookReplica } from "./OrderBookReplica";
import { TradeTape } from "./TradeTape";

export interface IInstrumentState {
  instrument: string;
  book: OrderBookReplica;
  tape: TradeTape;
  features: FeatureExtractor;
}

export interface IRegistryOptions {
  tapeCapacity?: number;
  features?: Partial<IFeatureOptions>;
  clock?: () => number;
}

/**
 * Per-instrument book, tape and feature state. Owned by the orchestrator
 * and handed to whatever needs instrument lookup.
 */
export class InstrumentRegistry {
  private entries: Map<string, IInstrumentState> = new Map();

  constructor(private options: IRegistryOptions = {}) {}

  getOrCreate(instrument: string): IInstrumentState {
    const existing = this.entries.get(instrument);
    if (existing) return existing;

    const book = new OrderBookReplica(instrument);
    const tape = new TradeTape(instrument, this.options.tapeCapacity ?? DEFAULT_TAPE_CAPACITY);
    const features = new FeatureExtractor(book, tape, this.options.features, this.options.clock);
    const state = { instrument, book, tape, features };
    this.entries.set(instrument, state);
    return state;
  }

  get(instrument: string): IInstrumentState | undefined {
    return this.entries.get(instrument);
  }

  remove(instrument: string): boolean {
    return this.entries.delete(instrument);
  }

  instruments(): string[] {
    return [...this.entries.keys()];
  }
}
