import { BookLevelUpdateModel, ILevelRecord } from "../models/BookLevelUpdate";
import { ISignalRecord, SignalRecordModel } from "../models/SignalRecord";
import { ITradeRecord, TradePrintModel } from "../models/TradePrint";
import { IStorageSink, SignalOutcome } from "../types/exchange.types";
import { BookSideName, IPriceLevel, ITradeEvent } from "../types/orderbook.types";
import { ISignal } from "../types/strategy.types";
import { logger } from "../utils/logger";

export interface IArchiveWriter {
  writeLevels(docs: ILevelRecord[]): Promise<void>;
  writeTrades(docs: ITradeRecord[]): Promise<void>;
  writeSignals(docs: ISignalRecord[]): Promise<void>;
}

export class MongoArchiveWriter implements IArchiveWriter {
  async writeLevels(docs: ILevelRecord[]): Promise<void> {
    await BookLevelUpdateModel.insertMany(docs, { ordered: false });
  }

  async writeTrades(docs: ITradeRecord[]): Promise<void> {
    await TradePrintModel.insertMany(docs, { ordered: false });
  }

  async writeSignals(docs: ISignalRecord[]): Promise<void> {
    await SignalRecordModel.insertMany(docs, { ordered: false });
  }
}

const DEFAULT_MAX_BUFFER = 10_000;

function pushBounded<T>(buffer: T[], item: T, max: number): number {
  buffer.push(item);
  if (buffer.length > max) {
    const dropped = buffer.length - max;
    buffer.splice(0, dropped);
    return dropped;
  }
  return 0;
}

/**
 * Buffers archive records in memory and writes them in batches. Recording
 * is synchronous; a failed batch is logged and dropped.
 */
export class MongoStorageSink implements IStorageSink {
  private levels: ILevelRecord[] = [];
  private trades: ITradeRecord[] = [];
  private signals: ISignalRecord[] = [];
  private droppedCount = 0;
  private flushing: Promise<void> | null = null;

  constructor(
    private writer: IArchiveWriter = new MongoArchiveWriter(),
    private maxBuffer = DEFAULT_MAX_BUFFER
  ) {}

  recordLevels(
    instrument: string,
    side: BookSideName,
    levels: readonly IPriceLevel[],
    timestamp: number
  ): void {
    const at = new Date(timestamp);
    for (const level of levels) {
      this.droppedCount += pushBounded(
        this.levels,
        { instrument, side, price: level.price, size: level.size, orderCount: level.orderCount, timestamp: at },
        this.maxBuffer
      );
    }
  }

  recordTrade(trade: ITradeEvent): void {
    this.droppedCount += pushBounded(
      this.trades,
      {
        instrument: trade.instrument,
        tradeId: trade.tradeId,
        price: trade.price,
        size: trade.size,
        side: trade.side,
        timestamp: new Date(trade.timestamp),
      },
      this.maxBuffer
    );
  }

  recordSignal(signal: ISignal, outcome: SignalOutcome): void {
    this.droppedCount += pushBounded(
      this.signals,
      {
        signalId: signal.id,
        strategy: signal.strategy,
        instrument: signal.instrument,
        action: signal.action,
        orderType: signal.orderType,
        price: signal.price,
        size: signal.size,
        confidence: signal.confidence,
        reason: signal.reason,
        outcome,
        timestamp: new Date(signal.timestamp),
      },
      this.maxBuffer
    );
  }

  /** Concurrent calls share the in-flight flush. */
  flush(): Promise<void> {
    if (!this.flushing) {
      this.flushing = this.writeAll().finally(() => {
        this.flushing = null;
      });
    }
    return this.flushing;
  }

  private async writeAll(): Promise<void> {
    const levels = this.levels;
    const trades = this.trades;
    const signals = this.signals;
    this.levels = [];
    this.trades = [];
    this.signals = [];

    await this.writeBatch("levels", levels, (docs) => this.writer.writeLevels(docs));
    await this.writeBatch("trades", trades, (docs) => this.writer.writeTrades(docs));
    await this.writeBatch("signals", signals, (docs) => this.writer.writeSignals(docs));
  }

  private async writeBatch<T>(label: string, docs: T[], write: (docs: T[]) => Promise<void>): Promise<void> {
    if (docs.length === 0) return;
    try {
      await write(docs);
      logger.debug(`[Storage] Archived ${docs.length} ${label}`);
    } catch (err) {
      this.droppedCount += docs.length;
      logger.error(`[Storage] Failed to archive ${docs.length} ${label}, batch dropped`, err);
    }
  }

  async close(): Promise<void> {
    await this.flush();
  }

  getPendingCounts(): { levels: number; trades: number; signals: number; dropped: number } {
    return {
      levels: this.levels.length,
      trades: this.trades.length,
      signals: this.signals.length,
      dropped: this.droppedCount,
    };
  }
}

/** Used when no database is configured. */
export class NullStorageSink implements IStorageSink {
  recordLevels(): void {}
  recordTrade(): void {}
  recordSignal(): void {}
  async flush(): Promise<void> {}
  async close(): Promise<void> {}
}
