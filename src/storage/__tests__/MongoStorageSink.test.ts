import { describe, it, expect, beforeEach, vi } from "vitest";
import { IArchiveWriter, MongoStorageSink, NullStorageSink } from "../MongoStorageSink";
import { createSignal } from "../../strategies/createSignal";

function fakeWriter() {
  return {
    writeLevels: vi.fn(async () => undefined),
    writeTrades: vi.fn(async () => undefined),
    writeSignals: vi.fn(async () => undefined),
  } satisfies IArchiveWriter;
}

const SIGNAL = createSignal({
  strategy: "spread_capturing",
  instrument: "BTC-USDT-SWAP",
  action: "market_make",
  orderType: "post_only",
  price: 101,
  size: 0.01,
  confidence: 0.8,
  reason: "spread 99.5bps",
  timestamp: 1_000,
  quote: { bid: 100, ask: 101 },
});

describe("MongoStorageSink", () => {
  let writer: ReturnType<typeof fakeWriter>;
  let sink: MongoStorageSink;

  beforeEach(() => {
    writer = fakeWriter();
    sink = new MongoStorageSink(writer, 3);
  });

  it("buffers records until flushed", async () => {
    sink.recordLevels("BTC-USDT-SWAP", "bid", [{ price: 100, size: 5, orderCount: 2 }], 1_000);
    sink.recordTrade({
      instrument: "BTC-USDT-SWAP",
      price: 100.5,
      size: 1,
      side: "buy",
      timestamp: 2_000,
      tradeId: "t-1",
    });
    sink.recordSignal(SIGNAL, "executed");

    expect(sink.getPendingCounts()).toEqual({ levels: 1, trades: 1, signals: 1, dropped: 0 });
    expect(writer.writeLevels).not.toHaveBeenCalled();

    await sink.flush();

    expect(writer.writeLevels).toHaveBeenCalledWith([
      { instrument: "BTC-USDT-SWAP", side: "bid", price: 100, size: 5, orderCount: 2, timestamp: new Date(1_000) },
    ]);
    expect(writer.writeTrades).toHaveBeenCalledWith([
      {
        instrument: "BTC-USDT-SWAP",
        tradeId: "t-1",
        price: 100.5,
        size: 1,
        side: "buy",
        timestamp: new Date(2_000),
      },
    ]);
    expect(writer.writeSignals).toHaveBeenCalledWith([
      {
        signalId: SIGNAL.id,
        strategy: "spread_capturing",
        instrument: "BTC-USDT-SWAP",
        action: "market_make",
        orderType: "post_only",
        price: 101,
        size: 0.01,
        confidence: 0.8,
        reason: "spread 99.5bps",
        outcome: "executed",
        timestamp: new Date(1_000),
      },
    ]);
    expect(sink.getPendingCounts()).toEqual({ levels: 0, trades: 0, signals: 0, dropped: 0 });
  });

  it("skips empty batches", async () => {
    await sink.flush();
    expect(writer.writeLevels).not.toHaveBeenCalled();
    expect(writer.writeTrades).not.toHaveBeenCalled();
    expect(writer.writeSignals).not.toHaveBeenCalled();
  });

  it("drops the oldest records past the buffer limit", () => {
    const levels = [1, 2, 3, 4, 5].map((price) => ({ price, size: 1, orderCount: 1 }));
    sink.recordLevels("BTC-USDT-SWAP", "ask", levels, 0);

    expect(sink.getPendingCounts()).toMatchObject({ levels: 3, dropped: 2 });
  });

  it("logs and drops a batch the database refuses", async () => {
    writer.writeSignals.mockRejectedValueOnce(new Error("E11000 duplicate key"));
    sink.recordSignal(SIGNAL, "rejected");
    sink.recordSignal(SIGNAL, "rejected");

    await expect(sink.flush()).resolves.toBeUndefined();
    expect(sink.getPendingCounts()).toEqual({ levels: 0, trades: 0, signals: 0, dropped: 2 });
  });

  it("shares one in-flight flush between callers", async () => {
    sink.recordSignal(SIGNAL, "failed");
    const first = sink.flush();
    const second = sink.flush();

    expect(second).toBe(first);
    await first;
    expect(writer.writeSignals).toHaveBeenCalledTimes(1);
  });

  it("flushes on close", async () => {
    sink.recordSignal(SIGNAL, "executed");
    await sink.close();
    expect(writer.writeSignals).toHaveBeenCalledTimes(1);
  });
});

describe("NullStorageSink", () => {
  it("accepts records and flushes nothing", async () => {
    const sink = new NullStorageSink();
    sink.recordSignal();
    await expect(sink.flush()).resolves.toBeUndefined();
  });
});
