import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Orchestrator } from "../Orchestrator";
import { loadConfig } from "../../config/environment";
import { PaperExecutionClient } from "../../exchange/PaperExecutionClient";
import { IStorageSink } from "../../types/exchange.types";
import { createSignal } from "../../strategies/createSignal";
import { FakeTransport } from "../../stream/__tests__/fakeTransport";

const INST = "BTC-USDT-SWAP";

function recordingSink() {
  return {
    recordLevels: vi.fn(),
    recordTrade: vi.fn(),
    recordSignal: vi.fn(),
    flush: vi.fn(async () => undefined),
    close: vi.fn(async () => undefined),
  } satisfies IStorageSink;
}

function bookMessage(action: "snapshot" | "update", data: Record<string, unknown>) {
  return { arg: { channel: "books-l2-tbt", instId: INST }, action, data: [data] };
}

describe("Orchestrator", () => {
  let transports: FakeTransport[];
  let mark: number;
  let paper: PaperExecutionClient;
  let sink: ReturnType<typeof recordingSink>;
  let orch: Orchestrator;

  async function start(env: Record<string, string> = {}): Promise<FakeTransport> {
    orch = new Orchestrator(loadConfig(env), {
      client: paper,
      sink,
      scheduleJobs: false,
      clock: () => 1_000,
      transportFactory: (url) => {
        const t = new FakeTransport(url);
        transports.push(t);
        return t;
      },
    });
    const starting = orch.start();
    await vi.waitFor(() => expect(transports).toHaveLength(1));
    transports[0].emitOpen();
    await starting;
    return transports[0];
  }

  beforeEach(() => {
    transports = [];
    mark = 0;
    paper = new PaperExecutionClient(10_000, () => mark, () => 1_000);
    sink = recordingSink();
  });

  afterEach(async () => {
    await orch.shutdown();
  });

  it("subscribes to book and trade channels for every instrument", async () => {
    const t = await start({ INSTRUMENTS: "BTC-USDT-SWAP,ETH-USDT-SWAP" });

    expect(t.sentJson()).toEqual([
      {
        op: "subscribe",
        args: [
          { channel: "books-l2-tbt", instId: "BTC-USDT-SWAP" },
          { channel: "trades", instId: "BTC-USDT-SWAP" },
          { channel: "books-l2-tbt", instId: "ETH-USDT-SWAP" },
          { channel: "trades", instId: "ETH-USDT-SWAP" },
        ],
      },
    ]);
    expect(orch.privateStream).toBeNull();
    expect(orch.getStatus().risk.totalBalance).toBe(10_000);
  });

  it("quotes both sides of a wide spread through the paper account", async () => {
    const t = await start();

    t.emitMessage(
      bookMessage("snapshot", {
        bids: [["100", "5", "0", "2"]],
        asks: [["101", "2", "0", "1"]],
        ts: "1700000000000",
      })
    );
    await orch.stream.idle();
    await orch.execution.idle();

    const quotes = paper.getOpenOrders(INST).map((o) => [o.side, o.type, o.price, o.size]);
    expect(quotes).toEqual([
      ["buy", "post_only", 100, 0.01],
      ["sell", "post_only", 101, 0.01],
    ]);

    const status = orch.getStatus();
    expect(status.strategies.spread_capturing).toEqual({
      enabled: true,
      generated: 1,
      executed: 1,
      executionRate: 1,
    });
    // Resting quotes are not fills
    expect(status.risk.totalTrades).toBe(0);
    expect(status.books[0]).toMatchObject({ instrument: INST, consistent: true });

    expect(sink.recordLevels).toHaveBeenCalledWith(
      INST,
      "bid",
      [{ price: 100, size: 5, orderCount: 2 }],
      1_700_000_000_000
    );
    expect(sink.recordSignal).toHaveBeenCalledTimes(1);
    expect(sink.recordSignal.mock.calls[0][1]).toBe("executed");
  });

  it("scores paper fills by the P&L they realize", async () => {
    await start();
    const order = {
      strategy: "front_running",
      instrument: INST,
      orderType: "market",
      price: 100,
      size: 1,
      confidence: 0.7,
      reason: "test",
      timestamp: 1_000,
    } as const;

    mark = 100;
    orch.execution.enqueue(createSignal({ ...order, action: "buy" }));
    await orch.execution.idle();
    mark = 104;
    orch.execution.enqueue(createSignal({ ...order, action: "sell" }));
    await orch.execution.idle();

    expect(paper.getRealizedPnl()).toBe(4);
    expect(orch.getStatus().risk).toMatchObject({
      totalTrades: 2,
      winningTrades: 1,
      losingTrades: 0,
      winRate: 0.5,
    });
  });

  it("archives trades from the tape", async () => {
    const t = await start();

    t.emitMessage({
      arg: { channel: "trades", instId: INST },
      data: [{ instId: INST, tradeId: "242720720", px: "100.5", sz: "3", side: "sell", ts: "1700000000100" }],
    });
    await orch.stream.idle();

    expect(sink.recordTrade).toHaveBeenCalledWith({
      instrument: INST,
      tradeId: "242720720",
      price: 100.5,
      size: 3,
      side: "sell",
      timestamp: 1_700_000_000_100,
    });
  });

  it("skips tactics and requests a fresh snapshot after a checksum mismatch", async () => {
    const t = await start({ AUTO_RESYNC_ON_MISMATCH: "true" });

    t.emitMessage(
      bookMessage("snapshot", {
        bids: [["100", "5", "0", "2"]],
        asks: [["101", "2", "0", "1"]],
        checksum: 12345,
      })
    );
    t.emitMessage(
      bookMessage("update", {
        bids: [["100", "4", "0", "2"]],
        asks: [],
        checksum: 12345,
      })
    );
    await orch.stream.idle();
    await orch.execution.idle();

    const book = { channel: "books-l2-tbt", instId: INST };
    expect(t.sentJson().slice(1)).toEqual([
      { op: "unsubscribe", args: [book] },
      { op: "subscribe", args: [book] },
    ]);
    expect(paper.getOpenOrders()).toEqual([]);
    expect(orch.getStatus().strategies.spread_capturing.generated).toBe(0);
  });

  it("rejects signals while the risk manager is in emergency stop", async () => {
    const t = await start();
    orch.risk.enableEmergencyStop("manual");

    t.emitMessage(
      bookMessage("snapshot", {
        bids: [["100", "5", "0", "2"]],
        asks: [["101", "2", "0", "1"]],
      })
    );
    await orch.stream.idle();
    await orch.execution.idle();

    expect(paper.getOpenOrders()).toEqual([]);
    expect(sink.recordSignal.mock.calls[0][1]).toBe("rejected");
  });
});
