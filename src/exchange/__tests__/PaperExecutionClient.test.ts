import { describe, it, expect, beforeEach } from "vitest";
import { PaperExecutionClient } from "../PaperExecutionClient";

const INST = "BTC-USDT-SWAP";

describe("PaperExecutionClient", () => {
  let mark: number;
  let paper: PaperExecutionClient;

  beforeEach(() => {
    mark = 110;
    paper = new PaperExecutionClient(10_000, () => mark, () => 5);
  });

  it("fills market orders at once and marks the position", async () => {
    const result = await paper.placeOrder({ instrument: INST, side: "buy", type: "market", size: 2, price: 100 });

    expect(result.ok).toBe(true);
    expect(await paper.getPositions()).toEqual([
      {
        instrument: INST,
        side: "long",
        size: 2,
        avgPrice: 100,
        markPrice: 110,
        notional: 220,
        unrealizedPnl: 20,
      },
    ]);
    expect(await paper.getBalance()).toEqual({ total: 10_020, available: 10_000 });
  });

  it("realizes P&L when a fill reduces or flips the position", async () => {
    await paper.placeOrder({ instrument: INST, side: "buy", type: "market", size: 2, price: 100 });
    const flip = await paper.placeOrder({ instrument: INST, side: "sell", type: "ioc", size: 3, price: 120 });

    expect(flip).toMatchObject({ ok: true, fill: { price: 120, size: 3, realizedPnl: 40 } });
    expect(paper.getRealizedPnl()).toBe(40);
    const [pos] = await paper.getPositions();
    expect(pos).toMatchObject({ side: "short", size: 1, avgPrice: 120, unrealizedPnl: 10 });
    expect(await paper.getBalance()).toEqual({ total: 10_050, available: 10_040 });
  });

  it("averages the entry price when adding to a position", async () => {
    await paper.placeOrder({ instrument: INST, side: "buy", type: "market", size: 1, price: 100 });
    await paper.placeOrder({ instrument: INST, side: "buy", type: "market", size: 3, price: 108 });

    const [pos] = await paper.getPositions();
    expect(pos.size).toBe(4);
    expect(pos.avgPrice).toBe(106);
  });

  it("fills market orders without a price at the mark", async () => {
    await paper.placeOrder({ instrument: INST, side: "buy", type: "market", size: 1 });
    const [pos] = await paper.getPositions();
    expect(pos.avgPrice).toBe(110);
  });

  it("rests limit and post-only orders until cancelled", async () => {
    const quote = await paper.placeOrder({ instrument: INST, side: "buy", type: "post_only", size: 1, price: 100 });
    expect(quote.ok && quote.fill).toBeUndefined();
    await paper.placeOrder({ instrument: INST, side: "sell", type: "limit", size: 1, price: 101 });
    await paper.placeOrder({ instrument: "ETH-USDT-SWAP", side: "buy", type: "limit", size: 1, price: 2000 });

    expect(await paper.getPositions()).toEqual([]);
    expect(paper.getOpenOrders(INST)).toHaveLength(2);
    expect(paper.getOpenOrders(INST)[0].createdAt).toBe(5);

    expect(await paper.cancelAll(INST)).toBe(2);
    expect(paper.getOpenOrders()).toHaveLength(1);
  });

  it("rejects orders it cannot fill", async () => {
    expect(await paper.placeOrder({ instrument: INST, side: "buy", type: "limit", size: 1 })).toEqual({
      ok: false,
      error: "Limit order without price",
    });
    expect(await paper.placeOrder({ instrument: INST, side: "buy", type: "market", size: 0 })).toEqual({
      ok: false,
      error: "Invalid size 0",
    });

    mark = 0;
    expect(await paper.placeOrder({ instrument: INST, side: "buy", type: "market", size: 1 })).toEqual({
      ok: false,
      error: `No price available for ${INST}`,
    });
  });

  it("reports no request latency", () => {
    expect(paper.getAvgLatencyMs()).toBe(0);
  });
});
