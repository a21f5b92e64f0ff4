import { describe, it, expect, beforeEach } from "vitest";
import { FeatureExtractor } from "../FeatureExtractor";
import { classifyGamblerBehavior } from "../gamblerBehavior";
import { OrderBookReplica } from "../../orderbook/OrderBookReplica";
import { TradeTape } from "../../orderbook/TradeTape";
import { IMicrostructureSnapshot } from "../../types/market.types";

const INST = "BTC-USDT-SWAP";

describe("FeatureExtractor", () => {
  let now: number;
  let book: OrderBookReplica;
  let tape: TradeTape;
  let features: FeatureExtractor;

  function setTop(bidSize: number, askSize: number, bidPx = "100", askPx = "101"): void {
    book.applySnapshot([[bidPx, String(bidSize)]], [[askPx, String(askSize)]]);
  }

  beforeEach(() => {
    now = 0;
    book = new OrderBookReplica(INST);
    tape = new TradeTape(INST);
    features = new FeatureExtractor(book, tape, {}, () => now);
  });

  it("tracks a steadily growing bid as rising order flow", () => {
    let snap: IMicrostructureSnapshot | null = null;
    for (let i = 0; i < 10; i++) {
      now = i * 100;
      setTop(10 * (i + 1), 5);
      snap = features.update();
    }

    expect(snap?.ofi1s).toBe(90);
    expect(snap?.ofi5s).toBe(90);
    expect(snap?.ofiTrend).toBe("rising");
    expect(snap?.pressure.buyPressure).toBe(90);
    expect(snap?.pressure.sellPressure).toBe(0);
    expect(snap?.pressure.netPressure).toBe(90);
    expect(snap?.timestamp).toBe(900);
  });

  it("reports a stable trend until the window is full", () => {
    for (let i = 0; i < 9; i++) {
      now = i * 100;
      setTop(10 * (i + 1), 5);
      features.update();
    }
    expect(features.ofiTrend()).toBe("stable");
  });

  it("sees a draining bid as falling order flow", () => {
    for (let i = 0; i < 10; i++) {
      now = i * 100;
      setTop(100 - 10 * i, 5);
      features.update();
    }
    expect(features.ofi(1_000)).toBe(-90);
    expect(features.ofiTrend()).toBe("falling");
    expect(features.pressureIndex().sellPressure).toBe(90);
  });

  it("only counts samples inside the window", () => {
    now = 0;
    setTop(10, 5);
    features.update();
    now = 3_000;
    setTop(40, 5);
    features.update();

    expect(features.ofi(1_000)).toBe(0);
    expect(features.ofi(5_000)).toBe(30);
  });

  it("returns identical snapshots when nothing was written in between", () => {
    now = 1_000;
    setTop(20, 5);
    features.update();

    now = 5_000;
    const first = features.snapshot();
    const second = features.snapshot();

    expect(second).toEqual(first);
    expect(first.timestamp).toBe(1_000);
    expect(features.getSampleCount()).toBe(1);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("keeps snapshots stable before the first sample", () => {
    setTop(20, 5);
    now = 1_000;
    const first = features.snapshot();
    now = 2_000;
    const second = features.snapshot();

    expect(second).toEqual(first);
    expect(first.timestamp).toBe(0);
  });

  it("classifies spread width in basis points", () => {
    setTop(1, 1, "1000", "1001");
    expect(features.spreadStatus()).toBe("normal");
    setTop(1, 1, "1000", "1003");
    expect(features.spreadStatus()).toBe("wide");
    setTop(1, 1, "100", "101");
    expect(features.spreadStatus()).toBe("extreme");
  });

  it("flags a lopsided top five as a liquidity squeeze", () => {
    setTop(90, 10);
    expect(features.detectLiquiditySqueeze()).toBe(true);
    setTop(60, 40);
    expect(features.detectLiquiditySqueeze()).toBe(false);
  });

  describe("detectSpoofing", () => {
    it("needs five samples", () => {
      for (let i = 0; i < 4; i++) {
        setTop(50, 5);
        features.update();
      }
      setTop(5, 5);
      expect(features.detectSpoofing()).toBeNull();
    });

    it("flags a large best bid that mostly vanished", () => {
      for (let i = 0; i < 5; i++) {
        setTop(50, 5);
        features.update();
      }
      setTop(5, 5);

      expect(features.detectSpoofing()).toEqual({
        side: "bid",
        price: 100,
        previousSize: 50,
        currentSize: 5,
      });
    });

    it("ignores a moderate reduction", () => {
      for (let i = 0; i < 5; i++) {
        setTop(50, 5);
        features.update();
      }
      setTop(20, 5);
      expect(features.detectSpoofing()).toBeNull();
    });
  });

  it("measures the buy share of recent volume", () => {
    expect(features.buySellRatio()).toBe(0.5);

    const base = { instrument: INST, price: 100 };
    tape.append({ ...base, size: 3, side: "buy", timestamp: 100, tradeId: "1" });
    tape.append({ ...base, size: 1, side: "sell", timestamp: 200, tradeId: "2" });
    expect(features.buySellRatio(1_000)).toBe(0.75);
  });

  it("keeps bounded spread and depth histories", () => {
    const small = new FeatureExtractor(book, tape, { historySize: 3 }, () => now);
    for (let i = 1; i <= 4; i++) {
      setTop(i, 1);
      small.update();
    }
    expect(small.getDepthHistory()).toEqual([
      { bid: 2, ask: 1 },
      { bid: 3, ask: 1 },
      { bid: 4, ask: 1 },
    ]);
    expect(small.getSpreadHistory()).toHaveLength(3);
  });
});

describe("classifyGamblerBehavior", () => {
  function snapshot(overrides: Partial<IMicrostructureSnapshot>): IMicrostructureSnapshot {
    const book = new OrderBookReplica(INST);
    book.applySnapshot([["1000", "1"]], [["1001", "1"]]);
    const base = new FeatureExtractor(book, new TradeTape(INST), {}, () => 0).snapshot();
    return { ...base, ...overrides };
  }

  it("finds nothing in a calm book", () => {
    expect(classifyGamblerBehavior(snapshot({}))).toEqual({
      panicSelling: false,
      fomoBuying: false,
      chasingRally: false,
      panicCovering: false,
      reasons: [],
    });
  });

  it("detects panic selling", () => {
    const result = classifyGamblerBehavior(
      snapshot({
        spreadStatus: "extreme",
        ofiTrend: "falling",
        pressure: { buyPressure: 0, sellPressure: 150, netPressure: -150, imbalance: -1 },
      })
    );
    expect(result.panicSelling).toBe(true);
    expect(result.reasons).toEqual(["panic_selling"]);
  });

  it("detects FOMO buying and panic covering by spread width", () => {
    const pressure = { buyPressure: 150, sellPressure: 0, netPressure: 150, imbalance: 1 };
    const wide = classifyGamblerBehavior(snapshot({ spreadStatus: "wide", ofiTrend: "rising", pressure }));
    const extreme = classifyGamblerBehavior(
      snapshot({ spreadStatus: "extreme", ofiTrend: "rising", pressure })
    );

    expect(wide.reasons).toEqual(["fomo_buying"]);
    expect(extreme.reasons).toEqual(["panic_covering"]);
  });

  it("detects chasing when the weighted mid runs ahead with strong flow", () => {
    const result = classifyGamblerBehavior(snapshot({ mid: 1000, wmp: 1002, ofi1s: 60 }));
    expect(result.chasingRally).toBe(true);
    expect(result.reasons).toEqual(["chasing_rally"]);

    expect(classifyGamblerBehavior(snapshot({ mid: 1000, wmp: 1002, ofi1s: 40 })).chasingRally).toBe(false);
  });
});
