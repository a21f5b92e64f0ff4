import { describe, it, expect } from "vitest";
import { loadConfig } from "../environment";
import { ConfigurationError } from "../../utils/errors";
import {
  OKX_REST_URL,
  OKX_WS_PAPER_PRIVATE_URL,
  OKX_WS_PAPER_PUBLIC_URL,
  OKX_WS_PRIVATE_URL,
  OKX_WS_PUBLIC_URL,
} from "../../utils/constants";

const LIVE_CREDS = {
  TRADING_MODE: "live",
  OKX_API_KEY: "test-key",
  OKX_SECRET_KEY: "test-secret",
  OKX_PASSPHRASE: "test-pass",
};

describe("loadConfig", () => {
  it("defaults to paper trading on one instrument", () => {
    const cfg = loadConfig({});

    expect(cfg.mode).toBe("paper");
    expect(cfg.instruments).toEqual(["BTC-USDT-SWAP"]);
    expect(cfg.credentials).toBeUndefined();
    expect(cfg.mongoUri).toBeUndefined();
    expect(cfg.restUrl).toBe(OKX_REST_URL);
    expect(cfg.stream.publicUrl).toBe(OKX_WS_PAPER_PUBLIC_URL);
    expect(cfg.stream.privateUrl).toBe(OKX_WS_PAPER_PRIVATE_URL);
    expect(cfg.stream.bookChannel).toBe("books-l2-tbt");
    expect(cfg.orderBook).toEqual({ validateChecksum: true, autoResyncOnChecksumMismatch: false, tapeCapacity: 1000 });
    expect(cfg.tactics.enabled).toEqual({ front_running: true, wall_riding: true, spread_capturing: true });
    expect(cfg.killSwitch.maxDailyLoss).toBe(0.05);
    expect(cfg.risk.maxDailyLoss).toBe(0.05);
  });

  it("uses the production endpoints and credentials in live mode", () => {
    const cfg = loadConfig(LIVE_CREDS);

    expect(cfg.stream.publicUrl).toBe(OKX_WS_PUBLIC_URL);
    expect(cfg.stream.privateUrl).toBe(OKX_WS_PRIVATE_URL);
    expect(cfg.credentials).toEqual({ apiKey: "test-key", secretKey: "test-secret", passphrase: "test-pass" });
  });

  it("requires credentials in live mode", () => {
    expect(() => loadConfig({ TRADING_MODE: "live", OKX_API_KEY: "test-key" })).toThrow(ConfigurationError);
  });

  it("rejects an unknown trading mode", () => {
    expect(() => loadConfig({ TRADING_MODE: "Backtest" })).toThrow(
      'TRADING_MODE must be "paper" or "live", got "backtest"'
    );
  });

  it("parses the instrument list", () => {
    const cfg = loadConfig({ INSTRUMENTS: " BTC-USDT-SWAP, ETH-USDT-SWAP ,," });
    expect(cfg.instruments).toEqual(["BTC-USDT-SWAP", "ETH-USDT-SWAP"]);

    expect(() => loadConfig({ INSTRUMENTS: " , " })).toThrow("INSTRUMENTS must name at least one instrument");
  });

  it("reads numeric and boolean overrides", () => {
    const cfg = loadConfig({
      MAX_DAILY_LOSS: "0.02",
      WALL_PERSISTENCE_MS: "8000",
      VALIDATE_CHECKSUM: "FALSE",
      AUTO_RESYNC_ON_MISMATCH: "true",
      ENABLE_FRONT_RUNNING: "false",
      MONGODB_URI: "mongodb://localhost:27017/test",
    });

    expect(cfg.killSwitch.maxDailyLoss).toBe(0.02);
    expect(cfg.risk.maxDailyLoss).toBe(0.02);
    expect(cfg.tactics.wallRiding.persistenceMs).toBe(8000);
    expect(cfg.tactics.wallRiding.absenceGraceMs).toBe(2000);
    expect(cfg.orderBook.validateChecksum).toBe(false);
    expect(cfg.orderBook.autoResyncOnChecksumMismatch).toBe(true);
    expect(cfg.tactics.enabled.front_running).toBe(false);
    expect(cfg.mongoUri).toBe("mongodb://localhost:27017/test");
  });

  it("rejects malformed numbers", () => {
    expect(() => loadConfig({ MAX_LATENCY_MS: "fast" })).toThrow('MAX_LATENCY_MS must be a number, got "fast"');
    expect(() => loadConfig({ TICK_SIZE: "0" })).toThrow("TICK_SIZE must be > 0, got 0");
  });

  it("rejects a minimum spread above the maximum", () => {
    expect(() => loadConfig({ SPREAD_MIN_BPS: "300" })).toThrow(
      "SPREAD_MIN_BPS (300) must not exceed SPREAD_MAX_BPS (200)"
    );
  });
});
