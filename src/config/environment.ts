import { config } from "dotenv";
import {
  DEFAULT_FEATURE_OPTIONS,
  DEFAULT_FRONT_RUNNING,
  DEFAULT_KILL_SWITCH,
  DEFAULT_RISK_LIMITS,
  DEFAULT_SPREAD_CAPTURING,
  DEFAULT_STREAM_OPTIONS,
  DEFAULT_TAPE_CAPACITY,
  DEFAULT_WALL_RIDING,
} from "./defaults";
import { IFeatureOptions } from "../types/market.types";
import { IKillSwitchLimits, IRiskLimits } from "../types/risk.types";
import {
  IFrontRunningOptions,
  ISpreadCapturingOptions,
  IWallRidingOptions,
  TacticKind,
} from "../types/strategy.types";
import { IStreamCredentials, IStreamOptions } from "../types/stream.types";
import {
  DEFAULT_BOOK_CHANNEL,
  DEFAULT_INSTRUMENT,
  DEFAULT_TRADE_CHANNEL,
  OKX_REST_URL,
  OKX_WS_PAPER_PRIVATE_URL,
  OKX_WS_PAPER_PUBLIC_URL,
} from "../utils/constants";
import { ConfigurationError } from "../utils/errors";

// Load environment variables from .env file
config();

export type TradingMode = "paper" | "live";

type Env = Record<string, string | undefined>;

export interface IAppConfig {
  mode: TradingMode;
  instruments: string[];
  logLevel: string;
  mongoUri?: string;
  credentials?: IStreamCredentials;
  restUrl: string;
  restTimeoutMs: number;
  paperStartingBalance: number;
  stream: IStreamOptions & { bookChannel: string; tradeChannel: string };
  orderBook: {
    validateChecksum: boolean;
    autoResyncOnChecksumMismatch: boolean;
    tapeCapacity: number;
  };
  features: IFeatureOptions;
  tactics: {
    enabled: Record<TacticKind, boolean>;
    frontRunning: IFrontRunningOptions;
    wallRiding: IWallRidingOptions;
    spreadCapturing: ISpreadCapturingOptions;
  };
  killSwitch: IKillSwitchLimits;
  risk: IRiskLimits;
  syncSchedule: string;
  dailyResetSchedule: string;
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readPositive(env: Env, key: string, fallback: number): number {
  const value = readNumber(env, key, fallback);
  if (value <= 0) {
    throw new ConfigurationError(`${key} must be > 0, got ${value}`);
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  return raw.trim().toLowerCase() === "true";
}

function readMode(env: Env): TradingMode {
  const raw = (env.TRADING_MODE || "paper").toLowerCase();
  if (raw !== "paper" && raw !== "live") {
    throw new ConfigurationError(`TRADING_MODE must be "paper" or "live", got "${raw}"`);
  }
  return raw;
}

function readCredentials(env: Env, mode: TradingMode): IStreamCredentials | undefined {
  const apiKey = env.OKX_API_KEY || "";
  const secretKey = env.OKX_SECRET_KEY || "";
  const passphrase = env.OKX_PASSPHRASE || "";

  if (apiKey && secretKey && passphrase) {
    return { apiKey, secretKey, passphrase };
  }
  if (mode === "live") {
    throw new ConfigurationError(
      "OKX_API_KEY, OKX_SECRET_KEY and OKX_PASSPHRASE are required in live mode"
    );
  }
  return undefined;
}

/**
 * Builds the full runtime configuration from environment variables.
 * Every tunable has a default; malformed values throw ConfigurationError.
 */
export function loadConfig(env: Env = process.env): IAppConfig {
  const mode = readMode(env);
  const instruments = (env.INSTRUMENTS || DEFAULT_INSTRUMENT)
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  if (instruments.length === 0) {
    throw new ConfigurationError("INSTRUMENTS must name at least one instrument");
  }

  const minSpreadBps = readNumber(env, "SPREAD_MIN_BPS", DEFAULT_SPREAD_CAPTURING.minSpreadBps);
  const maxSpreadBps = readNumber(env, "SPREAD_MAX_BPS", DEFAULT_SPREAD_CAPTURING.maxSpreadBps);
  if (minSpreadBps > maxSpreadBps) {
    throw new ConfigurationError(
      `SPREAD_MIN_BPS (${minSpreadBps}) must not exceed SPREAD_MAX_BPS (${maxSpreadBps})`
    );
  }

  const maxDailyLoss = readPositive(env, "MAX_DAILY_LOSS", DEFAULT_RISK_LIMITS.maxDailyLoss);

  return {
    mode,
    instruments,
    logLevel: env.LOG_LEVEL || "info",
    mongoUri: env.MONGODB_URI || undefined,
    credentials: readCredentials(env, mode),
    restUrl: env.OKX_BASE_URL || OKX_REST_URL,
    restTimeoutMs: readPositive(env, "REST_TIMEOUT_MS", 10_000),
    paperStartingBalance: readPositive(env, "PAPER_STARTING_BALANCE", 10_000),
    stream: {
      ...DEFAULT_STREAM_OPTIONS,
      publicUrl: mode === "paper" ? OKX_WS_PAPER_PUBLIC_URL : DEFAULT_STREAM_OPTIONS.publicUrl,
      privateUrl: mode === "paper" ? OKX_WS_PAPER_PRIVATE_URL : DEFAULT_STREAM_OPTIONS.privateUrl,
      reconnectDelayMs: readPositive(env, "WS_RECONNECT_DELAY_MS", DEFAULT_STREAM_OPTIONS.reconnectDelayMs),
      receiveTimeoutMs: readPositive(env, "WS_RECEIVE_TIMEOUT_MS", DEFAULT_STREAM_OPTIONS.receiveTimeoutMs),
      authTimeoutMs: readPositive(env, "WS_AUTH_TIMEOUT_MS", DEFAULT_STREAM_OPTIONS.authTimeoutMs),
      bookChannel: env.WS_BOOK_CHANNEL || DEFAULT_BOOK_CHANNEL,
      tradeChannel: env.WS_TRADE_CHANNEL || DEFAULT_TRADE_CHANNEL,
    },
    orderBook: {
      validateChecksum: readBool(env, "VALIDATE_CHECKSUM", true),
      autoResyncOnChecksumMismatch: readBool(env, "AUTO_RESYNC_ON_MISMATCH", false),
      tapeCapacity: readPositive(env, "TRADE_TAPE_CAPACITY", DEFAULT_TAPE_CAPACITY),
    },
    features: {
      ...DEFAULT_FEATURE_OPTIONS,
      voidGapThreshold: readPositive(env, "VOID_GAP_THRESHOLD", DEFAULT_FEATURE_OPTIONS.voidGapThreshold),
      wallMinDepth: readPositive(env, "FEATURE_WALL_DEPTH", DEFAULT_FEATURE_OPTIONS.wallMinDepth),
      squeezeThreshold: readPositive(env, "SQUEEZE_THRESHOLD", DEFAULT_FEATURE_OPTIONS.squeezeThreshold),
    },
    tactics: {
      enabled: {
        front_running: readBool(env, "ENABLE_FRONT_RUNNING", true),
        wall_riding: readBool(env, "ENABLE_WALL_RIDING", true),
        spread_capturing: readBool(env, "ENABLE_SPREAD_CAPTURING", true),
      },
      frontRunning: {
        ...DEFAULT_FRONT_RUNNING,
        largeTradeThreshold: readPositive(env, "LARGE_TRADE_THRESHOLD", DEFAULT_FRONT_RUNNING.largeTradeThreshold),
        depthDropThreshold: readPositive(env, "DEPTH_DROP_THRESHOLD", DEFAULT_FRONT_RUNNING.depthDropThreshold),
      },
      wallRiding: {
        ...DEFAULT_WALL_RIDING,
        wallDepthThreshold: readPositive(env, "WALL_DEPTH_THRESHOLD", DEFAULT_WALL_RIDING.wallDepthThreshold),
        persistenceMs: readPositive(env, "WALL_PERSISTENCE_MS", DEFAULT_WALL_RIDING.persistenceMs),
        tickSize: readPositive(env, "TICK_SIZE", DEFAULT_WALL_RIDING.tickSize),
      },
      spreadCapturing: {
        ...DEFAULT_SPREAD_CAPTURING,
        minSpreadBps,
        maxSpreadBps,
        positionSize: readPositive(env, "MM_POSITION_SIZE", DEFAULT_SPREAD_CAPTURING.positionSize),
      },
    },
    killSwitch: {
      ...DEFAULT_KILL_SWITCH,
      maxDailyLoss,
      maxLatencyMs: readPositive(env, "MAX_LATENCY_MS", DEFAULT_KILL_SWITCH.maxLatencyMs),
    },
    risk: {
      ...DEFAULT_RISK_LIMITS,
      maxPositionSize: readPositive(env, "MAX_POSITION_SIZE", DEFAULT_RISK_LIMITS.maxPositionSize),
      maxDailyLoss,
      leverageLimit: readPositive(env, "LEVERAGE_LIMIT", DEFAULT_RISK_LIMITS.leverageLimit),
    },
    syncSchedule: env.SYNC_CRON || "*/5 * * * * *",
    dailyResetSchedule: env.DAILY_RESET_CRON || "0 0 * * *",
  };
}
