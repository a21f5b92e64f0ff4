import { IFeatureOptions } from "../types/market.types";
import { IKillSwitchLimits, IRiskLimits } from "../types/risk.types";
import {
  IFrontRunningOptions,
  ISpreadCapturingOptions,
  IWallRidingOptions,
} from "../types/strategy.types";
import { IStreamOptions } from "../types/stream.types";
import { OKX_WS_PRIVATE_URL, OKX_WS_PUBLIC_URL } from "../utils/constants";

export const DEFAULT_STREAM_OPTIONS: IStreamOptions = {
  publicUrl: OKX_WS_PUBLIC_URL,
  privateUrl: OKX_WS_PRIVATE_URL,
  reconnectDelayMs: 5_000,
  receiveTimeoutMs: 30_000,
  authTimeoutMs: 10_000,
};

export const DEFAULT_TAPE_CAPACITY = 1000;

export const DEFAULT_FEATURE_OPTIONS: IFeatureOptions = {
  historySize: 100,
  trendWindow: 10,
  voidGapThreshold: 0.002, // 0.2%
  voidScanLevels: 50,
  wallMinDepth: 50,
  wallScanLevels: 20,
  squeezeThreshold: 0.7,
};

export const DEFAULT_FRONT_RUNNING: IFrontRunningOptions = {
  largeTradeThreshold: 10,
  depthDropThreshold: 0.5,
  historySize: 20,
  positionSize: 0.01,
};

export const DEFAULT_WALL_RIDING: IWallRidingOptions = {
  wallDepthThreshold: 100,
  scanLevels: 20,
  persistenceMs: 5_000,
  absenceGraceMs: 2_000,
  tickSize: 0.1,
  positionSize: 0.01,
  confidence: 0.7,
};

export const DEFAULT_SPREAD_CAPTURING: ISpreadCapturingOptions = {
  minSpreadBps: 50,
  maxSpreadBps: 200,
  positionSize: 0.01,
  confidence: 0.8,
};

export const DEFAULT_KILL_SWITCH: IKillSwitchLimits = {
  maxDailyLoss: 0.05,
  maxLatencyMs: 100,
  latencyWindow: 100,
  checkIntervalMs: 1_000,
};

export const DEFAULT_RISK_LIMITS: IRiskLimits = {
  maxPositionSize: 1000,
  maxDailyLoss: 0.05,
  leverageLimit: 20,
  kelly: {
    winRate: 0.55,
    avgWin: 0.02,
    avgLoss: 0.015,
    maxFraction: 0.25,
  },
};
