export type TriggerReason = "daily_loss" | "latency" | "manual";

export interface IRiskState {
  dailyStartBalance: number;
  currentBalance: number;
  latencySamples: number[];
  triggered: boolean;
  triggerReason: TriggerReason | null;
  triggerTime: number | null;
}

export interface IKillSwitchLimits {
  maxDailyLoss: number;
  maxLatencyMs: number;
  latencyWindow: number;
  checkIntervalMs: number;
}

export interface IKillSwitchStatus {
  triggered: boolean;
  triggerReason: TriggerReason | null;
  triggerTime: number | null;
  dailyLossRatio: number;
  avgLatencyMs: number;
  maxDailyLoss: number;
  maxLatencyMs: number;
}

/** Anything that can veto trading as a whole. */
export interface ISafetyGate {
  isSafe(): boolean;
}

export interface IKellyInputs {
  winRate: number;
  avgWin: number;
  avgLoss: number;
  maxFraction: number;
}

export interface IRiskLimits {
  maxPositionSize: number;
  maxDailyLoss: number;
  leverageLimit: number;
  kelly: IKellyInputs;
}

export type RiskRejectCode =
  | "circuit_breaker"
  | "emergency_stop"
  | "daily_loss"
  | "max_position"
  | "insufficient_margin"
  | "leverage";

export type RiskCheckResult =
  | { approved: true; notional: number; kellySize: number; warning?: string }
  | { approved: false; code: RiskRejectCode; reason: string; notional: number };

export type RiskAdvisory = "reduce_size" | "consider_flatten";

export interface IPostTradeResult {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  advisories: RiskAdvisory[];
}

export interface IRiskMetrics {
  totalBalance: number;
  availableBalance: number;
  totalPositionValue: number;
  unrealizedPnl: number;
  leverage: number;
  dailyPnl: number;
  dailyLossRatio: number;
}

export interface IRiskSummary extends IRiskMetrics {
  startBalance: number;
  dailyStartBalance: number;
  emergencyStop: boolean;
  emergencyReason: string | null;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number;
}
