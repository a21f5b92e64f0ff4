import { DEFAULT_RISK_LIMITS } from "../config/defaults";
import { IBalance, IPosition } from "../types/exchange.types";
import {
  IPostTradeResult,
  IRiskLimits,
  IRiskMetrics,
  IRiskSummary,
  ISafetyGate,
  RiskAdvisory,
  RiskCheckResult,
  RiskRejectCode,
} from "../types/risk.types";
import { ISignal } from "../types/strategy.types";
import { clamp } from "../utils/mathUtils";
import { logger } from "../utils/logger";

const REDUCE_SIZE_LOSS = -0.03;
const CONSIDER_FLATTEN_LOSS = -0.04;

/**
 * Synchronous pre-trade gate plus post-trade bookkeeping.
 * Rejections come back as structured results; nothing here throws.
 */
export class RiskManager {
  private limits: IRiskLimits;
  private startBalance = 0;
  private dailyStartBalance = 0;
  private initialized = false;
  private metrics: IRiskMetrics = {
    totalBalance: 0,
    availableBalance: 0,
    totalPositionValue: 0,
    unrealizedPnl: 0,
    leverage: 0,
    dailyPnl: 0,
    dailyLossRatio: 0,
  };
  private emergencyStop = false;
  private emergencyReason: string | null = null;
  private totalTrades = 0;
  private winningTrades = 0;
  private losingTrades = 0;

  constructor(limits: Partial<IRiskLimits> = {}, private safety: ISafetyGate | null = null) {
    this.limits = { ...DEFAULT_RISK_LIMITS, ...limits };
  }

  attachSafetyGate(gate: ISafetyGate): void {
    this.safety = gate;
  }

  updateMetrics(balance: IBalance, positions: readonly IPosition[]): IRiskMetrics {
    if (!this.initialized) {
      this.startBalance = balance.total;
      this.dailyStartBalance = balance.total;
      this.initialized = true;
      logger.info(`[Risk] Start balance ${balance.total.toFixed(2)}`);
    }

    let positionValue = 0;
    let unrealized = 0;
    for (const pos of positions) {
      positionValue += Math.abs(pos.notional);
      unrealized += pos.unrealizedPnl;
    }

    const dailyPnl = balance.total - this.dailyStartBalance;
    this.metrics = {
      totalBalance: balance.total,
      availableBalance: balance.available,
      totalPositionValue: positionValue,
      unrealizedPnl: unrealized,
      leverage: balance.total > 0 ? positionValue / balance.total : 0,
      dailyPnl,
      dailyLossRatio: this.dailyStartBalance > 0 ? dailyPnl / this.dailyStartBalance : 0,
    };
    logger.debug(
      `[Risk] balance=${balance.total.toFixed(2)} positions=${positionValue.toFixed(2)} leverage=${this.metrics.leverage.toFixed(2)}x daily=${(this.metrics.dailyLossRatio * 100).toFixed(2)}%`
    );
    return { ...this.metrics };
  }

  preTradeCheck(signal: ISignal): RiskCheckResult {
    const notional = signal.size * signal.price;
    const m = this.metrics;

    if (this.safety && !this.safety.isSafe()) {
      return this.deny("circuit_breaker", "Circuit breaker triggered", notional);
    }

    if (this.emergencyStop) {
      return this.deny("emergency_stop", `Emergency stop active (${this.emergencyReason ?? "unknown"})`, notional);
    }

    if (m.dailyLossRatio <= -this.limits.maxDailyLoss) {
      this.enableEmergencyStop(`daily loss ${(m.dailyLossRatio * 100).toFixed(2)}%`);
      return this.deny(
        "daily_loss",
        `Daily loss ${(m.dailyLossRatio * 100).toFixed(2)}% reached limit ${(this.limits.maxDailyLoss * 100).toFixed(2)}%`,
        notional
      );
    }

    if (notional > this.limits.maxPositionSize) {
      return this.deny(
        "max_position",
        `Notional ${notional.toFixed(2)} > max position ${this.limits.maxPositionSize}`,
        notional
      );
    }

    const requiredMargin = notional / this.limits.leverageLimit;
    if (requiredMargin > m.availableBalance) {
      return this.deny(
        "insufficient_margin",
        `Margin ${requiredMargin.toFixed(2)} > available ${m.availableBalance.toFixed(2)}`,
        notional
      );
    }

    const newLeverage = m.totalBalance > 0 ? (m.totalPositionValue + notional) / m.totalBalance : Infinity;
    if (newLeverage > this.limits.leverageLimit) {
      return this.deny(
        "leverage",
        `Leverage ${newLeverage.toFixed(2)}x > limit ${this.limits.leverageLimit}x`,
        notional
      );
    }

    const kellySize = this.kellyFraction() * m.totalBalance;
    if (notional > kellySize) {
      const warning = `Notional ${notional.toFixed(2)} above Kelly size ${kellySize.toFixed(2)}`;
      logger.warning(`[Risk] ${signal.instrument} ${warning}`);
      return { approved: true, notional, kellySize, warning };
    }
    return { approved: true, notional, kellySize };
  }

  private deny(code: RiskRejectCode, reason: string, notional: number): RiskCheckResult {
    return { approved: false, code, reason, notional };
  }

  /** Kelly fraction of total balance, clamped to [0, maxFraction]. */
  kellyFraction(): number {
    const { winRate, avgWin, avgLoss, maxFraction } = this.limits.kelly;
    if (avgWin <= 0) return 0;
    return clamp((winRate * avgWin - (1 - winRate) * avgLoss) / avgWin, 0, maxFraction);
  }

  postTradeCheck(trade: { realizedPnl?: number } = {}): IPostTradeResult {
    this.totalTrades++;
    const pnl = trade.realizedPnl;
    if (pnl !== undefined && pnl !== 0) {
      if (pnl > 0) {
        this.winningTrades++;
        logger.success(`[Risk] Trade #${this.totalTrades} profit ${pnl.toFixed(4)}`);
      } else {
        this.losingTrades++;
        logger.warning(`[Risk] Trade #${this.totalTrades} loss ${pnl.toFixed(4)}`);
      }
    }

    const advisories: RiskAdvisory[] = [];
    const ratio = this.metrics.dailyLossRatio;
    if (ratio < REDUCE_SIZE_LOSS) {
      advisories.push("reduce_size");
      logger.warning(`[Risk] Daily loss ${(ratio * 100).toFixed(2)}% beyond 3%, reduce size`);
    }
    if (ratio < CONSIDER_FLATTEN_LOSS) {
      advisories.push("consider_flatten");
      logger.warning(`[Risk] Daily loss ${(ratio * 100).toFixed(2)}% beyond 4%, consider flattening`);
    }

    return {
      totalTrades: this.totalTrades,
      winningTrades: this.winningTrades,
      losingTrades: this.losingTrades,
      advisories,
    };
  }

  checkEmergencyStop(): boolean {
    if (this.metrics.dailyLossRatio <= -this.limits.maxDailyLoss) {
      this.enableEmergencyStop(`daily loss ${(this.metrics.dailyLossRatio * 100).toFixed(2)}%`);
    }
    return this.emergencyStop;
  }

  enableEmergencyStop(reason: string): void {
    if (!this.emergencyStop) {
      logger.critical(`[Risk] EMERGENCY STOP: ${reason}`);
    }
    this.emergencyStop = true;
    this.emergencyReason = reason;
  }

  disableEmergencyStop(): void {
    this.emergencyStop = false;
    this.emergencyReason = null;
    logger.warning("[Risk] Emergency stop cleared");
  }

  resetDaily(): void {
    this.dailyStartBalance = this.metrics.totalBalance;
    this.metrics = { ...this.metrics, dailyPnl: 0, dailyLossRatio: 0 };
    logger.info(`[Risk] Daily stats reset, start balance ${this.dailyStartBalance.toFixed(2)}`);
  }

  getRiskSummary(): IRiskSummary {
    return {
      ...this.metrics,
      startBalance: this.startBalance,
      dailyStartBalance: this.dailyStartBalance,
      emergencyStop: this.emergencyStop,
      emergencyReason: this.emergencyReason,
      totalTrades: this.totalTrades,
      winningTrades: this.winningTrades,
      losingTrades: this.losingTrades,
      winRate: this.totalTrades > 0 ? this.winningTrades / this.totalTrades : 0,
    };
  }
}
