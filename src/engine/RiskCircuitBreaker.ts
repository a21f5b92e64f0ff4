import { DEFAULT_KILL_SWITCH } from "../config/defaults";
import { IExecutionClient } from "../types/exchange.types";
import {
  IKillSwitchLimits,
  IKillSwitchStatus,
  IRiskState,
  ISafetyGate,
  TriggerReason,
} from "../types/risk.types";
import { mean } from "../utils/mathUtils";
import { logger } from "../utils/logger";

/**
 * Kill switch. An independent loop samples balance and request latency once
 * per interval and halts all trading when either limit is breached.
 *
 * Only the loop (or an explicit trip/reset) writes the state. A trip cancels
 * resting orders once; there is no automatic recovery.
 */
export class RiskCircuitBreaker implements ISafetyGate {
  private limits: IKillSwitchLimits;
  private state: IRiskState = {
    dailyStartBalance: 0,
    currentBalance: 0,
    latencySamples: [],
    triggered: false,
    triggerReason: null,
    triggerTime: null,
  };
  private running = false;
  private loop: Promise<void> | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(
    private client: IExecutionClient,
    private instruments: () => string[] = () => [],
    limits: Partial<IKillSwitchLimits> = {},
    private clock: () => number = Date.now
  ) {
    this.limits = { ...DEFAULT_KILL_SWITCH, ...limits };
  }

  async start(): Promise<void> {
    if (this.running) return;
    const balance = await this.client.getBalance();
    this.state.dailyStartBalance = balance.total;
    this.state.currentBalance = balance.total;
    this.running = true;
    this.loop = this.runLoop();
    logger.success(
      `[KillSwitch] Monitoring | start balance ${balance.total.toFixed(2)} | max daily loss ${(this.limits.maxDailyLoss * 100).toFixed(1)}% | max latency ${this.limits.maxLatencyMs}ms`
    );
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    this.wake?.();
    this.wake = null;
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    logger.info("[KillSwitch] Stopped");
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      try {
        await this.checkOnce();
      } catch (err) {
        logger.error("[KillSwitch] Check failed", err);
      }
      await this.sleep(this.limits.checkIntervalMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      if (!this.running) {
        resolve();
        return;
      }
      this.wake = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }

  /** One monitor iteration. */
  async checkOnce(): Promise<void> {
    if (this.state.triggered) {
      logger.debug(`[KillSwitch] Triggered (${this.state.triggerReason}), waiting for manual reset`);
      return;
    }

    const balance = await this.client.getBalance();
    this.state.currentBalance = balance.total;
    // Zero until the client has timed a request
    const latency = this.client.getAvgLatencyMs();
    if (latency > 0) this.recordLatency(latency);

    const loss = this.dailyLossRatio();
    if (loss > this.limits.maxDailyLoss) {
      await this.trip(
        "daily_loss",
        `daily loss ${(loss * 100).toFixed(2)}% > ${(this.limits.maxDailyLoss * 100).toFixed(2)}%`
      );
      return;
    }

    const avgLatency = this.avgLatencyMs();
    if (avgLatency > this.limits.maxLatencyMs) {
      await this.trip("latency", `avg latency ${avgLatency.toFixed(1)}ms > ${this.limits.maxLatencyMs}ms`);
    }
  }

  recordLatency(ms: number): void {
    const samples = this.state.latencySamples;
    samples.push(ms);
    if (samples.length > this.limits.latencyWindow) {
      samples.splice(0, samples.length - this.limits.latencyWindow);
    }
  }

  /** Halt trading and cancel every known instrument's orders, once per trip. */
  async trip(reason: TriggerReason, message: string): Promise<void> {
    if (this.state.triggered) return;
    this.state.triggered = true;
    this.state.triggerReason = reason;
    this.state.triggerTime = this.clock();
    logger.critical(`[KillSwitch] TRIGGERED (${reason}): ${message}`);
    await this.cancelEverything();
  }

  private async cancelEverything(): Promise<void> {
    const targets = new Set(this.instruments());
    try {
      for (const pos of await this.client.getPositions()) {
        targets.add(pos.instrument);
      }
    } catch (err) {
      logger.error("[KillSwitch] Could not load positions for cancel-all", err);
    }

    for (const instrument of targets) {
      try {
        const cancelled = await this.client.cancelAll(instrument);
        logger.warning(`[KillSwitch] Cancelled ${cancelled} orders on ${instrument}`);
      } catch (err) {
        logger.error(`[KillSwitch] Cancel-all failed for ${instrument}`, err);
      }
    }
  }

  /** Manual recovery: clears the trip and rebases the day on the current balance. */
  reset(): void {
    this.state.triggered = false;
    this.state.triggerReason = null;
    this.state.triggerTime = null;
    this.state.latencySamples = [];
    this.state.dailyStartBalance = this.state.currentBalance;
    logger.warning(`[KillSwitch] Manually reset, daily start balance ${this.state.currentBalance.toFixed(2)}`);
  }

  /** New trading day. Does not clear an active trip. */
  rollDay(): void {
    this.state.dailyStartBalance = this.state.currentBalance;
    logger.info(`[KillSwitch] New day, start balance ${this.state.currentBalance.toFixed(2)}`);
  }

  isSafe(): boolean {
    return !this.state.triggered;
  }

  dailyLossRatio(): number {
    const start = this.state.dailyStartBalance;
    if (start <= 0) return 0;
    return (start - this.state.currentBalance) / start;
  }

  avgLatencyMs(): number {
    return mean(this.state.latencySamples);
  }

  getState(): IRiskState {
    return { ...this.state, latencySamples: this.state.latencySamples.slice() };
  }

  getStatus(): IKillSwitchStatus {
    return {
      triggered: this.state.triggered,
      triggerReason: this.state.triggerReason,
      triggerTime: this.state.triggerTime,
      dailyLossRatio: this.dailyLossRatio(),
      avgLatencyMs: this.avgLatencyMs(),
      maxDailyLoss: this.limits.maxDailyLoss,
      maxLatencyMs: this.limits.maxLatencyMs,
    };
  }
}
