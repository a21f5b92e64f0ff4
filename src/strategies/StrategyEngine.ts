import { ITradeEvent } from "../types/orderbook.types";
import { ISafetyGate } from "../types/risk.types";
import {
  IFrontRunningOptions,
  ISignal,
  ISpreadCapturingOptions,
  ITactic,
  ITacticContext,
  ITacticStats,
  IWallRidingOptions,
  TACTIC_KINDS,
  TacticKind,
} from "../types/strategy.types";
import { logger } from "../utils/logger";
import { FrontRunningTactic } from "./FrontRunningTactic";
import { SpreadCapturingTactic } from "./SpreadCapturingTactic";
import { WallRidingTactic } from "./WallRidingTactic";

export interface IStrategyEngineOptions {
  frontRunning?: Partial<IFrontRunningOptions>;
  wallRiding?: Partial<IWallRidingOptions>;
  spreadCapturing?: Partial<ISpreadCapturingOptions>;
  enabled?: Partial<Record<TacticKind, boolean>>;
}

type Hook = (tactic: ITactic) => ISignal[];

/**
 * Runs the three tactics on each event, in fixed order, while the safety
 * gate reports safe. Counts generated and executed signals per tactic.
 */
export class StrategyEngine {
  private tactics: Record<TacticKind, ITactic>;
  private enabled: Record<TacticKind, boolean>;
  private generated: Record<TacticKind, number>;
  private executed: Record<TacticKind, number>;

  constructor(private safety: ISafetyGate, options: IStrategyEngineOptions = {}) {
    this.tactics = {
      front_running: new FrontRunningTactic(options.frontRunning),
      wall_riding: new WallRidingTactic(options.wallRiding),
      spread_capturing: new SpreadCapturingTactic(options.spreadCapturing),
    };
    this.enabled = {
      front_running: options.enabled?.front_running ?? true,
      wall_riding: options.enabled?.wall_riding ?? true,
      spread_capturing: options.enabled?.spread_capturing ?? true,
    };
    this.generated = { front_running: 0, wall_riding: 0, spread_capturing: 0 };
    this.executed = { front_running: 0, wall_riding: 0, spread_capturing: 0 };
  }

  onMarketData(ctx: ITacticContext): ISignal[] {
    return this.run("market-data", (t) => t.onMarketData(ctx));
  }

  onOrderBook(ctx: ITacticContext): ISignal[] {
    return this.run("orderbook", (t) => t.onOrderBook(ctx));
  }

  onTrade(ctx: ITacticContext, trade: ITradeEvent): ISignal[] {
    return this.run("trade", (t) => t.onTrade(ctx, trade));
  }

  private run(event: string, hook: Hook): ISignal[] {
    if (!this.safety.isSafe()) return [];

    const signals: ISignal[] = [];
    for (const kind of TACTIC_KINDS) {
      if (!this.enabled[kind]) continue;
      try {
        for (const signal of hook(this.tactics[kind])) {
          this.generated[kind]++;
          logger.info(
            `[Signal] ${kind} ${signal.action} ${signal.instrument} ${signal.size}@${signal.price} conf=${signal.confidence.toFixed(2)} (${signal.reason})`
          );
          signals.push(signal);
        }
      } catch (err) {
        logger.error(`[StrategyEngine] ${kind} failed on ${event} event`, err);
      }
    }
    return signals;
  }

  markExecuted(signal: ISignal): void {
    this.executed[signal.strategy]++;
  }

  enable(kind: TacticKind): void {
    this.enabled[kind] = true;
    logger.info(`[StrategyEngine] ${kind} enabled`);
  }

  disable(kind: TacticKind): void {
    this.enabled[kind] = false;
    logger.info(`[StrategyEngine] ${kind} disabled`);
  }

  isEnabled(kind: TacticKind): boolean {
    return this.enabled[kind];
  }

  getStats(): Record<TacticKind, ITacticStats> {
    const stats = (kind: TacticKind): ITacticStats => ({
      enabled: this.enabled[kind],
      generated: this.generated[kind],
      executed: this.executed[kind],
      executionRate: this.generated[kind] > 0 ? this.executed[kind] / this.generated[kind] : 0,
    });
    return {
      front_running: stats("front_running"),
      wall_riding: stats("wall_riding"),
      spread_capturing: stats("spread_capturing"),
    };
  }
}
