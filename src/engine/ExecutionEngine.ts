import { IExecutionClient, IExecutionOutcome, IOrderRequest } from "../types/exchange.types";
import { ISignal } from "../types/strategy.types";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";

export type OutcomeListener = (outcome: IExecutionOutcome) => void;

/** Orders a signal translates to; market-making signals become two post-only quotes. */
export function ordersForSignal(signal: ISignal): IOrderRequest[] {
  if (signal.action === "market_make") {
    if (!signal.quote) return [];
    return [
      { instrument: signal.instrument, side: "buy", type: "post_only", size: signal.size, price: signal.quote.bid },
      { instrument: signal.instrument, side: "sell", type: "post_only", size: signal.size, price: signal.quote.ask },
    ];
  }
  if (signal.orderType === "market") {
    return [{ instrument: signal.instrument, side: signal.action, type: "market", size: signal.size }];
  }
  return [
    {
      instrument: signal.instrument,
      side: signal.action,
      type: signal.orderType,
      size: signal.size,
      price: signal.price,
    },
  ];
}

/**
 * Single-worker queue between the risk gate and the exchange. A failed
 * order is reported as "not executed" and never propagates.
 */
export class ExecutionEngine {
  private queue: ISignal[] = [];
  private draining: Promise<void> | null = null;
  private stopped = false;
  private executedCount = 0;
  private failedCount = 0;

  constructor(
    private client: IExecutionClient,
    private onOutcome: OutcomeListener = () => undefined,
    private clock: () => number = Date.now
  ) {}

  enqueue(signal: ISignal): void {
    if (this.stopped) {
      logger.warning(`[Execution] Stopped, dropping ${signal.strategy} signal ${signal.id}`);
      return;
    }
    this.queue.push(signal);
    this.kick();
  }

  private kick(): void {
    if (this.draining || this.stopped) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.queue.length > 0) this.kick();
    });
  }

  private async drain(): Promise<void> {
    let next = this.queue.shift();
    while (next && !this.stopped) {
      const outcome = await this.execute(next);
      try {
        this.onOutcome(outcome);
      } catch (err) {
        logger.error("[Execution] Outcome listener failed", err);
      }
      next = this.queue.shift();
    }
  }

  async execute(signal: ISignal): Promise<IExecutionOutcome> {
    const started = this.clock();
    const orders = ordersForSignal(signal);
    if (orders.length === 0) {
      this.failedCount++;
      return {
        signal,
        executed: false,
        orderIds: [],
        fills: 0,
        realizedPnl: 0,
        error: "Signal has no executable orders",
        latencyMs: 0,
      };
    }

    const orderIds: string[] = [];
    const errors: string[] = [];
    let fills = 0;
    let realizedPnl = 0;
    for (const order of orders) {
      try {
        const result = await this.client.placeOrder(order);
        if (!result.ok) {
          errors.push(result.error);
          continue;
        }
        orderIds.push(result.orderId);
        if (result.fill) {
          fills++;
          realizedPnl += result.fill.realizedPnl;
        }
      } catch (err) {
        errors.push(errorMessage(err));
      }
    }

    const latencyMs = this.clock() - started;
    if (errors.length > 0) {
      this.failedCount++;
      logger.warning(`[Execution] ${signal.strategy} signal ${signal.id} not executed: ${errors.join("; ")}`);
      return { signal, executed: false, orderIds, fills, realizedPnl, error: errors.join("; "), latencyMs };
    }

    this.executedCount++;
    logger.success(
      `[Execution] ${signal.strategy} ${signal.action} ${signal.instrument} -> ${orderIds.join(", ")} (${latencyMs}ms)`
    );
    return { signal, executed: true, orderIds, fills, realizedPnl, latencyMs };
  }

  /** Resolves once the queue is empty. */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  async stop(): Promise<void> {
    this.stopped = true;
    const dropped = this.queue.length;
    this.queue = [];
    if (this.draining) await this.draining;
    if (dropped > 0) logger.warning(`[Execution] Dropped ${dropped} queued signals on stop`);
  }

  getStats(): { queued: number; executed: number; failed: number } {
    return { queued: this.queue.length, executed: this.executedCount, failed: this.failedCount };
  }
}
