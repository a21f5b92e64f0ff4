import { vi } from "vitest";
import {
  IBalance,
  IExecutionClient,
  IOrderRequest,
  IPosition,
  PlaceOrderResult,
} from "../../types/exchange.types";

/**
 * Scripted execution client. Balances are served in order; the last one
 * repeats once the script runs out.
 */
export class FakeExecutionClient implements IExecutionClient {
  balances: number[];
  positions: IPosition[] = [];
  latencyMs = 10;
  orders: IOrderRequest[] = [];
  failNextOrder: string | null = null;
  cancelAll = vi.fn(async (_instrument: string): Promise<number> => 1);

  constructor(...balances: number[]) {
    this.balances = balances.length > 0 ? balances : [10_000];
  }

  async placeOrder(order: IOrderRequest): Promise<PlaceOrderResult> {
    this.orders.push(order);
    if (this.failNextOrder) {
      const error = this.failNextOrder;
      this.failNextOrder = null;
      return { ok: false, error };
    }
    return { ok: true, orderId: `ord-${this.orders.length}` };
  }

  async getBalance(): Promise<IBalance> {
    const total = this.balances.length > 1 ? this.balances.shift() ?? 0 : this.balances[0];
    return { total, available: total };
  }

  async getPositions(): Promise<IPosition[]> {
    return this.positions;
  }

  getAvgLatencyMs(): number {
    return this.latencyMs;
  }
}
