import { v4 as uuidv4 } from "uuid";
import {
  IBalance,
  IExecutionClient,
  IOrderRequest,
  IPosition,
  PlaceOrderResult,
} from "../types/exchange.types";
import { logger } from "../utils/logger";

interface IPaperPosition {
  quantity: number; // signed: long > 0, short < 0
  avgPrice: number;
}

export interface IRestingOrder extends IOrderRequest {
  orderId: string;
  createdAt: number;
}

/**
 * In-memory account for paper trading. Market, IOC and FOK orders fill at
 * once at the order price (or the mark); limit and post-only orders rest
 * until cancelled.
 */
export class PaperExecutionClient implements IExecutionClient {
  private balance: number;
  private positions: Map<string, IPaperPosition> = new Map();
  private resting: Map<string, IRestingOrder> = new Map();
  private realizedPnl = 0;

  constructor(
    startingBalance = 10_000,
    private markPrice: (instrument: string) => number = () => 0,
    private clock: () => number = Date.now
  ) {
    this.balance = startingBalance;
    logger.info(`[Paper] Account initialized with ${startingBalance.toFixed(2)}`);
  }

  async placeOrder(order: IOrderRequest): Promise<PlaceOrderResult> {
    if (order.size <= 0) {
      return { ok: false, error: `Invalid size ${order.size}` };
    }
    const orderId = uuidv4();

    if (order.type === "limit" || order.type === "post_only") {
      if (order.price === undefined) return { ok: false, error: "Limit order without price" };
      this.resting.set(orderId, { ...order, orderId, createdAt: this.clock() });
      return { ok: true, orderId };
    }

    const price = order.price ?? this.markPrice(order.instrument);
    if (!(price > 0)) {
      return { ok: false, error: `No price available for ${order.instrument}` };
    }
    const realizedPnl = this.fill(order.instrument, order.side === "buy" ? order.size : -order.size, price);
    return { ok: true, orderId, fill: { price, size: order.size, realizedPnl } };
  }

  /** Returns the P&L realized by this fill. */
  private fill(instrument: string, signedQty: number, price: number): number {
    const pos = this.positions.get(instrument) ?? { quantity: 0, avgPrice: 0 };
    const q = pos.quantity;
    let pnl = 0;

    if (q === 0 || Math.sign(q) === Math.sign(signedQty)) {
      const total = Math.abs(q) + Math.abs(signedQty);
      pos.avgPrice = (Math.abs(q) * pos.avgPrice + Math.abs(signedQty) * price) / total;
      pos.quantity = q + signedQty;
    } else {
      const closing = Math.min(Math.abs(q), Math.abs(signedQty));
      pnl = closing * (price - pos.avgPrice) * Math.sign(q);
      this.balance += pnl;
      this.realizedPnl += pnl;
      pos.quantity = q + signedQty;
      if (pos.quantity === 0) pos.avgPrice = 0;
      else if (Math.sign(pos.quantity) !== Math.sign(q)) pos.avgPrice = price;
    }

    if (pos.quantity === 0) this.positions.delete(instrument);
    else this.positions.set(instrument, pos);
    return pnl;
  }

  async cancelAll(instrument: string): Promise<number> {
    let cancelled = 0;
    for (const [id, order] of this.resting) {
      if (order.instrument === instrument) {
        this.resting.delete(id);
        cancelled++;
      }
    }
    return cancelled;
  }

  async getBalance(): Promise<IBalance> {
    const unrealized = this.getPositionsSync().reduce((sum, p) => sum + p.unrealizedPnl, 0);
    return { total: this.balance + unrealized, available: this.balance };
  }

  async getPositions(): Promise<IPosition[]> {
    return this.getPositionsSync();
  }

  private getPositionsSync(): IPosition[] {
    const out: IPosition[] = [];
    for (const [instrument, pos] of this.positions) {
      const mark = this.markPrice(instrument) || pos.avgPrice;
      out.push({
        instrument,
        side: pos.quantity > 0 ? "long" : "short",
        size: Math.abs(pos.quantity),
        avgPrice: pos.avgPrice,
        markPrice: mark,
        notional: Math.abs(pos.quantity) * mark,
        unrealizedPnl: (mark - pos.avgPrice) * pos.quantity,
      });
    }
    return out;
  }

  getAvgLatencyMs(): number {
    return 0;
  }

  getOpenOrders(instrument?: string): IRestingOrder[] {
    return [...this.resting.values()].filter((o) => !instrument || o.instrument === instrument);
  }

  getRealizedPnl(): number {
    return this.realizedPnl;
  }
}
