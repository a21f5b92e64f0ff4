import axios, { AxiosAdapter, AxiosInstance } from "axios";
import {
  IBalance,
  IExecutionClient,
  IOrderRequest,
  IPosition,
  PlaceOrderResult,
} from "../types/exchange.types";
import { IStreamCredentials } from "../types/stream.types";
import { OKX_CANCEL_BATCH_LIMIT, OKX_REST_URL } from "../utils/constants";
import { ExchangeRequestError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { mean, RingBuffer } from "../utils/mathUtils";
import { signOkx } from "../utils/signing";
import { isRecord, toNumber } from "../stream/okxMessages";

export interface IOkxRestOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Adds x-simulated-trading: 1 (demo trading account). */
  simulated: boolean;
  latencyWindow: number;
  tdMode: "cross" | "isolated" | "cash";
  adapter?: AxiosAdapter;
}

const DEFAULT_OPTIONS: IOkxRestOptions = {
  baseUrl: OKX_REST_URL,
  timeoutMs: 10_000,
  simulated: true,
  latencyWindow: 100,
  tdMode: "cross",
};

function str(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/**
 * OKX v5 REST execution client. Every request is signed; the round-trip
 * time of each request feeds a rolling latency window.
 */
export class OkxRestClient implements IExecutionClient {
  private http: AxiosInstance;
  private options: IOkxRestOptions;
  private latencies: RingBuffer<number>;

  constructor(
    private credentials: IStreamCredentials,
    options: Partial<IOkxRestOptions> = {},
    private clock: () => number = Date.now
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.latencies = new RingBuffer(this.options.latencyWindow);
    this.http = axios.create({
      baseURL: this.options.baseUrl,
      timeout: this.options.timeoutMs,
      headers: { "Content-Type": "application/json" },
      adapter: this.options.adapter,
    });
  }

  private authHeaders(method: string, path: string, body: string): Record<string, string> {
    const timestamp = new Date(this.clock()).toISOString();
    const headers: Record<string, string> = {
      "OK-ACCESS-KEY": this.credentials.apiKey,
      "OK-ACCESS-SIGN": signOkx(this.credentials.secretKey, timestamp, method, path, body),
      "OK-ACCESS-TIMESTAMP": timestamp,
      "OK-ACCESS-PASSPHRASE": this.credentials.passphrase,
    };
    if (this.options.simulated) headers["x-simulated-trading"] = "1";
    return headers;
  }

  /** Returns the `data` array of a successful OKX response. */
  private async request(method: "GET" | "POST", path: string, body?: unknown): Promise<unknown[]> {
    const bodyText = body === undefined ? "" : JSON.stringify(body);
    const started = this.clock();
    try {
      const resp = await this.http.request<unknown>({
        method,
        url: path,
        data: bodyText || undefined,
        headers: this.authHeaders(method, path, bodyText),
      });
      const payload = resp.data;
      if (!isRecord(payload)) {
        throw new ExchangeRequestError("Malformed response", path);
      }
      const code = str(payload.code);
      if (code !== "0") {
        throw new ExchangeRequestError(`OKX error ${code}: ${str(payload.msg)}`, path, code);
      }
      return Array.isArray(payload.data) ? payload.data : [];
    } catch (err) {
      if (err instanceof ExchangeRequestError) throw err;
      throw new ExchangeRequestError(`${method} ${path} failed: ${errorMessage(err)}`, path);
    } finally {
      this.latencies.push(this.clock() - started);
    }
  }

  async placeOrder(order: IOrderRequest): Promise<PlaceOrderResult> {
    const body: Record<string, string> = {
      instId: order.instrument,
      tdMode: this.options.tdMode,
      side: order.side,
      ordType: order.type,
      sz: String(order.size),
    };
    if (order.price !== undefined && order.type !== "market") body.px = String(order.price);
    if (order.clientOrderId) body.clOrdId = order.clientOrderId;

    try {
      const [result] = await this.request("POST", "/api/v5/trade/order", body);
      if (!isRecord(result)) return { ok: false, error: "Empty order response" };
      const sCode = str(result.sCode);
      if (sCode !== "0") {
        return { ok: false, error: `Order rejected (sCode=${sCode}): ${str(result.sMsg)}` };
      }
      const orderId = str(result.ordId);
      logger.info(`[OKX] Order ${orderId}: ${order.side} ${order.size} ${order.instrument} ${order.type}${body.px ? ` @ ${body.px}` : ""}`);
      return { ok: true, orderId };
    } catch (err) {
      logger.error(`[OKX] placeOrder failed for ${order.instrument}`, err);
      return { ok: false, error: errorMessage(err) };
    }
  }

  async cancelAll(instrument: string): Promise<number> {
    const pending = await this.request(
      "GET",
      `/api/v5/trade/orders-pending?instId=${encodeURIComponent(instrument)}`
    );
    const orderIds = pending.filter(isRecord).map((o) => str(o.ordId)).filter(Boolean);

    let cancelled = 0;
    for (let i = 0; i < orderIds.length; i += OKX_CANCEL_BATCH_LIMIT) {
      const batch = orderIds
        .slice(i, i + OKX_CANCEL_BATCH_LIMIT)
        .map((ordId) => ({ instId: instrument, ordId }));
      const results = await this.request("POST", "/api/v5/trade/cancel-batch-orders", batch);
      cancelled += results.filter((r) => isRecord(r) && str(r.sCode) === "0").length;
    }
    return cancelled;
  }

  async getBalance(): Promise<IBalance> {
    const [account] = await this.request("GET", "/api/v5/account/balance");
    if (!isRecord(account)) return { total: 0, available: 0 };

    const total = toNumber(account.totalEq) ?? 0;
    let available = total;
    if (Array.isArray(account.details)) {
      const usdt = account.details.find((d) => isRecord(d) && d.ccy === "USDT");
      if (isRecord(usdt)) {
        available = toNumber(usdt.availBal) ?? toNumber(usdt.availEq) ?? total;
      }
    }
    return { total, available };
  }

  async getPositions(): Promise<IPosition[]> {
    const rows = await this.request("GET", "/api/v5/account/positions");
    const positions: IPosition[] = [];
    for (const row of rows) {
      if (!isRecord(row) || typeof row.instId !== "string") continue;
      const size = toNumber(row.pos) ?? 0;
      if (size === 0) continue;
      const posSide = row.posSide === "long" || row.posSide === "short" ? row.posSide : "net";
      positions.push({
        instrument: row.instId,
        side: posSide,
        size,
        avgPrice: toNumber(row.avgPx) ?? 0,
        markPrice: toNumber(row.markPx) ?? 0,
        notional: toNumber(row.notionalUsd) ?? 0,
        unrealizedPnl: toNumber(row.upl) ?? 0,
      });
    }
    return positions;
  }

  getAvgLatencyMs(): number {
    return mean(this.latencies.toArray());
  }
}
