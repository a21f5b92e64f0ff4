import cron from "node-cron";
import { IAppConfig } from "../config/environment";
import { connectToDatabase, disconnectFromDatabase } from "../config/mongoose";
import { OkxRestClient } from "../exchange/OkxRestClient";
import { PaperExecutionClient } from "../exchange/PaperExecutionClient";
import { InstrumentRegistry, IInstrumentState } from "../orderbook/InstrumentRegistry";
import { MongoStorageSink, NullStorageSink } from "../storage/MongoStorageSink";
import { StrategyEngine } from "../strategies/StrategyEngine";
import { parseBookData, parseOrderUpdate, parseTrade } from "../stream/okxMessages";
import { StreamClient } from "../stream/StreamClient";
import { wsTransportFactory } from "../stream/WsTransport";
import { IExecutionClient, IExecutionOutcome, IStorageSink } from "../types/exchange.types";
import { IBookSummary } from "../types/orderbook.types";
import { IKillSwitchStatus, IRiskSummary } from "../types/risk.types";
import { ISignal, ITacticContext, ITacticStats, TacticKind } from "../types/strategy.types";
import { IChannelArg, IStreamMessage, TransportFactory } from "../types/stream.types";
import { logger } from "../utils/logger";
import { ExecutionEngine } from "./ExecutionEngine";
import { RiskCircuitBreaker } from "./RiskCircuitBreaker";
import { RiskManager } from "./RiskManager";

export interface IOrchestratorDeps {
  client?: IExecutionClient;
  transportFactory?: TransportFactory;
  sink?: IStorageSink;
  clock?: () => number;
  /** Cron jobs for account sync and the daily reset. */
  scheduleJobs?: boolean;
}

export interface IOrchestratorStatus {
  stream: ReturnType<StreamClient["getStats"]>;
  privateStream: ReturnType<StreamClient["getStats"]> | null;
  books: IBookSummary[];
  strategies: Record<TacticKind, ITacticStats>;
  risk: IRiskSummary;
  killSwitch: IKillSwitchStatus;
  execution: ReturnType<ExecutionEngine["getStats"]>;
}

/**
 * Wires the stream, per-instrument books, tactics, risk and execution
 * together, and owns the periodic account sync.
 */
export class Orchestrator {
  readonly registry: InstrumentRegistry;
  readonly stream: StreamClient;
  /** Authenticated connection for the orders channel; null without credentials. */
  readonly privateStream: StreamClient | null;
  readonly strategies: StrategyEngine;
  readonly risk: RiskManager;
  readonly killSwitch: RiskCircuitBreaker;
  readonly execution: ExecutionEngine;
  private client: IExecutionClient;
  private sink: IStorageSink;
  private clock: () => number;
  private isPrivate: boolean;
  private scheduleJobs: boolean;
  private cronJobs: ReturnType<typeof cron.schedule>[] = [];
  private listening: Promise<void>[] = [];
  private syncing: Promise<void> | null = null;
  private resyncPending: Set<string> = new Set();
  private usingDatabase = false;

  constructor(private config: IAppConfig, deps: IOrchestratorDeps = {}) {
    this.clock = deps.clock ?? Date.now;
    this.scheduleJobs = deps.scheduleJobs ?? true;
    this.isPrivate = config.credentials !== undefined;

    this.registry = new InstrumentRegistry({
      tapeCapacity: config.orderBook.tapeCapacity,
      features: config.features,
      clock: this.clock,
    });
    for (const instrument of config.instruments) {
      this.registry.getOrCreate(instrument);
    }

    this.client = deps.client ?? this.createClient();
    this.sink = deps.sink ?? new NullStorageSink();
    this.usingDatabase = deps.sink === undefined && config.mongoUri !== undefined;

    this.killSwitch = new RiskCircuitBreaker(
      this.client,
      () => this.registry.instruments(),
      config.killSwitch,
      this.clock
    );
    this.risk = new RiskManager(config.risk, this.killSwitch);
    this.strategies = new StrategyEngine(this.killSwitch, {
      enabled: config.tactics.enabled,
      frontRunning: config.tactics.frontRunning,
      wallRiding: config.tactics.wallRiding,
      spreadCapturing: config.tactics.spreadCapturing,
    });
    this.execution = new ExecutionEngine(this.client, (o) => this.handleOutcome(o), this.clock);
    const transportFactory = deps.transportFactory ?? wsTransportFactory;
    this.stream = new StreamClient(transportFactory, config.stream, undefined, this.clock);
    this.privateStream = config.credentials
      ? new StreamClient(transportFactory, config.stream, config.credentials, this.clock)
      : null;
  }

  private createClient(): IExecutionClient {
    const creds = this.config.credentials;
    if (creds) {
      return new OkxRestClient(creds, {
        baseUrl: this.config.restUrl,
        timeoutMs: this.config.restTimeoutMs,
        simulated: this.config.mode === "paper",
      });
    }
    logger.warning("[Orchestrator] No API credentials, using the in-memory paper account");
    return new PaperExecutionClient(
      this.config.paperStartingBalance,
      (instrument) => this.registry.get(instrument)?.book.midPrice() ?? 0,
      this.clock
    );
  }

  async start(): Promise<void> {
    // 1. Archive
    if (this.usingDatabase && this.config.mongoUri) {
      await connectToDatabase(this.config.mongoUri);
      this.sink = new MongoStorageSink();
    }

    // 2. Risk monitor and first account snapshot
    await this.killSwitch.start();
    await this.syncAccount();

    // 3. Market data
    this.stream.on("orderbook", (msg) => this.handleBook(msg));
    this.stream.on("trades", (msg) => this.handleTrades(msg));
    await this.stream.connect(false);
    this.stream.subscribe(this.channelArgs());
    this.listening.push(this.watch(this.stream, "public"));

    if (this.privateStream) {
      this.privateStream.on("orders", (msg) => this.handleOrders(msg));
      await this.privateStream.connect(true);
      this.privateStream.subscribe([{ channel: "orders", instType: "SWAP" }]);
      this.listening.push(this.watch(this.privateStream, "private"));
    }

    // 4. Periodic jobs
    if (this.scheduleJobs) this.scheduleCronJobs();

    logger.success(
      `Orchestrator started | ${this.config.mode} | ${this.config.instruments.join(", ")} | fills via ${this.isPrivate ? "orders channel" : "execution results"}`
    );
  }

  private channelArgs(): IChannelArg[] {
    const args: IChannelArg[] = [];
    for (const instId of this.config.instruments) {
      args.push({ channel: this.config.stream.bookChannel, instId });
      args.push({ channel: this.config.stream.tradeChannel, instId });
    }
    return args;
  }

  private watch(stream: StreamClient, label: string): Promise<void> {
    return stream.listen().then(() => logger.info(`[Orchestrator] ${label} stream closed`));
  }

  private scheduleCronJobs(): void {
    this.cronJobs.push(
      cron.schedule(this.config.syncSchedule, () => {
        this.syncAccount().catch((err) => logger.error("[Orchestrator] Sync job failed", err));
      })
    );
    this.cronJobs.push(cron.schedule(this.config.dailyResetSchedule, () => this.resetDaily()));
    logger.info("Cron jobs scheduled");
  }

  // ==================== MARKET DATA ====================

  handleBook(msg: IStreamMessage): void {
    const state = this.registry.get(msg.instId);
    if (!state) return;
    const { book } = state;

    for (const raw of msg.data) {
      const data = parseBookData(raw);
      if (!data) {
        logger.warning(`[Orchestrator] Malformed book payload for ${msg.instId}`);
        continue;
      }
      const checksum = this.config.orderBook.validateChecksum ? data.checksum : undefined;
      const result =
        msg.action === "update"
          ? book.applyDelta(data.bids, data.asks, checksum, data.seqId)
          : book.applySnapshot(data.bids, data.asks, checksum, data.seqId);

      if (result.ok && msg.action !== "update") {
        this.resyncPending.delete(msg.instId);
      } else if (!result.ok && this.config.orderBook.autoResyncOnChecksumMismatch) {
        this.requestResync(msg.instId);
      }

      const ts = data.ts || this.clock();
      this.sink.recordLevels(msg.instId, "bid", book.getBids(5), ts);
      this.sink.recordLevels(msg.instId, "ask", book.getAsks(5), ts);

      state.features.update();
      if (!book.isConsistent()) {
        logger.debug(`[Orchestrator] ${msg.instId} book not trusted, skipping tactics`);
        continue;
      }
      this.processSignals(this.strategies.onOrderBook(this.context(state)));
    }
  }

  handleTrades(msg: IStreamMessage): void {
    for (const raw of msg.data) {
      const parsed = parseTrade(raw, msg.instId);
      if (!parsed) continue;
      const state = this.registry.get(parsed.instrument);
      if (!state) continue;

      const trade = state.tape.append(parsed);
      this.sink.recordTrade(trade);
      if (!state.book.isConsistent()) continue;
      this.processSignals(this.strategies.onTrade(this.context(state), trade));
    }
  }

  handleOrders(msg: IStreamMessage): void {
    for (const raw of msg.data) {
      const update = parseOrderUpdate(raw);
      if (!update || update.state !== "filled") continue;
      const result = this.risk.postTradeCheck({ realizedPnl: update.fillPnl });
      logger.info(
        `[Orchestrator] Fill ${update.orderId} ${update.side} ${update.instrument} | trades=${result.totalTrades}`
      );
    }
  }

  private context(state: IInstrumentState): ITacticContext {
    return {
      instrument: state.instrument,
      book: state.book,
      features: state.features.snapshot(),
      now: this.clock(),
    };
  }

  private requestResync(instrument: string): void {
    if (this.resyncPending.has(instrument)) return;
    this.resyncPending.add(instrument);
    logger.warning(`[Orchestrator] Resubscribing ${instrument} for a fresh snapshot`);
    this.stream.resubscribe([{ channel: this.config.stream.bookChannel, instId: instrument }]);
  }

  // ==================== SIGNALS ====================

  private processSignals(signals: ISignal[]): void {
    for (const signal of signals) {
      const check = this.risk.preTradeCheck(signal);
      if (!check.approved) {
        logger.info(`[Risk] Rejected ${signal.strategy} ${signal.action} ${signal.instrument}: ${check.reason}`);
        this.sink.recordSignal(signal, "rejected");
        continue;
      }
      this.execution.enqueue(signal);
    }
  }

  private handleOutcome(outcome: IExecutionOutcome): void {
    // With credentials, fills arrive on the orders channel instead
    if (!this.isPrivate && outcome.fills > 0) {
      this.risk.postTradeCheck({ realizedPnl: outcome.realizedPnl });
    }
    if (!outcome.executed) {
      this.sink.recordSignal(outcome.signal, "failed");
      return;
    }
    this.strategies.markExecuted(outcome.signal);
    this.sink.recordSignal(outcome.signal, "executed");
  }

  // ==================== PERIODIC ====================

  /** Balance and positions into the risk manager, then flush the archive. */
  syncAccount(): Promise<void> {
    if (!this.syncing) {
      this.syncing = this.runSync().finally(() => {
        this.syncing = null;
      });
    }
    return this.syncing;
  }

  private async runSync(): Promise<void> {
    try {
      const [balance, positions] = await Promise.all([
        this.client.getBalance(),
        this.client.getPositions(),
      ]);
      this.risk.updateMetrics(balance, positions);
      this.risk.checkEmergencyStop();
    } catch (err) {
      logger.error("[Orchestrator] Account sync failed", err);
    }
    await this.sink.flush();
  }

  resetDaily(): void {
    this.risk.resetDaily();
    this.killSwitch.rollDay();
  }

  getStatus(): IOrchestratorStatus {
    return {
      stream: this.stream.getStats(),
      privateStream: this.privateStream ? this.privateStream.getStats() : null,
      books: this.registry.instruments().flatMap((i) => {
        const state = this.registry.get(i);
        return state ? [state.book.summary()] : [];
      }),
      strategies: this.strategies.getStats(),
      risk: this.risk.getRiskSummary(),
      killSwitch: this.killSwitch.getStatus(),
      execution: this.execution.getStats(),
    };
  }

  async shutdown(): Promise<void> {
    logger.info("Orchestrator shutting down...");

    for (const job of this.cronJobs) {
      job.stop();
    }
    this.cronJobs = [];

    this.stream.close();
    this.privateStream?.close();
    await Promise.all(this.listening);
    this.listening = [];
    await this.killSwitch.stop();
    await this.execution.stop();
    await this.sink.close();
    if (this.usingDatabase) await disconnectFromDatabase();

    logger.info("Orchestrator shut down complete");
  }
}
