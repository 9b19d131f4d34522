import type {
  CorrelationPredicate,
  OrderGateway,
  PositionLedger,
  PositionRepository,
  PriceFeed,
} from '../contracts';
import type { AccountState, PositionSnapshot, RiskConfig, Signal, TradeOutcome } from '../types/domain';
import { openingSide } from '../types/domain';
import { buildRiskConfig, loadRiskConfig, RiskConfigHolder } from '../config/risk-config';
import { loadAppConfig } from '../utils/config';
import { validateSignal } from '../core/signal';
import { committedMargin, computePositionSize, deriveTargets, evaluateAdmission, type SizingPlan } from '../core/risk';
import { staticGroupCorrelation } from '../core/correlation';
import { PositionMachine } from '../core/position';
import { PositionBook } from '../core/position-book';
import { ExecutionService } from '../adapters/execution-service';
import { InMemoryPositionStore } from '../adapters/position-store';
import { MonitoringLoop, type ForceCloseResult, type MonitorHealth } from './monitor';
import { EventBusLedger, fanOutLedger } from './ledger';
import { getEventBus, type EventBus } from './events/bus';
import { registerLoggerSubscriber } from './events/subscribers/logger-subscriber';
import { registerPositionSubscriber, type PositionSubscription } from './events/subscribers/position-subscriber';
import { PerformanceTracker, registerStatsSubscriber, type PerformanceSnapshot } from './events/subscribers/stats-subscriber';
import { registerTradeLoggerSubscriber } from './events/subscribers/trade-logger-subscriber';
import { EngineError, SizingError, errorMessage, normalizeErrorCode } from './errors';
import { log } from '../utils/logger';

type AccountSource = AccountState | (() => AccountState | Promise<AccountState>);

export interface EngineOptions {
  gateway: OrderGateway;
  feed: PriceFeed;
  repository?: PositionRepository;
  /** told about opens, partial closes and closes besides the event bus */
  ledger?: PositionLedger;
  riskConfig?: Partial<RiskConfig>;
  account?: AccountSource;
  /** defaults to the static groups of the risk config */
  correlation?: CorrelationPredicate;
  bus?: EventBus;
  now?: () => number;
  loopIntervalMs?: number;
  retryAttempts?: number;
  retryBackoffMs?: number;
  closeRetryLimit?: number;
  /** write the JSONL trade log; on by default */
  tradeLog?: boolean;
}

export interface EngineHealth extends MonitorHealth {
  riskConfigRevision: number;
}

/**
 * Entry point of the position engine: admits signals, supervises the
 * resulting positions and answers queries about them.
 */
export class TradingEngine {
  readonly book = new PositionBook();
  private readonly holder: RiskConfigHolder;
  private readonly bus: EventBus;
  private readonly now: () => number;
  private readonly repository: PositionRepository;
  private readonly execution: ExecutionService;
  private readonly monitor: MonitoringLoop;
  private readonly tracker = new PerformanceTracker();
  private readonly store: PositionSubscription;
  private readonly offs: Array<() => void> = [];
  private readonly customCorrelation?: CorrelationPredicate;
  private correlation: CorrelationPredicate;

  constructor(private readonly opts: EngineOptions) {
    const app = loadAppConfig();
    this.bus = opts.bus ?? getEventBus();
    this.now = opts.now ?? Date.now;
    this.holder = new RiskConfigHolder(buildRiskConfig(opts.riskConfig));
    this.repository = opts.repository ?? new InMemoryPositionStore();
    this.customCorrelation = opts.correlation;
    this.correlation = opts.correlation ?? staticGroupCorrelation(this.holder.current.correlationGroups);
    this.execution = new ExecutionService(opts.gateway, {
      retryAttempts: opts.retryAttempts ?? app.retryAttempts,
      retryBackoffMs: opts.retryBackoffMs ?? app.retryBackoffMs,
      closeRetryLimit: opts.closeRetryLimit ?? app.closeRetryLimit,
      now: this.now,
      bus: this.bus,
    });
    const busLedger = new EventBusLedger(this.bus, this.now);
    this.monitor = new MonitoringLoop({
      book: this.book,
      execution: this.execution,
      feed: opts.feed,
      ledger: opts.ledger ? fanOutLedger(busLedger, opts.ledger) : busLedger,
      config: this.holder,
      intervalMs: opts.loopIntervalMs ?? app.loopIntervalMs,
      bus: this.bus,
      now: this.now,
    });
    this.store = registerPositionSubscriber(this.repository, this.bus);
    this.offs.push(
      this.store.unsubscribe,
      registerStatsSubscriber(this.tracker, this.bus),
      registerLoggerSubscriber(this.bus),
    );
    if (opts.tradeLog !== false) this.offs.push(registerTradeLoggerSubscriber(this.bus));
  }

  private async account(): Promise<AccountState> {
    const src = this.opts.account;
    if (src == null) return { equity: loadAppConfig().accountEquity };
    return typeof src === 'function' ? await src() : src;
  }

  private reject(symbol: string, err: EngineError): never {
    this.bus.publish({ type: 'SIGNAL_REJECTED', ts: this.now(), symbol, code: err.code, reason: err.message });
    throw err;
  }

  /**
   * Validates, sizes and admits a signal, then places its entry order.
   * Resolves with the position as it stands once the entry has been polled once.
   */
  async submitSignal(input: unknown): Promise<PositionSnapshot> {
    const validated = validateSignal(input);
    if (!validated.ok) {
      const symbol = typeof input === 'object' && input !== null && 'symbol' in input ? String(input.symbol) : '?';
      return this.reject(symbol, validated.error);
    }
    const signal = validated.value;
    return this.monitor.runExclusive(() => this.admit(signal));
  }

  private async admit(signal: Signal): Promise<PositionSnapshot> {
    const cfg = this.holder.current;
    const account = await this.account();
    const live = this.book.exposures();
    // without a reported figure, free margin is equity less what open positions hold
    const availableMargin = account.availableMargin ?? Math.max(0, account.equity - committedMargin(live));
    let plan: SizingPlan;
    try {
      plan = computePositionSize(signal, cfg, { ...account, availableMargin });
    } catch (e) {
      if (e instanceof SizingError) return this.reject(signal.symbol, e);
      throw e;
    }
    const admission = evaluateAdmission({ symbol: signal.symbol, riskAmount: plan.riskAmount }, live, cfg, account.equity, this.correlation);
    if (!admission.ok) return this.reject(signal.symbol, admission.error);

    const now = this.now();
    const m = PositionMachine.create(signal, plan, deriveTargets(signal, cfg), now);
    this.book.add(m);
    log('INFO', 'RISK', 'signal admitted', { positionId: m.id, quantity: plan.quantity, leverage: plan.leverage, riskAmount: plan.riskAmount, margin: plan.margin, availableMargin, marginCapped: plan.marginCapped });

    let orderId: string | undefined;
    try {
      const intent = await this.execution.submitEntry(m.id, {
        symbol: m.symbol,
        direction: m.direction,
        side: openingSide(m.direction),
        quantity: plan.quantity,
        price: plan.entryPrice,
        leverage: plan.leverage,
        clientOrderId: `${m.id}#entry`,
      });
      orderId = intent.orderId;
    } catch (e) {
      await this.monitor.apply(m, m.onEntryRejected(this.now()));
      this.monitor.sweep();
      throw e;
    }
    if (orderId) {
      m.onEntryPlaced(orderId, this.now());
      this.publishUpdated(m);
      const fill = await this.execution.pollOrder(orderId);
      if (fill) await this.monitor.settle(fill);
    }
    this.monitor.sweep();
    return this.monitor.snapshot(m);
  }

  private publishUpdated(m: PositionMachine) {
    this.bus.publish({ type: 'POSITION_UPDATED', ts: this.now(), symbol: m.symbol, positionId: m.id, position: this.monitor.snapshot(m) });
  }

  /** Every position not yet closed, oldest first. */
  listOpenPositions(): PositionSnapshot[] {
    return this.book.all()
      .filter(m => !m.isClosed)
      .sort((a, b) => a.createdAt - b.createdAt)
      .map(m => this.monitor.snapshot(m));
  }

  forceClose(symbol: string): Promise<ForceCloseResult> {
    return this.monitor.forceClose(symbol);
  }

  getRiskConfig(): Readonly<RiskConfig> {
    return this.holder.current;
  }

  /**
   * Replaces the risk config between ticks. Without overrides it is re-read
   * from the environment. Live positions keep their stops and trail distance.
   */
  reloadRiskConfig(overrides?: Partial<RiskConfig>): Promise<Readonly<RiskConfig>> {
    return this.monitor.runExclusive(() => {
      const next = overrides ? buildRiskConfig({ ...this.holder.current, ...overrides }) : loadRiskConfig();
      this.holder.swap(next);
      if (!this.customCorrelation) this.correlation = staticGroupCorrelation(next.correlationGroups);
      this.bus.publish({ type: 'RISK_CONFIG_RELOADED', ts: this.now(), revision: this.holder.revision });
      return next;
    });
  }

  /**
   * Loads persisted positions into the book: open ones, and closed ones
   * whose close orders never reached the exchange. Those closes are re-sent
   * on the next tick. Resolves with how many positions were added.
   */
  rehydrate(): Promise<number> {
    return this.monitor.runExclusive(async () => {
      const records = await this.repository.loadOpen();
      let added = 0;
      for (const r of records) {
        if (this.book.get(r.id) || (r.status !== 'CLOSED' && this.book.findBySymbol(r.symbol))) {
          log('WARN', 'STORE', 'skipped persisted position already tracked', { positionId: r.id, symbol: r.symbol });
          continue;
        }
        const m = PositionMachine.fromRecord(r);
        this.book.add(m);
        if (r.status === 'PENDING_ENTRY' && r.entryOrderId) {
          this.execution.adoptEntry(r.id, { symbol: r.symbol, side: openingSide(r.direction), quantity: r.requestedQuantity, orderId: r.entryOrderId, createdAt: r.createdAt });
        }
        for (const p of r.pendingCloses ?? []) this.execution.adoptClose(r.id, r.symbol, p);
        added++;
      }
      const closes = records.reduce((n, r) => n + (r.pendingCloses?.length ?? 0), 0);
      log('INFO', 'STORE', 'rehydrated positions', { count: added, pendingCloses: closes });
      return added;
    });
  }

  /** One monitoring pass, outside the timer. */
  tick(): Promise<void> {
    return this.monitor.runOnce();
  }

  start() {
    this.monitor.start();
  }

  async stop(): Promise<void> {
    await this.monitor.stop();
    await this.bus.flush();
    await this.store.drain();
  }

  pause() { this.monitor.pause(); }
  resume() { this.monitor.resume(); }

  getPerformance(): PerformanceSnapshot {
    return this.tracker.snapshot();
  }

  getHealth(): EngineHealth {
    return { ...this.monitor.getHealth(), riskConfigRevision: this.holder.revision };
  }

  getHistory(limit?: number): Promise<TradeOutcome[]> {
    return this.repository.listHistory(limit);
  }

  /** Waits for event delivery and persistence to catch up. */
  async settle(): Promise<void> {
    await this.bus.flush();
    await this.store.drain();
  }

  dispose() {
    for (const off of this.offs.splice(0)) {
      try { off(); } catch (e) { log('WARN', 'ENGINE', 'unsubscribe failed', { code: normalizeErrorCode(e), message: errorMessage(e) }); }
    }
  }
}
