import type { CancelResult, PositionLedger, PriceFeed } from '../contracts';
import type { ExecutionService, CloseSubmission, FillEvent } from '../adapters/execution-service';
import type { PositionBook } from '../core/position-book';
import type { CloseCommand, PositionMachine, Transition } from '../core/position';
import type { RiskConfigHolder } from '../config/risk-config';
import { getEventBus, type EventBus } from './events/bus';
import type { AlertEvent } from './events/types';
import { FeedUnavailable, errorMessage, normalizeErrorCode } from './errors';
import { log } from '../utils/logger';

export interface MonitorDeps {
  book: PositionBook;
  execution: ExecutionService;
  feed: PriceFeed;
  ledger: PositionLedger;
  config: RiskConfigHolder;
  intervalMs: number;
  bus?: EventBus;
  now?: () => number;
}

export interface MonitorHealth {
  running: boolean;
  paused: boolean;
  ticks: number;
  lastTickAt?: number;
  lastTickDurationMs: number;
  tickErrors: number;
  positionErrors: number;
  consecutiveErrors: number;
  feedMisses: number;
  openPositions: number;
  pendingCloseRetries: number;
  healthy: boolean;
}

export type ForceCloseResult = 'ok' | 'not_found';

const UNHEALTHY_AFTER_ERRORS = 3;

interface TickStats {
  ticks: number;
  lastTickAt?: number;
  lastTickDurationMs: number;
  tickErrors: number;
  positionErrors: number;
  consecutiveErrors: number;
  feedMisses: number;
}

/**
 * Periodic supervisor of the position book. Ticks, manual closes, admissions
 * and config reloads all pass through `runExclusive`, so no two of them ever
 * touch the book at the same time.
 */
export class MonitoringLoop {
  private queue: Promise<void> = Promise.resolve();
  private timer?: NodeJS.Timeout;
  private running = false;
  private paused = false;
  private readonly now: () => number;
  private readonly cancelRetry = new Set<string>();
  private stats: TickStats = { ticks: 0, lastTickDurationMs: 0, tickErrors: 0, positionErrors: 0, consecutiveErrors: 0, feedMisses: 0 };

  constructor(private readonly deps: MonitorDeps) {
    this.now = deps.now ?? Date.now;
  }

  private get bus(): EventBus { return this.deps.bus ?? getEventBus(); }

  /** Runs `fn` after everything queued before it. Its rejection reaches the caller only. */
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  /** One full monitoring pass. */
  runOnce(): Promise<void> {
    return this.runExclusive(() => this.tick());
  }

  start() {
    if (this.running) return;
    this.running = true;
    log('INFO', 'MONITOR', 'started', { intervalMs: this.deps.intervalMs });
    this.schedule(0);
  }

  pause() { this.paused = true; }
  resume() { this.paused = false; }

  /**
   * Stops scheduling, waits for the tick in progress, then gives every
   * pending close one more delivery attempt.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) { clearTimeout(this.timer); this.timer = undefined; }
    await this.runExclusive(() => this.drain());
    log('INFO', 'MONITOR', 'stopped', { pendingCloseRetries: this.deps.execution.pendingRetries().length });
  }

  private schedule(delayMs: number) {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.loop();
    }, delayMs);
  }

  private async loop() {
    if (!this.running) return;
    if (!this.paused) {
      try {
        await this.runOnce();
      } catch (e) {
        this.stats.tickErrors++;
        this.stats.consecutiveErrors++;
        log('ERROR', 'MONITOR', 'tick failed', { code: normalizeErrorCode(e), message: errorMessage(e) });
      }
    }
    if (this.running) this.schedule(this.deps.intervalMs);
  }

  private async tick() {
    const started = this.now();
    const cfg = this.deps.config.current;
    const { book, execution } = this.deps;

    for (const sub of await execution.retryPendingCloses()) await this.onCloseSubmission(sub);

    for (const ev of await execution.pollOutstanding()) await this.settle(ev);

    for (const m of book.all()) {
      if (m.status !== 'PENDING_ENTRY') continue;
      if (this.cancelRetry.has(m.id) && m.entryOrderId) {
        await this.cancelEntry(m, m.entryOrderId);
        continue;
      }
      await this.apply(m, m.onEntryTimeout(this.now(), cfg));
    }

    const live = book.all().filter(m => m.isLive);
    const prices = await this.fetchPrices([...new Set(live.map(m => m.symbol))]);
    for (const m of live) {
      const price = prices.get(m.symbol);
      if (price == null || !m.isLive) continue;
      try {
        await this.apply(m, m.onTick(price, this.now(), cfg));
      } catch (e) {
        this.stats.positionErrors++;
        log('ERROR', 'MONITOR', 'position update failed', { positionId: m.id, symbol: m.symbol, message: errorMessage(e) });
        this.bus.publish({ type: 'EVENT/ERROR', ts: this.now(), code: normalizeErrorCode(e), symbol: m.symbol, positionId: m.id, cause: { code: normalizeErrorCode(e), message: errorMessage(e) } });
      }
    }

    this.sweep();
    this.stats.ticks++;
    this.stats.lastTickAt = started;
    this.stats.lastTickDurationMs = this.now() - started;
    this.stats.consecutiveErrors = 0;
  }

  /** One price per symbol; a symbol without one is skipped this tick. */
  private async fetchPrices(symbols: string[]): Promise<Map<string, number>> {
    const out = new Map<string, number>();
    for (const symbol of symbols) {
      try {
        const p = await this.deps.feed.latestPrice(symbol);
        if (p == null || !(p > 0)) throw new FeedUnavailable(symbol);
        out.set(symbol, p);
      } catch (e) {
        this.stats.feedMisses++;
        log('WARN', 'FEED', 'no price; skipping symbol this tick', { symbol, message: errorMessage(e) });
      }
    }
    return out;
  }

  private async drain() {
    const { execution } = this.deps;
    for (const sub of await execution.retryPendingCloses()) await this.onCloseSubmission(sub);
    for (const ev of await execution.pollOutstanding()) await this.settle(ev);
    this.sweep();
  }

  /**
   * Publishes a transition's notices, then issues its commands. Closes are
   * queued first so the published snapshot already lists them as undelivered.
   */
  async apply(m: PositionMachine, t: Transition): Promise<void> {
    if (!t.notices.length && !t.commands.length) return;
    for (const cmd of t.commands) {
      if (cmd.kind === 'CLOSE') this.deps.execution.queueClose(cmd);
    }
    this.publishNotices(m, t);
    for (const cmd of t.commands) {
      if (cmd.kind === 'CLOSE') {
        await this.onCloseSubmission(await this.deps.execution.submitClose(cmd));
      } else {
        await this.cancelEntry(m, cmd.orderId);
      }
    }
  }

  private async cancelEntry(m: PositionMachine, orderId: string) {
    let result: CancelResult;
    try {
      result = await this.deps.execution.cancelEntry(orderId);
    } catch (e) {
      this.cancelRetry.add(m.id);
      log('WARN', 'EXEC', 'entry cancel failed; retrying next tick', { positionId: m.id, orderId, message: errorMessage(e) });
      return;
    }
    this.cancelRetry.delete(m.id);
    // already_final: the fill (or reject) arrives with the next poll
    if (result === 'ack') await this.apply(m, m.onEntryRejected(this.now()));
  }

  private publishNotices(m: PositionMachine, t: Transition) {
    const { ledger } = this.deps;
    const ts = this.now();
    const base = { ts, symbol: m.symbol, positionId: m.id };
    for (const n of t.notices) {
      switch (n.kind) {
        case 'OPENED':
          ledger.onPositionOpened(this.snapshot(m));
          break;
        case 'ENTRY_DOWNSIZED':
          log('WARN', 'POSITION', 'entry partially filled; position downsized', { positionId: m.id, requested: n.requested, filled: n.filled });
          break;
        case 'PARTIAL_CLOSE':
          ledger.onPartialClose(this.snapshot(m), n.fraction, `TARGET_${n.targetIndex + 1}`);
          break;
        case 'PROFIT_TAKEN':
          ledger.onPartialClose(this.snapshot(m), n.fraction, 'PARTIAL_PROFIT');
          break;
        case 'STOP_MOVED':
          this.bus.publish({ type: 'POSITION_STOP_MOVED', ...base, from: n.from, to: n.to, stopKind: n.stopKind });
          break;
        case 'TRAILING_ACTIVATED':
          this.bus.publish({ type: 'POSITION_TRAILING_ACTIVATED', ...base, trailDistance: n.trailDistance });
          break;
        case 'BREAKEVEN_APPLIED':
          this.bus.publish({ type: 'POSITION_BREAKEVEN', ...base });
          break;
        case 'CLOSED':
          ledger.onPositionClosed(n.outcome);
          break;
        case 'FILL_RECONCILED':
          this.bus.publish({ type: 'FILL_RECONCILED', ...base, clientOrderId: n.intentId, provisionalPrice: n.provisionalPrice, fillPrice: n.fillPrice, pnlAdjustment: n.pnlAdjustment, outcome: n.outcome });
          break;
        case 'CLOSE_REVERSED':
          log('WARN', 'POSITION', 'target close rejected; quantity restored', { positionId: m.id, intentId: n.intentId, quantity: n.quantity });
          break;
      }
    }
    // closed positions too: the store keeps them until their closes are final
    this.bus.publish({ type: 'POSITION_UPDATED', ...base, position: this.snapshot(m) });
  }

  private async onCloseSubmission(sub: CloseSubmission) {
    const { intent } = sub;
    const m = this.deps.book.get(intent.positionId);
    if (sub.outcome === 'submitted') return;
    if (sub.outcome === 'retry_pending') {
      if (sub.firstExhaustion) {
        this.alert('ERROR', 'CLOSE_RETRY_EXHAUSTED', `close of ${intent.quantity} ${intent.symbol} not delivered after ${intent.attempts} attempts; retrying every tick`, intent.positionId, intent.symbol);
      }
      if (sub.limitReached) {
        this.alert('FATAL', 'CLOSE_RETRY_LIMIT', `close of ${intent.quantity} ${intent.symbol} still undelivered after ${intent.attempts} attempts`, intent.positionId, intent.symbol);
      }
      if (m) this.bus.publish({ type: 'POSITION_UPDATED', ts: this.now(), symbol: m.symbol, positionId: m.id, position: this.snapshot(m) });
      return;
    }
    await this.closeRejected(m, intent.close, sub.error.message);
  }

  private async closeRejected(m: PositionMachine | undefined, cmd: CloseCommand | undefined, reason: string) {
    if (!cmd) return;
    if (m && m.isLive && cmd.purpose !== 'EXIT') {
      await this.apply(m, m.onCloseRejected(cmd, this.now()));
      return;
    }
    this.alert('ERROR', 'CLOSE_REJECTED', `close of ${cmd.quantity} ${cmd.symbol} rejected (${reason}); exchange exposure may remain`, cmd.positionId, cmd.symbol);
  }

  /** Routes a fill or reject of a tracked order to its position. */
  async settle(ev: FillEvent): Promise<void> {
    const { intent } = ev;
    const m = this.deps.book.get(intent.positionId);
    if (!m) {
      log('WARN', 'EXEC', 'fill for untracked position', { positionId: intent.positionId, orderId: intent.orderId });
      return;
    }
    if (intent.kind === 'ENTRY') {
      await this.apply(m, ev.kind === 'filled' ? m.onEntryFill(ev.quantity, ev.price, this.now()) : m.onEntryRejected(this.now()));
      return;
    }
    if (!intent.close) return;
    if (ev.kind === 'filled') {
      await this.apply(m, m.onCloseFill(intent.close, ev.quantity, ev.price, this.now()));
      if (ev.quantity < intent.close.quantity) {
        log('WARN', 'EXEC', 'close filled short', { positionId: m.id, requested: intent.close.quantity, filled: ev.quantity });
      }
      return;
    }
    await this.closeRejected(m, intent.close, ev.reason);
  }

  /** Closes the live position on `symbol` at the current price. */
  forceClose(symbol: string): Promise<ForceCloseResult> {
    return this.runExclusive(async () => {
      const m = this.deps.book.findBySymbol(symbol);
      if (!m) return 'not_found';
      let price: number | undefined;
      try {
        price = await this.deps.feed.latestPrice(m.symbol);
      } catch (e) {
        log('WARN', 'FEED', 'no price for manual close; using last known', { symbol: m.symbol, message: errorMessage(e) });
      }
      await this.apply(m, m.forceClose(price, this.now()));
      this.sweep();
      return 'ok';
    });
  }

  /** Drops closed positions whose orders are all final. */
  sweep() {
    const { book, execution } = this.deps;
    for (const m of book.all()) {
      if (!m.isClosed || execution.hasOutstanding(m.id)) continue;
      book.remove(m.id);
      execution.forget(m.id);
      this.cancelRetry.delete(m.id);
      this.bus.publish({ type: 'POSITION_REMOVED', ts: this.now(), symbol: m.symbol, positionId: m.id });
    }
  }

  snapshot(m: PositionMachine) {
    const { execution } = this.deps;
    return m.snapshot(execution.isRetryPending(m.id), execution.undeliveredCloses(m.id));
  }

  private alert(severity: AlertEvent['severity'], code: AlertEvent['code'], message: string, positionId?: string, symbol?: string) {
    this.bus.publish({ type: 'ALERT', ts: this.now(), severity, code, message, positionId, symbol });
  }

  getHealth(): MonitorHealth {
    const openPositions = this.deps.book.all().filter(m => !m.isClosed).length;
    const lastTickAt = this.stats.lastTickAt;
    const stale = this.running && !this.paused && lastTickAt != null && this.now() - lastTickAt > this.deps.intervalMs * 5;
    return {
      running: this.running,
      paused: this.paused,
      ticks: this.stats.ticks,
      lastTickAt,
      lastTickDurationMs: this.stats.lastTickDurationMs,
      tickErrors: this.stats.tickErrors,
      positionErrors: this.stats.positionErrors,
      consecutiveErrors: this.stats.consecutiveErrors,
      feedMisses: this.stats.feedMisses,
      openPositions,
      pendingCloseRetries: this.deps.execution.pendingRetries().length,
      healthy: this.stats.consecutiveErrors < UNHEALTHY_AFTER_ERRORS && !stale,
    };
  }
}
