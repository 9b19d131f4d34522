import { getEventBus, type EventBus } from '../bus';
import type { ExitReason, TradeOutcome } from '../../../types/domain';
import { log } from '../../../utils/logger';

export interface PerformanceSnapshot {
  totalTrades: number;
  wins: number;
  losses: number;
  winRate: number;
  totalPnl: number;
  avgPnl: number;
  avgWin: number;
  avgLoss: number;
  /** gross profit over gross loss; Infinity with no losing trade */
  profitFactor: number;
  bestTrade: number;
  worstTrade: number;
  avgDurationMs: number;
  consecLosses: number;
  entryFailures: number;
  partialCloses: number;
  breakevenActivations: number;
  trailingActivations: number;
  exitsByReason: Partial<Record<ExitReason, number>>;
}

/** Running trade statistics. Failed entries are counted apart from trades. */
export class PerformanceTracker {
  private byPosition = new Map<string, number>();
  private durations = 0;
  private consecLosses = 0;
  private entryFailures = 0;
  private partialCloses = 0;
  private breakevenActivations = 0;
  private trailingActivations = 0;
  private exits: Partial<Record<ExitReason, number>> = {};

  recordOutcome(o: TradeOutcome) {
    this.exits[o.exitReason] = (this.exits[o.exitReason] ?? 0) + 1;
    if (o.exitReason === 'ENTRY_FAILED') { this.entryFailures++; return; }
    this.byPosition.set(o.positionId, o.realizedPnl);
    this.durations += o.durationMs;
    this.consecLosses = o.realizedPnl < 0 ? this.consecLosses + 1 : 0;
  }
  /** Replaces the PnL of a trade already recorded. */
  amendOutcome(o: TradeOutcome) {
    if (this.byPosition.has(o.positionId)) this.byPosition.set(o.positionId, o.realizedPnl);
  }
  notePartialClose() { this.partialCloses++; }
  noteBreakeven() { this.breakevenActivations++; }
  noteTrailing() { this.trailingActivations++; }

  private get pnls(): number[] { return [...this.byPosition.values()]; }

  snapshot(): PerformanceSnapshot {
    const wins = this.pnls.filter(p => p > 0);
    const losses = this.pnls.filter(p => p < 0);
    const sum = (xs: number[]) => xs.reduce((a, b) => a + b, 0);
    const n = this.pnls.length;
    const grossWin = sum(wins);
    const grossLoss = -sum(losses);
    return {
      totalTrades: n,
      wins: wins.length,
      losses: losses.length,
      winRate: n ? wins.length / n : 0,
      totalPnl: sum(this.pnls),
      avgPnl: n ? sum(this.pnls) / n : 0,
      avgWin: wins.length ? grossWin / wins.length : 0,
      avgLoss: losses.length ? -grossLoss / losses.length : 0,
      profitFactor: grossLoss > 0 ? grossWin / grossLoss : grossWin > 0 ? Infinity : 0,
      bestTrade: n ? Math.max(...this.pnls) : 0,
      worstTrade: n ? Math.min(...this.pnls) : 0,
      avgDurationMs: n ? this.durations / n : 0,
      consecLosses: this.consecLosses,
      entryFailures: this.entryFailures,
      partialCloses: this.partialCloses,
      breakevenActivations: this.breakevenActivations,
      trailingActivations: this.trailingActivations,
      exitsByReason: { ...this.exits },
    };
  }

  reset() {
    this.byPosition.clear();
    this.durations = 0;
    this.consecLosses = 0;
    this.entryFailures = 0;
    this.partialCloses = 0;
    this.breakevenActivations = 0;
    this.trailingActivations = 0;
    this.exits = {};
  }
}

const CONSEC_LOSS_WARN = 5;

export function registerStatsSubscriber(tracker: PerformanceTracker, bus: EventBus = getEventBus()): () => void {
  const offs = [
    bus.subscribe('POSITION_CLOSED', (ev) => {
      tracker.recordOutcome(ev.outcome);
      const s = tracker.snapshot();
      if (ev.outcome.exitReason === 'ENTRY_FAILED') return;
      log('INFO', 'STATS', 'snapshot', { trades: s.totalTrades, wins: s.wins, losses: s.losses, winRate: s.winRate, totalPnl: s.totalPnl });
      if (s.consecLosses > CONSEC_LOSS_WARN) {
        log('WARN', 'STATS', 'anomaly', { consecLosses: s.consecLosses, winRate: s.winRate });
      }
    }),
    bus.subscribe('FILL_RECONCILED', (ev) => { if (ev.outcome) tracker.amendOutcome(ev.outcome); }),
    bus.subscribe('POSITION_PARTIAL_CLOSE', () => tracker.notePartialClose()),
    bus.subscribe('POSITION_BREAKEVEN', () => tracker.noteBreakeven()),
    bus.subscribe('POSITION_TRAILING_ACTIVATED', () => tracker.noteTrailing()),
  ];
  return () => { for (const off of offs) off(); };
}
