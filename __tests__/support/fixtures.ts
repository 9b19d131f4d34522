import type { AccountState, RiskConfig, Signal } from '../../src/types/domain';
import type { AppEvent, AppEventType, EventOf } from '../../src/application/events/types';
import type { EventBus } from '../../src/application/events/bus';
import { buildRiskConfig } from '../../src/config/risk-config';
import { computePositionSize, deriveTargets } from '../../src/core/risk';
import { PositionMachine } from '../../src/core/position';

export const T0 = 1_700_000_000_000;

export function makeSignal(overrides: Partial<Signal> = {}): Signal {
  return {
    symbol: 'BTCUSDT',
    direction: 'LONG',
    entry: 50000,
    stopLoss: 49000,
    targets: [52000, 54000],
    ...overrides,
  };
}

/** Sized, placed and fully filled at the signal's entry. */
export function openMachine(
  signal: Signal = makeSignal(),
  cfg: Readonly<RiskConfig> = buildRiskConfig(),
  account: AccountState = { equity: 10000 },
  now = T0,
): PositionMachine {
  const plan = computePositionSize(signal, cfg, account);
  const m = PositionMachine.create(signal, plan, deriveTargets(signal, cfg), now);
  m.onEntryPlaced(`order-${m.symbol}`, now);
  m.onEntryFill(plan.quantity, plan.entryPrice, now);
  return m;
}

export function pendingMachine(signal: Signal = makeSignal(), cfg: Readonly<RiskConfig> = buildRiskConfig(), now = T0): PositionMachine {
  const plan = computePositionSize(signal, cfg, { equity: 10000 });
  return PositionMachine.create(signal, plan, deriveTargets(signal, cfg), now);
}

export function manualClock(start = T0) {
  let t = start;
  return {
    now: () => t,
    advance(ms: number) { t += ms; },
    set(v: number) { t = v; },
  };
}

export function collectEvents(bus: EventBus, types: AppEventType[]): AppEvent[] {
  const out: AppEvent[] = [];
  for (const type of types) bus.subscribe(type, (ev: AppEvent) => { out.push(ev); });
  return out;
}

export function ofType<K extends AppEventType>(events: ReadonlyArray<AppEvent>, type: K): EventOf<K>[] {
  return events.filter((e): e is EventOf<K> => e.type === type);
}

export function transientError(message = 'socket hang up'): Error {
  return Object.assign(new Error(message), { code: 'ECONNRESET' });
}
