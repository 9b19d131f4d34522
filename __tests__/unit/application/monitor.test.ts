import { describe, it, expect, vi } from 'vitest';
import { MonitoringLoop } from '../../../src/application/monitor';
import { EventBusLedger } from '../../../src/application/ledger';
import { InMemoryEventBus } from '../../../src/application/events/bus';
import { ExecutionService } from '../../../src/adapters/execution-service';
import { StaticPriceFeed } from '../../../src/adapters/price-feed';
import { PaperOrderGateway } from '../../../src/api/paper-gateway';
import { PositionBook } from '../../../src/core/position-book';
import { buildRiskConfig, RiskConfigHolder } from '../../../src/config/risk-config';
import { GatewayRejectedError } from '../../../src/application/errors';
import { openingSide } from '../../../src/types/domain';
import {
  T0,
  collectEvents,
  makeSignal,
  manualClock,
  ofType,
  openMachine,
  pendingMachine,
  transientError,
} from '../../support/fixtures';

function harness(opts: { retryAttempts?: number; closeRetryLimit?: number; fillAfterPolls?: number } = {}) {
  const bus = new InMemoryEventBus();
  const clock = manualClock();
  const feed = new StaticPriceFeed({ BTCUSDT: 50000, SOLUSDT: 100 });
  const gateway = new PaperOrderGateway({ feed, fillAfterPolls: opts.fillAfterPolls });
  const execution = new ExecutionService(gateway, {
    retryAttempts: opts.retryAttempts ?? 2,
    retryBackoffMs: 0,
    closeRetryLimit: opts.closeRetryLimit ?? 4,
    now: clock.now,
    bus,
  });
  const book = new PositionBook();
  const config = new RiskConfigHolder(buildRiskConfig());
  const monitor = new MonitoringLoop({ book, execution, feed, ledger: new EventBusLedger(bus, clock.now), config, intervalMs: 1000, bus, now: clock.now });
  const events = collectEvents(bus, [
    'ALERT', 'POSITION_CLOSED', 'POSITION_REMOVED', 'POSITION_UPDATED', 'POSITION_PARTIAL_CLOSE',
    'FILL_RECONCILED', 'EVENT/ERROR', 'ORDER_CANCELED', 'CLOSE_RETRY_PENDING',
  ]);
  return { bus, clock, feed, gateway, execution, book, monitor, events };
}

const sol = makeSignal({ symbol: 'SOLUSDT', entry: 100, stopLoss: 97, targets: [110] });

describe('application/monitor', () => {
  it('closes at the stop, then reconciles and removes the position once the close fills', async () => {
    const h = harness();
    const m = openMachine();
    h.book.add(m);
    h.feed.set('BTCUSDT', 49000);

    await h.monitor.runOnce();
    expect(m.status).toBe('CLOSED');
    expect(h.book.size).toBe(1);
    expect(h.execution.hasOutstanding(m.id)).toBe(true);

    await h.monitor.runOnce();
    await h.bus.flush();
    expect(h.book.size).toBe(0);
    const closed = ofType(h.events, 'POSITION_CLOSED');
    expect(closed).toHaveLength(1);
    expect(closed[0].outcome.exitReason).toBe('STOP_LOSS');
    const rec = ofType(h.events, 'FILL_RECONCILED');
    expect(rec).toHaveLength(1);
    expect(rec[0].pnlAdjustment).toBe(0);
    expect(ofType(h.events, 'POSITION_REMOVED').map(e => e.positionId)).toEqual([m.id]);
  });

  it('skips a symbol without a price and keeps evaluating the rest', async () => {
    const h = harness();
    const btc = openMachine();
    const s = openMachine(sol);
    h.book.add(btc);
    h.book.add(s);
    h.feed.set('BTCUSDT', undefined);
    h.feed.set('SOLUSDT', 96.5);

    await h.monitor.runOnce();
    expect(btc.status).toBe('OPEN');
    expect(s.status).toBe('CLOSED');
    const health = h.monitor.getHealth();
    expect(health.feedMisses).toBe(1);
    expect(health.ticks).toBe(1);
    expect(h.gateway.calls.filter(c => c.op === 'placeMarketClose').map(c => c.arg)).toEqual([`SOLUSDT@${T0}#1`]);
  });

  it('isolates a position whose evaluation throws', async () => {
    const h = harness();
    const btc = openMachine();
    const s = openMachine(sol);
    h.book.add(btc);
    h.book.add(s);
    vi.spyOn(btc, 'onTick').mockImplementation(() => { throw new Error('boom'); });
    h.feed.set('SOLUSDT', 96.5);

    await h.monitor.runOnce();
    await h.bus.flush();
    expect(s.status).toBe('CLOSED');
    const health = h.monitor.getHealth();
    expect(health.positionErrors).toBe(1);
    expect(health.healthy).toBe(true);
    const errs = ofType(h.events, 'EVENT/ERROR');
    expect(errs).toHaveLength(1);
    expect(errs[0].positionId).toBe(btc.id);
    expect(errs[0].cause.message).toBe('boom');
  });

  it('parks an undelivered close, escalates, and delivers it on a later tick', async () => {
    const h = harness({ retryAttempts: 2, closeRetryLimit: 4 });
    const m = openMachine();
    h.book.add(m);
    h.gateway.failNext('placeMarketClose', transientError(), 4);
    h.feed.set('BTCUSDT', 49000);

    await h.monitor.runOnce();
    await h.bus.flush();
    expect(m.status).toBe('CLOSED');
    expect(h.execution.pendingRetries()).toHaveLength(1);
    expect(h.execution.pendingRetries()[0].attempts).toBe(2);
    expect(h.monitor.getHealth().pendingCloseRetries).toBe(1);
    expect(h.book.size).toBe(1);
    expect(ofType(h.events, 'ALERT').map(a => [a.severity, a.code])).toEqual([['ERROR', 'CLOSE_RETRY_EXHAUSTED']]);

    await h.monitor.runOnce();
    await h.bus.flush();
    expect(h.execution.pendingRetries()[0].attempts).toBe(4);
    expect(ofType(h.events, 'ALERT').map(a => [a.severity, a.code])).toEqual([
      ['ERROR', 'CLOSE_RETRY_EXHAUSTED'],
      ['FATAL', 'CLOSE_RETRY_LIMIT'],
    ]);

    await h.monitor.runOnce();
    await h.bus.flush();
    expect(h.execution.pendingRetries()).toHaveLength(0);
    expect(h.book.size).toBe(0);
    expect(ofType(h.events, 'ALERT')).toHaveLength(2);
    expect(ofType(h.events, 'CLOSE_RETRY_PENDING').map(e => e.attempts)).toEqual([2, 4]);
    expect(ofType(h.events, 'POSITION_CLOSED')).toHaveLength(1);
  });

  it('gives pending closes one more attempt when stopped', async () => {
    const h = harness({ retryAttempts: 1 });
    const m = openMachine();
    h.book.add(m);
    h.gateway.failNext('placeMarketClose', transientError(), 1);
    h.feed.set('BTCUSDT', 49000);

    await h.monitor.runOnce();
    expect(h.execution.pendingRetries()).toHaveLength(1);

    await h.monitor.stop();
    expect(h.execution.pendingRetries()).toHaveLength(0);
    expect(h.book.size).toBe(0);
    expect(h.gateway.calls.filter(c => c.op === 'placeMarketClose')).toHaveLength(2);
  });

  it('restores quantity when a target close is rejected', async () => {
    const h = harness();
    const m = openMachine(makeSignal({ targets: [51000, 52000] }));
    h.book.add(m);
    h.gateway.failNext('placeMarketClose', new GatewayRejectedError('reduce-only order rejected'), 1);
    h.feed.set('BTCUSDT', 51000);

    await h.monitor.runOnce();
    await h.bus.flush();
    const s = m.snapshot();
    expect(s.status).toBe('OPEN');
    expect(s.quantity).toBeCloseTo(0.2, 12);
    expect(s.targets[0].filled).toBe(false);
    expect(ofType(h.events, 'ALERT')).toHaveLength(0);
    expect(ofType(h.events, 'POSITION_PARTIAL_CLOSE')).toHaveLength(1);
  });

  it('raises an alert when a full exit is rejected', async () => {
    const h = harness();
    const m = openMachine();
    h.book.add(m);
    h.gateway.failNext('placeMarketClose', new GatewayRejectedError('position not found'), 1);
    h.feed.set('BTCUSDT', 49000);

    await h.monitor.runOnce();
    await h.bus.flush();
    expect(m.status).toBe('CLOSED');
    const alerts = ofType(h.events, 'ALERT');
    expect(alerts).toHaveLength(1);
    expect(alerts[0]).toMatchObject({ severity: 'ERROR', code: 'CLOSE_REJECTED', positionId: m.id });
    expect(h.book.size).toBe(0);
  });

  it('cancels an entry that outlives entryTimeoutMs', async () => {
    const h = harness({ fillAfterPolls: 100 });
    const m = pendingMachine();
    h.book.add(m);
    const intent = await h.execution.submitEntry(m.id, {
      symbol: m.symbol, direction: m.direction, side: openingSide(m.direction), quantity: 0.2, price: 50000, leverage: 3, clientOrderId: `${m.id}#entry`,
    });
    expect(intent.orderId).toBe('paper-1');
    m.onEntryPlaced('paper-1', T0);

    h.clock.set(T0 + 600_000);
    await h.monitor.runOnce();
    await h.bus.flush();
    expect(m.status).toBe('CLOSED');
    expect(h.gateway.getOrder('paper-1')?.status).toBe('canceled');
    expect(ofType(h.events, 'ORDER_CANCELED')).toHaveLength(1);
    expect(ofType(h.events, 'POSITION_CLOSED')[0].outcome.exitReason).toBe('ENTRY_FAILED');
    expect(h.book.size).toBe(0);
  });

  it('retries a failed entry cancel on the next tick', async () => {
    const h = harness({ fillAfterPolls: 100, retryAttempts: 1 });
    const m = pendingMachine();
    h.book.add(m);
    await h.execution.submitEntry(m.id, {
      symbol: m.symbol, direction: m.direction, side: 'BUY', quantity: 0.2, price: 50000, leverage: 3, clientOrderId: `${m.id}#entry`,
    });
    m.onEntryPlaced('paper-1', T0);
    h.gateway.failNext('cancel', transientError(), 1);

    h.clock.set(T0 + 600_000);
    await h.monitor.runOnce();
    expect(m.status).toBe('PENDING_ENTRY');

    await h.monitor.runOnce();
    expect(m.status).toBe('CLOSED');
    expect(h.gateway.calls.filter(c => c.op === 'cancel')).toHaveLength(2);
  });

  it('force-closes by symbol and reports unknown symbols', async () => {
    const h = harness();
    const m = openMachine();
    h.book.add(m);
    h.feed.set('BTCUSDT', 50500);

    expect(await h.monitor.forceClose('ETHUSDT')).toBe('not_found');
    expect(await h.monitor.forceClose('btcusdt')).toBe('ok');
    await h.bus.flush();
    const closed = ofType(h.events, 'POSITION_CLOSED');
    expect(closed[0].outcome.exitReason).toBe('MANUAL');
    expect(closed[0].outcome.exitPrice).toBe(50500);
    expect(await h.monitor.forceClose('BTCUSDT')).toBe('not_found');
  });

  it('runs exclusive work one at a time in order', async () => {
    const h = harness();
    const order: string[] = [];
    const slow = h.monitor.runExclusive(async () => {
      await new Promise(r => setTimeout(r, 5));
      order.push('first');
    });
    const failing = h.monitor.runExclusive(() => { order.push('second'); throw new Error('nope'); });
    const fast = h.monitor.runExclusive(() => { order.push('third'); return 3; });
    await expect(failing).rejects.toThrow('nope');
    expect(await fast).toBe(3);
    await slow;
    expect(order).toEqual(['first', 'second', 'third']);
  });
});
