import { getEventBus, type EventBus } from '../bus';
import type { AppEvent, AppEventType } from '../types';
import { log, type Level } from '../../../utils/logger';
import { formatDuration } from '../../../utils/toolkit';

function describe(ev: AppEvent): { level: Level; category: string; meta: Record<string, unknown> } {
  switch (ev.type) {
    case 'ORDER_SUBMITTED':
    case 'ORDER_FILLED':
    case 'ORDER_CANCELED':
      return { level: 'INFO', category: 'ORDER-EVENT', meta: { positionId: ev.positionId, symbol: ev.symbol, intent: ev.intent, side: ev.side, quantity: ev.quantity, orderId: ev.orderId } };
    case 'ORDER_REJECTED':
      return { level: 'WARN', category: 'ORDER-EVENT', meta: { positionId: ev.positionId, symbol: ev.symbol, intent: ev.intent, reason: ev.reason } };
    case 'CLOSE_RETRY_PENDING':
      return { level: 'WARN', category: 'ORDER-EVENT', meta: { positionId: ev.positionId, symbol: ev.symbol, attempts: ev.attempts, cause: ev.cause } };
    case 'POSITION_OPENED':
      return { level: 'INFO', category: 'POSITION', meta: { positionId: ev.position.id, symbol: ev.symbol, direction: ev.position.direction, entry: ev.position.entryPrice, quantity: ev.position.quantity, stop: ev.position.stopPrice, riskReward: ev.position.riskReward } };
    case 'POSITION_PARTIAL_CLOSE':
      return { level: 'INFO', category: 'POSITION', meta: { positionId: ev.positionId, symbol: ev.symbol, reason: ev.reason, fraction: ev.fraction, quantity: ev.quantity, price: ev.price } };
    case 'POSITION_STOP_MOVED':
      return { level: 'INFO', category: 'POSITION', meta: { positionId: ev.positionId, symbol: ev.symbol, from: ev.from, to: ev.to, stopKind: ev.stopKind } };
    case 'POSITION_TRAILING_ACTIVATED':
      return { level: 'INFO', category: 'POSITION', meta: { positionId: ev.positionId, symbol: ev.symbol, trailDistance: ev.trailDistance } };
    case 'POSITION_CLOSED':
      return {
        level: 'INFO', category: 'POSITION',
        meta: { positionId: ev.outcome.positionId, symbol: ev.symbol, reason: ev.outcome.exitReason, exitPrice: ev.outcome.exitPrice, pnl: ev.outcome.realizedPnl, pnlPct: ev.outcome.pnlPct, held: formatDuration(ev.outcome.durationMs) },
      };
    case 'FILL_RECONCILED':
      return { level: 'DEBUG', category: 'POSITION', meta: { positionId: ev.positionId, provisional: ev.provisionalPrice, fill: ev.fillPrice, adjustment: ev.pnlAdjustment } };
    case 'SIGNAL_REJECTED':
      return { level: 'WARN', category: 'SIGNAL', meta: { symbol: ev.symbol, code: ev.code, reason: ev.reason } };
    case 'RISK_CONFIG_RELOADED':
      return { level: 'INFO', category: 'CONFIG', meta: { revision: ev.revision } };
    case 'ALERT':
      return { level: ev.severity, category: 'ALERT', meta: { code: ev.code, symbol: ev.symbol, positionId: ev.positionId, message: ev.message } };
    case 'EVENT/ERROR':
      return { level: 'ERROR', category: 'EVENT', meta: { code: ev.code, symbol: ev.symbol, positionId: ev.positionId, orderId: ev.orderId, cause: ev.cause } };
    default:
      return { level: 'DEBUG', category: 'POSITION', meta: { positionId: ev.positionId, symbol: ev.symbol } };
  }
}

const LOGGED: AppEventType[] = [
  'ORDER_SUBMITTED', 'ORDER_FILLED', 'ORDER_REJECTED', 'ORDER_CANCELED', 'CLOSE_RETRY_PENDING',
  'POSITION_OPENED', 'POSITION_PARTIAL_CLOSE', 'POSITION_STOP_MOVED', 'POSITION_TRAILING_ACTIVATED', 'POSITION_BREAKEVEN',
  'POSITION_CLOSED', 'FILL_RECONCILED', 'SIGNAL_REJECTED', 'RISK_CONFIG_RELOADED', 'ALERT', 'EVENT/ERROR',
];

export function registerLoggerSubscriber(bus: EventBus = getEventBus()): () => void {
  const offs = LOGGED.map(t => bus.subscribe(t, (ev: AppEvent) => {
    const { level, category, meta } = describe(ev);
    log(level, category, ev.type, meta);
  }));
  return () => { for (const off of offs) off(); };
}
