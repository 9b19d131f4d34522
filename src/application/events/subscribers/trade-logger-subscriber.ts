import { getEventBus, type EventBus } from '../bus';
import { logClose, logExecution, logOrder, logSignal, logTradeError, logTradeInfo } from '../../../utils/trade-logger';

export function registerTradeLoggerSubscriber(bus: EventBus = getEventBus()): () => void {
  const offs = [
    bus.subscribe('ORDER_SUBMITTED', (ev) => logOrder(`[EVENT] ${ev.type}`, { positionId: ev.positionId, symbol: ev.symbol, intent: ev.intent, side: ev.side, quantity: ev.quantity, orderId: ev.orderId, price: ev.price })),
    bus.subscribe('ORDER_FILLED', (ev) => logExecution(`[EVENT] ${ev.type}`, { positionId: ev.positionId, symbol: ev.symbol, intent: ev.intent, orderId: ev.orderId, filled: ev.filled, avgPrice: ev.avgPrice })),
    bus.subscribe('ORDER_REJECTED', (ev) => logTradeError(`[EVENT] ${ev.type}`, { positionId: ev.positionId, symbol: ev.symbol, intent: ev.intent, reason: ev.reason })),
    bus.subscribe('POSITION_OPENED', (ev) => logTradeInfo('[EVENT] POSITION_OPENED', { positionId: ev.position.id, symbol: ev.symbol, direction: ev.position.direction, entryPrice: ev.position.entryPrice, quantity: ev.position.quantity })),
    bus.subscribe('POSITION_PARTIAL_CLOSE', (ev) => logTradeInfo('[EVENT] POSITION_PARTIAL_CLOSE', { positionId: ev.positionId, symbol: ev.symbol, reason: ev.reason, targetIndex: ev.targetIndex, fraction: ev.fraction, quantity: ev.quantity, price: ev.price })),
    bus.subscribe('POSITION_CLOSED', (ev) => logClose('[EVENT] POSITION_CLOSED', { ...ev.outcome })),
    bus.subscribe('SIGNAL_REJECTED', (ev) => logSignal('[EVENT] SIGNAL_REJECTED', { symbol: ev.symbol, code: ev.code, reason: ev.reason })),
    bus.subscribe('ALERT', (ev) => logTradeError(`[ALERT] ${ev.code}`, { severity: ev.severity, symbol: ev.symbol, positionId: ev.positionId, message: ev.message })),
  ];
  return () => { for (const off of offs) off(); };
}
