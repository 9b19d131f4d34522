import type { PositionLedger } from '../contracts';
import type { PositionSnapshot, TradeOutcome } from '../types/domain';
import { getEventBus, type EventBus } from './events/bus';
import { log } from '../utils/logger';
import { errorMessage } from './errors';

/** Publishes ledger callbacks as position events on the bus. */
export class EventBusLedger implements PositionLedger {
  constructor(private readonly bus: EventBus = getEventBus(), private readonly now: () => number = Date.now) {}

  onPositionOpened(position: PositionSnapshot): void {
    this.bus.publish({ type: 'POSITION_OPENED', ts: this.now(), symbol: position.symbol, positionId: position.id, position });
  }

  onPartialClose(position: PositionSnapshot, fraction: number, reason: string): void {
    const profit = position.partialProfit;
    if (reason === 'PARTIAL_PROFIT' && profit) {
      this.bus.publish({
        type: 'POSITION_PARTIAL_CLOSE', ts: this.now(), symbol: position.symbol, positionId: position.id, position,
        fraction, reason, targetIndex: -1, quantity: profit.quantity, price: profit.price,
      });
      return;
    }
    // reason is TARGET_<n>; without it, the most recently filled target
    const n = /^TARGET_(\d+)$/.exec(reason);
    const filled = position.targets.filter(t => t.filled);
    const target = n ? position.targets[Number(n[1]) - 1] : filled[filled.length - 1];
    this.bus.publish({
      type: 'POSITION_PARTIAL_CLOSE',
      ts: this.now(),
      symbol: position.symbol,
      positionId: position.id,
      position,
      fraction,
      reason,
      targetIndex: target ? target.index : -1,
      quantity: target ? target.filledQuantity : 0,
      price: target?.fillPrice ?? position.lastPrice ?? position.entryPrice,
    });
  }

  onPositionClosed(outcome: TradeOutcome): void {
    this.bus.publish({ type: 'POSITION_CLOSED', ts: outcome.closedAt, symbol: outcome.symbol, positionId: outcome.positionId, outcome });
  }
}

/**
 * Calls every ledger in order. One ledger throwing is logged and does not
 * keep the others from being told.
 */
export function fanOutLedger(...ledgers: PositionLedger[]): PositionLedger {
  const each = (what: string, call: (l: PositionLedger) => void) => {
    for (const l of ledgers) {
      try { call(l); } catch (e) { log('ERROR', 'LEDGER', `${what} failed`, { message: errorMessage(e) }); }
    }
  };
  return {
    onPositionOpened: (p) => each('onPositionOpened', l => l.onPositionOpened(p)),
    onPartialClose: (p, f, r) => each('onPartialClose', l => l.onPartialClose(p, f, r)),
    onPositionClosed: (o) => each('onPositionClosed', l => l.onPositionClosed(o)),
  };
}
