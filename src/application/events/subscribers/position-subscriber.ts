import { getEventBus, type EventBus } from '../bus';
import type { PositionRepository } from '../../../contracts';
import { toPositionRecord } from '../../../core/position';
import { log } from '../../../utils/logger';
import { errorMessage } from '../../errors';

export interface PositionSubscription {
  unsubscribe(): void;
  /** resolves once every queued write has been attempted */
  drain(): Promise<void>;
}

/**
 * Writes position changes through to the repository. Writes run one at a
 * time in arrival order; a failed write is logged and the queue goes on.
 * A closed position stays stored until it is removed from the book, so an
 * undelivered close survives a restart.
 */
export function registerPositionSubscriber(repo: PositionRepository, bus: EventBus = getEventBus()): PositionSubscription {
  let chain: Promise<void> = Promise.resolve();
  const enqueue = (what: string, id: string, op: () => Promise<void>) => {
    chain = chain.then(op).catch((e: unknown) => {
      log('ERROR', 'STORE', `${what} failed`, { positionId: id, message: errorMessage(e) });
    });
    return chain;
  };
  const offs = [
    bus.subscribe('POSITION_OPENED', (ev) => enqueue('upsert', ev.position.id, () => repo.upsert(toPositionRecord(ev.position)))),
    bus.subscribe('POSITION_UPDATED', (ev) => enqueue('upsert', ev.position.id, () => repo.upsert(toPositionRecord(ev.position)))),
    bus.subscribe('POSITION_PARTIAL_CLOSE', (ev) => enqueue('upsert', ev.position.id, () => repo.upsert(toPositionRecord(ev.position)))),
    bus.subscribe('POSITION_CLOSED', (ev) => enqueue('appendHistory', ev.outcome.positionId, () => repo.appendHistory(ev.outcome))),
    bus.subscribe('FILL_RECONCILED', (ev) => {
      const { outcome } = ev;
      if (outcome) void enqueue('amendHistory', outcome.positionId, () => repo.amendHistory(outcome));
    }),
    // only once every order of the position is final
    bus.subscribe('POSITION_REMOVED', (ev) => {
      const id = ev.positionId;
      if (id) void enqueue('remove', id, () => repo.remove(id));
    }),
  ];
  return {
    unsubscribe: () => { for (const off of offs) off(); },
    drain: async () => {
      let seen: Promise<void>;
      do { seen = chain; await seen; } while (seen !== chain);
    },
  };
}
