import type { AppEvent, AppEventType, EventOf } from './types';
import { log as logCat } from '../../utils/logger';

export type EventHandler<T extends AppEvent = AppEvent> = (event: T) => void | Promise<void>;

export interface EventBus {
  publish(event: AppEvent, opts?: { async?: boolean }): void;
  subscribe<K extends AppEventType>(type: K, handler: EventHandler<EventOf<K>>): () => void;
  clear(): void;
  has(type: AppEventType): boolean;
  flush(): Promise<void>;
}

function isType<K extends AppEventType>(ev: AppEvent, type: K): ev is EventOf<K> {
  return ev.type === type;
}

function isPromiseLike(v: unknown): v is PromiseLike<void> {
  return typeof v === 'object' && v !== null && 'then' in v && typeof v.then === 'function';
}

export class InMemoryEventBus implements EventBus {
  private handlers = new Map<AppEventType, Set<EventHandler>>();
  private inflight = new Set<Promise<void>>();

  private timed(type: string, latencyMs: number) {
    const slowThreshold = Number(process.env.EVENTBUS_SLOW_HANDLER_MS || 100);
    if (latencyMs >= slowThreshold) {
      logCat('WARN', 'EVENT', 'slow-handler', { type, latencyMs, threshold: slowThreshold });
    }
  }

  private fail(err: unknown, event: AppEvent) {
    logCat('ERROR', 'EVENT', 'handler-error', { type: event.type, error: err });
  }

  private invoke(handler: EventHandler, event: AppEvent): Promise<void> | undefined {
    const t0 = Date.now();
    try {
      const r = handler(event);
      if (isPromiseLike(r)) {
        return Promise.resolve(r).then(
          () => { this.timed(event.type, Date.now() - t0); },
          (err: unknown) => { this.timed(event.type, Date.now() - t0); this.fail(err, event); },
        );
      }
      this.timed(event.type, Date.now() - t0);
    } catch (err) {
      this.timed(event.type, Date.now() - t0);
      this.fail(err, event);
    }
    return undefined;
  }

  private track(p: Promise<void> | undefined) {
    if (!p) return;
    this.inflight.add(p);
    void p.finally(() => { this.inflight.delete(p); });
  }

  has(type: AppEventType): boolean { const set = this.handlers.get(type); return !!(set && set.size > 0); }

  /** Delivers on a microtask unless `async: false`. Handler errors never reach the publisher. */
  publish(evt: AppEvent, opts?: { async?: boolean }): void {
    if (!evt.eventId) evt.eventId = `${Date.now()}-${Math.random().toString(36).slice(2, 10)}`;
    const set = this.handlers.get(evt.type);
    if (!set || set.size === 0) return;
    const handlers = Array.from(set);
    const call = () => { for (const h of handlers) this.track(this.invoke(h, evt)); };
    if (opts?.async === false) { call(); return; }
    const scheduled = new Promise<void>((resolve) => { queueMicrotask(() => { call(); resolve(); }); });
    this.track(scheduled);
  }

  subscribe<K extends AppEventType>(type: K, handler: EventHandler<EventOf<K>>): () => void {
    const wrapper: EventHandler = (ev) => (isType(ev, type) ? handler(ev) : undefined);
    let set = this.handlers.get(type);
    if (!set) { set = new Set(); this.handlers.set(type, set); }
    set.add(wrapper);
    const owner = set;
    return () => { owner.delete(wrapper); };
  }

  /** Waits until every scheduled delivery and async handler has settled. */
  async flush(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(Array.from(this.inflight));
    }
  }

  /** Removes every handler. */
  clear() { this.handlers.clear(); }
}

let _bus: EventBus | undefined;
export function getEventBus(): EventBus {
  if (!_bus) _bus = new InMemoryEventBus();
  return _bus;
}
export function setEventBus(bus: EventBus) {
  _bus = bus;
}
