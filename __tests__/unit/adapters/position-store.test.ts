import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FilePositionStore, InMemoryPositionStore } from '../../../src/adapters/position-store';
import { toPositionRecord } from '../../../src/core/position';
import type { TradeOutcome } from '../../../src/types/domain';
import { openMachine, pendingMachine } from '../../support/fixtures';

function outcome(id: string, realizedPnl: number): TradeOutcome {
  return {
    positionId: id, symbol: 'BTCUSDT', direction: 'LONG', finalState: 'CLOSED', exitReason: 'MANUAL',
    exitPrice: 50000, realizedPnl, pnlPct: 0, durationMs: 1, openedAt: 0, closedAt: 1, targetsHit: 0,
  };
}

describe('adapters/position-store', () => {
  let dir: string;
  beforeEach(() => { dir = fs.mkdtempSync(path.join(os.tmpdir(), 'positions-')); });
  afterEach(() => { fs.rmSync(dir, { recursive: true, force: true }); });

  it('round-trips live positions and drops removed ones', async () => {
    const store = new FilePositionStore(dir);
    const open = toPositionRecord(openMachine().snapshot());
    const pending = { ...toPositionRecord(pendingMachine().snapshot()), id: 'ETHUSDT@1', symbol: 'ETHUSDT' };
    await store.upsert(open);
    await store.upsert(pending);
    const again = new FilePositionStore(dir);
    expect((await again.loadOpen()).map(r => r.id).sort()).toEqual([open.id, 'ETHUSDT@1'].sort());
    expect((await again.loadOpen()).find(r => r.id === open.id)).toEqual(open);
    await again.remove(open.id);
    await again.remove('missing');
    expect((await store.loadOpen()).map(r => r.id)).toEqual(['ETHUSDT@1']);
    expect(fs.existsSync(path.join(dir, 'positions.json.tmp'))).toBe(false);
  });

  it('skips closed records on load', async () => {
    const store = new FilePositionStore(dir);
    await store.upsert({ ...toPositionRecord(openMachine().snapshot()), status: 'CLOSED', exitReason: 'MANUAL' });
    expect(await store.loadOpen()).toEqual([]);
  });

  it('loads a closed record while it still has undelivered closes', async () => {
    const store = new FilePositionStore(dir);
    const closed = {
      ...toPositionRecord(openMachine().snapshot()),
      status: 'CLOSED' as const,
      exitReason: 'STOP_LOSS' as const,
      quantity: 0,
      pendingCloses: [{ intentId: 'BTCUSDT@1#1', side: 'SELL' as const, quantity: 0.2, provisionalPrice: 49000, purpose: 'EXIT' as const, reason: 'STOP_LOSS' as const, attempts: 2 }],
    };
    await store.upsert(closed);
    const [loaded] = await new FilePositionStore(dir).loadOpen();
    expect(loaded.status).toBe('CLOSED');
    expect(loaded.pendingCloses).toEqual(closed.pendingCloses);
    await store.upsert({ ...closed, pendingCloses: undefined });
    expect(await store.loadOpen()).toEqual([]);
  });

  it('moves an unreadable file aside and starts clean', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    fs.writeFileSync(path.join(dir, 'positions.json'), '{"positions": {"x": {"id": 1}}}');
    const store = new FilePositionStore(dir);
    expect(await store.loadOpen()).toEqual([]);
    const files = fs.readdirSync(dir);
    expect(files.some(f => f.startsWith('positions.json.corrupt-'))).toBe(true);
    expect(files).not.toContain('positions.json');
    await store.upsert(toPositionRecord(openMachine().snapshot()));
    expect(await store.loadOpen()).toHaveLength(1);
  });

  it('appends history and keeps the newest entries under a limit', async () => {
    const store = new FilePositionStore(dir);
    expect(await store.listHistory()).toEqual([]);
    await store.appendHistory(outcome('a', 1));
    await store.appendHistory(outcome('b', 2));
    fs.appendFileSync(path.join(dir, 'history.jsonl'), 'not json\n');
    await store.appendHistory(outcome('c', 3));
    expect((await store.listHistory()).map(o => o.positionId)).toEqual(['a', 'b', 'c']);
    expect((await store.listHistory(2)).map(o => o.positionId)).toEqual(['b', 'c']);
  });

  it('amends the history row of a position in place', async () => {
    const store = new FilePositionStore(dir);
    await store.appendHistory(outcome('a', 1));
    await store.appendHistory(outcome('b', 2));
    await store.amendHistory(outcome('a', -4));
    await store.amendHistory(outcome('c', 7));
    expect((await store.listHistory()).map(o => [o.positionId, o.realizedPnl])).toEqual([['a', -4], ['b', 2], ['c', 7]]);
    expect(fs.existsSync(path.join(dir, 'history.jsonl.tmp'))).toBe(false);

    const memory = new InMemoryPositionStore();
    await memory.appendHistory(outcome('a', 1));
    await memory.amendHistory(outcome('a', 3));
    expect((await memory.listHistory()).map(o => o.realizedPnl)).toEqual([3]);
  });

  it('keeps copies in memory', async () => {
    const store = new InMemoryPositionStore();
    const rec = toPositionRecord(openMachine().snapshot());
    await store.upsert(rec);
    rec.quantity = 0;
    const [loaded] = await store.loadOpen();
    expect(loaded.quantity).toBe(0.2);
    await store.appendHistory(outcome('a', 1));
    await store.appendHistory(outcome('b', 1));
    expect((await store.listHistory(1)).map(o => o.positionId)).toEqual(['b']);
    await store.remove(rec.id);
    expect(await store.loadOpen()).toEqual([]);
  });
});
