import { describe, it, expect, vi } from 'vitest';
import { BaseService } from '../../../src/adapters/base-service';
import { GatewayRejectedError, GatewayTransientError } from '../../../src/application/errors';
import { captureLogs, setupJsonLogs } from '../../support/logging';
import { transientError } from '../../support/fixtures';

describe('adapters/base-service', () => {
  it('retries transient failures and returns the first success', async () => {
    setupJsonLogs();
    const logs = captureLogs();
    const svc = new BaseService();
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(transientError())
      .mockResolvedValueOnce('ok');
    await expect(svc.withRetry(fn, 'placeOrder', 3, 1, { category: 'ORDER', symbol: 'BTCUSDT' })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(logs.map(l => `${l.level}:${l.category}:${l.message}`)).toEqual(['WARN:ORDER:retry']);
    expect(logs[0].data).toMatchObject({ symbol: 'BTCUSDT', retries: 1, cause: { code: 'NETWORK', message: 'socket hang up' } });
  });

  it('rethrows a definitive failure without retrying', async () => {
    captureLogs();
    const svc = new BaseService();
    const rejected = new GatewayRejectedError('insufficient margin');
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(rejected);
    await expect(svc.withRetry(fn, 'placeOrder', 3, 1)).rejects.toBe(rejected);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('wraps exhaustion in GatewayTransientError', async () => {
    setupJsonLogs();
    const logs = captureLogs();
    const svc = new BaseService();
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(transientError('timeout'));
    const err: unknown = await svc.withRetry(fn, 'closeOrder', 3, 1).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GatewayTransientError);
    expect(err).toMatchObject({ message: 'closeOrder failed after 3 attempts: timeout', attempts: 3, code: 'GATEWAY_TRANSIENT' });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(logs.map(l => l.message)).toEqual(['retry', 'retry', 'failed']);
    expect(logs[2]).toMatchObject({ level: 'ERROR', category: 'API' });
  });

  it('reads attempts from the environment when not given', async () => {
    process.env.RETRY_ATTEMPTS = '2';
    process.env.RETRY_BACKOFF_MS = '0';
    captureLogs();
    const fn = vi.fn<() => Promise<number>>().mockRejectedValue(transientError());
    await expect(new BaseService().withRetry(fn, 'poll')).rejects.toThrow('poll failed after 2 attempts: socket hang up');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
