import { describe, it, expect, vi } from 'vitest';
import axios, { type AxiosAdapter } from 'axios';
import { HttpPriceFeed, StaticPriceFeed } from '../../../src/adapters/price-feed';
import { manualClock } from '../../support/fixtures';

function stubClient(respond: (symbol: unknown) => unknown) {
  const requests: Array<{ url?: string; symbol: unknown }> = [];
  const adapter: AxiosAdapter = async (config) => {
    const symbol: unknown = config.params?.symbol;
    requests.push({ url: config.url, symbol });
    return { data: respond(symbol), status: 200, statusText: 'OK', headers: {}, config };
  };
  return { client: axios.create({ baseURL: 'http://feed.test', adapter }), requests };
}

describe('adapters/price-feed', () => {
  it('reads the mark price of the upper-cased symbol', async () => {
    const { client, requests } = stubClient(() => ({ symbol: 'BTCUSDT', markPrice: '50123.5' }));
    const feed = new HttpPriceFeed({ baseUrl: 'http://feed.test', client, cacheTtlMs: 0 });
    await expect(feed.latestPrice('btcusdt')).resolves.toBe(50123.5);
    expect(requests).toEqual([{ url: '/fapi/v1/premiumIndex', symbol: 'BTCUSDT' }]);
  });

  it('reuses a price until the cache entry expires', async () => {
    const clock = manualClock();
    let price = 100;
    const { client, requests } = stubClient(() => ({ symbol: 'SOLUSDT', markPrice: price }));
    const feed = new HttpPriceFeed({ baseUrl: 'http://feed.test', client, cacheTtlMs: 1000, now: clock.now });
    expect(await feed.latestPrice('SOLUSDT')).toBe(100);
    price = 101;
    clock.advance(999);
    expect(await feed.latestPrice('SOLUSDT')).toBe(100);
    clock.advance(1);
    expect(await feed.latestPrice('SOLUSDT')).toBe(101);
    expect(requests).toHaveLength(2);
    feed.clearCache();
    expect(await feed.latestPrice('SOLUSDT')).toBe(101);
    expect(requests).toHaveLength(3);
  });

  it('treats a malformed body as no price', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { client } = stubClient(() => ({ symbol: 'BTCUSDT', markPrice: 'n/a' }));
    const feed = new HttpPriceFeed({ baseUrl: 'http://feed.test', client });
    await expect(feed.latestPrice('BTCUSDT')).resolves.toBeUndefined();
  });

  it('treats a request that keeps failing as no price', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    let calls = 0;
    const adapter: AxiosAdapter = async () => { calls++; throw Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }); };
    const feed = new HttpPriceFeed({ baseUrl: 'http://feed.test', client: axios.create({ adapter }), retryAttempts: 2, retryBackoffMs: 0 });
    await expect(feed.latestPrice('BTCUSDT')).resolves.toBeUndefined();
    expect(calls).toBe(2);
  });

  it('retries a dropped connection before giving up on the price', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    let calls = 0;
    const adapter: AxiosAdapter = async (config) => {
      calls++;
      if (calls === 1) throw Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
      return { data: { symbol: 'BTCUSDT', markPrice: '50200' }, status: 200, statusText: 'OK', headers: {}, config };
    };
    const feed = new HttpPriceFeed({ baseUrl: 'http://feed.test', client: axios.create({ adapter }), retryAttempts: 3, retryBackoffMs: 0 });
    await expect(feed.latestPrice('BTCUSDT')).resolves.toBe(50200);
    expect(calls).toBe(2);
  });

  it('does not retry a client error', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    let calls = 0;
    const adapter: AxiosAdapter = async () => { calls++; throw Object.assign(new Error('Request failed with status code 400'), { response: { status: 400 } }); };
    const feed = new HttpPriceFeed({ baseUrl: 'http://feed.test', client: axios.create({ adapter }), retryAttempts: 3, retryBackoffMs: 0 });
    await expect(feed.latestPrice('BTCUSDT')).resolves.toBeUndefined();
    expect(calls).toBe(1);
  });

  it('serves fixed prices', async () => {
    const feed = new StaticPriceFeed({ btcusdt: 50000 });
    expect(await feed.latestPrice('BTCUSDT')).toBe(50000);
    feed.set('BTCUSDT', undefined);
    expect(await feed.latestPrice('BTCUSDT')).toBeUndefined();
  });
});
