import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { PriceFeed } from '../contracts';
import BaseService from './base-service';
import { errorMessage, normalizeErrorCode } from '../application/errors';

const markPriceSchema = z.object({
  symbol: z.string(),
  markPrice: z.coerce.number().positive(),
});

export interface HttpPriceFeedOptions {
  baseUrl: string;
  /** how long a fetched price is reused; 0 disables the cache */
  cacheTtlMs?: number;
  timeoutMs?: number;
  /** attempts per fetch on network errors, 429 and 5xx */
  retryAttempts?: number;
  retryBackoffMs?: number;
  client?: AxiosInstance;
  now?: () => number;
}

interface CachedPrice { price: number; at: number }

/**
 * Mark prices from a futures premium-index endpoint. Transient failures are
 * retried; anything still failing after that reads as "no price right now".
 */
export class HttpPriceFeed extends BaseService implements PriceFeed {
  private readonly client: AxiosInstance;
  private readonly ttl: number;
  private readonly now: () => number;
  private readonly cache = new Map<string, CachedPrice>();

  constructor(private readonly opts: HttpPriceFeedOptions) {
    super();
    this.client = opts.client ?? axios.create({ baseURL: opts.baseUrl, timeout: opts.timeoutMs ?? 5000 });
    this.ttl = Math.max(0, opts.cacheTtlMs ?? 1000);
    this.now = opts.now ?? Date.now;
  }

  async latestPrice(symbol: string): Promise<number | undefined> {
    const sym = symbol.toUpperCase();
    const hit = this.cache.get(sym);
    if (hit && this.ttl > 0 && this.now() - hit.at < this.ttl) return hit.price;
    try {
      const r = await this.withRetry(
        () => this.client.get('/fapi/v1/premiumIndex', { params: { symbol: sym } }),
        'latestPrice',
        this.opts.retryAttempts,
        this.opts.retryBackoffMs,
        { category: 'FEED', opType: 'QUERY', symbol: sym },
      );
      const parsed = markPriceSchema.safeParse(r.data);
      if (!parsed.success) {
        this.clog('FEED', 'WARN', 'malformed', { symbol: sym, issues: parsed.error.issues.map(i => i.message) });
        return undefined;
      }
      const price = parsed.data.markPrice;
      this.cache.set(sym, { price, at: this.now() });
      return price;
    } catch (e) {
      this.clog('FEED', 'WARN', 'unavailable', { symbol: sym, cause: { code: normalizeErrorCode(e), message: errorMessage(e) } });
      return undefined;
    }
  }

  clearCache() { this.cache.clear(); }
}

/** Fixed prices, settable from tests and the paper setup. */
export class StaticPriceFeed implements PriceFeed {
  private readonly prices = new Map<string, number>();

  constructor(initial: Record<string, number> = {}) {
    for (const [k, v] of Object.entries(initial)) this.prices.set(k.toUpperCase(), v);
  }

  set(symbol: string, price: number | undefined) {
    if (price == null) this.prices.delete(symbol.toUpperCase());
    else this.prices.set(symbol.toUpperCase(), price);
  }

  async latestPrice(symbol: string): Promise<number | undefined> {
    return this.prices.get(symbol.toUpperCase());
  }
}
