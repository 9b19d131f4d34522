import { sleep, toPosInt } from "../utils/toolkit";
import { log, type Level } from "../utils/logger";
import { GatewayTransientError, errorMessage, isTransient, normalizeErrorCode } from "../application/errors";

export interface RetryMeta {
  requestId?: string;
  positionId?: string;
  symbol?: string;
  side?: string;
  quantity?: number;
  price?: number;
  category?: string;
  opType?: 'ORDER' | 'CLOSE' | 'CANCEL' | 'POLL' | 'QUERY';
}

/** Retry and categorized logging shared by the adapters that talk to the network. */
export class BaseService {
  /**
   * Runs `fn` up to `attempts` times with exponential backoff and +/-10-20% jitter.
   * Errors that are not transient (a definitive rejection, a 4xx) are rethrown
   * at once; exhausting the attempts throws GatewayTransientError.
   */
  async withRetry<T>(
    fn: () => Promise<T>,
    label: string,
    attempts?: number,
    backoffMs?: number,
    contextMeta?: RetryMeta,
  ): Promise<T> {
    const max = Math.max(1, toPosInt(attempts ?? process.env.RETRY_ATTEMPTS, 3));
    const backoff = toPosInt(backoffMs ?? process.env.RETRY_BACKOFF_MS, 50);
    const category = contextMeta?.category || 'API';
    const baseMeta = {
      requestId: contextMeta?.requestId ?? null,
      positionId: contextMeta?.positionId ?? null,
      symbol: contextMeta?.symbol ?? null,
      side: contextMeta?.side ?? null,
      quantity: contextMeta?.quantity ?? null,
      price: contextMeta?.price ?? null,
      opType: contextMeta?.opType ?? null,
    };
    let lastErr: unknown;
    for (let i = 0; i < max; i++) {
      try {
        return await fn();
      } catch (e) {
        lastErr = e;
        if (!isTransient(e)) {
          this.clog(category, 'WARN', 'not-retried', { ...baseMeta, retries: i, cause: { code: normalizeErrorCode(e), message: errorMessage(e) } });
          throw e;
        }
        if (i < max - 1) {
          const amp = 0.1 + Math.random() * 0.1;
          const sign = Math.random() < 0.5 ? -1 : 1;
          const delay = Math.floor(backoff * Math.pow(2, i) * (1 + sign * amp));
          this.clog(category, 'WARN', 'retry', {
            ...baseMeta,
            retries: i + 1,
            cause: { code: normalizeErrorCode(e), message: errorMessage(e) },
          });
          await sleep(delay);
        }
      }
    }
    this.clog(category, 'ERROR', 'failed', {
      ...baseMeta,
      retries: max,
      cause: { code: normalizeErrorCode(lastErr), message: errorMessage(lastErr) },
    });
    throw new GatewayTransientError(`${label} failed after ${max} attempts: ${errorMessage(lastErr)}`, max, { cause: lastErr });
  }

  protected clog(category: string, level: Level, message: string, meta?: unknown) {
    log(level, category, message, meta);
  }
}

export default BaseService;
