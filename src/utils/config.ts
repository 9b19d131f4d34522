import path from "path";
import { z } from "zod";

export interface AppConfig {
    dryRun: boolean;
    loopIntervalMs: number;
    retryAttempts: number;
    retryBackoffMs: number;
    closeRetryLimit: number;
    positionStoreDir: string;
    priceFeedUrl: string;
    priceCacheTtlMs: number;
    accountEquity: number;
    signalFile?: string;
}

const truthy = (val?: string) => val ? ["1", "true", "yes", "on"].includes(val.toLowerCase()) : false;
const intWithDefault = (def: number) => z.string().optional().transform((val, ctx) => {
    if (val == null || val.trim() === '') return def;
    const n = Number(val);
    if (!Number.isFinite(n) || n < 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a non-negative number, got "${val}"` });
        return z.NEVER;
    }
    return Math.floor(n);
});

// Zod schema for environment validation
const envSchema = z.object({
    DRY_RUN: z.string().optional().transform(truthy),
    LOOP_INTERVAL_MS: intWithDefault(5000),
    RETRY_ATTEMPTS: intWithDefault(3),
    RETRY_BACKOFF_MS: intWithDefault(200),
    CLOSE_RETRY_LIMIT: intWithDefault(10),
    POSITION_STORE_DIR: z.string().optional(),
    PRICE_FEED_URL: z.string().url().optional().default("https://fapi.binance.com"),
    PRICE_CACHE_TTL_MS: intWithDefault(1000),
    ACCOUNT_EQUITY: intWithDefault(10000),
    SIGNAL_FILE: z.string().optional(),
});

let __cachedAppConfig: AppConfig | null = null;
export function loadAppConfig(): AppConfig {
    if (__cachedAppConfig) return __cachedAppConfig;
    const env = envSchema.parse(process.env);
    __cachedAppConfig = {
        dryRun: env.DRY_RUN,
        loopIntervalMs: Math.max(100, env.LOOP_INTERVAL_MS),
        retryAttempts: Math.max(1, env.RETRY_ATTEMPTS),
        retryBackoffMs: env.RETRY_BACKOFF_MS,
        closeRetryLimit: Math.max(1, env.CLOSE_RETRY_LIMIT),
        positionStoreDir: path.resolve(process.cwd(), env.POSITION_STORE_DIR || ".positions"),
        priceFeedUrl: env.PRICE_FEED_URL,
        priceCacheTtlMs: env.PRICE_CACHE_TTL_MS,
        accountEquity: env.ACCOUNT_EQUITY,
        signalFile: env.SIGNAL_FILE,
    };
    return __cachedAppConfig;
}

/**
 * Test helper: reset cached app config so subsequent calls re-read env.
 */
export function resetConfigCache(){
    __cachedAppConfig = null;
}
