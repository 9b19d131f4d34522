import { z } from 'zod';
import type { RiskConfig } from '../types/domain';
import { log } from '../utils/logger';

const HOUR_MS = 3_600_000;

export const DEFAULT_RISK_CONFIG: RiskConfig = {
  riskFraction: 0.02,
  maxOpenTrades: 5,
  maxPortfolioRisk: 0.05,
  maxLeverage: 20,
  defaultLeverage: 3,
  trailingStopActivation: 0.05,
  trailingMode: 'ORIGINAL_STOP_DISTANCE',
  trailingStopDistance: 0.02,
  breakevenThreshold: 0.03,
  emergencyStopLoss: 0.15,
  maxTradeDurationMs: 168 * HOUR_MS,
  moveStopOnTarget: false,
  lotSize: 0.001,
  entryTimeoutMs: 10 * 60_000,
  partialProfitActivation: 0,
  partialProfitFraction: 0.25,
  correlationProtection: true,
  correlationGroups: [['BTCUSDT', 'ETHUSDT']],
};

const activation = z.number().gt(0).max(0.5);

export const riskConfigSchema = z.object({
  riskFraction: z.number().gt(0).max(1),
  maxOpenTrades: z.number().int().min(1),
  maxPortfolioRisk: z.number().gt(0).max(1),
  maxLeverage: z.number().min(1),
  defaultLeverage: z.number().min(1),
  trailingStopActivation: activation,
  trailingMode: z.enum(['ORIGINAL_STOP_DISTANCE', 'PERCENT']),
  trailingStopDistance: activation,
  breakevenThreshold: activation,
  emergencyStopLoss: z.number().gt(0).max(1),
  maxTradeDurationMs: z.number().int().positive(),
  targetSplit: z.array(z.number().positive()).min(1).max(4).optional(),
  moveStopOnTarget: z.boolean(),
  lotSize: z.number().positive(),
  entryTimeoutMs: z.number().int().positive(),
  partialProfitActivation: z.number().min(0),
  partialProfitFraction: z.number().gt(0).lt(1),
  correlationProtection: z.boolean(),
  correlationGroups: z.array(z.array(z.string().min(1))),
});

const flag = z.string().optional().transform(v => v == null ? undefined : ['1', 'true', 'yes', 'on'].includes(v.toLowerCase()));
const num = z.string().optional().transform(v => (v == null || v.trim() === '' ? undefined : Number(v)));
const list = z.string().optional().transform(v => v == null ? undefined : v.split(',').map(s => s.trim()).filter(Boolean));

// RISK_* environment variables; every one is optional and falls back to the defaults above
const envSchema = z.object({
  RISK_FRACTION: num,
  RISK_MAX_OPEN_TRADES: num,
  RISK_MAX_PORTFOLIO_RISK: num,
  RISK_MAX_LEVERAGE: num,
  RISK_DEFAULT_LEVERAGE: num,
  RISK_TRAILING_ACTIVATION: num,
  RISK_TRAILING_MODE: z.enum(['ORIGINAL_STOP_DISTANCE', 'PERCENT']).optional(),
  RISK_TRAILING_DISTANCE: num,
  RISK_BREAKEVEN_THRESHOLD: num,
  RISK_EMERGENCY_STOP_LOSS: num,
  RISK_MAX_TRADE_DURATION_HOURS: num,
  RISK_TARGET_SPLIT: list,
  RISK_MOVE_STOP_ON_TARGET: flag,
  RISK_LOT_SIZE: num,
  RISK_ENTRY_TIMEOUT_SEC: num,
  RISK_PARTIAL_PROFIT_ACTIVATION: num,
  RISK_PARTIAL_PROFIT_FRACTION: num,
  RISK_CORRELATION_PROTECTION: flag,
  RISK_CORRELATION_GROUPS: z.string().optional(),
});

function parseGroups(raw: string | undefined): string[][] | undefined {
  if (raw == null) return undefined;
  return raw.split(';')
    .map(g => g.split(',').map(s => s.trim().toUpperCase()).filter(Boolean))
    .filter(g => g.length > 1);
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const v of Object.values(obj)) {
    if (v && typeof v === 'object' && !Object.isFrozen(v)) deepFreeze(v);
  }
  return Object.freeze(obj);
}

/** Defaults merged with overrides, validated and frozen. Throws on invalid values. */
export function buildRiskConfig(overrides: Partial<RiskConfig> = {}): Readonly<RiskConfig> {
  const merged: RiskConfig = { ...DEFAULT_RISK_CONFIG, ...overrides };
  const parsed = riskConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`invalid risk config: ${issues.join('; ')}`);
  }
  const cfg: RiskConfig = {
    ...parsed.data,
    correlationGroups: parsed.data.correlationGroups.map(g => g.map(s => s.toUpperCase())),
  };
  if (cfg.targetSplit == null) delete cfg.targetSplit;
  if (cfg.defaultLeverage > cfg.maxLeverage) {
    log('WARN', 'CONFIG', 'defaultLeverage above maxLeverage; capped', { defaultLeverage: cfg.defaultLeverage, maxLeverage: cfg.maxLeverage });
    cfg.defaultLeverage = cfg.maxLeverage;
  }
  return deepFreeze(cfg);
}

function definedOnly(obj: Partial<RiskConfig>): Partial<RiskConfig> {
  const out: Partial<RiskConfig> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) Object.assign(out, { [k]: v });
  }
  return out;
}

export function loadRiskConfig(env: NodeJS.ProcessEnv = process.env): Readonly<RiskConfig> {
  const e = envSchema.parse(env);
  const hours = e.RISK_MAX_TRADE_DURATION_HOURS;
  const entrySec = e.RISK_ENTRY_TIMEOUT_SEC;
  return buildRiskConfig(definedOnly({
    riskFraction: e.RISK_FRACTION,
    maxOpenTrades: e.RISK_MAX_OPEN_TRADES,
    maxPortfolioRisk: e.RISK_MAX_PORTFOLIO_RISK,
    maxLeverage: e.RISK_MAX_LEVERAGE,
    defaultLeverage: e.RISK_DEFAULT_LEVERAGE,
    trailingStopActivation: e.RISK_TRAILING_ACTIVATION,
    trailingMode: e.RISK_TRAILING_MODE,
    trailingStopDistance: e.RISK_TRAILING_DISTANCE,
    breakevenThreshold: e.RISK_BREAKEVEN_THRESHOLD,
    emergencyStopLoss: e.RISK_EMERGENCY_STOP_LOSS,
    maxTradeDurationMs: hours == null ? undefined : Math.round(hours * HOUR_MS),
    targetSplit: e.RISK_TARGET_SPLIT?.map(Number),
    moveStopOnTarget: e.RISK_MOVE_STOP_ON_TARGET,
    lotSize: e.RISK_LOT_SIZE,
    entryTimeoutMs: entrySec == null ? undefined : Math.round(entrySec * 1000),
    partialProfitActivation: e.RISK_PARTIAL_PROFIT_ACTIVATION,
    partialProfitFraction: e.RISK_PARTIAL_PROFIT_FRACTION,
    correlationProtection: e.RISK_CORRELATION_PROTECTION,
    correlationGroups: parseGroups(e.RISK_CORRELATION_GROUPS),
  }));
}

/**
 * Holds the process-wide snapshot. Readers take `current` once per tick;
 * `swap` replaces the whole object, never mutating the previous one.
 */
export class RiskConfigHolder {
  private snapshot: Readonly<RiskConfig>;
  private version = 1;
  constructor(initial: Readonly<RiskConfig>) { this.snapshot = initial; }
  get current(): Readonly<RiskConfig> { return this.snapshot; }
  get revision(): number { return this.version; }
  swap(next: Readonly<RiskConfig>): void {
    this.snapshot = Object.isFrozen(next) ? next : buildRiskConfig(next);
    this.version++;
    log('INFO', 'CONFIG', 'risk config replaced', { revision: this.version });
  }
}
