import type {
  AccountState,
  Direction,
  PositionStatus,
  RiskConfig,
  Signal,
  Target,
} from "../types/domain";
import type { CorrelationPredicate } from "../contracts";
import { PortfolioLimitExceeded, SizingError } from "../application/errors";
import { fail, ok, type Result } from "../utils/result";
import { floorToStep } from "../utils/toolkit";

export interface SizingPlan {
  entryPrice: number;
  stopPrice: number;
  quantity: number;
  leverage: number;
  riskAmount: number;
  /** |entry - stop| / entry */
  distance: number;
  margin: number;
  /** quantity was reduced to fit available margin */
  marginCapped: boolean;
}

/** What admission needs to know about a live position. */
export interface ExposureView {
  symbol: string;
  direction: Direction;
  entryPrice: number;
  stopPrice: number;
  quantity: number;
  leverage: number;
  status: PositionStatus;
}

export interface AdmissionCandidate {
  symbol: string;
  /** capital lost if the initial stop is hit */
  riskAmount: number;
}

export function directionSign(direction: Direction): 1 | -1 {
  return direction === "LONG" ? 1 : -1;
}

/** Entry price, or the arithmetic mean of the entry range. */
export function resolveEntryPrice(signal: Pick<Signal, "entry" | "entryRange">): number {
  if (signal.entry != null) return signal.entry;
  if (signal.entryRange) return (signal.entryRange.low + signal.entryRange.high) / 2;
  throw new SizingError("signal has neither entry nor entryRange");
}

/** Favorable price move as a fraction of entry, unleveraged. Negative when adverse. */
export function priceMovePct(direction: Direction, entry: number, price: number): number {
  if (entry <= 0) return 0;
  return (directionSign(direction) * (price - entry)) / entry;
}

/** Leveraged PnL fraction relative to the margin committed. */
export function pnlPct(direction: Direction, entry: number, price: number, leverage: number): number {
  return priceMovePct(direction, entry, price) * leverage;
}

export function unrealizedPnl(direction: Direction, entry: number, price: number, quantity: number): number {
  return directionSign(direction) * (price - entry) * quantity;
}

/** reward / risk for the first target, rounded to 2 decimals; 1 when risk is not positive. */
export function riskRewardRatio(direction: Direction, entry: number, stop: number, target: number | undefined): number {
  if (target == null) return 0;
  const sign = directionSign(direction);
  const risk = sign * (entry - stop);
  const reward = sign * (target - entry);
  if (risk <= 0) return 1;
  return Math.round((reward / risk) * 100) / 100;
}

export function resolveLeverage(signal: Pick<Signal, "leverage">, cfg: RiskConfig): number {
  const wanted = signal.leverage ?? cfg.defaultLeverage;
  return Math.max(1, Math.min(wanted, cfg.maxLeverage));
}

/**
 * Fixed-fractional sizing: lose `equity * riskFraction` if the stop is hit.
 * Quantity is capped by available margin and rounded down to the lot size.
 */
export function computePositionSize(signal: Signal, cfg: RiskConfig, account: AccountState): SizingPlan {
  const entryPrice = resolveEntryPrice(signal);
  const stopPrice = signal.stopLoss;
  const sign = directionSign(signal.direction);
  const adverse = sign * (entryPrice - stopPrice);
  if (!(adverse > 0)) {
    throw new SizingError(`stop ${stopPrice} is not on the adverse side of entry ${entryPrice} for ${signal.direction}`);
  }
  if (!(account.equity > 0)) throw new SizingError(`equity must be positive, got ${account.equity}`);
  const riskAmount = account.equity * cfg.riskFraction;
  const distance = adverse / entryPrice;
  const leverage = resolveLeverage(signal, cfg);
  let raw = riskAmount / (distance * entryPrice);
  const availableMargin = account.availableMargin ?? account.equity;
  let marginCapped = false;
  if ((raw * entryPrice) / leverage > availableMargin) {
    raw = (availableMargin * leverage) / entryPrice;
    marginCapped = true;
  }
  const quantity = floorToStep(raw, cfg.lotSize);
  if (!(quantity > 0)) {
    throw new SizingError(`quantity ${raw} rounds to zero at lot size ${cfg.lotSize}`);
  }
  return {
    entryPrice,
    stopPrice,
    quantity,
    leverage,
    riskAmount: quantity * adverse,
    distance,
    margin: (quantity * entryPrice) / leverage,
    marginCapped,
  };
}

/** Capital lost if the current stop is hit; zero once the stop is at or beyond entry. */
export function atRiskCapital(p: Pick<ExposureView, "direction" | "entryPrice" | "stopPrice" | "quantity">): number {
  const adverse = directionSign(p.direction) * (p.entryPrice - p.stopPrice);
  return Math.max(0, adverse) * p.quantity;
}

/** Margin held by positions not yet closed; a pending entry counts at its requested size. */
export function committedMargin(live: ReadonlyArray<Pick<ExposureView, "entryPrice" | "quantity" | "leverage" | "status">>): number {
  let total = 0;
  for (const p of live) {
    if (p.status === "CLOSED" || !(p.leverage > 0)) continue;
    total += (p.quantity * p.entryPrice) / p.leverage;
  }
  return total;
}

/**
 * Portfolio admission: open count, one position per symbol, correlation,
 * and aggregate at-risk capital against equity.
 */
export function evaluateAdmission(
  candidate: AdmissionCandidate,
  live: ReadonlyArray<ExposureView>,
  cfg: RiskConfig,
  equity: number,
  correlated?: CorrelationPredicate,
): Result<void, PortfolioLimitExceeded> {
  const active = live.filter(p => p.status !== "CLOSED");
  if (active.length >= cfg.maxOpenTrades) {
    return fail(new PortfolioLimitExceeded("MAX_OPEN_TRADES", `${active.length} open positions, max ${cfg.maxOpenTrades}`));
  }
  const symbol = candidate.symbol.toUpperCase();
  if (active.some(p => p.symbol.toUpperCase() === symbol)) {
    return fail(new PortfolioLimitExceeded("DUPLICATE_SYMBOL", `${symbol} already has a live position`));
  }
  if (cfg.correlationProtection && correlated) {
    const peer = active.find(p => correlated(symbol, p.symbol));
    if (peer) {
      return fail(new PortfolioLimitExceeded("CORRELATED", `${symbol} is correlated with open ${peer.symbol}`));
    }
  }
  const current = active.reduce((sum, p) => sum + atRiskCapital(p), 0);
  const ratio = (current + candidate.riskAmount) / equity;
  if (ratio > cfg.maxPortfolioRisk) {
    return fail(new PortfolioLimitExceeded(
      "PORTFOLIO_RISK",
      `portfolio risk ${(ratio * 100).toFixed(2)}% would exceed ${(cfg.maxPortfolioRisk * 100).toFixed(2)}%`,
    ));
  }
  return ok(undefined);
}

/**
 * Targets with their share of the filled quantity. Without a configured split
 * every target gets 1/N; a split shorter than the target list leaves 1/N for
 * the rest. Weights are normalized to sum to 1.
 */
export function deriveTargets(signal: Pick<Signal, "targets">, cfg: Pick<RiskConfig, "targetSplit">): Target[] {
  const n = signal.targets.length;
  const split = cfg.targetSplit;
  const raw = signal.targets.map((_, i) => (split && i < split.length ? split[i] : 1 / n));
  const total = raw.reduce((a, b) => a + b, 0);
  return signal.targets.map((price, index) => ({
    index,
    price,
    weight: raw[index] / total,
    filled: false,
    filledQuantity: 0,
  }));
}

/**
 * Fraction of the *remaining* quantity to close at target `index`:
 * its weight over the weights of every target not yet filled.
 */
export function targetCloseFraction(targets: ReadonlyArray<Target>, index: number): number {
  const pending = targets.filter(t => !t.filled && t.index >= index);
  const own = targets.find(t => t.index === index);
  if (!own || own.filled) return 0;
  if (pending.length <= 1) return 1;
  const sum = pending.reduce((a, t) => a + t.weight, 0);
  return sum > 0 ? own.weight / sum : 1;
}

export function targetReached(direction: Direction, price: number, target: number): boolean {
  return direction === "LONG" ? price >= target : price <= target;
}

export function stopCrossed(direction: Direction, price: number, stop: number): boolean {
  return direction === "LONG" ? price <= stop : price >= stop;
}

/** True when `next` is strictly tighter (more favorable) than `current`. */
export function isFavorableStop(direction: Direction, current: number, next: number): boolean {
  return direction === "LONG" ? next > current : next < current;
}
