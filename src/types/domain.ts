export type Direction = 'LONG' | 'SHORT';
export type OrderSide = 'BUY' | 'SELL';

export interface EntryRange { low: number; high: number }

/** Structured trade instruction handed over by the signal parser. */
export interface Signal {
  symbol: string;
  direction: Direction;
  entry?: number;
  entryRange?: EntryRange;
  /** 1-4 prices, ordered away from entry in the favorable direction */
  targets: number[];
  stopLoss: number;
  leverage?: number;
  /** 0-100 */
  confidence?: number;
}

export type TrailingMode = 'ORIGINAL_STOP_DISTANCE' | 'PERCENT';

export interface RiskConfig {
  riskFraction: number;
  maxOpenTrades: number;
  maxPortfolioRisk: number;
  maxLeverage: number;
  defaultLeverage: number;
  trailingStopActivation: number;
  trailingMode: TrailingMode;
  trailingStopDistance: number;
  breakevenThreshold: number;
  emergencyStopLoss: number;
  maxTradeDurationMs: number;
  targetSplit?: number[];
  moveStopOnTarget: boolean;
  lotSize: number;
  entryTimeoutMs: number;
  /** leveraged PnL share that triggers the one-time scale-out; 0 turns it off */
  partialProfitActivation: number;
  /** share of the remaining quantity that scale-out closes */
  partialProfitFraction: number;
  correlationProtection: boolean;
  correlationGroups: string[][];
}

export interface AccountState {
  equity: number;
  /** margin still free for new positions; defaults to equity less the margin of open positions */
  availableMargin?: number;
}

export type PositionStatus = 'PENDING_ENTRY' | 'OPEN' | 'PARTIALLY_CLOSED' | 'CLOSED';
export type StopKind = 'ORIGINAL' | 'BREAKEVEN' | 'TRAILING';
export type ExitReason =
  | 'STOP_LOSS'
  | 'TRAILING_STOP'
  | 'BREAKEVEN_STOP'
  | 'EMERGENCY_STOP'
  | 'TIME_EXIT'
  | 'ALL_TARGETS'
  | 'MANUAL'
  | 'ENTRY_FAILED';

export interface Target {
  index: number;
  price: number;
  /** share of the filled quantity this target takes */
  weight: number;
  filled: boolean;
  filledQuantity: number;
  fillPrice?: number;
}

/** TARGET and PROFIT closes are partial and can be reversed; EXIT ends the position. */
export type ClosePurpose = 'TARGET' | 'PROFIT' | 'EXIT';
export type CloseReason = ExitReason | 'TARGET_HIT' | 'PARTIAL_PROFIT';

/** A close order the exchange has not yet acknowledged. */
export interface PendingClose {
  intentId: string;
  side: OrderSide;
  quantity: number;
  /** price the state change was booked at */
  provisionalPrice: number;
  purpose: ClosePurpose;
  reason: CloseReason;
  targetIndex?: number;
  attempts: number;
}

export interface PartialProfit {
  quantity: number;
  price: number;
  at: number;
}

/** Persistable state of one position. */
export interface PositionRecord {
  id: string;
  symbol: string;
  direction: Direction;
  entryPrice: number;
  requestedQuantity: number;
  initialQuantity: number;
  quantity: number;
  leverage: number;
  originalStop: number;
  stopPrice: number;
  stopKind: StopKind;
  trailDistance?: number;
  breakevenApplied: boolean;
  targets: Target[];
  realizedPnl: number;
  status: PositionStatus;
  exitReason?: ExitReason;
  exitPrice?: number;
  createdAt: number;
  updatedAt: number;
  closedAt?: number;
  lastPrice?: number;
  entryOrderId?: string;
  /** set once a cancel of the entry order has been asked for */
  entryCancelRequested?: 'MANUAL' | 'ENTRY_FAILED';
  /** last close-order sequence number issued for this position */
  intentSeq: number;
  confidence?: number;
  /** set once the one-time profit scale-out has been taken */
  partialProfit?: PartialProfit;
  /** undelivered close orders, re-sent after a restart */
  pendingCloses?: PendingClose[];
}

export interface PositionSnapshot extends Readonly<Omit<PositionRecord, 'targets' | 'pendingCloses'>> {
  readonly targets: ReadonlyArray<Readonly<Target>>;
  readonly pendingCloses: ReadonlyArray<Readonly<PendingClose>>;
  readonly unrealizedPnl: number;
  readonly pnlPct: number;
  readonly riskReward: number;
  /** a close order for this position is waiting to be re-sent */
  readonly closeRetryPending: boolean;
}

export interface TradeOutcome {
  positionId: string;
  symbol: string;
  direction: Direction;
  finalState: 'CLOSED';
  exitReason: ExitReason;
  exitPrice: number;
  realizedPnl: number;
  /** leveraged, relative to the margin committed */
  pnlPct: number;
  durationMs: number;
  openedAt: number;
  closedAt: number;
  targetsHit: number;
}

export function closingSide(direction: Direction): OrderSide {
  return direction === 'LONG' ? 'SELL' : 'BUY';
}

export function openingSide(direction: Direction): OrderSide {
  return direction === 'LONG' ? 'BUY' : 'SELL';
}
