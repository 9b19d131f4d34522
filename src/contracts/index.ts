// Centralized contracts for the engine's collaborators

import type {
  Direction,
  OrderSide,
  PositionRecord,
  PositionSnapshot,
  TradeOutcome,
} from '../types/domain';

// --- Price feed ---
export interface PriceFeed {
  /** Latest mark price, or undefined when the feed cannot supply one right now. */
  latestPrice(symbol: string): Promise<number | undefined>;
}

// --- Order gateway ---
export interface EntryOrderRequest {
  symbol: string;
  direction: Direction;
  side: OrderSide;
  quantity: number;
  /** reference price; market entries may fill elsewhere */
  price: number;
  leverage: number;
  clientOrderId: string;
}

export interface CloseOrderRequest {
  symbol: string;
  side: OrderSide;
  quantity: number;
  clientOrderId: string;
}

export type FillReport =
  | { status: 'pending' }
  | { status: 'filled'; quantity: number; price: number }
  | { status: 'rejected'; reason?: string };

export type CancelResult = 'ack' | 'already_final';

/**
 * Exchange order API. Every call is safe to retry with the same clientOrderId;
 * the engine de-duplicates by the returned order id.
 */
export interface OrderGateway {
  placeEntry(req: EntryOrderRequest): Promise<string>;
  placeMarketClose(req: CloseOrderRequest): Promise<string>;
  pollFill(orderId: string): Promise<FillReport>;
  cancel(orderId: string): Promise<CancelResult>;
}

// --- Ledger / notifier ---
export interface PositionLedger {
  onPositionOpened(position: PositionSnapshot): void;
  onPartialClose(position: PositionSnapshot, fraction: number, reason: string): void;
  onPositionClosed(outcome: TradeOutcome): void;
}

// --- Persistent store ---
export interface PositionRepository {
  loadOpen(): Promise<PositionRecord[]>;
  upsert(record: PositionRecord): Promise<void>;
  remove(id: string): Promise<void>;
  appendHistory(outcome: TradeOutcome): Promise<void>;
  /** replaces the recorded result of a closed trade after a late fill moved its PnL */
  amendHistory(outcome: TradeOutcome): Promise<void>;
  listHistory(limit?: number): Promise<TradeOutcome[]>;
}

// --- Risk ---
/** True when two symbols move together closely enough to count as one exposure. */
export type CorrelationPredicate = (a: string, b: string) => boolean;
