import type { ExitReason, OrderSide, PositionSnapshot, StopKind, TradeOutcome } from '../../types/domain';
import type { ErrorCode } from '../errors';

export type IntentKind = 'ENTRY' | 'CLOSE';

export interface EventBaseMeta {
  eventId?: string;
  ts: number;
  symbol: string;
  positionId?: string;
}

export interface OrderMeta extends EventBaseMeta {
  clientOrderId: string;
  intent: IntentKind;
  side: OrderSide;
  quantity: number;
}

export type OrderEvent =
  | ({ type: 'ORDER_SUBMITTED' } & OrderMeta & { orderId: string; price?: number })
  | ({ type: 'ORDER_FILLED' } & OrderMeta & { orderId: string; filled: number; avgPrice: number })
  | ({ type: 'ORDER_REJECTED' } & OrderMeta & { orderId?: string; reason: string })
  | ({ type: 'ORDER_CANCELED' } & OrderMeta & { orderId: string })
  | ({ type: 'CLOSE_RETRY_PENDING' } & OrderMeta & { attempts: number; cause: { code: ErrorCode; message: string } });

export type PositionEvent =
  | ({ type: 'POSITION_OPENED' } & EventBaseMeta & { position: PositionSnapshot })
  | ({ type: 'POSITION_UPDATED' } & EventBaseMeta & { position: PositionSnapshot })
  | ({ type: 'POSITION_PARTIAL_CLOSE' } & EventBaseMeta & {
      position: PositionSnapshot;
      fraction: number;
      reason: string;
      targetIndex: number;
      quantity: number;
      price: number;
    })
  | ({ type: 'POSITION_STOP_MOVED' } & EventBaseMeta & { from: number; to: number; stopKind: StopKind })
  | ({ type: 'POSITION_TRAILING_ACTIVATED' } & EventBaseMeta & { trailDistance: number })
  | ({ type: 'POSITION_BREAKEVEN' } & EventBaseMeta)
  | ({ type: 'POSITION_CLOSED' } & EventBaseMeta & { outcome: TradeOutcome })
  | ({ type: 'POSITION_REMOVED' } & EventBaseMeta)
  | ({ type: 'FILL_RECONCILED' } & EventBaseMeta & {
      clientOrderId: string;
      provisionalPrice: number;
      fillPrice: number;
      pnlAdjustment: number;
      /** amended trade result, when the fill landed after the close was booked */
      outcome?: TradeOutcome;
    });

export type SignalRejectedEvent = {
  type: 'SIGNAL_REJECTED';
  eventId?: string;
  ts: number;
  symbol: string;
  code: ErrorCode;
  reason: string;
};

export type RiskConfigReloadedEvent = {
  type: 'RISK_CONFIG_RELOADED';
  eventId?: string;
  ts: number;
  revision: number;
};

export type AlertSeverity = 'ERROR' | 'FATAL';

/** Needs an operator: a close that cannot be delivered, an unreversible reject. */
export type AlertEvent = {
  type: 'ALERT';
  eventId?: string;
  ts: number;
  severity: AlertSeverity;
  code: ErrorCode | 'CLOSE_REJECTED' | 'CLOSE_RETRY_EXHAUSTED' | 'CLOSE_RETRY_LIMIT';
  symbol?: string;
  positionId?: string;
  message: string;
  exitReason?: ExitReason;
};

export type ErrorEvent = {
  type: 'EVENT/ERROR';
  eventId?: string;
  ts: number;
  code: ErrorCode;
  symbol?: string;
  positionId?: string;
  orderId?: string;
  cause: { code: ErrorCode; message: string };
};

export type AppEvent = OrderEvent | PositionEvent | SignalRejectedEvent | RiskConfigReloadedEvent | AlertEvent | ErrorEvent;

export type AppEventType = AppEvent['type'];
export type EventOf<K extends AppEventType> = Extract<AppEvent, { type: K }>;
