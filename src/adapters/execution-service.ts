import BaseService from "./base-service";
import type { CancelResult, EntryOrderRequest, FillReport, OrderGateway } from "../contracts";
import type { CloseCommand } from "../core/position";
import type { OrderSide, PendingClose } from "../types/domain";
import type { IntentKind } from "../application/events/types";
import { getEventBus, type EventBus } from "../application/events/bus";
import {
  EntryFailed,
  GatewayRejectedError,
  GatewayTransientError,
  InconsistentFillReport,
  errorMessage,
  normalizeErrorCode,
} from "../application/errors";
import { logExecution, logTradeError } from "../utils/trade-logger";

const QTY_TOLERANCE = 1e-9;

export type IntentStatus = "QUEUED" | "SUBMITTED" | "CLOSE_PENDING_RETRY" | "FILLED" | "REJECTED";

export interface OrderIntent {
  clientOrderId: string;
  kind: IntentKind;
  positionId: string;
  symbol: string;
  side: OrderSide;
  quantity: number;
  status: IntentStatus;
  orderId?: string;
  /** gateway attempts made so far, across ticks */
  attempts: number;
  createdAt: number;
  updatedAt: number;
  lastError?: string;
  /** set on close intents */
  close?: CloseCommand;
  filledQuantity?: number;
  avgPrice?: number;
}

export type CloseSubmission =
  | { outcome: "submitted"; intent: OrderIntent }
  | { outcome: "rejected"; intent: OrderIntent; error: GatewayRejectedError }
  | { outcome: "retry_pending"; intent: OrderIntent; firstExhaustion: boolean; limitReached: boolean };

export type FillEvent =
  | { kind: "filled"; intent: OrderIntent; quantity: number; price: number }
  | { kind: "rejected"; intent: OrderIntent; reason: string };

export interface ExecutionOptions {
  retryAttempts: number;
  retryBackoffMs: number;
  /** attempts after which an undelivered close escalates to FATAL */
  closeRetryLimit: number;
  now?: () => number;
  bus?: EventBus;
}

const FINAL: ReadonlySet<IntentStatus> = new Set(["FILLED", "REJECTED"]);

/**
 * Order-intent registry in front of the OrderGateway. Every order the engine
 * means to place is tracked by clientOrderId until it is final, so fills can
 * be matched, duplicates ignored and undelivered closes re-sent.
 */
export class ExecutionService extends BaseService {
  private readonly intents = new Map<string, OrderIntent>();
  private readonly byOrderId = new Map<string, string>();
  private readonly now: () => number;
  private readonly busRef?: EventBus;

  constructor(private readonly gateway: OrderGateway, private readonly opts: ExecutionOptions) {
    super();
    this.now = opts.now ?? Date.now;
    this.busRef = opts.bus;
  }

  private get bus(): EventBus { return this.busRef ?? getEventBus(); }

  get(clientOrderId: string): OrderIntent | undefined { return this.intents.get(clientOrderId); }

  byOrder(orderId: string): OrderIntent | undefined {
    const id = this.byOrderId.get(orderId);
    return id ? this.intents.get(id) : undefined;
  }

  list(): OrderIntent[] { return [...this.intents.values()]; }

  /** Intents of a position that still expect a gateway answer. */
  outstanding(positionId: string): OrderIntent[] {
    return this.list().filter(i => i.positionId === positionId && !FINAL.has(i.status));
  }

  hasOutstanding(positionId: string): boolean { return this.outstanding(positionId).length > 0; }

  isRetryPending(positionId: string): boolean {
    return this.list().some(i => i.positionId === positionId && i.status === "CLOSE_PENDING_RETRY");
  }

  pendingRetries(): OrderIntent[] { return this.list().filter(i => i.status === "CLOSE_PENDING_RETRY"); }

  /** Close orders of a position the gateway has not acknowledged yet, in a persistable form. */
  undeliveredCloses(positionId: string): PendingClose[] {
    const out: PendingClose[] = [];
    for (const i of this.list()) {
      if (i.positionId !== positionId || !i.close) continue;
      if (i.status !== "QUEUED" && i.status !== "CLOSE_PENDING_RETRY") continue;
      const { intentId, side, quantity, provisionalPrice, purpose, reason, targetIndex } = i.close;
      out.push({ intentId, side, quantity, provisionalPrice, purpose, reason, targetIndex, attempts: i.attempts });
    }
    return out;
  }

  /** Drops every intent of a position that is already final. */
  forget(positionId: string) {
    for (const i of this.list()) {
      if (i.positionId !== positionId || !FINAL.has(i.status)) continue;
      this.intents.delete(i.clientOrderId);
      if (i.orderId) this.byOrderId.delete(i.orderId);
    }
  }

  private register(intent: OrderIntent) {
    this.intents.set(intent.clientOrderId, intent);
  }

  private markSubmitted(intent: OrderIntent, orderId: string) {
    intent.status = "SUBMITTED";
    intent.orderId = orderId;
    intent.updatedAt = this.now();
    this.byOrderId.set(orderId, intent.clientOrderId);
  }

  /** Places an entry order. Any failure surfaces as EntryFailed. */
  async submitEntry(positionId: string, req: EntryOrderRequest): Promise<OrderIntent> {
    const intent: OrderIntent = {
      clientOrderId: req.clientOrderId,
      kind: "ENTRY",
      positionId,
      symbol: req.symbol,
      side: req.side,
      quantity: req.quantity,
      status: "QUEUED",
      attempts: 0,
      createdAt: this.now(),
      updatedAt: this.now(),
    };
    this.register(intent);
    try {
      const orderId = await this.withRetry(
        () => { intent.attempts++; return this.gateway.placeEntry(req); },
        "placeEntry",
        this.opts.retryAttempts,
        this.opts.retryBackoffMs,
        { category: "EXEC", opType: "ORDER", requestId: req.clientOrderId, positionId, symbol: req.symbol, side: req.side, quantity: req.quantity, price: req.price },
      );
      this.markSubmitted(intent, orderId);
      logExecution("entry submitted", { positionId, symbol: req.symbol, orderId, quantity: req.quantity, price: req.price });
      this.bus.publish({ type: "ORDER_SUBMITTED", ts: this.now(), symbol: req.symbol, positionId, clientOrderId: req.clientOrderId, intent: "ENTRY", side: req.side, quantity: req.quantity, orderId, price: req.price });
      return intent;
    } catch (e) {
      intent.status = "REJECTED";
      intent.lastError = errorMessage(e);
      intent.updatedAt = this.now();
      logTradeError("entry failed", { positionId, symbol: req.symbol, cause: { code: normalizeErrorCode(e), message: errorMessage(e) } });
      this.bus.publish({ type: "ORDER_REJECTED", ts: this.now(), symbol: req.symbol, positionId, clientOrderId: req.clientOrderId, intent: "ENTRY", side: req.side, quantity: req.quantity, reason: errorMessage(e) });
      throw new EntryFailed(`entry for ${req.symbol} failed: ${errorMessage(e)}`, { cause: e });
    }
  }

  /** Registers a close before it is sent. Idempotent per intent id. */
  queueClose(cmd: CloseCommand): OrderIntent {
    let intent = this.intents.get(cmd.intentId);
    if (!intent) {
      intent = {
        clientOrderId: cmd.intentId,
        kind: "CLOSE",
        positionId: cmd.positionId,
        symbol: cmd.symbol,
        side: cmd.side,
        quantity: cmd.quantity,
        status: "QUEUED",
        attempts: 0,
        createdAt: this.now(),
        updatedAt: this.now(),
        close: cmd,
      };
      this.register(intent);
    }
    return intent;
  }

  /** Sends a close; a transient failure parks it as CLOSE_PENDING_RETRY. */
  submitClose(cmd: CloseCommand): Promise<CloseSubmission> {
    return this.attemptClose(this.queueClose(cmd));
  }

  /** Parks a persisted, undelivered close of a rehydrated position for the next retry round. */
  adoptClose(positionId: string, symbol: string, pending: PendingClose) {
    if (this.intents.has(pending.intentId)) return;
    const { attempts, ...close } = pending;
    this.register({
      clientOrderId: pending.intentId,
      kind: "CLOSE",
      positionId,
      symbol,
      side: pending.side,
      quantity: pending.quantity,
      status: "CLOSE_PENDING_RETRY",
      attempts,
      createdAt: this.now(),
      updatedAt: this.now(),
      close: { kind: "CLOSE", positionId, symbol, ...close },
    });
  }

  /** One more delivery round for every parked close. */
  async retryPendingCloses(): Promise<CloseSubmission[]> {
    const out: CloseSubmission[] = [];
    for (const intent of this.pendingRetries()) {
      out.push(await this.attemptClose(intent));
    }
    return out;
  }

  private async attemptClose(intent: OrderIntent): Promise<CloseSubmission> {
    if (FINAL.has(intent.status) || intent.status === "SUBMITTED") return { outcome: "submitted", intent };
    const wasPending = intent.status === "CLOSE_PENDING_RETRY";
    const meta = { category: "EXEC", opType: "CLOSE" as const, requestId: intent.clientOrderId, positionId: intent.positionId, symbol: intent.symbol, side: intent.side, quantity: intent.quantity };
    try {
      const orderId = await this.withRetry(
        () => {
          intent.attempts++;
          return this.gateway.placeMarketClose({ symbol: intent.symbol, side: intent.side, quantity: intent.quantity, clientOrderId: intent.clientOrderId });
        },
        "placeMarketClose",
        this.opts.retryAttempts,
        this.opts.retryBackoffMs,
        meta,
      );
      this.markSubmitted(intent, orderId);
      logExecution("close submitted", { positionId: intent.positionId, symbol: intent.symbol, orderId, quantity: intent.quantity, attempts: intent.attempts });
      this.bus.publish({ type: "ORDER_SUBMITTED", ts: this.now(), symbol: intent.symbol, positionId: intent.positionId, clientOrderId: intent.clientOrderId, intent: "CLOSE", side: intent.side, quantity: intent.quantity, orderId });
      return { outcome: "submitted", intent };
    } catch (e) {
      intent.lastError = errorMessage(e);
      intent.updatedAt = this.now();
      if (e instanceof GatewayTransientError) {
        const before = intent.attempts - e.attempts;
        intent.status = "CLOSE_PENDING_RETRY";
        const limitReached = intent.attempts >= this.opts.closeRetryLimit && before < this.opts.closeRetryLimit;
        this.bus.publish({
          type: "CLOSE_RETRY_PENDING", ts: this.now(), symbol: intent.symbol, positionId: intent.positionId, clientOrderId: intent.clientOrderId,
          intent: "CLOSE", side: intent.side, quantity: intent.quantity, attempts: intent.attempts,
          cause: { code: normalizeErrorCode(e.cause), message: errorMessage(e.cause) },
        });
        return { outcome: "retry_pending", intent, firstExhaustion: !wasPending, limitReached };
      }
      const rejected = e instanceof GatewayRejectedError ? e : new GatewayRejectedError(errorMessage(e), { cause: e });
      intent.status = "REJECTED";
      logTradeError("close rejected", { positionId: intent.positionId, symbol: intent.symbol, cause: { code: normalizeErrorCode(e), message: errorMessage(e) } });
      this.bus.publish({ type: "ORDER_REJECTED", ts: this.now(), symbol: intent.symbol, positionId: intent.positionId, clientOrderId: intent.clientOrderId, intent: "CLOSE", side: intent.side, quantity: intent.quantity, reason: rejected.message });
      return { outcome: "rejected", intent, error: rejected };
    }
  }

  /** Polls every submitted order once. Poll failures leave the order outstanding. */
  async pollOutstanding(): Promise<FillEvent[]> {
    const out: FillEvent[] = [];
    for (const intent of this.list()) {
      if (intent.status !== "SUBMITTED" || !intent.orderId) continue;
      const ev = await this.pollOrder(intent.orderId);
      if (ev) out.push(ev);
    }
    return out;
  }

  /** One poll of one order; undefined while it is pending or when the report is unusable. */
  async pollOrder(orderId: string): Promise<FillEvent | undefined> {
    const intent = this.byOrder(orderId);
    if (!intent || intent.status !== "SUBMITTED") return undefined;
    let report: FillReport;
    try {
      report = await this.withRetry(
        () => this.gateway.pollFill(orderId),
        "pollFill",
        this.opts.retryAttempts,
        this.opts.retryBackoffMs,
        { category: "EXEC", opType: "POLL", requestId: intent.clientOrderId, positionId: intent.positionId, symbol: intent.symbol },
      );
    } catch (e) {
      this.clog("EXEC", "WARN", "poll-failed", { orderId, positionId: intent.positionId, cause: { code: normalizeErrorCode(e), message: errorMessage(e) } });
      return undefined;
    }
    try {
      return this.applyReport(orderId, report);
    } catch (e) {
      if (!(e instanceof InconsistentFillReport)) throw e;
      this.clog("EXEC", "ERROR", "inconsistent-fill", { orderId, positionId: intent.positionId, message: e.message });
      return undefined;
    }
  }

  /** Re-tracks the resting entry order of a rehydrated position. */
  adoptEntry(positionId: string, req: { symbol: string; side: OrderSide; quantity: number; orderId: string; createdAt: number }) {
    if (this.byOrderId.has(req.orderId)) return;
    const intent: OrderIntent = {
      clientOrderId: `${positionId}#entry`,
      kind: "ENTRY",
      positionId,
      symbol: req.symbol,
      side: req.side,
      quantity: req.quantity,
      status: "QUEUED",
      attempts: 0,
      createdAt: req.createdAt,
      updatedAt: this.now(),
    };
    this.register(intent);
    this.markSubmitted(intent, req.orderId);
  }

  /**
   * Applies a fill report to its intent. Unknown orders and over-fills throw
   * InconsistentFillReport; reports for final intents are ignored.
   */
  applyReport(orderId: string, report: FillReport): FillEvent | undefined {
    const intent = this.byOrder(orderId);
    if (!intent) throw new InconsistentFillReport(orderId, `fill report for unknown order ${orderId}`);
    if (FINAL.has(intent.status) || report.status === "pending") return undefined;
    if (report.status === "rejected") {
      intent.status = "REJECTED";
      intent.lastError = report.reason ?? "rejected";
      intent.updatedAt = this.now();
      this.bus.publish({ type: "ORDER_REJECTED", ts: this.now(), symbol: intent.symbol, positionId: intent.positionId, clientOrderId: intent.clientOrderId, intent: intent.kind, side: intent.side, quantity: intent.quantity, orderId, reason: intent.lastError });
      return { kind: "rejected", intent, reason: intent.lastError };
    }
    if (report.quantity > intent.quantity * (1 + QTY_TOLERANCE) + QTY_TOLERANCE) {
      throw new InconsistentFillReport(orderId, `order ${orderId} filled ${report.quantity}, more than the ${intent.quantity} requested`);
    }
    if (report.quantity < 0 || !(report.price > 0 || report.quantity === 0)) {
      throw new InconsistentFillReport(orderId, `order ${orderId} reported quantity ${report.quantity} at price ${report.price}`);
    }
    intent.status = "FILLED";
    intent.filledQuantity = report.quantity;
    intent.avgPrice = report.price;
    intent.updatedAt = this.now();
    logExecution("order filled", { positionId: intent.positionId, symbol: intent.symbol, orderId, kind: intent.kind, quantity: report.quantity, price: report.price });
    this.bus.publish({ type: "ORDER_FILLED", ts: this.now(), symbol: intent.symbol, positionId: intent.positionId, clientOrderId: intent.clientOrderId, intent: intent.kind, side: intent.side, quantity: intent.quantity, orderId, filled: report.quantity, avgPrice: report.price });
    return { kind: "filled", intent, quantity: report.quantity, price: report.price };
  }

  /** Cancels a resting entry order. `ack` finalizes the intent as rejected. */
  async cancelEntry(orderId: string): Promise<CancelResult> {
    const intent = this.byOrder(orderId);
    const result = await this.withRetry(
      () => this.gateway.cancel(orderId),
      "cancel",
      this.opts.retryAttempts,
      this.opts.retryBackoffMs,
      { category: "EXEC", opType: "CANCEL", requestId: intent?.clientOrderId, positionId: intent?.positionId, symbol: intent?.symbol },
    );
    if (result === "ack" && intent && !FINAL.has(intent.status)) {
      intent.status = "REJECTED";
      intent.lastError = "cancelled";
      intent.updatedAt = this.now();
      this.bus.publish({ type: "ORDER_CANCELED", ts: this.now(), symbol: intent.symbol, positionId: intent.positionId, clientOrderId: intent.clientOrderId, intent: intent.kind, side: intent.side, quantity: intent.quantity, orderId });
    }
    return result;
  }
}
