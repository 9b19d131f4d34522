import type {
  CloseReason,
  ClosePurpose,
  Direction,
  ExitReason,
  PendingClose,
  PositionRecord,
  PositionSnapshot,
  PositionStatus,
  RiskConfig,
  Signal,
  StopKind,
  Target,
  TradeOutcome,
} from "../types/domain";
import { closingSide } from "../types/domain";
import {
  directionSign,
  isFavorableStop,
  pnlPct,
  priceMovePct,
  riskRewardRatio,
  stopCrossed,
  targetCloseFraction,
  targetReached,
  unrealizedPnl,
  type SizingPlan,
} from "./risk";
import { floorToStep } from "../utils/toolkit";

const QTY_EPSILON = 1e-12;

export type { ClosePurpose };

export type GatewayCommand =
  | ({ kind: "CLOSE"; positionId: string; symbol: string } & Omit<PendingClose, "attempts">)
  | { kind: "CANCEL_ENTRY"; positionId: string; symbol: string; orderId: string };

export type CloseCommand = Extract<GatewayCommand, { kind: "CLOSE" }>;

export type PositionNotice =
  | { kind: "OPENED" }
  | { kind: "ENTRY_DOWNSIZED"; requested: number; filled: number }
  | { kind: "PARTIAL_CLOSE"; targetIndex: number; fraction: number; quantity: number; price: number }
  | { kind: "PROFIT_TAKEN"; fraction: number; quantity: number; price: number }
  | { kind: "STOP_MOVED"; from: number; to: number; stopKind: StopKind }
  | { kind: "TRAILING_ACTIVATED"; trailDistance: number }
  | { kind: "BREAKEVEN_APPLIED" }
  | { kind: "CLOSED"; outcome: TradeOutcome }
  /** `outcome` is the amended trade result when the fill lands after CLOSED and moves the PnL */
  | { kind: "FILL_RECONCILED"; intentId: string; provisionalPrice: number; fillPrice: number; pnlAdjustment: number; outcome?: TradeOutcome }
  | { kind: "CLOSE_REVERSED"; intentId: string; quantity: number; targetIndex?: number };

export interface Transition {
  commands: GatewayCommand[];
  notices: PositionNotice[];
}

const none = (): Transition => ({ commands: [], notices: [] });

function exitReasonFor(kind: StopKind): ExitReason {
  switch (kind) {
    case "ORIGINAL": return "STOP_LOSS";
    case "BREAKEVEN": return "BREAKEVEN_STOP";
    case "TRAILING": return "TRAILING_STOP";
  }
}

function copyRecord(r: PositionRecord): PositionRecord {
  const copy: PositionRecord = { ...r, targets: r.targets.map(t => ({ ...t })) };
  if (r.partialProfit) copy.partialProfit = { ...r.partialProfit };
  // delivery state belongs to the execution layer
  delete copy.pendingCloses;
  return copy;
}

/**
 * One trade's lifecycle. Every method is a synchronous transition that
 * commits its state change and returns the gateway commands to issue and
 * the notices to publish. CLOSED is terminal: only a late close fill still
 * adjusts its booked PnL.
 */
export class PositionMachine {
  private r: PositionRecord;

  private constructor(record: PositionRecord) {
    this.r = record;
  }

  static create(signal: Signal, plan: SizingPlan, targets: Target[], now: number): PositionMachine {
    const symbol = signal.symbol.toUpperCase();
    return new PositionMachine({
      id: `${symbol}@${now}`,
      symbol,
      direction: signal.direction,
      entryPrice: plan.entryPrice,
      requestedQuantity: plan.quantity,
      initialQuantity: 0,
      quantity: plan.quantity,
      leverage: plan.leverage,
      originalStop: plan.stopPrice,
      stopPrice: plan.stopPrice,
      stopKind: "ORIGINAL",
      breakevenApplied: false,
      targets: targets.map(t => ({ ...t })),
      realizedPnl: 0,
      status: "PENDING_ENTRY",
      createdAt: now,
      updatedAt: now,
      intentSeq: 0,
      confidence: signal.confidence,
    });
  }

  static fromRecord(record: PositionRecord): PositionMachine {
    return new PositionMachine(copyRecord(record));
  }

  get id(): string { return this.r.id; }
  get symbol(): string { return this.r.symbol; }
  get direction(): Direction { return this.r.direction; }
  get status(): PositionStatus { return this.r.status; }
  get entryOrderId(): string | undefined { return this.r.entryOrderId; }
  get createdAt(): number { return this.r.createdAt; }
  get isClosed(): boolean { return this.r.status === "CLOSED"; }
  /** OPEN or PARTIALLY_CLOSED: receives price ticks */
  get isLive(): boolean { return this.r.status === "OPEN" || this.r.status === "PARTIALLY_CLOSED"; }

  toRecord(): PositionRecord {
    return copyRecord(this.r);
  }

  snapshot(closeRetryPending = false, pendingCloses: ReadonlyArray<PendingClose> = []): PositionSnapshot {
    const r = this.r;
    const mark = r.lastPrice ?? r.entryPrice;
    return Object.freeze({
      ...r,
      targets: Object.freeze(r.targets.map(t => Object.freeze({ ...t }))),
      pendingCloses: Object.freeze(pendingCloses.map(p => Object.freeze({ ...p }))),
      unrealizedPnl: r.status === "CLOSED" ? 0 : unrealizedPnl(r.direction, r.entryPrice, mark, r.quantity),
      pnlPct: pnlPct(r.direction, r.entryPrice, mark, r.leverage),
      riskReward: riskRewardRatio(r.direction, r.entryPrice, r.originalStop, r.targets[0]?.price),
      closeRetryPending,
    });
  }

  // --- entry ---

  onEntryPlaced(orderId: string, now: number): Transition {
    if (this.r.status !== "PENDING_ENTRY") return none();
    this.r.entryOrderId = orderId;
    this.r.updatedAt = now;
    return none();
  }

  onEntryFill(filledQuantity: number, avgPrice: number, now: number): Transition {
    if (this.r.status !== "PENDING_ENTRY") return none();
    const r = this.r;
    const qty = Math.min(Math.max(0, filledQuantity), r.requestedQuantity);
    if (qty <= QTY_EPSILON) return this.finish("ENTRY_FAILED", r.entryPrice, now, false);
    const t: Transition = none();
    if (avgPrice > 0) r.entryPrice = avgPrice;
    if (qty < r.requestedQuantity - QTY_EPSILON) {
      t.notices.push({ kind: "ENTRY_DOWNSIZED", requested: r.requestedQuantity, filled: qty });
    }
    r.initialQuantity = qty;
    r.quantity = qty;
    r.status = "OPEN";
    r.updatedAt = now;
    t.notices.push({ kind: "OPENED" });
    const cancelReason = r.entryCancelRequested;
    delete r.entryCancelRequested;
    if (cancelReason === "MANUAL") {
      // a manual close raced the fill: exit right away
      const exit = this.finish("MANUAL", r.lastPrice ?? r.entryPrice, now, true);
      t.commands.push(...exit.commands);
      t.notices.push(...exit.notices);
    }
    return t;
  }

  onEntryRejected(now: number): Transition {
    if (this.r.status !== "PENDING_ENTRY") return none();
    const reason = this.r.entryCancelRequested ?? "ENTRY_FAILED";
    return this.finish(reason, this.r.entryPrice, now, false);
  }

  /** Asks for the entry order to be cancelled once it has waited `entryTimeoutMs`. */
  onEntryTimeout(now: number, cfg: Pick<RiskConfig, "entryTimeoutMs">): Transition {
    const r = this.r;
    if (r.status !== "PENDING_ENTRY" || r.entryCancelRequested || !r.entryOrderId) return none();
    if (now - r.createdAt < cfg.entryTimeoutMs) return none();
    r.entryCancelRequested = "ENTRY_FAILED";
    r.updatedAt = now;
    return { commands: [{ kind: "CANCEL_ENTRY", positionId: r.id, symbol: r.symbol, orderId: r.entryOrderId }], notices: [] };
  }

  // --- price ticks ---

  onTick(price: number, now: number, cfg: RiskConfig): Transition {
    if (!this.isLive || !(price > 0)) return none();
    const r = this.r;
    r.lastPrice = price;
    r.updatedAt = now;

    if (pnlPct(r.direction, r.entryPrice, price, r.leverage) <= -cfg.emergencyStopLoss) {
      return this.finish("EMERGENCY_STOP", price, now, true);
    }
    if (stopCrossed(r.direction, price, r.stopPrice)) {
      return this.finish(exitReasonFor(r.stopKind), price, now, true);
    }
    if (now - r.createdAt >= cfg.maxTradeDurationMs) {
      return this.finish("TIME_EXIT", price, now, true);
    }

    const t = this.fillTargets(price, now, cfg);
    if (this.isClosed) return t;

    const p = this.takePartialProfit(price, now, cfg);
    t.commands.push(...p.commands);
    t.notices.push(...p.notices);

    const s = this.adjustStop(price, cfg);
    t.notices.push(...s.notices);
    return t;
  }

  private fillTargets(price: number, now: number, cfg: RiskConfig): Transition {
    const r = this.r;
    const t = none();
    for (const target of r.targets) {
      if (target.filled) continue;
      if (!targetReached(r.direction, price, target.price)) break;
      const isLast = r.targets.every(o => o.filled || o.index === target.index);
      const fraction = targetCloseFraction(r.targets, target.index);
      // every reached target closes at least one lot
      const qty = isLast ? r.quantity : Math.min(r.quantity, Math.max(cfg.lotSize, floorToStep(r.quantity * fraction, cfg.lotSize)));
      if (isLast || r.quantity - qty <= QTY_EPSILON) {
        target.filled = true;
        target.filledQuantity = r.quantity;
        target.fillPrice = price;
        const exit = this.finish("ALL_TARGETS", price, now, true);
        t.commands.push(...exit.commands);
        t.notices.push(...exit.notices);
        return t;
      }
      target.filled = true;
      target.filledQuantity = qty;
      target.fillPrice = price;
      r.quantity -= qty;
      r.realizedPnl += unrealizedPnl(r.direction, r.entryPrice, price, qty);
      t.commands.push(this.closeCommand(qty, price, "TARGET", "TARGET_HIT", target.index));
      t.notices.push({ kind: "PARTIAL_CLOSE", targetIndex: target.index, fraction, quantity: qty, price });
      r.status = "PARTIALLY_CLOSED";
      if (cfg.moveStopOnTarget) {
        const prev = target.index === 0 ? r.entryPrice : r.targets[target.index - 1].price;
        const kind: StopKind = target.index === 0 ? "BREAKEVEN" : "TRAILING";
        if (target.index === 0) r.breakevenApplied = true;
        const moved = this.moveStop(prev, kind);
        if (moved) t.notices.push(moved);
      }
    }
    return t;
  }

  /** One scale-out once leveraged PnL reaches `partialProfitActivation`. Never closes the last lot. */
  private takePartialProfit(price: number, now: number, cfg: RiskConfig): Transition {
    const r = this.r;
    if (r.partialProfit || !(cfg.partialProfitActivation > 0)) return none();
    if (pnlPct(r.direction, r.entryPrice, price, r.leverage) < cfg.partialProfitActivation) return none();
    const qty = Math.max(cfg.lotSize, floorToStep(r.quantity * cfg.partialProfitFraction, cfg.lotSize));
    if (r.quantity - qty <= QTY_EPSILON) return none();
    r.partialProfit = { quantity: qty, price, at: now };
    r.quantity -= qty;
    r.realizedPnl += unrealizedPnl(r.direction, r.entryPrice, price, qty);
    r.status = "PARTIALLY_CLOSED";
    return {
      commands: [this.closeCommand(qty, price, "PROFIT", "PARTIAL_PROFIT")],
      notices: [{ kind: "PROFIT_TAKEN", fraction: cfg.partialProfitFraction, quantity: qty, price }],
    };
  }

  /** Breakeven comes first, so a trail armed on the same tick only moves the stop past entry. */
  private adjustStop(price: number, cfg: RiskConfig): Transition {
    const r = this.r;
    const t = none();
    const move = priceMovePct(r.direction, r.entryPrice, price);
    if (!r.breakevenApplied && move >= cfg.breakevenThreshold) {
      r.breakevenApplied = true;
      t.notices.push({ kind: "BREAKEVEN_APPLIED" });
      const moved = this.moveStop(r.entryPrice, "BREAKEVEN");
      if (moved) t.notices.push(moved);
    }
    if (r.trailDistance == null && move >= cfg.trailingStopActivation) {
      r.trailDistance = cfg.trailingMode === "ORIGINAL_STOP_DISTANCE"
        ? Math.abs(price - r.originalStop)
        : price * cfg.trailingStopDistance;
      t.notices.push({ kind: "TRAILING_ACTIVATED", trailDistance: r.trailDistance });
    }
    if (r.trailDistance != null) {
      const candidate = price - directionSign(r.direction) * r.trailDistance;
      const moved = this.moveStop(candidate, "TRAILING");
      if (moved) t.notices.push(moved);
    }
    return t;
  }

  /** Stops only ever tighten. Returns the notice when the stop moved. */
  private moveStop(next: number, kind: StopKind): PositionNotice | undefined {
    const r = this.r;
    if (!isFavorableStop(r.direction, r.stopPrice, next)) return undefined;
    const from = r.stopPrice;
    r.stopPrice = next;
    r.stopKind = kind;
    return { kind: "STOP_MOVED", from, to: next, stopKind: kind };
  }

  // --- closing ---

  /** Manual close. A no-op on a closed position. */
  forceClose(price: number | undefined, now: number): Transition {
    const r = this.r;
    if (r.status === "CLOSED") return none();
    if (r.status === "PENDING_ENTRY") {
      if (!r.entryOrderId) return this.finish("MANUAL", r.entryPrice, now, false);
      if (r.entryCancelRequested === "MANUAL") return none();
      r.entryCancelRequested = "MANUAL";
      r.updatedAt = now;
      return { commands: [{ kind: "CANCEL_ENTRY", positionId: r.id, symbol: r.symbol, orderId: r.entryOrderId }], notices: [] };
    }
    const mark = price != null && price > 0 ? price : r.lastPrice ?? r.entryPrice;
    if (price != null && price > 0) r.lastPrice = price;
    return this.finish("MANUAL", mark, now, true);
  }

  /** Reconciles the booked PnL with the actual fill of a close order. */
  onCloseFill(cmd: CloseCommand, filledQuantity: number, fillPrice: number, now: number): Transition {
    const qty = Math.min(filledQuantity, cmd.quantity);
    const pnlAdjustment = directionSign(this.r.direction) * (fillPrice - cmd.provisionalPrice) * qty;
    const notice: PositionNotice = {
      kind: "FILL_RECONCILED",
      intentId: cmd.intentId,
      provisionalPrice: cmd.provisionalPrice,
      fillPrice,
      pnlAdjustment,
    };
    if (this.isClosed) {
      // the trade result is already out; amend it
      if (pnlAdjustment === 0) return { commands: [], notices: [notice] };
      this.r.realizedPnl += pnlAdjustment;
      if (cmd.purpose === "EXIT") this.r.exitPrice = fillPrice;
      return { commands: [], notices: [{ ...notice, outcome: this.outcome() }] };
    }
    this.r.realizedPnl += pnlAdjustment;
    if (cmd.targetIndex != null) {
      const target = this.r.targets[cmd.targetIndex];
      if (target) target.fillPrice = fillPrice;
    }
    if (cmd.purpose === "PROFIT" && this.r.partialProfit) this.r.partialProfit.price = fillPrice;
    this.r.updatedAt = now;
    return { commands: [], notices: [notice] };
  }

  /**
   * Undoes an optimistic partial close the exchange definitively rejected.
   * Full exits are terminal and are left as they are.
   */
  onCloseRejected(cmd: CloseCommand, now: number): Transition {
    const r = this.r;
    if (r.status === "CLOSED" || cmd.purpose === "EXIT") return none();
    if (cmd.purpose === "TARGET") {
      const target = cmd.targetIndex == null ? undefined : r.targets[cmd.targetIndex];
      if (!target || !target.filled) return none();
      target.filled = false;
      target.filledQuantity = 0;
      delete target.fillPrice;
    } else {
      if (!r.partialProfit) return none();
      delete r.partialProfit;
    }
    r.quantity += cmd.quantity;
    r.realizedPnl -= unrealizedPnl(r.direction, r.entryPrice, cmd.provisionalPrice, cmd.quantity);
    r.status = r.targets.some(x => x.filled) || r.partialProfit ? "PARTIALLY_CLOSED" : "OPEN";
    r.updatedAt = now;
    return { commands: [], notices: [{ kind: "CLOSE_REVERSED", intentId: cmd.intentId, quantity: cmd.quantity, targetIndex: cmd.targetIndex }] };
  }

  private closeCommand(quantity: number, price: number, purpose: ClosePurpose, reason: CloseReason, targetIndex?: number): CloseCommand {
    const r = this.r;
    r.intentSeq += 1;
    return {
      kind: "CLOSE",
      intentId: `${r.id}#${r.intentSeq}`,
      positionId: r.id,
      symbol: r.symbol,
      side: closingSide(r.direction),
      quantity,
      provisionalPrice: price,
      purpose,
      reason,
      targetIndex,
    };
  }

  /** Single path into CLOSED: books the remainder, builds the one TradeOutcome. */
  private finish(reason: ExitReason, price: number, now: number, sendOrder: boolean): Transition {
    const r = this.r;
    if (r.status === "CLOSED") return none();
    const t = none();
    const qty = r.status === "PENDING_ENTRY" ? 0 : r.quantity;
    if (qty > QTY_EPSILON) {
      r.realizedPnl += unrealizedPnl(r.direction, r.entryPrice, price, qty);
      if (sendOrder) t.commands.push(this.closeCommand(qty, price, "EXIT", reason));
    }
    r.quantity = 0;
    r.status = "CLOSED";
    r.exitReason = reason;
    r.exitPrice = price;
    r.lastPrice = price;
    r.updatedAt = now;
    r.closedAt = now;
    t.notices.push({ kind: "CLOSED", outcome: this.outcome() });
    return t;
  }

  private outcome(): TradeOutcome {
    const r = this.r;
    const closedAt = r.closedAt ?? r.updatedAt;
    const margin = (r.initialQuantity * r.entryPrice) / r.leverage;
    return {
      positionId: r.id,
      symbol: r.symbol,
      direction: r.direction,
      finalState: "CLOSED",
      exitReason: r.exitReason ?? "MANUAL",
      exitPrice: r.exitPrice ?? r.lastPrice ?? r.entryPrice,
      realizedPnl: r.realizedPnl,
      pnlPct: margin > 0 ? r.realizedPnl / margin : 0,
      durationMs: closedAt - r.createdAt,
      openedAt: r.createdAt,
      closedAt,
      targetsHit: r.targets.filter(x => x.filled).length,
    };
  }
}

/** Strips the derived fields of a snapshot back to its persistable record. */
export function toPositionRecord(s: PositionSnapshot): PositionRecord {
  return {
    id: s.id,
    symbol: s.symbol,
    direction: s.direction,
    entryPrice: s.entryPrice,
    requestedQuantity: s.requestedQuantity,
    initialQuantity: s.initialQuantity,
    quantity: s.quantity,
    leverage: s.leverage,
    originalStop: s.originalStop,
    stopPrice: s.stopPrice,
    stopKind: s.stopKind,
    trailDistance: s.trailDistance,
    breakevenApplied: s.breakevenApplied,
    targets: s.targets.map(t => ({ ...t })),
    realizedPnl: s.realizedPnl,
    status: s.status,
    exitReason: s.exitReason,
    createdAt: s.createdAt,
    updatedAt: s.updatedAt,
    lastPrice: s.lastPrice,
    entryOrderId: s.entryOrderId,
    entryCancelRequested: s.entryCancelRequested,
    intentSeq: s.intentSeq,
    confidence: s.confidence,
    exitPrice: s.exitPrice,
    closedAt: s.closedAt,
    partialProfit: s.partialProfit ? { ...s.partialProfit } : undefined,
    pendingCloses: s.pendingCloses.length ? s.pendingCloses.map(p => ({ ...p })) : undefined,
  };
}
