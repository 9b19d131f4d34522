import type {
  CancelResult,
  CloseOrderRequest,
  EntryOrderRequest,
  FillReport,
  OrderGateway,
  PriceFeed,
} from "../contracts";
import { log } from "../utils/logger";

type PaperOp = "placeEntry" | "placeMarketClose" | "pollFill" | "cancel";

interface PaperOrder {
  id: string;
  clientOrderId: string;
  kind: "entry" | "close";
  symbol: string;
  quantity: number;
  refPrice?: number;
  status: "open" | "filled" | "canceled" | "rejected";
  filledQuantity: number;
  avgPrice: number;
  polls: number;
  createdAt: number;
}

export interface PaperGatewayOptions {
  /** price source for fills; entries fall back to their reference price */
  feed?: PriceFeed;
  /** polls answered "pending" before an order fills */
  fillAfterPolls?: number;
  /** share of an entry that fills (0-1) */
  entryFillRatio?: number;
}

/**
 * Exchange stand-in for dry runs and tests. Orders live in memory and fill
 * at the feed price once polled; failures can be queued per operation.
 */
export class PaperOrderGateway implements OrderGateway {
  private readonly orders = new Map<string, PaperOrder>();
  private readonly byClientId = new Map<string, string>();
  private readonly failures = new Map<PaperOp, unknown[]>();
  private seq = 0;
  readonly calls: Array<{ op: PaperOp; arg: string }> = [];

  constructor(private readonly opts: PaperGatewayOptions = {}) {}

  /** The next `times` calls of `op` throw `error`. */
  failNext(op: PaperOp, error: unknown, times = 1) {
    const q = this.failures.get(op) ?? [];
    for (let i = 0; i < times; i++) q.push(error);
    this.failures.set(op, q);
  }

  private maybeFail(op: PaperOp) {
    const q = this.failures.get(op);
    if (q && q.length) throw q.shift();
  }

  getOrder(id: string): Readonly<PaperOrder> | undefined { return this.orders.get(id); }
  listOrders(): ReadonlyArray<Readonly<PaperOrder>> { return [...this.orders.values()]; }

  /** Forces the fill of an open order, overriding quantity or price. */
  settle(orderId: string, fill: { quantity?: number; price?: number; rejected?: boolean }) {
    const o = this.orders.get(orderId);
    if (!o || o.status !== "open") return;
    if (fill.rejected) { o.status = "rejected"; return; }
    o.status = "filled";
    o.filledQuantity = fill.quantity ?? o.quantity;
    o.avgPrice = fill.price ?? o.refPrice ?? 0;
  }

  private record(kind: PaperOrder["kind"], clientOrderId: string, symbol: string, quantity: number, refPrice?: number): string {
    const existing = this.byClientId.get(clientOrderId);
    if (existing) return existing;
    const id = `paper-${++this.seq}`;
    this.orders.set(id, { id, clientOrderId, kind, symbol, quantity, refPrice, status: "open", filledQuantity: 0, avgPrice: 0, polls: 0, createdAt: Date.now() });
    this.byClientId.set(clientOrderId, id);
    log("DEBUG", "PAPER", "order", { id, kind, symbol, quantity });
    return id;
  }

  async placeEntry(req: EntryOrderRequest): Promise<string> {
    this.calls.push({ op: "placeEntry", arg: req.clientOrderId });
    this.maybeFail("placeEntry");
    return this.record("entry", req.clientOrderId, req.symbol, req.quantity, req.price);
  }

  async placeMarketClose(req: CloseOrderRequest): Promise<string> {
    this.calls.push({ op: "placeMarketClose", arg: req.clientOrderId });
    this.maybeFail("placeMarketClose");
    return this.record("close", req.clientOrderId, req.symbol, req.quantity);
  }

  async pollFill(orderId: string): Promise<FillReport> {
    this.calls.push({ op: "pollFill", arg: orderId });
    this.maybeFail("pollFill");
    const o = this.orders.get(orderId);
    if (!o) return { status: "rejected", reason: `unknown order ${orderId}` };
    if (o.status === "rejected" || o.status === "canceled") return { status: "rejected", reason: o.status };
    if (o.status === "filled") return { status: "filled", quantity: o.filledQuantity, price: o.avgPrice };
    o.polls++;
    if (o.polls <= (this.opts.fillAfterPolls ?? 0)) return { status: "pending" };
    const market = this.opts.feed ? await this.opts.feed.latestPrice(o.symbol) : undefined;
    const base = o.kind === "entry" ? market ?? o.refPrice : market;
    if (base == null) return { status: "pending" };
    o.avgPrice = base;
    o.filledQuantity = o.kind === "entry" ? o.quantity * Math.min(1, Math.max(0, this.opts.entryFillRatio ?? 1)) : o.quantity;
    o.status = "filled";
    return { status: "filled", quantity: o.filledQuantity, price: o.avgPrice };
  }

  async cancel(orderId: string): Promise<CancelResult> {
    this.calls.push({ op: "cancel", arg: orderId });
    this.maybeFail("cancel");
    const o = this.orders.get(orderId);
    if (!o || o.status !== "open") return "already_final";
    o.status = "canceled";
    return "ack";
  }
}
