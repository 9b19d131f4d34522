import type { PositionMachine } from "./position";
import type { ExposureView } from "./risk";

/**
 * Live positions keyed by id. `version` increases on every insert or removal
 * so readers can tell whether a listing is stale.
 */
export class PositionBook {
  private readonly byId = new Map<string, PositionMachine>();
  private _version = 0;

  get version(): number { return this._version; }
  get size(): number { return this.byId.size; }

  add(machine: PositionMachine): void {
    if (this.byId.has(machine.id)) throw new Error(`position ${machine.id} already tracked`);
    this.byId.set(machine.id, machine);
    this._version++;
  }

  get(id: string): PositionMachine | undefined {
    return this.byId.get(id);
  }

  /** The non-closed position for `symbol`, if any. */
  findBySymbol(symbol: string): PositionMachine | undefined {
    const wanted = symbol.toUpperCase();
    for (const m of this.byId.values()) {
      if (m.symbol === wanted && !m.isClosed) return m;
    }
    return undefined;
  }

  remove(id: string): boolean {
    const removed = this.byId.delete(id);
    if (removed) this._version++;
    return removed;
  }

  all(): PositionMachine[] {
    return [...this.byId.values()];
  }

  exposures(): ExposureView[] {
    return this.all()
      .filter(m => !m.isClosed)
      .map(m => {
        const r = m.toRecord();
        return {
          symbol: r.symbol,
          direction: r.direction,
          entryPrice: r.entryPrice,
          stopPrice: r.stopPrice,
          quantity: r.quantity,
          leverage: r.leverage,
          status: r.status,
        };
      });
  }

  clear(): void {
    this.byId.clear();
    this._version++;
  }
}
