import fs from "fs";
import path from "path";
import { z } from "zod";
import type { PositionRepository } from "../contracts";
import type { PositionRecord, TradeOutcome } from "../types/domain";
import { log } from "../utils/logger";

const direction = z.enum(["LONG", "SHORT"]);
const exitReason = z.enum(["STOP_LOSS", "TRAILING_STOP", "BREAKEVEN_STOP", "EMERGENCY_STOP", "TIME_EXIT", "ALL_TARGETS", "MANUAL", "ENTRY_FAILED"]);

const targetSchema = z.object({
    index: z.number().int().min(0),
    price: z.number(),
    weight: z.number(),
    filled: z.boolean(),
    filledQuantity: z.number(),
    fillPrice: z.number().optional(),
});

const pendingCloseSchema = z.object({
    intentId: z.string(),
    side: z.enum(["BUY", "SELL"]),
    quantity: z.number().positive(),
    provisionalPrice: z.number(),
    purpose: z.enum(["TARGET", "PROFIT", "EXIT"]),
    reason: z.union([exitReason, z.literal("TARGET_HIT"), z.literal("PARTIAL_PROFIT")]),
    targetIndex: z.number().int().min(0).optional(),
    attempts: z.number().int().min(0),
});

const recordSchema = z.object({
    id: z.string(),
    symbol: z.string(),
    direction,
    entryPrice: z.number(),
    requestedQuantity: z.number(),
    initialQuantity: z.number(),
    quantity: z.number(),
    leverage: z.number(),
    originalStop: z.number(),
    stopPrice: z.number(),
    stopKind: z.enum(["ORIGINAL", "BREAKEVEN", "TRAILING"]),
    trailDistance: z.number().optional(),
    breakevenApplied: z.boolean(),
    targets: z.array(targetSchema),
    realizedPnl: z.number(),
    status: z.enum(["PENDING_ENTRY", "OPEN", "PARTIALLY_CLOSED", "CLOSED"]),
    exitReason: exitReason.optional(),
    exitPrice: z.number().optional(),
    createdAt: z.number(),
    updatedAt: z.number(),
    closedAt: z.number().optional(),
    lastPrice: z.number().optional(),
    entryOrderId: z.string().optional(),
    entryCancelRequested: z.enum(["MANUAL", "ENTRY_FAILED"]).optional(),
    intentSeq: z.number().int().min(0).default(0),
    confidence: z.number().optional(),
    partialProfit: z.object({ quantity: z.number(), price: z.number(), at: z.number() }).optional(),
    pendingCloses: z.array(pendingCloseSchema).optional(),
});

const outcomeSchema = z.object({
    positionId: z.string(),
    symbol: z.string(),
    direction,
    finalState: z.literal("CLOSED"),
    exitReason,
    exitPrice: z.number(),
    realizedPnl: z.number(),
    pnlPct: z.number(),
    durationMs: z.number(),
    openedAt: z.number(),
    closedAt: z.number(),
    targetsHit: z.number(),
});

const fileSchema = z.object({ positions: z.record(recordSchema) });

/** Live positions, and closed ones whose close orders were never delivered. */
function needsRehydration(r: PositionRecord): boolean {
    return r.status !== "CLOSED" || (r.pendingCloses?.length ?? 0) > 0;
}

/**
 * JSON-file repository: live positions in positions.json (rewritten
 * atomically through a tmp file), closed trades appended to history.jsonl.
 */
export class FilePositionStore implements PositionRepository {
    private readonly file: string;
    private readonly historyFile: string;

    constructor(private readonly dir: string) {
        this.file = path.join(dir, "positions.json");
        this.historyFile = path.join(dir, "history.jsonl");
    }

    private ensureDir() { fs.mkdirSync(this.dir, { recursive: true }); }

    private readAll(): Record<string, PositionRecord> {
        if (!fs.existsSync(this.file)) return {};
        const raw = fs.readFileSync(this.file, "utf8");
        let json: unknown;
        try {
            json = JSON.parse(raw || "{}");
        } catch (e) {
            this.quarantine(e);
            return {};
        }
        const parsed = fileSchema.safeParse(json);
        if (!parsed.success) {
            this.quarantine(parsed.error);
            return {};
        }
        return parsed.data.positions;
    }

    /** Moves an unreadable file aside so the next write starts clean. */
    private quarantine(cause: unknown) {
        const aside = `${this.file}.corrupt-${Date.now()}`;
        fs.renameSync(this.file, aside);
        log("ERROR", "STORE", "unreadable position file moved aside", { file: aside, error: cause });
    }

    private writeAll(positions: Record<string, PositionRecord>) {
        this.ensureDir();
        const tmp = `${this.file}.tmp`;
        fs.writeFileSync(tmp, JSON.stringify({ positions }, null, 2), "utf8");
        fs.renameSync(tmp, this.file);
    }

    async loadOpen(): Promise<PositionRecord[]> {
        return Object.values(this.readAll()).filter(needsRehydration);
    }

    async upsert(record: PositionRecord): Promise<void> {
        const all = this.readAll();
        all[record.id] = record;
        this.writeAll(all);
    }

    async remove(id: string): Promise<void> {
        const all = this.readAll();
        if (!(id in all)) return;
        delete all[id];
        this.writeAll(all);
    }

    async appendHistory(outcome: TradeOutcome): Promise<void> {
        this.ensureDir();
        fs.appendFileSync(this.historyFile, JSON.stringify(outcome) + "\n");
    }

    /** Replaces the newest history row of the same position. */
    async amendHistory(outcome: TradeOutcome): Promise<void> {
        const rows = await this.listHistory();
        const at = rows.map(r => r.positionId).lastIndexOf(outcome.positionId);
        if (at < 0) {
            await this.appendHistory(outcome);
            return;
        }
        rows[at] = outcome;
        this.ensureDir();
        const tmp = `${this.historyFile}.tmp`;
        fs.writeFileSync(tmp, rows.map(r => JSON.stringify(r) + "\n").join(""), "utf8");
        fs.renameSync(tmp, this.historyFile);
    }

    /** Most recent last; `limit` keeps the newest entries. */
    async listHistory(limit?: number): Promise<TradeOutcome[]> {
        if (!fs.existsSync(this.historyFile)) return [];
        const out: TradeOutcome[] = [];
        for (const line of fs.readFileSync(this.historyFile, "utf8").split("\n")) {
            if (!line.trim()) continue;
            let json: unknown;
            try { json = JSON.parse(line); } catch { log("WARN", "STORE", "skipped malformed history line"); continue; }
            const parsed = outcomeSchema.safeParse(json);
            if (parsed.success) out.push(parsed.data);
        }
        return limit != null && limit >= 0 ? out.slice(Math.max(0, out.length - limit)) : out;
    }
}

/** Repository kept in memory; used by dry runs and tests. */
export class InMemoryPositionStore implements PositionRepository {
    private readonly positions = new Map<string, PositionRecord>();
    private readonly history: TradeOutcome[] = [];

    async loadOpen(): Promise<PositionRecord[]> {
        return [...this.positions.values()].filter(needsRehydration).map(r => structuredClone(r));
    }
    async upsert(record: PositionRecord): Promise<void> { this.positions.set(record.id, structuredClone(record)); }
    async remove(id: string): Promise<void> { this.positions.delete(id); }
    async appendHistory(outcome: TradeOutcome): Promise<void> { this.history.push({ ...outcome }); }
    async amendHistory(outcome: TradeOutcome): Promise<void> {
        const at = this.history.map(r => r.positionId).lastIndexOf(outcome.positionId);
        if (at < 0) this.history.push({ ...outcome });
        else this.history[at] = { ...outcome };
    }
    async listHistory(limit?: number): Promise<TradeOutcome[]> {
        return limit != null && limit >= 0 ? this.history.slice(Math.max(0, this.history.length - limit)) : [...this.history];
    }
}
