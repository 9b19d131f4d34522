import fs from "fs";
import path from "path";
import { log } from "./logger";
import { todayStr } from "./toolkit";

function getLogDir(){
    return process.env.LOG_DIR || path.resolve(process.cwd(), "logs");
}
function dailyLogPath(dateStr?: string) {
    return path.join(getLogDir(), `trades-${dateStr || todayStr()}.log`);
}

export type TradeLogType = "SIGNAL" | "ORDER" | "EXECUTION" | "CLOSE" | "ERROR" | "INFO";

export interface TradeLogEntry {
    ts: string;           // ISO timestamp
    type: TradeLogType;
    message: string;
    data?: unknown;
}

/** Appends one JSON line to today's trade log. Write failures are logged, not thrown. */
export function logTrade(entry: TradeLogEntry) {
    if (process.env.TRADE_LOG_DISABLED === '1') return;
    try {
        const p = dailyLogPath();
        fs.mkdirSync(path.dirname(p), { recursive: true });
        fs.appendFileSync(p, JSON.stringify(entry) + "\n");
    } catch (err) {
        log('ERROR', 'TRADE-LOG', 'write failed', err);
    }
}

const entry = (type: TradeLogType) => (message: string, data?: unknown) =>
    logTrade({ ts: new Date().toISOString(), type, message, data });

export const logSignal = entry("SIGNAL");
export const logOrder = entry("ORDER");
export const logExecution = entry("EXECUTION");
export const logClose = entry("CLOSE");
export const logTradeError = entry("ERROR");
export const logTradeInfo = entry("INFO");
