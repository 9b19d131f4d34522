export type Level = "TRACE" | "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";

const LEVELS: Level[] = ["TRACE", "DEBUG", "INFO", "WARN", "ERROR", "FATAL"];

let context: Record<string, string | number | boolean> = {};
const redactKeys = new Set<string>([
  'apikey', 'key', 'secret', 'passphrase', 'signature', 'token', 'refreshtoken',
  'privatekey', 'authorization', 'auth', 'password',
]);

/**
 * Converts a log level string to its corresponding numeric value.
 * TRACE=0, DEBUG=10, INFO=20, WARN=30, ERROR=40, FATAL=50.
 */
function levelValue(l: Level): number {
  switch (l) {
    case "TRACE": return 0;
    case "DEBUG": return 10;
    case "INFO": return 20;
    case "WARN": return 30;
    case "ERROR": return 40;
    case "FATAL": return 50;
  }
}

function isLevel(v: string): v is Level {
  return (LEVELS as string[]).includes(v);
}

/**
 * Current threshold from LOG_LEVEL; anything unset or unknown means INFO.
 */
function currentThreshold(): number {
  const env = (process.env.LOG_LEVEL || "INFO").toUpperCase();
  return levelValue(isLevel(env) ? env : "INFO");
}
function ts(): string { return new Date().toISOString(); }

function redactMeta(meta: unknown): unknown {
  if (meta == null || typeof meta !== 'object') return meta;
  if (meta instanceof Error) return { name: meta.name, message: meta.message };
  if (Array.isArray(meta)) return meta.map(redactMeta);
  const out: Record<string, unknown> = {};
  let redacted = false;
  for (const [k, v] of Object.entries(meta)) {
    if (redactKeys.has(k.toLowerCase())) { out[k] = '***'; redacted = true; continue; }
    out[k] = redactMeta(v);
  }
  if (redacted) out.redacted = true;
  return out;
}

/**
 * Emits a log line if its level is at or above the threshold.
 * LOG_JSON=1 switches to one JSON object per line.
 */
function emit(level: Level, category: string, message: string, meta?: unknown) {
  // TEST_MODE keeps test output to errors unless a level is asked for explicitly
  const lvlEnv = (process.env.LOG_LEVEL || '').toUpperCase();
  if (process.env.TEST_MODE === '1' && !lvlEnv && levelValue(level) < 40) return;
  if (levelValue(level) < currentThreshold()) return;
  const redMeta = redactMeta(meta);
  const sink = level === "ERROR" || level === "FATAL" ? console.error : level === "WARN" ? console.warn : console.log;
  if (process.env.LOG_JSON === "1") {
    sink(JSON.stringify({ ts: ts(), level, category, message, data: redMeta != null ? [redMeta] : [], ...context }));
    return;
  }
  let ctxStr = "";
  if (Object.keys(context).length > 0) {
    ctxStr = " " + Object.entries(context).map(([k, v]) => `[${k}=${String(v)}]`).join(" ");
  }
  const prefix = `[${level}][${category}]`;
  sink(`${prefix} ${message}${ctxStr}`, ...(redMeta != null ? [redMeta] : []));
}

/** Merges keys into the context appended to every line. */
export function setLoggerContext(ctx: Record<string, string | number | boolean>) {
  context = { ...context, ...ctx };
}

/** Clears the whole context, or only the given keys. */
export function clearLoggerContext(keys?: string[]) {
  if (!keys) { context = {}; return; }
  const next = { ...context };
  for (const k of keys) delete next[k];
  context = next;
}

// Category-aware API
export function log(level: Level, category: string, message: string, meta?: unknown) {
  emit(level, category, message, meta);
}
