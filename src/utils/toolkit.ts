/** Return YYYY-MM-DD for given date (defaults to now). */
export function todayStr(d: Date = new Date()): string { return d.toISOString().slice(0, 10); }

/**
 * Sleep helper.
 * - When FAST_CI=1, shorten waits to speed up CI runs. Upper bound is TEST_SLEEP_MS (default 5ms).
 */
export function sleep(ms: number): Promise<void> {
  let delay = Math.max(0, ms);
  if (process.env.FAST_CI === '1') {
    const cap = Math.max(0, Number(process.env.TEST_SLEEP_MS || '5'));
    delay = Math.min(delay, cap);
  }
  return new Promise(r => setTimeout(r, delay));
}

export function toPosInt(val: number | string | undefined | null, def: number): number {
  const n = Number(val);
  if (val != null && val !== '' && Number.isFinite(n) && n >= 0) return Math.floor(n);
  return def;
}

function stepDecimals(step: number): number {
  const s = String(step);
  if (s.includes('e-')) return Number(s.split('e-')[1]);
  const dot = s.indexOf('.');
  return dot < 0 ? 0 : s.length - dot - 1;
}

/** Round down to a multiple of step, trimming float noise (0.1 + 0.2 style). */
export function floorToStep(value: number, step: number): number {
  if (!(step > 0)) return value;
  const units = Math.floor(value / step + 1e-9);
  return Number((units * step).toFixed(stepDecimals(step)));
}

/** Compact duration label: 45m, 3.5h, 2.0d. */
export function formatDuration(ms: number): string {
  const hours = ms / 3_600_000;
  if (hours < 1) return `${Math.floor(ms / 60_000)}m`;
  if (hours < 24) return `${hours.toFixed(1)}h`;
  return `${(hours / 24).toFixed(1)}d`;
}
