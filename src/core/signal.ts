import { z } from 'zod';
import type { Signal } from '../types/domain';
import { fail, ok, type Result } from '../utils/result';
import { InvalidSignalError } from '../application/errors';

const price = z.number().finite().positive();

export const signalSchema = z.object({
  symbol: z.string().trim().min(1).transform(s => s.toUpperCase().replace(/[/_-]/g, '')),
  direction: z.enum(['LONG', 'SHORT']),
  entry: price.optional(),
  entryRange: z.object({ low: price, high: price })
    .refine(r => r.low <= r.high, { message: 'entryRange.low must not exceed entryRange.high' })
    .optional(),
  targets: z.array(price).min(1).max(4),
  stopLoss: price,
  leverage: z.number().finite().min(1).optional(),
  confidence: z.number().min(0).max(100).optional(),
}).refine(s => s.entry != null || s.entryRange != null, { message: 'entry or entryRange is required' });

function entryOf(s: Pick<Signal, 'entry' | 'entryRange'>): number {
  if (s.entry != null) return s.entry;
  if (s.entryRange) return (s.entryRange.low + s.entryRange.high) / 2;
  return NaN;
}

/**
 * Validates a structured signal. Target ordering is checked here; the stop
 * side is left to sizing, which reports it as a SizingError.
 */
export function validateSignal(input: unknown): Result<Signal, InvalidSignalError> {
  const parsed = signalSchema.safeParse(input);
  if (!parsed.success) {
    return fail(new InvalidSignalError(parsed.error.issues.map(i => `${i.path.join('.') || 'signal'}: ${i.message}`)));
  }
  const s = parsed.data;
  const entry = entryOf(s);
  const sign = s.direction === 'LONG' ? 1 : -1;
  const issues: string[] = [];
  let prev = entry;
  s.targets.forEach((t, i) => {
    if ((t - prev) * sign <= 0) {
      issues.push(`targets.${i}: ${t} is not beyond ${i === 0 ? 'entry' : 'the previous target'} ${prev} for ${s.direction}`);
    }
    prev = t;
  });
  if (issues.length) return fail(new InvalidSignalError(issues));
  return ok(s);
}

/** Like validateSignal, but throws. */
export function parseSignal(input: unknown): Signal {
  const r = validateSignal(input);
  if (!r.ok) throw r.error;
  return r.value;
}
