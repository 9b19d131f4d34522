import type { CorrelationPredicate } from '../contracts';

/**
 * Predicate backed by a static grouping table: two different symbols are
 * correlated when some group lists both.
 */
export function staticGroupCorrelation(groups: ReadonlyArray<ReadonlyArray<string>>): CorrelationPredicate {
  const groupOf = new Map<string, Set<number>>();
  groups.forEach((g, idx) => {
    for (const raw of g) {
      const sym = raw.toUpperCase();
      const set = groupOf.get(sym) ?? new Set<number>();
      set.add(idx);
      groupOf.set(sym, set);
    }
  });
  return (a, b) => {
    const A = a.toUpperCase();
    const B = b.toUpperCase();
    if (A === B) return false;
    const ga = groupOf.get(A);
    const gb = groupOf.get(B);
    if (!ga || !gb) return false;
    for (const idx of ga) if (gb.has(idx)) return true;
    return false;
  };
}
