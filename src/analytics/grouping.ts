/** Sum of `pick(row)` over rows. */
export function sumBy<T>(rows: readonly T[], pick: (row: T) => number): number {
  let total = 0;
  for (const row of rows) total += pick(row);
  return total;
}

/** Arithmetic mean of `pick(row)`; 0 for no rows. */
export function meanBy<T>(rows: readonly T[], pick: (row: T) => number): number {
  return rows.length === 0 ? 0 : sumBy(rows, pick) / rows.length;
}

/**
 * Fold rows into one accumulator per key. Keys keep first-seen order; callers
 * sort the result themselves.
 */
export function groupInto<T, K, A>(
  rows: readonly T[],
  keyOf: (row: T) => K,
  init: (row: T) => A,
  add: (acc: A, row: T) => void,
): Map<K, A> {
  const groups = new Map<K, A>();
  for (const row of rows) {
    const key = keyOf(row);
    let acc = groups.get(key);
    if (acc === undefined) {
      acc = init(row);
      groups.set(key, acc);
    }
    add(acc, row);
  }
  return groups;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Code-point order, the way a sorted group-by orders its keys. */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Influencer ids ascending; numeric ids compare by value ("2" before "10"). */
export function compareInfluencerIds(a: string, b: string): number {
  return a.localeCompare(b, "en", { numeric: true });
}
