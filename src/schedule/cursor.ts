export type Selection<T> = {
  selected: T[];
  nextCursor: number;
};

/**
 * Round-robin slice of `items` starting at `cursor`. A non-positive `maxPerCycle`,
 * or one covering the whole list, selects everything.
 */
export function selectRoundRobin<T>(items: readonly T[], cursor: number, maxPerCycle: number): Selection<T> {
  const n = items.length;
  if (n === 0) return { selected: [], nextCursor: 0 };

  const start = ((cursor % n) + n) % n;
  if (maxPerCycle <= 0 || maxPerCycle >= n) {
    return { selected: [...items], nextCursor: start };
  }

  const selected: T[] = [];
  for (let k = 0; k < maxPerCycle; k++) selected.push(items[(start + k) % n]);
  return { selected, nextCursor: (start + maxPerCycle) % n };
}
