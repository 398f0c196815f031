import type { TabularStore } from "./TabularStore.js";

export type SheetTitles = {
  ordered: string[];
  byLower: Map<string, string>;
};

export function indexTitles(titles: string[]): SheetTitles {
  const byLower = new Map<string, string>();
  for (const t of titles) {
    const key = t.toLowerCase();
    if (!byLower.has(key)) byLower.set(key, t);
  }
  return { ordered: [...titles], byLower };
}

/**
 * Per-cycle memo of sheet titles. Build a new one for every cycle so that
 * sheets added or renamed between cycles are picked up.
 */
export class SheetTitleCache {
  private readonly pending = new Map<string, Promise<SheetTitles>>();

  constructor(private readonly store: TabularStore) {}

  get(storeId: string): Promise<SheetTitles> {
    let hit = this.pending.get(storeId);
    if (!hit) {
      hit = this.store.listSheetTitles(storeId).then(indexTitles);
      // Drop failed lookups so a later call in the same cycle can retry.
      hit.catch(() => this.pending.delete(storeId));
      this.pending.set(storeId, hit);
    }
    return hit;
  }

  forget(storeId: string): void {
    this.pending.delete(storeId);
  }
}

/**
 * Create-if-absent with a case-insensitive match. If creation fails because
 * someone else created the sheet in the meantime, the fresh listing wins.
 */
export async function ensureTitle(
  list: () => Promise<string[]>,
  create: (title: string) => Promise<void>,
  desired: string
): Promise<string> {
  const wanted = desired.toLowerCase();
  const existing = (await list()).find((t) => t.toLowerCase() === wanted);
  if (existing !== undefined) return existing;

  try {
    await create(desired);
    return desired;
  } catch (err) {
    const raced = (await list()).find((t) => t.toLowerCase() === wanted);
    if (raced !== undefined) return raced;
    throw err;
  }
}
