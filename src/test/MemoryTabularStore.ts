import type { Grid, TabularStore } from "../adapters/TabularStore.js";
import { ensureTitle } from "../adapters/sheetTitles.js";

type Rect = { title: string; c1: number; r1: number; c2?: number; r2?: number };

export type StoreCall = { op: "get" | "update" | "clear" | "list" | "add"; storeId: string; range: string };

function colNumber(letters: string): number {
  let n = 0;
  for (const ch of letters) n = n * 26 + (ch.charCodeAt(0) - 64);
  return n;
}

export function parseRange(range: string): Rect {
  const m = /^(?:'((?:[^']|'')*)'|([^!]+))(?:!([A-Z]+)(\d+)(?::([A-Z]+)(\d*))?)?$/.exec(range);
  if (!m) throw new Error(`Bad range: ${range}`);
  const title = m[1] !== undefined ? m[1].replace(/''/g, "'") : m[2];
  if (!m[3]) return { title, c1: 1, r1: 1 };
  return {
    title,
    c1: colNumber(m[3]),
    r1: parseInt(m[4], 10),
    c2: m[5] ? colNumber(m[5]) : undefined,
    r2: m[6] ? parseInt(m[6], 10) : undefined
  };
}

/** In-process spreadsheet service for tests: store id → sheet title → rows. */
export class MemoryTabularStore implements TabularStore {
  readonly calls: StoreCall[] = [];
  private readonly books = new Map<string, Map<string, string[][]>>();
  failWith: ((call: StoreCall) => unknown) | null = null;

  setSheet(storeId: string, title: string, rows: string[][]): void {
    this.book(storeId).set(title, rows.map((r) => [...r]));
  }

  sheet(storeId: string, title: string): string[][] | undefined {
    return this.books.get(storeId)?.get(title);
  }

  private book(storeId: string): Map<string, string[][]> {
    let b = this.books.get(storeId);
    if (!b) {
      b = new Map();
      this.books.set(storeId, b);
    }
    return b;
  }

  private record(call: StoreCall): void {
    this.calls.push(call);
    const err = this.failWith?.(call);
    if (err !== undefined) throw err;
  }

  private rows(storeId: string, title: string): string[][] {
    const rows = this.book(storeId).get(title);
    if (!rows) throw Object.assign(new Error(`Unable to parse range: ${title}`), { status: 400 });
    return rows;
  }

  async getValues(storeId: string, range: string): Promise<string[][]> {
    this.record({ op: "get", storeId, range });
    const r = parseRange(range);
    const rows = this.rows(storeId, r.title);
    const lastRow = r.r2 ?? rows.length;
    const out: string[][] = [];
    for (let i = r.r1 - 1; i < Math.min(lastRow, rows.length); i++) {
      const row = rows[i] ?? [];
      const cells = row.slice(r.c1 - 1, r.c2 ?? row.length);
      while (cells.length && cells[cells.length - 1] === "") cells.pop();
      out.push(cells);
    }
    while (out.length && out[out.length - 1].length === 0) out.pop();
    return out;
  }

  async updateValues(storeId: string, range: string, grid: Grid): Promise<void> {
    this.record({ op: "update", storeId, range });
    const r = parseRange(range);
    const rows = this.rows(storeId, r.title);
    grid.forEach((line, i) => {
      const y = r.r1 - 1 + i;
      while (rows.length <= y) rows.push([]);
      line.forEach((v, j) => {
        const x = r.c1 - 1 + j;
        while (rows[y].length <= x) rows[y].push("");
        rows[y][x] = String(v);
      });
    });
  }

  async clearRange(storeId: string, range: string): Promise<void> {
    this.record({ op: "clear", storeId, range });
    const r = parseRange(range);
    const rows = this.rows(storeId, r.title);
    const lastRow = Math.min(r.r2 ?? rows.length, rows.length);
    for (let y = r.r1 - 1; y < lastRow; y++) {
      const row = rows[y];
      const lastCol = Math.min(r.c2 ?? row.length, row.length);
      for (let x = r.c1 - 1; x < lastCol; x++) row[x] = "";
    }
  }

  async listSheetTitles(storeId: string): Promise<string[]> {
    this.record({ op: "list", storeId, range: "" });
    return [...this.book(storeId).keys()];
  }

  async ensureSheetExists(storeId: string, title: string): Promise<string> {
    return ensureTitle(
      () => this.listSheetTitles(storeId),
      async (t) => {
        this.record({ op: "add", storeId, range: t });
        this.book(storeId).set(t, []);
      },
      title
    );
  }
}
