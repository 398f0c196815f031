import { HEADER_KEYWORDS } from "./keywords.js";
import type { HeaderField, HeaderIndex } from "./types.js";

export type LocatedHeader = {
  index: HeaderIndex;
  /** Position of the header row within the sheet (0 or 1). */
  headerRow: number;
  /** Lower-cased text of the manager header cell. */
  managerLabel: string;
};

export function normalizeHeaders(row: readonly string[]): string[] {
  return row.map((h) => h.toLowerCase().trim());
}

export function findColumn(headers: readonly string[], keywords: readonly string[]): number {
  for (let i = 0; i < headers.length; i++) {
    if (keywords.some((k) => headers[i].includes(k))) return i;
  }
  return -1;
}

export function indexHeaders(row: readonly string[]): HeaderIndex {
  const headers = normalizeHeaders(row);
  const col = (f: HeaderField) => findColumn(headers, HEADER_KEYWORDS[f]);
  return {
    manager: col("manager"),
    legalForm: col("legalForm"),
    contract: col("contract"),
    acceptance: col("acceptance"),
    tag: col("tag")
  };
}

/**
 * Finds the header on row 0, or on row 1 when the sheet has a title row
 * above it. Null when no manager column exists on either.
 */
export function locateHeader(rows: readonly (readonly string[])[]): LocatedHeader | null {
  if (rows.length === 0) return null;

  let headerRow = 0;
  let index = indexHeaders(rows[0]);

  if (index.manager === -1 && rows.length > 2) {
    headerRow = 1;
    index = indexHeaders(rows[1]);
  }
  if (index.manager === -1) return null;

  const managerLabel = normalizeHeaders(rows[headerRow])[index.manager];
  return { index, headerRow, managerLabel };
}
