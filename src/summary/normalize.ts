/** Cell text, or "" when the row is shorter than `col` or `col` is -1. */
export function cellAt(row: readonly string[], col: number): string {
  if (col < 0 || col >= row.length) return "";
  return row[col] ?? "";
}

export function normalizeManagerName(raw: string): string | null {
  const s = raw.trim();
  if (s.length < 2) return null;
  return s.slice(0, 1).toUpperCase() + s.slice(1).toLowerCase();
}

export function rowText(row: readonly string[]): string {
  return row.map((c) => (c ?? "").toLowerCase()).join(" ");
}
