export function columnLetter(n: number): string {
  let s = "";
  let rest = n;
  while (rest > 0) {
    const r = (rest - 1) % 26;
    s = String.fromCharCode(65 + r) + s;
    rest = Math.floor((rest - 1) / 26);
  }
  return s;
}

export function quoteSheet(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

export function a1Range(title: string, fromCol: number, fromRow: number, toCol?: number, toRow?: number): string {
  const start = `${columnLetter(fromCol)}${fromRow}`;
  if (toCol === undefined) return `${quoteSheet(title)}!${start}`;
  const end = `${columnLetter(toCol)}${toRow ?? ""}`;
  return `${quoteSheet(title)}!${start}:${end}`;
}
