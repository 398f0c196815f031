import type { SheetTitles } from "../adapters/sheetTitles.js";

function squash(s: string): string {
  return s.toLowerCase().replace(/\s+/g, "");
}

/**
 * Maps a name typed into Settings to a real sheet title: exact, then
 * case-insensitive exact, then whitespace-blind substring either way.
 * Returns null when nothing matches.
 */
export function resolveSheetTitle(requested: string, titles: SheetTitles): string | null {
  const search = requested.trim();
  if (!search) return null;

  if (titles.ordered.includes(search)) return search;

  const folded = titles.byLower.get(search.toLowerCase());
  if (folded !== undefined) return folded;

  const needle = squash(search);
  for (const title of titles.ordered) {
    const hay = squash(title);
    if (!hay) continue;
    if (hay.includes(needle) || needle.includes(hay)) return title;
  }
  return null;
}
