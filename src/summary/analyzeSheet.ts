import type { TabularStore } from "../adapters/TabularStore.js";
import type { SheetTitleCache } from "../adapters/sheetTitles.js";
import { quoteSheet } from "../adapters/a1.js";
import { aggregateRows, DEFAULT_RED_GAP_ROWS } from "./aggregate.js";
import { locateHeader } from "./headerLocator.js";
import { DIAGNOSTICS } from "./keywords.js";
import { resolveSheetTitle } from "./sheetResolver.js";
import type { SheetAnalysis } from "./types.js";

export type AnalyzeOptions = {
  redGapRows?: number;
};

export function analyzeRows(rows: readonly (readonly string[])[], opts: AnalyzeOptions = {}): SheetAnalysis {
  if (rows.length < 2) return { kind: "diagnostic", message: DIAGNOSTICS.sheetEmpty };

  const header = locateHeader(rows);
  if (!header) return { kind: "diagnostic", message: DIAGNOSTICS.managerColumnMissing };

  return { kind: "rows", rows: aggregateRows(rows, header, opts.redGapRows ?? DEFAULT_RED_GAP_ROWS) };
}

/**
 * Resolves `requestedName` in the source spreadsheet and aggregates it.
 * Lookup problems come back as a diagnostic; store errors are thrown.
 */
export async function analyzeSheet(
  store: TabularStore,
  titles: SheetTitleCache,
  storeId: string,
  requestedName: string,
  opts: AnalyzeOptions = {}
): Promise<SheetAnalysis> {
  if (!requestedName.trim()) return { kind: "diagnostic", message: DIAGNOSTICS.noSheetName };

  const realName = resolveSheetTitle(requestedName, await titles.get(storeId));
  if (realName === null) return { kind: "diagnostic", message: DIAGNOSTICS.sheetNotFound(requestedName) };

  const rows = await store.getValues(storeId, quoteSheet(realName));
  return analyzeRows(rows, opts);
}
