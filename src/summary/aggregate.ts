import {
  ACCEPT_NEGATIVES,
  CONTRACT_NEGATIVES,
  IP_MARKERS,
  MANAGER_HEADER_LABEL,
  RED_MARKER,
  TOO_MARKER
} from "./keywords.js";
import type { LocatedHeader } from "./headerLocator.js";
import { cellAt, normalizeManagerName, rowText } from "./normalize.js";
import type { ManagerStats, ReportRow } from "./types.js";

export const DEFAULT_RED_GAP_ROWS = 5;

export type TagBucket = "nibSale" | "nib" | "zero" | "emptyTag" | "otherTag";

function emptyStats(): ManagerStats {
  return { total: 0, ip: 0, too: 0, contract: 0, accept: 0, nibSale: 0, nib: 0, zero: 0, emptyTag: 0, otherTag: 0, red: 0 };
}

export function classifyTag(raw: string): TagBucket {
  const tag = raw.toLowerCase().trim();
  if (tag.includes("nib_sale")) return "nibSale";
  if (tag === "nib" || ` ${tag} `.includes(" nib ")) return "nib";
  if (tag === "0" || tag === "0.0") return "zero";
  if (tag === "") return "emptyTag";
  return "otherTag";
}

export function hasContract(raw: string): boolean {
  return !CONTRACT_NEGATIVES.has(raw.toLowerCase().trim());
}

export function isAccepted(raw: string): boolean {
  const v = raw.toLowerCase();
  return v.length > 1 && !ACCEPT_NEGATIVES.some((n) => v.includes(n));
}

export function acceptRatio(s: Pick<ManagerStats, "accept" | "total">): number {
  return s.total > 0 ? s.accept / s.total : 0;
}

export function toReportRow(manager: string, s: ManagerStats): ReportRow {
  return [
    manager, s.total, s.ip, s.too, s.contract, s.accept, acceptRatio(s),
    s.nibSale, s.nib, s.zero, s.emptyTag, s.otherTag, s.red
  ];
}

function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Scans the rows below the header and counts per manager.
 *
 * After `redGapRows` consecutive rows with no manager the scan enters the red
 * zone and never leaves it: every later row only adds to its manager's `red`.
 */
export function aggregateRows(
  rows: readonly (readonly string[])[],
  header: LocatedHeader,
  redGapRows: number = DEFAULT_RED_GAP_ROWS
): ReportRow[] {
  const { index, headerRow, managerLabel } = header;
  const stats = new Map<string, ManagerStats>();
  let inRedZone = false;
  let emptyRun = 0;

  for (let i = headerRow + 1; i < rows.length; i++) {
    const row = rows[i];
    const managerRaw = cellAt(row, index.manager);

    if (managerRaw.trim() === "") {
      emptyRun++;
      if (emptyRun >= redGapRows) inRedZone = true;
      continue;
    }
    emptyRun = 0;

    const manager = normalizeManagerName(managerRaw);
    if (!manager) continue;
    const lower = manager.toLowerCase();
    if (lower === MANAGER_HEADER_LABEL || lower === managerLabel) continue;

    let s = stats.get(manager);
    if (!s) {
      s = emptyStats();
      stats.set(manager, s);
    }

    if (inRedZone) {
      s.red++;
      continue;
    }

    s.total++;

    const text = rowText(row);
    const legalForm = cellAt(row, index.legalForm).toLowerCase() + " " + text;
    if (IP_MARKERS.some((m) => legalForm.includes(m))) s.ip++;
    if (legalForm.includes(TOO_MARKER)) s.too++;

    if (index.contract > -1 && hasContract(cellAt(row, index.contract))) s.contract++;
    if (index.acceptance > -1 && isAccepted(cellAt(row, index.acceptance))) s.accept++;

    s[classifyTag(cellAt(row, index.tag))]++;

    // Rows marked red by hand count as red on top of the normal counters.
    if (text.includes(RED_MARKER)) s.red++;
  }

  return [...stats.entries()]
    .sort(([a], [b]) => compareOrdinal(a, b))
    .map(([manager, s]) => toReportRow(manager, s));
}
