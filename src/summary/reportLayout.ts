import type { Cell, Grid } from "../adapters/TabularStore.js";
import { DIAGNOSTICS } from "./keywords.js";
import { REPORT_WIDTH, SheetAnalysis } from "./types.js";

export const REPORT_HEADERS = [
  "Менеджеры", "Офферты всего", "ИП", "ТОО", "Договор есть", "Акцепт/Оплата",
  "Акцепт %", "Метка nib_sales", "Метка nib", "Метка 0", "Пусто", "Другое", "Красные"
];

export const DEFAULT_GAP_ROWS = 5;

export type ReportSection = {
  title: string;
  analysis: SheetAnalysis;
};

export function fitRow(row: readonly Cell[], width: number = REPORT_WIDTH): Cell[] {
  const out = row.slice(0, width);
  while (out.length < width) out.push("");
  return out;
}

function sectionRows(section: ReportSection): Grid {
  const out: Grid = [fitRow([section.title]), fitRow(REPORT_HEADERS)];
  const { analysis } = section;
  if (analysis.kind === "diagnostic") {
    out.push(fitRow([analysis.message]));
  } else if (analysis.rows.length === 0) {
    out.push(fitRow([DIAGNOSTICS.noData]));
  } else {
    for (const r of analysis.rows) out.push(fitRow(r));
  }
  return out;
}

/** Lays sections out top to bottom with `gapRows` blank rows between them. */
export function buildReportGrid(sections: readonly ReportSection[], opts: { gapRows?: number } = {}): Grid {
  const gap = opts.gapRows ?? DEFAULT_GAP_ROWS;
  const grid: Grid = [];
  sections.forEach((section, i) => {
    if (i > 0) {
      for (let g = 0; g < gap; g++) grid.push(fitRow([]));
    }
    grid.push(...sectionRows(section));
  });
  return grid;
}

export function sectionTitle(label: string, sheetName: string): string {
  return `${label} (${sheetName || "-"})`;
}
