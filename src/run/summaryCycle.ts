import { v4 as uuidv4 } from "uuid";
import type { TabularStore } from "../adapters/TabularStore.js";
import { SheetTitleCache } from "../adapters/sheetTitles.js";
import { a1Range, quoteSheet } from "../adapters/a1.js";
import type { SummaryConfig } from "../config/summaryConfig.js";
import type { Logger } from "../logging/logger.js";
import { selectRoundRobin } from "../schedule/cursor.js";
import { createRefreshPolicy } from "../schedule/refreshPolicy.js";
import { formatStamp, inWorkWindow } from "../schedule/workWindow.js";
import type { StateStore } from "../state/StateStore.js";
import { analyzeSheet } from "../summary/analyzeSheet.js";
import { buildReportGrid, sectionTitle } from "../summary/reportLayout.js";
import { REPORT_WIDTH } from "../summary/types.js";
import { fingerprint } from "../sync/fingerprint.js";
import { decideWrite, stateKey } from "../sync/writeGate.js";

export type CycleConfig = Pick<
  SummaryConfig,
  | "SUMMARY_SPREADSHEET_ID"
  | "OUR_GRID_ID"
  | "YANDEX_GRID_ID"
  | "SUMMARY_SETTINGS_SHEET_NAME"
  | "TZ"
  | "SUMMARY_MIN_WRITE_INTERVAL_SEC"
  | "RED_GAP_ROWS"
  | "WORK_START_HOUR"
  | "WORK_END_HOUR"
  | "MAX_REPORTS_PER_CYCLE"
  | "HOT_REPORT_NAME"
  | "HOT_INTERVAL_SEC"
  | "COLD_REPORT_NAMES"
  | "COLD_INTERVAL_SEC"
  | "MAX_DATA_ROWS"
  | "REPORT_GAP_ROWS"
  | "REPORT_PREFIX"
  | "SOURCE_A_LABEL"
  | "SOURCE_B_LABEL"
>;

export type CycleDeps = {
  store: TabularStore;
  state: StateStore;
  config: CycleConfig;
  log: Logger;
};

export type ReportPair = {
  ourName: string;
  yandexName: string;
  rawName: string;
  reportName: string;
};

export type ReportOutcome = "written" | "noop" | "deferred" | "skipped";

export type CycleResult =
  | { skipped: "outside_work_window" | "no_settings"; reports: [] }
  | { skipped: null; reports: { reportName: string; outcome: ReportOutcome }[] };

export function readPairs(settings: readonly (readonly string[])[], prefix: string): ReportPair[] {
  const pairs: ReportPair[] = [];
  for (const row of settings) {
    const ourName = (row[0] ?? "").trim();
    const yandexName = (row[1] ?? "").trim();
    if (!ourName && !yandexName) continue;
    const rawName = ourName || yandexName;
    pairs.push({ ourName, yandexName, rawName, reportName: `${prefix}${rawName}` });
  }
  return pairs;
}

async function syncReport(
  deps: CycleDeps,
  titles: SheetTitleCache,
  pair: ReportPair,
  minIntervalSec: number,
  now: () => Date
): Promise<ReportOutcome> {
  const { store, state, config, log } = deps;
  const analyzeOpts = { redGapRows: config.RED_GAP_ROWS };

  // Both sources are read before anything is written.
  const ours = await analyzeSheet(store, titles, config.OUR_GRID_ID, pair.ourName, analyzeOpts);
  const yandex = await analyzeSheet(store, titles, config.YANDEX_GRID_ID, pair.yandexName, analyzeOpts);

  const grid = buildReportGrid(
    [
      { title: sectionTitle(config.SOURCE_A_LABEL, pair.ourName), analysis: ours },
      { title: sectionTitle(config.SOURCE_B_LABEL, pair.yandexName), analysis: yandex }
    ],
    { gapRows: config.REPORT_GAP_ROWS }
  );

  const hash = fingerprint(grid);
  const key = stateKey(pair.reportName);
  const prev = await state.readSyncState(key);
  const decision = decideWrite({
    fingerprint: hash,
    state: prev,
    nowSec: now().getTime() / 1000,
    minIntervalSec
  });

  if (decision.action === "noop") {
    log.info(`SUMMARY NO-CHANGE: ${pair.reportName}`);
    return "noop";
  }
  if (decision.action === "defer") {
    log.info(`SUMMARY THROTTLE: ${pair.reportName} (${Math.ceil(decision.waitSec)}s left)`);
    return "deferred";
  }

  const dest = config.SUMMARY_SPREADSHEET_ID;
  const title = await store.ensureSheetExists(dest, pair.reportName);
  const rows = grid.length;

  await store.updateValues(dest, a1Range(title, 1, 1, REPORT_WIDTH, rows), grid);
  if (rows < config.MAX_DATA_ROWS) {
    // Clear leftovers of a longer previous report, inside the report columns only.
    await store.clearRange(dest, a1Range(title, 1, rows + 1, REPORT_WIDTH, config.MAX_DATA_ROWS));
  }
  await store.updateValues(dest, a1Range(title, REPORT_WIDTH + 1, 1), [[`Обновлено: ${formatStamp(now(), config.TZ)}`]]);

  await state.writeSyncState(key, { hash, lastWriteTs: now().getTime() / 1000 });
  log.ok(`SUMMARY SYNC: ${pair.reportName} (${rows}x${REPORT_WIDTH})`);
  return "written";
}

/**
 * One pass: read Settings, pick this cycle's reports, rebuild each one and
 * write it when the gate allows. Errors propagate to the caller.
 */
export async function runSummaryOnce(deps: CycleDeps, now: () => Date = () => new Date()): Promise<CycleResult> {
  const { store, state, config } = deps;
  const log = deps.log.child(uuidv4().slice(0, 8));

  if (!inWorkWindow(now(), config.TZ, config.WORK_START_HOUR, config.WORK_END_HOUR)) {
    log.info("SUMMARY outside work window, skipping");
    return { skipped: "outside_work_window", reports: [] };
  }

  const settings = await store.getValues(
    config.SUMMARY_SPREADSHEET_ID,
    `${quoteSheet(config.SUMMARY_SETTINGS_SHEET_NAME)}!A2:B`
  );
  const pairs = readPairs(settings, config.REPORT_PREFIX);
  if (pairs.length === 0) {
    log.warn(`SUMMARY Settings is empty (${config.SUMMARY_SETTINGS_SHEET_NAME}!A2:B)`);
    return { skipped: "no_settings", reports: [] };
  }

  const cursor = await state.readCursor();
  const { selected, nextCursor } = selectRoundRobin(pairs, cursor, config.MAX_REPORTS_PER_CYCLE);
  if (nextCursor !== cursor) await state.writeCursor(nextCursor);

  const policy = createRefreshPolicy({
    defaultIntervalSec: config.SUMMARY_MIN_WRITE_INTERVAL_SEC,
    hotName: config.HOT_REPORT_NAME,
    hotIntervalSec: config.HOT_INTERVAL_SEC,
    coldNames: config.COLD_REPORT_NAMES,
    coldIntervalSec: config.COLD_INTERVAL_SEC
  });

  const titles = new SheetTitleCache(store);
  const reports: { reportName: string; outcome: ReportOutcome }[] = [];

  for (const pair of selected) {
    const interval = policy.intervalFor(pair);
    if (interval === null) {
      reports.push({ reportName: pair.reportName, outcome: "skipped" });
      continue;
    }
    const outcome = await syncReport({ ...deps, log }, titles, pair, interval, now);
    reports.push({ reportName: pair.reportName, outcome });
  }

  return { skipped: null, reports };
}
