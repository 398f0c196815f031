export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type StateBackend = "file" | "postgres";

export type SummaryConfig = {
  SUMMARY_SPREADSHEET_ID: string;
  OUR_GRID_ID: string;
  YANDEX_GRID_ID: string;

  SUMMARY_SETTINGS_SHEET_NAME: string;
  TZ: string;
  SUMMARY_MIN_WRITE_INTERVAL_SEC: number;
  RED_GAP_ROWS: number;
  WORK_START_HOUR: number;
  WORK_END_HOUR: number;

  MAX_REPORTS_PER_CYCLE: number;
  HOT_REPORT_NAME: string;
  HOT_INTERVAL_SEC: number;
  COLD_REPORT_NAMES: string[];
  COLD_INTERVAL_SEC: number;

  MAX_DATA_ROWS: number;
  REPORT_GAP_ROWS: number;
  REPORT_PREFIX: string;
  SOURCE_A_LABEL: string;
  SOURCE_B_LABEL: string;

  LOOP_SLEEP_SEC: number;
  STATE_BACKEND: StateBackend;
  STATE_DIR: string;
  // Optional: required only by the postgres state backend / BullMQ workers.
  DATABASE_URL: string;
  REDIS_URL: string;

  GCP_SA_JSON: string;
  GOOGLE_APPLICATION_CREDENTIALS: string;
  LOG_FILE: string;
};

type Source = Record<string, string | undefined>;

export function loadConfig(src: Source): SummaryConfig {
  function req(name: string): string {
    const v = src[name];
    if (!v) throw new ConfigError(`Missing env var: ${name}`);
    return v;
  }

  function num(name: string, fallback: string, parse: (s: string) => number = (s) => parseInt(s, 10)): number {
    const raw = src[name] || fallback;
    const v = parse(raw);
    if (!Number.isFinite(v)) throw new ConfigError(`Invalid number in env var ${name}: "${raw}"`);
    return v;
  }

  const backend = (src.STATE_BACKEND || "file").toLowerCase();
  if (backend !== "file" && backend !== "postgres") {
    throw new ConfigError(`Invalid env var STATE_BACKEND: "${backend}" (expected file or postgres)`);
  }

  return {
    SUMMARY_SPREADSHEET_ID: req("SUMMARY_SPREADSHEET_ID"),
    OUR_GRID_ID: req("OUR_GRID_ID"),
    YANDEX_GRID_ID: req("YANDEX_GRID_ID"),

    SUMMARY_SETTINGS_SHEET_NAME: src.SUMMARY_SETTINGS_SHEET_NAME || "Settings",
    TZ: src.TZ || "Asia/Almaty",
    // Poll often, but never write more often than this (and only on change).
    SUMMARY_MIN_WRITE_INTERVAL_SEC: num("SUMMARY_MIN_WRITE_INTERVAL_SEC", "30", parseFloat),
    RED_GAP_ROWS: num("RED_GAP_ROWS", "5"),
    WORK_START_HOUR: num("WORK_START_HOUR", "0"),
    WORK_END_HOUR: num("WORK_END_HOUR", "24"),

    MAX_REPORTS_PER_CYCLE: num("MAX_REPORTS_PER_CYCLE", "0"),
    HOT_REPORT_NAME: (src.HOT_REPORT_NAME || "").trim(),
    HOT_INTERVAL_SEC: num("HOT_INTERVAL_SEC", "15", parseFloat),
    COLD_REPORT_NAMES: (src.COLD_REPORT_NAMES || "").split(",").map((s) => s.trim()).filter(Boolean),
    COLD_INTERVAL_SEC: num("COLD_INTERVAL_SEC", "86400", parseFloat),

    MAX_DATA_ROWS: num("MAX_DATA_ROWS", "1000"),
    REPORT_GAP_ROWS: num("REPORT_GAP_ROWS", "5"),
    REPORT_PREFIX: src.REPORT_PREFIX || "Сводная - ",
    SOURCE_A_LABEL: src.SOURCE_A_LABEL || "НАША СЕТКА",
    SOURCE_B_LABEL: src.SOURCE_B_LABEL || "ЯНДЕКС СЕТКА",

    LOOP_SLEEP_SEC: num("LOOP_SLEEP_SEC", "3", parseFloat),
    STATE_BACKEND: backend,
    STATE_DIR: src.STATE_DIR || "data/state",
    DATABASE_URL: src.DATABASE_URL || "",
    REDIS_URL: src.REDIS_URL || "",

    GCP_SA_JSON: src.GCP_SA_JSON || "",
    GOOGLE_APPLICATION_CREDENTIALS: src.GOOGLE_APPLICATION_CREDENTIALS || "",
    LOG_FILE: src.LOG_FILE || ""
  };
}
