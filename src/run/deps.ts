import { createSheetsClient, GoogleSheetsStore, SheetsCredentials } from "../adapters/GoogleSheetsStore.js";
import type { SummaryConfig } from "../config/summaryConfig.js";
import { ConfigError } from "../config/summaryConfig.js";
import { consoleSink, createLogger, Logger } from "../logging/logger.js";
import { FileStateStore } from "../state/FileStateStore.js";
import { PgStateStore } from "../state/PgStateStore.js";
import type { StateStore } from "../state/StateStore.js";
import type { CycleDeps } from "./summaryCycle.js";

function credentialsFrom(cfg: SummaryConfig): SheetsCredentials {
  // Hosted: full key JSON in GCP_SA_JSON. Local: path in GOOGLE_APPLICATION_CREDENTIALS.
  if (cfg.GCP_SA_JSON) return { kind: "inline", json: cfg.GCP_SA_JSON };
  if (cfg.GOOGLE_APPLICATION_CREDENTIALS) return { kind: "keyFile", path: cfg.GOOGLE_APPLICATION_CREDENTIALS };
  throw new ConfigError("Missing env var: GCP_SA_JSON or GOOGLE_APPLICATION_CREDENTIALS");
}

export async function createStateStore(cfg: SummaryConfig): Promise<StateStore> {
  if (cfg.STATE_BACKEND === "postgres") {
    // Loaded lazily so file-backed runs never need DATABASE_URL.
    const { pool } = await import("../db/pool.js");
    return new PgStateStore({ query: (text, values) => pool.query(text, values) });
  }
  return new FileStateStore(cfg.STATE_DIR);
}

export function createRootLogger(cfg: SummaryConfig): Logger {
  return createLogger(consoleSink(cfg.LOG_FILE || undefined));
}

export async function createCycleDeps(cfg: SummaryConfig, log: Logger = createRootLogger(cfg)): Promise<CycleDeps> {
  const store = new GoogleSheetsStore(createSheetsClient(credentialsFrom(cfg)));
  const state = await createStateStore(cfg);
  return { store, state, config: cfg, log };
}
