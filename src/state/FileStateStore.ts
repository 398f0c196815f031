import fs from "fs";
import path from "path";
import { EMPTY_SYNC_STATE, SyncState } from "../sync/writeGate.js";
import type { StateStore } from "./StateStore.js";

const STATE_PREFIX = "summary_state_";
const CURSOR_FILE = "summary_cursor.json";

function readJson(p: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(p, "utf8"));
  } catch {
    // Missing or half-written file: treat as no state.
    return null;
  }
}

function writeJson(p: string, value: unknown) {
  const tmp = `${p}.tmp`;
  fs.writeFileSync(tmp, JSON.stringify(value), "utf8");
  fs.renameSync(tmp, p);
}

/** One JSON file per report: {"hash": "<hex>", "last_write_ts": <epoch seconds>}. */
export class FileStateStore implements StateStore {
  constructor(private readonly dir: string) {
    fs.mkdirSync(dir, { recursive: true });
  }

  private statePath(key: string): string {
    return path.join(this.dir, `${STATE_PREFIX}${key}.json`);
  }

  async readSyncState(key: string): Promise<SyncState> {
    const raw = readJson(this.statePath(key));
    if (typeof raw !== "object" || raw === null) return EMPTY_SYNC_STATE;
    const hash = "hash" in raw && typeof raw.hash === "string" ? raw.hash : null;
    const ts = "last_write_ts" in raw && typeof raw.last_write_ts === "number" ? raw.last_write_ts : 0;
    return { hash, lastWriteTs: ts };
  }

  async writeSyncState(key: string, state: SyncState): Promise<void> {
    writeJson(this.statePath(key), { hash: state.hash, last_write_ts: state.lastWriteTs });
  }

  async readCursor(): Promise<number> {
    const raw = readJson(path.join(this.dir, CURSOR_FILE));
    if (typeof raw === "object" && raw !== null && "cursor" in raw && typeof raw.cursor === "number") {
      return Number.isInteger(raw.cursor) && raw.cursor >= 0 ? raw.cursor : 0;
    }
    return 0;
  }

  async writeCursor(position: number): Promise<void> {
    writeJson(path.join(this.dir, CURSOR_FILE), { cursor: position });
  }

  async resetSyncState(key?: string): Promise<number> {
    if (key !== undefined) {
      const p = this.statePath(key);
      if (!fs.existsSync(p)) return 0;
      fs.unlinkSync(p);
      return 1;
    }
    let removed = 0;
    for (const name of fs.readdirSync(this.dir)) {
      if (name.startsWith(STATE_PREFIX) || name === CURSOR_FILE) {
        fs.unlinkSync(path.join(this.dir, name));
        removed++;
      }
    }
    return removed;
  }
}
