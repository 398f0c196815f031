import { EMPTY_SYNC_STATE, SyncState } from "../sync/writeGate.js";
import type { StateStore } from "./StateStore.js";

export type QueryResultLike = { rows: unknown[]; rowCount: number | null };

/** The slice of pg.Pool this store needs. */
export type Queryable = {
  query: (text: string, values?: unknown[]) => Promise<QueryResultLike>;
};

const CURSOR_NAME = "summary";

export class PgStateStore implements StateStore {
  constructor(private readonly db: Queryable) {}

  async readSyncState(key: string): Promise<SyncState> {
    const res = await this.db.query(
      "SELECT hash, last_write_ts FROM summary_sync_state WHERE state_key=$1",
      [key]
    );
    const row = res.rows[0];
    if (typeof row !== "object" || row === null) return EMPTY_SYNC_STATE;
    const hash = "hash" in row && typeof row.hash === "string" ? row.hash : null;
    const ts = "last_write_ts" in row ? Number(row.last_write_ts) : 0;
    return { hash, lastWriteTs: Number.isFinite(ts) ? ts : 0 };
  }

  async writeSyncState(key: string, state: SyncState): Promise<void> {
    await this.db.query(
      `INSERT INTO summary_sync_state(state_key, hash, last_write_ts, updated_at)
       VALUES($1, $2, $3, now())
       ON CONFLICT (state_key)
       DO UPDATE SET hash=EXCLUDED.hash, last_write_ts=EXCLUDED.last_write_ts, updated_at=now()`,
      [key, state.hash, state.lastWriteTs]
    );
  }

  async readCursor(): Promise<number> {
    const res = await this.db.query("SELECT position FROM summary_cursor WHERE name=$1", [CURSOR_NAME]);
    const row = res.rows[0];
    const pos = typeof row === "object" && row !== null && "position" in row ? Number(row.position) : 0;
    return Number.isInteger(pos) && pos >= 0 ? pos : 0;
  }

  async writeCursor(position: number): Promise<void> {
    await this.db.query(
      `INSERT INTO summary_cursor(name, position, updated_at) VALUES($1, $2, now())
       ON CONFLICT (name) DO UPDATE SET position=EXCLUDED.position, updated_at=now()`,
      [CURSOR_NAME, position]
    );
  }

  async resetSyncState(key?: string): Promise<number> {
    if (key !== undefined) {
      const r = await this.db.query("DELETE FROM summary_sync_state WHERE state_key=$1", [key]);
      return r.rowCount ?? 0;
    }
    const r = await this.db.query("DELETE FROM summary_sync_state");
    const c = await this.db.query("DELETE FROM summary_cursor");
    return (r.rowCount ?? 0) + (c.rowCount ?? 0);
  }
}
