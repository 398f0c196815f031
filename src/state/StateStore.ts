import type { SyncState } from "../sync/writeGate.js";

export interface StateStore {
  readSyncState(key: string): Promise<SyncState>;
  writeSyncState(key: string, state: SyncState): Promise<void>;
  readCursor(): Promise<number>;
  writeCursor(position: number): Promise<void>;
  /** Forget one report's state, or everything (cursor included) when no key is given. */
  resetSyncState(key?: string): Promise<number>;
}
