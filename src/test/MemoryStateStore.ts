import type { StateStore } from "../state/StateStore.js";
import { EMPTY_SYNC_STATE, SyncState } from "../sync/writeGate.js";

export class MemoryStateStore implements StateStore {
  readonly states = new Map<string, SyncState>();
  cursor = 0;

  async readSyncState(key: string): Promise<SyncState> {
    return this.states.get(key) ?? EMPTY_SYNC_STATE;
  }

  async writeSyncState(key: string, state: SyncState): Promise<void> {
    this.states.set(key, { ...state });
  }

  async readCursor(): Promise<number> {
    return this.cursor;
  }

  async writeCursor(position: number): Promise<void> {
    this.cursor = position;
  }

  async resetSyncState(key?: string): Promise<number> {
    if (key !== undefined) return this.states.delete(key) ? 1 : 0;
    const n = this.states.size;
    this.states.clear();
    this.cursor = 0;
    return n;
  }
}
