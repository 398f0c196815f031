import crypto from "crypto";

export type SyncState = {
  hash: string | null;
  /** Epoch seconds of the last successful write; 0 if never written. */
  lastWriteTs: number;
};

export const EMPTY_SYNC_STATE: SyncState = { hash: null, lastWriteTs: 0 };

export type GateDecision =
  | { action: "noop" }
  | { action: "defer"; waitSec: number }
  | { action: "write" };

export function decideWrite(input: {
  fingerprint: string;
  state: SyncState;
  nowSec: number;
  minIntervalSec: number;
}): GateDecision {
  const { fingerprint, state, nowSec, minIntervalSec } = input;
  if (state.hash === fingerprint) return { action: "noop" };
  if (state.hash === null) return { action: "write" };

  const elapsed = nowSec - state.lastWriteTs;
  if (elapsed < minIntervalSec) return { action: "defer", waitSec: minIntervalSec - elapsed };

  return { action: "write" };
}

/**
 * Turns a report name into a storage key: a readable sanitised prefix plus a
 * digest of the exact name, so names that sanitise alike keep separate state.
 */
export function stateKey(reportName: string): string {
  const safe = reportName.replace(/[^\p{L}\p{N}_.-]+/gu, "_");
  const digest = crypto.createHash("sha256").update(reportName, "utf8").digest("hex").slice(0, 12);
  return `${safe}_${digest}`;
}
