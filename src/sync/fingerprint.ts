import crypto from "crypto";
import type { Grid } from "../adapters/TabularStore.js";

export function fingerprint(grid: Grid): string {
  return crypto.createHash("sha256").update(JSON.stringify(grid), "utf8").digest("hex");
}
