import { env } from "../config/env.js";
import { createCycleDeps } from "../run/deps.js";
import { runSummaryOnce } from "../run/summaryCycle.js";
import type { CycleDeps, CycleResult } from "../run/summaryCycle.js";

let deps: Promise<CycleDeps> | null = null;

export async function summarySyncJob(): Promise<CycleResult> {
  if (!deps) {
    deps = createCycleDeps(env);
    deps.catch(() => {
      deps = null;
    });
  }
  return runSummaryOnce(await deps);
}
