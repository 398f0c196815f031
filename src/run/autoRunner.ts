import { env } from "../config/env.js";
import { describeError } from "../logging/logger.js";
import { sleep } from "../transport/backoff.js";
import { createCycleDeps } from "./deps.js";
import { runSummaryOnce } from "./summaryCycle.js";

// ---------------------------------------------------------------------------
// Main: poll forever. Writes are throttled by the gate, not by this loop.
// ---------------------------------------------------------------------------
async function main() {
  const deps = await createCycleDeps(env);
  const { log } = deps;

  log.info("═".repeat(60));
  log.info("SUMMARY AUTO-RUNNER STARTED");
  log.info(`Destination: ${env.SUMMARY_SPREADSHEET_ID}`);
  log.info(`Sources: ${env.OUR_GRID_ID} / ${env.YANDEX_GRID_ID}`);
  log.info(`Loop sleep: ${env.LOOP_SLEEP_SEC}s | min write interval: ${env.SUMMARY_MIN_WRITE_INTERVAL_SEC}s`);
  log.info(`Work window: ${env.WORK_START_HOUR}:00-${env.WORK_END_HOUR}:00 ${env.TZ}`);
  log.info(`State backend: ${env.STATE_BACKEND}`);
  log.info("═".repeat(60));

  for (;;) {
    try {
      await runSummaryOnce(deps);
    } catch (err) {
      // No fallback overwrite anywhere; log and try again next cycle.
      log.error(describeError(err));
    }
    await sleep(env.LOOP_SLEEP_SEC * 1000);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
