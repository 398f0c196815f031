import { env, requireEnv } from "../config/env.js";
import { createConnection, createSummaryQueue, SUMMARY_QUEUE } from "../jobs/queues.js";

async function main() {
  const every = Math.max(1000, Math.round(env.LOOP_SLEEP_SEC * 1000));
  const connection = createConnection(requireEnv("REDIS_URL"));
  const qSummary = createSummaryQueue(connection);

  await qSummary.add(SUMMARY_QUEUE, {}, {
    repeat: { every },
    jobId: SUMMARY_QUEUE,
    removeOnComplete: true,
    removeOnFail: 100
  });
  console.log(`Repeatable ${SUMMARY_QUEUE} job registered (every ${every} ms).`);
  console.log("Start workers with: npm run workers");

  await qSummary.close();
  await connection.quit();
}

main().catch(e => { console.error(e); process.exit(1); });
