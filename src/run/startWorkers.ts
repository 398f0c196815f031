import { Worker } from "bullmq";
import { requireEnv } from "../config/env.js";
import { SUMMARY_QUEUE, createConnection } from "../jobs/queues.js";
import { summarySyncJob } from "../jobs/summarySync.worker.js";

// One cycle at a time: two cycles must never write the same report concurrently.
const worker = new Worker(SUMMARY_QUEUE, summarySyncJob, {
  connection: createConnection(requireEnv("REDIS_URL")),
  concurrency: 1
});

worker.on("failed", (job, err) => {
  console.error(`[ERROR] ${SUMMARY_QUEUE} ${job?.id ?? "?"}: ${err.name}: ${err.message}`);
});

console.log("Workers started.");
