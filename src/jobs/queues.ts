import { Queue } from "bullmq";
import { Redis, RedisOptions } from "ioredis";

export const SUMMARY_QUEUE = "summary_sync";

// BullMQ workers need maxRetriesPerRequest: null on their connection.
export const createConnection = (url: string, opts: RedisOptions = {}) =>
  new Redis(url, { ...opts, maxRetriesPerRequest: null });

export const createSummaryQueue = (connection: Redis) => new Queue(SUMMARY_QUEUE, { connection });
