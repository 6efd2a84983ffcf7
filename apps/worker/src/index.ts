import { Queue, Worker } from "bullmq";
import { Redis } from "ioredis";
import { Pool } from "pg";
import { DEFAULT_BULLMQ_JOB_OPTIONS, REPLY_JOB_NAMES, type ReplyOutcomePayload } from "@reply-triage/shared";
import { loadWorkerConfig } from "./config.js";
import { MemoryCampaignDirectory, PostgresCampaignDirectory } from "./crm/campaign-directory.js";
import { QueueOutcomeSink } from "./crm/outcome-sink.js";
import { createReplyJobHandlers } from "./jobs.js";
import { createLogger, toLogError } from "./logging.js";
import { BullMqDlqStore, type DlqItemPayload } from "./pipeline/dlq.js";
import {
  REPLY_QUEUE_NAMES,
  type CalibrationJobPayload,
  type DlqReplayJobPayload,
  type FeedbackJobPayload,
  type LeadArchiveJobPayload,
  type ReplyBatchJobPayload
} from "./pipeline/types.js";
import { createReplyRuntime } from "./runtime.js";
import { MemoryReplyStore } from "./store/memory-store.js";
import { PostgresReplyStore } from "./store/postgres-store.js";

const config = loadWorkerConfig();
const logger = createLogger({ name: config.workerName, level: config.logLevel });

if (!config.redisUrl) {
  logger.warn({ event: "worker.skipped", reason: "redis not configured, skipping queue init" });
  process.exit(0);
}

const connection = new Redis(config.redisUrl, {
  maxRetriesPerRequest: null,
  enableReadyCheck: false
});

const dbPool = config.databaseUrl ? new Pool({ connectionString: config.databaseUrl }) : null;
if (!dbPool) {
  logger.warn({ event: "worker.memory_store", reason: "DATABASE_URL not set, reply state is not persisted" });
}

const outcomesQueue = new Queue<ReplyOutcomePayload>(REPLY_QUEUE_NAMES.outcomes, { connection });
const dlqQueue = new Queue<DlqItemPayload>(REPLY_QUEUE_NAMES.dlq, { connection });
const calibrationQueue = new Queue<CalibrationJobPayload>(REPLY_QUEUE_NAMES.calibration, { connection });
const batchesQueue = new Queue<ReplyBatchJobPayload>(REPLY_QUEUE_NAMES.batches, {
  connection,
  defaultJobOptions: DEFAULT_BULLMQ_JOB_OPTIONS
});
const dlq = new BullMqDlqStore(dlqQueue);

const processor = await createReplyRuntime({
  config,
  logger,
  store: dbPool ? new PostgresReplyStore(dbPool) : new MemoryReplyStore(),
  directory: dbPool ? new PostgresCampaignDirectory(dbPool) : new MemoryCampaignDirectory(),
  sink: new QueueOutcomeSink(outcomesQueue),
  dlq
});
const handlers = createReplyJobHandlers({
  processor,
  logger,
  dlq,
  enqueueBatch: async ({ payload, jobId }) => {
    await batchesQueue.add(REPLY_JOB_NAMES.batch, payload, { jobId });
  }
});

// One batch at a time per process; the lead lock is in-process only.
const batchWorker = new Worker<ReplyBatchJobPayload>(REPLY_QUEUE_NAMES.batches, (job) => handlers.batch(job), {
  connection,
  concurrency: 1
});
const feedbackWorker = new Worker<FeedbackJobPayload>(REPLY_QUEUE_NAMES.feedback, (job) => handlers.feedback(job), {
  connection
});
const leadArchiveWorker = new Worker<LeadArchiveJobPayload>(
  REPLY_QUEUE_NAMES.leadArchive,
  (job) => handlers.leadArchive(job),
  { connection }
);
const calibrationWorker = new Worker<CalibrationJobPayload>(
  REPLY_QUEUE_NAMES.calibration,
  (job) => handlers.calibration(job),
  { connection, concurrency: 1 }
);
const dlqReplayWorker = new Worker<DlqReplayJobPayload>(REPLY_QUEUE_NAMES.dlqReplay, (job) => handlers.dlqReplay(job), {
  connection,
  concurrency: 1
});

await calibrationQueue.add(
  REPLY_JOB_NAMES.calibration,
  {},
  {
    repeat: { every: config.calibrationRecomputeEveryMs },
    jobId: "calibration-recompute",
    removeOnComplete: 100,
    removeOnFail: 500
  }
);

const workers = [batchWorker, feedbackWorker, leadArchiveWorker, calibrationWorker, dlqReplayWorker];

let readyLogPrinted = false;
const emitWorkerReady = (): void => {
  if (readyLogPrinted) {
    return;
  }
  readyLogPrinted = true;
  logger.info({ event: "worker.ready", workerName: config.workerName, at: new Date().toISOString() });
};

for (const worker of workers) {
  worker.on("ready", emitWorkerReady);
  worker.on("error", (error) => {
    logger.error({ event: "worker.error", queueName: worker.name, error: toLogError(error) });
  });
}

async function shutdown(signal: string): Promise<void> {
  logger.info({ event: "worker.shutdown", signal, stats: processor.snapshot() });
  await Promise.all(workers.map((worker) => worker.close()));
  await Promise.all([outcomesQueue.close(), dlqQueue.close(), calibrationQueue.close(), batchesQueue.close()]);
  await connection.quit();
  await dbPool?.end();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ event: "worker.shutdown_failed", error: toLogError(error) });
        process.exit(1);
      }
    );
  });
}
