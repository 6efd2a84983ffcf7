import { UnrecoverableError } from "bullmq";
import type { Logger } from "pino";
import {
  DEFAULT_JOB_ATTEMPTS,
  ErrorClass,
  KILL_SWITCH_REPLY_INGESTION,
  asCorrelationId,
  classifyError,
  isGlobalReplyIngestionDisabled,
  isIntentLabel,
  newCorrelationId,
  type LeadScore
} from "@reply-triage/shared";
import { toLogError, toStructuredLogEvent, type StructuredLogContext } from "./logging.js";
import type { FeedbackResult, RecomputeResult } from "./pipeline/classifier.js";
import type { DlqStore } from "./pipeline/dlq.js";
import { MalformedInputError, isReplyFailureCode, type ReplyFailureCode } from "./pipeline/errors.js";
import type { BatchSummary, ReplyProcessor } from "./pipeline/processor.js";
import { replayDlqItems, type DlqReplayResult } from "./pipeline/replay.js";
import {
  REPLY_QUEUE_NAMES,
  type CalibrationJobPayload,
  type DlqReplayJobPayload,
  type FeedbackJobPayload,
  type LeadArchiveJobPayload,
  type ReplyBatchJobPayload
} from "./pipeline/types.js";

const MAX_STACK_LINES = 6;
const DEFAULT_REPLAY_LIMIT = 100;
const MAX_REPLAY_LIMIT = 1000;

/**
 * The subset of a BullMQ job the handlers read.
 */
export type JobLike<T> = {
  id?: string;
  data: T;
  attemptsMade: number;
  opts: { attempts?: number };
};

export type BatchJobResult = BatchSummary | { skipped: typeof KILL_SWITCH_REPLY_INGESTION };

function toSafeStack(stack: string | undefined): string | undefined {
  return stack?.split("\n").slice(0, MAX_STACK_LINES).join("\n");
}

function assertRequiredString(value: unknown, field: string): string {
  if (typeof value === "string" && value.trim().length > 0) {
    return value.trim();
  }
  throw new MalformedInputError({ field, message: `Missing required field: ${field}` });
}

/**
 * Wraps a job body with job.start / job.done / job.error events. Permanent
 * failures become UnrecoverableError so BullMQ stops retrying them.
 */
export async function runLoggedJob<T, R>(input: {
  logger: Logger;
  queueName: string;
  job: JobLike<T>;
  context?: StructuredLogContext;
  run: (data: T) => Promise<R>;
}): Promise<R> {
  const { job, logger } = input;
  const startedAt = Date.now();
  const startedAtIso = new Date(startedAt).toISOString();
  const attempt = job.attemptsMade + 1;
  const maxAttempts = job.opts.attempts ?? DEFAULT_JOB_ATTEMPTS;
  const context: StructuredLogContext = {
    ...input.context,
    queueName: input.queueName,
    jobId: job.id
  };

  logger.info(toStructuredLogEvent(context, "job.start", { startedAt: startedAtIso, attempt, maxAttempts }));
  try {
    const result = await input.run(job.data);
    logger.info(
      toStructuredLogEvent(context, "job.done", {
        startedAt: startedAtIso,
        elapsedMs: Date.now() - startedAt,
        attempt,
        maxAttempts
      })
    );
    return result;
  } catch (error) {
    const classified = classifyError(error);
    const errorClass = classified.class === ErrorClass.TRANSIENT ? ErrorClass.TRANSIENT : ErrorClass.PERMANENT;
    const structuredError = toLogError(error);
    logger.error({
      ...toStructuredLogEvent(context, "job.error", {
        startedAt: startedAtIso,
        elapsedMs: Date.now() - startedAt,
        attempt,
        maxAttempts,
        errorClass,
        errorCode: structuredError.code ?? classified.code,
        errorMessage: structuredError.message
      }),
      errorStack: toSafeStack(structuredError.stack)
    });

    if (errorClass === ErrorClass.PERMANENT) {
      throw new UnrecoverableError(structuredError.message);
    }
    throw error;
  }
}

export type ReplyJobHandlers = {
  batch(job: JobLike<ReplyBatchJobPayload>): Promise<BatchJobResult>;
  feedback(job: JobLike<FeedbackJobPayload>): Promise<FeedbackResult>;
  leadArchive(job: JobLike<LeadArchiveJobPayload>): Promise<LeadScore>;
  calibration(job: JobLike<CalibrationJobPayload>): Promise<RecomputeResult>;
  dlqReplay(job: JobLike<DlqReplayJobPayload>): Promise<DlqReplayResult>;
};

function replayLimit(value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    return DEFAULT_REPLAY_LIMIT;
  }
  return Math.min(value, MAX_REPLAY_LIMIT);
}

export function createReplyJobHandlers(input: {
  processor: ReplyProcessor;
  logger: Logger;
  dlq: DlqStore;
  enqueueBatch: (request: { payload: ReplyBatchJobPayload; jobId: string }) => Promise<void>;
  env?: Record<string, string | undefined>;
}): ReplyJobHandlers {
  const { processor, logger } = input;
  const env = input.env ?? process.env;

  return {
    batch: (job) => {
      const correlationId =
        typeof job.data.correlationId === "string" && job.data.correlationId.trim().length > 0
          ? asCorrelationId(job.data.correlationId.trim())
          : newCorrelationId();
      return runLoggedJob({
        logger,
        queueName: REPLY_QUEUE_NAMES.batches,
        job,
        context: { correlationId, stage: "reply_batch" },
        run: async (data): Promise<BatchJobResult> => {
          if (isGlobalReplyIngestionDisabled(env)) {
            logger.warn(
              toStructuredLogEvent({ correlationId, queueName: REPLY_QUEUE_NAMES.batches, jobId: job.id }, "batch.skipped", {
                errorCode: KILL_SWITCH_REPLY_INGESTION
              })
            );
            return { skipped: KILL_SWITCH_REPLY_INGESTION };
          }
          if (!Array.isArray(data.messages)) {
            throw new MalformedInputError({ field: "messages", message: "Missing required field: messages" });
          }
          return processor.processBatch(data.messages, {
            batchId: job.id ? `batch:${job.id}` : undefined,
            correlationId
          });
        }
      });
    },

    feedback: (job) =>
      runLoggedJob({
        logger,
        queueName: REPLY_QUEUE_NAMES.feedback,
        job,
        context: { stage: "feedback", messageId: job.data.messageId },
        run: async (data) => {
          const messageId = assertRequiredString(data.messageId, "messageId");
          if (!isIntentLabel(data.confirmedLabel)) {
            throw new MalformedInputError({ field: "confirmedLabel", messageId });
          }
          return processor.recordFeedback({ messageId, confirmedLabel: data.confirmedLabel });
        }
      }),

    leadArchive: (job) =>
      runLoggedJob({
        logger,
        queueName: REPLY_QUEUE_NAMES.leadArchive,
        job,
        context: { stage: "lead_archive", leadId: job.data.leadId },
        run: async (data) => processor.archiveLead(assertRequiredString(data.leadId, "leadId"))
      }),

    calibration: (job) =>
      runLoggedJob({
        logger,
        queueName: REPLY_QUEUE_NAMES.calibration,
        job,
        context: { stage: "calibration" },
        run: async () => processor.recomputeCalibration()
      }),

    dlqReplay: (job) =>
      runLoggedJob({
        logger,
        queueName: REPLY_QUEUE_NAMES.dlqReplay,
        job,
        context: { stage: "dlq_replay" },
        run: async (data) => {
          let reasonCode: ReplyFailureCode | undefined;
          if (data.reasonCode !== undefined) {
            if (!isReplyFailureCode(data.reasonCode)) {
              throw new MalformedInputError({ field: "reasonCode", message: `Unknown reasonCode: ${data.reasonCode}` });
            }
            reasonCode = data.reasonCode;
          }
          return replayDlqItems({
            dlqStore: input.dlq,
            filters: { reasonCode, limit: replayLimit(data.limit) },
            enqueueBatch: input.enqueueBatch
          });
        }
      })
  };
}
