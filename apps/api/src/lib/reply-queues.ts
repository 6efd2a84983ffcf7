import { createHash } from "node:crypto";
import { Queue } from "bullmq";
import { Redis } from "ioredis";
import {
  DEFAULT_BULLMQ_JOB_OPTIONS,
  REPLY_JOB_NAMES,
  REPLY_QUEUE_NAMES,
  dlqReplayJobId,
  feedbackJobId,
  leadArchiveJobId,
  replyBatchJobId,
  type DlqReplayJobPayload,
  type FeedbackJobPayload,
  type LeadArchiveJobPayload,
  type ReplyBatchJobPayload
} from "@reply-triage/shared";

const PENDING_STATES = new Set(["active", "waiting", "delayed", "prioritized", "waiting-children"]);

export type EnqueueResult = {
  jobId: string | undefined;
  reused: boolean;
};

export interface ReplyQueueClient {
  enqueueReplyBatch(payload: ReplyBatchJobPayload): Promise<EnqueueResult>;
  enqueueFeedback(payload: FeedbackJobPayload): Promise<EnqueueResult>;
  enqueueLeadArchive(payload: LeadArchiveJobPayload): Promise<EnqueueResult>;
  enqueueDlqReplay(payload: DlqReplayJobPayload): Promise<EnqueueResult>;
  close(): Promise<void>;
}

export function stableKey(parts: readonly string[]): string {
  return createHash("sha256").update(parts.join("\n")).digest("hex").slice(0, 32);
}

/**
 * Same messages, in any order, map to the same job id.
 */
export function replyBatchJobIdFor(payload: ReplyBatchJobPayload): string {
  return replyBatchJobId(stableKey(payload.messages.map((message) => message.messageId).sort()));
}

export function feedbackJobIdFor(payload: FeedbackJobPayload): string {
  return feedbackJobId(stableKey([payload.messageId]), payload.confirmedLabel);
}

export function leadArchiveJobIdFor(payload: LeadArchiveJobPayload): string {
  return leadArchiveJobId(stableKey([payload.leadId]));
}

/**
 * One pending replay per filter set.
 */
export function dlqReplayJobIdFor(payload: DlqReplayJobPayload): string {
  return dlqReplayJobId(stableKey([payload.reasonCode ?? "any", String(payload.limit ?? "default")]));
}

/**
 * The part of a BullMQ queue the idempotent enqueue needs.
 */
export type IdempotentQueue<T> = {
  getJob(jobId: string): Promise<{ id?: string; getState(): Promise<string> } | undefined>;
  remove(jobId: string): Promise<number>;
  add(name: string, data: T, opts: { jobId: string }): Promise<{ id?: string }>;
};

/**
 * Adds a job under a deterministic id. A pending job with the same id is
 * reused; a finished one is replaced.
 */
export async function enqueueIdempotent<T>(
  queue: IdempotentQueue<T>,
  jobName: string,
  data: T,
  jobId: string
): Promise<EnqueueResult> {
  const existingJob = await queue.getJob(jobId);
  if (existingJob) {
    const state = await existingJob.getState();
    if (PENDING_STATES.has(state)) {
      return { jobId: existingJob.id, reused: true };
    }
    await queue.remove(jobId);
  }

  try {
    const queuedJob = await queue.add(jobName, data, { jobId });
    return { jobId: queuedJob.id, reused: false };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (/job\s+.*already\s+exists/i.test(message)) {
      const existing = await queue.getJob(jobId);
      return { jobId: existing?.id ?? jobId, reused: true };
    }
    throw error;
  }
}

export function createBullMqReplyQueues(redisUrl: string | undefined = process.env.REDIS_URL): ReplyQueueClient {
  if (!redisUrl) {
    throw new Error("REDIS_URL is required for reply queues");
  }

  const connection = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false
  });
  const options = { connection, defaultJobOptions: DEFAULT_BULLMQ_JOB_OPTIONS };
  const batches = new Queue<ReplyBatchJobPayload>(REPLY_QUEUE_NAMES.batches, options);
  const feedback = new Queue<FeedbackJobPayload>(REPLY_QUEUE_NAMES.feedback, options);
  const leadArchive = new Queue<LeadArchiveJobPayload>(REPLY_QUEUE_NAMES.leadArchive, options);
  const dlqReplay = new Queue<DlqReplayJobPayload>(REPLY_QUEUE_NAMES.dlqReplay, options);

  return {
    enqueueReplyBatch: (payload) =>
      enqueueIdempotent(batches, REPLY_JOB_NAMES.batch, payload, replyBatchJobIdFor(payload)),
    enqueueFeedback: (payload) =>
      enqueueIdempotent(feedback, REPLY_JOB_NAMES.feedback, payload, feedbackJobIdFor(payload)),
    enqueueLeadArchive: (payload) =>
      enqueueIdempotent(leadArchive, REPLY_JOB_NAMES.leadArchive, payload, leadArchiveJobIdFor(payload)),
    enqueueDlqReplay: (payload) =>
      enqueueIdempotent(dlqReplay, REPLY_JOB_NAMES.dlqReplay, payload, dlqReplayJobIdFor(payload)),
    close: async () => {
      await Promise.all([batches.close(), feedback.close(), leadArchive.close(), dlqReplay.close()]);
      await connection.quit();
    }
  };
}
