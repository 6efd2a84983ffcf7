import { createHash } from "node:crypto";
import type { Queue } from "bullmq";
import { DEFAULT_BULLMQ_JOB_OPTIONS, type ReplyOutcomePayload } from "@reply-triage/shared";
import type { ReplyOutcomeSink } from "../pipeline/types.js";

export function outcomeJobId(messageId: string): string {
  return `reply_outcome-${createHash("sha256").update(messageId).digest("hex").slice(0, 32)}`;
}

/**
 * Publishes outcomes for the CRM updater, notifier and response generator.
 * The job id is derived from the message id, so a re-emit after a partial
 * failure is a no-op when the first publish landed.
 */
export class QueueOutcomeSink implements ReplyOutcomeSink {
  private readonly queue: Queue<ReplyOutcomePayload>;

  constructor(queue: Queue<ReplyOutcomePayload>) {
    this.queue = queue;
  }

  async deliver(payload: ReplyOutcomePayload): Promise<void> {
    await this.queue.add("reply_outcome", payload, {
      ...DEFAULT_BULLMQ_JOB_OPTIONS,
      jobId: outcomeJobId(payload.messageId)
    });
  }
}

export class MemoryOutcomeSink implements ReplyOutcomeSink {
  readonly delivered: ReplyOutcomePayload[] = [];
  private failuresRemaining = 0;

  failNext(times = 1): void {
    this.failuresRemaining = times;
  }

  async deliver(payload: ReplyOutcomePayload): Promise<void> {
    if (this.failuresRemaining > 0) {
      this.failuresRemaining -= 1;
      throw new Error("outcome sink unavailable");
    }
    this.delivered.push(structuredClone(payload));
  }
}
