import { randomUUID } from "node:crypto";
import type { Queue } from "bullmq";
import { DEAD_LETTER_JOB_OPTIONS } from "@reply-triage/shared";
import type { ReplyFailureCode, SerializedError } from "./errors.js";
import type { ReplyQueueName } from "./types.js";

const MAX_JSON_CHARS = 8000;

export type DlqStage = Exclude<ReplyQueueName, "reply_dlq" | "reply_dlq_replay" | "reply_outcomes">;

export type DlqItemPayload = {
  dlqId: string;
  createdAt: string;
  occurredAt: string;
  replayedAt?: string;
  replayCount: number;
  stage: DlqStage;
  batchId?: string;
  threadKey?: string;
  messageId?: string;
  reasonCode: ReplyFailureCode;
  error: SerializedError;
  originalPayload: unknown;
};

export type DlqEnqueueInput = Omit<DlqItemPayload, "dlqId" | "createdAt" | "replayCount">;

export type DlqListFilters = {
  stage?: DlqStage;
  reasonCode?: ReplyFailureCode;
};

export interface DlqStore {
  enqueue(input: DlqEnqueueInput): Promise<DlqItemPayload>;
  list(input: { limit: number; filters?: DlqListFilters }): Promise<DlqItemPayload[]>;
  markReplayed(dlqId: string): Promise<void>;
}

function safeClonePayload(payload: unknown): unknown {
  let json: string | undefined;
  try {
    json = JSON.stringify(payload);
  } catch {
    return { truncated: true, preview: "[unserializable payload]" };
  }
  if (!json) {
    return null;
  }
  if (json.length <= MAX_JSON_CHARS) {
    const cloned: unknown = JSON.parse(json);
    return cloned;
  }
  return {
    truncated: true,
    preview: `${json.slice(0, MAX_JSON_CHARS)}…`
  };
}

function toDlqItem(input: DlqEnqueueInput, now: Date): DlqItemPayload {
  return {
    ...input,
    originalPayload: safeClonePayload(input.originalPayload),
    dlqId: randomUUID(),
    createdAt: now.toISOString(),
    replayCount: 0
  };
}

function matchesFilters(item: DlqItemPayload, filters: DlqListFilters | undefined): boolean {
  return (
    !item.replayedAt &&
    (!filters?.stage || item.stage === filters.stage) &&
    (!filters?.reasonCode || item.reasonCode === filters.reasonCode)
  );
}

export class BullMqDlqStore implements DlqStore {
  private readonly queue: Queue<DlqItemPayload>;

  constructor(queue: Queue<DlqItemPayload>) {
    this.queue = queue;
  }

  async enqueue(input: DlqEnqueueInput): Promise<DlqItemPayload> {
    const payload = toDlqItem(input, new Date());
    await this.queue.add("dlq_item", payload, {
      ...DEAD_LETTER_JOB_OPTIONS,
      jobId: `dlq-${payload.stage}-${payload.dlqId}`
    });
    return payload;
  }

  async list(input: { limit: number; filters?: DlqListFilters }): Promise<DlqItemPayload[]> {
    const jobs = await this.queue.getJobs(["waiting", "delayed", "prioritized"], 0, Math.max(input.limit * 5, input.limit));
    return jobs
      .map((job) => job.data)
      .filter((item) => matchesFilters(item, input.filters))
      .sort((left, right) => left.createdAt.localeCompare(right.createdAt))
      .slice(0, input.limit);
  }

  async markReplayed(dlqId: string): Promise<void> {
    const jobs = await this.queue.getJobs(["waiting", "delayed", "prioritized"], 0, 500);
    const matching = jobs.find((job) => job.data.dlqId === dlqId);
    if (!matching) {
      return;
    }

    await matching.updateData({
      ...matching.data,
      replayCount: matching.data.replayCount + 1,
      replayedAt: new Date().toISOString()
    });
  }
}

export class MemoryDlqStore implements DlqStore {
  readonly items: DlqItemPayload[] = [];

  async enqueue(input: DlqEnqueueInput): Promise<DlqItemPayload> {
    const payload = toDlqItem(input, new Date());
    this.items.push(payload);
    return payload;
  }

  async list(input: { limit: number; filters?: DlqListFilters }): Promise<DlqItemPayload[]> {
    return this.items
      .filter((item) => matchesFilters(item, input.filters))
      .sort((left, right) => left.createdAt.localeCompare(right.createdAt))
      .slice(0, input.limit);
  }

  async markReplayed(dlqId: string): Promise<void> {
    const item = this.items.find((candidate) => candidate.dlqId === dlqId);
    if (item) {
      item.replayCount += 1;
      item.replayedAt = new Date().toISOString();
    }
  }
}
