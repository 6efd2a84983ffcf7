import { parseInboundMessage, replyBatchJobId, type ReplyBatchJobPayload } from "@reply-triage/shared";
import type { DlqStore } from "./dlq.js";
import type { ReplyFailureCode } from "./errors.js";

export type DlqReplayFilters = {
  reasonCode?: ReplyFailureCode;
  limit: number;
};

export type DlqReplayResult = {
  scanned: number;
  replayed: number;
  unreadable: number;
};

export function replayJobId(dlqId: string): string {
  return replyBatchJobId(`replay-${dlqId}`);
}

/**
 * Re-enqueues dead-lettered replies as single-message batches. The
 * processed-message record makes replaying an already committed reply a no-op.
 */
export async function replayDlqItems(input: {
  dlqStore: DlqStore;
  filters: DlqReplayFilters;
  enqueueBatch: (request: { payload: ReplyBatchJobPayload; jobId: string }) => Promise<void>;
}): Promise<DlqReplayResult> {
  const entries = await input.dlqStore.list({
    limit: input.filters.limit,
    filters: {
      stage: "reply_batches",
      reasonCode: input.filters.reasonCode
    }
  });

  let replayed = 0;
  let unreadable = 0;

  for (const entry of entries) {
    const parsed = parseInboundMessage(entry.originalPayload);
    if (!parsed.ok) {
      unreadable += 1;
      continue;
    }

    await input.enqueueBatch({
      payload: { messages: [parsed.value] },
      jobId: replayJobId(entry.dlqId)
    });
    await input.dlqStore.markReplayed(entry.dlqId);
    replayed += 1;
  }

  return {
    scanned: entries.length,
    replayed,
    unreadable
  };
}
