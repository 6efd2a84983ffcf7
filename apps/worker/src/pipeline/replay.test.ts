import assert from "node:assert/strict";
import test from "node:test";
import type { ReplyBatchJobPayload } from "@reply-triage/shared";
import { MemoryDlqStore } from "./dlq.js";
import { replayDlqItems, replayJobId } from "./replay.js";
import { inboundMessage } from "./test-support.js";

function failure(reasonCode: "MALFORMED_INPUT" | "UNEXPECTED", originalPayload: unknown) {
  return {
    occurredAt: "2024-01-01T00:00:00.000Z",
    stage: "reply_batches" as const,
    reasonCode,
    error: { name: "Error", message: "boom" },
    originalPayload
  };
}

test("replayDlqItems re-enqueues readable replies once", async () => {
  const dlqStore = new MemoryDlqStore();
  const replayable = await dlqStore.enqueue(failure("UNEXPECTED", inboundMessage({ messageId: "m-1" })));
  await dlqStore.enqueue(failure("MALFORMED_INPUT", inboundMessage({ messageId: "m-2", sender: "" })));
  await dlqStore.enqueue(failure("UNEXPECTED", { note: "not a reply" }));

  const enqueued: Array<{ payload: ReplyBatchJobPayload; jobId: string }> = [];
  const result = await replayDlqItems({
    dlqStore,
    filters: { reasonCode: "UNEXPECTED", limit: 10 },
    enqueueBatch: async (request) => {
      enqueued.push(request);
    }
  });

  assert.deepEqual(result, { scanned: 2, replayed: 1, unreadable: 1 });
  assert.equal(enqueued.length, 1);
  assert.equal(enqueued[0]?.jobId, replayJobId(replayable.dlqId));
  assert.equal(enqueued[0]?.payload.messages[0]?.messageId, "m-1");

  const again = await replayDlqItems({
    dlqStore,
    filters: { reasonCode: "UNEXPECTED", limit: 10 },
    enqueueBatch: async (request) => {
      enqueued.push(request);
    }
  });
  assert.deepEqual(again, { scanned: 1, replayed: 0, unreadable: 1 });
  assert.equal(enqueued.length, 1);
});

test("dead-lettered payloads are stored as detached copies", async () => {
  const dlqStore = new MemoryDlqStore();
  const message = inboundMessage({ messageId: "m-1" });
  const item = await dlqStore.enqueue(failure("UNEXPECTED", message));
  message.subject = "changed";

  assert.equal(item.replayCount, 0);
  assert.deepEqual(item.originalPayload, inboundMessage({ messageId: "m-1" }));
});
