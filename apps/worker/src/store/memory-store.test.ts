import assert from "node:assert/strict";
import test from "node:test";
import { asThreadKey } from "@reply-triage/shared";
import { StateCorruptionError } from "../pipeline/errors.js";
import { BASE_TIME_MS, DAY_MS, classifiedEntry, inboundMessage } from "../pipeline/test-support.js";
import { MemoryReplyStore } from "./memory-store.js";

const THREAD = asThreadKey("thr_pilot");

function commitFor(messageId: string, receivedAtMs: number) {
  return {
    threadKey: THREAD,
    normalizedSubject: "pilot program",
    participants: ["dana@lead.example"],
    entry: classifiedEntry(inboundMessage({ messageId, receivedAtMs }), { label: "Interested", confidence: 0.8 }),
    status: "classified" as const
  };
}

test("commitMessage keeps entries chronological and indexes message ids", async () => {
  const store = new MemoryReplyStore();
  await store.commitMessage(commitFor("m-2", BASE_TIME_MS + DAY_MS));
  await store.commitMessage(commitFor("m-1", BASE_TIME_MS));

  const thread = await store.getThread(THREAD);
  assert.deepEqual(
    thread?.entries.map((entry) => entry.message.messageId),
    ["m-1", "m-2"]
  );
  assert.equal(await store.findThreadKeyByMessageId("m-1"), THREAD);
  assert.equal((await store.getClassification("m-2"))?.label, "Interested");
  assert.equal((await store.getProcessed("m-1"))?.emitted, true);
});

test("committing a message twice is store corruption", async () => {
  const store = new MemoryReplyStore();
  await store.commitMessage(commitFor("m-1", BASE_TIME_MS));

  await assert.rejects(store.commitMessage(commitFor("m-1", BASE_TIME_MS)), (error: unknown) => {
    assert.ok(error instanceof StateCorruptionError);
    assert.equal(error.scope, "store");
    return true;
  });
  assert.equal(store.commitCount, 1);
});

test("reads return detached copies", async () => {
  const store = new MemoryReplyStore();
  await store.commitMessage(commitFor("m-1", BASE_TIME_MS));

  const thread = await store.getThread(THREAD);
  thread?.entries.pop();

  assert.equal((await store.getThread(THREAD))?.entries.length, 1);
});

test("archiveLead freezes an existing score and creates an empty one otherwise", async () => {
  const store = new MemoryReplyStore();
  store.seedLeadScore({ leadId: "lead-1", score: 33, lastEngagedAtMs: BASE_TIME_MS, updateCount: 2, archived: false });

  assert.deepEqual(await store.archiveLead("lead-1"), {
    leadId: "lead-1",
    score: 33,
    lastEngagedAtMs: BASE_TIME_MS,
    updateCount: 2,
    archived: true
  });
  assert.deepEqual(await store.archiveLead("lead-2"), {
    leadId: "lead-2",
    score: 0,
    lastEngagedAtMs: 0,
    updateCount: 0,
    archived: true
  });
});

test("appendCalibrationSample keeps one sample per message", async () => {
  const store = new MemoryReplyStore();
  const sample = {
    messageId: "m-1",
    contextLabels: [],
    predictedLabel: "Interested" as const,
    rawConfidence: 0.8,
    effectiveConfidence: 0.8,
    confirmedLabel: "Interested" as const,
    recordedAtMs: BASE_TIME_MS
  };

  assert.equal(await store.appendCalibrationSample(sample), true);
  assert.equal(await store.appendCalibrationSample({ ...sample, confirmedLabel: "NotInterested" }), false);
  assert.equal((await store.listCalibrationSamples()).length, 1);
});
