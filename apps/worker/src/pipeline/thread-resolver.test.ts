import assert from "node:assert/strict";
import test from "node:test";
import { asThreadKey, type InboundMessage } from "@reply-triage/shared";
import { MemoryReplyStore } from "../store/memory-store.js";
import { MalformedInputError, StateCorruptionError } from "./errors.js";
import { createReplyStats } from "./stats.js";
import { ThreadResolver, assertWellFormed, detectSpam, type ThreadResolution } from "./thread-resolver.js";

function message(overrides: Partial<InboundMessage> & { messageId: string }): InboundMessage {
  return {
    sender: "dana@lead.example",
    recipients: ["sales@vendor.example"],
    subject: "Re: Pilot program",
    body: { text: `Reply ${overrides.messageId}` },
    receivedAtMs: 1_000,
    ...overrides
  };
}

function setup() {
  const store = new MemoryReplyStore();
  const stats = createReplyStats(new Date("2024-01-01T00:00:00.000Z"));
  return { store, stats, resolver: new ThreadResolver({ store, stats }) };
}

async function commit(store: MemoryReplyStore, resolution: ThreadResolution): Promise<void> {
  await store.commitMessage({
    threadKey: resolution.threadKey,
    normalizedSubject: resolution.thread.normalizedSubject,
    participants: resolution.thread.participants,
    entry: resolution.entry,
    status: resolution.isDuplicate ? "duplicate" : resolution.isSpam ? "spam" : "classified"
  });
}

test("detectSpam recognizes bulk headers, automated senders and auto-reply text", () => {
  assert.equal(detectSpam(message({ messageId: "s-1", headers: { Precedence: "Bulk" } })), "bulk_header");
  assert.equal(detectSpam(message({ messageId: "s-2", headers: { "Auto-Submitted": "auto-replied" } })), "bulk_header");
  assert.equal(detectSpam(message({ messageId: "s-3", sender: "no-reply@vendor.example" })), "automated_sender");
  assert.equal(
    detectSpam(message({ messageId: "s-4", subject: "Out of Office: back Monday" })),
    "auto_reply_marker"
  );
  assert.equal(
    detectSpam(message({ messageId: "s-5", body: { text: "You have been unsubscribed from this list." } })),
    "unsubscribe_confirmation"
  );
  assert.equal(detectSpam(message({ messageId: "s-6", headers: { "Auto-Submitted": "no" } })), undefined);
});

test("detectSpam ignores automated wording inside quoted history", () => {
  const quoted = [
    "Yes, let's schedule a call next week.",
    "",
    "On Mon, Jan 1, 2024 at 9:00 AM Sales <sales@vendor.example> wrote:",
    "> Hi Dana, this is an automated follow-up about the pilot."
  ].join("\n");
  assert.equal(detectSpam(message({ messageId: "q-1", body: { text: quoted } })), undefined);

  const bracketed = "Count me in.\n> You have been unsubscribed from the old list.";
  assert.equal(detectSpam(message({ messageId: "q-2", body: { text: bracketed } })), undefined);

  const ownWords = "This is an automated reply. I am away until Monday.";
  assert.equal(detectSpam(message({ messageId: "q-3", body: { text: ownWords } })), "auto_reply_marker");
});

test("assertWellFormed rejects messages without sender or body", () => {
  assert.throws(
    () => assertWellFormed(message({ messageId: "m-1", sender: "  " })),
    (error: unknown) => error instanceof MalformedInputError && error.field === "sender"
  );
  assert.throws(
    () => assertWellFormed(message({ messageId: "m-2", body: { text: " ", html: "" } })),
    (error: unknown) => error instanceof MalformedInputError && error.field === "body"
  );
  assert.doesNotThrow(() => assertWellFormed(message({ messageId: "m-3", body: { html: "<p>Hi</p>" } })));
});

test("subject threads ignore reply prefixes and participant order", async () => {
  const { resolver } = setup();
  const first = await resolver.resolveKey(
    message({ messageId: "m-1", subject: "Pilot program", recipients: ["sales@vendor.example"] })
  );
  const second = await resolver.resolveKey(
    message({ messageId: "m-2", subject: "RE: pilot   program", recipients: ["SALES@vendor.example"] })
  );
  assert.equal(first, second);
});

test("reply headers resolve to the referenced thread before the subject", async () => {
  const { store, resolver } = setup();
  const opener = await resolver.resolve(message({ messageId: "m-1", subject: "Pilot program" }));
  await commit(store, opener);

  const followUp = message({ messageId: "m-2", subject: "Something else entirely", inReplyTo: "m-1" });
  assert.equal(await resolver.resolveKey(followUp), opener.threadKey);

  const pending = new Map([["m-9", asThreadKey("thr_pending")]]);
  const inBatch = message({ messageId: "m-10", references: ["m-1", "m-9"] });
  assert.equal(await resolver.resolveKey(inBatch, pending), asThreadKey("thr_pending"));
});

test("resolve inserts late messages chronologically", async () => {
  const { store, resolver } = setup();
  await commit(store, await resolver.resolve(message({ messageId: "m-2", receivedAtMs: 2_000 })));
  await commit(store, await resolver.resolve(message({ messageId: "m-3", receivedAtMs: 3_000 })));

  const late = await resolver.resolve(message({ messageId: "m-1", receivedAtMs: 1_000 }));
  assert.equal(late.isNewThread, false);
  assert.deepEqual(
    late.thread.entries.map((entry) => entry.message.messageId),
    ["m-1", "m-2", "m-3"]
  );
});

test("resolve flags repeated ids and repeated content as duplicates", async () => {
  const { store, resolver } = setup();
  const original = await resolver.resolve(message({ messageId: "m-1", body: { text: "Send pricing please" } }));
  assert.equal(original.isNewThread, true);
  await commit(store, original);

  const sameId = await resolver.resolve(message({ messageId: "m-1", body: { text: "Send pricing please" } }));
  assert.equal(sameId.isDuplicate, true);
  assert.equal(sameId.duplicateOf, "message_id");

  const sameContent = await resolver.resolve(
    message({ messageId: "m-2", receivedAtMs: 2_000, body: { text: "send   PRICING please\n> quoted" } })
  );
  assert.equal(sameContent.isDuplicate, true);
  assert.equal(sameContent.duplicateOf, "content_hash");
  assert.equal(sameContent.isSpam, false);
});

test("thread spam flag holds only while every entry is spam", async () => {
  const { store, resolver } = setup();
  const bounce = await resolver.resolve(message({ messageId: "m-1", subject: "Automatic reply: Pilot program" }));
  assert.equal(bounce.isSpam, true);
  assert.equal(bounce.thread.isSpam, true);
  await commit(store, bounce);

  const human = await resolver.resolve(
    message({ messageId: "m-2", subject: "Automatic reply: Pilot program", body: { text: "Actually, I am interested" }, receivedAtMs: 2_000 })
  );
  assert.equal(human.isSpam, true);

  const plain = await resolver.resolve(
    message({ messageId: "m-3", subject: "Pilot program", inReplyTo: "m-1", receivedAtMs: 3_000 })
  );
  assert.equal(plain.isSpam, false);
  assert.equal(plain.thread.isSpam, false);
});

test("resolve refuses a thread whose stored order is broken", async () => {
  const { store, resolver } = setup();
  const threadKey = asThreadKey("thr_broken");
  store.seedThread({
    threadKey,
    normalizedSubject: "pilot program",
    participants: ["dana@lead.example"],
    isSpam: false,
    entries: [
      { message: message({ messageId: "m-2", receivedAtMs: 2_000 }), contentHash: "b", isDuplicate: false, isSpam: false },
      { message: message({ messageId: "m-1", receivedAtMs: 1_000 }), contentHash: "a", isDuplicate: false, isSpam: false }
    ]
  });

  await assert.rejects(
    resolver.resolve(message({ messageId: "m-3", receivedAtMs: 3_000 }), { threadKey }),
    (error: unknown) => error instanceof StateCorruptionError && error.scope === "thread"
  );
});

test("acknowledge counts each resolution kind", async () => {
  const { resolver, stats } = setup();
  resolver.acknowledge(await resolver.resolve(message({ messageId: "m-1" })));
  resolver.acknowledge(await resolver.resolve(message({ messageId: "m-2", sender: "mailer-daemon@vendor.example" })));
  resolver.recordUnresolved("malformed");

  const snapshot = stats.snapshot();
  assert.equal(snapshot.ingested, 3);
  assert.equal(snapshot.classified, 1);
  assert.equal(snapshot.spam, 1);
  assert.equal(snapshot.malformed, 1);
});
