import assert from "node:assert/strict";
import test from "node:test";
import { asThreadKey, type AttributionRecord } from "@reply-triage/shared";
import { MemoryCampaignDirectory } from "../crm/campaign-directory.js";
import {
  AttributionEngine,
  extractTrackingId,
  fuzzySubjectConfidence,
  isAttributed,
  reviseAttribution
} from "./attribution.js";
import { inboundMessage, silentLogger } from "./test-support.js";
import type { CampaignDirectory } from "./types.js";

const threadKey = asThreadKey("thr_attr");

function directory(): MemoryCampaignDirectory {
  return new MemoryCampaignDirectory([
    {
      campaignId: "c-spring",
      name: "Spring pilot",
      sendList: [
        { leadId: "lead-1", email: "dana@lead.example", subject: "Spring pilot offer", trackingId: "trk-1" },
        { leadId: "lead-2", email: "lee@other.example", subject: "Spring pilot offer" }
      ]
    },
    {
      campaignId: "c-fall",
      name: "Fall webinar",
      sendList: [{ leadId: "lead-3", email: "sam@third.example", subject: "Fall webinar invite" }]
    },
    {
      campaignId: "c-archived",
      name: "Old",
      active: false,
      sendList: [{ leadId: "lead-4", email: "old@fourth.example", subject: "Spring pilot offers" }]
    }
  ]);
}

function engine(source: CampaignDirectory = directory()): AttributionEngine {
  return new AttributionEngine({
    directory: source,
    logger: silentLogger(),
    options: { directoryTimeoutMs: 20, fuzzyMaxEditDistance: 3 }
  });
}

test("extractTrackingId reads the header before the body token", () => {
  assert.equal(
    extractTrackingId(inboundMessage({ messageId: "m-1", headers: { "X-Campaign-Id": " trk-9 " } })),
    "trk-9"
  );
  assert.equal(
    extractTrackingId(inboundMessage({ messageId: "m-2", body: { text: "Thanks!\n[ref: trk-1]" } })),
    "trk-1"
  );
  assert.equal(extractTrackingId(inboundMessage({ messageId: "m-3" })), undefined);
});

test("tracking id attribution is certain", async () => {
  const record = await engine().attribute({
    threadKey,
    message: inboundMessage({ messageId: "m-1", sender: "forwarded@elsewhere.example", headers: { "X-Campaign-Id": "trk-1" } }),
    existing: null
  });
  assert.deepEqual(record, {
    threadKey,
    campaignId: "c-spring",
    leadId: "lead-1",
    confidence: 1,
    matchedBy: "tracking_id",
    precedence: 1,
    revision: 1,
    sourceMessageId: "m-1"
  });
});

test("sender email attribution comes next", async () => {
  const record = await engine().attribute({
    threadKey,
    message: inboundMessage({ messageId: "m-1", sender: "Lee@Other.example" }),
    existing: null
  });
  assert.equal(record.campaignId, "c-spring");
  assert.equal(record.leadId, "lead-2");
  assert.equal(record.confidence, 0.9);
  assert.equal(record.matchedBy, "sender_email");
});

test("fuzzy subject attribution keeps the campaign but not the lead for unknown senders", async () => {
  const record = await engine().attribute({
    threadKey,
    message: inboundMessage({ messageId: "m-1", sender: "new@nowhere.example", subject: "RE: Spring pilot offr" }),
    existing: null
  });
  assert.equal(record.campaignId, "c-spring");
  assert.equal(record.leadId, "unattributed:new@nowhere.example");
  assert.equal(record.matchedBy, "fuzzy_subject");
  assert.equal(record.confidence, 0.5625);
  assert.equal(isAttributed(record), true);
});

test("a failing email lookup still allows a fuzzy match to the sender's lead", async () => {
  const base = directory();
  const flaky: CampaignDirectory = {
    findByTrackingId: (trackingId) => base.findByTrackingId(trackingId),
    findLeadByEmail: () => new Promise<null>(() => undefined),
    listActiveCampaigns: () => base.listActiveCampaigns()
  };

  const record = await engine(flaky).attribute({
    threadKey,
    message: inboundMessage({ messageId: "m-1", sender: "lee@other.example", subject: "Spring pilot offer" }),
    existing: null
  });
  assert.equal(record.leadId, "lead-2");
  assert.equal(record.matchedBy, "fuzzy_subject");
  assert.equal(record.confidence, 0.75);
});

test("no match yields the unattributed record", async () => {
  const record = await engine().attribute({
    threadKey,
    message: inboundMessage({ messageId: "m-1", sender: "Stranger@Nowhere.example", subject: "Totally unrelated" }),
    existing: null
  });
  assert.equal(record.campaignId, "unattributed");
  assert.equal(record.leadId, "unattributed:stranger@nowhere.example");
  assert.equal(record.confidence, 0);
  assert.equal(record.precedence, 4);
  assert.equal(isAttributed(record), false);
});

test("attribution only moves to a stronger precedence", async () => {
  const existing: AttributionRecord = {
    threadKey,
    campaignId: "c-fall",
    leadId: "lead-3",
    confidence: 0.9,
    matchedBy: "sender_email",
    precedence: 2,
    revision: 1,
    sourceMessageId: "m-0"
  };

  const weaker = await engine().attribute({
    threadKey,
    message: inboundMessage({ messageId: "m-1", sender: "new@nowhere.example", subject: "Spring pilot offer" }),
    existing
  });
  assert.equal(weaker, existing);

  const stronger = await engine().attribute({
    threadKey,
    message: inboundMessage({ messageId: "m-2", body: { text: "[ref:trk-1]" } }),
    existing
  });
  assert.equal(stronger.matchedBy, "tracking_id");
  assert.equal(stronger.revision, 2);
  assert.equal(stronger.sourceMessageId, "m-2");

  const settled = await engine().attribute({
    threadKey,
    message: inboundMessage({ messageId: "m-3", sender: "sam@third.example" }),
    existing: stronger
  });
  assert.equal(settled, stronger);
});

test("reviseAttribution keeps equal precedence and fuzzy confidence shrinks with distance", () => {
  const existing = reviseAttribution(null, {
    threadKey,
    campaignId: "c-1",
    leadId: "lead-1",
    confidence: 0.9,
    matchedBy: "sender_email",
    precedence: 2,
    sourceMessageId: "m-1"
  });
  assert.equal(existing.revision, 1);
  assert.equal(
    reviseAttribution(existing, { ...existing, campaignId: "c-2", sourceMessageId: "m-2" }),
    existing
  );
  assert.equal(fuzzySubjectConfidence(0, 3), 0.75);
  assert.equal(fuzzySubjectConfidence(3, 3), 0.1875);
});
