import assert from "node:assert/strict";
import test from "node:test";
import { asThreadKey, type ActionDecision, type ClassificationResult, type LeadScore } from "@reply-triage/shared";
import { DEFAULT_SCORING } from "../config.js";
import { DEFAULT_CALIBRATION_PARAMS } from "./calibration.js";
import { StateCorruptionError } from "./errors.js";
import {
  ScoringEngine,
  applyScoreUpdate,
  assertLeadScoreInvariants,
  decayFactor,
  scoreContribution
} from "./scoring.js";
import { createReplyStats } from "./stats.js";
import { BASE_TIME_MS, DAY_MS } from "./test-support.js";

function near(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${expected}, got ${actual}`);
}

function leadScore(score: number, overrides: Partial<LeadScore> = {}): LeadScore {
  return { leadId: "lead-1", score, lastEngagedAtMs: BASE_TIME_MS, updateCount: 1, archived: false, ...overrides };
}

function classification(overrides: Partial<ClassificationResult> = {}): ClassificationResult {
  return {
    messageId: "m-1",
    label: "Interested",
    confidence: 0.5,
    rawConfidence: 0.5,
    contextLabels: [],
    modelVersion: "openai:test-model+cal.v0",
    fallback: false,
    ...overrides
  };
}

test("decayFactor halves per half-life and ignores negative gaps", () => {
  assert.equal(decayFactor({ elapsedMs: 30 * DAY_MS, halfLifeDays: 30 }), 0.5);
  assert.equal(decayFactor({ elapsedMs: 60 * DAY_MS, halfLifeDays: 30 }), 0.25);
  assert.equal(decayFactor({ elapsedMs: -5 * DAY_MS, halfLifeDays: 30 }), 1);
});

test("engagement multipliers only amplify positive contributions", () => {
  near(scoreContribution({ label: "Interested", confidence: 0.8, multiplier: 2, weights: DEFAULT_SCORING.weights }), 24);
  near(scoreContribution({ label: "NotInterested", confidence: 0.8, multiplier: 3, weights: DEFAULT_SCORING.weights }), -8);
});

test("applyScoreUpdate decays the previous score before adding", () => {
  const next = applyScoreUpdate({
    leadId: "lead-1",
    existing: leadScore(40),
    label: "Interested",
    confidence: 1,
    multiplier: 1,
    receivedAtMs: BASE_TIME_MS + 30 * DAY_MS,
    config: DEFAULT_SCORING
  });
  assert.deepEqual(next, {
    leadId: "lead-1",
    score: 35,
    lastEngagedAtMs: BASE_TIME_MS + 30 * DAY_MS,
    updateCount: 2,
    archived: false
  });
});

test("applyScoreUpdate clamps to the floor and the ceiling", () => {
  const floored = applyScoreUpdate({
    leadId: "lead-1",
    existing: leadScore(5),
    label: "NotInterested",
    confidence: 1,
    multiplier: 1,
    receivedAtMs: BASE_TIME_MS,
    config: DEFAULT_SCORING
  });
  assert.equal(floored.score, 0);

  const capped = applyScoreUpdate({
    leadId: "lead-1",
    existing: leadScore(95),
    label: "Interested",
    confidence: 1,
    multiplier: 3,
    receivedAtMs: BASE_TIME_MS,
    config: DEFAULT_SCORING
  });
  assert.equal(capped.score, 100);
});

test("archived leads keep their score", () => {
  const archived = leadScore(42, { archived: true });
  const next = applyScoreUpdate({
    leadId: "lead-1",
    existing: archived,
    label: "Interested",
    confidence: 1,
    multiplier: 3,
    receivedAtMs: BASE_TIME_MS + DAY_MS,
    config: DEFAULT_SCORING
  });
  assert.equal(next, archived);
});

test("late replies do not move lastEngagedAtMs backwards", () => {
  const next = applyScoreUpdate({
    leadId: "lead-1",
    existing: leadScore(10),
    label: "MaybeInterested",
    confidence: 1,
    multiplier: 1,
    receivedAtMs: BASE_TIME_MS - DAY_MS,
    config: DEFAULT_SCORING
  });
  assert.equal(next.score, 15);
  assert.equal(next.lastEngagedAtMs, BASE_TIME_MS);
});

test("assertLeadScoreInvariants rejects stored scores no update could produce", () => {
  const input = { config: DEFAULT_SCORING, threadKey: "thr_1" };
  const isThreadCorruption = (error: unknown): boolean =>
    error instanceof StateCorruptionError && error.scope === "thread" && error.threadKey === "thr_1";

  assert.doesNotThrow(() => assertLeadScoreInvariants(leadScore(0), input));
  assert.doesNotThrow(() => assertLeadScoreInvariants(leadScore(100, { archived: true }), input));
  assert.throws(() => assertLeadScoreInvariants(leadScore(Number.NaN), input), isThreadCorruption);
  assert.throws(() => assertLeadScoreInvariants(leadScore(-40), input), isThreadCorruption);
  assert.throws(() => assertLeadScoreInvariants(leadScore(100.5), input), isThreadCorruption);
  assert.throws(
    () => assertLeadScoreInvariants(leadScore(10, { lastEngagedAtMs: Number.POSITIVE_INFINITY }), input),
    isThreadCorruption
  );
  assert.throws(() => assertLeadScoreInvariants(leadScore(10, { updateCount: 1.5 }), input), isThreadCorruption);
  assert.throws(() => assertLeadScoreInvariants(leadScore(10, { updateCount: -1 }), input), isThreadCorruption);
});

test("ScoringEngine applies the strongest engagement signal and counts acknowledged decisions", () => {
  const stats = createReplyStats();
  const engine = new ScoringEngine({ config: DEFAULT_SCORING, stats });
  const scored = engine.score({
    leadId: "lead-9",
    existing: null,
    classification: classification(),
    text: "Can we schedule a demo to discuss pricing?",
    receivedAtMs: BASE_TIME_MS
  });
  near(scored.score, 22.5);
  assert.equal(scored.updateCount, 1);

  const decision: ActionDecision = {
    messageId: "m-1",
    actions: ["NotifyRep"],
    campaignListRemoval: false,
    priority: "normal",
    scoreTier: "warm",
    reason: "interested",
    evidence: {
      classification: classification({ fallback: true }),
      attribution: {
        threadKey: asThreadKey("thr_1"),
        campaignId: "c-1",
        leadId: "lead-9",
        confidence: 0.9,
        matchedBy: "sender_email",
        precedence: 2,
        revision: 1,
        sourceMessageId: "m-1"
      },
      score: scored
    }
  };
  engine.acknowledge(decision);

  const snapshot = stats.snapshot();
  assert.equal(snapshot.scoreUpdates, 1);
  assert.equal(snapshot.fallbacks, 1);
  assert.equal(snapshot.labels.Interested, 1);
  assert.equal(snapshot.actions.NotifyRep, 1);
});

test("ScoringEngine counts recorded feedback and calibration versions only", () => {
  const stats = createReplyStats();
  const engine = new ScoringEngine({ config: DEFAULT_SCORING, stats });

  engine.acknowledgeFeedback({ recorded: true, agreed: true });
  engine.acknowledgeFeedback({ recorded: true, agreed: false });
  engine.acknowledgeFeedback({ recorded: false, reason: "already_recorded" });
  engine.acknowledgeCalibration({ updated: true, params: { ...DEFAULT_CALIBRATION_PARAMS, version: 2 } });
  engine.acknowledgeCalibration({ updated: false, sampleCount: 3, params: DEFAULT_CALIBRATION_PARAMS });

  const snapshot = stats.snapshot();
  assert.deepEqual(snapshot.feedback, { received: 2, agreed: 1, accuracy: 0.5 });
  assert.equal(snapshot.calibrationVersion, 2);
});
