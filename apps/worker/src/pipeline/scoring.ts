import type { ActionDecision, ClassificationResult, IntentLabel, LeadScore } from "@reply-triage/shared";
import type { ScoringConfig } from "../config.js";
import type { FeedbackResult, RecomputeResult } from "./classifier.js";
import { StateCorruptionError } from "./errors.js";
import { detectEngagementSignals, engagementMultiplier } from "./signals.js";
import type { ReplyStats } from "./stats.js";

const MS_PER_DAY = 86_400_000;

export function decayFactor(input: { elapsedMs: number; halfLifeDays: number }): number {
  const elapsedDays = Math.max(0, input.elapsedMs) / MS_PER_DAY;
  return 0.5 ** (elapsedDays / input.halfLifeDays);
}

export function scoreContribution(input: {
  label: IntentLabel;
  confidence: number;
  multiplier: number;
  weights: ScoringConfig["weights"];
}): number {
  const weight = input.weights[input.label];
  return weight > 0 ? weight * input.confidence * input.multiplier : weight * input.confidence;
}

/**
 * Rejects a stored score that no update could have produced. The failure
 * is scoped to the thread being processed.
 */
export function assertLeadScoreInvariants(
  score: LeadScore,
  input: { config: Pick<ScoringConfig, "floor" | "ceiling">; threadKey: string }
): void {
  const fail = (detail: string): never => {
    throw new StateCorruptionError({
      scope: "thread",
      threadKey: input.threadKey,
      detail: `lead ${score.leadId} ${detail}`
    });
  };

  if (!Number.isFinite(score.score) || score.score < input.config.floor || score.score > input.config.ceiling) {
    fail(`score ${score.score} outside [${input.config.floor}, ${input.config.ceiling}]`);
  }
  if (!Number.isFinite(score.lastEngagedAtMs)) {
    fail(`last engagement ${score.lastEngagedAtMs} is not a timestamp`);
  }
  if (!Number.isInteger(score.updateCount) || score.updateCount < 0) {
    fail(`update count ${score.updateCount} is not a non-negative integer`);
  }
}

/**
 * Decays the previous score to `receivedAtMs`, adds the reply's contribution
 * and clamps into [floor, ceiling]. Archived leads are returned unchanged.
 */
export function applyScoreUpdate(input: {
  leadId: string;
  existing: LeadScore | null;
  label: IntentLabel;
  confidence: number;
  multiplier: number;
  receivedAtMs: number;
  config: ScoringConfig;
}): LeadScore {
  const { existing, config } = input;
  if (existing?.archived) {
    return existing;
  }

  const previous = existing
    ? existing.score *
      decayFactor({ elapsedMs: input.receivedAtMs - existing.lastEngagedAtMs, halfLifeDays: config.halfLifeDays })
    : 0;
  const next =
    previous +
    scoreContribution({
      label: input.label,
      confidence: input.confidence,
      multiplier: input.multiplier,
      weights: config.weights
    });

  return {
    leadId: input.leadId,
    score: Math.min(config.ceiling, Math.max(config.floor, next)),
    lastEngagedAtMs: existing ? Math.max(existing.lastEngagedAtMs, input.receivedAtMs) : input.receivedAtMs,
    updateCount: (existing?.updateCount ?? 0) + 1,
    archived: false
  };
}

export class ScoringEngine {
  private readonly config: ScoringConfig;
  private readonly stats: ReplyStats;

  constructor(input: { config: ScoringConfig; stats: ReplyStats }) {
    this.config = input.config;
    this.stats = input.stats;
  }

  score(input: {
    leadId: string;
    existing: LeadScore | null;
    classification: ClassificationResult;
    text: string;
    receivedAtMs: number;
  }): LeadScore {
    return applyScoreUpdate({
      leadId: input.leadId,
      existing: input.existing,
      label: input.classification.label,
      confidence: input.classification.confidence,
      multiplier: engagementMultiplier(detectEngagementSignals(input.text)),
      receivedAtMs: input.receivedAtMs,
      config: this.config
    });
  }

  /**
   * Counts a scored message once its commit has landed.
   */
  acknowledge(decision: ActionDecision): void {
    this.stats.recordScored({
      label: decision.evidence.classification.label,
      fallback: decision.evidence.classification.fallback,
      actions: decision.actions
    });
  }

  acknowledgeFeedback(result: FeedbackResult): void {
    if (result.recorded) {
      this.stats.recordFeedback({ agreed: result.agreed });
    }
  }

  acknowledgeCalibration(result: RecomputeResult): void {
    if (result.updated) {
      this.stats.recordCalibrationVersion(result.params.version);
    }
  }
}
