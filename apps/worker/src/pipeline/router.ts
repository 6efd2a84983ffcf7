import type {
  ActionDecision,
  ActionKind,
  AttributionRecord,
  ClassificationResult,
  LeadScore,
  NotifyPriority,
  ScoreTier
} from "@reply-triage/shared";
import type { RouterThresholds, ScoreTierCutoffs } from "../config.js";
import { isAttributed } from "./attribution.js";

export type RouterPolicy = {
  thresholds: RouterThresholds;
  scoreTiers: ScoreTierCutoffs;
};

export type RouterSignals = {
  urgent: boolean;
};

export function scoreTierOf(score: number, cutoffs: ScoreTierCutoffs): ScoreTier {
  if (score >= cutoffs.hot) {
    return "hot";
  }
  if (score >= cutoffs.warm) {
    return "warm";
  }
  return "cold";
}

function routeLabel(
  classification: ClassificationResult,
  thresholds: RouterThresholds
): { actions: ActionKind[]; reason: string } {
  const confidence = classification.confidence;
  switch (classification.label) {
    case "Interested":
      return confidence >= thresholds.high
        ? { actions: ["RespondInterested", "NotifyRep"], reason: `interested at ${confidence.toFixed(3)} >= ${thresholds.high}` }
        : { actions: ["NotifyRep"], reason: `interested at ${confidence.toFixed(3)} < ${thresholds.high}` };
    case "MaybeInterested":
      return confidence >= thresholds.mid
        ? { actions: ["RespondMaybe"], reason: `maybe interested at ${confidence.toFixed(3)} >= ${thresholds.mid}` }
        : { actions: ["NoAction"], reason: `maybe interested at ${confidence.toFixed(3)} < ${thresholds.mid}` };
    case "NotInterested":
      return { actions: ["SuppressAndAcknowledge"], reason: "not interested" };
  }
}

/**
 * Pure routing table. Equal inputs always produce equal decisions.
 */
export function decide(
  classification: ClassificationResult,
  attribution: AttributionRecord,
  score: LeadScore,
  policy: RouterPolicy,
  signals: RouterSignals = { urgent: false }
): ActionDecision {
  const { actions, reason } = routeLabel(classification, policy.thresholds);
  const scoreTier = scoreTierOf(score.score, policy.scoreTiers);
  const notifies = actions.includes("NotifyRep");
  const priority: NotifyPriority = notifies && (scoreTier === "hot" || signals.urgent) ? "high" : "normal";

  return {
    messageId: classification.messageId,
    actions,
    campaignListRemoval: actions.includes("SuppressAndAcknowledge") && isAttributed(attribution),
    priority,
    scoreTier,
    reason,
    evidence: {
      classification,
      attribution,
      score
    }
  };
}
