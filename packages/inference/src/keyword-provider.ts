import type {
  InferRequest,
  InferResponse,
  InferenceCapability,
  InferenceHealth,
  IntentLabel
} from "@reply-triage/shared";

type KeywordRule = {
  label: IntentLabel;
  confidence: number;
  keywords: string[];
};

// Evaluated in order; rejection phrases must win over "interested".
const KEYWORD_RULES: KeywordRule[] = [
  {
    label: "NotInterested",
    confidence: 0.8,
    keywords: [
      "not interested",
      "no thanks",
      "no thank you",
      "unsubscribe",
      "remove me",
      "stop emailing",
      "stop sending",
      "don't contact",
      "do not contact",
      "not looking",
      "already have",
      "satisfied with current"
    ]
  },
  {
    label: "Interested",
    confidence: 0.7,
    keywords: [
      "interested",
      "pricing",
      "cost",
      "demo",
      "meeting",
      "call",
      "schedule",
      "discuss",
      "more information",
      "tell me more"
    ]
  },
  {
    label: "MaybeInterested",
    confidence: 0.6,
    keywords: ["maybe", "perhaps", "might be", "could be", "future", "later", "not right now", "busy", "timing"]
  }
];

const DEFAULT_CONFIDENCE = 0.5;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function containsPhrase(text: string, phrase: string): boolean {
  return new RegExp(`\\b${escapeRegExp(phrase)}\\b`, "i").test(text);
}

export function matchKeywordRule(text: string): { label: IntentLabel; confidence: number; keyword?: string } {
  for (const rule of KEYWORD_RULES) {
    const keyword = rule.keywords.find((candidate) => containsPhrase(text, candidate));
    if (keyword) {
      return { label: rule.label, confidence: rule.confidence, keyword };
    }
  }
  return { label: "MaybeInterested", confidence: DEFAULT_CONFIDENCE };
}

/**
 * Rule-based capability; useful offline and as a configured backend when no
 * hosted model is available.
 */
export class KeywordInferenceProvider implements InferenceCapability {
  readonly name = "keyword" as const;
  readonly modelId = "keyword-rules-v1";

  async infer(request: InferRequest): Promise<InferResponse> {
    const matched = matchKeywordRule(request.text);
    const label = request.labelSet.includes(matched.label) ? matched.label : "MaybeInterested";
    return {
      label,
      rawConfidence: label === matched.label ? matched.confidence : DEFAULT_CONFIDENCE
    };
  }

  async checkHealth(): Promise<InferenceHealth> {
    return { available: true };
  }
}
