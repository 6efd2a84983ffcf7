export const ENGAGEMENT_SIGNALS = ["pricing_inquiry", "demo_request", "meeting_request"] as const;

export type EngagementSignal = (typeof ENGAGEMENT_SIGNALS)[number];

export const ENGAGEMENT_MULTIPLIERS: Record<EngagementSignal, number> = {
  pricing_inquiry: 2.0,
  demo_request: 2.5,
  meeting_request: 3.0
};

const ENGAGEMENT_KEYWORDS: Record<EngagementSignal, string[]> = {
  pricing_inquiry: ["price", "pricing", "cost", "budget", "quote", "proposal"],
  demo_request: ["demo", "demonstration", "show me", "walk through", "preview"],
  meeting_request: ["meeting", "call", "schedule", "appointment", "discuss", "talk"]
};

const URGENT_KEYWORDS = [
  "urgent",
  "asap",
  "immediately",
  "today",
  "this week",
  "budget approved",
  "ready to buy",
  "decision maker"
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function containsPhrase(text: string, phrase: string): boolean {
  return new RegExp(`\\b${escapeRegExp(phrase)}\\b`, "i").test(text);
}

export function detectEngagementSignals(text: string): EngagementSignal[] {
  return ENGAGEMENT_SIGNALS.filter((signal) =>
    ENGAGEMENT_KEYWORDS[signal].some((keyword) => containsPhrase(text, keyword))
  );
}

/**
 * Strongest matched signal wins; multipliers do not compound.
 */
export function engagementMultiplier(signals: readonly EngagementSignal[]): number {
  return signals.reduce((max, signal) => Math.max(max, ENGAGEMENT_MULTIPLIERS[signal]), 1);
}

export function hasUrgentWording(text: string): boolean {
  return URGENT_KEYWORDS.some((keyword) => containsPhrase(text, keyword));
}
