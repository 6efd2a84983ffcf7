export type ThreadKey = string & { readonly __brand: "ThreadKey" };

export const INTENT_LABELS = ["NotInterested", "MaybeInterested", "Interested"] as const;

export type IntentLabel = (typeof INTENT_LABELS)[number];

export function isIntentLabel(value: unknown): value is IntentLabel {
  return typeof value === "string" && (INTENT_LABELS as readonly string[]).includes(value);
}

export type ReplyBody = {
  text?: string;
  html?: string;
};

/**
 * One inbound reply as delivered by the ingestion collaborator.
 * Addresses are compared lowercase; `receivedAtMs` is epoch milliseconds.
 */
export type InboundMessage = {
  messageId: string;
  sender: string;
  recipients?: string[];
  subject: string;
  body: ReplyBody;
  receivedAtMs: number;
  inReplyTo?: string;
  references?: string[];
  headers?: Record<string, string>;
};

export type SpamReason =
  | "auto_reply_marker"
  | "bulk_header"
  | "automated_sender"
  | "unsubscribe_confirmation";

export type ThreadEntry = {
  message: InboundMessage;
  contentHash: string;
  isDuplicate: boolean;
  isSpam: boolean;
  spamReason?: SpamReason;
  classification?: ClassificationResult;
};

/**
 * Deterministic thread state:
 * - entries sorted ascending by receivedAtMs, tie-breaker messageId
 * - participants deduped by lowercase address and sorted
 */
export type ReplyThread = {
  threadKey: ThreadKey;
  normalizedSubject: string;
  participants: string[];
  entries: ThreadEntry[];
  isSpam: boolean;
};

export type ContextWindowEntry = {
  messageId: string;
  label: IntentLabel;
  confidence: number;
  text: string;
};

export type ClassificationResult = {
  messageId: string;
  label: IntentLabel;
  confidence: number;
  rawConfidence: number;
  contextLabels: IntentLabel[];
  modelVersion: string;
  fallback: boolean;
};

export type AttributionReason = "tracking_id" | "sender_email" | "fuzzy_subject" | "unattributed";

export const UNATTRIBUTED_CAMPAIGN_ID = "unattributed";

export const ATTRIBUTION_PRECEDENCE: Record<AttributionReason, number> = {
  tracking_id: 1,
  sender_email: 2,
  fuzzy_subject: 3,
  unattributed: 4
};

export type AttributionRecord = {
  threadKey: ThreadKey;
  campaignId: string;
  leadId: string;
  confidence: number;
  matchedBy: AttributionReason;
  precedence: number;
  revision: number;
  sourceMessageId: string;
};

export type LeadScore = {
  leadId: string;
  score: number;
  lastEngagedAtMs: number;
  updateCount: number;
  archived: boolean;
};

export type ActionKind =
  | "RespondInterested"
  | "RespondMaybe"
  | "SuppressAndAcknowledge"
  | "NotifyRep"
  | "NoAction";

export type ScoreTier = "cold" | "warm" | "hot";

export type NotifyPriority = "normal" | "high";

export type ActionDecision = {
  messageId: string;
  actions: ActionKind[];
  campaignListRemoval: boolean;
  priority: NotifyPriority;
  scoreTier: ScoreTier;
  reason: string;
  evidence: {
    classification: ClassificationResult;
    attribution: AttributionRecord;
    score: LeadScore;
  };
};

export type ThreadSummary = {
  threadKey: ThreadKey;
  messageCount: number;
  participants: string[];
  firstReceivedAtMs: number;
  lastReceivedAtMs: number;
};

/**
 * Payload handed to the CRM updater, notifier and response generator.
 * The core never writes to the CRM itself.
 */
export type ReplyOutcomePayload = {
  messageId: string;
  threadKey: ThreadKey;
  decision: ActionDecision;
  attribution: AttributionRecord;
  score: LeadScore;
  classification: ClassificationResult;
  history: ThreadEntry[];
  summary: ThreadSummary;
};
