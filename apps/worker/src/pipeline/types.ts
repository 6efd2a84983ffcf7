import type {
  ActionDecision,
  AttributionRecord,
  ClassificationResult,
  IntentLabel,
  LeadScore,
  ReplyOutcomePayload,
  ReplyThread,
  ThreadEntry,
  ThreadKey
} from "@reply-triage/shared";

export {
  REPLY_QUEUE_NAMES,
  type CalibrationJobPayload,
  type DlqReplayJobPayload,
  type FeedbackJobPayload,
  type LeadArchiveJobPayload,
  type ReplyBatchJobPayload,
  type ReplyQueueName
} from "@reply-triage/shared";

export type ProcessedStatus = "classified" | "duplicate" | "spam";

export type ProcessedMessageRecord = {
  messageId: string;
  threadKey: ThreadKey;
  status: ProcessedStatus;
  outcome?: ReplyOutcomePayload;
  emitted: boolean;
};

/**
 * Everything one message changes, written in a single atomic step keyed by
 * message id.
 */
export type MessageCommit = {
  threadKey: ThreadKey;
  normalizedSubject: string;
  participants: string[];
  entry: ThreadEntry;
  status: ProcessedStatus;
  attribution?: AttributionRecord;
  score?: LeadScore;
  decision?: ActionDecision;
  outcome?: ReplyOutcomePayload;
};

export type CalibrationSample = {
  messageId: string;
  contextLabels: IntentLabel[];
  predictedLabel: IntentLabel;
  rawConfidence: number;
  effectiveConfidence: number;
  confirmedLabel: IntentLabel;
  recordedAtMs: number;
};

export type CalibrationParams = {
  version: number;
  contextWeight: number;
  maxContextBoost: number;
  flipRetention: number;
  sampleCount: number;
  computedAtMs: number;
};

export interface ReplyStore {
  getThread(threadKey: ThreadKey): Promise<ReplyThread | null>;
  findThreadKeyByMessageId(messageId: string): Promise<ThreadKey | null>;
  getProcessed(messageId: string): Promise<ProcessedMessageRecord | null>;
  getClassification(messageId: string): Promise<ClassificationResult | null>;
  getAttribution(threadKey: ThreadKey): Promise<AttributionRecord | null>;
  getLeadScore(leadId: string): Promise<LeadScore | null>;
  commitMessage(commit: MessageCommit): Promise<void>;
  markEmitted(messageId: string): Promise<void>;
  archiveLead(leadId: string): Promise<LeadScore>;
  appendCalibrationSample(sample: CalibrationSample): Promise<boolean>;
  listCalibrationSamples(): Promise<CalibrationSample[]>;
  getCalibrationParams(): Promise<CalibrationParams | null>;
  saveCalibrationParams(params: CalibrationParams): Promise<void>;
}

export type Campaign = {
  campaignId: string;
  name: string;
  active: boolean;
  sendList: Array<{ leadId: string; email: string; subject: string }>;
};

/**
 * Read side of the CRM, supplied by the CRM collaborator.
 */
export interface CampaignDirectory {
  findByTrackingId(trackingId: string): Promise<{ campaignId: string; leadId: string } | null>;
  findLeadByEmail(email: string): Promise<{ leadId: string; campaignId?: string } | null>;
  listActiveCampaigns(): Promise<Campaign[]>;
}

/**
 * CRM updater, notifier and response generator behind one hand-off.
 */
export interface ReplyOutcomeSink {
  deliver(payload: ReplyOutcomePayload): Promise<void>;
}
