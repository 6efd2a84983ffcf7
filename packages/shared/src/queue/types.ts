import type { InboundMessage, IntentLabel } from "../replies/types.js";

export const REPLY_QUEUE_NAMES = {
  batches: "reply_batches",
  feedback: "reply_feedback",
  leadArchive: "lead_archive",
  calibration: "calibration",
  dlqReplay: "reply_dlq_replay",
  outcomes: "reply_outcomes",
  dlq: "reply_dlq"
} as const;

export type ReplyQueueName = (typeof REPLY_QUEUE_NAMES)[keyof typeof REPLY_QUEUE_NAMES];

export const REPLY_JOB_NAMES = {
  batch: "reply.batch",
  feedback: "reply.feedback",
  leadArchive: "lead.archive",
  calibration: "calibration.recompute",
  dlqReplay: "dlq.replay"
} as const;

export type ReplyBatchJobPayload = {
  correlationId?: string;
  messages: InboundMessage[];
};

export type FeedbackJobPayload = {
  messageId: string;
  confirmedLabel: IntentLabel;
  source?: string;
};

export type LeadArchiveJobPayload = {
  leadId: string;
};

export type CalibrationJobPayload = {
  requestedAt?: string;
};

export type DlqReplayJobPayload = {
  limit?: number;
  reasonCode?: string;
};

export const replyBatchJobId = (batchKey: string): string => `reply_batch-${batchKey}`;

export const feedbackJobId = (messageKey: string, confirmedLabel: IntentLabel): string =>
  `reply_feedback-${messageKey}-${confirmedLabel}`;

export const leadArchiveJobId = (leadKey: string): string => `lead_archive-${leadKey}`;

export const dlqReplayJobId = (filterKey: string): string => `dlq_replay-${filterKey}`;
