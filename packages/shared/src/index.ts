export type {
  AttributionReason,
  AttributionRecord,
  ActionDecision,
  ActionKind,
  ClassificationResult,
  ContextWindowEntry,
  InboundMessage,
  IntentLabel,
  LeadScore,
  NotifyPriority,
  ReplyBody,
  ReplyOutcomePayload,
  ReplyThread,
  ScoreTier,
  SpamReason,
  ThreadEntry,
  ThreadKey,
  ThreadSummary
} from "./replies/types.js";

export {
  ATTRIBUTION_PRECEDENCE,
  INTENT_LABELS,
  UNATTRIBUTED_CAMPAIGN_ID,
  isIntentLabel
} from "./replies/types.js";

export { asTrimmedString, parseInboundMessage } from "./replies/parse.js";
export type { ParseResult } from "./replies/parse.js";

export {
  LOCK_KEYS,
  asThreadKey,
  compareChronologically,
  isStaleWork
} from "./replies/keys.js";

export type {
  InferRequest,
  InferResponse,
  InferenceCapability,
  InferenceHealth,
  InferenceProviderDeps,
  InferenceProviderFactory,
  InferenceProviderName,
  InferenceProviderRegistry
} from "./inference/provider.js";

export {
  REPLY_JOB_NAMES,
  REPLY_QUEUE_NAMES,
  dlqReplayJobId,
  feedbackJobId,
  leadArchiveJobId,
  replyBatchJobId
} from "./queue/types.js";
export type {
  CalibrationJobPayload,
  DlqReplayJobPayload,
  FeedbackJobPayload,
  LeadArchiveJobPayload,
  ReplyBatchJobPayload,
  ReplyQueueName
} from "./queue/types.js";

export type { BatchContext, BatchId, CorrelationId } from "./pipeline/types.js";

export { asBatchId, asCorrelationId, newBatchId, newCorrelationId } from "./pipeline/ids.js";

export { ErrorClass, classifyError } from "./reliability/error-taxonomy.js";
export type { ClassifiedError } from "./reliability/error-taxonomy.js";

export {
  DEAD_LETTER_JOB_OPTIONS,
  DEFAULT_BACKOFF_BASE_MS,
  DEFAULT_BULLMQ_JOB_OPTIONS,
  DEFAULT_JOB_ATTEMPTS
} from "./reliability/retry-policy.js";

export {
  ENV_REPLY_INGESTION_DISABLED,
  KILL_SWITCH_REPLY_INGESTION,
  isGlobalReplyIngestionDisabled,
  isTruthyEnv
} from "./reliability/kill-switches.js";
