import type { Logger } from "pino";
import {
  ErrorClass,
  LOCK_KEYS,
  asBatchId,
  classifyError,
  compareChronologically,
  isStaleWork,
  newBatchId,
  newCorrelationId,
  type ActionDecision,
  type BatchContext,
  type CorrelationId,
  type InboundMessage,
  type InferenceCapability,
  type IntentLabel,
  type LeadScore,
  type ReplyOutcomePayload,
  type ReplyThread,
  type ThreadEntry,
  type ThreadKey,
  type ThreadSummary
} from "@reply-triage/shared";
import type { WorkerConfig } from "../config.js";
import { toStructuredLogEvent, type StructuredLogContext } from "../logging.js";
import { AttributionEngine } from "./attribution.js";
import { ContextAwareClassifier, type FeedbackResult, type RecomputeResult } from "./classifier.js";
import type { DlqStore } from "./dlq.js";
import {
  MalformedInputError,
  StateCorruptionError,
  isStoreLevelCorruption,
  serializeError,
  toFailureCode
} from "./errors.js";
import { KeyedLock } from "./keyed-lock.js";
import { decide } from "./router.js";
import { ScoringEngine, assertLeadScoreInvariants } from "./scoring.js";
import { hasUrgentWording } from "./signals.js";
import type { ReplyStats, ReplyStatsSnapshot } from "./stats.js";
import { bodyToText, stripQuotedReply } from "./text.js";
import { ThreadResolver, assertWellFormed, type ThreadResolution } from "./thread-resolver.js";
import {
  REPLY_QUEUE_NAMES,
  type CalibrationParams,
  type CampaignDirectory,
  type ReplyOutcomeSink,
  type ReplyStore
} from "./types.js";

export type ProcessorConfig = Pick<
  WorkerConfig,
  | "inferenceTimeoutMs"
  | "directoryTimeoutMs"
  | "contextWindowSize"
  | "thresholds"
  | "scoreTiers"
  | "scoring"
  | "fuzzyMaxEditDistance"
  | "calibrationMinSamples"
>;

export type ReplyProcessorDeps = {
  store: ReplyStore;
  directory: CampaignDirectory;
  inference: InferenceCapability;
  sink: ReplyOutcomeSink;
  dlq: DlqStore;
  stats: ReplyStats;
  logger: Logger;
  config: ProcessorConfig;
};

export type MessageOutcomeStatus =
  | "processed"
  | "already_processed"
  | "duplicate"
  | "spam"
  | "skipped"
  | "failed";

export type MessageOutcome = {
  messageId: string;
  status: MessageOutcomeStatus;
  threadKey?: ThreadKey;
  decision?: ActionDecision;
  reason?: string;
};

export type BatchSummary = {
  batchId: string;
  received: number;
  processed: number;
  alreadyProcessed: number;
  duplicates: number;
  spam: number;
  skipped: number;
  failed: number;
  outcomes: MessageOutcome[];
};

type IndexedMessage = {
  index: number;
  message: InboundMessage;
};

type ThreadGroup = {
  threadKey: ThreadKey;
  items: IndexedMessage[];
};

export function summarizeThread(thread: Pick<ReplyThread, "threadKey" | "participants" | "entries">): ThreadSummary {
  const first = thread.entries[0];
  const last = thread.entries[thread.entries.length - 1];
  return {
    threadKey: thread.threadKey,
    messageCount: thread.entries.length,
    participants: [...thread.participants],
    firstReceivedAtMs: first ? first.message.receivedAtMs : 0,
    lastReceivedAtMs: last ? last.message.receivedAtMs : 0
  };
}

export function summarizeOutcomes(batchId: string, received: number, outcomes: MessageOutcome[]): BatchSummary {
  const count = (status: MessageOutcomeStatus): number =>
    outcomes.filter((outcome) => outcome.status === status).length;
  return {
    batchId,
    received,
    processed: count("processed"),
    alreadyProcessed: count("already_processed"),
    duplicates: count("duplicate"),
    spam: count("spam"),
    skipped: count("skipped"),
    failed: count("failed"),
    outcomes
  };
}

function isFatal(error: unknown): boolean {
  if (isStoreLevelCorruption(error)) {
    return true;
  }
  if (error instanceof MalformedInputError || error instanceof StateCorruptionError) {
    return false;
  }
  return classifyError(error).class === ErrorClass.TRANSIENT;
}

/**
 * Runs inbound replies through thread resolution, classification,
 * attribution, scoring and routing, committing each message atomically.
 */
export class ReplyProcessor {
  readonly resolver: ThreadResolver;
  readonly classifier: ContextAwareClassifier;
  readonly attribution: AttributionEngine;
  readonly scoring: ScoringEngine;

  private readonly store: ReplyStore;
  private readonly sink: ReplyOutcomeSink;
  private readonly dlq: DlqStore;
  private readonly stats: ReplyStats;
  private readonly logger: Logger;
  private readonly config: ProcessorConfig;
  private readonly threadLocks = new KeyedLock();
  private readonly leadLocks = new KeyedLock();

  constructor(deps: ReplyProcessorDeps) {
    this.store = deps.store;
    this.sink = deps.sink;
    this.dlq = deps.dlq;
    this.stats = deps.stats;
    this.logger = deps.logger;
    this.config = deps.config;
    this.resolver = new ThreadResolver({ store: deps.store, stats: deps.stats });
    this.classifier = new ContextAwareClassifier({
      inference: deps.inference,
      store: deps.store,
      logger: deps.logger,
      options: {
        contextWindowSize: deps.config.contextWindowSize,
        inferenceTimeoutMs: deps.config.inferenceTimeoutMs,
        calibrationMinSamples: deps.config.calibrationMinSamples
      }
    });
    this.attribution = new AttributionEngine({
      directory: deps.directory,
      logger: deps.logger,
      options: {
        directoryTimeoutMs: deps.config.directoryTimeoutMs,
        fuzzyMaxEditDistance: deps.config.fuzzyMaxEditDistance
      }
    });
    this.scoring = new ScoringEngine({ config: deps.config.scoring, stats: deps.stats });
  }

  snapshot(): ReplyStatsSnapshot {
    return this.stats.snapshot();
  }

  async processBatch(
    messages: readonly InboundMessage[],
    input: { batchId?: string; correlationId?: CorrelationId } = {}
  ): Promise<BatchSummary> {
    const context: BatchContext = {
      batchId: input.batchId ? asBatchId(input.batchId) : newBatchId(),
      correlationId: input.correlationId ?? newCorrelationId(),
      receivedAt: new Date().toISOString()
    };
    const logContext: StructuredLogContext = {
      batchId: context.batchId,
      correlationId: context.correlationId,
      stage: "reply_batch"
    };
    const startedAtMs = Date.now();
    this.logger.info({ ...toStructuredLogEvent(logContext, "batch.start"), received: messages.length });

    const outcomes = new Array<MessageOutcome | undefined>(messages.length).fill(undefined);
    const valid: IndexedMessage[] = [];

    for (const [index, message] of messages.entries()) {
      try {
        assertWellFormed(message);
        valid.push({ index, message });
      } catch (error) {
        outcomes[index] = await this.reject({ message, error, logContext, status: "skipped" });
      }
    }

    valid.sort((left, right) => compareChronologically(left.message, right.message));

    const pending = new Map<string, ThreadKey>();
    const groups = new Map<ThreadKey, ThreadGroup>();
    for (const item of valid) {
      const { message } = item;
      const seenKey = pending.get(message.messageId);
      if (seenKey) {
        this.resolver.recordUnresolved("duplicate");
        outcomes[item.index] = {
          messageId: message.messageId,
          status: "duplicate",
          threadKey: seenKey,
          reason: "repeated message id in batch"
        };
        continue;
      }
      const threadKey = await this.resolver.resolveKey(message, pending);
      pending.set(message.messageId, threadKey);
      const group = groups.get(threadKey) ?? { threadKey, items: [] };
      group.items.push(item);
      groups.set(threadKey, group);
    }

    const params = await this.classifier.currentParams();
    const settled = await Promise.allSettled(
      [...groups.values()].map((group) =>
        this.threadLocks.runExclusive(LOCK_KEYS.threadSingleFlight(group.threadKey), () =>
          this.processGroup(group, { logContext, params, outcomes })
        )
      )
    );

    const fatal = settled.find((result): result is PromiseRejectedResult => result.status === "rejected");
    if (fatal) {
      const serialized = serializeError(fatal.reason);
      this.logger.error(
        toStructuredLogEvent(logContext, "batch.aborted", {
          elapsedMs: Date.now() - startedAtMs,
          errorClass: serialized.name,
          errorCode: serialized.code,
          errorMessage: serialized.message
        })
      );
      throw fatal.reason;
    }

    const summary = summarizeOutcomes(
      context.batchId,
      messages.length,
      outcomes.map(
        (outcome, index): MessageOutcome =>
          outcome ?? { messageId: messages[index].messageId, status: "failed", reason: "not processed" }
      )
    );
    this.logger.info({
      ...toStructuredLogEvent(logContext, "batch.done", { elapsedMs: Date.now() - startedAtMs }),
      processed: summary.processed,
      alreadyProcessed: summary.alreadyProcessed,
      duplicates: summary.duplicates,
      spam: summary.spam,
      skipped: summary.skipped,
      failed: summary.failed
    });
    return summary;
  }

  async recordFeedback(input: { messageId: string; confirmedLabel: IntentLabel }): Promise<FeedbackResult> {
    const result = await this.classifier.recordFeedback(input);
    this.scoring.acknowledgeFeedback(result);
    return result;
  }

  async recomputeCalibration(input: { nowMs?: number } = {}): Promise<RecomputeResult> {
    const result = await this.classifier.recomputeCalibration(input);
    this.scoring.acknowledgeCalibration(result);
    return result;
  }

  async archiveLead(leadId: string): Promise<LeadScore> {
    return this.leadLocks.runExclusive(LOCK_KEYS.leadSingleFlight(leadId), () => this.store.archiveLead(leadId));
  }

  private async processGroup(
    group: ThreadGroup,
    input: {
      logContext: StructuredLogContext;
      params: CalibrationParams;
      outcomes: Array<MessageOutcome | undefined>;
    }
  ): Promise<void> {
    for (const [position, item] of group.items.entries()) {
      const logContext = {
        ...input.logContext,
        threadKey: group.threadKey,
        messageId: item.message.messageId
      };
      try {
        input.outcomes[item.index] = await this.processMessage(item.message, group.threadKey, {
          logContext,
          params: input.params
        });
      } catch (error) {
        if (isFatal(error)) {
          throw error;
        }
        input.outcomes[item.index] = await this.reject({
          message: item.message,
          error,
          logContext,
          status: "failed",
          threadKey: group.threadKey
        });
        if (error instanceof StateCorruptionError) {
          for (const rest of group.items.slice(position + 1)) {
            input.outcomes[rest.index] = await this.reject({
              message: rest.message,
              error,
              logContext: { ...logContext, messageId: rest.message.messageId },
              status: "failed",
              threadKey: group.threadKey
            });
          }
          return;
        }
      }
    }
  }

  private async processMessage(
    message: InboundMessage,
    threadKey: ThreadKey,
    input: { logContext: StructuredLogContext; params: CalibrationParams }
  ): Promise<MessageOutcome> {
    const { logContext } = input;
    const processed = await this.store.getProcessed(message.messageId);
    if (processed) {
      if (processed.outcome && !processed.emitted) {
        await this.emit(processed.outcome, logContext);
      }
      return {
        messageId: message.messageId,
        status: "already_processed",
        threadKey: processed.threadKey,
        decision: processed.outcome?.decision,
        reason: processed.status
      };
    }

    const resolution = await this.resolver.resolve(message, { threadKey });
    this.logResolution(resolution, logContext);

    if (resolution.duplicateOf === "message_id") {
      return { messageId: message.messageId, status: "duplicate", threadKey, reason: "message id already in thread" };
    }

    if (resolution.isDuplicate || resolution.isSpam) {
      const status = resolution.isDuplicate ? "duplicate" : "spam";
      await this.store.commitMessage({
        threadKey,
        normalizedSubject: resolution.thread.normalizedSubject,
        participants: resolution.thread.participants,
        entry: resolution.entry,
        status
      });
      this.resolver.acknowledge(resolution);
      return {
        messageId: message.messageId,
        status,
        threadKey,
        reason: resolution.isDuplicate ? "content hash matches an earlier reply" : resolution.entry.spamReason
      };
    }

    const classification = await this.classifier.classify(message, resolution.thread.entries, {
      params: input.params,
      logContext
    });
    const attribution = await this.attribution.attribute({
      threadKey,
      message,
      existing: await this.store.getAttribution(threadKey),
      logContext
    });
    const text = stripQuotedReply(bodyToText(message.body));

    const outcome = await this.leadLocks.runExclusive(LOCK_KEYS.leadSingleFlight(attribution.leadId), async () => {
      const existing = await this.store.getLeadScore(attribution.leadId);
      if (existing) {
        assertLeadScoreInvariants(existing, { config: this.config.scoring, threadKey });
      }
      const score = this.scoring.score({
        leadId: attribution.leadId,
        existing,
        classification,
        text,
        receivedAtMs: message.receivedAtMs
      });
      const decision = decide(
        classification,
        attribution,
        score,
        { thresholds: this.config.thresholds, scoreTiers: this.config.scoreTiers },
        { urgent: hasUrgentWording(text) }
      );
      const entry: ThreadEntry = { ...resolution.entry, classification };
      const history = resolution.thread.entries.map((candidate) =>
        candidate.message.messageId === message.messageId ? entry : candidate
      );
      const payload: ReplyOutcomePayload = {
        messageId: message.messageId,
        threadKey,
        decision,
        attribution,
        score,
        classification,
        history,
        summary: summarizeThread({ ...resolution.thread, entries: history })
      };

      await this.store.commitMessage({
        threadKey,
        normalizedSubject: resolution.thread.normalizedSubject,
        participants: resolution.thread.participants,
        entry,
        status: "classified",
        attribution,
        score,
        decision,
        outcome: payload
      });
      return payload;
    });

    this.resolver.acknowledge(resolution);
    this.scoring.acknowledge(outcome.decision);
    this.logger.info(
      toStructuredLogEvent({ ...logContext, leadId: outcome.score.leadId, campaignId: outcome.attribution.campaignId }, "reply.decided", {
        label: classification.label,
        confidence: classification.confidence,
        actions: outcome.decision.actions
      })
    );

    await this.emit(outcome, logContext);
    return {
      messageId: message.messageId,
      status: "processed",
      threadKey,
      decision: outcome.decision
    };
  }

  private logResolution(resolution: ThreadResolution, logContext: StructuredLogContext): void {
    const latest = resolution.thread.entries[resolution.thread.entries.length - 1];
    const late =
      latest !== undefined &&
      latest.message.messageId !== resolution.entry.message.messageId &&
      isStaleWork({
        candidateReceivedAtMs: resolution.entry.message.receivedAtMs,
        latestReceivedAtMs: latest.message.receivedAtMs
      });
    this.logger.info({
      ...toStructuredLogEvent(logContext, "reply.resolved"),
      isNewThread: resolution.isNewThread,
      isDuplicate: resolution.isDuplicate,
      isSpam: resolution.isSpam,
      lateArrival: late
    });
  }

  /**
   * Hands the outcome to collaborators. A failed hand-off leaves the
   * message unemitted so the next delivery of the same id retries it.
   */
  private async emit(payload: ReplyOutcomePayload, logContext: StructuredLogContext): Promise<void> {
    try {
      await this.sink.deliver(payload);
    } catch (error) {
      const serialized = serializeError(error);
      this.logger.warn(
        toStructuredLogEvent(logContext, "reply.emit_failed", {
          errorClass: serialized.name,
          errorCode: serialized.code,
          errorMessage: serialized.message
        })
      );
      return;
    }
    await this.store.markEmitted(payload.messageId);
  }

  private async reject(input: {
    message: InboundMessage;
    error: unknown;
    logContext: StructuredLogContext;
    status: "skipped" | "failed";
    threadKey?: ThreadKey;
  }): Promise<MessageOutcome> {
    const serialized = serializeError(input.error);
    const reasonCode = toFailureCode(input.error);

    this.logger.warn(
      toStructuredLogEvent({ ...input.logContext, messageId: input.message.messageId }, "reply.failed", {
        errorClass: serialized.name,
        errorCode: reasonCode,
        errorMessage: serialized.message
      })
    );
    this.resolver.recordUnresolved(input.status === "skipped" ? "malformed" : "failed");

    await this.dlq.enqueue({
      occurredAt: new Date().toISOString(),
      stage: REPLY_QUEUE_NAMES.batches,
      batchId: input.logContext.batchId,
      threadKey: input.threadKey,
      messageId: input.message.messageId,
      reasonCode,
      error: serialized,
      originalPayload: input.message
    });

    return {
      messageId: input.message.messageId,
      status: input.status,
      threadKey: input.threadKey,
      reason: `${reasonCode}: ${serialized.message}`
    };
  }
}
