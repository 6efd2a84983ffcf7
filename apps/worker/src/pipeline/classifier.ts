import type { Logger } from "pino";
import {
  INTENT_LABELS,
  compareChronologically,
  isIntentLabel,
  type ClassificationResult,
  type ContextWindowEntry,
  type InboundMessage,
  type InferenceCapability,
  type IntentLabel,
  type ThreadEntry
} from "@reply-triage/shared";
import { toStructuredLogEvent, type StructuredLogContext } from "../logging.js";
import { DEFAULT_CALIBRATION_PARAMS, applyCalibration, fitCalibration } from "./calibration.js";
import { serializeError, toTransientCapabilityError, withTimeout } from "./errors.js";
import { bodyToText, stripQuotedReply } from "./text.js";
import type { CalibrationParams, ReplyStore } from "./types.js";

const FALLBACK_MODEL_VERSION = "fallback";
const NO_CONTEXT_FALLBACK = { label: "MaybeInterested", confidence: 0.3 } as const;

export type ClassifierOptions = {
  contextWindowSize: number;
  inferenceTimeoutMs: number;
  calibrationMinSamples: number;
};

export type FeedbackResult =
  | { recorded: true; agreed: boolean }
  | { recorded: false; reason: "unknown_message" | "fallback_classification" | "already_recorded" };

export type RecomputeResult =
  | { updated: true; params: CalibrationParams }
  | { updated: false; sampleCount: number; params: CalibrationParams };

/**
 * Prior non-duplicate, non-spam, classified entries that precede `message`,
 * most recent first.
 */
export function buildContextWindow(
  history: readonly ThreadEntry[],
  message: InboundMessage,
  size: number
): ContextWindowEntry[] {
  const window: ContextWindowEntry[] = [];
  for (let index = history.length - 1; index >= 0 && window.length < size; index -= 1) {
    const entry = history[index];
    const classification = entry.classification;
    if (!classification || entry.isDuplicate || entry.isSpam) {
      continue;
    }
    if (compareChronologically(entry.message, message) >= 0) {
      continue;
    }
    window.push({
      messageId: entry.message.messageId,
      label: classification.label,
      confidence: classification.confidence,
      text: stripQuotedReply(bodyToText(entry.message.body)).trim()
    });
  }
  return window;
}

/**
 * `prior` is the thread's most recent classified entry, independent of the
 * window size.
 */
export function fallbackClassification(
  messageId: string,
  contextWindow: readonly ContextWindowEntry[],
  prior: ContextWindowEntry | undefined = contextWindow[0]
): ClassificationResult {
  const label: IntentLabel = prior ? prior.label : NO_CONTEXT_FALLBACK.label;
  const confidence = prior ? prior.confidence / 2 : NO_CONTEXT_FALLBACK.confidence;
  return {
    messageId,
    label,
    confidence,
    rawConfidence: confidence,
    contextLabels: contextWindow.map((entry) => entry.label),
    modelVersion: FALLBACK_MODEL_VERSION,
    fallback: true
  };
}

export class ContextAwareClassifier {
  private readonly inference: InferenceCapability;
  private readonly store: ReplyStore;
  private readonly logger: Logger;
  private readonly options: ClassifierOptions;

  constructor(input: {
    inference: InferenceCapability;
    store: ReplyStore;
    logger: Logger;
    options: ClassifierOptions;
  }) {
    this.inference = input.inference;
    this.store = input.store;
    this.logger = input.logger;
    this.options = input.options;
  }

  async currentParams(): Promise<CalibrationParams> {
    return (await this.store.getCalibrationParams()) ?? DEFAULT_CALIBRATION_PARAMS;
  }

  /**
   * Never throws for capability failures: timeouts, transport errors and
   * unusable outputs all resolve to the fallback classification.
   */
  async classify(
    message: InboundMessage,
    history: readonly ThreadEntry[],
    input: { params?: CalibrationParams; logContext?: StructuredLogContext } = {}
  ): Promise<ClassificationResult> {
    const params = input.params ?? (await this.currentParams());
    const contextWindow = buildContextWindow(history, message, this.options.contextWindowSize);
    const contextLabels = contextWindow.map((entry) => entry.label);
    const text = stripQuotedReply(bodyToText(message.body)).trim();
    const logContext = { ...input.logContext, messageId: message.messageId };

    try {
      const response = await withTimeout({
        capability: "inference",
        timeoutMs: this.options.inferenceTimeoutMs,
        run: (signal) =>
          this.inference.infer({
            text,
            contextWindow,
            labelSet: INTENT_LABELS,
            signal
          })
      });

      if (!isIntentLabel(response.label)) {
        throw new Error(`inference returned unknown label "${String(response.label)}"`);
      }
      if (!Number.isFinite(response.rawConfidence)) {
        throw new Error("inference returned a non-finite confidence");
      }

      const rawConfidence = Math.min(1, Math.max(0, response.rawConfidence));
      const result: ClassificationResult = {
        messageId: message.messageId,
        label: response.label,
        confidence: applyCalibration({ label: response.label, rawConfidence, contextLabels }, params),
        rawConfidence,
        contextLabels,
        modelVersion: `${this.inference.name}:${this.inference.modelId}+cal.v${params.version}`,
        fallback: false
      };

      this.logger.info(
        toStructuredLogEvent(logContext, "reply.classified", {
          label: result.label,
          confidence: result.confidence
        })
      );
      return result;
    } catch (error) {
      const transient = toTransientCapabilityError("inference", error);
      const result = fallbackClassification(
        message.messageId,
        contextWindow,
        buildContextWindow(history, message, 1)[0]
      );
      const serialized = serializeError(error);
      this.logger.warn(
        toStructuredLogEvent(logContext, "reply.fallback", {
          label: result.label,
          confidence: result.confidence,
          errorClass: serialized.name,
          errorCode: serialized.code,
          errorMessage: transient.message
        })
      );
      return result;
    }
  }

  /**
   * Appends one calibration sample. Parameters only move on recompute.
   */
  async recordFeedback(input: {
    messageId: string;
    confirmedLabel: IntentLabel;
    nowMs?: number;
  }): Promise<FeedbackResult> {
    const classification = await this.store.getClassification(input.messageId);
    if (!classification) {
      return { recorded: false, reason: "unknown_message" };
    }
    if (classification.fallback) {
      return { recorded: false, reason: "fallback_classification" };
    }

    const appended = await this.store.appendCalibrationSample({
      messageId: input.messageId,
      contextLabels: [...classification.contextLabels],
      predictedLabel: classification.label,
      rawConfidence: classification.rawConfidence,
      effectiveConfidence: classification.confidence,
      confirmedLabel: input.confirmedLabel,
      recordedAtMs: input.nowMs ?? Date.now()
    });
    if (!appended) {
      return { recorded: false, reason: "already_recorded" };
    }

    return { recorded: true, agreed: classification.label === input.confirmedLabel };
  }

  async recomputeCalibration(input: { nowMs?: number } = {}): Promise<RecomputeResult> {
    const current = await this.currentParams();
    const samples = await this.store.listCalibrationSamples();
    const next = fitCalibration({
      samples,
      current,
      minSamples: this.options.calibrationMinSamples,
      nowMs: input.nowMs ?? Date.now()
    });

    if (!next) {
      return { updated: false, sampleCount: samples.length, params: current };
    }

    await this.store.saveCalibrationParams(next);
    this.logger.info({
      ...toStructuredLogEvent({ stage: "calibration" }, "calibration.recomputed"),
      version: next.version,
      sampleCount: next.sampleCount,
      contextWeight: next.contextWeight,
      flipRetention: next.flipRetention
    });
    return { updated: true, params: next };
  }
}
