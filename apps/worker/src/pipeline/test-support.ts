import { pino, type Logger } from "pino";
import type {
  ClassificationResult,
  InboundMessage,
  InferRequest,
  InferResponse,
  InferenceCapability,
  InferenceHealth,
  IntentLabel,
  ThreadEntry
} from "@reply-triage/shared";
import { DEFAULT_SCORE_TIERS, DEFAULT_SCORING, DEFAULT_THRESHOLDS } from "../config.js";
import { MemoryCampaignDirectory, type StaticCampaign } from "../crm/campaign-directory.js";
import { MemoryOutcomeSink } from "../crm/outcome-sink.js";
import { MemoryReplyStore } from "../store/memory-store.js";
import { MemoryDlqStore } from "./dlq.js";
import { ReplyProcessor, type ProcessorConfig } from "./processor.js";
import { createReplyStats } from "./stats.js";
import { contentHash } from "./text.js";

export const DAY_MS = 24 * 60 * 60 * 1000;
export const BASE_TIME_MS = Date.UTC(2024, 0, 1);

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function inboundMessage(overrides: Partial<InboundMessage> & { messageId: string }): InboundMessage {
  return {
    sender: "dana@lead.example",
    recipients: ["sales@vendor.example"],
    subject: "Re: Pilot program",
    body: { text: `Reply ${overrides.messageId}` },
    receivedAtMs: BASE_TIME_MS,
    ...overrides
  };
}

export function classifiedEntry(
  message: InboundMessage,
  classification: { label: IntentLabel; confidence: number; fallback?: boolean; contextLabels?: IntentLabel[] }
): ThreadEntry {
  const result: ClassificationResult = {
    messageId: message.messageId,
    label: classification.label,
    confidence: classification.confidence,
    rawConfidence: classification.confidence,
    contextLabels: classification.contextLabels ?? [],
    modelVersion: classification.fallback ? "fallback" : "openai:test-model+cal.v0",
    fallback: classification.fallback ?? false
  };
  return {
    message,
    contentHash: contentHash(message.body),
    isDuplicate: false,
    isSpam: false,
    classification: result
  };
}

export type InferenceScript = (request: InferRequest) => Promise<InferResponse> | InferResponse;

/**
 * In-process inference stand-in. Each call runs the script; requests are
 * kept for assertions.
 */
export class ScriptedInference implements InferenceCapability {
  readonly name = "openai";
  readonly modelId = "test-model";
  readonly requests: InferRequest[] = [];
  private script: InferenceScript;

  constructor(script: InferenceScript) {
    this.script = script;
  }

  setScript(script: InferenceScript): void {
    this.script = script;
  }

  async infer(request: InferRequest): Promise<InferResponse> {
    this.requests.push(request);
    return this.script(request);
  }

  async checkHealth(): Promise<InferenceHealth> {
    return { available: true };
  }
}

/**
 * Settles only when the caller aborts, rejecting the way fetch does.
 */
export function hangUntilAborted(request: InferRequest): Promise<InferResponse> {
  return new Promise((_, reject) => {
    request.signal?.addEventListener("abort", () => {
      reject(Object.assign(new Error("The operation was aborted"), { name: "AbortError" }));
    });
  });
}

export const TEST_CAMPAIGN: StaticCampaign = {
  campaignId: "cmp-pilot",
  name: "Pilot outreach",
  sendList: [{ leadId: "lead-dana", email: "dana@lead.example", subject: "Pilot program", trackingId: "trk-1" }]
};

export const TEST_PROCESSOR_CONFIG: ProcessorConfig = {
  inferenceTimeoutMs: 50,
  directoryTimeoutMs: 50,
  contextWindowSize: 5,
  thresholds: DEFAULT_THRESHOLDS,
  scoreTiers: DEFAULT_SCORE_TIERS,
  scoring: DEFAULT_SCORING,
  fuzzyMaxEditDistance: 3,
  calibrationMinSamples: 20
};

export function keywordScript(request: InferRequest): InferResponse {
  if (request.text.toLowerCase().includes("remove me")) {
    return { label: "NotInterested", rawConfidence: 0.9 };
  }
  return { label: "Interested", rawConfidence: 0.9 };
}

export function createProcessorHarness(script: InferenceScript = keywordScript, store = new MemoryReplyStore()) {
  const inference = new ScriptedInference(script);
  const sink = new MemoryOutcomeSink();
  const dlq = new MemoryDlqStore();
  const stats = createReplyStats();
  const processor = new ReplyProcessor({
    store,
    directory: new MemoryCampaignDirectory([TEST_CAMPAIGN]),
    inference,
    sink,
    dlq,
    stats,
    logger: silentLogger(),
    config: TEST_PROCESSOR_CONFIG
  });
  return { processor, store, inference, sink, dlq, stats };
}
