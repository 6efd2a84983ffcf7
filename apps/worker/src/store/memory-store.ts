import type { AttributionRecord, ClassificationResult, LeadScore, ReplyThread, ThreadKey } from "@reply-triage/shared";
import { StateCorruptionError } from "../pipeline/errors.js";
import { insertChronologically } from "../pipeline/thread-resolver.js";
import type {
  CalibrationParams,
  CalibrationSample,
  MessageCommit,
  ProcessedMessageRecord,
  ReplyStore
} from "../pipeline/types.js";

function clone<T>(value: T): T {
  return structuredClone(value);
}

/**
 * Reply state held in process memory. Every commit applies all of its
 * writes synchronously, so readers never see a partial message.
 */
export class MemoryReplyStore implements ReplyStore {
  private readonly threads = new Map<ThreadKey, ReplyThread>();
  private readonly messageIndex = new Map<string, ThreadKey>();
  private readonly processed = new Map<string, ProcessedMessageRecord>();
  private readonly classifications = new Map<string, ClassificationResult>();
  private readonly attributions = new Map<ThreadKey, AttributionRecord>();
  private readonly scores = new Map<string, LeadScore>();
  private readonly samples: CalibrationSample[] = [];
  private calibration: CalibrationParams | null = null;

  commitCount = 0;

  async getThread(threadKey: ThreadKey): Promise<ReplyThread | null> {
    const thread = this.threads.get(threadKey);
    return thread ? clone(thread) : null;
  }

  async findThreadKeyByMessageId(messageId: string): Promise<ThreadKey | null> {
    return this.messageIndex.get(messageId) ?? null;
  }

  async getProcessed(messageId: string): Promise<ProcessedMessageRecord | null> {
    const record = this.processed.get(messageId);
    return record ? clone(record) : null;
  }

  async getClassification(messageId: string): Promise<ClassificationResult | null> {
    const classification = this.classifications.get(messageId);
    return classification ? clone(classification) : null;
  }

  async getAttribution(threadKey: ThreadKey): Promise<AttributionRecord | null> {
    const attribution = this.attributions.get(threadKey);
    return attribution ? clone(attribution) : null;
  }

  async getLeadScore(leadId: string): Promise<LeadScore | null> {
    const score = this.scores.get(leadId);
    return score ? clone(score) : null;
  }

  async commitMessage(commit: MessageCommit): Promise<void> {
    const messageId = commit.entry.message.messageId;
    if (this.processed.has(messageId)) {
      throw new StateCorruptionError({
        scope: "store",
        detail: `message ${messageId} committed twice`
      });
    }
    const indexed = this.messageIndex.get(messageId);
    if (indexed && indexed !== commit.threadKey) {
      throw new StateCorruptionError({
        scope: "store",
        detail: `message ${messageId} indexed under ${indexed}, committed to ${commit.threadKey}`
      });
    }

    const existing = this.threads.get(commit.threadKey);
    const entries = insertChronologically(existing?.entries ?? [], clone(commit.entry));
    this.threads.set(commit.threadKey, {
      threadKey: commit.threadKey,
      normalizedSubject: existing?.normalizedSubject ?? commit.normalizedSubject,
      participants: [...commit.participants],
      entries,
      isSpam: entries.every((entry) => entry.isSpam)
    });
    this.messageIndex.set(messageId, commit.threadKey);

    if (commit.entry.classification) {
      this.classifications.set(messageId, clone(commit.entry.classification));
    }
    if (commit.attribution) {
      this.attributions.set(commit.threadKey, clone(commit.attribution));
    }
    if (commit.score) {
      this.scores.set(commit.score.leadId, clone(commit.score));
    }
    this.processed.set(messageId, {
      messageId,
      threadKey: commit.threadKey,
      status: commit.status,
      outcome: commit.outcome ? clone(commit.outcome) : undefined,
      emitted: commit.outcome === undefined
    });
    this.commitCount += 1;
  }

  async markEmitted(messageId: string): Promise<void> {
    const record = this.processed.get(messageId);
    if (record) {
      record.emitted = true;
    }
  }

  async archiveLead(leadId: string): Promise<LeadScore> {
    const existing = this.scores.get(leadId);
    const archived: LeadScore = existing
      ? { ...existing, archived: true }
      : { leadId, score: 0, lastEngagedAtMs: 0, updateCount: 0, archived: true };
    this.scores.set(leadId, archived);
    return clone(archived);
  }

  async appendCalibrationSample(sample: CalibrationSample): Promise<boolean> {
    if (this.samples.some((candidate) => candidate.messageId === sample.messageId)) {
      return false;
    }
    this.samples.push(clone(sample));
    return true;
  }

  async listCalibrationSamples(): Promise<CalibrationSample[]> {
    return clone(this.samples);
  }

  async getCalibrationParams(): Promise<CalibrationParams | null> {
    return this.calibration ? clone(this.calibration) : null;
  }

  async saveCalibrationParams(params: CalibrationParams): Promise<void> {
    this.calibration = clone(params);
  }

  /**
   * Test hook for seeding state the pipeline would never write itself.
   */
  seedThread(thread: ReplyThread): void {
    this.threads.set(thread.threadKey, clone(thread));
    for (const entry of thread.entries) {
      this.messageIndex.set(entry.message.messageId, thread.threadKey);
    }
  }

  seedLeadScore(score: LeadScore): void {
    this.scores.set(score.leadId, clone(score));
  }
}
