import type { ActionKind, IntentLabel } from "@reply-triage/shared";

export type ReplyStatsSnapshot = {
  startedAt: string;
  ingested: number;
  classified: number;
  duplicates: number;
  spam: number;
  malformed: number;
  failed: number;
  fallbacks: number;
  labels: Record<IntentLabel, number>;
  actions: Record<ActionKind, number>;
  scoreUpdates: number;
  feedback: {
    received: number;
    agreed: number;
    accuracy: number | null;
  };
  calibrationVersion: number;
};

export type ResolutionKind = "classified" | "duplicate" | "spam" | "malformed" | "failed";

/**
 * Process-wide counters. Created empty at startup; read through snapshot().
 * Only ThreadResolver and ScoringEngine write to it.
 */
export class ReplyStats {
  private readonly startedAt: string;
  private ingested = 0;
  private readonly resolutions: Record<ResolutionKind, number> = {
    classified: 0,
    duplicate: 0,
    spam: 0,
    malformed: 0,
    failed: 0
  };
  private fallbacks = 0;
  private readonly labels: Record<IntentLabel, number> = {
    NotInterested: 0,
    MaybeInterested: 0,
    Interested: 0
  };
  private readonly actions: Record<ActionKind, number> = {
    RespondInterested: 0,
    RespondMaybe: 0,
    SuppressAndAcknowledge: 0,
    NotifyRep: 0,
    NoAction: 0
  };
  private scoreUpdates = 0;
  private feedbackReceived = 0;
  private feedbackAgreed = 0;
  private calibrationVersion = 0;

  constructor(now: Date = new Date()) {
    this.startedAt = now.toISOString();
  }

  recordResolution(kind: ResolutionKind): void {
    this.ingested += 1;
    this.resolutions[kind] += 1;
  }

  recordScored(input: { label: IntentLabel; fallback: boolean; actions: readonly ActionKind[] }): void {
    this.scoreUpdates += 1;
    this.labels[input.label] += 1;
    if (input.fallback) {
      this.fallbacks += 1;
    }
    for (const action of input.actions) {
      this.actions[action] += 1;
    }
  }

  recordFeedback(input: { agreed: boolean }): void {
    this.feedbackReceived += 1;
    if (input.agreed) {
      this.feedbackAgreed += 1;
    }
  }

  recordCalibrationVersion(version: number): void {
    this.calibrationVersion = version;
  }

  snapshot(): ReplyStatsSnapshot {
    return {
      startedAt: this.startedAt,
      ingested: this.ingested,
      classified: this.resolutions.classified,
      duplicates: this.resolutions.duplicate,
      spam: this.resolutions.spam,
      malformed: this.resolutions.malformed,
      failed: this.resolutions.failed,
      fallbacks: this.fallbacks,
      labels: { ...this.labels },
      actions: { ...this.actions },
      scoreUpdates: this.scoreUpdates,
      feedback: {
        received: this.feedbackReceived,
        agreed: this.feedbackAgreed,
        accuracy: this.feedbackReceived > 0 ? this.feedbackAgreed / this.feedbackReceived : null
      },
      calibrationVersion: this.calibrationVersion
    };
  }
}

export function createReplyStats(now?: Date): ReplyStats {
  return new ReplyStats(now);
}
