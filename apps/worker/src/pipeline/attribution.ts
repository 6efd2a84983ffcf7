import type { Logger } from "pino";
import {
  ATTRIBUTION_PRECEDENCE,
  UNATTRIBUTED_CAMPAIGN_ID,
  type AttributionReason,
  type AttributionRecord,
  type InboundMessage,
  type ThreadKey
} from "@reply-triage/shared";
import { toStructuredLogEvent, type StructuredLogContext } from "../logging.js";
import { serializeError, toTransientCapabilityError, withTimeout } from "./errors.js";
import { bodyToText, levenshteinDistance, normalizeAddress, normalizeSubject } from "./text.js";
import type { CampaignDirectory } from "./types.js";

const TRACKING_HEADER = "x-campaign-id";
const TRACKING_TOKEN_PATTERN = /\[ref:\s*([A-Za-z0-9._-]+)\s*\]/i;

export const ATTRIBUTION_CONFIDENCE = {
  tracking_id: 1,
  sender_email: 0.9,
  fuzzySubjectMax: 0.75
} as const;

export type AttributionOptions = {
  directoryTimeoutMs: number;
  fuzzyMaxEditDistance: number;
};

type AttributionCandidate = {
  campaignId: string;
  leadId: string;
  confidence: number;
  matchedBy: AttributionReason;
};

export function extractTrackingId(message: InboundMessage): string | undefined {
  for (const [name, value] of Object.entries(message.headers ?? {})) {
    if (name.trim().toLowerCase() === TRACKING_HEADER && value.trim().length > 0) {
      return value.trim();
    }
  }
  return TRACKING_TOKEN_PATTERN.exec(bodyToText(message.body))?.[1];
}

export function unattributedLeadId(sender: string): string {
  return `unattributed:${normalizeAddress(sender)}`;
}

export function isAttributed(record: AttributionRecord): boolean {
  return record.matchedBy !== "unattributed" && record.campaignId !== UNATTRIBUTED_CAMPAIGN_ID;
}

export function fuzzySubjectConfidence(distance: number, maxEditDistance: number): number {
  return ATTRIBUTION_CONFIDENCE.fuzzySubjectMax * (1 - distance / (maxEditDistance + 1));
}

/**
 * Keeps `existing` unless `candidate` matched at a strictly stronger
 * precedence. Score contributions already made stay with the old lead.
 */
export function reviseAttribution(
  existing: AttributionRecord | null,
  candidate: Omit<AttributionRecord, "revision">
): AttributionRecord {
  if (!existing) {
    return { ...candidate, revision: 1 };
  }
  if (candidate.precedence < existing.precedence) {
    return { ...candidate, revision: existing.revision + 1 };
  }
  return existing;
}

export class AttributionEngine {
  private readonly directory: CampaignDirectory;
  private readonly logger: Logger;
  private readonly options: AttributionOptions;

  constructor(input: { directory: CampaignDirectory; logger: Logger; options: AttributionOptions }) {
    this.directory = input.directory;
    this.logger = input.logger;
    this.options = input.options;
  }

  async attribute(input: {
    threadKey: ThreadKey;
    message: InboundMessage;
    existing: AttributionRecord | null;
    logContext?: StructuredLogContext;
  }): Promise<AttributionRecord> {
    const logContext = { ...input.logContext, threadKey: input.threadKey, messageId: input.message.messageId };
    if (input.existing?.precedence === ATTRIBUTION_PRECEDENCE.tracking_id) {
      return input.existing;
    }

    const candidate =
      (await this.matchTrackingId(input.message, logContext)) ??
      (await this.matchSenderEmail(input.message, logContext)) ??
      (await this.matchFuzzySubject(input.message, logContext)) ?? {
        campaignId: UNATTRIBUTED_CAMPAIGN_ID,
        leadId: unattributedLeadId(input.message.sender),
        confidence: 0,
        matchedBy: "unattributed"
      };

    return reviseAttribution(input.existing, {
      threadKey: input.threadKey,
      ...candidate,
      precedence: ATTRIBUTION_PRECEDENCE[candidate.matchedBy],
      sourceMessageId: input.message.messageId
    });
  }

  private async lookup<T>(
    operation: string,
    logContext: StructuredLogContext,
    run: () => Promise<T>
  ): Promise<T | null> {
    try {
      return await withTimeout({
        capability: `directory.${operation}`,
        timeoutMs: this.options.directoryTimeoutMs,
        run: () => run()
      });
    } catch (error) {
      const transient = toTransientCapabilityError(`directory.${operation}`, error);
      this.logger.warn(
        toStructuredLogEvent(logContext, "attribution.lookup_failed", {
          errorClass: serializeError(error).name,
          errorMessage: transient.message
        })
      );
      return null;
    }
  }

  private async matchTrackingId(
    message: InboundMessage,
    logContext: StructuredLogContext
  ): Promise<AttributionCandidate | null> {
    const trackingId = extractTrackingId(message);
    if (!trackingId) {
      return null;
    }
    const match = await this.lookup("findByTrackingId", logContext, () => this.directory.findByTrackingId(trackingId));
    if (!match) {
      return null;
    }
    return {
      campaignId: match.campaignId,
      leadId: match.leadId,
      confidence: ATTRIBUTION_CONFIDENCE.tracking_id,
      matchedBy: "tracking_id"
    };
  }

  private async matchSenderEmail(
    message: InboundMessage,
    logContext: StructuredLogContext
  ): Promise<AttributionCandidate | null> {
    const sender = normalizeAddress(message.sender);
    const match = await this.lookup("findLeadByEmail", logContext, () => this.directory.findLeadByEmail(sender));
    if (!match) {
      return null;
    }
    return {
      campaignId: match.campaignId ?? UNATTRIBUTED_CAMPAIGN_ID,
      leadId: match.leadId,
      confidence: ATTRIBUTION_CONFIDENCE.sender_email,
      matchedBy: "sender_email"
    };
  }

  private async matchFuzzySubject(
    message: InboundMessage,
    logContext: StructuredLogContext
  ): Promise<AttributionCandidate | null> {
    const campaigns = await this.lookup("listActiveCampaigns", logContext, () => this.directory.listActiveCampaigns());
    if (!campaigns) {
      return null;
    }

    const subject = normalizeSubject(message.subject);
    const sender = normalizeAddress(message.sender);
    const maxDistance = this.options.fuzzyMaxEditDistance;
    let best: { campaignId: string; leadId: string; distance: number; senderMatches: boolean } | null = null;

    for (const campaign of campaigns) {
      if (!campaign.active) {
        continue;
      }
      for (const recipient of campaign.sendList) {
        const distance = levenshteinDistance(subject, normalizeSubject(recipient.subject), maxDistance);
        if (distance > maxDistance) {
          continue;
        }
        const senderMatches = normalizeAddress(recipient.email) === sender;
        const better =
          !best ||
          distance < best.distance ||
          (distance === best.distance && senderMatches && !best.senderMatches) ||
          (distance === best.distance &&
            senderMatches === best.senderMatches &&
            campaign.campaignId.localeCompare(best.campaignId) < 0);
        if (better) {
          best = {
            campaignId: campaign.campaignId,
            leadId: senderMatches ? recipient.leadId : unattributedLeadId(sender),
            distance,
            senderMatches
          };
        }
      }
    }

    if (!best) {
      return null;
    }
    return {
      campaignId: best.campaignId,
      leadId: best.leadId,
      confidence: fuzzySubjectConfidence(best.distance, maxDistance),
      matchedBy: "fuzzy_subject"
    };
  }
}
