import {
  asThreadKey,
  compareChronologically,
  type InboundMessage,
  type ReplyThread,
  type SpamReason,
  type ThreadEntry,
  type ThreadKey
} from "@reply-triage/shared";
import { MalformedInputError, StateCorruptionError } from "./errors.js";
import type { ReplyStats } from "./stats.js";
import {
  bodyToText,
  contentHash,
  normalizeAddress,
  normalizeParticipants,
  normalizeSubject,
  stripQuotedReply,
  subjectThreadKey
} from "./text.js";
import type { ReplyStore } from "./types.js";

const AUTO_REPLY_MARKERS = [
  "auto-reply",
  "autoreply",
  "automatic reply",
  "out of office",
  "out-of-office",
  "vacation reply",
  "away message",
  "automated response",
  "delivery failure",
  "undelivered mail",
  "mail delivery failed",
  "this is an automated",
  "automatically generated"
];

const UNSUBSCRIBE_CONFIRMATION_MARKERS = [
  "you have been unsubscribed",
  "you have been successfully unsubscribed",
  "successfully unsubscribed",
  "your unsubscribe request has been received",
  "you have been removed from our mailing list",
  "your subscription has been cancelled"
];

const AUTOMATED_SENDER_PATTERN = /^(mailer-daemon|postmaster|no-?reply|do-?not-?reply|bounces?)([+._-].*)?$/i;

export type DuplicateReason = "message_id" | "content_hash";

export type ThreadResolution = {
  threadKey: ThreadKey;
  thread: ReplyThread;
  entry: ThreadEntry;
  isNewThread: boolean;
  isDuplicate: boolean;
  duplicateOf?: DuplicateReason;
  isSpam: boolean;
};

function lowerCaseHeaders(headers: Record<string, string> | undefined): Map<string, string> {
  const result = new Map<string, string>();
  for (const [key, value] of Object.entries(headers ?? {})) {
    result.set(key.trim().toLowerCase(), String(value).trim().toLowerCase());
  }
  return result;
}

export function detectSpam(message: InboundMessage): SpamReason | undefined {
  const headers = lowerCaseHeaders(message.headers);
  const precedence = headers.get("precedence");
  const autoSubmitted = headers.get("auto-submitted");
  if (
    (precedence && ["bulk", "junk", "list"].includes(precedence)) ||
    (autoSubmitted && autoSubmitted !== "no") ||
    headers.has("x-autoreply") ||
    headers.has("x-autorespond") ||
    (headers.has("list-id") && headers.has("list-unsubscribe"))
  ) {
    return "bulk_header";
  }

  const localPart = normalizeAddress(message.sender).split("@")[0] ?? "";
  if (AUTOMATED_SENDER_PATTERN.test(localPart)) {
    return "automated_sender";
  }

  // Body markers only count outside quoted history.
  const subject = message.subject.toLowerCase();
  const text = stripQuotedReply(bodyToText(message.body)).toLowerCase();
  if (AUTO_REPLY_MARKERS.some((marker) => subject.includes(marker) || text.includes(marker))) {
    return "auto_reply_marker";
  }
  if (UNSUBSCRIBE_CONFIRMATION_MARKERS.some((marker) => subject.includes(marker) || text.includes(marker))) {
    return "unsubscribe_confirmation";
  }
  return undefined;
}

export function assertWellFormed(message: InboundMessage): void {
  if (typeof message.messageId !== "string" || message.messageId.trim().length === 0) {
    throw new MalformedInputError({ field: "messageId" });
  }
  if (typeof message.sender !== "string" || normalizeAddress(message.sender).length === 0) {
    throw new MalformedInputError({ field: "sender", messageId: message.messageId });
  }
  if (!Number.isFinite(message.receivedAtMs)) {
    throw new MalformedInputError({ field: "receivedAtMs", messageId: message.messageId });
  }
  const text = message.body?.text?.trim() ?? "";
  const html = message.body?.html?.trim() ?? "";
  if (text.length === 0 && html.length === 0) {
    throw new MalformedInputError({ field: "body", messageId: message.messageId });
  }
}

export function assertThreadInvariants(thread: ReplyThread): void {
  const fail = (detail: string): never => {
    throw new StateCorruptionError({ scope: "thread", threadKey: thread.threadKey, detail });
  };

  const seen = new Set<string>();
  for (let index = 0; index < thread.entries.length; index += 1) {
    const entry = thread.entries[index];
    if (seen.has(entry.message.messageId)) {
      fail(`message ${entry.message.messageId} appears twice`);
    }
    seen.add(entry.message.messageId);

    if (index > 0 && compareChronologically(thread.entries[index - 1].message, entry.message) > 0) {
      fail(`entries are not in chronological order at ${entry.message.messageId}`);
    }

    const classification = entry.classification;
    if (classification) {
      if (entry.isDuplicate || entry.isSpam) {
        fail(`skipped message ${entry.message.messageId} carries a classification`);
      }
      if (classification.messageId !== entry.message.messageId) {
        fail(`classification for ${classification.messageId} stored on ${entry.message.messageId}`);
      }
      if (!(classification.confidence >= 0 && classification.confidence <= 1)) {
        fail(`confidence ${classification.confidence} out of range on ${entry.message.messageId}`);
      }
    }
  }
}

export function participantsOf(message: InboundMessage): string[] {
  return normalizeParticipants([message.sender, ...(message.recipients ?? [])]);
}

export function insertChronologically(entries: readonly ThreadEntry[], entry: ThreadEntry): ThreadEntry[] {
  const next = [...entries];
  let index = next.length;
  while (index > 0 && compareChronologically(next[index - 1].message, entry.message) > 0) {
    index -= 1;
  }
  next.splice(index, 0, entry);
  return next;
}

export class ThreadResolver {
  private readonly store: ReplyStore;
  private readonly stats: ReplyStats;

  constructor(input: { store: ReplyStore; stats: ReplyStats }) {
    this.store = input.store;
    this.stats = input.stats;
  }

  /**
   * Explicit references win over the subject-derived key. `pending` maps
   * message ids seen earlier in the current batch to their thread keys.
   */
  async resolveKey(message: InboundMessage, pending?: ReadonlyMap<string, ThreadKey>): Promise<ThreadKey> {
    assertWellFormed(message);

    const referenced = [
      ...(message.inReplyTo ? [message.inReplyTo] : []),
      ...[...(message.references ?? [])].reverse()
    ].filter((id) => id.trim().length > 0 && id !== message.messageId);

    for (const referenceId of referenced) {
      const fromBatch = pending?.get(referenceId);
      if (fromBatch) {
        return fromBatch;
      }
      const known = await this.store.findThreadKeyByMessageId(referenceId);
      if (known) {
        return known;
      }
    }

    const existing = await this.store.findThreadKeyByMessageId(message.messageId);
    if (existing) {
      return existing;
    }

    return asThreadKey(
      subjectThreadKey({
        normalizedSubject: normalizeSubject(message.subject),
        participants: participantsOf(message)
      })
    );
  }

  async resolve(message: InboundMessage, options: { threadKey?: ThreadKey } = {}): Promise<ThreadResolution> {
    assertWellFormed(message);
    const threadKey = options.threadKey ?? (await this.resolveKey(message));

    const stored = await this.store.getThread(threadKey);
    if (stored) {
      assertThreadInvariants(stored);
    }

    const current: ReplyThread = stored ?? {
      threadKey,
      normalizedSubject: normalizeSubject(message.subject),
      participants: [],
      entries: [],
      isSpam: false
    };

    const existingEntry = current.entries.find((entry) => entry.message.messageId === message.messageId);
    if (existingEntry) {
      return {
        threadKey,
        thread: current,
        entry: existingEntry,
        isNewThread: false,
        isDuplicate: true,
        duplicateOf: "message_id",
        isSpam: existingEntry.isSpam
      };
    }

    const hash = contentHash(message.body);
    const isDuplicate = current.entries.some((entry) => entry.contentHash === hash);
    const spamReason = isDuplicate ? undefined : detectSpam(message);

    const entry: ThreadEntry = {
      message,
      contentHash: hash,
      isDuplicate,
      isSpam: spamReason !== undefined,
      ...(spamReason ? { spamReason } : {})
    };

    const entries = insertChronologically(current.entries, entry);
    const thread: ReplyThread = {
      threadKey,
      normalizedSubject: current.normalizedSubject,
      participants: normalizeParticipants([...current.participants, ...participantsOf(message)]),
      entries,
      isSpam: entries.every((candidate) => candidate.isSpam)
    };

    return {
      threadKey,
      thread,
      entry,
      isNewThread: stored === null,
      isDuplicate,
      duplicateOf: isDuplicate ? "content_hash" : undefined,
      isSpam: entry.isSpam
    };
  }

  /**
   * Counts a resolution once its commit has landed.
   */
  acknowledge(resolution: ThreadResolution): void {
    if (resolution.isDuplicate) {
      this.stats.recordResolution("duplicate");
    } else if (resolution.isSpam) {
      this.stats.recordResolution("spam");
    } else {
      this.stats.recordResolution("classified");
    }
  }

  recordUnresolved(kind: "malformed" | "failed" | "duplicate"): void {
    this.stats.recordResolution(kind);
  }
}
