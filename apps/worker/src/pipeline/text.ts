import { createHash } from "node:crypto";
import { convert } from "html-to-text";
import type { ReplyBody } from "@reply-triage/shared";

const REPLY_PREFIX_PATTERN = /^\s*((re|fw|fwd|aw|sv|wg)(\s*\[\d+\])?\s*:\s*)+/i;
const QUOTE_HEADER_PATTERNS = [
  /^on\s.+\bwrote:\s*$/i,
  /^-{2,}\s*original message\s*-{2,}$/i,
  /^-{2,}\s*forwarded message\s*-{2,}$/i,
  /^_{5,}$/,
  /^from:\s.+$/i
];
const SIGNATURE_PATTERNS = [/^--\s*$/, /^sent from my\s.+$/i, /^get outlook for\s.+$/i];

export function normalizeSubject(subject: string): string {
  return subject.replace(REPLY_PREFIX_PATTERN, "").replace(/\s+/g, " ").trim().toLowerCase();
}

export function normalizeAddress(address: string): string {
  return address.trim().toLowerCase();
}

export function normalizeParticipants(addresses: readonly string[]): string[] {
  return Array.from(
    new Set(addresses.map((address) => normalizeAddress(address)).filter((address) => address.length > 0))
  ).sort((left, right) => left.localeCompare(right));
}

/**
 * Plain text view of a reply; HTML is only converted when no text part exists.
 */
export function bodyToText(body: ReplyBody): string {
  const text = body.text?.trim();
  if (text) {
    return text;
  }
  const html = body.html?.trim();
  if (!html) {
    return "";
  }
  return convert(html, {
    wordwrap: false,
    selectors: [
      { selector: "a", options: { ignoreHref: true } },
      { selector: "img", format: "skip" }
    ]
  }).trim();
}

export function stripQuotedReply(text: string): string {
  const kept: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (QUOTE_HEADER_PATTERNS.some((pattern) => pattern.test(trimmed))) {
      break;
    }
    if (SIGNATURE_PATTERNS.some((pattern) => pattern.test(trimmed))) {
      break;
    }
    if (trimmed.startsWith(">")) {
      continue;
    }
    kept.push(line);
  }
  return kept.join("\n");
}

export function normalizeBodyForHash(body: ReplyBody): string {
  return stripQuotedReply(bodyToText(body)).replace(/\s+/g, " ").trim().toLowerCase();
}

export function sha256Hex(value: string): string {
  return createHash("sha256").update(value).digest("hex");
}

export function contentHash(body: ReplyBody): string {
  return sha256Hex(normalizeBodyForHash(body));
}

export function subjectThreadKey(input: { normalizedSubject: string; participants: readonly string[] }): string {
  return `thr_${sha256Hex(`${input.normalizedSubject}|${input.participants.join(",")}`).slice(0, 24)}`;
}

export function levenshteinDistance(left: string, right: string, maxDistance = Number.POSITIVE_INFINITY): number {
  if (left === right) {
    return 0;
  }
  if (Math.abs(left.length - right.length) > maxDistance) {
    return maxDistance + 1;
  }

  let previous = Array.from({ length: right.length + 1 }, (_, index) => index);
  for (let i = 1; i <= left.length; i += 1) {
    const current = [i];
    let rowMin = i;
    for (let j = 1; j <= right.length; j += 1) {
      const substitution = previous[j - 1] + (left[i - 1] === right[j - 1] ? 0 : 1);
      const value = Math.min(previous[j] + 1, current[j - 1] + 1, substitution);
      current.push(value);
      rowMin = Math.min(rowMin, value);
    }
    if (rowMin > maxDistance) {
      return maxDistance + 1;
    }
    previous = current;
  }
  return previous[right.length];
}
