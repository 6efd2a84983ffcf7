import type { InboundMessage } from "./types.js";

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asTrimmedString(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

function asStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === "string" && item.trim().length > 0);
}

function asHeaderMap(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const headers: Record<string, string> = {};
  for (const [name, headerValue] of Object.entries(value)) {
    if (typeof headerValue === "string") {
      headers[name] = headerValue;
    }
  }
  return headers;
}

function parseReceivedAt(raw: Record<string, unknown>): number | null {
  if (typeof raw.receivedAtMs === "number" && Number.isFinite(raw.receivedAtMs)) {
    return raw.receivedAtMs;
  }
  if (typeof raw.receivedAt === "number" && Number.isFinite(raw.receivedAt)) {
    return raw.receivedAt;
  }
  const iso = asTrimmedString(raw.receivedAt);
  if (iso) {
    const parsed = Date.parse(iso);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/**
 * Coerces untyped input into an inbound message. Only the message id and the
 * receive time are required here; sender and body are checked by the worker
 * so malformed replies still reach the dead-letter store with their payload.
 */
export function parseInboundMessage(raw: unknown, label = "message"): ParseResult<InboundMessage> {
  if (!isRecord(raw)) {
    return { ok: false, error: `${label} must be an object` };
  }

  const messageId = asTrimmedString(raw.messageId);
  if (!messageId) {
    return { ok: false, error: `${label}.messageId is required` };
  }

  const receivedAtMs = parseReceivedAt(raw);
  if (receivedAtMs === null) {
    return { ok: false, error: `${label}.receivedAt must be epoch millis or an ISO timestamp` };
  }

  const rawBody = raw.body;
  const body = isRecord(rawBody)
    ? {
        text: typeof rawBody.text === "string" ? rawBody.text : undefined,
        html: typeof rawBody.html === "string" ? rawBody.html : undefined
      }
    : { text: typeof rawBody === "string" ? rawBody : undefined };

  return {
    ok: true,
    value: {
      messageId,
      sender: typeof raw.sender === "string" ? raw.sender.trim() : "",
      recipients: asStringList(raw.recipients),
      subject: typeof raw.subject === "string" ? raw.subject : "",
      body,
      receivedAtMs,
      inReplyTo: asTrimmedString(raw.inReplyTo) ?? undefined,
      references: asStringList(raw.references),
      headers: asHeaderMap(raw.headers)
    }
  };
}
