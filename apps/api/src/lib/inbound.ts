import {
  asCorrelationId,
  asTrimmedString,
  newCorrelationId,
  parseInboundMessage,
  type CorrelationId,
  type InboundMessage,
  type ParseResult
} from "@reply-triage/shared";

export const MAX_BATCH_SIZE = 500;

export function parseReplyBatch(body: unknown): ParseResult<InboundMessage[]> {
  const rawMessages = typeof body === "object" && body !== null && "messages" in body ? body.messages : undefined;
  if (!Array.isArray(rawMessages) || rawMessages.length === 0) {
    return { ok: false, error: "messages must be a non-empty array" };
  }
  if (rawMessages.length > MAX_BATCH_SIZE) {
    return { ok: false, error: `at most ${MAX_BATCH_SIZE} messages per batch` };
  }

  const messages: InboundMessage[] = [];
  for (const [index, raw] of rawMessages.entries()) {
    const parsed = parseInboundMessage(raw, `messages[${index}]`);
    if (!parsed.ok) {
      return parsed;
    }
    messages.push(parsed.value);
  }
  return { ok: true, value: messages };
}

export function resolveCorrelationId(headers: Record<string, unknown>): CorrelationId {
  const raw = headers["x-correlation-id"];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = asTrimmedString(value);
  return trimmed ? asCorrelationId(trimmed) : newCorrelationId();
}
