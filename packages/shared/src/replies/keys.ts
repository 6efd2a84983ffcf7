import type { ThreadKey } from "./types.js";

export function asThreadKey(value: string): ThreadKey {
  return value as ThreadKey;
}

function threadWorkKey(threadKey: string): string {
  return `thread:${threadKey}`;
}

function leadWorkKey(leadId: string): string {
  return `lead:${leadId}`;
}

export const LOCK_KEYS = {
  threadSingleFlight: (threadKey: string): string => `lock:${threadWorkKey(threadKey)}`,
  leadSingleFlight: (leadId: string): string => `lock:${leadWorkKey(leadId)}`
} as const;

/**
 * Chronological order used everywhere a thread is replayed:
 * receivedAtMs ascending, tie-breaker messageId.
 */
export function compareChronologically(
  left: { messageId: string; receivedAtMs: number },
  right: { messageId: string; receivedAtMs: number }
): number {
  if (left.receivedAtMs !== right.receivedAtMs) {
    return left.receivedAtMs - right.receivedAtMs;
  }
  return left.messageId.localeCompare(right.messageId);
}

export function isStaleWork(input: {
  candidateReceivedAtMs: number;
  latestReceivedAtMs: number;
}): boolean {
  return input.candidateReceivedAtMs < input.latestReceivedAtMs;
}
