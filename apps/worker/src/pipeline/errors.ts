import { ErrorClass, classifyError } from "@reply-triage/shared";

const MAX_MESSAGE_CHARS = 500;
const MAX_STACK_CHARS = 2000;

export type SerializedError = {
  name: string;
  message: string;
  code?: string;
  stack?: string;
};

export const REPLY_FAILURE_CODES = ["MALFORMED_INPUT", "STATE_CORRUPTION", "UNEXPECTED"] as const;

export type ReplyFailureCode = (typeof REPLY_FAILURE_CODES)[number];

export function isReplyFailureCode(value: unknown): value is ReplyFailureCode {
  return typeof value === "string" && (REPLY_FAILURE_CODES as readonly string[]).includes(value);
}

export class MalformedInputError extends Error {
  readonly code = "MALFORMED_INPUT";
  readonly messageId?: string;
  readonly field: string;

  constructor(input: { field: string; messageId?: string; message?: string }) {
    super(input.message ?? `Malformed message ${input.messageId ?? "<unknown>"}: missing ${input.field}`);
    this.name = "MalformedInputError";
    this.field = input.field;
    this.messageId = input.messageId;
  }
}

export class CapabilityTimeoutError extends Error {
  readonly capability: string;
  readonly timeoutMs: number;

  constructor(input: { capability: string; timeoutMs: number }) {
    super(`${input.capability} did not answer within ${input.timeoutMs}ms`);
    this.name = "CapabilityTimeoutError";
    this.capability = input.capability;
    this.timeoutMs = input.timeoutMs;
  }
}

/**
 * A recoverable failure of an external capability (inference, directory,
 * outcome sink). Never aborts a batch.
 */
export class TransientCapabilityError extends Error {
  readonly capability: string;
  readonly reason: string;

  constructor(input: { capability: string; reason: string; cause?: unknown }) {
    super(`${input.capability} failed: ${input.reason}`, { cause: input.cause });
    this.name = "TransientCapabilityError";
    this.capability = input.capability;
    this.reason = input.reason;
  }
}

export type StateCorruptionScope = "thread" | "store";

export class StateCorruptionError extends Error {
  readonly code = "STATE_CORRUPTION";
  readonly scope: StateCorruptionScope;
  readonly threadKey?: string;

  constructor(input: { scope: StateCorruptionScope; detail: string; threadKey?: string; cause?: unknown }) {
    super(
      input.scope === "thread"
        ? `Thread ${input.threadKey ?? "<unknown>"} state is corrupted: ${input.detail}`
        : `Reply store is corrupted: ${input.detail}`,
      { cause: input.cause }
    );
    this.name = "StateCorruptionError";
    this.scope = input.scope;
    this.threadKey = input.threadKey;
  }
}

function truncate(value: string | undefined, maxChars: number): string | undefined {
  if (!value) {
    return undefined;
  }
  return value.length > maxChars ? `${value.slice(0, maxChars)}…` : value;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: truncate(error.message, MAX_MESSAGE_CHARS) ?? "Unknown error",
      code: "code" in error && typeof error.code === "string" ? error.code : undefined,
      stack: truncate(error.stack, MAX_STACK_CHARS)
    };
  }

  return {
    name: "UnknownError",
    message: truncate(String(error), MAX_MESSAGE_CHARS) ?? "Unknown error"
  };
}

export function toTransientCapabilityError(capability: string, error: unknown): TransientCapabilityError {
  if (error instanceof TransientCapabilityError) {
    return error;
  }
  const classified = classifyError(error);
  const reason =
    classified.class === ErrorClass.TRANSIENT
      ? classified.reason
      : `${classified.reason}: ${serializeError(error).message}`;
  return new TransientCapabilityError({ capability, reason, cause: error });
}

export function isStoreLevelCorruption(error: unknown): error is StateCorruptionError {
  return error instanceof StateCorruptionError && error.scope === "store";
}

export function toFailureCode(error: unknown): ReplyFailureCode {
  if (error instanceof MalformedInputError) {
    return "MALFORMED_INPUT";
  }
  if (error instanceof StateCorruptionError) {
    return "STATE_CORRUPTION";
  }
  return "UNEXPECTED";
}

/**
 * Bounded wait on an external call. The signal is aborted on timeout so
 * fetch-based capabilities release their sockets.
 */
export async function withTimeout<T>(input: {
  capability: string;
  timeoutMs: number;
  run: (signal: AbortSignal) => Promise<T>;
}): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new CapabilityTimeoutError({ capability: input.capability, timeoutMs: input.timeoutMs }));
    }, input.timeoutMs);
  });

  try {
    return await Promise.race([input.run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
