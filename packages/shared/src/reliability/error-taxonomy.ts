export enum ErrorClass {
  TRANSIENT = "TRANSIENT",
  PERMANENT = "PERMANENT",
  IGNORE = "IGNORE"
}

export type ClassifiedError = {
  class: ErrorClass;
  reason: string;
  code?: string;
  httpStatus?: number;
};

const NODE_TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "ECONNREFUSED",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET"
]);

const POSTGRES_TRANSIENT_SQLSTATE = new Set(["40001", "40P01", "53300", "57P01", "08006", "08001"]);

const TRANSIENT_ERROR_NAMES = new Set(["AbortError", "TimeoutError", "CapabilityTimeoutError"]);

const DUPLICATE_PATTERNS = [/duplicate key/i, /already exists/i, /already processed/i];

const QUOTA_PATTERNS = [/quota/i, /rate limit/i, /too many requests/i];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readString(value: unknown, key: string): string | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const candidate = value[key];
  return typeof candidate === "string" ? candidate : undefined;
}

function readNumber(value: unknown, key: string): number | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const candidate = value[key];
  return typeof candidate === "number" ? candidate : undefined;
}

function extractHttpStatus(value: unknown): number | undefined {
  const directStatus =
    readNumber(value, "status") ?? readNumber(value, "statusCode") ?? readNumber(value, "httpStatus");
  if (typeof directStatus === "number") {
    return directStatus;
  }
  if (!isRecord(value)) {
    return undefined;
  }
  return readNumber(value.response, "status");
}

function extractCode(value: unknown): string | undefined {
  const code = readString(value, "code") ?? readString(value, "errno");
  return code?.toUpperCase();
}

function extractMessage(value: unknown): string | undefined {
  if (value instanceof Error) {
    return value.message;
  }
  return readString(value, "message");
}

function extractName(value: unknown): string | undefined {
  if (value instanceof Error) {
    return value.name;
  }
  return readString(value, "name");
}

export function classifyError(err: unknown): ClassifiedError {
  try {
    const code = extractCode(err);
    const httpStatus = extractHttpStatus(err);
    const message = extractMessage(err);
    const name = extractName(err);

    if (code === "23505" || (message && DUPLICATE_PATTERNS.some((pattern) => pattern.test(message)))) {
      return { class: ErrorClass.IGNORE, reason: "duplicate_or_already_exists", code, httpStatus };
    }

    if (name && TRANSIENT_ERROR_NAMES.has(name)) {
      return { class: ErrorClass.TRANSIENT, reason: "timeout_or_abort", code, httpStatus };
    }

    if (code && NODE_TRANSIENT_CODES.has(code)) {
      return { class: ErrorClass.TRANSIENT, reason: "network_code", code, httpStatus };
    }

    if (code && POSTGRES_TRANSIENT_SQLSTATE.has(code)) {
      return { class: ErrorClass.TRANSIENT, reason: "postgres_transient_sqlstate", code, httpStatus };
    }

    if (typeof httpStatus === "number") {
      if (httpStatus === 408 || httpStatus === 429 || httpStatus >= 500) {
        return { class: ErrorClass.TRANSIENT, reason: "http_retryable_status", code, httpStatus };
      }
      if (httpStatus >= 400 && httpStatus < 500) {
        return { class: ErrorClass.PERMANENT, reason: "http_client_error", code, httpStatus };
      }
    }

    if (message && QUOTA_PATTERNS.some((pattern) => pattern.test(message))) {
      return { class: ErrorClass.TRANSIENT, reason: "quota_exhausted", code, httpStatus };
    }

    return { class: ErrorClass.PERMANENT, reason: "default_permanent", code, httpStatus };
  } catch {
    return { class: ErrorClass.PERMANENT, reason: "classification_fallback" };
  }
}
