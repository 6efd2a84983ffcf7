import { pino, type Logger } from "pino";
import type { CorrelationId } from "@reply-triage/shared";

export type StructuredLogContext = {
  batchId?: string;
  correlationId?: CorrelationId;
  stage?: string;
  queueName?: string;
  jobId?: string;
  threadKey?: string;
  messageId?: string;
  leadId?: string;
  campaignId?: string;
};

export type StructuredLogEvent = StructuredLogContext & {
  event: string;
  elapsedMs?: number;
  startedAt?: string;
  attempt?: number;
  maxAttempts?: number;
  label?: string;
  confidence?: number;
  actions?: string[];
  errorClass?: string;
  errorCode?: string;
  errorMessage?: string;
};

export type LogExtra = Omit<StructuredLogEvent, keyof StructuredLogContext | "event">;

export function createLogger(input: { name: string; level?: string }): Logger {
  return pino({
    name: input.name,
    level: input.level ?? process.env.LOG_LEVEL ?? "info",
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export function toStructuredLogContext(context: StructuredLogContext): StructuredLogContext {
  return {
    batchId: context.batchId,
    correlationId: context.correlationId,
    stage: context.stage,
    queueName: context.queueName,
    jobId: context.jobId,
    threadKey: context.threadKey,
    messageId: context.messageId,
    leadId: context.leadId,
    campaignId: context.campaignId
  };
}

export function toStructuredLogEvent(
  context: StructuredLogContext,
  event: string,
  extra?: LogExtra
): StructuredLogEvent {
  return {
    ...toStructuredLogContext(context),
    event,
    ...extra
  };
}

export function toLogError(error: unknown): { message: string; stack?: string; code?: string } {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
      code: "code" in error && typeof error.code === "string" ? error.code : undefined
    };
  }

  return {
    message: String(error)
  };
}
