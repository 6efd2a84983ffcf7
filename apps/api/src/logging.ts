import type { CorrelationId } from "@reply-triage/shared";

export type StructuredLogContext = {
  stage?: string;
  queueName?: string;
  jobId?: string;
  correlationId?: CorrelationId;
  messageId?: string;
  leadId?: string;
};

export type StructuredLogEvent = StructuredLogContext & {
  event: string;
  elapsedMs?: number;
  accepted?: number;
  reused?: boolean;
};

export function toStructuredLogContext(context: StructuredLogContext): StructuredLogContext {
  return {
    stage: context.stage,
    queueName: context.queueName,
    jobId: context.jobId,
    correlationId: context.correlationId,
    messageId: context.messageId,
    leadId: context.leadId
  };
}

export function toStructuredLogEvent(
  context: StructuredLogContext,
  event: string,
  extra?: {
    elapsedMs?: number;
    accepted?: number;
    reused?: boolean;
  }
): StructuredLogEvent {
  return {
    ...toStructuredLogContext(context),
    event,
    elapsedMs: extra?.elapsedMs,
    accepted: extra?.accepted,
    reused: extra?.reused
  };
}
