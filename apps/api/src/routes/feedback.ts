import type { FastifyPluginAsync } from "fastify";
import { INTENT_LABELS, REPLY_QUEUE_NAMES, asTrimmedString, isIntentLabel } from "@reply-triage/shared";
import { resolveCorrelationId } from "../lib/inbound.js";
import type { ReplyQueueClient } from "../lib/reply-queues.js";
import { toStructuredLogContext, toStructuredLogEvent } from "../logging.js";

export type FeedbackRoutesOptions = {
  queues: ReplyQueueClient;
};

type FeedbackBody = {
  messageId?: unknown;
  confirmedLabel?: unknown;
  source?: unknown;
};

const feedbackRoutes: FastifyPluginAsync<FeedbackRoutesOptions> = async (app, options) => {
  app.post<{ Body: FeedbackBody | undefined }>("/v1/feedback", async (request, reply) => {
    const correlationId = resolveCorrelationId(request.headers);
    const messageId = asTrimmedString(request.body?.messageId);
    const confirmedLabel = request.body?.confirmedLabel;

    if (!messageId) {
      return reply.code(400).send({ error: "messageId is required" });
    }
    if (!isIntentLabel(confirmedLabel)) {
      return reply.code(400).send({ error: `confirmedLabel must be one of ${INTENT_LABELS.join(", ")}` });
    }

    const result = await options.queues.enqueueFeedback({
      messageId,
      confirmedLabel,
      source: asTrimmedString(request.body?.source) ?? undefined
    });

    request.log.info(
      toStructuredLogEvent(
        toStructuredLogContext({
          stage: "feedback",
          queueName: REPLY_QUEUE_NAMES.feedback,
          jobId: result.jobId,
          correlationId,
          messageId
        }),
        "reply.feedback.enqueued",
        { reused: result.reused }
      )
    );

    return reply.code(202).send({ jobId: result.jobId, reused: result.reused, correlationId });
  });
};

export default feedbackRoutes;
