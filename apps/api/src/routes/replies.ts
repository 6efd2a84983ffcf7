import type { FastifyPluginAsync } from "fastify";
import {
  KILL_SWITCH_REPLY_INGESTION,
  REPLY_QUEUE_NAMES,
  isGlobalReplyIngestionDisabled
} from "@reply-triage/shared";
import { parseReplyBatch, resolveCorrelationId } from "../lib/inbound.js";
import type { ReplyQueueClient } from "../lib/reply-queues.js";
import { toStructuredLogContext, toStructuredLogEvent } from "../logging.js";

export type ReplyRoutesOptions = {
  queues: ReplyQueueClient;
  env?: Record<string, string | undefined>;
};

const replyRoutes: FastifyPluginAsync<ReplyRoutesOptions> = async (app, options) => {
  app.post("/v1/replies", async (request, reply) => {
    const correlationId = resolveCorrelationId(request.headers);
    const baseLogContext = toStructuredLogContext({
      stage: "reply_batch",
      queueName: REPLY_QUEUE_NAMES.batches,
      correlationId
    });

    if (isGlobalReplyIngestionDisabled(options.env ?? process.env)) {
      request.log.warn(
        toStructuredLogEvent(baseLogContext, "reply.batch.ignored"),
        `${KILL_SWITCH_REPLY_INGESTION} disabled by global env`
      );
      return reply.code(503).send({ error: "Reply ingestion is disabled", key: KILL_SWITCH_REPLY_INGESTION });
    }

    const parsed = parseReplyBatch(request.body);
    if (!parsed.ok) {
      return reply.code(400).send({ error: parsed.error });
    }

    const startedAt = Date.now();
    const result = await options.queues.enqueueReplyBatch({ correlationId, messages: parsed.value });

    request.log.info(
      toStructuredLogEvent({ ...baseLogContext, jobId: result.jobId }, "reply.batch.enqueued", {
        elapsedMs: Date.now() - startedAt,
        accepted: parsed.value.length,
        reused: result.reused
      })
    );

    return reply.code(202).send({
      jobId: result.jobId,
      reused: result.reused,
      correlationId,
      accepted: parsed.value.length
    });
  });
};

export default replyRoutes;
