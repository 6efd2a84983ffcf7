import type { FastifyPluginAsync } from "fastify";
import { REPLY_QUEUE_NAMES, asTrimmedString } from "@reply-triage/shared";
import { resolveCorrelationId } from "../lib/inbound.js";
import type { ReplyQueueClient } from "../lib/reply-queues.js";
import { toStructuredLogContext, toStructuredLogEvent } from "../logging.js";

const REASON_CODES = new Set(["MALFORMED_INPUT", "STATE_CORRUPTION", "UNEXPECTED"]);
const MAX_REPLAY_LIMIT = 1000;

export type DlqRoutesOptions = {
  queues: ReplyQueueClient;
};

type ReplayBody = {
  limit?: unknown;
  reasonCode?: unknown;
};

const dlqRoutes: FastifyPluginAsync<DlqRoutesOptions> = async (app, options) => {
  app.post<{ Body: ReplayBody | undefined }>("/v1/dlq/replay", async (request, reply) => {
    const correlationId = resolveCorrelationId(request.headers);
    const rawLimit = request.body?.limit;
    const reasonCode = asTrimmedString(request.body?.reasonCode) ?? undefined;

    if (
      rawLimit !== undefined &&
      (typeof rawLimit !== "number" || !Number.isInteger(rawLimit) || rawLimit < 1 || rawLimit > MAX_REPLAY_LIMIT)
    ) {
      return reply.code(400).send({ error: `limit must be an integer between 1 and ${MAX_REPLAY_LIMIT}` });
    }
    if (reasonCode && !REASON_CODES.has(reasonCode)) {
      return reply.code(400).send({ error: `reasonCode must be one of ${[...REASON_CODES].join(", ")}` });
    }

    const result = await options.queues.enqueueDlqReplay({
      limit: typeof rawLimit === "number" ? rawLimit : undefined,
      reasonCode
    });

    request.log.info(
      toStructuredLogEvent(
        toStructuredLogContext({
          stage: "dlq_replay",
          queueName: REPLY_QUEUE_NAMES.dlqReplay,
          jobId: result.jobId,
          correlationId
        }),
        "dlq.replay.enqueued",
        { reused: result.reused }
      )
    );

    return reply.code(202).send({ jobId: result.jobId, reused: result.reused, correlationId });
  });
};

export default dlqRoutes;
