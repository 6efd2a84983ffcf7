import type { FastifyPluginAsync } from "fastify";
import { REPLY_QUEUE_NAMES, asTrimmedString } from "@reply-triage/shared";
import { resolveCorrelationId } from "../lib/inbound.js";
import type { ReplyQueueClient } from "../lib/reply-queues.js";
import { toStructuredLogContext, toStructuredLogEvent } from "../logging.js";

export type LeadRoutesOptions = {
  queues: ReplyQueueClient;
};

const leadRoutes: FastifyPluginAsync<LeadRoutesOptions> = async (app, options) => {
  app.post<{ Params: { leadId: string } }>("/v1/leads/:leadId/archive", async (request, reply) => {
    const correlationId = resolveCorrelationId(request.headers);
    const leadId = asTrimmedString(request.params.leadId);
    if (!leadId) {
      return reply.code(400).send({ error: "leadId is required" });
    }

    const result = await options.queues.enqueueLeadArchive({ leadId });

    request.log.info(
      toStructuredLogEvent(
        toStructuredLogContext({
          stage: "lead_archive",
          queueName: REPLY_QUEUE_NAMES.leadArchive,
          jobId: result.jobId,
          correlationId,
          leadId
        }),
        "lead.archive.enqueued",
        { reused: result.reused }
      )
    );

    return reply.code(202).send({ jobId: result.jobId, reused: result.reused, correlationId });
  });
};

export default leadRoutes;
