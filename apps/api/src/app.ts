import { fastify, type FastifyInstance, type FastifyServerOptions } from "fastify";
import type { ReplyQueueClient } from "./lib/reply-queues.js";
import dlqRoutes from "./routes/dlq.js";
import feedbackRoutes from "./routes/feedback.js";
import leadRoutes from "./routes/leads.js";
import replyRoutes from "./routes/replies.js";

export type BuildAppOptions = {
  queues: ReplyQueueClient;
  env?: Record<string, string | undefined>;
  logger?: FastifyServerOptions["logger"];
};

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = fastify({
    logger: options.logger ?? {
      level: process.env.LOG_LEVEL ?? "info"
    }
  });

  app.get("/healthz", async () => {
    return { ok: true, service: "api", ts: new Date().toISOString() };
  });

  await app.register(replyRoutes, { queues: options.queues, env: options.env });
  await app.register(feedbackRoutes, { queues: options.queues });
  await app.register(leadRoutes, { queues: options.queues });
  await app.register(dlqRoutes, { queues: options.queues });

  app.addHook("onClose", async () => {
    await options.queues.close();
  });

  return app;
}
