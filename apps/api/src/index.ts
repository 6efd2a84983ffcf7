import { buildApp } from "./app.js";
import { createBullMqReplyQueues } from "./lib/reply-queues.js";

async function main() {
  const app = await buildApp({ queues: createBullMqReplyQueues() });

  const port = Number(process.env.PORT ?? 3001);
  const host = process.env.HOST ?? "0.0.0.0";

  try {
    await app.listen({ port, host });
    app.log.info({ event: "api.ready", host, port });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
