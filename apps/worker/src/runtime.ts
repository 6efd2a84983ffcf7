import type { Logger } from "pino";
import type { InferenceCapability } from "@reply-triage/shared";
import { getInferenceProvider } from "@reply-triage/inference";
import type { WorkerConfig } from "./config.js";
import type { DlqStore } from "./pipeline/dlq.js";
import { ReplyProcessor } from "./pipeline/processor.js";
import { createReplyStats } from "./pipeline/stats.js";
import type { CampaignDirectory, ReplyOutcomeSink, ReplyStore } from "./pipeline/types.js";

export type ReplyRuntimeDeps = {
  config: WorkerConfig;
  logger: Logger;
  store: ReplyStore;
  directory: CampaignDirectory;
  sink: ReplyOutcomeSink;
  dlq: DlqStore;
  inference?: InferenceCapability;
  env?: Record<string, string | undefined>;
  fetchImpl?: typeof fetch;
};

/**
 * Builds the processor for one worker process. Stats start empty here and
 * live as long as the returned processor. An unavailable inference backend
 * is logged but does not stop startup; replies fall back until it recovers.
 */
export async function createReplyRuntime(deps: ReplyRuntimeDeps): Promise<ReplyProcessor> {
  const inference =
    deps.inference ??
    getInferenceProvider(deps.config.inferenceProvider, {
      env: deps.env,
      fetchImpl: deps.fetchImpl
    });

  const health = await inference.checkHealth();
  const ready = {
    event: "runtime.ready",
    inferenceProvider: inference.name,
    modelId: inference.modelId,
    inferenceAvailable: health.available,
    inferenceDetail: health.detail
  };
  if (health.available) {
    deps.logger.info(ready);
  } else {
    deps.logger.warn(ready);
  }

  return new ReplyProcessor({
    store: deps.store,
    directory: deps.directory,
    inference,
    sink: deps.sink,
    dlq: deps.dlq,
    stats: createReplyStats(),
    logger: deps.logger,
    config: deps.config
  });
}
