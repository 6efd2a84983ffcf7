import assert from "node:assert/strict";
import test from "node:test";
import { pino } from "pino";
import type { InferenceHealth } from "@reply-triage/shared";
import { loadWorkerConfig } from "./config.js";
import { MemoryCampaignDirectory } from "./crm/campaign-directory.js";
import { MemoryOutcomeSink } from "./crm/outcome-sink.js";
import { MemoryDlqStore } from "./pipeline/dlq.js";
import { ScriptedInference, keywordScript } from "./pipeline/test-support.js";
import { createReplyRuntime } from "./runtime.js";
import { MemoryReplyStore } from "./store/memory-store.js";

type LogLine = {
  level: number;
  event?: string;
  inferenceProvider?: string;
  inferenceAvailable?: boolean;
  inferenceDetail?: string;
};

function captureLogger() {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "info" },
    {
      write(line: string) {
        const parsed: LogLine = JSON.parse(line);
        lines.push(parsed);
      }
    }
  );
  return { logger, lines };
}

class UnavailableInference extends ScriptedInference {
  async checkHealth(): Promise<InferenceHealth> {
    return { available: false, detail: "missing api key" };
  }
}

function runtimeDeps() {
  return {
    config: loadWorkerConfig({}),
    store: new MemoryReplyStore(),
    directory: new MemoryCampaignDirectory(),
    sink: new MemoryOutcomeSink(),
    dlq: new MemoryDlqStore()
  };
}

test("createReplyRuntime reports the configured inference backend at startup", async () => {
  const { logger, lines } = captureLogger();

  await createReplyRuntime({ ...runtimeDeps(), logger });

  const ready = lines.find((line) => line.event === "runtime.ready");
  assert.equal(ready?.level, 30);
  assert.equal(ready?.inferenceProvider, "keyword");
  assert.equal(ready?.inferenceAvailable, true);
});

test("createReplyRuntime warns when the inference backend is unavailable", async () => {
  const { logger, lines } = captureLogger();

  const processor = await createReplyRuntime({
    ...runtimeDeps(),
    logger,
    inference: new UnavailableInference(keywordScript)
  });

  const ready = lines.find((line) => line.event === "runtime.ready");
  assert.equal(ready?.level, 40);
  assert.equal(ready?.inferenceAvailable, false);
  assert.equal(ready?.inferenceDetail, "missing api key");
  assert.equal(processor.snapshot().ingested, 0);
});
