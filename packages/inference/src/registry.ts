import type {
  InferenceCapability,
  InferenceProviderDeps,
  InferenceProviderFactory,
  InferenceProviderName,
  InferenceProviderRegistry
} from "@reply-triage/shared";
import { KeywordInferenceProvider } from "./keyword-provider.js";
import { OpenAiInferenceProvider } from "./openai-provider.js";

export const createOpenAiProvider: InferenceProviderFactory = (deps) => {
  if (deps.provider !== "openai") {
    throw new Error(`OpenAiInferenceProvider cannot handle provider ${deps.provider}`);
  }
  const env = deps.env ?? process.env;
  return new OpenAiInferenceProvider({
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_API_BASE_URL,
    model: env.OPENAI_CLASSIFIER_MODEL,
    fetchImpl: deps.fetchImpl
  });
};

export const createKeywordProvider: InferenceProviderFactory = (deps) => {
  if (deps.provider !== "keyword") {
    throw new Error(`KeywordInferenceProvider cannot handle provider ${deps.provider}`);
  }
  return new KeywordInferenceProvider();
};

export const inferenceProviderRegistry: InferenceProviderRegistry = {
  openai: createOpenAiProvider,
  keyword: createKeywordProvider
};

export function isInferenceProviderName(value: unknown): value is InferenceProviderName {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(inferenceProviderRegistry, value);
}

export function getInferenceProvider(
  name: string,
  deps: Omit<InferenceProviderDeps, "provider"> = {}
): InferenceCapability {
  if (!isInferenceProviderName(name)) {
    throw new Error(`Unknown inference provider: ${name}`);
  }
  return inferenceProviderRegistry[name]({ ...deps, provider: name });
}
