import type { ContextWindowEntry, IntentLabel } from "../replies/types.js";

export type InferenceProviderName = "openai" | "keyword";

export interface InferRequest {
  text: string;
  contextWindow: readonly ContextWindowEntry[];
  labelSet: readonly IntentLabel[];
  signal?: AbortSignal;
}

export interface InferResponse {
  label: IntentLabel;
  rawConfidence: number;
}

export interface InferenceHealth {
  available: boolean;
  detail?: string;
}

/**
 * External classification capability. Implementations may throw on
 * timeout, quota or transport failures; callers own the fallback policy.
 */
export interface InferenceCapability {
  readonly name: InferenceProviderName;
  readonly modelId: string;
  infer(request: InferRequest): Promise<InferResponse>;
  checkHealth(): Promise<InferenceHealth>;
}

export type InferenceProviderDeps = {
  provider: InferenceProviderName;
  env?: Record<string, string | undefined>;
  fetchImpl?: typeof fetch;
};

export type InferenceProviderFactory = (deps: InferenceProviderDeps) => InferenceCapability;

export type InferenceProviderRegistry = Record<InferenceProviderName, InferenceProviderFactory>;
