export { KeywordInferenceProvider, matchKeywordRule } from "./keyword-provider.js";
export {
  OpenAiInferenceProvider,
  buildClassificationPrompt,
  parseClassificationOutput,
  type OpenAiProviderOptions
} from "./openai-provider.js";
export {
  createKeywordProvider,
  createOpenAiProvider,
  getInferenceProvider,
  inferenceProviderRegistry,
  isInferenceProviderName
} from "./registry.js";
export { InferenceNotConfiguredError, InferenceOutputError, InferenceRequestError } from "./errors.js";
