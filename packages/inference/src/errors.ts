export class InferenceNotConfiguredError extends Error {
  readonly provider: string;

  constructor(input: { provider: string; message?: string }) {
    super(input.message ?? `Inference provider ${input.provider} is not configured`);
    this.name = "InferenceNotConfiguredError";
    this.provider = input.provider;
  }
}

export class InferenceRequestError extends Error {
  readonly provider: string;
  readonly statusCode: number;

  constructor(input: { provider: string; statusCode: number; body?: string }) {
    super(`INFERENCE_FAILED: provider=${input.provider} status=${input.statusCode} body=${(input.body ?? "").slice(0, 500)}`);
    this.name = "InferenceRequestError";
    this.provider = input.provider;
    this.statusCode = input.statusCode;
  }
}

export class InferenceOutputError extends Error {
  readonly provider: string;

  constructor(input: { provider: string; message: string }) {
    super(`INFERENCE_OUTPUT_INVALID: provider=${input.provider} ${input.message}`);
    this.name = "InferenceOutputError";
    this.provider = input.provider;
  }
}
