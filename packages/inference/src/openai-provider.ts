import {
  isIntentLabel,
  type InferRequest,
  type InferResponse,
  type InferenceCapability,
  type InferenceHealth
} from "@reply-triage/shared";
import { InferenceNotConfiguredError, InferenceOutputError, InferenceRequestError } from "./errors.js";

const DEFAULT_API_BASE = "https://api.openai.com/v1";
const DEFAULT_CLASSIFIER_MODEL = "gpt-4.1-mini";
const MAX_CONTEXT_CHARS = 300;

type ResponsesApiPayload = {
  output_text?: unknown;
  output?: Array<{
    content?: Array<{
      text?: unknown;
    }>;
  }>;
};

export type OpenAiProviderOptions = {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  fetchImpl?: typeof fetch;
};

function extractOutputText(payload: ResponsesApiPayload): string {
  if (typeof payload.output_text === "string" && payload.output_text.trim().length > 0) {
    return payload.output_text.trim();
  }

  const segments: string[] = [];
  for (const item of payload.output ?? []) {
    for (const content of item.content ?? []) {
      if (typeof content.text === "string" && content.text.trim().length > 0) {
        segments.push(content.text.trim());
      }
    }
  }

  return segments.join("\n").trim();
}

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max)}...` : value;
}

export function buildClassificationPrompt(request: Omit<InferRequest, "signal">): string {
  const contextLines =
    request.contextWindow.length === 0
      ? ["No previous conversation history."]
      : request.contextWindow.map(
          (entry, index) =>
            `Prior reply ${index + 1} (most recent first), labelled ${entry.label}: ${truncate(entry.text, MAX_CONTEXT_CHARS)}`
        );

  return [
    `Allowed labels: ${request.labelSet.join(", ")}`,
    "Conversation context:",
    ...contextLines,
    "Current reply:",
    request.text
  ].join("\n\n");
}

export function parseClassificationOutput(provider: string, text: string): InferResponse {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start < 0 || end <= start) {
    throw new InferenceOutputError({ provider, message: "no JSON object in output" });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch {
    throw new InferenceOutputError({ provider, message: "output is not valid JSON" });
  }

  if (typeof parsed !== "object" || parsed === null) {
    throw new InferenceOutputError({ provider, message: "output is not a JSON object" });
  }
  const label = "label" in parsed ? parsed.label : undefined;
  if (!isIntentLabel(label)) {
    throw new InferenceOutputError({ provider, message: `unknown label ${String(label)}` });
  }
  const confidence = Number("confidence" in parsed ? parsed.confidence : undefined);
  if (!Number.isFinite(confidence)) {
    throw new InferenceOutputError({ provider, message: "confidence is not a number" });
  }

  return {
    label,
    rawConfidence: Math.min(1, Math.max(0, confidence))
  };
}

export class OpenAiInferenceProvider implements InferenceCapability {
  readonly name = "openai" as const;
  readonly modelId: string;
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAiProviderOptions = {}) {
    this.apiKey = options.apiKey?.trim() || undefined;
    this.baseUrl = options.baseUrl?.trim() || DEFAULT_API_BASE;
    this.modelId = options.model?.trim() || DEFAULT_CLASSIFIER_MODEL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private assertApiKey(): string {
    if (!this.apiKey) {
      throw new InferenceNotConfiguredError({
        provider: this.name,
        message: "OPENAI_API_KEY is required for the openai inference provider"
      });
    }
    return this.apiKey;
  }

  async infer(request: InferRequest): Promise<InferResponse> {
    const key = this.assertApiKey();

    const systemInstruction = [
      "You classify replies to outbound sales campaign emails by the sender's interest.",
      "NotInterested: rejections, unsubscribe or removal requests.",
      "MaybeInterested: neutral replies, timing questions, requests for more information.",
      "Interested: meeting or demo requests, pricing questions, clear buying signals.",
      "Weigh how the sender's interest evolved across the conversation context.",
      'Respond only with JSON: {"label": "<label>", "confidence": <0..1>}.'
    ].join(" ");

    const response = await this.fetchImpl(`${this.baseUrl}/responses`, {
      method: "POST",
      signal: request.signal,
      headers: {
        Authorization: `Bearer ${key}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify({
        model: this.modelId,
        temperature: 0,
        input: [
          {
            role: "system",
            content: [{ type: "input_text", text: systemInstruction }]
          },
          {
            role: "user",
            content: [{ type: "input_text", text: buildClassificationPrompt(request) }]
          }
        ]
      })
    });

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new InferenceRequestError({ provider: this.name, statusCode: response.status, body });
    }

    const payload = (await response.json()) as ResponsesApiPayload;
    const text = extractOutputText(payload);
    if (text.length === 0) {
      throw new InferenceOutputError({ provider: this.name, message: "empty output text" });
    }
    return parseClassificationOutput(this.name, text);
  }

  async checkHealth(): Promise<InferenceHealth> {
    if (!this.apiKey) {
      return { available: false, detail: "missing api key" };
    }

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/models/${encodeURIComponent(this.modelId)}`, {
        method: "GET",
        headers: { Authorization: `Bearer ${this.apiKey}` }
      });
      return response.ok
        ? { available: true }
        : { available: false, detail: `status=${response.status}` };
    } catch (error) {
      return { available: false, detail: error instanceof Error ? error.message : String(error) };
    }
  }
}
