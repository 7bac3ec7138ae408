import OpenAI from "openai";
import { GenerationCapability, GenerationRequest, extractJsonObject } from "./types";

const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
const FALLBACK_OPENAI_MODEL = "gpt-4.1-mini";
const MAX_OUTPUT_TOKENS = 400;

export type OpenAICapabilityOptions = {
  apiKey: string;
  model?: string;
  fallbackModel?: string;
};

export class OpenAICapability implements GenerationCapability {
  readonly name = "openai";
  private client: OpenAI;
  private models: string[];

  constructor(options: OpenAICapabilityOptions) {
    const primary = options.model || DEFAULT_OPENAI_MODEL;
    const fallback = options.fallbackModel || FALLBACK_OPENAI_MODEL;
    this.models = [primary, fallback].filter((m, idx, arr) => arr.indexOf(m) === idx);
    this.client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async generateStructured(request: GenerationRequest, signal: AbortSignal): Promise<unknown> {
    const text = await this.withFallback((model) => this.callModel(model, request, signal, true), signal);
    return extractJsonObject(text);
  }

  async generateText(request: GenerationRequest, signal: AbortSignal): Promise<string> {
    return this.withFallback((model) => this.callModel(model, request, signal, false), signal);
  }

  private async withFallback(call: (model: string) => Promise<string>, signal: AbortSignal): Promise<string> {
    let lastErr: unknown = null;
    for (const model of this.models) {
      if (signal.aborted) break;
      try {
        return await call(model);
      } catch (err) {
        lastErr = err;
      }
    }
    throw lastErr instanceof Error ? lastErr : new Error("OpenAI failed");
  }

  private async callModel(
    model: string,
    request: GenerationRequest,
    signal: AbortSignal,
    json: boolean
  ): Promise<string> {
    const response = await this.client.responses.create(
      {
        model,
        input: [
          { role: "system", content: request.system },
          { role: "user", content: request.user }
        ],
        max_output_tokens: MAX_OUTPUT_TOKENS,
        temperature: request.temperature,
        ...(json ? { text: { format: { type: "json_object" as const } } } : {})
      },
      { signal }
    );
    const text = response.output_text?.trim() || "";
    if (!text) throw new Error(`OpenAI ${model} returned empty output`);
    return text;
  }
}
