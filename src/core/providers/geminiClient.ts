import { GoogleGenerativeAI } from "@google/generative-ai";
import { GenerationCapability, GenerationRequest, extractJsonObject } from "./types";

const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";
const FALLBACK_GEMINI_MODEL = "gemini-1.5-flash";

export type GeminiCapabilityOptions = {
  apiKey: string;
  model?: string;
  fallbackModel?: string;
};

export class GeminiCapability implements GenerationCapability {
  readonly name = "gemini";
  private client: GoogleGenerativeAI;
  private models: string[];

  constructor(options: GeminiCapabilityOptions) {
    const primary = options.model || DEFAULT_GEMINI_MODEL;
    const fallback = options.fallbackModel || FALLBACK_GEMINI_MODEL;
    this.models = [primary, fallback].filter((m, idx, arr) => arr.indexOf(m) === idx);
    this.client = new GoogleGenerativeAI(options.apiKey);
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
    throw lastErr instanceof Error ? lastErr : new Error("Gemini failed");
  }

  private async callModel(
    modelName: string,
    request: GenerationRequest,
    signal: AbortSignal,
    json: boolean
  ): Promise<string> {
    const model = this.client.getGenerativeModel({
      model: modelName,
      systemInstruction: request.system,
      generationConfig: {
        temperature: request.temperature,
        ...(json ? { responseMimeType: "application/json" } : {})
      }
    });
    const result = await model.generateContent(request.user, { signal });
    const text = result.response.text().trim();
    if (!text) throw new Error(`Gemini ${modelName} returned empty output`);
    return text;
  }
}
