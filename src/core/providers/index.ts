import { logEvent } from "../../utils/logging";
import { GeminiCapability } from "./geminiClient";
import { OpenAICapability } from "./openaiClient";
import { GenerationCapability, GenerationRequest } from "./types";

export type { GenerationCapability, GenerationRequest } from "./types";

/** Stands in when no provider key is configured; every call rejects so runners drop to the offline tier. */
export class UnavailableCapability implements GenerationCapability {
  readonly name = "unavailable";

  async generateStructured(): Promise<unknown> {
    throw new Error("no generation provider configured");
  }

  async generateText(): Promise<string> {
    throw new Error("no generation provider configured");
  }
}

/** Tries each provider in order until one answers. */
export class FailoverCapability implements GenerationCapability {
  readonly name: string;

  constructor(private providers: GenerationCapability[]) {
    this.name = providers.map((p) => p.name).join("+");
  }

  async generateStructured(request: GenerationRequest, signal: AbortSignal): Promise<unknown> {
    return this.tryEach((p) => p.generateStructured(request, signal), signal);
  }

  async generateText(request: GenerationRequest, signal: AbortSignal): Promise<string> {
    return this.tryEach((p) => p.generateText(request, signal), signal);
  }

  private async tryEach<T>(call: (p: GenerationCapability) => Promise<T>, signal: AbortSignal): Promise<T> {
    let lastErr: unknown = null;
    for (const provider of this.providers) {
      if (signal.aborted) break;
      try {
        return await call(provider);
      } catch (err) {
        lastErr = err;
      }
    }
    throw lastErr instanceof Error ? lastErr : new Error("all providers failed");
  }
}

export function createGenerationCapability(env: NodeJS.ProcessEnv = process.env): GenerationCapability {
  const providers: GenerationCapability[] = [];
  if (env.OPENAI_API_KEY) {
    providers.push(
      new OpenAICapability({
        apiKey: env.OPENAI_API_KEY,
        model: env.OPENAI_MODEL,
        fallbackModel: env.OPENAI_FALLBACK_MODEL
      })
    );
  }
  const geminiKey = env.GEMINI_API_KEY || env.GOOGLE_API_KEY;
  if (geminiKey) {
    providers.push(
      new GeminiCapability({ apiKey: geminiKey, model: env.GEMINI_MODEL, fallbackModel: env.GEMINI_FALLBACK_MODEL })
    );
  }

  if (providers.length === 0) {
    logEvent("PROVIDERS", "no provider key set, replies will come from the offline tier");
    return new UnavailableCapability();
  }
  const capability = providers.length === 1 ? providers[0] : new FailoverCapability(providers);
  logEvent("PROVIDERS", `using ${capability.name}`);
  return capability;
}
