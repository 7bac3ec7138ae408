export type GenerationRequest = {
  system: string;
  user: string;
  temperature: number;
};

/**
 * Opaque text-generation service. Both calls honour the abort signal and
 * reject on any provider failure; callers decide what a failure means.
 */
export interface GenerationCapability {
  readonly name: string;
  generateStructured(request: GenerationRequest, signal: AbortSignal): Promise<unknown>;
  generateText(request: GenerationRequest, signal: AbortSignal): Promise<string>;
}

export function extractJsonObject(text: string): unknown {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end === -1 || end <= start) {
    throw new Error("structured output contained no JSON object");
  }
  return JSON.parse(text.slice(start, end + 1));
}
