import { z } from "zod";
import { clamp01 } from "../utils/mask";
import { IntelligenceRecord, coerceIntelligence } from "./intel";

export const MIN_REPLY_LENGTH = 10;

export type ParsedReply = {
  reply: string;
  scamDetected: boolean;
  confidence: number;
  scamType: string;
  intelligence: IntelligenceRecord;
  notes: string;
};

export type ReplyDefaults = {
  scamDetected: boolean;
  confidence: number;
  scamType: string;
};

export type RecoveryParser = "direct" | "fields" | "cleanup" | "plain";

const usableReply = z
  .string()
  .transform((value) => value.trim())
  .refine((value) => value.length > MIN_REPLY_LENGTH, "reply too short");

/** Shape a model must return on the structured tier. */
export const structuredReplySchema = z.object({
  reply: usableReply,
  scamDetected: z.boolean(),
  confidence: z.number(),
  scamType: z.string().optional(),
  intelligence: z.unknown().optional(),
  notes: z.string().optional()
});

/** Looser shape for text the recovered tier had to dig out. */
const looseReplySchema = z.object({
  reply: usableReply,
  scamDetected: z.boolean().optional(),
  confidence: z.number().optional(),
  scamType: z.string().optional(),
  intelligence: z.unknown().optional(),
  notes: z.string().optional()
});

type LooseReply = z.infer<typeof looseReplySchema>;

function finish(value: LooseReply, defaults: ReplyDefaults): ParsedReply {
  const scamType = value.scamType?.trim();
  return {
    reply: value.reply,
    scamDetected: value.scamDetected ?? defaults.scamDetected,
    confidence: clamp01(value.confidence ?? defaults.confidence),
    scamType: scamType ? scamType : defaults.scamType,
    intelligence: coerceIntelligence(value.intelligence),
    notes: value.notes?.trim() ?? ""
  };
}

export function parseStructured(value: unknown, defaults: ReplyDefaults): ParsedReply | null {
  const result = structuredReplySchema.safeParse(value);
  return result.success ? finish(result.data, defaults) : null;
}

function withReplyAlias(value: unknown): unknown {
  if (!value || typeof value !== "object" || Array.isArray(value)) return value;
  if ("reply" in value) return value;
  if ("response" in value) return { ...value, reply: value.response };
  return value;
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function parseLoose(value: unknown): LooseReply | null {
  const result = looseReplySchema.safeParse(withReplyAlias(value));
  return result.success ? result.data : null;
}

export function parseDirectJson(text: string): LooseReply | null {
  return parseLoose(tryJson(text.trim()));
}

function pullString(text: string, field: string): string | undefined {
  const match = new RegExp(`"${field}"\\s*:\\s*"((?:[^"\\\\]|\\\\.)*)"`).exec(text);
  if (!match) return undefined;
  const decoded = tryJson(`"${match[1]}"`);
  return typeof decoded === "string" ? decoded : match[1];
}

/** Field-by-field pull for JSON that is truncated or otherwise unparseable. */
export function pullFields(text: string): LooseReply | null {
  const reply = pullString(text, "reply") ?? pullString(text, "response");
  if (reply === undefined) return null;
  const detected = /"scamDetected"\s*:\s*(true|false)/.exec(text);
  const confidence = /"confidence"\s*:\s*(-?\d+(?:\.\d+)?)/.exec(text);
  return parseLoose({
    reply,
    scamDetected: detected ? detected[1] === "true" : undefined,
    confidence: confidence ? Number(confidence[1]) : undefined,
    scamType: pullString(text, "scamType"),
    notes: pullString(text, "notes")
  });
}

function stripWrapping(text: string): string {
  return text
    .replace(/```(?:json)?/gi, "")
    .replace(/^\s*(?:reply|response|answer)\s*:\s*/i, "")
    .trim();
}

/** Strips fences and prose, then parses the outermost object; plain text becomes the reply when it is long enough. */
export function cleanupAndParse(text: string): { value: LooseReply; parser: "cleanup" | "plain" } | null {
  const cleaned = stripWrapping(text);
  const start = cleaned.indexOf("{");
  const end = cleaned.lastIndexOf("}");
  if (start !== -1 && end > start) {
    const parsed = parseLoose(tryJson(cleaned.slice(start, end + 1)));
    if (parsed) return { value: parsed, parser: "cleanup" };
  }
  if (cleaned.includes("{")) return null;
  const plain = cleaned.replace(/^["']+|["']+$/g, "").trim();
  if (plain.length <= MIN_REPLY_LENGTH) return null;
  return { value: { reply: plain }, parser: "plain" };
}

export function recoverReply(
  text: string,
  defaults: ReplyDefaults
): { parsed: ParsedReply; parser: RecoveryParser } | null {
  const direct = parseDirectJson(text);
  if (direct) return { parsed: finish(direct, defaults), parser: "direct" };
  const pulled = pullFields(text);
  if (pulled) return { parsed: finish(pulled, defaults), parser: "fields" };
  const cleaned = cleanupAndParse(text);
  if (cleaned) return { parsed: finish(cleaned.value, defaults), parser: cleaned.parser };
  return null;
}
