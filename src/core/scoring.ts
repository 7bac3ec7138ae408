import { DEFAULT_KEYWORDS, KeywordTables } from "../utils/config";
import { clamp01, round2 } from "../utils/mask";
import { containsTerm, messageSignals } from "./extractor";

export type ScamAssessment = {
  scamDetected: boolean;
  confidence: number;
  scamType: string;
  redFlags: string[];
};

export const UNKNOWN_SCAM_TYPE = "unknown";

const DETECTION_THRESHOLD = 0.5;

/** Scam family with the most keyword hits across the texts; ties go to the earlier table entry. */
export function detectScamType(texts: string[], tables: KeywordTables = DEFAULT_KEYWORDS): string {
  const combined = texts.join(" ");
  let best = UNKNOWN_SCAM_TYPE;
  let bestHits = 0;
  for (const [scamType, keywords] of Object.entries(tables.scamTypes)) {
    const hits = keywords.filter((kw) => containsTerm(combined, kw)).length;
    if (hits > bestHits) {
      best = scamType;
      bestHits = hits;
    }
  }
  return best;
}

/** Narrative phrases for every red-flag family with at least one keyword hit, in table order. */
export function detectRedFlags(texts: string[], tables: KeywordTables = DEFAULT_KEYWORDS): string[] {
  const combined = texts.join(" ");
  return Object.values(tables.redFlags)
    .filter((rule) => rule.keywords.some((kw) => containsTerm(combined, kw)))
    .map((rule) => rule.phrase);
}

/**
 * Keyword heuristic over the latest message, with the whole conversation used
 * for scam type and red flags. Used wherever a model verdict is absent.
 */
export function assessScam(
  message: string,
  history: string[] = [],
  tables: KeywordTables = DEFAULT_KEYWORDS
): ScamAssessment {
  const signals = messageSignals(message, tables);
  const hits = [signals.urgency, signals.authority, signals.credentials, signals.payment, signals.link];

  let confidence = clamp01(hits.filter(Boolean).length / hits.length);

  if (signals.credentials) confidence = Math.max(confidence, 0.98);
  if (signals.link && signals.urgency) confidence = Math.max(confidence, 0.95);
  if (signals.account && signals.urgency) confidence = Math.max(confidence, 0.9);

  const conversation = [...history, message];
  return {
    scamDetected: confidence >= DETECTION_THRESHOLD,
    confidence: round2(confidence),
    scamType: detectScamType(conversation, tables),
    redFlags: detectRedFlags(conversation, tables)
  };
}
