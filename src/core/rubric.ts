import { DEFAULT_KEYWORDS, DEFAULT_SCORING, KeywordTables, ScoringWeights } from "../utils/config";
import { round2 } from "../utils/mask";
import { IntelligenceRecord, PRIORITY_CATEGORIES, PriorityCategory, hasNewEntries } from "./intel";
import type { Strategy } from "./strategies";
import type { CandidateResult } from "./types";

export type ScoringContext = {
  /** Session-accumulated intelligence before this turn. */
  known: IntelligenceRecord;
  missing: PriorityCategory[];
  recentReplies: string[];
};

export type ScoreBreakdown = {
  newIntel: number;
  missingTargeting: number;
  confidence: number;
  naturalness: number;
  coverPenalty: number;
  repetitionPenalty: number;
  total: number;
};

export type Selection = {
  winner: CandidateResult;
  score: number;
  breakdown: ScoreBreakdown;
  forced: boolean;
};

function normalize(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}

function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count += 1;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

function naturalnessScore(length: number, weights: ScoringWeights): number {
  const band = weights.naturalness;
  if (length <= band.minLength) return band.shortBand;
  if (length < band.maxLength) return band.midBand;
  return band.longBand;
}

export function explainScore(
  candidate: CandidateResult,
  ctx: ScoringContext,
  weights: ScoringWeights = DEFAULT_SCORING,
  tables: KeywordTables = DEFAULT_KEYWORDS
): ScoreBreakdown {
  const lower = candidate.reply.toLowerCase();

  let newIntel = 0;
  for (const category of PRIORITY_CATEGORIES) {
    if (hasNewEntries(category, candidate.intelligence[category], ctx.known[category])) {
      newIntel += weights.newIntel[category];
    }
  }

  let missingTargeting = 0;
  for (const category of ctx.missing) {
    if (tables.triggers[category].some((word) => lower.includes(word.toLowerCase()))) {
      missingTargeting += weights.missingFieldBonus;
    }
  }

  const confidence = candidate.scamDetected ? candidate.confidence * weights.confidenceMultiplier : 0;
  const naturalness = naturalnessScore(candidate.reply.length, weights);

  let coverHits = 0;
  for (const term of tables.coverBreaking) coverHits += countOccurrences(lower, term.toLowerCase());
  const coverPenalty = coverHits * weights.coverPenalty;

  const normalized = normalize(candidate.reply);
  const repeated = ctx.recentReplies.some((prev) => normalize(prev) === normalized);
  const repetitionPenalty = repeated ? weights.repetitionPenalty : 0;

  const total = newIntel + missingTargeting + confidence + naturalness - coverPenalty - repetitionPenalty;
  return {
    newIntel,
    missingTargeting,
    confidence: round2(confidence),
    naturalness,
    coverPenalty,
    repetitionPenalty,
    total: round2(total)
  };
}

export function scoreCandidate(
  candidate: CandidateResult,
  ctx: ScoringContext,
  weights: ScoringWeights = DEFAULT_SCORING,
  tables: KeywordTables = DEFAULT_KEYWORDS
): number {
  return explainScore(candidate, ctx, weights, tables).total;
}

/**
 * Highest score wins; equal scores go to the strategy declared first. With no
 * candidates the fallback is produced and returned as the winner.
 */
export function selectWinner(
  candidates: readonly CandidateResult[],
  strategies: readonly Strategy[],
  ctx: ScoringContext,
  fallback: () => CandidateResult,
  weights: ScoringWeights = DEFAULT_SCORING,
  tables: KeywordTables = DEFAULT_KEYWORDS
): Selection {
  const order = (candidate: CandidateResult) => {
    const index = strategies.findIndex((s) => s.id === candidate.strategyId);
    return index === -1 ? strategies.length : index;
  };

  let best: Selection | null = null;
  for (const candidate of candidates) {
    const breakdown = explainScore(candidate, ctx, weights, tables);
    const better =
      !best ||
      breakdown.total > best.score ||
      (breakdown.total === best.score && order(candidate) < order(best.winner));
    if (better) best = { winner: candidate, score: breakdown.total, breakdown, forced: false };
  }
  if (best) return best;

  const forced = fallback();
  const breakdown = explainScore(forced, ctx, weights, tables);
  return { winner: forced, score: breakdown.total, breakdown, forced: true };
}
