import { errorCause, logEvent } from "../utils/logging";
import { RandomSource, synthesizeOfflineReply } from "./offline";
import { ParsedReply, ReplyDefaults, parseStructured, recoverReply } from "./parsing";
import { buildGenerationRequest } from "./prompt";
import type { GenerationCapability } from "./providers/types";
import type { Strategy } from "./strategies";
import type { CandidateResult, Tier, TierFailure, TurnContext } from "./types";

export type RungOutcome = { ok: true; candidate: CandidateResult } | { ok: false; cause: string };

export type Rung = {
  tier: Tier;
  run: (signal: AbortSignal) => Promise<RungOutcome>;
};

export type RunnerDeps = {
  capability: GenerationCapability;
  random?: RandomSource;
};

/** Defaults for fields a recovered reply may leave out. */
export function recoveredDefaults(ctx: TurnContext): ReplyDefaults {
  return { scamDetected: true, confidence: 0.8, scamType: ctx.assessment.scamType };
}

function toCandidate(strategyId: string, tier: Tier, parsed: ParsedReply, notes: string): CandidateResult {
  return {
    strategyId,
    reply: parsed.reply,
    scamDetected: parsed.scamDetected,
    confidence: parsed.confidence,
    scamType: parsed.scamType,
    intelligence: parsed.intelligence,
    notes: parsed.notes || notes,
    tier,
    failures: []
  };
}

export function buildLadder(strategy: Strategy, ctx: TurnContext, deps: RunnerDeps): Rung[] {
  const request = buildGenerationRequest(strategy, ctx);
  const defaults: ReplyDefaults = {
    scamDetected: ctx.assessment.scamDetected,
    confidence: ctx.assessment.confidence,
    scamType: ctx.assessment.scamType
  };

  return [
    {
      tier: "structured",
      run: async (signal) => {
        const value = await deps.capability.generateStructured(request, signal);
        const parsed = parseStructured(value, defaults);
        if (!parsed) return { ok: false, cause: "structured output failed validation" };
        return { ok: true, candidate: toCandidate(strategy.id, "structured", parsed, `${deps.capability.name} structured`) };
      }
    },
    {
      tier: "recovered",
      run: async (signal) => {
        const text = await deps.capability.generateText(request, signal);
        const recovered = recoverReply(text, recoveredDefaults(ctx));
        if (!recovered) return { ok: false, cause: "no usable reply in text output" };
        return {
          ok: true,
          candidate: toCandidate(
            strategy.id,
            "recovered",
            recovered.parsed,
            `${deps.capability.name} recovered via ${recovered.parser}`
          )
        };
      }
    },
    {
      tier: "offline",
      run: async () => ({ ok: true, candidate: runOfflineTier(strategy, ctx, deps.random) })
    }
  ];
}

export function runOfflineTier(strategy: Strategy, ctx: TurnContext, random?: RandomSource): CandidateResult {
  return synthesizeOfflineReply(strategy.id, ctx, random);
}

/**
 * Walks the ladder until a rung yields a candidate. Resolves to null once the
 * signal is aborted, or if every rung failed.
 */
export async function driveLadder(
  strategyId: string,
  rungs: Rung[],
  signal: AbortSignal
): Promise<CandidateResult | null> {
  const failures: TierFailure[] = [];
  for (const rung of rungs) {
    if (signal.aborted) return null;
    let outcome: RungOutcome;
    try {
      outcome = await rung.run(signal);
    } catch (err) {
      outcome = { ok: false, cause: errorCause(err) };
    }
    if (signal.aborted) return null;
    if (outcome.ok) {
      return { ...outcome.candidate, failures };
    }
    failures.push({ tier: rung.tier, cause: outcome.cause });
    logEvent("AGENT", `${strategyId} ${rung.tier} failed: ${outcome.cause}`);
  }
  return null;
}

/** Never rejects. Null means the run was cancelled and has nothing to offer. */
export async function runStrategy(
  strategy: Strategy,
  ctx: TurnContext,
  signal: AbortSignal,
  deps: RunnerDeps
): Promise<CandidateResult | null> {
  const candidate = await driveLadder(strategy.id, buildLadder(strategy, ctx, deps), signal);
  if (candidate || signal.aborted) return candidate;
  return runOfflineTier(strategy, ctx, deps.random);
}
