import { z } from "zod";
import replyTable from "../data/offlineReplies.json";
import type { MessageSignals, Register } from "./extractor";
import { PRIORITY_CATEGORIES, PriorityCategory, emptyIntelligence } from "./intel";
import type { TurnPhase } from "./strategies";
import type { CandidateResult, TurnContext } from "./types";

const TRIGGERS = ["rapport", "bank", "credentials", "link", "payment", "urgency", "authority", "generic"] as const;

export type ReplyTrigger = (typeof TRIGGERS)[number];

const offlineReplySchema = z.object({
  id: z.string().min(1),
  strategy: z.string().min(1),
  register: z.enum(["english", "hinglish"]),
  trigger: z.enum(TRIGGERS),
  targets: z.array(z.enum(PRIORITY_CATEGORIES)),
  text: z.string().min(1)
});

export type OfflineReply = z.infer<typeof offlineReplySchema>;

export type RandomSource = () => number;

export const OFFLINE_REPLIES: readonly OfflineReply[] = z.array(offlineReplySchema).parse(replyTable);

export const EMERGENCY_REPLY = "Sorry sir, my phone is acting strange. Can you tell me again what I have to do?";

export type OfflineSelection = {
  strategyId: string;
  register: Register;
  signals: MessageSignals;
  phase: TurnPhase;
  missing: PriorityCategory[];
  lastReplyId: string | null;
};

export function matchedTriggers(signals: MessageSignals): ReplyTrigger[] {
  const triggers: ReplyTrigger[] = [];
  if (signals.bank && signals.account) triggers.push("bank");
  if (signals.credentials) triggers.push("credentials");
  if (signals.link) triggers.push("link");
  if (signals.payment) triggers.push("payment");
  if (signals.urgency) triggers.push("urgency");
  if (signals.authority) triggers.push("authority");
  return triggers;
}

function targetsAny(entry: OfflineReply, missing: PriorityCategory[]): boolean {
  return entry.targets.some((target) => missing.includes(target));
}

function nonEmpty<T>(preferred: T[], fallback: T[]): T[] {
  return preferred.length > 0 ? preferred : fallback;
}

/**
 * Candidate pool for one strategy and turn. The entry used last in the
 * session is never offered again straight away.
 */
export function selectOfflinePool(
  selection: OfflineSelection,
  table: readonly OfflineReply[] = OFFLINE_REPLIES
): OfflineReply[] {
  const own = nonEmpty(
    table.filter((entry) => entry.strategy === selection.strategyId),
    [...table]
  );
  const scoped = nonEmpty(
    own.filter((entry) => entry.register === selection.register),
    own
  );
  const generic = scoped.filter((entry) => entry.trigger === "generic");

  let pool: OfflineReply[];
  if (selection.phase === 1) {
    pool = scoped.filter((entry) => entry.trigger === "rapport");
  } else {
    const triggers = matchedTriggers(selection.signals);
    pool = scoped.filter((entry) => triggers.includes(entry.trigger));
  }

  if (selection.phase >= 3 && selection.missing.length > 0) {
    const targeted = pool.filter((entry) => targetsAny(entry, selection.missing));
    if (targeted.length > 0) {
      pool = targeted;
    } else if (selection.phase === 4) {
      pool = nonEmpty(
        generic.filter((entry) => targetsAny(entry, selection.missing)),
        pool
      );
    }
  }

  if (pool.length === 0) pool = generic;

  const notLast = (entry: OfflineReply) => entry.id !== selection.lastReplyId;
  const fresh = pool.filter(notLast);
  if (fresh.length > 0) return fresh;
  const freshGeneric = generic.filter(notLast);
  if (freshGeneric.length > 0) return freshGeneric;
  return nonEmpty(scoped.filter(notLast), scoped);
}

export function pickFrom<T>(pool: readonly T[], random: RandomSource): T | undefined {
  if (pool.length === 0) return undefined;
  const index = Math.min(pool.length - 1, Math.max(0, Math.floor(random() * pool.length)));
  return pool[index];
}

export function fillPlaceholders(text: string, signals: MessageSignals, register: Register): string {
  const bank =
    signals.bank && signals.bank !== "bank"
      ? signals.bank.toUpperCase()
      : register === "hinglish"
        ? "bank"
        : "the bank";
  const name = signals.claimedName ? `${signals.claimedName} ji` : "Sir";
  return text.split("{bank}").join(bank).split("{name}").join(name);
}

/** Offline tier: no external call, always produces a candidate. */
export function synthesizeOfflineReply(
  strategyId: string,
  ctx: TurnContext,
  random: RandomSource = Math.random,
  table: readonly OfflineReply[] = OFFLINE_REPLIES
): CandidateResult {
  const pool = selectOfflinePool(
    {
      strategyId,
      register: ctx.register,
      signals: ctx.signals,
      phase: ctx.phase,
      missing: ctx.missing,
      lastReplyId: ctx.lastReplyId
    },
    table
  );
  const entry = pickFrom(pool, random);

  return {
    strategyId,
    reply: entry ? fillPlaceholders(entry.text, ctx.signals, ctx.register) : EMERGENCY_REPLY,
    scamDetected: ctx.assessment.scamDetected,
    confidence: ctx.assessment.confidence,
    scamType: ctx.assessment.scamType,
    intelligence: emptyIntelligence(),
    notes: entry ? `offline reply ${entry.id} (${entry.trigger})` : "offline reply unavailable",
    tier: "offline",
    replyId: entry?.id,
    failures: []
  };
}
