import type { GenerationRequest } from "./providers/types";
import { BASE_PROMPT, Strategy, phaseInstruction } from "./strategies";
import { IntelligenceRecord, PRIORITY_CATEGORIES, PriorityCategory, mergeIntelligence } from "./intel";
import type { TurnContext } from "./types";

const MISSING_HINTS: Record<PriorityCategory, string> = {
  phishingLinks: "any link or website they want you to open",
  bankAccounts: "the bank account number money should go to",
  upiIds: "the UPI ID for payment",
  phoneNumbers: "their phone number to call back",
  referenceIds: "their employee, badge or reference ID",
  emails: "their email address for confirmation"
};

const OUTPUT_CONTRACT = [
  "Return JSON only, no prose, with exactly these fields:",
  '{"reply":"<your in-character reply>","scamDetected":true|false,"confidence":0.0-1.0,',
  '"scamType":"<bank_fraud|upi_fraud|phishing|kyc_fraud|job_scam|lottery_scam|other>",',
  '"intelligence":{"phoneNumbers":[],"bankAccounts":[],"upiIds":[],"phishingLinks":[],"emails":[],"referenceIds":[],"suspiciousKeywords":[]},',
  '"notes":"<one line on the tactics the other person used>"}'
].join("\n");

const SHORT_LABELS: Record<PriorityCategory, string> = {
  phishingLinks: "links",
  bankAccounts: "accounts",
  upiIds: "upi",
  phoneNumbers: "phones",
  referenceIds: "ids",
  emails: "emails"
};

const HISTORY_LIMIT = 12;

function describeMissing(ctx: TurnContext): string {
  if (ctx.missing.length === 0) {
    return "Still missing: nothing. Keep them talking and confirm what they already shared.";
  }
  const lines = ctx.missing.map((category) =>
    ctx.extracted[category].length > 0
      ? `- ${MISSING_HINTS[category]} (they just shared it: confirm it, do not ask again)`
      : `- ${MISSING_HINTS[category]}`
  );
  return `Still missing, ask for these first:\n${lines.join("\n")}`;
}

function describeCounts(record: IntelligenceRecord): string {
  const parts = PRIORITY_CATEGORIES.filter((category) => record[category].length > 0).map(
    (category) => `${SHORT_LABELS[category]}=${record[category].length}`
  );
  return parts.length ? parts.join(", ") : "none";
}

/** Values the extractor already pulled from this conversation, so strategies do not ask for them twice. */
function describeCaptured(extracted: IntelligenceRecord): string {
  const parts = PRIORITY_CATEGORIES.filter((category) => extracted[category].length > 0).map(
    (category) => `${SHORT_LABELS[category]}: ${extracted[category].join(", ")}`
  );
  return parts.length ? parts.join("; ") : "none";
}

export function buildSystemPrompt(strategy: Strategy, ctx: TurnContext): string {
  return [
    ...BASE_PROMPT,
    ...strategy.overlay,
    phaseInstruction(ctx.phase),
    describeMissing(ctx),
    "Everything under alreadyCaptured is recorded. Never ask for it again.",
    ctx.register === "hinglish" ? "They are writing in Hinglish: reply in Hinglish." : "",
    OUTPUT_CONTRACT
  ]
    .filter(Boolean)
    .join("\n");
}

export function buildUserPrompt(ctx: TurnContext): string {
  const transcript = ctx.history
    .slice(-HISTORY_LIMIT)
    .map((m) => `${m.sender === "scammer" ? "Them" : "You"}: ${m.text}`)
    .join("\n");
  const channel = ctx.metadata?.channel;
  const locale = ctx.metadata?.locale;
  return [
    `turn: ${ctx.turn}`,
    channel ? `channel: ${channel}` : "",
    locale ? `locale: ${locale}` : "",
    `collectedSoFar: ${describeCounts(mergeIntelligence(ctx.known, ctx.extracted))}`,
    `alreadyCaptured: ${describeCaptured(ctx.extracted)}`,
    `yourRecentReplies: ${ctx.recentReplies.slice(-3).join(" | ") || "none"}`,
    `conversation:\n${transcript || "(first message)"}`,
    `latestMessage: ${ctx.message}`
  ]
    .filter(Boolean)
    .join("\n");
}

export function buildGenerationRequest(strategy: Strategy, ctx: TurnContext): GenerationRequest {
  return {
    system: buildSystemPrompt(strategy, ctx),
    user: buildUserPrompt(ctx),
    temperature: strategy.temperature
  };
}
