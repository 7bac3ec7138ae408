import { describe, it, expect } from "vitest";
import { emptyIntelligence, missingCategories } from "../core/intel";
import { ScoringContext, explainScore, scoreCandidate, selectWinner } from "../core/rubric";
import { DEFAULT_STRATEGIES } from "../core/strategies";
import { makeCandidate } from "./fakes";

function freshContext(): ScoringContext {
  const known = emptyIntelligence();
  return { known, missing: missingCategories(known), recentReplies: [] };
}

describe("explainScore", () => {
  it("adds new intel, missing-field targeting, confidence and naturalness", () => {
    const candidate = makeCandidate({
      reply: "Sir, please send the link again, my phone is slow.",
      scamDetected: true,
      confidence: 0.9,
      intelligence: { ...emptyIntelligence(), phishingLinks: ["http://x.in"] }
    });
    expect(explainScore(candidate, freshContext())).toEqual({
      newIntel: 15,
      missingTargeting: 15,
      confidence: 9,
      naturalness: 10,
      coverPenalty: 0,
      repetitionPenalty: 0,
      total: 49
    });
  });

  it("counts every cover-breaking word against the reply", () => {
    const candidate = makeCandidate({ reply: "This is a scam, I will report you to police" });
    const breakdown = explainScore(candidate, freshContext());
    expect(breakdown.coverPenalty).toBe(60);
    expect(breakdown.total).toBe(-50);
  });

  it("awards one weight per category and only for entries not already known", () => {
    const ctx = freshContext();
    ctx.known.phoneNumbers.push("9876543210");
    ctx.missing = missingCategories(ctx.known);
    const candidate = makeCandidate({
      reply: "Okay sir, I will do it.",
      intelligence: {
        ...emptyIntelligence(),
        phoneNumbers: ["+91 98765 43210"],
        bankAccounts: ["123456789012", "223456789012"]
      }
    });
    expect(explainScore(candidate, ctx).newIntel).toBe(12);
  });

  it("credits each missing category the reply asks about", () => {
    const candidate = makeCandidate({ reply: "What is your email and the UPI ID for payment?" });
    expect(explainScore(candidate, freshContext()).missingTargeting).toBe(30);
  });

  it("ignores confidence when no scam was detected", () => {
    const candidate = makeCandidate({ reply: "Yes", scamDetected: false, confidence: 1 });
    expect(explainScore(candidate, freshContext())).toMatchObject({ confidence: 0, naturalness: 3, total: 3 });
  });

  it("scores long replies in the long band", () => {
    const candidate = makeCandidate({ reply: "a".repeat(200) });
    expect(explainScore(candidate, freshContext()).naturalness).toBe(5);
  });

  it("gives the same score every time for the same inputs", () => {
    const ctx = freshContext();
    ctx.recentReplies = ["Okay sir."];
    const candidate = makeCandidate({
      reply: "Please share the UPI ID again, the app shows an error.",
      scamDetected: true,
      confidence: 0.85,
      intelligence: { ...emptyIntelligence(), phoneNumbers: ["9876543210"] }
    });
    const first = scoreCandidate(candidate, ctx);
    expect(scoreCandidate(candidate, ctx)).toBe(first);
    expect(explainScore(candidate, ctx)).toEqual(explainScore(candidate, ctx));
  });

  it("penalises repeating a recent reply", () => {
    const ctx = freshContext();
    ctx.recentReplies = ["Sir, which account do you mean exactly?"];
    const candidate = makeCandidate({ reply: "sir,  which account do you mean EXACTLY?" });
    expect(explainScore(candidate, ctx).repetitionPenalty).toBe(10);
    expect(scoreCandidate(candidate, ctx)).toBe(0);
  });
});

describe("selectWinner", () => {
  it("takes the highest score", () => {
    const plain = makeCandidate({ strategyId: "confused_uncle", reply: "Okay sir, I will do it." });
    const rich = makeCandidate({
      strategyId: "worried_citizen",
      reply: "Okay sir, I will do it.",
      intelligence: { ...emptyIntelligence(), upiIds: ["x@ybl"] }
    });
    const selection = selectWinner([plain, rich], DEFAULT_STRATEGIES, freshContext(), () => plain);
    expect(selection.winner.strategyId).toBe("worried_citizen");
    expect(selection.score).toBe(20);
    expect(selection.forced).toBe(false);
  });

  it("breaks ties by declaration order, not completion order", () => {
    const late = makeCandidate({ strategyId: "worried_citizen" });
    const early = makeCandidate({ strategyId: "eager_victim" });
    const selection = selectWinner([late, early], DEFAULT_STRATEGIES, freshContext(), () => late);
    expect(selection.winner.strategyId).toBe("eager_victim");
  });

  it("forces the fallback when nothing completed", () => {
    const fallback = makeCandidate({ strategyId: "confused_uncle", tier: "offline" });
    const selection = selectWinner([], DEFAULT_STRATEGIES, freshContext(), () => fallback);
    expect(selection.forced).toBe(true);
    expect(selection.winner).toBe(fallback);
  });
});
