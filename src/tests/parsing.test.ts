import { describe, it, expect } from "vitest";
import { parseStructured, recoverReply } from "../core/parsing";

const defaults = { scamDetected: true, confidence: 0.8, scamType: "phishing" };

describe("parseStructured", () => {
  it("accepts a complete object and clamps confidence", () => {
    const parsed = parseStructured(
      {
        reply: "Sir, which account number should I check?",
        scamDetected: true,
        confidence: 1.4,
        scamType: "bank_fraud",
        intelligence: { upiIds: ["a@ybl"] }
      },
      defaults
    );
    expect(parsed).not.toBeNull();
    expect(parsed?.confidence).toBe(1);
    expect(parsed?.scamType).toBe("bank_fraud");
    expect(parsed?.intelligence.upiIds).toEqual(["a@ybl"]);
    expect(parsed?.notes).toBe("");
  });

  it("rejects replies of ten characters or fewer", () => {
    expect(parseStructured({ reply: "0123456789", scamDetected: true, confidence: 0.5 }, defaults)).toBeNull();
  });

  it("rejects objects missing required fields", () => {
    expect(parseStructured({ reply: "A perfectly fine reply here" }, defaults)).toBeNull();
    expect(parseStructured("not an object", defaults)).toBeNull();
  });

  it("falls back to the default scam type when the model leaves it blank", () => {
    const parsed = parseStructured({ reply: "Okay sir, tell me more.", scamDetected: false, confidence: 0.2, scamType: " " }, defaults);
    expect(parsed?.scamType).toBe("phishing");
    expect(parsed?.scamDetected).toBe(false);
  });
});

describe("recoverReply", () => {
  it("parses clean JSON directly and fills defaults", () => {
    const recovered = recoverReply('{"reply":"Please send the link again sir"}', defaults);
    expect(recovered?.parser).toBe("direct");
    expect(recovered?.parsed).toMatchObject({
      reply: "Please send the link again sir",
      scamDetected: true,
      confidence: 0.8,
      scamType: "phishing"
    });
  });

  it("accepts response as an alias for reply", () => {
    const recovered = recoverReply('{"response":"Which branch are you calling from?"}', defaults);
    expect(recovered?.parser).toBe("direct");
    expect(recovered?.parsed.reply).toBe("Which branch are you calling from?");
  });

  it("pulls fields out of truncated JSON", () => {
    const recovered = recoverReply('{"reply": "Which branch are you \\"calling\\" from?", "confidence": 0.6, "notes": "asks', defaults);
    expect(recovered?.parser).toBe("fields");
    expect(recovered?.parsed.reply).toBe('Which branch are you "calling" from?');
    expect(recovered?.parsed.confidence).toBe(0.6);
    expect(recovered?.parsed.notes).toBe("");
  });

  it("uses fenced plain text as the reply", () => {
    const recovered = recoverReply("```\nSir, my app shows an error, can you send the link again?\n```", defaults);
    expect(recovered?.parser).toBe("plain");
    expect(recovered?.parsed.reply).toBe("Sir, my app shows an error, can you send the link again?");
  });

  it("finds the reply inside surrounding prose", () => {
    const recovered = recoverReply("Sure! {'reply': 'x'} then {\"reply\": \"Okay sir, what is your employee ID?\"} done", defaults);
    expect(recovered?.parsed.reply).toBe("Okay sir, what is your employee ID?");
  });

  it("gives up on short or broken output", () => {
    expect(recoverReply("ok", defaults)).toBeNull();
    expect(recoverReply("Reply: {broken", defaults)).toBeNull();
  });
});
