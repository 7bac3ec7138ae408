import { describe, it, expect, vi, beforeEach } from "vitest";
import { driveLadder, runStrategy } from "../core/agentRunner";
import { DEFAULT_STRATEGIES } from "../core/strategies";
import { FakeCapability, makeCandidate, makeContext, untilAborted } from "./fakes";

const strategy = DEFAULT_STRATEGIES[0];

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

describe("runStrategy", () => {
  it("returns the structured tier when the model answers in shape", async () => {
    const capability = new FakeCapability(async () => ({
      reply: "Sir, which account are you talking about?",
      scamDetected: true,
      confidence: 0.75,
      scamType: "bank_fraud",
      intelligence: { phoneNumbers: ["9876543210"] }
    }));
    const result = await runStrategy(strategy, makeContext(), new AbortController().signal, { capability });
    expect(result?.tier).toBe("structured");
    expect(result?.strategyId).toBe("confused_uncle");
    expect(result?.intelligence.phoneNumbers).toEqual(["9876543210"]);
    expect(result?.failures).toEqual([]);
    expect(capability.textCalls).toBe(0);
  });

  it("drops to the recovered tier and records why", async () => {
    const capability = new FakeCapability(
      async () => ({ reply: "too short" }),
      async () => 'Here: {"reply": "Okay sir, please send me the link again"}'
    );
    const result = await runStrategy(strategy, makeContext(), new AbortController().signal, { capability });
    expect(result?.tier).toBe("recovered");
    expect(result?.reply).toBe("Okay sir, please send me the link again");
    expect(result?.scamDetected).toBe(true);
    expect(result?.confidence).toBe(0.8);
    expect(result?.scamType).toBe("bank_fraud");
    expect(result?.failures).toEqual([{ tier: "structured", cause: "structured output failed validation" }]);
  });

  it("ends on the offline tier when both model calls fail", async () => {
    const capability = new FakeCapability();
    const result = await runStrategy(strategy, makeContext({ message: "hello" }), new AbortController().signal, {
      capability,
      random: () => 0
    });
    expect(result?.tier).toBe("offline");
    expect(result?.replyId).toBe("cu-en-rapport-1");
    expect(result?.failures).toEqual([
      { tier: "structured", cause: "structured unavailable" },
      { tier: "recovered", cause: "text unavailable" }
    ]);
  });

  it("returns nothing once cancelled, without further calls", async () => {
    const controller = new AbortController();
    const capability = new FakeCapability(async (_req, signal) => {
      controller.abort();
      return untilAborted(signal);
    });
    const result = await runStrategy(strategy, makeContext(), controller.signal, { capability });
    expect(result).toBeNull();
    expect(capability.textCalls).toBe(0);
  });

  it("does not start when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const capability = new FakeCapability();
    expect(await runStrategy(strategy, makeContext(), controller.signal, { capability })).toBeNull();
    expect(capability.structuredCalls).toBe(0);
  });

  it("passes the strategy temperature and persona to the capability", async () => {
    const seen: Array<{ temperature: number; system: string }> = [];
    const capability = new FakeCapability(async (req) => {
      seen.push({ temperature: req.temperature, system: req.system });
      throw new Error("stop");
    });
    await runStrategy(strategy, makeContext(), new AbortController().signal, { capability });
    expect(seen).toHaveLength(1);
    expect(seen[0]?.temperature).toBe(0.7);
    expect(seen[0]?.system).toContain("retired clerk");
  });
});

describe("driveLadder", () => {
  it("treats a throwing rung as a failure and moves on", async () => {
    const candidate = makeCandidate({ tier: "offline" });
    const result = await driveLadder(
      "s",
      [
        {
          tier: "structured",
          run: async () => {
            throw new Error("boom");
          }
        },
        { tier: "offline", run: async () => ({ ok: true, candidate }) }
      ],
      new AbortController().signal
    );
    expect(result?.failures).toEqual([{ tier: "structured", cause: "boom" }]);
  });

  it("returns null when every rung fails", async () => {
    const result = await driveLadder(
      "s",
      [{ tier: "structured", run: async () => ({ ok: false, cause: "nope" }) }],
      new AbortController().signal
    );
    expect(result).toBeNull();
  });
});
