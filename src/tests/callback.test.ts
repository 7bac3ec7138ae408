import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  HttpReportSink,
  buildAgentNotes,
  buildFinalReport,
  deliverReport,
  evaluateReportTrigger
} from "../core/callback";
import { emptyIntelligence } from "../core/intel";
import { createSessionState } from "../core/sessionStore";
import { RecordingSink } from "./fakes";

const { post } = vi.hoisted(() => ({ post: vi.fn() }));

vi.mock("axios", () => ({
  default: { post }
}));

const policy = { minTurns: 18, minConfidence: 0.7 };

function readyState() {
  const state = createSessionState("s1", "2026-03-01T10:00:00.000Z");
  state.turnCount = 18;
  state.scamDetected = true;
  state.confidence = 0.7;
  state.lastMessageAt = "2026-03-01T10:04:05.400Z";
  return state;
}

beforeEach(() => {
  post.mockReset();
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

describe("evaluateReportTrigger", () => {
  it("fires when turns, detection and confidence all meet the policy", () => {
    expect(evaluateReportTrigger(readyState(), policy)).toBe(true);
  });

  it("waits for enough turns", () => {
    const state = readyState();
    state.turnCount = 17;
    expect(evaluateReportTrigger(state, policy)).toBe(false);
  });

  it("needs a confident detection", () => {
    const low = readyState();
    low.confidence = 0.69;
    expect(evaluateReportTrigger(low, policy)).toBe(false);
    const undetected = readyState();
    undetected.scamDetected = false;
    expect(evaluateReportTrigger(undetected, policy)).toBe(false);
  });

  it("never fires twice", () => {
    const state = readyState();
    state.reportSent = true;
    expect(evaluateReportTrigger(state, policy)).toBe(false);
  });
});

describe("buildFinalReport", () => {
  it("summarises the session", () => {
    const state = readyState();
    state.scamType = "bank_fraud";
    state.intelligence.phoneNumbers.push("9876543210");
    state.intelligence.upiIds.push("x@ybl");
    const report = buildFinalReport(state, ["used urgency tactics demanding immediate action"], "");
    expect(report).toMatchObject({
      sessionId: "s1",
      status: "success",
      scamDetected: true,
      scamType: "bank_fraud",
      totalTurns: 18,
      totalMessagesExchanged: 36,
      engagementDurationSeconds: 245,
      engagementMetrics: { totalMessagesExchanged: 36, engagementDurationSeconds: 245 }
    });
    expect(report.extractedIntelligence.upiIds).toEqual(["x@ybl"]);
    expect(report.agentNotes).toBe(
      "Bank Fraud engagement. Scammer used urgency tactics demanding immediate action. Honeypot extracted phone number(s), UPI ID(s) while staying in character."
    );
  });
});

describe("buildAgentNotes", () => {
  it("falls back to generic wording and appends the last turn's notes", () => {
    expect(buildAgentNotes("unknown", emptyIntelligence(), [], "asked for link")).toBe(
      "Scam engagement. Scammer employed social engineering. Honeypot extracted no actionable intel yet while staying in character. Last turn: asked for link"
    );
  });
});

describe("deliverReport", () => {
  it("reports success from the sink", async () => {
    const sink = new RecordingSink();
    expect(await deliverReport(sink, buildFinalReport(readyState(), [], ""))).toBe(true);
    expect(sink.reports).toHaveLength(1);
  });

  it("swallows sink failures after a single attempt", async () => {
    const sink = new RecordingSink(new Error("503"));
    expect(await deliverReport(sink, buildFinalReport(readyState(), [], ""))).toBe(false);
    expect(sink.reports).toHaveLength(1);
  });
});

describe("HttpReportSink", () => {
  it("posts the report as JSON with the configured timeout", async () => {
    post.mockResolvedValue({ status: 200 });
    const report = buildFinalReport(readyState(), [], "");
    await new HttpReportSink("http://report.test/final", 1500).send(report);
    expect(post).toHaveBeenCalledWith("http://report.test/final", report, {
      headers: { "Content-Type": "application/json" },
      timeout: 1500
    });
  });

  it("rejects when the endpoint fails", async () => {
    post.mockRejectedValue(new Error("Request failed with status code 500"));
    await expect(
      new HttpReportSink("http://report.test/final", 1500).send(buildFinalReport(readyState(), [], ""))
    ).rejects.toThrow("status code 500");
  });
});
