import type { FinalReport, ReportSink } from "../core/callback";
import { emptyIntelligence } from "../core/intel";
import type { GenerationCapability, GenerationRequest } from "../core/providers/types";
import { DEFAULT_KEYWORDS, DEFAULT_SCORING, EngineConfig } from "../utils/config";
import { messageSignals } from "../core/extractor";
import { phaseForTurn } from "../core/strategies";
import type { CandidateResult, TurnContext } from "../core/types";

type Handler<T> = (request: GenerationRequest, signal: AbortSignal) => Promise<T>;

/** Capability whose two calls are plain functions the test supplies. */
export class FakeCapability implements GenerationCapability {
  readonly name = "fake";
  structuredCalls = 0;
  textCalls = 0;

  constructor(
    private structured: Handler<unknown> = async () => {
      throw new Error("structured unavailable");
    },
    private text: Handler<string> = async () => {
      throw new Error("text unavailable");
    }
  ) {}

  async generateStructured(request: GenerationRequest, signal: AbortSignal): Promise<unknown> {
    this.structuredCalls += 1;
    return this.structured(request, signal);
  }

  async generateText(request: GenerationRequest, signal: AbortSignal): Promise<string> {
    this.textCalls += 1;
    return this.text(request, signal);
  }
}

/** Settles only when the signal aborts, rejecting like a cancelled HTTP call. */
export function untilAborted<T>(signal: AbortSignal): Promise<T> {
  return new Promise<T>((_resolve, reject) => {
    if (signal.aborted) {
      reject(new Error("aborted"));
      return;
    }
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RecordingSink implements ReportSink {
  reports: FinalReport[] = [];

  constructor(private failWith?: Error) {}

  async send(report: FinalReport): Promise<void> {
    this.reports.push(report);
    if (this.failWith) throw this.failWith;
  }
}

export function testConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    deadlineMs: 200,
    report: { minTurns: 18, minConfidence: 0.7 },
    recentReplyWindow: 5,
    scoring: DEFAULT_SCORING,
    keywords: DEFAULT_KEYWORDS,
    callback: { url: "http://report.test/final", timeoutMs: 1000 },
    ...overrides
  };
}

export function makeContext(overrides: Partial<TurnContext> = {}): TurnContext {
  const message = overrides.message ?? "Hello, this is your bank calling about your account.";
  const turn = overrides.turn ?? 1;
  return {
    sessionId: "session-test",
    turn,
    phase: phaseForTurn(turn),
    message,
    history: [],
    register: "english",
    signals: messageSignals(message),
    known: emptyIntelligence(),
    extracted: emptyIntelligence(),
    missing: ["phishingLinks", "bankAccounts", "upiIds", "phoneNumbers", "referenceIds", "emails"],
    assessment: { scamDetected: true, confidence: 0.9, scamType: "bank_fraud", redFlags: [] },
    lastReplyId: null,
    recentReplies: [],
    ...overrides
  };
}

export function makeCandidate(overrides: Partial<CandidateResult> = {}): CandidateResult {
  return {
    strategyId: "confused_uncle",
    reply: "Sir, which account do you mean exactly?",
    scamDetected: false,
    confidence: 0,
    scamType: "unknown",
    intelligence: emptyIntelligence(),
    notes: "",
    tier: "structured",
    failures: [],
    ...overrides
  };
}
