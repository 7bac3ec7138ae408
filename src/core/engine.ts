import type { EngineConfig } from "../utils/config";
import { logTurn } from "../utils/conversationLogger";
import { errorCause, logEvent, safeStringify } from "../utils/logging";
import { runOfflineTier, runStrategy } from "./agentRunner";
import { FinalReport, ReportSink, buildFinalReport, deliverReport, evaluateReportTrigger } from "./callback";
import { dispatchStrategies } from "./council";
import { detectRegister, extractIntelligence, messageSignals } from "./extractor";
import { countEntries, mergeIntelligence, missingCategories } from "./intel";
import { EMERGENCY_REPLY, RandomSource } from "./offline";
import type { GenerationCapability } from "./providers/types";
import { selectWinner } from "./rubric";
import { assessScam } from "./scoring";
import { SessionState, SessionStore, applyTurn } from "./sessionStore";
import { DEFAULT_STRATEGIES, Strategy, phaseForTurn } from "./strategies";
import type { InboundTurn, Tier, TurnContext } from "./types";

export type EngineDeps = {
  store: SessionStore;
  capability: GenerationCapability;
  sink: ReportSink;
  config: EngineConfig;
  strategies?: readonly Strategy[];
  random?: RandomSource;
  now?: () => Date;
};

export type TurnResult = {
  reply: string;
  strategyId: string;
  tier: Tier;
  score: number;
  scamDetected: boolean;
  confidence: number;
  timedOut: boolean;
  reportTriggered: boolean;
  agentNotes: string;
};

export type SessionView = {
  state: SessionState;
  /** The report this session would send now. */
  report: FinalReport;
};

export type ManualReportOutcome =
  | { found: false }
  | { found: true; delivered: boolean; alreadySent: boolean; report: FinalReport | null };

export class HoneypotEngine {
  private strategies: readonly Strategy[];
  private pendingReports = new Set<Promise<boolean>>();

  constructor(private deps: EngineDeps) {
    this.strategies = deps.strategies ?? DEFAULT_STRATEGIES;
    if (this.strategies.length === 0) {
      throw new Error("HoneypotEngine needs at least one strategy");
    }
  }

  /** Produces a reply for one inbound message. Never rejects. */
  async processTurn(turn: InboundTurn): Promise<TurnResult> {
    try {
      return await this.runTurn(turn);
    } catch (err) {
      const cause = errorCause(err);
      logEvent("TURN", `${turn.sessionId} failed internally: ${cause}`);
      return {
        reply: EMERGENCY_REPLY,
        strategyId: "none",
        tier: "offline",
        score: 0,
        scamDetected: false,
        confidence: 0,
        timedOut: false,
        reportTriggered: false,
        agentNotes: `internal error: ${cause}`
      };
    }
  }

  /** Read-only view of a session. Null for an id never seen; nothing is created. */
  async inspectSession(sessionId: string): Promise<SessionView | null> {
    const state = await this.deps.store.find(sessionId);
    if (!state) return null;
    return { state, report: buildFinalReport(state, state.redFlags, state.lastNotes) };
  }

  /**
   * Sends the final report on demand, skipping the turn and confidence
   * thresholds. The claim goes through the store's atomic update, so a session
   * still reports at most once.
   */
  async triggerReport(sessionId: string): Promise<ManualReportOutcome> {
    const { store } = this.deps;
    const existing = await store.find(sessionId);
    if (!existing) return { found: false };

    const report = await store.update(sessionId, existing.lastMessageAt, (state): FinalReport | null => {
      if (state.reportSent) return null;
      state.reportSent = true;
      return buildFinalReport(state, state.redFlags, state.lastNotes);
    });
    if (!report) {
      logEvent("REPORT", `${sessionId} manual trigger ignored, already sent`);
      return { found: true, delivered: false, alreadySent: true, report: null };
    }

    logEvent("REPORT", `${sessionId} triggered manually after ${report.totalTurns} turns`);
    const delivered = await this.track(deliverReport(this.deps.sink, report));
    return { found: true, delivered, alreadySent: false, report };
  }

  /** Resolves once every report fired so far has settled. */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.pendingReports));
  }

  private async runTurn(turn: InboundTurn): Promise<TurnResult> {
    const { store, capability, config, random } = this.deps;
    const timestamp = turn.message.timestamp || (this.deps.now?.() ?? new Date()).toISOString();
    const session = await store.getOrCreate(turn.sessionId, timestamp);

    const historyTexts = turn.history.map((m) => m.text);
    const extracted = extractIntelligence([...historyTexts, turn.message.text], config.keywords);
    const turnNumber = session.turnCount + 1;
    const assessment = assessScam(turn.message.text, historyTexts, config.keywords);

    const ctx: TurnContext = {
      sessionId: turn.sessionId,
      turn: turnNumber,
      phase: phaseForTurn(turnNumber),
      message: turn.message.text,
      history: turn.history,
      register: detectRegister(turn.message.text, turn.metadata?.language, config.keywords),
      signals: messageSignals(turn.message.text, config.keywords),
      known: session.intelligence,
      extracted,
      missing: missingCategories(session.intelligence),
      assessment,
      lastReplyId: session.lastReplyId,
      recentReplies: session.recentReplies,
      metadata: turn.metadata
    };

    logTurn({ sessionId: turn.sessionId, turn: turnNumber, role: "SCAMMER", text: turn.message.text });

    const dispatch = await dispatchStrategies(
      this.strategies,
      (strategy, signal) => runStrategy(strategy, ctx, signal, { capability, random }),
      config.deadlineMs
    );

    const selection = selectWinner(
      dispatch.completed,
      this.strategies,
      { known: session.intelligence, missing: ctx.missing, recentReplies: session.recentReplies },
      () => runOfflineTier(this.strategies[0], ctx, random),
      config.scoring,
      config.keywords
    );
    const winner = selection.winner;

    const merged = mergeIntelligence(
      extracted,
      ...dispatch.completed.map((candidate) => candidate.intelligence),
      winner.intelligence
    );

    const report = await store.update(turn.sessionId, timestamp, (state): FinalReport | null => {
      applyTurn(state, {
        timestamp,
        intelligence: merged,
        scamDetected: winner.scamDetected,
        confidence: winner.confidence,
        scamType: winner.scamType,
        redFlags: assessment.redFlags,
        reply: winner.reply,
        replyId: winner.replyId,
        notes: winner.notes,
        recentReplyWindow: config.recentReplyWindow
      });
      if (!evaluateReportTrigger(state, config.report)) return null;
      state.reportSent = true;
      return buildFinalReport(state, state.redFlags, winner.notes);
    });

    if (report) this.emitReport(report);

    const summary = {
      turn: turnNumber,
      completed: dispatch.completed.map((c) => `${c.strategyId}:${c.tier}`),
      timedOut: dispatch.timedOut,
      winner: winner.strategyId,
      forced: selection.forced,
      score: selection.breakdown,
      intel: countEntries(merged)
    };
    logEvent("COUNCIL", `${turn.sessionId} ${safeStringify(summary, 1000)}`);
    logTurn({
      sessionId: turn.sessionId,
      turn: turnNumber,
      role: "HONEYPOT",
      text: winner.reply,
      strategy: winner.strategyId,
      tier: winner.tier
    });

    return {
      reply: winner.reply,
      strategyId: winner.strategyId,
      tier: winner.tier,
      score: selection.score,
      scamDetected: winner.scamDetected,
      confidence: winner.confidence,
      timedOut: dispatch.timedOut,
      reportTriggered: report !== null,
      agentNotes: winner.notes
    };
  }

  private emitReport(report: FinalReport): void {
    logEvent("REPORT", `${report.sessionId} triggered after ${report.totalTurns} turns`);
    void this.track(deliverReport(this.deps.sink, report));
  }

  private track(delivery: Promise<boolean>): Promise<boolean> {
    const pending: Promise<boolean> = delivery.finally(() => {
      this.pendingReports.delete(pending);
    });
    this.pendingReports.add(pending);
    return pending;
  }
}
