import axios from "axios";
import type { ReportPolicy } from "../utils/config";
import { errorCause, logEvent, safeStringify } from "../utils/logging";
import type { IntelligenceRecord } from "./intel";
import { UNKNOWN_SCAM_TYPE } from "./scoring";
import type { SessionState } from "./sessionStore";

export type FinalReport = {
  sessionId: string;
  status: "success";
  scamDetected: boolean;
  scamType: string;
  extractedIntelligence: IntelligenceRecord;
  totalTurns: number;
  totalMessagesExchanged: number;
  engagementDurationSeconds: number;
  engagementMetrics: {
    totalMessagesExchanged: number;
    engagementDurationSeconds: number;
  };
  agentNotes: string;
};

export interface ReportSink {
  send(report: FinalReport): Promise<void>;
}

export class HttpReportSink implements ReportSink {
  constructor(
    private url: string,
    private timeoutMs: number
  ) {}

  async send(report: FinalReport): Promise<void> {
    await axios.post(this.url, report, {
      headers: { "Content-Type": "application/json" },
      timeout: this.timeoutMs
    });
  }
}

/** True exactly once per session: when the thresholds are first met and nothing has been sent. */
export function evaluateReportTrigger(state: SessionState, policy: ReportPolicy): boolean {
  if (state.reportSent) return false;
  return state.turnCount >= policy.minTurns && state.scamDetected && state.confidence >= policy.minConfidence;
}

const COLLECTED_LABELS: Array<[keyof IntelligenceRecord, string]> = [
  ["phoneNumbers", "phone number(s)"],
  ["bankAccounts", "bank account number(s)"],
  ["upiIds", "UPI ID(s)"],
  ["phishingLinks", "phishing URL(s)"],
  ["emails", "email address(es)"],
  ["referenceIds", "employee or reference ID(s)"]
];

function titleCase(scamType: string): string {
  return scamType
    .split("_")
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function buildAgentNotes(
  scamType: string,
  intelligence: IntelligenceRecord,
  redFlags: string[],
  winnerNotes: string
): string {
  const label = scamType === UNKNOWN_SCAM_TYPE ? "Scam" : titleCase(scamType);
  const tactics = redFlags.length ? redFlags.join(", ") : "employed social engineering";
  const collected = COLLECTED_LABELS.filter(([category]) => intelligence[category].length > 0).map(
    ([, text]) => text
  );
  const collectedText = collected.length ? collected.join(", ") : "no actionable intel yet";
  const summary = `${label} engagement. Scammer ${tactics}. Honeypot extracted ${collectedText} while staying in character.`;
  return winnerNotes ? `${summary} Last turn: ${winnerNotes}` : summary;
}

function durationSeconds(startedAt: string, lastMessageAt: string): number {
  const start = Date.parse(startedAt);
  const end = Date.parse(lastMessageAt);
  if (!Number.isFinite(start) || !Number.isFinite(end)) return 0;
  return Math.max(0, Math.round((end - start) / 1000));
}

export function buildFinalReport(state: SessionState, redFlags: string[], winnerNotes: string): FinalReport {
  const totalMessagesExchanged = state.turnCount * 2;
  const engagementDurationSeconds = durationSeconds(state.startedAt, state.lastMessageAt);
  return {
    sessionId: state.sessionId,
    status: "success",
    scamDetected: state.scamDetected,
    scamType: state.scamType,
    extractedIntelligence: state.intelligence,
    totalTurns: state.turnCount,
    totalMessagesExchanged,
    engagementDurationSeconds,
    engagementMetrics: { totalMessagesExchanged, engagementDurationSeconds },
    agentNotes: buildAgentNotes(state.scamType, state.intelligence, redFlags, winnerNotes)
  };
}

/** Single attempt. Failures are logged and reported as false, never thrown. */
export async function deliverReport(sink: ReportSink, report: FinalReport): Promise<boolean> {
  try {
    await sink.send(report);
    logEvent("REPORT", `${report.sessionId} delivered ${safeStringify(report.extractedIntelligence, 400)}`);
    return true;
  } catch (err) {
    logEvent("REPORT", `${report.sessionId} delivery failed: ${errorCause(err)}`);
    return false;
  }
}
