import type { MessageSignals, Register } from "./extractor";
import type { IntelligenceRecord, PriorityCategory } from "./intel";
import type { ScamAssessment } from "./scoring";
import type { TurnPhase } from "./strategies";

export type HistoryMessage = {
  sender: string;
  text: string;
  timestamp?: string;
};

export type TurnMetadata = {
  channel?: string;
  language?: string;
  locale?: string;
};

/** One inbound message plus the conversation so far, as the core receives it. */
export type InboundTurn = {
  sessionId: string;
  message: HistoryMessage;
  history: HistoryMessage[];
  metadata?: TurnMetadata;
};

export type Tier = "structured" | "recovered" | "offline";

export type TierFailure = {
  tier: Tier;
  cause: string;
};

export type CandidateResult = {
  strategyId: string;
  reply: string;
  scamDetected: boolean;
  confidence: number;
  scamType: string;
  intelligence: IntelligenceRecord;
  notes: string;
  tier: Tier;
  replyId?: string;
  failures: TierFailure[];
};

/** Everything a strategy runner may read for the turn being processed. Identical for every strategy. */
export type TurnContext = {
  sessionId: string;
  turn: number;
  phase: TurnPhase;
  message: string;
  history: HistoryMessage[];
  register: Register;
  signals: MessageSignals;
  known: IntelligenceRecord;
  extracted: IntelligenceRecord;
  missing: PriorityCategory[];
  assessment: ScamAssessment;
  lastReplyId: string | null;
  recentReplies: string[];
  metadata?: TurnMetadata;
};
