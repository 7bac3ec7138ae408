import keywords from "../data/keywords.json";
import type { PriorityCategory } from "../core/intel";

export type RedFlagRule = {
  phrase: string;
  keywords: string[];
};

export type KeywordTables = {
  suspicious: string[];
  triggers: Record<PriorityCategory, string[]>;
  coverBreaking: string[];
  signals: {
    banks: string[];
    credentials: string[];
    links: string[];
    paymentApps: string[];
    urgency: string[];
    authority: string[];
    accounts: string[];
  };
  hinglishMarkers: string[];
  scamTypes: Record<string, string[]>;
  redFlags: Record<string, RedFlagRule>;
};

export type ScoringWeights = {
  newIntel: Record<PriorityCategory, number>;
  missingFieldBonus: number;
  confidenceMultiplier: number;
  naturalness: {
    minLength: number;
    maxLength: number;
    midBand: number;
    shortBand: number;
    longBand: number;
  };
  coverPenalty: number;
  repetitionPenalty: number;
};

export type ReportPolicy = {
  minTurns: number;
  minConfidence: number;
};

export type EngineConfig = {
  deadlineMs: number;
  report: ReportPolicy;
  recentReplyWindow: number;
  scoring: ScoringWeights;
  keywords: KeywordTables;
  callback: {
    url: string;
    timeoutMs: number;
  };
};

export type SessionBackend = "memory" | "supabase";

export type ServerConfig = {
  port: number;
  apiKey: string;
  sessionBackend: SessionBackend;
  sessionsFile: string | null;
  supabaseUrl: string;
  supabaseKey: string;
};

export const DEFAULT_KEYWORDS: KeywordTables = keywords;

export const DEFAULT_SCORING: ScoringWeights = {
  newIntel: {
    phishingLinks: 15,
    bankAccounts: 12,
    upiIds: 10,
    phoneNumbers: 8,
    referenceIds: 6,
    emails: 5
  },
  missingFieldBonus: 15,
  confidenceMultiplier: 10,
  naturalness: {
    minLength: 20,
    maxLength: 200,
    midBand: 10,
    shortBand: 3,
    longBand: 5
  },
  coverPenalty: 20,
  repetitionPenalty: 10
};

// Callers such as evaluation harnesses give up around 30s.
export const DEFAULT_DEADLINE_MS = 25_000;

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    deadlineMs: numberFromEnv(env.TURN_DEADLINE_MS, DEFAULT_DEADLINE_MS),
    report: {
      minTurns: numberFromEnv(env.REPORT_AFTER_TURNS, 18),
      minConfidence: numberFromEnv(env.REPORT_MIN_CONFIDENCE, 0.7)
    },
    recentReplyWindow: numberFromEnv(env.RECENT_REPLY_WINDOW, 5),
    scoring: DEFAULT_SCORING,
    keywords: DEFAULT_KEYWORDS,
    callback: {
      url: env.CALLBACK_URL || "http://localhost:4000/api/final-report",
      timeoutMs: numberFromEnv(env.CALLBACK_TIMEOUT_MS, 5000)
    }
  };
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const persistEnabled = env.SESSION_PERSIST === "true";
  return {
    port: numberFromEnv(env.PORT, 3000),
    apiKey: env.API_KEY || "",
    sessionBackend: env.SESSION_BACKEND === "supabase" ? "supabase" : "memory",
    sessionsFile: persistEnabled ? env.SESSIONS_FILE || "sessions.json" : null,
    supabaseUrl: env.SUPABASE_URL || "",
    supabaseKey: env.SUPABASE_SERVICE_ROLE_KEY || ""
  };
}
