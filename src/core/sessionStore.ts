import fs from "fs";
import path from "path";
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { clamp01 } from "../utils/mask";
import { KeyedMutex } from "../utils/keyedMutex";
import { errorCause, logEvent } from "../utils/logging";
import { IntelligenceRecord, emptyIntelligence, mergeIntelligence } from "./intel";
import { UNKNOWN_SCAM_TYPE } from "./scoring";

export type SessionState = {
  sessionId: string;
  intelligence: IntelligenceRecord;
  turnCount: number;
  startedAt: string;
  lastMessageAt: string;
  scamType: string;
  scamTypeConfidence: number;
  scamDetected: boolean;
  confidence: number;
  reportSent: boolean;
  lastReplyId: string | null;
  recentReplies: string[];
  lastNotes: string;
  redFlags: string[];
};

/** What one processed turn contributes to the session. */
export type TurnUpdate = {
  timestamp: string;
  intelligence: IntelligenceRecord;
  scamDetected: boolean;
  confidence: number;
  scamType: string;
  redFlags: string[];
  reply: string;
  replyId?: string;
  notes: string;
  recentReplyWindow: number;
};

export interface SessionStore {
  /** Current state, or null for a session never seen. Never creates one. */
  find(sessionId: string): Promise<SessionState | null>;
  getOrCreate(sessionId: string, timestamp: string): Promise<SessionState>;
  /**
   * Runs the mutator on the current state under the session's lock and
   * persists its changes before releasing. Different sessions never contend.
   */
  update<T>(sessionId: string, timestamp: string, mutator: (state: SessionState) => T): Promise<T>;
}

const stringList = z.array(z.string()).default([]);

const intelligenceSchema = z.object({
  phoneNumbers: stringList,
  bankAccounts: stringList,
  upiIds: stringList,
  phishingLinks: stringList,
  emails: stringList,
  referenceIds: stringList,
  suspiciousKeywords: stringList
});

export const sessionStateSchema = z.object({
  sessionId: z.string().min(1),
  intelligence: intelligenceSchema.default({}),
  turnCount: z.number().int().nonnegative().default(0),
  startedAt: z.string(),
  lastMessageAt: z.string(),
  scamType: z.string().default(UNKNOWN_SCAM_TYPE),
  scamTypeConfidence: z.number().default(0),
  scamDetected: z.boolean().default(false),
  confidence: z.number().default(0),
  reportSent: z.boolean().default(false),
  lastReplyId: z.string().nullable().default(null),
  recentReplies: stringList,
  lastNotes: z.string().default(""),
  redFlags: stringList
});

export function createSessionState(sessionId: string, timestamp: string): SessionState {
  return {
    sessionId,
    intelligence: emptyIntelligence(),
    turnCount: 0,
    startedAt: timestamp,
    lastMessageAt: timestamp,
    scamType: UNKNOWN_SCAM_TYPE,
    scamTypeConfidence: 0,
    scamDetected: false,
    confidence: 0,
    reportSent: false,
    lastReplyId: null,
    recentReplies: [],
    lastNotes: "",
    redFlags: []
  };
}

export function cloneState(state: SessionState): SessionState {
  return structuredClone(state);
}

/** Folds one turn into the state in place. Intelligence only grows and the turn count only rises. */
export function applyTurn(state: SessionState, update: TurnUpdate): SessionState {
  state.intelligence = mergeIntelligence(state.intelligence, update.intelligence);
  state.turnCount += 1;
  state.lastMessageAt = update.timestamp;
  state.scamDetected = update.scamDetected;
  state.confidence = clamp01(update.confidence);
  if (
    update.scamDetected &&
    update.scamType &&
    update.scamType !== UNKNOWN_SCAM_TYPE &&
    state.confidence > state.scamTypeConfidence
  ) {
    state.scamType = update.scamType;
    state.scamTypeConfidence = state.confidence;
  }
  if (update.replyId) state.lastReplyId = update.replyId;
  const window = Math.max(1, update.recentReplyWindow);
  state.recentReplies = [...state.recentReplies, update.reply].slice(-window);
  state.lastNotes = update.notes;
  state.redFlags = Array.from(new Set([...state.redFlags, ...update.redFlags]));
  return state;
}

export type InMemorySessionStoreOptions = {
  persistFile?: string | null;
};

export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, SessionState>();
  private locks = new KeyedMutex();
  private persistFile: string | null;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.persistFile = options.persistFile ? path.resolve(options.persistFile) : null;
    if (this.persistFile) {
      this.loadFromFile();
    }
  }

  private loadFromFile(): void {
    if (!this.persistFile) return;
    if (!fs.existsSync(this.persistFile)) return;
    const raw = fs.readFileSync(this.persistFile, "utf-8");
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      logEvent("SESSION", `ignoring corrupt ${this.persistFile}: ${errorCause(err)}`);
      return;
    }
    const parsed = z.array(sessionStateSchema).safeParse(json);
    if (!parsed.success) {
      logEvent("SESSION", `ignoring unreadable ${this.persistFile}: ${parsed.error.issues.length} issue(s)`);
      return;
    }
    for (const session of parsed.data) {
      this.sessions.set(session.sessionId, {
        ...session,
        intelligence: mergeIntelligence(session.intelligence)
      });
    }
  }

  private saveToFile(): void {
    if (!this.persistFile) return;
    const payload = Array.from(this.sessions.values());
    fs.writeFileSync(this.persistFile, JSON.stringify(payload, null, 2));
  }

  async find(sessionId: string): Promise<SessionState | null> {
    return this.locks.runExclusive(sessionId, () => {
      const existing = this.sessions.get(sessionId);
      return existing ? cloneState(existing) : null;
    });
  }

  async getOrCreate(sessionId: string, timestamp: string): Promise<SessionState> {
    return this.locks.runExclusive(sessionId, () => cloneState(this.current(sessionId, timestamp)));
  }

  async update<T>(sessionId: string, timestamp: string, mutator: (state: SessionState) => T): Promise<T> {
    return this.locks.runExclusive(sessionId, () => {
      const draft = cloneState(this.current(sessionId, timestamp));
      const result = mutator(draft);
      this.sessions.set(sessionId, draft);
      this.saveToFile();
      return result;
    });
  }

  get size(): number {
    return this.sessions.size;
  }

  private current(sessionId: string, timestamp: string): SessionState {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;
    const fresh = createSessionState(sessionId, timestamp);
    this.sessions.set(sessionId, fresh);
    this.saveToFile();
    return fresh;
  }
}

export const SESSION_TABLE = "honeypot_sessions";

/**
 * Keeps one JSON state row per session. Locking is in-process, so a single
 * server instance is assumed per session.
 */
export class SupabaseSessionStore implements SessionStore {
  private locks = new KeyedMutex();

  constructor(
    private client: SupabaseClient,
    private table: string = SESSION_TABLE
  ) {}

  async find(sessionId: string): Promise<SessionState | null> {
    return this.locks.runExclusive(sessionId, () => this.fetch(sessionId));
  }

  async getOrCreate(sessionId: string, timestamp: string): Promise<SessionState> {
    return this.locks.runExclusive(sessionId, () => this.load(sessionId, timestamp));
  }

  async update<T>(sessionId: string, timestamp: string, mutator: (state: SessionState) => T): Promise<T> {
    return this.locks.runExclusive(sessionId, async () => {
      const draft = await this.load(sessionId, timestamp);
      const result = mutator(draft);
      await this.save(draft);
      return result;
    });
  }

  private async load(sessionId: string, timestamp: string): Promise<SessionState> {
    const existing = await this.fetch(sessionId);
    if (existing) return existing;
    const fresh = createSessionState(sessionId, timestamp);
    await this.save(fresh);
    return fresh;
  }

  private async fetch(sessionId: string): Promise<SessionState | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select("state")
      .eq("session_id", sessionId)
      .maybeSingle();
    if (error) throw new Error(`session load failed: ${error.message}`);
    if (!data) return null;
    const parsed = sessionStateSchema.safeParse(data.state);
    if (!parsed.success) throw new Error(`session ${sessionId} has malformed state`);
    return { ...parsed.data, intelligence: mergeIntelligence(parsed.data.intelligence) };
  }

  private async save(state: SessionState): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .upsert({ session_id: state.sessionId, state, updated_at: new Date().toISOString() });
    if (error) throw new Error(`session save failed: ${error.message}`);
  }
}
