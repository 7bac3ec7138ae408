import { Router, Request, Response } from "express";
import { z } from "zod";
import type { ManualReportOutcome, SessionView, TurnResult } from "../core/engine";
import type { InboundTurn } from "../core/types";
import { errorCause, logEvent, safeStringify, sanitizeHeaders } from "../utils/logging";

export interface HoneypotService {
  processTurn(turn: InboundTurn): Promise<TurnResult>;
  inspectSession(sessionId: string): Promise<SessionView | null>;
  triggerReport(sessionId: string): Promise<ManualReportOutcome>;
}

export type HoneypotRouterOptions = {
  apiKey: string;
};

const timestampSchema = z.union([z.string(), z.number()]).optional();

const historySchema = z.object({
  sender: z.string().default("scammer"),
  text: z.string().default(""),
  timestamp: timestampSchema
});

const inboundTurnSchema = z
  .object({
    sessionId: z.string().trim().min(1).optional(),
    session_id: z.string().trim().min(1).optional(),
    message: z.object({
      sender: z.string().default("scammer"),
      text: z.string().trim().min(1, "message.text must not be empty"),
      timestamp: timestampSchema
    }),
    conversationHistory: z.array(historySchema).default([]),
    metadata: z
      .object({
        channel: z.string().optional(),
        language: z.string().optional(),
        locale: z.string().optional()
      })
      .optional()
  })
  .refine((body) => Boolean(body.sessionId || body.session_id), {
    message: "sessionId is required",
    path: ["sessionId"]
  });

/** ISO form of an epoch (seconds or milliseconds) or date string; undefined when unreadable. */
export function normalizeTimestamp(value: string | number | undefined): string | undefined {
  if (value === undefined || value === "") return undefined;
  let millis: number;
  if (typeof value === "number" || /^\d+(\.\d+)?$/.test(value.trim())) {
    const n = Number(value);
    millis = n < 1e12 ? n * 1000 : n;
  } else {
    millis = Date.parse(value);
  }
  return Number.isFinite(millis) ? new Date(millis).toISOString() : undefined;
}

export type ParseResult = { ok: true; turn: InboundTurn } | { ok: false; error: string };

export function parseInboundTurn(body: unknown): ParseResult {
  const parsed = inboundTurnSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? `${issue.path.join(".")}: ` : "";
    return { ok: false, error: issue ? `${where}${issue.message}` : "invalid request body" };
  }
  const data = parsed.data;
  return {
    ok: true,
    turn: {
      sessionId: data.sessionId ?? data.session_id ?? "",
      message: {
        sender: data.message.sender,
        text: data.message.text,
        timestamp: normalizeTimestamp(data.message.timestamp)
      },
      history: data.conversationHistory
        .filter((m) => m.text.trim().length > 0)
        .map((m) => ({ sender: m.sender, text: m.text, timestamp: normalizeTimestamp(m.timestamp) })),
      metadata: data.metadata
    }
  };
}

export function isAuthorized(provided: string | undefined, expected: string): boolean {
  if (!expected) return true;
  return provided === expected;
}

function logIncoming(req: Request) {
  logEvent("INCOMING", `headers: ${safeStringify(sanitizeHeaders(req.headers), 2000)}`);
  logEvent("INCOMING", `body: ${safeStringify(req.body, 2000)}`);
}

function logOutgoing(status: number, responseJson: unknown) {
  logEvent("OUTGOING", `status: ${status} response_json: ${safeStringify(responseJson, 2000)}`);
}

function respond(res: Response, status: number, body: unknown) {
  logOutgoing(status, body);
  return res.status(status).json(body);
}

export function describeSession(view: SessionView) {
  const { state, report } = view;
  return {
    status: "success",
    sessionId: state.sessionId,
    turnCount: state.turnCount,
    scamType: state.scamType,
    reportSent: state.reportSent,
    elapsedSeconds: report.engagementDurationSeconds,
    finalReport: report
  };
}

export function createHoneypotRouter(engine: HoneypotService, options: HoneypotRouterOptions): Router {
  const router = Router();

  router.get("/session/:sessionId", async (req: Request, res: Response) => {
    if (!isAuthorized(req.header("x-api-key"), options.apiKey)) {
      return respond(res, 401, { status: "error", message: "Invalid API key" });
    }
    try {
      const view = await engine.inspectSession(req.params.sessionId);
      if (!view) return respond(res, 404, { status: "error", message: "Session not found" });
      return respond(res, 200, describeSession(view));
    } catch (err) {
      logEvent("OUTGOING", `${req.params.sessionId} session read failed: ${errorCause(err)}`);
      return respond(res, 500, { status: "error", message: "internal error" });
    }
  });

  router.post("/session/:sessionId/callback", async (req: Request, res: Response) => {
    if (!isAuthorized(req.header("x-api-key"), options.apiKey)) {
      return respond(res, 401, { status: "error", message: "Invalid API key" });
    }
    try {
      const outcome = await engine.triggerReport(req.params.sessionId);
      if (!outcome.found) return respond(res, 404, { status: "error", message: "Session not found" });
      return respond(res, 200, {
        status: "success",
        delivered: outcome.delivered,
        alreadySent: outcome.alreadySent,
        reportSent: true
      });
    } catch (err) {
      logEvent("OUTGOING", `${req.params.sessionId} manual report failed: ${errorCause(err)}`);
      return respond(res, 500, { status: "error", message: "internal error" });
    }
  });

  router.post("/honeypot", async (req: Request, res: Response) => {
    logIncoming(req);

    if (!isAuthorized(req.header("x-api-key"), options.apiKey)) {
      return respond(res, 401, { status: "error", message: "Invalid API key" });
    }

    const parsed = parseInboundTurn(req.body);
    if (!parsed.ok) {
      return respond(res, 400, { status: "error", message: parsed.error });
    }

    try {
      const result = await engine.processTurn(parsed.turn);
      return respond(res, 200, { status: "success", reply: result.reply });
    } catch (err) {
      logEvent("OUTGOING", `${parsed.turn.sessionId} engine error: ${errorCause(err)}`);
      return respond(res, 500, { status: "error", message: "internal error" });
    }
  });

  return router;
}
