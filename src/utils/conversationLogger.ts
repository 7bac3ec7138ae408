import { logRaw, maskDigits } from "./logging";

type LogTurnInput = {
  sessionId: string;
  turn: number;
  role: "SCAMMER" | "HONEYPOT";
  text: string;
  strategy?: string;
  tier?: string;
};

export function logTurn(input: LogTurnInput): void {
  const sessionId = input.sessionId || "unknown";
  const turn = Number.isFinite(input.turn) && input.turn > 0 ? input.turn : 1;
  const raw = input.text || "";
  const trimmed = raw.length > 500 ? raw.slice(0, 500) : raw;
  const origin = input.strategy ? `[strategy=${input.strategy}][tier=${input.tier ?? "?"}]` : "";
  logRaw(`[HONEYPOT][session=${sessionId}][turn=${turn}][role=${input.role}]${origin}`);
  logRaw(maskDigits(trimmed));
  logRaw("--------------------------------------------------");
}
