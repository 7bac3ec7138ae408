
export type LogTag =
  | "INCOMING"
  | "OUTGOING"
  | "TURN"
  | "COUNCIL"
  | "AGENT"
  | "REPORT"
  | "SESSION"
  | "PROVIDERS"
  | "SERVER";

/** Runs of three or more digits keep only their last two; phones and accounts never reach the log whole. */
export function maskDigits(input: string): string {
  return input.replace(/\d{3,}/g, (run) => run.slice(-2).padStart(run.length, "*"));
}

export function maskApiKey(value?: string): string {
  if (!value) return "missing";
  return value.length <= 4 ? "*".repeat(value.length) : value.slice(-4).padStart(value.length, "*");
}

export function sanitizeHeaders(headers: NodeJS.Dict<string | string[]>): Record<string, string> {
  const output: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const name = key.toLowerCase();
    const text = Array.isArray(value) ? value.join(",") : value;
    output[name] = name === "x-api-key" ? maskApiKey(text) : text;
  }
  return output;
}

export function safeStringify(value: unknown, maxLen: number): string {
  let text: string;
  try {
    text = typeof value === "string" ? value : JSON.stringify(value) ?? String(value);
  } catch {
    text = String(value);
  }
  text = maskDigits(text);
  return text.length > maxLen ? `${text.slice(0, maxLen)}...(truncated)` : text;
}

function readField(source: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(source, key) ? Reflect.get(source, key) : undefined;
}

/**
 * One-line cause for a failed rung, report or turn. Adds the error code
 * (ECONNABORTED, ERR_CANCELED) and the HTTP status of a provider or
 * callback response when the error carries them.
 */
export function errorCause(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const parts = [err.message || err.name];
  const code = readField(err, "code");
  if (typeof code === "string" && !parts[0].includes(code)) parts.push(`code=${code}`);
  const response = readField(err, "response");
  const status = response && typeof response === "object" ? readField(response, "status") : readField(err, "status");
  if (typeof status === "number") parts.push(`status=${status}`);
  return parts.join(" ");
}

/** Plain line, for framed transcripts. Never throws. */
export function logRaw(line: string): void {
  try {
    console.info(line);
  } catch {
    // a broken stdout must not fail the turn
  }
}

export function logEvent(tag: LogTag, message: string): void {
  logRaw(`[${tag}] ${message}`);
}
