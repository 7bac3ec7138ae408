import { errorCause, logEvent } from "../utils/logging";
import type { Strategy } from "./strategies";
import type { CandidateResult } from "./types";

export type StrategyRun = (strategy: Strategy, signal: AbortSignal) => Promise<CandidateResult | null>;

export type DispatchOutcome = {
  /** Results that arrived before the deadline, in completion order. */
  completed: CandidateResult[];
  timedOut: boolean;
};

/**
 * Runs every strategy concurrently and collects what finishes inside the
 * deadline. Never rejects. A non-positive deadline has already passed, so
 * nothing is waited for.
 */
export async function dispatchStrategies(
  strategies: readonly Strategy[],
  run: StrategyRun,
  deadlineMs: number
): Promise<DispatchOutcome> {
  const controller = new AbortController();
  const completed: CandidateResult[] = [];

  if (deadlineMs <= 0 || strategies.length === 0) {
    controller.abort();
    return { completed, timedOut: deadlineMs <= 0 && strategies.length > 0 };
  }

  let closed = false;
  const runs = strategies.map(async (strategy) => {
    try {
      const result = await run(strategy, controller.signal);
      if (!closed && result) completed.push(result);
    } catch (err) {
      logEvent("COUNCIL", `${strategy.id} rejected: ${errorCause(err)}`);
    }
  });

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<"deadline">((resolve) => {
    timer = setTimeout(() => resolve("deadline"), deadlineMs);
  });

  try {
    const first = await Promise.race([Promise.all(runs).then(() => "settled" as const), deadline]);
    closed = true;
    if (first === "deadline") {
      controller.abort();
      logEvent(
        "COUNCIL",
        `deadline ${deadlineMs}ms reached with ${completed.length}/${strategies.length} strategies done`
      );
      return { completed: [...completed], timedOut: true };
    }
    return { completed: [...completed], timedOut: false };
  } finally {
    clearTimeout(timer);
  }
}
