import strategyTable from "../data/strategies.json";

export type Strategy = {
  id: string;
  label: string;
  temperature: number;
  overlay: string[];
};

export type TurnPhase = 1 | 2 | 3 | 4;

export const BASE_PROMPT: readonly string[] = strategyTable.basePrompt;

/** Declaration order is significant: it breaks score ties, and the first entry is the fallback. */
export const DEFAULT_STRATEGIES: readonly Strategy[] = strategyTable.strategies;

const PHASE_INSTRUCTIONS: Record<TurnPhase, string> = {
  1: strategyTable.phases["1"],
  2: strategyTable.phases["2"],
  3: strategyTable.phases["3"],
  4: strategyTable.phases["4"]
};

/** Phase of a 1-based turn number: rapport, gathering, targeted extraction, final push. */
export function phaseForTurn(turn: number): TurnPhase {
  if (turn <= 2) return 1;
  if (turn <= 5) return 2;
  if (turn <= 8) return 3;
  return 4;
}

export function phaseInstruction(phase: TurnPhase): string {
  return PHASE_INSTRUCTIONS[phase];
}
