// src/planning/application/TraceTranslator.ts

/**
 * Turns a planner trace into plain sentences.
 *
 * Only `(move <robot> <from> <to>)` actions are explained; comments (`;`),
 * other actions and malformed lines are skipped silently.
 */

export const MOVE_ACTION = 'move';
export const MIN_MOVE_TOKENS = 4;

export type PlanSummary = {
  steps: number;
  reachedGoal: boolean;
};

/**
 * Tokens between the first '(' and the first ')' of an action line,
 * or null for blank, comment or malformed lines.
 */
export function parseActionTokens(rawLine: string): string[] | null {
  const line = rawLine.trim();
  if (line.length === 0 || line.startsWith(';')) return null;

  const open = line.indexOf('(');
  const close = line.indexOf(')');
  if (open === -1 || close === -1) return null;

  // A ')' before the first '(' leaves nothing between them.
  const inner = close > open ? line.slice(open + 1, close) : '';
  const tokens = inner.trim().split(/\s+/).filter((t) => t.length > 0);
  return tokens;
}

export function translatePlan(planText: string): string {
  const sentences: string[] = [];

  for (const line of planText.split('\n')) {
    const tokens = parseActionTokens(line);
    if (!tokens || tokens.length < MIN_MOVE_TOKENS || tokens[0] !== MOVE_ACTION) continue;

    const [, robot, from, to] = tokens;
    sentences.push(`Robot ${robot} moves from ${from} to ${to}.`);
  }

  return sentences.join('\n');
}

/**
 * Count the actions in a trace. Any action counts, not only moves.
 */
export function summarizePlan(planText: string): PlanSummary {
  let steps = 0;

  for (const line of planText.split('\n')) {
    const tokens = parseActionTokens(line);
    if (tokens && tokens.length > 0) steps++;
  }

  return { steps, reachedGoal: steps > 0 };
}
