// ── ActionOutcome ────────────────────────────────────────────
// Internal tagged result. The public surface only ever sees
// `message`, so LLM callers read the same text either way.

export type ActionVia =
  | 'resolved'
  | 'forced'
  | 'coordinates'
  | 'text'
  | 'field-fallback';

export type ActionOutcome =
  | { kind: 'ok'; message: string; via: ActionVia }
  | { kind: 'not_found'; message: string }
  | { kind: 'precondition'; message: string }
  | { kind: 'interaction'; message: string; reason: string };

export type OutcomeKind = ActionOutcome['kind'];

export const BROWSER_NOT_OPEN = 'Browser not open';

export function ok(message: string, via: ActionVia): ActionOutcome {
  return { kind: 'ok', message, via };
}

export function notFound(message: string): ActionOutcome {
  return { kind: 'not_found', message };
}

export function precondition(message: string = BROWSER_NOT_OPEN): ActionOutcome {
  return { kind: 'precondition', message };
}

export function interaction(message: string, reason: string): ActionOutcome {
  return { kind: 'interaction', message, reason };
}

const FAILURE_KEYWORDS = ['not found', 'could not', 'failed', 'not open', 'no tab named', 'cannot'] as const;

/**
 * Keyword test for callers that only have the message string
 * (script runner exit codes, agents reading tool output).
 */
export function looksFailed(message: string): boolean {
  const lower = message.toLowerCase();
  return FAILURE_KEYWORDS.some((keyword) => lower.includes(keyword));
}
