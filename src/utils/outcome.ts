import { InvalidOutcomeError } from '../errors';
import { Outcome } from '../types';

/** Bottom-bar order. */
export const OUTCOMES: readonly Outcome[] = ['know', 'vague', 'forgot'];

export const OUTCOME_LABELS: Record<Outcome, string> = {
  forgot: '忘记',
  vague: '模糊',
  know: '认识',
};

const LABEL_TO_OUTCOME = new Map<string, Outcome>(
  OUTCOMES.map((outcome) => [OUTCOME_LABELS[outcome], outcome] as const),
);

export function isOutcome(value: unknown): value is Outcome {
  return OUTCOMES.some((outcome) => outcome === value);
}

export function parseOutcome(input: unknown): Outcome | null {
  const raw = input instanceof String ? input.valueOf() : input;
  if (typeof raw !== 'string') {
    return null;
  }
  const trimmed = raw.trim();
  const byLabel = LABEL_TO_OUTCOME.get(trimmed);
  if (byLabel) {
    return byLabel;
  }
  const folded = trimmed.toLowerCase();
  return isOutcome(folded) ? folded : null;
}

export function assertOutcome(input: unknown): Outcome {
  const outcome = parseOutcome(input);
  if (outcome === null) {
    throw new InvalidOutcomeError(input);
  }
  return outcome;
}
