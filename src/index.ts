export * from './types';
export * from './errors';
export * from './scheduler/config';
export * from './scheduler/constants';
export * from './scheduler/reviewScheduler';
export * from './session';
export * from './wordList';
export * from './quiz';
export * from './flashcard';
export * from './hooks';
export * from './storage/keyValueStorage';
export * from './storage/deckRepository';
export { formatDueLabel } from './utils/due';
export { formatIntervalLabel } from './utils/interval';
export { formatCounterDisplay, formatProgressCounter } from './utils/counter';
export { assertOutcome, isOutcome, OUTCOME_LABELS, OUTCOMES, parseOutcome } from './utils/outcome';
export { isDue, nowIso } from './utils/time';
