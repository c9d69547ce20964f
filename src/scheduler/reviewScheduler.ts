import { InvalidCardError, InvalidOutcomeError, InvalidTimestampError } from '../errors';
import { Card, CardStatus, NewCard, Outcome, ScheduledCard, ScheduledStatus, WordExample } from '../types';
import { normalizeBoundedText, normalizeOptionalBoundedText } from '../utils/text';
import { addDaysIso, parseIsoMs, toSafeIso } from '../utils/time';
import { isOutcome } from '../utils/outcome';
import { DEFAULT_SCHEDULER_CONFIG, roundEase, SchedulerConfig } from './config';
import {
  EXAMPLE_MAX_LENGTH,
  MEANING_MAX_LENGTH,
  MNEMONIC_MAX_LENGTH,
  PHONETIC_MAX_LENGTH,
  TEXT_MAX_LENGTH,
} from './constants';

export interface NewCardInput {
  id?: string;
  text: string;
  meaning: string;
  phonetic?: string;
  examples?: WordExample[];
  mnemonic?: string;
}

export type OutcomeIntervalPreview = Record<Outcome, number>;

let cardIdSequence = 0;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function requireIso(field: string, value: string): string {
  const parsed = parseIsoMs(value);
  if (parsed === null) {
    throw new InvalidTimestampError(field, value);
  }
  return toSafeIso(parsed);
}

type RandomSource = { getRandomValues?: (buffer: Uint32Array) => Uint32Array };

// Web Crypto exists on Node.js, browsers and Hermes; Math.random covers hosts without it.
function idEntropy(): string {
  const runtimeCrypto = (globalThis as { crypto?: RandomSource }).crypto;
  if (runtimeCrypto?.getRandomValues) {
    const buffer = new Uint32Array(1);
    runtimeCrypto.getRandomValues(buffer);
    return buffer[0].toString(36);
  }
  return Math.floor(Math.random() * 0x100000000).toString(36);
}

function nextCardId(createdAt: string): string {
  cardIdSequence += 1;
  const anchor = Date.parse(createdAt).toString(36);
  return `${anchor}-${cardIdSequence.toString(36)}-${idEntropy()}`;
}

function normalizeExamples(examples: WordExample[] | undefined): WordExample[] | undefined {
  if (!examples) {
    return undefined;
  }
  const normalized = examples
    .map((example) => ({
      english: normalizeBoundedText(example.english, EXAMPLE_MAX_LENGTH),
      chinese: normalizeBoundedText(example.chinese, EXAMPLE_MAX_LENGTH),
    }))
    .filter((example) => example.english.length > 0);
  return normalized.length > 0 ? normalized : undefined;
}

export function createCard(
  input: NewCardInput,
  now: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
): NewCard {
  const createdAt = requireIso('now', now);
  const text = normalizeBoundedText(input.text, TEXT_MAX_LENGTH);
  const meaning = normalizeBoundedText(input.meaning, MEANING_MAX_LENGTH);
  if (text.length === 0) {
    throw new InvalidCardError('Card text must not be blank');
  }
  if (meaning.length === 0) {
    throw new InvalidCardError(`Card "${text}" needs a meaning`);
  }
  const explicitId = normalizeOptionalBoundedText(input.id, TEXT_MAX_LENGTH);

  return {
    id: explicitId ?? nextCardId(createdAt),
    text,
    meaning,
    phonetic: normalizeBoundedText(input.phonetic, PHONETIC_MAX_LENGTH),
    examples: normalizeExamples(input.examples),
    mnemonic: normalizeOptionalBoundedText(input.mnemonic, MNEMONIC_MAX_LENGTH),
    createdAt,
    status: 'new',
    intervalDays: 0,
    easeFactor: config.initialEase,
    consecutiveCorrect: 0,
  };
}

function isEarlyStage(status: CardStatus): boolean {
  return status === 'new' || status === 'learning';
}

function knowInterval(card: Card, config: SchedulerConfig): number {
  if (isEarlyStage(card.status)) {
    return 1;
  }
  return clamp(Math.round(card.intervalDays * card.easeFactor), 1, config.maxIntervalDays);
}

function vagueInterval(card: Card, config: SchedulerConfig): number {
  return clamp(Math.round(card.intervalDays * config.vagueIntervalMultiplier), 1, config.maxIntervalDays);
}

export function previewIntervals(
  card: Card,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
): OutcomeIntervalPreview {
  return {
    forgot: 0,
    vague: vagueInterval(card, config),
    know: knowInterval(card, config),
  };
}

function schedule(
  card: Card,
  status: ScheduledStatus,
  intervalDays: number,
  easeFactor: number,
  consecutiveCorrect: number,
  reviewedAt: string,
): ScheduledCard {
  return {
    ...card,
    status,
    intervalDays,
    easeFactor,
    consecutiveCorrect,
    lastReviewedAt: reviewedAt,
    dueAt: addDaysIso(reviewedAt, intervalDays),
  };
}

/**
 * Applies one grading outcome and returns the updated card. The input card is
 * never mutated; callers write the result back to their collection.
 */
export function grade(
  card: Card,
  outcome: Outcome,
  now: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
): ScheduledCard {
  if (!isOutcome(outcome)) {
    throw new InvalidOutcomeError(outcome);
  }
  const reviewedAt = requireIso('now', now);
  const easeFactor = Math.max(config.minEase, card.easeFactor);

  switch (outcome) {
    case 'forgot':
      return schedule(
        card,
        'learning',
        0,
        Math.max(config.minEase, roundEase(easeFactor - config.forgotEasePenalty)),
        0,
        reviewedAt,
      );
    case 'vague':
      return schedule(
        card,
        card.status === 'mastered' ? 'mastered' : 'reviewing',
        vagueInterval(card, config),
        easeFactor,
        0,
        reviewedAt,
      );
    case 'know': {
      const consecutiveCorrect = card.consecutiveCorrect + 1;
      return schedule(
        card,
        consecutiveCorrect >= config.masteryStreak || card.status === 'mastered' ? 'mastered' : 'reviewing',
        knowInterval({ ...card, easeFactor }, config),
        roundEase(easeFactor + config.knowEaseStep),
        consecutiveCorrect,
        reviewedAt,
      );
    }
    default: {
      const unreachable: never = outcome;
      throw new InvalidOutcomeError(unreachable);
    }
  }
}

function dueTimeOrNull(card: Card): number | null {
  return card.dueAt === undefined ? null : parseIsoMs(card.dueAt);
}

/** Scheduled reviews first by due time, then new cards; ties broken by id. */
export function compareDueCards(a: Card, b: Card): number {
  const aNew = a.status === 'new';
  const bNew = b.status === 'new';
  if (aNew !== bNew) {
    return aNew ? 1 : -1;
  }
  if (!aNew) {
    const aDue = dueTimeOrNull(a) ?? Number.MIN_SAFE_INTEGER;
    const bDue = dueTimeOrNull(b) ?? Number.MIN_SAFE_INTEGER;
    if (aDue !== bDue) {
      return aDue - bDue;
    }
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

export function isCardDue(card: Card, now: string): boolean {
  if (card.status === 'new') {
    return true;
  }
  const nowMs = parseIsoMs(now);
  const dueMs = dueTimeOrNull(card);
  return nowMs !== null && dueMs !== null && dueMs <= nowMs;
}

export function selectDue(cards: readonly Card[], now: string): Card[] {
  const current = requireIso('now', now);
  return cards.filter((card) => isCardDue(card, current)).sort(compareDueCards);
}
