import { DEFAULT_SCHEDULER_CONFIG, SchedulerConfig } from '../scheduler/config';
import {
  EXAMPLE_MAX_LENGTH,
  MEANING_MAX_LENGTH,
  MNEMONIC_MAX_LENGTH,
  PHONETIC_MAX_LENGTH,
  TEXT_MAX_LENGTH,
} from '../scheduler/constants';
import { isCardDue } from '../scheduler/reviewScheduler';
import { Card, CardStatus, Deck, DeckStats, ScheduledStatus, WordExample } from '../types';
import { addDaysIso, isIsoDateTime, nowIso, parseIsoMs, toCanonicalIso } from '../utils/time';
import { normalizeBoundedText, normalizeOptionalBoundedText } from '../utils/text';
import { KeyValueStorage } from './keyValueStorage';

export const DECK_STORAGE_KEY = 'vocab_review.deck.v1';

const STATUS_ALIASES: Record<string, CardStatus> = {
  new: 'new',
  unstudied: 'new',
  未学习: 'new',
  learning: 'learning',
  learn: 'learning',
  学习中: 'learning',
  reviewing: 'reviewing',
  review: 'reviewing',
  复习中: 'reviewing',
  mastered: 'mastered',
  已掌握: 'mastered',
};

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeStatus(value: unknown): CardStatus | null {
  if (typeof value !== 'string') {
    return null;
  }
  const folded = value.trim().toLowerCase().replace(/[\s_-]+/g, '');
  return Object.prototype.hasOwnProperty.call(STATUS_ALIASES, folded) ? STATUS_ALIASES[folded] : null;
}

function asFiniteNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function asNonNegativeInt(value: unknown, max: number): number {
  const parsed = asFiniteNumber(value);
  if (parsed === null) {
    return 0;
  }
  return Math.min(max, Math.max(0, Math.floor(parsed)));
}

function normalizeIso(value: unknown): string | undefined {
  return isIsoDateTime(value) ? toCanonicalIso(value) : undefined;
}

function normalizeExamples(value: unknown): WordExample[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  const examples = value.filter(isRecord).map((item) => ({
    english: normalizeBoundedText(item.english, EXAMPLE_MAX_LENGTH),
    chinese: normalizeBoundedText(item.chinese, EXAMPLE_MAX_LENGTH),
  }));
  const kept = examples.filter((example) => example.english.length > 0);
  return kept.length > 0 ? kept : undefined;
}

function scheduledIntervalFloor(status: ScheduledStatus): number {
  // Learning cards are waiting on a re-review right away; the others have passed at least one.
  return status === 'learning' ? 0 : 1;
}

/**
 * Repairs a persisted card so that it satisfies the scheduling invariants:
 * ease at or above the floor, new cards unscheduled, and `dueAt` recomputed
 * from `lastReviewedAt + intervalDays`. Returns `null` when the record has no
 * usable id, word or meaning.
 */
export function normalizeCard(
  raw: unknown,
  fallbackIso: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
): Card | null {
  if (!isRecord(raw)) {
    return null;
  }
  const id = normalizeBoundedText(raw.id, TEXT_MAX_LENGTH);
  const text = normalizeBoundedText(raw.text, TEXT_MAX_LENGTH);
  const meaning = normalizeBoundedText(raw.meaning, MEANING_MAX_LENGTH);
  if (!id || !text || !meaning) {
    return null;
  }

  const lastReviewedAt = normalizeIso(raw.lastReviewedAt);
  const createdAt = normalizeIso(raw.createdAt) ?? lastReviewedAt ?? fallbackIso;
  const easeValue = asFiniteNumber(raw.easeFactor);
  const base = {
    id,
    text,
    meaning,
    phonetic: normalizeBoundedText(raw.phonetic, PHONETIC_MAX_LENGTH),
    examples: normalizeExamples(raw.examples),
    mnemonic: normalizeOptionalBoundedText(raw.mnemonic, MNEMONIC_MAX_LENGTH),
    createdAt,
    easeFactor: easeValue === null ? config.initialEase : Math.max(config.minEase, easeValue),
    consecutiveCorrect: asNonNegativeInt(raw.consecutiveCorrect, Number.MAX_SAFE_INTEGER),
  };

  const status = normalizeStatus(raw.status) ?? (lastReviewedAt ? 'learning' : 'new');
  if (status === 'new') {
    return { ...base, status, intervalDays: 0 };
  }

  if (!lastReviewedAt) {
    // Without a review timestamp the schedule cannot be rebuilt; re-queue it now.
    return {
      ...base,
      status: 'learning',
      intervalDays: 0,
      lastReviewedAt: createdAt,
      dueAt: createdAt,
    };
  }

  const interval =
    status === 'learning'
      ? 0
      : Math.max(scheduledIntervalFloor(status), asNonNegativeInt(raw.intervalDays, config.maxIntervalDays));
  return {
    ...base,
    status,
    intervalDays: interval,
    lastReviewedAt,
    dueAt: addDaysIso(lastReviewedAt, interval),
  };
}

function reviewedMs(card: Card): number {
  return parseIsoMs(card.lastReviewedAt) ?? Number.MIN_SAFE_INTEGER;
}

function pickFreshestDuplicate(existing: Card, incoming: Card): Card {
  return reviewedMs(incoming) >= reviewedMs(existing) ? incoming : existing;
}

function compareCreated(a: Card, b: Card): number {
  const delta = Date.parse(a.createdAt) - Date.parse(b.createdAt);
  if (delta !== 0) {
    return delta;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function normalizeCards(rawCards: readonly unknown[], fallbackIso: string, config: SchedulerConfig): Card[] {
  const byId = new Map<string, Card>();
  for (const raw of rawCards) {
    const card = normalizeCard(raw, fallbackIso, config);
    if (!card) {
      continue;
    }
    const existing = byId.get(card.id);
    byId.set(card.id, existing ? pickFreshestDuplicate(existing, card) : card);
  }
  return [...byId.values()].sort(compareCreated);
}

export interface DeckRepositoryOptions {
  key?: string;
  config?: SchedulerConfig;
  now?: string;
}

export async function loadDeck(storage: KeyValueStorage, options: DeckRepositoryOptions = {}): Promise<Deck> {
  const serialized = await storage.getItem(options.key ?? DECK_STORAGE_KEY);
  if (!serialized) {
    return { cards: [] };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(serialized);
  } catch (error) {
    console.warn('Stored deck is not valid JSON, starting with an empty deck:', error);
    return { cards: [] };
  }
  if (!isRecord(parsed)) {
    console.warn('Stored deck has an unexpected shape, starting with an empty deck');
    return { cards: [] };
  }

  const rawCards = Array.isArray(parsed.cards) ? parsed.cards : [];
  const cards = normalizeCards(rawCards, options.now ?? nowIso(), options.config ?? DEFAULT_SCHEDULER_CONFIG);
  if (cards.length < rawCards.length) {
    console.warn(`Dropped ${rawCards.length - cards.length} unreadable or duplicate card(s) from the stored deck`);
  }
  return { cards, lastReviewedAt: normalizeIso(parsed.lastReviewedAt) };
}

export async function saveDeck(
  storage: KeyValueStorage,
  deck: Deck,
  options: DeckRepositoryOptions = {},
): Promise<void> {
  const safeDeck: Deck = {
    cards: normalizeCards(deck.cards, options.now ?? nowIso(), options.config ?? DEFAULT_SCHEDULER_CONFIG),
    lastReviewedAt: normalizeIso(deck.lastReviewedAt),
  };
  await storage.setItem(options.key ?? DECK_STORAGE_KEY, JSON.stringify(safeDeck));
}

export function computeDeckStats(cards: readonly Card[], currentIso = nowIso()): DeckStats {
  return cards.reduce<DeckStats>(
    (acc, card) => {
      acc.total += 1;
      if (isCardDue(card, currentIso)) {
        acc.dueNow += 1;
      }
      acc[card.status] += 1;
      return acc;
    },
    { total: 0, dueNow: 0, new: 0, learning: 0, reviewing: 0, mastered: 0 },
  );
}
