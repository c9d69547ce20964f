export type CardStatus = 'new' | 'learning' | 'reviewing' | 'mastered';

export type ScheduledStatus = Exclude<CardStatus, 'new'>;

export type Outcome = 'forgot' | 'vague' | 'know';

export interface WordExample {
  english: string;
  chinese: string;
}

interface CardContent {
  id: string;
  text: string;
  meaning: string;
  phonetic: string;
  examples?: WordExample[];
  mnemonic?: string;
  createdAt: string;
  easeFactor: number;
  consecutiveCorrect: number;
}

export interface NewCard extends CardContent {
  status: 'new';
  intervalDays: 0;
  dueAt?: undefined;
  lastReviewedAt?: undefined;
}

export interface ScheduledCard extends CardContent {
  status: ScheduledStatus;
  intervalDays: number;
  dueAt: string;
  lastReviewedAt: string;
}

export type Card = NewCard | ScheduledCard;

export type CardStore = ReadonlyMap<string, Card>;

export interface Session {
  readonly queue: readonly string[];
  readonly cursor: number;
}

export interface SessionProgress {
  done: number;
  total: number;
  remaining: number;
}

export interface Deck {
  cards: Card[];
  lastReviewedAt?: string;
}

export interface DeckStats {
  total: number;
  dueNow: number;
  new: number;
  learning: number;
  reviewing: number;
  mastered: number;
}
