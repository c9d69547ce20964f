import { CardNotFoundError, SessionCompleteError } from './errors';
import { DEFAULT_SCHEDULER_CONFIG, SchedulerConfig } from './scheduler/config';
import { grade, selectDue } from './scheduler/reviewScheduler';
import { Card, CardStore, Outcome, ScheduledCard, Session, SessionProgress } from './types';

export interface SessionOptions {
  /** Upper bound on queued cards; the rest wait for the next session. */
  limit?: number;
}

export interface GradeCurrentResult {
  card: ScheduledCard;
  session: Session;
}

export const EMPTY_SESSION: Session = Object.freeze({ queue: Object.freeze([]), cursor: 0 });

function normalizeLimit(limit: number | undefined): number {
  if (limit === undefined || Number.isNaN(limit)) {
    return Number.POSITIVE_INFINITY;
  }
  return Math.max(0, Math.floor(limit));
}

export function startSession(cards: readonly Card[], now: string, options: SessionOptions = {}): Session {
  const due = selectDue(cards, now);
  const limit = normalizeLimit(options.limit);
  const queue = (Number.isFinite(limit) ? due.slice(0, limit) : due).map((card) => card.id);
  return { queue, cursor: 0 };
}

export function isSessionComplete(session: Session): boolean {
  return session.cursor >= session.queue.length;
}

export function currentCard(session: Session, store: CardStore): Card | undefined {
  if (isSessionComplete(session)) {
    return undefined;
  }
  const id = session.queue[session.cursor];
  const card = store.get(id);
  if (!card) {
    throw new CardNotFoundError(id);
  }
  return card;
}

export function advanceSession(session: Session): Session {
  if (isSessionComplete(session)) {
    return session.cursor === session.queue.length ? session : { ...session, cursor: session.queue.length };
  }
  return { ...session, cursor: session.cursor + 1 };
}

export function gradeCurrent(
  session: Session,
  store: CardStore,
  outcome: Outcome,
  now: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
): GradeCurrentResult {
  const card = currentCard(session, store);
  if (!card) {
    throw new SessionCompleteError();
  }
  return {
    card: grade(card, outcome, now, config),
    session: advanceSession(session),
  };
}

export function sessionProgress(session: Session): SessionProgress {
  const total = session.queue.length;
  const done = Math.min(session.cursor, total);
  return { done, total, remaining: total - done };
}

export function indexCards(cards: readonly Card[]): Map<string, Card> {
  return new Map(cards.map((card) => [card.id, card]));
}
