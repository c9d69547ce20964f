import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import { DEFAULT_SCHEDULER_CONFIG, SchedulerConfig } from './scheduler/config';
import { createCard, NewCardInput } from './scheduler/reviewScheduler';
import { advanceSession, currentCard, gradeCurrent, indexCards, sessionProgress, SessionOptions, startSession } from './session';
import { loadDeck, saveDeck } from './storage/deckRepository';
import { KeyValueStorage } from './storage/keyValueStorage';
import { Card, Outcome, ScheduledCard, Session, SessionProgress } from './types';
import { removeCard } from './wordList';
import { nowIso } from './utils/time';

export interface StudyState {
  cards: Card[];
  session: Session;
  lastReviewedAt?: string;
}

export interface StudyGradeResult {
  reviewed: boolean;
  state: StudyState;
  graded?: ScheduledCard;
}

export function createStudyState(cards: Card[], now: string, options: SessionOptions = {}): StudyState {
  return { cards, session: startSession(cards, now, options) };
}

/** Writes a graded card back over the card with the same id; unknown ids leave the list untouched. */
export function applyGradedCard(cards: Card[], graded: Card): Card[] {
  const index = cards.findIndex((card) => card.id === graded.id);
  if (index === -1) {
    return cards;
  }
  const next = cards.slice();
  next[index] = graded;
  return next;
}

export function applyStudyGrade(
  state: StudyState,
  outcome: Outcome,
  now: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
): StudyGradeResult {
  const store = indexCards(state.cards);
  if (!currentCard(state.session, store)) {
    return { reviewed: false, state };
  }
  const { card, session } = gradeCurrent(state.session, store, outcome, now, config);
  return {
    reviewed: true,
    graded: card,
    state: {
      cards: applyGradedCard(state.cards, card),
      session,
      lastReviewedAt: card.lastReviewedAt,
    },
  };
}

export function skipCurrentCard(state: StudyState): StudyState {
  const session = advanceSession(state.session);
  return session === state.session ? state : { ...state, session };
}

/** Removes a card from the deck and from the queue, keeping the cursor on the same upcoming card. */
export function deleteStudyCard(state: StudyState, cardId: string): StudyState {
  const queueIndex = state.session.queue.indexOf(cardId);
  const cards = removeCard(state.cards, cardId);
  if (queueIndex === -1) {
    return cards.length === state.cards.length ? state : { ...state, cards };
  }
  const queue = state.session.queue.filter((id) => id !== cardId);
  const cursor = queueIndex < state.session.cursor ? state.session.cursor - 1 : state.session.cursor;
  return { ...state, cards, session: { queue, cursor: Math.min(cursor, queue.length) } };
}

export function addStudyCard(
  state: StudyState,
  input: NewCardInput,
  now: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
): StudyState {
  const created = createCard(input, now, config);
  if (state.cards.some((card) => card.id === created.id)) {
    return state;
  }
  // New words wait for the next session rather than joining the one in progress.
  return { ...state, cards: [...state.cards, created] };
}

export interface UseStudySessionOptions extends SessionOptions {
  config?: SchedulerConfig;
  clock?: () => string;
  storageKey?: string;
}

export interface StudySessionHandle {
  loading: boolean;
  error: Error | null;
  cards: Card[];
  card: Card | undefined;
  progress: SessionProgress;
  grade: (outcome: Outcome) => ScheduledCard | undefined;
  skip: () => void;
  restart: () => void;
  addCard: (input: NewCardInput) => void;
  deleteCard: (cardId: string) => void;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

interface StudySessionSettings {
  storage: KeyValueStorage;
  storageKey?: string;
  config: SchedulerConfig;
  clock: () => string;
  limit?: number;
}

function resolveSettings(storage: KeyValueStorage, options: UseStudySessionOptions): StudySessionSettings {
  return {
    storage,
    storageKey: options.storageKey,
    config: options.config ?? DEFAULT_SCHEDULER_CONFIG,
    clock: options.clock ?? nowIso,
    limit: options.limit,
  };
}

/**
 * Loads the deck once on mount and persists every later change. Options are
 * read at call time, so callers may pass fresh `clock` or `config` values on
 * each render.
 */
export function useStudySession(storage: KeyValueStorage, options: UseStudySessionOptions = {}): StudySessionHandle {
  const [state, setState] = useState<StudyState>(() => createStudyState([], (options.clock ?? nowIso)()));
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<Error | null>(null);
  const settingsRef = useRef(resolveSettings(storage, options));
  const stateRef = useRef(state);
  const persistQueueRef = useRef<Promise<void>>(Promise.resolve());
  const loadedRef = useRef(false);

  useEffect(() => {
    settingsRef.current = resolveSettings(storage, options);
  });

  const commit = useCallback((next: StudyState) => {
    stateRef.current = next;
    setState(next);
  }, []);

  useEffect(() => {
    let active = true;
    const { storage: store, storageKey, config, clock, limit } = settingsRef.current;
    loadDeck(store, { key: storageKey, config })
      .then((deck) => {
        if (!active) {
          return;
        }
        loadedRef.current = true;
        commit({ ...createStudyState(deck.cards, clock(), { limit }), lastReviewedAt: deck.lastReviewedAt });
      })
      .catch((loadError: unknown) => {
        console.error('Failed to load deck:', loadError);
        if (active) {
          setError(toError(loadError));
        }
      })
      .finally(() => {
        if (active) {
          setLoading(false);
        }
      });
    return () => {
      active = false;
    };
  }, [commit]);

  useEffect(() => {
    if (!loadedRef.current) {
      return;
    }
    const snapshot = { cards: state.cards, lastReviewedAt: state.lastReviewedAt };
    const { storage: store, storageKey, config } = settingsRef.current;
    // Serialize writes so an older snapshot never lands after a newer one.
    persistQueueRef.current = persistQueueRef.current
      .then(() => saveDeck(store, snapshot, { key: storageKey, config }))
      .catch((saveError: unknown) => {
        console.error('Failed to save deck:', saveError);
        setError(toError(saveError));
      });
  }, [state.cards, state.lastReviewedAt]);

  const card = useMemo(() => currentCard(state.session, indexCards(state.cards)), [state.cards, state.session]);
  const progress = useMemo(() => sessionProgress(state.session), [state.session]);

  const grade = useCallback(
    (outcome: Outcome) => {
      const { clock, config } = settingsRef.current;
      const result = applyStudyGrade(stateRef.current, outcome, clock(), config);
      if (result.reviewed) {
        commit(result.state);
      }
      return result.graded;
    },
    [commit],
  );

  const skip = useCallback(() => commit(skipCurrentCard(stateRef.current)), [commit]);

  const restart = useCallback(() => {
    const { clock, limit } = settingsRef.current;
    const { cards, lastReviewedAt } = stateRef.current;
    commit({ ...createStudyState(cards, clock(), { limit }), lastReviewedAt });
  }, [commit]);

  const addCard = useCallback(
    (input: NewCardInput) => {
      const { clock, config } = settingsRef.current;
      commit(addStudyCard(stateRef.current, input, clock(), config));
    },
    [commit],
  );

  const deleteCard = useCallback((cardId: string) => commit(deleteStudyCard(stateRef.current, cardId)), [commit]);

  return { loading, error, cards: state.cards, card, progress, grade, skip, restart, addCard, deleteCard };
}
