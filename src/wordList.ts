import { Card, CardStatus } from './types';
import { includesFolded } from './utils/text';

export const WORDS_PER_PAGE = 20;

export const STATUS_LABELS: Record<CardStatus, string> = {
  new: '未学习',
  learning: '学习中',
  reviewing: '复习中',
  mastered: '已掌握',
};

export interface WordListFilter {
  search?: string;
  status?: CardStatus;
}

export interface Page<T> {
  items: T[];
  page: number;
  totalPages: number;
  totalItems: number;
}

export interface StudyProgress {
  total: number;
  counts: Record<CardStatus, number>;
  /** Fraction in [0, 1]; 0 for an empty list. */
  masteredRatio: number;
}

export function filterCards(cards: readonly Card[], filter: WordListFilter = {}): Card[] {
  const search = filter.search ?? '';
  return cards.filter((card) => {
    if (filter.status && card.status !== filter.status) {
      return false;
    }
    return includesFolded(card.text, search) || includesFolded(card.meaning, search);
  });
}

export function paginate<T>(items: readonly T[], page: number, perPage = WORDS_PER_PAGE): Page<T> {
  const safePerPage = Number.isFinite(perPage) && perPage >= 1 ? Math.floor(perPage) : WORDS_PER_PAGE;
  const totalPages = Math.max(1, Math.ceil(items.length / safePerPage));
  const requested = Number.isFinite(page) ? Math.floor(page) : 1;
  const current = Math.min(totalPages, Math.max(1, requested));
  const start = (current - 1) * safePerPage;
  return {
    items: items.slice(start, start + safePerPage),
    page: current,
    totalPages,
    totalItems: items.length,
  };
}

export function computeStudyProgress(cards: readonly Card[]): StudyProgress {
  const counts: Record<CardStatus, number> = { new: 0, learning: 0, reviewing: 0, mastered: 0 };
  for (const card of cards) {
    counts[card.status] += 1;
  }
  return {
    total: cards.length,
    counts,
    masteredRatio: cards.length === 0 ? 0 : counts.mastered / cards.length,
  };
}

export function removeCard(cards: readonly Card[], id: string): Card[] {
  return cards.filter((card) => card.id !== id);
}
