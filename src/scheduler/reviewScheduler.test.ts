import { InvalidCardError, InvalidOutcomeError, InvalidTimestampError } from '../errors';
import { Card, Outcome, ScheduledCard } from '../types';
import { addDaysIso } from '../utils/time';
import { resolveSchedulerConfig } from './config';
import { compareDueCards, createCard, grade, isCardDue, previewIntervals, selectDue } from './reviewScheduler';

const NOW = '2026-02-23T12:00:00.000Z';
const NEXT_DAY = '2026-02-24T12:00:00.000Z';

function scheduledCard(overrides: Partial<ScheduledCard> & Pick<ScheduledCard, 'id'>): ScheduledCard {
  return {
    text: `word-${overrides.id}`,
    meaning: 'meaning',
    phonetic: '',
    createdAt: '2026-02-01T00:00:00.000Z',
    status: 'reviewing',
    intervalDays: 3,
    easeFactor: 2.5,
    consecutiveCorrect: 1,
    lastReviewedAt: '2026-02-20T12:00:00.000Z',
    dueAt: NOW,
    ...overrides,
  };
}

describe('createCard', () => {
  it('creates new cards with trimmed fields and default learning state', () => {
    const card = createCard({ text: '  Serendipity ', meaning: ' 意外发现珍奇事物的本领 ', phonetic: ' /ˌser.ənˈdɪp.ə.t̬i/ ' }, NOW);

    expect(card.text).toBe('Serendipity');
    expect(card.meaning).toBe('意外发现珍奇事物的本领');
    expect(card.phonetic).toBe('/ˌser.ənˈdɪp.ə.t̬i/');
    expect(card.status).toBe('new');
    expect(card.intervalDays).toBe(0);
    expect(card.easeFactor).toBe(2.5);
    expect(card.consecutiveCorrect).toBe(0);
    expect(card.dueAt).toBeUndefined();
    expect(card.lastReviewedAt).toBeUndefined();
    expect(card.createdAt).toBe(NOW);
  });

  it('enforces field length limits', () => {
    const card = createCard({ text: 'a'.repeat(120), meaning: 'b'.repeat(220), mnemonic: 'c'.repeat(300) }, NOW);

    expect(card.text).toHaveLength(80);
    expect(card.meaning).toHaveLength(180);
    expect(card.mnemonic).toHaveLength(240);
  });

  it('keeps explicit ids and generates unique ones otherwise', () => {
    expect(createCard({ id: ' w-1 ', text: 'alpha', meaning: 'first' }, NOW).id).toBe('w-1');

    const first = createCard({ text: 'alpha', meaning: 'first' }, NOW);
    const second = createCard({ text: 'alpha', meaning: 'first' }, NOW);
    expect(first.id).not.toBe(second.id);
    expect(first.id).toMatch(/^[0-9a-z]+-[0-9a-z]+-[0-9a-z]+$/);
  });

  it('drops examples without an English sentence', () => {
    const card = createCard(
      {
        text: 'Luminous',
        meaning: '发光的',
        examples: [
          { english: '  The moon was luminous. ', chinese: '月亮很明亮。' },
          { english: '   ', chinese: '空' },
        ],
      },
      NOW,
    );

    expect(card.examples).toEqual([{ english: 'The moon was luminous.', chinese: '月亮很明亮。' }]);
  });

  it('rejects blank text or meaning', () => {
    expect(() => createCard({ text: '  ', meaning: 'x' }, NOW)).toThrow(InvalidCardError);
    expect(() => createCard({ text: 'Solitude', meaning: '' }, NOW)).toThrow('Card "Solitude" needs a meaning');
  });

  it('uses the configured initial ease', () => {
    const card = createCard({ text: 'alpha', meaning: 'first' }, NOW, resolveSchedulerConfig({ initialEase: 2.2 }));
    expect(card.easeFactor).toBe(2.2);
  });
});

describe('grade', () => {
  it('moves a new card to reviewing with a one-day interval on know', () => {
    const card = createCard({ text: 'Ephemeral', meaning: '转瞬即逝的' }, NOW);

    const graded = grade(card, 'know', NOW);

    expect(graded).toMatchObject({
      status: 'reviewing',
      intervalDays: 1,
      dueAt: NEXT_DAY,
      lastReviewedAt: NOW,
      consecutiveCorrect: 1,
      easeFactor: 2.6,
    });
  });

  it('sends a card back to learning on forgot and lowers its ease', () => {
    const card = grade(createCard({ text: 'Ephemeral', meaning: '转瞬即逝的' }, NOW), 'know', NOW);

    const graded = grade(card, 'forgot', NEXT_DAY);

    expect(graded).toMatchObject({
      status: 'learning',
      intervalDays: 0,
      dueAt: NEXT_DAY,
      lastReviewedAt: NEXT_DAY,
      consecutiveCorrect: 0,
      easeFactor: 2.4,
    });
  });

  it('masters a card after three consecutive know grades', () => {
    let card: Card = createCard({ text: 'Resilience', meaning: '恢复力' }, NOW);
    const intervals: number[] = [];
    const eases: number[] = [];
    let clock = NOW;

    for (let step = 0; step < 3; step += 1) {
      card = grade(card, 'know', clock);
      intervals.push(card.intervalDays);
      eases.push(card.easeFactor);
      clock = addDaysIso(clock, card.intervalDays);
    }

    expect(intervals).toEqual([1, 3, 8]);
    expect(eases).toEqual([2.6, 2.7, 2.8]);
    expect(card.status).toBe('mastered');
    expect(card.consecutiveCorrect).toBe(3);
  });

  it('always resets interval and due time on forgot', () => {
    const cards: Card[] = [
      createCard({ text: 'alpha', meaning: 'first' }, NOW),
      scheduledCard({ id: 'r', status: 'reviewing', intervalDays: 12 }),
      scheduledCard({ id: 'm', status: 'mastered', intervalDays: 200, consecutiveCorrect: 7 }),
    ];

    for (const card of cards) {
      const graded = grade(card, 'forgot', NEXT_DAY);
      expect(graded.intervalDays).toBe(0);
      expect(graded.dueAt).toBe(NEXT_DAY);
      expect(graded.status).toBe('learning');
    }
  });

  it('increments the streak by one on every know grade', () => {
    const cards = [
      scheduledCard({ id: 'a', consecutiveCorrect: 0 }),
      scheduledCard({ id: 'b', consecutiveCorrect: 5, status: 'mastered' }),
    ];

    for (const card of cards) {
      expect(grade(card, 'know', NOW).consecutiveCorrect).toBe(card.consecutiveCorrect + 1);
    }
  });

  it('never lets ease drop below the floor', () => {
    let card: Card = createCard({ text: 'alpha', meaning: 'first' }, NOW);
    for (let step = 0; step < 20; step += 1) {
      card = grade(card, 'forgot', NOW);
      expect(card.easeFactor).toBeGreaterThanOrEqual(1.3);
    }
    expect(card.easeFactor).toBe(1.3);
  });

  it('grows the interval gently on vague without touching ease', () => {
    const reviewing = scheduledCard({ id: 'v', intervalDays: 10, easeFactor: 2.3, consecutiveCorrect: 2 });

    const graded = grade(reviewing, 'vague', NOW);

    expect(graded).toMatchObject({
      status: 'reviewing',
      intervalDays: 12,
      easeFactor: 2.3,
      consecutiveCorrect: 0,
      dueAt: '2026-03-07T12:00:00.000Z',
    });
  });

  it('promotes early-stage cards to reviewing on vague and keeps mastered cards mastered', () => {
    const learning = grade(createCard({ text: 'alpha', meaning: 'first' }, NOW), 'forgot', NOW);
    expect(grade(learning, 'vague', NOW)).toMatchObject({ status: 'reviewing', intervalDays: 1 });

    const mastered = scheduledCard({ id: 'm', status: 'mastered', intervalDays: 1 });
    expect(grade(mastered, 'vague', NOW)).toMatchObject({ status: 'mastered', intervalDays: 1 });
  });

  it('keeps a mastered card mastered on know even after a vague reset its streak', () => {
    const mastered = scheduledCard({ id: 'mv', status: 'mastered', intervalDays: 20, consecutiveCorrect: 4 });
    const vague = grade(mastered, 'vague', NOW);

    expect(vague.consecutiveCorrect).toBe(0);
    expect(grade(vague, 'know', NOW)).toMatchObject({ status: 'mastered', consecutiveCorrect: 1 });
  });

  it('applies ease steps finer than a hundredth', () => {
    const config = resolveSchedulerConfig({ knowEaseStep: 0.005, forgotEasePenalty: 0.003 });
    const card = scheduledCard({ id: 'fine', easeFactor: 2.5 });

    expect(grade(card, 'know', NOW, config).easeFactor).toBe(2.505);
    expect(grade(card, 'forgot', NOW, config).easeFactor).toBe(2.497);
  });

  it('restarts a relearned card at a one-day interval on know', () => {
    const learning = grade(scheduledCard({ id: 'l', intervalDays: 40 }), 'forgot', NOW);

    expect(grade(learning, 'know', NOW).intervalDays).toBe(1);
  });

  it('clamps long intervals at the configured maximum', () => {
    const card = scheduledCard({ id: 'long', status: 'mastered', intervalDays: 300, consecutiveCorrect: 9 });

    expect(grade(card, 'know', NOW).intervalDays).toBe(365);
    expect(grade(card, 'know', NOW, resolveSchedulerConfig({ maxIntervalDays: 180 })).intervalDays).toBe(180);
  });

  it('does not mutate the input card and is deterministic', () => {
    const card = scheduledCard({ id: 'pure' });
    const snapshot = { ...card };

    const first = grade(card, 'know', NOW);
    const second = grade(card, 'know', NOW);

    expect(card).toEqual(snapshot);
    expect(first).toEqual(second);
    expect(first).not.toBe(card);
  });

  it('rejects outcomes outside the closed set', () => {
    const card = scheduledCard({ id: 'bad' });

    expect(() => grade(card, 'easy' as Outcome, NOW)).toThrow(InvalidOutcomeError);
  });

  it('rejects malformed clocks', () => {
    const card = scheduledCard({ id: 'clock' });

    expect(() => grade(card, 'know', '2026-02-23 12:00')).toThrow(InvalidTimestampError);
  });
});

describe('previewIntervals', () => {
  it('previews the interval for each outcome', () => {
    expect(previewIntervals(createCard({ text: 'alpha', meaning: 'first' }, NOW))).toEqual({
      forgot: 0,
      vague: 1,
      know: 1,
    });
    expect(previewIntervals(scheduledCard({ id: 'p', intervalDays: 10, easeFactor: 2.5 }))).toEqual({
      forgot: 0,
      vague: 12,
      know: 25,
    });
  });
});

describe('selectDue', () => {
  const overdue = scheduledCard({ id: 'c', dueAt: '2026-02-21T12:00:00.000Z' });
  const dueNow = scheduledCard({ id: 'a', dueAt: NOW });
  const sameTime = scheduledCard({ id: 'b', dueAt: NOW });
  const future = scheduledCard({ id: 'd', dueAt: NEXT_DAY });
  const freshB = createCard({ id: 'new-b', text: 'beta', meaning: 'second' }, NOW);
  const freshA = createCard({ id: 'new-a', text: 'alpha', meaning: 'first' }, NOW);
  const cards: Card[] = [freshB, future, sameTime, freshA, dueNow, overdue];

  it('orders due reviews by due time and id, then new cards', () => {
    expect(selectDue(cards, NOW).map((card) => card.id)).toEqual(['c', 'a', 'b', 'new-a', 'new-b']);
  });

  it('never returns a scheduled card that is not yet due', () => {
    const selected = selectDue(cards, NOW);

    expect(selected).not.toContain(future);
    expect(selected.every((card) => card.status === 'new' || isCardDue(card, NOW))).toBe(true);
  });

  it('is idempotent and leaves the input order untouched', () => {
    const before = cards.map((card) => card.id);

    expect(selectDue(cards, NOW)).toEqual(selectDue(cards, NOW));
    expect(cards.map((card) => card.id)).toEqual(before);
  });

  it('includes cards once their due time arrives', () => {
    expect(selectDue([future], NEXT_DAY)).toEqual([future]);
  });

  it('returns an empty list when nothing is due', () => {
    expect(selectDue([future], NOW)).toEqual([]);
  });

  it('sorts unparseable due times first among scheduled cards', () => {
    const broken = scheduledCard({ id: 'z', dueAt: 'not-a-date' });
    expect(compareDueCards(broken, overdue)).toBeLessThan(0);
  });
});
