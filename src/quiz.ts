import { Card, WordExample } from './types';

export type StudyMode = 'card' | 'en-zh' | 'zh-en' | 'audio';

export const STUDY_MODE_HINTS: Record<StudyMode, string> = {
  card: '单词详情',
  'en-zh': '英-中模式，看英文回忆中文',
  'zh-en': '中-英模式，看中文回忆英文',
  audio: '听力模式，听英文回忆单词',
};

export interface QuizPrompt {
  mode: StudyMode;
  /** Text shown before the reveal; `null` in audio mode where the prompt is only spoken. */
  prompt: string | null;
  /** Text the host should offer to play through text-to-speech. */
  spoken: string | null;
  answer: string;
  example?: WordExample;
}

export type SpellingSlotState = 'correct' | 'wrong' | 'pending';

export interface SpellingSlot {
  /** `undefined` for characters typed past the end of the word. */
  expected?: string;
  typed?: string;
  state: SpellingSlotState;
}

export interface SpellingCheck {
  slots: SpellingSlot[];
  /** Index of the next slot to type into, or `null` once every letter has input. */
  activeIndex: number | null;
  complete: boolean;
  correct: boolean;
  /** Input after trimming to the allowed overflow. */
  input: string;
}

export const SPELLING_OVERFLOW_CHARS = 3;
const MASK_PADDING = 2;

function sameLetter(a: string, b: string): boolean {
  return a.toLocaleLowerCase() === b.toLocaleLowerCase();
}

export function checkSpelling(target: string, input: string): SpellingCheck {
  const expected = Array.from(target);
  const typed = Array.from(input).slice(0, expected.length + SPELLING_OVERFLOW_CHARS);
  const slots: SpellingSlot[] = [];

  for (let index = 0; index < Math.max(expected.length, typed.length); index += 1) {
    const expectedChar = expected[index];
    const typedChar = typed[index];
    if (typedChar === undefined) {
      slots.push({ expected: expectedChar, state: 'pending' });
      continue;
    }
    const state = expectedChar !== undefined && sameLetter(expectedChar, typedChar) ? 'correct' : 'wrong';
    slots.push({ expected: expectedChar, typed: typedChar, state });
  }

  const trimmedInput = typed.join('');
  return {
    slots,
    activeIndex: typed.length < expected.length ? typed.length : null,
    complete: typed.length >= expected.length,
    correct: sameLetter(trimmedInput.trim(), target),
    input: trimmedInput,
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function maskWordInSentence(sentence: string, word: string): string {
  if (word.length === 0) {
    return sentence;
  }
  const mask = '_'.repeat(Array.from(word).length + MASK_PADDING);
  return sentence.replace(new RegExp(escapeRegExp(word), 'gi'), mask);
}

export function buildQuizPrompt(card: Card, mode: StudyMode): QuizPrompt {
  const example = card.examples?.[0];
  switch (mode) {
    case 'card':
    case 'en-zh':
      return { mode, prompt: card.text, spoken: card.text, answer: card.meaning, example };
    case 'zh-en':
      return {
        mode,
        prompt: card.meaning,
        spoken: null,
        answer: card.text,
        example: example && { ...example, english: maskWordInSentence(example.english, card.text) },
      };
    case 'audio':
      return { mode, prompt: null, spoken: card.text, answer: card.text, example };
  }
}
