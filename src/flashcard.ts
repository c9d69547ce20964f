import { StudyMode } from './quiz';

export type FlashcardSide = 'front' | 'back';

export interface FlashcardVisibility {
  showWord: boolean;
  showPhonetic: boolean;
  showMeaning: boolean;
  showExample: boolean;
  /** Example is rendered but blurred until the hint is used. */
  blurExample: boolean;
  showMnemonic: boolean;
  showOutcomes: boolean;
}

export interface FlashcardContent {
  hasExample: boolean;
  hasMnemonic: boolean;
}

export function flipFlashcardSide(side: FlashcardSide): FlashcardSide {
  return side === 'front' ? 'back' : 'front';
}

export function getFlashcardVisibility(
  mode: StudyMode,
  side: FlashcardSide,
  content: FlashcardContent,
): FlashcardVisibility {
  const revealed = side === 'back';
  if (mode === 'card') {
    return {
      showWord: true,
      showPhonetic: true,
      showMeaning: true,
      showExample: content.hasExample,
      blurExample: false,
      showMnemonic: content.hasMnemonic,
      showOutcomes: true,
    };
  }
  return {
    showWord: mode === 'en-zh' || revealed,
    showPhonetic: mode === 'en-zh' || revealed,
    showMeaning: mode === 'zh-en' || revealed,
    showExample: content.hasExample,
    blurExample: content.hasExample && !revealed && mode !== 'zh-en',
    showMnemonic: content.hasMnemonic && revealed,
    showOutcomes: revealed,
  };
}
