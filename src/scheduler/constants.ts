export const EASE_INITIAL = 2.5;
export const EASE_MIN = 1.3;
export const EASE_KNOW_STEP = 0.1;
export const EASE_FORGOT_STEP = 0.2;
/** Ease values and ease steps are kept on a 0.0001 grid. */
export const EASE_GRID = 10000;

export const VAGUE_INTERVAL_MULTIPLIER = 1.2;
export const MASTERY_STREAK = 3;
export const MAX_INTERVAL_DAYS = 365;
export const INTERVAL_HARD_LIMIT_DAYS = 36500;

export const TEXT_MAX_LENGTH = 80;
export const MEANING_MAX_LENGTH = 180;
export const PHONETIC_MAX_LENGTH = 80;
export const EXAMPLE_MAX_LENGTH = 240;
export const MNEMONIC_MAX_LENGTH = 240;
