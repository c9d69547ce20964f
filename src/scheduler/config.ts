import {
  EASE_FORGOT_STEP,
  EASE_GRID,
  EASE_INITIAL,
  EASE_KNOW_STEP,
  EASE_MIN,
  INTERVAL_HARD_LIMIT_DAYS,
  MASTERY_STREAK,
  MAX_INTERVAL_DAYS,
  VAGUE_INTERVAL_MULTIPLIER,
} from './constants';

export interface SchedulerConfig {
  initialEase: number;
  /** Never below 1.3; lower values are raised to it. */
  minEase: number;
  knowEaseStep: number;
  forgotEasePenalty: number;
  vagueIntervalMultiplier: number;
  /** Consecutive `know` grades needed for a card to count as mastered. */
  masteryStreak: number;
  /** Interval growth is clamped here rather than rejected. */
  maxIntervalDays: number;
}

export const DEFAULT_SCHEDULER_CONFIG: Readonly<SchedulerConfig> = Object.freeze({
  initialEase: EASE_INITIAL,
  minEase: EASE_MIN,
  knowEaseStep: EASE_KNOW_STEP,
  forgotEasePenalty: EASE_FORGOT_STEP,
  vagueIntervalMultiplier: VAGUE_INTERVAL_MULTIPLIER,
  masteryStreak: MASTERY_STREAK,
  maxIntervalDays: MAX_INTERVAL_DAYS,
});

/** Rounds onto the ease grid so repeated steps do not drift (2.5 + 0.1 stays 2.6). */
export function roundEase(value: number): number {
  return Math.round(value * EASE_GRID) / EASE_GRID;
}

function finiteOr(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function resolveSchedulerConfig(overrides: Partial<SchedulerConfig> = {}): SchedulerConfig {
  const minEase = Math.max(EASE_MIN, finiteOr(overrides.minEase, DEFAULT_SCHEDULER_CONFIG.minEase));
  return {
    initialEase: Math.max(minEase, finiteOr(overrides.initialEase, DEFAULT_SCHEDULER_CONFIG.initialEase)),
    minEase,
    knowEaseStep: roundEase(Math.max(0, finiteOr(overrides.knowEaseStep, DEFAULT_SCHEDULER_CONFIG.knowEaseStep))),
    forgotEasePenalty: roundEase(
      Math.max(0, finiteOr(overrides.forgotEasePenalty, DEFAULT_SCHEDULER_CONFIG.forgotEasePenalty)),
    ),
    vagueIntervalMultiplier: Math.max(
      1,
      finiteOr(overrides.vagueIntervalMultiplier, DEFAULT_SCHEDULER_CONFIG.vagueIntervalMultiplier),
    ),
    masteryStreak: Math.max(1, Math.floor(finiteOr(overrides.masteryStreak, DEFAULT_SCHEDULER_CONFIG.masteryStreak))),
    maxIntervalDays: Math.min(
      INTERVAL_HARD_LIMIT_DAYS,
      Math.max(1, Math.floor(finiteOr(overrides.maxIntervalDays, DEFAULT_SCHEDULER_CONFIG.maxIntervalDays))),
    ),
  };
}
