import { INTERVAL_HARD_LIMIT_DAYS } from '../scheduler/constants';

const WEEK_IN_DAYS = 7;
const MONTH_IN_DAYS = 30;
const YEAR_IN_DAYS = 365;

/** Compact label for a scheduled gap in whole days, as shown under the grading buttons. */
export function formatIntervalLabel(days: number): string {
  const normalizedDays = days === Number.POSITIVE_INFINITY ? INTERVAL_HARD_LIMIT_DAYS : Math.floor(days);

  if (!Number.isFinite(normalizedDays) || normalizedDays <= 0) {
    return 'now';
  }
  if (normalizedDays < WEEK_IN_DAYS) {
    return `${normalizedDays}d`;
  }
  if (normalizedDays < 60) {
    return `${Math.floor(normalizedDays / WEEK_IN_DAYS)}w`;
  }
  if (normalizedDays < YEAR_IN_DAYS) {
    return `${Math.floor(normalizedDays / MONTH_IN_DAYS)}mo`;
  }
  return `${Math.floor(normalizedDays / YEAR_IN_DAYS)}y`;
}
