export const DAY_MS = 24 * 60 * 60 * 1000;
const EPOCH_ISO = '1970-01-01T00:00:00.000Z';
const EPOCH_MS = Date.parse(EPOCH_ISO);
const MIN_DATE_MS = -8640000000000000;
const MAX_DATE_MS = 8640000000000000;
const ISO_DATE_TIME_RE = /^[+-]?\d{4,6}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d{1,3})?(?:[Zz]|[+-]\d{2}:\d{2})$/;

export function isIsoDateTime(value: unknown): value is string {
  return typeof value === 'string' && ISO_DATE_TIME_RE.test(value) && Number.isFinite(Date.parse(value));
}

export function parseIsoMs(iso: unknown): number | null {
  if (!isIsoDateTime(iso)) {
    return null;
  }
  const parsed = Date.parse(iso);
  return Number.isFinite(parsed) ? parsed : null;
}

function safeNowMs(): number {
  const runtimeNow = Date.now();
  return Number.isFinite(runtimeNow) ? runtimeNow : EPOCH_MS;
}

export function toSafeIso(ms: number): string {
  const safeMs = Number.isFinite(ms)
    ? Math.min(MAX_DATE_MS, Math.max(MIN_DATE_MS, ms))
    : EPOCH_MS;
  return new Date(safeMs).toISOString();
}

export function toCanonicalIso(iso: string): string {
  const parsed = parseIsoMs(iso);
  return parsed === null ? iso : toSafeIso(parsed);
}

export function nowIso(): string {
  return toSafeIso(safeNowMs());
}

export function addDaysIso(iso: string, days: number): string {
  const base = parseIsoMs(iso);
  const start = base === null ? safeNowMs() : base;
  const safeDays = Number.isFinite(days) ? days : 0;
  return toSafeIso(start + safeDays * DAY_MS);
}

/**
 * A missing due date means the card has never been scheduled and is always due.
 * An unparseable one is never due; repair it through the deck repository first.
 */
export function isDue(dueAt: string | undefined, now: string): boolean {
  const current = parseIsoMs(now);
  if (current === null) {
    return false;
  }
  if (dueAt === undefined) {
    return true;
  }
  const due = parseIsoMs(dueAt);
  return due !== null && due <= current;
}
