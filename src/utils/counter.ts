function toCount(value: unknown): number | null {
  const raw = value instanceof Number ? value.valueOf() : value;
  if (typeof raw !== 'number' || !Number.isFinite(raw)) {
    return null;
  }
  const normalized = Math.floor(raw);
  return normalized >= 0 ? normalized : null;
}

export function formatCounterDisplay(value: unknown): string {
  const count = toCount(value);
  return count === null ? '--' : count.toLocaleString('en-US');
}

/** "current / total" header shown on every study screen; current is 1-based and stops at total. */
export function formatProgressCounter(done: number, total: number): string {
  const safeTotal = toCount(total);
  const safeDone = toCount(done);
  if (safeTotal === null || safeDone === null) {
    return '-- / --';
  }
  if (safeTotal === 0) {
    return '0 / 0';
  }
  const position = Math.min(safeTotal, safeDone + 1);
  return `${formatCounterDisplay(position)} / ${formatCounterDisplay(safeTotal)}`;
}
