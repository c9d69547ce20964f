import { DAY_MS, parseIsoMs } from './time';

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;
const NOW_THRESHOLD_MS = 60 * 1000;

export function formatDueLabel(dueAt: string | undefined, clockIso: string): string {
  if (dueAt === undefined) {
    return 'New';
  }
  const dueMs = parseIsoMs(dueAt.trim());
  const nowMs = parseIsoMs(clockIso.trim());
  if (dueMs === null || nowMs === null) {
    return 'Needs schedule repair';
  }

  const deltaMs = dueMs - nowMs;
  const distanceMs = Math.abs(deltaMs);
  if (distanceMs <= NOW_THRESHOLD_MS) {
    return 'Due now';
  }
  if (deltaMs < 0) {
    if (distanceMs < HOUR_MS) {
      return `Overdue ${Math.max(1, Math.floor(distanceMs / MINUTE_MS))}m`;
    }
    if (distanceMs < DAY_MS) {
      return `Overdue ${Math.max(1, Math.floor(distanceMs / HOUR_MS))}h`;
    }
    return `Overdue ${Math.max(1, Math.floor(distanceMs / DAY_MS))}d`;
  }
  if (deltaMs < HOUR_MS) {
    return `Due in ${Math.max(1, Math.floor(deltaMs / MINUTE_MS))}m`;
  }
  if (deltaMs < DAY_MS) {
    return `Due in ${Math.max(1, Math.floor(deltaMs / HOUR_MS))}h`;
  }
  return `Due in ${Math.max(1, Math.floor(deltaMs / DAY_MS))}d`;
}
