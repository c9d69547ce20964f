const INVISIBLE_CHARACTERS = /[\u00AD\u200B-\u200F\u2060\uFEFF]/g;

function clampMaxLength(maxLength: number): number {
  if (!Number.isFinite(maxLength)) {
    return 0;
  }
  return Math.max(0, Math.floor(maxLength));
}

function readText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof String) {
    return value.valueOf();
  }
  return '';
}

export function collapseWhitespace(value: string): string {
  return value.replace(INVISIBLE_CHARACTERS, '').trim().replace(/\s+/g, ' ');
}

export function normalizeBoundedText(value: unknown, maxLength: number): string {
  const text = readText(value);
  if (text.length === 0) {
    return '';
  }
  return collapseWhitespace(text).slice(0, clampMaxLength(maxLength));
}

export function normalizeOptionalBoundedText(value: unknown, maxLength: number): string | undefined {
  const normalized = normalizeBoundedText(value, maxLength);
  return normalized.length > 0 ? normalized : undefined;
}

// Full-width latin typed through a CJK input method should still match.
export function foldSearchText(value: string): string {
  return collapseWhitespace(value.normalize('NFKC')).toLocaleLowerCase();
}

export function includesFolded(haystack: string, needle: string): boolean {
  const foldedNeedle = foldSearchText(needle);
  if (foldedNeedle.length === 0) {
    return true;
  }
  return foldSearchText(haystack).includes(foldedNeedle);
}
