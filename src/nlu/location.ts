// src/nlu/location.ts

const TIME_WORDS = [
  'now', 'today', 'yesterday', 'last', 'this', 'next', 'week', 'month',
  'jan(?:uary)?', 'feb(?:ruary)?', 'mar(?:ch)?', 'apr(?:il)?', 'may', 'jun(?:e)?',
  'jul(?:y)?', 'aug(?:ust)?', 'sep(?:tember)?', 'oct(?:ober)?', 'nov(?:ember)?', 'dec(?:ember)?',
];

const TIME_WORD_PATTERN = new RegExp(TIME_WORDS.map(w => `\\b${w}\\b`).join('|'), 'gi');

const SPLIT_PATTERN = /\s+and\s+|,|;|\/|\|/i;

/**
 * Clean a raw location capture. Returns null when nothing usable is left.
 *
 * The steps run in a fixed order: parentheses go first so that "(today)"
 * becomes a bare time word, and punctuation is stripped before time words
 * so "Paris today." loses both.
 */
export function sanitizeLocation(raw: string | null | undefined): string | null {
  if (!raw) return null;

  const cleaned = raw
    .replace(/[()]/g, ' ')
    .trim()
    .replace(/[.,;:]+$/, '')
    .trim()
    .replace(TIME_WORD_PATTERN, '')
    .trim()
    .replace(/\s{2,}/g, ' ')
    .trim()
    .replace(/^,+|,+$/g, '');

  return cleaned || null;
}

/** "Paris and Tokyo, London" → ["Paris", "Tokyo", "London"] */
export function splitLocations(raw: string | null | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(SPLIT_PATTERN)
    .map(part => part.trim())
    .filter(part => part.length > 0);
}
