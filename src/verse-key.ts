import type { VerseKey } from './types.js';
import { MalformedKeyError } from './errors.js';

export const SURAH_COUNT = 114;

// "2:255", with optional surrounding whitespace
const VERSE_KEY_PATTERN = /^\s*(\d+):(\d+)\s*$/;

// "2:255" or "2:1-10" (inclusive ayah range within one surah)
const VERSE_REFERENCE_PATTERN = /^\s*(\d+):(\d+)(?:\s*-\s*(\d+))?\s*$/;

/**
 * An inclusive ayah range within one surah.
 */
export interface VerseReference {
  surah: number;
  fromAyah: number;
  toAyah: number;
}

function toPositiveInt(digits: string): number | null {
  const n = parseInt(digits, 10);
  return Number.isSafeInteger(n) && n >= 1 ? n : null;
}

function checkSurah(raw: string, surah: number | null): number {
  if (surah === null || surah > SURAH_COUNT) {
    throw new MalformedKeyError(raw, `surah must be an integer in 1..${SURAH_COUNT}`);
  }
  return surah;
}

function checkAyah(raw: string, ayah: number | null): number {
  if (ayah === null) {
    throw new MalformedKeyError(raw, 'ayah must be a positive integer');
  }
  return ayah;
}

/**
 * Parse "surah:ayah". Leading zeros are accepted and dropped.
 */
export function parseVerseKey(raw: string): VerseKey {
  const match = raw.match(VERSE_KEY_PATTERN);
  if (!match) {
    throw new MalformedKeyError(raw, 'expected "surah:ayah"');
  }
  const surah = checkSurah(raw, toPositiveInt(match[1]));
  const ayah = checkAyah(raw, toPositiveInt(match[2]));
  return { surah, ayah };
}

/**
 * Like parseVerseKey, but returns null instead of throwing.
 */
export function tryParseVerseKey(raw: string): VerseKey | null {
  try {
    return parseVerseKey(raw);
  } catch (err) {
    if (err instanceof MalformedKeyError) return null;
    throw err;
  }
}

export function formatVerseKey(key: VerseKey): string {
  return `${key.surah}:${key.ayah}`;
}

/**
 * Canonical order: surah ascending, then ayah ascending
 */
export function compareVerseKeys(a: VerseKey, b: VerseKey): number {
  return a.surah - b.surah || a.ayah - b.ayah;
}

/**
 * Accept either a parsed key or its string form.
 */
export function toVerseKey(key: VerseKey | string): VerseKey {
  return typeof key === 'string' ? parseVerseKey(key) : key;
}

/**
 * Parse a reference query such as "2:255" or "2:1-10".
 * Returns null when the text is not shaped like a reference at all, and
 * throws MalformedKeyError when it is shaped like one but out of range.
 */
export function parseVerseReference(query: string): VerseReference | null {
  const match = query.match(VERSE_REFERENCE_PATTERN);
  if (!match) return null;

  const raw = query.trim();
  const surah = checkSurah(raw, toPositiveInt(match[1]));
  const fromAyah = checkAyah(raw, toPositiveInt(match[2]));
  const toAyah = match[3] === undefined ? fromAyah : checkAyah(raw, toPositiveInt(match[3]));

  if (toAyah < fromAyah) {
    throw new MalformedKeyError(raw, 'range end precedes range start');
  }
  return { surah, fromAyah, toAyah };
}
