import { createHash, randomInt } from 'node:crypto';
import { format, isValid, parse } from 'date-fns';
import type { VerseRecord } from './types.js';
import { InvalidQueryError, NotFoundError } from './errors.js';

export const DAY_FORMAT = 'yyyy-MM-dd';

function requireVerses(records: readonly VerseRecord[]): void {
  if (records.length === 0) {
    throw new NotFoundError('No verses available');
  }
}

/**
 * Calendar day of a date in local time, as "yyyy-MM-dd"
 */
export function dayKey(date: Date): string {
  if (!isValid(date)) {
    throw new InvalidQueryError('Invalid date');
  }
  return format(date, DAY_FORMAT);
}

/**
 * Parse "yyyy-MM-dd" strictly; "2024-02-30" and "2024-2-3" are rejected.
 */
export function parseDay(text: string): Date {
  const date = parse(text, DAY_FORMAT, new Date());
  if (!isValid(date) || format(date, DAY_FORMAT) !== text) {
    throw new InvalidQueryError(`Invalid date "${text}", expected ${DAY_FORMAT}`);
  }
  return date;
}

/**
 * Map a day key onto 0..size-1. SHA-256 spreads consecutive days evenly;
 * 48 bits of the digest keep the modulo bias negligible for any corpus size.
 */
export function dayIndex(day: string, size: number): number {
  const digest = createHash('sha256').update(day).digest();
  return digest.readUIntBE(0, 6) % size;
}

/**
 * Uniformly random verse; each call draws fresh entropy.
 */
export function pickRandom(records: readonly VerseRecord[]): VerseRecord {
  requireVerses(records);
  return records[randomInt(records.length)];
}

/**
 * The verse for a calendar day. Same day and same records give the same verse.
 */
export function pickOfDay(records: readonly VerseRecord[], date: Date): VerseRecord {
  requireVerses(records);
  return records[dayIndex(dayKey(date), records.length)];
}
