import type { SearchResult, VerseRecord } from './types.js';

/** Commentary shown by formatVerse unless full text is asked for */
export const EXCERPT_LENGTH = 200;

const RULE = '-'.repeat(60);

/**
 * Cut text to at most `max` characters, marking the cut with "..."
 */
export function excerpt(text: string, max: number = EXCERPT_LENGTH): string {
  if (text.length <= max) return text;
  return `${text.slice(0, max).trimEnd()}...`;
}

/**
 * Plain-text lines for one verse, as printed by the command-line scripts
 */
export function formatVerse(record: VerseRecord, fullCommentary = false): string[] {
  const lines = [
    `Verse ${record.verseKey}`,
    RULE,
    `Surah ${record.key.surah}, Ayah ${record.key.ayah}`,
    '',
    'Arabic:',
    record.arabicText,
    '',
    'Translation:',
    record.translation || '(none)'
  ];

  if (record.commentary) {
    lines.push('', fullCommentary ? 'Commentary:' : 'Commentary (excerpt):');
    lines.push(fullCommentary ? record.commentary : excerpt(record.commentary));
  }
  return lines;
}

// "1. [2:255] 0.917 translation, commentary"
export function formatSearchHit(result: SearchResult, rank: number): string[] {
  const fields = Array.from(result.matchedFields).join(', ');
  const preview = result.record.translation || result.record.commentary;
  return [
    `${rank}. [${result.verseKey}] ${result.relevanceScore.toFixed(3)} ${fields}`,
    `   ${excerpt(preview, 120)}`
  ];
}
