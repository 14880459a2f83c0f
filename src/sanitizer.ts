import * as cheerio from 'cheerio';

/**
 * Markup-to-text cleanup for commentary (and translation) fragments.
 *
 * The output never contains a tag delimiter, and sanitizing the output again
 * returns it unchanged. Nothing here throws: malformed markup is stripped on a
 * best-effort basis.
 */

// Elements whose content is never display text
const SCRIPT_STYLE_PATTERN = /<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;

// Block-level tags separate words; inline tags (b, i, em, span...) do not
const BLOCK_TAG_PATTERN = /<\/?(?:p|div|br|hr|h[1-6]|li|ul|ol|blockquote|tr|td|th|table|section)\b[^>]*>/gi;

// Tags the parser left as text, e.g. decoded from "&lt;b&gt;"
const ANY_TAG_PATTERN = /<\/?[a-zA-Z!?][^<>]*>/g;

const STRAY_DELIMITER_PATTERN = /[<>]/g;
const WHITESPACE_PATTERN = /\s+/g;

function markupToText(input: string): string {
  const spaced = input.replace(SCRIPT_STYLE_PATTERN, ' ').replace(BLOCK_TAG_PATTERN, ' ');
  try {
    const $ = cheerio.load(spaced, null, false);
    $('script, style').remove();
    return $.root().text();
  } catch (err) {
    console.warn(`Markup parse failed, falling back to tag stripping: ${err}`);
    return spaced.replace(ANY_TAG_PATTERN, '');
  }
}

function sanitizeOnce(input: string): string {
  return markupToText(input)
    .replace(BLOCK_TAG_PATTERN, ' ')
    .replace(ANY_TAG_PATTERN, '')
    .replace(STRAY_DELIMITER_PATTERN, '')
    .replace(WHITESPACE_PATTERN, ' ')
    .trim();
}

/**
 * Strip tags, decode character references, collapse whitespace and trim.
 */
export function sanitizeText(input: string): string {
  if (!input) return '';

  // Decoding can expose more markup ("&amp;lt;b&amp;gt;"), so run to a fixpoint.
  // After the first pass every pass that changes the text also shortens it.
  let current = sanitizeOnce(input);
  for (;;) {
    const next = sanitizeOnce(current);
    if (next === current || next.length >= current.length) {
      return next;
    }
    current = next;
  }
}

/**
 * True when the text still carries a tag delimiter.
 */
export function containsMarkup(text: string): boolean {
  return text.includes('<') || text.includes('>');
}
