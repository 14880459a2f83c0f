import { ALL_SEARCH_FIELDS } from './types.js';
import type { SearchField, SearchOptions, SearchResult, VerseRecord } from './types.js';
import { InvalidQueryError } from './errors.js';

/**
 * Relevance weights. With equal term coverage, a translation match always
 * outranks a commentary match, which always outranks an Arabic match:
 * each weight gap times FIELD_SHARE exceeds PROXIMITY_SHARE.
 */
export const FIELD_WEIGHTS: Readonly<Record<SearchField, number>> = {
  translation: 1.0,
  commentary: 0.6,
  arabic: 0.2
};

const COVERAGE_SHARE = 0.6;
const FIELD_SHARE = 0.3;
const PROXIMITY_SHARE = 0.1;

/**
 * Lower-cased translation and commentary, computed once per record list
 */
interface FoldedText {
  translation: string;
  commentary: string;
}

const foldedCache = new WeakMap<readonly VerseRecord[], FoldedText[]>();

function foldedTexts(records: readonly VerseRecord[]): FoldedText[] {
  let folded = foldedCache.get(records);
  if (!folded) {
    folded = records.map(r => ({
      translation: r.translation.toLowerCase(),
      commentary: r.commentary.toLowerCase()
    }));
    foldedCache.set(records, folded);
  }
  return folded;
}

/**
 * A query split into the forms each field compares against
 */
interface PreparedQuery {
  phrase: string;
  foldedPhrase: string;
  terms: string[];
  foldedTerms: string[];
}

function prepareQuery(query: string): PreparedQuery {
  const phrase = query.trim();
  if (!phrase) {
    throw new InvalidQueryError('Search query must not be empty');
  }
  const terms = Array.from(new Set(phrase.split(/\s+/)));
  return {
    phrase,
    foldedPhrase: phrase.toLowerCase(),
    terms,
    foldedTerms: terms.map(t => t.toLowerCase())
  };
}

function resolveFields(fields: Iterable<SearchField> | undefined): SearchField[] {
  if (fields === undefined) return [...ALL_SEARCH_FIELDS];

  const requested = new Set<string>(fields);
  for (const field of requested) {
    if (!isSearchField(field)) {
      throw new InvalidQueryError(`Unknown search field "${field}"`);
    }
  }
  return ALL_SEARCH_FIELDS.filter(f => requested.has(f));
}

function resolveLimit(limit: number | undefined): number {
  if (limit === undefined) return Infinity;
  if (!Number.isInteger(limit)) {
    throw new InvalidQueryError(`Search limit must be an integer, got ${limit}`);
  }
  return Math.max(0, limit);
}

export function isSearchField(value: string): value is SearchField {
  const names: readonly string[] = ALL_SEARCH_FIELDS;
  return names.includes(value);
}

/**
 * Score one verse, or return null when it does not qualify.
 *
 * A verse qualifies only when the whole query occurs in an enabled field.
 * Individual terms then feed the score: it is the best per-field score over
 * every field holding at least one term, where a field scores
 *   0.6 * (terms found in the field / terms)
 * + 0.3 * field weight
 * + 0.1 * (1 - offset of the earliest hit / field length).
 */
function scoreRecord(
  record: VerseRecord,
  folded: FoldedText,
  query: PreparedQuery,
  fields: SearchField[]
): { score: number; matchedFields: Set<SearchField> } | null {
  const matchedFields = new Set<SearchField>();
  let phraseFound = false;
  let best = 0;

  for (const field of fields) {
    const isArabic = field === 'arabic';
    const haystack = isArabic ? record.arabicText : folded[field];
    if (!haystack) continue;

    const phrase = isArabic ? query.phrase : query.foldedPhrase;
    const terms = isArabic ? query.terms : query.foldedTerms;

    const phrasePos = haystack.indexOf(phrase);
    let firstPos = phrasePos;
    let termsInField = 0;

    terms.forEach(term => {
      const pos = haystack.indexOf(term);
      if (pos < 0) return;
      termsInField++;
      if (firstPos < 0 || pos < firstPos) firstPos = pos;
    });

    if (firstPos < 0) continue;

    if (phrasePos >= 0) {
      phraseFound = true;
    }
    matchedFields.add(field);

    const coverage = termsInField / terms.length;
    const proximity = 1 - firstPos / haystack.length;
    const score = COVERAGE_SHARE * coverage + FIELD_SHARE * FIELD_WEIGHTS[field] + PROXIMITY_SHARE * proximity;
    if (score > best) best = score;
  }

  if (!phraseFound) {
    return null;
  }
  return { score: Math.min(1, best), matchedFields };
}

/**
 * Substring search over the given records.
 * Results are ordered by descending score, ties by ascending sequenceIndex.
 */
export function searchRecords(records: readonly VerseRecord[], query: string, options: SearchOptions = {}): SearchResult[] {
  const prepared = prepareQuery(query);
  const fields = resolveFields(options.fields);
  const limit = resolveLimit(options.limit);
  if (fields.length === 0 || limit === 0) return [];

  const folded = foldedTexts(records);

  const results: SearchResult[] = [];
  records.forEach((record, i) => {
    const scored = scoreRecord(record, folded[i], prepared, fields);
    if (scored) {
      results.push({
        verseKey: record.verseKey,
        relevanceScore: scored.score,
        matchedFields: scored.matchedFields,
        record
      });
    }
  });

  results.sort((a, b) => b.relevanceScore - a.relevanceScore || a.record.sequenceIndex - b.record.sequenceIndex);

  return results.length > limit ? results.slice(0, limit) : results;
}
