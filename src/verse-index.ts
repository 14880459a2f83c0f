import type { IntegrityIssue, IntegrityReport, SearchOptions, SearchResult, VerseKey, VerseRecord } from './types.js';
import { NotFoundError } from './errors.js';
import { compareVerseKeys, formatVerseKey, parseVerseReference, toVerseKey } from './verse-key.js';
import { parseDatasets, type DatasetFragments } from './loader.js';
import { sanitizeText } from './sanitizer.js';
import { validateIndex } from './integrity.js';
import { searchRecords } from './search.js';
import { pickOfDay, pickRandom } from './selector.js';

/**
 * A built index and the report produced while building it
 */
export interface BuildResult {
  index: VerseIndex;
  report: IntegrityReport;
}

/**
 * Immutable collection of verse records with by-key, positional and by-surah
 * lookups. Safe to share between any number of readers.
 */
export class VerseIndex {
  private readonly ordered: readonly VerseRecord[];
  private readonly byKey: ReadonlyMap<string, VerseRecord>;
  private readonly bySurah: ReadonlyMap<number, readonly VerseRecord[]>;

  /**
   * `records` must already be in canonical order with matching sequence
   * indexes; use buildIndex() to get one from raw datasets.
   */
  constructor(records: readonly VerseRecord[]) {
    this.ordered = Object.freeze([...records]);

    const byKey = new Map<string, VerseRecord>();
    const bySurah = new Map<number, VerseRecord[]>();
    for (const record of this.ordered) {
      if (!byKey.has(record.verseKey)) {
        byKey.set(record.verseKey, record);
      }
      const list = bySurah.get(record.key.surah);
      if (list) {
        list.push(record);
      } else {
        bySurah.set(record.key.surah, [record]);
      }
    }
    for (const list of bySurah.values()) {
      Object.freeze(list);
    }

    this.byKey = byKey;
    this.bySurah = bySurah;
  }

  size(): number {
    return this.ordered.length;
  }

  has(key: VerseKey | string): boolean {
    return this.byKey.has(formatVerseKey(toVerseKey(key)));
  }

  /**
   * Look up one verse. Throws MalformedKeyError for an unparsable string key
   * and NotFoundError for a key outside the corpus.
   */
  get(key: VerseKey | string): VerseRecord {
    const verseKey = formatVerseKey(toVerseKey(key));
    const record = this.byKey.get(verseKey);
    if (!record) {
      throw new NotFoundError(`Verse not found: ${verseKey}`);
    }
    return record;
  }

  /**
   * The verse at a 0-based position in canonical order
   */
  at(sequenceIndex: number): VerseRecord {
    const record = Number.isInteger(sequenceIndex) ? this.ordered[sequenceIndex] : undefined;
    if (!record) {
      throw new NotFoundError(`No verse at position ${sequenceIndex} (corpus has ${this.ordered.length})`);
    }
    return record;
  }

  records(): readonly VerseRecord[] {
    return this.ordered;
  }

  surahNumbers(): number[] {
    return Array.from(this.bySurah.keys()).sort((a, b) => a - b);
  }

  /**
   * All verses of one surah, in ayah order
   */
  surah(surah: number): readonly VerseRecord[] {
    const verses = this.bySurah.get(surah);
    if (!verses) {
      throw new NotFoundError(`Surah not found: ${surah}`);
    }
    return verses;
  }

  /**
   * Verses of one surah with fromAyah <= ayah <= toAyah. Empty when nothing
   * falls in the range.
   */
  range(surah: number, fromAyah: number, toAyah: number): readonly VerseRecord[] {
    const verses = this.bySurah.get(surah) ?? [];
    return verses.filter(v => v.key.ayah >= fromAyah && v.key.ayah <= toAyah);
  }

  /**
   * Resolve a reference query ("2:255", "2:1-10"). Null when the query is not
   * a reference; MalformedKeyError when it is one but out of range.
   */
  lookupReference(query: string): readonly VerseRecord[] | null {
    const reference = parseVerseReference(query);
    if (!reference) return null;
    return this.range(reference.surah, reference.fromAyah, reference.toAyah);
  }

  search(query: string, options: SearchOptions = {}): SearchResult[] {
    return searchRecords(this.ordered, query, options);
  }

  pickRandom(): VerseRecord {
    return pickRandom(this.ordered);
  }

  pickOfDay(date: Date): VerseRecord {
    return pickOfDay(this.ordered, date);
  }
}

/**
 * Merge parsed fragments into an index. Iterates the anchor dataset in
 * canonical order; gaps in the other two datasets are recorded, not fatal.
 */
export function buildIndexFromFragments(fragments: DatasetFragments): BuildResult {
  const issues: IntegrityIssue[] = [...fragments.issues];
  const anchors = Array.from(fragments.arabic.values()).sort((a, b) => compareVerseKeys(a.key, b.key));

  // Cross-referenced commentary is shared by several verses; sanitize it once
  const sanitizedCommentary = new Map<string, string>();

  const records = anchors.map((fragment, sequenceIndex): VerseRecord => {
    const { verseKey } = fragment;

    const rawTranslation = fragments.translation.get(verseKey);
    const translation = rawTranslation === undefined ? '' : sanitizeText(rawTranslation);
    if (rawTranslation === undefined) {
      issues.push({ dataset: 'translation', verseKey, kind: 'missing', message: `No translation for ${verseKey}` });
    } else if (!translation) {
      issues.push({ dataset: 'translation', verseKey, kind: 'missing', message: `Translation for ${verseKey} is empty` });
    }

    const commentaryFragment = fragments.commentary.get(verseKey);
    let commentary = '';
    if (commentaryFragment) {
      const cached = sanitizedCommentary.get(commentaryFragment.sourceKey);
      commentary = cached ?? sanitizeText(commentaryFragment.text);
      if (cached === undefined) {
        sanitizedCommentary.set(commentaryFragment.sourceKey, commentary);
      }
    }
    if (!commentaryFragment) {
      issues.push({ dataset: 'commentary', verseKey, kind: 'missing', message: `No commentary for ${verseKey}` });
    } else if (!commentary) {
      issues.push({ dataset: 'commentary', verseKey, kind: 'missing', message: `Commentary for ${verseKey} is empty` });
    }

    return Object.freeze({
      key: Object.freeze({ surah: fragment.key.surah, ayah: fragment.key.ayah }),
      verseKey,
      arabicText: fragment.text,
      translation,
      commentary,
      commentarySourceKey: commentary && commentaryFragment ? commentaryFragment.sourceKey : null,
      sequenceIndex
    });
  });

  for (const verseKey of fragments.translation.keys()) {
    if (!fragments.arabic.has(verseKey)) {
      issues.push({ dataset: 'translation', verseKey, kind: 'orphan', message: `Translation for ${verseKey} has no Arabic verse` });
    }
  }
  for (const verseKey of fragments.commentary.keys()) {
    if (!fragments.arabic.has(verseKey)) {
      issues.push({ dataset: 'commentary', verseKey, kind: 'orphan', message: `Commentary for ${verseKey} has no Arabic verse` });
    }
  }

  const index = new VerseIndex(records);
  return { index, report: validateIndex(index, issues) };
}

/**
 * Build an index from the three raw keyed sources (parsed JSON values).
 * Throws MalformedKeyError or SchemaError only when the Arabic dataset is
 * unusable.
 */
export function buildIndex(arabicSource: unknown, translationSource: unknown, commentarySource: unknown): BuildResult {
  const fragments = parseDatasets({
    arabic: arabicSource,
    translation: translationSource,
    commentary: commentarySource
  });
  return buildIndexFromFragments(fragments);
}
