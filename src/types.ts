/**
 * Composite verse identifier. Ordered by surah, then ayah.
 */
export interface VerseKey {
  /** Chapter number, 1..114 */
  surah: number;

  /** Verse number within the surah, 1-based */
  ayah: number;
}

/**
 * The unified record for one verse, merged from the three datasets.
 * Records are frozen once the index is built.
 */
export interface VerseRecord {
  key: Readonly<VerseKey>;

  /** Canonical "surah:ayah" rendering of the key */
  verseKey: string;

  /** Arabic text, verbatim with diacritics */
  arabicText: string;

  /** Plain-text translation ("" when the translation dataset lacks the verse) */
  translation: string;

  /** Sanitized commentary ("" when no commentary could be resolved) */
  commentary: string;

  /**
   * Verse key of the commentary entry that supplied `commentary`.
   * Differs from `verseKey` when the entry was a cross-reference; null when missing.
   */
  commentarySourceKey: string | null;

  /** 0-based position in canonical order */
  sequenceIndex: number;
}

/**
 * Fields a search can look at.
 */
export type SearchField = 'arabic' | 'translation' | 'commentary';

export const ALL_SEARCH_FIELDS: readonly SearchField[] = ['arabic', 'translation', 'commentary'];

/**
 * A single ranked search hit.
 */
export interface SearchResult {
  verseKey: string;

  /** Relevance in [0, 1], higher is better */
  relevanceScore: number;

  /** Enabled fields in which at least one query term occurred */
  matchedFields: Set<SearchField>;

  record: VerseRecord;
}

/**
 * Options accepted by a text search.
 */
export interface SearchOptions {
  /** Fields to search (default: all) */
  fields?: Iterable<SearchField>;

  /** Maximum number of results (default: unbounded) */
  limit?: number;
}

/**
 * The three source datasets.
 */
export type DatasetName = 'arabic' | 'translation' | 'commentary';

export type IssueKind =
  | 'missing'
  | 'orphan'
  | 'malformed-key'
  | 'schema'
  | 'unresolved-reference'
  | 'duplicate'
  | 'sequence'
  | 'markup';

/**
 * A non-fatal problem found while loading, merging or validating.
 */
export interface IntegrityIssue {
  dataset: DatasetName;

  /** The raw or canonical key the issue concerns */
  verseKey: string;

  kind: IssueKind;

  message: string;
}

/**
 * Outcome of validating a built index against its source datasets.
 */
export interface IntegrityReport {
  totalVerses: number;
  surahCount: number;
  missingTranslation: string[];
  missingCommentary: string[];
  orphanTranslation: string[];
  orphanCommentary: string[];
  duplicateKeys: string[];
  issues: IntegrityIssue[];

  /** False when an index invariant is violated; missing or orphan data alone keeps this true */
  ok: boolean;
}
