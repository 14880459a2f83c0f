import type { DatasetName, IntegrityIssue, IntegrityReport, IssueKind } from './types.js';
import type { VerseIndex } from './verse-index.js';
import { compareVerseKeys } from './verse-key.js';
import { containsMarkup } from './sanitizer.js';

// Issues of these kinds mean the index itself is wrong, not just incomplete
const FAILING_KINDS: ReadonlySet<IssueKind> = new Set<IssueKind>(['duplicate', 'sequence', 'markup']);

function keysOf(issues: IntegrityIssue[], dataset: DatasetName, kind: IssueKind): string[] {
  return issues.filter(i => i.dataset === dataset && i.kind === kind).map(i => i.verseKey);
}

/**
 * Re-check the index invariants and fold them, together with the issues
 * collected while loading and merging, into one report.
 */
export function validateIndex(index: VerseIndex, buildIssues: IntegrityIssue[]): IntegrityReport {
  const issues = [...buildIssues];
  const records = index.records();
  const seen = new Set<string>();

  records.forEach((record, position) => {
    if (record.sequenceIndex !== position) {
      issues.push({
        dataset: 'arabic',
        verseKey: record.verseKey,
        kind: 'sequence',
        message: `${record.verseKey} has sequenceIndex ${record.sequenceIndex} at position ${position}`
      });
    }

    if (seen.has(record.verseKey)) {
      issues.push({ dataset: 'arabic', verseKey: record.verseKey, kind: 'duplicate', message: `${record.verseKey} appears more than once` });
    }
    seen.add(record.verseKey);

    const previous = position > 0 ? records[position - 1] : undefined;
    if (previous && compareVerseKeys(previous.key, record.key) > 0) {
      issues.push({
        dataset: 'arabic',
        verseKey: record.verseKey,
        kind: 'sequence',
        message: `${record.verseKey} is ordered after ${previous.verseKey}`
      });
    }

    if (containsMarkup(record.commentary)) {
      issues.push({ dataset: 'commentary', verseKey: record.verseKey, kind: 'markup', message: `Commentary for ${record.verseKey} still contains markup` });
    }
  });

  const surahNumbers = index.surahNumbers();
  const surahTotal = surahNumbers.reduce((sum, n) => sum + index.surah(n).length, 0);
  if (surahTotal !== records.length) {
    issues.push({
      dataset: 'arabic',
      verseKey: '*',
      kind: 'sequence',
      message: `Surah lists hold ${surahTotal} verses but the index holds ${records.length}`
    });
  }

  const duplicateKeys = Array.from(new Set(issues.filter(i => i.kind === 'duplicate').map(i => i.verseKey)));

  return {
    totalVerses: index.size(),
    surahCount: surahNumbers.length,
    missingTranslation: keysOf(issues, 'translation', 'missing'),
    missingCommentary: keysOf(issues, 'commentary', 'missing'),
    orphanTranslation: keysOf(issues, 'translation', 'orphan'),
    orphanCommentary: keysOf(issues, 'commentary', 'orphan'),
    duplicateKeys,
    issues,
    ok: !issues.some(i => FAILING_KINDS.has(i.kind))
  };
}
