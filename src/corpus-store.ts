import type { IntegrityReport } from './types.js';
import { CorpusError } from './errors.js';
import { buildIndexFromFragments, type BuildResult, type VerseIndex } from './verse-index.js';
import { loadDatasets, type LoadOptions } from './loader.js';

/**
 * One published, immutable index together with its build report
 */
export interface CorpusSnapshot {
  readonly index: VerseIndex;
  readonly report: IntegrityReport;
  readonly loadedAt: Date;
}

export type IndexBuilder = () => Promise<BuildResult>;

/**
 * Holds the current snapshot. A reload builds a complete new index off to the
 * side and only then replaces the reference, so readers see either the old
 * index or the new one, never a partial one.
 */
export class CorpusStore {
  private snapshot: CorpusSnapshot | null = null;
  private pending: Promise<CorpusSnapshot> | null = null;

  constructor(private readonly builder: IndexBuilder) {}

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  /**
   * The published snapshot. Callers should hold on to it for the duration of
   * a request rather than calling current() repeatedly.
   */
  current(): CorpusSnapshot {
    if (!this.snapshot) {
      throw new CorpusError('Verse index has not been loaded yet', 503);
    }
    return this.snapshot;
  }

  /**
   * Build and publish a new snapshot. Overlapping calls share one build.
   * If the build fails the previous snapshot stays published.
   */
  reload(): Promise<CorpusSnapshot> {
    if (!this.pending) {
      this.pending = this.build().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async build(): Promise<CorpusSnapshot> {
    const { index, report } = await this.builder();
    const snapshot: CorpusSnapshot = Object.freeze({ index, report, loadedAt: new Date() });
    this.snapshot = snapshot;
    return snapshot;
  }
}

/**
 * Builder that reads the three datasets from disk on every reload
 */
export function datasetBuilder(options: LoadOptions): IndexBuilder {
  return async () => buildIndexFromFragments(await loadDatasets(options));
}
