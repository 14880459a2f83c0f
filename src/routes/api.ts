import { Router, Request, Response, NextFunction } from 'express';
import type { SearchField, SearchResult, VerseRecord } from '../types.js';
import type { CorpusStore } from '../corpus-store.js';
import { isSearchField } from '../search.js';
import { dayKey, parseDay } from '../selector.js';
import { SURAH_COUNT } from '../verse-key.js';

/**
 * Options for the API routes
 */
export interface ApiOptions {
  /** Allow POST /api/reload */
  reloadAllowed: boolean;
  /** Page size when ?limit is absent */
  defaultSearchLimit: number;
  /** Upper bound on ?limit */
  maxSearchLimit: number;
}

function searchResultView(result: SearchResult) {
  return {
    verseKey: result.verseKey,
    relevanceScore: result.relevanceScore,
    matchedFields: Array.from(result.matchedFields),
    verse: result.record
  };
}

function referenceResultView(record: VerseRecord) {
  return {
    verseKey: record.verseKey,
    relevanceScore: 1,
    matchedFields: [],
    verse: record
  };
}

/**
 * Create API routes for verse access. Each handler reads the store's current
 * snapshot once, so a reload mid-request cannot mix two indexes.
 */
export function createApiRoutes(store: CorpusStore, options: ApiOptions): Router {
  const router = Router();

  /**
   * GET /api/verse/:key
   * One verse by "surah:ayah"
   */
  router.get('/verse/:key', (req: Request, res: Response) => {
    const { index } = store.current();
    res.json(index.get(req.params.key));
  });

  /**
   * GET /api/surah/:number
   * All verses of a surah, in order
   */
  router.get('/surah/:number', (req: Request, res: Response) => {
    const { number } = req.params;
    const surah = /^\d+$/.test(number) ? parseInt(number, 10) : NaN;

    if (isNaN(surah) || surah < 1 || surah > SURAH_COUNT) {
      res.status(400).json({ error: `Invalid surah number: ${number}` });
      return;
    }

    const { index } = store.current();
    res.json({ surah, verses: index.surah(surah) });
  });

  /**
   * GET /api/random
   */
  router.get('/random', (_req: Request, res: Response) => {
    const { index } = store.current();
    res.json(index.pickRandom());
  });

  /**
   * GET /api/verse-of-the-day
   * Query params: ?date=2024-03-01 (default: today, server local time)
   */
  router.get('/verse-of-the-day', (req: Request, res: Response) => {
    const { date } = req.query;

    if (date !== undefined && typeof date !== 'string') {
      res.status(400).json({ error: 'Query parameter "date" must be a single yyyy-MM-dd value' });
      return;
    }

    const day = date === undefined ? new Date() : parseDay(date);
    const { index } = store.current();
    res.json({ date: dayKey(day), verse: index.pickOfDay(day) });
  });

  /**
   * GET /api/search
   * Text search, or a verse reference lookup when q looks like "2:255" / "2:1-10"
   * Query params: ?q=mercy&fields=translation,commentary&limit=20
   */
  router.get('/search', (req: Request, res: Response) => {
    const { q, fields, limit } = req.query;

    if (!q || typeof q !== 'string' || !q.trim()) {
      res.status(400).json({ error: 'Query parameter "q" is required' });
      return;
    }

    let searchFields: SearchField[] | undefined;
    if (fields !== undefined) {
      if (typeof fields !== 'string') {
        res.status(400).json({ error: 'Query parameter "fields" must be a comma-separated list' });
        return;
      }
      const names = fields.split(',').map(f => f.trim()).filter(f => f.length > 0);
      const unknown = names.filter(f => !isSearchField(f));
      if (names.length === 0 || unknown.length > 0) {
        res.status(400).json({ error: `Invalid search fields: ${fields}` });
        return;
      }
      searchFields = names.filter(isSearchField);
    }

    let pageSize = options.defaultSearchLimit;
    if (limit !== undefined) {
      const n = typeof limit === 'string' && /^\d+$/.test(limit) ? parseInt(limit, 10) : NaN;
      if (isNaN(n) || n < 1) {
        res.status(400).json({ error: 'Query parameter "limit" must be a positive integer' });
        return;
      }
      pageSize = Math.min(n, options.maxSearchLimit);
    }

    const { index } = store.current();

    const referenced = index.lookupReference(q);
    if (referenced !== null) {
      res.json({
        query: q,
        mode: 'reference',
        total: referenced.length,
        results: referenced.slice(0, pageSize).map(referenceResultView)
      });
      return;
    }

    const results = index.search(q, { fields: searchFields });
    res.json({
      query: q,
      mode: 'text',
      total: results.length,
      results: results.slice(0, pageSize).map(searchResultView)
    });
  });

  /**
   * GET /api/integrity
   * The report produced when the current index was built
   */
  router.get('/integrity', (_req: Request, res: Response) => {
    const { report, loadedAt } = store.current();
    res.json({ loadedAt: loadedAt.toISOString(), ...report });
  });

  /**
   * POST /api/reload
   * Rebuild the index from the datasets and swap it in
   */
  router.post('/reload', (_req: Request, res: Response, next: NextFunction) => {
    if (!options.reloadAllowed) {
      res.status(403).json({ error: 'Reload is disabled' });
      return;
    }

    store.reload()
      .then(snapshot => {
        console.log(`Reloaded verse index: ${snapshot.index.size()} verses, ${snapshot.report.issues.length} issues`);
        res.json({
          verses: snapshot.index.size(),
          loadedAt: snapshot.loadedAt.toISOString(),
          ok: snapshot.report.ok,
          issues: snapshot.report.issues.length
        });
      })
      .catch(next);
  });

  return router;
}
