import * as test from 'node:test';
import * as assert from 'node:assert';
import request from 'supertest';
import { createApp, type AppOptions } from '../app.js';
import { CorpusStore } from '../corpus-store.js';
import { parseDay } from '../selector.js';
import { buildSampleIndex } from './fixtures.js';

const { describe, it, beforeEach } = test;

const baseOptions: AppOptions = {
  logRequests: false,
  reloadAllowed: false,
  defaultSearchLimit: 20,
  maxSearchLimit: 100
};

async function loadedStore() {
  const store = new CorpusStore(async () => buildSampleIndex());
  await store.reload();
  return store;
}

describe('API', () => {
  let store: CorpusStore;

  beforeEach(async () => {
    store = await loadedStore();
  });

  describe('GET /health', () => {
    it('should report the loaded index', async () => {
      const res = await request(createApp(store, baseOptions)).get('/health');
      assert.strictEqual(res.status, 200);
      assert.strictEqual(res.body.status, 'ok');
      assert.strictEqual(res.body.verses, 5);
    });

    it('should report loading before the first build', async () => {
      const empty = new CorpusStore(async () => buildSampleIndex());
      const res = await request(createApp(empty, baseOptions)).get('/health');
      assert.strictEqual(res.status, 503);
      assert.deepStrictEqual(res.body, { status: 'loading' });
    });
  });

  describe('GET /api/verse/:key', () => {
    it('should return the merged verse', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/verse/2:2');
      assert.strictEqual(res.status, 200);
      assert.strictEqual(res.body.verseKey, '2:2');
      assert.strictEqual(res.body.commentary, 'His mercy covers all things & more.');
      assert.strictEqual(res.body.commentarySourceKey, '2:1');
      assert.deepStrictEqual(res.body.key, { surah: 2, ayah: 2 });
    });

    it('should return 404 for a verse outside the corpus', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/verse/9:9');
      assert.strictEqual(res.status, 404);
      assert.deepStrictEqual(res.body, { error: 'Verse not found: 9:9' });
    });

    it('should return 400 for a malformed key', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/verse/abc');
      assert.strictEqual(res.status, 400);
      assert.deepStrictEqual(res.body, { error: 'Malformed verse key "abc": expected "surah:ayah"' });
    });

    it('should return 503 before the first build', async () => {
      const empty = new CorpusStore(async () => buildSampleIndex());
      const res = await request(createApp(empty, baseOptions)).get('/api/verse/1:1');
      assert.strictEqual(res.status, 503);
      assert.deepStrictEqual(res.body, { error: 'Verse index has not been loaded yet' });
    });
  });

  describe('GET /api/surah/:number', () => {
    it('should list the verses of a surah in order', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/surah/2');
      assert.strictEqual(res.status, 200);
      assert.strictEqual(res.body.surah, 2);
      assert.deepStrictEqual(res.body.verses.map((v: { verseKey: string }) => v.verseKey), ['2:1', '2:2', '2:10']);
    });

    it('should return 400 for an invalid surah number', async () => {
      const app = createApp(store, baseOptions);
      for (const value of ['0', '115', 'two']) {
        const res = await request(app).get(`/api/surah/${value}`);
        assert.strictEqual(res.status, 400, value);
        assert.deepStrictEqual(res.body, { error: `Invalid surah number: ${value}` });
      }
    });

    it('should return 404 for a surah with no verses loaded', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/surah/3');
      assert.strictEqual(res.status, 404);
      assert.deepStrictEqual(res.body, { error: 'Surah not found: 3' });
    });
  });

  describe('GET /api/random', () => {
    it('should return a verse of the corpus', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/random');
      assert.strictEqual(res.status, 200);
      assert.ok(['1:1', '1:2', '2:1', '2:2', '2:10'].includes(res.body.verseKey));
    });
  });

  describe('GET /api/verse-of-the-day', () => {
    it('should return the verse picked for the given day', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/verse-of-the-day?date=2024-03-01');
      assert.strictEqual(res.status, 200);
      assert.strictEqual(res.body.date, '2024-03-01');
      assert.strictEqual(res.body.verse.verseKey, store.current().index.pickOfDay(parseDay('2024-03-01')).verseKey);
    });

    it('should default to today', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/verse-of-the-day');
      assert.strictEqual(res.status, 200);
      assert.match(res.body.date, /^\d{4}-\d{2}-\d{2}$/);
    });

    it('should return 400 for a bad date', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/verse-of-the-day?date=2024-13-01');
      assert.strictEqual(res.status, 400);
      assert.deepStrictEqual(res.body, { error: 'Invalid date "2024-13-01", expected yyyy-MM-dd' });
    });
  });

  describe('GET /api/search', () => {
    it('should rank text matches', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/search?q=mercy');
      assert.strictEqual(res.status, 200);
      assert.strictEqual(res.body.query, 'mercy');
      assert.strictEqual(res.body.mode, 'text');
      assert.strictEqual(res.body.total, 3);
      assert.deepStrictEqual(res.body.results.map((r: { verseKey: string }) => r.verseKey), ['1:2', '2:1', '2:2']);
      assert.deepStrictEqual(res.body.results[1].matchedFields, ['commentary']);
      assert.strictEqual(res.body.results[1].verse.verseKey, '2:1');
    });

    it('should restrict fields', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/search?q=mercy&fields=translation');
      assert.strictEqual(res.status, 200);
      assert.deepStrictEqual(res.body.results.map((r: { verseKey: string }) => r.verseKey), ['1:2']);
    });

    it('should page with limit but report the full total', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/search?q=mercy&limit=1');
      assert.strictEqual(res.body.total, 3);
      assert.strictEqual(res.body.results.length, 1);
    });

    it('should cap limit at the configured maximum', async () => {
      const app = createApp(store, { ...baseOptions, defaultSearchLimit: 1, maxSearchLimit: 2 });
      const capped = await request(app).get('/api/search?q=mercy&limit=50');
      assert.strictEqual(capped.body.results.length, 2);
      const byDefault = await request(app).get('/api/search?q=mercy');
      assert.strictEqual(byDefault.body.results.length, 1);
    });

    it('should look up verse references', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/search?q=2:1-2');
      assert.strictEqual(res.status, 200);
      assert.strictEqual(res.body.mode, 'reference');
      assert.strictEqual(res.body.total, 2);
      assert.deepStrictEqual(res.body.results.map((r: { verseKey: string }) => r.verseKey), ['2:1', '2:2']);
      assert.strictEqual(res.body.results[0].relevanceScore, 1);
    });

    it('should return 400 for an out-of-range reference', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/search?q=200:1');
      assert.strictEqual(res.status, 400);
      assert.deepStrictEqual(res.body, { error: 'Malformed verse key "200:1": surah must be an integer in 1..114' });
    });

    it('should return 400 for bad parameters', async () => {
      const app = createApp(store, baseOptions);

      const noQuery = await request(app).get('/api/search');
      assert.strictEqual(noQuery.status, 400);
      assert.deepStrictEqual(noQuery.body, { error: 'Query parameter "q" is required' });

      const badField = await request(app).get('/api/search?q=mercy&fields=title');
      assert.strictEqual(badField.status, 400);
      assert.deepStrictEqual(badField.body, { error: 'Invalid search fields: title' });

      const badLimit = await request(app).get('/api/search?q=mercy&limit=0');
      assert.strictEqual(badLimit.status, 400);
      assert.deepStrictEqual(badLimit.body, { error: 'Query parameter "limit" must be a positive integer' });
    });
  });

  describe('GET /api/integrity', () => {
    it('should return the build report', async () => {
      const res = await request(createApp(store, baseOptions)).get('/api/integrity');
      assert.strictEqual(res.status, 200);
      assert.strictEqual(res.body.ok, true);
      assert.strictEqual(res.body.totalVerses, 5);
      assert.deepStrictEqual(res.body.missingTranslation, ['2:10']);
      assert.deepStrictEqual(res.body.orphanTranslation, ['3:1']);
      assert.strictEqual(res.body.loadedAt, store.current().loadedAt.toISOString());
    });
  });

  describe('POST /api/reload', () => {
    it('should be refused unless enabled', async () => {
      const res = await request(createApp(store, baseOptions)).post('/api/reload');
      assert.strictEqual(res.status, 403);
      assert.deepStrictEqual(res.body, { error: 'Reload is disabled' });
    });

    it('should rebuild and publish a new snapshot', async () => {
      const before = store.current();
      const res = await request(createApp(store, { ...baseOptions, reloadAllowed: true })).post('/api/reload');
      assert.strictEqual(res.status, 200);
      assert.strictEqual(res.body.verses, 5);
      assert.strictEqual(res.body.ok, true);
      assert.strictEqual(res.body.issues, 2);
      assert.notStrictEqual(store.current(), before);
    });

    it('should report a failed rebuild and keep serving the old index', async () => {
      let fail = false;
      const flaky = new CorpusStore(async () => {
        if (fail) throw new Error('disk gone');
        return buildSampleIndex();
      });
      await flaky.reload();
      fail = true;

      const app = createApp(flaky, { ...baseOptions, reloadAllowed: true });
      const res = await request(app).post('/api/reload');
      assert.strictEqual(res.status, 500);
      assert.deepStrictEqual(res.body, { error: 'Internal server error' });

      const verse = await request(app).get('/api/verse/1:1');
      assert.strictEqual(verse.status, 200);
    });
  });

  it('should return 404 for unknown routes', async () => {
    const res = await request(createApp(store, baseOptions)).get('/api/nothing-here');
    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(res.body, { error: 'Not found' });
  });
});
