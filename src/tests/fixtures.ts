import * as fs from 'node:fs';
import * as path from 'node:path';
import type { VerseRecord } from '../types.js';
import type { RawSources } from '../loader.js';
import { buildIndex } from '../verse-index.js';

/**
 * A small made-up corpus. Keys are deliberately out of canonical order,
 * 2:10 has no translation, 2:2 shares the commentary of 2:1 and 3:1 exists
 * only in the translation dataset.
 */
export function sampleSources(): RawSources {
  return {
    arabic: {
      '2:10': { id: 5, verse_key: '2:10', surah: 2, ayah: 10, text: 'علم نافع' },
      '1:2': { id: 2, verse_key: '1:2', surah: 1, ayah: 2, text: 'رحمة واسعة' },
      '2:1': { id: 3, verse_key: '2:1', surah: 2, ayah: 1, text: 'نور وهدى' },
      '1:1': { id: 1, verse_key: '1:1', surah: 1, ayah: 1, text: 'كلمة أولى' },
      '2:2': { id: 4, verse_key: '2:2', surah: 2, ayah: 2, text: 'صبر جميل' }
    },
    translation: {
      '1:1': { t: 'In the name of the Merciful' },
      '1:2': { t: 'Indeed, Allah is full of mercy' },
      '2:1': 'A light and a guidance',
      '2:2': { t: 'Patience is beautiful' },
      '3:1': { t: 'A line with no Arabic verse' }
    },
    commentary: {
      '1:1': { text: '<p>Opening words.</p>' },
      '1:2': { text: '<p>Mercy is <b>central</b>.</p>' },
      '2:1': { text: '<p>His mercy covers all things &amp; more.</p>' },
      '2:2': '2:1',
      '2:10': '<div>Knowledge&nbsp;benefits.</div>'
    }
  };
}

export function buildSampleIndex() {
  const { arabic, translation, commentary } = sampleSources();
  return buildIndex(arabic, translation, commentary);
}

/**
 * Write the sample datasets as JSON files under dir
 */
export function writeSampleDatasets(dir: string, files = { arabic: 'arabic.json', translation: 'translation.json', commentary: 'commentary.json' }) {
  const sources = sampleSources();
  fs.writeFileSync(path.join(dir, files.arabic), JSON.stringify(sources.arabic));
  fs.writeFileSync(path.join(dir, files.translation), JSON.stringify(sources.translation));
  fs.writeFileSync(path.join(dir, files.commentary), JSON.stringify(sources.commentary));
  return files;
}

/**
 * A hand-made record, for index tests that bypass buildIndex
 */
export function makeRecord(surah: number, ayah: number, sequenceIndex: number, overrides: Partial<VerseRecord> = {}): VerseRecord {
  return {
    key: { surah, ayah },
    verseKey: `${surah}:${ayah}`,
    arabicText: 'نص',
    translation: `Translation of ${surah}:${ayah}`,
    commentary: `Commentary on ${surah}:${ayah}`,
    commentarySourceKey: `${surah}:${ayah}`,
    sequenceIndex,
    ...overrides
  };
}
