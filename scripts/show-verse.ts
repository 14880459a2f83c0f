/**
 * show-verse.ts - Prints one verse, or a range of verses, from the datasets.
 *
 * Usage: npm run show-verse -- 2:255 [--full] [--data-dir=path]
 *        npm run show-verse -- 2:1-5
 */

import { loadConfig } from '../src/config.js';
import { datasetBuilder } from '../src/corpus-store.js';
import { formatVerse } from '../src/text-format.js';

async function main() {
    const args = process.argv.slice(2);
    const full = args.includes('--full');
    const reference = args.find(a => !a.startsWith('--'));

    if (!reference) {
        console.error('Usage: npm run show-verse -- <surah:ayah | surah:from-to> [--full] [--data-dir=path]');
        process.exit(1);
    }

    const config = await loadConfig({ rootDir: process.cwd(), argv: args });
    const { index } = await datasetBuilder({ dataDir: config.dataDir, files: config.files })();

    const verses = index.lookupReference(reference);
    if (verses === null) {
        console.error(`Not a verse reference: ${reference}`);
        process.exit(1);
    }
    if (verses.length === 0) {
        console.error(`Verse ${reference} not found`);
        process.exit(1);
    }

    for (const verse of verses) {
        console.log('');
        for (const line of formatVerse(verse, full)) {
            console.log(line);
        }
    }
}

main().catch(err => {
    console.error(`Error displaying verse: ${err instanceof Error ? err.message : err}`);
    process.exit(1);
});
