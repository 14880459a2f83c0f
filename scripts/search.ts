/**
 * search.ts - Runs a text search over the datasets and prints ranked hits.
 *
 * Usage: npm run search -- "query" [--fields=translation,commentary] [--limit=5] [--data-dir=path]
 */

import { loadConfig } from '../src/config.js';
import { datasetBuilder } from '../src/corpus-store.js';
import { isSearchField } from '../src/search.js';
import { formatSearchHit } from '../src/text-format.js';
import type { SearchField } from '../src/types.js';

const DEFAULT_LIMIT = 5;

function argValue(args: string[], name: string): string | undefined {
    const arg = args.find(a => a.startsWith(`--${name}=`));
    return arg === undefined ? undefined : arg.slice(name.length + 3);
}

function parseFields(value: string | undefined): SearchField[] | undefined {
    if (value === undefined) return undefined;
    const names = value.split(',').map(f => f.trim()).filter(f => f.length > 0);
    const unknown = names.filter(f => !isSearchField(f));
    if (unknown.length > 0) {
        throw new Error(`Unknown search fields: ${unknown.join(', ')}`);
    }
    return names.filter(isSearchField);
}

function parseLimit(value: string | undefined): number {
    if (value === undefined) return DEFAULT_LIMIT;
    const n = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
    if (isNaN(n) || n < 1) {
        throw new Error(`--limit must be a positive integer, got "${value}"`);
    }
    return n;
}

async function main() {
    const args = process.argv.slice(2);
    const query = args.filter(a => !a.startsWith('--')).join(' ');

    if (!query.trim()) {
        console.error('Usage: npm run search -- "query" [--fields=translation,commentary] [--limit=5] [--data-dir=path]');
        process.exit(1);
    }

    const fields = parseFields(argValue(args, 'fields'));
    const limit = parseLimit(argValue(args, 'limit'));

    const config = await loadConfig({ rootDir: process.cwd(), argv: args });
    const { index } = await datasetBuilder({ dataDir: config.dataDir, files: config.files })();

    console.log(`Searching for: "${query}"`);
    const results = index.search(query, { fields });
    if (results.length === 0) {
        console.log('No verses found');
        return;
    }

    console.log(`${results.length} verses found, showing ${Math.min(limit, results.length)}`);
    results.slice(0, limit).forEach((result, i) => {
        console.log('');
        for (const line of formatSearchHit(result, i + 1)) {
            console.log(line);
        }
    });
}

main().catch(err => {
    console.error(`Search failed: ${err instanceof Error ? err.message : err}`);
    process.exit(1);
});
