/**
 * validate-data.ts - Loads the three datasets, builds the verse index and
 * prints its integrity report.
 *
 * Usage: npm run validate-data -- [--data-dir=path] [--verbose]
 * Exits 1 when the Arabic dataset is unusable or the report is not ok.
 */

import { loadConfig } from '../src/config.js';
import { loadDatasets } from '../src/loader.js';
import { buildIndexFromFragments } from '../src/verse-index.js';
import type { IntegrityIssue } from '../src/types.js';

// Issues printed per kind unless --verbose
const SAMPLE_SIZE = 10;

function printIssues(issues: IntegrityIssue[], verbose: boolean) {
    const byKind = new Map<string, IntegrityIssue[]>();
    for (const issue of issues) {
        const label = `${issue.dataset}/${issue.kind}`;
        const list = byKind.get(label);
        if (list) {
            list.push(issue);
        } else {
            byKind.set(label, [issue]);
        }
    }

    for (const [label, list] of byKind) {
        console.log(`  ${label}: ${list.length}`);
        const shown = verbose ? list : list.slice(0, SAMPLE_SIZE);
        for (const issue of shown) {
            console.log(`    ${issue.message}`);
        }
        if (shown.length < list.length) {
            console.log(`    ... ${list.length - shown.length} more (use --verbose)`);
        }
    }
}

async function main() {
    const args = process.argv.slice(2);
    const verbose = args.includes('--verbose');

    const config = await loadConfig({ rootDir: process.cwd(), argv: args });
    console.log(`Validating datasets in: ${config.dataDir}`);

    const fragments = await loadDatasets({ dataDir: config.dataDir, files: config.files });
    console.log(`Parsed ${fragments.arabic.size} Arabic verses, ${fragments.translation.size} translations, ${fragments.commentary.size} commentary entries`);

    const { report } = buildIndexFromFragments(fragments);

    console.log(`Total verses: ${report.totalVerses} in ${report.surahCount} surahs`);
    console.log(`Missing translations: ${report.missingTranslation.length}`);
    console.log(`Missing commentary: ${report.missingCommentary.length}`);
    console.log(`Orphan translations: ${report.orphanTranslation.length}`);
    console.log(`Orphan commentary: ${report.orphanCommentary.length}`);
    console.log(`Duplicate keys: ${report.duplicateKeys.length}`);

    if (report.issues.length > 0) {
        console.log('Issues:');
        printIssues(report.issues, verbose);
    }

    if (!report.ok) {
        console.error('Integrity check failed');
        process.exit(1);
    }
    console.log('Integrity check passed');
}

main().catch(err => {
    console.error(`Validation failed: ${err instanceof Error ? err.message : err}`);
    process.exit(1);
});
