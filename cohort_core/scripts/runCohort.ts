#!/usr/bin/env tsx

import dotenv from 'dotenv';
import { runCohortCli } from '../lib/cli/cohortCli';

dotenv.config();

function printHelp(): void {
    const lines = [
        'Usage: tsx cohort_core/scripts/runCohort.ts [--db <file.db>] --criteria <criteria.json> [options]',
        '       tsx cohort_core/scripts/runCohort.ts [--db <file.db>] --criteria-text <criteria.txt> --study <id> [options]',
        '',
        'Options:',
        '  --db <file.db>        SQLite dataset (default: DATABASE_PATH)',
        '  --enable I01,E01      Funnel over this subset of predicate ids',
        '  --preview             Fetch preview rows after the count',
        '  --max-repairs <n>     Repair attempts (default: MAX_REPAIR_ATTEMPTS or 3)',
        '  --resolve             Resolve unresolved concepts from the reference tables',
        '  --resolve-ai          Resolve unresolved concepts through the AI endpoint',
        '  --verbose             Write session log documents to stderr',
        '',
        'Environment (also read from .env):',
        '  DATABASE_PATH, MAX_REPAIR_ATTEMPTS, QUERY_TIMEOUT_MS, RESOLVER_TIMEOUT_MS,',
        '  PREVIEW_ROW_LIMIT, SUSPICIOUS_DROP_THRESHOLD, HUGE_COHORT_CEILING,',
        '  AI_ENDPOINT, AI_MODEL, AI_API_KEY',
    ];
    process.stdout.write(`${lines.join('\n')}\n`);
}

async function main(): Promise<void> {
    const argv = process.argv.slice(2);
    if (argv.includes('--help')) {
        printHelp();
        return;
    }

    const { bundle, output } = await runCohortCli(argv);
    process.stdout.write(`${output}\n`);
    if (bundle.lastError !== null) {
        process.exitCode = 2;
    }
}

main().catch((error: unknown) => {
    console.error('[runCohort]', error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
