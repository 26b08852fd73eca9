import { getConfig } from '../config';
import { childLogger } from '../logger';
import { formatSearchOutcome, runWebSearch, summarizeOutcomes, type SearchOutcome } from '../tools/search/web_search';
import { describeError, preview, sleep } from '../utils';

const DEFAULT_QUERIES = [
    'What is the latest news about renewable energy?',
    'Latest news about artificial intelligence',
];

const PAUSE_BETWEEN_QUERIES_MS = 1_000;

async function main() {
    const config = getConfig();
    if (!config.secrets.MISTRAL_API_KEY) {
        console.error('MISTRAL_API_KEY not found in environment variables');
        console.error('Add it to .env: MISTRAL_API_KEY=your_api_key_here');
        process.exit(1);
    }

    const queries = process.argv.slice(2).length > 0 ? process.argv.slice(2) : DEFAULT_QUERIES;
    const logger = childLogger('search_probe');
    const outcomes: SearchOutcome[] = [];

    for (const [i, query] of queries.entries()) {
        console.log(`Test ${i + 1}/${queries.length}: ${query}`);
        const outcome = await runWebSearch(query, { config, logger, sessionId: `probe_${i + 1}` });
        outcomes.push(outcome);

        const status = outcome.ok ? 'OK' : 'FAILED';
        console.log(`${status} (${(outcome.durationMs / 1000).toFixed(2)}s): ${preview(formatSearchOutcome(outcome), 200)}\n`);

        if (i < queries.length - 1) await sleep(PAUSE_BETWEEN_QUERIES_MS);
    }

    const summary = summarizeOutcomes(outcomes);
    console.log(`Total: ${summary.total}  Successful: ${summary.successful}  Failed: ${summary.failed}  Success rate: ${summary.successRate.toFixed(1)}%`);
    if (summary.failed > 0) process.exitCode = 1;
}

main().catch((e) => {
    console.error('Search probe failed:', describeError(e));
    process.exit(1);
});
