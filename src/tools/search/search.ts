import { llm } from '@livekit/agents';
import { z } from 'zod';
import { formatSearchOutcome, runWebSearch, type WebSearchOptions } from './web_search';

/** Handler behind the web_search tool; always resolves to text the model can read. */
export function searchTheWeb(opts: WebSearchOptions = {}) {
    return async ({ query }: { query: string }): Promise<string> =>
        formatSearchOutcome(await runWebSearch(query, opts));
}

// one tool per job so every log line carries that job's session id
export function createWebSearchTool(sessionId?: string) {
    return llm.tool({
        description:
            'Search the web for up-to-date information such as news, scores, prices or recent events. ' +
            'Use it whenever the answer may have changed recently.',
        parameters: z.object({
            query: z.string().describe('What to search for, phrased as a short question'),
        }),
        execute: searchTheWeb({ sessionId }),
    });
}
