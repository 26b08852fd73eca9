import { getConfig, type AppConfig } from '../../config';
import { childLogger, type Logger } from '../../logger';
import { describeError, elapsedMs, errorType, preview } from '../../utils';
import { SearchClient, type Citation } from './search_client';

export type SearchOutcome =
    | { ok: true; text: string; citations: Citation[]; durationMs: number }
    | { ok: false; error: string; durationMs: number };

export interface WebSearchOptions {
    config?: AppConfig;
    client?: SearchClient;
    logger?: Logger;
    sessionId?: string;
}

export async function runWebSearch(query: string, opts: WebSearchOptions = {}): Promise<SearchOutcome> {
    const startedAt = Date.now();
    const log = opts.logger ?? childLogger('web_search');
    const sessionId = opts.sessionId ?? 'unknown';

    log.info('Web search initiated', { query, session_id: sessionId });

    const fail = (error: string, fields: Record<string, unknown> = {}): SearchOutcome => {
        const durationMs = elapsedMs(startedAt);
        log.error('Web search failed', {
            query,
            session_id: sessionId,
            duration_ms: durationMs,
            error,
            ...fields,
        });
        return { ok: false, error, durationMs };
    };

    if (!query.trim()) {
        return fail('No search query was given');
    }

    let client = opts.client;
    if (!client) {
        const config = opts.config ?? getConfig();
        const apiKey = config.secrets.MISTRAL_API_KEY;
        if (!apiKey) {
            return fail('Mistral API key not configured', { error_type: 'missing_api_key' });
        }
        client = new SearchClient({
            apiKey,
            baseUrl: config.search.baseUrl,
            model: config.search.model,
            timeoutMs: config.search.timeoutMs,
            pollIntervalMs: config.search.pollIntervalMs,
            maxPolls: config.search.maxPolls,
            logger: log,
        });
    }

    try {
        const result = await client.search(query);
        const durationMs = elapsedMs(startedAt);
        log.info('Web search completed', {
            query,
            session_id: sessionId,
            agent_id: result.agentId,
            conversation_id: result.conversationId,
            polls: result.polls,
            duration_ms: durationMs,
            result_length_chars: result.text.length,
            citation_count: result.citations.length,
            result_preview: preview(result.text),
        });
        return { ok: true, text: result.text, citations: result.citations, durationMs };
    } catch (e) {
        return fail(describeError(e), { error_type: errorType(e) });
    }
}

export function formatSearchOutcome(outcome: SearchOutcome): string {
    if (!outcome.ok) {
        return `Web search failed: ${outcome.error}`;
    }
    if (outcome.citations.length === 0) {
        return outcome.text;
    }
    const sources = outcome.citations.map((c) => `${c.title} (${c.url})`).join('; ');
    return `${outcome.text}\n\nSources: ${sources}`;
}

export interface SearchSummary {
    total: number;
    successful: number;
    failed: number;
    successRate: number;
}

export function summarizeOutcomes(outcomes: readonly SearchOutcome[]): SearchSummary {
    const successful = outcomes.filter((o) => o.ok).length;
    const total = outcomes.length;
    return {
        total,
        successful,
        failed: total - successful,
        successRate: total === 0 ? 0 : (successful / total) * 100,
    };
}
