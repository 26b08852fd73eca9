import axios, { isAxiosError, type AxiosAdapter, type AxiosInstance } from 'axios';
import { z, ZodError } from 'zod';
import { childLogger, type Logger } from '../../logger';
import { describeError, sleep } from '../../utils';

const HELPER_NAME = 'Voice Web Search Helper';
const HELPER_DESCRIPTION = 'Agent able to search information over the web';
const HELPER_INSTRUCTIONS =
    'You have the ability to perform web searches to find up-to-date information. ' +
    'Provide concise, accurate answers suitable for voice responses.';

export interface SearchClientOptions {
    apiKey: string;
    baseUrl?: string;
    model?: string;
    timeoutMs?: number;
    pollIntervalMs?: number;
    maxPolls?: number;
    logger?: Logger;
    adapter?: AxiosAdapter;
    wait?: (ms: number) => Promise<void>;
}

export interface Citation {
    title: string;
    url: string;
}

export interface SearchAnswer {
    text: string;
    citations: Citation[];
}

export interface SearchResult extends SearchAnswer {
    agentId: string;
    conversationId: string;
    polls: number;
}

const agentSchema = z.object({ id: z.string() });

const entrySchema = z.object({
    type: z.string(),
    content: z.union([z.string(), z.array(z.unknown())]).optional(),
}).passthrough();
export type ConversationEntry = z.infer<typeof entrySchema>;

const conversationSchema = z.object({
    conversation_id: z.string(),
    outputs: z.array(entrySchema),
});

const historySchema = z.object({
    entries: z.array(entrySchema),
});

const textChunkSchema = z.object({ type: z.literal('text'), text: z.string() });

const referenceChunkSchema = z.object({
    type: z.literal('tool_reference'),
    title: z.string(),
    url: z.string().nullish(),
});

const apiErrorSchema = z.object({ message: z.string() });

/**
 * Pulls the assistant's answer out of a list of conversation entries.
 * Returns null while no `message.output` entry has been produced.
 */
export function extractAnswer(entries: readonly ConversationEntry[]): SearchAnswer | null {
    const message = [...entries].reverse().find((entry) => entry.type === 'message.output');
    if (!message) return null;

    const content = message.content ?? '';
    if (typeof content === 'string') return { text: content.trim(), citations: [] };

    let text = '';
    const citations: Citation[] = [];
    const seen = new Set<string>();

    for (const chunk of content) {
        const asText = textChunkSchema.safeParse(chunk);
        if (asText.success) {
            text += asText.data.text;
            continue;
        }
        const asReference = referenceChunkSchema.safeParse(chunk);
        if (asReference.success && asReference.data.url && !seen.has(asReference.data.url)) {
            seen.add(asReference.data.url);
            citations.push({ title: asReference.data.title, url: asReference.data.url });
        }
    }

    return { text: text.trim(), citations };
}

export class SearchClient {
    private readonly model: string;
    private readonly pollIntervalMs: number;
    private readonly maxPolls: number;
    private readonly logger: Logger;
    private readonly wait: (ms: number) => Promise<void>;
    private readonly http: AxiosInstance;

    constructor(opts: SearchClientOptions) {
        if (!opts.apiKey) {
            throw new SearchError('Missing apiKey');
        }

        this.model = opts.model ?? 'mistral-medium-2505';
        this.pollIntervalMs = opts.pollIntervalMs ?? 1_000;
        this.maxPolls = opts.maxPolls ?? 10;
        this.logger = opts.logger ?? childLogger('search_client');
        this.wait = opts.wait ?? sleep;

        this.http = axios.create({
            baseURL: (opts.baseUrl ?? 'https://api.mistral.ai/v1').replace(/\/$/, ''),
            timeout: opts.timeoutMs ?? 30_000,
            headers: {
                Authorization: `Bearer ${opts.apiKey}`,
                'Content-Type': 'application/json',
                Accept: 'application/json',
            },
            adapter: opts.adapter,
        });
    }

    async search(query: string): Promise<SearchResult> {
        if (!query.trim()) throw new SearchError('query is required');

        const agentId = await this.createHelper();
        try {
            const conversation = await this.startConversation(agentId, query);
            let answer = extractAnswer(conversation.outputs);
            let polls = 0;

            while (!answer && polls < this.maxPolls) {
                polls++;
                await this.wait(this.pollIntervalMs);
                answer = extractAnswer(await this.fetchHistory(conversation.conversation_id));
            }

            if (!answer) {
                throw new SearchError(`search did not finish after ${polls} polls`);
            }
            if (!answer.text) {
                throw new SearchError('search returned an empty answer');
            }

            return { ...answer, agentId, conversationId: conversation.conversation_id, polls };
        } finally {
            await this.deleteHelper(agentId);
        }
    }

    private async createHelper(): Promise<string> {
        const data = await this.request('POST', '/agents', {
            model: this.model,
            name: HELPER_NAME,
            description: HELPER_DESCRIPTION,
            instructions: HELPER_INSTRUCTIONS,
            tools: [{ type: 'web_search' }],
            completion_args: { temperature: 0.3, top_p: 0.95 },
        });
        const agent = this.parse(agentSchema, data);
        this.logger.debug('Search helper created', { agent_id: agent.id });
        return agent.id;
    }

    private async startConversation(agentId: string, query: string) {
        const data = await this.request('POST', '/conversations', {
            agent_id: agentId,
            inputs: [{ role: 'user', content: query }],
            stream: false,
        });
        return this.parse(conversationSchema, data);
    }

    private async fetchHistory(conversationId: string): Promise<ConversationEntry[]> {
        const data = await this.request('GET', `/conversations/${encodeURIComponent(conversationId)}/history`);
        return this.parse(historySchema, data).entries;
    }

    private async deleteHelper(agentId: string): Promise<void> {
        try {
            await this.request('DELETE', `/agents/${encodeURIComponent(agentId)}`);
            this.logger.debug('Search helper deleted', { agent_id: agentId });
        } catch (e) {
            this.logger.warn('Search helper cleanup failed', {
                agent_id: agentId,
                cleanup_error: describeError(e),
            });
        }
    }

    private async request(method: 'GET' | 'POST' | 'DELETE', url: string, body?: unknown): Promise<unknown> {
        try {
            const res = await this.http.request<unknown>({ method, url, data: body });
            return res.data;
        } catch (e) {
            throw this.toSearchError(e);
        }
    }

    private parse<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
        try {
            return schema.parse(data);
        } catch (e) {
            throw this.toSearchError(e);
        }
    }

    private toSearchError(e: unknown): SearchError {
        if (e instanceof SearchError) return e;
        if (isAxiosError(e)) {
            const status = e.response?.status;
            const details: unknown = e.response?.data;
            const apiError = apiErrorSchema.safeParse(details);
            const msg = apiError.success ? apiError.data.message : e.message;
            return new SearchError(msg, status, details);
        }
        if (e instanceof ZodError) {
            return new SearchError(`unexpected response from search API: ${e.issues[0]?.message ?? e.message}`);
        }
        return new SearchError(describeError(e));
    }
}

export class SearchError extends Error {
    public readonly status?: number | undefined;
    public readonly details?: unknown;

    constructor(message: string, status?: number, details?: unknown) {
        super(message);
        this.name = 'SearchError';
        this.status = status;
        this.details = details;
        Object.setPrototypeOf(this, SearchError.prototype);
    }
}
