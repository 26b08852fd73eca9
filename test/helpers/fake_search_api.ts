import { AxiosError, type AxiosAdapter, type AxiosResponse } from 'axios';

export interface FakeReply {
    status: number;
    data: unknown;
}

export interface RecordedCall {
    route: string;
    body: unknown;
    authorization: unknown;
}

/**
 * In-process stand-in for the hosted agents API. Each route ("POST /agents")
 * maps to a queue of replies; the last reply repeats once the queue is drained.
 */
export function fakeSearchApi(routes: Record<string, FakeReply[]>) {
    const calls: RecordedCall[] = [];

    const adapter: AxiosAdapter = async (config) => {
        const route = `${(config.method ?? 'get').toUpperCase()} ${config.url ?? ''}`;
        calls.push({
            route,
            body: typeof config.data === 'string' ? JSON.parse(config.data) : undefined,
            authorization: config.headers.get('Authorization'),
        });

        const queue = routes[route];
        const reply = queue && queue.length > 1 ? queue.shift() : queue?.[0];
        const { status, data } = reply ?? { status: 404, data: { message: `no route for ${route}` } };

        const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
        if (status >= 400) {
            throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, {}, response);
        }
        return response;
    };

    return { adapter, calls, routes: () => calls.map((c) => c.route) };
}
