export function sleep(ms: number) {
    return new Promise<void>((r) => setTimeout(r, ms));
}

export function describeError(e: unknown): string {
    if (e instanceof Error) return e.message;
    return String(e);
}

export function errorType(e: unknown): string {
    if (e instanceof Error) return e.name;
    return typeof e;
}

export function preview(text: string, max = 100): string {
    return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function elapsedMs(startedAt: number): number {
    return Date.now() - startedAt;
}
