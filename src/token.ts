import { AccessToken } from 'livekit-server-sdk';
import { requireKeys, type AppConfig } from './config';

export interface TokenRequest {
    room?: string;
    identity?: string;
    name?: string;
    ttl?: string | number;
}

export const DEFAULT_ROOM = 'test-room';
export const DEFAULT_IDENTITY = 'user';

/** Command-line TTLs: bare digits are seconds, anything else a duration such as `'1h'`. */
export function parseTtl(value: string): string | number {
    return /^\d+$/.test(value.trim()) ? Number(value.trim()) : value.trim();
}

/**
 * Signs a join token for a test participant: room join, publish and subscribe.
 * `ttl` is a number of seconds or a duration string such as `'1h'`.
 */
export async function createAccessToken(config: AppConfig, req: TokenRequest = {}): Promise<string> {
    requireKeys(config, ['LIVEKIT_API_KEY', 'LIVEKIT_API_SECRET']);

    const identity = req.identity ?? DEFAULT_IDENTITY;
    const at = new AccessToken(config.secrets.LIVEKIT_API_KEY, config.secrets.LIVEKIT_API_SECRET, {
        identity,
        name: req.name ?? identity,
        ttl: req.ttl ?? '1h',
    });
    at.addGrant({
        room: req.room ?? DEFAULT_ROOM,
        roomJoin: true,
        canPublish: true,
        canSubscribe: true,
    });
    return at.toJwt();
}
