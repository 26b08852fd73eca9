import { parseArgs } from 'node:util';
import { getConfig } from '../config';
import { createAccessToken, DEFAULT_IDENTITY, DEFAULT_ROOM, parseTtl } from '../token';
import { describeError } from '../utils';

async function main() {
    const { values } = parseArgs({
        options: {
            room: { type: 'string', short: 'r', default: DEFAULT_ROOM },
            identity: { type: 'string', short: 'i', default: DEFAULT_IDENTITY },
            ttl: { type: 'string', default: '1h' },
        },
    });

    const config = getConfig();
    const token = await createAccessToken(config, {
        room: values.room,
        identity: values.identity,
        ttl: parseTtl(values.ttl ?? '1h'),
    });

    console.log(token);
    if (config.secrets.LIVEKIT_URL) {
        console.error(`connect to ${config.secrets.LIVEKIT_URL} as "${values.identity}" in room "${values.room}"`);
    }
}

main().catch((e) => {
    console.error('Token generation failed:', describeError(e));
    process.exit(1);
});
