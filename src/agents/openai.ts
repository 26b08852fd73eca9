import { type JobContext, WorkerOptions, cli, defineAgent } from '@livekit/agents';
import { fileURLToPath } from 'node:url';
import { Assistant } from '../agent';
import { getConfig, requireKeys } from '../config';
import { openaiRealtimeSession, startVoiceSession } from '../session';

// OpenAI realtime model with the weather tool
export default defineAgent({
    entry: async (ctx: JobContext) => {
        requireKeys(getConfig(), ['OPENAI_API_KEY']);

        await startVoiceSession(ctx, {
            session: openaiRealtimeSession(),
            agent: new Assistant('weather'),
            backend: 'openai-realtime',
        });
    },
});

cli.runApp(new WorkerOptions({ agent: fileURLToPath(import.meta.url) }));
