import { type JobContext, WorkerOptions, cli, defineAgent } from '@livekit/agents';
import { fileURLToPath } from 'node:url';
import { Assistant } from '../agent';
import { getConfig, requireKeys } from '../config';
import { childLogger } from '../logger';
import { geminiRealtimeSession, startVoiceSession } from '../session';

// Gemini realtime model with weather and web search
export default defineAgent({
    entry: async (ctx: JobContext) => {
        const config = getConfig();
        requireKeys(config, ['GOOGLE_API_KEY']);
        if (!config.secrets.MISTRAL_API_KEY) {
            childLogger('gemini').warn('MISTRAL_API_KEY is not set; web_search will report an error to the model');
        }

        await startVoiceSession(ctx, {
            session: geminiRealtimeSession(),
            agent: new Assistant('weatherAndSearch', ctx.job.id),
            backend: 'gemini-realtime',
        });
    },
});

cli.runApp(new WorkerOptions({ agent: fileURLToPath(import.meta.url) }));
