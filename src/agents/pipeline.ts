import { type JobContext, type JobProcess, WorkerOptions, cli, defineAgent } from '@livekit/agents';
import { fileURLToPath } from 'node:url';
import { Assistant } from '../agent';
import { getConfig, requireKeys } from '../config';
import { loadVad, pipelineSession, prewarmedVad, startVoiceSession } from '../session';

// Deepgram STT -> OpenAI LLM -> OpenAI TTS, no tools
export default defineAgent({
    prewarm: async (proc: JobProcess) => {
        proc.userData.vad = await loadVad();
    },
    entry: async (ctx: JobContext) => {
        requireKeys(getConfig(), ['OPENAI_API_KEY', 'DEEPGRAM_API_KEY']);

        await startVoiceSession(ctx, {
            session: pipelineSession(prewarmedVad(ctx)),
            agent: new Assistant('none'),
            backend: 'pipeline',
        });
    },
});

cli.runApp(new WorkerOptions({ agent: fileURLToPath(import.meta.url) }));
