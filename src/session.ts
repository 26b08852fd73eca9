import { metrics, voice, type JobContext } from '@livekit/agents';
import * as deepgram from '@livekit/agents-plugin-deepgram';
import * as google from '@livekit/agents-plugin-google';
import * as livekit from '@livekit/agents-plugin-livekit';
import * as openai from '@livekit/agents-plugin-openai';
import * as silero from '@livekit/agents-plugin-silero';
import { BackgroundVoiceCancellation } from '@livekit/noise-cancellation-node';
import { GREETING_INSTRUCTIONS } from './agent';
import { childLogger } from './logger';
import { describeError } from './utils';

const OPENAI_REALTIME_MODEL = 'gpt-4o-realtime-preview';
const OPENAI_REALTIME_VOICE = 'alloy';

const GEMINI_MODEL = 'gemini-2.0-flash-exp';
const GEMINI_VOICE = 'Kore';
const GEMINI_TEMPERATURE = 0.8;
const GEMINI_INSTRUCTIONS = 'You are a helpful assistant';

const PIPELINE_LLM_MODEL = 'gpt-4.1-nano';
const PIPELINE_STT_MODEL = 'nova-3';
const PIPELINE_TTS_MODEL = 'gpt-4o-mini-tts';
const PIPELINE_TTS_VOICE = 'ash';

export function openaiRealtimeSession(): voice.AgentSession {
    return new voice.AgentSession({
        llm: new openai.realtime.RealtimeModel({
            model: OPENAI_REALTIME_MODEL,
            voice: OPENAI_REALTIME_VOICE,
        }),
    });
}

export function geminiRealtimeSession(): voice.AgentSession {
    return new voice.AgentSession({
        llm: new google.beta.realtime.RealtimeModel({
            model: GEMINI_MODEL,
            voice: GEMINI_VOICE,
            temperature: GEMINI_TEMPERATURE,
            instructions: GEMINI_INSTRUCTIONS,
        }),
    });
}

export function pipelineSession(vad: silero.VAD): voice.AgentSession {
    return new voice.AgentSession({
        vad,
        stt: new deepgram.STT({ model: PIPELINE_STT_MODEL }),
        llm: new openai.LLM({ model: PIPELINE_LLM_MODEL }),
        tts: new openai.TTS({ model: PIPELINE_TTS_MODEL, voice: PIPELINE_TTS_VOICE }),
        turnDetection: new livekit.turnDetector.MultilingualModel(),
    });
}

export async function loadVad(): Promise<silero.VAD> {
    return silero.VAD.load();
}

export function prewarmedVad(ctx: JobContext): silero.VAD {
    const vad = ctx.proc.userData.vad;
    if (!(vad instanceof silero.VAD)) {
        throw new Error('VAD was not loaded in prewarm');
    }
    return vad;
}

export interface StartOptions {
    session: voice.AgentSession;
    agent: voice.Agent;
    backend: string;
}

/**
 * Starts `session` in the job's room with background voice cancellation,
 * joins the room and asks the model for an opening greeting.
 * Usage metrics are collected for the lifetime of the job and logged at shutdown.
 */
export async function startVoiceSession(ctx: JobContext, { session, agent, backend }: StartOptions): Promise<void> {
    const log = childLogger('session');
    const usage = new metrics.UsageCollector();

    session.on(voice.AgentSessionEventTypes.MetricsCollected, (ev) => {
        usage.collect(ev.metrics);
    });
    session.on(voice.AgentSessionEventTypes.Error, (ev) => {
        log.error('Session error', { backend, room: ctx.room.name, error: describeError(ev.error) });
    });

    ctx.addShutdownCallback(async () => {
        log.info('Session usage', { backend, room: ctx.room.name, usage: usage.getSummary() });
    });

    await session.start({
        agent,
        room: ctx.room,
        inputOptions: {
            noiseCancellation: BackgroundVoiceCancellation(),
        },
    });

    await ctx.connect();
    log.info('Agent joined room', { backend, room: ctx.room.name });

    const greeting = session.generateReply({ instructions: GREETING_INSTRUCTIONS });
    await greeting.waitForPlayout();
}
