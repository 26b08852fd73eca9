import { llm, voice } from '@livekit/agents';
import { createWebSearchTool } from './tools/search/search';
import { lookupWeatherTool } from './tools/weather/weather';

export type ToolSet = 'none' | 'weather' | 'weatherAndSearch';

export const GREETING_INSTRUCTIONS = 'Greet the user and offer your assistance.';

const BASE_INSTRUCTIONS = `You are a helpful voice AI assistant. Be friendly and concise. Most of your responses should be 1-2 sentences.
Your answers are spoken aloud, so avoid lists, markdown, emojis and symbols that cannot be pronounced.`;

const TOOL_INSTRUCTIONS: Record<ToolSet, string> = {
    none: '',
    weather: `
When the user asks about the weather, call lookup_weather with the place they mention and read the result back naturally.`,
    weatherAndSearch: `
When the user asks about the weather, call lookup_weather with the place they mention and read the result back naturally.
When the user asks about news, sports, prices or anything that may have changed recently, call web_search first and summarise what it returns in one or two sentences. If the search fails, say so briefly instead of guessing.`,
};

export function toolsFor(set: ToolSet, sessionId?: string): llm.ToolContext {
    switch (set) {
        case 'none':
            return {};
        case 'weather':
            return { lookup_weather: lookupWeatherTool };
        case 'weatherAndSearch':
            return { lookup_weather: lookupWeatherTool, web_search: createWebSearchTool(sessionId) };
    }
}

export function instructionsFor(set: ToolSet): string {
    return `${BASE_INSTRUCTIONS}${TOOL_INSTRUCTIONS[set]}`;
}

export class Assistant extends voice.Agent {
    constructor(tools: ToolSet = 'none', sessionId?: string) {
        super({
            instructions: instructionsFor(tools),
            tools: toolsFor(tools, sessionId),
        });
    }
}
