import { llm } from '@livekit/agents';
import { z } from 'zod';
import { describeWeather } from './forecast';

export async function lookupWeather({ location }: { location: string }): Promise<string> {
    return describeWeather(location);
}

export const lookupWeatherTool = llm.tool({
    description: 'Used to look up weather information for a city or place.',
    parameters: z.object({
        location: z.string().describe("The place to get the weather for, e.g. 'Paris' or 'Austin, Texas'"),
    }),
    execute: lookupWeather,
});
