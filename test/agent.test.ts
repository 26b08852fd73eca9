import { describe, it, expect, vi } from 'vitest';
import { instructionsFor, toolsFor } from '../src/agent';
import { searchTheWeb } from '../src/tools/search/search';
import { lookupWeather, lookupWeatherTool } from '../src/tools/weather/weather';
import { loadConfig } from '../src/config';
import { silentLogger } from './helpers/logger';

describe('toolsFor', () => {
    it('registers no tools for the pipeline agent', () => {
        expect(Object.keys(toolsFor('none'))).toEqual([]);
    });

    it('registers only the weather tool for the OpenAI agent', () => {
        expect(Object.keys(toolsFor('weather'))).toEqual(['lookup_weather']);
    });

    it('registers weather and web search for the Gemini agent', () => {
        expect(Object.keys(toolsFor('weatherAndSearch', 'job_1'))).toEqual(['lookup_weather', 'web_search']);
    });
});

describe('instructionsFor', () => {
    it('mentions only the tools in the set', () => {
        expect(instructionsFor('none')).not.toMatch(/lookup_weather|web_search/);

        expect(instructionsFor('weather')).toContain('lookup_weather');
        expect(instructionsFor('weather')).not.toContain('web_search');

        expect(instructionsFor('weatherAndSearch')).toContain('lookup_weather');
        expect(instructionsFor('weatherAndSearch')).toContain('web_search');
    });
});

describe('lookup_weather', () => {
    it('accepts a location argument', () => {
        expect(lookupWeatherTool.parameters.safeParse({ location: 'Paris' }).success).toBe(true);
        expect(lookupWeatherTool.parameters.safeParse({}).success).toBe(false);
    });

    it('answers with a summary naming the place', async () => {
        const reply = await lookupWeather({ location: '  Reykjavik ' });

        expect(reply).toMatch(/^The weather in Reykjavik is .+ with a temperature of \d+°F\.$/);
    });
});

describe('web_search', () => {
    it('tells the model the search failed when no API key is configured', async () => {
        const logger = silentLogger();
        const info = vi.spyOn(logger, 'info');
        const search = searchTheWeb({ config: loadConfig({}), logger, sessionId: 'job_1' });

        await expect(search({ query: 'latest football scores' })).resolves.toBe(
            'Web search failed: Mistral API key not configured',
        );
        expect(info).toHaveBeenCalledWith('Web search initiated', {
            query: 'latest football scores',
            session_id: 'job_1',
        });
    });

    it('resolves with the default configuration too', async () => {
        await expect(searchTheWeb()({ query: 'latest football scores' })).resolves.toBe(
            'Web search failed: Mistral API key not configured',
        );
    });
});
