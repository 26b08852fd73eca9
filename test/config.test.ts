import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig, requireKeys } from '../src/config';

describe('loadConfig', () => {
    it('applies defaults', () => {
        expect(loadConfig({})).toEqual({
            secrets: {},
            search: {
                model: 'mistral-medium-2505',
                baseUrl: 'https://api.mistral.ai/v1',
                timeoutMs: 30000,
                pollIntervalMs: 1000,
                maxPolls: 10,
            },
            logging: {
                dir: 'logs',
                level: 'info',
                retentionDays: 30,
                console: true,
            },
        });
    });

    it('coerces numbers and flags from strings', () => {
        const config = loadConfig({
            SEARCH_MAX_POLLS: '3',
            SEARCH_BASE_URL: 'http://localhost:9999/v1/',
            LOG_RETENTION_DAYS: '7',
            LOG_CONSOLE: 'false',
            LOG_LEVEL: 'debug',
        });

        expect(config.search.maxPolls).toBe(3);
        expect(config.search.baseUrl).toBe('http://localhost:9999/v1');
        expect(config.logging).toEqual({ dir: 'logs', level: 'debug', retentionDays: 7, console: false });
    });

    it('treats blank values as unset', () => {
        const config = loadConfig({ OPENAI_API_KEY: '   ', MISTRAL_API_KEY: 'test-key', LOG_DIR: '' });

        expect(config.secrets).toEqual({ MISTRAL_API_KEY: 'test-key' });
        expect(config.logging.dir).toBe('logs');
    });

    it('lists every invalid variable', () => {
        let caught: unknown;
        try {
            loadConfig({ LOG_LEVEL: 'verbose', SEARCH_TIMEOUT_MS: '-5' });
        } catch (e) {
            caught = e;
        }

        expect(caught).toBeInstanceOf(ConfigError);
        const problems = caught instanceof ConfigError ? caught.problems : [];
        expect(problems).toHaveLength(2);
        expect(problems.some((p) => p.startsWith('LOG_LEVEL:'))).toBe(true);
        expect(problems.some((p) => p.startsWith('SEARCH_TIMEOUT_MS:'))).toBe(true);
    });
});

describe('requireKeys', () => {
    it('passes when every key is present', () => {
        const config = loadConfig({ OPENAI_API_KEY: 'test-openai', DEEPGRAM_API_KEY: 'test-deepgram' });

        expect(() => requireKeys(config, ['OPENAI_API_KEY', 'DEEPGRAM_API_KEY'])).not.toThrow();
    });

    it('names every missing key', () => {
        const config = loadConfig({ OPENAI_API_KEY: 'test-openai' });

        expect(() => requireKeys(config, ['OPENAI_API_KEY', 'DEEPGRAM_API_KEY', 'GOOGLE_API_KEY']))
            .toThrow('Invalid configuration: DEEPGRAM_API_KEY is not set; GOOGLE_API_KEY is not set');
    });
});
