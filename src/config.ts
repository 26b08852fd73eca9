import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

loadDotenv();

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export const SECRET_NAMES = [
    'LIVEKIT_URL',
    'LIVEKIT_API_KEY',
    'LIVEKIT_API_SECRET',
    'OPENAI_API_KEY',
    'GOOGLE_API_KEY',
    'DEEPGRAM_API_KEY',
    'MISTRAL_API_KEY',
] as const;
export type SecretName = typeof SECRET_NAMES[number];

const flag = z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
    LIVEKIT_URL: z.string().url().optional(),
    LIVEKIT_API_KEY: z.string().optional(),
    LIVEKIT_API_SECRET: z.string().optional(),
    OPENAI_API_KEY: z.string().optional(),
    GOOGLE_API_KEY: z.string().optional(),
    DEEPGRAM_API_KEY: z.string().optional(),
    MISTRAL_API_KEY: z.string().optional(),

    SEARCH_MODEL: z.string().default('mistral-medium-2505'),
    SEARCH_BASE_URL: z.string().url().default('https://api.mistral.ai/v1'),
    SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    SEARCH_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1_000),
    SEARCH_MAX_POLLS: z.coerce.number().int().nonnegative().default(10),

    LOG_DIR: z.string().default('logs'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    LOG_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
    LOG_CONSOLE: flag.default('true'),
});

export interface SearchConfig {
    model: string;
    baseUrl: string;
    timeoutMs: number;
    pollIntervalMs: number;
    maxPolls: number;
}

export interface LoggingConfig {
    dir: string;
    level: LogLevel;
    retentionDays: number;
    console: boolean;
}

export interface AppConfig {
    secrets: Partial<Record<SecretName, string>>;
    search: SearchConfig;
    logging: LoggingConfig;
}

export class ConfigError extends Error {
    public readonly problems: string[];

    constructor(problems: string[]) {
        super(`Invalid configuration: ${problems.join('; ')}`);
        this.name = 'ConfigError';
        this.problems = problems;
        Object.setPrototypeOf(this, ConfigError.prototype);
    }
}

// `KEY=` in a .env file means unset, not an empty key
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') out[key] = value.trim();
    }
    return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(withoutBlanks(env));
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    const e = parsed.data;
    const secrets: Partial<Record<SecretName, string>> = {};
    for (const name of SECRET_NAMES) {
        const value = e[name];
        if (value) secrets[name] = value;
    }

    return {
        secrets,
        search: {
            model: e.SEARCH_MODEL,
            baseUrl: e.SEARCH_BASE_URL.replace(/\/$/, ''),
            timeoutMs: e.SEARCH_TIMEOUT_MS,
            pollIntervalMs: e.SEARCH_POLL_INTERVAL_MS,
            maxPolls: e.SEARCH_MAX_POLLS,
        },
        logging: {
            dir: e.LOG_DIR,
            level: e.LOG_LEVEL,
            retentionDays: e.LOG_RETENTION_DAYS,
            console: e.LOG_CONSOLE,
        },
    };
}

export function requireKeys(config: AppConfig, names: readonly SecretName[]): void {
    const missing = names.filter((name) => !config.secrets[name]);
    if (missing.length > 0) {
        throw new ConfigError(missing.map((name) => `${name} is not set`));
    }
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
    if (!cached) cached = loadConfig();
    return cached;
}
