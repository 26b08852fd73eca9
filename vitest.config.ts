import { tmpdir } from 'node:os';
import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['test/**/*.test.ts'],
        environment: 'node',
        testTimeout: 10000,
        // process.env wins over .env: keep tests off the real search API and out of ./logs
        env: {
            MISTRAL_API_KEY: '',
            LOG_DIR: path.join(tmpdir(), 'voice-tool-agents-test-logs'),
            LOG_CONSOLE: 'false',
        },
    },
});
