import { describe, expect, test } from 'vitest';
import { ConfigError, DEFAULT_CONFIG, loadConfig } from '../../src/config.js';
import { createLogger, getLogger } from '../../src/logger.js';

describe('loadConfig', () => {
    test('applies defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({
            logLevel: 'info',
            scriptTimeoutMs: 1000,
            definitionsPath: 'custom_nodes.json',
        });
        expect(DEFAULT_CONFIG.scriptTimeoutMs).toBe(1000);
    });

    test('reads and coerces environment variables', () => {
        const config = loadConfig({
            NODEFLOW_LOG_LEVEL: 'debug',
            NODEFLOW_SCRIPT_TIMEOUT_MS: '250',
            NODEFLOW_DEFINITIONS_PATH: '/tmp/defs.json',
        });
        expect(config).toEqual({ logLevel: 'debug', scriptTimeoutMs: 250, definitionsPath: '/tmp/defs.json' });
    });

    test('lists every invalid variable', () => {
        try {
            loadConfig({ NODEFLOW_LOG_LEVEL: 'loud', NODEFLOW_SCRIPT_TIMEOUT_MS: '-5' });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigError);
            if (error instanceof ConfigError) {
                expect(error.issues).toHaveLength(2);
                expect(error.issues[0]).toMatch(/^NODEFLOW_LOG_LEVEL: /);
                expect(error.issues[1]).toMatch(/^NODEFLOW_SCRIPT_TIMEOUT_MS: /);
            }
        }
    });
});

describe('logger', () => {
    test('child loggers carry their component name', () => {
        const root = createLogger({ level: 'warn' });
        const child = getLogger('pipeline', root);
        expect(child.bindings()).toMatchObject({ component: 'pipeline' });
        expect(child.level).toBe('warn');
    });
});
