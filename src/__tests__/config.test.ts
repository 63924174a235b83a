import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG, type SRAgentConfig } from '../types/index.js';
import {
    assertCredentials,
    mergeConfig,
    pickEntrezCredentials,
    redactConfig,
    resolveConfig,
    validateConfig,
} from '../utils/config.js';
import { ConfigurationError } from '../utils/errors.js';

function withCredentials(overrides: Partial<SRAgentConfig> = {}): SRAgentConfig {
    return {
        ...DEFAULT_CONFIG,
        entrez: { ...DEFAULT_CONFIG.entrez, email: 'test@example.org' },
        webSearch: { ...DEFAULT_CONFIG.webSearch, apiKey: 'test-secret', engineId: 'test-engine' },
        ...overrides,
    };
}

describe('Configuration', () => {
    describe('pickEntrezCredentials', () => {
        it('should use EMAIL and NCBI_API_KEY', () => {
            expect(pickEntrezCredentials({ EMAIL: 'test@example.org', NCBI_API_KEY: 'test-secret' })).toEqual({
                email: 'test@example.org',
                apiKey: 'test-secret',
            });
        });

        it('should pick one numbered set', () => {
            const env = { EMAIL1: 'a@example.org', NCBI_API_KEY1: 'test-secret-1', EMAIL2: 'b@example.org' };

            expect(pickEntrezCredentials(env, () => 0)).toEqual({ email: 'a@example.org', apiKey: 'test-secret-1' });
            expect(pickEntrezCredentials(env, () => 0.99)).toEqual({ email: 'b@example.org' });
        });

        it('should return nothing without credentials', () => {
            expect(pickEntrezCredentials({})).toEqual({});
        });
    });

    describe('mergeConfig', () => {
        it('should start from the defaults', () => {
            expect(validateConfig(mergeConfig())).toEqual(DEFAULT_CONFIG);
        });

        it('should let later layers win', () => {
            const config = validateConfig(
                mergeConfig(
                    { retry: { maxAttempts: 2, baseDelayMs: 500 }, format: 'csv' },
                    { retry: { maxAttempts: 6 } },
                    null
                )
            );

            expect(config.retry).toEqual({ ...DEFAULT_CONFIG.retry, maxAttempts: 6, baseDelayMs: 500 });
            expect(config.format).toBe('csv');
        });

        it('should ignore undefined values', () => {
            const config = validateConfig(
                mergeConfig({ aggregation: { policy: 'exhaustive' } }, { aggregation: { policy: undefined } })
            );
            expect(config.aggregation.policy).toBe('exhaustive');
        });
    });

    describe('validateConfig', () => {
        it('should list every invalid field', () => {
            const candidate = mergeConfig({ retry: { maxAttempts: 0 }, aggregation: { resolvedThreshold: 2 } });

            expect(() => validateConfig(candidate)).toThrow(ConfigurationError);
            try {
                validateConfig(candidate);
            } catch (error) {
                expect(error).toBeInstanceOf(ConfigurationError);
                if (!(error instanceof ConfigurationError)) return;
                expect(error.issues).toHaveLength(2);
                expect(error.issues[0]).toMatch(/^retry\.maxAttempts: /);
                expect(error.issues[1]).toMatch(/^aggregation\.resolvedThreshold: /);
            }
        });

        it('should reject a backoff cap below the base delay', () => {
            const candidate = mergeConfig({ retry: { baseDelayMs: 5000, maxDelayMs: 1000 } });

            expect(() => validateConfig(candidate)).toThrow(
                'retry.maxDelayMs: maxDelayMs must be greater than or equal to baseDelayMs'
            );
        });

        it('should keep batch concurrency between 1 and 20', () => {
            expect(validateConfig(mergeConfig({ maxConcurrency: 20 })).maxConcurrency).toBe(20);
            expect(() => validateConfig(mergeConfig({ maxConcurrency: 0 }))).toThrow(/^Invalid configuration: maxConcurrency: /);
            expect(() => validateConfig(mergeConfig({ maxConcurrency: 21 }))).toThrow(/^Invalid configuration: maxConcurrency: /);
        });
    });

    describe('assertCredentials', () => {
        it('should accept complete credentials', () => {
            expect(() => assertCredentials(withCredentials())).not.toThrow();
        });

        it('should name every missing credential', () => {
            try {
                assertCredentials(DEFAULT_CONFIG);
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(ConfigurationError);
                if (!(error instanceof ConfigurationError)) return;
                expect(error.issues.map((i) => i.split(':')[0])).toEqual([
                    'entrez.email',
                    'webSearch.apiKey',
                    'webSearch.engineId',
                ]);
            }
        });

        it('should not ask for web search credentials when it is disabled', () => {
            const config = withCredentials({ webSearch: { ...DEFAULT_CONFIG.webSearch, enabled: false } });
            expect(() => assertCredentials(config)).not.toThrow();
        });

        it('should require at least one adapter', () => {
            const config = withCredentials({
                entrez: { ...DEFAULT_CONFIG.entrez, enabled: false },
                webSearch: { ...DEFAULT_CONFIG.webSearch, enabled: false },
            });
            expect(() => assertCredentials(config)).toThrow('at least one of entrez or webSearch');
        });
    });

    describe('resolveConfig', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'sragent-test-'));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('should layer flags over env over the config file', async () => {
            writeFileSync(
                join(dir, 'sragent.config.json'),
                JSON.stringify({ aggregation: { policy: 'exhaustive' }, retry: { maxAttempts: 2 }, logLevel: 'warn' })
            );

            const config = await resolveConfig(
                { retry: { maxAttempts: 5 } },
                { env: { EMAIL: 'test@example.org', SRAGENT_LOG_LEVEL: 'debug' }, searchFrom: dir }
            );

            expect(config.retry.maxAttempts).toBe(5);
            expect(config.aggregation.policy).toBe('exhaustive');
            expect(config.entrez.email).toBe('test@example.org');
            expect(config.logLevel).toBe('debug');
        });

        it('should read Google credentials from the environment', async () => {
            const config = await resolveConfig({}, {
                env: { GOOGLE_API_KEY: 'test-secret', GOOGLE_CSE_ID: 'test-engine' },
                searchFrom: dir,
            });

            expect(config.webSearch.apiKey).toBe('test-secret');
            expect(config.webSearch.engineId).toBe('test-engine');
        });

        it('should reject an invalid config file', async () => {
            writeFileSync(join(dir, 'sragent.config.json'), JSON.stringify({ aggregation: { policy: 'fastest' } }));

            await expect(resolveConfig({}, { env: {}, searchFrom: dir })).rejects.toBeInstanceOf(ConfigurationError);
        });
    });

    describe('redactConfig', () => {
        it('should mask credentials', () => {
            const redacted = redactConfig(withCredentials());

            expect(redacted).toMatchObject({
                entrez: { email: '***', apiKey: null },
                webSearch: { apiKey: '***', engineId: '***' },
            });
            expect(JSON.stringify(redacted)).not.toContain('test-secret');
        });
    });
});
