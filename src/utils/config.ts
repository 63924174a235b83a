import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    type SRAgentConfig,
    type SRAgentConfigInput,
} from '../types/index.js';
import { ConfigurationError } from './errors.js';
import { getLogger } from './logger.js';

// ─── Schemas ──────────────────────────────────────────────

const entrezSchema = z.object({
    enabled: z.boolean(),
    email: z.string().email().optional(),
    apiKey: z.string().min(1).optional(),
    tool: z.string().min(1),
    rateLimitCeiling: z.number().int().positive(),
});

const webSearchSchema = z.object({
    enabled: z.boolean(),
    apiKey: z.string().min(1).optional(),
    engineId: z.string().min(1).optional(),
    resultsPerQuery: z.number().int().min(1).max(10),
    rateLimitCeiling: z.number().int().positive(),
});

const retrySchema = z.object({
    maxAttempts: z.number().int().min(1).max(10),
    baseDelayMs: z.number().int().nonnegative(),
    maxDelayMs: z.number().int().nonnegative(),
    jitterRatio: z.number().min(0).max(1),
    attemptTimeoutMs: z.number().int().positive(),
});

const aggregationSchema = z.object({
    policy: z.enum(['first-success', 'exhaustive']),
    resolvedThreshold: z.number().min(0).max(1),
});

const cacheSchema = z.object({
    enabled: z.boolean(),
    dir: z.string().min(1),
    ttlHours: z.number().positive(),
});

const formatSchema = z.enum(['table', 'csv', 'tsv', 'json']);
const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

const configSchema = z.object({
    entrez: entrezSchema,
    webSearch: webSearchSchema,
    retry: retrySchema.refine((r) => r.maxDelayMs >= r.baseDelayMs, {
        message: 'maxDelayMs must be greater than or equal to baseDelayMs',
        path: ['maxDelayMs'],
    }),
    aggregation: aggregationSchema,
    cache: cacheSchema,
    rateLimitWindowMs: z.number().int().positive(),
    maxConcurrency: z.number().int().min(1).max(20),
    format: formatSchema,
    db: z.string().min(1).optional(),
    logLevel: logLevelSchema,
    jsonLogs: z.boolean(),
});

const configInputSchema = z.object({
    entrez: entrezSchema.partial().optional(),
    webSearch: webSearchSchema.partial().optional(),
    retry: retrySchema.partial().optional(),
    aggregation: aggregationSchema.partial().optional(),
    cache: cacheSchema.partial().optional(),
    rateLimitWindowMs: z.number().optional(),
    maxConcurrency: z.number().optional(),
    format: formatSchema.optional(),
    db: z.string().optional(),
    logLevel: logLevelSchema.optional(),
    jsonLogs: z.boolean().optional(),
});

function formatIssues(error: z.ZodError, prefix = ''): string[] {
    return error.issues.map((issue) => `${prefix}${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

// ─── Sources ──────────────────────────────────────────────

/**
 * Load configuration from sragent.config.json using cosmiconfig.
 * Returns null when no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<SRAgentConfigInput | null> {
    const explorer = cosmiconfig('sragent', {
        searchPlaces: ['sragent.config.json', '.sragentrc.json'],
    });

    let result: Awaited<ReturnType<typeof explorer.search>>;
    try {
        result = await explorer.search(searchFrom);
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
        return null;
    }

    if (!result || result.isEmpty) return null;

    const parsed = configInputSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new ConfigurationError(
            `Invalid config file ${result.filepath}`,
            formatIssues(parsed.error, `${result.filepath}: `)
        );
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Pick the Entrez credentials for this process. With numbered sets
 * (EMAIL1..EMAIL10, NCBI_API_KEY1..NCBI_API_KEY10) one set is chosen at random to
 * spread load across keys; otherwise EMAIL / NCBI_API_KEY are used.
 */
export function pickEntrezCredentials(
    env: NodeJS.ProcessEnv,
    random: () => number = Math.random
): { email?: string; apiKey?: string } {
    const indices: number[] = [];
    for (let i = 0; i <= 10; i++) {
        if (env[`EMAIL${i}`]) indices.push(i);
    }

    let email = env['EMAIL'];
    let apiKey = env['NCBI_API_KEY'];

    if (indices.length > 0) {
        const n = indices[Math.min(indices.length - 1, Math.floor(random() * indices.length))];
        if (n !== undefined) {
            email = env[`EMAIL${n}`] ?? email;
            apiKey = env[`NCBI_API_KEY${n}`] ?? apiKey;
        }
    }

    return {
        ...(email ? { email } : {}),
        ...(apiKey ? { apiKey } : {}),
    };
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv, random: () => number): SRAgentConfigInput {
    const input: SRAgentConfigInput = {
        entrez: pickEntrezCredentials(env, random),
        webSearch: {},
    };

    const googleKey = env['GOOGLE_API_KEY'];
    const googleCx = env['GOOGLE_CSE_ID'];
    if (googleKey) input.webSearch = { ...input.webSearch, apiKey: googleKey };
    if (googleCx) input.webSearch = { ...input.webSearch, engineId: googleCx };

    const level = logLevelSchema.safeParse(env['SRAGENT_LOG_LEVEL']);
    if (level.success) input.logLevel = level.data;

    return input;
}

// ─── Merge & validate ─────────────────────────────────────

/**
 * Shallow merge that ignores undefined values, so unset flags never erase
 * lower-precedence settings.
 */
function mergeDefined<T extends object>(base: T, ...layers: Array<Partial<T> | undefined>): T {
    const result: T = { ...base };
    for (const layer of layers) {
        if (!layer) continue;
        for (const [key, value] of Object.entries(layer)) {
            if (value !== undefined) {
                Reflect.set(result, key, value);
            }
        }
    }
    return result;
}

/**
 * Merge configuration layers over the defaults.
 * Layers are given lowest precedence first.
 */
export function mergeConfig(...layers: Array<SRAgentConfigInput | null>): unknown {
    const present = layers.filter((l): l is SRAgentConfigInput => l !== null);

    const top = mergeDefined<SRAgentConfigInput>({}, ...present);

    return {
        ...DEFAULT_CONFIG,
        ...top,
        entrez: mergeDefined({ ...DEFAULT_CONFIG.entrez }, ...present.map((l) => l.entrez)),
        webSearch: mergeDefined({ ...DEFAULT_CONFIG.webSearch }, ...present.map((l) => l.webSearch)),
        retry: mergeDefined({ ...DEFAULT_CONFIG.retry }, ...present.map((l) => l.retry)),
        aggregation: mergeDefined({ ...DEFAULT_CONFIG.aggregation }, ...present.map((l) => l.aggregation)),
        cache: mergeDefined({ ...DEFAULT_CONFIG.cache }, ...present.map((l) => l.cache)),
    };
}

/**
 * Validate a merged configuration. Throws ConfigurationError listing every issue.
 */
export function validateConfig(candidate: unknown): SRAgentConfig {
    const parsed = configSchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = formatIssues(parsed.error);
        throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }
    return parsed.data;
}

/**
 * Check that every enabled adapter has its credentials.
 */
export function assertCredentials(config: SRAgentConfig): void {
    const issues: string[] = [];

    if (config.entrez.enabled && !config.entrez.email) {
        issues.push('entrez.email: required by NCBI E-utilities (set EMAIL or entrez.email)');
    }
    if (config.webSearch.enabled && !config.webSearch.apiKey) {
        issues.push('webSearch.apiKey: required (set GOOGLE_API_KEY or disable web search)');
    }
    if (config.webSearch.enabled && !config.webSearch.engineId) {
        issues.push('webSearch.engineId: required (set GOOGLE_CSE_ID or disable web search)');
    }
    if (!config.entrez.enabled && !config.webSearch.enabled) {
        issues.push('adapters: at least one of entrez or webSearch must be enabled');
    }

    if (issues.length > 0) {
        throw new ConfigurationError(`Missing credentials: ${issues.join('; ')}`, issues);
    }
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: SRAgentConfigInput,
    options: { env?: NodeJS.ProcessEnv; random?: () => number; searchFrom?: string } = {}
): Promise<SRAgentConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env ?? process.env, options.random ?? Math.random);

    return validateConfig(mergeConfig(fileConfig, envConfig, cliFlags));
}

/**
 * Configuration with credentials masked, for storage and debug output.
 */
export function redactConfig(config: SRAgentConfig): unknown {
    const mask = (value: string | undefined) => (value ? '***' : null);
    return {
        ...config,
        entrez: { ...config.entrez, email: mask(config.entrez.email), apiKey: mask(config.entrez.apiKey) },
        webSearch: {
            ...config.webSearch,
            apiKey: mask(config.webSearch.apiKey),
            engineId: mask(config.webSearch.engineId),
        },
    };
}
