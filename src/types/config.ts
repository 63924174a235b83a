/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Aggregation policy.
 *
 *   first-success — stop once a goal record reaches the resolved threshold
 *   exhaustive    — run every planned strategy for best coverage
 */
export type AggregationPolicy = 'first-success' | 'exhaustive';

/**
 * Output format of the `resolve` command.
 */
export type OutputFormat = 'table' | 'csv' | 'tsv' | 'json';

/**
 * NCBI Entrez E-utilities configuration.
 */
export interface EntrezConfig {
    enabled: boolean;
    email?: string;
    apiKey?: string;
    /** Sent as the E-utilities `tool` parameter */
    tool: string;
    rateLimitCeiling: number;
}

/**
 * Google Custom Search configuration.
 */
export interface WebSearchConfig {
    enabled: boolean;
    apiKey?: string;
    engineId?: string;
    resultsPerQuery: number;
    rateLimitCeiling: number;
}

/**
 * Retry/backoff configuration.
 */
export interface RetryConfig {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    /** Fraction of the nominal delay used as ± jitter */
    jitterRatio: number;
    attemptTimeoutMs: number;
}

export interface AggregationConfig {
    policy: AggregationPolicy;
    /** Minimum confidence for a record to count as resolving the request */
    resolvedThreshold: number;
}

export interface CacheConfig {
    enabled: boolean;
    dir: string;
    ttlHours: number;
}

/**
 * Full SRAgent configuration merged from CLI flags, env vars, and config file.
 */
export interface SRAgentConfig {
    entrez: EntrezConfig;
    webSearch: WebSearchConfig;
    retry: RetryConfig;
    aggregation: AggregationConfig;
    cache: CacheConfig;

    /** Window over which rate-limit responses are counted per adapter */
    rateLimitWindowMs: number;

    /** Requests resolved at once by `sragent batch` */
    maxConcurrency: number;

    // Output
    format: OutputFormat;
    db?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Partial configuration as accepted from a file, env or flags.
 */
export interface SRAgentConfigInput {
    entrez?: Partial<EntrezConfig>;
    webSearch?: Partial<WebSearchConfig>;
    retry?: Partial<RetryConfig>;
    aggregation?: Partial<AggregationConfig>;
    cache?: Partial<CacheConfig>;
    rateLimitWindowMs?: number;
    maxConcurrency?: number;
    format?: OutputFormat;
    db?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: SRAgentConfig = {
    entrez: {
        enabled: true,
        tool: 'sragent',
        rateLimitCeiling: 3,
    },
    webSearch: {
        enabled: true,
        resultsPerQuery: 10,
        rateLimitCeiling: 2,
    },
    retry: {
        maxAttempts: 4,
        baseDelayMs: 1000,
        maxDelayMs: 30000,
        jitterRatio: 0.2,
        attemptTimeoutMs: 30000,
    },
    aggregation: {
        policy: 'first-success',
        resolvedThreshold: 0.8,
    },
    cache: {
        enabled: true,
        dir: '.sragent-cache',
        ttlHours: 24,
    },
    rateLimitWindowMs: 60000,
    maxConcurrency: 5,
    format: 'table',
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id: number;
    created_at: string;
    sragent_version: string;
    goal: string;
    input: string;
    target_type: string | null;
    status: string;
    cancelled: number;
    duration_ms: number;
    config_json: string;
}
