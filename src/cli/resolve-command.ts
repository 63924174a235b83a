import { z } from 'zod';
import {
    ResolutionStatus,
    type AccessionNamespace,
    type ResolutionResult,
    type SRAgentConfig,
    type SRAgentConfigInput,
} from '../types/index.js';
import { createEngine, type EngineFactoryDeps } from '../engine/factory.js';
import { createRequest, goalForAgent, parseTarget } from '../engine/request.js';
import { renderResult } from '../exporters/format.js';
import { ResolutionDatabase } from '../storage/database.js';
import { redactConfig, resolveConfig } from '../utils/config.js';
import { ConfigurationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export const EXIT_OK = 0;
export const EXIT_UNRESOLVED = 1;
export const EXIT_CONFIGURATION = 2;

/**
 * Options of `sragent resolve` as commander hands them over. Numbers arrive as
 * strings; `--no-cache` and `--no-web-search` default their flag to true.
 */
export const resolveFlagsSchema = z.object({
    target: z.string().optional(),
    policy: z.enum(['first-success', 'exhaustive']).optional(),
    maxAttempts: z.coerce.number().int().optional(),
    baseDelay: z.coerce.number().int().optional(),
    maxDelay: z.coerce.number().int().optional(),
    timeout: z.coerce.number().int().optional(),
    threshold: z.coerce.number().optional(),
    format: z.enum(['table', 'csv', 'tsv', 'json']).optional(),
    db: z.string().optional(),
    skipExisting: z.boolean().optional(),
    cache: z.boolean().optional(),
    webSearch: z.boolean().optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
    jsonLogs: z.boolean().optional(),
});

export type ResolveFlags = z.infer<typeof resolveFlagsSchema>;

export interface ResolveCommandDeps {
    env?: NodeJS.ProcessEnv;
    searchFrom?: string;
    signal?: AbortSignal;
    engine?: EngineFactoryDeps;

    /** Called once the configuration is known, before any lookup */
    onConfig?: (config: SRAgentConfig) => void;
}

export interface CommandOutput {
    exitCode: number;
    stdout: string;
    stderr: string;
}

/**
 * Translate parsed flags into a configuration layer. Only flags the user set
 * are included, so they never mask file or env settings by accident.
 */
export function flagsToConfig(flags: ResolveFlags): SRAgentConfigInput {
    return {
        retry: {
            maxAttempts: flags.maxAttempts,
            baseDelayMs: flags.baseDelay,
            maxDelayMs: flags.maxDelay,
            attemptTimeoutMs: flags.timeout,
        },
        aggregation: {
            policy: flags.policy,
            resolvedThreshold: flags.threshold,
        },
        cache: flags.cache === false ? { enabled: false } : {},
        webSearch: flags.webSearch === false ? { enabled: false } : {},
        format: flags.format,
        db: flags.db,
        logLevel: flags.logLevel,
        jsonLogs: flags.jsonLogs,
    };
}

/**
 * Run `sragent resolve` and return what to print and the exit code.
 * Configuration problems become exit code 2; anything else unexpected propagates.
 */
export async function executeResolve(
    agent: string,
    query: readonly string[],
    rawFlags: unknown,
    deps: ResolveCommandDeps = {}
): Promise<CommandOutput> {
    let db: ResolutionDatabase | null = null;

    try {
        const flags = parseFlags(resolveFlagsSchema, rawFlags);

        const goal = goalForAgent(agent);
        const target = flags.target !== undefined ? requireTarget(flags.target) : undefined;

        const config = await resolveConfig(flagsToConfig(flags), { env: deps.env, searchFrom: deps.searchFrom });
        deps.onConfig?.(config);

        const request = createRequest(goal, query.join(' '), target);

        if (flags.skipExisting && !config.db) {
            throw new ConfigurationError('--skip-existing needs a result database', ['db: set --db <path>']);
        }
        if (config.db) db = new ResolutionDatabase(config.db);

        if (flags.skipExisting && db) {
            const previous = db.findLatestResolved(request.goal, request.input, request.targetType);
            if (previous) {
                getLogger().info({ runId: previous.run.run_id }, 'Reusing stored resolution');
                const reused: ResolutionResult = {
                    request,
                    status: ResolutionStatus.Resolved,
                    records: previous.records,
                    attempts: [],
                    cancelled: false,
                    durationMs: 0,
                };
                const rendered = renderResult(reused, config.format);
                return {
                    exitCode: EXIT_OK,
                    stdout: rendered.stdout,
                    stderr: `Reusing run #${previous.run.run_id} from ${previous.run.created_at}\n${rendered.stderr}`,
                };
            }
        }

        const engine = createEngine(config, deps.engine);
        const result = await engine.resolve(request, { signal: deps.signal });

        if (db) {
            const runId = db.saveResult(result, redactConfig(config));
            getLogger().info({ runId, db: config.db }, 'Stored resolution');
        }

        const rendered = renderResult(result, config.format);
        return {
            exitCode: result.status === ResolutionStatus.Unresolved ? EXIT_UNRESOLVED : EXIT_OK,
            ...rendered,
        };
    } catch (error) {
        if (error instanceof ConfigurationError) {
            return { exitCode: EXIT_CONFIGURATION, stdout: '', stderr: formatConfigurationError(error) };
        }
        throw error;
    } finally {
        db?.close();
    }
}

export function formatConfigurationError(error: ConfigurationError): string {
    const lines = [`Configuration error: ${error.message}`, ...error.issues.map((issue) => `  - ${issue}`)];
    return `${lines.join('\n')}\n`;
}

/**
 * Validate commander options against a flag schema. Issues name the flag as
 * typed on the command line.
 */
export function parseFlags<T extends z.ZodTypeAny>(schema: T, rawFlags: unknown): z.infer<T> {
    const parsed = schema.safeParse(rawFlags);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `--${kebab(String(i.path[0] ?? 'option'))}: ${i.message}`);
        throw new ConfigurationError('Invalid options', issues);
    }
    return parsed.data;
}

export function requireTarget(raw: string): AccessionNamespace {
    const target = parseTarget(raw);
    if (!target) {
        throw new ConfigurationError(`Unknown target type "${raw}"`, [
            'target: use an accession type such as SRX, SRR, SRP, GSE, BIOPROJECT, PMID or DOI',
        ]);
    }
    return target;
}

function kebab(name: string): string {
    return name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}
