import { existsSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import { ResolutionStatus } from '../types/index.js';
import { resolveBatch } from '../engine/batch.js';
import { createEngine } from '../engine/factory.js';
import { createRequest, goalForAgent } from '../engine/request.js';
import { renderBatch } from '../exporters/format.js';
import { ResolutionDatabase } from '../storage/database.js';
import { redactConfig, resolveConfig } from '../utils/config.js';
import { parseCsv, readColumn } from '../utils/csv.js';
import { ConfigurationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
    EXIT_CONFIGURATION,
    EXIT_OK,
    EXIT_UNRESOLVED,
    flagsToConfig,
    formatConfigurationError,
    parseFlags,
    requireTarget,
    resolveFlagsSchema,
    type CommandOutput,
    type ResolveCommandDeps,
} from './resolve-command.js';

export const DEFAULT_ACCESSION_COLUMN = 'accession';

/**
 * Options of `sragent batch`: the resolve options without `--skip-existing`,
 * plus the CSV column, the concurrency limit and an output file.
 */
const batchFlagsSchema = resolveFlagsSchema.omit({ skipExisting: true }).extend({
    accessionColumn: z.string().min(1).optional(),
    maxConcurrency: z.coerce.number().int().optional(),
    output: z.string().min(1).optional(),
});

export type BatchFlags = z.infer<typeof batchFlagsSchema>;

/**
 * Expand batch inputs into the list of queries to resolve. An input naming an
 * existing file is read as CSV and contributes its accession column; anything
 * else is taken as an accession. Blank cells are skipped and repeated queries
 * resolved once, keeping first-seen order.
 */
export function readBatchInputs(inputs: readonly string[], column = DEFAULT_ACCESSION_COLUMN): string[] {
    const logger = getLogger();
    const queries: string[] = [];

    for (const input of inputs) {
        if (!existsSync(input) || !statSync(input).isFile()) {
            queries.push(input);
            continue;
        }

        const rows = parseCsv(readFileSync(input, 'utf-8'));
        const values = readColumn(rows, column);
        if (values === null) {
            throw new ConfigurationError(`${input} has no "${column}" column`, [
                `accession-column: header is ${(rows[0] ?? []).map((name) => `"${name}"`).join(', ') || 'empty'}`,
            ]);
        }

        const present = values.map((value) => value?.trim() ?? '').filter((value) => value !== '');
        if (present.length < values.length) {
            logger.warn({ file: input, skipped: values.length - present.length }, 'Skipped rows without an accession');
        }
        logger.debug({ file: input, column, rows: present.length }, 'Read batch file');
        queries.push(...present);
    }

    const unique = [...new Set(queries.map((query) => query.trim()).filter((query) => query !== ''))];
    if (unique.length < queries.length) {
        logger.debug({ duplicates: queries.length - unique.length }, 'Dropped repeated batch inputs');
    }
    if (unique.length === 0) {
        throw new ConfigurationError('Nothing to resolve', ['input: give accessions or a CSV file with an accession column']);
    }
    return unique;
}

/**
 * Run `sragent batch`: one resolution per input on a shared engine, at most
 * `maxConcurrency` at a time, rendered as one combined output. Exits 1 when any
 * item is Unresolved.
 */
export async function executeBatch(
    agent: string,
    inputs: readonly string[],
    rawFlags: unknown,
    deps: ResolveCommandDeps = {}
): Promise<CommandOutput> {
    let db: ResolutionDatabase | null = null;

    try {
        const flags = parseFlags(batchFlagsSchema, rawFlags);

        const goal = goalForAgent(agent);
        const target = flags.target !== undefined ? requireTarget(flags.target) : undefined;

        const config = await resolveConfig(
            { ...flagsToConfig(flags), maxConcurrency: flags.maxConcurrency },
            { env: deps.env, searchFrom: deps.searchFrom }
        );
        deps.onConfig?.(config);

        const requests = readBatchInputs(inputs, flags.accessionColumn).map((query) => createRequest(goal, query, target));
        if (config.db) db = new ResolutionDatabase(config.db);

        const engine = createEngine(config, deps.engine);
        const started = Date.now();
        const results = await resolveBatch(engine, requests, {
            maxConcurrency: config.maxConcurrency,
            signal: deps.signal,
        });
        const durationMs = Date.now() - started;

        if (db) {
            const stored = redactConfig(config);
            for (const result of results) {
                db.saveResult(result, stored);
            }
            getLogger().info({ runs: results.length, db: config.db }, 'Stored batch resolutions');
        }

        const rendered = renderBatch(results, config.format, durationMs);
        const exitCode = results.some((r) => r.status === ResolutionStatus.Unresolved) ? EXIT_UNRESOLVED : EXIT_OK;

        if (flags.output !== undefined) {
            writeFileSync(flags.output, rendered.stdout);
            getLogger().info({ path: flags.output, items: results.length }, 'Batch output written');
            return { exitCode, stdout: '', stderr: `${rendered.stderr}Wrote ${flags.output}\n` };
        }

        return { exitCode, ...rendered };
    } catch (error) {
        if (error instanceof ConfigurationError) {
            return { exitCode: EXIT_CONFIGURATION, stdout: '', stderr: formatConfigurationError(error) };
        }
        throw error;
    } finally {
        db?.close();
    }
}
