import { Command } from 'commander';
import { ResponseCache } from '../cache/response-cache.js';
import { formatDuration } from '../exporters/format.js';
import { ResolutionDatabase } from '../storage/database.js';
import { resolveConfig } from '../utils/config.js';
import { ConfigurationError } from '../utils/errors.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';
import { DEFAULT_ACCESSION_COLUMN, executeBatch } from './batch-command.js';
import {
    EXIT_CONFIGURATION,
    executeResolve,
    formatConfigurationError,
    type CommandOutput,
    type ResolveCommandDeps,
} from './resolve-command.js';

const program = new Command();

program
    .name('sragent')
    .description('Resolve GEO, SRA, BioProject, BioSample and publication accessions through NCBI Entrez and web search.')
    .version(VERSION);

// ─── RESOLVE command ──────────────────────────────────────

program
    .command('resolve')
    .description('Resolve a query with an agent: convert | publications | datasets | entrez')
    .argument('<agent>', 'Agent: convert | publications | datasets | entrez')
    .argument('<query...>', 'Accession(s) or free-text description')
    .option('-t, --target <type>', 'Target accession type (SRX, SRR, SRP, GSE, BIOPROJECT, PMID, ...)')
    .option('--policy <policy>', 'Aggregation policy: first-success | exhaustive')
    .option('--max-attempts <n>', 'Attempts per strategy')
    .option('--base-delay <ms>', 'Initial backoff delay')
    .option('--max-delay <ms>', 'Backoff cap')
    .option('--timeout <ms>', 'Timeout per attempt')
    .option('--threshold <confidence>', 'Confidence at which a record resolves the request')
    .option('-f, --format <format>', 'Output format: table | csv | tsv | json')
    .option('--db <path>', 'Store the result in a SQLite database')
    .option('--skip-existing', 'Reuse the latest Resolved run from --db for the same query')
    .option('--no-cache', 'Disable response caching')
    .option('--no-web-search', 'Only query NCBI Entrez')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (agent: string, query: string[], opts: unknown) => {
        await runInterruptible((deps) => executeResolve(agent, query, opts, deps));
    });

// ─── BATCH command ────────────────────────────────────────

program
    .command('batch')
    .description('Resolve many accessions, given inline or as a CSV column, into one combined output')
    .argument('<agent>', 'Agent: convert | publications | datasets | entrez')
    .argument('<inputs...>', 'Accessions and/or CSV files')
    .option('--accession-column <name>', 'CSV column holding the accessions', DEFAULT_ACCESSION_COLUMN)
    .option('-j, --max-concurrency <n>', 'Accessions resolved at once (1-20)')
    .option('-o, --output <path>', 'Write the combined output to a file')
    .option('-t, --target <type>', 'Target accession type (SRX, SRR, SRP, GSE, BIOPROJECT, PMID, ...)')
    .option('--policy <policy>', 'Aggregation policy: first-success | exhaustive')
    .option('--max-attempts <n>', 'Attempts per strategy')
    .option('--base-delay <ms>', 'Initial backoff delay')
    .option('--max-delay <ms>', 'Backoff cap')
    .option('--timeout <ms>', 'Timeout per attempt')
    .option('--threshold <confidence>', 'Confidence at which a record resolves the request')
    .option('-f, --format <format>', 'Output format: table | csv | tsv | json')
    .option('--db <path>', 'Store every result in a SQLite database')
    .option('--no-cache', 'Disable response caching')
    .option('--no-web-search', 'Only query NCBI Entrez')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (agent: string, inputs: string[], opts: unknown) => {
        await runInterruptible((deps) => executeBatch(agent, inputs, opts, deps));
    });

/**
 * Run a command with SIGINT wired to cancellation and the logger configured from
 * the resolved settings, then print its output.
 */
async function runInterruptible(run: (deps: ResolveCommandDeps) => Promise<CommandOutput>): Promise<void> {
    const controller = new AbortController();
    const onSigint = () => {
        getLogger().warn('Interrupted, finishing the current lookup');
        controller.abort();
    };
    process.once('SIGINT', onSigint);

    try {
        const output = await run({
            signal: controller.signal,
            onConfig: (config) => initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs }),
        });
        process.stderr.write(output.stderr);
        process.stdout.write(output.stdout);
        process.exitCode = output.exitCode;
    } catch (error) {
        getLogger().error({ err: error }, 'Resolution failed');
        process.exitCode = 1;
    } finally {
        process.off('SIGINT', onSigint);
    }
}

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show stored resolutions')
    .requiredOption('--db <path>', 'Result database path')
    .option('--run <id>', 'Show records and attempts of one run')
    .option('-n, --limit <n>', 'Recent runs to list', '10')
    .action((opts: { db: string; run?: string; limit: string }) => {
        const db = new ResolutionDatabase(opts.db);

        try {
            if (opts.run !== undefined) {
                printRun(db, parseInt(opts.run, 10));
                return;
            }

            const stats = db.getStats();
            console.log('\nSRAgent result database\n');
            console.log(`  Runs:     ${stats.runs}`);
            console.log(`  Records:  ${stats.records}`);
            console.log(`  Attempts: ${stats.attempts}`);

            if (Object.keys(stats.runsByStatus).length > 0) {
                console.log('\n  By status:');
                for (const [status, count] of Object.entries(stats.runsByStatus)) {
                    console.log(`    ${status}: ${count}`);
                }
            }

            const runs = db.getRuns(parseInt(opts.limit, 10) || 10);
            if (runs.length > 0) {
                console.log('\n  Recent runs:');
                for (const run of runs) {
                    const target = run.target_type ? ` → ${run.target_type}` : '';
                    console.log(`    #${run.run_id}  ${run.created_at}  ${run.status.padEnd(17)} ${run.goal} "${run.input}"${target}`);
                }
            }

            console.log('');
        } finally {
            db.close();
        }
    });

function printRun(db: ResolutionDatabase, runId: number): void {
    const run = db.getRun(runId);
    if (!run) {
        console.error(`No run #${runId}`);
        process.exitCode = 1;
        return;
    }

    console.log(`\nRun #${run.run_id}: ${run.status}, ${run.goal} "${run.input}" (${formatDuration(run.duration_ms)})\n`);
    for (const record of db.getRecords(runId)) {
        console.log(`  ${record.namespace.padEnd(12)} ${record.id.padEnd(24)} ${record.confidence.toFixed(2)}  ${record.source}`);
    }

    const attempts = db.getAttempts(runId);
    if (attempts.length > 0) {
        console.log('\n  Attempts:');
        for (const a of attempts) {
            const detail = a.reason ?? `${a.records_added} new`;
            console.log(`    ${a.position + 1}. ${a.strategy_id}: ${a.outcome} (${detail}, ${a.attempts} attempts)`);
        }
    }
    console.log('');
}

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the response cache')
    .argument('<action>', 'Action: clear | stats')
    .action(async (action: string) => {
        const config = await resolveConfig({}).catch((error: unknown) => {
            if (!(error instanceof ConfigurationError)) throw error;
            process.stderr.write(formatConfigurationError(error));
            process.exitCode = EXIT_CONFIGURATION;
            return null;
        });
        if (!config) return;

        const cache = new ResponseCache({ cacheDir: config.cache.dir, ttlHours: config.cache.ttlHours, enabled: false });

        switch (action) {
            case 'clear': {
                const removed = cache.clear();
                console.log(removed > 0 ? `Cache cleared (${removed} entries).` : 'No cache to clear.');
                break;
            }
            case 'stats': {
                const stats = cache.getStats();
                console.log(`Cache ${stats.directory}: ${stats.entries} entries, ${(stats.bytes / 1024).toFixed(1)} KB`);
                break;
            }
            default:
                console.error(`Unknown action: ${action}. Valid: clear, stats`);
                process.exitCode = 1;
        }
    });

await program.parseAsync(process.argv);
