import Database from 'better-sqlite3';
import { z } from 'zod';
import {
    ACCESSION_NAMESPACES,
    type AccessionNamespace,
    type AccessionRecord,
    type GoalType,
    type ResolutionResult,
    type RunRecord,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

/**
 * SQLite schema migration v1.
 * One row per finished resolution, plus its records and attempt log.
 */
const MIGRATION_V1 = `
-- Runs: one finished resolution each
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  sragent_version TEXT NOT NULL,
  goal TEXT NOT NULL,
  input TEXT NOT NULL,
  target_type TEXT,
  status TEXT NOT NULL,
  cancelled INTEGER NOT NULL DEFAULT 0,
  duration_ms INTEGER NOT NULL,
  config_json TEXT NOT NULL DEFAULT '{}'
);

-- Records: deduplicated output of a run
CREATE TABLE IF NOT EXISTS records (
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  namespace TEXT NOT NULL,
  accession TEXT NOT NULL,
  source TEXT NOT NULL,
  strategy_id TEXT NOT NULL,
  confidence REAL NOT NULL,
  rank INTEGER NOT NULL,
  title TEXT,
  url TEXT,
  PRIMARY KEY (run_id, namespace, accession)
);

-- Attempts: every strategy tried, in order
CREATE TABLE IF NOT EXISTS attempts (
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  position INTEGER NOT NULL,
  strategy_id TEXT NOT NULL,
  adapter TEXT NOT NULL,
  query TEXT NOT NULL,
  rewrite TEXT NOT NULL,
  outcome TEXT NOT NULL,
  attempts INTEGER NOT NULL,
  reason TEXT,
  records_added INTEGER NOT NULL DEFAULT 0,
  duration_ms INTEGER NOT NULL,
  PRIMARY KEY (run_id, position)
);

CREATE INDEX IF NOT EXISTS idx_runs_lookup ON runs(goal, input, target_type);
CREATE INDEX IF NOT EXISTS idx_records_accession ON records(namespace, accession);
`;

// ─── Row schemas ──────────────────────────────────────────

const namespaceSchema = z.custom<AccessionNamespace>(
    (value) => ACCESSION_NAMESPACES.some((ns) => ns === value),
    { message: 'Unknown accession namespace' }
);

const runRowSchema = z.object({
    run_id: z.number(),
    created_at: z.string(),
    sragent_version: z.string(),
    goal: z.string(),
    input: z.string(),
    target_type: z.string().nullable(),
    status: z.string(),
    cancelled: z.number(),
    duration_ms: z.number(),
    config_json: z.string(),
});

const recordRowSchema = z.object({
    namespace: namespaceSchema,
    accession: z.string(),
    source: z.string(),
    strategy_id: z.string(),
    confidence: z.number(),
    rank: z.number(),
    title: z.string().nullable(),
    url: z.string().nullable(),
});

const attemptRowSchema = z.object({
    position: z.number(),
    strategy_id: z.string(),
    adapter: z.string(),
    query: z.string(),
    rewrite: z.string(),
    outcome: z.string(),
    attempts: z.number(),
    reason: z.string().nullable(),
    records_added: z.number(),
    duration_ms: z.number(),
});

const countSchema = z.object({ count: z.number() });
const statusCountSchema = z.object({ status: z.string(), count: z.number() });

export type StoredAttempt = z.infer<typeof attemptRowSchema>;

export interface DatabaseStats {
    runs: number;
    records: number;
    attempts: number;
    runsByStatus: Record<string, number>;
}

/**
 * Result store around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys and run bookkeeping.
 */
export class ResolutionDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    private migrate(): void {
        const currentVersion = z.number().parse(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Writes ───────────────────────────────────────────────

    /**
     * Store a finished resolution in one transaction. Returns the run id.
     */
    saveResult(result: ResolutionResult, config: unknown = {}): number {
        const runStmt = this.db.prepare(`
      INSERT INTO runs (sragent_version, goal, input, target_type, status, cancelled, duration_ms, config_json)
      VALUES (@sragent_version, @goal, @input, @target_type, @status, @cancelled, @duration_ms, @config_json)
    `);
        const recordStmt = this.db.prepare(`
      INSERT OR REPLACE INTO records (run_id, namespace, accession, source, strategy_id, confidence, rank, title, url)
      VALUES (@run_id, @namespace, @accession, @source, @strategy_id, @confidence, @rank, @title, @url)
    `);
        const attemptStmt = this.db.prepare(`
      INSERT INTO attempts (run_id, position, strategy_id, adapter, query, rewrite, outcome, attempts, reason, records_added, duration_ms)
      VALUES (@run_id, @position, @strategy_id, @adapter, @query, @rewrite, @outcome, @attempts, @reason, @records_added, @duration_ms)
    `);

        const save = this.db.transaction((): number => {
            const { request } = result;
            const runId = Number(
                runStmt.run({
                    sragent_version: VERSION,
                    goal: request.goal,
                    input: request.input,
                    target_type: request.targetType ?? null,
                    status: result.status,
                    cancelled: result.cancelled ? 1 : 0,
                    duration_ms: Math.round(result.durationMs),
                    config_json: JSON.stringify(config),
                }).lastInsertRowid
            );

            for (const record of result.records) {
                recordStmt.run({
                    run_id: runId,
                    namespace: record.namespace,
                    accession: record.id,
                    source: record.source,
                    strategy_id: record.strategyId,
                    confidence: record.confidence,
                    rank: record.rank,
                    title: record.title ?? null,
                    url: record.url ?? null,
                });
            }

            result.attempts.forEach((attempt, position) => {
                attemptStmt.run({
                    run_id: runId,
                    position,
                    strategy_id: attempt.strategy.id,
                    adapter: attempt.strategy.adapter,
                    query: attempt.strategy.query,
                    rewrite: attempt.strategy.rewrite,
                    outcome: attempt.outcome,
                    attempts: attempt.attempts,
                    reason: attempt.reason ? `${attempt.reason.kind}: ${attempt.reason.message}` : null,
                    records_added: attempt.recordsAdded,
                    duration_ms: Math.round(attempt.durationMs),
                });
            });

            return runId;
        });

        const runId = save();
        getLogger().debug({ runId, records: result.records.length }, 'Resolution stored');
        return runId;
    }

    // ─── Reads ────────────────────────────────────────────────

    getRun(runId: number): RunRecord | undefined {
        const row = this.db.prepare('SELECT * FROM runs WHERE run_id = ?').get(runId);
        return row === undefined ? undefined : runRowSchema.parse(row);
    }

    /**
     * Most recent runs first.
     */
    getRuns(limit = 20): RunRecord[] {
        const rows = this.db.prepare('SELECT * FROM runs ORDER BY run_id DESC LIMIT ?').all(limit);
        return z.array(runRowSchema).parse(rows);
    }

    getRecords(runId: number): AccessionRecord[] {
        const rows = this.db
            .prepare('SELECT * FROM records WHERE run_id = ? ORDER BY rank, namespace, accession')
            .all(runId);

        return z.array(recordRowSchema).parse(rows).map((row) => ({
            id: row.accession,
            namespace: row.namespace,
            source: row.source,
            strategyId: row.strategy_id,
            confidence: row.confidence,
            rank: row.rank,
            ...(row.title !== null ? { title: row.title } : {}),
            ...(row.url !== null ? { url: row.url } : {}),
        }));
    }

    getAttempts(runId: number): StoredAttempt[] {
        const rows = this.db.prepare('SELECT * FROM attempts WHERE run_id = ? ORDER BY position').all(runId);
        return z.array(attemptRowSchema).parse(rows);
    }

    /**
     * Latest Resolved run for the same goal, input and target, if any.
     */
    findLatestResolved(
        goal: GoalType,
        input: string,
        targetType?: AccessionNamespace
    ): { run: RunRecord; records: AccessionRecord[] } | null {
        const row = this.db
            .prepare(`
      SELECT * FROM runs
      WHERE goal = @goal AND input = @input AND target_type IS @target AND status = 'Resolved'
      ORDER BY run_id DESC LIMIT 1
    `)
            .get({ goal, input: input.trim(), target: targetType ?? null });

        if (row === undefined) return null;

        const run = runRowSchema.parse(row);
        return { run, records: this.getRecords(run.run_id) };
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): DatabaseStats {
        const count = (sql: string) => countSchema.parse(this.db.prepare(sql).get()).count;

        const runsByStatus: Record<string, number> = {};
        const rows = this.db.prepare('SELECT status, COUNT(*) as count FROM runs GROUP BY status').all();
        for (const row of z.array(statusCountSchema).parse(rows)) {
            runsByStatus[row.status] = row.count;
        }

        return {
            runs: count('SELECT COUNT(*) as count FROM runs'),
            records: count('SELECT COUNT(*) as count FROM records'),
            attempts: count('SELECT COUNT(*) as count FROM attempts'),
            runsByStatus,
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Get the raw better-sqlite3 instance (for ad-hoc queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }

    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }
}
