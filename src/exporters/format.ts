import {
    ResolutionStatus,
    type AccessionRecord,
    type OutputFormat,
    type ResolutionResult,
    type StrategyAttempt,
} from '../types/index.js';
import { VERSION } from '../version.js';

// ─── Types ───────────────────────────────────────────────

export interface RenderedResult {
    /** Structured output, written to stdout */
    stdout: string;

    /** Human summary, written to stderr when stdout carries machine-readable output */
    stderr: string;
}

const RECORD_COLUMNS = ['namespace', 'accession', 'confidence', 'source', 'strategy', 'title', 'url'] as const;
const TITLE_WIDTH = 60;

// ─── Entry point ─────────────────────────────────────────

/**
 * Render a result for the terminal. The table format puts everything on stdout;
 * csv, tsv and json keep stdout machine-readable and move the summary to stderr.
 */
export function renderResult(result: ResolutionResult, format: OutputFormat): RenderedResult {
    const summary = renderSummary(result);

    switch (format) {
        case 'table': {
            const table = result.records.length > 0 ? `\n${renderTable(result.records)}\n` : '';
            return { stdout: `${summary}${table}`, stderr: '' };
        }
        case 'csv':
            return { stdout: renderDelimited(result.records, ','), stderr: summary };
        case 'tsv':
            return { stdout: renderDelimited(result.records, '\t'), stderr: summary };
        case 'json':
            return { stdout: renderJson(result), stderr: summary };
    }
}

// ─── Summary ─────────────────────────────────────────────

/**
 * Status line plus, for anything short of Resolved, the attempt log.
 */
export function renderSummary(result: ResolutionResult): string {
    const { request } = result;
    const count = result.records.length;
    const target = request.targetType ? ` → ${request.targetType}` : '';
    const lines = [
        `Status: ${result.status}${result.cancelled ? ' (cancelled)' : ''}`,
        `Request: ${request.goal} "${request.input}"${target}`,
        `Found ${count} record${count === 1 ? '' : 's'} in ${formatDuration(result.durationMs)}`,
    ];

    if (result.status !== ResolutionStatus.Resolved) {
        lines.push('', 'Attempted strategies:');
        if (result.attempts.length === 0) {
            lines.push('  (none)');
        }
        result.attempts.forEach((attempt, i) => {
            lines.push(`  ${i + 1}. ${describeAttempt(attempt)}`);
        });
    }

    return `${lines.join('\n')}\n`;
}

/**
 * One-line description of a strategy attempt.
 */
export function describeAttempt(attempt: StrategyAttempt): string {
    const { strategy } = attempt;
    const tries = `${attempt.attempts} attempt${attempt.attempts === 1 ? '' : 's'}`;
    const head = `${strategy.id} [${strategy.adapter}] "${strategy.query}"`;

    if (attempt.outcome === 'success') {
        return `${head}: success, ${attempt.recordsAdded} new record${attempt.recordsAdded === 1 ? '' : 's'} (${tries})`;
    }

    const reason = attempt.reason ? `${attempt.reason.kind}: ${attempt.reason.message}` : 'unknown';
    return `${head}: failed, ${reason} (${tries})`;
}

// ─── Formats ─────────────────────────────────────────────

function renderTable(records: readonly AccessionRecord[]): string {
    const headers = ['NAMESPACE', 'ACCESSION', 'CONFIDENCE', 'SOURCE', 'TITLE'];
    const rows = records.map((r) => [
        r.namespace,
        r.id,
        r.confidence.toFixed(2),
        r.source,
        truncate(r.title ?? '', TITLE_WIDTH),
    ]);

    const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((row) => (row[i] ?? '').length)));
    const line = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i] ?? 0)).join('  ').trimEnd();

    return [line(headers), ...rows.map(line)].join('\n');
}

/**
 * CSV (RFC 4180 quoting) or TSV (tabs and newlines flattened to spaces).
 */
export function renderDelimited(records: readonly AccessionRecord[], delimiter: ',' | '\t'): string {
    const lines = [RECORD_COLUMNS.join(delimiter)];
    for (const r of records) {
        lines.push(recordCells(r).map((value) => delimitedCell(value, delimiter)).join(delimiter));
    }
    return `${lines.join('\n')}\n`;
}

function recordCells(r: AccessionRecord): string[] {
    return [r.namespace, r.id, r.confidence.toFixed(2), r.source, r.strategyId, r.title ?? '', r.url ?? ''];
}

function delimitedCell(value: string, delimiter: ',' | '\t'): string {
    if (delimiter === '\t') return value.replace(/[\t\r\n]+/g, ' ');
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function renderJson(result: ResolutionResult): string {
    return `${JSON.stringify({ sragent: { version: VERSION }, ...resultToJson(result) }, null, 2)}\n`;
}

function resultToJson(result: ResolutionResult) {
    const { request } = result;
    return {
        status: result.status,
        cancelled: result.cancelled,
        duration_ms: Math.round(result.durationMs),
        request: {
            goal: request.goal,
            input: request.input,
            target_type: request.targetType ?? null,
            accessions: request.accessions.map((a) => ({ namespace: a.namespace, id: a.id })),
        },
        records: result.records.map((r) => ({
            namespace: r.namespace,
            accession: r.id,
            confidence: r.confidence,
            rank: r.rank,
            source: r.source,
            strategy: r.strategyId,
            title: r.title ?? null,
            url: r.url ?? null,
        })),
        attempts: result.attempts.map((a) => ({
            strategy: a.strategy.id,
            adapter: a.strategy.adapter,
            query: a.strategy.query,
            rewrite: a.strategy.rewrite,
            deferred: a.strategy.deferred,
            outcome: a.outcome,
            attempts: a.attempts,
            reason: a.reason ? { kind: a.reason.kind, message: a.reason.message } : null,
            records_added: a.recordsAdded,
            duration_ms: Math.round(a.durationMs),
        })),
    };
}

// ─── Batch ───────────────────────────────────────────────

/**
 * Render a batch as one combined output. Delimited formats prefix every record
 * row with the item's input and status; an item without records still gets a
 * row so every input appears in the file.
 */
export function renderBatch(
    results: readonly ResolutionResult[],
    format: OutputFormat,
    durationMs: number
): RenderedResult {
    const summary = renderBatchSummary(results, durationMs);

    switch (format) {
        case 'table': {
            const table = results.length > 0 ? `\n${renderBatchTable(results)}\n` : '';
            return { stdout: `${summary}${table}`, stderr: '' };
        }
        case 'csv':
            return { stdout: renderBatchDelimited(results, ','), stderr: summary };
        case 'tsv':
            return { stdout: renderBatchDelimited(results, '\t'), stderr: summary };
        case 'json':
            return {
                stdout: `${JSON.stringify({
                    sragent: { version: VERSION },
                    duration_ms: Math.round(durationMs),
                    results: results.map(resultToJson),
                }, null, 2)}\n`,
                stderr: summary,
            };
    }
}

/**
 * Totals by status, then one line per item. Items short of Resolved list their
 * attempts underneath.
 */
export function renderBatchSummary(results: readonly ResolutionResult[], durationMs: number): string {
    const count = (status: ResolutionStatus) => results.filter((r) => r.status === status).length;
    const lines = [
        `Batch: ${results.length} input${results.length === 1 ? '' : 's'} in ${formatDuration(durationMs)}`,
        `Resolved ${count(ResolutionStatus.Resolved)}, `
            + `PartiallyResolved ${count(ResolutionStatus.PartiallyResolved)}, `
            + `Unresolved ${count(ResolutionStatus.Unresolved)}`,
    ];

    if (results.length > 0) lines.push('');

    results.forEach((result, i) => {
        const n = result.records.length;
        const cancelled = result.cancelled ? ' (cancelled)' : '';
        lines.push(`  ${i + 1}. ${result.status}${cancelled} "${result.request.input}": ${n} record${n === 1 ? '' : 's'}`);

        if (result.status !== ResolutionStatus.Resolved) {
            for (const attempt of result.attempts) {
                lines.push(`       - ${describeAttempt(attempt)}`);
            }
        }
    });

    return `${lines.join('\n')}\n`;
}

function renderBatchTable(results: readonly ResolutionResult[]): string {
    const headers = ['INPUT', 'STATUS', 'NAMESPACE', 'ACCESSION', 'CONFIDENCE', 'SOURCE'];
    const rows: string[][] = [];
    for (const result of results) {
        const head = [truncate(result.request.input, TITLE_WIDTH), result.status];
        if (result.records.length === 0) {
            rows.push([...head, '', '', '', '']);
        }
        for (const r of result.records) {
            rows.push([...head, r.namespace, r.id, r.confidence.toFixed(2), r.source]);
        }
    }

    const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((row) => (row[i] ?? '').length)));
    const line = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i] ?? 0)).join('  ').trimEnd();

    return [line(headers), ...rows.map(line)].join('\n');
}

function renderBatchDelimited(results: readonly ResolutionResult[], delimiter: ',' | '\t'): string {
    const lines = [['input', 'status', ...RECORD_COLUMNS].join(delimiter)];
    for (const result of results) {
        const head = [result.request.input, result.status];
        const rows = result.records.length > 0
            ? result.records.map(recordCells)
            : [RECORD_COLUMNS.map(() => '')];
        for (const cells of rows) {
            lines.push([...head, ...cells].map((value) => delimitedCell(value, delimiter)).join(delimiter));
        }
    }
    return `${lines.join('\n')}\n`;
}

// ─── Helpers ─────────────────────────────────────────────

export function formatDuration(ms: number): string {
    return ms < 1000 ? `${Math.round(ms)}ms` : `${(ms / 1000).toFixed(2)}s`;
}

function truncate(text: string, width: number): string {
    return text.length <= width ? text : `${text.slice(0, width - 1)}…`;
}
