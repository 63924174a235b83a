import type { AccessionNamespace, AccessionRecord, AccessionRef } from './accession.js';

/**
 * What the caller wants out of a request.
 *
 *   convert          — accession X to accession type Y (GSE → SRX, PRJNA → SRR, ...)
 *   find-publication — PMID / PMCID / DOI of the paper behind a dataset
 *   find-datasets    — dataset accessions matching a free-text description
 *   lookup           — every accession related to the given identifiers
 */
export type GoalType = 'convert' | 'find-publication' | 'find-datasets' | 'lookup';

/**
 * Immutable value created once per invocation.
 */
export interface ResolutionRequest {
    readonly goal: GoalType;

    /** Raw input text as given by the user */
    readonly input: string;

    /** Identifiers parsed from the input, in order of appearance */
    readonly accessions: readonly AccessionRef[];

    /** Requested output namespace, if any */
    readonly targetType?: AccessionNamespace;
}

/** Query rewrite applied to a search-oriented strategy */
export type RewriteRule = 'literal' | 'quote-terms' | 'append-database';

/**
 * One planned (adapter, query) pair.
 */
export interface Strategy {
    /** Stable identifier, unique within a plan */
    readonly id: string;

    readonly adapter: string;
    readonly query: string;
    readonly context: Readonly<Record<string, string>>;
    readonly rewrite: RewriteRule;

    /** Confidence assigned to records this strategy yields */
    readonly confidence: number;

    /** Namespaces this strategy is expected to produce */
    readonly targets: readonly AccessionNamespace[];

    /** Index in the plan */
    readonly position: number;

    /** True when the adapter was over its throttle ceiling at plan time */
    readonly deferred: boolean;
}

export type AdapterFailureKind =
    | 'timeout'
    | 'rate-limit'
    | 'network'
    | 'server'
    | 'auth'
    | 'malformed-query'
    | 'not-found'
    | 'malformed-response'
    | 'cancelled'
    | 'unknown';

export interface AdapterFailure {
    readonly kind: AdapterFailureKind;
    readonly message: string;
    readonly status?: number;

    /** Server-provided Retry-After hint */
    readonly retryAfterMs?: number;
}

export interface SuccessOutcome<P = unknown> {
    readonly kind: 'success';
    readonly payload: P;
    readonly attempts: number;
}

export interface RetryableFailureOutcome {
    readonly kind: 'retryable-failure';
    readonly reason: AdapterFailure;
    readonly attempts: number;
}

export interface TerminalFailureOutcome {
    readonly kind: 'terminal-failure';
    readonly reason: AdapterFailure;
    readonly attempts: number;

    /** True when the attempt budget ran out on retryable failures */
    readonly exhausted: boolean;
}

export type AttemptOutcome<P = unknown> = SuccessOutcome<P> | RetryableFailureOutcome | TerminalFailureOutcome;

/** What `RetryController.execute` settles on */
export type SettledOutcome<P = unknown> = SuccessOutcome<P> | TerminalFailureOutcome;

export enum ResolutionStatus {
    Resolved = 'Resolved',
    PartiallyResolved = 'PartiallyResolved',
    Unresolved = 'Unresolved',
}

/**
 * Diagnostic entry for one strategy the engine tried.
 */
export interface StrategyAttempt {
    readonly strategy: Strategy;
    readonly outcome: 'success' | 'terminal-failure';
    readonly attempts: number;
    readonly reason?: AdapterFailure;
    readonly recordsAdded: number;
    readonly durationMs: number;
}

export interface ResolutionResult {
    readonly request: ResolutionRequest;
    readonly status: ResolutionStatus;
    readonly records: readonly AccessionRecord[];
    readonly attempts: readonly StrategyAttempt[];
    readonly cancelled: boolean;
    readonly durationMs: number;
}
