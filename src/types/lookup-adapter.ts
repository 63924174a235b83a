import type { AccessionRecord } from './accession.js';
import type { AdapterFailure, Strategy } from './resolution.js';

export type LookupResult<P> =
    | { readonly ok: true; readonly payload: P }
    | { readonly ok: false; readonly error: AdapterFailure };

/**
 * Interface for external lookup adapters (Entrez, web search, etc.).
 * Each adapter owns its request shape, its failure classification and the rules
 * that turn its payload into AccessionRecords.
 */
export interface LookupAdapter<P = unknown> {
    /** Adapter identifier used in strategies, records and the throttle registry */
    readonly name: string;

    /**
     * Rate-limit responses tolerated inside the registry window before the
     * strategy selector defers this adapter.
     */
    readonly rateLimitCeiling: number;

    /**
     * Run one query. Expected failures come back as `{ ok: false }`; anything
     * thrown is classified by the retry controller.
     */
    lookup(query: string, context: Readonly<Record<string, string>>, signal?: AbortSignal): Promise<LookupResult<P>>;

    /**
     * Whether a failure is worth another attempt.
     */
    isRetryable(failure: AdapterFailure): boolean;

    /**
     * Normalize a payload into zero or more records for the strategy that produced it.
     */
    normalize(payload: P, strategy: Strategy): AccessionRecord[];
}

/**
 * Options for adapter initialization.
 */
export interface LookupAdapterOptions {
    /** API key (from config or environment) */
    apiKey?: string;

    /** Overrides the adapter's default throttle ceiling */
    rateLimitCeiling?: number;
}
