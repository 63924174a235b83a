import { ZodError } from 'zod';
import type { AdapterFailure, AdapterFailureKind } from '../types/index.js';
import { HttpError } from './http-client.js';

/**
 * Raised for missing credentials or invalid settings. The only error the
 * resolution layer lets reach the caller.
 */
export class ConfigurationError extends Error {
    constructor(
        message: string,
        public readonly issues: readonly string[] = []
    ) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Expected failure raised inside an adapter (empty result, error in a response
 * body). Adapters catch it and return `{ ok: false }`.
 */
export class AdapterError extends Error {
    constructor(public readonly failure: AdapterFailure) {
        super(failure.message);
        this.name = 'AdapterError';
    }
}

/** Failure kinds worth another attempt unless an adapter says otherwise */
const RETRYABLE_KINDS: ReadonlySet<AdapterFailureKind> = new Set(['timeout', 'rate-limit', 'network', 'server']);

/**
 * Default retryable-failure predicate.
 */
export function isRetryableFailure(failure: AdapterFailure): boolean {
    return RETRYABLE_KINDS.has(failure.kind);
}

/**
 * Map an HTTP status to a failure kind.
 */
export function failureKindForStatus(status: number): AdapterFailureKind {
    if (status === 429) return 'rate-limit';
    if (status === 408) return 'timeout';
    if (status >= 500) return 'server';
    if (status === 401 || status === 403) return 'auth';
    if (status === 404) return 'not-found';
    if (status >= 400) return 'malformed-query';
    return 'unknown';
}

/**
 * Convert anything an adapter throws into an AdapterFailure value.
 */
export function toAdapterFailure(error: unknown): AdapterFailure {
    if (error instanceof AdapterError) return error.failure;

    if (error instanceof HttpError) {
        let kind: AdapterFailureKind;
        switch (error.code) {
            case 'timeout':
                kind = 'timeout';
                break;
            case 'cancelled':
                kind = 'cancelled';
                break;
            case 'network':
                kind = error.retryable ? 'network' : 'unknown';
                break;
            default:
                kind = failureKindForStatus(error.status);
        }
        return {
            kind,
            message: error.message,
            ...(error.status > 0 ? { status: error.status } : {}),
            ...(error.retryAfterMs !== undefined ? { retryAfterMs: error.retryAfterMs } : {}),
        };
    }

    if (error instanceof ZodError) {
        const first = error.issues[0];
        const where = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'schema mismatch';
        return { kind: 'malformed-response', message: `Unexpected response shape (${where})` };
    }

    if (error instanceof Error) {
        if (error.name === 'AbortError') {
            return { kind: 'cancelled', message: error.message || 'Aborted' };
        }
        return { kind: 'unknown', message: error.message };
    }

    return { kind: 'unknown', message: String(error) };
}
