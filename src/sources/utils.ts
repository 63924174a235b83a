import type { AccessionRecord, AccessionRef, AdapterFailureKind, LookupResult, Strategy } from '../types/index.js';
import { accessionKey } from '../accessions/parse.js';
import { AdapterError } from '../utils/errors.js';

/**
 * Shared utilities for lookup adapters.
 */

/**
 * Every string inside a JSON value, depth first. Used to scan summary documents
 * for accessions without tripping over JSON escaping.
 */
export function collectStrings(value: unknown, out: string[] = []): string[] {
    if (typeof value === 'string') {
        out.push(value);
    } else if (Array.isArray(value)) {
        for (const item of value) collectStrings(item, out);
    } else if (value !== null && typeof value === 'object') {
        for (const item of Object.values(value)) collectStrings(item, out);
    }
    return out;
}

/**
 * Keep the refs a strategy is after, first occurrence wins.
 */
export function forTargets(refs: readonly AccessionRef[], strategy: Strategy): AccessionRef[] {
    const wanted = new Set(strategy.targets);
    const seen = new Set<string>();
    return refs.filter((ref) => {
        const key = accessionKey(ref);
        if (!wanted.has(ref.namespace) || seen.has(key)) return false;
        seen.add(key);
        return true;
    });
}

/**
 * Build a record with confidence rounded to two decimals and clamped to [floor, 1].
 */
export function makeRecord(
    ref: AccessionRef,
    strategy: Strategy,
    fields: { confidence: number; rank: number; title?: string | undefined; url?: string | undefined; floor?: number }
): AccessionRecord {
    const confidence = Math.min(1, Math.max(fields.floor ?? 0, Math.round(fields.confidence * 100) / 100));
    return Object.freeze({
        id: ref.id,
        namespace: ref.namespace,
        source: strategy.adapter,
        strategyId: strategy.id,
        confidence,
        rank: fields.rank,
        ...(fields.title ? { title: fields.title } : {}),
        ...(fields.url ? { url: fields.url } : {}),
    });
}

/**
 * Raise an expected failure from inside an adapter.
 */
export function fail(kind: AdapterFailureKind, message: string): never {
    throw new AdapterError({ kind, message });
}

/**
 * Run an adapter operation, returning expected failures as values. HTTP and
 * schema errors still propagate so the retry controller classifies them.
 */
export async function settle<P>(operation: () => Promise<P>): Promise<LookupResult<P>> {
    try {
        return { ok: true, payload: await operation() };
    } catch (error) {
        if (error instanceof AdapterError) {
            return { ok: false, error: error.failure };
        }
        throw error;
    }
}
