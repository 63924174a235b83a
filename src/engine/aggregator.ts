import type { AccessionRecord, LookupAdapter, Strategy } from '../types/index.js';
import { accessionKey } from '../accessions/parse.js';

/**
 * Merge incoming records into an existing collection.
 *
 * Records are keyed by namespace and trimmed, lower-cased id. A later record
 * replaces an earlier one in place only when its confidence is strictly higher,
 * so ties keep the record from the higher-priority strategy. Neither input is
 * touched; the result is a new frozen array of frozen records.
 */
export function fold(
    existing: readonly AccessionRecord[],
    incoming: readonly AccessionRecord[]
): readonly AccessionRecord[] {
    const merged: AccessionRecord[] = [];
    const index = new Map<string, number>();

    const add = (record: AccessionRecord) => {
        const key = accessionKey(record);
        const at = index.get(key);
        if (at === undefined) {
            index.set(key, merged.length);
            merged.push(Object.isFrozen(record) ? record : Object.freeze({ ...record }));
            return;
        }
        const current = merged[at];
        if (current && record.confidence > current.confidence) {
            merged[at] = Object.isFrozen(record) ? record : Object.freeze({ ...record });
        }
    };

    for (const record of existing) add(record);
    for (const record of incoming) add(record);

    return Object.freeze(merged);
}

/**
 * Normalize a payload with its adapter's own rules, then fold it in.
 */
export function foldPayload<P>(
    existing: readonly AccessionRecord[],
    adapter: LookupAdapter<P>,
    payload: P,
    strategy: Strategy
): readonly AccessionRecord[] {
    return fold(existing, adapter.normalize(payload, strategy));
}

/**
 * Highest confidence in a collection, 0 when empty.
 */
export function bestConfidence(records: readonly AccessionRecord[]): number {
    return records.reduce((best, r) => Math.max(best, r.confidence), 0);
}
