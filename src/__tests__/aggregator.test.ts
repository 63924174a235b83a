import { describe, it, expect } from 'vitest';
import { bestConfidence, fold, foldPayload } from '../engine/aggregator.js';
import { FakeAdapter, found, makeStrategy, record } from './helpers.js';

describe('Aggregator', () => {
    describe('fold', () => {
        it('should append new records in order', () => {
            const merged = fold([record({ id: 'SRX1' })], [record({ id: 'SRX2' }), record({ id: 'SRX3' })]);
            expect(merged.map((r) => r.id)).toEqual(['SRX1', 'SRX2', 'SRX3']);
        });

        it('should deduplicate by namespace and case-insensitive id', () => {
            const merged = fold([record({ id: 'SRX1', confidence: 0.6 })], [record({ id: 'srx1', confidence: 0.6 })]);
            expect(merged).toHaveLength(1);
            expect(merged[0]?.id).toBe('SRX1');
        });

        it('should keep the same id in different namespaces', () => {
            const merged = fold([record({ id: 'X1', namespace: 'SRX' })], [record({ id: 'X1', namespace: 'SRR' })]);
            expect(merged).toHaveLength(2);
        });

        it('should replace a record in place when confidence is strictly higher', () => {
            const merged = fold(
                [record({ id: 'SRX1', confidence: 0.6, source: 'web-search' }), record({ id: 'SRX2' })],
                [record({ id: 'SRX1', confidence: 0.95, source: 'entrez' })]
            );

            expect(merged.map((r) => [r.id, r.confidence, r.source])).toEqual([
                ['SRX1', 0.95, 'entrez'],
                ['SRX2', 0.9, 'entrez'],
            ]);
        });

        it('should keep the earlier record on a tie or lower confidence', () => {
            const earlier = record({ id: 'SRX1', confidence: 0.8, strategyId: 'first' });
            const merged = fold(
                [earlier],
                [
                    record({ id: 'SRX1', confidence: 0.8, strategyId: 'second' }),
                    record({ id: 'SRX1', confidence: 0.5, strategyId: 'third' }),
                ]
            );

            expect(merged).toHaveLength(1);
            expect(merged[0]?.strategyId).toBe('first');
        });

        it('should be idempotent', () => {
            const existing = [record({ id: 'SRX1', confidence: 0.7 })];
            const incoming = [record({ id: 'SRX1', confidence: 0.9 }), record({ id: 'SRX2' })];

            const once = fold(existing, incoming);
            expect(fold(once, incoming)).toEqual(once);
        });

        it('should not modify its inputs', () => {
            const existing = [record({ id: 'SRX1', confidence: 0.5 })];
            const incoming = [record({ id: 'SRX1', confidence: 0.9 })];

            const merged = fold(existing, incoming);

            expect(merged).not.toBe(existing);
            expect(existing).toEqual([record({ id: 'SRX1', confidence: 0.5 })]);
            expect(incoming).toEqual([record({ id: 'SRX1', confidence: 0.9 })]);
        });

        it('should return frozen records', () => {
            const merged = fold([], [record()]);
            expect(Object.isFrozen(merged)).toBe(true);
            expect(Object.isFrozen(merged[0])).toBe(true);
        });
    });

    describe('foldPayload', () => {
        it('should normalize with the adapter before folding', () => {
            const adapter = new FakeAdapter('web-search', () => found());
            const strategy = makeStrategy({ id: 'web-search:literal:GSE121737', adapter: 'web-search', confidence: 0.6 });

            const merged = foldPayload(
                [],
                adapter,
                { refs: [{ namespace: 'SRX', id: 'SRX1' }, { namespace: 'SRX', id: 'SRX2' }], decay: 0.05 },
                strategy
            );

            expect(merged).toEqual([
                { id: 'SRX1', namespace: 'SRX', source: 'web-search', strategyId: 'web-search:literal:GSE121737', confidence: 0.6, rank: 0 },
                { id: 'SRX2', namespace: 'SRX', source: 'web-search', strategyId: 'web-search:literal:GSE121737', confidence: 0.55, rank: 1 },
            ]);
        });
    });

    describe('bestConfidence', () => {
        it('should return the highest confidence', () => {
            expect(bestConfidence([record({ id: 'A', confidence: 0.4 }), record({ id: 'B', confidence: 0.7 })])).toBe(0.7);
        });

        it('should return 0 for no records', () => {
            expect(bestConfidence([])).toBe(0);
        });
    });
});
