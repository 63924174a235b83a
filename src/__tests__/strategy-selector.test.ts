import { describe, it, expect } from 'vitest';
import { ACCESSION_NAMESPACES } from '../types/index.js';
import { createRequest } from '../engine/request.js';
import {
    StrategySelector,
    entrezTerm,
    goalTargets,
    rewriteQuery,
    ENTREZ,
    WEB_SEARCH,
} from '../engine/strategy-selector.js';

const both = new StrategySelector([ENTREZ, WEB_SEARCH]);

describe('StrategySelector', () => {
    describe('plan', () => {
        it('should order a GEO to SRA conversion by priority', () => {
            const plan = both.plan(createRequest('convert', 'GSE121737', 'SRX'));

            expect(plan.map((s) => s.id)).toEqual([
                'entrez:link:gds>sra:GSE121737',
                'entrez:search:sra:GSE121737',
                'entrez:summary:gds:GSE121737',
                'web-search:literal:GSE121737',
                'web-search:quote-terms:GSE121737',
                'web-search:append-database:GSE121737',
            ]);
            expect(plan.map((s) => s.position)).toEqual([0, 1, 2, 3, 4, 5]);
            expect(plan.map((s) => s.confidence)).toEqual([0.95, 0.85, 0.8, 0.6, 0.55, 0.5]);
            expect(plan.map((s) => s.query)).toEqual([
                'GSE121737[ACCN]',
                'GSE121737[ACCN]',
                'GSE121737[ACCN]',
                'GSE121737',
                '"GSE121737"',
                'GSE121737 NCBI SRA',
            ]);
        });

        it('should give Entrez strategies their route in the context', () => {
            const [first] = both.plan(createRequest('convert', 'GSE121737', 'SRX'));

            expect(first?.context).toEqual({
                operation: 'link',
                db: 'gds',
                term: 'GSE121737[ACCN]',
                namespace: 'GSE',
                targets: 'SRX',
                targetDb: 'sra',
            });
            expect(first?.targets).toEqual(['SRX']);
            expect(first?.deferred).toBe(false);
        });

        it('should be deterministic', () => {
            const request = createRequest('find-publication', 'GSE121737');
            expect(both.plan(request)).toEqual(both.plan(request));
        });

        it('should return a frozen plan', () => {
            const plan = both.plan(createRequest('convert', 'GSE121737', 'SRX'));
            expect(Object.isFrozen(plan)).toBe(true);
            expect(plan.every((s) => Object.isFrozen(s))).toBe(true);
        });

        it('should try GEO inputs before SRA inputs', () => {
            const plan = both.plan(createRequest('convert', 'SRP166966 GSE121737', 'SRR'));

            expect(plan[0]?.id).toBe('entrez:link:gds>sra:GSE121737');
            // sra → sra links are skipped
            expect(plan.map((s) => s.id).filter((id) => id.endsWith('SRP166966'))).toEqual([
                'entrez:search:sra:SRP166966',
                'entrez:summary:sra:SRP166966',
                'web-search:literal:SRP166966',
                'web-search:quote-terms:SRP166966',
                'web-search:append-database:SRP166966',
            ]);
            expect(plan).toHaveLength(11);
        });

        it('should consider at most three input accessions', () => {
            const plan = both.plan(createRequest('convert', 'GSE1 GSE2 GSE3 GSE4', 'SRX'));

            expect(plan.some((s) => s.id.endsWith(':GSE3'))).toBe(true);
            expect(plan.some((s) => s.id.endsWith(':GSE4'))).toBe(false);
        });

        it('should plan free-text searches in every target database', () => {
            const plan = both.plan(createRequest('find-datasets', 'single cell RNA-seq of mouse liver'));

            expect(plan.map((s) => [s.id, s.query, s.confidence])).toEqual([
                ['entrez:search:gds:text', 'single cell RNA-seq of mouse liver', 0.7],
                ['entrez:search:sra:text', 'single cell RNA-seq of mouse liver', 0.7],
                ['entrez:search:bioproject:text', 'single cell RNA-seq of mouse liver', 0.7],
                ['web-search:literal:text', 'single cell RNA-seq of mouse liver', 0.6],
                ['web-search:quote-terms:text', '"single cell RNA-seq of mouse liver"', 0.55],
                ['web-search:append-database:text', 'single cell RNA-seq of mouse liver NCBI GEO', 0.5],
            ]);
        });

        it('should link publications to PMC for find-publication', () => {
            const plan = new StrategySelector([ENTREZ]).plan(createRequest('find-publication', 'PMID:30545852'));

            expect(plan.map((s) => s.id)).toEqual([
                'entrez:summary:pubmed:30545852',
                'entrez:link:pubmed>pmc:30545852',
            ]);
            expect(plan[0]?.query).toBe('30545852[uid]');
            expect(plan[0]?.targets).toEqual(['PMID', 'PMCID', 'DOI']);
            expect(plan[1]?.targets).toEqual(['PMCID']);
        });

        it('should omit adapters that are not registered', () => {
            const plan = new StrategySelector([ENTREZ]).plan(createRequest('convert', 'GSE121737', 'SRX'));

            expect(plan).toHaveLength(3);
            expect(plan.every((s) => s.adapter === ENTREZ)).toBe(true);
        });

        it('should return an empty plan without adapters', () => {
            expect(new StrategySelector([]).plan(createRequest('convert', 'GSE121737'))).toEqual([]);
        });
    });

    describe('throttled adapters', () => {
        it('should move a throttled adapter to the back', () => {
            const plan = both.plan(createRequest('convert', 'GSE121737', 'SRX'), { throttled: new Set([ENTREZ]) });

            expect(plan.map((s) => [s.adapter, s.position, s.deferred])).toEqual([
                [WEB_SEARCH, 0, false],
                [WEB_SEARCH, 1, false],
                [WEB_SEARCH, 2, false],
                [ENTREZ, 3, true],
                [ENTREZ, 4, true],
                [ENTREZ, 5, true],
            ]);
            expect(plan[3]?.id).toBe('entrez:link:gds>sra:GSE121737');
        });

        it('should keep the order when every adapter is throttled', () => {
            const request = createRequest('convert', 'GSE121737', 'SRX');
            const plan = both.plan(request, { throttled: new Set([ENTREZ, WEB_SEARCH]) });

            expect(plan).toEqual(both.plan(request));
            expect(plan.some((s) => s.deferred)).toBe(false);
        });
    });
});

describe('goalTargets', () => {
    it('should prefer the explicit target', () => {
        expect(goalTargets(createRequest('lookup', 'GSE121737', 'SRR'))).toEqual(['SRR']);
    });

    it('should fall back to the goal default', () => {
        expect(goalTargets(createRequest('convert', 'GSE121737'))).toEqual(['SRX']);
        expect(goalTargets(createRequest('find-publication', 'GSE121737'))).toEqual(['PMID', 'PMCID', 'DOI']);
        expect(goalTargets(createRequest('lookup', 'GSE121737'))).toEqual(ACCESSION_NAMESPACES);
    });
});

describe('entrezTerm', () => {
    it('should qualify terms by namespace', () => {
        expect(entrezTerm({ namespace: 'PMID', id: '30545852' })).toBe('30545852[uid]');
        expect(entrezTerm({ namespace: 'DOI', id: '10.1101/abc' })).toBe('10.1101/abc[doi]');
        expect(entrezTerm({ namespace: 'GSM', id: 'GSM1' })).toBe('GSM1[ACCN]');
        expect(entrezTerm({ namespace: 'SRX', id: 'SRX1' })).toBe('SRX1');
    });
});

describe('rewriteQuery', () => {
    const ref = { namespace: 'GSE' as const, id: 'GSE121737' };

    it('should leave literal queries alone', () => {
        expect(rewriteQuery('literal', 'GSE121737 liver', [ref], 'SRA')).toBe('GSE121737 liver');
    });

    it('should quote accessions inside a query', () => {
        expect(rewriteQuery('quote-terms', 'gse121737 liver', [ref], 'SRA')).toBe('"GSE121737" liver');
    });

    it('should quote a free-text query as a phrase', () => {
        expect(rewriteQuery('quote-terms', 'say "hi" there', [], 'SRA')).toBe('"say hi there"');
    });

    it('should append the database label', () => {
        expect(rewriteQuery('append-database', 'GSE121737', [ref], 'SRA')).toBe('GSE121737 NCBI SRA');
    });
});
