import { describe, it, expect } from 'vitest';
import {
    accessionKey,
    canonicalizeAccession,
    classifyAccession,
    extractAccessions,
    parseAccession,
} from '../accessions/parse.js';
import { accessionUrl, databaseLabel, entrezDatabaseFor, inputClassOf } from '../accessions/databases.js';

describe('Accession parsing', () => {
    describe('classifyAccession', () => {
        it('should classify GEO, SRA and project accessions', () => {
            expect(classifyAccession('GSE121737')).toBe('GSE');
            expect(classifyAccession('GSM3444155')).toBe('GSM');
            expect(classifyAccession('srx4967527')).toBe('SRX');
            expect(classifyAccession('ERR1234567')).toBe('SRR');
            expect(classifyAccession('DRP000001')).toBe('SRP');
            expect(classifyAccession('PRJNA498809')).toBe('BIOPROJECT');
            expect(classifyAccession('SAMEA104161')).toBe('BIOSAMPLE');
            expect(classifyAccession('E-MTAB-6701')).toBe('ARRAYEXPRESS');
        });

        it('should classify publication identifiers', () => {
            expect(classifyAccession('PMC6344127')).toBe('PMCID');
            expect(classifyAccession('PMID: 30545852')).toBe('PMID');
            expect(classifyAccession('https://doi.org/10.1038/S41586-019-0969-X')).toBe('DOI');
        });

        it('should not classify bare digits or unknown text', () => {
            expect(classifyAccession('30545852')).toBeNull();
            expect(classifyAccession('hello')).toBeNull();
            expect(classifyAccession('   ')).toBeNull();
        });
    });

    describe('canonicalizeAccession', () => {
        it('should upper-case database accessions', () => {
            expect(canonicalizeAccession('GSE', '  gse121737 ')).toBe('GSE121737');
        });

        it('should strip the PMID prefix', () => {
            expect(canonicalizeAccession('PMID', 'PMID:30545852')).toBe('30545852');
        });

        it('should prefix bare PMC numbers', () => {
            expect(canonicalizeAccession('PMCID', '6344127')).toBe('PMC6344127');
        });

        it('should lower-case DOIs and drop resolver prefixes', () => {
            expect(canonicalizeAccession('DOI', 'https://doi.org/10.1101/ABC.')).toBe('10.1101/abc');
            expect(canonicalizeAccession('DOI', 'doi: 10.1016/J.CELL.2018.11.001')).toBe('10.1016/j.cell.2018.11.001');
        });
    });

    describe('parseAccession', () => {
        it('should return namespace and canonical id', () => {
            expect(parseAccession('prjna498809')).toEqual({ namespace: 'BIOPROJECT', id: 'PRJNA498809' });
        });

        it('should return null for unrecognized input', () => {
            expect(parseAccession('liver')).toBeNull();
        });
    });

    describe('extractAccessions', () => {
        it('should find accessions in order of appearance', () => {
            const refs = extractAccessions(
                'See GSE121737 (SRP166966); PMID:30545852 and doi:10.1101/2020.01.01.123456.'
            );
            expect(refs).toEqual([
                { namespace: 'GSE', id: 'GSE121737' },
                { namespace: 'SRP', id: 'SRP166966' },
                { namespace: 'PMID', id: '30545852' },
                { namespace: 'DOI', id: '10.1101/2020.01.01.123456' },
            ]);
        });

        it('should drop duplicates regardless of case', () => {
            expect(extractAccessions('GSE1 and gse1')).toEqual([{ namespace: 'GSE', id: 'GSE1' }]);
        });

        it('should not match inside longer tokens', () => {
            expect(extractAccessions('XGSE121737 GSE121737abc')).toEqual([]);
        });

        it('should read PubMed URLs', () => {
            expect(extractAccessions('https://pubmed.ncbi.nlm.nih.gov/30545852/')).toEqual([
                { namespace: 'PMID', id: '30545852' },
            ]);
        });

        it('should return nothing for plain text', () => {
            expect(extractAccessions('single cell RNA-seq of mouse liver')).toEqual([]);
        });
    });

    describe('accessionKey', () => {
        it('should ignore case and surrounding whitespace', () => {
            expect(accessionKey({ namespace: 'SRX', id: ' srx1 ' })).toBe(accessionKey({ namespace: 'SRX', id: 'SRX1' }));
        });

        it('should keep namespaces apart', () => {
            expect(accessionKey({ namespace: 'SRX', id: 'X1' })).not.toBe(accessionKey({ namespace: 'SRR', id: 'X1' }));
        });
    });
});

describe('Accession databases', () => {
    it('should map namespaces to Entrez databases', () => {
        expect(entrezDatabaseFor('GSE')).toBe('gds');
        expect(entrezDatabaseFor('SRR')).toBe('sra');
        expect(entrezDatabaseFor('DOI')).toBe('pubmed');
        expect(entrezDatabaseFor('ARRAYEXPRESS')).toBeNull();
    });

    it('should label and classify namespaces', () => {
        expect(databaseLabel('SRX')).toBe('SRA');
        expect(inputClassOf('GSM')).toBe('geo');
        expect(inputClassOf('PMCID')).toBe('publication');
    });

    it('should build landing page URLs', () => {
        expect(accessionUrl('GSE', 'GSE121737')).toBe('https://www.ncbi.nlm.nih.gov/geo/query/acc.cgi?acc=GSE121737');
        expect(accessionUrl('SRX', 'SRX4967527')).toBe('https://www.ncbi.nlm.nih.gov/sra/SRX4967527');
        expect(accessionUrl('PMID', '30545852')).toBe('https://pubmed.ncbi.nlm.nih.gov/30545852/');
        expect(accessionUrl('DOI', '10.1101/abc')).toBe('https://doi.org/10.1101/abc');
    });
});
