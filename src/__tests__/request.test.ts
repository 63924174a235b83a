import { describe, it, expect } from 'vitest';
import { createRequest, detectTarget, goalForAgent, parseTarget } from '../engine/request.js';
import { ConfigurationError } from '../utils/errors.js';

describe('Request building', () => {
    describe('goalForAgent', () => {
        it('should map agent selectors to goals', () => {
            expect(goalForAgent('convert')).toBe('convert');
            expect(goalForAgent('publications')).toBe('find-publication');
            expect(goalForAgent('datasets')).toBe('find-datasets');
            expect(goalForAgent(' Entrez ')).toBe('lookup');
        });

        it('should accept goal names', () => {
            expect(goalForAgent('find-publication')).toBe('find-publication');
            expect(goalForAgent('lookup')).toBe('lookup');
        });

        it('should reject unknown agents', () => {
            expect(() => goalForAgent('sequencer')).toThrow(ConfigurationError);
            expect(() => goalForAgent('sequencer')).toThrow(
                'Unknown agent "sequencer". Valid: convert, publications, datasets, entrez'
            );
        });
    });

    describe('parseTarget', () => {
        it('should parse namespaces and aliases', () => {
            expect(parseTarget('SRX')).toBe('SRX');
            expect(parseTarget('runs')).toBe('SRR');
            expect(parseTarget(' PubMed ')).toBe('PMID');
            expect(parseTarget('prjna')).toBe('BIOPROJECT');
        });

        it('should return null for unknown words', () => {
            expect(parseTarget('fastq')).toBeNull();
        });
    });

    describe('detectTarget', () => {
        it('should find the target after "to"', () => {
            expect(detectTarget('convert GSE121737 to SRX')).toBe('SRX');
        });

        it('should skip articles', () => {
            expect(detectTarget('turn PRJNA498765 into a bioproject')).toBe('BIOPROJECT');
        });

        it('should let the last phrase win', () => {
            expect(detectTarget('map SRP166966 to runs as srr experiments as study')).toBe('SRP');
        });

        it('should ignore words that are not types', () => {
            expect(detectTarget('datasets related to liver regeneration')).toBeUndefined();
        });
    });

    describe('createRequest', () => {
        it('should trim the input and extract accessions', () => {
            const request = createRequest('convert', '  GSE121737 and SRP166966  ', 'SRR');

            expect(request).toEqual({
                goal: 'convert',
                input: 'GSE121737 and SRP166966',
                accessions: [
                    { namespace: 'GSE', id: 'GSE121737' },
                    { namespace: 'SRP', id: 'SRP166966' },
                ],
                targetType: 'SRR',
            });
        });

        it('should detect the target from the text', () => {
            expect(createRequest('convert', 'GSE121737 to srx').targetType).toBe('SRX');
        });

        it('should prefer the explicit target', () => {
            expect(createRequest('convert', 'GSE121737 to srx', 'SRR').targetType).toBe('SRR');
        });

        it('should leave targetType out when none is given', () => {
            expect('targetType' in createRequest('find-datasets', 'liver single cell')).toBe(false);
        });

        it('should be frozen', () => {
            const request = createRequest('convert', 'GSE121737');
            expect(Object.isFrozen(request)).toBe(true);
            expect(Object.isFrozen(request.accessions)).toBe(true);
        });

        it('should reject an empty query', () => {
            expect(() => createRequest('convert', '   ')).toThrow('Query is empty');
        });
    });
});
