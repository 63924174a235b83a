import type { AccessionNamespace } from '../types/index.js';

/**
 * Entrez database holding each namespace. ArrayExpress has no Entrez database of
 * its own; its accessions are reached through SRA full-text search.
 */
const ENTREZ_DATABASE: Record<AccessionNamespace, string | null> = {
    GSE: 'gds',
    GSM: 'gds',
    SRP: 'sra',
    SRX: 'sra',
    SRR: 'sra',
    SRS: 'sra',
    BIOPROJECT: 'bioproject',
    BIOSAMPLE: 'biosample',
    ARRAYEXPRESS: null,
    PMID: 'pubmed',
    PMCID: 'pmc',
    DOI: 'pubmed',
};

/**
 * Human-facing database name, used when a search query is broadened with context.
 */
const DATABASE_LABEL: Record<AccessionNamespace, string> = {
    GSE: 'GEO',
    GSM: 'GEO',
    SRP: 'SRA',
    SRX: 'SRA',
    SRR: 'SRA',
    SRS: 'SRA',
    BIOPROJECT: 'BioProject',
    BIOSAMPLE: 'BioSample',
    ARRAYEXPRESS: 'ArrayExpress',
    PMID: 'PubMed',
    PMCID: 'PMC',
    DOI: 'DOI',
};

export type InputClass = 'geo' | 'arrayexpress' | 'sra' | 'bioproject' | 'biosample' | 'publication' | 'free-text';

const INPUT_CLASS: Record<AccessionNamespace, InputClass> = {
    GSE: 'geo',
    GSM: 'geo',
    SRP: 'sra',
    SRX: 'sra',
    SRR: 'sra',
    SRS: 'sra',
    BIOPROJECT: 'bioproject',
    BIOSAMPLE: 'biosample',
    ARRAYEXPRESS: 'arrayexpress',
    PMID: 'publication',
    PMCID: 'publication',
    DOI: 'publication',
};

/**
 * Which input identifiers to try first. GEO series and ArrayExpress experiments
 * link to publications and SRA more reliably than SRA projects or BioProjects.
 */
const INPUT_PREFERENCE: Record<AccessionNamespace, number> = {
    GSE: 0,
    ARRAYEXPRESS: 0,
    GSM: 1,
    SRP: 2,
    BIOPROJECT: 2,
    SRX: 3,
    SRS: 3,
    SRR: 3,
    BIOSAMPLE: 4,
    PMID: 5,
    PMCID: 5,
    DOI: 5,
};

export function entrezDatabaseFor(namespace: AccessionNamespace): string | null {
    return ENTREZ_DATABASE[namespace];
}

export function databaseLabel(namespace: AccessionNamespace): string {
    return DATABASE_LABEL[namespace];
}

export function inputClassOf(namespace: AccessionNamespace): InputClass {
    return INPUT_CLASS[namespace];
}

export function inputPreference(namespace: AccessionNamespace): number {
    return INPUT_PREFERENCE[namespace];
}

/**
 * Landing page of an accession.
 */
export function accessionUrl(namespace: AccessionNamespace, id: string): string {
    switch (namespace) {
        case 'GSE':
        case 'GSM':
            return `https://www.ncbi.nlm.nih.gov/geo/query/acc.cgi?acc=${id}`;
        case 'SRP':
        case 'SRX':
        case 'SRR':
        case 'SRS':
            return `https://www.ncbi.nlm.nih.gov/sra/${id}`;
        case 'BIOPROJECT':
            return `https://www.ncbi.nlm.nih.gov/bioproject/${id}`;
        case 'BIOSAMPLE':
            return `https://www.ncbi.nlm.nih.gov/biosample/${id}`;
        case 'ARRAYEXPRESS':
            return `https://www.ebi.ac.uk/biostudies/arrayexpress/studies/${id}`;
        case 'PMID':
            return `https://pubmed.ncbi.nlm.nih.gov/${id}/`;
        case 'PMCID':
            return `https://www.ncbi.nlm.nih.gov/pmc/articles/${id}/`;
        case 'DOI':
            return `https://doi.org/${id}`;
    }
}
