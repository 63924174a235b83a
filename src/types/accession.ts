/**
 * Accession namespaces understood by SRAgent.
 *
 * SRA namespaces cover the INSDC mirrors as well: ERX/DRX are stored under SRX,
 * ERP/DRP under SRP, and so on. BioProject and BioSample cover the NCBI, EBI and
 * DDBJ prefixes (PRJNA/PRJEB/PRJDB, SAMN/SAMEA/SAMD).
 */
export type AccessionNamespace =
    | 'GSE'
    | 'GSM'
    | 'SRP'
    | 'SRX'
    | 'SRR'
    | 'SRS'
    | 'BIOPROJECT'
    | 'BIOSAMPLE'
    | 'ARRAYEXPRESS'
    | 'PMID'
    | 'PMCID'
    | 'DOI';

export const ACCESSION_NAMESPACES: readonly AccessionNamespace[] = [
    'GSE', 'GSM', 'SRP', 'SRX', 'SRR', 'SRS',
    'BIOPROJECT', 'BIOSAMPLE', 'ARRAYEXPRESS',
    'PMID', 'PMCID', 'DOI',
];

export const PUBLICATION_NAMESPACES: readonly AccessionNamespace[] = ['PMID', 'PMCID', 'DOI'];

/**
 * An identifier with its namespace, `id` always in canonical form.
 */
export interface AccessionRef {
    readonly namespace: AccessionNamespace;
    readonly id: string;
}

/**
 * Normalized unit of output.
 */
export interface AccessionRecord {
    /** Canonical identifier (e.g. "SRX4967527", "PMC6344127", "10.1038/s41586-019-0969-x") */
    readonly id: string;

    readonly namespace: AccessionNamespace;

    /** Adapter name that produced the record */
    readonly source: string;

    /** Strategy that produced the record */
    readonly strategyId: string;

    /** 0.0 to 1.0, two decimals */
    readonly confidence: number;

    /** Position of the record inside its adapter payload (0 = first) */
    readonly rank: number;

    readonly title?: string;
    readonly url?: string;
}
