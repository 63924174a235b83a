import type { AccessionNamespace, AccessionRef } from '../types/index.js';

/**
 * Accession grammar shared by the request parser and the adapters.
 *
 * Every pattern is matched case-insensitively and the matched text is brought to
 * canonical form: upper case for database accessions, bare digits for PMIDs,
 * lower case for DOIs (DOIs are case-insensitive by definition).
 */
interface AccessionPattern {
    readonly namespace: AccessionNamespace;
    /** Regex source without anchors; capture group 1, when present, is the identifier */
    readonly body: string;
}

const PATTERNS: readonly AccessionPattern[] = [
    { namespace: 'GSE', body: 'GSE\\d+' },
    { namespace: 'GSM', body: 'GSM\\d+' },
    { namespace: 'SRP', body: '[SED]RP\\d+' },
    { namespace: 'SRX', body: '[SED]RX\\d+' },
    { namespace: 'SRR', body: '[SED]RR\\d+' },
    { namespace: 'SRS', body: '[SED]RS\\d+' },
    { namespace: 'BIOPROJECT', body: 'PRJ[NED][A-Z]\\d+' },
    { namespace: 'BIOSAMPLE', body: 'SAM(?:N|EA|D)\\d+' },
    { namespace: 'ARRAYEXPRESS', body: 'E-[A-Z]{4}-\\d+' },
    { namespace: 'PMCID', body: 'PMC\\d+' },
];

/** Forms that only appear inside text or URLs */
const PMID_SCANS: readonly RegExp[] = [
    /PMID:?\s*(\d{1,9})(?!\d)/gi,
    /pubmed\.ncbi\.nlm\.nih\.gov\/(\d{1,9})(?!\d)/gi,
];

const DOI_SCAN = /(?<![\w.])(10\.\d{4,9}\/[^\s"'<>]+)/gi;

const BOUNDARY_BEFORE = '(?<![A-Za-z0-9])';
const BOUNDARY_AFTER = '(?![A-Za-z0-9])';

const ANCHORED = PATTERNS.map((p) => ({
    namespace: p.namespace,
    regex: new RegExp(`^${p.body}$`, 'i'),
}));

const ANCHORED_PMID = /^(?:PMID:?\s*)?(\d{1,9})$/i;
const ANCHORED_DOI = /^(?:https?:\/\/(?:dx\.)?doi\.org\/|doi:\s*)?(10\.\d{4,9}\/\S+)$/i;

/**
 * Classify a single identifier. Bare digits are not classified: an Entrez UID
 * and a PMID look alike, so PMIDs need their "PMID" prefix here.
 */
export function classifyAccession(raw: string): AccessionNamespace | null {
    const value = raw.trim();
    if (!value) return null;

    for (const { namespace, regex } of ANCHORED) {
        if (regex.test(value)) return namespace;
    }

    if (/^PMID/i.test(value) && ANCHORED_PMID.test(value)) return 'PMID';
    if (ANCHORED_DOI.test(value)) return 'DOI';

    return null;
}

/**
 * Bring an identifier to canonical form for its namespace.
 * "  gse121737 " → "GSE121737", "PMID: 30545852" → "30545852",
 * "https://doi.org/10.1101/ABC" → "10.1101/abc", "6344127" (PMCID) → "PMC6344127"
 */
export function canonicalizeAccession(namespace: AccessionNamespace, raw: string): string {
    const value = raw.trim();

    switch (namespace) {
        case 'PMID': {
            const match = value.match(ANCHORED_PMID);
            return match?.[1] ?? value;
        }
        case 'PMCID': {
            const upper = value.toUpperCase();
            return upper.startsWith('PMC') ? upper : `PMC${upper}`;
        }
        case 'DOI': {
            const match = value.match(ANCHORED_DOI);
            return trimTrailingPunctuation(match?.[1] ?? value).toLowerCase();
        }
        default:
            return value.toUpperCase();
    }
}

/**
 * Parse an identifier into an AccessionRef, or null when it is not recognized.
 */
export function parseAccession(raw: string): AccessionRef | null {
    const namespace = classifyAccession(raw);
    if (!namespace) return null;
    return { namespace, id: canonicalizeAccession(namespace, raw) };
}

/**
 * Find every accession mentioned in free text, in order of first appearance,
 * without duplicates.
 */
export function extractAccessions(text: string): AccessionRef[] {
    const found: Array<{ index: number; ref: AccessionRef }> = [];

    for (const pattern of PATTERNS) {
        const scan = new RegExp(`${BOUNDARY_BEFORE}(${pattern.body})${BOUNDARY_AFTER}`, 'gi');
        for (const match of text.matchAll(scan)) {
            const value = match[1];
            if (value === undefined) continue;
            found.push({
                index: match.index ?? 0,
                ref: { namespace: pattern.namespace, id: canonicalizeAccession(pattern.namespace, value) },
            });
        }
    }

    for (const scan of PMID_SCANS) {
        for (const match of text.matchAll(scan)) {
            const value = match[1];
            if (value === undefined) continue;
            found.push({ index: match.index ?? 0, ref: { namespace: 'PMID', id: value } });
        }
    }

    for (const match of text.matchAll(DOI_SCAN)) {
        const value = match[1];
        if (value === undefined) continue;
        found.push({ index: match.index ?? 0, ref: { namespace: 'DOI', id: canonicalizeAccession('DOI', value) } });
    }

    found.sort((a, b) => a.index - b.index);

    const seen = new Set<string>();
    const refs: AccessionRef[] = [];
    for (const { ref } of found) {
        const key = accessionKey(ref);
        if (seen.has(key)) continue;
        seen.add(key);
        refs.push(ref);
    }

    return refs;
}

/**
 * Deduplication key: namespace plus trimmed, lower-cased identifier.
 */
export function accessionKey(ref: { namespace: AccessionNamespace; id: string }): string {
    return `${ref.namespace}:${ref.id.trim().toLowerCase()}`;
}

function trimTrailingPunctuation(value: string): string {
    return value.replace(/[.,;:)\]]+$/, '');
}
