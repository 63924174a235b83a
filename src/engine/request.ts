import type { AccessionNamespace, GoalType, ResolutionRequest } from '../types/index.js';
import { extractAccessions } from '../accessions/parse.js';
import { ConfigurationError } from '../utils/errors.js';

/**
 * CLI agent selectors and the goal each one resolves.
 */
export const AGENT_GOALS: Readonly<Record<string, GoalType>> = {
    convert: 'convert',
    publications: 'find-publication',
    datasets: 'find-datasets',
    entrez: 'lookup',
};

/**
 * Words accepted as a target type, lower case.
 */
const TARGET_ALIASES: Readonly<Record<string, AccessionNamespace>> = {
    gse: 'GSE',
    geo: 'GSE',
    gsm: 'GSM',
    srp: 'SRP',
    study: 'SRP',
    studies: 'SRP',
    srx: 'SRX',
    sra: 'SRX',
    experiment: 'SRX',
    experiments: 'SRX',
    srr: 'SRR',
    run: 'SRR',
    runs: 'SRR',
    srs: 'SRS',
    bioproject: 'BIOPROJECT',
    prjna: 'BIOPROJECT',
    biosample: 'BIOSAMPLE',
    samn: 'BIOSAMPLE',
    arrayexpress: 'ARRAYEXPRESS',
    pmid: 'PMID',
    pubmed: 'PMID',
    pmcid: 'PMCID',
    pmc: 'PMCID',
    doi: 'DOI',
};

/**
 * Goal for a CLI agent selector. Goal names themselves are accepted too.
 */
export function goalForAgent(agent: string): GoalType {
    const key = agent.trim().toLowerCase();
    const goal = AGENT_GOALS[key] ?? Object.values(AGENT_GOALS).find((g) => g === key);
    if (!goal) {
        const valid = Object.keys(AGENT_GOALS).join(', ');
        throw new ConfigurationError(`Unknown agent "${agent}". Valid: ${valid}`, [`agent: must be one of ${valid}`]);
    }
    return goal;
}

/**
 * Parse an explicit target type such as "SRX", "srr" or "bioproject".
 */
export function parseTarget(raw: string): AccessionNamespace | null {
    return TARGET_ALIASES[raw.trim().toLowerCase()] ?? null;
}

/**
 * Target named in free text: "convert GSE121737 to SRX" → SRX. The last
 * "to|into|as <type>" phrase wins.
 */
export function detectTarget(text: string): AccessionNamespace | undefined {
    let target: AccessionNamespace | undefined;
    for (const match of text.matchAll(/\b(?:to|into|as)\s+(?:an?\s+|the\s+)?([A-Za-z]+)\b/gi)) {
        const word = match[1];
        const namespace = word ? parseTarget(word) : null;
        if (namespace) target = namespace;
    }
    return target;
}

/**
 * Build the immutable request for one invocation.
 */
export function createRequest(goal: GoalType, input: string, targetType?: AccessionNamespace): ResolutionRequest {
    const text = input.trim();
    if (!text) {
        throw new ConfigurationError('Query is empty', ['query: provide an accession or a description']);
    }

    const target = targetType ?? detectTarget(text);

    return Object.freeze({
        goal,
        input: text,
        accessions: Object.freeze(extractAccessions(text)),
        ...(target ? { targetType: target } : {}),
    });
}
