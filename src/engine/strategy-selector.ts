import {
    ACCESSION_NAMESPACES,
    PUBLICATION_NAMESPACES,
    type AccessionNamespace,
    type AccessionRef,
    type GoalType,
    type ResolutionRequest,
    type RewriteRule,
    type Strategy,
} from '../types/index.js';
import {
    databaseLabel,
    entrezDatabaseFor,
    inputClassOf,
    inputPreference,
    type InputClass,
} from '../accessions/databases.js';
import { HEALTHY, type AdapterHealth } from './rate-limit-registry.js';

export const ENTREZ = 'entrez';
export const WEB_SEARCH = 'web-search';

// ─── Priority table ───────────────────────────────────────

export type EntrezOperation = 'link' | 'search' | 'summary';

type Template =
    | { readonly adapter: typeof ENTREZ; readonly operation: EntrezOperation; readonly confidence: number }
    | { readonly adapter: typeof WEB_SEARCH; readonly confidence: number };

const link: Template = { adapter: ENTREZ, operation: 'link', confidence: 0.95 };
const search: Template = { adapter: ENTREZ, operation: 'search', confidence: 0.85 };
const summary: Template = { adapter: ENTREZ, operation: 'summary', confidence: 0.8 };
const textSearch: Template = { adapter: ENTREZ, operation: 'search', confidence: 0.7 };
const web: Template = { adapter: WEB_SEARCH, confidence: 0.6 };

/**
 * Templates tried for each goal and input class, highest priority first.
 */
const PRIORITY: Record<GoalType, Record<InputClass, readonly Template[]>> = {
    convert: {
        geo: [link, search, summary, web],
        sra: [link, search, summary, web],
        bioproject: [link, search, summary, web],
        biosample: [link, search, web],
        arrayexpress: [search, web],
        publication: [link, web],
        'free-text': [textSearch, web],
    },
    'find-publication': {
        geo: [link, summary, web],
        sra: [link, summary, web],
        bioproject: [link, summary, web],
        biosample: [link, web],
        arrayexpress: [search, web],
        publication: [summary, link, web],
        'free-text': [textSearch, web],
    },
    'find-datasets': {
        geo: [link, search, web],
        sra: [link, search, web],
        bioproject: [link, search, web],
        biosample: [link, search, web],
        arrayexpress: [search, web],
        publication: [link, search, web],
        'free-text': [textSearch, web],
    },
    lookup: {
        geo: [summary, link, search, web],
        sra: [summary, link, search, web],
        bioproject: [summary, link, search, web],
        biosample: [summary, link, web],
        arrayexpress: [search, web],
        publication: [summary, link, web],
        'free-text': [textSearch, web],
    },
};

const DATASET_NAMESPACES: readonly AccessionNamespace[] = ['GSE', 'SRP', 'BIOPROJECT', 'ARRAYEXPRESS'];

/** Web search rewrites, most literal first */
const REWRITES: readonly RewriteRule[] = ['literal', 'quote-terms', 'append-database'];
const REWRITE_PENALTY = 0.05;

/** Input accessions considered per request */
const MAX_INPUTS = 3;

/**
 * Namespaces that satisfy a request: the explicit target, or the goal's default.
 */
export function goalTargets(request: ResolutionRequest): readonly AccessionNamespace[] {
    if (request.targetType) return [request.targetType];

    switch (request.goal) {
        case 'convert':
            return ['SRX'];
        case 'find-publication':
            return PUBLICATION_NAMESPACES;
        case 'find-datasets':
            return DATASET_NAMESPACES;
        case 'lookup':
            return ACCESSION_NAMESPACES;
    }
}

/**
 * Search term for an identifier in its Entrez database.
 */
export function entrezTerm(ref: AccessionRef): string {
    switch (ref.namespace) {
        case 'PMID':
            return `${ref.id}[uid]`;
        case 'DOI':
            return `${ref.id}[doi]`;
        case 'GSE':
        case 'GSM':
            return `${ref.id}[ACCN]`;
        default:
            return ref.id;
    }
}

/**
 * Apply a rewrite rule to a search query.
 */
export function rewriteQuery(rule: RewriteRule, query: string, refs: readonly AccessionRef[], label: string): string {
    switch (rule) {
        case 'literal':
            return query;
        case 'quote-terms': {
            if (refs.length === 0) return `"${query.replace(/"/g, '')}"`;
            let quoted = query;
            for (const ref of refs) {
                quoted = quoted.replace(new RegExp(`(?<!")${escapeRegex(ref.id)}(?!")`, 'i'), `"${ref.id}"`);
            }
            return quoted;
        }
        case 'append-database':
            return `${query} NCBI ${label}`;
    }
}

// ─── Selector ─────────────────────────────────────────────

/**
 * Builds the ordered strategy list for a request. Deterministic for a given
 * request, adapter set and health snapshot; it reads nothing else.
 */
export class StrategySelector {
    private readonly registered: ReadonlySet<string>;

    constructor(adapters: Iterable<string>) {
        this.registered = new Set(adapters);
    }

    plan(request: ResolutionRequest, health: AdapterHealth = HEALTHY): readonly Strategy[] {
        const targets = goalTargets(request);
        const drafts: Draft[] = [];
        const seen = new Set<string>();

        const push = (draft: Draft) => {
            if (!this.registered.has(draft.adapter) || seen.has(draft.id)) return;
            seen.add(draft.id);
            drafts.push(draft);
        };

        const inputs = orderInputs(request.accessions).slice(0, MAX_INPUTS);

        if (inputs.length === 0) {
            for (const template of PRIORITY[request.goal]['free-text']) {
                for (const draft of expand(template, null, request, targets)) push(draft);
            }
        } else {
            for (const ref of inputs) {
                for (const template of PRIORITY[request.goal][inputClassOf(ref.namespace)]) {
                    for (const draft of expand(template, ref, request, targets)) push(draft);
                }
            }
        }

        return Object.freeze(defer(drafts, health).map((draft, position) => Object.freeze({ ...draft, position })));
    }
}

type Draft = Omit<Strategy, 'position'>;

/**
 * Stable sort of input accessions by how reliably they link to other databases.
 */
function orderInputs(refs: readonly AccessionRef[]): AccessionRef[] {
    return refs
        .map((ref, index) => ({ ref, index }))
        .sort((a, b) => inputPreference(a.ref.namespace) - inputPreference(b.ref.namespace) || a.index - b.index)
        .map(({ ref }) => ref);
}

/**
 * Throttled adapters go to the back. When every adapter in the plan is throttled
 * there is nothing to prefer, so the order stands.
 */
function defer(drafts: Draft[], health: AdapterHealth): Draft[] {
    const ready = drafts.filter((d) => !health.throttled.has(d.adapter));
    if (ready.length === 0 || ready.length === drafts.length) return drafts;

    const throttled = drafts
        .filter((d) => health.throttled.has(d.adapter))
        .map((d) => ({ ...d, deferred: true }));

    return [...ready, ...throttled];
}

function expand(
    template: Template,
    ref: AccessionRef | null,
    request: ResolutionRequest,
    targets: readonly AccessionNamespace[]
): Draft[] {
    if (template.adapter === WEB_SEARCH) {
        return expandWebSearch(template.confidence, ref, request, targets);
    }
    return expandEntrez(template.operation, template.confidence, ref, request, targets);
}

function expandEntrez(
    operation: EntrezOperation,
    confidence: number,
    ref: AccessionRef | null,
    request: ResolutionRequest,
    targets: readonly AccessionNamespace[]
): Draft[] {
    const sourceDb = ref ? entrezDatabaseFor(ref.namespace) : null;
    const term = ref ? entrezTerm(ref) : request.input;
    const subject = ref?.id ?? 'text';
    const namespace = ref?.namespace ?? 'TEXT';

    const draft = (db: string, produced: readonly AccessionNamespace[], extra: Record<string, string>, id: string): Draft => ({
        id,
        adapter: ENTREZ,
        query: term,
        context: Object.freeze({ operation, db, term, namespace, targets: produced.join(','), ...extra }),
        rewrite: 'literal',
        confidence,
        targets: Object.freeze([...produced]),
        deferred: false,
    });

    switch (operation) {
        case 'summary':
            if (!sourceDb) return [];
            return [draft(sourceDb, targets, {}, `entrez:summary:${sourceDb}:${subject}`)];

        case 'link':
            if (!sourceDb) return [];
            return groupByDatabase(targets)
                .filter(([db]) => db !== sourceDb)
                .map(([db, produced]) =>
                    draft(sourceDb, produced, { targetDb: db }, `entrez:link:${sourceDb}>${db}:${subject}`)
                );

        case 'search':
            // Full-text search in each target database; the only route for ArrayExpress
            return groupByDatabase(targets).map(([db, produced]) =>
                draft(db, produced, {}, `entrez:search:${db}:${subject}`)
            );
    }
}

function expandWebSearch(
    confidence: number,
    ref: AccessionRef | null,
    request: ResolutionRequest,
    targets: readonly AccessionNamespace[]
): Draft[] {
    const literal = ref?.id ?? request.input;
    const refs = ref ? [ref] : [];
    const label = databaseLabel(targets[0] ?? 'SRX');
    const subject = ref?.id ?? 'text';

    return REWRITES.map((rewrite, i) => {
        const query = rewriteQuery(rewrite, literal, refs, label);
        return {
            id: `web-search:${rewrite}:${subject}`,
            adapter: WEB_SEARCH,
            query,
            context: Object.freeze({ rewrite, namespace: ref?.namespace ?? 'TEXT', targets: targets.join(',') }),
            rewrite,
            confidence: round2(confidence - i * REWRITE_PENALTY),
            targets: Object.freeze([...targets]),
            deferred: false,
        };
    });
}

/**
 * Target namespaces grouped by the Entrez database holding them, in first-seen order.
 */
function groupByDatabase(targets: readonly AccessionNamespace[]): Array<[string, AccessionNamespace[]]> {
    const groups = new Map<string, AccessionNamespace[]>();
    for (const namespace of targets) {
        const db = entrezDatabaseFor(namespace);
        if (!db) continue;
        const group = groups.get(db);
        if (group) {
            group.push(namespace);
        } else {
            groups.set(db, [namespace]);
        }
    }
    return [...groups.entries()];
}

export function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

function escapeRegex(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
