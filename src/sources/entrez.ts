import { z } from 'zod';
import type {
    AccessionRecord,
    AccessionRef,
    AdapterFailure,
    LookupAdapter,
    LookupAdapterOptions,
    LookupResult,
    Strategy,
} from '../types/index.js';
import { canonicalizeAccession, extractAccessions } from '../accessions/parse.js';
import { accessionUrl } from '../accessions/databases.js';
import { isRetryableFailure } from '../utils/errors.js';
import { getHttpClient, redactUrl, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { collectStrings, fail, forTargets, makeRecord, settle } from './utils.js';

const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

/** Ids requested from esearch and passed on to elink / esummary */
const RETMAX = 20;

// ─── Response schemas (subset of relevant fields) ─────────

const esearchSchema = z.object({
    esearchresult: z.object({
        count: z.string().optional(),
        idlist: z.array(z.string()),
        ERROR: z.string().optional(),
    }),
});

const elinkSchema = z.object({
    linksets: z.array(
        z.object({
            dbfrom: z.string().optional(),
            linksetdbs: z
                .array(
                    z.object({
                        dbto: z.string(),
                        linkname: z.string().optional(),
                        links: z.array(z.string()),
                    })
                )
                .optional(),
        })
    ),
});

const esummarySchema = z.object({
    result: z.object({ uids: z.array(z.string()) }).catchall(z.unknown()),
});

const summaryDocSchema = z
    .object({
        uid: z.string(),
        title: z.string().optional(),
        expxml: z.string().optional(),
        articleids: z.array(z.object({ idtype: z.string(), value: z.string() })).optional(),
    })
    .passthrough();

/** E-utilities sometimes answers 200 with an error in the body */
const bodyErrorSchema = z.object({ error: z.string() });

export type EntrezDocument = z.infer<typeof summaryDocSchema>;

export interface EntrezPayload {
    /** Database the documents were summarized from */
    readonly db: string;
    readonly documents: readonly EntrezDocument[];
}

export interface EntrezAdapterOptions extends LookupAdapterOptions {
    email?: string;
    tool?: string;
}

/**
 * NCBI Entrez E-utilities adapter (esearch, elink, esummary in JSON mode).
 *
 * `context.operation` selects the route:
 *   search  — esearch `db` for the term, summarize the hits
 *   summary — same route, on the identifier's own database
 *   link    — esearch `db`, elink to `targetDb`, summarize the linked ids
 *
 * @see https://www.ncbi.nlm.nih.gov/books/NBK25501/
 */
export class EntrezAdapter implements LookupAdapter<EntrezPayload> {
    readonly name = 'entrez';
    readonly rateLimitCeiling: number;
    private httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly email?: string;
    private readonly tool: string;

    constructor(options: EntrezAdapterOptions = {}) {
        this.rateLimitCeiling = options.rateLimitCeiling ?? 3;
        this.tool = options.tool ?? 'sragent';
        if (options.apiKey) this.apiKey = options.apiKey;
        if (options.email) this.email = options.email;
        this.httpClient = getHttpClient();
        this.applyPacing();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
        this.applyPacing();
    }

    async lookup(
        query: string,
        context: Readonly<Record<string, string>>,
        signal?: AbortSignal
    ): Promise<LookupResult<EntrezPayload>> {
        return settle(async () => {
            const operation = context['operation'] ?? 'search';
            const db = context['db'];
            if (!db) fail('malformed-query', 'Entrez lookup without a database');

            const ids = await this.esearch(db, query, signal);
            if (ids.length === 0) fail('not-found', `No ${db} records match "${query}"`);

            if (operation !== 'link') {
                return { db, documents: await this.esummary(db, ids, signal) };
            }

            const targetDb = context['targetDb'];
            if (!targetDb) fail('malformed-query', 'Entrez link without a target database');

            const linked = await this.elink(db, targetDb, ids, signal);
            if (linked.length === 0) fail('not-found', `No ${targetDb} records linked from ${db} "${query}"`);

            return { db: targetDb, documents: await this.esummary(targetDb, linked, signal) };
        });
    }

    /**
     * NCBI serves truncated or HTML bodies under load, so a malformed response is
     * worth another try along with the usual transient kinds.
     */
    isRetryable(failure: AdapterFailure): boolean {
        return isRetryableFailure(failure) || failure.kind === 'malformed-response';
    }

    normalize(payload: EntrezPayload, strategy: Strategy): AccessionRecord[] {
        const records: AccessionRecord[] = [];

        for (const doc of payload.documents) {
            const found = extractAccessions(collectStrings(doc).join('\n'));
            const refs = forTargets([...documentIds(payload.db, doc), ...found], strategy);
            const title = doc.title || expxmlTitle(doc.expxml);

            for (const ref of refs) {
                records.push(
                    makeRecord(ref, strategy, {
                        confidence: strategy.confidence,
                        rank: records.length,
                        title,
                        url: accessionUrl(ref.namespace, ref.id),
                    })
                );
            }
        }

        return records;
    }

    // ─── E-utilities calls ────────────────────────────────────

    private async esearch(db: string, term: string, signal?: AbortSignal): Promise<string[]> {
        const data = await this.call('esearch.fcgi', { db, term, retmax: String(RETMAX) }, esearchSchema, signal);
        const parsed = esearchSchema.parse(data).esearchresult;
        if (parsed.ERROR) fail('malformed-query', `esearch: ${parsed.ERROR}`);
        return parsed.idlist;
    }

    private async elink(dbfrom: string, db: string, ids: readonly string[], signal?: AbortSignal): Promise<string[]> {
        const data = await this.call('elink.fcgi', { dbfrom, db, id: ids.join(',') }, elinkSchema, signal);
        const links = new Set<string>();
        for (const linkset of elinkSchema.parse(data).linksets) {
            for (const linksetdb of linkset.linksetdbs ?? []) {
                if (linksetdb.dbto !== db) continue;
                for (const id of linksetdb.links) links.add(id);
            }
        }
        return [...links].slice(0, RETMAX);
    }

    private async esummary(db: string, ids: readonly string[], signal?: AbortSignal): Promise<EntrezDocument[]> {
        const data = await this.call('esummary.fcgi', { db, id: ids.join(',') }, esummarySchema, signal);
        const { result } = esummarySchema.parse(data);

        const documents = result.uids.map((uid) => summaryDocSchema.parse(result[uid] ?? { uid }));
        if (documents.length === 0) fail('not-found', `No ${db} summaries for ${ids.join(',')}`);
        return documents;
    }

    private async call(
        endpoint: string,
        params: Record<string, string>,
        schema: z.ZodTypeAny,
        signal?: AbortSignal
    ): Promise<unknown> {
        const search = new URLSearchParams({ ...params, retmode: 'json', tool: this.tool });
        if (this.email) search.set('email', this.email);
        if (this.apiKey) search.set('api_key', this.apiKey);

        const url = `${EUTILS_BASE}/${endpoint}?${search.toString()}`;
        getLogger().debug({ url: redactUrl(url) }, 'Entrez request');

        const response = await this.httpClient.get(url, {
            source: 'entrez',
            signal,
            // Rate-limit and query errors arrive as 200 and must reach the network on retry
            cacheable: (data) => !bodyErrorSchema.safeParse(data).success && schema.safeParse(data).success,
        });

        const bodyError = bodyErrorSchema.safeParse(response.data);
        if (bodyError.success) {
            const message = bodyError.data.error;
            fail(/rate limit/i.test(message) ? 'rate-limit' : 'malformed-query', `${endpoint}: ${message}`);
        }

        return response.data;
    }

    private applyPacing(): void {
        // 3 requests/s without an API key, 10 with one
        const tokensPerSecond = this.apiKey ? 10 : 3;
        this.httpClient.setRateLimit('entrez', { tokensPerSecond, maxBurst: tokensPerSecond });
    }
}

/**
 * Identifiers a summary document carries outside its free text: the uid itself
 * for pubmed/pmc, and the publication ids in `articleids`.
 */
function documentIds(db: string, doc: EntrezDocument): AccessionRef[] {
    const refs: AccessionRef[] = [];

    if (db === 'pubmed') refs.push({ namespace: 'PMID', id: doc.uid });
    if (db === 'pmc') refs.push({ namespace: 'PMCID', id: canonicalizeAccession('PMCID', doc.uid) });

    for (const { idtype, value } of doc.articleids ?? []) {
        switch (idtype) {
            case 'pubmed':
            case 'pmid':
                if (/^\d+$/.test(value)) refs.push({ namespace: 'PMID', id: value });
                break;
            case 'doi':
                refs.push({ namespace: 'DOI', id: canonicalizeAccession('DOI', value) });
                break;
            case 'pmc':
            case 'pmcid': {
                const pmc = value.match(/PMC\d+/i)?.[0];
                if (pmc) refs.push({ namespace: 'PMCID', id: pmc.toUpperCase() });
                break;
            }
        }
    }

    return refs;
}

function expxmlTitle(expxml: string | undefined): string | undefined {
    return expxml?.match(/<Title>([^<]*)<\/Title>/)?.[1]?.trim() || undefined;
}
