import { z } from 'zod';
import type {
    AccessionRecord,
    AdapterFailure,
    LookupAdapter,
    LookupAdapterOptions,
    LookupResult,
    Strategy,
} from '../types/index.js';
import { extractAccessions } from '../accessions/parse.js';
import { isRetryableFailure } from '../utils/errors.js';
import { getHttpClient, HttpError, redactUrl, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { fail, forTargets, makeRecord, settle } from './utils.js';

const CUSTOM_SEARCH_BASE = 'https://www.googleapis.com/customsearch/v1';

/** Confidence lost per result rank */
const RANK_DECAY = 0.05;
const CONFIDENCE_FLOOR = 0.1;

const searchItemSchema = z.object({
    title: z.string().default(''),
    link: z.string().default(''),
    snippet: z.string().default(''),
});

const searchResponseSchema = z.object({
    items: z.array(searchItemSchema).optional(),
});

/** Google reports quota exhaustion as 403 with one of these reasons */
const quotaErrorSchema = z.object({
    error: z.object({
        errors: z.array(z.object({ reason: z.string() })).optional(),
    }),
});
const QUOTA_REASONS = new Set(['rateLimitExceeded', 'userRateLimitExceeded', 'dailyLimitExceeded']);

export type SearchItem = z.infer<typeof searchItemSchema>;

export interface WebSearchPayload {
    readonly items: readonly SearchItem[];
}

export interface WebSearchAdapterOptions extends LookupAdapterOptions {
    engineId?: string;
    resultsPerQuery?: number;
}

/**
 * Google Custom Search JSON API adapter. Finds accessions mentioned in result
 * titles, snippets and links.
 *
 * @see https://developers.google.com/custom-search/v1/reference/rest/v1/cse/list
 */
export class WebSearchAdapter implements LookupAdapter<WebSearchPayload> {
    readonly name = 'web-search';
    readonly rateLimitCeiling: number;
    private httpClient: HttpClient;
    private readonly apiKey: string;
    private readonly engineId: string;
    private readonly resultsPerQuery: number;

    constructor(options: WebSearchAdapterOptions = {}) {
        this.apiKey = options.apiKey ?? '';
        this.engineId = options.engineId ?? '';
        this.resultsPerQuery = Math.min(10, Math.max(1, options.resultsPerQuery ?? 10));
        this.rateLimitCeiling = options.rateLimitCeiling ?? 2;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async lookup(
        query: string,
        _context: Readonly<Record<string, string>>,
        signal?: AbortSignal
    ): Promise<LookupResult<WebSearchPayload>> {
        return settle(async () => {
            const params = new URLSearchParams({
                key: this.apiKey,
                cx: this.engineId,
                q: query,
                num: String(this.resultsPerQuery),
            });
            const url = `${CUSTOM_SEARCH_BASE}?${params.toString()}`;
            getLogger().debug({ url: redactUrl(url) }, 'Web search request');

            let data: unknown;
            try {
                data = (
                    await this.httpClient.get(url, {
                        source: 'web-search',
                        signal,
                        cacheable: (body) => searchResponseSchema.safeParse(body).success,
                    })
                ).data;
            } catch (error) {
                if (error instanceof HttpError && error.status === 403 && isQuotaError(error.response)) {
                    fail('rate-limit', 'Custom Search quota exceeded');
                }
                throw error;
            }

            const items = searchResponseSchema.parse(data).items ?? [];
            if (items.length === 0) fail('not-found', `No web results for "${query}"`);

            return { items };
        });
    }

    isRetryable(failure: AdapterFailure): boolean {
        return isRetryableFailure(failure);
    }

    normalize(payload: WebSearchPayload, strategy: Strategy): AccessionRecord[] {
        const records: AccessionRecord[] = [];

        payload.items.forEach((item, rank) => {
            const refs = forTargets(extractAccessions(`${item.title}\n${item.snippet}\n${item.link}`), strategy);
            for (const ref of refs) {
                records.push(
                    makeRecord(ref, strategy, {
                        confidence: strategy.confidence - rank * RANK_DECAY,
                        floor: CONFIDENCE_FLOOR,
                        rank,
                        title: item.title,
                        url: item.link,
                    })
                );
            }
        });

        return records;
    }
}

function isQuotaError(body: unknown): boolean {
    const parsed = quotaErrorSchema.safeParse(body);
    if (!parsed.success) return false;
    return (parsed.data.error.errors ?? []).some((e) => QUOTA_REASONS.has(e.reason));
}
