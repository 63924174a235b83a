import type {
    AccessionRef,
    AdapterFailure,
    AdapterFailureKind,
    LookupAdapter,
    LookupResult,
    RetryConfig,
    Strategy,
    AccessionRecord,
} from '../types/index.js';
import { isRetryableFailure } from '../utils/errors.js';
import { makeRecord } from '../sources/utils.js';

/**
 * Payload of the fake adapter: the refs it "found", in rank order.
 */
export interface FakePayload {
    refs: AccessionRef[];
    /** Confidence lost per rank */
    decay?: number;
}

type Responder = (
    query: string,
    context: Readonly<Record<string, string>>,
    call: number
) => LookupResult<FakePayload> | Promise<LookupResult<FakePayload>>;

/**
 * In-process adapter driven by a responder function.
 */
export class FakeAdapter implements LookupAdapter<FakePayload> {
    readonly calls: Array<{ query: string; context: Readonly<Record<string, string>> }> = [];

    constructor(
        readonly name: string,
        private readonly responder: Responder,
        readonly rateLimitCeiling = 3
    ) {}

    async lookup(query: string, context: Readonly<Record<string, string>>): Promise<LookupResult<FakePayload>> {
        this.calls.push({ query, context });
        return this.responder(query, context, this.calls.length - 1);
    }

    isRetryable(failure: AdapterFailure): boolean {
        return isRetryableFailure(failure);
    }

    normalize(payload: FakePayload, strategy: Strategy): AccessionRecord[] {
        return payload.refs.map((ref, rank) =>
            makeRecord(ref, strategy, { confidence: strategy.confidence - rank * (payload.decay ?? 0), rank })
        );
    }
}

export function found(...refs: AccessionRef[]): LookupResult<FakePayload> {
    return { ok: true, payload: { refs } };
}

export function failure(kind: AdapterFailureKind, message: string = kind): LookupResult<FakePayload> {
    return { ok: false, error: { kind, message } };
}

export const FAST_RETRY: RetryConfig = {
    maxAttempts: 3,
    baseDelayMs: 10,
    maxDelayMs: 100,
    jitterRatio: 0.2,
    attemptTimeoutMs: 1000,
};

export function makeStrategy(overrides: Partial<Strategy> = {}): Strategy {
    return {
        id: 'test:strategy',
        adapter: 'entrez',
        query: 'GSE121737',
        context: {},
        rewrite: 'literal',
        confidence: 0.9,
        targets: ['SRX'],
        position: 0,
        deferred: false,
        ...overrides,
    };
}

export function record(overrides: Partial<AccessionRecord> = {}): AccessionRecord {
    return {
        id: 'SRX4967527',
        namespace: 'SRX',
        source: 'entrez',
        strategyId: 'test:strategy',
        confidence: 0.9,
        rank: 0,
        ...overrides,
    };
}

/**
 * A JSON fetch response.
 */
export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json', ...headers },
    });
}

/**
 * URL string of whatever was passed to fetch.
 */
export function urlOf(input: unknown): string {
    if (typeof input === 'string') return input;
    if (input instanceof URL) return input.toString();
    if (input instanceof Request) return input.url;
    return String(input);
}

/**
 * E-utilities responses for GSE121737 linking to one SRA experiment.
 */
export const EUTILS = {
    esearchGds: { esearchresult: { count: '1', idlist: ['200121737'] } },
    esearchEmpty: { esearchresult: { count: '0', idlist: [] } },
    elinkGdsSra: {
        linksets: [
            {
                dbfrom: 'gds',
                linksetdbs: [{ dbto: 'sra', linkname: 'gds_sra', links: ['6653075'] }],
            },
        ],
    },
    esummarySra: {
        result: {
            uids: ['6653075'],
            '6653075': {
                uid: '6653075',
                expxml:
                    '<Summary><Title>Liver scRNA-seq</Title></Summary>'
                    + '<Experiment acc="SRX4967527" ver="1"/><Study acc="SRP166966"/>',
                runs: '<Run acc="SRR8148392" total_spots="1000"/>',
            },
        },
    },
};

/**
 * fetch stub that answers E-utilities calls by endpoint.
 */
export function eutilsFetch(routes: { esearch?: unknown; elink?: unknown; esummary?: unknown }) {
    return async (input: unknown): Promise<Response> => {
        const url = urlOf(input);
        if (url.includes('esearch.fcgi')) return jsonResponse(routes.esearch ?? EUTILS.esearchEmpty);
        if (url.includes('elink.fcgi')) return jsonResponse(routes.elink ?? { linksets: [] });
        if (url.includes('esummary.fcgi')) return jsonResponse(routes.esummary ?? { result: { uids: [] } });
        return jsonResponse({ error: 'unexpected url' }, 404);
    };
}
