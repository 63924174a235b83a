import type { ResponseCache } from '../cache/response-cache.js';
import { VERSION } from '../version.js';
import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Reserve the token now so concurrent callers queue behind each other
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        this.tokens -= 1;
        await sleep(waitMs);
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, RateLimit> = {
    entrez: { tokensPerSecond: 3, maxBurst: 3 },        // 3/s without API key, 10/s with
    'web-search': { tokensPerSecond: 5, maxBurst: 5 },
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source rate limiting
    signal?: AbortSignal;

    /**
     * Whether a successful body may be cached. Bodies the caller would reject
     * (an error reported with status 200, a shape mismatch) must not be replayed.
     */
    cacheable?: (data: unknown) => boolean;
}

/**
 * HTTP response wrapper. `data` is parsed JSON or raw text and is validated by
 * the caller.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: unknown;
    ok: boolean;
    cached: boolean;
}

export type HttpErrorCode = 'http' | 'timeout' | 'network' | 'cancelled';

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    readonly code: HttpErrorCode;
    readonly retryAfterMs?: number;

    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown,
        details: { code?: HttpErrorCode; retryAfterMs?: number } = {}
    ) {
        super(message);
        this.name = 'HttpError';
        this.code = details.code ?? 'http';
        if (details.retryAfterMs !== undefined) {
            this.retryAfterMs = details.retryAfterMs;
        }
    }
}

/**
 * Centralized HTTP client with per-source rate limiting, timeouts and an optional
 * response cache. A call makes exactly one request; retrying is the caller's job.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private limits = new Map<string, RateLimit>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly cache: ResponseCache | null;

    constructor(options?: { timeout?: number; version?: string; cache?: ResponseCache }) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? VERSION;
        this.userAgent = `SRAgent/${version} (Node.js)`;
        this.cache = options?.cache ?? null;
    }

    /**
     * Make a single HTTP request, paced by the source's token bucket.
     */
    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const {
            headers = {},
            timeout = this.defaultTimeout,
            source = 'default',
            signal,
            cacheable = () => true,
        } = options;

        if (this.cache) {
            const hit = this.cache.get(url);
            if (hit !== null && cacheable(hit)) {
                return { status: 200, headers: {}, data: hit, ok: true, cached: true };
            }
        }

        // Acquire rate limit token
        await this.getBucket(source).acquire();

        if (signal?.aborted) {
            throw new HttpError(`Request cancelled: ${redactUrl(url)}`, 0, false, undefined, { code: 'cancelled' });
        }

        // Track request count
        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        const controller = new AbortController();
        let timedOut = false;
        const timeoutId = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, timeout);
        const onAbort = () => controller.abort();
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            const response = await fetch(url, {
                headers: requestHeaders,
                signal: controller.signal,
            });

            // Parse response
            const contentType = response.headers.get('content-type') ?? '';
            const data: unknown = contentType.includes('json')
                ? await response.json()
                : await response.text();

            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            if (!response.ok) {
                const retryable = RETRYABLE_STATUS_CODES.has(response.status);
                const retryAfterMs = this.parseRetryAfter(response.headers.get('retry-after'));
                getLogger().debug({ status: response.status, source, url: redactUrl(url) }, 'HTTP error response');

                throw new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    retryable,
                    data,
                    retryAfterMs !== null ? { retryAfterMs } : {}
                );
            }

            if (this.cache && cacheable(data)) {
                this.cache.set(url, data);
            }

            return { status: response.status, headers: responseHeaders, data, ok: true, cached: false };
        } catch (error) {
            if (error instanceof HttpError) throw error;

            if (timedOut) {
                throw new HttpError(`Request timeout after ${timeout}ms: ${redactUrl(url)}`, 0, true, undefined, { code: 'timeout' });
            }

            if (signal?.aborted) {
                throw new HttpError(`Request cancelled: ${redactUrl(url)}`, 0, false, undefined, { code: 'cancelled' });
            }

            const code = errorCode(error);
            const retryable = code ? RETRYABLE_ERROR_CODES.has(code) : false;

            throw new HttpError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                0,
                retryable,
                undefined,
                { code: 'network' }
            );
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', onAbort);
        }
    }

    /**
     * Convenience method for GET requests.
     */
    async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
        return this.request(url, options);
    }

    /**
     * Override the pacing of one source (e.g. Entrez with an API key).
     */
    setRateLimit(source: string, limit: RateLimit): void {
        this.limits.set(source, limit);
        this.buckets.delete(source);
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    private getBucket(source: string): TokenBucket {
        const existing = this.buckets.get(source);
        if (existing) return existing;

        const config = this.limits.get(source) ?? RATE_LIMITS[source] ?? { tokensPerSecond: 5, maxBurst: 5 };
        const bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
        this.buckets.set(source, bucket);
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }
}

/**
 * Strip credentials from a URL before it is logged or put in an error message.
 */
export function redactUrl(url: string): string {
    return url.replace(/([?&](?:api_key|key)=)[^&]*/g, '$1***');
}

function errorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    const cause = error.cause;
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') return cause.code;
    return undefined;
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: { timeout?: number; version?: string; cache?: ResponseCache }): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: { timeout?: number; version?: string; cache?: ResponseCache }): HttpClient {
    return new HttpClient(options);
}
