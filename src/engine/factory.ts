import type { LookupAdapter, SRAgentConfig } from '../types/index.js';
import { ResponseCache } from '../cache/response-cache.js';
import { EntrezAdapter } from '../sources/entrez.js';
import { WebSearchAdapter } from '../sources/web-search.js';
import { assertCredentials } from '../utils/config.js';
import { createHttpClient, type HttpClient } from '../utils/http-client.js';
import { VERSION } from '../version.js';
import { getRateLimitRegistry, type RateLimitRegistry } from './rate-limit-registry.js';
import { RetryController, type RetryControllerDeps } from './retry-controller.js';
import { ResolutionEngine } from './workflow-engine.js';

export interface EngineFactoryDeps {
    httpClient?: HttpClient;
    registry?: RateLimitRegistry;
    sleep?: RetryControllerDeps['sleep'];
    random?: () => number;
}

/**
 * HTTP client for the configured cache and attempt timeout.
 */
export function createConfiguredHttpClient(config: SRAgentConfig): HttpClient {
    const cache = config.cache.enabled
        ? new ResponseCache({ cacheDir: config.cache.dir, ttlHours: config.cache.ttlHours })
        : undefined;
    return createHttpClient({ timeout: config.retry.attemptTimeoutMs, version: VERSION, cache });
}

/**
 * Adapters for every enabled source, keyed by adapter name.
 * Throws ConfigurationError when an enabled source lacks credentials.
 */
export function createAdapters(config: SRAgentConfig, httpClient: HttpClient): Map<string, LookupAdapter> {
    assertCredentials(config);

    const adapters = new Map<string, LookupAdapter>();

    if (config.entrez.enabled) {
        const entrez = new EntrezAdapter({
            email: config.entrez.email,
            apiKey: config.entrez.apiKey,
            tool: config.entrez.tool,
            rateLimitCeiling: config.entrez.rateLimitCeiling,
        });
        entrez.setHttpClient(httpClient);
        adapters.set(entrez.name, entrez);
    }

    if (config.webSearch.enabled) {
        const webSearch = new WebSearchAdapter({
            apiKey: config.webSearch.apiKey,
            engineId: config.webSearch.engineId,
            resultsPerQuery: config.webSearch.resultsPerQuery,
            rateLimitCeiling: config.webSearch.rateLimitCeiling,
        });
        webSearch.setHttpClient(httpClient);
        adapters.set(webSearch.name, webSearch);
    }

    return adapters;
}

/**
 * Wire adapters, retry controller and the shared registry into an engine.
 */
export function createEngine(config: SRAgentConfig, deps: EngineFactoryDeps = {}): ResolutionEngine {
    // Before the cache directory is created
    assertCredentials(config);

    const httpClient = deps.httpClient ?? createConfiguredHttpClient(config);
    const registry = deps.registry ?? getRateLimitRegistry(config.rateLimitWindowMs);
    const adapters = createAdapters(config, httpClient);

    const retry = new RetryController(config.retry, { registry, sleep: deps.sleep, random: deps.random });

    return new ResolutionEngine({
        adapters,
        retry,
        aggregation: config.aggregation,
        registry,
    });
}
