import { ResolutionStatus, type ResolutionRequest, type ResolutionResult } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import type { ResolutionEngine, ResolveOptions } from './workflow-engine.js';

/**
 * Counting semaphore for bounding concurrent work on the event loop.
 */
export class Semaphore {
    private inFlight = 0;
    private readonly queue: Array<() => void> = [];

    constructor(private readonly limit: number) {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
        }
    }

    get active(): number {
        return this.inFlight;
    }

    get waiting(): number {
        return this.queue.length;
    }

    async acquire(): Promise<() => void> {
        if (this.inFlight < this.limit) {
            this.inFlight += 1;
            return this.releaser();
        }

        return new Promise((resolve) => {
            this.queue.push(() => {
                this.inFlight += 1;
                resolve(this.releaser());
            });
        });
    }

    /** A release function that only counts once */
    private releaser(): () => void {
        let released = false;
        return () => {
            if (released) return;
            released = true;
            this.release();
        };
    }

    private release(): void {
        this.inFlight -= 1;
        const next = this.queue.shift();
        if (next) {
            next();
        }
    }
}

export interface BatchOptions {
    maxConcurrency: number;

    /** Request-level cancellation, shared by every item */
    signal?: AbortSignal;

    /** Called as each item finishes, in completion order */
    onResult?: (result: ResolutionResult, index: number) => void;
}

/**
 * Resolve several requests on one engine, at most `maxConcurrency` at a time.
 * Results come back in input order. Every request shares the engine's rate-limit
 * registry, so throttling seen by one item defers that adapter for items planned
 * after it.
 */
export async function resolveBatch(
    engine: ResolutionEngine,
    requests: readonly ResolutionRequest[],
    options: BatchOptions
): Promise<ResolutionResult[]> {
    const logger = getLogger();
    const semaphore = new Semaphore(options.maxConcurrency);
    const resolveOptions: ResolveOptions = { signal: options.signal };

    logger.info({ items: requests.length, maxConcurrency: options.maxConcurrency }, 'Starting batch');

    const results = await Promise.all(
        requests.map(async (request, index) => {
            const release = await semaphore.acquire();
            try {
                const result = await engine.resolve(request, resolveOptions);
                logger.debug({ index, input: request.input, status: result.status }, 'Batch item finished');
                options.onResult?.(result, index);
                return result;
            } finally {
                release();
            }
        })
    );

    logger.info(
        { items: results.length, resolved: results.filter((r) => r.status === ResolutionStatus.Resolved).length },
        'Batch finished'
    );
    return results;
}
