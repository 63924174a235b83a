import {
    ResolutionStatus,
    type AccessionRecord,
    type AggregationConfig,
    type LookupAdapter,
    type ResolutionRequest,
    type ResolutionResult,
    type Strategy,
    type StrategyAttempt,
} from '../types/index.js';
import { accessionKey } from '../accessions/parse.js';
import { getLogger } from '../utils/logger.js';
import { bestConfidence, foldPayload } from './aggregator.js';
import { getRateLimitRegistry, type RateLimitRegistry } from './rate-limit-registry.js';
import type { RetryController } from './retry-controller.js';
import { StrategySelector, goalTargets } from './strategy-selector.js';

export type EnginePhase = 'planning' | 'attempting' | 'aggregating' | 'done';

export interface ResolutionEngineDeps {
    adapters: ReadonlyMap<string, LookupAdapter>;
    retry: RetryController;
    aggregation: AggregationConfig;
    selector?: StrategySelector;
    registry?: RateLimitRegistry;
    now?: () => number;
}

export interface ResolveOptions {
    signal?: AbortSignal;
    onPhase?: (phase: EnginePhase) => void;
    onAttempt?: (attempt: StrategyAttempt) => void;
}

/** Successful adapter call waiting to be folded */
interface Pending {
    readonly strategy: Strategy;
    readonly adapter: LookupAdapter;
    readonly payload: unknown;
    readonly attempts: number;
    readonly startedAt: number;
}

/**
 * Drives one request from planning to a final status.
 *
 * Strategies run one after another. A failed strategy is logged and the next one
 * is tried; nothing an adapter does can make `resolve` reject. The engine keeps no
 * state between calls, so concurrent `resolve` calls only share the rate-limit
 * registry.
 */
export class ResolutionEngine {
    private readonly adapters: ReadonlyMap<string, LookupAdapter>;
    private readonly retry: RetryController;
    private readonly aggregation: AggregationConfig;
    private readonly selector: StrategySelector;
    private readonly registry: RateLimitRegistry;
    private readonly now: () => number;

    constructor(deps: ResolutionEngineDeps) {
        this.adapters = deps.adapters;
        this.retry = deps.retry;
        this.aggregation = deps.aggregation;
        this.selector = deps.selector ?? new StrategySelector(deps.adapters.keys());
        this.registry = deps.registry ?? getRateLimitRegistry();
        this.now = deps.now ?? Date.now;
    }

    async resolve(request: ResolutionRequest, options: ResolveOptions = {}): Promise<ResolutionResult> {
        const logger = getLogger();
        const { signal } = options;
        const { policy, resolvedThreshold } = this.aggregation;
        const started = this.now();

        const targets = new Set(goalTargets(request));
        const inputKeys = new Set(request.accessions.map(accessionKey));

        let phase: EnginePhase = 'planning';
        let queue: Strategy[] = [];
        let records: readonly AccessionRecord[] = [];
        let pending: Pending | null = null;
        let stoppedEarly = false;
        const attempts: StrategyAttempt[] = [];

        const log = (attempt: StrategyAttempt) => {
            attempts.push(attempt);
            options.onAttempt?.(attempt);
        };

        while (phase !== 'done') {
            options.onPhase?.(phase);

            switch (phase) {
                case 'planning': {
                    const health = this.registry.snapshot(this.ceilings());
                    queue = [...this.selector.plan(request, health)];
                    logger.info(
                        { goal: request.goal, strategies: queue.length, throttled: [...health.throttled] },
                        'Planned resolution strategies'
                    );
                    phase = 'attempting';
                    break;
                }

                case 'attempting': {
                    if (signal?.aborted) {
                        logger.warn({ remaining: queue.length }, 'Resolution cancelled');
                        phase = 'done';
                        break;
                    }

                    const strategy = queue.shift();
                    if (!strategy) {
                        phase = 'done';
                        break;
                    }

                    const adapter = this.adapters.get(strategy.adapter);
                    if (!adapter) {
                        log({
                            strategy,
                            outcome: 'terminal-failure',
                            attempts: 0,
                            reason: { kind: 'unknown', message: `Adapter "${strategy.adapter}" is not registered` },
                            recordsAdded: 0,
                            durationMs: 0,
                        });
                        break;
                    }

                    const startedAt = this.now();
                    logger.debug({ strategy: strategy.id, query: strategy.query }, 'Attempting strategy');

                    const outcome = await this.retry.execute(
                        adapter.name,
                        (attemptSignal) => adapter.lookup(strategy.query, strategy.context, attemptSignal),
                        { isRetryable: (failure) => adapter.isRetryable(failure), signal }
                    );

                    if (outcome.kind === 'success') {
                        pending = { strategy, adapter, payload: outcome.payload, attempts: outcome.attempts, startedAt };
                        phase = 'aggregating';
                        break;
                    }

                    logger.info(
                        { strategy: strategy.id, kind: outcome.reason.kind, attempts: outcome.attempts },
                        'Strategy failed'
                    );
                    log({
                        strategy,
                        outcome: 'terminal-failure',
                        attempts: outcome.attempts,
                        reason: outcome.reason,
                        recordsAdded: 0,
                        durationMs: this.now() - startedAt,
                    });
                    break;
                }

                case 'aggregating': {
                    if (!pending) {
                        phase = 'attempting';
                        break;
                    }

                    const { strategy, adapter, payload } = pending;
                    const before = records.length;
                    records = Object.freeze(
                        foldPayload(records, adapter, payload, strategy).filter((r) => !inputKeys.has(accessionKey(r)))
                    );

                    log({
                        strategy,
                        outcome: 'success',
                        attempts: pending.attempts,
                        recordsAdded: records.length - before,
                        durationMs: this.now() - pending.startedAt,
                    });
                    logger.info(
                        { strategy: strategy.id, added: records.length - before, total: records.length },
                        'Strategy succeeded'
                    );
                    pending = null;

                    const satisfied = records.some(
                        (r) => targets.has(r.namespace) && r.confidence >= resolvedThreshold
                    );
                    if (policy === 'first-success' && satisfied) {
                        stoppedEarly = true;
                        phase = 'done';
                    } else {
                        phase = 'attempting';
                    }
                    break;
                }
            }
        }

        options.onPhase?.('done');

        const status = decideStatus(records, attempts, resolvedThreshold, stoppedEarly);
        const result: ResolutionResult = Object.freeze({
            request,
            status,
            records,
            attempts: Object.freeze(attempts),
            cancelled: signal?.aborted ?? false,
            durationMs: this.now() - started,
        });

        logger.info(
            { status, records: records.length, attempts: attempts.length, durationMs: result.durationMs },
            'Resolution finished'
        );
        return result;
    }

    private ceilings(): Map<string, number> {
        const ceilings = new Map<string, number>();
        for (const [name, adapter] of this.adapters) {
            ceilings.set(name, adapter.rateLimitCeiling);
        }
        return ceilings;
    }
}

/**
 * Final status for a finished request.
 *
 * No records is always Unresolved and an early stop is always Resolved. After a
 * full run, a best confidence under the threshold combined with at least one
 * failed strategy is PartiallyResolved; anything else with records is Resolved.
 */
export function decideStatus(
    records: readonly AccessionRecord[],
    attempts: readonly StrategyAttempt[],
    threshold: number,
    stoppedEarly: boolean
): ResolutionStatus {
    if (records.length === 0) return ResolutionStatus.Unresolved;
    if (stoppedEarly) return ResolutionStatus.Resolved;

    const failed = attempts.some((a) => a.outcome === 'terminal-failure');
    if (failed && bestConfidence(records) < threshold) {
        return ResolutionStatus.PartiallyResolved;
    }
    return ResolutionStatus.Resolved;
}
