import type {
    AdapterFailure,
    AttemptOutcome,
    LookupResult,
    RetryConfig,
    SettledOutcome,
    TerminalFailureOutcome,
} from '../types/index.js';
import { isRetryableFailure, toAdapterFailure } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { getRateLimitRegistry, type RateLimitRegistry } from './rate-limit-registry.js';

/**
 * An adapter invocation already bound to its query. The signal fires when the
 * attempt times out.
 */
export type AdapterCall<P> = (signal: AbortSignal) => Promise<LookupResult<P>>;

export interface ExecuteOptions {
    /** Adapter-specific classification; defaults to timeout/rate-limit/network/server */
    isRetryable?: (failure: AdapterFailure) => boolean;

    /** Request-level cancellation */
    signal?: AbortSignal;

    /** Observer for every attempt, including retryable failures */
    onAttempt?: (outcome: AttemptOutcome, nextDelayMs: number | null) => void;
}

export interface RetryControllerDeps {
    registry?: RateLimitRegistry;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    random?: () => number;
}

/**
 * Bounded retries with exponential backoff and jitter around a single adapter call.
 * `execute` never throws: every failure ends up in the returned outcome.
 */
export class RetryController {
    private readonly registry: RateLimitRegistry;
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
    private readonly random: () => number;

    constructor(
        private readonly policy: RetryConfig,
        deps: RetryControllerDeps = {}
    ) {
        this.registry = deps.registry ?? getRateLimitRegistry();
        this.sleep = deps.sleep ?? abortableSleep;
        this.random = deps.random ?? Math.random;
    }

    /**
     * Delay before the attempt that follows failed attempt `attempt` (1-based),
     * without jitter: base × 2^(attempt-1), capped.
     */
    nominalDelay(attempt: number): number {
        const { baseDelayMs, maxDelayMs } = this.policy;
        return Math.min(maxDelayMs, baseDelayMs * Math.pow(2, Math.max(0, attempt - 1)));
    }

    /**
     * Nominal delay with ±jitterRatio noise, clamped to [0, maxDelayMs]. A
     * Retry-After hint from the server raises the delay, still within the cap.
     */
    backoffDelay(attempt: number, failure?: AdapterFailure): number {
        const { jitterRatio, maxDelayMs } = this.policy;
        const nominal = this.nominalDelay(attempt);
        const jitter = nominal * jitterRatio * (this.random() * 2 - 1);
        let delay = Math.round(Math.min(maxDelayMs, Math.max(0, nominal + jitter)));

        if (failure?.retryAfterMs !== undefined) {
            delay = Math.min(maxDelayMs, Math.max(delay, failure.retryAfterMs));
        }

        return delay;
    }

    async execute<P>(adapter: string, call: AdapterCall<P>, options: ExecuteOptions = {}): Promise<SettledOutcome<P>> {
        const { maxAttempts } = this.policy;
        const isRetryable = options.isRetryable ?? isRetryableFailure;
        const { signal } = options;

        let lastFailure: AdapterFailure | null = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            if (signal?.aborted) {
                return cancelled(attempt - 1);
            }

            const result = await this.runAttempt(call);

            if (result.ok) {
                const outcome = { kind: 'success', payload: result.payload, attempts: attempt } as const;
                options.onAttempt?.(outcome, null);
                return outcome;
            }

            const failure = result.error;
            lastFailure = failure;

            if (failure.kind === 'rate-limit') {
                const count = this.registry.recordThrottle(adapter);
                getLogger().debug({ adapter, throttleCount: count }, 'Rate-limit response recorded');
            }

            const retryable = failure.kind !== 'cancelled'
                && (failure.kind === 'timeout' || isRetryable(failure));

            if (!retryable) {
                const outcome: TerminalFailureOutcome = {
                    kind: 'terminal-failure',
                    reason: failure,
                    attempts: attempt,
                    exhausted: false,
                };
                options.onAttempt?.(outcome, null);
                return outcome;
            }

            if (attempt === maxAttempts) {
                options.onAttempt?.({ kind: 'retryable-failure', reason: failure, attempts: attempt }, null);
                break;
            }

            const delay = this.backoffDelay(attempt, failure);
            options.onAttempt?.({ kind: 'retryable-failure', reason: failure, attempts: attempt }, delay);
            getLogger().warn(
                { adapter, kind: failure.kind, attempt, maxAttempts, backoffMs: delay },
                'Retryable adapter failure, backing off'
            );

            await this.sleep(delay, signal);
        }

        if (signal?.aborted && lastFailure === null) {
            return cancelled(0);
        }

        return {
            kind: 'terminal-failure',
            reason: lastFailure ?? { kind: 'unknown', message: 'No attempt was made' },
            attempts: maxAttempts,
            exhausted: true,
        };
    }

    /**
     * One attempt bounded by the attempt timeout. Thrown errors become failures.
     */
    private async runAttempt<P>(call: AdapterCall<P>): Promise<LookupResult<P>> {
        const { attemptTimeoutMs } = this.policy;
        const controller = new AbortController();
        let timer: ReturnType<typeof setTimeout> | undefined;

        const timeout = new Promise<LookupResult<P>>((resolve) => {
            timer = setTimeout(() => {
                controller.abort();
                resolve({
                    ok: false,
                    error: { kind: 'timeout', message: `Attempt exceeded ${attemptTimeoutMs}ms` },
                });
            }, attemptTimeoutMs);
        });

        const invocation = Promise.resolve()
            .then(() => call(controller.signal))
            .catch((error: unknown): LookupResult<P> => ({ ok: false, error: toAdapterFailure(error) }));

        try {
            return await Promise.race([invocation, timeout]);
        } finally {
            clearTimeout(timer);
        }
    }
}

function cancelled(attempts: number): TerminalFailureOutcome {
    return {
        kind: 'terminal-failure',
        reason: { kind: 'cancelled', message: 'Request cancelled' },
        attempts,
        exhausted: false,
    };
}

/**
 * setTimeout-based sleep that returns early when the signal aborts.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }

        const done = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal?.addEventListener('abort', done, { once: true });
    });
}
