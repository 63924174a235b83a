import { getLogger } from '../utils/logger.js';

/**
 * Per-adapter throttle bookkeeping shared by every request in the process.
 *
 * The retry controller records each rate-limit response; the strategy selector
 * reads a snapshot to defer adapters that are currently being throttled. Events
 * older than the window are dropped on every read and write. All mutation happens
 * synchronously, so concurrent requests on the event loop never interleave inside
 * an update.
 */
export class RateLimitRegistry {
    private events = new Map<string, number[]>();

    constructor(
        private windowMs: number = 60000,
        private readonly now: () => number = Date.now
    ) {}

    get window(): number {
        return this.windowMs;
    }

    /**
     * Change the sliding window. Recorded events are kept and judged against the new one.
     */
    setWindow(windowMs: number): void {
        this.windowMs = windowMs;
    }

    /**
     * Record one rate-limit response from an adapter. Returns the updated count.
     */
    recordThrottle(adapter: string): number {
        const live = this.prune(adapter);
        live.push(this.now());
        this.events.set(adapter, live);
        return live.length;
    }

    /**
     * Rate-limit responses seen inside the window.
     */
    throttleCount(adapter: string): number {
        return this.prune(adapter).length;
    }

    /**
     * Whether an adapter is at or over its ceiling.
     */
    isThrottled(adapter: string, ceiling: number): boolean {
        return this.throttleCount(adapter) >= ceiling;
    }

    /**
     * Immutable view of which adapters are throttled, for planning.
     */
    snapshot(ceilings: ReadonlyMap<string, number>): AdapterHealth {
        const throttled = new Set<string>();
        for (const [adapter, ceiling] of ceilings) {
            if (this.isThrottled(adapter, ceiling)) throttled.add(adapter);
        }
        return { throttled };
    }

    /**
     * Forget every recorded event.
     */
    reset(): void {
        this.events.clear();
    }

    private prune(adapter: string): number[] {
        const cutoff = this.now() - this.windowMs;
        const live = (this.events.get(adapter) ?? []).filter((t) => t > cutoff);
        if (live.length > 0) {
            this.events.set(adapter, live);
        } else {
            this.events.delete(adapter);
        }
        return live;
    }
}

/**
 * Adapter health as seen by the strategy selector.
 */
export interface AdapterHealth {
    readonly throttled: ReadonlySet<string>;
}

export const HEALTHY: AdapterHealth = { throttled: new Set<string>() };

/**
 * Process-wide registry. Created lazily on first use, reset explicitly.
 */
let registryInstance: RateLimitRegistry | null = null;
let registryWindowSet = false;

/**
 * Get the shared registry instance. The first caller that passes a window
 * sets it, even when an earlier caller already created the registry with the
 * default; a later, different window is ignored with a warning.
 */
export function getRateLimitRegistry(windowMs?: number): RateLimitRegistry {
    if (!registryInstance) {
        registryInstance = new RateLimitRegistry(windowMs);
        registryWindowSet = windowMs !== undefined;
        return registryInstance;
    }

    if (windowMs !== undefined) {
        if (!registryWindowSet) {
            registryInstance.setWindow(windowMs);
            registryWindowSet = true;
        } else if (registryInstance.window !== windowMs) {
            getLogger().warn(
                { windowMs, activeWindowMs: registryInstance.window },
                'Rate-limit registry already configured, keeping its window'
            );
        }
    }

    return registryInstance;
}

/**
 * Drop the shared registry; the next `getRateLimitRegistry()` starts empty.
 */
export function resetRateLimitRegistry(): void {
    registryInstance = null;
    registryWindowSet = false;
}
