import { mkdirSync, existsSync, readFileSync, writeFileSync, readdirSync, statSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';

const cacheEntrySchema = z.object({
    timestamp: z.number(),
    data: z.unknown(),
});

/**
 * Simple file-system cache for API responses.
 * Stores JSON files in a configurable cache directory.
 *
 * Cache key = SHA-256 of the full URL.
 * TTL = 24 hours by default.
 */
export class ResponseCache {
    private cacheDir: string;
    private ttlMs: number;
    private enabled: boolean;

    constructor(options: {
        cacheDir?: string;
        ttlHours?: number;
        enabled?: boolean;
    } = {}) {
        this.cacheDir = options.cacheDir ?? '.sragent-cache';
        this.ttlMs = (options.ttlHours ?? 24) * 60 * 60 * 1000;
        this.enabled = options.enabled ?? true;

        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
            getLogger().debug({ cacheDir: this.cacheDir }, 'Cache initialized');
        }
    }

    /**
     * Generate a deterministic cache key from a URL.
     */
    private makeKey(url: string): string {
        return createHash('sha256').update(url).digest('hex');
    }

    /**
     * Get a cached response body, or null if not found/expired.
     */
    get(url: string): unknown {
        if (!this.enabled) return null;

        const filePath = join(this.cacheDir, `${this.makeKey(url)}.json`);
        if (!existsSync(filePath)) return null;

        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(filePath, 'utf-8'));
        } catch (error) {
            getLogger().debug({ error, filePath }, 'Unreadable cache entry');
            return null;
        }

        const entry = cacheEntrySchema.safeParse(raw);
        if (!entry.success || entry.data.data === undefined) return null;

        if (Date.now() - entry.data.timestamp > this.ttlMs) {
            getLogger().debug({ key: this.makeKey(url).slice(0, 12) }, 'Cache expired');
            return null;
        }

        getLogger().debug({ key: this.makeKey(url).slice(0, 12) }, 'Cache hit');
        return entry.data.data;
    }

    /**
     * Store a response body in the cache.
     */
    set(url: string, data: unknown): void {
        if (!this.enabled) return;

        const filePath = join(this.cacheDir, `${this.makeKey(url)}.json`);

        try {
            writeFileSync(filePath, JSON.stringify({ timestamp: Date.now(), data }), 'utf-8');
        } catch (error) {
            getLogger().warn({ error }, 'Failed to write cache entry');
        }
    }

    /**
     * Check if a URL is cached and not expired.
     */
    has(url: string): boolean {
        return this.get(url) !== null;
    }

    /**
     * Remove every cached entry.
     */
    clear(): number {
        if (!existsSync(this.cacheDir)) return 0;
        const count = readdirSync(this.cacheDir).length;
        rmSync(this.cacheDir, { recursive: true, force: true });
        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
        }
        return count;
    }

    /**
     * Get cache stats.
     */
    getStats(): { enabled: boolean; directory: string; entries: number; bytes: number } {
        let entries = 0;
        let bytes = 0;

        if (existsSync(this.cacheDir)) {
            for (const file of readdirSync(this.cacheDir)) {
                entries++;
                bytes += statSync(join(this.cacheDir, file)).size;
            }
        }

        return {
            enabled: this.enabled,
            directory: this.cacheDir,
            entries,
            bytes,
        };
    }
}
