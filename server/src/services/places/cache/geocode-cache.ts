/**
 * GeocodeCache
 * Caches geocoding results keyed by the raw location string.
 *
 * Only successful lookups are stored; failures are retried on the next turn.
 */

import { logger } from '../../../lib/logger/structured-logger.js';
import type { GeocodeResult } from '../models/types.js';

interface CacheEntry {
    result: GeocodeResult;
    timestamp: number;
}

export class GeocodeCache {
    private cache = new Map<string, CacheEntry>();
    private hits = 0;
    private misses = 0;

    constructor(
        private readonly ttlMs: number = 24 * 60 * 60 * 1000,
        private readonly now: () => number = Date.now
    ) { }

    /**
     * Returns null if not cached or expired
     */
    get(location: string): GeocodeResult | null {
        const key = this.makeKey(location);
        const entry = this.cache.get(key);

        if (!entry) {
            this.misses++;
            return null;
        }

        if (this.now() - entry.timestamp > this.ttlMs) {
            this.cache.delete(key);
            this.misses++;
            logger.debug({ location, event: 'geocode_cache_expired' }, '[GeocodeCache] EXPIRED');
            return null;
        }

        this.hits++;
        logger.debug({ location, hits: this.hits, misses: this.misses, event: 'geocode_cache_hit' }, '[GeocodeCache] HIT');
        return entry.result;
    }

    set(location: string, result: GeocodeResult): void {
        this.cache.set(this.makeKey(location), {
            result,
            timestamp: this.now()
        });
        logger.debug({ location, label: result.label, event: 'geocode_cache_store' }, '[GeocodeCache] STORE');
    }

    clearAll(): void {
        this.cache.clear();
        this.hits = 0;
        this.misses = 0;
    }

    getStats(): { size: number; hits: number; misses: number; hitRate: number } {
        const total = this.hits + this.misses;
        const hitRate = total > 0 ? this.hits / total : 0;

        return {
            size: this.cache.size,
            hits: this.hits,
            misses: this.misses,
            hitRate: Math.round(hitRate * 100) / 100
        };
    }

    /**
     * Case and surrounding whitespace do not change the place
     */
    private makeKey(location: string): string {
        return location.toLowerCase().trim();
    }

    cleanup(): number {
        const now = this.now();
        let cleaned = 0;

        for (const [key, entry] of this.cache.entries()) {
            if (now - entry.timestamp > this.ttlMs) {
                this.cache.delete(key);
                cleaned++;
            }
        }

        if (cleaned > 0) {
            logger.debug({ cleaned }, '[GeocodeCache] Cleaned up expired entries');
        }
        return cleaned;
    }

    size(): number {
        return this.cache.size;
    }
}
