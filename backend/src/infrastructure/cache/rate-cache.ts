import { RateTable } from '../../shared/types/common.types';
import { logger } from '../monitoring/logger.service';

export interface CacheStats {
    hits: number;
    misses: number;
    entries: number;
    hitRate: number;
}

/**
 * In-process memo of rate tables keyed by base currency.
 *
 * Entries hold the pending fetch, so callers that arrive while a fetch is in
 * flight share it instead of starting another. A rejected fetch is evicted and
 * the next caller tries again. Entries never expire on their own.
 */
export class RateCache {
    private readonly entries = new Map<string, Promise<Readonly<RateTable>>>();
    private hits = 0;
    private misses = 0;

    getOrCompute(key: string, compute: () => Promise<RateTable>): Promise<Readonly<RateTable>> {
        const cached = this.entries.get(key);
        if (cached) {
            this.hits++;
            logger.cache(`Rate table hit: ${key}`);
            return cached;
        }

        this.misses++;
        logger.cache(`Rate table miss: ${key}`);

        const pending: Promise<Readonly<RateTable>> = compute().then(
            table => Object.freeze({ ...table }),
            (error: unknown) => {
                if (this.entries.get(key) === pending) {
                    this.entries.delete(key);
                }
                throw error;
            }
        );
        this.entries.set(key, pending);
        return pending;
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    delete(key: string): boolean {
        const deleted = this.entries.delete(key);
        if (deleted) {
            logger.cache(`Rate table evicted: ${key}`);
        }
        return deleted;
    }

    clear(): void {
        const count = this.entries.size;
        this.entries.clear();
        logger.cache('Rate cache cleared', { entries: count });
    }

    get size(): number {
        return this.entries.size;
    }

    getStats(): CacheStats {
        const lookups = this.hits + this.misses;
        return {
            hits: this.hits,
            misses: this.misses,
            entries: this.entries.size,
            hitRate: lookups === 0 ? 0 : this.hits / lookups
        };
    }
}
