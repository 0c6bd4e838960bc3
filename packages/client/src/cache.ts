import { LRUCache } from 'lru-cache';
import { Time } from '@cfkit/utils';

export const DEFAULT_TTL = 5 * Time.minute;

export interface CacheOptions {
    ttl?: number;
    max?: number;
}

/**
 * TTL key-value store for decoded API results. Entries past their expiry
 * read as absent. Concurrent misses on one key are not merged.
 */
export class ResponseCache<V extends {}> {
    readonly ttl: number;
    private store: LRUCache<string, V>;

    constructor(options: CacheOptions = {}) {
        this.ttl = options.ttl ?? DEFAULT_TTL;
        this.store = new LRUCache<string, V>({
            max: options.max ?? 1000,
            ttl: this.ttl,
            ttlAutopurge: false,
        });
    }

    get(key: string): V | undefined {
        return this.store.get(key);
    }

    set(key: string, value: V) {
        this.store.set(key, value);
    }

    has(key: string) {
        return this.store.has(key);
    }

    delete(key: string) {
        return this.store.delete(key);
    }

    clear() {
        this.store.clear();
    }

    /** Number of stored entries; expired ones count until they are read. */
    get size() {
        return this.store.size;
    }
}

export function cacheKey(method: string, params: Record<string, string> = {}) {
    const query = Object.keys(params).sort().map((key) => `${key}=${params[key]}`).join('&');
    return query ? `${method}?${query}` : method;
}
