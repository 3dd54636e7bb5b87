import type { CVRecord } from "../types/resume";

export const DEFAULT_CACHE_TTL_SECONDS = 24 * 60 * 60;

export interface ResultCache {
    get(key: string): Promise<CVRecord | undefined>;
    set(key: string, record: CVRecord): Promise<void>;
}

interface CacheEntry {
    record: CVRecord;
    expiresAt: number;
}

export function cacheKey(fingerprint: string): string {
    return `cv:${fingerprint}`;
}

/**
 * In-process cache with a TTL. Records are cloned on the way in and out.
 */
export class MemoryResultCache implements ResultCache {
    private readonly entries = new Map<string, CacheEntry>();

    constructor(
        private readonly ttlSeconds: number = DEFAULT_CACHE_TTL_SECONDS,
        private readonly now: () => number = Date.now
    ) {}

    async get(key: string): Promise<CVRecord | undefined> {
        const entry = this.entries.get(key);
        if (!entry) return undefined;
        if (entry.expiresAt <= this.now()) {
            this.entries.delete(key);
            return undefined;
        }
        return structuredClone(entry.record);
    }

    async set(key: string, record: CVRecord): Promise<void> {
        this.entries.set(key, {
            record: structuredClone(record),
            expiresAt: this.now() + this.ttlSeconds * 1000,
        });
    }

    get size(): number {
        return this.entries.size;
    }
}
