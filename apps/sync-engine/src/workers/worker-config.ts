import type { RateLimiterConfig } from '../lib/rate-limiter';
import type { RetryPolicy } from '../lib/resilient-executor';
import type { CatalogName } from '../types/catalog';

export interface CatalogPolicy {
    batchSize: number;
    // Offset or limit pages; TIDAL cursor pages are sized by the server
    pageSize?: number;
    rateLimit: Partial<RateLimiterConfig>;
    retry?: Partial<RetryPolicy>;
}

export const CATALOG_POLICIES: Record<CatalogName, CatalogPolicy> = {
    plex: {
        batchSize: 100,
        pageSize: 100,
        // Local server; pacing only guards against bursts
        rateLimit: { initialRate: 20, minRate: 5, burstCapacity: 20 },
        retry: { baseDelayMs: 1_000, maxDelayMs: 30_000 },
    },
    spotify: {
        batchSize: 100,
        pageSize: 50,
        rateLimit: { initialRate: 5, minRate: 0.5, burstCapacity: 10 },
    },
    tidal: {
        batchSize: 20,
        rateLimit: { initialRate: 2, minRate: 0.25, burstCapacity: 4 },
    },
};

export const DEFAULT_CONCURRENCY = 1;
