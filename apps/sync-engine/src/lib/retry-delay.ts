import type { RateLimitHint } from './sync-errors';

export type JitterMode = 'full' | 'partial';

/**
 * Parses a Retry-After header, either delta-seconds or an HTTP date.
 * Returns the wait in milliseconds, or null when the header is absent or malformed.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
    if (value === null || value.trim() === '') {
        return null;
    }

    const trimmed = value.trim();
    if (/^\d+(\.\d+)?$/.test(trimmed)) {
        return Math.round(Number(trimmed) * 1000);
    }

    const date = Date.parse(trimmed);
    if (Number.isNaN(date)) {
        return null;
    }
    return Math.max(0, date - now);
}

/**
 * Token-bucket estimate used by services that publish their bucket state
 * instead of Retry-After: (requested - remaining) / replenish-rate seconds.
 */
export function estimateBucketWaitMs(headers: Headers): number | null {
    const remaining = Number(headers.get('X-RateLimit-Remaining'));
    const requested = Number(headers.get('X-RateLimit-Requested-Tokens'));
    const replenishRate = Number(headers.get('X-RateLimit-Replenish-Rate'));

    if (
        !headers.has('X-RateLimit-Replenish-Rate') ||
        !Number.isFinite(remaining) ||
        !Number.isFinite(requested) ||
        !Number.isFinite(replenishRate) ||
        replenishRate <= 0
    ) {
        return null;
    }

    const deficit = Math.max(0, requested - remaining);
    return Math.ceil((deficit / replenishRate) * 1000);
}

export function readRateLimitHint(headers: Headers, now: number = Date.now()): RateLimitHint {
    const retryAfter = parseRetryAfter(headers.get('Retry-After'), now);
    if (retryAfter !== null) {
        return { kind: 'retry-after', waitMs: retryAfter };
    }

    const bucketWait = estimateBucketWaitMs(headers);
    if (bucketWait !== null) {
        return { kind: 'bucket', waitMs: bucketWait };
    }

    return { kind: 'none' };
}

// attempt is 1-based
export function computeBackoffDelayMs(
    attempt: number,
    baseDelayMs: number,
    maxDelayMs: number,
    jitter: JitterMode,
    random: () => number = Math.random
): number {
    const ceiling = Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
    if (jitter === 'full') {
        return Math.round(random() * ceiling);
    }
    const half = ceiling / 2;
    return Math.round(half + random() * half);
}

// A server-requested wait is stretched up to 1.5x, never shortened
export function stretchServerWait(waitMs: number, maxDelayMs: number, random: () => number = Math.random): number {
    const stretched = Math.round(waitMs * (1 + random() * 0.5));
    return Math.max(waitMs, Math.min(stretched, maxDelayMs));
}
