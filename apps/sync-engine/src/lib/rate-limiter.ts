import type { Logger } from 'pino';
import { serviceLoggers } from './logger';
import { sleep as defaultSleep } from './timers';
import type { Sleep } from './timers';

export interface RateLimiterConfig {
    initialRate: number;      // Requests per second
    minRate: number;          // Floor after repeated 429s
    burstCapacity: number;    // Max tokens in bucket
    recoveryFactor: number;   // Rate increase factor after success streak
    successStreakThreshold: number;
}

export const DEFAULT_RATE_LIMITER_CONFIG: RateLimiterConfig = {
    initialRate: 2,
    minRate: 0.5,
    burstCapacity: 5,
    recoveryFactor: 1.25,
    successStreakThreshold: 20,
};

export interface RateLimiterOptions {
    name: string;
    config?: Partial<RateLimiterConfig>;
    now?: () => number;
    sleep?: Sleep;
}

export interface RateLimiterState {
    currentRate: number;
    tokens: number;
    isPaused: boolean;
}

// Per-catalog pacing: halves its rate on a 429, recovers after a success streak
export class AdaptiveRateLimiter {
    private tokens: number;
    private lastRefill: number;
    private currentRate: number;
    private successStreak = 0;
    private pauseUntil = 0;
    private readonly config: RateLimiterConfig;
    private readonly now: () => number;
    private readonly sleep: Sleep;
    private readonly log: Logger;

    constructor(options: RateLimiterOptions) {
        this.config = { ...DEFAULT_RATE_LIMITER_CONFIG, ...options.config };
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? defaultSleep;
        this.log = serviceLoggers.executor.child({ limiter: options.name });
        this.tokens = this.config.burstCapacity;
        this.lastRefill = this.now();
        this.currentRate = this.config.initialRate;
    }

    private refillTokens(): void {
        const now = this.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.config.burstCapacity, this.tokens + elapsed * this.currentRate);
        this.lastRefill = now;
    }

    async acquire(signal?: AbortSignal): Promise<void> {
        const pausedFor = this.pauseUntil - this.now();
        if (pausedFor > 0) {
            this.log.info({ waitMs: pausedFor }, 'Rate limiter paused, waiting');
            await this.sleep(pausedFor, signal);
        }
        this.pauseUntil = 0;

        this.refillTokens();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        const waitMs = Math.ceil(((1 - this.tokens) / this.currentRate) * 1000);
        this.log.debug({ waitMs, currentRate: this.currentRate }, 'Rate limiter waiting for token');
        await this.sleep(waitMs, signal);

        this.refillTokens();
        this.tokens = Math.max(0, this.tokens - 1);
    }

    recordSuccess(): void {
        this.successStreak++;

        if (this.successStreak < this.config.successStreakThreshold) {
            return;
        }

        const newRate = Math.min(this.config.initialRate, this.currentRate * this.config.recoveryFactor);
        if (newRate > this.currentRate) {
            this.log.info({ oldRate: this.currentRate, newRate }, 'Rate limiter recovering after success streak');
            this.currentRate = newRate;
        }
        this.successStreak = 0;
    }

    handleRateLimit(pauseMs: number): void {
        this.successStreak = 0;
        this.pauseUntil = Math.max(this.pauseUntil, this.now() + pauseMs);

        const newRate = Math.max(this.config.minRate, this.currentRate / 2);
        this.log.warn(
            {
                pauseMs,
                oldRate: this.currentRate,
                newRate,
                pauseUntil: new Date(this.pauseUntil).toISOString(),
            },
            'Rate limiter backing off after 429'
        );
        this.currentRate = newRate;
    }

    getState(): RateLimiterState {
        this.refillTokens();
        return {
            currentRate: this.currentRate,
            tokens: this.tokens,
            isPaused: this.pauseUntil > this.now(),
        };
    }

    reset(): void {
        this.tokens = this.config.burstCapacity;
        this.lastRefill = this.now();
        this.currentRate = this.config.initialRate;
        this.successStreak = 0;
        this.pauseUntil = 0;
    }
}
