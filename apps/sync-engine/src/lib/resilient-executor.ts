import pRetry from 'p-retry';
import type { Logger } from 'pino';
import type { z } from 'zod';
import { serviceLoggers } from './logger';
import type { AdaptiveRateLimiter } from './rate-limiter';
import { computeBackoffDelayMs, readRateLimitHint, stretchServerWait } from './retry-delay';
import type { JitterMode } from './retry-delay';
import {
    AuthenticationExpiredError,
    CatalogApiError,
    ExhaustedRetriesError,
    FatalClientError,
    JobCancelledError,
    RateLimitedError,
    TransientNetworkError,
    UnexpectedResponseError,
    isRetryableError,
} from './sync-errors';
import { sleep as defaultSleep } from './timers';
import type { Sleep } from './timers';

export interface RetryPolicy {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    requestTimeoutMs: number;
    maxTotalWaitMs: number;
    jitter: JitterMode;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxRetries: 2,
    baseDelayMs: 15_000,
    maxDelayMs: 600_000,
    requestTimeoutMs: 20_000,
    maxTotalWaitMs: 600_000,
    jitter: 'partial',
};

export interface AuthProvider {
    getAuthHeaders(): Promise<Record<string, string>>;
    // Called on a 401; must leave the provider holding a fresh credential or throw
    onAuthenticationExpired(): Promise<void>;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface ExecuteRequest {
    method?: HttpMethod;
    url: string;
    headers?: Record<string, string>;
    body?: string | URLSearchParams;
    authProvider?: AuthProvider;
    signal?: AbortSignal;
}

export interface RetryEvent {
    service: string;
    url: string;
    attempt: number;
    delayMs: number;
    status: number;
    reason: string;
}

export interface ExecutorOptions {
    service: string;
    policy?: Partial<RetryPolicy>;
    rateLimiter?: AdaptiveRateLimiter;
    sleep?: Sleep;
    random?: () => number;
    onRetry?: (event: RetryEvent) => void;
    // Applies to requests that carry no signal of their own
    signal?: AbortSignal;
}

// Settles with `task`, or rejects as soon as `signal` aborts
function untilAborted<T>(task: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        if (signal.aborted) {
            onAbort();
        } else {
            signal.addEventListener('abort', onAbort, { once: true });
        }
        task.then(
            value => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}

export class ResilientExecutor {
    readonly service: string;
    readonly policy: RetryPolicy;
    private readonly rateLimiter: AdaptiveRateLimiter | undefined;
    private readonly sleep: Sleep;
    private readonly random: () => number;
    private readonly onRetry: ((event: RetryEvent) => void) | undefined;
    private readonly signal: AbortSignal | undefined;
    private readonly log: Logger;

    constructor(options: ExecutorOptions) {
        this.service = options.service;
        this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
        this.rateLimiter = options.rateLimiter;
        this.sleep = options.sleep ?? defaultSleep;
        this.random = options.random ?? Math.random;
        this.onRetry = options.onRetry;
        this.signal = options.signal;
        this.log = serviceLoggers.executor.child({ service: options.service });
    }

    // The returned response has its body drained; use executeJson to read one
    async execute(input: ExecuteRequest): Promise<Response> {
        return this.run(input, async response => {
            await response.arrayBuffer();
            return response;
        });
    }

    async executeJson<S extends z.ZodTypeAny>(request: ExecuteRequest, schema: S): Promise<z.output<S>> {
        const { status, body } = await this.run(request, async response => {
            try {
                const json: unknown = await response.json();
                return { status: response.status, body: json };
            } catch (error) {
                throw new UnexpectedResponseError(`Invalid JSON from ${request.url}`, response.status, { cause: error });
            }
        });

        const parsed = schema.safeParse(body);
        if (!parsed.success) {
            throw new UnexpectedResponseError(
                `Unexpected response shape from ${request.url}: ${parsed.error.message}`,
                status,
                { cause: parsed.error }
            );
        }
        return parsed.data;
    }

    private async run<T>(input: ExecuteRequest, read: (response: Response) => Promise<T>): Promise<T> {
        const request: ExecuteRequest = { ...input, signal: input.signal ?? this.signal };
        const { signal } = request;
        const state = { refreshed: false, waitedMs: 0 };

        const consume = async (response: Response): Promise<T> => {
            await this.handleResponse(response);
            return read(response);
        };

        return pRetry(
            async () => {
                if (signal?.aborted) {
                    throw new pRetry.AbortError(new JobCancelledError());
                }
                await this.rateLimiter?.acquire(signal);

                const first = await this.send(request, async response => {
                    if (response.status === 401 && request.authProvider && !state.refreshed) {
                        return null;
                    }
                    return { value: await consume(response) };
                });
                if (first) {
                    return first.value;
                }

                state.refreshed = true;
                this.log.info({ url: request.url }, 'Received 401, refreshing credentials');
                await request.authProvider?.onAuthenticationExpired();
                return this.send(request, consume);
            },
            {
                retries: this.policy.maxRetries,
                minTimeout: 0,
                maxTimeout: 0,
                onFailedAttempt: async (error) => {
                    if (!isRetryableError(error) || !(error instanceof CatalogApiError)) {
                        throw error;
                    }

                    const attempt = error.attemptNumber;
                    if (error.retriesLeft === 0) {
                        this.log.warn({ url: request.url, attempt, err: error }, 'Retries exhausted');
                        throw new ExhaustedRetriesError('attempts', attempt, error);
                    }

                    const delayMs = this.delayFor(error, attempt);
                    if (state.waitedMs + delayMs > this.policy.maxTotalWaitMs) {
                        this.log.warn(
                            { url: request.url, attempt, delayMs, waitedMs: state.waitedMs },
                            'Retry wait budget exceeded'
                        );
                        throw new ExhaustedRetriesError('budget', attempt, error);
                    }

                    if (error instanceof RateLimitedError) {
                        this.rateLimiter?.handleRateLimit(delayMs);
                    }

                    const event: RetryEvent = {
                        service: this.service,
                        url: request.url,
                        attempt,
                        delayMs,
                        status: error.statusCode,
                        reason: error.name,
                    };
                    this.log.info(event, 'Retrying request');
                    this.onRetry?.(event);

                    state.waitedMs += delayMs;
                    await this.sleep(delayMs, signal);
                },
            }
        );
    }

    private delayFor(error: CatalogApiError, attempt: number): number {
        const { baseDelayMs, maxDelayMs, jitter } = this.policy;
        if (error instanceof RateLimitedError && error.hint.kind !== 'none') {
            return stretchServerWait(error.hint.waitMs, maxDelayMs, this.random);
        }
        return computeBackoffDelayMs(attempt, baseDelayMs, maxDelayMs, jitter, this.random);
    }

    // The per-call deadline spans the headers and `consume`, which reads the body
    private async send<T>(request: ExecuteRequest, consume: (response: Response) => Promise<T>): Promise<T> {
        const authHeaders = request.authProvider ? await request.authProvider.getAuthHeaders() : {};
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.policy.requestTimeoutMs);
        const onAbort = () => controller.abort();
        request.signal?.addEventListener('abort', onAbort, { once: true });

        try {
            const response = await fetch(request.url, {
                method: request.method ?? 'GET',
                headers: { ...request.headers, ...authHeaders },
                body: request.body,
                signal: controller.signal,
            });
            return await untilAborted(consume(response), controller.signal);
        } catch (error) {
            if (request.signal?.aborted) {
                throw new pRetry.AbortError(new JobCancelledError());
            }
            if (controller.signal.aborted) {
                throw new TransientNetworkError(`Request timed out after ${this.policy.requestTimeoutMs}ms`, 0, {
                    cause: error,
                });
            }
            if (error instanceof CatalogApiError || error instanceof pRetry.AbortError) {
                throw error;
            }
            const message = `Network failure: ${error instanceof Error ? error.message : String(error)}`;
            throw new TransientNetworkError(message, 0, { cause: error });
        } finally {
            clearTimeout(timer);
            request.signal?.removeEventListener('abort', onAbort);
        }
    }

    private async handleResponse(response: Response): Promise<void> {
        if (response.ok) {
            this.rateLimiter?.recordSuccess();
            return;
        }

        if (response.status === 401) {
            throw new pRetry.AbortError(new AuthenticationExpiredError());
        }

        if (response.status === 429) {
            throw new RateLimitedError(readRateLimitHint(response.headers));
        }

        const errorText = await response.text();
        if (response.status >= 500) {
            throw new TransientNetworkError(`${this.service} returned ${response.status}: ${errorText}`, response.status);
        }

        throw new FatalClientError(`${this.service} API error ${response.status}: ${errorText}`, response.status);
    }
}
