export class CatalogApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number,
        public readonly retryable: boolean,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'CatalogApiError';
    }
}

// Connection failures, timeouts and 5xx responses
export class TransientNetworkError extends CatalogApiError {
    constructor(message: string, statusCode = 0, options?: { cause?: unknown }) {
        super(message, statusCode, true, options);
        this.name = 'TransientNetworkError';
    }
}

export type RateLimitHint =
    | { kind: 'retry-after'; waitMs: number }
    | { kind: 'bucket'; waitMs: number }
    | { kind: 'none' };

export class RateLimitedError extends CatalogApiError {
    constructor(
        public readonly hint: RateLimitHint,
        message = 'Rate limited by remote service'
    ) {
        super(message, 429, true);
        this.name = 'RateLimitedError';
    }
}

export class AuthenticationExpiredError extends CatalogApiError {
    constructor(message = 'Access token rejected after refresh') {
        super(message, 401, false);
        this.name = 'AuthenticationExpiredError';
    }
}

export class FatalClientError extends CatalogApiError {
    constructor(message: string, statusCode: number) {
        super(message, statusCode, false);
        this.name = 'FatalClientError';
    }
}

export class UnexpectedResponseError extends CatalogApiError {
    constructor(message: string, statusCode: number, options?: { cause?: unknown }) {
        super(message, statusCode, false, options);
        this.name = 'UnexpectedResponseError';
    }
}

export type ExhaustionReason = 'attempts' | 'budget';

export class ExhaustedRetriesError extends Error {
    constructor(
        public readonly reason: ExhaustionReason,
        public readonly attempts: number,
        public readonly lastError: CatalogApiError
    ) {
        super(
            reason === 'attempts'
                ? `Gave up after ${attempts} attempts: ${lastError.message}`
                : `Retry wait budget exceeded after ${attempts} attempts: ${lastError.message}`,
            { cause: lastError }
        );
        this.name = 'ExhaustedRetriesError';
    }
}

export class AuthenticationUnavailableError extends Error {
    constructor(public readonly service: string, options?: { cause?: unknown }) {
        super(`No usable credentials for ${service}`, options);
        this.name = 'AuthenticationUnavailableError';
    }
}

export class AuthorizationTimeoutError extends Error {
    constructor(timeoutMs: number) {
        super(`No authorization callback received within ${Math.round(timeoutMs / 1000)}s`);
        this.name = 'AuthorizationTimeoutError';
    }
}

export class AuthorizationStateMismatchError extends Error {
    constructor() {
        super('Authorization callback state does not match the request');
        this.name = 'AuthorizationStateMismatchError';
    }
}

export class AuthorizationDeniedError extends Error {
    constructor(reason: string) {
        super(`Authorization denied: ${reason}`);
        this.name = 'AuthorizationDeniedError';
    }
}

export class CheckpointCorruptError extends Error {
    constructor(public readonly path: string, options?: { cause?: unknown }) {
        super(`Checkpoint ${path} is unreadable; start fresh to discard it`, options);
        this.name = 'CheckpointCorruptError';
    }
}

export class JobCancelledError extends Error {
    constructor(message = 'Job cancelled') {
        super(message);
        this.name = 'JobCancelledError';
    }
}

export function isRetryableError(error: unknown): boolean {
    if (error instanceof CatalogApiError) {
        return error.retryable;
    }
    return false;
}

// Errors that must stop the whole job rather than one playlist
export function isJobFatalError(error: unknown): boolean {
    return error instanceof AuthenticationUnavailableError || error instanceof JobCancelledError;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
