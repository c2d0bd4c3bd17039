import pino from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

const LEVELS: LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(value: string | undefined): LevelWithSilent {
    const match = LEVELS.find(level => level === value);
    return match ?? 'info';
}

// Keeps statusCode/retryable from CatalogApiError and friends in log lines
function serializeError(err: unknown): Record<string, unknown> {
    if (!(err instanceof Error)) {
        return { message: String(err), type: typeof err };
    }

    const serialized: Record<string, unknown> = {
        type: err.name,
        message: err.message,
        stack: err.stack,
    };

    for (const key of ['statusCode', 'retryable', 'reason', 'service'] as const) {
        if (key in err) {
            serialized[key] = Reflect.get(err, key);
        }
    }

    if (err.cause !== undefined) {
        serialized.cause = serializeError(err.cause);
    }

    return serialized;
}

export const logger: Logger = pino({
    level: resolveLevel(process.env.LOG_LEVEL),
    base: { app: 'sync-engine' },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
        err: serializeError,
        error: serializeError,
    },
});

export const serviceLoggers = {
    executor: logger.child({ module: 'ResilientExecutor' }),
    session: logger.child({ module: 'SessionManager' }),
    resolver: logger.child({ module: 'EntityResolver' }),
    reconcile: logger.child({ module: 'ReconciliationEngine' }),
    checkpoint: logger.child({ module: 'CheckpointStore' }),
    catalog: logger.child({ module: 'CatalogClient' }),
};

export const workerLoggers = {
    catalog: (catalog: string) => logger.child({ worker: 'catalog', catalog }),
    job: logger.child({ worker: 'sync-job' }),
};
