import { JobCancelledError } from './sync-errors';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export function throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new JobCancelledError();
    }
}

export const sleep: Sleep = (ms, signal) => {
    if (signal?.aborted) {
        return Promise.reject(new JobCancelledError());
    }
    if (ms <= 0) {
        return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
        const onAbort = () => {
            clearTimeout(timer);
            reject(new JobCancelledError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
};
