import { PlannerError, isRetryable } from '@/lib/errors';

export type RetryOptions = {
    retries: number;
    baseDelayMs: number;
    signal?: AbortSignal;
    shouldRetry?: (err: unknown) => boolean;
    onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
};

export function timeoutError(cause?: unknown): PlannerError {
    return new PlannerError('TIMEOUT', 'Request deadline exceeded while waiting for Google Maps.', { cause });
}

export function throwIfAborted(signal?: AbortSignal) {
    if (signal?.aborted) throw timeoutError(signal.reason);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(timeoutError(signal.reason));
            return;
        }
        const onAbort = () => {
            clearTimeout(timeoutId);
            reject(timeoutError(signal?.reason));
        };
        const timeoutId = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Settles with `promise`, or rejects with a TIMEOUT as soon as `signal` aborts.
 * The underlying work keeps running; only the caller stops waiting.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise((resolve, reject) => {
        if (signal.aborted) {
            reject(timeoutError(signal.reason));
            return;
        }
        const onAbort = () => reject(timeoutError(signal.reason));
        signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (err: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(err);
            }
        );
    });
}

/**
 * Runs `fn`, retrying retryable failures with exponential backoff (base, 2x base, 4x base...).
 * Non-retryable errors and the last failure are rethrown unchanged.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    const shouldRetry = options.shouldRetry ?? isRetryable;

    for (let attempt = 0; ; attempt++) {
        throwIfAborted(options.signal);
        try {
            return await fn(attempt);
        } catch (err) {
            if (attempt >= options.retries || !shouldRetry(err)) throw err;
            const delayMs = options.baseDelayMs * 2 ** attempt;
            options.onRetry?.(err, attempt + 1, delayMs);
            await sleep(delayMs, options.signal);
        }
    }
}
