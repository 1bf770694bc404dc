import { describe, it, expect, vi } from 'vitest';
import { GoogleMapsError, PlannerError } from '@/lib/errors';
import { raceAbort, withRetry } from './retry';

const transient = () => new GoogleMapsError('rate limited', { apiStatus: 'OVER_QUERY_LIMIT', retryable: true });

describe('withRetry', () => {
    it('retries retryable failures until one succeeds', async () => {
        const fn = vi.fn()
            .mockRejectedValueOnce(transient())
            .mockRejectedValueOnce(transient())
            .mockResolvedValueOnce('ok');

        await expect(withRetry(fn, { retries: 2, baseDelayMs: 0 })).resolves.toBe('ok');
        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('gives up after the configured retries', async () => {
        const fn = vi.fn().mockRejectedValue(transient());
        await expect(withRetry(fn, { retries: 2, baseDelayMs: 0 })).rejects.toThrow('rate limited');
        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('does not retry permanent failures', async () => {
        const denied = new GoogleMapsError('denied', { apiStatus: 'REQUEST_DENIED', retryable: false });
        const fn = vi.fn().mockRejectedValue(denied);
        await expect(withRetry(fn, { retries: 5, baseDelayMs: 0 })).rejects.toBe(denied);
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('reports each retry with its backoff delay', async () => {
        const onRetry = vi.fn();
        const fn = vi.fn().mockRejectedValueOnce(transient()).mockRejectedValueOnce(transient()).mockResolvedValueOnce(1);
        await withRetry(fn, { retries: 2, baseDelayMs: 1, onRetry });
        expect(onRetry.mock.calls.map((c) => [c[1], c[2]])).toEqual([
            [1, 1],
            [2, 2],
        ]);
    });

    it('fails with a timeout once the signal is aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const fn = vi.fn().mockResolvedValue('never');

        const err = await withRetry(fn, { retries: 2, baseDelayMs: 0, signal: controller.signal }).catch((e: unknown) => e);
        expect(err).toBeInstanceOf(PlannerError);
        expect(err).toMatchObject({ code: 'TIMEOUT', status: 504 });
        expect(fn).not.toHaveBeenCalled();
    });
});

describe('raceAbort', () => {
    it('resolves with the value when it settles first', async () => {
        await expect(raceAbort(Promise.resolve('ready'), new AbortController().signal)).resolves.toBe('ready');
    });

    it('rejects with a timeout once the signal aborts', async () => {
        const controller = new AbortController();
        const pending = raceAbort(new Promise<string>(() => {}), controller.signal);
        controller.abort();

        await expect(pending).rejects.toMatchObject({ code: 'TIMEOUT', status: 504 });
    });

    it('passes through the underlying failure', async () => {
        const err = new Error('init failed');
        await expect(raceAbort(Promise.reject(err), new AbortController().signal)).rejects.toBe(err);
    });
});
