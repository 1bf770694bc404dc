import { z } from 'zod';
import { GoogleMapsError, PlannerError } from '@/lib/errors';
import { timeoutError, withRetry } from '@/lib/utils/retry';

export const GOOGLE_MAPS_BASE_URL = 'https://maps.googleapis.com/maps/api';

const RETRYABLE_API_STATUSES = new Set(['OVER_QUERY_LIMIT', 'UNKNOWN_ERROR']);
const SUCCESS_API_STATUSES = new Set(['OK', 'ZERO_RESULTS']);

const envelopeSchema = z.object({
    status: z.string(),
    error_message: z.string().optional(),
});

export const latLngSchema = z.object({
    lat: z.number(),
    lng: z.number(),
});

export type GoogleMapsClientOptions = {
    apiKey: string;
    baseUrl?: string;
    maxRetries?: number;
    retryBaseMs?: number;
};

export type GoogleMapsClient = {
    getJson<S extends z.ZodTypeAny>(
        endpoint: string,
        params: Record<string, string>,
        schema: S,
        signal?: AbortSignal
    ): Promise<z.infer<S>>;
};

function isAbortError(err: unknown): boolean {
    return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

/**
 * Thin JSON client over the Google Maps web services.
 * Every call carries the API key, honours the caller's abort signal, and retries
 * rate limiting, 5xx responses and network failures.
 */
export function createGoogleMapsClient(options: GoogleMapsClientOptions): GoogleMapsClient {
    const baseUrl = (options.baseUrl ?? GOOGLE_MAPS_BASE_URL).replace(/\/+$/, '');
    const maxRetries = options.maxRetries ?? 2;
    const retryBaseMs = options.retryBaseMs ?? 250;

    async function requestOnce(endpoint: string, params: Record<string, string>, signal?: AbortSignal): Promise<unknown> {
        const urlParams = new URLSearchParams({ ...params, key: options.apiKey });
        const url = `${baseUrl}/${endpoint}/json?${urlParams.toString()}`;

        let res: Response;
        try {
            res = await fetch(url, { signal });
        } catch (err: unknown) {
            if (signal?.aborted || isAbortError(err)) throw timeoutError(err);
            const message = err instanceof Error ? err.message : String(err);
            throw new GoogleMapsError(`Network error calling ${endpoint}: ${message}`, { retryable: true, cause: err });
        }

        if (!res.ok) {
            const text = await res.text().catch(() => '');
            throw new GoogleMapsError(`Google Maps ${endpoint} request failed: ${res.status} ${res.statusText} - ${text}`, {
                httpStatus: res.status,
                retryable: res.status === 429 || res.status >= 500,
            });
        }

        let data: unknown;
        try {
            data = await res.json();
        } catch (err: unknown) {
            if (signal?.aborted || isAbortError(err)) throw timeoutError(err);
            throw new GoogleMapsError(`Google Maps ${endpoint} returned invalid JSON`, { retryable: false, cause: err });
        }

        const envelope = envelopeSchema.safeParse(data);
        if (!envelope.success) {
            throw new GoogleMapsError(`Google Maps ${endpoint} returned an unexpected payload`, { retryable: false });
        }

        const { status, error_message } = envelope.data;
        if (!SUCCESS_API_STATUSES.has(status)) {
            throw new GoogleMapsError(`Google Maps ${endpoint} API error: ${status} - ${error_message || 'Unknown error'}`, {
                apiStatus: status,
                httpStatus: res.status,
                retryable: RETRYABLE_API_STATUSES.has(status),
            });
        }

        return data;
    }

    async function getJson<S extends z.ZodTypeAny>(
        endpoint: string,
        params: Record<string, string>,
        schema: S,
        signal?: AbortSignal
    ): Promise<z.infer<S>> {
        const data = await withRetry(() => requestOnce(endpoint, params, signal), {
            retries: maxRetries,
            baseDelayMs: retryBaseMs,
            signal,
            onRetry: (err, attempt, delayMs) => {
                const message = err instanceof Error ? err.message : String(err);
                console.warn(`[GOOGLE_MAPS_RETRY] ${endpoint} attempt ${attempt} in ${delayMs}ms: ${message}`);
            },
        });

        const parsed = schema.safeParse(data);
        if (!parsed.success) {
            throw new GoogleMapsError(`Google Maps ${endpoint} response did not match the expected shape`, {
                retryable: false,
                cause: parsed.error,
            });
        }
        return parsed.data;
    }

    return { getJson };
}

export function isPermanentAuthFailure(err: unknown): boolean {
    return err instanceof GoogleMapsError && err.apiStatus === 'REQUEST_DENIED';
}

export function isTimeout(err: unknown): boolean {
    return err instanceof PlannerError && err.code === 'TIMEOUT';
}
