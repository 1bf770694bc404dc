import type { ErrorCode } from '@/lib/types';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
    INPUT_INVALID: 400,
    ROUTE_NOT_FOUND: 400,
    NO_STATIONS: 400,
    UPSTREAM: 502,
    TIMEOUT: 504,
    CONFIG: 500,
    INTERNAL: 500,
};

export class PlannerError extends Error {
    readonly code: ErrorCode;
    readonly status: number;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PlannerError';
        this.code = code;
        this.status = STATUS_BY_CODE[code];
    }
}

/**
 * Raised for any non-success status returned by a Google Maps web service,
 * and for HTTP/network failures talking to one.
 */
export class GoogleMapsError extends Error {
    readonly apiStatus: string | null;
    readonly httpStatus: number | null;
    readonly retryable: boolean;

    constructor(
        message: string,
        params: { apiStatus?: string | null; httpStatus?: number | null; retryable: boolean; cause?: unknown }
    ) {
        super(message, { cause: params.cause });
        this.name = 'GoogleMapsError';
        this.apiStatus = params.apiStatus ?? null;
        this.httpStatus = params.httpStatus ?? null;
        this.retryable = params.retryable;
    }
}

export class ConfigError extends Error {
    readonly variable: string;

    constructor(variable: string, message: string) {
        super(`${variable}: ${message}`);
        this.name = 'ConfigError';
        this.variable = variable;
    }
}

export function isRetryable(err: unknown): boolean {
    return err instanceof GoogleMapsError && err.retryable;
}

/**
 * Normalizes anything thrown below the route handler into a PlannerError.
 */
export function toPlannerError(err: unknown): PlannerError {
    if (err instanceof PlannerError) return err;
    if (err instanceof ConfigError) return new PlannerError('CONFIG', err.message, { cause: err });
    if (err instanceof GoogleMapsError) {
        return new PlannerError('UPSTREAM', `Google Maps request failed: ${err.message}`, { cause: err });
    }
    const message = err instanceof Error ? err.message : 'Unknown error';
    return new PlannerError('INTERNAL', message, { cause: err });
}
