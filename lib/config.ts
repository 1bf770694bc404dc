import { z } from 'zod';
import { ConfigError } from '@/lib/errors';
import type { SelectionStrategyName } from '@/lib/types';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const flag = z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
    GOOGLE_MAPS_API_KEY: z.string().default(''),
    GOOGLE_MAPS_BASE_URL: z.string().url().default('https://maps.googleapis.com/maps/api'),
    FUEL_PRICES_CSV: z.string().min(1).default('data/fuel-prices.csv'),
    GEOCODED_FUEL_CSV: z.string().min(1).default('data/.cache/geocoded-fuel-prices.csv'),
    VEHICLE_RANGE_MILES: z.coerce.number().positive().default(500),
    VEHICLE_MPG: z.coerce.number().positive().default(10),
    ROUTE_SAMPLE_COUNT: positiveInt(100),
    FUEL_SELECTION_STRATEGY: z.enum(['cheapest-on-route', 'cheapest-in-visited-states']).default('cheapest-on-route'),
    TOP_STATIONS_LIMIT: positiveInt(5),
    PAIR_STATION_COSTS: flag,
    NEARBY_SEARCH_RADIUS_METERS: positiveInt(5000),
    REQUEST_TIMEOUT_MS: positiveInt(30000),
    UPSTREAM_MAX_RETRIES: nonNegativeInt(2),
    UPSTREAM_RETRY_BASE_MS: nonNegativeInt(250),
    UPSTREAM_CONCURRENCY: positiveInt(4),
    ROUTE_CACHE_TTL_MS: nonNegativeInt(300000),
    GEOCODE_LOCK_WAIT_MS: positiveInt(120000),
});

export type AppConfig = {
    googleMapsApiKey: string;
    googleMapsBaseUrl: string;
    fuelPricesCsv: string;
    geocodedFuelCsv: string;
    vehicleRangeMiles: number;
    vehicleMpg: number;
    routeSampleCount: number;
    selectionStrategy: SelectionStrategyName;
    topStationsLimit: number;
    pairStationCosts: boolean;
    nearbySearchRadiusMeters: number;
    requestTimeoutMs: number;
    upstreamMaxRetries: number;
    upstreamRetryBaseMs: number;
    upstreamConcurrency: number;
    routeCacheTtlMs: number;
    geocodeLockWaitMs: number;
};

/**
 * Reads the service configuration from environment variables.
 * Empty strings count as unset so `.env` templates with blank values fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const raw: Record<string, string> = {};
    for (const key of Object.keys(envSchema.shape)) {
        const value = env[key];
        if (value !== undefined && value.trim() !== '') raw[key] = value.trim();
    }

    const parsed = envSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const variable = issue && issue.path.length > 0 ? String(issue.path[0]) : 'environment';
        throw new ConfigError(variable, issue?.message ?? 'Invalid value');
    }

    const e = parsed.data;
    return {
        googleMapsApiKey: e.GOOGLE_MAPS_API_KEY,
        googleMapsBaseUrl: e.GOOGLE_MAPS_BASE_URL.replace(/\/+$/, ''),
        fuelPricesCsv: e.FUEL_PRICES_CSV,
        geocodedFuelCsv: e.GEOCODED_FUEL_CSV,
        vehicleRangeMiles: e.VEHICLE_RANGE_MILES,
        vehicleMpg: e.VEHICLE_MPG,
        routeSampleCount: e.ROUTE_SAMPLE_COUNT,
        selectionStrategy: e.FUEL_SELECTION_STRATEGY,
        topStationsLimit: e.TOP_STATIONS_LIMIT,
        pairStationCosts: e.PAIR_STATION_COSTS,
        nearbySearchRadiusMeters: e.NEARBY_SEARCH_RADIUS_METERS,
        requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
        upstreamMaxRetries: e.UPSTREAM_MAX_RETRIES,
        upstreamRetryBaseMs: e.UPSTREAM_RETRY_BASE_MS,
        upstreamConcurrency: e.UPSTREAM_CONCURRENCY,
        routeCacheTtlMs: e.ROUTE_CACHE_TTL_MS,
        geocodeLockWaitMs: e.GEOCODE_LOCK_WAIT_MS,
    };
}

export function requireApiKey(config: AppConfig): string {
    if (!config.googleMapsApiKey) {
        throw new ConfigError('GOOGLE_MAPS_API_KEY', 'environment variable is required');
    }
    return config.googleMapsApiKey;
}
