import type { AppConfig } from '@/lib/config';
import { loadConfig, requireApiKey } from '@/lib/config';
import { PlannerError } from '@/lib/errors';
import type { FuelPlan, FuelStation, PlanRequest } from '@/lib/types';
import { STRATEGIES, type FuelStopStrategy } from '@/lib/optimizer/strategies';
import { createGoogleMapsClient } from '@/lib/services/google-maps.client';
import { GoogleRouteProvider } from '@/lib/services/directions.google';
import { GoogleGeocoder } from '@/lib/services/geocode.google';
import { GooglePlacesProvider } from '@/lib/services/places.google';
import { buildGeocodedTable } from '@/lib/services/geocode-cache';
import type { Geocoder, PlacesProvider, ReverseGeocoder, RouteProvider } from '@/lib/services/providers';

export const ROUTE_NOT_FOUND_MESSAGE = 'Failed to fetch route.';

export type FuelPlannerDeps = {
    config: AppConfig;
    routeProvider: RouteProvider & { clear?: () => void };
    geocoder: Geocoder;
    places: PlacesProvider;
    reverseGeocoder: ReverseGeocoder;
    strategy?: FuelStopStrategy;
};

export function buildRouteMapUrl(start: string, finish: string): string {
    return `https://www.google.com/maps/dir/?api=1&origin=${encodeURIComponent(start)}&destination=${encodeURIComponent(finish)}`;
}

/**
 * Owns the geocoded fuel table and the Google Maps collaborators for the
 * lifetime of the process. `init()` must complete before `plan()`.
 */
export class FuelPlanner {
    private stations: FuelStation[] | null = null;
    readonly strategy: FuelStopStrategy;

    constructor(private deps: FuelPlannerDeps) {
        this.strategy = deps.strategy ?? STRATEGIES[deps.config.selectionStrategy];
    }

    get ready(): boolean {
        return this.stations !== null;
    }

    get stationCount(): number {
        return this.stations?.length ?? 0;
    }

    async init(): Promise<void> {
        if (this.stations) return;

        const { config } = this.deps;
        const table = await buildGeocodedTable({
            sourcePath: config.fuelPricesCsv,
            artifactPath: config.geocodedFuelCsv,
            geocoder: this.deps.geocoder,
            concurrency: config.upstreamConcurrency,
            lockWaitMs: config.geocodeLockWaitMs,
        });
        this.stations = table.stations;
        console.log(`[FUEL_PLANNER] Ready with ${table.stations.length} stations, strategy ${this.strategy.name}`);
    }

    async close(): Promise<void> {
        this.stations = null;
        this.deps.routeProvider.clear?.();
    }

    async plan(request: PlanRequest, signal?: AbortSignal): Promise<FuelPlan> {
        if (!this.stations) {
            throw new PlannerError('INTERNAL', 'Fuel planner used before init()');
        }

        const { config, routeProvider } = this.deps;
        const route = await routeProvider.getRoute(request.start, request.finish, signal);
        if (!route) {
            throw new PlannerError('ROUTE_NOT_FOUND', ROUTE_NOT_FOUND_MESSAGE);
        }

        return this.strategy.plan({
            route,
            routeMap: buildRouteMapUrl(request.start, request.finish),
            stations: this.stations,
            routeProvider,
            places: this.deps.places,
            reverseGeocoder: this.deps.reverseGeocoder,
            settings: {
                vehicleRangeMiles: config.vehicleRangeMiles,
                vehicleMpg: config.vehicleMpg,
                routeSampleCount: config.routeSampleCount,
                topStationsLimit: config.topStationsLimit,
                pairStationCosts: config.pairStationCosts,
                nearbySearchRadiusMeters: config.nearbySearchRadiusMeters,
                upstreamConcurrency: config.upstreamConcurrency,
            },
            signal,
        });
    }
}

/**
 * Wires a planner to the Google Maps web services.
 */
export function createFuelPlanner(config: AppConfig): FuelPlanner {
    const client = createGoogleMapsClient({
        apiKey: requireApiKey(config),
        baseUrl: config.googleMapsBaseUrl,
        maxRetries: config.upstreamMaxRetries,
        retryBaseMs: config.upstreamRetryBaseMs,
    });
    const geocoder = new GoogleGeocoder(client);

    return new FuelPlanner({
        config,
        routeProvider: new GoogleRouteProvider(client, config.routeCacheTtlMs),
        geocoder,
        places: new GooglePlacesProvider(client),
        reverseGeocoder: geocoder,
    });
}

let plannerPromise: Promise<FuelPlanner> | null = null;

/**
 * Process-wide planner used by the route handler. Initialization runs once;
 * a failed attempt is forgotten so the next request tries again.
 */
export function getFuelPlanner(factory: () => FuelPlanner = () => createFuelPlanner(loadConfig())): Promise<FuelPlanner> {
    if (plannerPromise) return plannerPromise;

    const pending = (async () => {
        const planner = factory();
        await planner.init();
        return planner;
    })();

    plannerPromise = pending;
    pending.catch(() => {
        if (plannerPromise === pending) plannerPromise = null;
    });

    return pending;
}

export async function resetFuelPlanner(): Promise<void> {
    const pending = plannerPromise;
    plannerPromise = null;
    if (!pending) return;
    try {
        const planner = await pending;
        await planner.close();
    } catch (err: unknown) {
        // The failed init was already reported to whoever awaited it.
        console.warn('[FUEL_PLANNER] Reset after failed init:', err instanceof Error ? err.message : err);
    }
}
