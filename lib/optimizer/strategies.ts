import { PlannerError } from '@/lib/errors';
import type {
    CheapestOnRoutePlan,
    DrivingRoute,
    FuelPlan,
    FuelStation,
    SelectionStrategyName,
    StationCost,
    VisitedStatesPlan,
} from '@/lib/types';
import type { PlacesProvider, ReverseGeocoder, RouteProvider } from '@/lib/services/providers';
import { findNearbyStopsAlongRoute } from '@/lib/services/nearby-stops';
import { findStationsWithinRange } from '@/lib/optimizer/proximity';
import {
    NO_STATIONS_MESSAGE,
    collectVisitedStates,
    pairStationsWithStops,
    selectCheapestInStates,
    selectCheapestStation,
} from '@/lib/optimizer/selection';
import { estimateFuelCost } from '@/lib/utils/cost';

export type StrategySettings = {
    vehicleRangeMiles: number;
    vehicleMpg: number;
    routeSampleCount: number;
    topStationsLimit: number;
    pairStationCosts: boolean;
    nearbySearchRadiusMeters: number;
    upstreamConcurrency: number;
};

export type StrategyContext = {
    route: DrivingRoute;
    routeMap: string;
    stations: readonly FuelStation[];
    routeProvider: RouteProvider;
    places: PlacesProvider;
    reverseGeocoder: ReverseGeocoder;
    settings: StrategySettings;
    signal?: AbortSignal;
};

export interface FuelStopStrategy {
    readonly name: SelectionStrategyName;
    plan(ctx: StrategyContext): Promise<FuelPlan>;
}

/**
 * Stations from the static table within range of points sampled along the
 * route; the single cheapest one prices the whole trip.
 */
export const cheapestOnRoute: FuelStopStrategy = {
    name: 'cheapest-on-route',

    async plan(ctx): Promise<CheapestOnRoutePlan> {
        const { route, settings, signal } = ctx;
        const points = await ctx.routeProvider.samplePoints(route, settings.routeSampleCount, signal);
        const eligible = findStationsWithinRange(points, ctx.stations, settings.vehicleRangeMiles);

        const best = selectCheapestStation(eligible);
        return {
            strategy: 'cheapest-on-route',
            routeMap: ctx.routeMap,
            cheapestStation: best.station,
            distanceToRouteMiles: best.distanceMiles,
            totalDistanceMiles: route.distanceMiles,
            cost: estimateFuelCost(route.distanceMiles, best.station.retailPrice, settings.vehicleMpg),
        };
    },
};

/**
 * States are discovered from live gas-station searches along the route steps;
 * any table station in one of those states is a candidate, whether or not it
 * sits near the route.
 */
export const cheapestInVisitedStates: FuelStopStrategy = {
    name: 'cheapest-in-visited-states',

    async plan(ctx): Promise<VisitedStatesPlan> {
        const { route, settings, signal } = ctx;
        const stops = await findNearbyStopsAlongRoute(route, {
            places: ctx.places,
            reverseGeocoder: ctx.reverseGeocoder,
            rangeMiles: settings.vehicleRangeMiles,
            radiusMeters: settings.nearbySearchRadiusMeters,
            concurrency: settings.upstreamConcurrency,
            signal,
        });
        if (stops.length === 0) {
            throw new PlannerError('NO_STATIONS', NO_STATIONS_MESSAGE);
        }

        const visitedStates = collectVisitedStates(stops);
        const cheapestStations = selectCheapestInStates(ctx.stations, visitedStates, settings.topStationsLimit);
        if (cheapestStations.length === 0) {
            throw new PlannerError('NO_STATIONS', `No priced fuel stations found in ${visitedStates.join(', ')}.`);
        }

        const plan: VisitedStatesPlan = {
            strategy: 'cheapest-in-visited-states',
            routeMap: ctx.routeMap,
            cheapestStations,
            visitedStates,
            route,
        };

        if (settings.pairStationCosts) {
            plan.stationCosts = pairStationsWithStops(cheapestStations, stops).map(
                ({ station, stop }): StationCost => ({
                    station,
                    nearbyStop: stop,
                    cost: estimateFuelCost(route.distanceMiles, station.retailPrice, settings.vehicleMpg),
                })
            );
        }

        return plan;
    },
};

export const STRATEGIES: Record<SelectionStrategyName, FuelStopStrategy> = {
    'cheapest-on-route': cheapestOnRoute,
    'cheapest-in-visited-states': cheapestInVisitedStates,
};
