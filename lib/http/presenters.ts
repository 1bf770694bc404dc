import type { CheapestOnRoutePlan, FuelPlan, FuelStation, VisitedStatesPlan } from '@/lib/types';
import { roundCurrency } from '@/lib/utils/cost';

export type StationBody = {
    name: string;
    address: string;
    city: string;
    state: string;
    price: number;
};

function presentStation(station: FuelStation): StationBody {
    return {
        name: station.name,
        address: station.address,
        city: station.city,
        state: station.state,
        price: station.retailPrice,
    };
}

function presentCheapestOnRoute(plan: CheapestOnRoutePlan) {
    return {
        strategy: plan.strategy,
        route_map: plan.routeMap,
        cheapest_station: presentStation(plan.cheapestStation),
        total_distance_miles: roundCurrency(plan.totalDistanceMiles),
        total_cost: plan.cost.totalCost,
    };
}

function presentVisitedStates(plan: VisitedStatesPlan) {
    return {
        strategy: plan.strategy,
        route_map: plan.routeMap,
        visited_states: plan.visitedStates,
        cheapest_stations: plan.cheapestStations.map((s) => ({ id: s.id, ...presentStation(s) })),
        route: {
            distance_miles: roundCurrency(plan.route.distanceMiles),
            overview_polyline: plan.route.overviewPolyline,
            steps: plan.route.steps.map((step) => ({
                lat: step.endLocation.lat,
                lng: step.endLocation.lng,
                distance_meters: step.distanceMeters,
            })),
        },
        ...(plan.stationCosts && {
            station_costs: plan.stationCosts.map((c) => ({
                id: c.station.id,
                ...presentStation(c.station),
                nearby_place: c.nearbyStop.place.name,
                total_cost: c.cost.totalCost,
            })),
        }),
    };
}

/**
 * JSON body for a successful plan. Field names are snake_case on the wire.
 */
export function presentPlan(plan: FuelPlan) {
    return plan.strategy === 'cheapest-on-route' ? presentCheapestOnRoute(plan) : presentVisitedStates(plan);
}
