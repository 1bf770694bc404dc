import { PlannerError } from '@/lib/errors';
import type { EligibleStop, FuelStation, NearbyStop } from '@/lib/types';

export const NO_STATIONS_MESSAGE = 'No fuel stations found within the route.';
export const DEFAULT_TOP_STATIONS = 5;

function compareIds(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Cheapest stop overall. Equal prices go to the stop closer to the route,
 * then to the lexicographically smaller station id.
 */
export function selectCheapestStation(stops: readonly EligibleStop[]): EligibleStop {
    if (stops.length === 0) {
        throw new PlannerError('NO_STATIONS', NO_STATIONS_MESSAGE);
    }

    return stops.reduce((best, stop) => {
        if (stop.station.retailPrice !== best.station.retailPrice) {
            return stop.station.retailPrice < best.station.retailPrice ? stop : best;
        }
        if (stop.distanceMiles !== best.distanceMiles) {
            return stop.distanceMiles < best.distanceMiles ? stop : best;
        }
        return compareIds(stop.station.id, best.station.id) < 0 ? stop : best;
    });
}

export function collectVisitedStates(stops: ReadonlyArray<{ state: string }>): string[] {
    return [...new Set(stops.map((s) => s.state.toUpperCase()))].sort();
}

/**
 * Cheapest stations anywhere in the given states, not only ones near the route.
 */
export function selectCheapestInStates(
    stations: readonly FuelStation[],
    states: readonly string[],
    limit: number = DEFAULT_TOP_STATIONS
): FuelStation[] {
    const wanted = new Set(states.map((s) => s.toUpperCase()));
    return stations
        .filter((s) => wanted.has(s.state))
        .sort((a, b) => a.retailPrice - b.retailPrice || compareIds(a.id, b.id))
        .slice(0, limit);
}

/**
 * Pairs each station with the nearby stop sharing its state and exact coordinates.
 * Stations without a match are left out.
 */
export function pairStationsWithStops(
    stations: readonly FuelStation[],
    stops: readonly NearbyStop[]
): Array<{ station: FuelStation; stop: NearbyStop }> {
    const pairs: Array<{ station: FuelStation; stop: NearbyStop }> = [];
    for (const station of stations) {
        if (station.lat === null || station.lng === null) continue;
        const stop = stops.find(
            (s) => s.state === station.state && s.place.lat === station.lat && s.place.lng === station.lng
        );
        if (stop) pairs.push({ station, stop });
    }
    return pairs;
}
