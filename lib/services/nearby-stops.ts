import type { DrivingRoute, NearbyStop } from '@/lib/types';
import type { PlacesProvider, ReverseGeocoder } from '@/lib/services/providers';
import { mapWithConcurrency } from '@/lib/utils/concurrency';
import { distanceMiles } from '@/lib/utils/geo';
import { throwIfAborted } from '@/lib/utils/retry';

export type NearbySearchOptions = {
    places: PlacesProvider;
    reverseGeocoder: ReverseGeocoder;
    rangeMiles: number;
    radiusMeters: number;
    concurrency: number;
    signal?: AbortSignal;
};

/**
 * Live gas-station search along a route.
 *
 * Each step's end location gets one places-nearby search. Places farther than
 * `rangeMiles` from the route origin (straight line) are dropped. The state of
 * a step is resolved with a single reverse geocode, and only when the step has
 * at least one place in range.
 */
export async function findNearbyStopsAlongRoute(route: DrivingRoute, options: NearbySearchOptions): Promise<NearbyStop[]> {
    const { places, reverseGeocoder, rangeMiles, radiusMeters, signal } = options;

    const perStep = await mapWithConcurrency(route.steps, options.concurrency, async (step, index) => {
        throwIfAborted(signal);

        const found = await places.nearbyGasStations(step.endLocation, radiusMeters, signal);
        const inRange = found
            .map((place) => ({ place, distanceMiles: distanceMiles(route.startLocation, place) }))
            .filter((p) => p.distanceMiles <= rangeMiles);
        if (inRange.length === 0) return [];

        const state = await reverseGeocoder.stateAt(step.endLocation, signal);
        if (!state) {
            console.warn(`[NEARBY_SEARCH] Could not resolve state for step ${index}, skipping ${inRange.length} places`);
            return [];
        }

        return inRange.map((p): NearbyStop => ({ ...p, state }));
    });

    const seen = new Set<string>();
    const stops: NearbyStop[] = [];
    for (const stop of perStep.flat()) {
        if (seen.has(stop.place.placeId)) continue;
        seen.add(stop.place.placeId);
        stops.push(stop);
    }
    return stops;
}
