import type { EligibleStop, FuelStation, RoutePoint } from '@/lib/types';
import { hasCoordinates } from '@/lib/services/fuel-table.csv';
import { distanceMiles } from '@/lib/utils/geo';

export const DEFAULT_RANGE_MILES = 500;

/**
 * Scans every (route point, station) pair and keeps the ones within range.
 *
 * A station is emitted once per qualifying route point, so the same station
 * can appear several times; callers dedupe if they need to. Stations that
 * were never geocoded are skipped. An empty result is a normal outcome.
 */
export function findStationsWithinRange(
    points: readonly RoutePoint[],
    stations: readonly FuelStation[],
    rangeMiles: number = DEFAULT_RANGE_MILES
): EligibleStop[] {
    const located = stations.filter(hasCoordinates);
    const eligible: EligibleStop[] = [];

    for (const point of points) {
        for (const station of located) {
            const d = distanceMiles(point, { lat: station.lat, lng: station.lng });
            if (d <= rangeMiles) {
                eligible.push({ station, distanceMiles: d });
            }
        }
    }

    return eligible;
}
