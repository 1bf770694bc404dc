import { z } from 'zod';
import { GoogleMapsError } from '@/lib/errors';
import type { DrivingRoute, RoutePoint } from '@/lib/types';
import { TtlCache } from '@/lib/utils/cache';
import { metersToMiles } from '@/lib/utils/cost';
import { latLngSchema, type GoogleMapsClient } from '@/lib/services/google-maps.client';
import type { RouteProvider } from '@/lib/services/providers';

const legSchema = z.object({
    distance: z.object({ value: z.number() }),
    start_location: latLngSchema,
    end_location: latLngSchema,
    steps: z
        .array(
            z.object({
                distance: z.object({ value: z.number() }),
                end_location: latLngSchema,
            })
        )
        .default([]),
});

const directionsSchema = z.object({
    routes: z
        .array(
            z.object({
                legs: z.array(legSchema).min(1),
                overview_polyline: z.object({ points: z.string() }),
            })
        )
        .default([]),
});

const elevationSchema = z.object({
    results: z.array(z.object({ location: latLngSchema })).default([]),
});

/**
 * Fetches a driving route between two free-form addresses.
 * Returns null when Google cannot route between them.
 */
export async function getDrivingRoute(
    client: GoogleMapsClient,
    params: { origin: string; destination: string; departureTime?: Date },
    signal?: AbortSignal
): Promise<DrivingRoute | null> {
    const query: Record<string, string> = {
        origin: params.origin,
        destination: params.destination,
        mode: 'driving',
        departure_time: params.departureTime ? Math.floor(params.departureTime.getTime() / 1000).toString() : 'now',
    };

    let data: z.infer<typeof directionsSchema>;
    try {
        data = await client.getJson('directions', query, directionsSchema, signal);
    } catch (err) {
        if (err instanceof GoogleMapsError && (err.apiStatus === 'NOT_FOUND' || err.apiStatus === 'INVALID_REQUEST')) {
            console.warn(`[DIRECTIONS_NOT_FOUND] ${params.origin} -> ${params.destination}: ${err.apiStatus}`);
            return null;
        }
        throw err;
    }

    if (data.routes.length === 0) return null;

    const route = data.routes[0];
    // A route without waypoints has exactly one leg; sum in case Google splits it.
    const distanceMeters = route.legs.reduce((sum, leg) => sum + leg.distance.value, 0);
    const firstLeg = route.legs[0];
    const lastLeg = route.legs[route.legs.length - 1];

    return {
        distanceMeters,
        distanceMiles: metersToMiles(distanceMeters),
        startLocation: firstLeg.start_location,
        endLocation: lastLeg.end_location,
        overviewPolyline: route.overview_polyline.points,
        steps: route.legs.flatMap((leg) =>
            leg.steps.map((step) => ({ endLocation: step.end_location, distanceMeters: step.distance.value }))
        ),
    };
}

/**
 * Samples evenly spaced points along an encoded polyline via the Elevation API.
 */
export async function sampleAlongPath(
    client: GoogleMapsClient,
    encodedPolyline: string,
    samples: number,
    signal?: AbortSignal
): Promise<RoutePoint[]> {
    const data = await client.getJson(
        'elevation',
        { path: `enc:${encodedPolyline}`, samples: String(samples) },
        elevationSchema,
        signal
    );
    return data.results.map((r) => ({ lat: r.location.lat, lng: r.location.lng }));
}

export class GoogleRouteProvider implements RouteProvider {
    private routes: TtlCache<DrivingRoute | null>;
    private samples: TtlCache<RoutePoint[]>;

    constructor(private client: GoogleMapsClient, cacheTtlMs: number) {
        this.routes = new TtlCache(cacheTtlMs);
        this.samples = new TtlCache(cacheTtlMs);
    }

    async getRoute(origin: string, destination: string, signal?: AbortSignal): Promise<DrivingRoute | null> {
        const key = JSON.stringify([origin.trim().toLowerCase(), destination.trim().toLowerCase()]);
        const cached = this.routes.get(key);
        if (cached !== undefined) return cached;

        const route = await getDrivingRoute(this.client, { origin, destination }, signal);
        this.routes.set(key, route);
        return route;
    }

    async samplePoints(route: DrivingRoute, samples: number, signal?: AbortSignal): Promise<RoutePoint[]> {
        const key = `${samples}:${route.overviewPolyline}`;
        const cached = this.samples.get(key);
        if (cached) return cached;

        const points = await sampleAlongPath(this.client, route.overviewPolyline, samples, signal);
        this.samples.set(key, points);
        return points;
    }

    clear() {
        this.routes.clear();
        this.samples.clear();
    }
}
