import { loadConfig, type AppConfig } from '@/lib/config';
import type { DrivingRoute, FuelStation, LatLng, NearbyPlace, RoutePoint } from '@/lib/types';
import type { Geocoder, PlacesProvider, ReverseGeocoder, RouteProvider } from '@/lib/services/providers';

export const DENVER: LatLng = { lat: 39.7392, lng: -104.9903 };
export const AURORA: LatLng = { lat: 39.7294, lng: -104.8319 };
export const CHICAGO: LatLng = { lat: 41.8781, lng: -87.6298 };
export const OMAHA: LatLng = { lat: 41.2565, lng: -95.9345 };
export const MIAMI: LatLng = { lat: 25.7617, lng: -80.1918 };

export function makeStation(overrides: Partial<FuelStation> & { id: string }): FuelStation {
    return {
        name: `STATION ${overrides.id}`,
        address: `I-80, EXIT ${overrides.id}`,
        city: 'Denver',
        state: 'CO',
        rackId: null,
        retailPrice: 3.0,
        lat: DENVER.lat,
        lng: DENVER.lng,
        ...overrides,
    };
}

export function makeRoute(overrides: Partial<DrivingRoute> = {}): DrivingRoute {
    return {
        distanceMeters: 1000 * 1609.34,
        distanceMiles: 1000,
        startLocation: CHICAGO,
        endLocation: DENVER,
        overviewPolyline: 'test-polyline',
        steps: [
            { endLocation: OMAHA, distanceMeters: 760000 },
            { endLocation: DENVER, distanceMeters: 850000 },
        ],
        ...overrides,
    };
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
    return {
        ...loadConfig({}),
        googleMapsApiKey: 'test-key',
        upstreamRetryBaseMs: 0,
        ...overrides,
    };
}

export class FakeRouteProvider implements RouteProvider {
    getRouteCalls: Array<{ origin: string; destination: string }> = [];
    sampleCalls: number[] = [];

    constructor(private route: DrivingRoute | null, private points: RoutePoint[] = [CHICAGO, OMAHA, DENVER]) {}

    async getRoute(origin: string, destination: string): Promise<DrivingRoute | null> {
        this.getRouteCalls.push({ origin, destination });
        return this.route;
    }

    async samplePoints(_route: DrivingRoute, samples: number): Promise<RoutePoint[]> {
        this.sampleCalls.push(samples);
        return this.points;
    }
}

export class FakeGeocoder implements Geocoder, ReverseGeocoder {
    geocodeCalls: string[] = [];
    stateCalls: LatLng[] = [];

    constructor(
        private locations: Record<string, LatLng | null | Error> = {},
        private states: Array<{ at: LatLng; state: string | null }> = []
    ) {}

    async geocode(address: string): Promise<LatLng | null> {
        this.geocodeCalls.push(address);
        const found = this.locations[address];
        if (found instanceof Error) throw found;
        return found ?? null;
    }

    async stateAt(location: LatLng): Promise<string | null> {
        this.stateCalls.push(location);
        const match = this.states.find((s) => s.at.lat === location.lat && s.at.lng === location.lng);
        return match ? match.state : null;
    }
}

export class FakePlaces implements PlacesProvider {
    calls: LatLng[] = [];

    constructor(private byLocation: Array<{ at: LatLng; places: NearbyPlace[] }> = []) {}

    async nearbyGasStations(location: LatLng): Promise<NearbyPlace[]> {
        this.calls.push(location);
        return this.byLocation.find((p) => p.at.lat === location.lat && p.at.lng === location.lng)?.places ?? [];
    }
}

export function makePlace(placeId: string, at: LatLng, name = `Place ${placeId}`): NearbyPlace {
    return { placeId, name, vicinity: `${name} vicinity`, lat: at.lat, lng: at.lng };
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}
