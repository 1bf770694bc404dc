import type { DrivingRoute, LatLng, NearbyPlace, RoutePoint } from '@/lib/types';

// External collaborators the planner talks to. Google Maps implements all of
// them in production; tests substitute in-memory fakes.

export interface RouteProvider {
    getRoute(origin: string, destination: string, signal?: AbortSignal): Promise<DrivingRoute | null>;
    samplePoints(route: DrivingRoute, samples: number, signal?: AbortSignal): Promise<RoutePoint[]>;
}

export interface Geocoder {
    geocode(address: string, signal?: AbortSignal): Promise<LatLng | null>;
}

export interface PlacesProvider {
    nearbyGasStations(location: LatLng, radiusMeters: number, signal?: AbortSignal): Promise<NearbyPlace[]>;
}

export interface ReverseGeocoder {
    stateAt(location: LatLng, signal?: AbortSignal): Promise<string | null>;
}
