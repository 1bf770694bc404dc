import { z } from 'zod';
import type { LatLng, NearbyPlace } from '@/lib/types';
import { latLngSchema, type GoogleMapsClient } from '@/lib/services/google-maps.client';
import type { PlacesProvider } from '@/lib/services/providers';

const nearbySchema = z.object({
    results: z
        .array(
            z.object({
                place_id: z.string(),
                name: z.string().default(''),
                vicinity: z.string().default(''),
                geometry: z.object({ location: latLngSchema }),
            })
        )
        .default([]),
});

export async function searchNearbyGasStations(
    client: GoogleMapsClient,
    location: LatLng,
    radiusMeters: number,
    signal?: AbortSignal
): Promise<NearbyPlace[]> {
    const data = await client.getJson(
        'place/nearbysearch',
        {
            location: `${location.lat},${location.lng}`,
            radius: String(radiusMeters),
            type: 'gas_station',
        },
        nearbySchema,
        signal
    );

    return data.results.map((p) => ({
        placeId: p.place_id,
        name: p.name,
        vicinity: p.vicinity,
        lat: p.geometry.location.lat,
        lng: p.geometry.location.lng,
    }));
}

export class GooglePlacesProvider implements PlacesProvider {
    constructor(private client: GoogleMapsClient) {}

    nearbyGasStations(location: LatLng, radiusMeters: number, signal?: AbortSignal): Promise<NearbyPlace[]> {
        return searchNearbyGasStations(this.client, location, radiusMeters, signal);
    }
}
