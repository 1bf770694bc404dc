import { z } from 'zod';
import type { LatLng } from '@/lib/types';
import { latLngSchema, type GoogleMapsClient } from '@/lib/services/google-maps.client';
import type { Geocoder, ReverseGeocoder } from '@/lib/services/providers';

const geocodeSchema = z.object({
    results: z
        .array(
            z.object({
                geometry: z.object({ location: latLngSchema }),
                address_components: z
                    .array(
                        z.object({
                            short_name: z.string(),
                            types: z.array(z.string()),
                        })
                    )
                    .default([]),
            })
        )
        .default([]),
});

/**
 * Geocode a single address using Google Maps Geocoding API.
 * Returns the first result's location, or null when Google finds nothing.
 */
export async function geocodeAddress(client: GoogleMapsClient, address: string, signal?: AbortSignal): Promise<LatLng | null> {
    const data = await client.getJson('geocode', { address }, geocodeSchema, signal);

    if (data.results.length === 0) {
        console.warn(`[GEOCODE_FAILED] No results for address: "${address}"`);
        return null;
    }

    const { lat, lng } = data.results[0].geometry.location;
    return { lat, lng };
}

/**
 * Resolves the state (administrative_area_level_1 short name) containing a coordinate.
 */
export async function reverseGeocodeState(client: GoogleMapsClient, location: LatLng, signal?: AbortSignal): Promise<string | null> {
    const data = await client.getJson(
        'geocode',
        { latlng: `${location.lat},${location.lng}` },
        geocodeSchema,
        signal
    );

    for (const result of data.results) {
        const area = result.address_components.find((c) => c.types.includes('administrative_area_level_1'));
        if (area) return area.short_name.toUpperCase();
    }
    return null;
}

export class GoogleGeocoder implements Geocoder, ReverseGeocoder {
    constructor(private client: GoogleMapsClient) {}

    geocode(address: string, signal?: AbortSignal): Promise<LatLng | null> {
        return geocodeAddress(this.client, address, signal);
    }

    stateAt(location: LatLng, signal?: AbortSignal): Promise<string | null> {
        return reverseGeocodeState(this.client, location, signal);
    }
}
