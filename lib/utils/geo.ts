import * as turf from '@turf/turf';
import type { LatLng } from '@/lib/types';

export function distanceMiles(a: LatLng, b: LatLng): number {
    return turf.distance(turf.point([a.lng, a.lat]), turf.point([b.lng, b.lat]), { units: 'miles' });
}
