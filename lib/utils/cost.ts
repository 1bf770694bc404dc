import type { CostEstimate } from '@/lib/types';

export const METERS_PER_MILE = 1609.34;
export const DEFAULT_VEHICLE_MPG = 10;

export function metersToMiles(meters: number): number {
    return meters / METERS_PER_MILE;
}

export function roundCurrency(value: number): number {
    return Math.round((value + Number.EPSILON) * 100) / 100;
}

/**
 * Fuel cost for a trip at a fixed fuel efficiency.
 * Inputs are not validated; a non-finite distance or price yields a non-finite cost.
 */
export function estimateFuelCost(
    distanceMiles: number,
    pricePerGallon: number,
    mpg: number = DEFAULT_VEHICLE_MPG
): CostEstimate {
    const gallons = distanceMiles / mpg;
    return {
        distanceMiles,
        pricePerGallon,
        gallons,
        totalCost: roundCurrency(gallons * pricePerGallon),
    };
}
