import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { AppConfig } from '@/lib/config';
import { PlannerError } from '@/lib/errors';
import type { FuelStation } from '@/lib/types';
import { FuelPlanner, buildRouteMapUrl, getFuelPlanner, resetFuelPlanner } from './fuel-planner';
import { saveFuelTable } from './fuel-table.csv';
import {
    AURORA,
    DENVER,
    FakeGeocoder,
    FakePlaces,
    FakeRouteProvider,
    MIAMI,
    OMAHA,
    makePlace,
    makeRoute,
    makeStation,
    testConfig,
} from '@/lib/testing/fixtures';

const coloradoTable: FuelStation[] = [
    makeStation({ id: '1', retailPrice: 3.1, ...DENVER }),
    makeStation({ id: '2', retailPrice: 2.95, ...AURORA }),
    makeStation({ id: '3', retailPrice: 3.5, lat: 39.75, lng: -105.0 }),
    makeStation({ id: '9', state: 'FL', city: 'Miami', retailPrice: 2.5, ...MIAMI }),
];

async function caught(promise: Promise<unknown>): Promise<unknown> {
    return promise.then(
        () => undefined,
        (err: unknown) => err
    );
}

describe('FuelPlanner', () => {
    let dir: string;
    let config: AppConfig;

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'fuel-planner-'));
        config = testConfig({
            fuelPricesCsv: path.join(dir, 'fuel-prices.csv'),
            geocodedFuelCsv: path.join(dir, 'geocoded.csv'),
        });
    });

    afterEach(async () => {
        await resetFuelPlanner();
        vi.restoreAllMocks();
        await fs.rm(dir, { recursive: true, force: true });
    });

    const plannerWith = (
        routeProvider: FakeRouteProvider,
        overrides: Partial<AppConfig> = {},
        extra: { places?: FakePlaces; geocoder?: FakeGeocoder } = {}
    ) => {
        const geocoder = extra.geocoder ?? new FakeGeocoder();
        return new FuelPlanner({
            config: { ...config, ...overrides },
            routeProvider,
            geocoder,
            places: extra.places ?? new FakePlaces(),
            reverseGeocoder: geocoder,
        });
    };

    describe('cheapest-on-route', () => {
        it('picks the cheapest station near the route and prices the trip with it', async () => {
            await saveFuelTable(config.geocodedFuelCsv, coloradoTable);
            const routes = new FakeRouteProvider(makeRoute({ distanceMiles: 1003.5 }));
            const planner = plannerWith(routes);
            await planner.init();

            const plan = await planner.plan({ start: 'Chicago, IL', finish: 'Denver, CO' });

            expect(plan.strategy).toBe('cheapest-on-route');
            if (plan.strategy !== 'cheapest-on-route') return;
            expect(plan.cheapestStation.id).toBe('2');
            expect(plan.cheapestStation.retailPrice).toBe(2.95);
            expect(plan.totalDistanceMiles).toBe(1003.5);
            expect(plan.cost.totalCost).toBe(296.03);
            expect(plan.routeMap).toBe(
                'https://www.google.com/maps/dir/?api=1&origin=Chicago%2C%20IL&destination=Denver%2C%20CO'
            );
            expect(routes.getRouteCalls).toEqual([{ origin: 'Chicago, IL', destination: 'Denver, CO' }]);
            expect(routes.sampleCalls).toEqual([100]);
        });

        it('reports an empty table as no stations found', async () => {
            await saveFuelTable(config.geocodedFuelCsv, []);
            const planner = plannerWith(new FakeRouteProvider(makeRoute()));
            await planner.init();

            const err = await caught(planner.plan({ start: 'Chicago, IL', finish: 'Denver, CO' }));

            expect(err).toBeInstanceOf(PlannerError);
            expect(err).toMatchObject({ code: 'NO_STATIONS', status: 400, message: 'No fuel stations found within the route.' });
        });

        it('fails when no route exists', async () => {
            await saveFuelTable(config.geocodedFuelCsv, coloradoTable);
            const planner = plannerWith(new FakeRouteProvider(null));
            await planner.init();

            const err = await caught(planner.plan({ start: 'Honolulu, HI', finish: 'Denver, CO' }));

            expect(err).toMatchObject({ code: 'ROUTE_NOT_FOUND', message: 'Failed to fetch route.' });
        });
    });

    describe('cheapest-in-visited-states', () => {
        const table: FuelStation[] = [
            makeStation({ id: '1', state: 'CO', retailPrice: 3.2, ...DENVER }),
            makeStation({ id: '2', state: 'NE', retailPrice: 3.0, ...OMAHA }),
            makeStation({ id: '3', state: 'NE', retailPrice: 3.1, lat: 40, lng: -100 }),
            makeStation({ id: '4', state: 'TX', retailPrice: 2.5, lat: 35.2, lng: -101.8 }),
        ];

        it('lists the cheapest stations in the states the route passes through', async () => {
            await saveFuelTable(config.geocodedFuelCsv, table);
            const geocoder = new FakeGeocoder({}, [{ at: OMAHA, state: 'NE' }]);
            const places = new FakePlaces([{ at: OMAHA, places: [makePlace('p1', OMAHA, 'Omaha Fuel')] }]);
            const planner = plannerWith(
                new FakeRouteProvider(makeRoute()),
                { selectionStrategy: 'cheapest-in-visited-states', pairStationCosts: true },
                { places, geocoder }
            );
            await planner.init();

            const plan = await planner.plan({ start: 'Chicago, IL', finish: 'Denver, CO' });

            expect(plan.strategy).toBe('cheapest-in-visited-states');
            if (plan.strategy !== 'cheapest-in-visited-states') return;
            expect(plan.visitedStates).toEqual(['NE']);
            expect(plan.cheapestStations.map((s) => s.id)).toEqual(['2', '3']);
            expect(plan.route.distanceMiles).toBe(1000);
            expect(plan.stationCosts?.map((c) => [c.station.id, c.nearbyStop.place.placeId, c.cost.totalCost])).toEqual([
                ['2', 'p1', 300],
            ]);
        });

        it('leaves out per-station costs unless pairing is enabled', async () => {
            await saveFuelTable(config.geocodedFuelCsv, table);
            const geocoder = new FakeGeocoder({}, [{ at: OMAHA, state: 'NE' }]);
            const places = new FakePlaces([{ at: OMAHA, places: [makePlace('p1', OMAHA)] }]);
            const planner = plannerWith(
                new FakeRouteProvider(makeRoute()),
                { selectionStrategy: 'cheapest-in-visited-states' },
                { places, geocoder }
            );
            await planner.init();

            const plan = await planner.plan({ start: 'Chicago, IL', finish: 'Denver, CO' });

            expect(plan).not.toHaveProperty('stationCosts');
        });

        it('reports no stations when the live search finds nothing in range', async () => {
            await saveFuelTable(config.geocodedFuelCsv, table);
            const planner = plannerWith(new FakeRouteProvider(makeRoute()), { selectionStrategy: 'cheapest-in-visited-states' });
            await planner.init();

            const err = await caught(planner.plan({ start: 'Chicago, IL', finish: 'Denver, CO' }));

            expect(err).toMatchObject({ code: 'NO_STATIONS', message: 'No fuel stations found within the route.' });
        });
    });

    describe('lifecycle', () => {
        it('refuses to plan before init', async () => {
            const planner = plannerWith(new FakeRouteProvider(makeRoute()));
            const err = await caught(planner.plan({ start: 'A', finish: 'B' }));
            expect(err).toMatchObject({ code: 'INTERNAL' });
        });

        it('geocodes the source table on first init and keeps it until close', async () => {
            await fs.writeFile(
                config.fuelPricesCsv,
                'OPIS Truckstop ID,Truckstop Name,Address,City,State,Rack ID,Retail Price\n7,TEST FUEL,"I-70, EXIT 7",Denver,CO,502,3.2\n'
            );
            const geocoder = new FakeGeocoder({ 'I-70, EXIT 7, Denver, CO': DENVER });
            const planner = plannerWith(new FakeRouteProvider(makeRoute()), {}, { geocoder });

            await planner.init();
            await planner.init();

            expect(planner.ready).toBe(true);
            expect(planner.stationCount).toBe(1);
            expect(geocoder.geocodeCalls).toEqual(['I-70, EXIT 7, Denver, CO']);
            await expect(fs.access(config.geocodedFuelCsv)).resolves.toBeUndefined();

            await planner.close();
            expect(planner.ready).toBe(false);
        });

        it('shares one initialized planner and retries after a failed init', async () => {
            const broken = plannerWith(new FakeRouteProvider(makeRoute()));
            await expect(getFuelPlanner(() => broken)).rejects.toThrow();

            await saveFuelTable(config.geocodedFuelCsv, coloradoTable);
            const working = plannerWith(new FakeRouteProvider(makeRoute()));
            const first = await getFuelPlanner(() => working);
            const second = await getFuelPlanner(() => plannerWith(new FakeRouteProvider(null)));

            expect(first).toBe(working);
            expect(second).toBe(working);
            expect(working.stationCount).toBe(4);
        });
    });
});

describe('buildRouteMapUrl', () => {
    it('encodes both addresses', () => {
        expect(buildRouteMapUrl('1 Main St & 2nd', 'Denver, CO')).toBe(
            'https://www.google.com/maps/dir/?api=1&origin=1%20Main%20St%20%26%202nd&destination=Denver%2C%20CO'
        );
    });
});
