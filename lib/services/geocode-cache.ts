import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { FuelStation } from '@/lib/types';
import type { Geocoder } from '@/lib/services/providers';
import { isPermanentAuthFailure } from '@/lib/services/google-maps.client';
import { hasCoordinates, loadFuelTable, saveFuelTable, stationAddress } from '@/lib/services/fuel-table.csv';
import { mapWithConcurrency } from '@/lib/utils/concurrency';

export type GeocodeCacheOptions = {
    sourcePath: string;
    artifactPath: string;
    geocoder: Geocoder;
    concurrency: number;
    lockWaitMs: number;
    pollIntervalMs?: number;
    lockRefreshMs?: number;
};

export type GeocodedTable = {
    stations: FuelStation[];
    fromCache: boolean;
    failedAddresses: number;
};

const LOCK_REFRESH_MS = 5000;
// A live writer touches its lock every refresh interval; one this many intervals old is abandoned.
const STALE_LOCK_INTERVALS = 3;

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function errorCode(err: unknown): string | undefined {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
    return undefined;
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Fills in coordinates for every station that lacks them.
 * A miss or a failed lookup leaves the station ungeocoded; only a rejected
 * API key stops the sweep.
 */
export async function geocodeMissingStations(
    stations: readonly FuelStation[],
    geocoder: Geocoder,
    concurrency: number
): Promise<{ stations: FuelStation[]; failedAddresses: number }> {
    let failedAddresses = 0;

    const out = await mapWithConcurrency(stations, concurrency, async (station) => {
        if (hasCoordinates(station)) return station;

        const address = stationAddress(station);
        try {
            const location = await geocoder.geocode(address);
            if (location) return { ...station, lat: location.lat, lng: location.lng };
        } catch (err: unknown) {
            if (isPermanentAuthFailure(err)) throw err;
            const message = err instanceof Error ? err.message : String(err);
            console.warn(`[GEOCODE_FAILED] Station ${station.id} "${address}": ${message}`);
        }

        failedAddresses++;
        return { ...station, lat: null, lng: null };
    });

    return { stations: out, failedAddresses };
}

/**
 * Takes the single-writer lock for the geocoding sweep, writing `token` into it.
 * Returns false when another writer holds a lock touched within `staleAfterMs`.
 */
async function tryAcquireLock(lockPath: string, token: string, staleAfterMs: number): Promise<boolean> {
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    try {
        const handle = await fs.open(lockPath, 'wx');
        await handle.writeFile(token);
        await handle.close();
        return true;
    } catch (err: unknown) {
        if (errorCode(err) !== 'EEXIST') throw err;
    }

    try {
        const stat = await fs.stat(lockPath);
        if (Date.now() - stat.mtimeMs > staleAfterMs) {
            console.warn(`[GEOCODE_CACHE] Removing stale lock ${lockPath}`);
            await fs.rm(lockPath, { force: true });
            return tryAcquireLock(lockPath, token, staleAfterMs);
        }
    } catch (err: unknown) {
        // Lock released between open and stat: try again.
        if (errorCode(err) === 'ENOENT') return tryAcquireLock(lockPath, token, staleAfterMs);
        throw err;
    }
    return false;
}

function keepLockFresh(lockPath: string, intervalMs: number): NodeJS.Timeout {
    const timer = setInterval(() => {
        const now = new Date();
        fs.utimes(lockPath, now, now).catch((err: unknown) => {
            console.warn(`[GEOCODE_CACHE] Could not refresh lock ${lockPath}:`, err instanceof Error ? err.message : err);
        });
    }, intervalMs);
    timer.unref();
    return timer;
}

/** Removes the lock only while it still carries our token. */
async function releaseLock(lockPath: string, token: string) {
    let holder: string;
    try {
        holder = await fs.readFile(lockPath, 'utf8');
    } catch (err: unknown) {
        if (errorCode(err) === 'ENOENT') return;
        throw err;
    }
    if (holder !== token) {
        console.warn(`[GEOCODE_CACHE] Lock ${lockPath} was taken over by another writer`);
        return;
    }
    await fs.rm(lockPath, { force: true });
}

/**
 * Returns the fuel table with coordinates, geocoding it at most once per deployment.
 *
 * The persisted artifact short-circuits everything. Otherwise one process takes
 * `<artifact>.lock`, touches it while it geocodes, writes the artifact and drops the
 * lock; any other process polls until the artifact shows up.
 */
export async function buildGeocodedTable(options: GeocodeCacheOptions): Promise<GeocodedTable> {
    const { sourcePath, artifactPath, lockWaitMs } = options;
    const lockPath = `${artifactPath}.lock`;
    const pollIntervalMs = options.pollIntervalMs ?? 250;
    const lockRefreshMs = options.lockRefreshMs ?? LOCK_REFRESH_MS;
    const staleAfterMs = lockRefreshMs * STALE_LOCK_INTERVALS;
    const token = `${process.pid}:${randomUUID()}`;
    const deadline = Date.now() + lockWaitMs;

    for (;;) {
        if (await fileExists(artifactPath)) {
            const stations = await loadFuelTable(artifactPath);
            console.log(`[GEOCODE_CACHE] Loaded ${stations.length} stations from ${artifactPath}`);
            return { stations, fromCache: true, failedAddresses: 0 };
        }

        if (await tryAcquireLock(lockPath, token, staleAfterMs)) break;

        if (Date.now() > deadline) {
            throw new Error(`Timed out waiting for another process to geocode ${artifactPath}`);
        }
        await delay(pollIntervalMs);
    }

    const refresh = keepLockFresh(lockPath, lockRefreshMs);
    try {
        // Another writer may have finished between the existence check and taking the lock.
        if (await fileExists(artifactPath)) {
            const stations = await loadFuelTable(artifactPath);
            return { stations, fromCache: true, failedAddresses: 0 };
        }

        const source = await loadFuelTable(sourcePath);
        console.log(`[GEOCODE_CACHE] Geocoding ${source.filter((s) => !hasCoordinates(s)).length} of ${source.length} stations`);

        const result = await geocodeMissingStations(source, options.geocoder, options.concurrency);
        await saveFuelTable(artifactPath, result.stations);

        console.log(`[GEOCODE_CACHE] Wrote ${artifactPath} (${result.failedAddresses} addresses not found)`);
        return { stations: result.stations, fromCache: false, failedAddresses: result.failedAddresses };
    } finally {
        clearInterval(refresh);
        await releaseLock(lockPath, token);
    }
}
