import fs from 'node:fs/promises';
import path from 'node:path';
import type { FuelStation } from '@/lib/types';

export const FUEL_TABLE_COLUMNS = [
    'OPIS Truckstop ID',
    'Truckstop Name',
    'Address',
    'City',
    'State',
    'Rack ID',
    'Retail Price',
    'Latitude',
    'Longitude',
] as const;

const REQUIRED_COLUMNS = FUEL_TABLE_COLUMNS.slice(0, 7).filter((c) => c !== 'Rack ID');

/**
 * Splits CSV text into rows of raw cells. Handles quoted cells (including
 * embedded commas, doubled quotes and line breaks), CRLF endings and a leading BOM.
 */
export function parseCsv(text: string): string[][] {
    const rows: string[][] = [];
    let row: string[] = [];
    let current = '';
    let inQuotes = false;
    const src = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

    for (let i = 0; i < src.length; i++) {
        const ch = src[i];
        if (inQuotes) {
            if (ch === '"') {
                if (src[i + 1] === '"') {
                    current += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                current += ch;
            }
            continue;
        }

        if (ch === '"') {
            inQuotes = true;
        } else if (ch === ',') {
            row.push(current);
            current = '';
        } else if (ch === '\n' || ch === '\r') {
            if (ch === '\r' && src[i + 1] === '\n') i++;
            row.push(current);
            rows.push(row);
            row = [];
            current = '';
        } else {
            current += ch;
        }
    }

    if (current !== '' || row.length > 0) {
        row.push(current);
        rows.push(row);
    }

    return rows.filter((r) => r.some((cell) => cell.trim() !== ''));
}

function escapeCell(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function parseCoordinate(raw: string | undefined): number | null {
    if (raw === undefined || raw.trim() === '') return null;
    const n = Number(raw);
    return Number.isFinite(n) ? n : null;
}

/**
 * Parses the fuel price CSV (optionally already carrying Latitude/Longitude).
 * Rows without a positive retail price are dropped; a row with a single
 * coordinate loses both.
 */
export function parseFuelTable(text: string): FuelStation[] {
    const rows = parseCsv(text);
    if (rows.length === 0) return [];

    const header = rows[0].map((h) => h.trim());
    const indexOf = (column: string) => header.indexOf(column);
    const missing = REQUIRED_COLUMNS.filter((c) => indexOf(c) === -1);
    if (missing.length > 0) {
        throw new Error(`Fuel price CSV is missing columns: ${missing.join(', ')}`);
    }

    const cell = (row: string[], column: string): string | undefined => {
        const idx = indexOf(column);
        return idx === -1 ? undefined : row[idx]?.trim();
    };

    const stations: FuelStation[] = [];
    for (let r = 1; r < rows.length; r++) {
        const row = rows[r];
        const id = cell(row, 'OPIS Truckstop ID') ?? '';
        const retailPrice = Number(cell(row, 'Retail Price'));

        if (!Number.isFinite(retailPrice) || retailPrice <= 0) {
            console.warn(`[FUEL_TABLE] Skipping row ${r + 1} (station ${id || 'unknown'}): invalid retail price`);
            continue;
        }

        let lat = parseCoordinate(cell(row, 'Latitude'));
        let lng = parseCoordinate(cell(row, 'Longitude'));
        if (lat === null || lng === null) {
            lat = null;
            lng = null;
        }

        const rackId = cell(row, 'Rack ID');
        stations.push({
            id,
            name: cell(row, 'Truckstop Name') ?? '',
            address: cell(row, 'Address') ?? '',
            city: cell(row, 'City') ?? '',
            state: (cell(row, 'State') ?? '').toUpperCase(),
            rackId: rackId ? rackId : null,
            retailPrice,
            lat,
            lng,
        });
    }

    return stations;
}

export function serializeFuelTable(stations: readonly FuelStation[]): string {
    const lines = [FUEL_TABLE_COLUMNS.join(',')];
    for (const s of stations) {
        const cells = [
            s.id,
            s.name,
            s.address,
            s.city,
            s.state,
            s.rackId ?? '',
            String(s.retailPrice),
            s.lat === null ? '' : String(s.lat),
            s.lng === null ? '' : String(s.lng),
        ];
        lines.push(cells.map(escapeCell).join(','));
    }
    return lines.join('\n') + '\n';
}

export async function loadFuelTable(filePath: string): Promise<FuelStation[]> {
    const text = await fs.readFile(filePath, 'utf8');
    return parseFuelTable(text);
}

/**
 * Writes the table next to its destination first and renames it into place,
 * so a concurrent reader sees either the old file or the complete new one.
 */
export async function saveFuelTable(filePath: string, stations: readonly FuelStation[]): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, serializeFuelTable(stations), 'utf8');
    await fs.rename(tmpPath, filePath);
}

export function hasCoordinates(station: FuelStation): station is FuelStation & { lat: number; lng: number } {
    return station.lat !== null && station.lng !== null;
}

export function stationAddress(station: FuelStation): string {
    return `${station.address}, ${station.city}, ${station.state}`;
}
