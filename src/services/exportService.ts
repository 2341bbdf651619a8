import { ATTENDANCE_ROW_COLUMNS, AttendanceRow } from '../database/models';

export const CSV_FILENAME = 'attendance_export.csv';

export type CoordinateKind = 'checkin' | 'checkout';

export interface MapPoint {
    id: number;
    username: string;
    lat: number;
    lon: number;
}

const escapeCsvField = (value: string | number | null): string => {
    if (value === null) {
        return '';
    }
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

/**
 * Serialize records with a header row and every column of the table,
 * legacy coordinates included.
 */
export function toCsv(records: AttendanceRow[]): string {
    const lines = [
        ATTENDANCE_ROW_COLUMNS.join(','),
        ...records.map(record => ATTENDANCE_ROW_COLUMNS.map(column => escapeCsvField(record[column])).join(','))
    ];
    return `${lines.join('\n')}\n`;
}

const toCoordinate = (value: unknown): number | null => {
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : null;
};

/**
 * Map input for either the check-in or the check-out coordinate pair; rows
 * without a usable pair are dropped.
 */
export function toMapPoints(records: AttendanceRow[], kind: CoordinateKind): MapPoint[] {
    const points: MapPoint[] = [];

    for (const record of records) {
        const lat = toCoordinate(kind === 'checkin' ? record.checkin_latitude : record.checkout_latitude);
        const lon = toCoordinate(kind === 'checkin' ? record.checkin_longitude : record.checkout_longitude);

        if (lat !== null && lon !== null) {
            points.push({ id: record.id, username: record.username, lat, lon });
        }
    }

    return points;
}

export function buildMapPoints(records: AttendanceRow[]): Record<CoordinateKind, MapPoint[]> {
    return {
        checkin: toMapPoints(records, 'checkin'),
        checkout: toMapPoints(records, 'checkout')
    };
}
