/**
 * Database model types
 * Row shapes as returned by pg for the attendance table
 */

export type AttendanceRow = {
    id: number;
    username: string;
    latitude: number | null;
    longitude: number | null;
    address: string | null;
    checkin_time: string;
    checkin_remark: string | null;
    checkin_latitude: number | null;
    checkin_longitude: number | null;
    checkout_time: string | null;
    checkout_remark: string | null;
    checkout_latitude: number | null;
    checkout_longitude: number | null;
};

/** Column order of the attendance table, used for exports. */
export const ATTENDANCE_ROW_COLUMNS = [
    'id',
    'username',
    'latitude',
    'longitude',
    'address',
    'checkin_time',
    'checkin_remark',
    'checkin_latitude',
    'checkin_longitude',
    'checkout_time',
    'checkout_remark',
    'checkout_latitude',
    'checkout_longitude'
] as const satisfies ReadonlyArray<keyof AttendanceRow>;

export type ColumnType = 'TEXT' | 'DOUBLE PRECISION' | 'INTEGER';

export type MigrationRow = {
    id: number;
    name: string;
    executed_at: Date;
};
