import { pool } from './connection';
import { ColumnType } from './models';
import { Queryable } from './utils';
import { escapeIdentifier, validateColumnType } from '../utils/sqlSecurity';

export const ATTENDANCE_TABLE = 'attendance';

/**
 * Columns added after the table was first created. Insertion order is the
 * order in which missing columns get added.
 */
export const ATTENDANCE_COLUMNS: Readonly<Record<string, ColumnType>> = {
    latitude: 'DOUBLE PRECISION',
    longitude: 'DOUBLE PRECISION',
    checkin_remark: 'TEXT',
    checkout_remark: 'TEXT',
    checkin_latitude: 'DOUBLE PRECISION',
    checkin_longitude: 'DOUBLE PRECISION',
    checkout_latitude: 'DOUBLE PRECISION',
    checkout_longitude: 'DOUBLE PRECISION',
};

/**
 * Create the attendance table with its original column set.
 */
export const ensureBaseTable = async (db: Queryable = pool): Promise<void> => {
    await db.query(`
        CREATE TABLE IF NOT EXISTS ${ATTENDANCE_TABLE} (
            id SERIAL PRIMARY KEY,
            username TEXT,
            address TEXT,
            checkin_time TEXT,
            checkout_time TEXT
        )
    `);
};

export const getExistingColumns = async (db: Queryable = pool): Promise<Set<string>> => {
    const result = await db.query<{ column_name: string }>(
        `SELECT column_name
         FROM information_schema.columns
         WHERE table_schema = current_schema() AND table_name = $1`,
        [ATTENDANCE_TABLE]
    );
    return new Set(result.rows.map(row => row.column_name));
};

/**
 * Add every expected column the table is missing. Columns that already exist
 * are left alone, so a table that is up to date sees no ALTER at all.
 *
 * @returns names of the columns that were added
 */
export const ensureColumns = async (
    expectedColumns: Readonly<Record<string, ColumnType>>,
    db: Queryable = pool
): Promise<string[]> => {
    const existing = await getExistingColumns(db);
    const added: string[] = [];

    for (const [column, columnType] of Object.entries(expectedColumns)) {
        if (existing.has(column)) {
            continue;
        }
        if (!validateColumnType(columnType)) {
            throw new Error(`Unsupported column type for ${column}: ${columnType}`);
        }

        await db.query(`ALTER TABLE ${ATTENDANCE_TABLE} ADD COLUMN ${escapeIdentifier(column)} ${columnType}`);
        added.push(column);
    }

    return added;
};

/**
 * Copy check-in coordinates into the legacy latitude/longitude pair for rows
 * written before that pair existed. Rows already filled are not matched, so a
 * second run updates nothing.
 *
 * @returns number of rows updated
 */
export const backfillLegacyLocation = async (db: Queryable = pool): Promise<number> => {
    const result = await db.query(`
        UPDATE ${ATTENDANCE_TABLE}
        SET latitude = checkin_latitude,
            longitude = checkin_longitude
        WHERE (latitude IS NULL OR longitude IS NULL)
          AND checkin_latitude IS NOT NULL
          AND checkin_longitude IS NOT NULL
    `);
    return result.rowCount ?? 0;
};
