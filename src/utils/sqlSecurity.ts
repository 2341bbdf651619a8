/**
 * Helpers for the few statements that cannot be parameterized (DDL).
 * Everything else goes through `$n` placeholders.
 */

/**
 * Validate SQL identifier (table names, column names)
 */
export function validateIdentifier(identifier: string): boolean {
    // Allow only alphanumeric characters and underscores
    return /^[a-zA-Z_][a-zA-Z0-9_]*$/.test(identifier);
}

/**
 * Escape identifier for use in dynamic queries (use sparingly)
 */
export function escapeIdentifier(identifier: string): string {
    if (!validateIdentifier(identifier)) {
        throw new Error(`Invalid identifier: ${identifier}`);
    }

    // PostgreSQL identifier escaping
    return `"${identifier.replace(/"/g, '""')}"`;
}

const COLUMN_TYPES = new Set(['TEXT', 'DOUBLE PRECISION', 'INTEGER']);

/**
 * Only a fixed set of column types may be spliced into ALTER TABLE.
 */
export function validateColumnType(columnType: string): boolean {
    return COLUMN_TYPES.has(columnType);
}
