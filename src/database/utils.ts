import { Pool, PoolClient } from 'pg';
import { pool } from './connection';

/**
 * Anything statements can be issued against: the pool itself or a client
 * checked out of it for a transaction.
 */
export type Queryable = Pick<Pool, 'query'>;

// Transaction wrapper
export const withTransaction = async <T>(
    callback: (client: PoolClient) => Promise<T>,
    db: Pool = pool
): Promise<T> => {
    const client = await db.connect();

    try {
        await client.query('BEGIN');
        const result = await callback(client);
        await client.query('COMMIT');
        return result;
    } catch (error) {
        await client.query('ROLLBACK');
        throw error;
    } finally {
        client.release();
    }
};
