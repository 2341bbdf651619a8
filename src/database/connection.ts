import { Pool, PoolConfig } from 'pg';
import { config } from '../config/environment';

const poolConfig: PoolConfig = {
    host: config.database.host,
    port: config.database.port,
    database: config.database.name,
    user: config.database.user,
    password: config.database.password,
    ssl: config.database.ssl ? { rejectUnauthorized: false } : false,
    max: config.database.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
};

// Create connection pool
export const pool = new Pool(poolConfig);

// Export function to get pool instance
export const getPool = (): Pool => pool;

pool.on('error', (err) => {
    console.error('Unexpected error on idle client', {
        message: err.message,
        timestamp: new Date().toISOString()
    });
});

export const closePool = async (): Promise<void> => {
    console.log('Closing database pool...');
    await pool.end();
};
