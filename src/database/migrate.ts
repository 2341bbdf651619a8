import { Pool, PoolClient } from 'pg';
import { pool, closePool } from './connection';
import { MigrationRow } from './models';
import { withTransaction } from './utils';
import {
    ATTENDANCE_COLUMNS,
    backfillLegacyLocation,
    ensureBaseTable,
    ensureColumns
} from './schema';

export interface Migration {
    id: number;
    name: string;
    up: (client: PoolClient) => Promise<void>;
}

/**
 * Ordered schema history. Append only: the id of the last applied entry is
 * the database's schema version.
 */
export const migrations: Migration[] = [
    {
        id: 1,
        name: '001_create_attendance',
        up: async (client) => {
            await ensureBaseTable(client);
        }
    },
    {
        id: 2,
        name: '002_add_location_and_remark_columns',
        up: async (client) => {
            const added = await ensureColumns(ATTENDANCE_COLUMNS, client);
            if (added.length > 0) {
                console.log(`  added columns: ${added.join(', ')}`);
            }
        }
    },
    {
        id: 3,
        name: '003_backfill_legacy_location',
        up: async (client) => {
            const updated = await backfillLegacyLocation(client);
            console.log(`  backfilled ${updated} rows`);
        }
    }
];

// Create migrations tracking table
const createMigrationsTable = async (db: Pool): Promise<void> => {
    await db.query(`
        CREATE TABLE IF NOT EXISTS migrations (
            id INTEGER PRIMARY KEY,
            name VARCHAR(255) UNIQUE NOT NULL,
            executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
        )
    `);
};

// Get executed migrations
const getExecutedMigrations = async (db: Pool): Promise<string[]> => {
    const result = await db.query<Pick<MigrationRow, 'name'>>('SELECT name FROM migrations ORDER BY id');
    return result.rows.map(row => row.name);
};

export const getSchemaVersion = async (db: Pool = pool): Promise<number> => {
    await createMigrationsTable(db);
    const result = await db.query<{ version: MigrationRow['id'] | null }>('SELECT MAX(id) AS version FROM migrations');
    return result.rows[0]?.version ?? 0;
};

// Execute a single migration and record it in the same transaction
const executeMigration = async (migration: Migration, db: Pool): Promise<void> => {
    try {
        await withTransaction(async (client) => {
            await migration.up(client);
            await client.query('INSERT INTO migrations (id, name) VALUES ($1, $2)', [migration.id, migration.name]);
        }, db);

        console.log(`✓ Migration ${migration.name} executed successfully`);
    } catch (error) {
        console.error(`✗ Migration ${migration.name} failed:`, error);
        throw error;
    }
};

/**
 * Run all pending migrations in order.
 *
 * @returns how many migrations were executed
 */
export const runMigrations = async (db: Pool = pool, list: Migration[] = migrations): Promise<number> => {
    console.log('Starting database migrations...');

    await createMigrationsTable(db);
    const executedMigrations = await getExecutedMigrations(db);

    const pending = [...list]
        .sort((a, b) => a.id - b.id)
        .filter(migration => !executedMigrations.includes(migration.name));

    console.log(`${executedMigrations.length} migrations already executed, ${pending.length} pending`);

    for (const migration of pending) {
        await executeMigration(migration, db);
    }

    if (pending.length === 0) {
        console.log('No pending migrations to execute');
    } else {
        console.log(`✓ Successfully executed ${pending.length} migrations`);
    }

    return pending.length;
};

/**
 * Startup routine: bring the schema to the latest version, then make sure
 * legacy coordinates are filled in.
 */
export const prepareSchema = async (db: Pool = pool): Promise<void> => {
    await runMigrations(db);

    const backfilled = await backfillLegacyLocation(db);
    if (backfilled > 0) {
        console.log(`Backfilled legacy location on ${backfilled} rows`);
    }
};

// Test the connection, then migrate
export const initializeDatabase = async (db: Pool = pool): Promise<void> => {
    console.log('Initializing database...');

    const client = await db.connect();
    console.log('✓ Database connection successful');
    client.release();

    await prepareSchema(db);

    console.log('✓ Database initialization complete');
};

// CLI interface
const main = async (): Promise<void> => {
    const command = process.argv[2];

    try {
        switch (command) {
            case 'init':
                await initializeDatabase();
                break;
            case 'migrate':
                await prepareSchema();
                break;
            case 'status': {
                await createMigrationsTable(pool);
                const executed = await getExecutedMigrations(pool);
                console.log('Executed migrations:');
                executed.forEach(name => console.log(`- ${name}`));
                console.log(`Schema version: ${await getSchemaVersion(pool)}`);
                break;
            }
            default:
                console.log('Usage: npm run migrate [init|migrate|status]');
                console.log('  init    - Test the connection and run all migrations');
                console.log('  migrate - Run pending migrations');
                console.log('  status  - Show migration status');
        }
    } catch (error) {
        console.error('Command failed:', error);
        process.exitCode = 1;
    } finally {
        await closePool();
    }
};

// Run if called directly
if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('Migration CLI crashed:', error);
        process.exit(1);
    });
}
