import { Pool } from 'pg';
import { Migration, getSchemaVersion, migrations, prepareSchema, runMigrations } from './migrate';

const createMockPool = () => {
    const client = {
        query: jest.fn().mockResolvedValue({ rows: [], rowCount: 0 }),
        release: jest.fn()
    };
    const mock = {
        query: jest.fn().mockResolvedValue({ rows: [], rowCount: 0 }),
        connect: jest.fn().mockResolvedValue(client)
    };
    return { client, mock, db: mock as unknown as Pool };
};

const executedRows = (names: string[]) => ({ rows: names.map(name => ({ name })) });

describe('Database migrations', () => {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should keep the schema history in version order', () => {
        expect(migrations.map(migration => migration.id)).toEqual([1, 2, 3]);
        expect(migrations.map(migration => migration.name)).toEqual([
            '001_create_attendance',
            '002_add_location_and_remark_columns',
            '003_backfill_legacy_location'
        ]);
    });

    describe('runMigrations', () => {
        const makeList = (): Migration[] => [
            { id: 2, name: '002_second', up: jest.fn().mockResolvedValue(undefined) },
            { id: 1, name: '001_first', up: jest.fn().mockResolvedValue(undefined) }
        ];

        it('should run pending migrations by id, each in its own transaction', async () => {
            const { client, mock, db } = createMockPool();
            const list = makeList();

            const executed = await runMigrations(db, list);

            expect(executed).toBe(2);
            expect(mock.connect).toHaveBeenCalledTimes(2);
            expect(client.query.mock.calls).toEqual([
                ['BEGIN'],
                ['INSERT INTO migrations (id, name) VALUES ($1, $2)', [1, '001_first']],
                ['COMMIT'],
                ['BEGIN'],
                ['INSERT INTO migrations (id, name) VALUES ($1, $2)', [2, '002_second']],
                ['COMMIT']
            ]);
            expect(client.release).toHaveBeenCalledTimes(2);
            expect(list[1].up).toHaveBeenCalledWith(client);
        });

        it('should skip migrations that were already recorded', async () => {
            const { client, mock, db } = createMockPool();
            mock.query
                .mockResolvedValueOnce({ rows: [] })
                .mockResolvedValueOnce(executedRows(['001_first']));
            const list = makeList();

            const executed = await runMigrations(db, list);

            expect(executed).toBe(1);
            expect(list[1].up).not.toHaveBeenCalled();
            expect(client.query).toHaveBeenCalledWith(
                'INSERT INTO migrations (id, name) VALUES ($1, $2)',
                [2, '002_second']
            );
        });

        it('should roll back and stop when a migration fails', async () => {
            const { client, db } = createMockPool();
            const list = makeList();
            list[1].up = jest.fn().mockRejectedValue(new Error('disk full'));

            await expect(runMigrations(db, list)).rejects.toThrow('disk full');

            expect(client.query.mock.calls).toEqual([['BEGIN'], ['ROLLBACK']]);
            expect(client.release).toHaveBeenCalledTimes(1);
            expect(list[0].up).not.toHaveBeenCalled();
        });

        it('should do nothing when the schema is current', async () => {
            const { mock, db } = createMockPool();
            mock.query
                .mockResolvedValueOnce({ rows: [] })
                .mockResolvedValueOnce(executedRows(['001_first', '002_second']));

            await expect(runMigrations(db, makeList())).resolves.toBe(0);
            expect(mock.connect).not.toHaveBeenCalled();
        });
    });

    describe('getSchemaVersion', () => {
        it('should report the highest applied migration id', async () => {
            const { mock, db } = createMockPool();
            mock.query
                .mockResolvedValueOnce({ rows: [] })
                .mockResolvedValueOnce({ rows: [{ version: 3 }] });

            await expect(getSchemaVersion(db)).resolves.toBe(3);
        });

        it('should report zero for a fresh database', async () => {
            const { mock, db } = createMockPool();
            mock.query
                .mockResolvedValueOnce({ rows: [] })
                .mockResolvedValueOnce({ rows: [{ version: null }] });

            await expect(getSchemaVersion(db)).resolves.toBe(0);
        });
    });

    describe('prepareSchema', () => {
        it('should backfill legacy coordinates after migrating', async () => {
            const { mock, db } = createMockPool();
            mock.query
                .mockResolvedValueOnce({ rows: [] })
                .mockResolvedValueOnce(executedRows(migrations.map(migration => migration.name)))
                .mockResolvedValueOnce({ rows: [], rowCount: 2 });

            await prepareSchema(db);

            expect(mock.query).toHaveBeenCalledTimes(3);
            expect(mock.query.mock.calls[2][0]).toContain('SET latitude = checkin_latitude');
            expect(console.log).toHaveBeenCalledWith('Backfilled legacy location on 2 rows');
        });
    });
});
