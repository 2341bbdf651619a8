import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../app';
import { AttendanceService } from '../services/attendanceService';
import { AdminSessionStore, AuthService } from '../services/authService';
import { LocationResolver } from '../services/locationService';
import { FakeAttendanceDb } from '../__tests__/helpers/fakeAttendanceDb';

describe('Attendance Routes', () => {
    let app: Express;
    let db: FakeAttendanceDb;
    let locator: jest.Mocked<LocationResolver>;
    let now: Date;

    beforeEach(() => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        db = new FakeAttendanceDb();
        locator = {
            resolveCurrentLocation: jest.fn().mockResolvedValue({
                latitude: 12.9,
                longitude: 77.6,
                address: 'Bengaluru, KA, India'
            })
        };
        now = new Date(2024, 0, 1, 9, 0, 0);

        app = createApp({
            attendanceService: new AttendanceService(db.asQueryable(), locator, () => now),
            authService: new AuthService({ username: 'admin', password: 'test-password' }, new AdminSessionStore(), 3600)
        });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('POST /api/attendance/check-in', () => {
        it('should open a record and report the check-in time', async () => {
            const response = await request(app)
                .post('/api/attendance/check-in')
                .send({ username: 'alice', remark: 'start' })
                .expect(201);

            expect(response.body.success).toBe(true);
            expect(response.body.message).toBe('Checked in at 2024-01-01 09:00:00');
            expect(response.body.data.id).toBe(1);
            expect(response.body.data.record).toMatchObject({
                username: 'alice',
                address: 'Bengaluru, KA, India',
                checkin_remark: 'start',
                checkin_latitude: 12.9,
                checkin_longitude: 77.6,
                checkout_time: null
            });
        });

        it('should look up the caller address', async () => {
            await request(app)
                .post('/api/attendance/check-in')
                .send({ username: 'alice' })
                .expect(201);

            expect(locator.resolveCurrentLocation).toHaveBeenCalledWith('127.0.0.1');
            expect(db.rows[0].checkin_remark).toBe('');
        });

        it('should refuse a missing name and store nothing', async () => {
            const response = await request(app)
                .post('/api/attendance/check-in')
                .send({ username: '  ', remark: 'start' })
                .expect(400);

            expect(response.body.code).toBe('VALIDATION_ERROR');
            expect(response.body.details[0]).toEqual({ field: 'username', message: 'Please enter your name.' });
            expect(db.rows).toHaveLength(0);
        });

        it('should refuse an overlong remark', async () => {
            const response = await request(app)
                .post('/api/attendance/check-in')
                .send({ username: 'alice', remark: 'x'.repeat(501) })
                .expect(400);

            expect(response.body.details).toEqual([
                { field: 'remark', message: 'remark must be between 0 and 500 characters' }
            ]);
        });
    });

    describe('POST /api/attendance/check-out', () => {
        it('should close the open record', async () => {
            await request(app)
                .post('/api/attendance/check-in')
                .send({ username: 'alice', remark: 'start' })
                .expect(201);

            now = new Date(2024, 0, 1, 17, 0, 0);
            const response = await request(app)
                .post('/api/attendance/check-out')
                .send({ username: 'alice', remark: 'done' })
                .expect(200);

            expect(response.body.message).toBe('Checked out at 2024-01-01 17:00:00');
            expect(response.body.data.record).toMatchObject({
                id: 1,
                checkin_time: '2024-01-01 09:00:00',
                checkin_remark: 'start',
                checkout_time: '2024-01-01 17:00:00',
                checkout_remark: 'done'
            });
        });

        it('should answer 404 when there is no open record', async () => {
            const response = await request(app)
                .post('/api/attendance/check-out')
                .send({ username: 'alice', remark: 'done' })
                .expect(404);

            expect(response.body).toEqual({
                success: false,
                error: 'No active check-in found',
                code: 'NO_ACTIVE_CHECKIN'
            });
        });
    });

    describe('GET /api/attendance/history/:username', () => {
        it('should list the user records newest first with map input', async () => {
            db.seed({
                username: 'alice',
                checkin_time: '2023-12-31 09:00:00',
                checkin_latitude: 12.9,
                checkin_longitude: 77.6,
                checkout_time: '2023-12-31 17:00:00',
                checkout_latitude: 12.95,
                checkout_longitude: 77.65
            });
            db.seed({ username: 'bob', checkin_time: '2024-01-01 08:00:00' });
            db.seed({ username: 'alice', checkin_time: '2024-01-01 09:00:00' });

            const response = await request(app)
                .get('/api/attendance/history/alice')
                .expect(200);

            expect(response.body.message).toBe('Attendance history retrieved');
            expect(response.body.meta).toEqual({ count: 2 });
            expect(response.body.data.records.map((record: { id: number }) => record.id)).toEqual([3, 1]);
            expect(response.body.data.mapPoints).toEqual({
                checkin: [{ id: 1, username: 'alice', lat: 12.9, lon: 77.6 }],
                checkout: [{ id: 1, username: 'alice', lat: 12.95, lon: 77.65 }]
            });
        });

        it('should store names and remarks as typed and find them again', async () => {
            const checkIn = await request(app)
                .post('/api/attendance/check-in')
                .send({ username: 'Tom <T>', remark: 'temp > 38C, fever <see doc>' })
                .expect(201);

            expect(checkIn.body.data.record.username).toBe('Tom <T>');
            expect(checkIn.body.data.record.checkin_remark).toBe('temp > 38C, fever <see doc>');

            await request(app)
                .post('/api/attendance/check-out')
                .send({ username: 'Tom <T>', remark: 'back <home>' })
                .expect(200);

            const response = await request(app)
                .get('/api/attendance/history/Tom%20%3CT%3E')
                .expect(200);

            expect(response.body.meta).toEqual({ count: 1 });
            expect(response.body.data.records[0]).toMatchObject({
                username: 'Tom <T>',
                checkin_remark: 'temp > 38C, fever <see doc>',
                checkout_remark: 'back <home>'
            });
        });

        it('should say so when there are no records', async () => {
            const response = await request(app)
                .get('/api/attendance/history/nobody')
                .expect(200);

            expect(response.body.message).toBe('No records found.');
            expect(response.body.data.records).toEqual([]);
        });

        it('should refuse a blank username', async () => {
            await request(app)
                .get('/api/attendance/history/%20')
                .expect(400);
        });
    });

    describe('App', () => {
        it('should answer health checks', async () => {
            const response = await request(app).get('/health').expect(200);

            expect(response.body.status).toBe('OK');
        });

        it('should answer unknown routes with a JSON 404', async () => {
            const response = await request(app).get('/api/nope').expect(404);

            expect(response.body).toEqual({
                success: false,
                error: 'Route GET /api/nope not found',
                code: 'NOT_FOUND'
            });
        });
    });
});
