import { getPool } from '../database/connection';
import { AttendanceRow } from '../database/models';
import { Queryable } from '../database/utils';
import { FieldError, NotFoundError, ValidationError } from '../middleware/errorHandler';
import { formatTimestamp, isValidDateString } from '../utils/time';
import { sanitizeString } from '../utils/validation';
import { IpLocationService, LocationResolver } from './locationService';

/** `"All"` disables the username filter in {@link AttendanceService.search}. */
export const ALL_USERS = 'All';

export interface SearchFilters {
    username: string;
    dateFrom: string;
    dateTo: string;
}

export class AttendanceService {
    constructor(
        private readonly db: Queryable = getPool(),
        private readonly locator: LocationResolver = new IpLocationService(),
        private readonly now: () => Date = () => new Date()
    ) { }

    /**
     * Open a new attendance record for the user, stamped with the current
     * time and the resolved location.
     */
    async checkIn(username: string, remark = '', clientIp?: string): Promise<AttendanceRow> {
        const user = this.requireUsername(username);
        const location = await this.locator.resolveCurrentLocation(clientIp);
        const checkinTime = formatTimestamp(this.now());

        const result = await this.db.query<AttendanceRow>(
            `INSERT INTO attendance
                (username, latitude, longitude, checkin_latitude, checkin_longitude, address,
                 checkin_time, checkin_remark, checkout_time, checkout_remark, checkout_latitude, checkout_longitude)
             VALUES ($1, $2, $3, $2, $3, $4, $5, $6, NULL, NULL, NULL, NULL)
             RETURNING *`,
            [user, location.latitude, location.longitude, location.address, checkinTime, remark]
        );

        return result.rows[0];
    }

    /**
     * Close the user's most recent open record. The row is picked and updated
     * in one statement, so two concurrent check-outs cannot both close it.
     *
     * @throws NotFoundError when the user has no open record
     */
    async checkOut(username: string, remark = '', clientIp?: string): Promise<AttendanceRow> {
        const user = this.requireUsername(username);
        const location = await this.locator.resolveCurrentLocation(clientIp);
        const checkoutTime = formatTimestamp(this.now());

        const result = await this.db.query<AttendanceRow>(
            `UPDATE attendance
             SET checkout_time = $2,
                 checkout_remark = $3,
                 checkout_latitude = $4,
                 checkout_longitude = $5
             WHERE id = (
                 SELECT id FROM attendance
                 WHERE username = $1 AND checkout_time IS NULL
                 ORDER BY id DESC
                 LIMIT 1
                 FOR UPDATE
             )
             AND checkout_time IS NULL
             RETURNING *`,
            [user, checkoutTime, remark, location.latitude, location.longitude]
        );

        const record = result.rows[0];
        if (!record) {
            throw new NotFoundError('No active check-in found', 'NO_ACTIVE_CHECKIN');
        }

        return record;
    }

    /**
     * All of a user's records, newest first.
     */
    async history(username: string): Promise<AttendanceRow[]> {
        const user = this.requireUsername(username);

        const result = await this.db.query<AttendanceRow>(
            'SELECT * FROM attendance WHERE username = $1 ORDER BY id DESC',
            [user]
        );
        return result.rows;
    }

    /**
     * Records whose check-in date (the `YYYY-MM-DD` prefix of checkin_time)
     * falls within [dateFrom, dateTo], optionally for one user, newest first.
     * A reversed range matches nothing.
     */
    async search(filters: SearchFilters): Promise<AttendanceRow[]> {
        const { username, dateFrom, dateTo } = filters;
        const errors: FieldError[] = [];

        if (!isValidDateString(dateFrom)) {
            errors.push({ field: 'from', message: 'from must be a date in YYYY-MM-DD format' });
        }
        if (!isValidDateString(dateTo)) {
            errors.push({ field: 'to', message: 'to must be a date in YYYY-MM-DD format' });
        }
        if (errors.length > 0) {
            throw new ValidationError('Invalid date range', errors);
        }

        let queryText = 'SELECT * FROM attendance WHERE 1=1';
        const queryParams: string[] = [];
        let paramIndex = 1;

        if (username !== ALL_USERS) {
            queryText += ` AND username = $${paramIndex}`;
            queryParams.push(username);
            paramIndex++;
        }

        queryText += ` AND substr(checkin_time, 1, 10) BETWEEN $${paramIndex} AND $${paramIndex + 1}`;
        queryParams.push(dateFrom, dateTo);
        queryText += ' ORDER BY id DESC';

        const result = await this.db.query<AttendanceRow>(queryText, queryParams);
        return result.rows;
    }

    /**
     * Distinct usernames that have at least one record, for the admin filter.
     */
    async listUsernames(): Promise<string[]> {
        const result = await this.db.query<{ username: string }>(
            `SELECT DISTINCT username FROM attendance
             WHERE username IS NOT NULL AND username <> ''
             ORDER BY username`
        );
        return result.rows.map(row => row.username);
    }

    /**
     * Body, query and path values all pass through here, so check-in,
     * check-out and history agree on the stored name.
     */
    private requireUsername(username: string): string {
        const trimmed = typeof username === 'string' ? sanitizeString(username) : '';
        if (trimmed === '') {
            throw new ValidationError('Please enter your name.', [
                { field: 'username', message: 'username is required' }
            ]);
        }
        return trimmed;
    }
}
