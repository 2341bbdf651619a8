import { Router, Request, Response } from 'express';
import { ALL_USERS, AttendanceService, SearchFilters } from '../services/attendanceService';
import { AuthService } from '../services/authService';
import { buildMapPoints, CSV_FILENAME, toCsv } from '../services/exportService';
import { authenticateAdmin } from '../middleware/auth';
import { validateRequest, DateValidationRule, StringLengthRule } from '../middleware/validation';
import { asyncHandler, getQueryString } from '../utils';
import { formatSuccessResponse } from '../utils/response';
import { defaultDateRange } from '../utils/time';
import { MAX_USERNAME_LENGTH } from '../utils/validation';

const filterRules = [
    new StringLengthRule('username', 1, MAX_USERNAME_LENGTH, 'query', true),
    new DateValidationRule('from', 'query', true),
    new DateValidationRule('to', 'query', true)
];

/**
 * Username defaults to "All", dates to the current month so far.
 */
const readFilters = (req: Request): SearchFilters => {
    const defaults = defaultDateRange();
    return {
        username: getQueryString(req, 'username') ?? ALL_USERS,
        dateFrom: getQueryString(req, 'from') ?? defaults.from,
        dateTo: getQueryString(req, 'to') ?? defaults.to
    };
};

export function createAdminRouter(
    attendanceService: AttendanceService = new AttendanceService(),
    authService: AuthService = new AuthService()
): Router {
    const router = Router();

    // Every admin route needs a live session
    router.use(authenticateAdmin(authService));

    /**
     * GET /api/admin/users
     * Usernames for the filter dropdown
     */
    router.get('/users', asyncHandler(async (req: Request, res: Response): Promise<void> => {
        const usernames = await attendanceService.listUsernames();
        res.json(formatSuccessResponse({ usernames: [ALL_USERS, ...usernames] }, 'Users retrieved'));
    }));

    /**
     * GET /api/admin/records?username=&from=&to=
     * Filtered records with check-in / check-out map input
     */
    router.get('/records',
        validateRequest(filterRules),
        asyncHandler(async (req: Request, res: Response): Promise<void> => {
            const filters = readFilters(req);
            const records = await attendanceService.search(filters);

            res.json(formatSuccessResponse(
                { records, mapPoints: buildMapPoints(records) },
                `Showing ${records.length} records`,
                { count: records.length, filters }
            ));
        }));

    /**
     * GET /api/admin/records/export?username=&from=&to=
     * Same filters, downloaded as CSV
     */
    router.get('/records/export',
        validateRequest(filterRules),
        asyncHandler(async (req: Request, res: Response): Promise<void> => {
            const records = await attendanceService.search(readFilters(req));

            res.attachment(CSV_FILENAME);
            res.send(Buffer.from(toCsv(records), 'utf8'));
        }));

    return router;
}
