import { Router, Request, Response } from 'express';
import { AttendanceService } from '../services/attendanceService';
import { buildMapPoints } from '../services/exportService';
import {
    validateRequest,
    RequiredFieldRule,
    StringLengthRule,
    TypeValidationRule
} from '../middleware/validation';
import { createAttendanceRateLimit } from '../middleware/rateLimiting';
import { asyncHandler, getClientIp } from '../utils';
import { formatSuccessResponse } from '../utils/response';
import { MAX_REMARK_LENGTH, MAX_USERNAME_LENGTH } from '../utils/validation';

interface AttendanceBody {
    username: string;
    remark?: string;
}

const attendanceBodyRules = [
    new RequiredFieldRule('username', 'body', 'Please enter your name.'),
    new StringLengthRule('username', 1, MAX_USERNAME_LENGTH),
    new TypeValidationRule('remark', 'string', 'body', true),
    new StringLengthRule('remark', 0, MAX_REMARK_LENGTH, 'body', true)
];

export function createAttendanceRouter(attendanceService: AttendanceService = new AttendanceService()): Router {
    const router = Router();
    const attendanceRateLimit = createAttendanceRateLimit();

    /**
     * POST /api/attendance/check-in
     * Open a new record stamped with the current time and location
     */
    router.post('/check-in',
        attendanceRateLimit,
        validateRequest(attendanceBodyRules),
        asyncHandler(async (req: Request, res: Response): Promise<void> => {
            const { username, remark }: AttendanceBody = req.body;
            const record = await attendanceService.checkIn(username, remark ?? '', getClientIp(req));

            res.status(201).json(formatSuccessResponse(
                { id: record.id, record },
                `Checked in at ${record.checkin_time}`
            ));
        }));

    /**
     * POST /api/attendance/check-out
     * Close the user's most recent open record
     */
    router.post('/check-out',
        attendanceRateLimit,
        validateRequest(attendanceBodyRules),
        asyncHandler(async (req: Request, res: Response): Promise<void> => {
            const { username, remark }: AttendanceBody = req.body;
            const record = await attendanceService.checkOut(username, remark ?? '', getClientIp(req));

            res.json(formatSuccessResponse(
                { id: record.id, record },
                `Checked out at ${record.checkout_time}`
            ));
        }));

    /**
     * GET /api/attendance/history/:username
     * A user's own records, newest first, with map input
     */
    router.get('/history/:username',
        validateRequest([
            new StringLengthRule('username', 1, MAX_USERNAME_LENGTH, 'params')
        ]),
        asyncHandler(async (req: Request, res: Response): Promise<void> => {
            const records = await attendanceService.history(req.params.username);

            res.json(formatSuccessResponse(
                { records, mapPoints: buildMapPoints(records) },
                records.length > 0 ? 'Attendance history retrieved' : 'No records found.',
                { count: records.length }
            ));
        }));

    return router;
}
