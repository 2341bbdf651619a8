import { Router } from 'express';
import { AttendanceService } from '../services/attendanceService';
import { AuthService } from '../services/authService';
import { createAttendanceRouter } from './attendance';
import { createAdminRouter } from './admin';
import { createAuthRouter } from './auth';

export interface ApiServices {
    attendanceService: AttendanceService;
    authService: AuthService;
}

export function createApiRouter({ attendanceService, authService }: ApiServices): Router {
    const router = Router();

    // Health check route
    router.get('/health', (req, res) => {
        res.json({
            status: 'OK',
            timestamp: new Date().toISOString(),
            service: 'Geolocation Attendance API'
        });
    });

    // Admin login / logout
    router.use('/auth', createAuthRouter(authService));

    // User check-in, check-out and history
    router.use('/attendance', createAttendanceRouter(attendanceService));

    // Admin review and export
    router.use('/admin', createAdminRouter(attendanceService, authService));

    return router;
}
