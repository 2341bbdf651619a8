import { Router, Request, Response } from 'express';
import { AuthService, LoginCredentials } from '../services/authService';
import { authenticateAdmin } from '../middleware/auth';
import { AuthenticationError } from '../middleware/errorHandler';
import { validateRequest, RequiredFieldRule, TypeValidationRule } from '../middleware/validation';
import { createAuthRateLimit } from '../middleware/rateLimiting';
import { asyncHandler } from '../utils';
import { formatSuccessResponse } from '../utils/response';

export function createAuthRouter(authService: AuthService = new AuthService()): Router {
    const router = Router();
    const requireAdmin = authenticateAdmin(authService);

    /**
     * POST /api/auth/login
     * Check the admin credential pair and open a session
     */
    router.post('/login',
        createAuthRateLimit(),
        validateRequest([
            new RequiredFieldRule('username'),
            new RequiredFieldRule('password'),
            new TypeValidationRule('username', 'string'),
            new TypeValidationRule('password', 'string')
        ]),
        asyncHandler(async (req: Request, res: Response): Promise<void> => {
            const { username, password }: LoginCredentials = req.body;
            const result = await authService.login({ username, password });

            if (!result.success || !result.session || !result.token) {
                res.status(401).json({
                    success: false,
                    error: result.error,
                    code: 'LOGIN_FAILED'
                });
                return;
            }

            res.json(formatSuccessResponse({
                token: result.token,
                session: result.session
            }, 'Logged in as Admin'));
        }));

    /**
     * GET /api/auth/session
     * Current admin session
     */
    router.get('/session', requireAdmin, (req: Request, res: Response): void => {
        if (!req.adminSession) {
            throw new AuthenticationError();
        }
        res.json(formatSuccessResponse({ session: req.adminSession }, 'Session active'));
    });

    /**
     * POST /api/auth/logout
     * End the session; its token stops working immediately
     */
    router.post('/logout', requireAdmin, (req: Request, res: Response): void => {
        if (!req.adminSession) {
            throw new AuthenticationError();
        }
        authService.logout(req.adminSession.id);
        res.json(formatSuccessResponse(null, 'Logged out'));
    });

    return router;
}
