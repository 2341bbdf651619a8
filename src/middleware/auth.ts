import { Request, Response, NextFunction } from 'express';
import { AdminSession, AuthService } from '../services/authService';
import { verifyAdminToken, extractTokenFromHeader } from '../utils/auth';

// Extend Express Request interface to include the admin session
declare global {
    namespace Express {
        interface Request {
            adminSession?: AdminSession;
        }
    }
}

/**
 * Middleware gating admin routes: the bearer token must verify and the
 * session it names must still be open.
 */
export function authenticateAdmin(authService: AuthService) {
    return (req: Request, res: Response, next: NextFunction): void => {
        const token = extractTokenFromHeader(req.headers.authorization);

        if (!token) {
            res.status(401).json({
                success: false,
                error: 'Access token required',
                code: 'TOKEN_MISSING'
            });
            return;
        }

        let sessionId: string;
        try {
            sessionId = verifyAdminToken(token).sessionId;
        } catch (error) {
            const message = error instanceof Error ? error.message : 'Token validation failed';
            res.status(401).json({
                success: false,
                error: message,
                code: message === 'Token expired' ? 'TOKEN_EXPIRED' : 'TOKEN_INVALID'
            });
            return;
        }

        const session = authService.getSession(sessionId);
        if (!session) {
            res.status(401).json({
                success: false,
                error: 'Session has ended, please log in again',
                code: 'SESSION_ENDED'
            });
            return;
        }

        req.adminSession = session;
        next();
    };
}
