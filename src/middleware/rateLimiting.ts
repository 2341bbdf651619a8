import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { Request, Response } from 'express';

/**
 * Rate limiting configuration for different endpoint types.
 * Factories rather than singletons so every app instance counts on its own.
 */

const limitExceeded = (error: string, code: string, retryAfter: string) =>
    (req: Request, res: Response): void => {
        res.status(429).json({
            success: false,
            error,
            code,
            retryAfter
        });
    };

/**
 * General API rate limiter - applies to all API endpoints
 */
export const createGeneralRateLimit = (): RateLimitRequestHandler => rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    limit: 1000,
    standardHeaders: true,
    legacyHeaders: false,
    handler: limitExceeded('Too many requests from this IP, please try again later', 'RATE_LIMIT_EXCEEDED', '15 minutes')
});

/**
 * Admin login limiter - only failed attempts count
 */
export const createAuthRateLimit = (): RateLimitRequestHandler => rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    limit: 10,
    standardHeaders: true,
    legacyHeaders: false,
    skipSuccessfulRequests: true,
    handler: limitExceeded('Too many login attempts from this IP, please try again later', 'AUTH_RATE_LIMIT_EXCEEDED', '15 minutes')
});

/**
 * Check-in / check-out limiter; each call also costs a geolocation lookup
 */
export const createAttendanceRateLimit = (): RateLimitRequestHandler => rateLimit({
    windowMs: 5 * 60 * 1000, // 5 minutes
    limit: 30,
    standardHeaders: true,
    legacyHeaders: false,
    handler: limitExceeded('Too many attendance requests, please wait before trying again', 'ATTENDANCE_RATE_LIMIT_EXCEEDED', '5 minutes')
});
