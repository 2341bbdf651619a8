import { Request, Response, NextFunction, RequestHandler } from 'express';
import { normalizeIp } from '../services/locationService';

// Utility functions

/**
 * Forward rejections from async route handlers to the error middleware
 */
export const asyncHandler = (
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => (req, res, next) => {
    fn(req, res, next).catch(next);
};

/**
 * Caller address as Express sees it (honours `trust proxy`)
 */
export const getClientIp = (req: Request): string | undefined => {
    return normalizeIp(req.ip || req.socket.remoteAddress);
};

/**
 * Read a single string query parameter, ignoring repeated or nested values
 */
export const getQueryString = (req: Request, name: string): string | undefined => {
    const value = req.query[name];
    return typeof value === 'string' && value !== '' ? value : undefined;
};
