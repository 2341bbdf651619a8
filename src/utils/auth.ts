import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import { config } from '../config/environment';

const SALT_ROUNDS = 12;
const TOKEN_ISSUER = 'geo-attendance';
const TOKEN_AUDIENCE = 'geo-attendance-admin';

export interface AdminTokenPayload {
    sessionId: string;
    username: string;
    type: 'admin';
}

/**
 * Hash a password using bcrypt (for producing ADMIN_PASSWORD_HASH)
 */
export async function hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, SALT_ROUNDS);
}

/**
 * Verify a password against its hash
 */
export async function verifyPassword(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
}

/**
 * Sign a token that refers to an admin session
 */
export function generateAdminToken(sessionId: string, username: string, expiresInSeconds: number): string {
    const payload: AdminTokenPayload = {
        sessionId,
        username,
        type: 'admin'
    };

    return jwt.sign(payload, config.jwt.secret, {
        expiresIn: expiresInSeconds,
        issuer: TOKEN_ISSUER,
        audience: TOKEN_AUDIENCE
    });
}

const isAdminTokenPayload = (value: unknown): value is AdminTokenPayload => {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    const candidate: Record<string, unknown> = { ...value };
    return typeof candidate.sessionId === 'string' &&
        typeof candidate.username === 'string' &&
        candidate.type === 'admin';
};

/**
 * Verify and decode an admin token
 */
export function verifyAdminToken(token: string): AdminTokenPayload {
    let decoded: unknown;

    try {
        decoded = jwt.verify(token, config.jwt.secret, {
            issuer: TOKEN_ISSUER,
            audience: TOKEN_AUDIENCE
        });
    } catch (error) {
        if (error instanceof jwt.TokenExpiredError) {
            throw new Error('Token expired');
        }
        if (error instanceof jwt.JsonWebTokenError) {
            throw new Error('Invalid token');
        }
        throw error;
    }

    if (!isAdminTokenPayload(decoded)) {
        throw new Error('Invalid token');
    }

    return decoded;
}

/**
 * Extract token from Authorization header
 */
export function extractTokenFromHeader(authHeader: string | undefined): string | null {
    if (!authHeader) {
        return null;
    }

    const parts = authHeader.split(' ');
    if (parts.length !== 2 || parts[0] !== 'Bearer') {
        return null;
    }

    return parts[1];
}
