import { Request, Response, NextFunction } from 'express';
import { config } from '../config/environment';

export type ErrorCode =
    | 'VALIDATION_ERROR'
    | 'NOT_FOUND'
    | 'NO_ACTIVE_CHECKIN'
    | 'AUTHENTICATION_ERROR'
    | 'INTERNAL_SERVER_ERROR';

export class AppError extends Error {
    readonly statusCode: number;
    readonly code: ErrorCode;

    constructor(message: string, statusCode = 500, code: ErrorCode = 'INTERNAL_SERVER_ERROR') {
        super(message);
        this.name = new.target.name;
        this.statusCode = statusCode;
        this.code = code;
    }
}

export interface FieldError {
    field: string;
    message: string;
}

/** Bad input from the caller; nothing was written. */
export class ValidationError extends AppError {
    readonly details: FieldError[];

    constructor(message: string, details: FieldError[] = []) {
        super(message, 400, 'VALIDATION_ERROR');
        this.details = details;
    }
}

export class NotFoundError extends AppError {
    constructor(message: string, code: ErrorCode = 'NOT_FOUND') {
        super(message, 404, code);
    }
}

export class AuthenticationError extends AppError {
    constructor(message = 'Authentication required') {
        super(message, 401, 'AUTHENTICATION_ERROR');
    }
}

export const errorHandler = (
    error: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const appError = error instanceof AppError ? error : isMalformedBody(error) ? new ValidationError('Malformed JSON body') : null;
    const statusCode = appError?.statusCode ?? 500;
    const code = appError?.code ?? 'INTERNAL_SERVER_ERROR';
    const message = appError ? appError.message : 'Internal Server Error';

    if (statusCode >= 500) {
        console.error(`Error ${statusCode} on ${req.method} ${req.path}: ${error.message}`);
        console.error(error.stack);
    } else {
        console.warn(`${code} on ${req.method} ${req.path}: ${message}`);
    }

    res.status(statusCode).json({
        success: false,
        error: message,
        code,
        ...(error instanceof ValidationError && error.details.length > 0 && { details: error.details }),
        ...(config.nodeEnv === 'development' && statusCode >= 500 && { stack: error.stack })
    });
};

// body-parser marks unparsable request bodies this way
const isMalformedBody = (error: Error): boolean =>
    error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
