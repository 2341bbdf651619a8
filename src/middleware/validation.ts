import { Request, Response, NextFunction } from 'express';
import { FieldError } from './errorHandler';
import { sanitizeString, sanitizeValue } from '../utils/validation';
import { isValidDateString } from '../utils/time';

/**
 * Validation result interface
 */
export interface ValidationResult {
    isValid: boolean;
    errors: FieldError[];
}

/**
 * Validation rule interface
 */
export interface ValidationRule {
    validate(req: Request): ValidationResult;
}

type Location = 'body' | 'params' | 'query';

/**
 * Base validation middleware factory
 */
export function validateRequest(validationRules: ValidationRule[]): (req: Request, res: Response, next: NextFunction) => void {
    return (req: Request, res: Response, next: NextFunction): void => {
        const errors: FieldError[] = [];

        for (const rule of validationRules) {
            const result = rule.validate(req);
            if (!result.isValid) {
                errors.push(...result.errors);
            }
        }

        if (errors.length > 0) {
            res.status(400).json({
                success: false,
                error: 'Validation failed',
                code: 'VALIDATION_ERROR',
                details: errors
            });
            return;
        }

        next();
    };
}

/**
 * Shared field lookup for rules that check a single request field
 */
abstract class FieldRule implements ValidationRule {
    constructor(
        protected readonly field: string,
        protected readonly location: Location = 'body',
        protected readonly optional: boolean = false
    ) { }

    abstract validate(req: Request): ValidationResult;

    protected getValue(req: Request): unknown {
        switch (this.location) {
            case 'params':
                return req.params[this.field];
            case 'query':
                return req.query[this.field];
            default:
                return isRecord(req.body) ? req.body[this.field] : undefined;
        }
    }

    protected isAbsent(value: unknown): boolean {
        return value === undefined || value === null || value === '';
    }

    protected pass(): ValidationResult {
        return { isValid: true, errors: [] };
    }

    protected fail(message: string): ValidationResult {
        return { isValid: false, errors: [{ field: this.field, message }] };
    }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Required field validation rule; whitespace-only strings count as missing
 */
export class RequiredFieldRule extends FieldRule {
    constructor(field: string, location: Location = 'body', private readonly customMessage?: string) {
        super(field, location);
    }

    validate(req: Request): ValidationResult {
        const value = this.getValue(req);
        const missing = this.isAbsent(value) || (typeof value === 'string' && value.trim() === '');

        return missing ? this.fail(this.customMessage || `${this.field} is required`) : this.pass();
    }
}

/**
 * Type validation rule
 */
export class TypeValidationRule extends FieldRule {
    constructor(
        field: string,
        private readonly expectedType: 'string' | 'number' | 'boolean',
        location: Location = 'body',
        optional: boolean = false
    ) {
        super(field, location, optional);
    }

    validate(req: Request): ValidationResult {
        const value = this.getValue(req);

        if (this.optional && (value === undefined || value === null)) {
            return this.pass();
        }

        const isValid = this.expectedType === 'number'
            ? typeof value === 'number' && !isNaN(value)
            : typeof value === this.expectedType;

        return isValid ? this.pass() : this.fail(`${this.field} must be of type ${this.expectedType}`);
    }
}

/**
 * String length validation rule (measured after trimming)
 */
export class StringLengthRule extends FieldRule {
    constructor(
        field: string,
        private readonly minLength: number,
        private readonly maxLength: number,
        location: Location = 'body',
        optional: boolean = false
    ) {
        super(field, location, optional);
    }

    validate(req: Request): ValidationResult {
        const value = this.getValue(req);

        if (this.optional && this.isAbsent(value)) {
            return this.pass();
        }

        if (typeof value !== 'string') {
            return this.fail(`${this.field} must be a string`);
        }

        const length = value.trim().length;
        return length >= this.minLength && length <= this.maxLength
            ? this.pass()
            : this.fail(`${this.field} must be between ${this.minLength} and ${this.maxLength} characters`);
    }
}

/**
 * Calendar date (YYYY-MM-DD) validation rule
 */
export class DateValidationRule extends FieldRule {
    validate(req: Request): ValidationResult {
        const value = this.getValue(req);

        if (this.optional && this.isAbsent(value)) {
            return this.pass();
        }

        return typeof value === 'string' && isValidDateString(value)
            ? this.pass()
            : this.fail(`${this.field} must be a date in YYYY-MM-DD format`);
    }
}

/**
 * Input sanitization middleware
 */
export function sanitizeInput(req: Request, res: Response, next: NextFunction): void {
    if (req.body && typeof req.body === 'object') {
        req.body = sanitizeValue(req.body);
    }

    for (const [key, value] of Object.entries(req.query)) {
        if (typeof value === 'string') {
            req.query[key] = sanitizeString(value);
        }
    }

    next();
}
