/**
 * Utility functions for input validation and sanitizing
 */

export const MAX_USERNAME_LENGTH = 64;
export const MAX_REMARK_LENGTH = 500;

/**
 * Normalize free text: trim whitespace and drop control characters.
 * Tabs and line breaks survive so multi-line remarks keep their shape;
 * every other character is stored as typed.
 */
export function sanitizeString(input: string): string {
    return input
        .trim()
        .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, ''); // Remove control characters
}

/**
 * Recursively sanitize every string inside a parsed JSON body
 */
export function sanitizeValue(value: unknown): unknown {
    if (typeof value === 'string') {
        return sanitizeString(value);
    }

    if (Array.isArray(value)) {
        return value.map(item => sanitizeValue(item));
    }

    if (typeof value === 'object' && value !== null) {
        const sanitized: Record<string, unknown> = {};
        for (const [key, item] of Object.entries(value)) {
            sanitized[key] = sanitizeValue(item);
        }
        return sanitized;
    }

    return value;
}
