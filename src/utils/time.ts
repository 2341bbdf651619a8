import { format, isValid, parse, startOfMonth } from 'date-fns';

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';
export const DATE_FORMAT = 'yyyy-MM-dd';

/** Local server clock, no timezone suffix, as stored in the attendance table. */
export const formatTimestamp = (date: Date): string => format(date, TIMESTAMP_FORMAT);

export const formatDate = (date: Date): string => format(date, DATE_FORMAT);

/**
 * Strict YYYY-MM-DD check; rejects impossible dates such as 2024-02-30.
 */
export const isValidDateString = (value: string): boolean => {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
        return false;
    }
    const parsed = parse(value, DATE_FORMAT, new Date());
    return isValid(parsed) && formatDate(parsed) === value;
};

/**
 * Default admin filter window: first day of the current month through today.
 */
export const defaultDateRange = (now: Date = new Date()): { from: string; to: string } => ({
    from: formatDate(startOfMonth(now)),
    to: formatDate(now)
});
