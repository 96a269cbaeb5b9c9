/**
 * Date utility functions for publish dates
 * Publish dates are carried as epoch milliseconds plus a YYYY-MM-DD string of the same instant (UTC)
 */

const DAY_MS = 24 * 60 * 60 * 1000;

const MONTHS: Record<string, number> = {
    jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
    jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

/**
 * Format epoch milliseconds as an ISO calendar date (YYYY-MM-DD, UTC)
 *
 * @example
 * ```typescript
 * toIsoDate(0) // '1970-01-01'
 * ```
 */
export function toIsoDate(epochMs: number): string {
    const date = new Date(epochMs);
    if (isNaN(date.getTime())) {
        return '1970-01-01';
    }
    return date.toISOString().substring(0, 10);
}

/**
 * Parse listing-page dates such as "Jan 05, 2024" or "January 5, 2024"
 *
 * @returns Epoch milliseconds at UTC midnight, or undefined if the text is not a date
 */
export function parseMonthDayYear(text: string): number | undefined {
    const match = text.trim().match(/^([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})$/);
    if (!match) {
        return undefined;
    }

    const month = MONTHS[match[1].substring(0, 3).toLowerCase()];
    if (month === undefined) {
        return undefined;
    }

    const day = parseInt(match[2], 10);
    const year = parseInt(match[3], 10);
    const epochMs = Date.UTC(year, month, day);
    // Reject day overflow such as "Feb 31"
    if (new Date(epochMs).getUTCDate() !== day) {
        return undefined;
    }
    return epochMs;
}

/**
 * Parse an ISO 8601 date or date-time string
 *
 * @returns Epoch milliseconds, or undefined if invalid
 */
export function parseIsoDate(dateString: string): number | undefined {
    if (!/^\d{4}-\d{2}-\d{2}/.test(dateString.trim())) {
        return undefined;
    }
    const time = new Date(dateString.trim()).getTime();
    return isNaN(time) ? undefined : time;
}

/**
 * Epoch milliseconds of the instant `days` days before `now`
 */
export function daysBefore(days: number, now: number = Date.now()): number {
    return now - days * DAY_MS;
}
