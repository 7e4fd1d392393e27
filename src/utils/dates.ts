/**
 * Calendar-day helpers. Dates are ISO strings (YYYY-MM-DD) interpreted in UTC,
 * matching the timestamps in arXiv feeds.
 */

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
    if (!ISO_DATE.test(value)) return false;
    const parsed = new Date(`${value}T00:00:00Z`);
    return !isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

export function toIsoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

export function today(now: Date = new Date()): string {
    return toIsoDate(now);
}

export function addDays(isoDate: string, days: number): string {
    const date = new Date(`${isoDate}T00:00:00Z`);
    date.setUTCDate(date.getUTCDate() + days);
    return toIsoDate(date);
}

/**
 * arXiv `submittedDate` bound, e.g. "2024-05-01" → "202405010000".
 */
export function toArxivTimestamp(isoDate: string, time: '0000' | '2359'): string {
    return `${isoDate.replace(/-/g, '')}${time}`;
}
