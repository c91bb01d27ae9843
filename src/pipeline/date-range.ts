/**
 * Date windows for source filtering. Bounds are inclusive; a date-only
 * `end` covers that whole UTC day.
 */
import type { DateRangeInput, SourceConfig } from '../config/sources.js';
import type { Entry } from '../fetchers/types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export interface DateRange {
    start: Date;
    end: Date;
}

/**
 * The whole UTC day `YYYY-MM-DD`
 */
export function dayRange(day: string): DateRange {
    const start = Date.parse(`${day}T00:00:00.000Z`);
    return { start: new Date(start), end: new Date(start + DAY_MS - 1) };
}

export function toDateRange(input: DateRangeInput): DateRange {
    const start = DAY_PATTERN.test(input.start) ? dayRange(input.start).start : new Date(input.start);
    const end = DAY_PATTERN.test(input.end) ? dayRange(input.end).end : new Date(input.end);
    return { start, end };
}

/**
 * Effective window for a source: its own `dateRange`, then `date`, then the
 * run-wide window, then `maxAgeDays`. Null means unbounded.
 */
export function resolveDateRange(
    config: Pick<SourceConfig, 'dateRange' | 'date' | 'maxAgeDays'>,
    fallback?: DateRangeInput,
    now: Date = new Date()
): DateRange | null {
    if (config.dateRange) {
        return toDateRange(config.dateRange);
    }
    if (config.date) {
        return dayRange(config.date);
    }
    if (fallback) {
        return toDateRange(fallback);
    }
    if (config.maxAgeDays) {
        return { start: new Date(now.getTime() - config.maxAgeDays * DAY_MS), end: now };
    }
    return null;
}

/**
 * Undated entries always pass
 */
export function isWithinRange(entry: Pick<Entry, 'publishedAt'>, range: DateRange): boolean {
    if (!entry.publishedAt) {
        return true;
    }
    const published = Date.parse(entry.publishedAt);
    if (Number.isNaN(published)) {
        return true;
    }
    return published >= range.start.getTime() && published <= range.end.getTime();
}
