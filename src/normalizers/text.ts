/**
 * Text, date and URL normalization shared by the adapters
 */
import * as cheerio from 'cheerio';

const TAG_PATTERN = /<\/?[a-z][^>]*>/i;

export function collapseWhitespace(value: string | null | undefined): string {
    if (!value) return '';
    return value
        .replace(/[​-‍﻿]/g, '') // Remove zero-width characters
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Strip markup and decode entities. Bodies that were HTML-escaped twice
 * come out of the first pass as markup, so they get a second one.
 */
export function htmlToText(value: string | null | undefined): string {
    if (!value) return '';

    let text = cheerio.load(value, null, false).root().text();
    if (TAG_PATTERN.test(text)) {
        text = cheerio.load(text, null, false).root().text();
    }

    return collapseWhitespace(text);
}

export function truncate(value: string, maxLength: number): string {
    return value.length > maxLength ? `${value.slice(0, maxLength)}...` : value;
}

/**
 * Parse a date-ish value to ISO-8601; numbers are epoch seconds or milliseconds
 */
export function toIsoDate(value: unknown): string | undefined {
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
        const ms = value < 1e11 ? value * 1000 : value;
        return new Date(ms).toISOString();
    }

    if (typeof value === 'string' && value.trim()) {
        const ms = Date.parse(value.trim());
        return Number.isNaN(ms) ? undefined : new Date(ms).toISOString();
    }

    return undefined;
}

/**
 * Resolve a possibly relative reference to an absolute http(s) URL
 */
export function toAbsoluteHttpUrl(candidate: string | null | undefined, base?: string): string | null {
    const trimmed = candidate?.trim();
    if (!trimmed) return null;

    try {
        const resolved = base ? new URL(trimmed, base) : new URL(trimmed);
        if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
            return null;
        }
        return resolved.href;
    } catch {
        return null;
    }
}
