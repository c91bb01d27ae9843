/**
 * Deduplication service
 * Entry ids are canonical URLs, so the same article reached through two
 * sources collapses to one entry
 */
import { createHash } from 'crypto';
import type { Entry } from '../fetchers/types.js';

const TRACKING_PARAMS = [
    'utm_source',
    'utm_medium',
    'utm_campaign',
    'utm_content',
    'utm_term',
    'ref',
    'source',
    'fbclid',
    'gclid',
];

/**
 * Canonicalize URL for consistent deduplication
 */
export function canonicalizeUrl(url: string): string {
    try {
        const parsed = new URL(url.trim());
        // Remove tracking parameters
        TRACKING_PARAMS.forEach(param => parsed.searchParams.delete(param));
        // Remove trailing slash
        const path = parsed.pathname.replace(/\/+$/, '') || '/';
        // Lowercase hostname, drop fragment
        return `${parsed.protocol}//${parsed.host.toLowerCase()}${path}${parsed.search}`;
    } catch {
        // If URL parsing fails, hash it
        return createHash('sha256').update(url).digest('hex').substring(0, 32);
    }
}

/**
 * Stable entry id for a canonical link
 */
export function entryIdFor(url: string): string {
    return canonicalizeUrl(url);
}

export interface DedupResult {
    entries: Entry[];
    duplicates: Entry[];
}

/**
 * Keep the first entry for each id; later ones are dropped, not merged
 */
export function dedupeEntries(entries: readonly Entry[]): DedupResult {
    const seen = new Set<string>();
    const kept: Entry[] = [];
    const duplicates: Entry[] = [];

    for (const entry of entries) {
        if (seen.has(entry.id)) {
            duplicates.push(entry);
            continue;
        }
        seen.add(entry.id);
        kept.push(entry);
    }

    return { entries: kept, duplicates };
}
