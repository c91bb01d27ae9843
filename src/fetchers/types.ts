/**
 * Fetcher types and interfaces
 */
import type { Logger } from '../observability/logger.js';
import type { ImageStrategy, SourceConfig, SourceKind } from '../config/sources.js';

export type ContentType = 'news' | 'paper';

export type ImageKind = 'og-image' | 'figure' | 'image' | 'feed-image';

/**
 * Candidate illustrative image for an entry
 */
export interface ImageReference {
    url: string;
    kind: ImageKind;
    localPath?: string;     // Set once the downloader has the file on disk
}

/**
 * Normalized content record produced by a source adapter
 */
export interface Entry {
    id: string;             // Canonical URL key, shared across sources
    externalId: string;     // Source-native id
    source: SourceKind;
    sourceName: string;
    contentType: ContentType;
    title: string;
    summary: string;
    url: string;
    publishedAt?: string;   // ISO-8601, absent when the source has no date
    imageCandidates: ImageReference[];
    mediaHints: string[];   // Image URLs advertised by the payload itself
    extra: Record<string, unknown>;
    fetchedAt: string;
}

/**
 * Fetch result from a source
 */
export interface FetchResult {
    entries: Entry[];
    metadata: {
        totalFetched: number;
        skipped: number;
        errors: number;
    };
}

/**
 * Per-run settings handed to every adapter
 */
export interface FetchContext {
    logger: Logger;
    timeoutMs: number;
    userAgent: string;
}

/**
 * Fetcher interface - all fetchers must implement this
 */
export interface Fetcher<C extends SourceConfig = SourceConfig> {
    sourceKind: C['type'];
    supportsDateFilter: boolean;
    defaultImageStrategy: ImageStrategy;
    fetch(config: C, context: FetchContext): Promise<FetchResult>;
}
