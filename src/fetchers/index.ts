/**
 * Source Router / Fetcher Dispatcher
 * Routes fetch requests to the adapter registered for the source type
 */
import type { ImageStrategy, SourceConfig, SourceKind } from '../config/sources.js';
import type { FetchContext, FetchResult } from './types.js';

import { hackerNewsFetcher } from './hacker-news.fetcher.js';
import { feedFetcher } from './feed.fetcher.js';
import { arxivFetcher } from './arxiv.fetcher.js';
import { customFetcher } from './custom.fetcher.js';
import { websiteFetcher } from './website.fetcher.js';

export interface FetcherTraits {
    supportsDateFilter: boolean;
    defaultImageStrategy: ImageStrategy;
}

// Register all fetchers
const fetchers = {
    STRUCTURED_API: hackerNewsFetcher,
    SYNDICATION_FEED: feedFetcher,
    SCHOLARLY_LISTING: arxivFetcher,
    CUSTOM: customFetcher,
    WEBSITE: websiteFetcher,
} as const;

/**
 * Capabilities of the adapter for a source type
 */
export function getFetcherTraits(sourceKind: SourceKind): FetcherTraits {
    const { supportsDateFilter, defaultImageStrategy } = fetchers[sourceKind];
    return { supportsDateFilter, defaultImageStrategy };
}

/**
 * Fetch content from a source
 */
export async function runFetcher(config: SourceConfig, context: FetchContext): Promise<FetchResult> {
    context.logger.debug('Routing fetch request', { sourceType: config.type });

    switch (config.type) {
        case 'STRUCTURED_API':
            return fetchers.STRUCTURED_API.fetch(config, context);
        case 'SYNDICATION_FEED':
            return fetchers.SYNDICATION_FEED.fetch(config, context);
        case 'SCHOLARLY_LISTING':
            return fetchers.SCHOLARLY_LISTING.fetch(config, context);
        case 'CUSTOM':
            return fetchers.CUSTOM.fetch(config, context);
        case 'WEBSITE':
            return fetchers.WEBSITE.fetch(config, context);
    }
}

// Re-export types
export * from './types.js';
