/**
 * Custom Source Fetcher
 * Accepts a JSON list, an RSS/Atom feed, or an HTML page that links to a feed
 */
import { SourceUnavailableError, errorMessage } from '../errors.js';
import { normalizeEntry } from '../normalizers/entry.normalizer.js';
import { htmlToText, toIsoDate, truncate } from '../normalizers/text.js';
import { fetchText, ACCEPT_FEED } from '../services/http.js';
import type { FetchedText, FetchTextOptions } from '../services/http.js';
import {
    discoverFeedLinks,
    parseFeedTypeFromBody,
    probeCommonFeedPaths,
} from '../services/feed-discovery.service.js';
import type { Logger } from '../observability/logger.js';
import type { CustomFeedSourceConfig } from '../config/sources.js';
import type { Entry, Fetcher, FetchResult } from './types.js';
import { parseFeedEntries } from './feed.fetcher.js';

const SUMMARY_MAX_LENGTH = 500;

const LIST_KEYS = ['data', 'items', 'results', 'articles', 'entries'];
const TITLE_KEYS = ['title', 'name', 'headline'];
const LINK_KEYS = ['url', 'link', 'href', 'sourceUrl'];
const SUMMARY_KEYS = ['summary', 'description', 'content', 'abstract'];
const DATE_KEYS = ['published', 'publish_time', 'created_at', 'pubDate', 'date'];
const IMAGE_KEYS = ['image', 'imageUrl', 'thumbnail', 'imgUrl'];

const CUSTOM_ACCEPT = 'application/json, application/rss+xml, application/atom+xml, text/xml, text/html;q=0.9, */*;q=0.5';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(item: Record<string, unknown>, keys: readonly string[]): string | undefined {
    for (const key of keys) {
        const value = item[key];
        if (typeof value === 'string' && value.trim()) {
            return value.trim();
        }
    }
    return undefined;
}

function pickDate(item: Record<string, unknown>): string | undefined {
    for (const key of DATE_KEYS) {
        const value = item[key];
        if (typeof value === 'string' || typeof value === 'number') {
            return toIsoDate(value);
        }
    }
    return undefined;
}

function looksLikeJson(page: FetchedText): boolean {
    if (page.contentType.includes('json')) return true;
    const first = page.body.trimStart().charAt(0);
    return first === '{' || first === '[';
}

function looksLikeHtml(page: FetchedText): boolean {
    return page.contentType.includes('html') || /<html[\s>]/i.test(page.body.slice(0, 2000));
}

/**
 * The item list of a JSON payload: a top-level array, or an array under
 * one of the usual keys. Null when the shape is not recognized.
 */
export function extractJsonItems(data: unknown): unknown[] | null {
    if (Array.isArray(data)) return data;
    if (!isRecord(data)) return null;

    for (const key of LIST_KEYS) {
        if (key in data) {
            const value = data[key];
            return Array.isArray(value) ? value : null;
        }
    }
    return null;
}

function mapJsonItems(items: unknown[], config: CustomFeedSourceConfig, log: Logger): FetchResult {
    const fetchedAt = new Date().toISOString();
    const entries: Entry[] = [];
    let skipped = 0;
    let errors = 0;

    for (const raw of items) {
        if (!isRecord(raw)) {
            errors++;
            continue;
        }

        const link = pickString(raw, LINK_KEYS);
        if (!link) {
            skipped++;
            continue;
        }

        try {
            const image = pickString(raw, IMAGE_KEYS);
            entries.push(normalizeEntry({
                source: 'CUSTOM',
                sourceName: config.name,
                contentType: 'news',
                title: pickString(raw, TITLE_KEYS) ?? 'Untitled',
                summary: truncate(htmlToText(pickString(raw, SUMMARY_KEYS)), SUMMARY_MAX_LENGTH),
                // Relative links resolve against the listing URL
                url: new URL(link, config.url).toString(),
                publishedAt: pickDate(raw),
                mediaHints: image ? [image] : [],
            }, fetchedAt));
        } catch (itemError) {
            errors++;
            log.warn('Skipping malformed custom item', { link, error: errorMessage(itemError) });
        }
    }

    return {
        entries,
        metadata: { totalFetched: items.length, skipped, errors },
    };
}

async function parseFeed(body: string, feedUrl: string, config: CustomFeedSourceConfig, log: Logger): Promise<FetchResult> {
    try {
        return await parseFeedEntries(body, { name: config.name, kind: 'CUSTOM', feedUrl }, log);
    } catch (error) {
        throw new SourceUnavailableError(config.name, `Unparsable feed at ${feedUrl}: ${errorMessage(error)}`, { cause: error });
    }
}

/**
 * Find a feed for an HTML page: alternate links first, then the usual paths
 */
interface ResolvedFeed {
    url: string;
    body?: string;          // Set when probing already downloaded it
}

async function resolveFeedFromPage(page: FetchedText, options: FetchTextOptions, log: Logger): Promise<ResolvedFeed | null> {
    const [linked] = discoverFeedLinks(page.body, page.url);
    if (linked) {
        return { url: linked.url };
    }
    const probed = await probeCommonFeedPaths(page.url, options, log);
    return probed ? { url: probed.url, body: probed.body } : null;
}

export const customFetcher: Fetcher<CustomFeedSourceConfig> = {
    sourceKind: 'CUSTOM',
    supportsDateFilter: true,
    defaultImageStrategy: 'feed-hints',

    async fetch(config, context) {
        const log = context.logger;
        const httpOptions: FetchTextOptions = {
            timeoutMs: context.timeoutMs,
            userAgent: context.userAgent,
        };
        log.info('Fetching custom source', { url: config.url });

        let page: FetchedText;
        try {
            page = await fetchText(config.url, { ...httpOptions, accept: CUSTOM_ACCEPT });
        } catch (error) {
            throw new SourceUnavailableError(config.name, errorMessage(error), { cause: error });
        }

        if (looksLikeJson(page)) {
            try {
                const items = extractJsonItems(JSON.parse(page.body));
                if (items) {
                    const result = mapJsonItems(items, config, log);
                    log.info('Custom source parsed as JSON', {
                        totalItems: result.entries.length,
                        skipped: result.metadata.skipped,
                    });
                    return result;
                }
                log.debug('JSON shape not recognized, trying feed formats');
            } catch (error) {
                log.debug('Body is not valid JSON, trying feed formats', { error: errorMessage(error) });
            }
        }

        if (parseFeedTypeFromBody(page.body)) {
            const result = await parseFeed(page.body, page.url, config, log);
            log.info('Custom source parsed as feed', { totalItems: result.entries.length });
            return result;
        }

        if (looksLikeHtml(page)) {
            const feed = await resolveFeedFromPage(page, httpOptions, log);
            if (!feed) {
                throw new SourceUnavailableError(config.name, 'HTML page advertises no feed');
            }

            log.info('Following discovered feed', { feedUrl: feed.url });
            if (feed.body !== undefined) {
                return parseFeed(feed.body, feed.url, config, log);
            }

            let feedBody: string;
            try {
                ({ body: feedBody } = await fetchText(feed.url, { ...httpOptions, accept: ACCEPT_FEED }));
            } catch (error) {
                throw new SourceUnavailableError(config.name, errorMessage(error), { cause: error });
            }
            return parseFeed(feedBody, feed.url, config, log);
        }

        throw new SourceUnavailableError(config.name, 'Payload is neither a JSON list, a feed nor an HTML page');
    },
};
