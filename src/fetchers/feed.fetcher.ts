/**
 * Syndication Feed Fetcher
 * Parses RSS/Atom feeds into entries
 */
import Parser from 'rss-parser';
import { z } from 'zod';
import { SourceUnavailableError, errorMessage } from '../errors.js';
import { normalizeEntry } from '../normalizers/entry.normalizer.js';
import { htmlToText, toAbsoluteHttpUrl, toIsoDate, truncate } from '../normalizers/text.js';
import { fetchText, ACCEPT_FEED } from '../services/http.js';
import type { Logger } from '../observability/logger.js';
import type { SourceKind, SyndicationFeedSourceConfig } from '../config/sources.js';
import type { Entry, Fetcher, FetchResult } from './types.js';

const SUMMARY_MAX_LENGTH = 500;

interface FeedItemExtras {
    id?: string;
    mediaContent?: unknown;
    mediaThumbnail?: unknown;
}

const parser = new Parser<Record<string, unknown>, FeedItemExtras>({
    customFields: {
        item: [
            ['media:content', 'mediaContent', { keepArray: true }],
            ['media:thumbnail', 'mediaThumbnail'],
        ],
    },
});

const mediaNodeSchema = z.object({
    $: z.object({
        url: z.string(),
        medium: z.string().optional(),
        type: z.string().optional(),
    }),
});

const mediaNodesSchema = z.union([mediaNodeSchema, z.array(mediaNodeSchema)]);

type FeedItem = Parser.Item & FeedItemExtras;

function isImageMedia(node: z.infer<typeof mediaNodeSchema>): boolean {
    const { medium, type } = node.$;
    if (!medium && !type) return true;
    return medium === 'image' || Boolean(type?.startsWith('image/'));
}

/**
 * Image URLs the feed advertises: image enclosures, then media:content and media:thumbnail
 */
function collectMediaHints(item: FeedItem): string[] {
    const hints: string[] = [];

    if (item.enclosure?.url && item.enclosure.type?.toLowerCase().startsWith('image/')) {
        hints.push(item.enclosure.url);
    }

    for (const raw of [item.mediaContent, item.mediaThumbnail]) {
        const parsed = mediaNodesSchema.safeParse(raw);
        if (!parsed.success) continue;
        const nodes = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
        for (const node of nodes) {
            if (isImageMedia(node)) hints.push(node.$.url);
        }
    }

    return hints;
}

export interface FeedSource {
    name: string;
    kind: SourceKind;
    feedUrl: string;
}

/**
 * Parse feed XML into entries. Throws when the document is not a feed;
 * items without a usable link are skipped.
 */
export async function parseFeedEntries(xml: string, source: FeedSource, log: Logger): Promise<FetchResult> {
    const feed = await parser.parseString(xml);
    // Relative item links resolve against the channel link, then the feed URL
    const baseUrl = toAbsoluteHttpUrl(feed.link, source.feedUrl) ?? source.feedUrl;
    const fetchedAt = new Date().toISOString();
    const entries: Entry[] = [];
    let skipped = 0;
    let errors = 0;

    for (const item of feed.items) {
        if (!item.link) {
            skipped++;
            continue;
        }

        const link = toAbsoluteHttpUrl(item.link, baseUrl) ?? item.link;

        try {
            const rawSummary = item.contentSnippet || item.summary || item.content || '';
            entries.push(normalizeEntry({
                externalId: item.guid || item.id || link,
                source: source.kind,
                sourceName: source.name,
                contentType: 'news',
                title: item.title || 'Untitled',
                summary: truncate(htmlToText(rawSummary), SUMMARY_MAX_LENGTH),
                url: link,
                publishedAt: toIsoDate(item.isoDate ?? item.pubDate),
                mediaHints: collectMediaHints(item),
                extra: {
                    feedTitle: feed.title,
                    feedUrl: source.feedUrl,
                    author: item.creator || undefined,
                    categories: item.categories,
                },
            }, fetchedAt));
        } catch (itemError) {
            errors++;
            log.warn('Skipping malformed feed item', { link: item.link, error: errorMessage(itemError) });
        }
    }

    return {
        entries,
        metadata: {
            totalFetched: feed.items.length,
            skipped,
            errors,
        },
    };
}

export const feedFetcher: Fetcher<SyndicationFeedSourceConfig> = {
    sourceKind: 'SYNDICATION_FEED',
    supportsDateFilter: true,
    defaultImageStrategy: 'feed-hints',

    async fetch(config, context) {
        const log = context.logger;
        log.info('Fetching syndication feed', { url: config.url });

        let body: string;
        try {
            ({ body } = await fetchText(config.url, {
                timeoutMs: context.timeoutMs,
                userAgent: context.userAgent,
                accept: ACCEPT_FEED,
            }));
        } catch (error) {
            throw new SourceUnavailableError(config.name, errorMessage(error), { cause: error });
        }

        let result: FetchResult;
        try {
            result = await parseFeedEntries(body, { name: config.name, kind: 'SYNDICATION_FEED', feedUrl: config.url }, log);
        } catch (error) {
            throw new SourceUnavailableError(config.name, `Unparsable feed: ${errorMessage(error)}`, { cause: error });
        }

        log.info('Syndication feed fetched', {
            totalItems: result.entries.length,
            skipped: result.metadata.skipped,
            errors: result.metadata.errors,
        });

        return result;
    },
};
