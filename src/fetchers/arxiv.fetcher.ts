/**
 * arXiv Fetcher
 * Queries the arXiv export API (Atom) for recent submissions
 */
import Parser from 'rss-parser';
import { z } from 'zod';
import { SourceUnavailableError, errorMessage } from '../errors.js';
import { normalizeEntry } from '../normalizers/entry.normalizer.js';
import { collapseWhitespace, toIsoDate, truncate } from '../normalizers/text.js';
import { fetchText, ACCEPT_FEED } from '../services/http.js';
import type { ScholarlyListingSourceConfig } from '../config/sources.js';
import type { Entry, Fetcher } from './types.js';

const QUERY_ENDPOINT = 'https://export.arxiv.org/api/query';
const ABS_URL = 'https://arxiv.org/abs/';
const SUMMARY_MAX_LENGTH = 300;

interface ArxivItemExtras {
    id?: string;
    authors?: unknown;
}

const parser = new Parser<Record<string, unknown>, ArxivItemExtras>({
    customFields: {
        item: [['author', 'authors', { keepArray: true }]],
    },
});

const authorsSchema = z.array(z.object({
    name: z.array(z.string()).min(1),
}));

export function buildQueryUrl(config: ScholarlyListingSourceConfig): string {
    const params = new URLSearchParams({
        search_query: `all:${config.query}`,
        start: '0',
        max_results: String(config.maxResults),
        sortBy: 'submittedDate',
        sortOrder: 'descending',
    });
    return `${QUERY_ENDPOINT}?${params.toString()}`;
}

/**
 * `http://arxiv.org/abs/2401.01234v2` -> `2401.01234`
 */
export function parseArxivId(rawId: string | undefined): string | null {
    if (!rawId) return null;
    const marker = rawId.lastIndexOf('/abs/');
    const tail = marker >= 0 ? rawId.slice(marker + '/abs/'.length) : rawId;
    const id = tail.trim().replace(/v\d+$/, '');
    return id || null;
}

function joinAuthors(raw: unknown): string {
    const parsed = authorsSchema.safeParse(raw);
    if (!parsed.success) return '';
    return parsed.data.map(author => collapseWhitespace(author.name[0])).join(', ');
}

export const arxivFetcher: Fetcher<ScholarlyListingSourceConfig> = {
    sourceKind: 'SCHOLARLY_LISTING',
    supportsDateFilter: true,
    defaultImageStrategy: 'scholarly-figures',

    async fetch(config, context) {
        const log = context.logger;
        const queryUrl = buildQueryUrl(config);
        log.info('Fetching arXiv listing', { query: config.query, maxResults: config.maxResults });

        let body: string;
        try {
            ({ body } = await fetchText(queryUrl, {
                timeoutMs: context.timeoutMs,
                userAgent: context.userAgent,
                accept: ACCEPT_FEED,
            }));
        } catch (error) {
            throw new SourceUnavailableError(config.name, errorMessage(error), { cause: error });
        }

        let feed: Awaited<ReturnType<typeof parser.parseString>>;
        try {
            feed = await parser.parseString(body);
        } catch (error) {
            throw new SourceUnavailableError(config.name, `Unparsable Atom response: ${errorMessage(error)}`, { cause: error });
        }

        const fetchedAt = new Date().toISOString();
        const entries: Entry[] = [];
        const seenIds = new Set<string>();
        let skipped = 0;
        let errors = 0;

        for (const item of feed.items) {
            const arxivId = parseArxivId(item.id);
            if (!arxivId || seenIds.has(arxivId)) {
                skipped++;
                continue;
            }
            seenIds.add(arxivId);

            try {
                entries.push(normalizeEntry({
                    externalId: arxivId,
                    source: 'SCHOLARLY_LISTING',
                    sourceName: config.name,
                    contentType: 'paper',
                    title: item.title,
                    summary: truncate(collapseWhitespace(item.summary), SUMMARY_MAX_LENGTH),
                    url: `${ABS_URL}${arxivId}`,
                    publishedAt: toIsoDate(item.isoDate ?? item.pubDate),
                    extra: {
                        arxivId,
                        authors: joinAuthors(item.authors),
                    },
                }, fetchedAt));
            } catch (itemError) {
                errors++;
                log.warn('Skipping malformed arXiv entry', { arxivId, error: errorMessage(itemError) });
            }
        }

        log.info('arXiv listing fetched', { totalItems: entries.length, skipped, errors });

        return {
            entries,
            metadata: {
                totalFetched: feed.items.length,
                skipped,
                errors,
            },
        };
    },
};
