/**
 * Hacker News Fetcher
 * Uses the Algolia search API, ordered by points
 */
import { z } from 'zod';
import { SourceUnavailableError, errorMessage } from '../errors.js';
import { normalizeEntry } from '../normalizers/entry.normalizer.js';
import { htmlToText, toIsoDate } from '../normalizers/text.js';
import { fetchText, ACCEPT_JSON } from '../services/http.js';
import type { StructuredApiSourceConfig } from '../config/sources.js';
import type { Entry, Fetcher } from './types.js';

const SEARCH_ENDPOINT = 'https://hn.algolia.com/api/v1/search';
const ITEM_URL = 'https://news.ycombinator.com/item?id=';
const MAX_HITS_PER_PAGE = 1000;

const hitSchema = z.object({
    objectID: z.string().min(1),
    title: z.string().nullish(),
    url: z.string().nullish(),
    created_at: z.string().nullish(),
    created_at_i: z.number().nullish(),
    story_text: z.string().nullish(),
    points: z.number().nullish(),
    num_comments: z.number().nullish(),
    author: z.string().nullish(),
});

type Hit = z.infer<typeof hitSchema>;

const searchResponseSchema = z.object({
    hits: z.array(z.unknown()),
});

export function buildSearchUrl(config: StructuredApiSourceConfig): string {
    const params = new URLSearchParams({
        query: config.query,
        tags: 'story',
        hitsPerPage: String(Math.min(config.limit * config.overfetch, MAX_HITS_PER_PAGE)),
    });
    return `${SEARCH_ENDPOINT}?${params.toString()}`;
}

export const hackerNewsFetcher: Fetcher<StructuredApiSourceConfig> = {
    sourceKind: 'STRUCTURED_API',
    supportsDateFilter: true,
    defaultImageStrategy: 'og-image',

    async fetch(config, context) {
        const log = context.logger;
        const searchUrl = buildSearchUrl(config);
        log.info('Fetching Hacker News stories', { query: config.query, url: searchUrl });

        let payload: unknown;
        try {
            const { body } = await fetchText(searchUrl, {
                timeoutMs: context.timeoutMs,
                userAgent: context.userAgent,
                accept: ACCEPT_JSON,
            });
            payload = JSON.parse(body);
        } catch (error) {
            throw new SourceUnavailableError(config.name, errorMessage(error), { cause: error });
        }

        const response = searchResponseSchema.safeParse(payload);
        if (!response.success) {
            throw new SourceUnavailableError(config.name, 'Search response has no hits array');
        }

        const hits: Hit[] = [];
        let errors = 0;
        for (const raw of response.data.hits) {
            const hit = hitSchema.safeParse(raw);
            if (hit.success) {
                hits.push(hit.data);
            } else {
                errors++;
            }
        }

        // Stable: equal points keep API order. The aggregator applies the
        // date filter before the limit, hence the overfetch.
        hits.sort((a, b) => (b.points ?? 0) - (a.points ?? 0));

        const fetchedAt = new Date().toISOString();
        const entries: Entry[] = [];
        let skipped = 0;

        for (const hit of hits) {
            if (!hit.title?.trim()) {
                skipped++;
                continue;
            }

            try {
                entries.push(normalizeEntry({
                    externalId: hit.objectID,
                    source: 'STRUCTURED_API',
                    sourceName: config.name,
                    contentType: 'news',
                    title: hit.title,
                    summary: htmlToText(hit.story_text),
                    url: hit.url || `${ITEM_URL}${hit.objectID}`,
                    publishedAt: toIsoDate(hit.created_at ?? hit.created_at_i),
                    extra: {
                        score: hit.points ?? 0,
                        comments: hit.num_comments ?? 0,
                        author: hit.author ?? undefined,
                    },
                }, fetchedAt));
            } catch (itemError) {
                errors++;
                log.warn('Skipping malformed Hacker News hit', {
                    objectID: hit.objectID,
                    error: errorMessage(itemError),
                });
            }
        }

        log.info('Hacker News stories fetched', {
            totalHits: response.data.hits.length,
            totalItems: entries.length,
            skipped,
            errors,
        });

        return {
            entries,
            metadata: {
                totalFetched: response.data.hits.length,
                skipped,
                errors,
            },
        };
    },
};
