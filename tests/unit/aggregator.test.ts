/**
 * Aggregator Tests
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConfigInvalidError } from '../../src/errors.js';
import type { Entry } from '../../src/fetchers/types.js';
import { aggregate } from '../../src/pipeline/aggregator.js';
import { createLogger } from '../../src/observability/logger.js';
import { createFetchRouter, htmlResponse, jsonResponse, xmlResponse } from '../helpers/fetch-router.js';
import type { Route } from '../helpers/fetch-router.js';

const HN_SEARCH = 'https://hn.algolia.com/api/v1/search*';
const BLOG_FEED = 'https://blog.example.com/feed.xml';
const MIRROR_FEED = 'https://mirror.example.com/rss';

function rss(links: string[]): string {
    const items = links.map(link => `
    <item>
      <title>Story at ${link}</title>
      <link>${link}</link>
    </item>`).join('');
    return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0"><channel><title>Feed</title><link>https://example.com</link>${items}
</channel></rss>`;
}

const HN_HITS = {
    hits: [
        { objectID: '1', title: 'First story', url: 'https://a.example.com/one', points: 50 },
        { objectID: '2', title: 'Shared story', url: 'https://shared.example.com/story?utm_source=hn', points: 40 },
        { objectID: '3', title: 'Third story', url: 'https://a.example.com/three', points: 10 },
    ],
};

const hackerNews = { name: 'hn', type: 'STRUCTURED_API', query: 'ai', limit: 2, imageStrategy: 'none' };
const blog = { name: 'blog', type: 'SYNDICATION_FEED', url: BLOG_FEED, limit: 1, imageStrategy: 'none' };
const mirror = { name: 'mirror', type: 'SYNDICATION_FEED', url: MIRROR_FEED, limit: 3, imageStrategy: 'none' };

const baseRoutes: Record<string, Route> = {
    [HN_SEARCH]: jsonResponse(HN_HITS),
    [BLOG_FEED]: xmlResponse(rss(['https://blog.example.com/b1', 'https://blog.example.com/b2'])),
    [MIRROR_FEED]: xmlResponse(rss([
        'https://shared.example.com/story/',
        'https://mirror.example.com/c2',
        'https://mirror.example.com/c3',
    ])),
};

const options = { sortBy: 'none', logger: createLogger({ runId: 'test-run' }) } as const;

function withoutFetchedAt(entries: Entry[]) {
    return entries.map(({ fetchedAt: _fetchedAt, ...rest }) => rest);
}

describe('Aggregator', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should limit per source, merge in configuration order and drop duplicates', async () => {
        vi.stubGlobal('fetch', createFetchRouter(baseRoutes).fetch);

        const result = await aggregate([hackerNews, blog, mirror], options);

        expect(result.entries.map(entry => entry.url)).toEqual([
            'https://a.example.com/one',
            'https://shared.example.com/story?utm_source=hn',
            'https://blog.example.com/b1',
            'https://mirror.example.com/c2',
            'https://mirror.example.com/c3',
        ]);
        expect(result.entries[1].sourceName).toBe('hn');
        expect(result.stats).toEqual({
            total: 5,
            news: 5,
            papers: 0,
            duplicatesDropped: 1,
            sourcesOk: 3,
            sourcesFailed: 0,
            sourcesInvalid: 0,
        });
        expect(result.sources.map(report => [report.name, report.status, report.fetched, report.kept])).toEqual([
            ['hn', 'ok', 3, 2],
            ['blog', 'ok', 2, 1],
            ['mirror', 'ok', 3, 3],
        ]);
    });

    it('should let a lower priority value win a duplicate', async () => {
        vi.stubGlobal('fetch', createFetchRouter(baseRoutes).fetch);

        const result = await aggregate([hackerNews, blog, { ...mirror, priority: -1 }], options);

        expect(result.entries.map(entry => entry.url)).toEqual([
            'https://shared.example.com/story/',
            'https://mirror.example.com/c2',
            'https://mirror.example.com/c3',
            'https://a.example.com/one',
            'https://blog.example.com/b1',
        ]);
        expect(result.entries[0].sourceName).toBe('mirror');
        expect(result.stats.duplicatesDropped).toBe(1);
    });

    it('should give the same entries with a failing source as without it', async () => {
        vi.stubGlobal('fetch', createFetchRouter({
            ...baseRoutes,
            [BLOG_FEED]: new Error('connect ECONNREFUSED'),
        }).fetch);
        const withFailure = await aggregate([hackerNews, blog, mirror], options);

        vi.stubGlobal('fetch', createFetchRouter(baseRoutes).fetch);
        const withoutSource = await aggregate([hackerNews, mirror], options);

        expect(withoutFetchedAt(withFailure.entries)).toEqual(withoutFetchedAt(withoutSource.entries));
        expect(withFailure.sources[1]).toMatchObject({
            name: 'blog',
            status: 'failed',
            kept: 0,
            error: 'blog: connect ECONNREFUSED',
        });
        expect(withFailure.stats.sourcesFailed).toBe(1);
    });

    it('should apply the run-wide date window, keeping undated entries', async () => {
        vi.stubGlobal('fetch', createFetchRouter({
            [HN_SEARCH]: jsonResponse({
                hits: [
                    { objectID: '1', title: 'Too early', url: 'https://a.example.com/early', points: 30, created_at: '2024-04-30T23:59:59Z' },
                    { objectID: '2', title: 'Last second', url: 'https://a.example.com/late', points: 20, created_at: '2024-05-01T23:59:59Z' },
                    { objectID: '3', title: 'Undated', url: 'https://a.example.com/undated', points: 10 },
                ],
            }),
        }).fetch);

        const result = await aggregate([{ ...hackerNews, limit: 5 }], {
            ...options,
            dateRange: { start: '2024-05-01', end: '2024-05-01' },
        });

        expect(result.entries.map(entry => entry.url)).toEqual([
            'https://a.example.com/late',
            'https://a.example.com/undated',
        ]);
        expect(result.sources[0]).toMatchObject({ fetched: 3, outOfRange: 1, kept: 2 });
    });

    it('should let the run-wide window replace a source recency window', async () => {
        vi.stubGlobal('fetch', createFetchRouter({
            [HN_SEARCH]: jsonResponse({
                hits: [
                    { objectID: '1', title: 'On the day', url: 'https://a.example.com/day', points: 30, created_at: '2024-05-10T10:00:00Z' },
                    { objectID: '2', title: 'Last week', url: 'https://a.example.com/week', points: 20, created_at: '2024-05-03T10:00:00Z' },
                ],
            }),
        }).fetch);

        const result = await aggregate([{ ...hackerNews, limit: 5, maxAgeDays: 30 }], {
            ...options,
            dateRange: { start: '2024-05-10', end: '2024-05-10' },
            now: new Date('2024-05-12T00:00:00.000Z'),
        });

        expect(result.entries.map(entry => entry.publishedAt)).toEqual(['2024-05-10T10:00:00.000Z']);
        expect(result.sources[0].outOfRange).toBe(1);
    });

    it('should ignore date windows for website sources', async () => {
        vi.stubGlobal('fetch', createFetchRouter({
            'https://news.example.com/': htmlResponse(`<html><body>
              <a href="/a">Model release draws attention</a>
              <a href="/b">Benchmark results are published</a>
            </body></html>`),
        }).fetch);

        const result = await aggregate([{
            name: 'portal',
            type: 'WEBSITE',
            url: 'https://news.example.com/',
            limit: 5,
            date: '2020-01-01',
            imageStrategy: 'none',
        }], options);

        expect(result.entries.map(entry => entry.url)).toEqual([
            'https://news.example.com/a',
            'https://news.example.com/b',
        ]);
        expect(result.sources[0].outOfRange).toBe(0);
    });

    it('should report invalid configs in place and run the rest', async () => {
        vi.stubGlobal('fetch', createFetchRouter(baseRoutes).fetch);

        const result = await aggregate([
            { name: 'broken', type: 'SYNDICATION_FEED', limit: 1 },
            blog,
            { type: 'CARRIER_PIGEON', limit: 1 },
        ], options);

        expect(result.sources.map(report => [report.name, report.type, report.status])).toEqual([
            ['broken', 'SYNDICATION_FEED', 'config_invalid'],
            ['blog', 'SYNDICATION_FEED', 'ok'],
            ['unnamed', 'CARRIER_PIGEON', 'config_invalid'],
        ]);
        expect(result.sources[0].error).toContain('url');
        expect(result.entries.map(entry => entry.url)).toEqual(['https://blog.example.com/b1']);
        expect(result.stats.sourcesInvalid).toBe(2);
    });

    it('should return an empty result for no sources', async () => {
        const router = createFetchRouter({});
        vi.stubGlobal('fetch', router.fetch);

        const result = await aggregate([], options);

        expect(result.entries).toEqual([]);
        expect(result.sources).toEqual([]);
        expect(result.stats.total).toBe(0);
        expect(router.calls).toEqual([]);
    });

    it('should reject an invalid run-wide date window', async () => {
        await expect(aggregate([blog], {
            ...options,
            dateRange: { start: '2024-05-02', end: '2024-05-01' },
        })).rejects.toBeInstanceOf(ConfigInvalidError);
    });

    it('should attach og:image candidates for news sources', async () => {
        vi.stubGlobal('fetch', createFetchRouter({
            [HN_SEARCH]: jsonResponse({
                hits: [
                    { objectID: '1', title: 'Illustrated', url: 'https://a.example.com/post', points: 5 },
                    { objectID: '2', title: 'Plain', url: 'https://a.example.com/plain', points: 1 },
                ],
            }),
            'https://a.example.com/post': htmlResponse(
                '<html><head><meta property="og:image" content="/images/cover.png"></head></html>'
            ),
        }).fetch);

        const result = await aggregate([{ name: 'hn', type: 'STRUCTURED_API', query: 'ai', limit: 2 }], options);

        expect(result.entries.map(entry => entry.imageCandidates)).toEqual([
            [{ url: 'https://a.example.com/images/cover.png', kind: 'og-image' }],
            [],
        ]);
    });
});
