/**
 * Feed Discovery Tests
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    classifyFeedType,
    discoverFeedLinks,
    parseFeedTypeFromBody,
    probeCommonFeedPaths,
} from '../../src/services/feed-discovery.service.js';
import { createFetchRouter, htmlResponse, xmlResponse } from '../helpers/fetch-router.js';

describe('Feed Discovery', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should classify feed MIME types', () => {
        expect(classifyFeedType('application/atom+xml')).toBe('ATOM');
        expect(classifyFeedType('application/RSS+xml')).toBe('RSS');
        expect(classifyFeedType('text/xml')).toBe('XML');
    });

    it('should sniff the feed root element', () => {
        expect(parseFeedTypeFromBody('<?xml version="1.0"?><rss version="2.0">')).toBe('RSS');
        expect(parseFeedTypeFromBody('<feed xmlns="http://www.w3.org/2005/Atom">')).toBe('ATOM');
        expect(parseFeedTypeFromBody('<rdf:RDF xmlns:rdf="x">')).toBe('XML');
        expect(parseFeedTypeFromBody('<html><body>feedback</body></html>')).toBeNull();
    });

    it('should read alternate links in document order, resolved and deduplicated', () => {
        const html = `<html><head>
          <link rel="stylesheet" href="/style.css" type="text/css">
          <link rel="alternate" type="application/atom+xml" href="/atom.xml" title="Atom">
          <link rel="alternate" type="text/html" href="/print">
          <link rel="alternate" type="application/rss+xml" href="https://blog.example.com/rss">
          <link rel="alternate" type="application/atom+xml" href="atom.xml">
        </head></html>`;

        expect(discoverFeedLinks(html, 'https://blog.example.com/')).toEqual([
            { url: 'https://blog.example.com/atom.xml', title: 'Atom', type: 'ATOM' },
            { url: 'https://blog.example.com/rss', title: undefined, type: 'RSS' },
        ]);
    });

    it('should probe common paths until one serves a feed', async () => {
        const router = createFetchRouter({
            'https://blog.example.com/feed': htmlResponse('<html><body>Not here</body></html>'),
            'https://blog.example.com/rss': xmlResponse('<rss version="2.0"><channel></channel></rss>'),
        });
        vi.stubGlobal('fetch', router.fetch);

        const found = await probeCommonFeedPaths('https://blog.example.com/news/', {
            timeoutMs: 1000,
            userAgent: 'test-agent',
        });

        expect(found).toEqual({
            url: 'https://blog.example.com/rss',
            type: 'RSS',
            body: '<rss version="2.0"><channel></channel></rss>',
        });
        expect(router.calls).toEqual([
            'https://blog.example.com/feed',
            'https://blog.example.com/feed.xml',
            'https://blog.example.com/rss',
        ]);
    });

    it('should return null when no common path serves a feed', async () => {
        const router = createFetchRouter({});
        vi.stubGlobal('fetch', router.fetch);

        const found = await probeCommonFeedPaths('https://blog.example.com/', {
            timeoutMs: 1000,
            userAgent: 'test-agent',
        });

        expect(found).toBeNull();
        expect(router.calls).toHaveLength(5);
    });
});
