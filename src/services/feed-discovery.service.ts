import * as cheerio from 'cheerio';
import { fetchText, ACCEPT_FEED } from './http.js';
import type { FetchTextOptions } from './http.js';
import type { Logger } from '../observability/logger.js';
import { errorMessage } from '../errors.js';

export interface DiscoveredFeed {
    url: string;
    title?: string;
    type: 'RSS' | 'ATOM' | 'XML';
}

export interface ProbedFeed extends DiscoveredFeed {
    body: string;           // Already fetched while probing
}

const COMMON_FEED_PATHS = ['/feed', '/feed.xml', '/rss', '/rss.xml', '/atom.xml'];

const FEED_ROOT_PATTERN = /<(rss|feed|rdf:RDF)[\s>]/i;

export function classifyFeedType(typeHint: string): DiscoveredFeed['type'] {
    const normalized = typeHint.toLowerCase();
    if (normalized.includes('atom')) {
        return 'ATOM';
    }
    if (normalized.includes('rss')) {
        return 'RSS';
    }
    return 'XML';
}

/**
 * Sniff the root element of a body; null when it is not a feed
 */
export function parseFeedTypeFromBody(body: string): DiscoveredFeed['type'] | null {
    const match = FEED_ROOT_PATTERN.exec(body.slice(0, 2000));
    if (!match) {
        return null;
    }
    switch (match[1].toLowerCase()) {
        case 'feed':
            return 'ATOM';
        case 'rss':
            return 'RSS';
        default:
            return 'XML';
    }
}

/**
 * Read `<link rel="alternate">` feed links from an HTML page, in document order
 */
export function discoverFeedLinks(html: string, pageUrl: string): DiscoveredFeed[] {
    const $ = cheerio.load(html);
    const discovered: DiscoveredFeed[] = [];
    const seen = new Set<string>();

    $('link[rel~="alternate"][href]').each((_, element) => {
        const link = $(element);
        const typeAttr = (link.attr('type') || '').toLowerCase();
        if (!typeAttr.includes('rss') && !typeAttr.includes('atom') && !typeAttr.includes('xml')) {
            return;
        }

        const href = link.attr('href');
        if (!href) {
            return;
        }

        try {
            const absolute = new URL(href, pageUrl).toString();
            if (seen.has(absolute)) {
                return;
            }
            seen.add(absolute);
            discovered.push({
                url: absolute,
                title: link.attr('title') || undefined,
                type: classifyFeedType(typeAttr),
            });
        } catch {
            // Skip malformed feed URLs.
        }
    });

    return discovered;
}

/**
 * Try the usual feed locations of a site, returning the first that serves a
 * feed together with its body
 */
export async function probeCommonFeedPaths(
    pageUrl: string,
    options: FetchTextOptions,
    log?: Logger
): Promise<ProbedFeed | null> {
    for (const path of COMMON_FEED_PATHS) {
        const candidateUrl = new URL(path, pageUrl).toString();
        try {
            const { body } = await fetchText(candidateUrl, { ...options, accept: ACCEPT_FEED });
            const type = parseFeedTypeFromBody(body);
            if (type) {
                return { url: candidateUrl, type, body };
            }
        } catch (error) {
            log?.debug('Common feed path probe failed', {
                pageUrl,
                path,
                error: errorMessage(error),
            });
        }
    }

    return null;
}
