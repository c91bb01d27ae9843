/**
 * Website Fetcher
 * Scrapes headline links from a news page, filtered by keywords.
 */
import * as cheerio from 'cheerio';
import { SourceUnavailableError, errorMessage } from '../errors.js';
import { normalizeEntry } from '../normalizers/entry.normalizer.js';
import { collapseWhitespace, toAbsoluteHttpUrl } from '../normalizers/text.js';
import { fetchText, ACCEPT_HTML } from '../services/http.js';
import type { WebsiteSourceConfig } from '../config/sources.js';
import type { Entry, Fetcher } from './types.js';

const MIN_TITLE_LENGTH = 10;
const MAX_TITLE_LENGTH = 100;

function matchesAny(text: string, terms: readonly string[]): boolean {
    const lowered = text.toLowerCase();
    return terms.some(term => lowered.includes(term.toLowerCase()));
}

/**
 * Whether anchor text reads like a headline worth keeping
 */
export function isHeadline(title: string, config: Pick<WebsiteSourceConfig, 'keywords' | 'skipKeywords'>): boolean {
    if (title.length < MIN_TITLE_LENGTH || title.length > MAX_TITLE_LENGTH) {
        return false;
    }
    if (matchesAny(title, config.skipKeywords)) {
        return false;
    }
    return config.keywords.length === 0 || matchesAny(title, config.keywords);
}

export const websiteFetcher: Fetcher<WebsiteSourceConfig> = {
    sourceKind: 'WEBSITE',
    supportsDateFilter: false,
    defaultImageStrategy: 'og-image',

    async fetch(config, context) {
        const log = context.logger;
        log.info('Fetching website source', { url: config.url });

        let html: string;
        let pageUrl: string;
        try {
            ({ body: html, url: pageUrl } = await fetchText(config.url, {
                timeoutMs: context.timeoutMs,
                userAgent: context.userAgent,
                accept: ACCEPT_HTML,
            }));
        } catch (error) {
            throw new SourceUnavailableError(config.name, errorMessage(error), { cause: error });
        }

        const $ = cheerio.load(html);
        const fetchedAt = new Date().toISOString();
        const seenUrls = new Set<string>();
        const entries: Entry[] = [];
        const anchors = $('a[href]').toArray();
        let skipped = 0;

        for (const element of anchors) {
            if (entries.length >= config.limit) {
                break;
            }

            const anchor = $(element);
            const title = collapseWhitespace(anchor.text());
            if (!isHeadline(title, config)) {
                continue;
            }

            const absoluteUrl = toAbsoluteHttpUrl(anchor.attr('href'), pageUrl);
            if (!absoluteUrl || seenUrls.has(absoluteUrl)) {
                skipped++;
                continue;
            }
            seenUrls.add(absoluteUrl);

            entries.push(normalizeEntry({
                source: 'WEBSITE',
                sourceName: config.name,
                contentType: 'news',
                title,
                url: absoluteUrl,
                extra: { pageUrl },
            }, fetchedAt));
        }

        log.info('Website source fetched', { anchors: anchors.length, totalItems: entries.length, skipped });

        return {
            entries,
            metadata: {
                totalFetched: entries.length,
                skipped,
                errors: 0,
            },
        };
    },
};
