/**
 * Image Candidate Extractor
 * Discovers illustrative images for an entry using a per-source strategy
 */
import * as cheerio from 'cheerio';
import type { ImageStrategy } from '../config/sources.js';
import { errorMessage } from '../errors.js';
import type { Entry, ImageKind, ImageReference } from '../fetchers/types.js';
import { toAbsoluteHttpUrl } from '../normalizers/text.js';
import { imageCandidatesTotal } from '../observability/metrics.js';
import type { Logger } from '../observability/logger.js';
import { fetchText, ACCEPT_HTML } from '../services/http.js';

export interface ExtractOptions {
    logger: Logger;
    timeoutMs: number;
    userAgent: string;
    minImageDimension: number;
    maxImagesPerEntry: number;
}

const PAPER_HTML_URL = 'https://arxiv.org/html/';

// Rendered formulas and UI chrome, not figures
const EXCLUDED_SRC_TERMS = ['formula', 'inline', 'math', 'tex', 'equation', 'icon'];
const TEX_ALT_PATTERN = /\\[a-zA-Z]+|\$/;
const FIGURE_FILE_PATTERN = /(^|\/)x\d+\./i;

/**
 * Drop data URIs, non-http(s) URLs and repeats; first occurrence wins
 */
export function sanitizeCandidates(candidates: readonly ImageReference[]): ImageReference[] {
    const seen = new Set<string>();
    const kept: ImageReference[] = [];

    for (const candidate of candidates) {
        if (candidate.url.trim().toLowerCase().startsWith('data:')) continue;
        const url = toAbsoluteHttpUrl(candidate.url);
        if (!url || seen.has(url)) continue;
        seen.add(url);
        kept.push({ ...candidate, url });
    }

    return kept;
}

const PIXEL_PATTERN = /^\d+$/;

/**
 * First attribute value that is a plain pixel count; 0 when none is
 */
function readDimension(...values: Array<string | undefined>): number {
    for (const value of values) {
        const trimmed = value?.trim() ?? '';
        if (PIXEL_PATTERN.test(trimmed)) {
            return Number(trimmed);
        }
    }
    return 0;
}

/**
 * `og:image` of the entry's page, resolved against the final page URL
 */
export async function extractOgImage(entry: Entry, options: ExtractOptions): Promise<ImageReference[]> {
    const page = await fetchText(entry.url, {
        timeoutMs: options.timeoutMs,
        userAgent: options.userAgent,
        accept: ACCEPT_HTML,
    });

    const $ = cheerio.load(page.body);
    const content = $('meta[property="og:image"], meta[name="og:image"]').first().attr('content');
    const url = toAbsoluteHttpUrl(content, page.url);

    return url ? [{ url, kind: 'og-image' }] : [];
}

/**
 * Figures from a paper's HTML rendering, skipping formulas and small images.
 * Entries without an arXiv id have no such page.
 */
export async function extractScholarlyFigures(entry: Entry, options: ExtractOptions): Promise<ImageReference[]> {
    const arxivId = entry.extra.arxivId;
    if (typeof arxivId !== 'string' || !arxivId) {
        return [];
    }

    const htmlUrl = `${PAPER_HTML_URL}${arxivId}/`;
    const page = await fetchText(htmlUrl, {
        timeoutMs: options.timeoutMs,
        userAgent: options.userAgent,
        accept: ACCEPT_HTML,
    });

    const $ = cheerio.load(page.body);
    const found: ImageReference[] = [];

    $('img').each((_, element) => {
        const img = $(element);
        const src = (img.attr('src') || '').trim();
        if (!src || src.toLowerCase().startsWith('data:')) return;

        const lowerSrc = src.toLowerCase();
        if (EXCLUDED_SRC_TERMS.some(term => lowerSrc.includes(term))) return;
        if ((img.attr('class') || '').toLowerCase().includes('ltx_math')) return;
        if (TEX_ALT_PATTERN.test(img.attr('alt') || '')) return;

        const width = readDimension(img.attr('width'), img.attr('data-width'));
        const height = readDimension(img.attr('height'), img.attr('data-height'));
        if (width > 0 && height > 0 && (width < options.minImageDimension || height < options.minImageDimension)) {
            return;
        }

        const url = toAbsoluteHttpUrl(src, page.url);
        if (!url) return;

        const kind: ImageKind = img.closest('figure').length > 0 || FIGURE_FILE_PATTERN.test(src)
            ? 'figure'
            : 'image';
        found.push({ url, kind });
    });

    return sanitizeCandidates(found).slice(0, options.maxImagesPerEntry);
}

/**
 * Image URLs the source payload advertised
 */
export function extractFeedHints(entry: Entry): ImageReference[] {
    return entry.mediaHints.map((url): ImageReference => ({ url, kind: 'feed-image' }));
}

/**
 * Candidates for one entry. Never throws: a failed page fetch yields none.
 */
export async function extractImageCandidates(
    entry: Entry,
    strategy: ImageStrategy,
    options: ExtractOptions
): Promise<ImageReference[]> {
    let candidates: ImageReference[] = [];

    try {
        switch (strategy) {
            case 'og-image':
                candidates = await extractOgImage(entry, options);
                break;
            case 'scholarly-figures':
                candidates = await extractScholarlyFigures(entry, options);
                break;
            case 'feed-hints':
                candidates = extractFeedHints(entry);
                break;
            case 'none':
                break;
        }
    } catch (error) {
        options.logger.debug('Image extraction failed', {
            entryId: entry.id,
            strategy,
            error: errorMessage(error),
        });
        return [];
    }

    const sanitized = sanitizeCandidates(candidates);
    for (const candidate of sanitized) {
        imageCandidatesTotal.inc({ kind: candidate.kind });
    }
    return sanitized;
}
