/**
 * Entry Normalizer
 * Turns adapter-level drafts into the shared Entry shape
 */
import { ItemMalformedError } from '../errors.js';
import { entryIdFor } from '../services/dedup.service.js';
import type { SourceKind } from '../config/sources.js';
import type { ContentType, Entry } from '../fetchers/types.js';
import { collapseWhitespace, toAbsoluteHttpUrl } from './text.js';

export interface EntryDraft {
    externalId?: string;
    source: SourceKind;
    sourceName: string;
    contentType?: ContentType;
    title?: string | null;
    summary?: string;
    url?: string | null;
    publishedAt?: string;
    mediaHints?: string[];
    extra?: Record<string, unknown>;
}

export function normalizeEntry(draft: EntryDraft, fetchedAt: string = new Date().toISOString()): Entry {
    const url = toAbsoluteHttpUrl(draft.url);
    if (!url) {
        throw new ItemMalformedError(`Item has no usable link: ${JSON.stringify(draft.url ?? null)}`);
    }

    return {
        id: entryIdFor(url),
        externalId: draft.externalId?.trim() || url,
        source: draft.source,
        sourceName: draft.sourceName,
        contentType: draft.contentType ?? 'news',
        title: collapseWhitespace(draft.title),
        summary: draft.summary ?? '',
        url,
        publishedAt: draft.publishedAt,
        imageCandidates: [],
        mediaHints: (draft.mediaHints ?? []).flatMap(hint => toAbsoluteHttpUrl(hint, url) ?? []),
        extra: draft.extra ?? {},
        fetchedAt,
    };
}
