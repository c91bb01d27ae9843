import type { Entry } from '../fetchers/types.js';

export type SortKey = 'none' | 'score' | 'recency';

export interface SourceBatch {
    priority: number;
    index: number;              // Position in the sources file
    entries: Entry[];
}

/**
 * Concatenate batches by priority ascending, then configuration order
 */
export function mergeByPriority(batches: readonly SourceBatch[]): Entry[] {
    return [...batches]
        .sort((a, b) => a.priority - b.priority || a.index - b.index)
        .flatMap(batch => batch.entries);
}

function scoreOf(entry: Entry): number | null {
    const score = entry.extra.score;
    return typeof score === 'number' && Number.isFinite(score) ? score : null;
}

function timestampOf(entry: Entry): number | null {
    if (!entry.publishedAt) return null;
    const ms = Date.parse(entry.publishedAt);
    return Number.isNaN(ms) ? null : ms;
}

// Descending; entries without a value go last, keeping their order
function byDescending(valueOf: (entry: Entry) => number | null) {
    return (a: Entry, b: Entry): number => {
        const left = valueOf(a);
        const right = valueOf(b);
        if (left === null && right === null) return 0;
        if (left === null) return 1;
        if (right === null) return -1;
        return right - left;
    };
}

/**
 * Stable sort; `none` keeps merge order
 */
export function sortEntries(entries: readonly Entry[], sortBy: SortKey): Entry[] {
    switch (sortBy) {
        case 'score':
            return [...entries].sort(byDescending(scoreOf));
        case 'recency':
            return [...entries].sort(byDescending(timestampOf));
        case 'none':
            return [...entries];
    }
}
