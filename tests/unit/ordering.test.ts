/**
 * Ordering Tests
 */
import { describe, it, expect } from 'vitest';
import { mergeByPriority, sortEntries } from '../../src/pipeline/ordering.js';
import { makeEntry } from '../helpers/entries.js';

describe('Ordering', () => {
    const a = makeEntry({ url: 'https://example.com/a', extra: { score: 10 }, publishedAt: '2024-05-01T00:00:00.000Z' });
    const b = makeEntry({ url: 'https://example.com/b', extra: { score: 30 } });
    const c = makeEntry({ url: 'https://example.com/c', extra: {}, publishedAt: '2024-05-03T00:00:00.000Z' });
    const d = makeEntry({ url: 'https://example.com/d', extra: { score: 10 }, publishedAt: '2024-05-02T00:00:00.000Z' });

    it('should merge by priority, then configuration order', () => {
        const merged = mergeByPriority([
            { priority: 1, index: 0, entries: [a] },
            { priority: 0, index: 2, entries: [b] },
            { priority: 0, index: 1, entries: [c, d] },
        ]);
        expect(merged.map(entry => entry.url)).toEqual([
            'https://example.com/c',
            'https://example.com/d',
            'https://example.com/b',
            'https://example.com/a',
        ]);
    });

    it('should keep merge order for none', () => {
        expect(sortEntries([a, b, c, d], 'none')).toEqual([a, b, c, d]);
    });

    it('should sort by score descending, stable, unscored last', () => {
        expect(sortEntries([a, c, b, d], 'score')).toEqual([b, a, d, c]);
    });

    it('should sort by recency with undated entries last', () => {
        expect(sortEntries([a, b, c, d], 'recency')).toEqual([c, d, a, b]);
    });
});
