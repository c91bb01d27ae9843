/**
 * Source Config Tests
 */
import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigInvalidError } from '../../src/errors.js';
import { describeSource, loadSourcesFile, validateSourceConfig } from '../../src/config/sources.js';

function captureConfigError(raw: unknown): ConfigInvalidError {
    try {
        validateSourceConfig(raw);
    } catch (error) {
        if (error instanceof ConfigInvalidError) return error;
        throw error;
    }
    throw new Error('Expected ConfigInvalidError');
}

describe('Source config', () => {
    describe('validateSourceConfig', () => {
        it('should apply adapter defaults and coerce the limit', () => {
            const parsed = validateSourceConfig({ name: 'hacker_news', type: 'STRUCTURED_API', limit: '3' });

            expect(parsed).toEqual({
                name: 'hacker_news',
                type: 'STRUCTURED_API',
                limit: 3,
                query: 'AI',
                overfetch: 20,
            });
        });

        it('should reject a non-positive limit', () => {
            const error = captureConfigError({ name: 'hn', type: 'STRUCTURED_API', limit: 0 });

            expect(error.code).toBe('CONFIG_INVALID');
            expect(error.issues).toHaveLength(1);
            expect(error.issues[0].startsWith('limit: ')).toBe(true);
            expect(error.message.startsWith('Invalid source config "hn"')).toBe(true);
        });

        it('should reject an unknown type', () => {
            const error = captureConfigError({ name: 'mystery', type: 'NOPE', limit: 1 });
            expect(error.issues[0].startsWith('type: ')).toBe(true);
        });

        it('should reject an impossible calendar date', () => {
            const error = captureConfigError({ name: 'feed', type: 'SYNDICATION_FEED', url: 'https://example.com/feed', limit: 1, date: '2024-13-45' });
            expect(error.issues).toEqual(['date: Must be a valid calendar date']);
        });

        it('should reject a date range that ends before it starts', () => {
            const error = captureConfigError({
                name: 'feed',
                type: 'SYNDICATION_FEED',
                url: 'https://example.com/feed',
                limit: 1,
                dateRange: { start: '2024-05-02', end: '2024-05-01' },
            });
            expect(error.issues).toEqual(['dateRange.start: start must not be after end']);
        });

        it('should reject a non-http url', () => {
            const error = captureConfigError({ name: 'feed', type: 'CUSTOM', url: 'ftp://example.com/list', limit: 1 });
            expect(error.issues).toEqual(['url: Must be an http(s) URL']);
        });
    });

    it('should describe sources by name, even invalid ones', () => {
        expect(describeSource({ name: ' arxiv ' })).toBe('arxiv');
        expect(describeSource({ limit: 1 })).toBe('unnamed');
        expect(describeSource(null)).toBe('unnamed');
    });

    describe('loadSourcesFile', () => {
        let dir: string | undefined;

        afterEach(async () => {
            if (dir) await rm(dir, { recursive: true, force: true });
            dir = undefined;
        });

        it('should return the raw array', async () => {
            dir = await mkdtemp(join(tmpdir(), 'digest-sources-'));
            const path = join(dir, 'sources.json');
            await writeFile(path, JSON.stringify([{ name: 'a' }, { name: 'b' }]));

            await expect(loadSourcesFile(path)).resolves.toEqual([{ name: 'a' }, { name: 'b' }]);
        });

        it('should reject a file that is not an array', async () => {
            dir = await mkdtemp(join(tmpdir(), 'digest-sources-'));
            const path = join(dir, 'sources.json');
            await writeFile(path, JSON.stringify({ name: 'a' }));

            await expect(loadSourcesFile(path)).rejects.toThrow(ConfigInvalidError);
        });

        it('should reject a missing file', async () => {
            await expect(loadSourcesFile(join(tmpdir(), 'digest-does-not-exist.json'))).rejects.toThrow(ConfigInvalidError);
        });
    });
});
