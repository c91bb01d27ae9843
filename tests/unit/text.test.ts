/**
 * Text Normalizer Tests
 */
import { describe, it, expect } from 'vitest';
import {
    collapseWhitespace,
    htmlToText,
    toAbsoluteHttpUrl,
    toIsoDate,
    truncate,
} from '../../src/normalizers/text.js';

describe('Text normalizers', () => {
    describe('htmlToText', () => {
        it('should strip tags and decode entities', () => {
            expect(htmlToText('<p>Fast &amp; cheap</p>')).toBe('Fast & cheap');
        });

        it('should decode double-escaped bodies', () => {
            expect(htmlToText('&lt;p&gt;Hello &amp;amp; welcome&lt;/p&gt;')).toBe('Hello & welcome');
        });

        it('should leave comparison signs alone', () => {
            expect(htmlToText('a < b and c > d')).toBe('a < b and c > d');
        });

        it('should return an empty string for missing input', () => {
            expect(htmlToText(undefined)).toBe('');
            expect(htmlToText(null)).toBe('');
        });
    });

    it('should collapse whitespace', () => {
        expect(collapseWhitespace('  two\n\t words  ')).toBe('two words');
    });

    it('should truncate with an ellipsis only when too long', () => {
        expect(truncate('abcdef', 3)).toBe('abc...');
        expect(truncate('abc', 3)).toBe('abc');
    });

    describe('toIsoDate', () => {
        it('should read epoch seconds and milliseconds', () => {
            expect(toIsoDate(1700000000)).toBe('2023-11-14T22:13:20.000Z');
            expect(toIsoDate(1700000000000)).toBe('2023-11-14T22:13:20.000Z');
        });

        it('should parse date strings', () => {
            expect(toIsoDate('2024-03-05')).toBe('2024-03-05T00:00:00.000Z');
            expect(toIsoDate('Wed, 01 May 2024 08:00:00 GMT')).toBe('2024-05-01T08:00:00.000Z');
        });

        it('should return undefined for unusable values', () => {
            expect(toIsoDate('garbage')).toBeUndefined();
            expect(toIsoDate('')).toBeUndefined();
            expect(toIsoDate(null)).toBeUndefined();
        });
    });

    describe('toAbsoluteHttpUrl', () => {
        it('should resolve relative and protocol-relative references', () => {
            expect(toAbsoluteHttpUrl('/a', 'https://x.example.com/b/c')).toBe('https://x.example.com/a');
            expect(toAbsoluteHttpUrl('//cdn.example.com/i.png', 'https://x.example.com/')).toBe('https://cdn.example.com/i.png');
        });

        it('should reject non-http schemes and empty values', () => {
            expect(toAbsoluteHttpUrl('javascript:alert(1)')).toBeNull();
            expect(toAbsoluteHttpUrl('data:image/png;base64,AAAA')).toBeNull();
            expect(toAbsoluteHttpUrl('   ')).toBeNull();
            expect(toAbsoluteHttpUrl('relative/only')).toBeNull();
        });
    });
});
