/**
 * Per-source configuration
 * Validated with a Zod discriminated union on `type`
 */
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigInvalidError, errorMessage } from '../errors.js';

export const SOURCE_KINDS = [
    'STRUCTURED_API',
    'SYNDICATION_FEED',
    'SCHOLARLY_LISTING',
    'CUSTOM',
    'WEBSITE',
] as const;

export type SourceKind = typeof SOURCE_KINDS[number];

export const IMAGE_STRATEGIES = ['og-image', 'scholarly-figures', 'feed-hints', 'none'] as const;

export type ImageStrategy = typeof IMAGE_STRATEGIES[number];

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const httpUrlSchema = z.string().trim().url('Must be a valid URL').refine(
    value => value.startsWith('http://') || value.startsWith('https://'),
    'Must be an http(s) URL'
);

const daySchema = z.string().regex(DAY_PATTERN, 'Must be a YYYY-MM-DD date').refine(
    value => !Number.isNaN(Date.parse(`${value}T00:00:00Z`)),
    'Must be a valid calendar date'
);

const timestampSchema = z.string().refine(
    value => !Number.isNaN(Date.parse(value)),
    'Must be an ISO-8601 date or timestamp'
);

export const dateRangeSchema = z.object({
    start: timestampSchema,
    end: timestampSchema,
}).refine(
    range => Date.parse(range.start) <= Date.parse(range.end),
    { message: 'start must not be after end', path: ['start'] }
);

export type DateRangeInput = z.infer<typeof dateRangeSchema>;

const baseSourceSchema = z.object({
    name: z.string().trim().min(1, 'Source name is required'),
    limit: z.coerce.number().int().positive(),
    priority: z.number().int().optional(),
    date: daySchema.optional(),
    dateRange: dateRangeSchema.optional(),
    maxAgeDays: z.number().int().positive().optional(),
    imageStrategy: z.enum(IMAGE_STRATEGIES).optional(),
});

const structuredApiSchema = baseSourceSchema.extend({
    type: z.literal('STRUCTURED_API'),
    query: z.string().trim().min(1).default('AI'),
    overfetch: z.number().int().positive().max(50).default(20),
});

const syndicationFeedSchema = baseSourceSchema.extend({
    type: z.literal('SYNDICATION_FEED'),
    url: httpUrlSchema,
});

const scholarlyListingSchema = baseSourceSchema.extend({
    type: z.literal('SCHOLARLY_LISTING'),
    query: z.string().trim().min(1).default('artificial intelligence OR machine learning'),
    maxResults: z.number().int().positive().max(200).default(20),
});

const customFeedSchema = baseSourceSchema.extend({
    type: z.literal('CUSTOM'),
    url: httpUrlSchema,
});

const websiteSchema = baseSourceSchema.extend({
    type: z.literal('WEBSITE'),
    url: httpUrlSchema,
    keywords: z.array(z.string().min(1)).default([]),
    skipKeywords: z.array(z.string().min(1)).default([
        'login', 'log in', 'sign up', 'register', 'about us', 'contact', 'advertise', 'careers', 'privacy',
    ]),
});

export const sourceConfigSchema = z.discriminatedUnion('type', [
    structuredApiSchema,
    syndicationFeedSchema,
    scholarlyListingSchema,
    customFeedSchema,
    websiteSchema,
]);

export type SourceConfig = z.infer<typeof sourceConfigSchema>;
export type SourceConfigInput = z.input<typeof sourceConfigSchema>;

export type StructuredApiSourceConfig = z.infer<typeof structuredApiSchema>;
export type SyndicationFeedSourceConfig = z.infer<typeof syndicationFeedSchema>;
export type ScholarlyListingSourceConfig = z.infer<typeof scholarlyListingSchema>;
export type CustomFeedSourceConfig = z.infer<typeof customFeedSchema>;
export type WebsiteSourceConfig = z.infer<typeof websiteSchema>;

/**
 * Validate one source config, throwing ConfigInvalidError with every issue found
 */
export function validateSourceConfig(raw: unknown): SourceConfig {
    const result = sourceConfigSchema.safeParse(raw);

    if (!result.success) {
        const issues = result.error.issues.map(issue => {
            const path = issue.path.join('.') || '(root)';
            return `${path}: ${issue.message}`;
        });
        throw new ConfigInvalidError(
            `Invalid source config "${describeSource(raw)}": ${issues.join('; ')}`,
            issues
        );
    }

    return result.data;
}

/**
 * Best-effort display name for a raw (possibly invalid) source config
 */
export function describeSource(raw: unknown): string {
    if (typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string' && raw.name.trim()) {
        return raw.name.trim();
    }
    return 'unnamed';
}

/**
 * Read the sources file: a JSON array of source configs.
 * Individual entries are validated later, per source.
 */
export async function loadSourcesFile(path: string): Promise<unknown[]> {
    let content: string;
    try {
        content = await readFile(path, 'utf-8');
    } catch (error) {
        throw new ConfigInvalidError(`Cannot read sources file ${path}: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (error) {
        throw new ConfigInvalidError(`Sources file ${path} is not valid JSON: ${errorMessage(error)}`);
    }

    if (!Array.isArray(parsed)) {
        throw new ConfigInvalidError(`Invalid sources file format: expected a JSON array in ${path}`);
    }

    return parsed;
}
