/**
 * Configuration module with Zod schema validation
 * Fail-fast with actionable error messages
 */
import { z } from 'zod';

// Custom validators
const positiveIntSchema = z.coerce.number().int().positive();
const booleanFlagSchema = z.enum(['true', 'false']).default('false').transform(v => v === 'true');

// Configuration schema
const configSchema = z.object({
    // Inputs & outputs
    sourcesFile: z.string().min(1).default('sources.json'),
    outputPath: z.string().min(1).default('digest.json'),
    imageOutputDir: z.string().min(1).default('./images'),
    downloadImages: booleanFlagSchema,
    metricsOutputPath: z.string().nullable().default(null),

    // HTTP
    httpTimeoutMs: positiveIntSchema.default(10000),
    userAgent: z.string().min(1).default('TopicDigest/1.0 (Content Aggregation)'),

    // Worker pools
    sourceConcurrency: positiveIntSchema.default(4),
    extractConcurrency: positiveIntSchema.default(3),
    downloadConcurrency: positiveIntSchema.default(4),

    // Image heuristics
    minImageDimension: positiveIntSchema.default(200),
    maxImagesPerEntry: positiveIntSchema.default(5),
    maxImageBytes: positiveIntSchema.default(10 * 1024 * 1024),

    // Run-wide date window (YYYY-MM-DD, whole UTC day)
    digestDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be a YYYY-MM-DD date').nullable().default(null),

    // Ordering
    sortBy: z.enum(['none', 'score', 'recency']).default('none'),

    // Logging
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Map environment variables to config object
 */
function mapEnvToConfig(): Record<string, unknown> {
    return {
        sourcesFile: process.env.SOURCES_FILE,
        outputPath: process.env.OUTPUT_PATH,
        imageOutputDir: process.env.IMAGE_OUTPUT_DIR,
        downloadImages: process.env.DOWNLOAD_IMAGES,
        metricsOutputPath: process.env.METRICS_OUTPUT_PATH || null,

        httpTimeoutMs: process.env.HTTP_TIMEOUT_MS,
        userAgent: process.env.USER_AGENT,

        sourceConcurrency: process.env.SOURCE_CONCURRENCY,
        extractConcurrency: process.env.EXTRACT_CONCURRENCY,
        downloadConcurrency: process.env.DOWNLOAD_CONCURRENCY,

        minImageDimension: process.env.MIN_IMAGE_DIMENSION,
        maxImagesPerEntry: process.env.MAX_IMAGES_PER_ENTRY,
        maxImageBytes: process.env.MAX_IMAGE_BYTES,

        digestDate: process.env.DIGEST_DATE || null,
        sortBy: process.env.SORT_BY,
        logLevel: process.env.LOG_LEVEL,
    };
}

/**
 * Load and validate configuration
 * Fails fast with clear error messages
 */
function loadConfig(): Config {
    const rawConfig = mapEnvToConfig();

    const result = configSchema.safeParse(rawConfig);

    if (!result.success) {
        const errors = result.error.issues.map(issue => {
            const path = issue.path.join('.');
            const envVar = pathToEnvVar(path);
            return `  - ${envVar}: ${issue.message}`;
        });

        console.error('\n❌ Configuration Error\n');
        console.error('The following environment variables are missing or invalid:\n');
        console.error(errors.join('\n'));
        console.error('\nSee .env.example for available configuration.\n');

        process.exit(1);
    }

    return result.data;
}

/**
 * Convert config path to environment variable name
 */
function pathToEnvVar(path: string): string {
    return path
        .replace(/([A-Z])/g, '_$1')
        .toUpperCase()
        .replace(/^_/, '');
}

// Export singleton config
export const config = loadConfig();
