/**
 * Prometheus metrics for aggregation runs
 */
import client from 'prom-client';

// Create a Registry
export const registry = new client.Registry();

// Add default metrics (process CPU, memory, etc.)
client.collectDefaultMetrics({ register: registry });

// ============================================================================
// SOURCE METRICS
// ============================================================================

/**
 * Counter: Source adapter runs by source and outcome
 */
export const sourceFetchesTotal = new client.Counter({
    name: 'digest_source_fetches_total',
    help: 'Total number of source adapter runs',
    labelNames: ['source', 'status'] as const,
    registers: [registry],
});

/**
 * Histogram: Source adapter duration in seconds
 */
export const sourceFetchDuration = new client.Histogram({
    name: 'digest_source_fetch_duration_seconds',
    help: 'Source adapter fetch duration in seconds',
    labelNames: ['source'] as const,
    buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
    registers: [registry],
});

/**
 * Counter: Entries kept per source after date filtering and limits
 */
export const entriesTotal = new client.Counter({
    name: 'digest_entries_total',
    help: 'Entries kept per source after filtering and limits',
    labelNames: ['source'] as const,
    registers: [registry],
});

/**
 * Counter: Items skipped because they could not be parsed
 */
export const itemsSkippedTotal = new client.Counter({
    name: 'digest_items_skipped_total',
    help: 'Source items skipped as malformed',
    labelNames: ['source'] as const,
    registers: [registry],
});

// ============================================================================
// IMAGE METRICS
// ============================================================================

/**
 * Counter: Image candidates discovered by kind
 */
export const imageCandidatesTotal = new client.Counter({
    name: 'digest_image_candidates_total',
    help: 'Image candidates discovered',
    labelNames: ['kind'] as const,
    registers: [registry],
});

/**
 * Counter: Image downloads by outcome
 */
export const imageDownloadsTotal = new client.Counter({
    name: 'digest_image_downloads_total',
    help: 'Image download attempts by outcome',
    labelNames: ['status'] as const,
    registers: [registry],
});

/**
 * Counter: Bytes written to the image directory
 */
export const imageBytesTotal = new client.Counter({
    name: 'digest_image_bytes_total',
    help: 'Total image bytes written to disk',
    registers: [registry],
});

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Get metrics as Prometheus text format
 */
export async function getMetrics(): Promise<string> {
    return registry.metrics();
}
