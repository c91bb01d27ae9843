#!/usr/bin/env node
/**
 * Topic Digest - Main entry point
 *
 * One run:
 * - Loads source configs from the sources file
 * - Aggregates entries and image candidates
 * - Optionally downloads the images
 * - Writes the digest document (and metrics, when configured)
 */
import { writeFile } from 'fs/promises';
import { config } from './config/index.js';
import { loadSourcesFile } from './config/sources.js';
import { downloadAll } from './media/index.js';
import type { DownloadReport } from './media/index.js';
import { logger } from './observability/logger.js';
import { getMetrics } from './observability/metrics.js';
import { aggregate, buildDigestDocument, writeDigestDocument } from './pipeline/index.js';

async function main(): Promise<void> {
    logger.info('Starting topic digest run...');
    logger.info('Configuration loaded', {
        sourcesFile: config.sourcesFile,
        outputPath: config.outputPath,
        downloadImages: config.downloadImages,
        imageOutputDir: config.imageOutputDir,
        digestDate: config.digestDate,
        sortBy: config.sortBy,
        logLevel: config.logLevel,
    });

    const sources = await loadSourcesFile(config.sourcesFile);

    // A date-only range covers that whole UTC day
    const result = await aggregate(sources, {
        dateRange: config.digestDate
            ? { start: config.digestDate, end: config.digestDate }
            : undefined,
    });

    let entries = result.entries;
    let downloads: DownloadReport | undefined;
    if (config.downloadImages) {
        const downloaded = await downloadAll(entries, {
            outputDir: config.imageOutputDir,
            timeoutMs: config.httpTimeoutMs,
            userAgent: config.userAgent,
            concurrency: config.downloadConcurrency,
            maxBytes: config.maxImageBytes,
            logger: logger.child({ runId: result.runId, stage: 'download' }),
        });
        entries = downloaded.entries;
        downloads = downloaded.report;
    }

    const document = buildDigestDocument({ result, entries, date: config.digestDate, downloads });
    await writeDigestDocument(config.outputPath, document);
    logger.info('Digest written', {
        outputPath: config.outputPath,
        entries: document.entries.length,
        runId: result.runId,
    });

    if (config.metricsOutputPath) {
        await writeFile(config.metricsOutputPath, await getMetrics(), 'utf-8');
        logger.info('Metrics written', { metricsOutputPath: config.metricsOutputPath });
    }
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
    process.exit(1);
});

main().catch((error: unknown) => {
    logger.error('Digest run failed', error);
    process.exit(1);
});
