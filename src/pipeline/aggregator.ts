/**
 * Aggregator
 * Runs every configured source, filters and limits per source, attaches
 * image candidates, then merges, dedups and optionally sorts.
 */
import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config/index.js';
import { dateRangeSchema, describeSource, validateSourceConfig } from '../config/sources.js';
import type { DateRangeInput, SourceConfig } from '../config/sources.js';
import { ConfigInvalidError, errorMessage } from '../errors.js';
import { getFetcherTraits, runFetcher } from '../fetchers/index.js';
import type { Entry } from '../fetchers/types.js';
import { extractImageCandidates } from '../media/extractor.js';
import { logger as rootLogger } from '../observability/logger.js';
import type { Logger } from '../observability/logger.js';
import {
    entriesTotal,
    itemsSkippedTotal,
    sourceFetchDuration,
    sourceFetchesTotal,
} from '../observability/metrics.js';
import { dedupeEntries } from '../services/dedup.service.js';
import { isWithinRange, resolveDateRange } from './date-range.js';
import { mergeByPriority, sortEntries } from './ordering.js';
import type { SortKey, SourceBatch } from './ordering.js';

export type SourceStatus = 'ok' | 'failed' | 'config_invalid';

export interface SourceReport {
    name: string;
    type: string | null;
    status: SourceStatus;
    priority: number;
    fetched: number;            // Entries the adapter returned
    outOfRange: number;         // Dropped by the date filter
    kept: number;               // After the per-source limit
    skipped: number;            // Malformed or link-less items
    durationMs: number;
    error?: string;
}

export interface AggregationStats {
    total: number;
    news: number;
    papers: number;
    duplicatesDropped: number;
    sourcesOk: number;
    sourcesFailed: number;
    sourcesInvalid: number;
}

export interface AggregationResult {
    runId: string;
    startedAt: string;
    completedAt: string;
    durationMs: number;
    entries: Entry[];
    sources: SourceReport[];
    stats: AggregationStats;
}

export interface AggregateOptions {
    dateRange?: DateRangeInput;     // Fallback window for sources without their own
    sortBy?: SortKey;
    sourceConcurrency?: number;
    extractConcurrency?: number;
    timeoutMs?: number;
    userAgent?: string;
    minImageDimension?: number;
    maxImagesPerEntry?: number;
    logger?: Logger;
    now?: Date;
}

interface ValidSource {
    index: number;
    config: SourceConfig;
}

interface RunSettings {
    timeoutMs: number;
    userAgent: string;
    dateRange?: DateRangeInput;
}

interface SourceOutcome {
    source: ValidSource;
    report: SourceReport;
    entries: Entry[];
}

function invalidReport(raw: unknown, error: ConfigInvalidError): SourceReport {
    const type = typeof raw === 'object' && raw !== null && 'type' in raw && typeof raw.type === 'string'
        ? raw.type
        : null;
    return {
        name: describeSource(raw),
        type,
        status: 'config_invalid',
        priority: 0,
        fetched: 0,
        outOfRange: 0,
        kept: 0,
        skipped: 0,
        durationMs: 0,
        error: error.message,
    };
}

/**
 * Fetch one source, then apply its date window and limit
 */
async function runSource(
    source: ValidSource,
    settings: RunSettings,
    log: Logger,
    now: Date
): Promise<SourceOutcome> {
    const sourceConfig = source.config;
    const sourceLog = log.child({ source: sourceConfig.name, stage: 'fetch' });
    const traits = getFetcherTraits(sourceConfig.type);
    const endTimer = sourceFetchDuration.startTimer({ source: sourceConfig.name });
    const started = Date.now();

    const base: SourceReport = {
        name: sourceConfig.name,
        type: sourceConfig.type,
        status: 'ok',
        priority: sourceConfig.priority ?? 0,
        fetched: 0,
        outOfRange: 0,
        kept: 0,
        skipped: 0,
        durationMs: 0,
    };

    try {
        const result = await runFetcher(sourceConfig, {
            logger: sourceLog,
            timeoutMs: settings.timeoutMs,
            userAgent: settings.userAgent,
        });

        let entries = result.entries;
        const range = traits.supportsDateFilter ? resolveDateRange(sourceConfig, settings.dateRange, now) : null;
        if (range) {
            entries = entries.filter(entry => isWithinRange(entry, range));
        }
        const outOfRange = result.entries.length - entries.length;
        entries = entries.slice(0, sourceConfig.limit);

        const skipped = result.metadata.skipped + result.metadata.errors;
        sourceFetchesTotal.inc({ source: sourceConfig.name, status: 'ok' });
        entriesTotal.inc({ source: sourceConfig.name }, entries.length);
        itemsSkippedTotal.inc({ source: sourceConfig.name }, skipped);

        return {
            source,
            entries,
            report: {
                ...base,
                fetched: result.entries.length,
                outOfRange,
                kept: entries.length,
                skipped,
                durationMs: Date.now() - started,
            },
        };
    } catch (error) {
        sourceLog.error('Source failed, continuing without it', error);
        sourceFetchesTotal.inc({ source: sourceConfig.name, status: 'failed' });

        return {
            source,
            entries: [],
            report: {
                ...base,
                status: 'failed',
                durationMs: Date.now() - started,
                error: errorMessage(error),
            },
        };
    } finally {
        endTimer();
    }
}

/**
 * Aggregate raw (unvalidated) source configs into one deduplicated entry list.
 * Invalid configs and failing sources are reported, never fatal.
 */
export async function aggregate(rawSources: readonly unknown[], options: AggregateOptions = {}): Promise<AggregationResult> {
    const runId = uuidv4();
    const now = options.now ?? new Date();
    const startedAt = new Date();
    const log = (options.logger ?? rootLogger).child({ runId, stage: 'aggregate' });

    if (options.dateRange) {
        const parsed = dateRangeSchema.safeParse(options.dateRange);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'dateRange'}: ${issue.message}`);
            throw new ConfigInvalidError(`Invalid date range: ${issues.join('; ')}`, issues);
        }
    }

    const settings: RunSettings = {
        dateRange: options.dateRange,
        timeoutMs: options.timeoutMs ?? config.httpTimeoutMs,
        userAgent: options.userAgent ?? config.userAgent,
    };

    // 1. Validate
    const valid: ValidSource[] = [];
    const reports: Array<SourceReport | null> = rawSources.map(() => null);
    rawSources.forEach((raw, index) => {
        try {
            valid.push({ index, config: validateSourceConfig(raw) });
        } catch (error) {
            if (!(error instanceof ConfigInvalidError)) throw error;
            log.warn('Invalid source config skipped', { source: describeSource(raw), issues: error.issues });
            reports[index] = invalidReport(raw, error);
        }
    });

    log.info('Aggregation started', { sources: rawSources.length, valid: valid.length });

    // 2-4. Fetch through the pool, filter, limit
    const sourceLimit = pLimit(options.sourceConcurrency ?? config.sourceConcurrency);
    const outcomes = await Promise.all(
        valid.map(source => sourceLimit(() => runSource(source, settings, log, now)))
    );

    // 5. Image candidates
    const extractLimit = pLimit(options.extractConcurrency ?? config.extractConcurrency);
    const extractLog = log.child({ stage: 'extract' });
    const extractOptions = {
        logger: extractLog,
        timeoutMs: settings.timeoutMs,
        userAgent: settings.userAgent,
        minImageDimension: options.minImageDimension ?? config.minImageDimension,
        maxImagesPerEntry: options.maxImagesPerEntry ?? config.maxImagesPerEntry,
    };

    const batches: SourceBatch[] = await Promise.all(outcomes.map(async outcome => {
        const sourceConfig = outcome.source.config;
        const strategy = sourceConfig.imageStrategy ?? getFetcherTraits(sourceConfig.type).defaultImageStrategy;
        const entries = await Promise.all(outcome.entries.map(entry =>
            extractLimit(async () => ({
                ...entry,
                imageCandidates: await extractImageCandidates(entry, strategy, extractOptions),
            }))
        ));
        reports[outcome.source.index] = outcome.report;
        return { priority: sourceConfig.priority ?? 0, index: outcome.source.index, entries };
    }));

    // 6-8. Merge, dedup, sort
    const merged = mergeByPriority(batches);
    const { entries: unique, duplicates } = dedupeEntries(merged);
    const entries = sortEntries(unique, options.sortBy ?? config.sortBy);

    const sources = reports.filter((report): report is SourceReport => report !== null);
    const completedAt = new Date();
    const stats: AggregationStats = {
        total: entries.length,
        news: entries.filter(entry => entry.contentType === 'news').length,
        papers: entries.filter(entry => entry.contentType === 'paper').length,
        duplicatesDropped: duplicates.length,
        sourcesOk: sources.filter(report => report.status === 'ok').length,
        sourcesFailed: sources.filter(report => report.status === 'failed').length,
        sourcesInvalid: sources.filter(report => report.status === 'config_invalid').length,
    };

    log.info('Aggregation complete', { ...stats, durationMs: completedAt.getTime() - startedAt.getTime() });

    return {
        runId,
        startedAt: startedAt.toISOString(),
        completedAt: completedAt.toISOString(),
        durationMs: completedAt.getTime() - startedAt.getTime(),
        entries,
        sources,
        stats,
    };
}
