import { writeFile } from 'fs/promises';
import type { Entry } from '../fetchers/types.js';
import type { DownloadReport } from '../media/downloader.js';
import type { AggregationResult, AggregationStats, SourceReport } from './aggregator.js';

/**
 * Serialized output of one run
 */
export interface DigestDocument {
    date: string;               // YYYY-MM-DD the digest covers
    generatedAt: string;
    runId: string;
    entries: Entry[];
    stats: AggregationStats;
    sources: SourceReport[];
    downloads?: DownloadReport;
}

export interface DigestInput {
    result: AggregationResult;
    entries?: Entry[];          // Overrides result.entries, e.g. after downloading
    date?: string | null;
    downloads?: DownloadReport;
}

export function buildDigestDocument({ result, entries, date, downloads }: DigestInput): DigestDocument {
    const document: DigestDocument = {
        date: date ?? result.startedAt.slice(0, 10),
        generatedAt: result.completedAt,
        runId: result.runId,
        entries: entries ?? result.entries,
        stats: result.stats,
        sources: result.sources,
    };

    if (downloads) {
        document.downloads = downloads;
    }

    return document;
}

export async function writeDigestDocument(path: string, document: DigestDocument): Promise<void> {
    await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
}
