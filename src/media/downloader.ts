/**
 * Batch Image Downloader
 * Saves every image candidate under a deterministic filename.
 * Failures are recorded per image; the batch always completes.
 */
import { createHash } from 'crypto';
import { createWriteStream } from 'fs';
import { mkdir, readdir, rm } from 'fs/promises';
import { extname, join } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { extension as mimeExtension } from 'mime-types';
import pLimit from 'p-limit';
import { ImageUnreachableError, errorMessage } from '../errors.js';
import type { Entry, ImageKind, ImageReference } from '../fetchers/types.js';
import { imageBytesTotal, imageDownloadsTotal } from '../observability/metrics.js';
import type { Logger } from '../observability/logger.js';

const IMAGE_EXTENSIONS = new Set(['jpg', 'jpeg', 'png', 'gif', 'webp', 'svg', 'bmp', 'avif', 'ico', 'tif', 'tiff']);
const DEFAULT_EXTENSION = 'jpg';

export type DownloadStatus = 'downloaded' | 'skipped_existing' | 'failed';

export interface DownloadRecord {
    entryId: string;
    sourceName: string;
    url: string;
    kind: ImageKind;
    status: DownloadStatus;
    localPath?: string;
    bytes?: number;
    reason?: string;
}

export interface DownloadReport {
    outputDir: string;
    downloaded: number;
    skipped: number;
    failed: number;
    items: DownloadRecord[];
}

export interface DownloadOptions {
    outputDir: string;
    timeoutMs: number;
    userAgent: string;
    concurrency: number;
    maxBytes: number;
    logger: Logger;
}

export interface DownloadResult {
    entries: Entry[];
    report: DownloadReport;
}

interface DownloadJob {
    entry: Entry;
    candidate: ImageReference;
    stem: string;
}

/**
 * `<source>_<kind>_<entry digest>-<ordinal>`; stable across runs for the same entry
 */
export function buildImageStem(sourceName: string, kind: ImageKind, entryId: string, ordinal: number): string {
    const source = sourceName.replace(/[^A-Za-z0-9_-]+/g, '-').replace(/^-+|-+$/g, '') || 'source';
    const digest = createHash('sha1').update(entryId).digest('hex').slice(0, 8);
    return `${source}_${kind}_${digest}-${ordinal}`;
}

/**
 * Extension from the URL path when it names an image type, else from the Content-Type
 */
export function inferExtension(url: string, contentType?: string): string {
    try {
        const fromPath = extname(new URL(url).pathname).slice(1).toLowerCase();
        if (IMAGE_EXTENSIONS.has(fromPath)) {
            return fromPath;
        }
    } catch {
        // Not a URL; fall back to the Content-Type
    }

    if (contentType?.startsWith('image/')) {
        const fromType = mimeExtension(contentType);
        if (fromType) {
            return fromType;
        }
    }

    return DEFAULT_EXTENSION;
}

function isAcceptedContentType(contentType: string): boolean {
    return !contentType || contentType.startsWith('image/') || contentType.startsWith('application/octet-stream');
}

function isFileExistsError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Map file stem -> filename for what is already in the output directory
 */
async function indexExistingFiles(outputDir: string): Promise<Map<string, string>> {
    const existing = new Map<string, string>();
    for (const name of await readdir(outputDir)) {
        const ext = extname(name);
        existing.set(ext ? name.slice(0, -ext.length) : name, name);
    }
    return existing;
}

type SavedImage =
    | { status: 'downloaded'; localPath: string; bytes: number }
    | { status: 'skipped_existing'; localPath: string };

/**
 * Stream one image to `<stem>.<ext>`, stopping as soon as it passes `maxBytes`.
 * A partial file is removed. A file another writer already created is left
 * in place and reported as existing.
 */
async function saveImage(job: DownloadJob, options: DownloadOptions): Promise<SavedImage> {
    const url = job.candidate.url;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
    try {
        const response = await fetch(url, {
            signal: controller.signal,
            headers: {
                'User-Agent': options.userAgent,
                Accept: 'image/*,*/*;q=0.8',
            },
        });

        if (!response.ok) {
            throw new ImageUnreachableError(url, `HTTP ${response.status}`);
        }

        const contentType = (response.headers.get('content-type') || '').split(';')[0].trim().toLowerCase();
        if (!isAcceptedContentType(contentType)) {
            throw new ImageUnreachableError(url, `Not an image (content-type ${contentType})`);
        }

        const declaredLength = Number(response.headers.get('content-length') || 0);
        if (declaredLength > options.maxBytes) {
            throw new ImageUnreachableError(url, `Too large (${declaredLength} bytes)`);
        }

        if (!response.body) {
            throw new ImageUnreachableError(url, 'Empty body');
        }

        const target = join(options.outputDir, `${job.stem}.${inferExtension(url, contentType)}`);
        let bytes = 0;

        try {
            await pipeline(
                Readable.fromWeb(response.body),
                async function* (source: AsyncIterable<Uint8Array>) {
                    for await (const chunk of source) {
                        bytes += chunk.byteLength;
                        if (bytes > options.maxBytes) {
                            throw new ImageUnreachableError(url, `Too large (over ${options.maxBytes} bytes)`);
                        }
                        yield chunk;
                    }
                },
                createWriteStream(target, { flags: 'wx' })
            );
        } catch (error) {
            if (isFileExistsError(error)) {
                return { status: 'skipped_existing', localPath: target };
            }
            await rm(target, { force: true });
            throw error;
        }

        if (bytes === 0) {
            await rm(target, { force: true });
            throw new ImageUnreachableError(url, 'Empty body');
        }

        return { status: 'downloaded', localPath: target, bytes };
    } catch (error) {
        if (error instanceof ImageUnreachableError) {
            throw error;
        }
        if (error instanceof Error && error.name === 'AbortError') {
            throw new ImageUnreachableError(url, `Timed out after ${options.timeoutMs}ms`, { cause: error });
        }
        throw new ImageUnreachableError(url, errorMessage(error), { cause: error });
    } finally {
        clearTimeout(timeoutId);
    }
}

async function runJob(job: DownloadJob, existing: Map<string, string>, options: DownloadOptions): Promise<DownloadRecord> {
    const record: Omit<DownloadRecord, 'status'> = {
        entryId: job.entry.id,
        sourceName: job.entry.sourceName,
        url: job.candidate.url,
        kind: job.candidate.kind,
    };

    const existingName = existing.get(job.stem);
    if (existingName) {
        return { ...record, status: 'skipped_existing', localPath: join(options.outputDir, existingName) };
    }

    try {
        const saved = await saveImage(job, options);
        if (saved.status === 'downloaded') {
            imageBytesTotal.inc(saved.bytes);
        }
        return { ...record, ...saved };
    } catch (error) {
        options.logger.warn('Image download failed', { url: job.candidate.url, error: errorMessage(error) });
        return { ...record, status: 'failed', reason: errorMessage(error) };
    }
}

/**
 * Download every candidate of every entry. Returns new entries with `localPath`
 * set where a file exists, and a report in input order.
 */
export async function downloadAll(entries: readonly Entry[], options: DownloadOptions): Promise<DownloadResult> {
    const log = options.logger;
    await mkdir(options.outputDir, { recursive: true });
    const existing = await indexExistingFiles(options.outputDir);

    const jobs: DownloadJob[] = entries.flatMap(entry =>
        entry.imageCandidates.map((candidate, index) => ({
            entry,
            candidate,
            stem: buildImageStem(entry.sourceName, candidate.kind, entry.id, index + 1),
        }))
    );

    log.info('Downloading images', { images: jobs.length, outputDir: options.outputDir, existing: existing.size });

    const limit = pLimit(options.concurrency);
    const items = await Promise.all(jobs.map(job => limit(() => runJob(job, existing, options))));

    for (const item of items) {
        imageDownloadsTotal.inc({ status: item.status });
    }

    let cursor = 0;
    const updated = entries.map(entry => ({
        ...entry,
        imageCandidates: entry.imageCandidates.map(candidate => {
            const localPath = items[cursor++].localPath;
            return localPath ? { ...candidate, localPath } : { ...candidate };
        }),
    }));

    const report: DownloadReport = {
        outputDir: options.outputDir,
        downloaded: items.filter(item => item.status === 'downloaded').length,
        skipped: items.filter(item => item.status === 'skipped_existing').length,
        failed: items.filter(item => item.status === 'failed').length,
        items,
    };

    log.info('Image downloads complete', {
        downloaded: report.downloaded,
        skipped: report.skipped,
        failed: report.failed,
    });

    return { entries: updated, report };
}
