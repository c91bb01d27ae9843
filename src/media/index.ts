/**
 * Media module exports
 */
export {
    downloadAll,
    buildImageStem,
    inferExtension,
    type DownloadOptions,
    type DownloadRecord,
    type DownloadReport,
    type DownloadResult,
    type DownloadStatus,
} from './downloader.js';

export {
    extractImageCandidates,
    extractOgImage,
    extractScholarlyFigures,
    extractFeedHints,
    sanitizeCandidates,
    type ExtractOptions,
} from './extractor.js';
