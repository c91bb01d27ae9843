/**
 * Pipeline module exports
 */
export {
    aggregate,
    type AggregateOptions,
    type AggregationResult,
    type AggregationStats,
    type SourceReport,
    type SourceStatus,
} from './aggregator.js';

export {
    dayRange,
    isWithinRange,
    resolveDateRange,
    toDateRange,
    type DateRange,
} from './date-range.js';

export {
    mergeByPriority,
    sortEntries,
    type SortKey,
    type SourceBatch,
} from './ordering.js';

export {
    buildDigestDocument,
    writeDigestDocument,
    type DigestDocument,
    type DigestInput,
} from './digest.js';
