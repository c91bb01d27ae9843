/**
 * Error taxonomy for the aggregation pipeline.
 * Each error is contained at the smallest unit that can proceed without it.
 */

export type AggregationErrorCode =
    | 'SOURCE_UNAVAILABLE'
    | 'ITEM_MALFORMED'
    | 'IMAGE_UNREACHABLE'
    | 'CONFIG_INVALID';

export class AggregationError extends Error {
    readonly code: AggregationErrorCode;

    constructor(code: AggregationErrorCode, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'AggregationError';
        this.code = code;
    }
}

/**
 * Whole source failed: unreachable, non-2xx or unparsable payload
 */
export class SourceUnavailableError extends AggregationError {
    constructor(readonly sourceName: string, message: string, options?: ErrorOptions) {
        super('SOURCE_UNAVAILABLE', `${sourceName}: ${message}`, options);
        this.name = 'SourceUnavailableError';
    }
}

/**
 * One item inside a source batch could not be parsed
 */
export class ItemMalformedError extends AggregationError {
    constructor(message: string, options?: ErrorOptions) {
        super('ITEM_MALFORMED', message, options);
        this.name = 'ItemMalformedError';
    }
}

/**
 * A candidate image could not be fetched or stored
 */
export class ImageUnreachableError extends AggregationError {
    constructor(readonly url: string, message: string, options?: ErrorOptions) {
        super('IMAGE_UNREACHABLE', message, options);
        this.name = 'ImageUnreachableError';
    }
}

/**
 * A caller-supplied parameter is unusable
 */
export class ConfigInvalidError extends AggregationError {
    constructor(message: string, readonly issues: string[] = []) {
        super('CONFIG_INVALID', message);
        this.name = 'ConfigInvalidError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
