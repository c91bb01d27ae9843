import { createLogger } from '../../src/observability/logger.js';
import type { FetchContext } from '../../src/fetchers/types.js';

export function testContext(): FetchContext {
    return {
        logger: createLogger({ runId: 'test-run' }),
        timeoutMs: 1000,
        userAgent: 'test-agent',
    };
}
