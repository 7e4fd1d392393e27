import { RateLimitError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Run `request`; on a `RateLimitError` wait `backoffMs` and run it exactly once more.
 */
export async function retryOnceAfterRateLimit<T>(
    request: () => Promise<T>,
    options: { backoffMs: number; wait: (ms: number) => Promise<void>; context?: Record<string, unknown> }
): Promise<T> {
    try {
        return await request();
    } catch (error) {
        if (!(error instanceof RateLimitError)) throw error;

        getLogger().warn({ ...options.context, backoffMs: options.backoffMs }, 'Rate limited, retrying once after backoff');
        await options.wait(options.backoffMs);
        return request();
    }
}
