import { describeError } from './errors';
import type { Logger } from './logger';

export interface RetryOptions {
    /** Additional attempts after the first one */
    retries: number;
    delayMs: number;
    logger: Logger;
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run an idempotent operation, retrying it after a fixed delay.
 * The last failure is rethrown unchanged.
 */
export async function withRetry<T>(label: string, operation: () => Promise<T>, options: RetryOptions): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await operation();
        } catch (error) {
            if (attempt >= options.retries) {
                throw error;
            }
            options.logger.warn(`${label} failed (${describeError(error)}), retrying in ${options.delayMs}ms`);
            await sleep(options.delayMs);
        }
    }
}

/**
 * Request options for AWS SDK calls: abort the call after timeoutMs
 */
export function withTimeout(timeoutMs: number): { abortSignal: AbortSignal } {
    return { abortSignal: AbortSignal.timeout(timeoutMs) };
}
