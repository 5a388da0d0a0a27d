import axios from 'axios';
import type { HealthCheckResult } from '../types';
import { DeployError, describeError } from '../utils/errors';
import { sleep } from '../utils/retry';
import { logger } from '../utils/logger';

/**
 * One HTTP GET; resolves with the status code whatever it is and rejects on
 * network failure, timeout or abort.
 */
export type StatusProbe = (url: string, options: { timeoutMs: number; signal: AbortSignal }) => Promise<number>;

export const axiosStatusProbe: StatusProbe = async (url, { timeoutMs, signal }) => {
    const response = await axios.get(url, {
        timeout: timeoutMs,
        signal,
        maxRedirects: 0,
        responseType: 'text',
        validateStatus: () => true
    });
    return response.status;
};

export interface HealthCheckOptions {
    timeoutMs: number;
    intervalMs: number;
    probe?: StatusProbe;
}

export function healthCheckUrl(serviceUrl: string, path: string): string {
    return `${serviceUrl.replace(/\/+$/, '')}${path}`;
}

/**
 * Poll url until it answers 2xx. The whole loop, including the attempt in
 * flight, is bounded by timeoutMs; on expiry a DeployError tagged unverified
 * is thrown.
 */
export async function waitForHealthy(url: string, options: HealthCheckOptions): Promise<HealthCheckResult> {
    const probe = options.probe ?? axiosStatusProbe;
    const startedAt = Date.now();
    const deadline = startedAt + options.timeoutMs;
    let attempts = 0;
    let lastProblem = 'no attempt completed';

    for (let remaining = options.timeoutMs; remaining > 0; remaining = deadline - Date.now()) {
        attempts++;
        try {
            const status = await probe(url, { timeoutMs: remaining, signal: AbortSignal.timeout(remaining) });
            if (status >= 200 && status < 300) {
                return { url, status, attempts, elapsedMs: Date.now() - startedAt };
            }
            lastProblem = `HTTP ${status}`;
        } catch (error) {
            lastProblem = describeError(error);
        }
        logger.debug(`Health check attempt ${attempts} failed: ${lastProblem}`, { url });

        const left = deadline - Date.now();
        if (left <= 0) {
            break;
        }
        await sleep(Math.min(options.intervalMs, left));
    }

    throw new DeployError(
        `Health check ${url} did not succeed within ${options.timeoutMs}ms (${attempts} attempts, last: ${lastProblem})`,
        { stage: 'verify', unverified: true }
    );
}
