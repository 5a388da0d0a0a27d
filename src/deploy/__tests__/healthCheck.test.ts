import http from 'http';
import { DeployError } from '../../utils/errors';
import { axiosStatusProbe, healthCheckUrl, StatusProbe, waitForHealthy } from '../healthCheck';

function scriptedProbe(outcomes: Array<number | Error>): { probe: StatusProbe; urls: string[] } {
    const urls: string[] = [];
    const probe: StatusProbe = async (url) => {
        urls.push(url);
        const outcome = outcomes.shift() ?? 503;
        if (outcome instanceof Error) throw outcome;
        return outcome;
    };
    return { probe, urls };
}

function portOf(server: http.Server): number {
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('server is not listening on a TCP port');
    }
    return address.port;
}

describe('healthCheckUrl', () => {
    it('joins the service URL and the path', () => {
        expect(healthCheckUrl('https://api.example.com/', '/health')).toBe('https://api.example.com/health');
        expect(healthCheckUrl('https://api.example.com', '/ready')).toBe('https://api.example.com/ready');
    });
});

describe('waitForHealthy', () => {
    it('resolves on the first 2xx answer', async () => {
        const { probe, urls } = scriptedProbe([503, new Error('connect ECONNREFUSED'), 200]);

        const result = await waitForHealthy('https://api.example.com/health', {
            timeoutMs: 5000,
            intervalMs: 1,
            probe
        });

        expect(result.status).toBe(200);
        expect(result.attempts).toBe(3);
        expect(urls).toEqual([
            'https://api.example.com/health',
            'https://api.example.com/health',
            'https://api.example.com/health'
        ]);
    });

    it('gives up after the timeout with an unverified DeployError', async () => {
        const { probe } = scriptedProbe([]);

        const attempt = waitForHealthy('https://api.example.com/health', { timeoutMs: 50, intervalMs: 10, probe });

        await expect(attempt).rejects.toBeInstanceOf(DeployError);
        await expect(attempt).rejects.toMatchObject({ stage: 'verify', unverified: true });
        await expect(attempt).rejects.toThrow(/did not succeed within 50ms \(\d+ attempts, last: HTTP 503\)/);
    });

    it('bounds a probe that never answers', async () => {
        const server = http.createServer(() => {
            // Accept the request and never respond
        });
        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
        const port = portOf(server);

        try {
            const startedAt = Date.now();
            const attempt = waitForHealthy(`http://127.0.0.1:${port}/health`, {
                timeoutMs: 200,
                intervalMs: 50,
                probe: axiosStatusProbe
            });

            await expect(attempt).rejects.toMatchObject({ stage: 'verify', unverified: true });
            expect(Date.now() - startedAt).toBeLessThan(2000);
        } finally {
            server.closeAllConnections();
            await new Promise<void>((resolve) => server.close(() => resolve()));
        }
    });

    it('reports a redirect status instead of following it', async () => {
        const server = http.createServer((_request, response) => {
            response.writeHead(302, { Location: '/login' });
            response.end();
        });
        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
        const port = portOf(server);

        try {
            await expect(axiosStatusProbe(`http://127.0.0.1:${port}/health`, {
                timeoutMs: 1000,
                signal: AbortSignal.timeout(1000)
            })).resolves.toBe(302);
        } finally {
            server.closeAllConnections();
            await new Promise<void>((resolve) => server.close(() => resolve()));
        }
    });
});
