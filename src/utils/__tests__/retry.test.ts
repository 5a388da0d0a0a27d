import { Logger } from '../logger';
import { withRetry } from '../retry';

const quiet = new Logger({ logFile: false, quiet: true });

describe('withRetry', () => {
    it('retries once and returns the second result', async () => {
        const operation = jest
            .fn<Promise<string>, []>()
            .mockRejectedValueOnce(new Error('registry unavailable'))
            .mockResolvedValueOnce('pushed');

        await expect(withRetry('Publish', operation, { retries: 1, delayMs: 0, logger: quiet })).resolves.toBe('pushed');
        expect(operation).toHaveBeenCalledTimes(2);
    });

    it('rethrows the last failure unchanged', async () => {
        const last = new Error('still unavailable');
        const operation = jest
            .fn<Promise<string>, []>()
            .mockRejectedValueOnce(new Error('registry unavailable'))
            .mockRejectedValueOnce(last);

        await expect(withRetry('Publish', operation, { retries: 1, delayMs: 0, logger: quiet })).rejects.toBe(last);
        expect(operation).toHaveBeenCalledTimes(2);
    });

    it('does not retry when retries is zero', async () => {
        const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('nope'));

        await expect(withRetry('Build', operation, { retries: 0, delayMs: 0, logger: quiet })).rejects.toThrow('nope');
        expect(operation).toHaveBeenCalledTimes(1);
    });
});
