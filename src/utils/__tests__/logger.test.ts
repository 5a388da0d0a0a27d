import { Logger } from '../logger';

describe('Logger', () => {
    let log: jest.SpyInstance;

    beforeEach(() => {
        log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        log.mockRestore();
    });

    it('prefixes console lines with the execution id', () => {
        const logger = new Logger({ logFile: false });
        const executionId = logger.startExecution('release');
        log.mockClear();

        logger.info('Build started');

        expect(log).toHaveBeenCalledTimes(1);
        expect(log.mock.calls[0][1]).toBe(`[${executionId.slice(0, 8)}] Build started`);
    });

    it('prints debug output only in verbose mode', () => {
        const logger = new Logger({ logFile: false });

        logger.debug('hidden');
        expect(log).not.toHaveBeenCalled();

        logger.setVerbose(true);
        log.mockClear();
        logger.debug('shown');
        expect(log).toHaveBeenCalledTimes(1);
        expect(logger.isVerbose()).toBe(true);
    });

    it('stays silent when quiet', () => {
        const logger = new Logger({ logFile: false, quiet: true });

        logger.startExecution('release');
        logger.info('Build started');
        logger.warn('Retrying');

        expect(log).not.toHaveBeenCalled();
        expect(logger.getLogFilePath()).toBeUndefined();
    });
});
