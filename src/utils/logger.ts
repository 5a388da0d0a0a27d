/**
 * ================================================================================
 * LOGGER UTILITY - Structured Logging and Monitoring
 * ================================================================================
 *
 * Console output for the person running a release plus a JSON log file for
 * later inspection. Every run gets an execution id that prefixes console lines
 * and is attached to each file entry.
 *
 * KEY FEATURES:
 * • Multi-level Logging - info, warn, error, debug, success
 * • Execution Tracking - UUID-based execution correlation
 * • File Persistence - JSON-structured logs written to shiprun.log
 * • Stage Steps - one step entry per pipeline stage
 * • Performance Timing - Built-in timer functionality
 * • Progress Indicators - Spinner support for long operations
 *
 * OUTPUT DESTINATIONS:
 * • Console - Formatted, colored output for user interaction
 * • File - JSON-structured logs, path from SHIPRUN_LOG_FILE ("off" disables it)
 */

import winston from 'winston';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { randomUUID } from 'crypto';
import path from 'path';

export interface LoggerOptions {
    /** Absolute path of the JSON log file, or false for no file output */
    logFile?: string | false;
    /** Suppress console output and spinners */
    quiet?: boolean;
}

/**
 * ================================================================================
 * LOGGER CLASS
 * ================================================================================
 *
 * //! IMPORTANT: use the exported 'logger' instance outside of tests
 * //? A quiet Logger with logFile: false is handy for injecting into the orchestrator in tests
 */
export class Logger {
    private winston: winston.Logger;
    private verbose = false;
    private quiet: boolean;
    private executionId = '';
    private logFilePath?: string;

    constructor(options: LoggerOptions = {}) {
        this.quiet = options.quiet ?? false;
        this.logFilePath = options.logFile === false ? undefined : options.logFile;

        this.winston = winston.createLogger({
            level: 'info',
            silent: this.logFilePath === undefined,
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json()
            ),
            transports: this.logFilePath
                ? [new winston.transports.File({ filename: this.logFilePath })]
                : [new winston.transports.Console({ silent: true })]
        });
    }

    setVerbose(verbose: boolean): void {
        this.verbose = verbose;
        this.winston.level = verbose ? 'debug' : 'info';
        this.debug('Verbose logging enabled');
    }

    isVerbose(): boolean {
        return this.verbose;
    }

    /**
     * Start a new execution session with a unique tracking id
     *
     * //? First 8 characters of the UUID are shown on every console line
     */
    startExecution(command: string): string {
        this.executionId = randomUUID();

        this.print(chalk.cyan('🚀'), chalk.bold(`Execution ID: ${this.executionId}`));
        if (this.logFilePath) {
            this.print(chalk.gray('📄'), `Log file: ${this.logFilePath}`);
        }
        this.print('');

        this.winston.info(`Starting execution: ${command}`, {
            executionId: this.executionId,
            command
        });
        return this.executionId;
    }

    private formatMessage(message: string): string {
        return this.executionId ? `[${this.executionId.slice(0, 8)}] ${message}` : message;
    }

    private print(...parts: string[]): void {
        if (!this.quiet) {
            console.log(...parts);
        }
    }

    /**
     * ================================================================================
     * LOGGING METHODS - Different Log Levels
     * ================================================================================
     */

    info(message: string, data?: unknown): void {
        this.print(chalk.blue('ℹ'), this.formatMessage(message));
        this.winston.info(message, { executionId: this.executionId, data });
    }

    success(message: string, data?: unknown): void {
        this.print(chalk.green('✓'), this.formatMessage(message));
        this.winston.info(message, { executionId: this.executionId, data, outcome: 'success' });
    }

    warn(message: string, data?: unknown): void {
        this.print(chalk.yellow('⚠'), this.formatMessage(message));
        this.winston.warn(message, { executionId: this.executionId, data });
    }

    /**
     * Log an error; stack traces go to the console only in verbose mode
     */
    error(message: string, error?: unknown, data?: unknown): void {
        this.print(chalk.red('✗'), this.formatMessage(message));

        if (error instanceof Error) {
            if (this.verbose && error.stack) {
                this.print(chalk.red(error.stack));
            }
            this.winston.error(message, { executionId: this.executionId, error: error.stack, data });
        } else {
            this.winston.error(message, { executionId: this.executionId, error, data });
        }
    }

    /**
     * Log debug message (console only in verbose mode, always to file)
     */
    debug(message: string, data?: unknown): void {
        if (this.verbose) {
            this.print(chalk.gray('🔍'), chalk.gray(this.formatMessage(message)));
            if (data !== undefined) {
                this.print(chalk.gray('   Data:'), chalk.gray(JSON.stringify(data, null, 2)));
            }
        }
        this.winston.debug(message, { executionId: this.executionId, data });
    }

    /**
     * Log a pipeline step (e.g. 'BUILD', 'PUBLISH')
     */
    step(step: string, message: string, data?: unknown): void {
        if (this.verbose) {
            this.print(chalk.magenta('📋'), chalk.magenta(this.formatMessage(`${step}: ${message}`)));
        }
        this.winston.info(`${step}: ${message}`, {
            executionId: this.executionId,
            step,
            data,
            type: 'step'
        });
    }

    /**
     * ================================================================================
     * UTILITY METHODS - Timing and Progress
     * ================================================================================
     */

    timer(label: string): { end: () => number } {
        const startTime = Date.now();
        this.debug(`Timer started: ${label}`);

        return {
            end: () => {
                const duration = Date.now() - startTime;
                this.debug(`Timer ended: ${label} (${duration}ms)`, { duration, label });
                return duration;
            }
        };
    }

    /**
     * //? Remember to call .succeed(), .fail(), or .stop() when done
     */
    spinner(message: string): Ora {
        return ora({ text: this.formatMessage(message), isSilent: this.quiet }).start();
    }

    getExecutionId(): string {
        return this.executionId;
    }

    getLogFilePath(): string | undefined {
        return this.logFilePath;
    }
}

function resolveLogFile(setting: string | undefined): string | false {
    if (setting === 'off') {
        return false;
    }
    return path.resolve(process.cwd(), setting || 'shiprun.log');
}

/**
 * Singleton used by the CLI and by modules without an injected logger
 */
export const logger = new Logger({ logFile: resolveLogFile(process.env.SHIPRUN_LOG_FILE) });
