import execa from 'execa';
import { CommandError } from './errors';
import { logger } from './logger';

export interface RunOptions {
    timeoutMs: number;
    cwd?: string;
    /** Written to the child's stdin (used for docker login --password-stdin) */
    input?: string;
    /** Stream stdout to the terminal instead of capturing it */
    inherit?: boolean;
}

export interface CommandResult {
    stdout: string;
    stderr: string;
}

/**
 * Runs an external command with a hard timeout. Injected everywhere a
 * command is executed so tests can substitute an in-process fake.
 */
export type CommandRunner = (file: string, args: readonly string[], options: RunOptions) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (file, args, options) => {
    const printable = `${file} ${args.join(' ')}`;
    logger.debug(`$ ${printable}`, { cwd: options.cwd, timeoutMs: options.timeoutMs });

    try {
        const result = await execa(file, [...args], {
            cwd: options.cwd,
            input: options.input,
            timeout: options.timeoutMs,
            stdout: options.inherit ? 'inherit' : 'pipe',
            stderr: 'pipe'
        });
        return { stdout: result.stdout ?? '', stderr: result.stderr ?? '' };
    } catch (error) {
        throw new CommandError(`${file} ${args[0] ?? ''}`.trim(), {
            exitCode: readNumber(error, 'exitCode'),
            timedOut: error instanceof Error && 'timedOut' in error && error.timedOut === true,
            stderr: readString(error, 'stderr'),
            cause: error
        });
    }
};

function readNumber(error: unknown, key: string): number | undefined {
    if (typeof error === 'object' && error !== null && key in error) {
        const value: unknown = Reflect.get(error, key);
        return typeof value === 'number' ? value : undefined;
    }
    return undefined;
}

function readString(error: unknown, key: string): string {
    if (typeof error === 'object' && error !== null && key in error) {
        const value: unknown = Reflect.get(error, key);
        return typeof value === 'string' ? value : '';
    }
    return '';
}
