/**
 * ================================================================================
 * ERRORS - Release Failure Taxonomy
 * ================================================================================
 *
 * Every failure a release can end with is a ReleaseError tagged with the stage
 * that raised it. The CLI maps the stage to a process exit code so scripts can
 * tell which stage failed without parsing output.
 *
 * HIERARCHY:
 * • ConfigError        - invalid or missing configuration (before any stage)
 * • AuthError          - credential file missing, malformed or rejected
 * • BuildError         - image build failed
 * • PublishError       - registry login or push failed
 * • DeployError        - service deploy, strict function deploy or health probe failed
 * • PartialDeployError - some auxiliary functions failed, the rest succeeded
 * • ReleaseCancelledError - run aborted before the next stage started
 */

import type { FunctionDeployResult, ReleaseSummary, StageName } from '../types';

export const EXIT_CODES: Record<StageName | 'cancelled', number> = {
    config: 2,
    authenticate: 3,
    build: 4,
    publish: 5,
    deploy: 6,
    functions: 7,
    verify: 8,
    cancelled: 130
};

export class ReleaseError extends Error {
    readonly stage: StageName;

    constructor(stage: StageName, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.stage = stage;
    }

    get exitCode(): number {
        return EXIT_CODES[this.stage];
    }
}

export class ConfigError extends ReleaseError {
    readonly problems: string[];

    constructor(problems: string[]) {
        super('config', `Invalid release configuration:\n  - ${problems.join('\n  - ')}`);
        this.problems = problems;
    }
}

export class AuthError extends ReleaseError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('authenticate', message, options);
    }
}

export class BuildError extends ReleaseError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('build', message, options);
    }
}

export class PublishError extends ReleaseError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('publish', message, options);
    }
}

export interface DeployErrorOptions {
    stage?: 'deploy' | 'functions' | 'verify';
    unverified?: boolean;
    /** Function results of a run that got past the functions stage */
    functions?: FunctionDeployResult[];
    cause?: unknown;
}

export class DeployError extends ReleaseError {
    /** Set when the deploy went through but the health probe never succeeded */
    readonly unverified: boolean;
    readonly functions: FunctionDeployResult[];

    constructor(message: string, options: DeployErrorOptions = {}) {
        super(options.stage ?? 'deploy', message, { cause: options.cause });
        this.unverified = options.unverified ?? false;
        this.functions = options.functions ?? [];
    }

    get failedFunctions(): string[] {
        return this.functions.filter((fn) => fn.status === 'failed').map((fn) => fn.name);
    }
}

/**
 * Raised after the pipeline has finished when at least one auxiliary function
 * failed. The summary is complete: the service is deployed (and verified, when
 * a health check is configured).
 */
export class PartialDeployError extends ReleaseError {
    readonly succeeded: string[];
    readonly failed: string[];
    readonly summary: ReleaseSummary;

    constructor(summary: ReleaseSummary) {
        const succeeded = summary.functions.filter((fn) => fn.status === 'deployed').map((fn) => fn.name);
        const failed = summary.functions.filter((fn) => fn.status === 'failed').map((fn) => fn.name);
        super(
            'functions',
            `${succeeded.length} of ${summary.functions.length} functions deployed; failed: ${failed.join(', ')}`
        );
        this.succeeded = succeeded;
        this.failed = failed;
        this.summary = summary;
    }
}

export class ReleaseCancelledError extends ReleaseError {
    constructor(pendingStage: StageName) {
        super(pendingStage, `Release cancelled before stage "${pendingStage}" started`);
    }

    get exitCode(): number {
        return EXIT_CODES.cancelled;
    }
}

/**
 * Failure of an external command (docker, gcloud, git)
 */
export class CommandError extends Error {
    readonly command: string;
    readonly exitCode?: number;
    readonly timedOut: boolean;
    readonly stderr: string;

    constructor(command: string, details: { exitCode?: number; timedOut: boolean; stderr: string; cause?: unknown }) {
        const reason = details.timedOut
            ? 'timed out'
            : `exited with code ${details.exitCode ?? 'unknown'}`;
        const lastLine = details.stderr.trim().split('\n').pop();
        super(lastLine ? `${command} ${reason}: ${lastLine}` : `${command} ${reason}`, { cause: details.cause });
        this.name = 'CommandError';
        this.command = command;
        this.exitCode = details.exitCode;
        this.timedOut = details.timedOut;
        this.stderr = details.stderr;
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
