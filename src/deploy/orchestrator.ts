/**
 * ================================================================================
 * RELEASE ORCHESTRATOR - Fail-fast Release Pipeline
 * ================================================================================
 *
 * Runs one release against one DeploymentTarget:
 *
 * 1. Authenticate - credential file -> cloud session
 * 2. Build        - docker build, unique tag + "latest" alias
 * 3. Publish      - registry login, push tag then alias (retried once)
 * 4. Deploy       - create/update the managed service revision (retried once)
 * 5. Functions    - auxiliary functions, partial-tolerant unless strict
 * 6. Verify       - optional health probe bounded by healthCheck.timeoutMs
 *
 * Stages 1-4 and 6 abort the run on failure. Stage 5 records failures and the
 * run ends with a PartialDeployError carrying the full summary. Nothing is
 * rolled back; the platform keeps serving the previous revision when a deploy
 * fails.
 *
 * //! IMPORTANT: cancellation is checked between stages only; a stage in flight finishes
 */

import type { ReleaseConfig } from '../config/types';
import type { CloudPlatform } from '../services/platform';
import {
    BuildArtifact,
    CloudSession,
    FunctionDeployResult,
    HealthCheckResult,
    ReleaseStage,
    ReleaseSummary,
    STAGE_LABELS
} from '../types';
import { buildDockerImage } from '../docker/dockerBuilder';
import { pushDockerImage } from '../docker/dockerPusher';
import { CommandRunner, runCommand } from '../utils/exec';
import {
    AuthError,
    BuildError,
    ConfigError,
    DeployError,
    PartialDeployError,
    PublishError,
    ReleaseCancelledError,
    ReleaseError,
    describeError
} from '../utils/errors';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import { deployFunctions, functionSpecProblems } from './functions';
import { healthCheckUrl, StatusProbe, waitForHealthy } from './healthCheck';

export interface OrchestratorDependencies {
    platform: CloudPlatform;
    /** Runs docker and git; defaults to execa */
    runner?: CommandRunner;
    logger?: Logger;
    probe?: StatusProbe;
    now?: () => Date;
}

export type ReleaseResult =
    | { ok: true; summary: ReleaseSummary }
    | { ok: false; error: ReleaseError };

/**
 * Wrap anything a stage throws in that stage's error class
 */
export function toStageError(stage: ReleaseStage, error: unknown): ReleaseError {
    if (error instanceof ReleaseError) {
        return error;
    }
    const message = `${STAGE_LABELS[stage]} failed: ${describeError(error)}`;
    switch (stage) {
        case 'authenticate':
            return new AuthError(message, { cause: error });
        case 'build':
            return new BuildError(message, { cause: error });
        case 'publish':
            return new PublishError(message, { cause: error });
        case 'deploy':
            return new DeployError(message, { cause: error });
        case 'functions':
            return new DeployError(message, { stage: 'functions', cause: error });
        case 'verify':
            return new DeployError(message, { stage: 'verify', unverified: true, cause: error });
    }
}

/**
 * Verify failure carrying the run's function results
 */
function withFunctionResults(error: unknown, functions: FunctionDeployResult[]): unknown {
    if (!(error instanceof DeployError) || error.stage !== 'verify' || functions.length === 0) {
        return error;
    }
    const failed = functions.filter((result) => result.status === 'failed').map((result) => result.name);
    const message = failed.length > 0 ? `${error.message}; functions failed: ${failed.join(', ')}` : error.message;
    return new DeployError(message, { stage: 'verify', unverified: error.unverified, functions, cause: error.cause });
}

export class ReleaseOrchestrator {
    private readonly platform: CloudPlatform;
    private readonly runner: CommandRunner;
    private readonly log: Logger;
    private readonly probe?: StatusProbe;
    private readonly now: () => Date;

    constructor(private readonly config: ReleaseConfig, dependencies: OrchestratorDependencies) {
        this.platform = dependencies.platform;
        this.runner = dependencies.runner ?? runCommand;
        this.log = dependencies.logger ?? defaultLogger;
        this.probe = dependencies.probe;
        this.now = dependencies.now ?? (() => new Date());
    }

    /**
     * Execute the pipeline. Resolves with the summary on full success and
     * throws a ReleaseError naming the failed stage otherwise.
     */
    async run(signal?: AbortSignal): Promise<ReleaseSummary> {
        const { target, pipeline, credentialsFile } = this.config;
        const startedAt = this.now();

        const problems = this.platform.validateTarget(target);
        if (problems.length > 0) {
            throw new ConfigError(problems.map((problem) => `${this.platform.name}: ${problem}`));
        }

        this.log.info(
            `Releasing ${target.serviceName} to ${this.platform.name}:${target.projectId}/${target.region}`
        );

        // 1. Authenticate
        const session = await this.stage('authenticate', signal, () =>
            this.platform.authenticate(credentialsFile, target)
        );
        this.log.success(`Authenticated as ${session.principal}`);

        // 2. Build (never retried)
        const artifact = await this.stage('build', signal, () =>
            buildDockerImage(this.runner, this.config.build, this.platform.repositoryFor(target), {
                timeoutMs: pipeline.timeouts.buildMs,
                now: this.now()
            })
        );
        this.log.success(`Built ${artifact.imageReference}`);

        // 3. Publish
        await this.stage('publish', signal, () =>
            this.retry('Publish', () => this.publish(artifact, session))
        );
        this.log.success(`Published ${artifact.imageReference}`);

        // 4. Deploy primary service
        const deployment = await this.stage('deploy', signal, () =>
            this.retry('Deploy', () => this.platform.deployService(target, artifact, session))
        );
        this.log.success(`Service ${target.serviceName} serving at ${deployment.serviceUrl}`);

        // 5. Auxiliary functions
        let functions: FunctionDeployResult[] = [];
        if (this.config.functions.length > 0) {
            functions = await this.stage('functions', signal, () =>
                deployFunctions(this.config.functions, {
                    strict: pipeline.strictFunctions,
                    concurrency: pipeline.functionConcurrency,
                    validate: (spec) => functionSpecProblems(spec, this.platform),
                    deploy: (spec) =>
                        this.retry(`Function ${spec.name}`, () => this.platform.deployFunction(spec, target, session)),
                    onResult: (result) => {
                        if (result.status === 'deployed') {
                            this.log.success(`Function ${result.name} deployed`);
                        } else {
                            this.log.warn(`Function ${result.name} failed: ${result.error}`);
                        }
                    }
                })
            );
        }

        // 6. Verify
        let healthCheck: HealthCheckResult | undefined;
        if (pipeline.healthCheck.enabled) {
            const url = healthCheckUrl(deployment.serviceUrl, pipeline.healthCheck.path);
            try {
                healthCheck = await this.stage('verify', signal, () =>
                    waitForHealthy(url, {
                        timeoutMs: pipeline.healthCheck.timeoutMs,
                        intervalMs: pipeline.healthCheck.intervalMs,
                        probe: this.probe
                    })
                );
            } catch (error) {
                throw withFunctionResults(error, functions);
            }
            this.log.success(`Health check ${url} answered ${healthCheck.status}`);
        }

        const finishedAt = this.now();
        const summary: ReleaseSummary = {
            platform: this.platform.name,
            projectId: target.projectId,
            region: target.region,
            serviceName: target.serviceName,
            serviceUrl: deployment.serviceUrl,
            revision: deployment.revision,
            artifact,
            publicAccess: target.allowPublicAccess,
            functions,
            verified: healthCheck !== undefined,
            healthCheck,
            startedAt: startedAt.toISOString(),
            finishedAt: finishedAt.toISOString(),
            durationMs: finishedAt.getTime() - startedAt.getTime()
        };

        if (functions.some((result) => result.status === 'failed')) {
            throw new PartialDeployError(summary);
        }
        return summary;
    }

    private async publish(artifact: BuildArtifact, session: CloudSession): Promise<void> {
        const { target, pipeline } = this.config;
        await this.platform.registryLogin(target, session);
        // Unique tag first so the alias never points at an image the registry lacks
        await pushDockerImage(this.runner, artifact.imageReference, pipeline.timeouts.publishMs);
        await pushDockerImage(this.runner, artifact.aliasReference, pipeline.timeouts.publishMs);
    }

    private retry<T>(label: string, operation: () => Promise<T>): Promise<T> {
        return withRetry(label, operation, {
            retries: 1,
            delayMs: this.config.pipeline.retryDelayMs,
            logger: this.log
        });
    }

    private async stage<T>(stage: ReleaseStage, signal: AbortSignal | undefined, action: () => Promise<T>): Promise<T> {
        if (signal?.aborted) {
            throw new ReleaseCancelledError(stage);
        }

        const label = STAGE_LABELS[stage];
        this.log.step(stage.toUpperCase(), `${label} started`);
        const timer = this.log.timer(stage);
        const spinner = this.log.spinner(`${label}...`);

        try {
            const result = await action();
            spinner.stop();
            this.log.step(stage.toUpperCase(), `${label} finished`, { durationMs: timer.end() });
            return result;
        } catch (error) {
            spinner.stop();
            const failure = toStageError(stage, error);
            this.log.step(stage.toUpperCase(), `${label} failed`, { durationMs: timer.end(), error: failure.message });
            throw failure;
        }
    }
}

/**
 * Run a release and return the outcome instead of throwing ReleaseErrors.
 * Anything that is not a ReleaseError is a bug and is rethrown.
 */
export async function runRelease(
    config: ReleaseConfig,
    dependencies: OrchestratorDependencies,
    signal?: AbortSignal
): Promise<ReleaseResult> {
    try {
        const summary = await new ReleaseOrchestrator(config, dependencies).run(signal);
        return { ok: true, summary };
    } catch (error) {
        if (error instanceof ReleaseError) {
            return { ok: false, error };
        }
        throw error;
    }
}
