/**
 * ================================================================================
 * GCP PLATFORM - Cloud Run and Cloud Functions through gcloud
 * ================================================================================
 *
 * Drives the gcloud CLI the same way the hand-run deploy script did, with the
 * hardcoded parts turned into target settings.
 *
 * KEY OPERATIONS:
 * • authenticate - gcloud auth activate-service-account --key-file (key must belong to the target project)
 * • registryLogin - gcloud auth configure-docker <host>
 * • deployService - gcloud run deploy, then gcloud run services describe for URL and revision
 * • deployFunction - gcloud functions deploy, then describe for the HTTPS trigger URL
 *
 * PREREQUISITES:
 * • gcloud and docker on PATH
 * • A service account key with Cloud Run, Cloud Functions and registry permissions
 *
 * //! SECURITY: the access flag is always passed explicitly; gcloud's own default is never relied on
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { DeploymentTarget, FunctionSpec, FunctionTrigger, TimeoutSettings } from '../config/types';
import type { BuildArtifact, CloudSession, FunctionDeployment, ServiceDeployment } from '../types';
import type { CloudPlatform } from './platform';
import { CommandRunner, runCommand } from '../utils/exec';
import { AuthError, describeError } from '../utils/errors';
import { PasswordSource, passwordFromEnv, readServiceAccountKey } from '../utils/credentials';
import { logger } from '../utils/logger';

// python39, python312, nodejs20, go122, java17, ruby33, php82, dotnet8
const GCF_RUNTIME_PATTERN = /^(nodejs\d{1,2}|python3\d{1,2}|go1\d{1,2}|java\d{1,2}|ruby\d{2}|php\d{2}|dotnet\d{1,2})$/;

// 1st gen memory tiers in MB
const GCF_MEMORY_TIERS = [128, 256, 512, 1024, 2048, 4096, 8192];

const GCF_MAX_TIMEOUT_SECONDS = 540;

const CLOUD_RUN_WHOLE_CPUS = [1, 2, 4, 6, 8];

export interface GcpPlatformOptions {
    registryHost: string;
    timeouts: TimeoutSettings;
    runner?: CommandRunner;
    /** Password of an encrypted key file; defaults to CREDENTIALS_PASSWORD */
    password?: PasswordSource;
}

function accessFlag(allowPublicAccess: boolean): string {
    return allowPublicAccess ? '--allow-unauthenticated' : '--no-allow-unauthenticated';
}

function triggerArgs(trigger: FunctionTrigger, allowPublicAccess: boolean): string[] {
    switch (trigger.type) {
        case 'http':
            return ['--trigger-http', accessFlag(allowPublicAccess)];
        case 'topic':
            return ['--trigger-topic', trigger.topic];
        case 'bucket':
            return ['--trigger-bucket', trigger.bucket];
    }
}

/**
 * Arguments for `gcloud run deploy`
 */
export function cloudRunDeployArgs(target: DeploymentTarget, imageReference: string): string[] {
    return [
        'run', 'deploy', target.serviceName,
        '--image', imageReference,
        '--project', target.projectId,
        '--region', target.region,
        '--platform', 'managed',
        '--memory', `${target.resources.memoryMb}Mi`,
        '--cpu', String(target.resources.cpu),
        '--min-instances', String(target.scaling.minInstances),
        '--max-instances', String(target.scaling.maxInstances),
        '--port', String(target.containerPort),
        accessFlag(target.allowPublicAccess),
        '--quiet'
    ];
}

/**
 * Arguments for `gcloud functions deploy`
 */
export function cloudFunctionDeployArgs(spec: FunctionSpec, target: DeploymentTarget): string[] {
    const args = [
        'functions', 'deploy', spec.name,
        '--project', target.projectId,
        '--region', spec.region ?? target.region,
        '--runtime', spec.runtime,
        '--entry-point', spec.entryPoint,
        '--memory', `${spec.memoryMb}MB`,
        '--timeout', `${spec.timeoutSeconds}s`,
        '--source', spec.source,
        ...triggerArgs(spec.trigger, target.allowPublicAccess)
    ];

    const environment = Object.entries(spec.environment);
    if (environment.length > 0) {
        args.push('--set-env-vars', environment.map(([name, value]) => `${name}=${value}`).join(','));
    }

    args.push('--quiet');
    return args;
}

/**
 * Pull URL and revision out of `gcloud run services describe --format json`
 */
export function parseServiceDescription(stdout: string): ServiceDeployment {
    let parsed: unknown;
    try {
        parsed = JSON.parse(stdout);
    } catch (error) {
        throw new Error(`Unreadable service description: ${describeError(error)}`);
    }

    const status = typeof parsed === 'object' && parsed !== null && 'status' in parsed ? parsed.status : undefined;
    if (typeof status !== 'object' || status === null) {
        throw new Error('Service description has no status');
    }

    const url = 'url' in status ? status.url : undefined;
    if (typeof url !== 'string' || url === '') {
        throw new Error('Service is not reporting a URL yet');
    }
    const revision = 'latestReadyRevisionName' in status ? status.latestReadyRevisionName : undefined;

    return {
        serviceUrl: url,
        revision: typeof revision === 'string' ? revision : undefined
    };
}

export class GcpPlatform implements CloudPlatform {
    readonly name = 'gcp' as const;
    private readonly runner: CommandRunner;
    private readonly registryHost: string;
    private readonly timeouts: TimeoutSettings;
    private readonly password: PasswordSource;

    constructor(options: GcpPlatformOptions) {
        this.runner = options.runner ?? runCommand;
        this.registryHost = options.registryHost;
        this.timeouts = options.timeouts;
        this.password = options.password ?? passwordFromEnv;
    }

    validateTarget(target: DeploymentTarget): string[] {
        const problems: string[] = [];
        const { cpu, memoryMb } = target.resources;

        if (!(cpu < 1 ? cpu >= 0.08 : CLOUD_RUN_WHOLE_CPUS.includes(cpu))) {
            problems.push(`Cloud Run cpu must be between 0.08 and 1, or one of ${CLOUD_RUN_WHOLE_CPUS.join(', ')} (got ${cpu})`);
        }
        if (memoryMb < 128 || memoryMb > 32768) {
            problems.push(`Cloud Run memory must be between 128Mi and 32Gi (got ${memoryMb}Mi)`);
        }
        if (target.scaling.maxInstances > 1000) {
            problems.push(`Cloud Run max instances must be at most 1000 (got ${target.scaling.maxInstances})`);
        }
        return problems;
    }

    async authenticate(credentialsFile: string, target: DeploymentTarget): Promise<CloudSession> {
        const key = await readServiceAccountKey(credentialsFile, this.password);
        if (key.projectId && key.projectId !== target.projectId) {
            throw new AuthError(
                `Service account ${key.clientEmail} belongs to project ${key.projectId}, not ${target.projectId}`
            );
        }

        if (key.decryptedKey === undefined) {
            await this.activateServiceAccount(key.clientEmail, credentialsFile, target);
        } else {
            //! gcloud only reads key files; the plaintext copy lives until activation returns
            const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shiprun-key-'));
            try {
                const keyFile = path.join(dir, 'key.json');
                await fs.writeFile(keyFile, key.decryptedKey, { mode: 0o600 });
                await this.activateServiceAccount(key.clientEmail, keyFile, target);
            } finally {
                await fs.rm(dir, { recursive: true, force: true });
            }
        }

        return { platform: 'gcp', projectId: target.projectId, principal: key.clientEmail };
    }

    private async activateServiceAccount(clientEmail: string, keyFile: string, target: DeploymentTarget): Promise<void> {
        try {
            await this.runner(
                'gcloud',
                ['auth', 'activate-service-account', clientEmail, `--key-file=${keyFile}`, `--project=${target.projectId}`, '--quiet'],
                { timeoutMs: this.timeouts.authMs }
            );
        } catch (error) {
            throw new AuthError(`gcloud rejected the service account ${clientEmail}: ${describeError(error)}`, { cause: error });
        }
    }

    /**
     * gcr.io/<project>/<service>, or <host path>/<service> for Artifact
     * Registry hosts given with their repository path.
     */
    repositoryFor(target: DeploymentTarget): string {
        const host = this.registryHost.replace(/\/+$/, '');
        return host.includes('/')
            ? `${host}/${target.serviceName}`
            : `${host}/${target.projectId}/${target.serviceName}`;
    }

    async registryLogin(): Promise<void> {
        const hostname = this.registryHost.split('/')[0];
        await this.runner('gcloud', ['auth', 'configure-docker', hostname, '--quiet'], {
            timeoutMs: this.timeouts.authMs
        });
    }

    async deployService(target: DeploymentTarget, artifact: BuildArtifact): Promise<ServiceDeployment> {
        await this.runner('gcloud', cloudRunDeployArgs(target, artifact.imageReference), {
            timeoutMs: this.timeouts.deployMs,
            inherit: logger.isVerbose()
        });

        const { stdout } = await this.runner(
            'gcloud',
            [
                'run', 'services', 'describe', target.serviceName,
                '--project', target.projectId,
                '--region', target.region,
                '--platform', 'managed',
                '--format', 'json'
            ],
            { timeoutMs: this.timeouts.authMs }
        );
        return parseServiceDescription(stdout);
    }

    validateFunction(spec: FunctionSpec): string[] {
        const problems: string[] = [];

        if (!GCF_RUNTIME_PATTERN.test(spec.runtime)) {
            problems.push(`runtime "${spec.runtime}" is not a Cloud Functions runtime`);
        }
        if (!GCF_MEMORY_TIERS.includes(spec.memoryMb)) {
            problems.push(`memory must be one of ${GCF_MEMORY_TIERS.join(', ')} MB (got ${spec.memoryMb})`);
        }
        if (spec.timeoutSeconds > GCF_MAX_TIMEOUT_SECONDS) {
            problems.push(`timeout must be at most ${GCF_MAX_TIMEOUT_SECONDS}s (got ${spec.timeoutSeconds}s)`);
        }
        return problems;
    }

    async deployFunction(spec: FunctionSpec, target: DeploymentTarget): Promise<FunctionDeployment> {
        await this.runner('gcloud', cloudFunctionDeployArgs(spec, target), {
            timeoutMs: this.timeouts.functionMs,
            inherit: logger.isVerbose()
        });

        if (spec.trigger.type !== 'http') {
            return {};
        }

        const { stdout } = await this.runner(
            'gcloud',
            [
                'functions', 'describe', spec.name,
                '--project', target.projectId,
                '--region', spec.region ?? target.region,
                '--format', 'value(httpsTrigger.url)'
            ],
            { timeoutMs: this.timeouts.authMs }
        );
        const url = stdout.trim();
        return url ? { url } : {};
    }
}
