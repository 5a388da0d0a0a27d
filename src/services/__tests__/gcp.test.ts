import { createCipheriv, pbkdf2Sync, randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { DeploymentTarget, FunctionSpec } from '../../config/types';
import { DEFAULT_TIMEOUTS } from '../../config/configManager';
import type { CommandRunner } from '../../utils/exec';
import { AuthError, CommandError } from '../../utils/errors';
import { cloudFunctionDeployArgs, cloudRunDeployArgs, GcpPlatform, parseServiceDescription } from '../gcp';

const target: DeploymentTarget = {
    projectId: 'demo-project',
    region: 'us-central1',
    serviceName: 'financial-api',
    resources: { memoryMb: 2048, cpu: 2 },
    scaling: { minInstances: 2, maxInstances: 100 },
    allowPublicAccess: false,
    containerPort: 8080
};

const processFunction: FunctionSpec = {
    name: 'process-financial-data',
    runtime: 'python39',
    entryPoint: 'process_financial_data',
    memoryMb: 512,
    timeoutSeconds: 60,
    trigger: { type: 'http' },
    source: '/work/functions/process',
    environment: {}
};

const description = JSON.stringify({
    metadata: { name: 'financial-api' },
    status: {
        url: 'https://financial-api-abc123-uc.a.run.app',
        latestReadyRevisionName: 'financial-api-00007-xyz'
    }
});

function fakeGcloud(responses: Record<string, string> = {}): { runner: CommandRunner; calls: string[][] } {
    const calls: string[][] = [];
    const runner: CommandRunner = async (file, args) => {
        calls.push([file, ...args]);
        const key = args.slice(0, 3).join(' ');
        return { stdout: responses[key] ?? '', stderr: '' };
    };
    return { runner, calls };
}

describe('cloudRunDeployArgs', () => {
    it('deploys restricted unless public access is enabled', () => {
        expect(cloudRunDeployArgs(target, 'gcr.io/demo-project/financial-api:t1')).toEqual([
            'run', 'deploy', 'financial-api',
            '--image', 'gcr.io/demo-project/financial-api:t1',
            '--project', 'demo-project',
            '--region', 'us-central1',
            '--platform', 'managed',
            '--memory', '2048Mi',
            '--cpu', '2',
            '--min-instances', '2',
            '--max-instances', '100',
            '--port', '8080',
            '--no-allow-unauthenticated',
            '--quiet'
        ]);
    });

    it('allows unauthenticated callers only when asked', () => {
        const args = cloudRunDeployArgs({ ...target, allowPublicAccess: true }, 'image:t1');
        expect(args).toContain('--allow-unauthenticated');
        expect(args).not.toContain('--no-allow-unauthenticated');
    });
});

describe('cloudFunctionDeployArgs', () => {
    it('deploys an http function with the service access setting', () => {
        expect(cloudFunctionDeployArgs(processFunction, target)).toEqual([
            'functions', 'deploy', 'process-financial-data',
            '--project', 'demo-project',
            '--region', 'us-central1',
            '--runtime', 'python39',
            '--entry-point', 'process_financial_data',
            '--memory', '512MB',
            '--timeout', '60s',
            '--source', '/work/functions/process',
            '--trigger-http',
            '--no-allow-unauthenticated',
            '--quiet'
        ]);
    });

    it('passes topic triggers, region overrides and environment variables', () => {
        const args = cloudFunctionDeployArgs(
            {
                ...processFunction,
                name: 'risk_analyzer',
                region: 'europe-west1',
                trigger: { type: 'topic', topic: 'risk-events' },
                environment: { LOG_LEVEL: 'debug', MODE: 'batch' }
            },
            target
        );

        expect(args.slice(5, 7)).toEqual(['--region', 'europe-west1']);
        expect(args.slice(-5)).toEqual([
            '--trigger-topic', 'risk-events',
            '--set-env-vars', 'LOG_LEVEL=debug,MODE=batch',
            '--quiet'
        ]);
    });
});

describe('parseServiceDescription', () => {
    it('reads the URL and the ready revision', () => {
        expect(parseServiceDescription(description)).toEqual({
            serviceUrl: 'https://financial-api-abc123-uc.a.run.app',
            revision: 'financial-api-00007-xyz'
        });
    });

    it('fails when the service has no URL yet', () => {
        expect(() => parseServiceDescription(JSON.stringify({ status: {} }))).toThrow('Service is not reporting a URL yet');
    });

    it('fails on unreadable output', () => {
        expect(() => parseServiceDescription('Deploying...')).toThrow(/^Unreadable service description/);
    });
});

describe('GcpPlatform', () => {
    it('checks Cloud Run limits', () => {
        const platform = new GcpPlatform({ registryHost: 'gcr.io', timeouts: DEFAULT_TIMEOUTS });

        expect(platform.validateTarget(target)).toEqual([]);
        expect(platform.validateTarget({ ...target, resources: { memoryMb: 64, cpu: 3 } })).toEqual([
            'Cloud Run cpu must be between 0.08 and 1, or one of 1, 2, 4, 6, 8 (got 3)',
            'Cloud Run memory must be between 128Mi and 32Gi (got 64Mi)'
        ]);
    });

    it('derives the repository from the registry host', () => {
        const gcr = new GcpPlatform({ registryHost: 'gcr.io', timeouts: DEFAULT_TIMEOUTS });
        const artifactRegistry = new GcpPlatform({
            registryHost: 'us-central1-docker.pkg.dev/demo-project/services',
            timeouts: DEFAULT_TIMEOUTS
        });

        expect(gcr.repositoryFor(target)).toBe('gcr.io/demo-project/financial-api');
        expect(artifactRegistry.repositoryFor(target)).toBe('us-central1-docker.pkg.dev/demo-project/services/financial-api');
    });

    it('rejects Cloud Functions settings outside the supported tiers', () => {
        const platform = new GcpPlatform({ registryHost: 'gcr.io', timeouts: DEFAULT_TIMEOUTS });

        expect(platform.validateFunction(processFunction)).toEqual([]);
        expect(platform.validateFunction({ ...processFunction, runtime: 'cobol85', memoryMb: 300, timeoutSeconds: 600 })).toEqual([
            'runtime "cobol85" is not a Cloud Functions runtime',
            'memory must be one of 128, 256, 512, 1024, 2048, 4096, 8192 MB (got 300)',
            'timeout must be at most 540s (got 600s)'
        ]);
    });

    it('configures docker for the registry hostname only', async () => {
        const { runner, calls } = fakeGcloud();
        const platform = new GcpPlatform({
            registryHost: 'us-central1-docker.pkg.dev/demo-project/services',
            timeouts: DEFAULT_TIMEOUTS,
            runner
        });

        await platform.registryLogin();

        expect(calls).toEqual([['gcloud', 'auth', 'configure-docker', 'us-central1-docker.pkg.dev', '--quiet']]);
    });

    it('deploys the service and reads back its URL', async () => {
        const { runner, calls } = fakeGcloud({ 'run services describe': description });
        const platform = new GcpPlatform({ registryHost: 'gcr.io', timeouts: DEFAULT_TIMEOUTS, runner });

        const deployment = await platform.deployService(target, {
            repository: 'gcr.io/demo-project/financial-api',
            tag: 't1',
            imageReference: 'gcr.io/demo-project/financial-api:t1',
            aliasReference: 'gcr.io/demo-project/financial-api:latest',
            revision: '3f2c1ab',
            builtAt: '2026-10-18T09:30:00.000Z'
        });

        expect(deployment).toEqual({
            serviceUrl: 'https://financial-api-abc123-uc.a.run.app',
            revision: 'financial-api-00007-xyz'
        });
        expect(calls.map((call) => call.slice(1, 4).join(' '))).toEqual(['run deploy financial-api', 'run services describe']);
    });

    it('returns the trigger URL of an http function', async () => {
        const { runner, calls } = fakeGcloud({
            'functions describe process-financial-data': 'https://us-central1-demo-project.cloudfunctions.net/process-financial-data\n'
        });
        const platform = new GcpPlatform({ registryHost: 'gcr.io', timeouts: DEFAULT_TIMEOUTS, runner });

        await expect(platform.deployFunction(processFunction, target)).resolves.toEqual({
            url: 'https://us-central1-demo-project.cloudfunctions.net/process-financial-data'
        });
        expect(calls).toHaveLength(2);
    });

    it('does not describe functions without an http trigger', async () => {
        const { runner, calls } = fakeGcloud();
        const platform = new GcpPlatform({ registryHost: 'gcr.io', timeouts: DEFAULT_TIMEOUTS, runner });

        await expect(
            platform.deployFunction({ ...processFunction, trigger: { type: 'bucket', bucket: 'uploads' } }, target)
        ).resolves.toEqual({});
        expect(calls).toHaveLength(1);
    });

    describe('authenticate', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shiprun-gcp-'));
        });

        afterEach(async () => {
            await fs.rm(dir, { recursive: true, force: true });
        });

        function keyJson(projectId = 'demo-project'): string {
            return JSON.stringify({
                type: 'service_account',
                project_id: projectId,
                private_key: 'test-secret',
                client_email: `deployer@${projectId}.iam.gserviceaccount.com`
            });
        }

        async function writeKey(content = keyJson()): Promise<string> {
            const file = path.join(dir, 'key.json');
            await fs.writeFile(file, content);
            return file;
        }

        it('activates the service account', async () => {
            const file = await writeKey();
            const { runner, calls } = fakeGcloud();
            const platform = new GcpPlatform({ registryHost: 'gcr.io', timeouts: DEFAULT_TIMEOUTS, runner });

            await expect(platform.authenticate(file, target)).resolves.toEqual({
                platform: 'gcp',
                projectId: 'demo-project',
                principal: 'deployer@demo-project.iam.gserviceaccount.com'
            });
            expect(calls).toEqual([
                [
                    'gcloud',
                    'auth',
                    'activate-service-account',
                    'deployer@demo-project.iam.gserviceaccount.com',
                    `--key-file=${file}`,
                    '--project=demo-project',
                    '--quiet'
                ]
            ]);
        });

        it('turns a gcloud rejection into an AuthError', async () => {
            const file = await writeKey();
            const runner: CommandRunner = async () => {
                throw new CommandError('gcloud auth', { exitCode: 1, timedOut: false, stderr: 'ERROR: invalid key' });
            };
            const platform = new GcpPlatform({ registryHost: 'gcr.io', timeouts: DEFAULT_TIMEOUTS, runner });

            const attempt = platform.authenticate(file, target);
            await expect(attempt).rejects.toBeInstanceOf(AuthError);
            await expect(attempt).rejects.toThrow(
                'gcloud rejected the service account deployer@demo-project.iam.gserviceaccount.com: gcloud auth exited with code 1: ERROR: invalid key'
            );
        });

        it('never calls gcloud with a missing key file', async () => {
            const { runner, calls } = fakeGcloud();
            const platform = new GcpPlatform({ registryHost: 'gcr.io', timeouts: DEFAULT_TIMEOUTS, runner });

            await expect(platform.authenticate(path.join(dir, 'absent.json'), target)).rejects.toBeInstanceOf(AuthError);
            expect(calls).toEqual([]);
        });

        it('rejects a key from another project before calling gcloud', async () => {
            const file = await writeKey(keyJson('other-project'));
            const { runner, calls } = fakeGcloud();
            const platform = new GcpPlatform({ registryHost: 'gcr.io', timeouts: DEFAULT_TIMEOUTS, runner });

            const attempt = platform.authenticate(file, target);
            await expect(attempt).rejects.toBeInstanceOf(AuthError);
            await expect(attempt).rejects.toThrow(
                'Service account deployer@other-project.iam.gserviceaccount.com belongs to project other-project, not demo-project'
            );
            expect(calls).toEqual([]);
        });

        it('activates a decrypted copy of an encrypted key and removes it afterwards', async () => {
            const salt = randomBytes(16);
            const nonce = randomBytes(12);
            const cipher = createCipheriv('aes-256-gcm', pbkdf2Sync('test-password', salt, 480_000, 32, 'sha256'), nonce);
            const ciphertext = Buffer.concat([cipher.update(keyJson(), 'utf-8'), cipher.final()]);
            const file = await writeKey(
                JSON.stringify({
                    salt: salt.toString('base64'),
                    nonce: nonce.toString('base64'),
                    tag: cipher.getAuthTag().toString('base64'),
                    ciphertext: ciphertext.toString('base64')
                })
            );

            let activatedWith = '';
            let keyFileContent = '';
            const runner: CommandRunner = async (_file, args) => {
                const keyFile = args[3].replace('--key-file=', '');
                activatedWith = keyFile;
                keyFileContent = await fs.readFile(keyFile, 'utf-8');
                return { stdout: '', stderr: '' };
            };
            const platform = new GcpPlatform({
                registryHost: 'gcr.io',
                timeouts: DEFAULT_TIMEOUTS,
                runner,
                password: async () => 'test-password'
            });

            await expect(platform.authenticate(file, target)).resolves.toMatchObject({
                principal: 'deployer@demo-project.iam.gserviceaccount.com'
            });
            expect(activatedWith).not.toBe(file);
            expect(keyFileContent).toBe(keyJson());
            await expect(fs.access(activatedWith)).rejects.toThrow();
        });
    });
});
