/**
 * ================================================================================
 * AWS PLATFORM - App Runner, ECR and Lambda
 * ================================================================================
 *
 * AWS rendition of the release pipeline. The managed container service is App
 * Runner (immutable deployments, public URL, min/max scaling), images live in
 * ECR and auxiliary functions are Lambda functions with optional function URLs.
 *
 * KEY OPERATIONS:
 * • authenticate - STS GetCallerIdentity with the key file; account must equal projectId
 * • registryLogin - ensure the ECR repository exists, then docker login with an ECR token
 * • deployService - reuse or create the auto scaling configuration, then CreateService/UpdateService
 *   and wait for the operation to finish (bounded by timeouts.deployMs)
 * • deployFunction - CreateFunction or UpdateFunctionCode + UpdateFunctionConfiguration, then the function URL
 *
 * PREREQUISITES:
 * • An access role App Runner assumes to pull from ECR (aws.accessRoleArn)
 * • An execution role for Lambda functions (aws.executionRoleArn)
 * • Function sources packaged as .zip archives
 *
 * //! SECURITY: IsPubliclyAccessible and the function URL auth type follow allowPublicAccess only
 */

import { promises as fs } from 'fs';
import { GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import {
    CreateRepositoryCommand,
    DescribeRepositoriesCommand,
    ECRClient,
    GetAuthorizationTokenCommand,
    ImageTagMutability,
    RepositoryNotFoundException
} from '@aws-sdk/client-ecr';
import {
    AppRunnerClient,
    CreateAutoScalingConfigurationCommand,
    CreateServiceCommand,
    DescribeAutoScalingConfigurationCommand,
    DescribeServiceCommand,
    ImageRepositoryType,
    InstanceConfiguration,
    ListAutoScalingConfigurationsCommand,
    ListOperationsCommand,
    ListServicesCommand,
    NetworkConfiguration,
    OperationStatus,
    ServiceStatus,
    SourceConfiguration,
    UpdateServiceCommand
} from '@aws-sdk/client-apprunner';
import {
    AddPermissionCommand,
    CreateFunctionCommand,
    CreateFunctionUrlConfigCommand,
    FunctionUrlAuthType,
    GetFunctionCommand,
    GetFunctionUrlConfigCommand,
    LambdaClient,
    PackageType,
    ResourceConflictException,
    ResourceNotFoundException,
    Runtime,
    UpdateFunctionCodeCommand,
    UpdateFunctionConfigurationCommand,
    UpdateFunctionUrlConfigCommand,
    waitUntilFunctionActiveV2,
    waitUntilFunctionUpdatedV2
} from '@aws-sdk/client-lambda';
import type { DeploymentTarget, FunctionSpec, TimeoutSettings } from '../config/types';
import type { BuildArtifact, CloudSession, FunctionDeployment, ServiceDeployment } from '../types';
import type { CloudPlatform } from './platform';
import {
    AwsCredentials,
    createAppRunnerClient,
    createECRClient,
    createLambdaClient,
    createSTSClient,
    toAwsCredentials
} from '../aws/clients';
import { dockerLogin } from '../docker/dockerPusher';
import { CommandRunner, runCommand } from '../utils/exec';
import { AuthError, describeError } from '../utils/errors';
import { PasswordSource, passwordFromEnv, readAwsAccessKey } from '../utils/credentials';
import { sleep, withTimeout } from '../utils/retry';
import { logger } from '../utils/logger';
import { formatDuration } from '../utils/validation';

/**
 * ================================================================================
 * LIMITS AND REQUEST BUILDERS
 * ================================================================================
 */

const APP_RUNNER_CPUS = [0.25, 0.5, 1, 2, 4];
const APP_RUNNER_MEMORY_MB = [512, 1024, 2048, 3072, 4096, 6144, 8192, 10240, 12288];
const APP_RUNNER_MAX_INSTANCES = 25;

const LAMBDA_MIN_MEMORY_MB = 128;
const LAMBDA_MAX_MEMORY_MB = 10240;
const LAMBDA_MAX_TIMEOUT_SECONDS = 900;

const LAMBDA_RUNTIMES: ReadonlySet<string> = new Set(Object.values(Runtime));

const PUBLIC_URL_STATEMENT_ID = 'FunctionURLAllowPublicAccess';

const APP_RUNNER_POLL_INTERVAL_MS = 5_000;

function isLambdaRuntime(value: string): value is Runtime {
    return LAMBDA_RUNTIMES.has(value);
}

export interface AwsPlatformOptions {
    timeouts: TimeoutSettings;
    accessRoleArn?: string;
    executionRoleArn?: string;
    runner?: CommandRunner;
    /** Password of an encrypted key file; defaults to CREDENTIALS_PASSWORD */
    password?: PasswordSource;
}

/**
 * App Runner keeps at least one instance provisioned, so a requested minimum
 * of zero becomes one.
 */
export function appRunnerScaling(target: DeploymentTarget): { minSize: number; maxSize: number } {
    return {
        minSize: Math.max(1, target.scaling.minInstances),
        maxSize: target.scaling.maxInstances
    };
}

export function autoScalingConfigurationName(serviceName: string): string {
    return `${serviceName.slice(0, 24)}-scaling`;
}

export function appRunnerServiceSettings(
    target: DeploymentTarget,
    imageReference: string,
    accessRoleArn: string
): { source: SourceConfiguration; instance: InstanceConfiguration; network: NetworkConfiguration } {
    return {
        source: {
            ImageRepository: {
                ImageIdentifier: imageReference,
                ImageRepositoryType: ImageRepositoryType.ECR,
                ImageConfiguration: { Port: String(target.containerPort) }
            },
            AutoDeploymentsEnabled: false,
            AuthenticationConfiguration: { AccessRoleArn: accessRoleArn }
        },
        instance: {
            Cpu: String(target.resources.cpu * 1024),
            Memory: String(target.resources.memoryMb)
        },
        network: {
            IngressConfiguration: { IsPubliclyAccessible: target.allowPublicAccess }
        }
    };
}

export function functionUrlAuthType(allowPublicAccess: boolean): FunctionUrlAuthType {
    return allowPublicAccess ? FunctionUrlAuthType.NONE : FunctionUrlAuthType.AWS_IAM;
}

export type OperationState = 'pending' | 'succeeded' | 'failed';

/**
 * State of one App Runner operation (ListOperations)
 */
export function operationState(status: string | undefined): OperationState {
    switch (status) {
        case OperationStatus.SUCCEEDED:
            return 'succeeded';
        case OperationStatus.FAILED:
        case OperationStatus.ROLLBACK_SUCCEEDED:
        case OperationStatus.ROLLBACK_FAILED:
            return 'failed';
        default:
            return 'pending';
    }
}

/**
 * State of the service itself (DescribeService)
 */
export function serviceState(status: string | undefined): OperationState {
    switch (status) {
        case ServiceStatus.RUNNING:
            return 'succeeded';
        case ServiceStatus.OPERATION_IN_PROGRESS:
            return 'pending';
        default:
            return 'failed';
    }
}

export interface AppRunnerWaitOptions {
    timeoutMs: number;
    intervalMs: number;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
}

/**
 * Poll an App Runner status until it settles. Throws when it settles as a
 * failure or is still pending once timeoutMs has passed.
 */
export async function waitForAppRunner(
    label: string,
    readStatus: () => Promise<string | undefined>,
    classify: (status: string | undefined) => OperationState,
    options: AppRunnerWaitOptions
): Promise<string | undefined> {
    const wait = options.sleep ?? sleep;
    const now = options.now ?? Date.now;
    const deadline = now() + options.timeoutMs;

    for (;;) {
        const status = await readStatus();
        const state = classify(status);
        if (state === 'succeeded') {
            return status;
        }
        if (state === 'failed') {
            throw new Error(`${label} ended with status ${status ?? 'unknown'}`);
        }
        if (now() >= deadline) {
            throw new Error(`${label} still ${status ?? 'pending'} after ${formatDuration(options.timeoutMs)}`);
        }
        logger.debug(`${label} is ${status ?? 'pending'}, checking again in ${options.intervalMs}ms`);
        await wait(options.intervalMs);
    }
}

/**
 * Split a base64 "AWS:<password>" ECR authorization token
 */
export function decodeAuthorizationToken(token: string): { username: string; password: string } {
    const decoded = Buffer.from(token, 'base64').toString('utf-8');
    const separator = decoded.indexOf(':');
    if (separator <= 0) {
        throw new Error('ECR returned an unreadable authorization token');
    }
    return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

/**
 * ================================================================================
 * AWS PLATFORM CLASS
 * ================================================================================
 */
export class AwsPlatform implements CloudPlatform {
    readonly name = 'aws' as const;
    private readonly runner: CommandRunner;
    private readonly timeouts: TimeoutSettings;
    private readonly accessRoleArn?: string;
    private readonly executionRoleArn?: string;
    private readonly password: PasswordSource;

    // Populated by authenticate()
    private credentials?: AwsCredentials;
    private ecrClient?: ECRClient;
    private appRunnerClient?: AppRunnerClient;
    private readonly lambdaClients = new Map<string, LambdaClient>();

    constructor(options: AwsPlatformOptions) {
        this.runner = options.runner ?? runCommand;
        this.timeouts = options.timeouts;
        this.accessRoleArn = options.accessRoleArn;
        this.executionRoleArn = options.executionRoleArn;
        this.password = options.password ?? passwordFromEnv;
    }

    validateTarget(target: DeploymentTarget): string[] {
        const problems: string[] = [];

        if (!/^\d{12}$/.test(target.projectId)) {
            problems.push(`projectId must be the 12-digit AWS account id (got "${target.projectId}")`);
        }
        if (!APP_RUNNER_CPUS.includes(target.resources.cpu)) {
            problems.push(`App Runner cpu must be one of ${APP_RUNNER_CPUS.join(', ')} (got ${target.resources.cpu})`);
        }
        if (!APP_RUNNER_MEMORY_MB.includes(target.resources.memoryMb)) {
            problems.push(`App Runner memory must be one of ${APP_RUNNER_MEMORY_MB.join(', ')} MB (got ${target.resources.memoryMb})`);
        }
        if (target.scaling.maxInstances > APP_RUNNER_MAX_INSTANCES) {
            problems.push(`App Runner max instances must be at most ${APP_RUNNER_MAX_INSTANCES} (got ${target.scaling.maxInstances})`);
        }
        return problems;
    }

    /**
     * ================================================================
     * AUTHENTICATION
     * ================================================================
     */

    async authenticate(credentialsFile: string, target: DeploymentTarget): Promise<CloudSession> {
        const credentials = toAwsCredentials(await readAwsAccessKey(credentialsFile, this.password));
        const sts = createSTSClient(target.region, credentials);

        let account: string | undefined;
        let arn: string | undefined;
        try {
            const identity = await sts.send(new GetCallerIdentityCommand({}), withTimeout(this.timeouts.authMs));
            account = identity.Account;
            arn = identity.Arn;
        } catch (error) {
            throw new AuthError(`AWS rejected the access key: ${describeError(error)}`, { cause: error });
        }

        if (account !== target.projectId) {
            throw new AuthError(`Access key belongs to account ${account ?? 'unknown'}, not ${target.projectId}`);
        }

        this.credentials = credentials;
        this.ecrClient = createECRClient(target.region, credentials);
        this.appRunnerClient = createAppRunnerClient(target.region, credentials);
        logger.debug('AWS session established', { account, arn });

        return { platform: 'aws', projectId: account, principal: arn ?? account };
    }

    private requireSession(): { ecr: ECRClient; appRunner: AppRunnerClient; credentials: AwsCredentials } {
        if (!this.credentials || !this.ecrClient || !this.appRunnerClient) {
            throw new Error('AWS platform used before authenticate()');
        }
        return { ecr: this.ecrClient, appRunner: this.appRunnerClient, credentials: this.credentials };
    }

    private lambdaFor(region: string): LambdaClient {
        const { credentials } = this.requireSession();
        let client = this.lambdaClients.get(region);
        if (!client) {
            client = createLambdaClient(region, credentials);
            this.lambdaClients.set(region, client);
        }
        return client;
    }

    /**
     * ================================================================
     * REGISTRY (ECR)
     * ================================================================
     */

    repositoryFor(target: DeploymentTarget): string {
        return `${target.projectId}.dkr.ecr.${target.region}.amazonaws.com/${target.serviceName}`;
    }

    async registryLogin(target: DeploymentTarget): Promise<void> {
        const { ecr } = this.requireSession();

        try {
            await ecr.send(
                new DescribeRepositoriesCommand({ repositoryNames: [target.serviceName] }),
                withTimeout(this.timeouts.authMs)
            );
        } catch (error) {
            if (!(error instanceof RepositoryNotFoundException)) {
                throw error;
            }
            logger.info(`Creating ECR repository ${target.serviceName}`);
            await ecr.send(
                new CreateRepositoryCommand({
                    repositoryName: target.serviceName,
                    imageTagMutability: ImageTagMutability.MUTABLE,
                    imageScanningConfiguration: { scanOnPush: true }
                }),
                withTimeout(this.timeouts.authMs)
            );
        }

        const { authorizationData } = await ecr.send(new GetAuthorizationTokenCommand({}), withTimeout(this.timeouts.authMs));
        const grant = authorizationData?.[0];
        if (!grant?.authorizationToken || !grant.proxyEndpoint) {
            throw new Error('ECR returned no authorization data');
        }

        await dockerLogin(
            this.runner,
            { registry: grant.proxyEndpoint, ...decodeAuthorizationToken(grant.authorizationToken) },
            this.timeouts.authMs
        );
    }

    /**
     * ================================================================
     * SERVICE (APP RUNNER)
     * ================================================================
     */

    async deployService(target: DeploymentTarget, artifact: BuildArtifact): Promise<ServiceDeployment> {
        const { appRunner } = this.requireSession();
        if (!this.accessRoleArn) {
            throw new Error('aws.accessRoleArn is required to deploy from ECR');
        }

        if (target.scaling.minInstances < 1) {
            logger.warn('App Runner keeps at least one instance; using minInstances = 1');
        }
        const autoScalingConfigurationArn = await this.ensureAutoScalingConfiguration(appRunner, target);
        const settings = appRunnerServiceSettings(target, artifact.imageReference, this.accessRoleArn);
        const existing = await this.findService(appRunner, target.serviceName);
        if (existing?.status === ServiceStatus.OPERATION_IN_PROGRESS) {
            logger.info(`App Runner service ${target.serviceName} is busy, waiting for its current operation`);
            await this.waitForService(appRunner, existing.arn, target.serviceName);
        }

        const response = existing
            ? await appRunner.send(
                new UpdateServiceCommand({
                    ServiceArn: existing.arn,
                    SourceConfiguration: settings.source,
                    InstanceConfiguration: settings.instance,
                    AutoScalingConfigurationArn: autoScalingConfigurationArn,
                    NetworkConfiguration: settings.network
                }),
                withTimeout(this.timeouts.deployMs)
            )
            : await appRunner.send(
                new CreateServiceCommand({
                    ServiceName: target.serviceName,
                    SourceConfiguration: settings.source,
                    InstanceConfiguration: settings.instance,
                    AutoScalingConfigurationArn: autoScalingConfigurationArn,
                    NetworkConfiguration: settings.network
                }),
                withTimeout(this.timeouts.deployMs)
            );

        const host = response.Service?.ServiceUrl;
        const serviceArn = response.Service?.ServiceArn;
        if (!host || !serviceArn) {
            throw new Error(`App Runner did not report a URL for ${target.serviceName}`);
        }
        logger.debug(existing ? 'App Runner service update started' : 'App Runner service creation started', {
            serviceArn,
            operationId: response.OperationId
        });

        //! App Runner deploys asynchronously; the new revision is live only once the operation succeeds
        const operationId = response.OperationId;
        if (operationId) {
            await waitForAppRunner(
                `App Runner operation ${operationId}`,
                () => this.readOperationStatus(appRunner, serviceArn, operationId),
                operationState,
                this.waitOptions()
            );
        } else {
            await this.waitForService(appRunner, serviceArn, target.serviceName);
        }

        return {
            serviceUrl: host.startsWith('https://') ? host : `https://${host}`,
            revision: operationId
        };
    }

    private waitOptions(): AppRunnerWaitOptions {
        return { timeoutMs: this.timeouts.deployMs, intervalMs: APP_RUNNER_POLL_INTERVAL_MS };
    }

    private async waitForService(appRunner: AppRunnerClient, serviceArn: string, serviceName: string): Promise<void> {
        await waitForAppRunner(
            `App Runner service ${serviceName}`,
            async () => {
                const { Service } = await appRunner.send(
                    new DescribeServiceCommand({ ServiceArn: serviceArn }),
                    withTimeout(this.timeouts.authMs)
                );
                return Service?.Status;
            },
            serviceState,
            this.waitOptions()
        );
    }

    private async readOperationStatus(
        appRunner: AppRunnerClient,
        serviceArn: string,
        operationId: string
    ): Promise<string | undefined> {
        const { OperationSummaryList } = await appRunner.send(
            new ListOperationsCommand({ ServiceArn: serviceArn, MaxResults: 20 }),
            withTimeout(this.timeouts.authMs)
        );
        return OperationSummaryList?.find((operation) => operation.Id === operationId)?.Status;
    }

    private async findService(
        appRunner: AppRunnerClient,
        serviceName: string
    ): Promise<{ arn: string; status?: string } | undefined> {
        let nextToken: string | undefined;
        do {
            const page = await appRunner.send(
                new ListServicesCommand({ NextToken: nextToken }),
                withTimeout(this.timeouts.authMs)
            );
            const match = page.ServiceSummaryList?.find((summary) => summary.ServiceName === serviceName);
            if (match?.ServiceArn) {
                return { arn: match.ServiceArn, status: match.Status };
            }
            nextToken = page.NextToken;
        } while (nextToken);
        return undefined;
    }

    /**
     * Reuse the latest revision of the service's scaling configuration when its
     * bounds already match; otherwise create a new revision.
     */
    private async ensureAutoScalingConfiguration(appRunner: AppRunnerClient, target: DeploymentTarget): Promise<string> {
        const name = autoScalingConfigurationName(target.serviceName);
        const { minSize, maxSize } = appRunnerScaling(target);

        const { AutoScalingConfigurationSummaryList } = await appRunner.send(
            new ListAutoScalingConfigurationsCommand({ AutoScalingConfigurationName: name, LatestOnly: true }),
            withTimeout(this.timeouts.authMs)
        );
        const latestArn = AutoScalingConfigurationSummaryList?.[0]?.AutoScalingConfigurationArn;
        if (latestArn) {
            const { AutoScalingConfiguration } = await appRunner.send(
                new DescribeAutoScalingConfigurationCommand({ AutoScalingConfigurationArn: latestArn }),
                withTimeout(this.timeouts.authMs)
            );
            if (AutoScalingConfiguration?.MinSize === minSize && AutoScalingConfiguration.MaxSize === maxSize) {
                return latestArn;
            }
        }

        const { AutoScalingConfiguration } = await appRunner.send(
            new CreateAutoScalingConfigurationCommand({
                AutoScalingConfigurationName: name,
                MinSize: minSize,
                MaxSize: maxSize
            }),
            withTimeout(this.timeouts.authMs)
        );
        if (!AutoScalingConfiguration?.AutoScalingConfigurationArn) {
            throw new Error(`App Runner did not return an auto scaling configuration for ${name}`);
        }
        return AutoScalingConfiguration.AutoScalingConfigurationArn;
    }

    /**
     * ================================================================
     * FUNCTIONS (LAMBDA)
     * ================================================================
     */

    validateFunction(spec: FunctionSpec): string[] {
        const problems: string[] = [];

        if (!isLambdaRuntime(spec.runtime)) {
            problems.push(`runtime "${spec.runtime}" is not a Lambda runtime`);
        }
        if (spec.memoryMb < LAMBDA_MIN_MEMORY_MB || spec.memoryMb > LAMBDA_MAX_MEMORY_MB) {
            problems.push(`memory must be between ${LAMBDA_MIN_MEMORY_MB} and ${LAMBDA_MAX_MEMORY_MB} MB (got ${spec.memoryMb})`);
        }
        if (spec.timeoutSeconds > LAMBDA_MAX_TIMEOUT_SECONDS) {
            problems.push(`timeout must be at most ${LAMBDA_MAX_TIMEOUT_SECONDS}s (got ${spec.timeoutSeconds}s)`);
        }
        if (spec.trigger.type !== 'http') {
            problems.push(`${spec.trigger.type} triggers are not supported on AWS; use an http trigger`);
        }
        if (!spec.source.endsWith('.zip')) {
            problems.push(`source must be a .zip archive on AWS (got ${spec.source})`);
        }
        return problems;
    }

    async deployFunction(spec: FunctionSpec, target: DeploymentTarget): Promise<FunctionDeployment> {
        const runtime = spec.runtime;
        if (!isLambdaRuntime(runtime)) {
            throw new Error(`runtime "${runtime}" is not a Lambda runtime`);
        }
        if (!this.executionRoleArn) {
            throw new Error('aws.executionRoleArn is required to deploy functions');
        }

        const client = this.lambdaFor(spec.region ?? target.region);
        const zipFile = await fs.readFile(spec.source);
        const waiter = { client, maxWaitTime: Math.ceil(this.timeouts.functionMs / 1000) };
        const configuration = {
            FunctionName: spec.name,
            Runtime: runtime,
            Handler: spec.entryPoint,
            MemorySize: spec.memoryMb,
            Timeout: spec.timeoutSeconds,
            Environment: { Variables: { ...spec.environment } }
        };

        if (await this.functionExists(client, spec.name)) {
            await client.send(
                new UpdateFunctionCodeCommand({ FunctionName: spec.name, ZipFile: zipFile }),
                withTimeout(this.timeouts.functionMs)
            );
            await waitUntilFunctionUpdatedV2(waiter, { FunctionName: spec.name });
            await client.send(new UpdateFunctionConfigurationCommand(configuration), withTimeout(this.timeouts.functionMs));
            await waitUntilFunctionUpdatedV2(waiter, { FunctionName: spec.name });
        } else {
            await client.send(
                new CreateFunctionCommand({
                    ...configuration,
                    Role: this.executionRoleArn,
                    PackageType: PackageType.Zip,
                    Code: { ZipFile: zipFile }
                }),
                withTimeout(this.timeouts.functionMs)
            );
            await waitUntilFunctionActiveV2(waiter, { FunctionName: spec.name });
        }

        if (spec.trigger.type !== 'http') {
            return {};
        }
        return { url: await this.ensureFunctionUrl(client, spec.name, target.allowPublicAccess) };
    }

    private async functionExists(client: LambdaClient, name: string): Promise<boolean> {
        try {
            await client.send(new GetFunctionCommand({ FunctionName: name }), withTimeout(this.timeouts.authMs));
            return true;
        } catch (error) {
            if (error instanceof ResourceNotFoundException) {
                return false;
            }
            throw error;
        }
    }

    private async ensureFunctionUrl(client: LambdaClient, name: string, allowPublicAccess: boolean): Promise<string | undefined> {
        const authType = functionUrlAuthType(allowPublicAccess);

        let exists = true;
        try {
            await client.send(new GetFunctionUrlConfigCommand({ FunctionName: name }), withTimeout(this.timeouts.authMs));
        } catch (error) {
            if (!(error instanceof ResourceNotFoundException)) {
                throw error;
            }
            exists = false;
        }

        const { FunctionUrl } = exists
            ? await client.send(
                new UpdateFunctionUrlConfigCommand({ FunctionName: name, AuthType: authType }),
                withTimeout(this.timeouts.authMs)
            )
            : await client.send(
                new CreateFunctionUrlConfigCommand({ FunctionName: name, AuthType: authType }),
                withTimeout(this.timeouts.authMs)
            );

        if (allowPublicAccess) {
            try {
                await client.send(
                    new AddPermissionCommand({
                        FunctionName: name,
                        StatementId: PUBLIC_URL_STATEMENT_ID,
                        Action: 'lambda:InvokeFunctionUrl',
                        Principal: '*',
                        FunctionUrlAuthType: FunctionUrlAuthType.NONE
                    }),
                    withTimeout(this.timeouts.authMs)
                );
            } catch (error) {
                if (!(error instanceof ResourceConflictException)) {
                    throw error;
                }
                logger.debug(`Public invoke permission already present on ${name}`);
            }
        }

        return FunctionUrl;
    }
}
