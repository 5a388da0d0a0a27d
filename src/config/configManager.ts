import { promises as fs } from 'fs';
import * as path from 'path';
import {
    BuildSource,
    DeploymentTarget,
    FunctionSpec,
    FunctionTrigger,
    PipelineSettings,
    PLATFORM_NAMES,
    PlatformName,
    PlatformSettings,
    ReleaseConfig,
    ReleaseInput,
    TimeoutSettings
} from './types';
import { ConfigError, describeError } from '../utils/errors';
import {
    isValidFunctionName,
    isValidImageTag,
    isValidRegion,
    isValidServiceName,
    parseBoolean,
    parseDurationMs,
    parseInteger,
    parseMemoryMb,
    parseNumber
} from '../utils/validation';

export const DEFAULT_CONFIG_FILE = 'shiprun.json';

export const DEFAULT_TIMEOUTS: TimeoutSettings = {
    authMs: 60_000,
    buildMs: 15 * 60_000,
    publishMs: 10 * 60_000,
    deployMs: 10 * 60_000,
    functionMs: 10 * 60_000
};

const TIMEOUT_KEYS: ReadonlyArray<keyof TimeoutSettings> = ['authMs', 'buildMs', 'publishMs', 'deployMs', 'functionMs'];

const DEFAULTS = {
    platform: 'gcp',
    registryHost: 'gcr.io',
    memoryMb: 512,
    cpu: 1,
    minInstances: 0,
    maxInstances: 100,
    containerPort: 8080,
    functionConcurrency: 4,
    retryDelayMs: 2000,
    healthCheckPath: '/health',
    healthCheckTimeoutMs: 5000,
    healthCheckIntervalMs: 1000,
    functionMemoryMb: 256,
    functionTimeoutSeconds: 60
} as const;

type Env = Record<string, string | undefined>;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Drop undefined fields so a layer only overrides what it actually sets
 */
function compact(input: ReleaseInput): ReleaseInput {
    return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

/**
 * Collects problems while reading untyped JSON so every mistake in a release
 * file is reported at once.
 */
class FieldReader {
    constructor(private readonly problems: string[]) {}

    string(record: JsonRecord, key: string, where: string): string | undefined {
        const value = record[key];
        if (value === undefined) return undefined;
        if (typeof value === 'string') return value;
        this.problems.push(`${where}${key} must be a string`);
        return undefined;
    }

    scalar(record: JsonRecord, key: string, where: string): string | number | undefined {
        const value = record[key];
        if (value === undefined) return undefined;
        if (typeof value === 'string' || typeof value === 'number') return value;
        this.problems.push(`${where}${key} must be a string or a number`);
        return undefined;
    }

    flag(record: JsonRecord, key: string, where: string): boolean | undefined {
        const value = record[key];
        if (value === undefined) return undefined;
        if (typeof value === 'boolean') return value;
        this.problems.push(`${where}${key} must be true or false`);
        return undefined;
    }

    section(record: JsonRecord, key: string): JsonRecord {
        const value = record[key];
        if (value === undefined) return {};
        if (isRecord(value)) return value;
        this.problems.push(`${key} must be an object`);
        return {};
    }

    stringMap(record: JsonRecord, key: string, where: string): Record<string, string> | undefined {
        const value = record[key];
        if (value === undefined) return undefined;
        if (isRecord(value) && Object.values(value).every((entry) => typeof entry === 'string')) {
            return Object.fromEntries(Object.entries(value).map(([name, entry]) => [name, String(entry)]));
        }
        this.problems.push(`${where}${key} must map names to strings`);
        return undefined;
    }
}

export interface LoadOptions {
    /** Explicit release file; when omitted shiprun.json in cwd is used if present */
    configPath?: string;
    cwd?: string;
    env?: Env;
    /** Values from CLI flags; highest precedence */
    overrides?: ReleaseInput;
}

/**
 * Builds the validated, frozen ReleaseConfig for one run from a release file,
 * environment variables and CLI flags (in increasing precedence).
 */
export class ConfigManager {
    private readonly cwd: string;
    private readonly env: Env;

    constructor(cwd: string = process.cwd(), env: Env = process.env) {
        this.cwd = cwd;
        this.env = env;
    }

    /**
     * Reads the release file. A missing default file is not an error; a
     * missing explicit one is.
     */
    async readReleaseFile(configPath?: string): Promise<ReleaseInput> {
        const file = path.resolve(this.cwd, configPath ?? DEFAULT_CONFIG_FILE);

        let content: string;
        try {
            content = await fs.readFile(file, 'utf-8');
        } catch (error) {
            if (configPath === undefined) {
                return {};
            }
            throw new ConfigError([`cannot read release file ${file}: ${describeError(error)}`]);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            throw new ConfigError([`release file ${file} is not valid JSON: ${describeError(error)}`]);
        }
        if (!isRecord(parsed)) {
            throw new ConfigError([`release file ${file} must contain a JSON object`]);
        }

        const problems: string[] = [];
        const input = this.fromFile(parsed, problems);
        if (problems.length > 0) {
            throw new ConfigError(problems);
        }
        return input;
    }

    private fromFile(raw: JsonRecord, problems: string[]): ReleaseInput {
        const read = new FieldReader(problems);
        const resources = read.section(raw, 'resources');
        const scaling = read.section(raw, 'scaling');
        const build = read.section(raw, 'build');
        const aws = read.section(raw, 'aws');
        const pipeline = read.section(raw, 'pipeline');
        const healthCheck = read.section(raw, 'healthCheck');
        const timeouts = read.section(pipeline, 'timeouts');

        let functions: unknown[] | undefined;
        if (raw.functions !== undefined) {
            if (Array.isArray(raw.functions)) {
                functions = raw.functions;
            } else {
                problems.push('functions must be an array');
            }
        }

        const timeoutValues: Partial<Record<keyof TimeoutSettings, number>> = {};
        for (const key of TIMEOUT_KEYS) {
            const value = read.scalar(timeouts, key, 'pipeline.timeouts.');
            if (value === undefined) continue;
            const ms = parseDurationMs(value);
            if (ms === null || ms <= 0) {
                problems.push(`pipeline.timeouts.${key} must be a positive duration`);
            } else {
                timeoutValues[key] = ms;
            }
        }

        return compact({
            platform: read.string(raw, 'platform', ''),
            projectId: read.string(raw, 'projectId', ''),
            region: read.string(raw, 'region', ''),
            serviceName: read.string(raw, 'serviceName', ''),
            credentialsFile: read.string(raw, 'credentialsFile', ''),
            allowPublicAccess: read.flag(raw, 'allowPublicAccess', ''),
            containerPort: read.scalar(raw, 'containerPort', ''),
            registryHost: read.string(raw, 'registryHost', ''),
            memory: read.scalar(resources, 'memory', 'resources.'),
            cpu: read.scalar(resources, 'cpu', 'resources.'),
            minInstances: read.scalar(scaling, 'minInstances', 'scaling.'),
            maxInstances: read.scalar(scaling, 'maxInstances', 'scaling.'),
            contextDir: read.string(build, 'context', 'build.'),
            dockerfile: read.string(build, 'dockerfile', 'build.'),
            buildArgs: read.stringMap(build, 'args', 'build.'),
            tag: read.string(build, 'tag', 'build.'),
            accessRoleArn: read.string(aws, 'accessRoleArn', 'aws.'),
            executionRoleArn: read.string(aws, 'executionRoleArn', 'aws.'),
            functions,
            strictFunctions: read.flag(pipeline, 'strictFunctions', 'pipeline.'),
            functionConcurrency: read.scalar(pipeline, 'functionConcurrency', 'pipeline.'),
            retryDelayMs: read.scalar(pipeline, 'retryDelayMs', 'pipeline.'),
            healthCheckEnabled: read.flag(healthCheck, 'enabled', 'healthCheck.'),
            healthCheckPath: read.string(healthCheck, 'path', 'healthCheck.'),
            healthCheckTimeout: read.scalar(healthCheck, 'timeoutMs', 'healthCheck.'),
            healthCheckInterval: read.scalar(healthCheck, 'intervalMs', 'healthCheck.'),
            timeouts: Object.keys(timeoutValues).length > 0 ? timeoutValues : undefined
        });
    }

    /**
     * Environment layer. Variable names follow the original deploy script.
     */
    fromEnv(): ReleaseInput {
        const env = this.env;
        return compact({
            platform: env.PLATFORM,
            projectId: env.PROJECT_ID,
            region: env.REGION,
            serviceName: env.SERVICE_NAME,
            credentialsFile: env.CREDENTIALS_FILE || env.GOOGLE_APPLICATION_CREDENTIALS || undefined,
            allowPublicAccess: env.ALLOW_PUBLIC_ACCESS,
            memory: env.MEMORY,
            cpu: env.CPU,
            minInstances: env.MIN_INSTANCES,
            maxInstances: env.MAX_INSTANCES,
            tag: env.IMAGE_TAG,
            registryHost: env.REGISTRY_HOST,
            healthCheckPath: env.HEALTH_CHECK_PATH,
            accessRoleArn: env.AWS_ACCESS_ROLE_ARN,
            executionRoleArn: env.AWS_EXECUTION_ROLE_ARN
        });
    }

    async load(options: LoadOptions = {}): Promise<ReleaseConfig> {
        const fileLayer = await this.readReleaseFile(options.configPath);
        const merged: ReleaseInput = {
            ...fileLayer,
            ...this.fromEnv(),
            ...compact(options.overrides ?? {})
        };
        return deepFreeze(this.resolve(merged));
    }

    /**
     * Apply defaults and validate. Throws one ConfigError listing every problem.
     */
    resolve(input: ReleaseInput): ReleaseConfig {
        const problems: string[] = [];

        const required = (value: string | undefined, name: string): string => {
            if (value === undefined || value.trim() === '') {
                problems.push(`${name} is required`);
                return '';
            }
            return value.trim();
        };

        const positive = (value: number | null, name: string): number => {
            if (value === null || !(value > 0)) {
                problems.push(`${name} must be a positive number`);
                return 0;
            }
            return value;
        };

        const flag = (value: boolean | string | undefined, name: string, fallback: boolean): boolean => {
            if (value === undefined) return fallback;
            const parsed = parseBoolean(value);
            if (parsed === null) {
                problems.push(`${name} must be true or false`);
                return fallback;
            }
            return parsed;
        };

        const integer = (value: string | number | undefined, name: string, fallback: number, min: number): number => {
            if (value === undefined) return fallback;
            const parsed = parseInteger(value);
            if (parsed === null || parsed < min) {
                problems.push(`${name} must be an integer >= ${min}`);
                return fallback;
            }
            return parsed;
        };

        // Platform
        const platformName = input.platform ?? DEFAULTS.platform;
        if (!isPlatformName(platformName)) {
            problems.push(`platform must be one of ${PLATFORM_NAMES.join(', ')} (got "${platformName}")`);
        }

        // Target
        const projectId = required(input.projectId, 'projectId (PROJECT_ID)');
        const region = required(input.region, 'region (REGION)');
        const serviceName = required(input.serviceName, 'serviceName (SERVICE_NAME)');
        const credentialsFile = required(input.credentialsFile, 'credentialsFile (CREDENTIALS_FILE)');

        if (region && !isValidRegion(region)) {
            problems.push(`region "${region}" is not a valid region`);
        }
        if (serviceName && !isValidServiceName(serviceName)) {
            problems.push(`serviceName "${serviceName}" must be lowercase letters, digits and dashes, starting with a letter`);
        }

        const memoryMb = positive(
            input.memory === undefined ? DEFAULTS.memoryMb : parseMemoryMb(input.memory),
            'resources.memory'
        );
        const cpu = positive(input.cpu === undefined ? DEFAULTS.cpu : parseNumber(input.cpu), 'resources.cpu');
        const minInstances = integer(input.minInstances, 'scaling.minInstances', DEFAULTS.minInstances, 0);
        const maxInstances = integer(input.maxInstances, 'scaling.maxInstances', DEFAULTS.maxInstances, 1);
        if (minInstances > maxInstances) {
            problems.push(`scaling.minInstances (${minInstances}) must not exceed scaling.maxInstances (${maxInstances})`);
        }
        const containerPort = integer(input.containerPort, 'containerPort', DEFAULTS.containerPort, 1);
        if (containerPort > 65535) {
            problems.push('containerPort must be at most 65535');
        }

        const target: DeploymentTarget = {
            projectId,
            region,
            serviceName,
            resources: { memoryMb, cpu },
            scaling: { minInstances, maxInstances },
            allowPublicAccess: flag(input.allowPublicAccess, 'allowPublicAccess', false),
            containerPort
        };

        // Build
        if (input.tag !== undefined && !isValidImageTag(input.tag)) {
            problems.push(`tag "${input.tag}" is not a valid unique image tag ("latest" is reserved as an alias)`);
        }
        const contextDir = path.resolve(this.cwd, input.contextDir ?? '.');
        const build: BuildSource = {
            contextDir,
            dockerfile: path.resolve(contextDir, input.dockerfile ?? 'Dockerfile'),
            buildArgs: input.buildArgs ?? {},
            tag: input.tag
        };

        // Functions
        const functions = (input.functions ?? []).map((raw, index) => this.readFunction(raw, index, problems));
        const seen = new Set<string>();
        for (const spec of functions) {
            if (seen.has(spec.name)) {
                problems.push(`function name "${spec.name}" is used more than once`);
            }
            seen.add(spec.name);
        }

        // Pipeline
        const healthTimeout = input.healthCheckTimeout === undefined
            ? DEFAULTS.healthCheckTimeoutMs
            : parseDurationMs(input.healthCheckTimeout);
        const healthInterval = input.healthCheckInterval === undefined
            ? DEFAULTS.healthCheckIntervalMs
            : parseDurationMs(input.healthCheckInterval);
        const healthPath = input.healthCheckPath ?? DEFAULTS.healthCheckPath;
        if (!healthPath.startsWith('/')) {
            problems.push('healthCheck.path must start with "/"');
        }

        const pipeline: PipelineSettings = {
            strictFunctions: flag(input.strictFunctions, 'strictFunctions', false),
            functionConcurrency: integer(input.functionConcurrency, 'functionConcurrency', DEFAULTS.functionConcurrency, 1),
            retryDelayMs: integer(input.retryDelayMs, 'retryDelayMs', DEFAULTS.retryDelayMs, 0),
            timeouts: { ...DEFAULT_TIMEOUTS, ...input.timeouts },
            healthCheck: {
                enabled: flag(input.healthCheckEnabled, 'healthCheck.enabled', true),
                path: healthPath,
                timeoutMs: positive(healthTimeout, 'healthCheck.timeoutMs'),
                intervalMs: positive(healthInterval, 'healthCheck.intervalMs')
            }
        };

        // Platform settings
        const platform: PlatformSettings = {
            name: isPlatformName(platformName) ? platformName : 'gcp',
            registryHost: input.registryHost ?? DEFAULTS.registryHost,
            accessRoleArn: input.accessRoleArn,
            executionRoleArn: input.executionRoleArn
        };
        if (platform.name === 'aws') {
            if (!platform.accessRoleArn) {
                problems.push('aws.accessRoleArn (AWS_ACCESS_ROLE_ARN) is required to pull images from ECR');
            }
            if (functions.length > 0 && !platform.executionRoleArn) {
                problems.push('aws.executionRoleArn (AWS_EXECUTION_ROLE_ARN) is required to deploy functions');
            }
        }

        if (problems.length > 0) {
            throw new ConfigError(problems);
        }

        return {
            platform,
            credentialsFile: path.resolve(this.cwd, credentialsFile),
            target,
            build,
            functions,
            pipeline
        };
    }

    /**
     * Structural checks only. Range and runtime checks happen in the
     * functions stage so one bad spec does not block the others.
     */
    private readFunction(raw: unknown, index: number, problems: string[]): FunctionSpec {
        const where = `functions[${index}].`;
        const read = new FieldReader(problems);
        const record: JsonRecord = isRecord(raw) ? raw : {};
        if (!isRecord(raw)) {
            problems.push(`functions[${index}] must be an object`);
        }

        const name = read.string(record, 'name', where) ?? '';
        if (!isValidFunctionName(name)) {
            problems.push(`${where}name "${name}" is not a valid function name`);
        }

        const memory = read.scalar(record, 'memory', where);
        const memoryMb = memory === undefined ? DEFAULTS.functionMemoryMb : parseMemoryMb(memory);
        if (memoryMb === null) {
            problems.push(`${where}memory "${memory}" is not a memory amount`);
        }

        const timeout = read.scalar(record, 'timeout', where);
        const timeoutMs = timeout === undefined ? DEFAULTS.functionTimeoutSeconds * 1000 : parseDurationMs(timeout, 's');
        if (timeoutMs === null) {
            problems.push(`${where}timeout "${timeout}" is not a duration`);
        }

        return {
            name,
            runtime: read.string(record, 'runtime', where) ?? '',
            entryPoint: read.string(record, 'entryPoint', where) ?? '',
            memoryMb: memoryMb ?? 0,
            timeoutSeconds: timeoutMs === null ? 0 : Math.round(timeoutMs / 1000),
            trigger: this.readTrigger(record, where, problems),
            region: read.string(record, 'region', where),
            source: path.resolve(this.cwd, read.string(record, 'source', where) ?? '.'),
            environment: read.stringMap(record, 'environment', where) ?? {}
        };
    }

    private readTrigger(record: JsonRecord, where: string, problems: string[]): FunctionTrigger {
        const trigger = record.trigger;
        if (trigger === undefined || trigger === 'http') {
            return { type: 'http' };
        }
        if (isRecord(trigger)) {
            if (trigger.type === 'http') {
                return { type: 'http' };
            }
            if (trigger.type === 'topic' && typeof trigger.topic === 'string') {
                return { type: 'topic', topic: trigger.topic };
            }
            if (trigger.type === 'bucket' && typeof trigger.bucket === 'string') {
                return { type: 'bucket', bucket: trigger.bucket };
            }
        }
        problems.push(`${where}trigger must be "http", { "type": "topic", "topic": ... } or { "type": "bucket", "bucket": ... }`);
        return { type: 'http' };
    }
}

function isPlatformName(value: string): value is PlatformName {
    return PLATFORM_NAMES.some((name) => name === value);
}

/**
 * Convenience wrapper used by the CLI commands
 */
export function loadReleaseConfig(options: LoadOptions = {}): Promise<ReleaseConfig> {
    return new ConfigManager(options.cwd, options.env).load(options);
}
