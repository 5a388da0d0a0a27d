export type PlatformName = 'gcp' | 'aws';

export const PLATFORM_NAMES: readonly PlatformName[] = ['gcp', 'aws'];

export interface ResourceLimits {
  readonly memoryMb: number;
  readonly cpu: number;
}

export interface ScalingBounds {
  readonly minInstances: number;
  readonly maxInstances: number;
}

/**
 * Where a release lands. Built once per invocation and frozen for the run.
 */
export interface DeploymentTarget {
  readonly projectId: string;
  readonly region: string;
  readonly serviceName: string;
  readonly resources: ResourceLimits;
  readonly scaling: ScalingBounds;
  readonly allowPublicAccess: boolean;
  readonly containerPort: number;
}

export type FunctionTrigger =
  | { readonly type: 'http' }
  | { readonly type: 'topic'; readonly topic: string }
  | { readonly type: 'bucket'; readonly bucket: string };

export interface FunctionSpec {
  readonly name: string;
  readonly runtime: string;
  readonly entryPoint: string;
  readonly memoryMb: number;
  readonly timeoutSeconds: number;
  readonly trigger: FunctionTrigger;
  readonly region?: string;
  readonly source: string;
  readonly environment: Readonly<Record<string, string>>;
}

export interface BuildSource {
  readonly contextDir: string;
  readonly dockerfile: string;
  readonly buildArgs: Readonly<Record<string, string>>;
  readonly tag?: string;
}

export interface HealthCheckSettings {
  readonly enabled: boolean;
  readonly path: string;
  readonly timeoutMs: number;
  readonly intervalMs: number;
}

export interface TimeoutSettings {
  readonly authMs: number;
  readonly buildMs: number;
  readonly publishMs: number;
  readonly deployMs: number;
  readonly functionMs: number;
}

export interface PipelineSettings {
  readonly strictFunctions: boolean;
  readonly functionConcurrency: number;
  readonly retryDelayMs: number;
  readonly timeouts: TimeoutSettings;
  readonly healthCheck: HealthCheckSettings;
}

export interface PlatformSettings {
  readonly name: PlatformName;
  readonly registryHost: string;
  readonly accessRoleArn?: string;
  readonly executionRoleArn?: string;
}

export interface ReleaseConfig {
  readonly platform: PlatformSettings;
  readonly credentialsFile: string;
  readonly target: DeploymentTarget;
  readonly build: BuildSource;
  readonly functions: readonly FunctionSpec[];
  readonly pipeline: PipelineSettings;
}

/**
 * One layer of raw settings (release file, environment or CLI flags).
 * Layers are merged field by field before validation.
 */
export interface ReleaseInput {
  platform?: string;
  projectId?: string;
  region?: string;
  serviceName?: string;
  credentialsFile?: string;
  memory?: string | number;
  cpu?: string | number;
  minInstances?: string | number;
  maxInstances?: string | number;
  containerPort?: string | number;
  allowPublicAccess?: boolean | string;
  registryHost?: string;
  accessRoleArn?: string;
  executionRoleArn?: string;
  tag?: string;
  contextDir?: string;
  dockerfile?: string;
  buildArgs?: Record<string, string>;
  functions?: unknown[];
  strictFunctions?: boolean | string;
  functionConcurrency?: string | number;
  retryDelayMs?: string | number;
  healthCheckEnabled?: boolean | string;
  healthCheckPath?: string;
  healthCheckTimeout?: string | number;
  healthCheckInterval?: string | number;
  timeouts?: Partial<Record<keyof TimeoutSettings, number>>;
}
