/**
 * ================================================================================
 * TYPE DEFINITIONS - Release Pipeline Data
 * ================================================================================
 *
 * Values passed from one pipeline stage to the next. Configuration types live
 * in config/types.ts; these are produced while a release is running.
 *
 * KEY INTERFACES:
 * • CloudSession - Result of the authenticate stage
 * • BuildArtifact - Uniquely tagged image produced by the build stage
 * • ServiceDeployment - Revision and URL reported by the deploy stage
 * • ReleaseSummary - Everything the CLI prints after a run
 */

import type { PlatformName } from '../config/types';

/**
 * ================================================================================
 * STAGES
 * ================================================================================
 */

/**
 * Ordered stages of a release. 'config' is not executed by the pipeline but
 * is used to tag configuration failures.
 */
export const RELEASE_STAGES = ['authenticate', 'build', 'publish', 'deploy', 'functions', 'verify'] as const;

export type ReleaseStage = (typeof RELEASE_STAGES)[number];

export type StageName = 'config' | ReleaseStage;

export const STAGE_LABELS: Record<StageName, string> = {
    config: 'Configuration',
    authenticate: 'Authenticate',
    build: 'Build image',
    publish: 'Publish image',
    deploy: 'Deploy service',
    functions: 'Deploy functions',
    verify: 'Verify deployment'
};

/**
 * ================================================================================
 * STAGE OUTPUTS
 * ================================================================================
 */

export interface CloudSession {
    platform: PlatformName;
    projectId: string;
    principal: string;              // service account e-mail or caller ARN
}

/**
 * Image produced by the build stage
 *
 * //! IMPORTANT: imageReference (unique tag) is what gets deployed, never aliasReference
 */
export interface BuildArtifact {
    repository: string;             // e.g. gcr.io/my-project/api
    tag: string;                    // e.g. 20261018-093000000-3f2c1ab
    imageReference: string;         // repository:tag
    aliasReference: string;         // repository:latest
    revision: string;               // source revision the tag was derived from
    builtAt: string;
}

export interface ServiceDeployment {
    serviceUrl: string;
    revision?: string;
}

export interface FunctionDeployment {
    url?: string;
}

export type FunctionDeployStatus = 'deployed' | 'failed' | 'skipped';

export interface FunctionDeployResult {
    name: string;
    status: FunctionDeployStatus;
    url?: string;
    error?: string;
}

export interface HealthCheckResult {
    url: string;
    status: number;
    attempts: number;
    elapsedMs: number;
}

export interface ReleaseSummary {
    platform: PlatformName;
    projectId: string;
    region: string;
    serviceName: string;
    serviceUrl: string;
    revision?: string;
    artifact: BuildArtifact;
    publicAccess: boolean;
    functions: FunctionDeployResult[];
    verified: boolean;
    healthCheck?: HealthCheckResult;
    startedAt: string;
    finishedAt: string;
    durationMs: number;
}
