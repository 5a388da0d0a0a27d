/**
 * ================================================================================
 * SERVICES MODULE - Cloud Platform Exports
 * ================================================================================
 *
 * USAGE:
 * import { createPlatform } from '../services';
 *
 * PLATFORMS:
 * • GcpPlatform - Cloud Run + Cloud Functions through gcloud (default)
 * • AwsPlatform - App Runner + Lambda through the AWS SDK
 */

import type { ReleaseConfig } from '../config/types';
import type { PasswordSource } from '../utils/credentials';
import type { CommandRunner } from '../utils/exec';
import type { CloudPlatform } from './platform';
import { AwsPlatform } from './aws';
import { GcpPlatform } from './gcp';

export * from './platform';
export * from './aws';
export * from './gcp';

export interface PlatformOptions {
    runner?: CommandRunner;
    password?: PasswordSource;
}

export function createPlatform(config: ReleaseConfig, options: PlatformOptions = {}): CloudPlatform {
    const { platform, pipeline } = config;
    const { runner, password } = options;

    switch (platform.name) {
        case 'gcp':
            return new GcpPlatform({ registryHost: platform.registryHost, timeouts: pipeline.timeouts, runner, password });
        case 'aws':
            return new AwsPlatform({
                timeouts: pipeline.timeouts,
                accessRoleArn: platform.accessRoleArn,
                executionRoleArn: platform.executionRoleArn,
                runner,
                password
            });
    }
}
