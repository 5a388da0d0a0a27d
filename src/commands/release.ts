/**
 * ================================================================================
 * RELEASE COMMAND - Build, Publish and Deploy One Service
 * ================================================================================
 *
 * Default command. Resolves the release configuration, asks before exposing
 * the service publicly and runs the release pipeline.
 *
 * COMMAND WORKFLOW:
 * 1. Configuration - release file, environment, then flags
 * 2. Confirmation - only for public deploys on an interactive terminal
 *    (plus the password of an encrypted key file when CREDENTIALS_PASSWORD is unset)
 * 3. Pipeline - authenticate, build, publish, deploy, functions, verify
 * 4. Summary - service URL, image tag and per-function status
 *
 * COMMAND OPTIONS:
 * • --config           - release file (default: ./shiprun.json when present)
 * • --platform         - gcp or aws
 * • --tag              - explicit image tag instead of the generated one
 * • --allow-public     - let unauthenticated callers reach the service
 * • --skip-verify      - skip the health check
 * • --strict-functions - stop at the first failing function
 * • --concurrency      - parallel function deploys
 * • --yes              - do not ask for confirmation
 *
 * EXAMPLES:
 * shiprun release --config shiprun.json
 * shiprun --platform aws --tag 2024-06-01-hotfix --yes
 */

import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { loadReleaseConfig } from '../config/configManager';
import type { ReleaseConfig, ReleaseInput } from '../config/types';
import { runRelease } from '../deploy/orchestrator';
import { createPlatform } from '../services';
import type { ReleaseSummary } from '../types';
import {
    CREDENTIALS_PASSWORD_ENV,
    PasswordSource,
    isEncryptedCredentialFile,
    promptForCredentialPassword
} from '../utils/credentials';
import { DeployError, PartialDeployError, ReleaseError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { formatDuration } from '../utils/validation';

export interface ReleaseCommandOptions {
    config?: string;
    platform?: string;
    tag?: string;
    allowPublic?: boolean;
    skipVerify?: boolean;
    strictFunctions?: boolean;
    concurrency?: string;
    yes?: boolean;
}

/**
 * Flags only override what was actually given on the command line
 */
export function toOverrides(options: ReleaseCommandOptions): ReleaseInput {
    return {
        platform: options.platform,
        tag: options.tag,
        allowPublicAccess: options.allowPublic ? true : undefined,
        healthCheckEnabled: options.skipVerify ? false : undefined,
        strictFunctions: options.strictFunctions ? true : undefined,
        functionConcurrency: options.concurrency
    };
}

/**
 * Plain-text summary lines; colors are added by the caller
 */
export function formatSummary(summary: ReleaseSummary): string[] {
    const lines = [
        `Service:   ${summary.serviceName} (${summary.platform}:${summary.projectId}/${summary.region})`,
        `URL:       ${summary.serviceUrl}`,
        `Image:     ${summary.artifact.imageReference}`,
        `Tag:       ${summary.artifact.tag}`,
        `Access:    ${summary.publicAccess ? 'public' : 'restricted'}`,
        `Verified:  ${summary.healthCheck ? `yes (HTTP ${summary.healthCheck.status})` : 'skipped'}`
    ];
    if (summary.revision) {
        lines.splice(2, 0, `Revision:  ${summary.revision}`);
    }
    if (summary.functions.length > 0) {
        lines.push('Functions:');
        for (const fn of summary.functions) {
            const detail = fn.status === 'deployed' ? fn.url ?? '' : fn.error ?? '';
            lines.push(`  ${fn.status === 'deployed' ? '✓' : '✗'} ${fn.name}${detail ? ` - ${detail}` : ''}`);
        }
    }
    lines.push(`Duration:  ${formatDuration(summary.durationMs)}`);
    return lines;
}

function printSummary(summary: ReleaseSummary): void {
    console.log();
    console.log(chalk.bold('📦 Release summary'));
    for (const line of formatSummary(summary)) {
        const colored = line.includes('✗') ? chalk.red(line) : line.includes('✓') ? chalk.green(line) : line;
        console.log(`   ${colored}`);
    }
    console.log();
}

async function confirmPublicAccess(config: ReleaseConfig): Promise<boolean> {
    const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
        {
            type: 'confirm',
            name: 'proceed',
            message: `${config.target.serviceName} will accept unauthenticated requests. Continue?`,
            default: false
        }
    ]);
    return proceed;
}

/**
 * Ask for the key file password up front, while no spinner owns the terminal.
 * Without a TTY the platforms fall back to CREDENTIALS_PASSWORD.
 */
async function resolvePassword(config: ReleaseConfig): Promise<PasswordSource | undefined> {
    if (process.env[CREDENTIALS_PASSWORD_ENV] || !process.stdin.isTTY) {
        return undefined;
    }
    if (!(await isEncryptedCredentialFile(config.credentialsFile))) {
        return undefined;
    }
    const password = await promptForCredentialPassword(config.credentialsFile);
    return async () => password;
}

function reportFailure(error: ReleaseError): void {
    logger.error(error.message, error);
    if (error instanceof PartialDeployError) {
        printSummary(error.summary);
    } else if (error instanceof DeployError) {
        if (error.unverified) {
            logger.warn('The new revision is deployed but did not pass its health check');
        }
        if (error.failedFunctions.length > 0) {
            logger.warn(`Functions that also failed: ${error.failedFunctions.join(', ')}`);
        }
    }
    logger.info(`Failed stage: ${error.stage} (exit code ${error.exitCode})`);
}

/**
 * ================================================================================
 * RELEASE COMMAND DEFINITION
 * ================================================================================
 *
 * //! IMPORTANT: the exit code tells scripts which stage failed; see EXIT_CODES
 * //? SIGINT/SIGTERM stop the run before the next stage, never mid-stage
 */
export const releaseCommand = new Command('release')
    .description('Build the image, publish it and deploy the service and its functions')
    .option('-c, --config <file>', 'Release file (JSON)')
    .option('--platform <name>', 'Target platform: gcp or aws')
    .option('--tag <tag>', 'Image tag to publish (must not be "latest")')
    .option('--allow-public', 'Allow unauthenticated access to the service')
    .option('--skip-verify', 'Skip the post-deploy health check')
    .option('--strict-functions', 'Stop at the first failing function')
    .option('--concurrency <n>', 'Functions deployed in parallel')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (options: ReleaseCommandOptions) => {
        const timer = logger.timer('release-command');
        logger.step('INIT', 'Release command started', { providedOptions: options });

        let config: ReleaseConfig;
        try {
            config = await loadReleaseConfig({ configPath: options.config, overrides: toOverrides(options) });
        } catch (error) {
            if (error instanceof ReleaseError) {
                reportFailure(error);
                process.exitCode = error.exitCode;
                return;
            }
            throw error;
        }
        logger.debug('Resolved release configuration', config);

        if (config.target.allowPublicAccess && !options.yes && process.stdin.isTTY) {
            if (!(await confirmPublicAccess(config))) {
                logger.warn('Release aborted by user');
                process.exitCode = 1;
                return;
            }
        }

        let password: PasswordSource | undefined;
        try {
            password = await resolvePassword(config);
        } catch (error) {
            if (error instanceof ReleaseError) {
                reportFailure(error);
                process.exitCode = error.exitCode;
                return;
            }
            throw error;
        }

        const controller = new AbortController();
        const cancel = (signal: NodeJS.Signals): void => {
            if (!controller.signal.aborted) {
                logger.warn(`${signal} received, stopping after the current stage`);
                controller.abort();
            }
        };
        process.on('SIGINT', cancel);
        process.on('SIGTERM', cancel);

        try {
            const result = await runRelease(config, { platform: createPlatform(config, { password }) }, controller.signal);
            if (result.ok) {
                logger.success(`Released ${config.target.serviceName} at ${result.summary.serviceUrl}`);
                printSummary(result.summary);
            } else {
                reportFailure(result.error);
                process.exitCode = result.error.exitCode;
            }
        } catch (error) {
            logger.error(`Unexpected failure: ${describeError(error)}`, error);
            process.exitCode = 1;
        } finally {
            process.off('SIGINT', cancel);
            process.off('SIGTERM', cancel);
            logger.debug('Release command finished', { durationMs: timer.end() });
        }
    });
