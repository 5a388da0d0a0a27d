/**
 * ================================================================================
 * PLAN COMMAND - Show What a Release Would Do
 * ================================================================================
 *
 * Resolves and validates the configuration exactly as `release` does and
 * prints the target, the image repository and the stages that would run.
 * Nothing is built, pushed or deployed and no credentials are read.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadReleaseConfig } from '../config/configManager';
import type { ReleaseConfig } from '../config/types';
import { byName, functionSpecProblems } from '../deploy/functions';
import { CloudPlatform, createPlatform } from '../services';
import { RELEASE_STAGES, ReleaseStage, STAGE_LABELS } from '../types';
import { ConfigError, ReleaseError } from '../utils/errors';
import { logger } from '../utils/logger';
import { formatDuration } from '../utils/validation';

/**
 * Stages a release with this configuration runs, in order
 */
export function plannedStages(config: ReleaseConfig): ReleaseStage[] {
    return RELEASE_STAGES.filter((stage) => {
        if (stage === 'functions') return config.functions.length > 0;
        if (stage === 'verify') return config.pipeline.healthCheck.enabled;
        return true;
    });
}

export function formatPlan(config: ReleaseConfig, repository: string): string[] {
    const { target, pipeline } = config;
    const lines = [
        `Platform:  ${config.platform.name}`,
        `Target:    ${target.projectId}/${target.region}/${target.serviceName}`,
        `Image:     ${repository}:${config.build.tag ?? '<generated>'} (alias :latest)`,
        `Build:     ${config.build.dockerfile} in ${config.build.contextDir}`,
        `Resources: ${target.resources.memoryMb}Mi memory, ${target.resources.cpu} cpu`,
        `Scaling:   ${target.scaling.minInstances}-${target.scaling.maxInstances} instances`,
        `Access:    ${target.allowPublicAccess ? 'public' : 'restricted'}`
    ];

    if (config.functions.length > 0) {
        lines.push(`Functions (${pipeline.strictFunctions ? 'strict' : `up to ${pipeline.functionConcurrency} at a time`}):`);
        for (const fn of [...config.functions].sort(byName)) {
            lines.push(`  • ${fn.name} (${fn.runtime}, ${fn.trigger.type} trigger)`);
        }
    }
    if (pipeline.healthCheck.enabled) {
        lines.push(`Health:    ${pipeline.healthCheck.path} within ${formatDuration(pipeline.healthCheck.timeoutMs)}`);
    }

    lines.push('Stages:');
    plannedStages(config).forEach((stage, index) => {
        lines.push(`  ${index + 1}. ${STAGE_LABELS[stage]}`);
    });
    return lines;
}

/**
 * Every problem the functions stage would report, per function in name order
 */
export function listFunctionProblems(config: ReleaseConfig, platform: CloudPlatform): string[] {
    return [...config.functions]
        .sort(byName)
        .flatMap((fn) => functionSpecProblems(fn, platform).map((problem) => `function ${fn.name}: ${problem}`));
}

export const planCommand = new Command('plan')
    .description('Validate the configuration and show the release steps without running them')
    .option('-c, --config <file>', 'Release file (JSON)')
    .option('--platform <name>', 'Target platform: gcp or aws')
    .action(async (options: { config?: string; platform?: string }) => {
        try {
            const config = await loadReleaseConfig({
                configPath: options.config,
                overrides: { platform: options.platform }
            });
            const platform = createPlatform(config);

            const problems = platform.validateTarget(config.target);
            if (problems.length > 0) {
                throw new ConfigError(problems.map((problem) => `${platform.name}: ${problem}`));
            }
            const functionProblems = listFunctionProblems(config, platform);

            console.log();
            console.log(chalk.bold('🗺  Release plan'));
            for (const line of formatPlan(config, platform.repositoryFor(config.target))) {
                console.log(`   ${line}`);
            }
            console.log();

            //? Invalid functions do not stop a release; they are reported as failed
            for (const problem of functionProblems) {
                logger.warn(problem);
            }
        } catch (error) {
            if (error instanceof ReleaseError) {
                logger.error(error.message);
                process.exitCode = error.exitCode;
                return;
            }
            throw error;
        }
    });
