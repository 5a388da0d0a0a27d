#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { planCommand } from './commands/plan';
import { releaseCommand } from './commands/release';
import { describeError } from './utils/errors';
import { logger } from './utils/logger';

// CLI Entrypoint
const program = new Command();

program
    .name('shiprun')
    .version('0.1.0')
    .description('Build, publish and deploy a containerized service and its functions')
    .option('-v, --verbose', 'Enable verbose logging')
    .hook('preAction', (thisCommand, actionCommand) => {
        if (thisCommand.opts().verbose) {
            logger.setVerbose(true);
        }
        logger.startExecution(actionCommand.name());
    });

program.addCommand(releaseCommand, { isDefault: true });
program.addCommand(planCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
    logger.error(`Unexpected failure: ${describeError(error)}`, error);
    process.exit(1);
});
