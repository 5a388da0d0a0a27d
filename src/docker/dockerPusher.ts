import { CommandRunner } from '../utils/exec';
import { logger } from '../utils/logger';

/**
 * Pushes a Docker image to a remote registry.
 * @param reference The full image name (including tag) to push.
 */
export async function pushDockerImage(runner: CommandRunner, reference: string, timeoutMs: number): Promise<void> {
    logger.info(`📤 Pushing Docker image: ${reference}`);
    await runner('docker', ['push', reference], { timeoutMs, inherit: logger.isVerbose() });
    logger.debug(`Docker image pushed: ${reference}`);
}

/**
 * Logs the local Docker daemon in to a registry. The password goes through
 * stdin so it never shows up in the process list or the log.
 */
export async function dockerLogin(
    runner: CommandRunner,
    login: { registry: string; username: string; password: string },
    timeoutMs: number
): Promise<void> {
    await runner('docker', ['login', '--username', login.username, '--password-stdin', login.registry], {
        timeoutMs,
        input: login.password
    });
    logger.debug(`Docker logged in to ${login.registry}`);
}
