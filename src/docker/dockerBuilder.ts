import { randomBytes } from 'crypto';
import { BuildSource } from '../config/types';
import { BuildArtifact } from '../types';
import { CommandRunner } from '../utils/exec';
import { logger } from '../utils/logger';

export const ALIAS_TAG = 'latest';

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * Unique tag for one build: UTC timestamp to the millisecond plus the source
 * revision, e.g. 20261018-093000000-3f2c1ab.
 */
export function createBuildTag(builtAt: Date, revision: string): string {
    const date = `${builtAt.getUTCFullYear()}${pad(builtAt.getUTCMonth() + 1)}${pad(builtAt.getUTCDate())}`;
    const time = `${pad(builtAt.getUTCHours())}${pad(builtAt.getUTCMinutes())}${pad(builtAt.getUTCSeconds())}`;
    const millis = String(builtAt.getUTCMilliseconds()).padStart(3, '0');
    return `${date}-${time}${millis}-${revision}`;
}

/**
 * Short git revision of the build context, or random hex when the context is
 * not a git checkout (or git is not installed).
 */
export async function resolveSourceRevision(runner: CommandRunner, contextDir: string): Promise<string> {
    try {
        const { stdout } = await runner('git', ['rev-parse', '--short=7', 'HEAD'], { cwd: contextDir, timeoutMs: 10_000 });
        const revision = stdout.trim();
        if (/^[0-9a-f]{7,}$/.test(revision)) {
            return revision;
        }
    } catch (error) {
        logger.debug('No git revision for build context, using a random suffix', {
            contextDir,
            error: error instanceof Error ? error.message : error
        });
    }
    return randomBytes(4).toString('hex').slice(0, 7);
}

/**
 * Builds the image with its unique tag and the movable "latest" alias.
 *
 * @param repository Registry path without tag, e.g. gcr.io/my-project/api
 */
export async function buildDockerImage(
    runner: CommandRunner,
    source: BuildSource,
    repository: string,
    options: { timeoutMs: number; now?: Date }
): Promise<BuildArtifact> {
    const builtAt = options.now ?? new Date();
    const revision = await resolveSourceRevision(runner, source.contextDir);
    const tag = source.tag ?? createBuildTag(builtAt, revision);
    const imageReference = `${repository}:${tag}`;
    const aliasReference = `${repository}:${ALIAS_TAG}`;

    const args = ['build', '-t', imageReference, '-t', aliasReference, '-f', source.dockerfile];
    for (const [name, value] of Object.entries(source.buildArgs)) {
        args.push('--build-arg', `${name}=${value}`);
    }
    args.push('--label', `org.opencontainers.image.revision=${revision}`);
    args.push(source.contextDir);

    logger.info(`🔨 Building Docker image: ${imageReference}`);
    await runner('docker', args, { timeoutMs: options.timeoutMs, inherit: logger.isVerbose() });

    return {
        repository,
        tag,
        imageReference,
        aliasReference,
        revision,
        builtAt: builtAt.toISOString()
    };
}
