import type { FunctionSpec } from '../config/types';
import type { FunctionDeployment, FunctionDeployResult } from '../types';
import type { CloudPlatform } from '../services/platform';
import { DeployError, describeError } from '../utils/errors';
import { validateFunctionSpec } from '../utils/validation';

export interface FunctionStageOptions {
    /** Stop at the first failure (sequential, name order) instead of reporting partially */
    strict: boolean;
    concurrency: number;
    validate: (spec: FunctionSpec) => string[];
    deploy: (spec: FunctionSpec) => Promise<FunctionDeployment>;
    onResult?: (result: FunctionDeployResult) => void;
}

/**
 * Generic spec checks followed by the platform's own rules
 */
export function functionSpecProblems(spec: FunctionSpec, platform: Pick<CloudPlatform, 'validateFunction'>): string[] {
    return [...validateFunctionSpec(spec), ...platform.validateFunction(spec)];
}

export function byName<T extends { name: string }>(a: T, b: T): number {
    if (a.name === b.name) return 0;
    return a.name < b.name ? -1 : 1;
}

async function deployOne(spec: FunctionSpec, options: FunctionStageOptions): Promise<FunctionDeployResult> {
    const problems = options.validate(spec);
    if (problems.length > 0) {
        return { name: spec.name, status: 'failed', error: `invalid spec: ${problems.join('; ')}` };
    }
    try {
        const deployment = await options.deploy(spec);
        return { name: spec.name, status: 'deployed', ...(deployment.url ? { url: deployment.url } : {}) };
    } catch (error) {
        return { name: spec.name, status: 'failed', error: describeError(error) };
    }
}

/**
 * Deploys every auxiliary function and returns one result per spec, sorted by
 * name whatever order they completed in.
 *
 * Default mode never throws: failures are recorded and the rest still deploy,
 * up to `concurrency` at a time. Strict mode deploys one by one and throws a
 * DeployError on the first failure.
 */
export async function deployFunctions(
    specs: readonly FunctionSpec[],
    options: FunctionStageOptions
): Promise<FunctionDeployResult[]> {
    const ordered = [...specs].sort(byName);

    if (options.strict) {
        const results: FunctionDeployResult[] = [];
        for (const spec of ordered) {
            const result = await deployOne(spec, options);
            options.onResult?.(result);
            if (result.status === 'failed') {
                throw new DeployError(`Function ${spec.name} failed: ${result.error}`, { stage: 'functions' });
            }
            results.push(result);
        }
        return results;
    }

    const results: FunctionDeployResult[] = [];
    let next = 0;
    const worker = async (): Promise<void> => {
        while (next < ordered.length) {
            const spec = ordered[next++];
            const result = await deployOne(spec, options);
            options.onResult?.(result);
            results.push(result);
        }
    };

    const workers = Math.max(1, Math.min(options.concurrency, ordered.length));
    await Promise.all(Array.from({ length: workers }, () => worker()));
    return results.sort(byName);
}
