import type { DeploymentTarget, FunctionSpec, PlatformName } from '../config/types';
import type { BuildArtifact, CloudSession, FunctionDeployment, ServiceDeployment } from '../types';

/**
 * A cloud the release pipeline can deploy to. One instance serves one run;
 * implementations may keep the authenticated clients between calls.
 *
 * Every method that reaches the cloud must bound its own runtime.
 */
export interface CloudPlatform {
    readonly name: PlatformName;

    /** Platform-specific limits on the target; checked before any stage runs */
    validateTarget(target: DeploymentTarget): string[];

    /** Exchange the credential file for a session (authenticate stage) */
    authenticate(credentialsFile: string, target: DeploymentTarget): Promise<CloudSession>;

    /** Image repository (no tag) the service's images are pushed to */
    repositoryFor(target: DeploymentTarget): string;

    /** Let the local Docker daemon push to repositoryFor(); idempotent */
    registryLogin(target: DeploymentTarget, session: CloudSession): Promise<void>;

    /** Create or update the managed service revision; idempotent */
    deployService(target: DeploymentTarget, artifact: BuildArtifact, session: CloudSession): Promise<ServiceDeployment>;

    /** Platform-specific rules for one auxiliary function */
    validateFunction(spec: FunctionSpec): string[];

    /** Create or update one auxiliary function; idempotent */
    deployFunction(spec: FunctionSpec, target: DeploymentTarget, session: CloudSession): Promise<FunctionDeployment>;
}
