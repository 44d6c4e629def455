import type { Logger } from '@swarm-deploy/logger';
import { SshRemoteChannel } from './SshRemoteChannel';
import type { RemoteChannelFactory } from './types';

export {
	type CommandRecord,
	DEPLOYMENT_STAGES,
	DeploymentDriver,
	type DeploymentDriverOptions,
	type DeploymentStage,
	type DriverState,
	type StageRecord,
} from './DeploymentDriver';
export { createDeploymentPlan, type DeploymentPlan, shellQuote } from './operations';
export { SshRemoteChannel } from './SshRemoteChannel';
export type {
	CommandResult,
	ExecOptions,
	RemoteChannel,
	RemoteChannelFactory,
	RemoteTarget,
} from './types';

/**
 * Factory for SSH channels sharing the given timeouts.
 */
export function createSshChannelFactory(options: {
	readyTimeout: number;
	defaultTimeout: number;
	logger: Logger;
}): RemoteChannelFactory {
	return (target) => new SshRemoteChannel(target, options);
}
