import type { Logger } from '@swarm-deploy/logger';
import { listEnvironments, resolveEnvironment } from './resolver';
import type { Environment } from './types';

export {
	DEFAULT_CONFIG_DIR,
	getEnvironmentConfigPath,
	isEnvironmentName,
	listEnvironments,
	normalizeEnvironmentName,
	resolveEnvironment,
	type ResolveEnvironmentOptions,
} from './resolver';
export {
	DYNAMIC_PORT_RANGE,
	type EnvironmentParameters,
	EnvironmentParametersSchema,
} from './schema';
export {
	type BindAddress,
	DEFAULT_ENVIRONMENT,
	ENVIRONMENT_NAMES,
	type Environment,
	type EnvironmentName,
} from './types';

const logger = console;

export function formatEnvironment(environment: Environment): string {
	const { controller, proxy } = environment;
	return [
		`  ${environment.name}`,
		`proxy ${proxy.host}:${proxy.port}${proxy.publicPath}`,
		`controller ${controller.host}:${controller.port}`,
		`app ${environment.appId}`,
	].join('  ');
}

/**
 * Print every environment that has a parameter file, with its addresses.
 */
export async function environmentsCommand(options: {
	configDir?: string;
	logger: Logger;
}): Promise<Environment[]> {
	const names = await listEnvironments(options.configDir);
	const environments: Environment[] = [];

	for (const name of names) {
		environments.push(
			await resolveEnvironment(name, {
				configDir: options.configDir,
				logger: options.logger,
			}),
		);
	}

	logger.log('\nEnvironments:');
	for (const environment of environments) {
		logger.log(formatEnvironment(environment));
	}

	return environments;
}
