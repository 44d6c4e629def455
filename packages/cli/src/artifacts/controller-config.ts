import { ArtifactGenerationError } from '@swarm-deploy/errors';
import { z } from 'zod/v4';
import { DYNAMIC_PORT_RANGE } from '../environment/schema';
import type { Environment } from '../environment/types';
import type { SecretBundle } from '../secrets/SecretBundle';
import {
	CONTAINER_CERT_DIR,
	CONTAINER_ENDPOINTS_CONF,
	CONTAINER_PAYLOAD_FILE,
} from './paths';

/** Command the controller runs after rewriting the endpoints file. */
export const PROXY_RELOAD_COMMAND = 'nginx -s reload';

const nonEmpty = z
	.string()
	.min(1)
	.refine((value) => value.trim() !== '', 'must not be blank');
const port = z.number().int().min(1).max(65535);

/**
 * Configuration document read by the controller at startup.
 */
export const ControllerConfigSchema = z.strictObject({
	controller: z.strictObject({ host: nonEmpty, port }),
	proxy: z.strictObject({ host: nonEmpty, port, fqdn: nonEmpty }),
	defaults: z.strictObject({
		verbose: z.boolean(),
		portRange: z.tuple([port, port]),
		reloadCommand: nonEmpty,
		payloadFile: nonEmpty,
		endpointsFile: nonEmpty,
		certFile: nonEmpty,
		keyFile: nonEmpty,
	}),
	api: z.strictObject({ key: nonEmpty }),
});

export type ControllerConfig = z.infer<typeof ControllerConfigSchema>;

/**
 * @throws ArtifactGenerationError when a value is empty or out of range
 */
export function buildControllerConfig(
	environment: Environment,
	secrets: SecretBundle,
): ControllerConfig {
	const result = ControllerConfigSchema.safeParse({
		controller: {
			host: environment.controller.host,
			port: environment.controller.port,
		},
		proxy: {
			host: environment.proxy.host,
			port: environment.proxy.port,
			fqdn: secrets.hostAddress,
		},
		defaults: {
			verbose: environment.verbose,
			portRange: [...DYNAMIC_PORT_RANGE],
			reloadCommand: PROXY_RELOAD_COMMAND,
			payloadFile: CONTAINER_PAYLOAD_FILE,
			endpointsFile: CONTAINER_ENDPOINTS_CONF,
			certFile: `${CONTAINER_CERT_DIR}/${environment.certFile}.pem`,
			keyFile: `${CONTAINER_CERT_DIR}/${environment.certFile}.key`,
		},
		api: { key: secrets.apiKey },
	});

	if (!result.success) {
		const fields = result.error.issues.map((issue) => issue.path.join('.'));
		throw new ArtifactGenerationError(
			`Controller configuration is incomplete: ${fields.join(', ')}`,
			{ artifact: 'controller-config' },
		);
	}

	return result.data;
}

export function serializeControllerConfig(config: ControllerConfig): string {
	return `${JSON.stringify(config, null, 2)}\n`;
}
