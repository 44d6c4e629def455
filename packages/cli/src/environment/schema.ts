import { z } from 'zod/v4';

/** Ports the controller hands out to dynamically registered endpoints. */
export const DYNAMIC_PORT_RANGE = [3002, 4000] as const;

const port = z.number().int().min(1).max(65535);

const host = z.string().trim().min(1);

const inDynamicRange = (value: number) =>
	value >= DYNAMIC_PORT_RANGE[0] && value <= DYNAMIC_PORT_RANGE[1];

/**
 * Shape of `config/environments/{name}.json`.
 */
export const EnvironmentParametersSchema = z
	.object({
		appId: z
			.string()
			.regex(
				/^[a-z0-9][a-z0-9_.-]*$/,
				'must be lowercase letters, digits, ".", "_" or "-"',
			),
		certFile: z
			.string()
			.regex(
				/^[A-Za-z0-9][A-Za-z0-9_.-]*$/,
				'must be a plain file name without extension',
			),
		verbose: z.boolean().default(false),
		controller: z.object({ host, port }),
		proxy: z.object({
			host,
			port,
			publicPath: z
				.string()
				.regex(
					/^(\/[A-Za-z0-9._~-]+)+\/?$/,
					'must start with "/" and name at least one path segment',
				)
				.transform((value) => value.replace(/\/$/, '')),
		}),
	})
	.refine((value) => value.controller.port !== value.proxy.port, {
		path: ['proxy', 'port'],
		message: 'must differ from controller.port',
	})
	.refine((value) => !inDynamicRange(value.controller.port), {
		path: ['controller', 'port'],
		message: `must be outside the dynamic endpoint range ${DYNAMIC_PORT_RANGE.join('-')}`,
	})
	.refine((value) => !inDynamicRange(value.proxy.port), {
		path: ['proxy', 'port'],
		message: `must be outside the dynamic endpoint range ${DYNAMIC_PORT_RANGE.join('-')}`,
	});

export type EnvironmentParameters = z.infer<typeof EnvironmentParametersSchema>;
