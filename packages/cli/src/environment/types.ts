/** Every deployment environment this tool knows about. */
export const ENVIRONMENT_NAMES = ['dev', 'prod'] as const;

export type EnvironmentName = (typeof ENVIRONMENT_NAMES)[number];

/** Substituted when the requested environment is absent or unknown. */
export const DEFAULT_ENVIRONMENT: EnvironmentName = 'dev';

export interface BindAddress {
	readonly host: string;
	readonly port: number;
}

/**
 * Parameters of one deployment environment. Built once per run and frozen.
 * The target host itself is not part of it: its address comes from the
 * secret bundle.
 */
export interface Environment {
	readonly name: EnvironmentName;
	/** Names the image and the container (`{appId}-{name}`) */
	readonly appId: string;
	/** File stem of the generated TLS pair */
	readonly certFile: string;
	readonly verbose: boolean;
	readonly controller: BindAddress;
	readonly proxy: BindAddress & {
		/** Prefix under which the proxy forwards to the controller */
		readonly publicPath: string;
	};
}
