// Deployment error taxonomy shared by every swarm-deploy package.

/**
 * Machine-readable error codes, one per failure class of a deployment run.
 */
export enum DeployErrorCode {
	ConfigNotFound = 'CONFIG_NOT_FOUND',
	ConfigInvalid = 'CONFIG_INVALID',
	ArtifactGeneration = 'ARTIFACT_GENERATION',
	Packaging = 'PACKAGING',
	SecretMissing = 'SECRET_MISSING',
	Checkout = 'CHECKOUT',
	RemoteConnect = 'REMOTE_CONNECT',
	RemoteCommand = 'REMOTE_COMMAND',
	Cancelled = 'CANCELLED',
	Unknown = 'UNKNOWN',
}

/**
 * Options accepted by every {@link DeployError}.
 */
export interface DeployErrorOptions {
	/** Pipeline step or remote stage the error was raised in */
	stage?: string;
	/** Additional context for operators */
	details?: Record<string, unknown>;
	/** The underlying error */
	cause?: unknown;
}

/**
 * Base class for every failure that aborts (or is recorded by) a deployment run.
 *
 * @example
 * ```typescript
 * throw new DeployError(DeployErrorCode.Packaging, 'Archive could not be written', {
 *   stage: 'package',
 *   details: { path: '/tmp/out' },
 * });
 * ```
 */
export class DeployError extends Error {
	/** Application-specific error code */
	public readonly code: DeployErrorCode;
	/** Pipeline step or remote stage that failed */
	public readonly stage?: string;
	/** Additional context for operators */
	public readonly details?: Record<string, unknown>;
	/** Type discriminator for runtime checks across module copies */
	public readonly isDeployError = true;

	constructor(
		code: DeployErrorCode,
		message: string,
		options: DeployErrorOptions = {},
	) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.name = this.constructor.name;
		this.code = code;
		this.stage = options.stage;
		this.details = options.details;

		Error.captureStackTrace(this, this.constructor);
	}

	/**
	 * Serializes the error for structured logs.
	 */
	toJSON() {
		return {
			name: this.name,
			code: this.code,
			stage: this.stage,
			message: this.message,
			details: this.details,
		};
	}
}

/**
 * The parameter file for the resolved environment does not exist.
 */
export class ConfigNotFoundError extends DeployError {
	constructor(
		readonly environment: string,
		readonly path: string,
	) {
		super(
			DeployErrorCode.ConfigNotFound,
			`No parameters found for environment "${environment}" (expected ${path})`,
			{ stage: 'resolve', details: { environment, path } },
		);
	}
}

/**
 * The parameter file exists but does not describe a usable environment.
 */
export class ConfigInvalidError extends DeployError {
	constructor(
		readonly environment: string,
		readonly issues: string[],
		cause?: unknown,
	) {
		super(
			DeployErrorCode.ConfigInvalid,
			`Invalid parameters for environment "${environment}": ${issues.join('; ')}`,
			{ stage: 'resolve', details: { environment, issues }, cause },
		);
	}
}

/**
 * An artifact could not be produced. Nothing from the failed set is kept.
 */
export class ArtifactGenerationError extends DeployError {
	constructor(
		message: string,
		options: { artifact?: string; cause?: unknown } = {},
	) {
		super(DeployErrorCode.ArtifactGeneration, message, {
			stage: 'artifacts',
			details: options.artifact ? { artifact: options.artifact } : undefined,
			cause: options.cause,
		});
	}
}

export class PackagingError extends DeployError {
	constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
		super(DeployErrorCode.Packaging, message, {
			stage: 'package',
			details: options.path ? { path: options.path } : undefined,
			cause: options.cause,
		});
	}
}

/**
 * A required secret is absent for the resolved environment.
 * The value itself is never part of the error.
 */
export class SecretMissingError extends DeployError {
	constructor(
		readonly environment: string,
		readonly kind: string,
		source?: string,
	) {
		super(
			DeployErrorCode.SecretMissing,
			`Secret "${kind}" is not set for environment "${environment}"${source ? ` (looked up ${source})` : ''}`,
			{ stage: 'secrets', details: { environment, kind, source } },
		);
	}
}

export class CheckoutError extends DeployError {
	constructor(
		message: string,
		options: { repositoryUrl: string; branch: string; cause?: unknown },
	) {
		super(DeployErrorCode.Checkout, message, {
			stage: 'checkout',
			details: { repositoryUrl: options.repositoryUrl, branch: options.branch },
			cause: options.cause,
		});
	}
}

/**
 * The remote command channel could not be opened. No remote stage was reached.
 */
export class RemoteConnectError extends DeployError {
	constructor(
		readonly host: string,
		cause?: unknown,
	) {
		const reason = cause instanceof Error ? `: ${cause.message}` : '';
		super(
			DeployErrorCode.RemoteConnect,
			`Could not connect to ${host}${reason}`,
			{ stage: 'CONNECTED', details: { host }, cause },
		);
	}
}

export interface RemoteCommandFailure {
	stage: string;
	command: string;
	/** Exit code, or null when the command never completed (timeout, channel loss) */
	exitCode: number | null;
	stdout: string;
	stderr: string;
	cause?: unknown;
}

/**
 * A remote command exited unsuccessfully. Carries the verbatim remote output.
 */
export class RemoteCommandError extends DeployError {
	readonly command: string;
	readonly exitCode: number | null;
	readonly stdout: string;
	readonly stderr: string;

	constructor(failure: RemoteCommandFailure) {
		const status =
			failure.exitCode === null
				? failure.cause instanceof Error
					? failure.cause.message
					: 'did not complete'
				: `exit code ${failure.exitCode}`;
		super(
			DeployErrorCode.RemoteCommand,
			`Remote command failed at ${failure.stage} (${status}): ${failure.command}`,
			{
				stage: failure.stage,
				details: { command: failure.command, exitCode: failure.exitCode },
				cause: failure.cause,
			},
		);
		this.command = failure.command;
		this.exitCode = failure.exitCode;
		this.stdout = failure.stdout;
		this.stderr = failure.stderr;
	}

	/** Combined remote output, stdout first */
	get output(): string {
		return [this.stdout, this.stderr]
			.map((part) => part.trimEnd())
			.filter(Boolean)
			.join('\n');
	}

	override toJSON() {
		return { ...super.toJSON(), stdout: this.stdout, stderr: this.stderr };
	}
}

/**
 * The caller aborted the run before the container transition began.
 */
export class DeploymentCancelledError extends DeployError {
	constructor(stage: string) {
		super(DeployErrorCode.Cancelled, `Deployment cancelled before ${stage}`, {
			stage,
		});
	}
}

/**
 * Type guard for {@link DeployError}, also matching instances from another
 * copy of this module.
 */
export function isDeployError(error: unknown): error is DeployError {
	return (
		error instanceof DeployError ||
		(error !== null &&
			typeof error === 'object' &&
			'isDeployError' in error &&
			error.isDeployError === true)
	);
}

/**
 * Returns the error unchanged when it is already a {@link DeployError},
 * otherwise builds one with `factory`.
 *
 * @example
 * ```typescript
 * try {
 *   await writeArchive();
 * } catch (error) {
 *   throw wrapError(error, (cause) => new PackagingError('Archive write failed', { cause }));
 * }
 * ```
 */
export function wrapError(
	error: unknown,
	factory: (cause: unknown) => DeployError,
): DeployError {
	if (isDeployError(error)) {
		return error;
	}
	return factory(error);
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
