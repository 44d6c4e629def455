import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import {
	DeployError,
	DeployErrorCode,
	DeploymentCancelledError,
	errorMessage,
	wrapError,
} from '@swarm-deploy/errors';
import type { Logger } from '@swarm-deploy/logger';
import { detectInstallStrategy, generateArtifacts } from '../artifacts';
import type { OrchestratorSettings } from '../config';
import { resolveEnvironment } from '../environment/resolver';
import type { EnvironmentName } from '../environment/types';
import { type DeploymentArchive, packageDeployment } from '../packager';
import { DeploymentDriver, type StageRecord } from '../remote/DeploymentDriver';
import { createDeploymentPlan } from '../remote/operations';
import type { RemoteChannelFactory } from '../remote/types';
import { loadSecretBundle } from '../secrets/bundle';
import type { SecretBundle } from '../secrets/SecretBundle';
import type { SecretProvider } from '../secrets/types';
import { type CheckoutOptions, checkout } from '../vcs/checkout';

export type PipelineStep =
	| 'resolve'
	| 'secrets'
	| 'checkout'
	| 'artifacts'
	| 'package'
	| 'remote';

export interface StepRecord {
	step: PipelineStep;
	status: 'succeeded' | 'failed';
	/** Milliseconds */
	duration: number;
}

export interface RepositorySource {
	url: string;
	/** Defaults to the environment name */
	branch?: string;
	credentialId?: string;
}

export interface DeployOptions {
	/** Requested environment; unknown names fall back to dev */
	environment?: string;
	/** Local application source; defaults to the working directory */
	sourceDir?: string;
	/** Check out the source instead of using `sourceDir` */
	repository?: RepositorySource;
	/** Where the archive is kept; a temporary directory when unset */
	archiveDir?: string;
	signal?: AbortSignal;
}

export interface DeployDependencies {
	settings: OrchestratorSettings;
	logger: Logger;
	secretProvider: SecretProvider;
	createChannel: RemoteChannelFactory;
	checkout?: (options: CheckoutOptions) => Promise<string>;
}

export interface DeploymentReport {
	status: 'succeeded' | 'failed';
	environment?: EnvironmentName;
	requestedEnvironment?: string;
	containerName?: string;
	steps: StepRecord[];
	/** Remote stages, in the order they were entered */
	stages: readonly StageRecord[];
	/** Pipeline step or remote stage that aborted the run */
	failedStage?: string;
	error?: DeployError;
	archive?: DeploymentArchive;
	/** Milliseconds */
	duration: number;
}

/**
 * Runs one deployment: resolve the environment, load its secrets, generate
 * and package the artifacts, then drive the target host. The first fatal
 * error ends the run and is returned in the report, never thrown. Secrets
 * are scrubbed and the local work directory removed in every outcome.
 */
export async function deploy(
	options: DeployOptions,
	dependencies: DeployDependencies,
): Promise<DeploymentReport> {
	const { settings, secretProvider, createChannel } = dependencies;
	const logger = dependencies.logger.child({ component: 'deploy' });
	const startTime = Date.now();

	const steps: StepRecord[] = [];
	let stages: readonly StageRecord[] = [];
	let environment: EnvironmentName | undefined;
	let containerName: string | undefined;
	let archive: DeploymentArchive | undefined;
	let bundle: SecretBundle | undefined;

	const step = async <T>(name: PipelineStep, run: () => Promise<T>): Promise<T> => {
		if (options.signal?.aborted) {
			throw new DeploymentCancelledError(name);
		}
		const stepStart = Date.now();
		try {
			const result = await run();
			steps.push({ step: name, status: 'succeeded', duration: Date.now() - stepStart });
			return result;
		} catch (error) {
			steps.push({ step: name, status: 'failed', duration: Date.now() - stepStart });
			throw error;
		}
	};

	const workDir = await mkdtemp(join(tmpdir(), 'swarm-deploy-'));

	try {
		const resolved = await step('resolve', () =>
			resolveEnvironment(options.environment, {
				configDir: settings.configDir,
				logger,
			}),
		);
		environment = resolved.name;
		containerName = `${resolved.appId}-${resolved.name}`;

		logger.info(
			{ environment: resolved.name, requested: options.environment },
			'Deployment started',
		);

		const secrets = await step('secrets', () =>
			loadSecretBundle(secretProvider, resolved.name, logger),
		);
		bundle = secrets;

		const repository = options.repository;
		const sourceDir = repository
			? await step('checkout', () =>
					(dependencies.checkout ?? checkout)({
						repositoryUrl: repository.url,
						branch: repository.branch ?? resolved.name,
						credentialId: repository.credentialId,
						destination: join(workDir, 'source'),
						timeout: settings.timeouts.command,
						logger,
					}),
				)
			: resolve(options.sourceDir ?? process.cwd());

		const artifacts = await step('artifacts', async () =>
			generateArtifacts(resolved, secrets, {
				dockerfile: { install: detectInstallStrategy(sourceDir) },
			}),
		);

		archive = await step('package', () =>
			packageDeployment({
				artifacts,
				sourceDir,
				outputDir: options.archiveDir ?? join(workDir, 'archive'),
				logger,
			}),
		);

		const channel = createChannel({
			host: secrets.hostAddress,
			port: settings.remote.port,
			username: settings.remote.user,
			credential: secrets.hostCredential,
		});
		const driver = new DeploymentDriver(
			channel,
			createDeploymentPlan(resolved, archive, settings.remote.workDir),
			{
				logger,
				timeouts: settings.timeouts,
				signal: options.signal,
			},
		);

		try {
			await step('remote', () => driver.run());
		} finally {
			stages = driver.history;
		}

		const warnings = stages.filter(({ status }) => status === 'failed');
		logger.info(
			{
				environment: resolved.name,
				container: containerName,
				duration: Date.now() - startTime,
				warnings: warnings.map(({ stage }) => stage),
			},
			'Deployment succeeded',
		);

		return {
			status: 'succeeded',
			environment,
			requestedEnvironment: options.environment,
			containerName,
			steps,
			stages,
			archive,
			duration: Date.now() - startTime,
		};
	} catch (caught) {
		const error = wrapError(
			caught,
			(cause) =>
				new DeployError(DeployErrorCode.Unknown, errorMessage(cause), { cause }),
		);
		const failedStage = error.stage ?? steps.at(-1)?.step;

		logger.error(
			{ error: error.toJSON(), stage: failedStage },
			'Deployment failed',
		);

		return {
			status: 'failed',
			environment,
			requestedEnvironment: options.environment,
			containerName,
			steps,
			stages,
			failedStage,
			error,
			archive,
			duration: Date.now() - startTime,
		};
	} finally {
		bundle?.scrub();
		await rm(workDir, { recursive: true, force: true });
	}
}
