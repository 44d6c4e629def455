import {
	DeploymentCancelledError,
	errorMessage,
	RemoteCommandError,
	RemoteConnectError,
	wrapError,
} from '@swarm-deploy/errors';
import type { Logger } from '@swarm-deploy/logger';
import {
	buildImage,
	cleanupWorkDir,
	type DeploymentPlan,
	extractArchive,
	inspectContainer,
	listContainer,
	prepareWorkDir,
	pruneImages,
	type RemoteOperation,
	removeContainer,
	runContainer,
	stopContainer,
} from './operations';
import type { RemoteChannel } from './types';

export const DEPLOYMENT_STAGES = [
	'CONNECTED',
	'TRANSFERRED',
	'BUILT',
	'OLD_STOPPED',
	'OLD_REMOVED',
	'NEW_STARTED',
	'PRUNED',
	'VERIFIED',
] as const;

export type DeploymentStage = (typeof DEPLOYMENT_STAGES)[number];

export type DriverState = 'IDLE' | DeploymentStage | 'FAILED' | 'CANCELLED';

interface StagePolicy {
	/** A failure aborts the run */
	fatal: boolean;
	/** The abort signal is honoured before entering */
	cancellable: boolean;
}

const STAGE_POLICY: Record<DeploymentStage, StagePolicy> = {
	CONNECTED: { fatal: true, cancellable: true },
	TRANSFERRED: { fatal: true, cancellable: true },
	BUILT: { fatal: true, cancellable: true },
	OLD_STOPPED: { fatal: true, cancellable: false },
	OLD_REMOVED: { fatal: true, cancellable: false },
	NEW_STARTED: { fatal: true, cancellable: false },
	PRUNED: { fatal: false, cancellable: false },
	VERIFIED: { fatal: false, cancellable: false },
};

export interface CommandRecord {
	command: string;
	exitCode: number | null;
	stdout: string;
	stderr: string;
	/** Milliseconds */
	duration: number;
	/** Failed, but only because the target was already absent */
	absent: boolean;
}

export interface StageRecord {
	stage: DeploymentStage;
	status: 'succeeded' | 'failed';
	fatal: boolean;
	/** Milliseconds */
	duration: number;
	commands: CommandRecord[];
	error?: string;
}

export interface DeploymentDriverOptions {
	logger: Logger;
	timeouts: {
		command: number;
		build: number;
	};
	signal?: AbortSignal;
}

/**
 * Drives the target host from the uploaded archive to a running, verified
 * container. Stages run in {@link DEPLOYMENT_STAGES} order; a stage is
 * entered only when the previous one succeeded, except that PRUNED and
 * VERIFIED failures are recorded and the run continues. No rollback and no
 * retries. The channel is closed whatever the outcome.
 *
 * @example
 * ```typescript
 * const driver = new DeploymentDriver(channel, plan, { logger, timeouts });
 * await driver.run();
 * driver.state; // 'VERIFIED'
 * ```
 */
export class DeploymentDriver {
	private currentState: DriverState = 'IDLE';
	private readonly records: StageRecord[] = [];
	private readonly logger: Logger;

	constructor(
		private readonly channel: RemoteChannel,
		private readonly plan: DeploymentPlan,
		private readonly options: DeploymentDriverOptions,
	) {
		this.logger = options.logger.child({
			component: 'driver',
			host: channel.host,
			container: plan.containerName,
		});
	}

	get state(): DriverState {
		return this.currentState;
	}

	get history(): readonly StageRecord[] {
		return this.records;
	}

	/** The stage whose failure aborted the run */
	get failedStage(): DeploymentStage | undefined {
		return this.records.find((record) => record.fatal && record.status === 'failed')
			?.stage;
	}

	/**
	 * @throws RemoteConnectError, RemoteCommandError or DeploymentCancelledError
	 */
	async run(): Promise<readonly StageRecord[]> {
		if (this.currentState !== 'IDLE') {
			throw new Error(`Deployment driver already ran (state ${this.currentState})`);
		}

		const { plan } = this;

		try {
			await this.enter('CONNECTED', async () => {
				try {
					await this.channel.connect();
				} catch (error) {
					throw new RemoteConnectError(this.channel.host, error);
				}
			});
			await this.enter('TRANSFERRED', async (record) => {
				await this.execute(record, prepareWorkDir(plan));
				await this.upload(record);
				await this.execute(record, extractArchive(plan));
			});
			await this.enter('BUILT', async (record) => {
				await this.execute(record, buildImage(plan));
				await this.execute(record, cleanupWorkDir(plan));
			});
			await this.enter('OLD_STOPPED', (record) =>
				this.execute(record, stopContainer(plan)),
			);
			await this.enter('OLD_REMOVED', (record) =>
				this.execute(record, removeContainer(plan)),
			);
			await this.enter('NEW_STARTED', (record) =>
				this.execute(record, runContainer(plan)),
			);
			await this.enter('PRUNED', (record) => this.execute(record, pruneImages()));
			await this.enter('VERIFIED', async (record) => {
				await this.execute(record, listContainer(plan));
				await this.execute(record, inspectContainer(plan));
			});

			return this.records;
		} finally {
			await this.channel.close().catch((error: unknown) => {
				this.logger.warn({ error: errorMessage(error) }, 'Could not close channel');
			});
		}
	}

	private async enter(
		stage: DeploymentStage,
		action: (record: StageRecord) => Promise<void>,
	): Promise<void> {
		const policy = STAGE_POLICY[stage];

		if (policy.cancellable && this.options.signal?.aborted) {
			this.currentState = 'CANCELLED';
			this.logger.warn({ stage }, 'Deployment cancelled');
			throw new DeploymentCancelledError(stage);
		}

		const record: StageRecord = {
			stage,
			status: 'succeeded',
			fatal: policy.fatal,
			duration: 0,
			commands: [],
		};
		this.records.push(record);

		const logger = this.logger.child({ stage });
		const startTime = Date.now();
		logger.info('Entering stage');

		try {
			await action(record);
			record.duration = Date.now() - startTime;
			this.currentState = stage;
			logger.info({ duration: record.duration }, 'Stage succeeded');
		} catch (error) {
			record.status = 'failed';
			record.duration = Date.now() - startTime;
			record.error = errorMessage(error);

			if (policy.fatal) {
				this.currentState = 'FAILED';
				logger.error(
					{ duration: record.duration, error: record.error },
					'Stage failed, aborting deployment',
				);
				throw error;
			}

			this.currentState = stage;
			logger.warn(
				{ duration: record.duration, error: record.error },
				'Stage failed, continuing',
			);
		}
	}

	private async execute(
		record: StageRecord,
		operation: RemoteOperation,
	): Promise<void> {
		const timeout =
			operation.timeout === 'build'
				? this.options.timeouts.build
				: this.options.timeouts.command;

		this.logger.debug({ stage: record.stage, command: operation.command }, 'Running');

		let result: Awaited<ReturnType<RemoteChannel['exec']>>;
		try {
			result = await this.channel.exec(operation.command, { timeout });
		} catch (error) {
			record.commands.push({
				command: operation.command,
				exitCode: null,
				stdout: '',
				stderr: '',
				duration: 0,
				absent: false,
			});
			throw new RemoteCommandError({
				stage: record.stage,
				command: operation.command,
				exitCode: null,
				stdout: '',
				stderr: '',
				cause: error,
			});
		}

		const output = `${result.stdout}\n${result.stderr}`;
		const absent =
			result.code !== 0 && operation.absentWhen?.test(output) === true;

		record.commands.push({
			command: operation.command,
			exitCode: result.code,
			stdout: result.stdout,
			stderr: result.stderr,
			duration: result.duration,
			absent,
		});

		if (absent) {
			this.logger.info(
				{ stage: record.stage, command: operation.command },
				'Target already absent, nothing to do',
			);
			return;
		}

		if (result.code !== 0) {
			throw new RemoteCommandError({
				stage: record.stage,
				command: operation.command,
				exitCode: result.code,
				stdout: result.stdout,
				stderr: result.stderr,
			});
		}
	}

	private async upload(record: StageRecord): Promise<void> {
		const { localArchivePath, remoteArchivePath } = this.plan;
		const command = `sftp put ${localArchivePath} ${remoteArchivePath}`;
		const startTime = Date.now();

		try {
			await this.channel.upload(localArchivePath, remoteArchivePath, {
				timeout: this.options.timeouts.build,
			});
		} catch (error) {
			record.commands.push({
				command,
				exitCode: null,
				stdout: '',
				stderr: '',
				duration: Date.now() - startTime,
				absent: false,
			});
			throw wrapError(
				error,
				(cause) =>
					new RemoteCommandError({
						stage: record.stage,
						command,
						exitCode: null,
						stdout: '',
						stderr: '',
						cause,
					}),
			);
		}

		record.commands.push({
			command,
			exitCode: 0,
			stdout: '',
			stderr: '',
			duration: Date.now() - startTime,
			absent: false,
		});
	}
}
