/**
 * Deploy Module
 *
 * Ships the controller and its TLS proxy to the host of one environment.
 *
 * ```
 * swarm-deploy deploy --env prod
 *   ├─ Resolve parameters (config/environments/prod.json)
 *   ├─ Load apiKey, hostAddress and hostCredential
 *   ├─ Generate certificate, controller config, nginx.conf and Dockerfile
 *   ├─ Package source and artifacts into swarm-controller-prod.tar.gz
 *   └─ On the host: upload, build, replace the container, prune, verify
 * ```
 *
 * @module deploy
 */
import { RemoteCommandError } from '@swarm-deploy/errors';
import type { Logger } from '@swarm-deploy/logger';
import type { OrchestratorSettings } from '../config';
import { createSshChannelFactory } from '../remote';
import type { RemoteChannelFactory } from '../remote/types';
import { createSecretProvider, type SecretSource } from '../secrets';
import {
	type DeployOptions,
	type DeploymentReport,
	deploy,
} from './orchestrator';

export {
	type DeployDependencies,
	type DeployOptions,
	type DeploymentReport,
	deploy,
	type PipelineStep,
	type RepositorySource,
	type StepRecord,
} from './orchestrator';

const logger = console;

export interface DeployCommandOptions extends DeployOptions {
	/** Where secrets are read from */
	secrets?: SecretSource;
}

export interface DeployCommandContext {
	settings: OrchestratorSettings;
	logger: Logger;
	/** Overrides the SSH channel, mainly for tests */
	createChannel?: RemoteChannelFactory;
}

/**
 * Runs a deployment and prints its summary. Resolves with the report; the
 * caller decides the exit code from `report.status`.
 */
export async function deployCommand(
	options: DeployCommandOptions,
	context: DeployCommandContext,
): Promise<DeploymentReport> {
	const { settings } = context;
	const secretProvider = createSecretProvider(options.secrets ?? 'env');

	logger.log(`\n🚀 Deploying ${options.environment ?? '(default environment)'}...`);
	logger.log(`   Secrets: ${secretProvider.source}`);

	const report = await deploy(options, {
		settings,
		logger: context.logger,
		secretProvider,
		createChannel:
			context.createChannel ??
			createSshChannelFactory({
				readyTimeout: settings.timeouts.connect,
				defaultTimeout: settings.timeouts.command,
				logger: context.logger,
			}),
	});

	printReport(report, options.archiveDir !== undefined);
	return report;
}

export function formatReport(report: DeploymentReport, keepArchive = false): string[] {
	const lines: string[] = [];

	if (report.environment && report.environment !== report.requestedEnvironment) {
		lines.push(`   Environment: ${report.environment}`);
	}

	for (const step of report.steps) {
		const mark = step.status === 'succeeded' ? '✓' : '✗';
		lines.push(`   ${mark} ${step.step} (${step.duration}ms)`);
	}
	for (const stage of report.stages) {
		const mark =
			stage.status === 'succeeded' ? '✓' : stage.fatal ? '✗' : '⚠';
		lines.push(`     ${mark} ${stage.stage} (${stage.duration}ms)`);
	}

	if (keepArchive && report.archive) {
		lines.push(`   Archive: ${report.archive.path}`);
		lines.push(`   SHA-256: ${report.archive.sha256}`);
	}

	if (report.status === 'succeeded') {
		lines.push(
			`\n✅ Deployed ${report.containerName} in ${Math.round(report.duration / 1000)}s`,
		);
	} else {
		lines.push(
			`\n❌ Deployment failed at ${report.failedStage ?? 'an unknown stage'}: ${report.error?.message ?? 'unknown error'}`,
		);
		if (report.error instanceof RemoteCommandError && report.error.output) {
			lines.push('   Remote output:');
			for (const line of report.error.output.split('\n')) {
				lines.push(`   | ${line}`);
			}
		}
	}

	return lines;
}

function printReport(report: DeploymentReport, keepArchive: boolean): void {
	const lines = formatReport(report, keepArchive);
	const failureAt = lines.findIndex((line) => line.startsWith('\n❌'));

	lines.forEach((line, index) => {
		if (failureAt !== -1 && index >= failureAt) {
			logger.error(line);
		} else {
			logger.log(line);
		}
	});
}
