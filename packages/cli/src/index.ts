#!/usr/bin/env -S npx tsx

import { errorMessage } from '@swarm-deploy/errors';
import { Command, InvalidArgumentError } from 'commander';
import pkg from '../package.json' with { type: 'json' };
import { loadSettings, type OrchestratorSettings } from './config';
import { deployCommand } from './deploy';
import { environmentsCommand } from './environment';
import { createCliLogger } from './logger';
import { renderCommand } from './render';
import {
	createSecretProvider,
	isSecretSource,
	type SecretSource,
	secretsSetCommand,
	secretsShowCommand,
} from './secrets';

function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new InvalidArgumentError('Must be a positive integer.');
	}
	return parsed;
}

function parseSecretSource(value: string): SecretSource {
	if (!isSecretSource(value)) {
		throw new InvalidArgumentError("Must be 'env' or 'file'.");
	}
	return value;
}

const program = new Command();

program
	.name('swarm-deploy')
	.description('Deploys the swarm controller and its TLS proxy')
	.version(pkg.version)
	.option('--cwd <path>', 'Change working directory');

function applyGlobalOptions(): void {
	const globalOptions = program.opts<{ cwd?: string }>();
	if (globalOptions.cwd) {
		process.chdir(globalOptions.cwd);
	}
}

function settingsWith(overrides: {
	configDir?: string;
	timeout?: number;
	buildTimeout?: number;
}): OrchestratorSettings {
	const settings = loadSettings();
	return {
		...settings,
		configDir: overrides.configDir ?? settings.configDir,
		timeouts: {
			...settings.timeouts,
			command: overrides.timeout ?? settings.timeouts.command,
			build: overrides.buildTimeout ?? settings.timeouts.build,
		},
	};
}

program
	.command('deploy')
	.description('Build and ship the controller container to an environment')
	.option('--env <name>', 'Target environment (dev, prod)')
	.option('--source <dir>', 'Application source directory', '.')
	.option('--repo <url>', 'Check out the source from this repository instead')
	.option('--branch <name>', 'Branch to check out (defaults to the environment)')
	.option('--credential-id <id>', 'Git credential, read from SWARM_GIT_TOKEN_{ID}')
	.option('--config-dir <dir>', 'Directory holding environment parameter files')
	.option('--secrets <source>', 'Secret source: env or file', parseSecretSource, 'env')
	.option('--timeout <ms>', 'Timeout for each remote command', parsePositiveInt)
	.option('--build-timeout <ms>', 'Timeout for the image build', parsePositiveInt)
	.option('--keep-archive <dir>', 'Keep the deployment archive in this directory')
	.action(
		async (options: {
			env?: string;
			source: string;
			repo?: string;
			branch?: string;
			credentialId?: string;
			configDir?: string;
			secrets: SecretSource;
			timeout?: number;
			buildTimeout?: number;
			keepArchive?: string;
		}) => {
			try {
				applyGlobalOptions();
				const settings = settingsWith(options);
				const logger = createCliLogger(settings);

				const controller = new AbortController();
				process.once('SIGINT', () => {
					logger.warn('Interrupt received, stopping before the next safe point');
					controller.abort();
				});

				const report = await deployCommand(
					{
						environment: options.env,
						sourceDir: options.source,
						repository: options.repo
							? {
									url: options.repo,
									branch: options.branch,
									credentialId: options.credentialId,
								}
							: undefined,
						archiveDir: options.keepArchive,
						secrets: options.secrets,
						signal: controller.signal,
					},
					{ settings, logger },
				);

				if (report.status === 'failed') {
					process.exit(1);
				}
			} catch (error) {
				console.error('Deploy failed:', errorMessage(error));
				process.exit(1);
			}
		},
	);

program
	.command('render')
	.description('Write the generated artifacts locally without deploying')
	.option('--env <name>', 'Target environment (dev, prod)')
	.option('--out <dir>', 'Output directory', '.swarm/render')
	.option('--source <dir>', 'Application source directory', '.')
	.option('--config-dir <dir>', 'Directory holding environment parameter files')
	.option('--secrets <source>', 'Secret source: env or file', parseSecretSource, 'env')
	.action(
		async (options: {
			env?: string;
			out: string;
			source: string;
			configDir?: string;
			secrets: SecretSource;
		}) => {
			try {
				applyGlobalOptions();
				const settings = settingsWith(options);
				await renderCommand(
					{
						environment: options.env,
						outDir: options.out,
						sourceDir: options.source,
						configDir: settings.configDir,
					},
					{
						secretProvider: createSecretProvider(options.secrets),
						logger: createCliLogger(settings),
					},
				);
			} catch (error) {
				console.error('Render failed:', errorMessage(error));
				process.exit(1);
			}
		},
	);

program
	.command('environments')
	.description('List the known environments and their addresses')
	.option('--config-dir <dir>', 'Directory holding environment parameter files')
	.action(async (options: { configDir?: string }) => {
		try {
			applyGlobalOptions();
			const settings = settingsWith(options);
			await environmentsCommand({
				configDir: settings.configDir,
				logger: createCliLogger(settings),
			});
		} catch (error) {
			console.error('Failed to list environments:', errorMessage(error));
			process.exit(1);
		}
	});

program
	.command('secrets:set')
	.description('Store a secret in the encrypted file store')
	.argument('<env>', 'Environment (dev, prod)')
	.argument('<kind>', 'apiKey, hostAddress or hostCredential')
	.argument('<value>', 'Secret value')
	.action(async (env: string, kind: string, value: string) => {
		try {
			applyGlobalOptions();
			await secretsSetCommand(env, kind, value);
		} catch (error) {
			console.error('Failed to set secret:', errorMessage(error));
			process.exit(1);
		}
	});

program
	.command('secrets:show')
	.description('Show the stored secrets of an environment')
	.argument('<env>', 'Environment (dev, prod)')
	.option('--reveal', 'Show actual values instead of masked')
	.action(async (env: string, options: { reveal?: boolean }) => {
		try {
			applyGlobalOptions();
			await secretsShowCommand(env, options);
		} catch (error) {
			console.error('Failed to show secrets:', errorMessage(error));
			process.exit(1);
		}
	});

program.parseAsync(process.argv).catch((error: unknown) => {
	console.error(errorMessage(error));
	process.exit(1);
});
