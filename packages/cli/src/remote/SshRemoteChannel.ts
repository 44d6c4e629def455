import type { Logger } from '@swarm-deploy/logger';
import { Client, type ClientChannel, type ConnectConfig } from 'ssh2';
import type {
	CommandResult,
	ExecOptions,
	RemoteChannel,
	RemoteTarget,
} from './types';

export interface SshRemoteChannelOptions {
	/** Milliseconds to wait for the SSH handshake */
	readyTimeout: number;
	/** Applied when `exec` or `upload` get no timeout of their own */
	defaultTimeout: number;
	logger: Logger;
}

const PEM_PRIVATE_KEY = /-----BEGIN [A-Z0-9 ]*PRIVATE KEY-----/;

export function isPrivateKey(credential: string): boolean {
	return PEM_PRIVATE_KEY.test(credential);
}

/**
 * {@link RemoteChannel} over ssh2. Host keys are accepted without
 * verification; the connection logs a warning saying so.
 */
export class SshRemoteChannel implements RemoteChannel {
	private client: Client | null = null;
	private readonly logger: Logger;

	constructor(
		private readonly target: RemoteTarget,
		private readonly options: SshRemoteChannelOptions,
	) {
		this.logger = options.logger.child({ component: 'ssh', host: target.host });
	}

	get host(): string {
		return this.target.host;
	}

	async connect(): Promise<void> {
		if (this.client) return;

		const { host, port, username, credential } = this.target;
		const config: ConnectConfig = {
			host,
			port,
			username,
			readyTimeout: this.options.readyTimeout,
			hostVerifier: () => true,
		};
		if (isPrivateKey(credential)) {
			config.privateKey = credential;
		} else {
			config.password = credential;
		}

		this.logger.warn('Host key verification is disabled for this connection');

		const client = new Client();
		await new Promise<void>((resolve, reject) => {
			client
				.once('ready', () => {
					client.removeListener('error', reject);
					resolve();
				})
				.once('error', reject)
				.connect(config);
		});

		client.on('error', (error: Error) => {
			this.logger.error({ error: error.message }, 'SSH connection error');
		});
		this.client = client;
	}

	private requireClient(): Client {
		if (!this.client) {
			throw new Error('SSH not connected. Call connect() first.');
		}
		return this.client;
	}

	async exec(command: string, options: ExecOptions = {}): Promise<CommandResult> {
		const { timeout = this.options.defaultTimeout } = options;
		const client = this.requireClient();
		const startTime = Date.now();

		return new Promise((resolve, reject) => {
			const stdout: Buffer[] = [];
			const stderr: Buffer[] = [];
			let channel: ClientChannel | undefined;
			let timedOut = false;
			let timeoutId: ReturnType<typeof setTimeout> | undefined;

			if (timeout > 0) {
				timeoutId = setTimeout(() => {
					timedOut = true;
					channel?.close();
					reject(new Error(`Command timed out after ${timeout}ms`));
				}, timeout);
			}

			client.exec(command, (err, stream) => {
				if (err) {
					clearTimeout(timeoutId);
					reject(err);
					return;
				}
				if (timedOut) {
					stream.close();
					return;
				}
				channel = stream;

				stream
					.on('close', (code: number | null) => {
						clearTimeout(timeoutId);
						// decoded once: a character may span two chunks
						resolve({
							stdout: Buffer.concat(stdout).toString('utf-8'),
							stderr: Buffer.concat(stderr).toString('utf-8'),
							code: code ?? null,
							duration: Date.now() - startTime,
						});
					})
					.on('data', (data: Buffer) => {
						stdout.push(data);
					})
					.stderr.on('data', (data: Buffer) => {
						stderr.push(data);
					});
			});
		});
	}

	async upload(
		localPath: string,
		remotePath: string,
		options: ExecOptions = {},
	): Promise<void> {
		const { timeout = this.options.defaultTimeout } = options;
		const client = this.requireClient();

		await new Promise<void>((resolve, reject) => {
			let timeoutId: ReturnType<typeof setTimeout> | undefined;

			if (timeout > 0) {
				timeoutId = setTimeout(() => {
					reject(new Error(`Upload timed out after ${timeout}ms`));
				}, timeout);
			}

			client.sftp((err, sftp) => {
				if (err) {
					clearTimeout(timeoutId);
					reject(err);
					return;
				}

				sftp.fastPut(localPath, remotePath, (error) => {
					clearTimeout(timeoutId);
					sftp.end();
					if (error) {
						reject(error);
						return;
					}
					resolve();
				});
			});
		});
	}

	async close(): Promise<void> {
		if (this.client) {
			this.client.end();
			this.client = null;
		}
	}
}
