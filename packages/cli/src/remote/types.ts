export interface CommandResult {
	stdout: string;
	stderr: string;
	/** Exit code; null when the process ended without one */
	code: number | null;
	/** Milliseconds */
	duration: number;
}

export interface ExecOptions {
	/** Milliseconds before the command is abandoned */
	timeout?: number;
}

/**
 * Connection to the target host. Implemented over SSH in production and by
 * in-process stand-ins in tests.
 */
export interface RemoteChannel {
	readonly host: string;
	connect(): Promise<void>;
	/**
	 * Runs a shell command. Resolves with a non-zero code rather than
	 * rejecting; rejects when the command cannot be run or times out.
	 */
	exec(command: string, options?: ExecOptions): Promise<CommandResult>;
	upload(localPath: string, remotePath: string, options?: ExecOptions): Promise<void>;
	close(): Promise<void>;
}

export interface RemoteTarget {
	host: string;
	port: number;
	username: string;
	/** Password, or a PEM private key */
	credential: string;
}

export type RemoteChannelFactory = (target: RemoteTarget) => RemoteChannel;
