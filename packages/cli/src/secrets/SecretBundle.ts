import { inspect } from 'node:util';
import { isSecretKind, type SecretKind } from './types';

const REDACTED = '[Redacted]';

/**
 * The secrets of one deployment run. Passed by parameter, never stored in
 * process-wide state. Serializes and inspects as `[Redacted]`; once
 * {@link SecretBundle.scrub} has run every read throws.
 */
export class SecretBundle {
	#values: Map<SecretKind, string>;
	#scrubbed = false;

	constructor(
		readonly environment: string,
		values: Record<SecretKind, string>,
	) {
		this.#values = new Map(Object.entries(values).filter(isSecretEntry));
	}

	get apiKey(): string {
		return this.get('apiKey');
	}

	get hostAddress(): string {
		return this.get('hostAddress');
	}

	get hostCredential(): string {
		return this.get('hostCredential');
	}

	get isScrubbed(): boolean {
		return this.#scrubbed;
	}

	get(kind: SecretKind): string {
		if (this.#scrubbed) {
			throw new Error(
				`Secret bundle for "${this.environment}" has been scrubbed`,
			);
		}
		const value = this.#values.get(kind);
		if (value === undefined) {
			throw new Error(`Secret bundle has no "${kind}"`);
		}
		return value;
	}

	/**
	 * Drops every value. Safe to call more than once.
	 */
	scrub(): void {
		this.#values.clear();
		this.#scrubbed = true;
	}

	toJSON(): string {
		return REDACTED;
	}

	toString(): string {
		return REDACTED;
	}

	[inspect.custom](): string {
		return `SecretBundle(${this.environment}) ${REDACTED}`;
	}
}

function isSecretEntry(entry: [string, string]): entry is [SecretKind, string] {
	return isSecretKind(entry[0]);
}
