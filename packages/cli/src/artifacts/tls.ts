import { randomBytes } from 'node:crypto';
import { isIP } from 'node:net';
import { ArtifactGenerationError, wrapError } from '@swarm-deploy/errors';
import forge from 'node-forge';

export interface TlsMaterial {
	/** PEM encoded X.509 certificate */
	certificate: string;
	/** PEM encoded RSA private key */
	privateKey: string;
	commonName: string;
	notBefore: Date;
	notAfter: Date;
}

export interface TlsOptions {
	keySize?: number;
	validityYears?: number;
	/** Start of the validity period */
	now?: Date;
}

export const TLS_DEFAULTS = {
	keySize: 2048,
	validityYears: 10,
} as const;

/** Positive 128-bit serial, hex encoded. */
function randomSerial(): string {
	const bytes = randomBytes(16);
	bytes[0] = bytes[0] & 0x7f;
	return bytes.toString('hex');
}

function subjectAltName(commonName: string) {
	// type 7 is iPAddress, type 2 is dNSName
	return isIP(commonName) === 0
		? { type: 2, value: commonName }
		: { type: 7, ip: commonName };
}

/**
 * Generates a fresh self-signed certificate for `commonName`.
 * Every call produces a new key pair and serial.
 *
 * @throws ArtifactGenerationError when the name is empty or signing fails
 */
export function generateTlsMaterial(
	commonName: string,
	options: TlsOptions = {},
): TlsMaterial {
	if (commonName.trim() === '') {
		throw new ArtifactGenerationError(
			'TLS common name (host address) is empty',
			{ artifact: 'certificate' },
		);
	}

	const keySize = options.keySize ?? TLS_DEFAULTS.keySize;
	const validityYears = options.validityYears ?? TLS_DEFAULTS.validityYears;
	const notBefore = options.now ?? new Date();
	const notAfter = new Date(notBefore);
	notAfter.setFullYear(notAfter.getFullYear() + validityYears);

	try {
		const keys = forge.pki.rsa.generateKeyPair({ bits: keySize, e: 0x10001 });
		const cert = forge.pki.createCertificate();

		cert.publicKey = keys.publicKey;
		cert.serialNumber = randomSerial();
		cert.validity.notBefore = notBefore;
		cert.validity.notAfter = notAfter;

		const attributes = [{ name: 'commonName', value: commonName }];
		cert.setSubject(attributes);
		cert.setIssuer(attributes);
		cert.setExtensions([
			{ name: 'basicConstraints', cA: false },
			{ name: 'keyUsage', digitalSignature: true, keyEncipherment: true },
			{ name: 'extKeyUsage', serverAuth: true },
			{ name: 'subjectAltName', altNames: [subjectAltName(commonName)] },
		]);
		cert.sign(keys.privateKey, forge.md.sha256.create());

		return {
			certificate: forge.pki.certificateToPem(cert),
			privateKey: forge.pki.privateKeyToPem(keys.privateKey),
			commonName,
			notBefore,
			notAfter,
		};
	} catch (error) {
		throw wrapError(
			error,
			(cause) =>
				new ArtifactGenerationError(`TLS generation failed for ${commonName}`, {
					artifact: 'certificate',
					cause,
				}),
		);
	}
}
