import { createPrivateKey, X509Certificate } from 'node:crypto';
import { ArtifactGenerationError } from '@swarm-deploy/errors';
import forge from 'node-forge';
import { describe, expect, it } from 'vitest';
import { generateTlsMaterial } from '../tls';

describe('generateTlsMaterial', () => {
	it('should create a self-signed certificate for the host', () => {
		const tls = generateTlsMaterial('dev.example.com');
		const certificate = new X509Certificate(tls.certificate);

		expect(certificate.subject).toBe('CN=dev.example.com');
		expect(certificate.issuer).toBe('CN=dev.example.com');
		expect(certificate.subjectAltName).toBe('DNS:dev.example.com');
		expect(certificate.checkPrivateKey(createPrivateKey(tls.privateKey))).toBe(
			true,
		);
		expect(certificate.verify(certificate.publicKey)).toBe(true);
	});

	it('should use a 2048-bit RSA key and a SHA-256 signature', () => {
		const tls = generateTlsMaterial('dev.example.com');
		const certificate = new X509Certificate(tls.certificate);

		expect(certificate.publicKey.asymmetricKeyType).toBe('rsa');
		expect(certificate.publicKey.asymmetricKeyDetails?.modulusLength).toBe(2048);
		expect(forge.pki.certificateFromPem(tls.certificate).siginfo.algorithmOid).toBe(
			forge.pki.oids.sha256WithRSAEncryption,
		);
	});

	it('should be valid for ten years from now', () => {
		const now = new Date('2024-03-01T12:00:00.000Z');

		const tls = generateTlsMaterial('dev.example.com', { now });
		const certificate = new X509Certificate(tls.certificate);

		expect(new Date(certificate.validFrom).toISOString()).toBe(
			'2024-03-01T12:00:00.000Z',
		);
		expect(new Date(certificate.validTo).toISOString()).toBe(
			'2034-03-01T12:00:00.000Z',
		);
		expect(tls.notAfter.toISOString()).toBe('2034-03-01T12:00:00.000Z');
	});

	it('should use an IP subject alternative name for addresses', () => {
		const tls = generateTlsMaterial('10.0.0.5');

		expect(new X509Certificate(tls.certificate).subjectAltName).toBe(
			'IP Address:10.0.0.5',
		);
	});

	it('should generate a fresh pair on every call', () => {
		const first = generateTlsMaterial('dev.example.com');
		const second = generateTlsMaterial('dev.example.com');

		expect(first.privateKey).not.toBe(second.privateKey);
		expect(new X509Certificate(first.certificate).serialNumber).not.toBe(
			new X509Certificate(second.certificate).serialNumber,
		);
	});

	it('should reject an empty host', () => {
		expect(() => generateTlsMaterial('  ')).toThrow(ArtifactGenerationError);
	});
});
