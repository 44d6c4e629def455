import { ArtifactGenerationError } from '@swarm-deploy/errors';
import { describe, expect, it } from 'vitest';
import { devEnvironment } from '../../__tests__/test-helpers';
import { buildDockerfile, serializeDockerfile } from '../dockerfile';
import { getArtifactLayout } from '../paths';

describe('buildDockerfile', () => {
	const layout = getArtifactLayout(devEnvironment);

	it('should render the controller image', () => {
		const output = serializeDockerfile(buildDockerfile(devEnvironment, layout));

		expect(output).toBe(
			[
				'FROM nginx:1.27',
				'RUN apt-get update && \\',
				'    apt-get install -y --no-install-recommends ca-certificates curl gnupg && \\',
				'    curl -fsSL https://deb.nodesource.com/setup_20.x | bash - && \\',
				'    apt-get install -y --no-install-recommends nodejs && \\',
				'    rm -rf /var/lib/apt/lists/*',
				'WORKDIR /usr/src/swarm',
				'COPY package*.json ./',
				'RUN npm ci --omit=dev',
				'COPY . .',
				'COPY proxy/conf/nginx.conf /etc/nginx/nginx.conf',
				'COPY proxy/conf/endpoints.conf /etc/nginx/endpoints.conf',
				'COPY swarm.pem swarm.key /etc/nginx/certs/',
				'EXPOSE 8443',
				'CMD ["/bin/sh","-c","nginx && exec npm start"]',
				'',
			].join('\n'),
		);
	});

	it('should honour image, Node.js and install options', () => {
		const output = serializeDockerfile(
			buildDockerfile(devEnvironment, layout, {
				baseImage: 'nginx:1.27-bookworm',
				nodeMajor: 22,
				install: 'install',
			}),
		);

		expect(output).toMatch(/^FROM nginx:1\.27-bookworm\n/);
		expect(output).toContain('setup_22.x');
		expect(output).toContain('\nRUN npm install --omit=dev\n');
	});

	it('should expose the proxy port', () => {
		const output = serializeDockerfile(
			buildDockerfile(
				{ ...devEnvironment, proxy: { ...devEnvironment.proxy, port: 443 } },
				layout,
			),
		);

		expect(output.split('\n')).toContain('EXPOSE 443');
	});
});

describe('serializeDockerfile', () => {
	it('should require FROM first', () => {
		expect(() => serializeDockerfile([{ kind: 'EXPOSE', port: 80 }])).toThrow(
			'Dockerfile must start with FROM',
		);
	});

	it('should reject empty values', () => {
		expect(() =>
			serializeDockerfile([
				{ kind: 'FROM', image: 'nginx' },
				{ kind: 'COPY', sources: [''], destination: '/etc' },
			]),
		).toThrow(ArtifactGenerationError);
	});

	it('should reject invalid ports', () => {
		expect(() =>
			serializeDockerfile([
				{ kind: 'FROM', image: 'nginx' },
				{ kind: 'EXPOSE', port: 0 },
			]),
		).toThrow('Dockerfile EXPOSE has an invalid port 0');
	});
});
