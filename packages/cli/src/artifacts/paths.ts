import type { Environment } from '../environment/types';

/** Root directory of the deployment archive and of the build context. */
export const ARCHIVE_ROOT = 'swarm';

/** Where the application lives inside the container. */
export const CONTAINER_APP_DIR = '/usr/src/swarm';

export const CONTAINER_NGINX_CONF = '/etc/nginx/nginx.conf';
export const CONTAINER_ENDPOINTS_CONF = '/etc/nginx/endpoints.conf';
export const CONTAINER_CERT_DIR = '/etc/nginx/certs';
export const CONTAINER_STATIC_ROOT = '/usr/share/nginx/html';

/** Registered endpoints, written by the controller at runtime. */
export const CONTAINER_PAYLOAD_FILE = `${CONTAINER_APP_DIR}/payload.json`;

/**
 * Paths of the generated files, relative to {@link ARCHIVE_ROOT}.
 */
export interface ArtifactLayout {
	privateKey: string;
	certificate: string;
	controllerConfig: string;
	proxyConfig: string;
	endpointsConfig: string;
	dockerfile: string;
}

export function getArtifactLayout(environment: Environment): ArtifactLayout {
	return {
		privateKey: `${environment.certFile}.key`,
		certificate: `${environment.certFile}.pem`,
		controllerConfig: `config/local-${environment.name}.json`,
		proxyConfig: 'proxy/conf/nginx.conf',
		endpointsConfig: 'proxy/conf/endpoints.conf',
		dockerfile: 'Dockerfile',
	};
}
