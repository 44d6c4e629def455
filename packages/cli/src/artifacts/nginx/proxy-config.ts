import type { Environment } from '../../environment/types';
import {
	CONTAINER_CERT_DIR,
	CONTAINER_ENDPOINTS_CONF,
	CONTAINER_STATIC_ROOT,
} from '../paths';
import { block, directive, type NginxNode } from './directives';

function listenAddress(host: string, port: number): string {
	return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

/**
 * The proxy in front of the controller: TLS termination on the proxy
 * address, static content at `/`, the controller under the public path,
 * and the endpoints the controller registers at runtime.
 */
export function buildProxyConfig(
	environment: Environment,
	serverName: string,
): NginxNode[] {
	const { controller, proxy } = environment;

	return [
		directive('worker_processes', 'auto'),
		block('events', [], [directive('worker_connections', 1024)]),
		block(
			'http',
			[],
			[
				directive('include', '/etc/nginx/mime.types'),
				directive('default_type', 'application/octet-stream'),
				directive('sendfile', 'on'),
				directive('keepalive_timeout', 65),
				block(
					'server',
					[],
					[
						directive('listen', listenAddress(proxy.host, proxy.port), 'ssl'),
						directive('server_name', serverName),
						directive(
							'ssl_certificate',
							`${CONTAINER_CERT_DIR}/${environment.certFile}.pem`,
						),
						directive(
							'ssl_certificate_key',
							`${CONTAINER_CERT_DIR}/${environment.certFile}.key`,
						),
						directive('ssl_protocols', 'TLSv1.2', 'TLSv1.3'),
						directive('proxy_set_header', 'Host', '$host'),
						directive('proxy_set_header', 'X-Real-IP', '$remote_addr'),
						directive(
							'proxy_set_header',
							'X-Forwarded-For',
							'$proxy_add_x_forwarded_for',
						),
						directive('proxy_set_header', 'X-Forwarded-Proto', '$scheme'),
						block(
							'location',
							['/'],
							[
								directive('root', CONTAINER_STATIC_ROOT),
								directive('index', 'index.html'),
							],
						),
						block(
							'location',
							[`${proxy.publicPath}/`],
							[
								directive(
									'proxy_pass',
									`http://${listenAddress(controller.host, controller.port)}/`,
								),
							],
						),
						directive('include', CONTAINER_ENDPOINTS_CONF),
					],
				),
			],
		),
	];
}
