import { ArtifactGenerationError } from '@swarm-deploy/errors';

export type NginxArgument = string | number;

export interface NginxDirective {
	kind: 'directive';
	name: string;
	args: NginxArgument[];
}

export interface NginxBlock {
	kind: 'block';
	name: string;
	args: NginxArgument[];
	children: NginxNode[];
}

export type NginxNode = NginxDirective | NginxBlock;

export function directive(name: string, ...args: NginxArgument[]): NginxDirective {
	return { kind: 'directive', name, args };
}

export function block(
	name: string,
	args: NginxArgument[],
	children: NginxNode[],
): NginxBlock {
	return { kind: 'block', name, args, children };
}

const INDENT = '    ';
const NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;
const NEEDS_QUOTES = /[\s;{}'"\\#]/;

function formatArgument(node: NginxNode, arg: NginxArgument): string {
	if (typeof arg === 'number') {
		if (!Number.isFinite(arg)) {
			throw new ArtifactGenerationError(
				`Directive "${node.name}" has a non-finite argument`,
				{ artifact: 'nginx.conf' },
			);
		}
		return String(arg);
	}

	if (arg === '') {
		throw new ArtifactGenerationError(
			`Directive "${node.name}" has an empty argument`,
			{ artifact: 'nginx.conf' },
		);
	}

	return NEEDS_QUOTES.test(arg) ? `"${arg.replace(/["\\]/g, '\\$&')}"` : arg;
}

function serializeNode(node: NginxNode, depth: number): string[] {
	if (!NAME_PATTERN.test(node.name)) {
		throw new ArtifactGenerationError(
			`Invalid nginx directive name "${node.name}"`,
			{ artifact: 'nginx.conf' },
		);
	}

	const indent = INDENT.repeat(depth);
	const head = [node.name, ...node.args.map((arg) => formatArgument(node, arg))].join(' ');

	if (node.kind === 'directive') {
		return [`${indent}${head};`];
	}

	return [
		`${indent}${head} {`,
		...node.children.flatMap((child) => serializeNode(child, depth + 1)),
		`${indent}}`,
	];
}

/**
 * Renders a directive tree in nginx configuration syntax. Arguments with
 * whitespace or syntax characters are double-quoted.
 *
 * @throws ArtifactGenerationError for invalid names or empty arguments
 */
export function serializeNginxConfig(nodes: NginxNode[]): string {
	const lines = nodes.flatMap((node) => serializeNode(node, 0));
	return lines.length === 0 ? '' : `${lines.join('\n')}\n`;
}
