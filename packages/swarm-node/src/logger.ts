import debug from 'debug';

const BASE_NAMESPACE = 'waypost:swarm-node';

export type Logger = debug.Debugger;

export function createLogger(subNamespace: string): Logger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}
