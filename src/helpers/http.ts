import { Agent, ProxyAgent, fetch, type Dispatcher } from 'undici';
import { logger } from './logger.js';

export type FetchLike = typeof fetch;

export interface FetchOptions {
	/** HTTP proxy URL (e.g., http://proxy:8080) */
	httpProxy?: string;

	/** Connect timeout in milliseconds */
	connectTimeout: number;

	/** Headers and body timeout in milliseconds */
	readTimeout: number;
}

/**
 * Create an undici dispatcher carrying the connect/read timeouts
 */
export function createDispatcher(options: FetchOptions): Dispatcher {
	const timeouts = {
		connect: { timeout: options.connectTimeout },
		headersTimeout: options.readTimeout,
		bodyTimeout: options.readTimeout
	};

	if (!options.httpProxy) {
		return new Agent(timeouts);
	}

	try {
		const proxyAgent = new ProxyAgent({ uri: options.httpProxy, ...timeouts });

		logger.debug('Created proxy agent', { proxyUrl: options.httpProxy });

		return proxyAgent;
	} catch (error) {
		logger.error('Failed to create proxy agent:', error);
		throw new Error(
			`Failed to create proxy agent with URL ${options.httpProxy}: ${error instanceof Error ? error.message : 'Unknown error'}`
		);
	}
}

/**
 * Create a fetch function with timeouts and optional proxy support
 */
export function createFetch(options: FetchOptions): FetchLike {
	const dispatcher = createDispatcher(options);

	return (input, init) => fetch(input, { ...init, dispatcher });
}
