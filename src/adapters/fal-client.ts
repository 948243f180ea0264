import { createFalClient } from '@fal-ai/client';
import type { ArgumentSet, GenerationClient } from '../types/index.js';

/**
 * GenerationClient backed by the fal.ai client library.
 * Resolves with the `data` part of each result.
 */
export function createFalGenerationClient(apiKey: string): GenerationClient {
	const client = createFalClient({ credentials: apiKey });

	return {
		async run(endpoint: string, input: ArgumentSet): Promise<unknown> {
			const result = await client.run(endpoint, { input });
			return result.data;
		},

		async subscribe(endpoint: string, input: ArgumentSet): Promise<unknown> {
			const result = await client.subscribe(endpoint, { input, logs: false });
			return result.data;
		}
	};
}
