/**
 * Generation API types
 */
import type { ArgumentSet, ModelDescriptor } from './models.js';

/**
 * Narrow view of the hosted generation API.
 * Both calls resolve with the response payload, whatever its shape.
 */
export interface GenerationClient {
	run(endpoint: string, input: ArgumentSet): Promise<unknown>;
	subscribe(endpoint: string, input: ArgumentSet): Promise<unknown>;
}

/**
 * Image generation adapter interface
 */
export interface IImageGenerationAdapter {
	/**
	 * Send one generation request for the given model
	 * @returns Raw response payload
	 */
	generate(model: ModelDescriptor, args: ArgumentSet): Promise<unknown>;
}

/**
 * Result returned when a request was only printed
 */
export interface DryRunResult {
	images: [];
}
