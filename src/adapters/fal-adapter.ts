import type {
	ArgumentSet,
	DryRunResult,
	GenerationClient,
	IImageGenerationAdapter,
	ModelDescriptor
} from '../types/index.js';
import { logger } from '../helpers/logger.js';
import { getModel } from '../config/model-registry.js';
import { createFalGenerationClient } from './fal-client.js';

/**
 * fal.ai image generation adapter configuration
 */
export interface FalImageAdapterConfig {
	/** fal.ai API key */
	apiKey: string;

	/** Client override, used instead of the fal.ai library */
	client?: GenerationClient;
}

/**
 * fal.ai image generation adapter.
 * Dispatches on the model's call mode; upstream errors propagate.
 */
export class FalImageAdapter implements IImageGenerationAdapter {
	private client: GenerationClient;

	constructor(config: FalImageAdapterConfig) {
		if (!config.apiKey) {
			throw new Error('API key is required');
		}

		this.client = config.client ?? createFalGenerationClient(config.apiKey);
	}

	async generate(model: ModelDescriptor, args: ArgumentSet): Promise<unknown> {
		const startTime = Date.now();

		logger.debug('Generating image with fal.ai', {
			model: model.key,
			endpoint: model.endpoint,
			call: model.call
		});

		const result =
			model.call === 'run'
				? await this.client.run(model.endpoint, args)
				: await this.client.subscribe(model.endpoint, args);

		logger.debug('Image generation completed', {
			model: model.key,
			duration: Date.now() - startTime
		});

		return result;
	}
}

export interface SendRequestOptions {
	dryRun?: boolean;

	/** Called only when the request is actually sent */
	createAdapter: () => IImageGenerationAdapter;
}

/**
 * Trace the request, then send it unless this is a dry run
 */
export async function sendRequest(
	modelKey: string,
	args: ArgumentSet,
	options: SendRequestOptions
): Promise<unknown> {
	const model = getModel(modelKey);

	logger.info('Request', {
		model: model.key,
		endpoint: model.endpoint,
		arguments: args
	});

	if (options.dryRun) {
		logger.info('Not sent (dry-run)');
		const empty: DryRunResult = { images: [] };
		return empty;
	}

	return options.createAdapter().generate(model, args);
}
