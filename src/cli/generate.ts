import Boom from '@hapi/boom';
import type { AppConfig, CandidateValues, IImageGenerationAdapter, NamedImageSize } from '../types/index.js';
import type { CliOptions } from '../schemas/arguments.schema.js';
import { logger } from '../helpers/logger.js';
import { coerceImageSize, parseImageUrls, parseLoras } from '../arguments/normalize.js';
import { buildArguments, ignoredOptions } from '../arguments/build-arguments.js';
import { FalImageAdapter, sendRequest } from '../adapters/fal-adapter.js';
import { extractUrls } from '../results/extract-urls.js';
import { saveAllImages } from '../downloader/save-images.js';
import { resolvePrompt } from './prompt-file.js';

export const DEFAULT_IMAGE_SIZE: NamedImageSize = 'portrait_4_3';

export interface GenerateDependencies {
	createAdapter?: (config: AppConfig) => IImageGenerationAdapter;
	saveImages?: typeof saveAllImages;
	random?: () => number;
}

/**
 * Adapter backed by fal.ai
 * @throws Boom.badRequest when no API key is configured
 */
export function createDefaultAdapter(config: AppConfig): IImageGenerationAdapter {
	if (!config.falKey) {
		throw Boom.badRequest('FAL_KEY is not set. Export it or add it to .env.');
	}

	return new FalImageAdapter({ apiKey: config.falKey });
}

/**
 * Turn CLI options into candidate argument values
 */
export async function collectValues(
	options: CliOptions,
	config: AppConfig
): Promise<{ values: CandidateValues; promptStem?: string }> {
	const { prompt, promptStem } = await resolvePrompt(
		options.prompt,
		options.promptfile,
		config.promptsDir
	);

	const imageSize =
		coerceImageSize(options.imageSize, options.width, options.height) ?? DEFAULT_IMAGE_SIZE;

	const loras = parseLoras(options.loras, config.safetensorsUrl);
	if (loras.length > 0) {
		logger.info('LoRAs', { loras });
	}

	const imageUrls = options.imageUrls
		? parseImageUrls(options.imageUrls, config.sourceImageUrl)
		: undefined;

	return {
		promptStem,
		values: {
			prompt,
			image_size: imageSize,
			num_images: options.numImages,
			seed: options.seed,
			num_inference_steps: options.numInferenceSteps,
			guidance_scale: options.guidanceScale,
			strength: options.strength,
			output_format: options.outputFormat,
			enable_safety_checker: options.enableSafetyChecker,
			loras: loras.length > 0 ? loras : undefined,
			image_urls: imageUrls
		}
	};
}

/**
 * Full generation flow: normalize, build, send, download
 * @returns Paths of the saved images
 */
export async function generate(
	options: CliOptions,
	config: AppConfig,
	dependencies: GenerateDependencies = {}
): Promise<string[]> {
	const {
		createAdapter = createDefaultAdapter,
		saveImages = saveAllImages,
		random = Math.random
	} = dependencies;

	const { values, promptStem } = await collectValues(options, config);
	const args = buildArguments(options.model, values, random);

	const ignored = ignoredOptions(options.model, values);
	if (ignored.length > 0) {
		logger.warn(
			`Ignoring unsupported options for model '${options.model}': ${ignored.join(', ')}`
		);
	}

	const result = await sendRequest(options.model, args, {
		dryRun: options.dryRun,
		createAdapter: () => createAdapter(config)
	});

	const urls = extractUrls(result);
	if (urls.length === 0) {
		logger.info('No image URLs returned.');
		return [];
	}

	return saveImages(urls, {
		namePrefix: promptStem ?? options.name,
		saveDir: options.outDir,
		openFiles: options.open,
		download: config.download,
		httpProxy: config.httpProxy
	});
}
