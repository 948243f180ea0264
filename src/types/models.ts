/**
 * Model registry and request argument types
 */

/**
 * How a model endpoint is invoked:
 * `run` is a blocking single-shot call, `subscribe` queues the request and waits for it
 */
export type CallMode = 'run' | 'subscribe';

/**
 * Named image sizes accepted by every model
 */
export const NAMED_IMAGE_SIZES = [
	'landscape_16_9',
	'landscape_4_3',
	'portrait_16_9',
	'portrait_4_3',
	'square',
	'square_hd'
] as const;

export type NamedImageSize = (typeof NAMED_IMAGE_SIZES)[number];

/**
 * Explicit image dimensions
 */
export interface ImageDimensions {
	width: number;
	height: number;
}

export type ImageSizeValue = NamedImageSize | ImageDimensions;

export const OUTPUT_FORMATS = ['jpeg', 'png'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * A style adapter applied during generation
 */
export interface LoraReference {
	/** Full URL or path of the weights file */
	readonly path: string;

	/** Adapter weight, always finite */
	readonly scale: number;
}

/**
 * Argument names understood by at least one model
 */
export type ArgumentName =
	| 'prompt'
	| 'image_size'
	| 'num_images'
	| 'max_images'
	| 'seed'
	| 'num_inference_steps'
	| 'guidance_scale'
	| 'strength'
	| 'output_format'
	| 'enable_safety_checker'
	| 'loras'
	| 'image_urls';

export type ArgumentValue =
	| string
	| number
	| boolean
	| ImageSizeValue
	| readonly LoraReference[]
	| readonly string[];

/**
 * Final payload sent to the generation API
 */
export type ArgumentSet = Record<string, ArgumentValue>;

/**
 * Candidate values collected from user input; absent values are skipped
 */
export type CandidateValues = Record<string, ArgumentValue | null | undefined>;

/**
 * Static configuration for one generation backend
 */
export interface ModelDescriptor {
	readonly key: string;
	readonly endpoint: string;
	readonly call: CallMode;
	readonly allowed: ReadonlySet<string>;
	readonly defaults: Readonly<ArgumentSet>;
}
