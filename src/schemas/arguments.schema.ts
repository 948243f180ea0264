import { z } from 'zod';
import { NAMED_IMAGE_SIZES, OUTPUT_FORMATS } from '../types/index.js';

/**
 * Named image size schema
 */
export const NamedImageSizeSchema = z.enum(NAMED_IMAGE_SIZES);

/**
 * Output format schema
 */
export const OutputFormatSchema = z.enum(OUTPUT_FORMATS);

/**
 * One entry of a structured (JSON) LoRA list.
 * Scale may be anything; values that are not finite numbers become 1.0.
 */
export const LoraItemSchema = z.union([
	z.string(),
	z
		.object({
			path: z.string().optional(),
			url: z.string().optional(),
			name: z.string().optional(),
			scale: z.unknown().optional()
		})
		.passthrough()
]);

export type LoraItem = z.infer<typeof LoraItemSchema>;

const positiveInt = z.number().int().positive();

/**
 * Options collected by the command-line program
 */
export const CliOptionsSchema = z.object({
	model: z.string().min(1),
	prompt: z.string().optional(),
	promptfile: z.string().min(1).optional(),
	numImages: positiveInt,
	name: z.string().min(1).optional(),
	loras: z.string(),
	imageSize: NamedImageSizeSchema.optional(),
	width: positiveInt.optional(),
	height: positiveInt.optional(),
	seed: z.number().int().min(0).max(2 ** 32 - 1),
	numInferenceSteps: positiveInt.optional(),
	guidanceScale: z.number().finite().optional(),
	strength: z.number().finite().optional(),
	outputFormat: OutputFormatSchema.optional(),
	enableSafetyChecker: z.boolean().optional(),
	imageUrls: z.string(),
	dryRun: z.boolean(),
	outDir: z.string().min(1),
	open: z.boolean()
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;
