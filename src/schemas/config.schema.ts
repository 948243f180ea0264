import { z } from 'zod';

/**
 * Download settings override schema
 */
export const DownloadConfigSchema = z
	.object({
		connectTimeout: z.number().int().positive(),
		readTimeout: z.number().int().positive(),
		userAgent: z.string().min(1),
		chunkSize: z.number().int().positive()
	})
	.partial();

/**
 * Schema of the JSON accepted through CONFIG or CONFIG_FILE
 */
export const ConfigOverridesSchema = z
	.object({
		falKey: z.string().min(1),
		safetensorsUrl: z.string(),
		sourceImageUrl: z.string(),
		saveDir: z.string().min(1),
		promptsDir: z.string().min(1),
		openFiles: z.boolean(),
		httpProxy: z.string().url(),
		download: DownloadConfigSchema
	})
	.partial()
	.strict();

export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;
