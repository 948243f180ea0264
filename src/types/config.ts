/**
 * Configuration types for the image generation CLI
 */

/**
 * Download settings
 */
export interface DownloadConfig {
	/** Connect timeout in milliseconds */
	connectTimeout: number;

	/** Read (headers and body) timeout in milliseconds */
	readTimeout: number;

	/** User-Agent header sent with every download */
	userAgent: string;

	/** Size of the chunks written to disk */
	chunkSize: number;
}

/**
 * Application configuration
 */
export interface AppConfig {
	/** fal.ai API key, required unless the request is a dry run */
	falKey?: string;

	/** Prefix for LoRA shorthand names */
	safetensorsUrl: string;

	/** Prefix for source image shorthand names */
	sourceImageUrl: string;

	/** Directory receiving downloaded images */
	saveDir: string;

	/** Directory searched for prompt files */
	promptsDir: string;

	/** Open each saved image with the system default handler */
	openFiles: boolean;

	/** HTTP proxy URL used for downloads */
	httpProxy?: string;

	download: DownloadConfig;
}
