import path from 'node:path';
import type { AppConfig } from '../types/index.js';

/**
 * Default application configuration
 */
export const defaultConfig: AppConfig = {
	falKey: process.env.FAL_KEY,
	safetensorsUrl: process.env.SAFETENSORS_URL || '',
	sourceImageUrl: process.env.SOURCE_IMAGE_URL || '',
	saveDir: process.env.IMAGE_DIR || 'assets',
	promptsDir: process.env.PROMPTS_DIR || path.resolve(process.cwd(), 'prompts'),
	openFiles: true,
	httpProxy: process.env.HTTP_PROXY,
	download: {
		connectTimeout: parseInt(process.env.DOWNLOAD_CONNECT_TIMEOUT_MS || '5000', 10),
		readTimeout: parseInt(process.env.DOWNLOAD_READ_TIMEOUT_MS || '60000', 10),
		userAgent: 'image-downloader/1.0',
		chunkSize: 64 * 1024 // 64 KiB
	}
};
