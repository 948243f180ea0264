export * from './types/index.js';
export { MODEL_REGISTRY, getModel, listModelKeys } from './config/model-registry.js';
export { defaultConfig } from './config/default-config.js';
export { loadConfigOverrides, resolveConfig } from './config/load-config.js';
export {
	coerceImageSize,
	parseImageUrls,
	parseLoras,
	parseScale,
	splitPathAndScale
} from './arguments/normalize.js';
export { buildArguments, ignoredOptions, randomSeed } from './arguments/build-arguments.js';
export { FalImageAdapter, sendRequest } from './adapters/fal-adapter.js';
export type { FalImageAdapterConfig, SendRequestOptions } from './adapters/fal-adapter.js';
export { createFalGenerationClient } from './adapters/fal-client.js';
export { extractUrls } from './results/extract-urls.js';
export { saveAllImages } from './downloader/save-images.js';
export type { SaveImagesOptions } from './downloader/save-images.js';
export { setExifData } from './exif/set-exif-data.js';
export type { SetExifOptions } from './exif/set-exif-data.js';
export { createProgram } from './cli/program.js';
export { generate } from './cli/generate.js';
export { logger } from './helpers/logger.js';
