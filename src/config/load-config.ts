import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import merge from 'deepmerge';
import type { AppConfig } from '../types/index.js';
import { logger } from '../helpers/logger.js';
import { ConfigOverridesSchema, type ConfigOverrides } from '../schemas/config.schema.js';
import { defaultConfig } from './default-config.js';

type Environment = Record<string, string | undefined>;

function parseOverrides(raw: string, source: string): ConfigOverrides {
	let json: unknown;

	try {
		json = JSON.parse(raw);
	} catch (error) {
		logger.error(`Failed to parse ${source}`, { error });
		throw new Error(`Invalid ${source} JSON`);
	}

	const parseResult = ConfigOverridesSchema.safeParse(json);

	if (!parseResult.success) {
		throw new Error(
			`Invalid ${source}: ${parseResult.error.issues
				.map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
				.join('; ')}`
		);
	}

	return parseResult.data;
}

/**
 * Load configuration overrides from the environment.
 * CONFIG holds inline JSON, CONFIG_FILE a path to a JSON file.
 */
export function loadConfigOverrides(
	env: Environment = process.env
): ConfigOverrides | undefined {
	if (env.CONFIG) {
		return parseOverrides(env.CONFIG, 'CONFIG');
	}

	if (env.CONFIG_FILE) {
		const configPath = resolve(process.cwd(), env.CONFIG_FILE);
		let content: string;

		try {
			content = readFileSync(configPath, 'utf-8');
		} catch (error) {
			logger.error('Failed to load config file', {
				path: env.CONFIG_FILE,
				error
			});
			throw new Error(`Failed to load config file: ${env.CONFIG_FILE}`);
		}

		return parseOverrides(content, 'CONFIG_FILE');
	}

	return undefined;
}

/**
 * Merge overrides over a base configuration
 */
export function resolveConfig(
	overrides?: ConfigOverrides,
	base: AppConfig = defaultConfig
): AppConfig {
	if (!overrides) {
		return base;
	}

	return merge<AppConfig, ConfigOverrides>(base, overrides);
}
