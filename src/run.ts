#!/usr/bin/env node

/**
 * CLI entry point
 */

// Load environment variables before the default configuration reads them
import 'dotenv/config';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import Boom from '@hapi/boom';
import { CommanderError } from 'commander';
import { logger } from './helpers/logger.js';
import { loadConfigOverrides, resolveConfig } from './config/load-config.js';
import { createProgram } from './cli/program.js';
import { generate } from './cli/generate.js';

export const USAGE_EXIT_CODE = 2;

/**
 * Exit code for an error that escaped the command
 */
export function reportError(error: unknown): number {
	// Commander has already printed its own message
	if (error instanceof CommanderError) {
		return error.exitCode === 0 ? 0 : USAGE_EXIT_CODE;
	}

	if (Boom.isBoom(error) && error.output.statusCode < 500) {
		logger.error(error.message, error.data ? { details: error.data } : {});
		return USAGE_EXIT_CODE;
	}

	logger.error(
		`Generation failed: ${error instanceof Error ? error.message : String(error)}`
	);
	return 1;
}

/**
 * Main function
 */
export async function main(argv: string[] = process.argv): Promise<number> {
	try {
		const config = resolveConfig(loadConfigOverrides());

		const program = createProgram({
			config,
			action: async (options) => {
				await generate(options, config);
			}
		});

		await program.exitOverride().parseAsync(argv);
		return 0;
	} catch (error) {
		return reportError(error);
	}
}

// npm links the bin entry, so compare resolved paths
const entryPath = process.argv[1] ? realpathSync(process.argv[1]) : '';

if (entryPath && import.meta.url === pathToFileURL(entryPath).href) {
	main().then(
		(code) => {
			process.exitCode = code;
		},
		(error: unknown) => {
			logger.error('Unhandled error in main', { error });
			process.exitCode = 1;
		}
	);
}
