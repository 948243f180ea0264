import Boom from '@hapi/boom';
import { Command, InvalidArgumentError, Option } from 'commander';
import { NAMED_IMAGE_SIZES, OUTPUT_FORMATS, type AppConfig } from '../types/index.js';
import { CliOptionsSchema, type CliOptions } from '../schemas/arguments.schema.js';
import { listModelKeys } from '../config/model-registry.js';

export interface ProgramOptions {
	config: AppConfig;
	action: (options: CliOptions) => Promise<void>;
}

function parseInteger(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed)) {
		throw new InvalidArgumentError('Not an integer.');
	}
	return parsed;
}

function parseNumber(value: string): number {
	const parsed = Number(value);
	if (value.trim() === '' || !Number.isFinite(parsed)) {
		throw new InvalidArgumentError('Not a number.');
	}
	return parsed;
}

/**
 * Build the `fal-image` command.
 * Option values are validated before the action runs.
 */
export function createProgram({ config, action }: ProgramOptions): Command {
	const program = new Command();

	program
		.name('fal-image')
		.description('Generate images with fal.ai models and save them locally.')
		.helpOption('--help', 'display help for command')
		.addOption(
			new Option('-m, --model <key>', 'Which model/workflow to use.')
				.choices(listModelKeys())
				.default('schnell')
		)
		.option('-p, --prompt <text>', 'Prompt for image generation.')
		.option(
			'-f, --promptfile <name>',
			'File containing the prompt (looked up in the prompts directory; .txt implied).'
		)
		.option('-#, --num-images <count>', 'Number of images to generate.', parseInteger, 1)
		.option('--name <name>', 'Base name for saved images.')
		.option(
			'--loras <spec>',
			'JSON list of {path, scale} or comma list of names/URLs, optionally with :scale. ' +
				'Names are expanded to <SAFETENSORS_URL><name>.safetensors. Default scale=1.',
			''
		)
		.addOption(
			new Option(
				'-i, --image-size <size>',
				'Named size (default portrait_4_3). Alternatively use --width/--height.'
			).choices(NAMED_IMAGE_SIZES)
		)
		.option('-w, --width <px>', 'Width of generated image (requires --height).', parseInteger)
		.option('-h, --height <px>', 'Height of generated image (requires --width).', parseInteger)
		.option('-s, --seed <seed>', 'Seed (0=random).', parseInteger, 0)
		.option('--num-inference-steps <steps>', 'Inference steps (varies by model).', parseInteger)
		.option('--guidance-scale <scale>', 'Guidance scale (where supported).', parseNumber)
		.option('--strength <value>', 'Strength (realism model).', parseNumber)
		.addOption(
			new Option('--output-format <format>', 'Output image format (where supported).').choices(
				OUTPUT_FORMATS
			)
		)
		.option('--enable-safety-checker', 'Enable the safety checker (where supported).')
		.option('--no-enable-safety-checker', 'Disable the safety checker (where supported).')
		.option(
			'--image-urls <list>',
			'Comma-separated URLs or names (seedream-edit only). ' +
				'Names are expanded to <SOURCE_IMAGE_URL><name>[.jpg].',
			''
		)
		.option('-n, --dry-run', 'Do not send; print the request and exit.', false)
		.option('-o, --out-dir <dir>', 'Directory for saved images.', config.saveDir)
		.option('--no-open', 'Do not open saved images.')
		.action(async () => {
			const opts = program.opts();
			const parseResult = CliOptionsSchema.safeParse({
				...opts,
				open: opts.open !== false && config.openFiles
			});

			if (!parseResult.success) {
				throw Boom.badRequest('Invalid options', {
					errors: parseResult.error.issues
				});
			}

			await action(parseResult.data);
		});

	return program;
}
