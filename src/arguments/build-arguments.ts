import type { ArgumentSet, CandidateValues } from '../types/index.js';
import { getModel } from '../config/model-registry.js';

const MAX_SEED = 2 ** 32 - 1;

/**
 * Uniform random seed in [1, 2^32 - 1]
 */
export function randomSeed(random: () => number = Math.random): number {
	return Math.floor(random() * MAX_SEED) + 1;
}

/**
 * Assemble the argument set for a model: registry defaults first,
 * then every present candidate the model accepts.
 * A missing or zero seed is replaced by a random one.
 */
export function buildArguments(
	modelKey: string,
	values: CandidateValues,
	random: () => number = Math.random
): ArgumentSet {
	const model = getModel(modelKey);
	const args: ArgumentSet = { ...model.defaults };

	for (const [key, value] of Object.entries(values)) {
		if (model.allowed.has(key) && value !== null && value !== undefined) {
			args[key] = value;
		}
	}

	if (model.allowed.has('seed')) {
		const seed = args.seed;
		if (seed === undefined || seed === 0) {
			args.seed = randomSeed(random);
		}
	}

	return args;
}

/**
 * Keys the user supplied that the model does not accept
 */
export function ignoredOptions(modelKey: string, values: CandidateValues): string[] {
	const model = getModel(modelKey);

	return Object.entries(values)
		.filter(([key, value]) => value !== null && value !== undefined && !model.allowed.has(key))
		.map(([key]) => key)
		.sort();
}
