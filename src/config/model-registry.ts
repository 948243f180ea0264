import Boom from '@hapi/boom';
import type { ArgumentName, ArgumentSet, CallMode, ModelDescriptor } from '../types/index.js';

interface ModelDefinition {
	endpoint: string;
	call: CallMode;
	allowed: readonly ArgumentName[];
	defaults: ArgumentSet;
}

const definitions: Record<string, ModelDefinition> = {
	// Minimal, fast
	schnell: {
		endpoint: 'fal-ai/flux/schnell',
		call: 'subscribe',
		allowed: [
			'prompt',
			'image_size',
			'num_images',
			'num_inference_steps',
			'enable_safety_checker',
			'seed'
		],
		defaults: {
			num_inference_steps: 4,
			enable_safety_checker: false
		}
	},
	dev: {
		endpoint: 'fal-ai/flux/dev',
		call: 'subscribe',
		allowed: [
			'prompt',
			'image_size',
			'num_inference_steps',
			'guidance_scale',
			'num_images',
			'enable_safety_checker',
			'seed'
		],
		defaults: {
			num_inference_steps: 28,
			guidance_scale: 3.5,
			enable_safety_checker: false
		}
	},
	realism: {
		endpoint: 'fal-ai/flux-realism',
		call: 'subscribe',
		allowed: [
			'prompt',
			'strength',
			'image_size',
			'num_images',
			'output_format',
			'num_inference_steps',
			'guidance_scale',
			'enable_safety_checker',
			'seed'
		],
		defaults: {
			num_inference_steps: 28,
			guidance_scale: 3.5,
			enable_safety_checker: false,
			output_format: 'jpeg',
			strength: 1
		}
	},
	lora: {
		endpoint: 'fal-ai/flux-lora',
		call: 'subscribe',
		allowed: [
			'prompt',
			'image_size',
			'num_inference_steps',
			'guidance_scale',
			'num_images',
			'output_format',
			'enable_safety_checker',
			'loras',
			'seed'
		],
		defaults: {
			num_inference_steps: 28,
			guidance_scale: 3.5,
			enable_safety_checker: false,
			output_format: 'jpeg'
		}
	},
	// Bytedance Seedream v4
	seedream: {
		endpoint: 'fal-ai/bytedance/seedream/v4/text-to-image',
		call: 'subscribe',
		allowed: [
			'prompt',
			'image_size',
			'num_images',
			'seed',
			'enable_safety_checker',
			'max_images'
		],
		defaults: {
			enable_safety_checker: false,
			num_images: 1
		}
	},
	// Editing with reference images
	'seedream-edit': {
		endpoint: 'fal-ai/bytedance/seedream/v4/edit',
		call: 'subscribe',
		allowed: [
			'prompt',
			'image_size',
			'num_images',
			'seed',
			'enable_safety_checker',
			'image_urls'
		],
		defaults: {
			enable_safety_checker: false,
			num_images: 1
		}
	}
};

function toDescriptor(key: string, definition: ModelDefinition): ModelDescriptor {
	return Object.freeze({
		key,
		endpoint: definition.endpoint,
		call: definition.call,
		allowed: new Set<string>(definition.allowed),
		defaults: Object.freeze({ ...definition.defaults })
	});
}

/**
 * Read-only model table, keyed by model name
 */
export const MODEL_REGISTRY: ReadonlyMap<string, ModelDescriptor> = new Map(
	Object.entries(definitions).map(([key, definition]) => [
		key,
		toDescriptor(key, definition)
	])
);

export function listModelKeys(): string[] {
	return Array.from(MODEL_REGISTRY.keys()).sort();
}

/**
 * Look up a model by key
 * @throws Boom.badRequest for an unknown key
 */
export function getModel(key: string): ModelDescriptor {
	const model = MODEL_REGISTRY.get(key);

	if (!model) {
		throw Boom.badRequest(
			`Unknown model '${key}'. Available: ${listModelKeys().join(', ')}`
		);
	}

	return model;
}
