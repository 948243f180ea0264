import { MODEL_REGISTRY, getModel, listModelKeys } from './model-registry.js';

describe('model registry', () => {
	it('should list model keys in order', () => {
		expect(listModelKeys()).toEqual([
			'dev',
			'lora',
			'realism',
			'schnell',
			'seedream',
			'seedream-edit'
		]);
	});

	it('should subscribe to every model endpoint', () => {
		const callModes = new Set(Array.from(MODEL_REGISTRY.values(), (model) => model.call));

		expect(callModes).toEqual(new Set(['subscribe']));
		expect(getModel('schnell').call).toBe('subscribe');
	});

	it('should only default arguments the model accepts', () => {
		for (const model of MODEL_REGISTRY.values()) {
			for (const key of Object.keys(model.defaults)) {
				expect(model.allowed.has(key)).toBe(true);
			}
		}
	});

	it('should describe the edit model', () => {
		const model = getModel('seedream-edit');

		expect(model.endpoint).toBe('fal-ai/bytedance/seedream/v4/edit');
		expect(model.allowed.has('image_urls')).toBe(true);
		expect(model.defaults).toEqual({ enable_safety_checker: false, num_images: 1 });
	});

	it('should freeze descriptors', () => {
		expect(Object.isFrozen(getModel('dev'))).toBe(true);
		expect(Object.isFrozen(getModel('dev').defaults)).toBe(true);
	});

	it('should reject unknown keys with the available list', () => {
		expect(() => getModel('turbo')).toThrow(
			"Unknown model 'turbo'. Available: dev, lora, realism, schnell, seedream, seedream-edit"
		);
	});
});
