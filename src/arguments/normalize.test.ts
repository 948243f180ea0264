import Boom from '@hapi/boom';
import { NAMED_IMAGE_SIZES } from '../types/index.js';
import {
	coerceImageSize,
	expandLoraPath,
	parseImageUrls,
	parseLoras,
	parseScale,
	splitPathAndScale
} from './normalize.js';

const LORA_PREFIX = 'https://models.example.com/loras/';
const IMAGE_PREFIX = 'https://images.example.com/src/';

describe('coerceImageSize', () => {
	it('should return every named size unchanged', () => {
		for (const size of NAMED_IMAGE_SIZES) {
			expect(coerceImageSize(size, undefined, undefined)).toBe(size);
		}
	});

	it('should return explicit dimensions', () => {
		expect(coerceImageSize(undefined, 640, 480)).toEqual({ width: 640, height: 480 });
	});

	it('should return undefined when nothing is given', () => {
		expect(coerceImageSize(undefined, undefined, undefined)).toBeUndefined();
	});

	it('should reject a named size combined with a dimension', () => {
		expect(() => coerceImageSize('square', 640, undefined)).toThrow(
			'--image-size cannot be combined with --width/--height'
		);
		expect(() => coerceImageSize('square', 640, 480)).toThrow(
			'--image-size cannot be combined with --width/--height'
		);
	});

	it('should reject a single dimension', () => {
		expect(() => coerceImageSize(undefined, 100, undefined)).toThrow(
			'--width and --height must be provided together'
		);
		expect(() => coerceImageSize(undefined, undefined, 100)).toThrow(
			'--width and --height must be provided together'
		);
	});

	it('should reject an unknown named size as a usage error', () => {
		let caught: unknown;
		try {
			coerceImageSize('huge', undefined, undefined);
		} catch (error) {
			caught = error;
		}

		expect(Boom.isBoom(caught)).toBe(true);
		expect(Boom.isBoom(caught) && caught.output.statusCode).toBe(400);
	});
});

describe('parseScale', () => {
	it('should parse numbers and fall back to 1.0', () => {
		expect(parseScale(' 0.8 ')).toBe(0.8);
		expect(parseScale('2')).toBe(2);
		expect(parseScale(-0.5)).toBe(-0.5);
		expect(parseScale('xx')).toBe(1);
		expect(parseScale('')).toBe(1);
		expect(parseScale('Infinity')).toBe(1);
		expect(parseScale(Number.NaN)).toBe(1);
		expect(parseScale(undefined)).toBe(1);
		expect(parseScale(null)).toBe(1);
		expect(parseScale(true)).toBe(1);
		expect(parseScale({ value: 2 })).toBe(1);
	});
});

describe('splitPathAndScale', () => {
	it('should only split URLs on a colon after the last slash', () => {
		expect(splitPathAndScale('https://x/y.safetensors:0.5')).toEqual({
			path: 'https://x/y.safetensors',
			scale: 0.5
		});
		expect(splitPathAndScale('https://host:8080/y.safetensors')).toEqual({
			path: 'https://host:8080/y.safetensors'
		});
	});

	it('should split plain tokens on the last colon', () => {
		expect(splitPathAndScale('foo:0.8')).toEqual({ path: 'foo', scale: 0.8 });
		expect(splitPathAndScale('a:b:1.5')).toEqual({ path: 'a:b', scale: 1.5 });
		expect(splitPathAndScale('foo')).toEqual({ path: 'foo' });
	});
});

describe('expandLoraPath', () => {
	it('should expand shorthand names only', () => {
		expect(expandLoraPath('foo', LORA_PREFIX)).toBe(`${LORA_PREFIX}foo.safetensors`);
		expect(expandLoraPath('dir/foo.safetensors', LORA_PREFIX)).toBe('dir/foo.safetensors');
		expect(expandLoraPath('https://x/y', LORA_PREFIX)).toBe('https://x/y');
	});
});

describe('parseLoras', () => {
	it('should return an empty list for empty input', () => {
		expect(parseLoras('', LORA_PREFIX)).toEqual([]);
	});

	it('should expand a shorthand name with scale 1.0', () => {
		expect(parseLoras('foo', LORA_PREFIX)).toEqual([
			{ path: `${LORA_PREFIX}foo.safetensors`, scale: 1.0 }
		]);
	});

	it('should parse comma-separated tokens with scales', () => {
		expect(
			parseLoras('foo:0.8,bar:1.2,https://x/y.safetensors:0.5', LORA_PREFIX)
		).toEqual([
			{ path: `${LORA_PREFIX}foo.safetensors`, scale: 0.8 },
			{ path: `${LORA_PREFIX}bar.safetensors`, scale: 1.2 },
			{ path: 'https://x/y.safetensors', scale: 0.5 }
		]);
	});

	it('should default an unparsable scale to 1.0', () => {
		expect(parseLoras('bad:xx', LORA_PREFIX)).toEqual([
			{ path: `${LORA_PREFIX}bad.safetensors`, scale: 1.0 }
		]);
	});

	it('should drop empty tokens and keep duplicates in order', () => {
		expect(parseLoras(' foo , ,foo:2,', LORA_PREFIX)).toEqual([
			{ path: `${LORA_PREFIX}foo.safetensors`, scale: 1 },
			{ path: `${LORA_PREFIX}foo.safetensors`, scale: 2 }
		]);
	});

	it('should parse a structured list of objects', () => {
		expect(
			parseLoras('[{"path": "https://ex/x.safetensors", "scale": 2}]', LORA_PREFIX)
		).toEqual([{ path: 'https://ex/x.safetensors', scale: 2.0 }]);
	});

	it('should keep structured items whose scale is null or not a number', () => {
		expect(
			parseLoras(
				'[{"path": "https://ex/x.safetensors", "scale": null}, {"path": "https://ex/y.safetensors", "scale": true}]',
				LORA_PREFIX
			)
		).toEqual([
			{ path: 'https://ex/x.safetensors', scale: 1.0 },
			{ path: 'https://ex/y.safetensors', scale: 1.0 }
		]);
	});

	it('should parse mixed strings and objects keyed by url or name', () => {
		expect(
			parseLoras(
				'["name", {"name": "other", "scale": 0.7}, {"url": "https://ex/u.safetensors"}]',
				LORA_PREFIX
			)
		).toEqual([
			{ path: `${LORA_PREFIX}name.safetensors`, scale: 1.0 },
			{ path: `${LORA_PREFIX}other.safetensors`, scale: 0.7 },
			{ path: 'https://ex/u.safetensors', scale: 1.0 }
		]);
	});

	it('should treat a single object as a one-element list', () => {
		expect(parseLoras('  {"path": "style", "scale": "0.25"}', LORA_PREFIX)).toEqual([
			{ path: `${LORA_PREFIX}style.safetensors`, scale: 0.25 }
		]);
	});

	it('should skip structured entries without a path', () => {
		expect(parseLoras('[{"scale": 2}, 3, "keep"]', LORA_PREFIX)).toEqual([
			{ path: `${LORA_PREFIX}keep.safetensors`, scale: 1 }
		]);
	});

	it('should fall back to token parsing when JSON is invalid', () => {
		expect(parseLoras('[foo:0.5', LORA_PREFIX)).toEqual([
			{ path: `${LORA_PREFIX}[foo.safetensors`, scale: 0.5 }
		]);
	});
});

describe('parseImageUrls', () => {
	it('should keep URLs and expand shorthand names', () => {
		expect(parseImageUrls('https://example.com/a.jpg,b.png, c', IMAGE_PREFIX)).toEqual([
			'https://example.com/a.jpg',
			`${IMAGE_PREFIX}b.png`,
			`${IMAGE_PREFIX}c.jpg`
		]);
	});

	it('should only look at the last segment for an extension', () => {
		expect(parseImageUrls('dir.v2/photo,dir/photo.webp', IMAGE_PREFIX)).toEqual([
			`${IMAGE_PREFIX}dir.v2/photo.jpg`,
			`${IMAGE_PREFIX}dir/photo.webp`
		]);
	});

	it('should ignore empty tokens', () => {
		expect(parseImageUrls(' , ,', IMAGE_PREFIX)).toEqual([]);
	});
});
