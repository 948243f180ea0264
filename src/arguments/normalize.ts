import Boom from '@hapi/boom';
import { z } from 'zod';
import { NAMED_IMAGE_SIZES, type ImageSizeValue, type LoraReference, type NamedImageSize } from '../types/index.js';
import { LoraItemSchema, type LoraItem } from '../schemas/arguments.schema.js';

const SCHEME_SEPARATOR = '://';
const LORA_SUFFIX = '.safetensors';
const DEFAULT_SCALE = 1.0;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function isNamedImageSize(value: string): value is NamedImageSize {
	return (NAMED_IMAGE_SIZES as readonly string[]).includes(value);
}

/**
 * Resolve the image_size argument from a named size or explicit dimensions.
 * Returns undefined when nothing was given.
 * @throws Boom.badRequest on conflicting or incomplete input
 */
export function coerceImageSize(
	imageSize: string | undefined,
	width: number | undefined,
	height: number | undefined
): ImageSizeValue | undefined {
	const hasDimension = width !== undefined || height !== undefined;

	if (imageSize !== undefined && hasDimension) {
		throw Boom.badRequest('--image-size cannot be combined with --width/--height');
	}

	if (hasDimension) {
		if (width === undefined || height === undefined) {
			throw Boom.badRequest('--width and --height must be provided together');
		}

		return { width, height };
	}

	if (imageSize === undefined) {
		return undefined;
	}

	if (!isNamedImageSize(imageSize)) {
		throw Boom.badRequest(
			`Invalid --image-size '${imageSize}'. Allowed: ${NAMED_IMAGE_SIZES.join(', ')}`
		);
	}

	return imageSize;
}

/**
 * Parse a scale, falling back to 1.0 for anything that is not a finite number
 */
export function parseScale(raw: unknown): number {
	if (typeof raw === 'number') {
		return Number.isFinite(raw) ? raw : DEFAULT_SCALE;
	}

	if (typeof raw !== 'string') {
		return DEFAULT_SCALE;
	}

	const text = raw.trim();
	if (!NUMBER_PATTERN.test(text)) {
		return DEFAULT_SCALE;
	}

	const value = Number(text);
	return Number.isFinite(value) ? value : DEFAULT_SCALE;
}

/**
 * Split "path[:scale]" into its parts.
 * For URLs only a colon after the last slash separates the scale.
 */
export function splitPathAndScale(token: string): { path: string; scale?: number } {
	const text = token.trim();

	if (text.includes(SCHEME_SEPARATOR)) {
		const lastSlash = text.lastIndexOf('/');
		const lastColon = text.lastIndexOf(':');

		if (lastColon > lastSlash) {
			return {
				path: text.slice(0, lastColon),
				scale: parseScale(text.slice(lastColon + 1))
			};
		}

		return { path: text };
	}

	const lastColon = text.lastIndexOf(':');
	if (lastColon === -1) {
		return { path: text };
	}

	return {
		path: text.slice(0, lastColon).trim(),
		scale: parseScale(text.slice(lastColon + 1))
	};
}

/**
 * Expand a shorthand LoRA name to a full URL; paths and URLs stay as they are
 */
export function expandLoraPath(path: string, prefix: string): string {
	if (path.includes(SCHEME_SEPARATOR) || path.includes('/')) {
		return path;
	}

	return `${prefix}${path}${LORA_SUFFIX}`;
}

function tokenToLora(token: string, prefix: string): LoraReference | null {
	if (!token.trim()) {
		return null;
	}

	const { path, scale } = splitPathAndScale(token);
	if (!path) {
		return null;
	}

	return { path: expandLoraPath(path, prefix), scale: scale ?? DEFAULT_SCALE };
}

function parseLoraTokens(input: string, prefix: string): LoraReference[] {
	return input
		.split(',')
		.map((token) => tokenToLora(token, prefix))
		.filter((item): item is LoraReference => item !== null);
}

function itemToLora(item: LoraItem, prefix: string): LoraReference | null {
	if (typeof item === 'string') {
		return tokenToLora(item, prefix);
	}

	const path = item.path || item.url || item.name;
	if (!path) {
		return null;
	}

	return { path: expandLoraPath(path, prefix), scale: parseScale(item.scale) };
}

const StructuredLorasSchema = z.union([z.array(z.unknown()), z.record(z.unknown())]);

function parseStructuredLoras(input: string, prefix: string): LoraReference[] | null {
	let json: unknown;

	try {
		json = JSON.parse(input);
	} catch {
		return null;
	}

	const parsed = StructuredLorasSchema.safeParse(json);
	if (!parsed.success) {
		return null;
	}

	const entries = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
	const result: LoraReference[] = [];

	for (const entry of entries) {
		const item = LoraItemSchema.safeParse(entry);
		if (!item.success) {
			continue;
		}

		const lora = itemToLora(item.data, prefix);
		if (lora) {
			result.push(lora);
		}
	}

	return result;
}

/**
 * Normalize a LoRA specification into an ordered list of references.
 *
 * Accepts a JSON list (or single object) of names/URLs and `{path|url|name, scale}`
 * objects, or comma-separated `name[:scale]` / `URL[:scale]` tokens.
 * Shorthand names become `<prefix><name>.safetensors`.
 */
export function parseLoras(input: string, prefix: string): LoraReference[] {
	if (!input) {
		return [];
	}

	const first = input.trimStart();
	if (first.startsWith('[') || first.startsWith('{')) {
		const structured = parseStructuredLoras(input, prefix);
		if (structured) {
			return structured;
		}
	}

	return parseLoraTokens(input, prefix);
}

/**
 * Normalize comma-separated image identifiers to absolute URLs.
 * Shorthand names get `.jpg` when their last segment has no dot, then the prefix.
 */
export function parseImageUrls(input: string, prefix: string): string[] {
	const result: string[] = [];

	for (const raw of input.split(',')) {
		const token = raw.trim();
		if (!token) {
			continue;
		}

		if (token.includes(SCHEME_SEPARATOR)) {
			result.push(token);
			continue;
		}

		const lastSegment = token.split('/').pop() ?? token;
		const name = lastSegment.includes('.') ? token : `${token}.jpg`;
		result.push(`${prefix}${name}`);
	}

	return result;
}
