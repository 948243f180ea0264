type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toUrl(item: unknown): string | null {
	if (typeof item === 'string') {
		return item;
	}

	if (isRecord(item) && typeof item.url === 'string') {
		return item.url;
	}

	return null;
}

function collect(items: unknown[]): string[] {
	return items.map(toUrl).filter((url): url is string => url !== null);
}

/**
 * Pull image URLs out of a generation response.
 * Looks at `images`, then `output`, then `image` (single item or list).
 */
export function extractUrls(result: unknown): string[] {
	if (!isRecord(result)) {
		return [];
	}

	if (Array.isArray(result.images)) {
		return collect(result.images);
	}

	if (Array.isArray(result.output)) {
		return collect(result.output);
	}

	if ('image' in result) {
		const image = result.image;
		return collect(Array.isArray(image) ? image : [image]);
	}

	return [];
}
