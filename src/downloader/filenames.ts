import { access } from 'node:fs/promises';
import path from 'node:path';
import * as mime from 'mime-types';

export const FALLBACK_NAME = 'download';
export const FALLBACK_EXTENSION = '.bin';

/**
 * Split a file name into stem and extension (extension keeps its dot).
 * Leading-dot names such as `.hidden` have no extension.
 */
export function splitNameAndExt(filename: string): { stem: string; ext: string } {
	const ext = path.extname(filename);
	return { stem: path.basename(filename, ext), ext };
}

/**
 * Final path segment of a URL, decoded. Never contains a path separator.
 */
export function filenameFromUrl(url: string): string {
	const { pathname } = new URL(url);

	let decoded: string;
	try {
		decoded = decodeURIComponent(pathname);
	} catch {
		decoded = pathname;
	}

	const name = path.posix.basename(decoded.replace(/\\/g, '/'));
	if (!name || name === '.' || name === '..') {
		return FALLBACK_NAME;
	}

	return name;
}

/**
 * Whether a Content-Type header denotes an image
 */
export function isImageContentType(contentType: string | null | undefined): boolean {
	return (contentType ?? '').trim().toLowerCase().startsWith('image/');
}

/**
 * File extension (with dot) for an image Content-Type, or '' when unknown
 */
export function extFromContentType(contentType: string | null | undefined): string {
	if (!contentType || !isImageContentType(contentType)) {
		return '';
	}

	const ext = mime.extension(contentType.split(';')[0].trim());
	return ext ? `.${ext}` : '';
}

async function exists(filePath: string): Promise<boolean> {
	try {
		await access(filePath);
		return true;
	} catch {
		return false;
	}
}

/**
 * First free path: the given one, else `<stem>-<n><ext>` for n = 1, 2, ...
 */
export async function uniquePath(filePath: string): Promise<string> {
	if (!(await exists(filePath))) {
		return filePath;
	}

	const dir = path.dirname(filePath);
	const { stem, ext } = splitNameAndExt(path.basename(filePath));

	for (let i = 1; ; i++) {
		const candidate = path.join(dir, `${stem}-${i}${ext}`);
		if (!(await exists(candidate))) {
			return candidate;
		}
	}
}
