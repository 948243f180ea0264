import { mkdir, open as openFile } from 'node:fs/promises';
import path from 'node:path';
import open from 'open';
import type { DownloadConfig } from '../types/index.js';
import { logger } from '../helpers/logger.js';
import { createFetch, type FetchLike } from '../helpers/http.js';
import { setExifData } from '../exif/set-exif-data.js';
import {
	FALLBACK_EXTENSION,
	extFromContentType,
	filenameFromUrl,
	isImageContentType,
	splitNameAndExt,
	uniquePath
} from './filenames.js';

export interface SaveImagesOptions {
	/** Prefix for `<prefix>-<N>-<stem><ext>` names, N starting at 1 */
	namePrefix?: string;

	/** Target directory, created when missing */
	saveDir: string;

	/** Open each saved file with the system default handler */
	openFiles?: boolean;

	download: DownloadConfig;

	httpProxy?: string;

	/** Fetch override; defaults to undici fetch with the configured timeouts */
	fetch?: FetchLike;

	/** Tagger override; defaults to synthetic EXIF tagging */
	tagImage?: (filePath: string) => Promise<boolean>;

	/** Opener override; defaults to the `open` package */
	openFile?: (filePath: string) => Promise<unknown>;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'syscall' in error && 'code' in error;
}

function describeError(error: unknown): string {
	if (error instanceof Error) {
		const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
		return `${error.message}${cause}`;
	}
	return String(error);
}

/**
 * Re-slice a byte stream into chunks of at most `size` bytes, dropping empty ones
 */
export async function* rechunk(
	source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
	size: number
): AsyncGenerator<Uint8Array> {
	for await (const chunk of source) {
		for (let offset = 0; offset < chunk.byteLength; offset += size) {
			yield chunk.subarray(offset, offset + size);
		}
	}
}

async function writeStream(
	filePath: string,
	body: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
	chunkSize: number
): Promise<void> {
	const handle = await openFile(filePath, 'wx');

	try {
		for await (const chunk of rechunk(body, chunkSize)) {
			await handle.write(chunk);
		}
	} finally {
		await handle.close();
	}
}

/**
 * Download image URLs into a directory, one after another.
 * Failures are logged per URL and never stop the batch.
 * @returns Saved paths, in input order
 */
export async function saveAllImages(
	urls: readonly string[],
	options: SaveImagesOptions
): Promise<string[]> {
	const fetchImage =
		options.fetch ??
		createFetch({
			httpProxy: options.httpProxy,
			connectTimeout: options.download.connectTimeout,
			readTimeout: options.download.readTimeout
		});
	const tagImage = options.tagImage ?? ((filePath: string) => setExifData(filePath, { quiet: false }));
	const openSaved = options.openFile ?? ((filePath: string) => open(filePath, { wait: false }));

	await mkdir(options.saveDir, { recursive: true });

	const savedPaths: string[] = [];

	for (const [index, url] of urls.entries()) {
		try {
			const { stem, ext: urlExt } = splitNameAndExt(filenameFromUrl(url));

			let response: Awaited<ReturnType<FetchLike>>;
			try {
				response = await fetchImage(url, {
					headers: { 'User-Agent': options.download.userAgent }
				});
			} catch (error) {
				logger.error(`Failed to download ${url}: ${describeError(error)}`);
				continue;
			}

			if (!response.ok) {
				logger.error(`Failed to download ${url}: HTTP ${response.status}`);
				await response.body?.cancel();
				continue;
			}

			const contentType = response.headers.get('content-type') ?? '';
			if (!isImageContentType(contentType)) {
				logger.warn(
					`Skip non-image content for ${url} (Content-Type=${contentType || 'unknown'})`
				);
				await response.body?.cancel();
				continue;
			}

			const ext = urlExt || extFromContentType(contentType) || FALLBACK_EXTENSION;
			const outName = options.namePrefix
				? `${options.namePrefix}-${index + 1}-${stem}${ext}`
				: `${stem}${ext}`;
			const filePath = await uniquePath(path.join(options.saveDir, outName));

			await writeStream(filePath, response.body ?? [], options.download.chunkSize);

			try {
				if (!(await tagImage(filePath))) {
					logger.warn(`Warning: failed to set EXIF for ${filePath}`);
				}
			} catch (error) {
				logger.warn(`Warning: failed to set EXIF for ${filePath}: ${describeError(error)}`);
			}

			savedPaths.push(filePath);
			logger.info(`Saved ${filePath}`);

			if (options.openFiles) {
				await openSaved(path.resolve(filePath));
			}
		} catch (error) {
			if (isErrnoException(error)) {
				logger.error(`Filesystem error for ${url}: ${error.message}`);
			} else {
				logger.error(`Unexpected error for ${url}: ${describeError(error)}`);
			}
		}
	}

	return savedPaths;
}
