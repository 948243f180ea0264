import { readFile, stat, writeFile } from 'node:fs/promises';
import piexif from 'piexifjs';
import encodeChunks from 'png-chunks-encode';
import extractChunks from 'png-chunks-extract';
import { logger } from '../helpers/logger.js';

export const DEFAULT_CAMERA_MAKE = 'Apple';
export const DEFAULT_CAMERA_MODEL = 'iPhone 16 pro';
export const AUTHOR = 'John Doe';
export const SOFTWARE = 'fal-image-cli';

const ORIENTATION_NORMAL = 1;
const EXPOSURE_PROGRAM_APERTURE_PRIORITY = 3;
const FLASH_DID_NOT_FIRE = 0;

export const EXPOSURE_TIMES = ['1/80', '1/60', '1/125', '1/250', '1/500'] as const;
export const ISO_VALUES = [100, 125, 200, 400, 800] as const;
export const APERTURE_VALUES = [1.8, 2.0, 2.8, 4.0, 5.6] as const;
export const FOCAL_LENGTHS = [35, 50, 85, 100, 135] as const;

export interface SetExifOptions {
	/** Source of randomness in [0, 1) for camera settings */
	random?: () => number;

	/** Timestamp for the date fields; defaults to the file's mtime */
	fileTime?: Date;

	/** Suppress diagnostics */
	quiet?: boolean;
}

export function copyrightFor(year: number): string {
	return `(C) ${year} ${AUTHOR}`;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Format a date as `YYYY:MM:DD HH:mm:ss` in local time
 */
export function formatExifDate(date: Date): string {
	return (
		`${date.getFullYear()}:${pad(date.getMonth() + 1)}:${pad(date.getDate())} ` +
		`${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
	);
}

function choice<T>(values: readonly T[], random: () => number): T {
	const index = Math.min(Math.floor(random() * values.length), values.length - 1);
	return values[index];
}

function toRational(fraction: string): [number, number] {
	const [numerator, denominator] = fraction.split('/').map((part) => parseInt(part, 10));
	return [numerator, denominator];
}

/**
 * Assemble the synthetic EXIF record
 */
export function buildExifRecord(fileTime: Date, random: () => number): piexif.ExifDict {
	const date = formatExifDate(fileTime);

	return {
		'0th': {
			[piexif.ImageIFD.Make]: DEFAULT_CAMERA_MAKE,
			[piexif.ImageIFD.Model]: DEFAULT_CAMERA_MODEL,
			[piexif.ImageIFD.Artist]: AUTHOR,
			[piexif.ImageIFD.Software]: SOFTWARE,
			[piexif.ImageIFD.Copyright]: copyrightFor(fileTime.getFullYear()),
			[piexif.ImageIFD.Orientation]: ORIENTATION_NORMAL
		},
		Exif: {
			[piexif.ExifIFD.DateTimeOriginal]: date,
			[piexif.ExifIFD.DateTimeDigitized]: date,
			[piexif.ExifIFD.ExposureTime]: toRational(choice(EXPOSURE_TIMES, random)),
			[piexif.ExifIFD.ISOSpeedRatings]: choice(ISO_VALUES, random),
			[piexif.ExifIFD.FNumber]: [Math.round(choice(APERTURE_VALUES, random) * 10), 10],
			[piexif.ExifIFD.FocalLength]: [choice(FOCAL_LENGTHS, random), 1],
			[piexif.ExifIFD.ExposureProgram]: EXPOSURE_PROGRAM_APERTURE_PRIORITY,
			[piexif.ExifIFD.Flash]: FLASH_DID_NOT_FIRE
		},
		GPS: {},
		Interop: {},
		'1st': {}
	};
}

type ImageFormat = 'jpeg' | 'png';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

// piexif.dump output starts with this APP1 marker, which PNG's eXIf chunk omits
const EXIF_HEADER = 'Exif\x00\x00';

function detectFormat(data: Buffer): ImageFormat | undefined {
	if (data.length > 2 && data[0] === 0xff && data[1] === 0xd8) {
		return 'jpeg';
	}

	if (data.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
		return 'png';
	}

	return undefined;
}

/**
 * Store EXIF bytes in an `eXIf` chunk ahead of the image data,
 * replacing any existing one
 */
function insertPngExif(exifBytes: string, data: Buffer): Buffer {
	const tiff = Buffer.from(exifBytes.slice(EXIF_HEADER.length), 'binary');
	const chunks = extractChunks(data).filter((chunk) => chunk.name !== 'eXIf');

	const firstData = chunks.findIndex((chunk) => chunk.name === 'IDAT');
	const at = firstData === -1 ? 1 : firstData;
	chunks.splice(at, 0, { name: 'eXIf', data: new Uint8Array(tiff) });

	return Buffer.from(encodeChunks(chunks));
}

/**
 * Replace an image's EXIF block with synthetic camera metadata, in place.
 * JPEG and PNG files can be tagged.
 * @returns false on any failure, never throws
 */
export async function setExifData(
	imagePath: string,
	options: SetExifOptions = {}
): Promise<boolean> {
	const { random = Math.random, quiet = true } = options;
	const report = (message: string): void => {
		if (!quiet) {
			logger.warn(message);
		}
	};

	let fileTime: Date;
	let data: Buffer;

	try {
		fileTime = options.fileTime ?? (await stat(imagePath)).mtime;
		data = await readFile(imagePath);
	} catch {
		report(`File not found: ${imagePath}`);
		return false;
	}

	const format = detectFormat(data);
	if (!format) {
		report(`Can't open image ${imagePath}: unsupported format`);
		return false;
	}

	try {
		const exifBytes = piexif.dump(buildExifRecord(fileTime, random));
		const tagged =
			format === 'jpeg'
				? Buffer.from(piexif.insert(exifBytes, data.toString('binary')), 'binary')
				: insertPngExif(exifBytes, data);
		await writeFile(imagePath, tagged);

		if (!quiet) {
			logger.info(`Updated EXIF data for ${imagePath}`);
		}

		return true;
	} catch (error) {
		report(
			`Error updating EXIF data for ${imagePath}: ${error instanceof Error ? error.message : String(error)}`
		);
		return false;
	}
}
