import { readFile } from 'node:fs/promises';
import path from 'node:path';
import Boom from '@hapi/boom';

export interface ResolvedPrompt {
	prompt: string;

	/** Stem of the prompt file, used as the filename prefix */
	promptStem?: string;
}

/**
 * Locate a prompt file. `.txt` is implied; relative names are looked up
 * by base name inside the prompts directory.
 */
export function promptFilePath(promptfile: string, promptsDir: string): string {
	const candidate = promptfile.endsWith('.txt') ? promptfile : `${promptfile}.txt`;

	return path.isAbsolute(candidate)
		? candidate
		: path.join(promptsDir, path.basename(candidate));
}

/**
 * Resolve the prompt text from an inline prompt or a prompt file.
 * The file wins when both are given.
 * @throws Boom.badRequest when no prompt can be found
 */
export async function resolvePrompt(
	prompt: string | undefined,
	promptfile: string | undefined,
	promptsDir: string
): Promise<ResolvedPrompt> {
	if (promptfile) {
		const filePath = promptFilePath(promptfile, promptsDir);
		let content: string;

		try {
			content = await readFile(filePath, 'utf-8');
		} catch {
			throw Boom.badRequest(`Prompt file not found: ${filePath}`);
		}

		const text = content.trim();
		if (!text) {
			throw Boom.badRequest(`Prompt file is empty: ${filePath}`);
		}

		return { prompt: text, promptStem: path.parse(filePath).name };
	}

	if (!prompt) {
		throw Boom.badRequest('Either --prompt or --promptfile must be provided.');
	}

	return { prompt };
}
