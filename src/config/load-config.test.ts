import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { AppConfig } from '../types/index.js';
import { loadConfigOverrides, resolveConfig } from './load-config.js';

const base: AppConfig = {
	safetensorsUrl: '',
	sourceImageUrl: '',
	saveDir: 'assets',
	promptsDir: 'prompts',
	openFiles: true,
	download: {
		connectTimeout: 5000,
		readTimeout: 60000,
		userAgent: 'image-downloader/1.0',
		chunkSize: 65536
	}
};

describe('loadConfigOverrides', () => {
	it('should return nothing without CONFIG or CONFIG_FILE', () => {
		expect(loadConfigOverrides({})).toBeUndefined();
	});

	it('should parse inline JSON', () => {
		expect(
			loadConfigOverrides({ CONFIG: '{"saveDir":"renders","download":{"chunkSize":1024}}' })
		).toEqual({ saveDir: 'renders', download: { chunkSize: 1024 } });
	});

	it('should reject malformed JSON', () => {
		expect(() => loadConfigOverrides({ CONFIG: '{saveDir' })).toThrow('Invalid CONFIG JSON');
	});

	it('should reject unknown or mistyped keys', () => {
		expect(() => loadConfigOverrides({ CONFIG: '{"colour":"red"}' })).toThrow(/^Invalid CONFIG:/);
		expect(() => loadConfigOverrides({ CONFIG: '{"openFiles":"yes"}' })).toThrow(
			/^Invalid CONFIG: openFiles/
		);
	});

	describe('CONFIG_FILE', () => {
		let dir: string;

		beforeEach(async () => {
			dir = await mkdtemp(path.join(os.tmpdir(), 'config-'));
		});

		afterEach(async () => {
			await rm(dir, { recursive: true, force: true });
		});

		it('should read overrides from a file', async () => {
			const file = path.join(dir, 'config.json');
			await writeFile(file, JSON.stringify({ openFiles: false }));

			expect(loadConfigOverrides({ CONFIG_FILE: file })).toEqual({ openFiles: false });
		});

		it('should report a missing file', () => {
			const file = path.join(dir, 'absent.json');

			expect(() => loadConfigOverrides({ CONFIG_FILE: file })).toThrow(
				`Failed to load config file: ${file}`
			);
		});
	});
});

describe('resolveConfig', () => {
	it('should return the base without overrides', () => {
		expect(resolveConfig(undefined, base)).toBe(base);
	});

	it('should deep merge nested settings', () => {
		const config = resolveConfig({ saveDir: 'renders', download: { chunkSize: 1024 } }, base);

		expect(config.saveDir).toBe('renders');
		expect(config.download).toEqual({
			connectTimeout: 5000,
			readTimeout: 60000,
			userAgent: 'image-downloader/1.0',
			chunkSize: 1024
		});
		expect(base.download.chunkSize).toBe(65536);
	});
});
