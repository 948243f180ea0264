import type { Config } from 'jest';
import { createDefaultEsmPreset } from 'ts-jest';

const basePreset = createDefaultEsmPreset({
	tsconfig: 'tsconfig.json'
});

export default {
	displayName: 'node',
	...basePreset,
	moduleNameMapper: {
		'^(\\.{1,2}/.*)\\.js$': '$1'
	},
	testEnvironment: 'node',
	testMatch: ['<rootDir>/src/**/*.test.ts'],
	modulePathIgnorePatterns: ['<rootDir>/dist/']
} satisfies Config;
