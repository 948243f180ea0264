import Boom from '@hapi/boom';
import { CommanderError } from 'commander';
import { USAGE_EXIT_CODE, reportError } from './run.js';

describe('reportError', () => {
	it('should map client errors to the usage exit code', () => {
		expect(reportError(Boom.badRequest('Prompt file not found: x.txt'))).toBe(USAGE_EXIT_CODE);
	});

	it('should map commander errors by their exit code', () => {
		expect(reportError(new CommanderError(1, 'commander.invalidArgument', 'bad'))).toBe(
			USAGE_EXIT_CODE
		);
		expect(reportError(new CommanderError(0, 'commander.helpDisplayed', '(outputHelp)'))).toBe(0);
	});

	it('should map other failures to 1', () => {
		expect(reportError(new Error('upstream unavailable'))).toBe(1);
		expect(reportError(Boom.badGateway('upstream'))).toBe(1);
	});
});
