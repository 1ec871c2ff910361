import type { Logger } from './types.js';

export interface ConsoleLoggerOptions {
	/** Suppress debug and info output; warnings and errors still print */
	quiet?: boolean;
	/** Tag printed in front of every line */
	prefix?: string;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
	const { quiet = false, prefix = 'freeslots' } = options;
	const tag = `[${prefix}]`;

	return {
		debug(message, ...details) {
			if (!quiet) console.debug(tag, message, ...details);
		},
		info(message, ...details) {
			if (!quiet) console.info(tag, message, ...details);
		},
		warn(message, ...details) {
			console.warn(tag, message, ...details);
		},
		error(message, ...details) {
			console.error(tag, message, ...details);
		},
	};
}

export const silentLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};
