// PGM Logging
// Tagged console output on stderr; stdout is left to the documents themselves.

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

export interface ConsoleLoggerOptions {
	/** Emit debug lines (default: false) */
	verbose?: boolean;
	/** Component tag printed in brackets (default: "pgmgen") */
	tag?: string;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
	const prefix = `[${options.tag ?? "pgmgen"}]`;
	const verbose = options.verbose ?? false;
	return {
		debug(message) {
			if (verbose) console.error(`${prefix} ${message}`);
		},
		info(message) {
			console.error(`${prefix} ${message}`);
		},
		warn(message) {
			console.warn(`${prefix} warning: ${message}`);
		},
		error(message) {
			console.error(`${prefix} error: ${message}`);
		},
	};
}

export const silentLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};
