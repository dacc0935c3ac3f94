/**
 * Logger interface compatible with console and @marianmeres/clog.
 * All methods accept variadic arguments.
 */
export interface Logger {
	debug: (...args: unknown[]) => unknown;
	log: (...args: unknown[]) => unknown;
	warn: (...args: unknown[]) => unknown;
	error: (...args: unknown[]) => unknown;
}

/**
 * Default console-based logger that wraps console methods.
 * Returns the first argument as a string (or empty string if no args).
 */
export const defaultLogger: Logger = {
	debug: (...args: unknown[]) => {
		console.debug(...args);
		return String(args[0] ?? "");
	},
	log: (...args: unknown[]) => {
		console.log(...args);
		return String(args[0] ?? "");
	},
	warn: (...args: unknown[]) => {
		console.warn(...args);
		return String(args[0] ?? "");
	},
	error: (...args: unknown[]) => {
		console.error(...args);
		return String(args[0] ?? "");
	},
};

/** Options shared by machines and the snapshot codec. */
export type DebugOptions = {
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};

/**
 * Returns a debug log function bound to a component prefix. The function is a
 * no-op unless `debug` is enabled.
 */
export function createDebugLog(
	prefix: string,
	options: DebugOptions = {}
): (...args: unknown[]) => void {
	const debug = options.debug ?? false;
	const logger = options.logger ?? defaultLogger;
	return (...args: unknown[]) => {
		if (debug) logger.debug(`[${prefix}]`, ...args);
	};
}
