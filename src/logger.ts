import { getConfig, LogLevel, onConfigChange } from './config.js';

export type LogObject = Record<string, unknown>;
export type LogFn = {
	(obj: LogObject, msg?: string): void;
	(msg: string): void;
};

/**
 * Structural logger interface. pino and most structured loggers satisfy it.
 */
export interface Logger {
	info: LogFn;
	error: LogFn;
	debug: LogFn;
	warn: LogFn;
}

const PREFIX = '[scopewire]';

const SEVERITY: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

export function createConsoleLogger(level: LogLevel): Logger {
	const enabled = (messageLevel: LogLevel) =>
		SEVERITY[messageLevel] >= SEVERITY[level];

	return {
		debug: (...args: unknown[]) => {
			if (enabled('debug')) console.debug(PREFIX, ...args);
		},

		info: (...args: unknown[]) => {
			if (enabled('info')) console.info(PREFIX, ...args);
		},

		warn: (...args: unknown[]) => {
			if (enabled('warn')) console.warn(PREFIX, ...args);
		},

		error: (...args: unknown[]) => {
			if (enabled('error')) console.error(PREFIX, ...args);
		},
	};
}

let custom: Logger | undefined;
let fallback: Logger | undefined;

// The default logger follows the configured level
onConfigChange(() => {
	fallback = undefined;
});

export function getLogger(): Logger {
	if (custom !== undefined) {
		return custom;
	}
	fallback ??= createConsoleLogger(getConfig().logLevel);
	return fallback;
}

/**
 * Replaces the logger used by containers and registries. Pass `undefined` to
 * restore the console logger.
 */
export function setLogger(logger: Logger | undefined): void {
	custom = logger;
}
