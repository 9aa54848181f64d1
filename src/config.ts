import { z } from 'zod/v4';
import { BaseError } from './errors.js';

export class ConfigurationError extends BaseError {}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type ScopewireConfig = {
	/** Messages below this level are dropped by the default logger. */
	logLevel: LogLevel;
	/** Default for containers created without an explicit setting. */
	detectCircularDependencies: boolean;
};

const booleanFlag = z
	.enum(['true', 'false', '1', '0'])
	.transform((flag) => flag === 'true' || flag === '1');

const EnvSchema = z.object({
	SCOPEWIRE_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
	SCOPEWIRE_DETECT_CIRCULAR: booleanFlag.optional(),
	NODE_ENV: z.string().optional(),
});

/**
 * Reads the configuration from environment variables.
 *
 * @throws {ConfigurationError} If a variable holds an unsupported value
 */
export function loadConfig(
	env: NodeJS.ProcessEnv = process.env
): ScopewireConfig {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigurationError('Invalid scopewire environment variables', {
			cause: parsed.error,
			detail: { issues: parsed.error.issues },
		});
	}

	const { SCOPEWIRE_LOG_LEVEL, SCOPEWIRE_DETECT_CIRCULAR, NODE_ENV } =
		parsed.data;

	return {
		logLevel: SCOPEWIRE_LOG_LEVEL,
		detectCircularDependencies:
			SCOPEWIRE_DETECT_CIRCULAR ?? NODE_ENV !== 'production',
	};
}

let loaded: ScopewireConfig | undefined;
let overrides: Partial<ScopewireConfig> = {};
const listeners = new Set<() => void>();

/**
 * The process configuration: environment values, then `configure()` overrides.
 */
export function getConfig(): ScopewireConfig {
	loaded ??= loadConfig();
	return { ...loaded, ...overrides };
}

export function configure(config: Partial<ScopewireConfig>): void {
	overrides = { ...overrides, ...config };
	notify();
}

/**
 * Drops overrides and re-reads the environment on next access.
 */
export function resetConfig(): void {
	loaded = undefined;
	overrides = {};
	notify();
}

/** @internal */
export function onConfigChange(listener: () => void): void {
	listeners.add(listener);
}

function notify(): void {
	for (const listener of listeners) {
		listener();
	}
}
