import {
	configure,
	ConfigurationError,
	getConfig,
	loadConfig,
	resetConfig,
} from '@/config.js';
import { Container } from '@/container.js';
import { CircularDependencyError } from '@/errors.js';
import { Tag } from '@/tag.js';
import { afterEach, describe, expect, it } from 'vitest';

describe('config', () => {
	afterEach(() => {
		resetConfig();
	});

	describe('loadConfig', () => {
		it('should fall back to defaults', () => {
			expect(loadConfig({})).toEqual({
				logLevel: 'warn',
				detectCircularDependencies: true,
			});
		});

		it('should read the log level', () => {
			expect(loadConfig({ SCOPEWIRE_LOG_LEVEL: 'debug' }).logLevel).toBe(
				'debug'
			);
		});

		it('should turn circular dependency detection off in production', () => {
			expect(
				loadConfig({ NODE_ENV: 'production' }).detectCircularDependencies
			).toBe(false);
		});

		it('should let the explicit flag win over NODE_ENV', () => {
			expect(
				loadConfig({ NODE_ENV: 'production', SCOPEWIRE_DETECT_CIRCULAR: '1' })
					.detectCircularDependencies
			).toBe(true);
			expect(
				loadConfig({ SCOPEWIRE_DETECT_CIRCULAR: 'false' })
					.detectCircularDependencies
			).toBe(false);
		});

		it('should reject unsupported values', () => {
			expect(() => loadConfig({ SCOPEWIRE_LOG_LEVEL: 'verbose' })).toThrow(
				ConfigurationError
			);
			expect(() => loadConfig({ SCOPEWIRE_DETECT_CIRCULAR: 'yes' })).toThrow(
				'Invalid scopewire environment variables'
			);
		});
	});

	describe('getConfig', () => {
		it('should read the test environment', () => {
			expect(getConfig().logLevel).toBe('silent');
		});

		it('should apply overrides on top of the environment', () => {
			configure({ logLevel: 'error' });
			configure({ detectCircularDependencies: false });

			expect(getConfig()).toEqual({
				logLevel: 'error',
				detectCircularDependencies: false,
			});
		});

		it('should drop overrides on reset', () => {
			configure({ logLevel: 'debug' });

			resetConfig();

			expect(getConfig().logLevel).toBe('silent');
		});
	});

	describe('container defaults', () => {
		class ServiceA extends Tag.Service('ServiceA') {}

		function nestedContainers() {
			const inner = Container.empty().registerSingletonLazy(
				ServiceA,
				() => new ServiceA()
			);
			return Container.empty().registerSingletonLazy(ServiceA, () =>
				inner.resolve(ServiceA)
			);
		}

		it('should detect re-entrant resolution when configured', () => {
			configure({ detectCircularDependencies: true });

			expect(() => nestedContainers().resolve(ServiceA)).toThrow(
				CircularDependencyError
			);
		});

		it('should skip detection when configured off', () => {
			configure({ detectCircularDependencies: false });

			expect(nestedContainers().resolve(ServiceA)).toBeInstanceOf(ServiceA);
		});
	});
});
