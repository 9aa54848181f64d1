import type { IContainer } from './container.js';
import { isDefined } from './utils/object.js';

/**
 * How long a produced instance lives: `singleton` instances are created once
 * and cached on the registration, `transient` ones are created on every
 * resolution.
 */
export type Lifetime = 'transient' | 'singleton';

/**
 * What a factory receives: the container it is registered in, restricted to
 * resolution.
 */
export type ResolutionContext = Pick<IContainer, 'resolve' | 'tryResolve'>;

/**
 * Function producing a dependency instance.
 *
 * @example
 * ```typescript
 * const factory: Factory<UserService> = (ctx) =>
 *   new UserService(ctx.resolve(DatabaseService));
 * ```
 */
export type Factory<T> = (ctx: ResolutionContext) => T;

/**
 * Factory, lifetime and instance cache for one tag in one container.
 *
 * The cache slot is written without any guard: if two resolutions create the
 * instance before either stores it, the last write is the one kept.
 */
export class Registration<T> {
	instance: T | undefined;

	constructor(
		readonly factory: Factory<T>,
		readonly lifetime: Lifetime
	) {}

	/**
	 * A singleton registration whose cache is already filled.
	 */
	static instance<T>(instance: T): Registration<T> {
		const registration = new Registration(() => instance, 'singleton');
		registration.instance = instance;
		return registration;
	}

	get isCached(): boolean {
		return isDefined(this.instance);
	}
}
