import { AnyTag, Tag } from './tag.js';
import { typeName } from './utils/object.js';

export type ErrorProps = {
	cause?: unknown;
	detail?: Record<string, unknown>;
};

export type ErrorDump = {
	name: string;
	message: string;
	stack?: string;
	error: {
		name: string;
		message: string;
		detail: Record<string, unknown>;
		cause?: unknown;
	};
};

export class BaseError extends Error {
	detail: Record<string, unknown> | undefined;

	constructor(message: string, { cause, detail }: ErrorProps = {}) {
		super(message, { cause });
		this.name = this.constructor.name;
		this.detail = detail;
		// Use cause stack if available, otherwise fall back to the current error's stack
		if (cause instanceof Error && cause.stack !== undefined) {
			this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
		}
	}

	static ensure(error: unknown): BaseError {
		return error instanceof BaseError
			? error
			: new BaseError('An unknown error occurred', { cause: error });
	}

	dump(): ErrorDump {
		// Only show the stack trace of the top-level error
		const cause =
			this.cause instanceof BaseError
				? this.cause.dump().error
				: this.cause;

		const result: ErrorDump['error'] = {
			name: this.name,
			message: this.message,
			cause,
			detail: this.detail ?? {},
		};

		return {
			name: this.name,
			message: result.message,
			stack: this.stack,
			error: result,
		};
	}

	dumps(): string {
		return JSON.stringify(this.dump());
	}
}

/**
 * Base error class for everything the containers and the registry raise.
 *
 * @example Catching registry errors
 * ```typescript
 * try {
 *   registry.resolve(UserService, 'App.UI');
 * } catch (error) {
 *   if (error instanceof ContainerError) {
 *     console.error(error.message, error.detail);
 *   }
 * }
 * ```
 */
export class ContainerError extends BaseError {}

/**
 * Raised when no registration for the tag exists in the containers that the
 * resolution context selects.
 */
export class NotRegisteredError extends ContainerError {
	/**
	 * @internal
	 * @param tag - The tag that could not be resolved
	 * @param scope - Namespace scope or scope owner description, if any
	 */
	constructor(tag: AnyTag, scope?: string) {
		const message =
			scope === undefined
				? `Service ${Tag.describe(tag)} is not registered`
				: `Service ${Tag.describe(tag)} is not registered for scope '${scope}'`;
		super(message, {
			detail: { tag: Tag.describe(tag), scope },
		});
	}
}

/**
 * Raised when a factory produced something that does not satisfy the tag it
 * was registered under. This is a registration bug.
 */
export class TypeMismatchError extends ContainerError {
	constructor(tag: AnyTag, instance: unknown) {
		const produced = typeName(instance);
		super(
			`Dependency type mismatch: requested ${Tag.describe(tag)} but the factory produced ${produced}. ` +
				`Check that it is registered under the right tag.`,
			{
				detail: { tag: Tag.describe(tag), produced },
			}
		);
	}
}

/**
 * Raised when a container is used after `dispose()`.
 */
export class ContainerDisposedError extends ContainerError {}

/**
 * Raised when several containers are registered and neither an explicit nor an
 * ambient scope picks one of them.
 */
export class AmbiguousScopeError extends ContainerError {
	constructor(tag: AnyTag, containerCount: number) {
		super(
			`Multiple containers are registered but no scope selects one for ${Tag.describe(tag)}. ` +
				`Use registry.beginScope(...) or registry.resolve(tag, scope).`,
			{
				detail: { tag: Tag.describe(tag), containerCount },
			}
		);
	}
}

/**
 * Raised when a container, a namespace scope or a scope owner is bound twice.
 */
export class DuplicateRegistrationError extends ContainerError {}

/**
 * Raised when ambient scopes are released in a different order than they
 * were opened.
 */
export class OutOfOrderScopeDisposeError extends ContainerError {}

/**
 * Raised when an argument is missing or malformed, such as a whitespace-only
 * namespace scope.
 */
export class InvalidArgumentError extends ContainerError {}

/**
 * Raised when a tag is requested again while its own resolution is still in
 * progress.
 *
 * @example
 * ```typescript
 * container
 *   .registerSingletonLazy(ServiceA, (ctx) => new ServiceA(ctx.resolve(ServiceB)))
 *   .registerSingletonLazy(ServiceB, (ctx) => new ServiceB(ctx.resolve(ServiceA)));
 *
 * container.resolve(ServiceA);
 * // CircularDependencyError: Circular dependency detected for ServiceA: ServiceA -> ServiceB -> ServiceA
 * ```
 */
export class CircularDependencyError extends ContainerError {
	/**
	 * @internal
	 * @param tag - The tag that was re-entered
	 * @param dependencyChain - The tags being resolved when it happened, outermost first
	 */
	constructor(tag: AnyTag, dependencyChain: readonly AnyTag[]) {
		const chain = dependencyChain.map((t) => Tag.describe(t)).join(' -> ');
		super(
			`Circular dependency detected for ${Tag.describe(tag)}: ${chain} -> ${Tag.describe(tag)}`,
			{
				detail: {
					tag: Tag.describe(tag),
					dependencyChain: dependencyChain.map((t) => Tag.describe(t)),
				},
			}
		);
	}
}

/**
 * Wraps an error thrown by a factory. The original error is kept as `cause`.
 */
export class DependencyCreationError extends ContainerError {
	constructor(tag: AnyTag, error: unknown) {
		super(`Error creating instance of ${Tag.describe(tag)}`, {
			cause: error,
			detail: {
				tag: Tag.describe(tag),
			},
		});
	}
}

/**
 * Aggregates the failures of tracked instances whose `dispose()` threw while
 * their container was torn down. The container is disposed regardless.
 */
export class DisposalError extends ContainerError {
	constructor(errors: unknown[]) {
		const wrapped = errors.map((error) => BaseError.ensure(error));
		super('Error disposing dependency container', {
			cause: errors[0],
			detail: {
				errors: wrapped.map((error) => error.dump()),
			},
		});
	}
}
