import { getConfig } from './config.js';
import {
	CircularDependencyError,
	ContainerDisposedError,
	ContainerError,
	DependencyCreationError,
	DisposalError,
	NotRegisteredError,
	TypeMismatchError,
} from './errors.js';
import { getLogger } from './logger.js';
import { Factory, Registration } from './registration.js';
import { AnyTag, Tag, TagType } from './tag.js';
import { hasKey } from './utils/object.js';

/**
 * Anything with a synchronous `dispose()` method. Containers track every
 * instance of this shape they produce.
 */
export interface IDisposable {
	dispose(): void;
}

export function isDisposable(value: unknown): value is IDisposable {
	return hasKey(value, 'dispose') && typeof value.dispose === 'function';
}

/**
 * Tags currently being resolved, outermost first. Resolution never suspends,
 * so a single stack is enough to see re-entrance across all containers.
 * @internal
 */
const resolutionStack: AnyTag[] = [];

function trackResolution<R>(tag: AnyTag, resolve: () => R): R {
	if (resolutionStack.includes(tag)) {
		throw new CircularDependencyError(tag, resolutionStack);
	}

	resolutionStack.push(tag);
	try {
		return resolve();
	} finally {
		resolutionStack.pop();
	}
}

export type ContainerOptions = {
	/** Used in logs and error details. */
	name?: string;
	/**
	 * Dispose tracked instances when the container is disposed.
	 * @default true
	 */
	ownsDisposables?: boolean;
	/**
	 * Raise CircularDependencyError when a tag is re-entered during its own
	 * resolution. Defaults to the `detectCircularDependencies` configuration.
	 */
	detectCircularDependencies?: boolean;
};

/**
 * Interface representing a container that can register and resolve dependencies.
 */
export interface IContainer extends IDisposable {
	readonly name: string;

	readonly isDisposed: boolean;

	registerSingletonLazy<T extends AnyTag>(
		tag: T,
		factory: Factory<TagType<T>>
	): IContainer;

	registerSingleton<T extends AnyTag>(
		tag: T,
		instance: TagType<T>
	): IContainer;

	registerTransient<T extends AnyTag>(
		tag: T,
		factory: Factory<TagType<T>>
	): IContainer;

	has(tag: AnyTag): boolean;

	exists(tag: AnyTag): boolean;

	resolve<T extends AnyTag>(tag: T): TagType<T>;

	tryResolve<T extends AnyTag>(tag: T): TagType<T> | undefined;

	onDispose(callback: () => void): void;
}

let containerCounter = 0;

/**
 * A synchronous dependency container with singleton and transient lifetimes,
 * runtime type verification of produced instances and ordered disposal.
 *
 * @example Basic usage
 * ```typescript
 * import { Container, Tag } from 'scopewire';
 *
 * class DatabaseService extends Tag.Service('DatabaseService') {
 *   query() { return 'data'; }
 * }
 *
 * class UserService extends Tag.Service('UserService') {
 *   constructor(private db: DatabaseService) { super(); }
 *   getUser() { return this.db.query(); }
 * }
 *
 * const c = Container.empty()
 *   .registerSingletonLazy(DatabaseService, () => new DatabaseService())
 *   .registerTransient(UserService, (ctx) =>
 *     new UserService(ctx.resolve(DatabaseService))
 *   );
 *
 * const users = c.resolve(UserService);
 * ```
 *
 * @example Disposal
 * ```typescript
 * class Connection extends Tag.Service('Connection') {
 *   dispose() { this.socket.close(); }
 * }
 *
 * const c = Container.empty().registerSingletonLazy(Connection, () => new Connection());
 * c.resolve(Connection);
 * c.dispose(); // calls Connection.dispose()
 * ```
 */
export class Container implements IContainer {
	readonly name: string;

	/**
	 * Registrations by tag. Registering a tag again replaces its entry.
	 * @internal
	 */
	protected readonly registrations = new Map<AnyTag, Registration<unknown>>();

	/**
	 * Disposable instances in creation order.
	 * @internal
	 */
	protected readonly disposables: IDisposable[] = [];

	protected disposed = false;

	private readonly ownsDisposables: boolean;
	private readonly detectCircularDependencies: boolean;
	private disposeCallback: (() => void) | undefined;

	constructor(options: ContainerOptions = {}) {
		this.name = options.name ?? `container-${++containerCounter}`;
		this.ownsDisposables = options.ownsDisposables ?? true;
		this.detectCircularDependencies =
			options.detectCircularDependencies ??
			getConfig().detectCircularDependencies;
	}

	static empty(options?: ContainerOptions): Container {
		return new Container(options);
	}

	get isDisposed(): boolean {
		return this.disposed;
	}

	/**
	 * Registers a singleton that is created on first resolution and then
	 * reused.
	 *
	 * @throws {ContainerDisposedError} If the container has been disposed
	 */
	registerSingletonLazy<T extends AnyTag>(
		tag: T,
		factory: Factory<TagType<T>>
	): this {
		this.assertNotDisposed(
			'Cannot register dependencies on a disposed container'
		);
		this.registrations.set(tag, new Registration(factory, 'singleton'));
		return this;
	}

	/**
	 * Registers an already created singleton. A disposable instance is tracked
	 * right away, as if the container had created it.
	 *
	 * @throws {ContainerDisposedError} If the container has been disposed
	 */
	registerSingleton<T extends AnyTag>(tag: T, instance: TagType<T>): this {
		this.assertNotDisposed(
			'Cannot register dependencies on a disposed container'
		);
		this.registrations.set(tag, Registration.instance(instance));
		this.handleNewlyCreated(instance);
		return this;
	}

	/**
	 * Registers a factory that runs on every resolution.
	 *
	 * @throws {ContainerDisposedError} If the container has been disposed
	 */
	registerTransient<T extends AnyTag>(
		tag: T,
		factory: Factory<TagType<T>>
	): this {
		this.assertNotDisposed(
			'Cannot register dependencies on a disposed container'
		);
		this.registrations.set(tag, new Registration(factory, 'transient'));
		return this;
	}

	/**
	 * Checks if a dependency has been registered, whether or not it has been
	 * created yet.
	 */
	has(tag: AnyTag): boolean {
		return this.registrations.has(tag);
	}

	/**
	 * Checks if a singleton instance is cached for the tag.
	 */
	exists(tag: AnyTag): boolean {
		return this.registrations.get(tag)?.isCached ?? false;
	}

	/**
	 * Resolves a dependency according to its lifetime.
	 *
	 * @throws {ContainerDisposedError} If the container has been disposed
	 * @throws {NotRegisteredError} If the tag is not registered
	 * @throws {TypeMismatchError} If the produced instance does not satisfy the tag
	 * @throws {CircularDependencyError} If the tag is already being resolved
	 * @throws {DependencyCreationError} If the factory throws
	 */
	resolve<T extends AnyTag>(tag: T): TagType<T> {
		this.assertNotDisposed(
			'Cannot resolve dependencies from a disposed container'
		);

		return this.track(tag, () => {
			const registration = this.registrations.get(tag);
			if (registration === undefined) {
				throw new NotRegisteredError(tag);
			}
			return this.produce(tag, registration);
		});
	}

	/**
	 * Like `resolve`, but returns `undefined` when the tag is not registered
	 * here. Every other failure still raises, including failures of nested
	 * resolutions made by the factory.
	 */
	tryResolve<T extends AnyTag>(tag: T): TagType<T> | undefined {
		this.assertNotDisposed(
			'Cannot resolve dependencies from a disposed container'
		);

		return this.track(tag, () => {
			const registration = this.registrations.get(tag);
			if (registration === undefined) {
				return undefined;
			}
			return this.produce(tag, registration);
		});
	}

	/**
	 * Installs the callback run at the end of `dispose()`, replacing any
	 * previous one. The registry factory uses it to unregister the container.
	 *
	 * @throws {ContainerDisposedError} If the container has been disposed
	 */
	onDispose(callback: () => void): void {
		this.assertNotDisposed(
			'Cannot subscribe to the dispose callback of a disposed container'
		);
		this.disposeCallback = callback;
	}

	/**
	 * Disposes every tracked instance in creation order (when the container
	 * owns them), drops all registrations and runs the dispose callback.
	 * Calling it again does nothing.
	 *
	 * A failing instance does not stop the others; the failures are raised
	 * together once the container is fully torn down. The container counts as
	 * disposed from the start, so an instance that resolves from it inside its
	 * own `dispose()` gets a ContainerDisposedError, reported with the other
	 * failures.
	 *
	 * @throws {DisposalError} If one or more tracked instances failed to dispose
	 */
	dispose(): void {
		if (this.disposed) {
			return;
		}

		this.disposed = true;

		const failures: unknown[] = [];
		const disposables = this.disposables.splice(0);

		if (this.ownsDisposables) {
			for (const disposable of disposables) {
				try {
					disposable.dispose();
				} catch (error) {
					failures.push(error);
				}
			}
		}

		this.registrations.clear();

		const callback = this.disposeCallback;
		this.disposeCallback = undefined;

		getLogger().debug(
			{ container: this.name, disposed: disposables.length },
			'Container disposed'
		);

		callback?.();

		if (failures.length > 0) {
			const error = new DisposalError(failures);
			getLogger().error(
				{ container: this.name, failures: failures.length },
				error.message
			);
			throw error;
		}
	}

	private produce<T extends AnyTag>(
		tag: T,
		registration: Registration<unknown>
	): TagType<T> {
		switch (registration.lifetime) {
			case 'transient': {
				const instance = this.verify(
					tag,
					this.create(tag, registration)
				);
				this.handleNewlyCreated(instance);
				return instance;
			}
			case 'singleton': {
				if (!registration.isCached) {
					const instance = this.create(tag, registration);
					registration.instance = instance;
					this.handleNewlyCreated(instance);
				}
				return this.verify(tag, registration.instance);
			}
		}
	}

	private create(tag: AnyTag, registration: Registration<unknown>): unknown {
		try {
			return registration.factory(this);
		} catch (error) {
			if (error instanceof ContainerError) {
				throw error;
			}
			throw new DependencyCreationError(tag, error);
		}
	}

	private verify<T extends AnyTag>(tag: T, instance: unknown): TagType<T> {
		if (!Tag.accepts(tag, instance)) {
			throw new TypeMismatchError(tag, instance);
		}
		return instance;
	}

	private handleNewlyCreated(instance: unknown): void {
		if (this.ownsDisposables && isDisposable(instance)) {
			this.disposables.push(instance);
		}
	}

	private track<R>(tag: AnyTag, resolve: () => R): R {
		return this.detectCircularDependencies
			? trackResolution(tag, resolve)
			: resolve();
	}

	private assertNotDisposed(message: string): void {
		if (this.disposed) {
			throw new ContainerDisposedError(message, {
				detail: { container: this.name },
			});
		}
	}
}
