import type { IContainer } from './container.js';
import {
	AmbiguousScopeError,
	DuplicateRegistrationError,
	InvalidArgumentError,
	NotRegisteredError,
} from './errors.js';
import { getLogger } from './logger.js';
import { describeScope, ScopeController, ScopeHandle } from './scope.js';
import { AnyTag, TagType } from './tag.js';
import { isReference } from './utils/object.js';

/**
 * Where a container sits in the resolution space. Both are optional; a
 * container registered without either is only reachable through the
 * single-container fast path.
 */
export type ContainerScope = {
	/** Dot-delimited namespace, e.g. `App.UI`. Unique among live containers. */
	namespaceScope?: string;
	/** Object whose identity selects the container. Unique among live containers. */
	scopeOwner?: object;
};

/**
 * The registry's record of a live container. The scope owner is only a
 * lookup key; the registry never disposes it.
 */
export class ContainerRegistration {
	constructor(
		readonly container: IContainer,
		readonly namespaceScope: string | undefined,
		readonly scopeOwner: object | undefined
	) {}
}

/**
 * Tracks every live container and picks the one a resolution should use:
 * the ambient scope, an explicit namespace scope or scope owner, or the only
 * registered container.
 *
 * A process-wide instance is exported as `registry`; containers created with
 * `createContainer()` register themselves there and unregister on dispose.
 *
 * @example Namespace scopes
 * ```typescript
 * const app = createContainer({ namespaceScope: 'App' })
 *   .registerSingletonLazy(Logger, () => new ConsoleLogger());
 * const ui = createContainer({ namespaceScope: 'App.UI' })
 *   .registerSingletonLazy(Theme, () => new DarkTheme());
 *
 * registry.resolve(Theme, 'App.UI.Widgets'); // from `ui`
 * registry.resolve(Logger, 'App.UI.Widgets'); // falls through to `app`
 * ```
 *
 * @example Ambient scope
 * ```typescript
 * registry.withScope('App.UI', () => {
 *   registry.resolve(Theme); // same as registry.resolve(Theme, 'App.UI')
 * });
 * ```
 */
export class ContainerRegistry {
	private readonly containers = new Map<IContainer, ContainerRegistration>();
	private readonly namespaceIndex = new Map<string, ContainerRegistration>();
	// Map compares object keys by identity
	private readonly ownerIndex = new Map<object, ContainerRegistration>();
	// One entry per namespace ever queried, unbounded; any registration
	// change clears it
	private readonly chainCache = new Map<
		string,
		readonly ContainerRegistration[]
	>();

	// Updated together; readers trust singleContainer only while count is 1
	private containerCount = 0;
	private singleContainer: ContainerRegistration | undefined;

	private readonly scopes = new ScopeController();

	/**
	 * Number of registered containers.
	 */
	get size(): number {
		return this.containers.size;
	}

	isRegistered(container: IContainer): boolean {
		return this.containers.has(container);
	}

	/**
	 * Registers a container, optionally under a namespace scope and/or a scope
	 * owner. Nothing is changed when the registration is rejected.
	 *
	 * @throws {InvalidArgumentError} If the container is missing, the namespace
	 * scope is whitespace-only or the scope owner is not an object
	 * @throws {DuplicateRegistrationError} If the container, the namespace scope
	 * or the scope owner is already registered
	 */
	registerContainer(container: IContainer, scope: ContainerScope = {}): void {
		// eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
		if (container === undefined || container === null) {
			throw new InvalidArgumentError('A container is required');
		}

		const { namespaceScope, scopeOwner } = scope;
		if (namespaceScope !== undefined) {
			validateNamespaceScope(namespaceScope);
		}
		if (scopeOwner !== undefined) {
			validateScopeOwner(scopeOwner);
		}

		if (this.containers.has(container)) {
			throw new DuplicateRegistrationError(
				`Container ${container.name} is already registered`,
				{ detail: { container: container.name } }
			);
		}

		if (
			namespaceScope !== undefined &&
			this.namespaceIndex.has(namespaceScope)
		) {
			throw new DuplicateRegistrationError(
				`A container with namespace scope '${namespaceScope}' is already registered`,
				{ detail: { container: container.name, namespaceScope } }
			);
		}

		if (scopeOwner !== undefined && this.ownerIndex.has(scopeOwner)) {
			const owner = describeScope({ kind: 'object', owner: scopeOwner });
			throw new DuplicateRegistrationError(
				`A container with scope ${owner} is already registered`,
				{ detail: { container: container.name, scopeOwner: owner } }
			);
		}

		const registration = new ContainerRegistration(
			container,
			namespaceScope,
			scopeOwner
		);

		this.containers.set(container, registration);
		if (namespaceScope !== undefined) {
			this.namespaceIndex.set(namespaceScope, registration);
		}
		if (scopeOwner !== undefined) {
			this.ownerIndex.set(scopeOwner, registration);
		}

		this.chainCache.clear();
		this.updateSingleContainerAfterAdd(registration);

		getLogger().debug(
			{ container: container.name, namespaceScope, size: this.size },
			'Container registered'
		);
	}

	/**
	 * Removes a container from every index. Unknown containers are ignored.
	 */
	unregisterContainer(container: IContainer): void {
		const registration = this.containers.get(container);
		if (registration === undefined) {
			return;
		}

		this.containers.delete(container);
		if (registration.namespaceScope !== undefined) {
			this.namespaceIndex.delete(registration.namespaceScope);
		}
		if (registration.scopeOwner !== undefined) {
			this.ownerIndex.delete(registration.scopeOwner);
		}

		this.chainCache.clear();
		this.updateSingleContainerAfterRemove();

		getLogger().debug(
			{
				container: container.name,
				namespaceScope: registration.namespaceScope,
				size: this.size,
			},
			'Container unregistered'
		);
	}

	/**
	 * Resolves a dependency.
	 *
	 * Without a scope, the innermost ambient scope of the current execution
	 * context decides; without one, the only registered container is used.
	 *
	 * With a namespace scope, containers bound to that namespace or any of its
	 * dot-delimited ancestors are tried from the most specific one up.
	 *
	 * With a scope owner, the container bound to that exact object is used.
	 *
	 * @throws {NotRegisteredError} If no selected container can resolve the tag
	 * @throws {AmbiguousScopeError} If several containers are registered and
	 * nothing selects one
	 * @throws {InvalidArgumentError} If the scope is malformed
	 */
	resolve<T extends AnyTag>(tag: T, scope?: string | object): TagType<T> {
		if (scope === undefined) {
			return this.resolveAmbient(tag);
		}
		if (typeof scope === 'string') {
			return this.resolveInNamespace(tag, scope);
		}
		return this.resolveForOwner(tag, scope);
	}

	/**
	 * Resolves straight from a container, for hot paths that already hold one.
	 */
	resolveFromContainer<T extends AnyTag>(
		container: IContainer,
		tag: T
	): TagType<T> {
		// eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
		if (container === undefined || container === null) {
			throw new InvalidArgumentError('A container is required');
		}
		return container.resolve(tag);
	}

	tryResolveFromContainer<T extends AnyTag>(
		container: IContainer,
		tag: T
	): TagType<T> | undefined {
		// eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
		if (container === undefined || container === null) {
			throw new InvalidArgumentError('A container is required');
		}
		return container.tryResolve(tag);
	}

	/**
	 * Opens an ambient scope for the current execution context. Scopes must be
	 * released in reverse order of opening.
	 *
	 * @example
	 * ```typescript
	 * const scope = registry.beginScope(this);
	 * try {
	 *   const weapon = registry.resolve(Weapon);
	 * } finally {
	 *   scope.release();
	 * }
	 * ```
	 */
	beginScope(scope: string | object): ScopeHandle {
		if (typeof scope === 'string') {
			validateNamespaceScope(scope);
			return this.scopes.begin({ kind: 'namespace', scope });
		}
		validateScopeOwner(scope);
		return this.scopes.begin({ kind: 'object', owner: scope });
	}

	/**
	 * Runs `fn` inside an ambient scope and releases it afterwards, even when
	 * `fn` throws.
	 *
	 * `fn` must be synchronous: the scope is released as soon as `fn` returns,
	 * so code after the first `await` of an async callback no longer sees it.
	 * For async work, open the scope with `beginScope` inside `isolate` and
	 * release it when the work settles.
	 */
	withScope<R>(scope: string | object, fn: () => R): R {
		const handle = this.beginScope(scope);
		try {
			return fn();
		} finally {
			handle.release();
		}
	}

	/**
	 * Runs `fn` in a fresh execution context whose ambient scope stack starts
	 * empty and is not shared with the caller.
	 */
	isolate<R>(fn: () => R): R {
		return this.scopes.run(fn);
	}

	/**
	 * Forgets every container and clears the ambient scope stack of the
	 * calling execution context. Containers are not disposed; stacks of other
	 * execution contexts are left alone.
	 */
	dispose(): void {
		this.namespaceIndex.clear();
		this.chainCache.clear();
		this.ownerIndex.clear();
		this.containers.clear();
		this.containerCount = 0;
		this.singleContainer = undefined;
		this.scopes.clear();

		getLogger().debug('Container registry disposed');
	}

	private resolveAmbient<T extends AnyTag>(tag: T): TagType<T> {
		const frame = this.scopes.current();
		if (frame !== undefined) {
			return frame.kind === 'namespace'
				? this.resolveInNamespace(tag, frame.scope)
				: this.resolveForOwner(tag, frame.owner);
		}

		return this.resolveUnscoped(tag);
	}

	private resolveInNamespace<T extends AnyTag>(
		tag: T,
		namespaceScope: string
	): TagType<T> {
		validateNamespaceScope(namespaceScope);

		const chain = this.getNamespaceChain(namespaceScope);
		if (chain.length === 0) {
			return this.resolveUnscoped(tag);
		}

		for (const registration of chain) {
			const instance = registration.container.tryResolve(tag);
			if (instance !== undefined) {
				return instance;
			}
		}

		throw new NotRegisteredError(tag, namespaceScope);
	}

	private resolveForOwner<T extends AnyTag>(
		tag: T,
		scopeOwner: object
	): TagType<T> {
		validateScopeOwner(scopeOwner);

		const registration = this.ownerIndex.get(scopeOwner);
		if (registration === undefined) {
			throw new NotRegisteredError(
				tag,
				describeScope({ kind: 'object', owner: scopeOwner })
			);
		}

		return this.resolveFromRegistration(tag, registration);
	}

	private resolveUnscoped<T extends AnyTag>(tag: T): TagType<T> {
		const single = this.tryGetSingleContainer();
		if (single !== undefined) {
			return this.resolveFromRegistration(tag, single);
		}

		if (this.containers.size === 0) {
			throw new NotRegisteredError(tag);
		}

		throw new AmbiguousScopeError(tag, this.containers.size);
	}

	private resolveFromRegistration<T extends AnyTag>(
		tag: T,
		registration: ContainerRegistration
	): TagType<T> {
		const instance = registration.container.tryResolve(tag);
		if (instance === undefined) {
			throw new NotRegisteredError(tag, registration.namespaceScope);
		}
		return instance;
	}

	private getNamespaceChain(
		namespaceScope: string
	): readonly ContainerRegistration[] {
		let chain = this.chainCache.get(namespaceScope);
		if (chain === undefined) {
			chain = this.buildNamespaceChain(namespaceScope);
			this.chainCache.set(namespaceScope, chain);
		}
		return chain;
	}

	/**
	 * Bound containers for `namespaceScope` and each ancestor obtained by
	 * dropping the trailing segment, most specific first.
	 */
	private buildNamespaceChain(
		namespaceScope: string
	): ContainerRegistration[] {
		const chain: ContainerRegistration[] = [];
		let current = namespaceScope;

		for (;;) {
			const registration = this.namespaceIndex.get(current);
			if (registration !== undefined) {
				chain.push(registration);
			}

			const lastDot = current.lastIndexOf('.');
			if (lastDot < 0) {
				break;
			}
			current = current.slice(0, lastDot);
		}

		return chain;
	}

	private tryGetSingleContainer(): ContainerRegistration | undefined {
		if (this.containerCount !== 1) {
			return undefined;
		}

		if (this.singleContainer !== undefined) {
			return this.singleContainer;
		}

		// Count and cached value disagree; take the slow path
		for (const registration of this.containers.values()) {
			this.singleContainer = registration;
			return registration;
		}

		return undefined;
	}

	private updateSingleContainerAfterAdd(
		registration: ContainerRegistration
	): void {
		this.containerCount += 1;
		this.singleContainer =
			this.containerCount === 1 ? registration : undefined;
	}

	private updateSingleContainerAfterRemove(): void {
		this.containerCount -= 1;
		this.singleContainer = undefined;

		if (this.containerCount === 1) {
			for (const registration of this.containers.values()) {
				this.singleContainer = registration;
				break;
			}
		}
	}
}

function validateNamespaceScope(namespaceScope: string): void {
	// eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
	if (namespaceScope === undefined || namespaceScope === null) {
		throw new InvalidArgumentError('A namespace scope is required');
	}

	if (namespaceScope.length > 0 && namespaceScope.trim().length === 0) {
		throw new InvalidArgumentError(
			'A namespace scope cannot be whitespace',
			{ detail: { namespaceScope } }
		);
	}
}

function validateScopeOwner(scopeOwner: object): void {
	if (!isReference(scopeOwner)) {
		throw new InvalidArgumentError(
			'A scope owner must be an object or a function',
			{ detail: { scopeOwner: typeof scopeOwner } }
		);
	}
}

/**
 * The process-wide registry.
 */
export const registry = new ContainerRegistry();
