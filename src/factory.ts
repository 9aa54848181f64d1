import { Container, ContainerOptions } from './container.js';
import { ContainerRegistry, ContainerScope, registry } from './registry.js';

export type CreateContainerOptions = ContainerOptions &
	ContainerScope & {
		/** Registry to join. Defaults to the process-wide `registry`. */
		registry?: ContainerRegistry;
	};

/**
 * Creates a container, registers it with a registry and unregisters it again
 * when the container is disposed.
 *
 * @throws {DuplicateRegistrationError} If the namespace scope or scope owner is taken
 * @throws {InvalidArgumentError} If the namespace scope or scope owner is malformed
 *
 * @example
 * ```typescript
 * const ui = createContainer({ namespaceScope: 'App.UI' })
 *   .registerSingletonLazy(Theme, () => new DarkTheme());
 *
 * registry.resolve(Theme, 'App.UI.Widgets');
 *
 * ui.dispose(); // also removes it from the registry
 * ```
 */
export function createContainer(options: CreateContainerOptions = {}): Container {
	const {
		namespaceScope,
		scopeOwner,
		registry: target = registry,
		...containerOptions
	} = options;

	const container = new Container(containerOptions);
	target.registerContainer(container, { namespaceScope, scopeOwner });
	container.onDispose(() => {
		target.unregisterContainer(container);
	});

	return container;
}
