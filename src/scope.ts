import { AsyncLocalStorage } from 'node:async_hooks';
import { OutOfOrderScopeDisposeError } from './errors.js';
import { typeName } from './utils/object.js';

/**
 * What an ambient scope points at: a namespace scope string, or the identity
 * of a scope owner object.
 */
export type ScopeTarget =
	| { readonly kind: 'namespace'; readonly scope: string }
	| { readonly kind: 'object'; readonly owner: object };

/**
 * One entry of the ambient scope stack, linked to the frame it shadows.
 */
export type ScopeFrame = ScopeTarget & {
	readonly previous: ScopeFrame | undefined;
};

type ScopeStack = { top: ScopeFrame | undefined };

/**
 * Printable form of a frame for error messages.
 * @internal
 */
export function describeScope(target: ScopeTarget): string {
	return target.kind === 'namespace'
		? `'${target.scope}'`
		: `owner ${typeName(target.owner)}`;
}

/**
 * Releases exactly the frame it was created for. Releasing twice is a no-op.
 */
export class ScopeHandle {
	private released = false;

	constructor(
		private readonly controller: ScopeController,
		readonly frame: ScopeFrame
	) {}

	get isReleased(): boolean {
		return this.released;
	}

	/**
	 * @throws {OutOfOrderScopeDisposeError} If a scope opened after this one
	 * in the current execution context is still open
	 */
	release(): void {
		if (this.released) {
			return;
		}

		this.controller.end(this.frame);
		this.released = true;
	}
}

/**
 * Ambient scope stacks, one per asynchronous execution context.
 *
 * Code running outside `run()` shares a root stack. `run()` starts a fresh,
 * empty stack that follows the callback through its awaits and callbacks and
 * is invisible to everything else, the way a thread-local would be.
 *
 * @example
 * ```typescript
 * const scopes = new ScopeController();
 *
 * const outer = scopes.begin({ kind: 'namespace', scope: 'App' });
 * const inner = scopes.begin({ kind: 'namespace', scope: 'App.UI' });
 *
 * scopes.run(() => scopes.current()); // undefined
 *
 * inner.release();
 * outer.release();
 * ```
 */
export class ScopeController {
	private readonly storage = new AsyncLocalStorage<ScopeStack>();
	private readonly rootStack: ScopeStack = { top: undefined };

	/**
	 * The innermost open frame of the current execution context.
	 */
	current(): ScopeFrame | undefined {
		return this.stack().top;
	}

	begin(target: ScopeTarget): ScopeHandle {
		const stack = this.stack();
		const frame: ScopeFrame = { ...target, previous: stack.top };
		stack.top = frame;
		return new ScopeHandle(this, frame);
	}

	/**
	 * Pops `frame`, which must be the innermost open frame.
	 * @internal - Called by ScopeHandle.release()
	 */
	end(frame: ScopeFrame): void {
		const stack = this.stack();
		if (stack.top !== frame) {
			const innermost =
				stack.top === undefined ? 'none' : describeScope(stack.top);
			throw new OutOfOrderScopeDisposeError(
				`Scope ${describeScope(frame)} disposed out of order; the innermost open scope is ${innermost}`,
				{
					detail: {
						scope: describeScope(frame),
						innermost,
					},
				}
			);
		}

		stack.top = frame.previous;
	}

	/**
	 * Drops every frame of the current execution context. Other contexts keep
	 * their stacks.
	 */
	clear(): void {
		this.stack().top = undefined;
	}

	/**
	 * Runs `fn` with its own empty stack.
	 */
	run<R>(fn: () => R): R {
		return this.storage.run({ top: undefined }, fn);
	}

	private stack(): ScopeStack {
		return this.storage.getStore() ?? this.rootStack;
	}
}
