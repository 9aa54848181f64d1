import { OutOfOrderScopeDisposeError } from '@/errors.js';
import { describeScope, ScopeController } from '@/scope.js';
import { beforeEach, describe, expect, it } from 'vitest';

class Session {}

const tick = () => new Promise((resolve) => setTimeout(resolve, 1));

describe('ScopeController', () => {
	let scopes: ScopeController;

	beforeEach(() => {
		scopes = new ScopeController();
	});

	it('should start without a scope', () => {
		expect(scopes.current()).toBeUndefined();
	});

	it('should stack frames in opening order', () => {
		const session = new Session();
		const outer = scopes.begin({ kind: 'namespace', scope: 'App' });
		const inner = scopes.begin({ kind: 'object', owner: session });

		expect(scopes.current()).toBe(inner.frame);
		expect(inner.frame.previous).toBe(outer.frame);

		inner.release();
		expect(scopes.current()).toBe(outer.frame);

		outer.release();
		expect(scopes.current()).toBeUndefined();
	});

	it('should reject releasing an outer scope first', () => {
		const outer = scopes.begin({ kind: 'namespace', scope: 'A' });
		const inner = scopes.begin({ kind: 'namespace', scope: 'B' });

		expect(() => outer.release()).toThrow(OutOfOrderScopeDisposeError);
		expect(outer.isReleased).toBe(false);
		expect(scopes.current()).toBe(inner.frame);

		inner.release();
		outer.release();
		expect(scopes.current()).toBeUndefined();
	});

	it('should ignore a second release', () => {
		const outer = scopes.begin({ kind: 'namespace', scope: 'A' });
		const inner = scopes.begin({ kind: 'namespace', scope: 'B' });

		inner.release();
		inner.release();

		expect(scopes.current()).toBe(outer.frame);
	});

	it('should clear only the current context', async () => {
		const root = scopes.begin({ kind: 'namespace', scope: 'Root' });

		await scopes.run(async () => {
			scopes.begin({ kind: 'namespace', scope: 'Inner' });
			await tick();
			scopes.clear();
			expect(scopes.current()).toBeUndefined();
		});

		expect(scopes.current()).toBe(root.frame);
	});

	describe('run', () => {
		it('should start with an empty stack', () => {
			scopes.begin({ kind: 'namespace', scope: 'Root' });

			expect(scopes.run(() => scopes.current())).toBeUndefined();
		});

		it('should keep concurrent contexts apart', async () => {
			const visit = (scope: string) =>
				scopes.run(async () => {
					const handle = scopes.begin({ kind: 'namespace', scope });
					await tick();
					const seen = scopes.current();
					handle.release();
					return seen?.kind === 'namespace' ? seen.scope : undefined;
				});

			const seen = await Promise.all([visit('First'), visit('Second')]);

			expect(seen).toEqual(['First', 'Second']);
			expect(scopes.current()).toBeUndefined();
		});
	});

	describe('describeScope', () => {
		it('should quote namespace scopes', () => {
			expect(describeScope({ kind: 'namespace', scope: 'App.UI' })).toBe(
				"'App.UI'"
			);
		});

		it('should name the owner type', () => {
			expect(describeScope({ kind: 'object', owner: new Session() })).toBe(
				'owner Session'
			);
			expect(describeScope({ kind: 'object', owner: {} })).toBe(
				'owner Object'
			);
		});
	});
});
