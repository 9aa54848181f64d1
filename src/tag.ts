import type { z } from 'zod/v4';

/**
 * Type representing a tag identifier (string or symbol).
 * @internal
 */
export type TagId = string | symbol;

/**
 * Property key carrying a tag's identifier on both value tags and service tags.
 *
 * Note: We can't use a symbol here because it produces the following TS error:
 *  error TS4020: 'extends' clause of exported class 'NotificationService' has or is using private name 'TagIdKey'.
 *
 * @internal
 */
export const TagIdKey = '__scopewire/TagIdKey__';

/**
 * Phantom property carrying the type a value tag stands for. Never read at runtime.
 * @internal
 */
export const TagTypeKey: unique symbol = Symbol.for('scopewire/TagTypeKey');

/**
 * Property holding the runtime check of a validated value tag.
 * @internal
 */
export const TagGuardKey: unique symbol = Symbol.for('scopewire/TagGuardKey');

/**
 * Type representing a value-based dependency tag.
 *
 * Value tags stand for non-class dependencies such as configuration objects or
 * plain functions. Without a guard the container can only check that the
 * produced value is not `null` or `undefined`.
 *
 * @template Id - The unique identifier for this tag
 * @template T - The type of the value this tag represents
 *
 * @example
 * ```typescript
 * const ApiUrl = Tag.of('apiUrl')<string>();
 * container.registerSingleton(ApiUrl, 'https://api.example.com');
 * ```
 */
export interface ValueTag<Id extends TagId, T> {
	readonly [TagIdKey]: Id;
	readonly [TagTypeKey]: T;
	readonly [TagGuardKey]?: (value: unknown) => boolean;
}

/**
 * Type representing a class-based dependency tag.
 *
 * Tagged classes come from Tag.Service() and are both the dependency key and
 * the runtime type that produced instances are checked against with
 * `instanceof`. Abstract classes are allowed, so a tag can play the role of
 * an interface with several implementations.
 *
 * @internal - Users should use Tag.Service() instead of working with this type directly
 */
export type ServiceTag<Id extends TagId, T> = (abstract new (
	// eslint-disable-next-line @typescript-eslint/no-explicit-any
	...args: any[]
) => T & { readonly [TagIdKey]: Id }) & {
	readonly [TagIdKey]: Id;
};

/**
 * Utility type that extracts the service type from any dependency tag.
 *
 * @example
 * ```typescript
 * const Port = Tag.of('port')<number>();
 * class UserService extends Tag.Service('UserService') {}
 *
 * type A = TagType<typeof Port>; // number
 * type B = TagType<typeof UserService>; // UserService
 * ```
 */
export type TagType<TTag extends AnyTag> =
	// eslint-disable-next-line @typescript-eslint/no-explicit-any
	TTag extends ValueTag<any, infer T>
		? T
		: // eslint-disable-next-line @typescript-eslint/no-explicit-any
			TTag extends ServiceTag<any, infer T>
			? T
			: never;

/**
 * Union type representing any valid dependency tag.
 */
export type AnyTag =
	// eslint-disable-next-line @typescript-eslint/no-explicit-any
	| ValueTag<TagId, any>
	// eslint-disable-next-line @typescript-eslint/no-explicit-any
	| ServiceTag<TagId, any>;

/**
 * Factory functions and helpers for dependency tags.
 */
export const Tag = {
	/**
	 * Creates a value tag factory for dependencies that are not classes.
	 *
	 * @example
	 * ```typescript
	 * const ConfigTag = Tag.of('config')<{ dbUrl: string; port: number }>();
	 * container.registerSingleton(ConfigTag, { dbUrl: 'postgres://localhost', port: 5432 });
	 * ```
	 */
	of: <Id extends TagId>(id: Id) => {
		return <T>(): ValueTag<Id, T> => ({
			[TagIdKey]: id,
			[TagTypeKey]: undefined as T,
		});
	},

	/**
	 * Creates an anonymous value tag with a unique symbol identifier.
	 */
	for: <T>(): ValueTag<symbol, T> => {
		return {
			[TagIdKey]: Symbol(),
			[TagTypeKey]: undefined as T,
		};
	},

	/**
	 * Creates a value tag whose produced values are checked against a zod
	 * schema. The check only accepts or rejects; callers always receive the
	 * reference the factory returned, not a parsed copy.
	 *
	 * @example
	 * ```typescript
	 * const Settings = Tag.validated('settings', z.object({ retries: z.number() }));
	 *
	 * container.registerSingletonLazy(Settings, () => ({ retries: 3 }));
	 * container.resolve(Settings).retries; // 3
	 * ```
	 */
	validated: <Id extends TagId, TSchema extends z.ZodType>(
		id: Id,
		schema: TSchema
	): ValueTag<Id, z.infer<TSchema>> => {
		return {
			[TagIdKey]: id,
			[TagTypeKey]: undefined as z.infer<TSchema>,
			[TagGuardKey]: (value: unknown) => schema.safeParse(value).success,
		};
	},

	/**
	 * Creates a base class that can be extended to create service classes with dependency tags.
	 *
	 * @example
	 * ```typescript
	 * abstract class Weapon extends Tag.Service('Weapon') {
	 *   abstract attack(): number;
	 * }
	 *
	 * class Sword extends Weapon {
	 *   attack() { return 10; }
	 * }
	 *
	 * container.registerSingletonLazy(Weapon, () => new Sword());
	 * ```
	 */
	Service: <Id extends TagId>(id: Id) => {
		class Tagged {
			static readonly [TagIdKey]: Id = id;
			readonly [TagIdKey]: Id = id;
		}
		return Tagged as ServiceTag<Id, Tagged>;
	},

	/**
	 * Extracts a tag's identifier.
	 */
	id: (tag: AnyTag): TagId => {
		return tag[TagIdKey];
	},

	/**
	 * Printable form of a tag's identifier, symbols included.
	 * @internal - Used in error messages and logs
	 */
	describe: (tag: AnyTag): string => {
		return String(tag[TagIdKey]);
	},

	/**
	 * Whether a produced value satisfies the tag: an instance of a service tag,
	 * or a value accepted by a value tag's guard. `null` and `undefined` never
	 * satisfy a tag.
	 */
	accepts: <T extends AnyTag>(tag: T, value: unknown): value is TagType<T> => {
		if (value === null || value === undefined) {
			return false;
		}
		const anyTag: AnyTag = tag;
		if (typeof anyTag === 'function') {
			return value instanceof anyTag;
		}
		const guard = anyTag[TagGuardKey];
		return guard === undefined || guard(value);
	},
};
