export const isDefined = <T>(value: T | undefined | null): value is T =>
	value !== undefined && value !== null;

export function hasKey<T extends PropertyKey>(
	obj: unknown,
	key: T
): obj is Record<T, unknown> {
	return (
		obj !== undefined &&
		obj !== null &&
		(typeof obj === 'object' || typeof obj === 'function') &&
		key in obj
	);
}

/**
 * Anything that can be compared by identity: objects and functions.
 */
export function isReference(value: unknown): value is object {
	return (
		(typeof value === 'object' && value !== null) ||
		typeof value === 'function'
	);
}

/**
 * Constructor name of an object, or the `typeof` of anything else.
 */
export function typeName(value: unknown): string {
	if (value === null) {
		return 'null';
	}
	if (typeof value === 'object') {
		const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
		return typeof ctor === 'function' && ctor.name !== ''
			? ctor.name
			: 'object';
	}
	return typeof value;
}
