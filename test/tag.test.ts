import { Tag, TagIdKey } from '@/tag.js';
import { describe, expect, it } from 'vitest';
import { z } from 'zod/v4';

describe('Tag', () => {
	describe('Tag.of', () => {
		it('should create a value tag with the given id', () => {
			const ApiUrl = Tag.of('apiUrl')<string>();

			expect(Tag.id(ApiUrl)).toBe('apiUrl');
			expect(ApiUrl[TagIdKey]).toBe('apiUrl');
		});

		it('should create distinct tags for the same id', () => {
			const first = Tag.of('config')<string>();
			const second = Tag.of('config')<string>();

			expect(first).not.toBe(second);
		});
	});

	describe('Tag.for', () => {
		it('should create tags with unique symbol ids', () => {
			const first = Tag.for<number>();
			const second = Tag.for<number>();

			expect(typeof Tag.id(first)).toBe('symbol');
			expect(Tag.id(first)).not.toBe(Tag.id(second));
		});
	});

	describe('Tag.Service', () => {
		it('should expose the id on the class and on instances', () => {
			class UserService extends Tag.Service('UserService') {}

			expect(Tag.id(UserService)).toBe('UserService');
			expect(new UserService()[TagIdKey]).toBe('UserService');
		});

		it('should allow abstract service tags', () => {
			abstract class Weapon extends Tag.Service('Weapon') {
				abstract attack(): number;
			}

			class Sword extends Weapon {
				attack() {
					return 10;
				}
			}

			expect(Tag.id(Weapon)).toBe('Weapon');
			expect(new Sword().attack()).toBe(10);
		});
	});

	describe('Tag.describe', () => {
		it('should describe string and symbol ids', () => {
			class Named extends Tag.Service('Named') {}
			const Anonymous = Tag.of(Symbol('anonymous'))<string>();

			expect(Tag.describe(Named)).toBe('Named');
			expect(Tag.describe(Anonymous)).toBe('Symbol(anonymous)');
		});
	});

	describe('Tag.accepts', () => {
		abstract class Weapon extends Tag.Service('Weapon') {}
		class Sword extends Weapon {}
		class Shield extends Tag.Service('Shield') {}

		it('should accept instances of a service tag and its subclasses', () => {
			expect(Tag.accepts(Weapon, new Sword())).toBe(true);
			expect(Tag.accepts(Sword, new Sword())).toBe(true);
		});

		it('should reject instances of unrelated classes', () => {
			expect(Tag.accepts(Weapon, new Shield())).toBe(false);
			expect(Tag.accepts(Weapon, {})).toBe(false);
		});

		it('should reject null and undefined for every tag', () => {
			const Plain = Tag.of('plain')<string | null>();

			expect(Tag.accepts(Weapon, null)).toBe(false);
			expect(Tag.accepts(Plain, null)).toBe(false);
			expect(Tag.accepts(Plain, undefined)).toBe(false);
		});

		it('should accept any other value for an unchecked value tag', () => {
			const Port = Tag.of('port')<number>();

			expect(Tag.accepts(Port, 8080)).toBe(true);
			expect(Tag.accepts(Port, 'not a number')).toBe(true);
		});

		it('should run the schema of a validated tag', () => {
			const Settings = Tag.validated(
				'settings',
				z.object({ retries: z.number() })
			);

			expect(Tag.accepts(Settings, { retries: 3 })).toBe(true);
			expect(Tag.accepts(Settings, { retries: 'three' })).toBe(false);
		});
	});
});
