/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { TextEncoder } from 'util';
import { IDeserialize } from '../de';
import {
	BorrowUnavailableError,
	EndOfInputError,
	MalformedInputError,
	RecursionLimitError,
	SerializationError,
	SerializationFailure,
	TrailingInputError,
} from '../errors';
import {
	array,
	bytes,
	char,
	enumeration,
	f64,
	i128,
	map,
	newtypeVariant,
	option,
	string,
	struct,
	structVariant,
	tupleVariant,
	u16,
	u32,
	u64,
	u8,
	unit,
	unitVariant,
} from '../mapping';
import { JsonFormat } from './json';
import { valueMapping } from './value';

describe('JsonFormat', () => {
	const json = new JsonFormat();
	const point = struct('Point', { x: u8, y: u8 });
	const color = enumeration('Color', {
		Red: unitVariant(),
		Rgb: tupleVariant(u8, u8, u8),
		Named: newtypeVariant(string),
		Hsl: structVariant({ h: u16, s: u8, l: u8 }),
	});

	describe('serialize', () => {
		it('writes structs as objects', () => {
			const user = struct('User', {
				id: u32,
				name: string,
				tags: array(string),
				score: option(f64),
			});

			expect(json.serialize({ id: 1, name: 'a"b', tags: ['x'], score: undefined }, user)).toBe(
				'{"id":1,"name":"a\\"b","tags":["x"],"score":null}',
			);
		});

		it('indents when asked to', () => {
			const nested = struct('Nested', { x: u8, y: array(u8) });
			expect(new JsonFormat({ indent: 2 }).serialize({ x: 1, y: [] }, nested)).toBe(
				'{\n  "x": 1,\n  "y": []\n}',
			);
			expect(new JsonFormat({ indent: '\t' }).serialize([1], array(u8))).toBe('[\n\t1\n]');
		});

		it('keeps floats distinguishable from integers', () => {
			expect(json.serialize(2, f64)).toBe('2.0');
			expect(json.serialize(-0.5, f64)).toBe('-0.5');
		});

		it('keeps the sign of negative zero', () => {
			expect(json.serialize(-0, f64)).toBe('-0.0');
			expect(json.serialize(0, f64)).toBe('0.0');
			expect(json.deserialize(json.serialize(-0, f64), f64)).toBe(-0);
		});

		it('refuses non-finite floats', () => {
			expect(() => json.serialize(NaN, f64)).toThrow(SerializationError);
			expect(() => json.serialize(Infinity, f64)).toThrow(
				'JSON cannot represent the non-finite float Infinity',
			);
		});

		it('writes wide integers exactly', () => {
			expect(json.serialize(2n ** 64n - 1n, u64)).toBe('18446744073709551615');
		});

		it('writes bytes, units and chars', () => {
			expect(json.serialize(Uint8Array.of(1, 2), bytes)).toBe('[1,2]');
			expect(json.serialize(undefined, unit)).toBe('null');
			expect(json.serialize('x', char)).toBe('"x"');
		});

		it('writes variants externally tagged', () => {
			expect(json.serialize({ variant: 'Red' }, color)).toBe('"Red"');
			expect(json.serialize({ variant: 'Rgb', value: [1, 2, 3] }, color)).toBe('{"Rgb":[1,2,3]}');
			expect(json.serialize({ variant: 'Named', value: 'teal' }, color)).toBe('{"Named":"teal"}');
			expect(json.serialize({ variant: 'Hsl', value: { h: 200, s: 50, l: 40 } }, color)).toBe(
				'{"Hsl":{"h":200,"s":50,"l":40}}',
			);
		});

		it('turns integer keys into strings', () => {
			expect(json.serialize(new Map([[1, 'a']]), map(u32, string))).toBe('{"1":"a"}');
		});

		it('refuses compound keys', () => {
			let error: unknown;
			try {
				json.serialize(new Map([[[1], 2]]), map(array(u8), u8));
			} catch (e) {
				error = e;
			}

			expect(error).toBeInstanceOf(SerializationError);
			expect(error).toMatchObject({ reason: SerializationFailure.KeyMustBeString });
		});
	});

	describe('deserialize', () => {
		it('reads objects and arrays as structs', () => {
			expect(json.deserialize('{"y":2,"x":1}', point)).toEqual({ x: 1, y: 2 });
			expect(json.deserialize(' [1, 2] ', point)).toEqual({ x: 1, y: 2 });
		});

		it('reads every variant form', () => {
			expect(json.deserialize('"Red"', color)).toEqual({ variant: 'Red' });
			expect(json.deserialize('{"Rgb":[1,2,3]}', color)).toEqual({
				variant: 'Rgb',
				value: [1, 2, 3],
			});
			expect(json.deserialize('{"Named":"teal"}', color)).toEqual({
				variant: 'Named',
				value: 'teal',
			});
			expect(json.deserialize('{"Hsl":{"h":200,"s":50,"l":40}}', color)).toEqual({
				variant: 'Hsl',
				value: { h: 200, s: 50, l: 40 },
			});
		});

		it('reads integer keys', () => {
			expect(json.deserialize('{"1":"a"}', map(u32, string))).toEqual(new Map([[1, 'a']]));
		});

		it('reads escapes', () => {
			expect(json.deserialize('"a\\nb\\u00e9"', string)).toBe('a\nbé');
		});

		it('reads bytes from arrays of numbers', () => {
			expect(json.deserialize('[1,2]', bytes)).toEqual(Uint8Array.of(1, 2));
		});

		it('reads options', () => {
			expect(json.deserialize('null', option(u8))).toBeUndefined();
			expect(json.deserialize('5', option(u8))).toBe(5);
		});

		it('reads integers of every width', () => {
			expect(json.deserialize('-1267650600228229401496703205376', i128)).toBe(-(2n ** 100n));
			expect(json.deserialize('18446744073709551615', u64)).toBe(2n ** 64n - 1n);
		});

		it('reads encoded bytes', () => {
			expect(json.deserialize(new TextEncoder().encode('"hi"'), string)).toBe('hi');
		});

		it('builds value trees from any input', () => {
			expect(json.deserialize('{"a":[1,-2,1.5,"x",null,true]}', valueMapping)).toEqual({
				kind: 'map',
				entries: [
					[
						{ kind: 'string', value: 'a' },
						{
							kind: 'seq',
							elements: [
								{ kind: 'u64', value: 1n },
								{ kind: 'i64', value: -2n },
								{ kind: 'f64', value: 1.5 },
								{ kind: 'string', value: 'x' },
								{ kind: 'unit' },
								{ kind: 'bool', value: true },
							],
						},
					],
				],
			});
		});
	});

	describe('string lifetimes', () => {
		const borrowedOnly: IDeserialize<string> = {
			deserialize: deserializer =>
				deserializer.deserializeStr({
					expecting: 'a borrowed string',
					visitBorrowedStr: value => value,
				}),
		};

		it('lends strings without escapes', () => {
			expect(json.deserialize('"plain"', borrowedOnly)).toBe('plain');
		});

		it('cannot lend strings it had to unescape', () => {
			expect(() => json.deserialize('"esc\\n"', borrowedOnly)).toThrow(BorrowUnavailableError);
		});
	});

	describe('errors', () => {
		it('reports where the input ended', () => {
			let error: unknown;
			try {
				json.deserialize('[1,', array(u8));
			} catch (e) {
				error = e;
			}

			expect(error).toBeInstanceOf(EndOfInputError);
			expect(error).toMatchObject({ offset: 3 });
		});

		it('rejects trailing input', () => {
			expect(() => json.deserialize('1 2', u8)).toThrow(TrailingInputError);
			expect(() => json.deserialize('1 2', u8)).toThrow('trailing input after value at offset 2');
		});

		it('rejects malformed input', () => {
			expect(() => json.deserialize('[1 2]', array(u8))).toThrow(MalformedInputError);
			expect(() => json.deserialize('nul', unit)).toThrow(EndOfInputError);
			expect(() => json.deserialize('"\\x"', string)).toThrow('invalid escape `\\x` at offset 1');
		});

		it('places semantic errors after the offending value', () => {
			expect(() => json.deserialize('[1, 300]', array(u8))).toThrow(
				'invalid value: integer `300`, expected a u8 integer at offset 7',
			);
			expect(() => json.deserialize('{"x":1,"z":2}', point)).toThrow(
				'unknown field `z`, expected one of `x`, `y` at offset 11',
			);
		});

		it('limits nesting', () => {
			const shallow = new JsonFormat({ maxDepth: 2 });
			expect(shallow.deserialize('[[1]]', valueMapping)).toEqual({
				kind: 'seq',
				elements: [{ kind: 'seq', elements: [{ kind: 'u64', value: 1n }] }],
			});
			expect(() => shallow.deserialize('[[[1]]]', valueMapping)).toThrow(RecursionLimitError);
			expect(() => shallow.deserialize('[[[1]]]', valueMapping)).toThrow(
				'recursion limit of 2 exceeded at offset 2',
			);
		});
	});
});
