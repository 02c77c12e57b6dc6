/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { SerializationError } from './errors';
import {
	array,
	bool,
	char,
	enumeration,
	f64,
	i32,
	iterable,
	map,
	newtypeStruct,
	newtypeVariant,
	option,
	string,
	struct,
	structVariant,
	tuple,
	tupleStruct,
	tupleVariant,
	u16,
	u32,
	u8,
	unit,
	unitStruct,
	unitVariant,
} from './mapping';
import {
	checkChar,
	checkInteger,
	fitsInteger,
	isChar,
	isFixedLength,
	SHAPE_KINDS,
	shapeGroup,
	ShapeGroup,
	shapeOf,
} from './model';

describe('model', () => {
	const color = enumeration('Color', {
		Red: unitVariant(),
		Rgb: tupleVariant(u8, u8, u8),
		Named: newtypeVariant(string),
		Hsl: structVariant({ h: u16, s: u8, l: u8 }),
	});

	it('registers 29 distinct shapes', () => {
		expect(SHAPE_KINDS).toHaveLength(29);
		expect(new Set(SHAPE_KINDS).size).toBe(29);
	});

	it('groups shapes', () => {
		expect(shapeGroup('i128')).toBe(ShapeGroup.Primitive);
		expect(shapeGroup('string')).toBe(ShapeGroup.Text);
		expect(shapeGroup('bytes')).toBe(ShapeGroup.Binary);
		expect(shapeGroup('unit_variant')).toBe(ShapeGroup.Empty);
		expect(shapeGroup('newtype_variant')).toBe(ShapeGroup.Wrapper);
		expect(shapeGroup('map')).toBe(ShapeGroup.VariableSequence);
		expect(shapeGroup('tuple_struct')).toBe(ShapeGroup.FixedSequence);
		expect(shapeGroup('struct_variant')).toBe(ShapeGroup.FixedKeyValue);
	});

	it('knows which lengths are static', () => {
		expect(SHAPE_KINDS.filter(isFixedLength)).toEqual([
			'tuple',
			'tuple_struct',
			'tuple_variant',
			'struct',
			'struct_variant',
		]);
	});

	it('checks integer ranges', () => {
		expect(fitsInteger('u8', 255)).toBe(true);
		expect(fitsInteger('u8', 256)).toBe(false);
		expect(fitsInteger('i8', -128)).toBe(true);
		expect(fitsInteger('i32', 1.5)).toBe(false);
		expect(fitsInteger('u64', 2n ** 64n - 1n)).toBe(true);
		expect(fitsInteger('i64', 2n ** 63n)).toBe(false);
		expect(() => checkInteger('u16', -1)).toThrow(SerializationError);
	});

	it('recognises single characters', () => {
		expect(isChar('a')).toBe(true);
		expect(isChar('\u{1F600}')).toBe(true);
		expect(isChar('ab')).toBe(false);
		expect(isChar('')).toBe(false);
		expect(isChar('\ud800')).toBe(false);
		expect(() => checkChar('xy')).toThrow('"xy" is not a single character');
	});

	describe('shapeOf', () => {
		it('classifies primitives', () => {
			expect(shapeOf(true, bool)).toEqual({ kind: 'bool' });
			expect(shapeOf(5, u8)).toEqual({ kind: 'u8' });
			expect(shapeOf(-5, i32)).toEqual({ kind: 'i32' });
			expect(shapeOf(1.5, f64)).toEqual({ kind: 'f64' });
			expect(shapeOf('x', char)).toEqual({ kind: 'char' });
			expect(shapeOf('xyz', string)).toEqual({ kind: 'string' });
		});

		it('classifies options and units', () => {
			expect(shapeOf(undefined, option(u8))).toEqual({ kind: 'option' });
			expect(shapeOf(3, option(u8))).toEqual({ kind: 'option' });
			expect(shapeOf(undefined, unit)).toEqual({ kind: 'unit' });
			expect(shapeOf(null, unitStruct('Marker', null))).toEqual({
				kind: 'unit_struct',
				name: 'Marker',
			});
		});

		it('classifies wrappers and sequences', () => {
			expect(shapeOf(2, newtypeStruct('Meters', f64))).toEqual({
				kind: 'newtype_struct',
				name: 'Meters',
			});
			expect(shapeOf([1, 2], array(u8))).toEqual({ kind: 'seq', len: 2 });
			expect(shapeOf(new Set([1]), iterable(u8))).toEqual({ kind: 'seq', len: undefined });
			expect(shapeOf(new Map([['a', 1]]), map(string, u8))).toEqual({ kind: 'map', len: 1 });
			expect(shapeOf([1, 'a'], tuple(u8, string))).toEqual({ kind: 'tuple', len: 2 });
			expect(shapeOf([1, 2], tupleStruct('Point', i32, i32))).toEqual({
				kind: 'tuple_struct',
				name: 'Point',
				len: 2,
			});
		});

		it('classifies structs with their fields', () => {
			const user = struct('User', { id: u32, name: string });
			expect(shapeOf({ id: 1, name: 'a' }, user)).toEqual({
				kind: 'struct',
				name: 'User',
				fields: ['id', 'name'],
			});
		});

		it('classifies every variant form', () => {
			expect(shapeOf({ variant: 'Red' }, color)).toEqual({
				kind: 'unit_variant',
				name: 'Color',
				variantIndex: 0,
				variant: 'Red',
			});
			expect(shapeOf({ variant: 'Rgb', value: [1, 2, 3] }, color)).toEqual({
				kind: 'tuple_variant',
				name: 'Color',
				variantIndex: 1,
				variant: 'Rgb',
				len: 3,
			});
			expect(shapeOf({ variant: 'Named', value: 'teal' }, color)).toEqual({
				kind: 'newtype_variant',
				name: 'Color',
				variantIndex: 2,
				variant: 'Named',
			});
			expect(shapeOf({ variant: 'Hsl', value: { h: 1, s: 2, l: 3 } }, color)).toEqual({
				kind: 'struct_variant',
				name: 'Color',
				variantIndex: 3,
				variant: 'Hsl',
				fields: ['h', 's', 'l'],
			});
		});

		it('is stable for a type', () => {
			expect(shapeOf(1, u8)).toEqual(shapeOf(200, u8));
		});
	});
});
