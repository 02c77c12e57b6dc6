/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { InvalidTypeError, UnknownVariantError } from '../errors';
import { Value, ValueFormat } from '../format/value';
import { enumeration, newtypeVariant, structVariant, tupleVariant, unitVariant } from './enums';
import { string, u16, u8 } from './primitives';
import { TypeOf } from './types';

const header = (variantIndex: number, variant: string) => ({
	name: 'Color',
	variantIndex,
	variant,
});
const byte = (value: number): Value => ({ kind: 'u8', value });

describe('enumeration', () => {
	const format = new ValueFormat();
	const color = enumeration('Color', {
		Red: unitVariant(),
		Rgb: tupleVariant(u8, u8, u8),
		Named: newtypeVariant(string),
		Hsl: structVariant({ h: u16, s: u8, l: u8 }),
	});

	it('picks the variant shape from the variant form', () => {
		expect(format.serialize({ variant: 'Red' }, color)).toEqual({
			kind: 'unit_variant',
			...header(0, 'Red'),
		});
		expect(format.serialize({ variant: 'Rgb', value: [1, 2, 3] }, color)).toEqual({
			kind: 'tuple_variant',
			...header(1, 'Rgb'),
			elements: [byte(1), byte(2), byte(3)],
		});
		expect(format.serialize({ variant: 'Named', value: 'teal' }, color)).toEqual({
			kind: 'newtype_variant',
			...header(2, 'Named'),
			value: { kind: 'string', value: 'teal' },
		});
		expect(format.serialize({ variant: 'Hsl', value: { h: 200, s: 50, l: 40 } }, color)).toEqual({
			kind: 'struct_variant',
			...header(3, 'Hsl'),
			fields: [
				['h', { kind: 'u16', value: 200 }],
				['s', byte(50)],
				['l', byte(40)],
			],
		});
	});

	it('decodes every form', () => {
		const values: TypeOf<typeof color>[] = [
			{ variant: 'Red' },
			{ variant: 'Rgb', value: [1, 2, 3] },
			{ variant: 'Named', value: 'teal' },
			{ variant: 'Hsl', value: { h: 200, s: 50, l: 40 } },
		];

		for (const value of values) {
			expect(format.deserialize(format.serialize(value, color), color)).toEqual(value);
		}
	});

	it('rejects unknown variants', () => {
		const input: Value = { kind: 'unit_variant', ...header(9, 'Blue') };
		expect(() => format.deserialize(input, color)).toThrow(UnknownVariantError);
		expect(() => format.deserialize(input, color)).toThrow(
			'unknown variant `Blue`, expected one of `Red`, `Rgb`, `Named`, `Hsl`',
		);
	});

	it('rejects a payload of the wrong form', () => {
		const input: Value = { kind: 'unit_variant', ...header(1, 'Rgb') };
		expect(() => format.deserialize(input, color)).toThrow(InvalidTypeError);
		expect(() => format.deserialize(input, color)).toThrow(
			'unexpected shape: got unit variant, expected tuple variant',
		);
	});
});
