/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { done } from './de';
import { InvalidTypeError } from './errors';
import { capabilities, expectation, IVisitor, Visit } from './visitor';

describe('Visit', () => {
	it('widens narrow integers to 64 bits', () => {
		const visitU64 = jest.fn((value: bigint) => value);
		const visitI64 = jest.fn((value: bigint) => value);
		const visitor: IVisitor<bigint> = { expecting: 'an integer', visitU64, visitI64 };

		expect(Visit.u8(visitor, 5)).toBe(5n);
		expect(Visit.u32(visitor, 70000)).toBe(70000n);
		expect(Visit.i16(visitor, -3)).toBe(-3n);
		expect(visitU64).toHaveBeenCalledTimes(2);
		expect(visitI64).toHaveBeenCalledTimes(1);
	});

	it('prefers the exact method when implemented', () => {
		const visitU8 = jest.fn((value: number) => value);
		const visitU64 = jest.fn((value: bigint) => Number(value));
		const visitor: IVisitor<number> = { expecting: 'a byte', visitU8, visitU64 };

		expect(Visit.u8(visitor, 9)).toBe(9);
		expect(visitU8).toHaveBeenCalledTimes(1);
		expect(visitU64).not.toHaveBeenCalled();
	});

	it('widens f32 to f64 and char to string', () => {
		const visitor: IVisitor<string> = {
			expecting: 'text',
			visitF64: value => `f64 ${value}`,
			visitStr: value => `str ${value}`,
		};

		expect(Visit.f32(visitor, 0.5)).toBe('f64 0.5');
		expect(Visit.char(visitor, 'x')).toBe('str x');
	});

	it('falls back from borrowed and owned strings and bytes', () => {
		const visitor: IVisitor<string> = {
			expecting: 'text',
			visitStr: value => `transient ${value}`,
			visitString: value => `owned ${value}`,
			visitBytes: value => `bytes ${value.length}`,
		};

		expect(Visit.borrowedStr(visitor, 'a')).toBe('transient a');
		expect(Visit.ownedStr(visitor, 'b')).toBe('owned b');
		expect(Visit.borrowedBytes(visitor, new Uint8Array(2))).toBe('bytes 2');
		expect(Visit.byteBuf(visitor, new Uint8Array(3))).toBe('bytes 3');
	});

	it('fails with the shape offered and the capabilities declared', () => {
		const visitor: IVisitor<bigint> = { expecting: 'a counter', visitU64: value => value };

		expect(() => Visit.i8(visitor, 5)).toThrow(InvalidTypeError);
		expect(() => Visit.i8(visitor, 5)).toThrow(
			'unexpected shape: got i8 `5`, expected one of {u64} (a counter)',
		);
		expect(() => Visit.seq(visitor, { sizeHint: 0, nextElement: () => done })).toThrow(
			'unexpected shape: got seq, expected one of {u64} (a counter)',
		);
	});

	it('reports an empty capability set', () => {
		const visitor: IVisitor<void> = { expecting: 'nothing useful' };
		expect(() => Visit.none(visitor)).toThrow(
			'unexpected shape: got option `none`, expected nothing (nothing useful)',
		);
	});
});

describe('capabilities', () => {
	it('lists each shape once, in registry order', () => {
		const visitor: IVisitor<number> = {
			expecting: 'x',
			visitSome: () => 1,
			visitBool: () => 0,
			visitNone: () => 2,
			visitMap: () => 3,
		};

		expect(capabilities(visitor)).toEqual(['bool', 'option', 'map']);
		expect(expectation(visitor)).toBe('one of {bool, option, map} (x)');
	});
});
