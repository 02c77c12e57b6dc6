/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { EndOfInputError } from './errors';
import { SliceReader, StreamReader } from './reader';

describe('SliceReader', () => {
	it('lends views into the input', () => {
		const input = Uint8Array.of(1, 2, 3, 4);
		const reader = new SliceReader(input);

		expect(reader.readByte('u8')).toBe(1);
		const extracted = reader.readBytes(2, 'bytes');
		expect(extracted.flavor).toBe('borrowed');
		expect([...extracted.value]).toEqual([2, 3]);

		input[1] = 9;
		expect(extracted.value[0]).toBe(9);
		expect(reader.offset).toBe(3);
		expect(reader.isEnd()).toBe(false);
	});

	it('copies when borrowing is off', () => {
		const input = Uint8Array.of(1, 2, 3);
		const reader = new SliceReader(input, { borrow: false });

		const extracted = reader.readBytes(2, 'bytes');
		expect(extracted.flavor).toBe('owned');
		input[0] = 7;
		expect([...extracted.value]).toEqual([1, 2]);
	});

	it('fails at the end of input with the offset', () => {
		const reader = new SliceReader(Uint8Array.of(1));
		reader.readByte('u8');

		expect(() => reader.readBytes(10, 'string')).toThrow(EndOfInputError);
		expect(() => reader.readBytes(10, 'string')).toThrow(
			'unexpected end of input while reading string at offset 1',
		);
		expect(reader.isEnd()).toBe(true);
	});
});

describe('StreamReader', () => {
	it('reads across chunk boundaries', () => {
		const reader = new StreamReader([Uint8Array.of(1, 2), Uint8Array.of(3), Uint8Array.of(4, 5)]);

		const first = reader.readBytes(4, 'bytes');
		expect(first.flavor).toBe('transient');
		expect([...first.value]).toEqual([1, 2, 3, 4]);
		expect(reader.offset).toBe(4);

		expect(reader.readByte('u8')).toBe(5);
		expect(reader.isEnd()).toBe(true);
		expect(() => reader.readByte('u8')).toThrow(
			'unexpected end of input while reading u8 at offset 5',
		);
	});

	it('reuses its scratch buffer between reads', () => {
		const reader = new StreamReader([Uint8Array.of(1, 2, 3, 4)]);

		const first = reader.readBytes(2, 'bytes');
		reader.readBytes(2, 'bytes');
		expect([...first.value]).toEqual([3, 4]);
	});

	it('skips empty chunks', () => {
		const reader = new StreamReader([new Uint8Array(0), Uint8Array.of(8), new Uint8Array(0)]);
		expect(reader.readByte('u8')).toBe(8);
		expect(reader.isEnd()).toBe(true);
	});

	it('reads chunks that are views into a shared buffer', () => {
		const backing = new Uint8Array(new ArrayBuffer(6));
		backing.set([0, 1, 2, 3, 4, 5]);
		const chunks: Uint8Array[] = [backing.subarray(1, 3), backing.subarray(3, 6)];
		const reader = new StreamReader(chunks);

		expect(reader.readByte('u8')).toBe(1);
		expect([...reader.readBytes(3, 'bytes').value]).toEqual([2, 3, 4]);
		expect(reader.readByte('u8')).toBe(5);
		expect(reader.isEnd()).toBe(true);
	});
});
