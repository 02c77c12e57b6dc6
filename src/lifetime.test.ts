/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { BorrowUnavailableError } from './errors';
import {
	acceptedFlavors,
	borrowed,
	deliverBytes,
	deliverStr,
	owned,
	transient,
} from './lifetime';
import { IVisitor } from './visitor';

describe('lifetime', () => {
	it('derives accepted flavors from the implemented methods', () => {
		expect(acceptedFlavors({ expecting: 'x', visitStr: () => 0 })).toEqual({
			str: ['transient', 'owned', 'borrowed'],
			bytes: [],
		});
		expect(acceptedFlavors({ expecting: 'x', visitBorrowedBytes: () => 0 })).toEqual({
			str: [],
			bytes: ['borrowed'],
		});
		expect(acceptedFlavors({ expecting: 'x', visitString: () => 0 })).toEqual({
			str: ['owned'],
			bytes: [],
		});
	});

	it('delivers each flavor to its own method', () => {
		const visitor: IVisitor<string> = {
			expecting: 'text',
			visitStr: value => `transient ${value}`,
			visitBorrowedStr: value => `borrowed ${value}`,
			visitString: value => `owned ${value}`,
		};

		expect(deliverStr(visitor, transient('a'))).toBe('transient a');
		expect(deliverStr(visitor, borrowed('b'))).toBe('borrowed b');
		expect(deliverStr(visitor, owned('c'))).toBe('owned c');
	});

	it('lets a transient-capable visitor take any flavor', () => {
		const visitBytes = jest.fn((value: Uint8Array) => value.length);
		const visitor: IVisitor<number> = { expecting: 'bytes', visitBytes };

		expect(deliverBytes(visitor, owned(new Uint8Array(1)))).toBe(1);
		expect(deliverBytes(visitor, borrowed(new Uint8Array(2)))).toBe(2);
		expect(visitBytes).toHaveBeenCalledTimes(2);
	});

	it('refuses to hand non-borrowed data to a borrow-only visitor', () => {
		const visitBorrowedStr = jest.fn((value: string) => value);
		const visitor: IVisitor<string> = { expecting: 'a borrowed string', visitBorrowedStr };

		expect(() => deliverStr(visitor, transient('a'))).toThrow(BorrowUnavailableError);
		expect(() => deliverStr(visitor, owned('a'))).toThrow(
			'cannot borrow string: input only offers owned data',
		);
		expect(visitBorrowedStr).not.toHaveBeenCalled();
		expect(deliverStr(visitor, borrowed('ok'))).toBe('ok');
	});
});
