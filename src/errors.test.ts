/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import {
	DeserializationError,
	InvalidTypeError,
	MissingFieldError,
	SerdeError,
	SerializationError,
	SerializationFailure,
	setErrorPosition,
	UnknownFieldError,
	UnknownVariantError,
} from './errors';

describe('errors', () => {
	it('names errors after their class', () => {
		const err = new MissingFieldError('id');
		expect(err.name).toBe('MissingFieldError');
		expect(err).toBeInstanceOf(DeserializationError);
		expect(err).toBeInstanceOf(SerdeError);
		expect(err.message).toBe('missing field `id`');
	});

	it('defaults serialization failures to custom', () => {
		expect(new SerializationError('nope').reason).toBe(SerializationFailure.Custom);
		expect(new SerializationError('big', SerializationFailure.OutOfRange).reason).toBe(
			'out-of-range',
		);
	});

	it('includes the offset in the message', () => {
		const err = new DeserializationError('bad byte', { offset: 3 });
		expect(err.message).toBe('bad byte at offset 3');
		expect(err.reason).toBe('bad byte');
		expect(err.category).toBe('syntax');
	});

	it('fills in a missing position once', () => {
		const err = new InvalidTypeError('bool', 'a string');
		expect(err.category).toBe('semantic');
		expect(err.message).toBe('unexpected shape: got bool, expected a string');

		setErrorPosition(err, 7);
		setErrorPosition(err, 9);
		expect(err.offset).toBe(7);
		expect(err.message).toBe('unexpected shape: got bool, expected a string at offset 7');
	});

	it('lists the expected names', () => {
		expect(new UnknownFieldError('z', ['x', 'y']).message).toBe(
			'unknown field `z`, expected one of `x`, `y`',
		);
		expect(new UnknownVariantError('C', ['A']).message).toBe('unknown variant `C`, expected `A`');
		expect(new UnknownVariantError('C', []).message).toBe('unknown variant `C`, expected nothing');
	});
});
