/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

/**
 * Base error extended by other error types.
 */
export class SerdeError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * Reasons a producer may fail to write a value.
 */
export const enum SerializationFailure {
	/** The format has no representation for the value or shape. */
	Unsupported = 'unsupported',
	/** A primitive was outside the range of its declared shape. */
	OutOfRange = 'out-of-range',
	/** A session wrote a different number of elements than it declared. */
	LengthMismatch = 'length-mismatch',
	/** The format only allows string-like map keys. */
	KeyMustBeString = 'key-must-be-string',
	/** Raised by mapping logic. */
	Custom = 'custom',
}

/**
 * Producer failure: the target format cannot represent the value, or the
 * calls made on the producer were out of order.
 */
export class SerializationError extends SerdeError {
	constructor(
		message: string,
		public readonly reason: SerializationFailure = SerializationFailure.Custom,
	) {
		super(message);
	}
}

/**
 * Distinguishes input that could not be read ("bad bytes") from input that
 * was read fine but names something the visitor does not recognise.
 */
export type DeserializationCategory = 'syntax' | 'semantic';

/**
 * Consumer failure. The offset is the input position where decoding stopped,
 * filled in by the format that knows it.
 */
export class DeserializationError extends SerdeError {
	public readonly category: DeserializationCategory = 'syntax';
	public offset?: number;
	public expected?: string;
	private readonly detail: string;

	constructor(detail: string, options: { offset?: number; expected?: string } = {}) {
		super(detail);
		this.detail = detail;
		this.offset = options.offset;
		this.expected = options.expected;
		this.message = this.format();
	}

	/** Message without position information. */
	public get reason() {
		return this.detail;
	}

	/** @hidden */
	public format() {
		return this.offset === undefined ? this.detail : `${this.detail} at offset ${this.offset}`;
	}
}

/**
 * Updates the position of a deserialization error raised below a format that
 * knows where in the input it is. Errors that already carry a position are
 * left alone, so the innermost position wins.
 * @hidden
 */
export function setErrorPosition(error: DeserializationError, offset: number) {
	if (error.offset === undefined) {
		error.offset = offset;
		error.message = error.format();
	}

	return error;
}

export class EndOfInputError extends DeserializationError {
	constructor(expected: string, offset?: number) {
		super(`unexpected end of input while reading ${expected}`, { offset, expected });
	}
}

export class MalformedInputError extends DeserializationError {}

export class TrailingInputError extends DeserializationError {
	constructor(offset: number) {
		super('trailing input after value', { offset });
	}
}

export class RecursionLimitError extends DeserializationError {
	constructor(limit: number, offset?: number) {
		super(`recursion limit of ${limit} exceeded`, { offset });
	}
}

/**
 * Input carried a valid shape, but not one the visitor declared.
 */
export class InvalidTypeError extends DeserializationError {
	public override readonly category = 'semantic';

	constructor(public readonly unexpected: string, expected: string) {
		super(`unexpected shape: got ${unexpected}, expected ${expected}`, { expected });
	}
}

/**
 * Input carried the right shape, but a value the visitor cannot hold.
 */
export class InvalidValueError extends DeserializationError {
	public override readonly category = 'semantic';

	constructor(unexpected: string, expected: string) {
		super(`invalid value: ${unexpected}, expected ${expected}`, { expected });
	}
}

/**
 * A sequence or map held more or fewer entries than were expected.
 */
export class InvalidLengthError extends DeserializationError {
	public override readonly category = 'semantic';

	constructor(public readonly actual: number, expected: string) {
		super(`invalid length ${actual}, expected ${expected}`, { expected });
	}
}

export class UnknownVariantError extends DeserializationError {
	public override readonly category = 'semantic';

	constructor(public readonly variant: string, expected: readonly string[]) {
		super(`unknown variant \`${variant}\`, expected ${oneOf(expected)}`, {
			expected: oneOf(expected),
		});
	}
}

export class UnknownFieldError extends DeserializationError {
	public override readonly category = 'semantic';

	constructor(public readonly field: string, expected: readonly string[]) {
		super(`unknown field \`${field}\`, expected ${oneOf(expected)}`, {
			expected: oneOf(expected),
		});
	}
}

export class MissingFieldError extends DeserializationError {
	public override readonly category = 'semantic';

	constructor(public readonly field: string) {
		super(`missing field \`${field}\``, { expected: field });
	}
}

export class DuplicateFieldError extends DeserializationError {
	public override readonly category = 'semantic';

	constructor(public readonly field: string) {
		super(`duplicate field \`${field}\``, { expected: field });
	}
}

/**
 * The visitor only accepts data borrowed from the input, and the reader
 * could not supply it.
 */
export class BorrowUnavailableError extends DeserializationError {
	public override readonly category = 'semantic';

	constructor(offered: string, expected: string) {
		super(`cannot borrow ${expected}: input only offers ${offered} data`, { expected });
	}
}

const oneOf = (names: readonly string[]) => {
	if (names.length === 0) {
		return 'nothing';
	}

	return names.length === 1
		? `\`${names[0]}\``
		: `one of ${names.map(n => `\`${n}\``).join(', ')}`;
};
