/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { IDeserializer } from '../de';
import { InvalidValueError } from '../errors';
import { fitsInteger, IntegerKind, isChar, SmallIntegerKind, WideIntegerKind } from '../model';
import { ISerializer } from '../ser';
import { IVisitor } from '../visitor';
import { IMapping } from './types';

const integerVisitor = <T>(kind: IntegerKind, convert: (value: bigint) => T): IVisitor<T> => {
	const expecting = `a ${kind} integer`;
	const check = (value: bigint) => {
		if (!fitsInteger(kind, value)) {
			throw new InvalidValueError(`integer \`${value}\``, expecting);
		}

		return convert(value);
	};

	// narrower integers reach these through the default widening
	return { expecting, visitI64: check, visitI128: check, visitU64: check, visitU128: check };
};

const smallInteger = (
	kind: SmallIntegerKind,
	write: <Ok>(serializer: ISerializer<Ok>, value: number) => Ok,
	read: <T>(deserializer: IDeserializer, visitor: IVisitor<T>) => T,
): IMapping<number> => {
	const visitor = integerVisitor(kind, Number);
	return {
		serialize: (value, serializer) => write(serializer, value),
		deserialize: deserializer => read(deserializer, visitor),
	};
};

const wideInteger = (
	kind: WideIntegerKind,
	write: <Ok>(serializer: ISerializer<Ok>, value: bigint) => Ok,
	read: <T>(deserializer: IDeserializer, visitor: IVisitor<T>) => T,
): IMapping<bigint> => {
	const visitor = integerVisitor(kind, value => value);
	return {
		serialize: (value, serializer) => write(serializer, value),
		deserialize: deserializer => read(deserializer, visitor),
	};
};

export const i8 = smallInteger(
	'i8',
	(s, v) => s.serializeI8(v),
	(d, v) => d.deserializeI8(v),
);
export const i16 = smallInteger(
	'i16',
	(s, v) => s.serializeI16(v),
	(d, v) => d.deserializeI16(v),
);
export const i32 = smallInteger(
	'i32',
	(s, v) => s.serializeI32(v),
	(d, v) => d.deserializeI32(v),
);
export const u8 = smallInteger(
	'u8',
	(s, v) => s.serializeU8(v),
	(d, v) => d.deserializeU8(v),
);
export const u16 = smallInteger(
	'u16',
	(s, v) => s.serializeU16(v),
	(d, v) => d.deserializeU16(v),
);
export const u32 = smallInteger(
	'u32',
	(s, v) => s.serializeU32(v),
	(d, v) => d.deserializeU32(v),
);
export const i64 = wideInteger(
	'i64',
	(s, v) => s.serializeI64(v),
	(d, v) => d.deserializeI64(v),
);
export const i128 = wideInteger(
	'i128',
	(s, v) => s.serializeI128(v),
	(d, v) => d.deserializeI128(v),
);
export const u64 = wideInteger(
	'u64',
	(s, v) => s.serializeU64(v),
	(d, v) => d.deserializeU64(v),
);
export const u128 = wideInteger(
	'u128',
	(s, v) => s.serializeU128(v),
	(d, v) => d.deserializeU128(v),
);

const floatVisitor = (expecting: string, convert: (value: number) => number): IVisitor<number> => {
	const fromInteger = (value: bigint) => convert(Number(value));
	return {
		expecting,
		visitF64: convert,
		visitI64: fromInteger,
		visitI128: fromInteger,
		visitU64: fromInteger,
		visitU128: fromInteger,
	};
};

const f32Visitor = floatVisitor('an f32', Math.fround);
const f64Visitor = floatVisitor('an f64', value => value);

export const f32: IMapping<number> = {
	serialize: (value, serializer) => serializer.serializeF32(value),
	deserialize: deserializer => deserializer.deserializeF32(f32Visitor),
};

export const f64: IMapping<number> = {
	serialize: (value, serializer) => serializer.serializeF64(value),
	deserialize: deserializer => deserializer.deserializeF64(f64Visitor),
};

const boolVisitor: IVisitor<boolean> = {
	expecting: 'a boolean',
	visitBool: value => value,
};

export const bool: IMapping<boolean> = {
	serialize: (value, serializer) => serializer.serializeBool(value),
	deserialize: deserializer => deserializer.deserializeBool(boolVisitor),
};

const charVisitor: IVisitor<string> = {
	expecting: 'a character',
	visitChar: value => value,
	visitStr(value) {
		if (!isChar(value)) {
			throw new InvalidValueError(`string ${JSON.stringify(value)}`, this.expecting);
		}

		return value;
	},
};

export const char: IMapping<string> = {
	serialize: (value, serializer) => serializer.serializeChar(value),
	deserialize: deserializer => deserializer.deserializeChar(charVisitor),
};

// every flavor falls back to visitStr, and strings are immutable, so no copy
const stringVisitor: IVisitor<string> = {
	expecting: 'a string',
	visitStr: value => value,
};

export const string: IMapping<string> = {
	serialize: (value, serializer) => serializer.serializeStr(value),
	deserialize: deserializer => deserializer.deserializeString(stringVisitor),
};

const byteBufVisitor: IVisitor<Uint8Array> = {
	expecting: 'a byte array',
	visitBytes: value => value.slice(),
	visitBorrowedBytes: value => value.slice(),
	visitByteBuf: value => value,
	visitSeq(seq) {
		const out: number[] = [];
		for (let n = seq.nextElement(u8); !n.done; n = seq.nextElement(u8)) {
			out.push(n.value);
		}

		return Uint8Array.from(out);
	},
};

/**
 * Byte arrays the caller owns. Transient and borrowed input is copied.
 */
export const bytes: IMapping<Uint8Array> = {
	serialize: (value, serializer) => serializer.serializeBytes(value),
	deserialize: deserializer => deserializer.deserializeByteBuf(byteBufVisitor),
};

const borrowedBytesVisitor: IVisitor<Uint8Array> = {
	expecting: 'borrowed bytes',
	visitBorrowedBytes: value => value,
};

/**
 * Zero-copy byte arrays: views into the input buffer. Decoding fails if the
 * consumer cannot borrow, such as when reading from a stream. The input must
 * not be modified while the decoded views are in use.
 */
export const borrowedBytes: IMapping<Uint8Array> = {
	serialize: bytes.serialize,
	deserialize: deserializer => deserializer.deserializeBytes(borrowedBytesVisitor),
};

const unitVisitor: IVisitor<undefined> = {
	expecting: 'unit',
	visitUnit: () => undefined,
};

export const unit: IMapping<undefined> = {
	serialize: (_value, serializer) => serializer.serializeUnit(),
	deserialize: deserializer => deserializer.deserializeUnit(unitVisitor),
};
