/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { SerializationError, SerializationFailure } from './errors';
import type {
	ISerialize,
	ISerializeMap,
	ISerializer,
	ISerializeSeq,
	ISerializeStruct,
} from './ser';

/**
 * Every shape of the data model, in registry order.
 */
export const SHAPE_KINDS = [
	'bool',
	'i8',
	'i16',
	'i32',
	'i64',
	'i128',
	'u8',
	'u16',
	'u32',
	'u64',
	'u128',
	'f32',
	'f64',
	'char',
	'string',
	'bytes',
	'option',
	'unit',
	'unit_struct',
	'unit_variant',
	'newtype_struct',
	'newtype_variant',
	'seq',
	'map',
	'tuple',
	'tuple_struct',
	'tuple_variant',
	'struct',
	'struct_variant',
] as const;

export type ShapeKind = (typeof SHAPE_KINDS)[number];

export type IntegerKind = SmallIntegerKind | WideIntegerKind;

/** Integers that are carried as a `number`. */
export type SmallIntegerKind = 'i8' | 'i16' | 'i32' | 'u8' | 'u16' | 'u32';

/** Integers that are carried as a `bigint`. */
export type WideIntegerKind = 'i64' | 'i128' | 'u64' | 'u128';

export type PrimitiveKind = IntegerKind | 'bool' | 'f32' | 'f64' | 'char';

interface IVariantInfo {
	name: string;
	variantIndex: number;
	variant: string;
}

/**
 * A shape together with the metadata the mapping logic declared for it.
 */
export type Shape =
	| { kind: PrimitiveKind | 'string' | 'bytes' | 'option' | 'unit' }
	| { kind: 'unit_struct'; name: string }
	| ({ kind: 'unit_variant' } & IVariantInfo)
	| { kind: 'newtype_struct'; name: string }
	| ({ kind: 'newtype_variant' } & IVariantInfo)
	| { kind: 'seq'; len: number | undefined }
	| { kind: 'map'; len: number | undefined }
	| { kind: 'tuple'; len: number }
	| { kind: 'tuple_struct'; name: string; len: number }
	| ({ kind: 'tuple_variant'; len: number } & IVariantInfo)
	| { kind: 'struct'; name: string; fields: readonly string[] }
	| ({ kind: 'struct_variant'; fields: readonly string[] } & IVariantInfo);

export const enum ShapeGroup {
	Primitive = 'primitive',
	Text = 'text',
	Binary = 'binary',
	Optional = 'optional',
	Empty = 'empty',
	Wrapper = 'wrapper',
	VariableSequence = 'variable-sequence',
	FixedSequence = 'fixed-sequence',
	FixedKeyValue = 'fixed-key-value',
}

export function shapeGroup(kind: ShapeKind): ShapeGroup {
	switch (kind) {
		case 'string':
			return ShapeGroup.Text;
		case 'bytes':
			return ShapeGroup.Binary;
		case 'option':
			return ShapeGroup.Optional;
		case 'unit':
		case 'unit_struct':
		case 'unit_variant':
			return ShapeGroup.Empty;
		case 'newtype_struct':
		case 'newtype_variant':
			return ShapeGroup.Wrapper;
		case 'seq':
		case 'map':
			return ShapeGroup.VariableSequence;
		case 'tuple':
		case 'tuple_struct':
		case 'tuple_variant':
			return ShapeGroup.FixedSequence;
		case 'struct':
		case 'struct_variant':
			return ShapeGroup.FixedKeyValue;
		default:
			return ShapeGroup.Primitive;
	}
}

/**
 * Whether the shape's length is known statically, before any serialized data
 * is inspected.
 */
export function isFixedLength(kind: ShapeKind) {
	const group = shapeGroup(kind);
	return group === ShapeGroup.FixedSequence || group === ShapeGroup.FixedKeyValue;
}

/**
 * Inclusive bounds of each integer shape.
 */
export const INTEGER_BOUNDS: { readonly [K in IntegerKind]: readonly [bigint, bigint] } = {
	i8: [-(2n ** 7n), 2n ** 7n - 1n],
	i16: [-(2n ** 15n), 2n ** 15n - 1n],
	i32: [-(2n ** 31n), 2n ** 31n - 1n],
	i64: [-(2n ** 63n), 2n ** 63n - 1n],
	i128: [-(2n ** 127n), 2n ** 127n - 1n],
	u8: [0n, 2n ** 8n - 1n],
	u16: [0n, 2n ** 16n - 1n],
	u32: [0n, 2n ** 32n - 1n],
	u64: [0n, 2n ** 64n - 1n],
	u128: [0n, 2n ** 128n - 1n],
};

/**
 * @returns whether the value is an integer that fits the given shape
 */
export function fitsInteger(kind: IntegerKind, value: number | bigint) {
	if (typeof value === 'number' && !Number.isInteger(value)) {
		return false;
	}

	const [min, max] = INTEGER_BOUNDS[kind];
	const big = BigInt(value);
	return big >= min && big <= max;
}

/**
 * Checks an integer handed to a producer, throwing if it does not fit.
 */
export function checkInteger(kind: IntegerKind, value: number | bigint) {
	if (!fitsInteger(kind, value)) {
		throw new SerializationError(
			`${String(value)} is out of range for ${kind}`,
			SerializationFailure.OutOfRange,
		);
	}
}

/**
 * @returns whether the string holds exactly one Unicode scalar value
 */
export function isChar(value: string) {
	if (value.length === 0 || value.length > 2) {
		return false;
	}

	const code = value.codePointAt(0);
	return (
		code !== undefined &&
		String.fromCodePoint(code).length === value.length &&
		!(code >= 0xd800 && code <= 0xdfff)
	);
}

/**
 * Checks a character handed to a producer, throwing if it is not exactly one
 * Unicode scalar value.
 */
export function checkChar(value: string) {
	if (!isChar(value)) {
		throw new SerializationError(
			`${JSON.stringify(value)} is not a single character`,
			SerializationFailure.OutOfRange,
		);
	}
}

const primitive =
	(kind: PrimitiveKind | 'string' | 'bytes' | 'option' | 'unit') =>
	(): Shape => ({ kind });

class ClassifiedSeq implements ISerializeSeq<Shape> {
	constructor(private readonly shape: Shape) {}

	serializeElement() {
		// classification ignores elements
	}

	end() {
		return this.shape;
	}
}

class ClassifiedMap implements ISerializeMap<Shape> {
	constructor(private readonly shape: Shape) {}

	serializeKey() {
		// classification ignores entries
	}

	serializeValue() {
		// classification ignores entries
	}

	serializeEntry() {
		// classification ignores entries
	}

	end() {
		return this.shape;
	}
}

class ClassifiedStruct implements ISerializeStruct<Shape> {
	private readonly fields: string[] = [];

	constructor(private readonly build: (fields: readonly string[]) => Shape) {}

	serializeField(key: string) {
		this.fields.push(key);
	}

	skipField(key: string) {
		this.fields.push(key);
	}

	end() {
		return this.build(this.fields);
	}
}

/**
 * Producer that writes nothing and returns the shape of the first operation
 * the mapping logic invokes.
 */
class ClassifyingSerializer implements ISerializer<Shape> {
	public readonly isHumanReadable = false;

	serializeBool = primitive('bool');
	serializeI8 = primitive('i8');
	serializeI16 = primitive('i16');
	serializeI32 = primitive('i32');
	serializeI64 = primitive('i64');
	serializeI128 = primitive('i128');
	serializeU8 = primitive('u8');
	serializeU16 = primitive('u16');
	serializeU32 = primitive('u32');
	serializeU64 = primitive('u64');
	serializeU128 = primitive('u128');
	serializeF32 = primitive('f32');
	serializeF64 = primitive('f64');
	serializeChar = primitive('char');
	serializeStr = primitive('string');
	serializeBytes = primitive('bytes');
	serializeNone = primitive('option');
	serializeSome = primitive('option');
	serializeUnit = primitive('unit');

	serializeUnitStruct(name: string): Shape {
		return { kind: 'unit_struct', name };
	}

	serializeUnitVariant(name: string, variantIndex: number, variant: string): Shape {
		return { kind: 'unit_variant', name, variantIndex, variant };
	}

	serializeNewtypeStruct(name: string): Shape {
		return { kind: 'newtype_struct', name };
	}

	serializeNewtypeVariant(name: string, variantIndex: number, variant: string): Shape {
		return { kind: 'newtype_variant', name, variantIndex, variant };
	}

	serializeSeq(len: number | undefined) {
		return new ClassifiedSeq({ kind: 'seq', len });
	}

	serializeTuple(len: number) {
		return new ClassifiedSeq({ kind: 'tuple', len });
	}

	serializeTupleStruct(name: string, len: number) {
		return new ClassifiedSeq({ kind: 'tuple_struct', name, len });
	}

	serializeTupleVariant(name: string, variantIndex: number, variant: string, len: number) {
		return new ClassifiedSeq({ kind: 'tuple_variant', name, variantIndex, variant, len });
	}

	serializeMap(len: number | undefined) {
		return new ClassifiedMap({ kind: 'map', len });
	}

	serializeStruct(name: string) {
		return new ClassifiedStruct(fields => ({ kind: 'struct', name, fields }));
	}

	serializeStructVariant(name: string, variantIndex: number, variant: string) {
		return new ClassifiedStruct(fields => ({
			kind: 'struct_variant',
			name,
			variantIndex,
			variant,
			fields,
		}));
	}
}

const classifier = new ClassifyingSerializer();

/**
 * Classifies a value through its mapping logic: returns the single shape it
 * maps to, with the metadata the mapping declared. Nothing is written, and
 * nested values are not visited.
 */
export function shapeOf<T>(value: T, mapping: ISerialize<T>): Shape {
	return mapping.serialize(value, classifier);
}
