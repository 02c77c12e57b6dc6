/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import {
	done,
	IDeserialize,
	IEnumAccess,
	IMapAccess,
	ISeqAccess,
	IVariantAccess,
	IVariantHint,
	next,
	Next,
	SelfDescribingDeserializer,
} from '../de';
import {
	DeserializationError,
	InvalidLengthError,
	InvalidTypeError,
	RecursionLimitError,
	SerializationError,
} from '../errors';
import { borrowed, deliverBytes, deliverStr } from '../lifetime';
import { string } from '../mapping/primitives';
import { IMapping } from '../mapping/types';
import { checkChar, checkInteger, SmallIntegerKind, WideIntegerKind } from '../model';
import {
	checkSessionLength,
	ISerialize,
	ISerializeMap,
	ISerializer,
	ISerializeSeq,
	ISerializeStruct,
} from '../ser';
import { IVisitor, Visit } from '../visitor';
import type { IFormat } from '.';

interface IVariantHeader {
	name: string;
	variantIndex: number;
	variant: string;
}

/**
 * A decoded value of any shape, keeping the metadata its shape carries. This
 * is the in-memory self-describing format: a tree can always be decoded
 * without knowing its shape in advance.
 */
export type Value =
	| { kind: 'bool'; value: boolean }
	| { kind: SmallIntegerKind | 'f32' | 'f64'; value: number }
	| { kind: WideIntegerKind; value: bigint }
	| { kind: 'char'; value: string }
	| { kind: 'string'; value: string }
	| { kind: 'bytes'; value: Uint8Array }
	| { kind: 'option'; value: Value | undefined }
	| { kind: 'unit' }
	| { kind: 'unit_struct'; name: string }
	| ({ kind: 'unit_variant' } & IVariantHeader)
	| { kind: 'newtype_struct'; name: string; value: Value }
	| ({ kind: 'newtype_variant'; value: Value } & IVariantHeader)
	| { kind: 'seq'; elements: Value[] }
	| { kind: 'map'; entries: [Value, Value][] }
	| { kind: 'tuple'; elements: Value[] }
	| { kind: 'tuple_struct'; name: string; elements: Value[] }
	| ({ kind: 'tuple_variant'; elements: Value[] } & IVariantHeader)
	| { kind: 'struct'; name: string; fields: [string, Value][] }
	| ({ kind: 'struct_variant'; fields: [string, Value][] } & IVariantHeader);

type ValueOf<K extends Value['kind']> = Extract<Value, { kind: K }>;

type VariantValue = ValueOf<
	'unit_variant' | 'newtype_variant' | 'tuple_variant' | 'struct_variant'
>;

export interface IValueOptions {
	/**
	 * Deepest nesting the deserializer descends into. Defaults to 128.
	 */
	maxDepth?: number;
}

const defaultOptions: Required<IValueOptions> = { maxDepth: 128 };

class ValueSeqSession implements ISerializeSeq<Value> {
	private readonly elements: Value[] = [];

	constructor(
		private readonly serializer: ValueSerializer,
		private readonly len: number | undefined,
		private readonly build: (elements: Value[]) => Value,
	) {}

	serializeElement<T>(value: T, mapping: ISerialize<T>) {
		this.elements.push(mapping.serialize(value, this.serializer));
	}

	end() {
		checkSessionLength(this.len, this.elements.length, 'sequence');
		return this.build(this.elements);
	}
}

class ValueMapSession implements ISerializeMap<Value> {
	private readonly entries: [Value, Value][] = [];
	private pendingKey?: Value;

	constructor(
		private readonly serializer: ValueSerializer,
		private readonly len: number | undefined,
	) {}

	serializeKey<K>(key: K, mapping: ISerialize<K>) {
		if (this.pendingKey) {
			throw new SerializationError('map key written twice without a value');
		}

		this.pendingKey = mapping.serialize(key, this.serializer);
	}

	serializeValue<V>(value: V, mapping: ISerialize<V>) {
		const key = this.pendingKey;
		if (!key) {
			throw new SerializationError('map value written before its key');
		}

		this.pendingKey = undefined;
		this.entries.push([key, mapping.serialize(value, this.serializer)]);
	}

	serializeEntry<K, V>(key: K, keyMapping: ISerialize<K>, value: V, valueMapping: ISerialize<V>) {
		this.serializeKey(key, keyMapping);
		this.serializeValue(value, valueMapping);
	}

	end(): Value {
		if (this.pendingKey) {
			throw new SerializationError('map ended with a key that has no value');
		}

		checkSessionLength(this.len, this.entries.length, 'map');
		return { kind: 'map', entries: this.entries };
	}
}

class ValueStructSession implements ISerializeStruct<Value> {
	private readonly fields: [string, Value][] = [];
	private skipped = 0;

	constructor(
		private readonly serializer: ValueSerializer,
		private readonly len: number,
		private readonly build: (fields: [string, Value][]) => Value,
	) {}

	serializeField<T>(key: string, value: T, mapping: ISerialize<T>) {
		this.fields.push([key, mapping.serialize(value, this.serializer)]);
	}

	skipField() {
		this.skipped++;
	}

	end() {
		checkSessionLength(this.len, this.fields.length + this.skipped, 'struct');
		return this.build(this.fields);
	}
}

/**
 * Producer that builds a `Value` tree.
 */
export class ValueSerializer implements ISerializer<Value> {
	public readonly isHumanReadable = false;

	serializeBool(value: boolean): Value {
		return { kind: 'bool', value };
	}

	serializeI8(value: number) {
		return this.small('i8', value);
	}

	serializeI16(value: number) {
		return this.small('i16', value);
	}

	serializeI32(value: number) {
		return this.small('i32', value);
	}

	serializeI64(value: bigint) {
		return this.wide('i64', value);
	}

	serializeI128(value: bigint) {
		return this.wide('i128', value);
	}

	serializeU8(value: number) {
		return this.small('u8', value);
	}

	serializeU16(value: number) {
		return this.small('u16', value);
	}

	serializeU32(value: number) {
		return this.small('u32', value);
	}

	serializeU64(value: bigint) {
		return this.wide('u64', value);
	}

	serializeU128(value: bigint) {
		return this.wide('u128', value);
	}

	serializeF32(value: number): Value {
		return { kind: 'f32', value: Math.fround(value) };
	}

	serializeF64(value: number): Value {
		return { kind: 'f64', value };
	}

	serializeChar(value: string): Value {
		checkChar(value);
		return { kind: 'char', value };
	}

	serializeStr(value: string): Value {
		return { kind: 'string', value };
	}

	serializeBytes(value: Uint8Array): Value {
		return { kind: 'bytes', value: value.slice() };
	}

	serializeNone(): Value {
		return { kind: 'option', value: undefined };
	}

	serializeSome<T>(value: T, mapping: ISerialize<T>): Value {
		return { kind: 'option', value: mapping.serialize(value, this) };
	}

	serializeUnit(): Value {
		return { kind: 'unit' };
	}

	serializeUnitStruct(name: string): Value {
		return { kind: 'unit_struct', name };
	}

	serializeUnitVariant(name: string, variantIndex: number, variant: string): Value {
		return { kind: 'unit_variant', name, variantIndex, variant };
	}

	serializeNewtypeStruct<T>(name: string, value: T, mapping: ISerialize<T>): Value {
		return { kind: 'newtype_struct', name, value: mapping.serialize(value, this) };
	}

	serializeNewtypeVariant<T>(
		name: string,
		variantIndex: number,
		variant: string,
		value: T,
		mapping: ISerialize<T>,
	): Value {
		return {
			kind: 'newtype_variant',
			name,
			variantIndex,
			variant,
			value: mapping.serialize(value, this),
		};
	}

	serializeSeq(len: number | undefined) {
		return new ValueSeqSession(this, len, elements => ({ kind: 'seq', elements }));
	}

	serializeTuple(len: number) {
		return new ValueSeqSession(this, len, elements => ({ kind: 'tuple', elements }));
	}

	serializeTupleStruct(name: string, len: number) {
		return new ValueSeqSession(this, len, elements => ({ kind: 'tuple_struct', name, elements }));
	}

	serializeTupleVariant(name: string, variantIndex: number, variant: string, len: number) {
		return new ValueSeqSession(this, len, elements => ({
			kind: 'tuple_variant',
			name,
			variantIndex,
			variant,
			elements,
		}));
	}

	serializeMap(len: number | undefined) {
		return new ValueMapSession(this, len);
	}

	serializeStruct(name: string, len: number) {
		return new ValueStructSession(this, len, fields => ({ kind: 'struct', name, fields }));
	}

	serializeStructVariant(name: string, variantIndex: number, variant: string, len: number) {
		return new ValueStructSession(this, len, fields => ({
			kind: 'struct_variant',
			name,
			variantIndex,
			variant,
			fields,
		}));
	}

	private small(kind: SmallIntegerKind, value: number): Value {
		checkInteger(kind, value);
		return { kind, value };
	}

	private wide(kind: WideIntegerKind, value: bigint): Value {
		checkInteger(kind, value);
		return { kind, value };
	}
}

const isKind = <K extends Value['kind']>(value: Value, kinds: readonly K[]): value is ValueOf<K> =>
	kinds.some(kind => kind === value.kind);

const describeKind = (value: Value) => value.kind.replace('_', ' ');

class ValueSeqAccess implements ISeqAccess {
	private index = 0;

	public get sizeHint() {
		return this.elements.length - this.index;
	}

	constructor(private readonly parent: ValueDeserializer, private readonly elements: Value[]) {}

	nextElement<T>(seed: IDeserialize<T>): Next<T> {
		if (this.index >= this.elements.length) {
			return done;
		}

		return next(seed.deserialize(this.parent.child(this.elements[this.index++])));
	}

	finish() {
		if (this.index < this.elements.length) {
			throw new InvalidLengthError(this.elements.length, `${this.index} elements in sequence`);
		}
	}
}

class ValueMapAccess implements IMapAccess {
	private index = 0;
	private pendingValue?: Value;

	public get sizeHint() {
		return this.entries.length - this.index;
	}

	constructor(
		private readonly parent: ValueDeserializer,
		private readonly entries: [Value, Value][],
	) {}

	nextKey<K>(seed: IDeserialize<K>): Next<K> {
		if (this.pendingValue) {
			throw new DeserializationError('map key requested before the previous value was read');
		}

		if (this.index >= this.entries.length) {
			return done;
		}

		const [key, value] = this.entries[this.index++];
		this.pendingValue = value;
		return next(seed.deserialize(this.parent.child(key)));
	}

	nextValue<V>(seed: IDeserialize<V>): V {
		const value = this.pendingValue;
		if (!value) {
			throw new DeserializationError('map value requested before its key');
		}

		this.pendingValue = undefined;
		return seed.deserialize(this.parent.child(value));
	}

	finish() {
		if (this.index < this.entries.length || this.pendingValue) {
			throw new InvalidLengthError(this.entries.length, `${this.index} entries in map`);
		}
	}
}

class ValueEnumAccess implements IEnumAccess, IVariantAccess {
	constructor(private readonly parent: ValueDeserializer, private readonly value: VariantValue) {}

	public get hint(): IVariantHint {
		const { kind, name, variantIndex } = this.value;
		switch (this.value.kind) {
			case 'tuple_variant':
				return { kind, name, variantIndex, len: this.value.elements.length };
			case 'struct_variant':
				return { kind, name, variantIndex, len: this.value.fields.length };
			default:
				return { kind, name, variantIndex };
		}
	}

	variant<V>(seed: IDeserialize<V>): [V, IVariantAccess] {
		const tag = this.parent.child({ kind: 'string', value: this.value.variant });
		return [seed.deserialize(tag), this];
	}

	unitVariant() {
		this.expect('unit_variant');
	}

	newtypeVariant<T>(seed: IDeserialize<T>): T {
		return seed.deserialize(this.parent.child(this.expect('newtype_variant').value));
	}

	tupleVariant<T>(len: number, visitor: IVisitor<T>): T {
		return this.parent.visitElements(visitor, this.expect('tuple_variant').elements, len);
	}

	structVariant<T>(_fields: readonly string[], visitor: IVisitor<T>): T {
		return this.parent.visitFields(visitor, this.expect('struct_variant').fields);
	}

	private expect<K extends VariantValue['kind']>(kind: K): ValueOf<K> {
		if (isKind(this.value, [kind])) {
			return this.value;
		}

		throw new InvalidTypeError(describeKind(this.value), kind.replace('_', ' '));
	}
}

/**
 * Consumer that reads a `Value` tree. Typed entry operations check the
 * tree's shape and never substitute one shape for another: a `map` is not
 * accepted where a `struct` is expected. Strings and bytes are lent out of
 * the tree, which must stay unmodified while decoded values use them.
 */
export class ValueDeserializer extends SelfDescribingDeserializer {
	public readonly isHumanReadable = false;
	private readonly options: Required<IValueOptions>;

	constructor(
		public readonly value: Value,
		options: IValueOptions = {},
		private readonly depth = 0,
	) {
		super();
		this.options = { ...defaultOptions, ...options };
	}

	/**
	 * Creates the deserializer for a nested value.
	 * @hidden
	 */
	public child(value: Value) {
		if (this.depth >= this.options.maxDepth) {
			throw new RecursionLimitError(this.options.maxDepth);
		}

		return new ValueDeserializer(value, this.options, this.depth + 1);
	}

	deserializeAny<T>(visitor: IVisitor<T>): T {
		const v = this.value;
		switch (v.kind) {
			case 'bool':
				return Visit.bool(visitor, v.value);
			case 'i8':
				return Visit.i8(visitor, v.value);
			case 'i16':
				return Visit.i16(visitor, v.value);
			case 'i32':
				return Visit.i32(visitor, v.value);
			case 'i64':
				return Visit.i64(visitor, v.value);
			case 'i128':
				return Visit.i128(visitor, v.value);
			case 'u8':
				return Visit.u8(visitor, v.value);
			case 'u16':
				return Visit.u16(visitor, v.value);
			case 'u32':
				return Visit.u32(visitor, v.value);
			case 'u64':
				return Visit.u64(visitor, v.value);
			case 'u128':
				return Visit.u128(visitor, v.value);
			case 'f32':
				return Visit.f32(visitor, v.value);
			case 'f64':
				return Visit.f64(visitor, v.value);
			case 'char':
				return Visit.char(visitor, v.value);
			case 'string':
				return deliverStr(visitor, borrowed(v.value));
			case 'bytes':
				return deliverBytes(visitor, borrowed(v.value));
			case 'option':
				return v.value === undefined
					? Visit.none(visitor)
					: Visit.some(visitor, this.child(v.value));
			case 'unit':
			case 'unit_struct':
				return Visit.unit(visitor);
			case 'newtype_struct':
				return Visit.newtypeStruct(visitor, this.child(v.value));
			case 'seq':
			case 'tuple':
			case 'tuple_struct':
				return this.visitElements(visitor, v.elements);
			case 'map':
				return this.visitEntries(visitor, v.entries);
			case 'struct':
				return this.visitFields(visitor, v.fields);
			case 'unit_variant':
			case 'newtype_variant':
			case 'tuple_variant':
			case 'struct_variant':
				return Visit.enumeration(visitor, new ValueEnumAccess(this, v));
		}
	}

	deserializeStr<T>(visitor: IVisitor<T>): T {
		return deliverStr(visitor, borrowed(this.expect(['string'], 'a string').value));
	}

	deserializeString<T>(visitor: IVisitor<T>): T {
		return this.deserializeStr(visitor);
	}

	deserializeBytes<T>(visitor: IVisitor<T>): T {
		return deliverBytes(visitor, borrowed(this.expect(['bytes'], 'a byte array').value));
	}

	deserializeByteBuf<T>(visitor: IVisitor<T>): T {
		return this.deserializeBytes(visitor);
	}

	deserializeOption<T>(visitor: IVisitor<T>): T {
		this.expect(['option'], 'an option');
		return this.deserializeAny(visitor);
	}

	deserializeUnit<T>(visitor: IVisitor<T>): T {
		this.expect(['unit'], 'unit');
		return Visit.unit(visitor);
	}

	deserializeUnitStruct<T>(name: string, visitor: IVisitor<T>): T {
		this.expect(['unit_struct'], `unit struct ${name}`);
		return Visit.unit(visitor);
	}

	deserializeNewtypeStruct<T>(name: string, visitor: IVisitor<T>): T {
		const v = this.expect(['newtype_struct'], `newtype struct ${name}`);
		return Visit.newtypeStruct(visitor, this.child(v.value));
	}

	deserializeSeq<T>(visitor: IVisitor<T>): T {
		return this.visitElements(visitor, this.expect(['seq'], 'a sequence').elements);
	}

	deserializeTuple<T>(len: number, visitor: IVisitor<T>): T {
		return this.visitElements(visitor, this.expect(['tuple'], 'a tuple').elements, len);
	}

	deserializeTupleStruct<T>(name: string, len: number, visitor: IVisitor<T>): T {
		const v = this.expect(['tuple_struct'], `tuple struct ${name}`);
		return this.visitElements(visitor, v.elements, len);
	}

	deserializeMap<T>(visitor: IVisitor<T>): T {
		return this.visitEntries(visitor, this.expect(['map'], 'a map').entries);
	}

	deserializeStruct<T>(name: string, _fields: readonly string[], visitor: IVisitor<T>): T {
		return this.visitFields(visitor, this.expect(['struct'], `struct ${name}`).fields);
	}

	deserializeEnum<T>(name: string, _variants: readonly string[], visitor: IVisitor<T>): T {
		const v = this.expect(
			['unit_variant', 'newtype_variant', 'tuple_variant', 'struct_variant'],
			`enum ${name}`,
		);
		return Visit.enumeration(visitor, new ValueEnumAccess(this, v));
	}

	/** @hidden */
	public visitElements<T>(visitor: IVisitor<T>, elements: Value[], len?: number): T {
		if (len !== undefined && len !== elements.length) {
			throw new InvalidLengthError(elements.length, `${len} elements`);
		}

		const access = new ValueSeqAccess(this, elements);
		const result = Visit.seq(visitor, access);
		access.finish();
		return result;
	}

	/** @hidden */
	public visitFields<T>(visitor: IVisitor<T>, fields: [string, Value][]): T {
		return this.visitEntries(
			visitor,
			fields.map(([key, value]): [Value, Value] => [{ kind: 'string', value: key }, value]),
		);
	}

	private visitEntries<T>(visitor: IVisitor<T>, entries: [Value, Value][]): T {
		const access = new ValueMapAccess(this, entries);
		const result = Visit.map(visitor, access);
		access.finish();
		return result;
	}

	private expect<K extends Value['kind']>(kinds: readonly K[], expected: string): ValueOf<K> {
		if (isKind(this.value, kinds)) {
			return this.value;
		}

		throw new InvalidTypeError(describeKind(this.value), expected);
	}
}

const valueVisitor: IVisitor<Value> = {
	expecting: 'any value',
	visitBool: value => ({ kind: 'bool', value }),
	visitI8: value => ({ kind: 'i8', value }),
	visitI16: value => ({ kind: 'i16', value }),
	visitI32: value => ({ kind: 'i32', value }),
	visitI64: value => ({ kind: 'i64', value }),
	visitI128: value => ({ kind: 'i128', value }),
	visitU8: value => ({ kind: 'u8', value }),
	visitU16: value => ({ kind: 'u16', value }),
	visitU32: value => ({ kind: 'u32', value }),
	visitU64: value => ({ kind: 'u64', value }),
	visitU128: value => ({ kind: 'u128', value }),
	visitF32: value => ({ kind: 'f32', value }),
	visitF64: value => ({ kind: 'f64', value }),
	visitChar: value => ({ kind: 'char', value }),
	visitStr: value => ({ kind: 'string', value }),
	visitBytes: value => ({ kind: 'bytes', value: value.slice() }),
	visitByteBuf: value => ({ kind: 'bytes', value }),
	visitNone: () => ({ kind: 'option', value: undefined }),
	visitSome: deserializer => ({ kind: 'option', value: valueMapping.deserialize(deserializer) }),
	visitUnit: () => ({ kind: 'unit' }),
	visitNewtypeStruct: deserializer => valueMapping.deserialize(deserializer),
	visitSeq: seq => ({ kind: 'seq', elements: readElements(seq) }),
	visitMap(map) {
		const entries: [Value, Value][] = [];
		for (let n = map.nextKey(valueMapping); !n.done; n = map.nextKey(valueMapping)) {
			entries.push([n.value, map.nextValue(valueMapping)]);
		}

		return { kind: 'map', entries };
	},
	visitEnum(data) {
		const [variant, access] = data.variant(string);
		const hint = access.hint;
		const header = { name: hint?.name ?? '', variantIndex: hint?.variantIndex ?? 0, variant };
		switch (hint?.kind) {
			case 'unit_variant':
				access.unitVariant();
				return { kind: 'unit_variant', ...header };
			case 'newtype_variant':
				return { kind: 'newtype_variant', ...header, value: access.newtypeVariant(valueMapping) };
			case 'tuple_variant':
				return {
					kind: 'tuple_variant',
					...header,
					elements: access.tupleVariant(hint?.len ?? 0, elementsVisitor),
				};
			case 'struct_variant':
				return {
					kind: 'struct_variant',
					...header,
					fields: access.structVariant([], fieldsVisitor),
				};
			default:
				return readUnhintedVariant(access, header);
		}
	},
};

const elementsVisitor: IVisitor<Value[]> = {
	expecting: 'variant elements',
	visitSeq: readElements,
};

const fieldsVisitor: IVisitor<[string, Value][]> = {
	expecting: 'variant fields',
	visitMap(map) {
		const fields: [string, Value][] = [];
		for (let n = map.nextKey(string); !n.done; n = map.nextKey(string)) {
			fields.push([n.value, map.nextValue(valueMapping)]);
		}

		return fields;
	},
};

function readElements(seq: ISeqAccess) {
	const elements: Value[] = [];
	for (let n = seq.nextElement(valueMapping); !n.done; n = seq.nextElement(valueMapping)) {
		elements.push(n.value);
	}

	return elements;
}

/**
 * Reads a variant whose format does not say which form it has: anything with
 * a payload becomes a newtype variant, anything without one a unit variant.
 */
function readUnhintedVariant(access: IVariantAccess, header: IVariantHeader): Value {
	try {
		return { kind: 'newtype_variant', ...header, value: access.newtypeVariant(valueMapping) };
	} catch (e) {
		if (!(e instanceof InvalidTypeError)) {
			throw e;
		}
	}

	access.unitVariant();
	return { kind: 'unit_variant', ...header };
}

/**
 * Mapping for `Value` itself. Encoding replays the tree into any producer.
 * Decoding from a `ValueDeserializer` returns a copy of its tree; from any
 * other self-describing format it accepts every shape the input offers, so
 * names and fixed lengths the format does not record come back as `seq`,
 * `map` and plain values.
 */
export const valueMapping: IMapping<Value> = {
	serialize<Ok>(value: Value, serializer: ISerializer<Ok>): Ok {
		switch (value.kind) {
			case 'bool':
				return serializer.serializeBool(value.value);
			case 'i8':
				return serializer.serializeI8(value.value);
			case 'i16':
				return serializer.serializeI16(value.value);
			case 'i32':
				return serializer.serializeI32(value.value);
			case 'i64':
				return serializer.serializeI64(value.value);
			case 'i128':
				return serializer.serializeI128(value.value);
			case 'u8':
				return serializer.serializeU8(value.value);
			case 'u16':
				return serializer.serializeU16(value.value);
			case 'u32':
				return serializer.serializeU32(value.value);
			case 'u64':
				return serializer.serializeU64(value.value);
			case 'u128':
				return serializer.serializeU128(value.value);
			case 'f32':
				return serializer.serializeF32(value.value);
			case 'f64':
				return serializer.serializeF64(value.value);
			case 'char':
				return serializer.serializeChar(value.value);
			case 'string':
				return serializer.serializeStr(value.value);
			case 'bytes':
				return serializer.serializeBytes(value.value);
			case 'option':
				return value.value === undefined
					? serializer.serializeNone()
					: serializer.serializeSome(value.value, valueMapping);
			case 'unit':
				return serializer.serializeUnit();
			case 'unit_struct':
				return serializer.serializeUnitStruct(value.name);
			case 'unit_variant':
				return serializer.serializeUnitVariant(value.name, value.variantIndex, value.variant);
			case 'newtype_struct':
				return serializer.serializeNewtypeStruct(value.name, value.value, valueMapping);
			case 'newtype_variant':
				return serializer.serializeNewtypeVariant(
					value.name,
					value.variantIndex,
					value.variant,
					value.value,
					valueMapping,
				);
			case 'seq':
				return writeElements(serializer.serializeSeq(value.elements.length), value.elements);
			case 'tuple':
				return writeElements(serializer.serializeTuple(value.elements.length), value.elements);
			case 'tuple_struct':
				return writeElements(
					serializer.serializeTupleStruct(value.name, value.elements.length),
					value.elements,
				);
			case 'tuple_variant':
				return writeElements(
					serializer.serializeTupleVariant(
						value.name,
						value.variantIndex,
						value.variant,
						value.elements.length,
					),
					value.elements,
				);
			case 'map': {
				const session = serializer.serializeMap(value.entries.length);
				for (const [k, v] of value.entries) {
					session.serializeEntry(k, valueMapping, v, valueMapping);
				}

				return session.end();
			}
			case 'struct':
				return writeFields(
					serializer.serializeStruct(value.name, value.fields.length),
					value.fields,
				);
			case 'struct_variant':
				return writeFields(
					serializer.serializeStructVariant(
						value.name,
						value.variantIndex,
						value.variant,
						value.fields.length,
					),
					value.fields,
				);
		}
	},
	deserialize: deserializer =>
		deserializer instanceof ValueDeserializer
			? valueMapping.serialize(deserializer.value, new ValueSerializer())
			: deserializer.deserializeAny(valueVisitor),
};

function writeElements<Ok>(session: ISerializeSeq<Ok>, elements: Value[]) {
	for (const element of elements) {
		session.serializeElement(element, valueMapping);
	}

	return session.end();
}

function writeFields<Ok>(session: ISerializeStruct<Ok>, fields: [string, Value][]) {
	for (const [key, value] of fields) {
		session.serializeField(key, value, valueMapping);
	}

	return session.end();
}

/**
 * The in-memory format: values are encoded to and decoded from `Value`
 * trees.
 */
export class ValueFormat implements IFormat<Value> {
	private readonly serializer = new ValueSerializer();

	constructor(private readonly options: IValueOptions = {}) {}

	serialize<T>(value: T, mapping: ISerialize<T>): Value {
		return mapping.serialize(value, this.serializer);
	}

	deserialize<T>(input: Value, mapping: IDeserialize<T>): T {
		return mapping.deserialize(new ValueDeserializer(input, this.options));
	}
}

