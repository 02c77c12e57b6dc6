/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { TextDecoder, TextEncoder } from 'util';
import {
	done,
	IDeserialize,
	IDeserializer,
	IEnumAccess,
	IMapAccess,
	ISeqAccess,
	IVariantAccess,
	next,
	Next,
} from '../de';
import {
	DeserializationError,
	InvalidLengthError,
	MalformedInputError,
	RecursionLimitError,
	SerializationError,
	SerializationFailure,
	setErrorPosition,
	TrailingInputError,
} from '../errors';
import { deliverBytes, deliverStr } from '../lifetime';
import { checkChar, checkInteger, fitsInteger, IntegerKind, isChar } from '../model';
import { IReader, SliceReader, StreamReader } from '../reader';
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

export interface IBinaryOptions {
	/**
	 * Decode strings and bytes as borrowed views into the input buffer.
	 * Defaults to true. Has no effect on stream input, which is always
	 * transient.
	 */
	borrow?: boolean;

	/**
	 * Deepest nesting of compound values the deserializer accepts.
	 * Defaults to 128.
	 */
	maxDepth?: number;
}

const defaultMaxDepth = 128;

const bitWidth: { readonly [K in IntegerKind]: number } = {
	i8: 8,
	i16: 16,
	i32: 32,
	i64: 64,
	i128: 128,
	u8: 8,
	u16: 16,
	u32: 32,
	u64: 64,
	u128: 128,
};

const zigzag = (value: bigint) => (value >= 0n ? value << 1n : ((-value) << 1n) - 1n);
const unzigzag = (value: bigint) => (value & 1n ? -(value >> 1n) - 1n : value >> 1n);

const notSelfDescribing = (operation: string) =>
	new DeserializationError(`the binary format is not self-describing and cannot ${operation}`);

/**
 * Growable byte buffer.
 */
class ByteBuffer {
	private bytes: Uint8Array = new Uint8Array(64);
	private length = 0;

	public push(byte: number) {
		this.reserve(1);
		this.bytes[this.length++] = byte;
	}

	public append(data: Uint8Array) {
		this.reserve(data.length);
		this.bytes.set(data, this.length);
		this.length += data.length;
	}

	public result() {
		return this.bytes.slice(0, this.length);
	}

	private reserve(n: number) {
		if (this.length + n <= this.bytes.length) {
			return;
		}

		const grown = new Uint8Array(Math.max(this.length + n, this.bytes.length * 2));
		grown.set(this.bytes.subarray(0, this.length));
		this.bytes = grown;
	}
}

class BinarySeqSession implements ISerializeSeq<void> {
	private count = 0;

	constructor(
		private readonly serializer: BinarySerializer,
		private readonly len: number | undefined,
		private readonly buffered: boolean,
	) {}

	serializeElement<T>(value: T, mapping: ISerialize<T>) {
		this.count++;
		mapping.serialize(value, this.serializer);
	}

	end() {
		checkSessionLength(this.len, this.count, 'sequence');
		if (this.buffered) {
			this.serializer.flushBuffered(this.count);
		}
	}
}

class BinaryMapSession implements ISerializeMap<void> {
	private count = 0;
	private pendingKey = false;

	constructor(
		private readonly serializer: BinarySerializer,
		private readonly len: number | undefined,
		private readonly buffered: boolean,
	) {}

	serializeKey<K>(key: K, mapping: ISerialize<K>) {
		if (this.pendingKey) {
			throw new SerializationError('map key written twice without a value');
		}

		mapping.serialize(key, this.serializer);
		this.pendingKey = true;
	}

	serializeValue<V>(value: V, mapping: ISerialize<V>) {
		if (!this.pendingKey) {
			throw new SerializationError('map value written before its key');
		}

		mapping.serialize(value, this.serializer);
		this.pendingKey = false;
		this.count++;
	}

	serializeEntry<K, V>(key: K, keyMapping: ISerialize<K>, value: V, valueMapping: ISerialize<V>) {
		this.serializeKey(key, keyMapping);
		this.serializeValue(value, valueMapping);
	}

	end() {
		if (this.pendingKey) {
			throw new SerializationError('map ended with a key that has no value');
		}

		checkSessionLength(this.len, this.count, 'map');
		if (this.buffered) {
			this.serializer.flushBuffered(this.count);
		}
	}
}

class BinaryStructSession implements ISerializeStruct<void> {
	private count = 0;

	constructor(private readonly serializer: BinarySerializer, private readonly len: number) {}

	serializeField<T>(_key: string, value: T, mapping: ISerialize<T>) {
		this.count++;
		mapping.serialize(value, this.serializer);
	}

	skipField(key: string) {
		// fields are positional, so a missing one would shift every later field
		throw new SerializationError(
			`the binary format cannot skip struct field \`${key}\``,
			SerializationFailure.Unsupported,
		);
	}

	end() {
		checkSessionLength(this.len, this.count, 'struct');
	}
}

/**
 * Producer for a compact, non-self-describing binary encoding:
 *  - integers wider than a byte are LEB128 varints, zigzag-encoded if signed
 *  - floats are little-endian IEEE 754
 *  - strings, bytes, sequences and maps are prefixed with their length
 *  - tuples and structs have no prefix, as their length is fixed by the type
 *  - options are a 0 or 1 tag, and enum variants a varint index
 */
export class BinarySerializer implements ISerializer<void> {
	public readonly isHumanReadable = false;
	private readonly buffers = [new ByteBuffer()];
	private readonly encoder = new TextEncoder();
	private readonly scratch = new DataView(new ArrayBuffer(8));

	/**
	 * @returns the bytes written so far
	 */
	public output() {
		if (this.buffers.length !== 1) {
			throw new SerializationError('output requested while a session is still open');
		}

		return this.buffers[0].result();
	}

	serializeBool(value: boolean) {
		this.push(value ? 1 : 0);
	}

	serializeI8(value: number) {
		checkInteger('i8', value);
		this.push(value & 0xff);
	}

	serializeI16(value: number) {
		this.signed('i16', value);
	}

	serializeI32(value: number) {
		this.signed('i32', value);
	}

	serializeI64(value: bigint) {
		this.signed('i64', value);
	}

	serializeI128(value: bigint) {
		this.signed('i128', value);
	}

	serializeU8(value: number) {
		checkInteger('u8', value);
		this.push(value);
	}

	serializeU16(value: number) {
		this.unsigned('u16', value);
	}

	serializeU32(value: number) {
		this.unsigned('u32', value);
	}

	serializeU64(value: bigint) {
		this.unsigned('u64', value);
	}

	serializeU128(value: bigint) {
		this.unsigned('u128', value);
	}

	serializeF32(value: number) {
		this.scratch.setFloat32(0, value, true);
		this.append(new Uint8Array(this.scratch.buffer, 0, 4));
	}

	serializeF64(value: number) {
		this.scratch.setFloat64(0, value, true);
		this.append(new Uint8Array(this.scratch.buffer, 0, 8));
	}

	serializeChar(value: string) {
		checkChar(value);
		this.varint(BigInt(value.codePointAt(0) ?? 0));
	}

	serializeStr(value: string) {
		this.serializeBytes(this.encoder.encode(value));
	}

	serializeBytes(value: Uint8Array) {
		this.varint(BigInt(value.length));
		this.append(value);
	}

	serializeNone() {
		this.push(0);
	}

	serializeSome<T>(value: T, mapping: ISerialize<T>) {
		this.push(1);
		mapping.serialize(value, this);
	}

	serializeUnit() {
		// zero bytes
	}

	serializeUnitStruct() {
		// zero bytes
	}

	serializeUnitVariant(_name: string, variantIndex: number) {
		this.variantIndex(variantIndex);
	}

	serializeNewtypeStruct<T>(_name: string, value: T, mapping: ISerialize<T>) {
		mapping.serialize(value, this);
	}

	serializeNewtypeVariant<T>(
		_name: string,
		variantIndex: number,
		_variant: string,
		value: T,
		mapping: ISerialize<T>,
	) {
		this.variantIndex(variantIndex);
		mapping.serialize(value, this);
	}

	serializeSeq(len: number | undefined) {
		if (len === undefined) {
			this.buffers.push(new ByteBuffer());
			return new BinarySeqSession(this, undefined, true);
		}

		this.varint(BigInt(len));
		return new BinarySeqSession(this, len, false);
	}

	serializeTuple(len: number) {
		return new BinarySeqSession(this, len, false);
	}

	serializeTupleStruct(_name: string, len: number) {
		return new BinarySeqSession(this, len, false);
	}

	serializeTupleVariant(_name: string, variantIndex: number, _variant: string, len: number) {
		this.variantIndex(variantIndex);
		return new BinarySeqSession(this, len, false);
	}

	serializeMap(len: number | undefined) {
		if (len === undefined) {
			this.buffers.push(new ByteBuffer());
			return new BinaryMapSession(this, undefined, true);
		}

		this.varint(BigInt(len));
		return new BinaryMapSession(this, len, false);
	}

	serializeStruct(_name: string, len: number) {
		return new BinaryStructSession(this, len);
	}

	serializeStructVariant(_name: string, variantIndex: number, _variant: string, len: number) {
		this.variantIndex(variantIndex);
		return new BinaryStructSession(this, len);
	}

	/**
	 * Closes a session of unknown length: its elements were written to a
	 * buffer of their own, which now follows the count.
	 * @hidden
	 */
	public flushBuffered(count: number) {
		const buffered = this.buffers.pop();
		if (!buffered || this.buffers.length === 0) {
			throw new SerializationError('session ended twice');
		}

		this.varint(BigInt(count));
		this.append(buffered.result());
	}

	private signed(kind: IntegerKind, value: number | bigint) {
		checkInteger(kind, value);
		this.varint(zigzag(BigInt(value)));
	}

	private unsigned(kind: IntegerKind, value: number | bigint) {
		checkInteger(kind, value);
		this.varint(BigInt(value));
	}

	private variantIndex(index: number) {
		checkInteger('u32', index);
		this.varint(BigInt(index));
	}

	private varint(value: bigint) {
		while (value >= 0x80n) {
			this.push(Number(value & 0x7fn) | 0x80);
			value >>= 7n;
		}
		this.push(Number(value));
	}

	private push(byte: number) {
		this.buffers[this.buffers.length - 1].push(byte);
	}

	private append(data: Uint8Array) {
		this.buffers[this.buffers.length - 1].append(data);
	}
}

class BinarySeqAccess implements ISeqAccess {
	private consumed = 0;

	public get sizeHint() {
		return this.len - this.consumed;
	}

	constructor(private readonly parent: BinaryDeserializer, private readonly len: number) {}

	nextElement<T>(seed: IDeserialize<T>): Next<T> {
		if (this.consumed >= this.len) {
			return done;
		}

		this.consumed++;
		return next(seed.deserialize(this.parent));
	}

	finish() {
		if (this.consumed < this.len) {
			throw new InvalidLengthError(this.len, `${this.consumed} elements in sequence`);
		}
	}
}

class BinaryMapAccess implements IMapAccess {
	private consumed = 0;
	private pendingValue = false;

	public get sizeHint() {
		return this.len - this.consumed;
	}

	constructor(private readonly parent: BinaryDeserializer, private readonly len: number) {}

	nextKey<K>(seed: IDeserialize<K>): Next<K> {
		if (this.pendingValue) {
			throw new DeserializationError('map key requested before the previous value was read');
		}

		if (this.consumed >= this.len) {
			return done;
		}

		this.pendingValue = true;
		return next(seed.deserialize(this.parent));
	}

	nextValue<V>(seed: IDeserialize<V>): V {
		if (!this.pendingValue) {
			throw new DeserializationError('map value requested before its key');
		}

		this.pendingValue = false;
		this.consumed++;
		return seed.deserialize(this.parent);
	}

	finish() {
		if (this.consumed < this.len) {
			throw new InvalidLengthError(this.len, `${this.consumed} entries in map`);
		}
	}
}

class BinaryEnumAccess implements IEnumAccess, IVariantAccess {
	constructor(private readonly parent: BinaryDeserializer) {}

	variant<V>(seed: IDeserialize<V>): [V, IVariantAccess] {
		return [seed.deserialize(this.parent), this];
	}

	unitVariant() {
		// no payload
	}

	newtypeVariant<T>(seed: IDeserialize<T>): T {
		return seed.deserialize(this.parent);
	}

	tupleVariant<T>(len: number, visitor: IVisitor<T>): T {
		return this.parent.deserializeTuple(len, visitor);
	}

	structVariant<T>(fields: readonly string[], visitor: IVisitor<T>): T {
		return this.parent.deserializeTuple(fields.length, visitor);
	}
}

/**
 * Consumer for the binary encoding written by {@link BinarySerializer}. The
 * encoding carries no type information, so every value must be requested
 * with the entry operation of the shape it was written as; `deserializeAny`
 * and `deserializeIgnoredAny` fail.
 *
 * Strings and bytes are delivered with the reader's flavor: borrowed from a
 * {@link SliceReader}, transient from a {@link StreamReader}.
 */
export class BinaryDeserializer implements IDeserializer {
	public readonly isHumanReadable = false;
	private readonly decoder = new TextDecoder('utf-8', { fatal: true });
	private readonly maxDepth: number;
	private depth = 0;

	constructor(private readonly reader: IReader, options: IBinaryOptions = {}) {
		this.maxDepth = options.maxDepth ?? defaultMaxDepth;
	}

	/**
	 * Number of input bytes consumed.
	 */
	public get offset() {
		return this.reader.offset;
	}

	/**
	 * Fails unless all input was consumed.
	 */
	public end() {
		if (!this.reader.isEnd()) {
			throw new TrailingInputError(this.reader.offset);
		}
	}

	deserializeAny<T>(_visitor: IVisitor<T>): T {
		throw notSelfDescribing('decode a value of unknown shape');
	}

	deserializeIgnoredAny<T>(_visitor: IVisitor<T>): T {
		throw notSelfDescribing('skip a value of unknown shape');
	}

	deserializeBool<T>(visitor: IVisitor<T>): T {
		const byte = this.reader.readByte('bool');
		if (byte > 1) {
			throw new MalformedInputError(`invalid bool byte ${byte}`, { expected: 'bool' });
		}

		return Visit.bool(visitor, byte === 1);
	}

	deserializeI8<T>(visitor: IVisitor<T>): T {
		const byte = this.reader.readByte('i8');
		return Visit.i8(visitor, byte >= 0x80 ? byte - 0x100 : byte);
	}

	deserializeI16<T>(visitor: IVisitor<T>): T {
		return Visit.i16(visitor, Number(this.signed('i16')));
	}

	deserializeI32<T>(visitor: IVisitor<T>): T {
		return Visit.i32(visitor, Number(this.signed('i32')));
	}

	deserializeI64<T>(visitor: IVisitor<T>): T {
		return Visit.i64(visitor, this.signed('i64'));
	}

	deserializeI128<T>(visitor: IVisitor<T>): T {
		return Visit.i128(visitor, this.signed('i128'));
	}

	deserializeU8<T>(visitor: IVisitor<T>): T {
		return Visit.u8(visitor, this.reader.readByte('u8'));
	}

	deserializeU16<T>(visitor: IVisitor<T>): T {
		return Visit.u16(visitor, Number(this.varint('u16')));
	}

	deserializeU32<T>(visitor: IVisitor<T>): T {
		return Visit.u32(visitor, Number(this.varint('u32')));
	}

	deserializeU64<T>(visitor: IVisitor<T>): T {
		return Visit.u64(visitor, this.varint('u64'));
	}

	deserializeU128<T>(visitor: IVisitor<T>): T {
		return Visit.u128(visitor, this.varint('u128'));
	}

	deserializeF32<T>(visitor: IVisitor<T>): T {
		return Visit.f32(visitor, this.float(4));
	}

	deserializeF64<T>(visitor: IVisitor<T>): T {
		return Visit.f64(visitor, this.float(8));
	}

	deserializeChar<T>(visitor: IVisitor<T>): T {
		const code = this.varint('u32');
		const text = code <= 0x10ffffn ? String.fromCodePoint(Number(code)) : '';
		if (!isChar(text)) {
			throw new MalformedInputError(`invalid code point ${code}`, { expected: 'char' });
		}

		return Visit.char(visitor, text);
	}

	deserializeStr<T>(visitor: IVisitor<T>): T {
		const extracted = this.reader.readBytes(this.length('string'), 'string');
		let text: string;
		try {
			text = this.decoder.decode(extracted.value);
		} catch (e) {
			if (e instanceof TypeError) {
				throw new MalformedInputError('invalid UTF-8 in string', { expected: 'string' });
			}

			throw e;
		}

		return deliverStr(visitor, { flavor: extracted.flavor, value: text });
	}

	deserializeString<T>(visitor: IVisitor<T>): T {
		return this.deserializeStr(visitor);
	}

	deserializeBytes<T>(visitor: IVisitor<T>): T {
		return deliverBytes(visitor, this.reader.readBytes(this.length('bytes'), 'bytes'));
	}

	deserializeByteBuf<T>(visitor: IVisitor<T>): T {
		return this.deserializeBytes(visitor);
	}

	deserializeOption<T>(visitor: IVisitor<T>): T {
		const tag = this.reader.readByte('option tag');
		switch (tag) {
			case 0:
				return Visit.none(visitor);
			case 1:
				return this.nested(() => Visit.some(visitor, this));
			default:
				throw new MalformedInputError(`invalid option tag ${tag}`, { expected: 'option' });
		}
	}

	deserializeUnit<T>(visitor: IVisitor<T>): T {
		return Visit.unit(visitor);
	}

	deserializeUnitStruct<T>(_name: string, visitor: IVisitor<T>): T {
		return Visit.unit(visitor);
	}

	deserializeNewtypeStruct<T>(_name: string, visitor: IVisitor<T>): T {
		return this.nested(() => Visit.newtypeStruct(visitor, this));
	}

	deserializeSeq<T>(visitor: IVisitor<T>): T {
		return this.sequence(this.length('sequence'), visitor);
	}

	deserializeTuple<T>(len: number, visitor: IVisitor<T>): T {
		return this.sequence(len, visitor);
	}

	deserializeTupleStruct<T>(_name: string, len: number, visitor: IVisitor<T>): T {
		return this.sequence(len, visitor);
	}

	deserializeMap<T>(visitor: IVisitor<T>): T {
		const len = this.length('map');
		return this.nested(() => {
			const access = new BinaryMapAccess(this, len);
			const result = Visit.map(visitor, access);
			access.finish();
			return result;
		});
	}

	deserializeStruct<T>(_name: string, fields: readonly string[], visitor: IVisitor<T>): T {
		return this.sequence(fields.length, visitor);
	}

	deserializeEnum<T>(_name: string, _variants: readonly string[], visitor: IVisitor<T>): T {
		return this.nested(() => Visit.enumeration(visitor, new BinaryEnumAccess(this)));
	}

	/**
	 * Identifiers are written as their index.
	 */
	deserializeIdentifier<T>(visitor: IVisitor<T>): T {
		return Visit.u32(visitor, Number(this.varint('u32')));
	}

	private sequence<T>(len: number, visitor: IVisitor<T>): T {
		return this.nested(() => {
			const access = new BinarySeqAccess(this, len);
			const result = Visit.seq(visitor, access);
			access.finish();
			return result;
		});
	}

	private nested<T>(fn: () => T): T {
		if (++this.depth > this.maxDepth) {
			throw new RecursionLimitError(this.maxDepth, this.reader.offset);
		}

		const result = fn();
		this.depth--;
		return result;
	}

	private length(expected: string) {
		const len = this.varint('u64');
		if (len > BigInt(Number.MAX_SAFE_INTEGER)) {
			throw new MalformedInputError(`${expected} length ${len} is too large`, { expected });
		}

		return Number(len);
	}

	private signed(kind: IntegerKind) {
		const value = unzigzag(this.varint(kind));
		if (!fitsInteger(kind, value)) {
			throw new MalformedInputError(`varint out of range for ${kind}`, { expected: kind });
		}

		return value;
	}

	/**
	 * Reads a LEB128 varint holding at most the bits of the given kind.
	 */
	private varint(kind: IntegerKind) {
		const bits = bitWidth[kind];
		let value = 0n;
		for (let shift = 0; ; shift += 7) {
			if (shift >= bits) {
				throw new MalformedInputError(`varint too long for ${kind}`, { expected: kind });
			}

			const byte = this.reader.readByte(kind);
			value |= BigInt(byte & 0x7f) << BigInt(shift);
			if (byte < 0x80) {
				break;
			}
		}

		if (value >> BigInt(bits) !== 0n) {
			throw new MalformedInputError(`varint out of range for ${kind}`, { expected: kind });
		}

		return value;
	}

	private float(size: 4 | 8) {
		const { value } = this.reader.readBytes(size, size === 4 ? 'f32' : 'f64');
		const view = new DataView(value.buffer, value.byteOffset, size);
		return size === 4 ? view.getFloat32(0, true) : view.getFloat64(0, true);
	}
}

/**
 * Compact binary format. `deserialize` reads a complete buffer;
 * `deserializeStream` reads from a sequence of chunks without joining them.
 */
export class BinaryFormat implements IFormat<Uint8Array> {
	constructor(private readonly options: IBinaryOptions = {}) {}

	serialize<T>(value: T, mapping: ISerialize<T>): Uint8Array {
		const serializer = new BinarySerializer();
		mapping.serialize(value, serializer);
		return serializer.output();
	}

	deserialize<T>(input: Uint8Array, mapping: IDeserialize<T>): T {
		return this.read(new SliceReader(input, { borrow: this.options.borrow }), mapping);
	}

	deserializeStream<T>(chunks: Iterable<Uint8Array>, mapping: IDeserialize<T>): T {
		return this.read(new StreamReader(chunks), mapping);
	}

	private read<T>(reader: IReader, mapping: IDeserialize<T>): T {
		const deserializer = new BinaryDeserializer(reader, this.options);
		try {
			const value = mapping.deserialize(deserializer);
			deserializer.end();
			return value;
		} catch (e) {
			if (e instanceof DeserializationError) {
				setErrorPosition(e, reader.offset);
			}

			throw e;
		}
	}
}
