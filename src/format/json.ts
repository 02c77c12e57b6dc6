/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { TextDecoder } from 'util';
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
	EndOfInputError,
	InvalidLengthError,
	InvalidTypeError,
	InvalidValueError,
	MalformedInputError,
	RecursionLimitError,
	SerializationError,
	SerializationFailure,
	setErrorPosition,
	TrailingInputError,
} from '../errors';
import { borrowed, deliverStr, IExtracted, transient } from '../lifetime';
import { checkChar, checkInteger, fitsInteger, IntegerKind } from '../model';
import {
	checkSessionLength,
	ISerialize,
	ISerializeMap,
	ISerializer,
	ISerializeSeq,
	ISerializeStruct,
} from '../ser';
import { IVisitor, Visit } from '../visitor';
import type { IFormat, Transportable } from '.';

export interface IJsonOptions {
	/**
	 * Indentation for pretty output: a string, or a number of spaces. Output
	 * is compact when unset.
	 */
	indent?: string | number;

	/**
	 * Deepest nesting of arrays and objects the deserializer accepts.
	 * Defaults to 128.
	 */
	maxDepth?: number;
}

const defaultMaxDepth = 128;

const unsupported = (what: string) =>
	new SerializationError(`JSON cannot represent ${what}`, SerializationFailure.Unsupported);

const keyMustBeString = (what: string) =>
	new SerializationError(
		`JSON map keys must be strings, got ${what}`,
		SerializationFailure.KeyMustBeString,
	);

/**
 * Writes floats so they read back as floats: `1` becomes `1.0`.
 */
const formatFloat = (value: number) => {
	if (!Number.isFinite(value)) {
		throw unsupported(`the non-finite float ${value}`);
	}

	if (Object.is(value, -0)) {
		return '-0.0';
	}

	const text = String(value);
	return /^-?\d+$/.test(text) ? `${text}.0` : text;
};

class JsonSeqSession implements ISerializeSeq<void> {
	private count = 0;

	constructor(
		private readonly serializer: JsonSerializer,
		private readonly len: number | undefined,
		private readonly inVariant: boolean,
	) {
		serializer.open('[');
	}

	serializeElement<T>(value: T, mapping: ISerialize<T>) {
		this.serializer.item(this.count++ === 0);
		mapping.serialize(value, this.serializer);
	}

	end() {
		checkSessionLength(this.len, this.count, 'sequence');
		this.serializer.close(']', this.count === 0);
		if (this.inVariant) {
			this.serializer.close('}', false);
		}
	}
}

class JsonMapSession implements ISerializeMap<void> {
	private count = 0;
	private pendingKey = false;

	constructor(
		private readonly serializer: JsonSerializer,
		private readonly len: number | undefined,
	) {
		serializer.open('{');
	}

	serializeKey<K>(key: K, mapping: ISerialize<K>) {
		if (this.pendingKey) {
			throw new SerializationError('map key written twice without a value');
		}

		this.serializer.item(this.count === 0);
		this.serializer.key(mapping.serialize(key, keySerializer));
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
		this.serializer.close('}', this.count === 0);
	}
}

class JsonStructSession implements ISerializeStruct<void> {
	private count = 0;
	private skipped = 0;

	constructor(
		private readonly serializer: JsonSerializer,
		private readonly len: number,
		private readonly inVariant: boolean,
	) {
		serializer.open('{');
	}

	serializeField<T>(key: string, value: T, mapping: ISerialize<T>) {
		this.serializer.item(this.count++ === 0);
		this.serializer.key(key);
		mapping.serialize(value, this.serializer);
	}

	skipField() {
		this.skipped++;
	}

	end() {
		checkSessionLength(this.len, this.count + this.skipped, 'struct');
		this.serializer.close('}', this.count === 0);
		if (this.inVariant) {
			this.serializer.close('}', false);
		}
	}
}

/**
 * Producer that writes JSON text. Unit and absent values are `null`, bytes
 * are arrays of numbers, and enum variants carrying data are written as
 * `{"Variant": payload}`.
 */
export class JsonSerializer implements ISerializer<void> {
	public readonly isHumanReadable = true;
	private readonly parts: string[] = [];
	private readonly indent: string | undefined;
	private level = 0;

	constructor(options: IJsonOptions = {}) {
		this.indent = typeof options.indent === 'number' ? ' '.repeat(options.indent) : options.indent;
	}

	/**
	 * @returns the text written so far
	 */
	public output() {
		return this.parts.join('');
	}

	serializeBool(value: boolean) {
		this.write(value ? 'true' : 'false');
	}

	serializeI8(value: number) {
		this.integer('i8', value);
	}

	serializeI16(value: number) {
		this.integer('i16', value);
	}

	serializeI32(value: number) {
		this.integer('i32', value);
	}

	serializeI64(value: bigint) {
		this.integer('i64', value);
	}

	serializeI128(value: bigint) {
		this.integer('i128', value);
	}

	serializeU8(value: number) {
		this.integer('u8', value);
	}

	serializeU16(value: number) {
		this.integer('u16', value);
	}

	serializeU32(value: number) {
		this.integer('u32', value);
	}

	serializeU64(value: bigint) {
		this.integer('u64', value);
	}

	serializeU128(value: bigint) {
		this.integer('u128', value);
	}

	serializeF32(value: number) {
		this.write(formatFloat(Math.fround(value)));
	}

	serializeF64(value: number) {
		this.write(formatFloat(value));
	}

	serializeChar(value: string) {
		checkChar(value);
		this.write(JSON.stringify(value));
	}

	serializeStr(value: string) {
		this.write(JSON.stringify(value));
	}

	serializeBytes(value: Uint8Array) {
		const seq = this.serializeSeq(value.length);
		for (const byte of value) {
			seq.serializeElement(byte, byteMapping);
		}
		seq.end();
	}

	serializeNone() {
		this.write('null');
	}

	serializeSome<T>(value: T, mapping: ISerialize<T>) {
		mapping.serialize(value, this);
	}

	serializeUnit() {
		this.write('null');
	}

	serializeUnitStruct() {
		this.write('null');
	}

	serializeUnitVariant(_name: string, _variantIndex: number, variant: string) {
		this.write(JSON.stringify(variant));
	}

	serializeNewtypeStruct<T>(_name: string, value: T, mapping: ISerialize<T>) {
		mapping.serialize(value, this);
	}

	serializeNewtypeVariant<T>(
		_name: string,
		_variantIndex: number,
		variant: string,
		value: T,
		mapping: ISerialize<T>,
	) {
		this.beginVariant(variant);
		mapping.serialize(value, this);
		this.close('}', false);
	}

	serializeSeq(len: number | undefined) {
		return new JsonSeqSession(this, len, false);
	}

	serializeTuple(len: number) {
		return new JsonSeqSession(this, len, false);
	}

	serializeTupleStruct(_name: string, len: number) {
		return new JsonSeqSession(this, len, false);
	}

	serializeTupleVariant(_name: string, _variantIndex: number, variant: string, len: number) {
		this.beginVariant(variant);
		return new JsonSeqSession(this, len, true);
	}

	serializeMap(len: number | undefined) {
		return new JsonMapSession(this, len);
	}

	serializeStruct(_name: string, len: number) {
		return new JsonStructSession(this, len, false);
	}

	serializeStructVariant(_name: string, _variantIndex: number, variant: string, len: number) {
		this.beginVariant(variant);
		return new JsonStructSession(this, len, true);
	}

	/** @hidden */
	public open(bracket: string) {
		this.write(bracket);
		this.level++;
	}

	/** @hidden */
	public item(first: boolean) {
		if (!first) {
			this.write(',');
		}
		if (this.indent !== undefined) {
			this.write(`\n${this.indent.repeat(this.level)}`);
		}
	}

	/** @hidden */
	public key(key: string) {
		this.write(JSON.stringify(key));
		this.write(this.indent !== undefined ? ': ' : ':');
	}

	/** @hidden */
	public close(bracket: string, empty: boolean) {
		this.level--;
		if (this.indent !== undefined && !empty) {
			this.write(`\n${this.indent.repeat(this.level)}`);
		}
		this.write(bracket);
	}

	private beginVariant(variant: string) {
		this.open('{');
		this.item(true);
		this.key(variant);
	}

	private integer(kind: IntegerKind, value: number | bigint) {
		checkInteger(kind, value);
		this.write(String(value));
	}

	private write(text: string) {
		this.parts.push(text);
	}
}

const byteMapping: ISerialize<number> = {
	serialize: (value, serializer) => serializer.serializeU8(value),
};

const notAKey = () => {
	throw keyMustBeString('a compound value');
};

/**
 * Producer for map keys: accepts only shapes with a natural string form.
 */
class JsonKeySerializer implements ISerializer<string> {
	public readonly isHumanReadable = true;

	serializeBool = (value: boolean) => String(value);
	serializeI8 = (value: number) => this.integer('i8', value);
	serializeI16 = (value: number) => this.integer('i16', value);
	serializeI32 = (value: number) => this.integer('i32', value);
	serializeI64 = (value: bigint) => this.integer('i64', value);
	serializeI128 = (value: bigint) => this.integer('i128', value);
	serializeU8 = (value: number) => this.integer('u8', value);
	serializeU16 = (value: number) => this.integer('u16', value);
	serializeU32 = (value: number) => this.integer('u32', value);
	serializeU64 = (value: bigint) => this.integer('u64', value);
	serializeU128 = (value: bigint) => this.integer('u128', value);

	serializeF32(): string {
		throw keyMustBeString('a float');
	}

	serializeF64(): string {
		throw keyMustBeString('a float');
	}

	serializeChar(value: string) {
		checkChar(value);
		return value;
	}

	serializeStr(value: string) {
		return value;
	}

	serializeBytes(): string {
		throw keyMustBeString('bytes');
	}

	serializeNone(): string {
		throw keyMustBeString('an option');
	}

	serializeSome(): string {
		throw keyMustBeString('an option');
	}

	serializeUnit(): string {
		throw keyMustBeString('unit');
	}

	serializeUnitStruct(): string {
		throw keyMustBeString('a unit struct');
	}

	serializeUnitVariant(_name: string, _variantIndex: number, variant: string) {
		return variant;
	}

	serializeNewtypeStruct<T>(_name: string, value: T, mapping: ISerialize<T>): string {
		return mapping.serialize(value, this);
	}

	serializeNewtypeVariant(): string {
		throw keyMustBeString('a newtype variant');
	}

	serializeSeq = notAKey;
	serializeTuple = notAKey;
	serializeTupleStruct = notAKey;
	serializeTupleVariant = notAKey;
	serializeMap = notAKey;
	serializeStruct = notAKey;
	serializeStructVariant = notAKey;

	private integer(kind: IntegerKind, value: number | bigint) {
		checkInteger(kind, value);
		return String(value);
	}
}

const keySerializer = new JsonKeySerializer();

const numberPattern = /-?(?:0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?/y;

const escapes: { [char: string]: string } = {
	'"': '"',
	'\\': '\\',
	'/': '/',
	b: '\b',
	f: '\f',
	n: '\n',
	r: '\r',
	t: '\t',
};

/**
 * Delivers a decoded JSON integer to the narrowest visitor method that holds
 * it, or as a float if no integer shape does.
 */
function visitInteger<T>(visitor: IVisitor<T>, text: string): T {
	const value = BigInt(text);
	if (value >= 0n) {
		if (fitsInteger('u64', value)) {
			return Visit.u64(visitor, value);
		}
		if (fitsInteger('u128', value)) {
			return Visit.u128(visitor, value);
		}
	} else {
		if (fitsInteger('i64', value)) {
			return Visit.i64(visitor, value);
		}
		if (fitsInteger('i128', value)) {
			return Visit.i128(visitor, value);
		}
	}

	return Visit.f64(visitor, Number(text));
}

class JsonSeqAccess implements ISeqAccess {
	public readonly sizeHint = undefined;
	private count = 0;
	private ended = false;

	constructor(private readonly parent: JsonDeserializer) {}

	nextElement<T>(seed: IDeserialize<T>): Next<T> {
		if (this.ended || !this.parent.hasItem(']', this.count === 0)) {
			this.ended = true;
			return done;
		}

		this.count++;
		return next(seed.deserialize(this.parent));
	}

	finish() {
		let remaining = 0;
		if (!this.ended) {
			while (this.parent.hasItem(']', this.count + remaining === 0)) {
				this.parent.skipValue();
				remaining++;
			}
		}

		this.parent.expectChar(']');
		if (remaining > 0) {
			throw new InvalidLengthError(this.count + remaining, `${this.count} elements in sequence`);
		}
	}
}

class JsonMapAccess implements IMapAccess {
	public readonly sizeHint = undefined;
	private count = 0;
	private ended = false;
	private pendingValue = false;

	constructor(private readonly parent: JsonDeserializer) {}

	nextKey<K>(seed: IDeserialize<K>): Next<K> {
		if (this.pendingValue) {
			throw new DeserializationError('map key requested before the previous value was read');
		}

		if (this.ended || !this.parent.hasItem('}', this.count === 0)) {
			this.ended = true;
			return done;
		}

		const key = this.parent.readKey();
		this.pendingValue = true;
		return next(seed.deserialize(new JsonKeyDeserializer(key)));
	}

	nextValue<V>(seed: IDeserialize<V>): V {
		if (!this.pendingValue) {
			throw new DeserializationError('map value requested before its key');
		}

		this.pendingValue = false;
		this.count++;
		return seed.deserialize(this.parent);
	}

	finish() {
		let remaining = 0;
		if (this.pendingValue) {
			this.parent.skipValue();
			remaining++;
		}

		if (!this.ended) {
			while (this.parent.hasItem('}', this.count + remaining === 0)) {
				this.parent.readKey();
				this.parent.skipValue();
				remaining++;
			}
		}

		this.parent.expectChar('}');
		if (remaining > 0) {
			throw new InvalidLengthError(this.count + remaining, `${this.count} entries in map`);
		}
	}
}

class JsonEnumAccess implements IEnumAccess, IVariantAccess {
	constructor(
		private readonly parent: JsonDeserializer,
		private readonly tag: IExtracted<string>,
		private readonly hasPayload: boolean,
	) {}

	public get hint(): IVariantHint | undefined {
		return this.hasPayload ? undefined : { kind: 'unit_variant' };
	}

	variant<V>(seed: IDeserialize<V>): [V, IVariantAccess] {
		return [seed.deserialize(new JsonKeyDeserializer(this.tag)), this];
	}

	unitVariant() {
		if (this.hasPayload) {
			this.parent.deserializeUnit({ expecting: 'unit variant', visitUnit: () => undefined });
		}
	}

	newtypeVariant<T>(seed: IDeserialize<T>): T {
		return seed.deserialize(this.payload('newtype variant'));
	}

	tupleVariant<T>(_len: number, visitor: IVisitor<T>): T {
		return this.payload('tuple variant').deserializeSeq(visitor);
	}

	structVariant<T>(_fields: readonly string[], visitor: IVisitor<T>): T {
		return this.payload('struct variant').deserializeMap(visitor);
	}

	private payload(expected: string) {
		if (!this.hasPayload) {
			throw new InvalidTypeError('unit variant', expected);
		}

		return this.parent;
	}
}

/**
 * Consumer for map keys, which JSON always writes as strings. Integer and
 * boolean entry operations parse the key text.
 */
class JsonKeyDeserializer extends SelfDescribingDeserializer {
	public readonly isHumanReadable = true;

	constructor(private readonly key: IExtracted<string>) {
		super();
	}

	deserializeAny<T>(visitor: IVisitor<T>): T {
		return deliverStr(visitor, this.key);
	}

	deserializeBool<T>(visitor: IVisitor<T>): T {
		if (this.key.value === 'true' || this.key.value === 'false') {
			return Visit.bool(visitor, this.key.value === 'true');
		}

		return this.deserializeAny(visitor);
	}

	deserializeI8<T>(visitor: IVisitor<T>): T {
		return this.deserializeInteger(visitor);
	}

	deserializeI16<T>(visitor: IVisitor<T>): T {
		return this.deserializeInteger(visitor);
	}

	deserializeI32<T>(visitor: IVisitor<T>): T {
		return this.deserializeInteger(visitor);
	}

	deserializeI64<T>(visitor: IVisitor<T>): T {
		return this.deserializeInteger(visitor);
	}

	deserializeI128<T>(visitor: IVisitor<T>): T {
		return this.deserializeInteger(visitor);
	}

	deserializeU8<T>(visitor: IVisitor<T>): T {
		return this.deserializeInteger(visitor);
	}

	deserializeU16<T>(visitor: IVisitor<T>): T {
		return this.deserializeInteger(visitor);
	}

	deserializeU32<T>(visitor: IVisitor<T>): T {
		return this.deserializeInteger(visitor);
	}

	deserializeU64<T>(visitor: IVisitor<T>): T {
		return this.deserializeInteger(visitor);
	}

	deserializeU128<T>(visitor: IVisitor<T>): T {
		return this.deserializeInteger(visitor);
	}

	deserializeOption<T>(visitor: IVisitor<T>): T {
		return Visit.some(visitor, this);
	}

	deserializeNewtypeStruct<T>(_name: string, visitor: IVisitor<T>): T {
		return Visit.newtypeStruct(visitor, this);
	}

	deserializeEnum<T>(_name: string, _variants: readonly string[], visitor: IVisitor<T>): T {
		return Visit.enumeration(visitor, new JsonEnumAccess(emptyDocument, this.key, false));
	}

	private deserializeInteger<T>(visitor: IVisitor<T>): T {
		if (!/^-?(?:0|[1-9]\d*)$/.test(this.key.value)) {
			throw new InvalidValueError(`string ${JSON.stringify(this.key.value)}`, 'an integer key');
		}

		return visitInteger(visitor, this.key.value);
	}
}

/**
 * Consumer that reads JSON text. JSON is self-describing, so
 * `deserializeAny` is supported. Integers are delivered through the 64-bit
 * visitor methods (128-bit when larger), and strings are borrowed from the
 * input unless they contained escapes.
 */
export class JsonDeserializer extends SelfDescribingDeserializer {
	public readonly isHumanReadable = true;
	private position = 0;
	private depth = 0;
	private readonly maxDepth: number;

	/**
	 * Input position, in UTF-16 code units.
	 */
	public get offset() {
		return this.position;
	}

	constructor(private readonly text: string, options: IJsonOptions = {}) {
		super();
		this.maxDepth = options.maxDepth ?? defaultMaxDepth;
	}

	deserializeAny<T>(visitor: IVisitor<T>): T {
		const char = this.peek('a value');
		switch (char) {
			case 'n':
				this.literal('null');
				return Visit.unit(visitor);
			case 't':
				this.literal('true');
				return Visit.bool(visitor, true);
			case 'f':
				this.literal('false');
				return Visit.bool(visitor, false);
			case '"':
				return deliverStr(visitor, this.readString());
			case '[': {
				this.enter();
				const access = new JsonSeqAccess(this);
				const result = Visit.seq(visitor, access);
				access.finish();
				this.depth--;
				return result;
			}
			case '{': {
				this.enter();
				const access = new JsonMapAccess(this);
				const result = Visit.map(visitor, access);
				access.finish();
				this.depth--;
				return result;
			}
			default:
				if (char === '-' || (char >= '0' && char <= '9')) {
					return this.readNumber(visitor);
				}

				throw new MalformedInputError(`expected a value, got \`${char}\``, {
					offset: this.position,
				});
		}
	}

	deserializeOption<T>(visitor: IVisitor<T>): T {
		if (this.peek('an option') === 'n') {
			this.literal('null');
			return Visit.none(visitor);
		}

		return Visit.some(visitor, this);
	}

	deserializeNewtypeStruct<T>(_name: string, visitor: IVisitor<T>): T {
		return Visit.newtypeStruct(visitor, this);
	}

	deserializeEnum<T>(name: string, _variants: readonly string[], visitor: IVisitor<T>): T {
		const char = this.peek(`enum ${name}`);
		if (char === '"') {
			return Visit.enumeration(visitor, new JsonEnumAccess(this, this.readString(), false));
		}

		if (char !== '{') {
			throw new InvalidTypeError(this.describeNext(), `enum ${name}`);
		}

		this.enter();
		if (this.peek('a variant name') !== '"') {
			throw new MalformedInputError('expected a variant name', { offset: this.position });
		}

		const tag = this.readKey();
		const result = Visit.enumeration(visitor, new JsonEnumAccess(this, tag, true));
		this.expectChar('}');
		this.depth--;
		return result;
	}

	deserializeIgnoredAny<T>(visitor: IVisitor<T>): T {
		this.skipValue();
		return Visit.unit(visitor);
	}

	/**
	 * Fails unless only whitespace is left.
	 */
	public end() {
		this.skipWhitespace();
		if (this.position < this.text.length) {
			throw new TrailingInputError(this.position);
		}
	}

	/**
	 * Moves to the next item of an array or object.
	 * @returns false when the closing bracket is next
	 * @hidden
	 */
	public hasItem(close: string, first: boolean) {
		if (this.peek(close) === close) {
			return false;
		}

		if (!first) {
			this.expectChar(',');
		}

		return true;
	}

	/**
	 * Reads an object key and the colon after it.
	 * @hidden
	 */
	public readKey() {
		if (this.peek('an object key') !== '"') {
			throw new MalformedInputError('expected a string key', { offset: this.position });
		}

		const key = this.readString();
		this.expectChar(':');
		return key;
	}

	/**
	 * Consumes the expected character after optional whitespace.
	 * @hidden
	 */
	public expectChar(char: string) {
		const found = this.peek(`\`${char}\``);
		if (found !== char) {
			throw new MalformedInputError(`expected \`${char}\`, got \`${found}\``, {
				offset: this.position,
				expected: char,
			});
		}

		this.position++;
	}

	/**
	 * Consumes the next value without decoding it.
	 * @hidden
	 */
	public skipValue() {
		this.deserializeAny(skipVisitor);
	}

	private enter() {
		if (++this.depth > this.maxDepth) {
			throw new RecursionLimitError(this.maxDepth, this.position);
		}

		this.position++;
	}

	private peek(expected: string) {
		this.skipWhitespace();
		if (this.position >= this.text.length) {
			throw new EndOfInputError(expected, this.position);
		}

		return this.text[this.position];
	}

	private skipWhitespace() {
		while (this.position < this.text.length) {
			const char = this.text[this.position];
			if (char !== ' ' && char !== '\n' && char !== '\r' && char !== '\t') {
				break;
			}
			this.position++;
		}
	}

	private literal(word: string) {
		if (this.text.startsWith(word, this.position)) {
			this.position += word.length;
			return;
		}

		if (
			this.text.length - this.position < word.length &&
			word.startsWith(this.text.slice(this.position))
		) {
			throw new EndOfInputError(`\`${word}\``, this.text.length);
		}

		throw new MalformedInputError(`expected \`${word}\``, {
			offset: this.position,
			expected: word,
		});
	}

	private describeNext() {
		const char = this.text[this.position];
		switch (char) {
			case 'n':
				return 'null';
			case 't':
			case 'f':
				return 'bool';
			case '"':
				return 'string';
			case '[':
				return 'seq';
			case '{':
				return 'map';
			default:
				return 'number';
		}
	}

	private readNumber<T>(visitor: IVisitor<T>): T {
		numberPattern.lastIndex = this.position;
		const match = numberPattern.exec(this.text);
		if (!match) {
			throw new MalformedInputError('invalid number', { offset: this.position });
		}

		this.position += match[0].length;
		if (match[1] === undefined && match[2] === undefined) {
			return visitInteger(visitor, match[0]);
		}

		return Visit.f64(visitor, Number(match[0]));
	}

	/**
	 * Reads a string starting at the opening quote. Strings without escapes
	 * are slices of the input and so borrowed; strings with escapes are built
	 * in a scratch buffer and transient.
	 */
	private readString(): IExtracted<string> {
		const start = ++this.position;
		const parts: string[] = [];
		let runStart = start;
		while (true) {
			if (this.position >= this.text.length) {
				throw new EndOfInputError('a string', this.position);
			}

			const char = this.text[this.position];
			if (char === '"') {
				const tail = this.text.slice(runStart, this.position++);
				if (parts.length === 0) {
					return borrowed(tail);
				}

				parts.push(tail);
				return transient(parts.join(''));
			}

			if (char < ' ') {
				throw new MalformedInputError('control character in string', { offset: this.position });
			}

			if (char !== '\\') {
				this.position++;
				continue;
			}

			parts.push(this.text.slice(runStart, this.position));
			parts.push(this.readEscape());
			runStart = this.position;
		}
	}

	private readEscape() {
		const escape = this.text[this.position + 1];
		if (escape === undefined) {
			throw new EndOfInputError('an escape sequence', this.position + 1);
		}

		if (escape !== 'u') {
			const replacement = escapes[escape];
			if (replacement === undefined) {
				throw new MalformedInputError(`invalid escape \`\\${escape}\``, {
					offset: this.position,
				});
			}

			this.position += 2;
			return replacement;
		}

		const hex = this.text.slice(this.position + 2, this.position + 6);
		if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
			throw new MalformedInputError('invalid unicode escape', { offset: this.position });
		}

		this.position += 6;
		return String.fromCharCode(parseInt(hex, 16));
	}
}

const skipVisitor: IVisitor<undefined> = {
	expecting: 'any value',
	visitBool: () => undefined,
	visitI64: () => undefined,
	visitI128: () => undefined,
	visitU64: () => undefined,
	visitU128: () => undefined,
	visitF64: () => undefined,
	visitStr: () => undefined,
	visitUnit: () => undefined,
	visitSeq(seq) {
		while (!seq.nextElement(skipSeed).done) {
			// drain
		}
		return undefined;
	},
	visitMap(map) {
		while (!map.nextKey(skipSeed).done) {
			map.nextValue(skipSeed);
		}
		return undefined;
	},
};

const skipSeed: IDeserialize<undefined> = {
	deserialize: deserializer => deserializer.deserializeAny(skipVisitor),
};

const emptyDocument = new JsonDeserializer('');

/**
 * JSON text format.
 */
export class JsonFormat implements IFormat<string, Transportable> {
	private decoder?: TextDecoder;

	constructor(private readonly options: IJsonOptions = {}) {}

	serialize<T>(value: T, mapping: ISerialize<T>): string {
		const serializer = new JsonSerializer(this.options);
		mapping.serialize(value, serializer);
		return serializer.output();
	}

	deserialize<T>(input: Transportable, mapping: IDeserialize<T>): T {
		if (typeof input !== 'string') {
			this.decoder ??= new TextDecoder('utf-8', { fatal: true });
			input = this.decoder.decode(input);
		}

		const deserializer = new JsonDeserializer(input, this.options);
		try {
			const value = mapping.deserialize(deserializer);
			deserializer.end();
			return value;
		} catch (e) {
			if (e instanceof DeserializationError) {
				setErrorPosition(e, deserializer.offset);
			}

			throw e;
		}
	}
}
