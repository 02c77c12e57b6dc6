/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { EventEmitter } from 'cockatiel';
import {
	IDeserialize,
	IDeserializer,
	IEnumAccess,
	IMapAccess,
	ISeqAccess,
	IVariantAccess,
	Next,
} from './de';
import { ShapeKind } from './model';
import { ISerialize, ISerializeMap, ISerializer, ISerializeSeq, ISerializeStruct } from './ser';
import { IVisitor, VisitMethod } from './visitor';

/**
 * Fired for each producer operation.
 */
export interface ISerializeEvent {
	kind: ShapeKind;
	/** Nesting level, 0 for the root value. */
	depth: number;
	/** The primitive, string or byte value written, if any. */
	value?: unknown;
	name?: string;
	variant?: string;
	len?: number;
}

/**
 * Fired for each consumer entry operation, before the consumer runs.
 */
export interface IRequestEvent {
	/** Name of the entry operation, e.g. `deserializeStruct`. */
	operation: keyof IDeserializer;
	depth: number;
	name?: string;
	len?: number;
	fields?: readonly string[];
}

/**
 * Fired for each visitor method a consumer invokes.
 */
export interface IVisitEvent {
	method: VisitMethod;
	depth: number;
}

class ObservedSeqSession<Ok> implements ISerializeSeq<Ok> {
	constructor(
		private readonly inner: ISerializeSeq<Ok>,
		private readonly owner: ObservedSerializer<Ok>,
	) {}

	serializeElement<T>(value: T, mapping: ISerialize<T>) {
		this.inner.serializeElement(value, this.owner.nested(mapping));
	}

	end() {
		return this.inner.end();
	}
}

class ObservedMapSession<Ok> implements ISerializeMap<Ok> {
	constructor(
		private readonly inner: ISerializeMap<Ok>,
		private readonly owner: ObservedSerializer<Ok>,
	) {}

	serializeKey<K>(key: K, mapping: ISerialize<K>) {
		this.inner.serializeKey(key, this.owner.nested(mapping));
	}

	serializeValue<V>(value: V, mapping: ISerialize<V>) {
		this.inner.serializeValue(value, this.owner.nested(mapping));
	}

	serializeEntry<K, V>(key: K, keyMapping: ISerialize<K>, value: V, valueMapping: ISerialize<V>) {
		this.inner.serializeEntry(
			key,
			this.owner.nested(keyMapping),
			value,
			this.owner.nested(valueMapping),
		);
	}

	end() {
		return this.inner.end();
	}
}

class ObservedStructSession<Ok> implements ISerializeStruct<Ok> {
	constructor(
		private readonly inner: ISerializeStruct<Ok>,
		private readonly owner: ObservedSerializer<Ok>,
	) {}

	serializeField<T>(key: string, value: T, mapping: ISerialize<T>) {
		this.inner.serializeField(key, value, this.owner.nested(mapping));
	}

	skipField(key: string) {
		this.inner.skipField(key);
	}

	end() {
		return this.inner.end();
	}
}

/**
 * Wraps a producer, firing an event for every operation on it and on the
 * values nested inside.
 */
export class ObservedSerializer<Ok> implements ISerializer<Ok> {
	/**
	 * Event that fires for every shape written, including nested ones.
	 */
	public readonly onDidSerialize = this.emitter.addListener;

	public get isHumanReadable() {
		return this.inner.isHumanReadable;
	}

	constructor(
		private readonly inner: ISerializer<Ok>,
		private readonly emitter = new EventEmitter<ISerializeEvent>(),
		private readonly depth = 0,
	) {}

	/**
	 * Wraps a nested mapping so the values it writes are observed one level
	 * deeper.
	 * @hidden
	 */
	public nested<T>(mapping: ISerialize<T>): ISerialize<T> {
		const { emitter, depth } = this;
		return {
			serialize<O>(value: T, serializer: ISerializer<O>): O {
				return mapping.serialize(value, new ObservedSerializer(serializer, emitter, depth + 1));
			},
		};
	}

	serializeBool(value: boolean) {
		this.fire('bool', { value });
		return this.inner.serializeBool(value);
	}

	serializeI8(value: number) {
		this.fire('i8', { value });
		return this.inner.serializeI8(value);
	}

	serializeI16(value: number) {
		this.fire('i16', { value });
		return this.inner.serializeI16(value);
	}

	serializeI32(value: number) {
		this.fire('i32', { value });
		return this.inner.serializeI32(value);
	}

	serializeI64(value: bigint) {
		this.fire('i64', { value });
		return this.inner.serializeI64(value);
	}

	serializeI128(value: bigint) {
		this.fire('i128', { value });
		return this.inner.serializeI128(value);
	}

	serializeU8(value: number) {
		this.fire('u8', { value });
		return this.inner.serializeU8(value);
	}

	serializeU16(value: number) {
		this.fire('u16', { value });
		return this.inner.serializeU16(value);
	}

	serializeU32(value: number) {
		this.fire('u32', { value });
		return this.inner.serializeU32(value);
	}

	serializeU64(value: bigint) {
		this.fire('u64', { value });
		return this.inner.serializeU64(value);
	}

	serializeU128(value: bigint) {
		this.fire('u128', { value });
		return this.inner.serializeU128(value);
	}

	serializeF32(value: number) {
		this.fire('f32', { value });
		return this.inner.serializeF32(value);
	}

	serializeF64(value: number) {
		this.fire('f64', { value });
		return this.inner.serializeF64(value);
	}

	serializeChar(value: string) {
		this.fire('char', { value });
		return this.inner.serializeChar(value);
	}

	serializeStr(value: string) {
		this.fire('string', { value });
		return this.inner.serializeStr(value);
	}

	serializeBytes(value: Uint8Array) {
		this.fire('bytes', { value });
		return this.inner.serializeBytes(value);
	}

	serializeNone() {
		this.fire('option');
		return this.inner.serializeNone();
	}

	serializeSome<T>(value: T, mapping: ISerialize<T>) {
		this.fire('option');
		return this.inner.serializeSome(value, this.nested(mapping));
	}

	serializeUnit() {
		this.fire('unit');
		return this.inner.serializeUnit();
	}

	serializeUnitStruct(name: string) {
		this.fire('unit_struct', { name });
		return this.inner.serializeUnitStruct(name);
	}

	serializeUnitVariant(name: string, variantIndex: number, variant: string) {
		this.fire('unit_variant', { name, variant });
		return this.inner.serializeUnitVariant(name, variantIndex, variant);
	}

	serializeNewtypeStruct<T>(name: string, value: T, mapping: ISerialize<T>) {
		this.fire('newtype_struct', { name });
		return this.inner.serializeNewtypeStruct(name, value, this.nested(mapping));
	}

	serializeNewtypeVariant<T>(
		name: string,
		variantIndex: number,
		variant: string,
		value: T,
		mapping: ISerialize<T>,
	) {
		this.fire('newtype_variant', { name, variant });
		return this.inner.serializeNewtypeVariant(
			name,
			variantIndex,
			variant,
			value,
			this.nested(mapping),
		);
	}

	serializeSeq(len: number | undefined) {
		this.fire('seq', { len });
		return new ObservedSeqSession(this.inner.serializeSeq(len), this);
	}

	serializeTuple(len: number) {
		this.fire('tuple', { len });
		return new ObservedSeqSession(this.inner.serializeTuple(len), this);
	}

	serializeTupleStruct(name: string, len: number) {
		this.fire('tuple_struct', { name, len });
		return new ObservedSeqSession(this.inner.serializeTupleStruct(name, len), this);
	}

	serializeTupleVariant(name: string, variantIndex: number, variant: string, len: number) {
		this.fire('tuple_variant', { name, variant, len });
		return new ObservedSeqSession(
			this.inner.serializeTupleVariant(name, variantIndex, variant, len),
			this,
		);
	}

	serializeMap(len: number | undefined) {
		this.fire('map', { len });
		return new ObservedMapSession(this.inner.serializeMap(len), this);
	}

	serializeStruct(name: string, len: number) {
		this.fire('struct', { name, len });
		return new ObservedStructSession(this.inner.serializeStruct(name, len), this);
	}

	serializeStructVariant(name: string, variantIndex: number, variant: string, len: number) {
		this.fire('struct_variant', { name, variant, len });
		return new ObservedStructSession(
			this.inner.serializeStructVariant(name, variantIndex, variant, len),
			this,
		);
	}

	private fire(kind: ShapeKind, detail: Omit<ISerializeEvent, 'kind' | 'depth'> = {}) {
		this.emitter.emit({ kind, depth: this.depth, ...detail });
	}
}

export interface IDeserializeEmitters {
	request: EventEmitter<IRequestEvent>;
	visit: EventEmitter<IVisitEvent>;
}

class ObservedSeqAccess implements ISeqAccess {
	public get sizeHint() {
		return this.inner.sizeHint;
	}

	constructor(private readonly inner: ISeqAccess, private readonly owner: ObservedDeserializer) {}

	nextElement<T>(seed: IDeserialize<T>): Next<T> {
		return this.inner.nextElement(this.owner.nested(seed));
	}
}

class ObservedMapAccess implements IMapAccess {
	public get sizeHint() {
		return this.inner.sizeHint;
	}

	constructor(private readonly inner: IMapAccess, private readonly owner: ObservedDeserializer) {}

	nextKey<K>(seed: IDeserialize<K>): Next<K> {
		return this.inner.nextKey(this.owner.nested(seed));
	}

	nextValue<V>(seed: IDeserialize<V>): V {
		return this.inner.nextValue(this.owner.nested(seed));
	}
}

class ObservedEnumAccess implements IEnumAccess {
	constructor(private readonly inner: IEnumAccess, private readonly owner: ObservedDeserializer) {}

	variant<V>(seed: IDeserialize<V>): [V, IVariantAccess] {
		const [tag, access] = this.inner.variant(this.owner.nested(seed));
		return [tag, new ObservedVariantAccess(access, this.owner)];
	}
}

class ObservedVariantAccess implements IVariantAccess {
	public get hint() {
		return this.inner.hint;
	}

	constructor(
		private readonly inner: IVariantAccess,
		private readonly owner: ObservedDeserializer,
	) {}

	unitVariant() {
		this.inner.unitVariant();
	}

	newtypeVariant<T>(seed: IDeserialize<T>): T {
		return this.inner.newtypeVariant(this.owner.nested(seed));
	}

	tupleVariant<T>(len: number, visitor: IVisitor<T>): T {
		return this.inner.tupleVariant(len, this.owner.child().observe(visitor));
	}

	structVariant<T>(fields: readonly string[], visitor: IVisitor<T>): T {
		return this.inner.structVariant(fields, this.owner.child().observe(visitor));
	}
}

/**
 * Wraps a consumer, firing an event for every entry operation requested of
 * it and every visitor method it runs, including those of nested values.
 */
export class ObservedDeserializer implements IDeserializer {
	/**
	 * Event that fires when mapping logic calls an entry operation.
	 */
	public readonly onDidRequest = this.emitters.request.addListener;

	/**
	 * Event that fires when the consumer invokes a visitor method.
	 */
	public readonly onDidVisit = this.emitters.visit.addListener;

	public get isHumanReadable() {
		return this.inner.isHumanReadable;
	}

	constructor(
		private readonly inner: IDeserializer,
		private readonly emitters: IDeserializeEmitters = {
			request: new EventEmitter(),
			visit: new EventEmitter(),
		},
		private readonly depth = 0,
	) {}

	/**
	 * @returns an observer for a consumer one level deeper
	 * @hidden
	 */
	public child(inner: IDeserializer = this.inner) {
		return new ObservedDeserializer(inner, this.emitters, this.depth + 1);
	}

	/**
	 * Wraps a seed so the value it decodes is observed one level deeper.
	 * @hidden
	 */
	public nested<T>(seed: IDeserialize<T>): IDeserialize<T> {
		return { deserialize: deserializer => seed.deserialize(this.child(deserializer)) };
	}

	/**
	 * Wraps a visitor so each of its methods fires an event when run. The
	 * wrapper implements exactly the methods the visitor does, so the
	 * defaults and capability lists are unchanged.
	 * @hidden
	 */
	public observe<T>(visitor: IVisitor<T>): IVisitor<T> {
		const on = <A extends unknown[]>(method: VisitMethod, fn: ((...args: A) => T) | undefined) =>
			fn &&
			((...args: A) => {
				this.emitters.visit.emit({ method, depth: this.depth });
				return fn.apply(visitor, args);
			});

		const { visitSome, visitNewtypeStruct, visitSeq, visitMap, visitEnum } = visitor;
		return {
			expecting: visitor.expecting,
			visitBool: on('visitBool', visitor.visitBool),
			visitI8: on('visitI8', visitor.visitI8),
			visitI16: on('visitI16', visitor.visitI16),
			visitI32: on('visitI32', visitor.visitI32),
			visitI64: on('visitI64', visitor.visitI64),
			visitI128: on('visitI128', visitor.visitI128),
			visitU8: on('visitU8', visitor.visitU8),
			visitU16: on('visitU16', visitor.visitU16),
			visitU32: on('visitU32', visitor.visitU32),
			visitU64: on('visitU64', visitor.visitU64),
			visitU128: on('visitU128', visitor.visitU128),
			visitF32: on('visitF32', visitor.visitF32),
			visitF64: on('visitF64', visitor.visitF64),
			visitChar: on('visitChar', visitor.visitChar),
			visitStr: on('visitStr', visitor.visitStr),
			visitBorrowedStr: on('visitBorrowedStr', visitor.visitBorrowedStr),
			visitString: on('visitString', visitor.visitString),
			visitBytes: on('visitBytes', visitor.visitBytes),
			visitBorrowedBytes: on('visitBorrowedBytes', visitor.visitBorrowedBytes),
			visitByteBuf: on('visitByteBuf', visitor.visitByteBuf),
			visitNone: on('visitNone', visitor.visitNone),
			visitUnit: on('visitUnit', visitor.visitUnit),
			visitSome: on(
				'visitSome',
				visitSome && ((d: IDeserializer) => visitSome.call(visitor, this.child(d))),
			),
			visitNewtypeStruct: on(
				'visitNewtypeStruct',
				visitNewtypeStruct &&
					((d: IDeserializer) => visitNewtypeStruct.call(visitor, this.child(d))),
			),
			visitSeq: on(
				'visitSeq',
				visitSeq && ((seq: ISeqAccess) => visitSeq.call(visitor, new ObservedSeqAccess(seq, this))),
			),
			visitMap: on(
				'visitMap',
				visitMap && ((map: IMapAccess) => visitMap.call(visitor, new ObservedMapAccess(map, this))),
			),
			visitEnum: on(
				'visitEnum',
				visitEnum &&
					((data: IEnumAccess) => visitEnum.call(visitor, new ObservedEnumAccess(data, this))),
			),
		};
	}

	deserializeAny<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeAny');
		return this.inner.deserializeAny(this.observe(visitor));
	}

	deserializeBool<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeBool');
		return this.inner.deserializeBool(this.observe(visitor));
	}

	deserializeI8<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeI8');
		return this.inner.deserializeI8(this.observe(visitor));
	}

	deserializeI16<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeI16');
		return this.inner.deserializeI16(this.observe(visitor));
	}

	deserializeI32<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeI32');
		return this.inner.deserializeI32(this.observe(visitor));
	}

	deserializeI64<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeI64');
		return this.inner.deserializeI64(this.observe(visitor));
	}

	deserializeI128<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeI128');
		return this.inner.deserializeI128(this.observe(visitor));
	}

	deserializeU8<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeU8');
		return this.inner.deserializeU8(this.observe(visitor));
	}

	deserializeU16<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeU16');
		return this.inner.deserializeU16(this.observe(visitor));
	}

	deserializeU32<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeU32');
		return this.inner.deserializeU32(this.observe(visitor));
	}

	deserializeU64<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeU64');
		return this.inner.deserializeU64(this.observe(visitor));
	}

	deserializeU128<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeU128');
		return this.inner.deserializeU128(this.observe(visitor));
	}

	deserializeF32<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeF32');
		return this.inner.deserializeF32(this.observe(visitor));
	}

	deserializeF64<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeF64');
		return this.inner.deserializeF64(this.observe(visitor));
	}

	deserializeChar<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeChar');
		return this.inner.deserializeChar(this.observe(visitor));
	}

	deserializeStr<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeStr');
		return this.inner.deserializeStr(this.observe(visitor));
	}

	deserializeString<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeString');
		return this.inner.deserializeString(this.observe(visitor));
	}

	deserializeBytes<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeBytes');
		return this.inner.deserializeBytes(this.observe(visitor));
	}

	deserializeByteBuf<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeByteBuf');
		return this.inner.deserializeByteBuf(this.observe(visitor));
	}

	deserializeOption<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeOption');
		return this.inner.deserializeOption(this.observe(visitor));
	}

	deserializeUnit<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeUnit');
		return this.inner.deserializeUnit(this.observe(visitor));
	}

	deserializeUnitStruct<T>(name: string, visitor: IVisitor<T>): T {
		this.fire('deserializeUnitStruct', { name });
		return this.inner.deserializeUnitStruct(name, this.observe(visitor));
	}

	deserializeNewtypeStruct<T>(name: string, visitor: IVisitor<T>): T {
		this.fire('deserializeNewtypeStruct', { name });
		return this.inner.deserializeNewtypeStruct(name, this.observe(visitor));
	}

	deserializeSeq<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeSeq');
		return this.inner.deserializeSeq(this.observe(visitor));
	}

	deserializeTuple<T>(len: number, visitor: IVisitor<T>): T {
		this.fire('deserializeTuple', { len });
		return this.inner.deserializeTuple(len, this.observe(visitor));
	}

	deserializeTupleStruct<T>(name: string, len: number, visitor: IVisitor<T>): T {
		this.fire('deserializeTupleStruct', { name, len });
		return this.inner.deserializeTupleStruct(name, len, this.observe(visitor));
	}

	deserializeMap<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeMap');
		return this.inner.deserializeMap(this.observe(visitor));
	}

	deserializeStruct<T>(name: string, fields: readonly string[], visitor: IVisitor<T>): T {
		this.fire('deserializeStruct', { name, fields });
		return this.inner.deserializeStruct(name, fields, this.observe(visitor));
	}

	deserializeEnum<T>(name: string, variants: readonly string[], visitor: IVisitor<T>): T {
		this.fire('deserializeEnum', { name, fields: variants });
		return this.inner.deserializeEnum(name, variants, this.observe(visitor));
	}

	deserializeIdentifier<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeIdentifier');
		return this.inner.deserializeIdentifier(this.observe(visitor));
	}

	deserializeIgnoredAny<T>(visitor: IVisitor<T>): T {
		this.fire('deserializeIgnoredAny');
		return this.inner.deserializeIgnoredAny(this.observe(visitor));
	}

	private fire(
		operation: IRequestEvent['operation'],
		detail: Omit<IRequestEvent, 'operation' | 'depth'> = {},
	) {
		this.emitters.request.emit({ operation, depth: this.depth, ...detail });
	}
}
