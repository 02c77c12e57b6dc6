/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { SerializationError, SerializationFailure } from './errors';

/**
 * Mapping logic for the encode side: translates a value of type `T` into
 * calls on a producer. A mapping must always pick the same shape for a type.
 */
export interface ISerialize<T> {
	serialize<Ok>(value: T, serializer: ISerializer<Ok>): Ok;
}

/**
 * Session for `seq`, `tuple`, `tuple_struct` and `tuple_variant` shapes.
 */
export interface ISerializeSeq<Ok> {
	/**
	 * Writes the next element.
	 */
	serializeElement<T>(value: T, mapping: ISerialize<T>): void;

	/**
	 * Finishes the session. Fails if a declared length was not met.
	 */
	end(): Ok;
}

export type SerializeTuple<Ok> = ISerializeSeq<Ok>;
export type SerializeTupleStruct<Ok> = ISerializeSeq<Ok>;
export type SerializeTupleVariant<Ok> = ISerializeSeq<Ok>;

/**
 * Session for the `map` shape. Keys and values are written alternately,
 * either one at a time or as an entry.
 */
export interface ISerializeMap<Ok> {
	serializeKey<K>(key: K, mapping: ISerialize<K>): void;
	serializeValue<V>(value: V, mapping: ISerialize<V>): void;
	serializeEntry<K, V>(
		key: K,
		keyMapping: ISerialize<K>,
		value: V,
		valueMapping: ISerialize<V>,
	): void;
	end(): Ok;
}

/**
 * Session for `struct` and `struct_variant` shapes. Field keys are constant
 * strings declared by the mapping logic.
 */
export interface ISerializeStruct<Ok> {
	serializeField<T>(key: string, value: T, mapping: ISerialize<T>): void;

	/**
	 * Tells formats that count fields that a declared field was left out.
	 */
	skipField(key: string): void;

	end(): Ok;
}

export type SerializeStructVariant<Ok> = ISerializeStruct<Ok>;

/**
 * The producer protocol. A format writer implements one operation per shape.
 * Each call either succeeds or throws a `SerializationError`; calls must
 * follow the nesting order of the data, and every session must be ended.
 */
export interface ISerializer<Ok> {
	/**
	 * Whether the format is meant for people to read. Mapping logic may pick
	 * a more compact representation for formats that are not.
	 */
	readonly isHumanReadable: boolean;

	serializeBool(value: boolean): Ok;
	serializeI8(value: number): Ok;
	serializeI16(value: number): Ok;
	serializeI32(value: number): Ok;
	serializeI64(value: bigint): Ok;
	serializeI128(value: bigint): Ok;
	serializeU8(value: number): Ok;
	serializeU16(value: number): Ok;
	serializeU32(value: number): Ok;
	serializeU64(value: bigint): Ok;
	serializeU128(value: bigint): Ok;
	serializeF32(value: number): Ok;
	serializeF64(value: number): Ok;

	/**
	 * Writes a single Unicode scalar value.
	 */
	serializeChar(value: string): Ok;
	serializeStr(value: string): Ok;
	serializeBytes(value: Uint8Array): Ok;

	serializeNone(): Ok;
	serializeSome<T>(value: T, mapping: ISerialize<T>): Ok;

	serializeUnit(): Ok;
	serializeUnitStruct(name: string): Ok;
	serializeUnitVariant(name: string, variantIndex: number, variant: string): Ok;

	serializeNewtypeStruct<T>(name: string, value: T, mapping: ISerialize<T>): Ok;
	serializeNewtypeVariant<T>(
		name: string,
		variantIndex: number,
		variant: string,
		value: T,
		mapping: ISerialize<T>,
	): Ok;

	/**
	 * Begins a sequence. The length may be unknown until all elements have
	 * been written.
	 */
	serializeSeq(len: number | undefined): ISerializeSeq<Ok>;
	serializeTuple(len: number): SerializeTuple<Ok>;
	serializeTupleStruct(name: string, len: number): SerializeTupleStruct<Ok>;
	serializeTupleVariant(
		name: string,
		variantIndex: number,
		variant: string,
		len: number,
	): SerializeTupleVariant<Ok>;

	/**
	 * Begins a map. The length may be unknown until all entries have been
	 * written.
	 */
	serializeMap(len: number | undefined): ISerializeMap<Ok>;
	serializeStruct(name: string, len: number): ISerializeStruct<Ok>;
	serializeStructVariant(
		name: string,
		variantIndex: number,
		variant: string,
		len: number,
	): SerializeStructVariant<Ok>;
}

/**
 * Checks the number of elements written in a session against the length it
 * declared at the start, if it declared one.
 */
export function checkSessionLength(declared: number | undefined, written: number, what: string) {
	if (declared !== undefined && declared !== written) {
		throw new SerializationError(
			`${what} declared ${declared} elements but ${written} were written`,
			SerializationFailure.LengthMismatch,
		);
	}
}
