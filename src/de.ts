/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import type { IVisitor } from './visitor';

/**
 * Mapping logic for the decode side: asks a consumer for the shape it
 * expects, handing over a visitor that builds the value. Also used as the
 * seed for each nested element a session fetches.
 */
export interface IDeserialize<T> {
	deserialize(deserializer: IDeserializer): T;
}

/**
 * Result of fetching from a pull session. `done` is signalled exactly once,
 * after the last element.
 */
export type Next<T> = { done: true } | { done: false; value: T };

export const done: { done: true } = { done: true };

export const next = <T>(value: T): Next<T> => ({ done: false, value });

/**
 * Pull session for sequence-like shapes.
 */
export interface ISeqAccess {
	/**
	 * Number of remaining elements, if the format knows it.
	 */
	readonly sizeHint: number | undefined;

	/**
	 * Decodes the next element, or signals the end of the sequence.
	 */
	nextElement<T>(seed: IDeserialize<T>): Next<T>;
}

/**
 * Pull session for map-like shapes. Each `nextKey` that yields a key must be
 * followed by exactly one `nextValue`.
 */
export interface IMapAccess {
	readonly sizeHint: number | undefined;
	nextKey<K>(seed: IDeserialize<K>): Next<K>;
	nextValue<V>(seed: IDeserialize<V>): V;
}

/**
 * What a self-describing format knows about a variant before its payload is
 * read.
 */
export interface IVariantHint {
	readonly kind: 'unit_variant' | 'newtype_variant' | 'tuple_variant' | 'struct_variant';
	readonly name?: string;
	readonly variantIndex?: number;
	/**
	 * Element or field count of tuple and struct variants.
	 */
	readonly len?: number;
}

/**
 * Access to the payload of an enum variant, after its tag was read.
 */
export interface IVariantAccess {
	/**
	 * The payload's form, if the format records it. Formats that do not leave
	 * this undefined and the caller picks the form.
	 */
	readonly hint?: IVariantHint;
	unitVariant(): void;
	newtypeVariant<T>(seed: IDeserialize<T>): T;
	tupleVariant<T>(len: number, visitor: IVisitor<T>): T;
	structVariant<T>(fields: readonly string[], visitor: IVisitor<T>): T;
}

export interface IEnumAccess {
	/**
	 * Decodes the variant tag with the seed, returning it together with the
	 * access for the payload.
	 */
	variant<V>(seed: IDeserialize<V>): [V, IVariantAccess];
}

/**
 * The consumer protocol. A format reader implements one entry operation per
 * shape category. Each entry operation inspects the next value of the input
 * and invokes exactly one method on the visitor, returning its result.
 */
export interface IDeserializer {
	readonly isHumanReadable: boolean;

	/**
	 * Lets the input determine the shape. Only self-describing formats
	 * support this.
	 */
	deserializeAny<T>(visitor: IVisitor<T>): T;

	deserializeBool<T>(visitor: IVisitor<T>): T;
	deserializeI8<T>(visitor: IVisitor<T>): T;
	deserializeI16<T>(visitor: IVisitor<T>): T;
	deserializeI32<T>(visitor: IVisitor<T>): T;
	deserializeI64<T>(visitor: IVisitor<T>): T;
	deserializeI128<T>(visitor: IVisitor<T>): T;
	deserializeU8<T>(visitor: IVisitor<T>): T;
	deserializeU16<T>(visitor: IVisitor<T>): T;
	deserializeU32<T>(visitor: IVisitor<T>): T;
	deserializeU64<T>(visitor: IVisitor<T>): T;
	deserializeU128<T>(visitor: IVisitor<T>): T;
	deserializeF32<T>(visitor: IVisitor<T>): T;
	deserializeF64<T>(visitor: IVisitor<T>): T;
	deserializeChar<T>(visitor: IVisitor<T>): T;

	/**
	 * Asks for a string the visitor will not retain; the format may offer a
	 * transient or borrowed one.
	 */
	deserializeStr<T>(visitor: IVisitor<T>): T;

	/**
	 * Asks for a string the visitor will keep.
	 */
	deserializeString<T>(visitor: IVisitor<T>): T;
	deserializeBytes<T>(visitor: IVisitor<T>): T;
	deserializeByteBuf<T>(visitor: IVisitor<T>): T;

	deserializeOption<T>(visitor: IVisitor<T>): T;
	deserializeUnit<T>(visitor: IVisitor<T>): T;
	deserializeUnitStruct<T>(name: string, visitor: IVisitor<T>): T;
	deserializeNewtypeStruct<T>(name: string, visitor: IVisitor<T>): T;

	deserializeSeq<T>(visitor: IVisitor<T>): T;
	deserializeTuple<T>(len: number, visitor: IVisitor<T>): T;
	deserializeTupleStruct<T>(name: string, len: number, visitor: IVisitor<T>): T;
	deserializeMap<T>(visitor: IVisitor<T>): T;
	deserializeStruct<T>(name: string, fields: readonly string[], visitor: IVisitor<T>): T;
	deserializeEnum<T>(name: string, variants: readonly string[], visitor: IVisitor<T>): T;

	/**
	 * Decodes a struct field name or enum variant tag.
	 */
	deserializeIdentifier<T>(visitor: IVisitor<T>): T;

	/**
	 * Skips over the next value, whatever its shape.
	 */
	deserializeIgnoredAny<T>(visitor: IVisitor<T>): T;
}

/**
 * Base for consumers of self-describing formats, where the input alone
 * determines the shape. Every entry operation defers to `deserializeAny`
 * unless the format overrides it.
 */
export abstract class SelfDescribingDeserializer implements IDeserializer {
	public abstract readonly isHumanReadable: boolean;

	public abstract deserializeAny<T>(visitor: IVisitor<T>): T;

	deserializeBool<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeI8<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeI16<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeI32<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeI64<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeI128<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeU8<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeU16<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeU32<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeU64<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeU128<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeF32<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeF64<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeChar<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeStr<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeString<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeBytes<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeByteBuf<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeOption<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeUnit<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeUnitStruct<T>(_name: string, visitor: IVisitor<T>): T {
		return this.deserializeUnit(visitor);
	}

	deserializeNewtypeStruct<T>(_name: string, visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeSeq<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeTuple<T>(_len: number, visitor: IVisitor<T>): T {
		return this.deserializeSeq(visitor);
	}

	deserializeTupleStruct<T>(_name: string, _len: number, visitor: IVisitor<T>): T {
		return this.deserializeSeq(visitor);
	}

	deserializeMap<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeStruct<T>(_name: string, _fields: readonly string[], visitor: IVisitor<T>): T {
		return this.deserializeMap(visitor);
	}

	deserializeEnum<T>(_name: string, _variants: readonly string[], visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}

	deserializeIdentifier<T>(visitor: IVisitor<T>): T {
		return this.deserializeStr(visitor);
	}

	deserializeIgnoredAny<T>(visitor: IVisitor<T>): T {
		return this.deserializeAny(visitor);
	}
}
