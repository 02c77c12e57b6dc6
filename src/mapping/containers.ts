/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { ISeqAccess } from '../de';
import { InvalidLengthError, SerializationError, SerializationFailure } from '../errors';
import { IVisitor } from '../visitor';
import { string } from './primitives';
import { IMapping, TypesOf } from './types';

/**
 * Maps `undefined` to an absent option and anything else to a present one.
 * An option of an option cannot tell `undefined` inside from absent; wrap
 * the inner value in a newtype where that matters.
 */
export function option<T>(inner: IMapping<T>): IMapping<T | undefined> {
	const visitor: IVisitor<T | undefined> = {
		expecting: 'an option',
		visitNone: () => undefined,
		visitUnit: () => undefined,
		visitSome: deserializer => inner.deserialize(deserializer),
	};

	return {
		serialize: (value, serializer) =>
			value === undefined ? serializer.serializeNone() : serializer.serializeSome(value, inner),
		deserialize: deserializer => deserializer.deserializeOption(visitor),
	};
}

/**
 * Maps an array to a `seq` whose length is known up front.
 */
export function array<T>(element: IMapping<T>): IMapping<T[]> {
	const visitor: IVisitor<T[]> = {
		expecting: 'a sequence',
		visitSeq(seq) {
			const out: T[] = [];
			for (let n = seq.nextElement(element); !n.done; n = seq.nextElement(element)) {
				out.push(n.value);
			}

			return out;
		},
	};

	return {
		serialize(value, serializer) {
			const seq = serializer.serializeSeq(value.length);
			for (const item of value) {
				seq.serializeElement(item, element);
			}

			return seq.end();
		},
		deserialize: deserializer => deserializer.deserializeSeq(visitor),
	};
}

/**
 * Maps an iterable to a `seq` whose length is only known once it has been
 * traversed, decoding back to an array.
 */
export function iterable<T>(element: IMapping<T>): IMapping<Iterable<T>> {
	const decoded = array(element);
	return {
		serialize(value, serializer) {
			const seq = serializer.serializeSeq(undefined);
			for (const item of value) {
				seq.serializeElement(item, element);
			}

			return seq.end();
		},
		deserialize: deserializer => decoded.deserialize(deserializer),
	};
}

/**
 * Maps a `Map` to the `map` shape. Later duplicate keys replace earlier ones.
 */
export function map<K, V>(key: IMapping<K>, value: IMapping<V>): IMapping<Map<K, V>> {
	const visitor: IVisitor<Map<K, V>> = {
		expecting: 'a map',
		visitMap(access) {
			const out = new Map<K, V>();
			for (let n = access.nextKey(key); !n.done; n = access.nextKey(key)) {
				out.set(n.value, access.nextValue(value));
			}

			return out;
		},
	};

	return {
		serialize(entries, serializer) {
			const session = serializer.serializeMap(entries.size);
			for (const [k, v] of entries) {
				session.serializeEntry(k, key, v, value);
			}

			return session.end();
		},
		deserialize: deserializer => deserializer.deserializeMap(visitor),
	};
}

/**
 * Maps a string-keyed object to the `map` shape.
 */
export function record<V>(value: IMapping<V>): IMapping<Record<string, V>> {
	const inner = map(string, value);
	return {
		serialize: (object, serializer) => inner.serialize(new Map(Object.entries(object)), serializer),
		deserialize: deserializer => Object.fromEntries(inner.deserialize(deserializer)),
	};
}

/**
 * Pulls exactly `mappings.length` elements from a fixed-length session.
 */
export function readFixed(
	seq: ISeqAccess,
	mappings: readonly IMapping<unknown>[],
	expecting: string,
): unknown[] {
	const out: unknown[] = [];
	for (const mapping of mappings) {
		const n = seq.nextElement(mapping);
		if (n.done) {
			throw new InvalidLengthError(out.length, expecting);
		}

		out.push(n.value);
	}

	return out;
}

function checkArity(value: readonly unknown[], arity: number, what: string) {
	if (value.length !== arity) {
		throw new SerializationError(
			`expected ${what} of ${arity} elements, got ${value.length}`,
			SerializationFailure.LengthMismatch,
		);
	}
}

/**
 * Maps a fixed-length array of heterogeneous elements to the `tuple` shape.
 */
export function tuple<E extends IMapping<unknown>[]>(...elements: E): IMapping<TypesOf<E>>;
export function tuple(...elements: IMapping<unknown>[]): IMapping<unknown[]> {
	const expecting = `a tuple of size ${elements.length}`;
	const visitor: IVisitor<unknown[]> = {
		expecting,
		visitSeq: seq => readFixed(seq, elements, expecting),
	};

	return {
		serialize(value, serializer) {
			checkArity(value, elements.length, 'a tuple');
			const session = serializer.serializeTuple(elements.length);
			elements.forEach((mapping, i) => session.serializeElement(value[i], mapping));
			return session.end();
		},
		deserialize: deserializer => deserializer.deserializeTuple(elements.length, visitor),
	};
}

/**
 * Maps a named fixed-length array to the `tuple_struct` shape.
 */
export function tupleStruct<E extends IMapping<unknown>[]>(
	name: string,
	...elements: E
): IMapping<TypesOf<E>>;
export function tupleStruct(name: string, ...elements: IMapping<unknown>[]): IMapping<unknown[]> {
	const expecting = `tuple struct ${name}`;
	const visitor: IVisitor<unknown[]> = {
		expecting,
		visitSeq: seq => readFixed(seq, elements, expecting),
	};

	return {
		serialize(value, serializer) {
			checkArity(value, elements.length, expecting);
			const session = serializer.serializeTupleStruct(name, elements.length);
			elements.forEach((mapping, i) => session.serializeElement(value[i], mapping));
			return session.end();
		},
		deserialize: deserializer =>
			deserializer.deserializeTupleStruct(name, elements.length, visitor),
	};
}

/**
 * Maps a singleton value to the `unit_struct` shape. Decoding returns the
 * same value.
 */
export function unitStruct<T>(name: string, value: T): IMapping<T> {
	const visitor: IVisitor<T> = {
		expecting: `unit struct ${name}`,
		visitUnit: () => value,
	};

	return {
		serialize: (_value, serializer) => serializer.serializeUnitStruct(name),
		deserialize: deserializer => deserializer.deserializeUnitStruct(name, visitor),
	};
}

/**
 * Maps a value to the `newtype_struct` shape: a named wrapper around it.
 */
export function newtypeStruct<T>(name: string, inner: IMapping<T>): IMapping<T> {
	const expecting = `newtype struct ${name}`;
	const visitor: IVisitor<T> = {
		expecting,
		visitNewtypeStruct: deserializer => inner.deserialize(deserializer),
		visitSeq(seq) {
			const n = seq.nextElement(inner);
			if (n.done) {
				throw new InvalidLengthError(0, expecting);
			}

			return n.value;
		},
	};

	return {
		serialize: (value, serializer) => serializer.serializeNewtypeStruct(name, value, inner),
		deserialize: deserializer => deserializer.deserializeNewtypeStruct(name, visitor),
	};
}
