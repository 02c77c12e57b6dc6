/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { TextDecoder } from 'util';
import { IDeserialize, IMapAccess, ISeqAccess } from '../de';
import {
	DuplicateFieldError,
	InvalidValueError,
	MissingFieldError,
	SerializationError,
	SerializationFailure,
	UnknownFieldError,
} from '../errors';
import { ISerializeStruct } from '../ser';
import { IVisitor } from '../visitor';
import { readFixed } from './containers';
import { Fields, IMapping, isRecord, StructOf } from './types';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decodes a struct field name or enum variant tag to its index in `names`.
 * Formats may send the name as a string or bytes, or the index itself.
 */
export function identifier(
	names: readonly string[],
	unknown: (name: string) => Error,
	expecting: string,
): IDeserialize<number> {
	const byName = (name: string) => {
		const index = names.indexOf(name);
		if (index === -1) {
			throw unknown(name);
		}

		return index;
	};

	const visitor: IVisitor<number> = {
		expecting,
		visitStr: byName,
		visitBytes: value => byName(utf8.decode(value)),
		visitU64(value) {
			if (value >= BigInt(names.length)) {
				throw new InvalidValueError(
					`index \`${value}\``,
					`an index below ${names.length} (${expecting})`,
				);
			}

			return Number(value);
		},
	};

	return { deserialize: deserializer => deserializer.deserializeIdentifier(visitor) };
}

/**
 * Writes every field of an object into a struct session.
 * @hidden
 */
export function writeFields<Ok>(
	session: ISerializeStruct<Ok>,
	fields: Fields,
	value: unknown,
	what: string,
): Ok {
	if (!isRecord(value)) {
		throw new SerializationError(`expected an object for ${what}`, SerializationFailure.Custom);
	}

	for (const [key, mapping] of Object.entries(fields)) {
		session.serializeField(key, value[key], mapping);
	}

	return session.end();
}

/**
 * Visitor that builds an object from either a map of named fields or a
 * sequence of fields in declaration order. Unknown, repeated and missing
 * fields fail the decode.
 * @hidden
 */
export function fieldsVisitor(
	fields: Fields,
	expecting: string,
): IVisitor<Record<string, unknown>> {
	const names = Object.keys(fields);
	const mappings = Object.values(fields);
	const key = identifier(names, name => new UnknownFieldError(name, names), 'a field identifier');

	return {
		expecting,
		visitMap(access: IMapAccess) {
			const values = new Map<string, unknown>();
			for (let n = access.nextKey(key); !n.done; n = access.nextKey(key)) {
				const name = names[n.value];
				if (values.has(name)) {
					throw new DuplicateFieldError(name);
				}

				values.set(name, access.nextValue(mappings[n.value]));
			}

			for (const name of names) {
				if (!values.has(name)) {
					throw new MissingFieldError(name);
				}
			}

			return Object.fromEntries(names.map(name => [name, values.get(name)]));
		},
		visitSeq(seq: ISeqAccess) {
			const values = readFixed(seq, mappings, expecting);
			return Object.fromEntries(names.map((name, i) => [name, values[i]]));
		},
	};
}

/**
 * Maps an object with a fixed set of fields to the `struct` shape. Fields are
 * written in the order they are declared here.
 */
export function struct<F extends Fields>(name: string, fields: F): IMapping<StructOf<F>>;
export function struct(name: string, fields: Fields): IMapping<Record<string, unknown>> {
	const names = Object.keys(fields);
	const visitor = fieldsVisitor(fields, `struct ${name}`);

	return {
		serialize: (value, serializer) =>
			writeFields(
				serializer.serializeStruct(name, names.length),
				fields,
				value,
				`struct ${name}`,
			),
		deserialize: deserializer => deserializer.deserializeStruct(name, names, visitor),
	};
}
