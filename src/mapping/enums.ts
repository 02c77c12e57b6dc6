/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { SerializationError, SerializationFailure, UnknownVariantError } from '../errors';
import { IVisitor } from '../visitor';
import { readFixed } from './containers';
import { fieldsVisitor, identifier, writeFields } from './structs';
import { Fields, IMapping, isRecord, StructOf, TypeOf, TypesOf } from './types';

export interface IUnitVariant {
	form: 'unit';
}

export interface INewtypeVariant<M extends IMapping<unknown>> {
	form: 'newtype';
	mapping: M;
}

export interface ITupleVariant<E extends IMapping<unknown>[]> {
	form: 'tuple';
	elements: E;
}

export interface IStructVariant<F extends Fields> {
	form: 'struct';
	fields: F;
}

export type VariantDef =
	| IUnitVariant
	| INewtypeVariant<IMapping<unknown>>
	| ITupleVariant<IMapping<unknown>[]>
	| IStructVariant<Fields>;

export type Variants = Record<string, VariantDef>;

export const unitVariant = (): IUnitVariant => ({ form: 'unit' });

export const newtypeVariant = <M extends IMapping<unknown>>(mapping: M): INewtypeVariant<M> => ({
	form: 'newtype',
	mapping,
});

export const tupleVariant = <E extends IMapping<unknown>[]>(...elements: E): ITupleVariant<E> => ({
	form: 'tuple',
	elements,
});

export const structVariant = <F extends Fields>(fields: F): IStructVariant<F> => ({
	form: 'struct',
	fields,
});

type VariantValue<K, D> = D extends INewtypeVariant<infer M>
	? { variant: K; value: TypeOf<M> }
	: D extends ITupleVariant<infer E>
	? { variant: K; value: TypesOf<E> }
	: D extends IStructVariant<infer F>
	? { variant: K; value: StructOf<F> }
	: { variant: K };

/**
 * The tagged union an enumeration maps: `{ variant }` for unit variants and
 * `{ variant, value }` for the others.
 */
export type EnumOf<D extends Variants> = {
	[K in keyof D & string]: VariantValue<K, D[K]>;
}[keyof D & string];

interface IEnumValue {
	variant: string;
	value?: unknown;
}

const payload = (value: IEnumValue, what: string) => {
	if (!('value' in value)) {
		throw new SerializationError(`${what} needs a value`, SerializationFailure.Custom);
	}

	return value.value;
};

/**
 * Maps a tagged union to the variant shapes: `unit_variant`,
 * `newtype_variant`, `tuple_variant` and `struct_variant`, picked by each
 * variant's form. Variant indexes follow declaration order.
 */
export function enumeration<D extends Variants>(name: string, variants: D): IMapping<EnumOf<D>>;
export function enumeration(name: string, variants: Variants): IMapping<IEnumValue> {
	const names = Object.keys(variants);
	const defs = Object.values(variants);
	const tag = identifier(names, v => new UnknownVariantError(v, names), 'a variant identifier');

	const visitor: IVisitor<IEnumValue> = {
		expecting: `enum ${name}`,
		visitEnum(data) {
			const [index, access] = data.variant(tag);
			const variant = names[index];
			const def = defs[index];
			const what = `variant ${name}::${variant}`;
			switch (def.form) {
				case 'unit':
					access.unitVariant();
					return { variant };
				case 'newtype':
					return { variant, value: access.newtypeVariant(def.mapping) };
				case 'tuple':
					return {
						variant,
						value: access.tupleVariant(def.elements.length, {
							expecting: `tuple ${what}`,
							visitSeq: seq => readFixed(seq, def.elements, `tuple ${what}`),
						}),
					};
				case 'struct':
					return {
						variant,
						value: access.structVariant(
							Object.keys(def.fields),
							fieldsVisitor(def.fields, `struct ${what}`),
						),
					};
			}
		},
	};

	return {
		serialize(value, serializer) {
			const index = names.indexOf(value.variant);
			if (index === -1) {
				throw new SerializationError(
					`enum ${name} has no variant \`${value.variant}\``,
					SerializationFailure.Custom,
				);
			}

			const def = defs[index];
			const what = `variant ${name}::${value.variant}`;
			switch (def.form) {
				case 'unit':
					return serializer.serializeUnitVariant(name, index, value.variant);
				case 'newtype':
					return serializer.serializeNewtypeVariant(
						name,
						index,
						value.variant,
						payload(value, what),
						def.mapping,
					);
				case 'tuple': {
					const elements = payload(value, what);
					if (!Array.isArray(elements) || elements.length !== def.elements.length) {
						throw new SerializationError(
							`${what} needs ${def.elements.length} elements`,
							SerializationFailure.LengthMismatch,
						);
					}

					const session = serializer.serializeTupleVariant(
						name,
						index,
						value.variant,
						def.elements.length,
					);
					def.elements.forEach((mapping, i) => session.serializeElement(elements[i], mapping));
					return session.end();
				}
				case 'struct': {
					const fields = payload(value, what);
					if (!isRecord(fields)) {
						throw new SerializationError(`${what} needs an object`, SerializationFailure.Custom);
					}

					return writeFields(
						serializer.serializeStructVariant(
							name,
							index,
							value.variant,
							Object.keys(def.fields).length,
						),
						def.fields,
						fields,
						what,
					);
				}
			}
		},
		deserialize: deserializer => deserializer.deserializeEnum(name, names, visitor),
	};
}
