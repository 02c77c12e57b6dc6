/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import type { IDeserialize } from '../de';
import type { ISerialize } from '../ser';

/**
 * Both halves of the mapping between a type and the data model.
 */
export interface IMapping<T> extends ISerialize<T>, IDeserialize<T> {}

/**
 * The type a mapping maps.
 */
export type TypeOf<M> = M extends IMapping<infer T> ? T : never;

/**
 * Element types of a list of mappings.
 */
export type TypesOf<E extends readonly IMapping<unknown>[]> = {
	-readonly [I in keyof E]: TypeOf<E[I]>;
};

/**
 * Field mappings of a struct, in declaration order.
 */
export type Fields = Record<string, IMapping<unknown>>;

/**
 * The object type described by a set of field mappings.
 */
export type StructOf<F extends Fields> = { [K in keyof F]: TypeOf<F[K]> };

export const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);
