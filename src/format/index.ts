/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import type { IDeserialize } from '../de';
import type { ISerialize } from '../ser';

/**
 * Encoded data as text or bytes.
 */
export type Transportable = string | Uint8Array;

/**
 * A concrete format: drives the producer and consumer of one encoding.
 */
export interface IFormat<TOutput, TInput = TOutput> {
	/**
	 * Encodes the value through its mapping.
	 */
	serialize<T>(value: T, mapping: ISerialize<T>): TOutput;

	/**
	 * Decodes a value through its mapping. Input left over after the value
	 * fails the decode.
	 */
	deserialize<T>(input: TInput, mapping: IDeserialize<T>): T;
}

export * from './binary';
export * from './json';
export * from './value';
