/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import type { IDeserializer, IEnumAccess, IMapAccess, ISeqAccess } from './de';
import { InvalidTypeError } from './errors';

/**
 * Builds an in-memory value from exactly one decoded shape. Every method is
 * optional: a visitor implements only the shapes it can build from, and the
 * `Visit` dispatch supplies the defaults for the rest.
 *
 * Strings and bytes arrive in one of three flavors:
 *  - `visitStr`/`visitBytes` receive transient data, valid only during the
 *    call. Copy it to keep it; byte views may be overwritten afterwards.
 *  - `visitString`/`visitByteBuf` receive an independent copy the visitor
 *    now owns.
 *  - `visitBorrowedStr`/`visitBorrowedBytes` receive data that lives as long
 *    as the input buffer the decode started from.
 */
export interface IVisitor<T> {
	/**
	 * Describes what the visitor builds, for error messages, e.g.
	 * "a Unix timestamp".
	 */
	readonly expecting: string;

	visitBool?(value: boolean): T;

	visitI8?(value: number): T;
	visitI16?(value: number): T;
	visitI32?(value: number): T;
	visitI64?(value: bigint): T;
	visitI128?(value: bigint): T;

	visitU8?(value: number): T;
	visitU16?(value: number): T;
	visitU32?(value: number): T;
	visitU64?(value: bigint): T;
	visitU128?(value: bigint): T;

	visitF32?(value: number): T;
	visitF64?(value: number): T;
	visitChar?(value: string): T;

	visitStr?(value: string): T;
	visitBorrowedStr?(value: string): T;
	visitString?(value: string): T;

	visitBytes?(value: Uint8Array): T;
	visitBorrowedBytes?(value: Uint8Array): T;
	visitByteBuf?(value: Uint8Array): T;

	visitNone?(): T;
	visitSome?(deserializer: IDeserializer): T;
	visitUnit?(): T;
	visitNewtypeStruct?(deserializer: IDeserializer): T;

	visitSeq?(seq: ISeqAccess): T;
	visitMap?(map: IMapAccess): T;
	visitEnum?(data: IEnumAccess): T;
}

export type VisitMethod = Exclude<keyof IVisitor<unknown>, 'expecting'>;

/**
 * Shape label of each visitor method, in the order capabilities are listed.
 */
export const VISIT_METHODS: ReadonlyArray<readonly [VisitMethod, string]> = [
	['visitBool', 'bool'],
	['visitI8', 'i8'],
	['visitI16', 'i16'],
	['visitI32', 'i32'],
	['visitI64', 'i64'],
	['visitI128', 'i128'],
	['visitU8', 'u8'],
	['visitU16', 'u16'],
	['visitU32', 'u32'],
	['visitU64', 'u64'],
	['visitU128', 'u128'],
	['visitF32', 'f32'],
	['visitF64', 'f64'],
	['visitChar', 'char'],
	['visitStr', 'string'],
	['visitBorrowedStr', 'borrowed string'],
	['visitString', 'owned string'],
	['visitBytes', 'bytes'],
	['visitBorrowedBytes', 'borrowed bytes'],
	['visitByteBuf', 'owned bytes'],
	['visitNone', 'option'],
	['visitSome', 'option'],
	['visitUnit', 'unit'],
	['visitNewtypeStruct', 'newtype_struct'],
	['visitSeq', 'seq'],
	['visitMap', 'map'],
	['visitEnum', 'enum'],
];

/**
 * @returns the shapes the visitor declared it can build from
 */
export function capabilities(visitor: IVisitor<unknown>): string[] {
	const labels: string[] = [];
	for (const [method, label] of VISIT_METHODS) {
		if (typeof visitor[method] === 'function' && !labels.includes(label)) {
			labels.push(label);
		}
	}

	return labels;
}

/**
 * @returns the "expected" part of an error raised on behalf of the visitor
 */
export function expectation(visitor: IVisitor<unknown>) {
	const caps = capabilities(visitor);
	const set = caps.length ? `one of {${caps.join(', ')}}` : 'nothing';
	return `${set} (${visitor.expecting})`;
}

/**
 * Describes a decoded value in error messages, e.g. "i32 `5`".
 */
export const describeValue = (shape: string, display?: string) =>
	display === undefined ? shape : `${shape} \`${display}\``;

/**
 * Raises the error a visitor method's default implementation fails with.
 */
export function invalidType(visitor: IVisitor<unknown>, shape: string, display?: string) {
	return new InvalidTypeError(describeValue(shape, display), expectation(visitor));
}

/**
 * Dispatch table that invokes one visitor method per decoded shape, applying
 * the defaults for methods the visitor does not implement. Consumers call
 * these instead of the visitor's methods directly.
 */
export namespace Visit {
	export function bool<T>(visitor: IVisitor<T>, value: boolean): T {
		if (visitor.visitBool) {
			return visitor.visitBool(value);
		}

		throw invalidType(visitor, 'bool', String(value));
	}

	export function i8<T>(visitor: IVisitor<T>, value: number): T {
		return visitor.visitI8 ? visitor.visitI8(value) : i64(visitor, BigInt(value), 'i8');
	}

	export function i16<T>(visitor: IVisitor<T>, value: number): T {
		return visitor.visitI16 ? visitor.visitI16(value) : i64(visitor, BigInt(value), 'i16');
	}

	export function i32<T>(visitor: IVisitor<T>, value: number): T {
		return visitor.visitI32 ? visitor.visitI32(value) : i64(visitor, BigInt(value), 'i32');
	}

	export function i64<T>(visitor: IVisitor<T>, value: bigint, shape = 'i64'): T {
		if (visitor.visitI64) {
			return visitor.visitI64(value);
		}

		throw invalidType(visitor, shape, String(value));
	}

	export function i128<T>(visitor: IVisitor<T>, value: bigint): T {
		if (visitor.visitI128) {
			return visitor.visitI128(value);
		}

		throw invalidType(visitor, 'i128', String(value));
	}

	export function u8<T>(visitor: IVisitor<T>, value: number): T {
		return visitor.visitU8 ? visitor.visitU8(value) : u64(visitor, BigInt(value), 'u8');
	}

	export function u16<T>(visitor: IVisitor<T>, value: number): T {
		return visitor.visitU16 ? visitor.visitU16(value) : u64(visitor, BigInt(value), 'u16');
	}

	export function u32<T>(visitor: IVisitor<T>, value: number): T {
		return visitor.visitU32 ? visitor.visitU32(value) : u64(visitor, BigInt(value), 'u32');
	}

	export function u64<T>(visitor: IVisitor<T>, value: bigint, shape = 'u64'): T {
		if (visitor.visitU64) {
			return visitor.visitU64(value);
		}

		throw invalidType(visitor, shape, String(value));
	}

	export function u128<T>(visitor: IVisitor<T>, value: bigint): T {
		if (visitor.visitU128) {
			return visitor.visitU128(value);
		}

		throw invalidType(visitor, 'u128', String(value));
	}

	export function f32<T>(visitor: IVisitor<T>, value: number): T {
		return visitor.visitF32 ? visitor.visitF32(value) : f64(visitor, value, 'f32');
	}

	export function f64<T>(visitor: IVisitor<T>, value: number, shape = 'f64'): T {
		if (visitor.visitF64) {
			return visitor.visitF64(value);
		}

		throw invalidType(visitor, shape, String(value));
	}

	export function char<T>(visitor: IVisitor<T>, value: string): T {
		return visitor.visitChar ? visitor.visitChar(value) : str(visitor, value, 'char');
	}

	/**
	 * Delivers a transient string.
	 */
	export function str<T>(visitor: IVisitor<T>, value: string, shape = 'string'): T {
		if (visitor.visitStr) {
			return visitor.visitStr(value);
		}

		throw invalidType(visitor, shape, value);
	}

	export function borrowedStr<T>(visitor: IVisitor<T>, value: string): T {
		return visitor.visitBorrowedStr ? visitor.visitBorrowedStr(value) : str(visitor, value);
	}

	export function ownedStr<T>(visitor: IVisitor<T>, value: string): T {
		return visitor.visitString ? visitor.visitString(value) : str(visitor, value);
	}

	/**
	 * Delivers transient bytes.
	 */
	export function bytes<T>(visitor: IVisitor<T>, value: Uint8Array): T {
		if (visitor.visitBytes) {
			return visitor.visitBytes(value);
		}

		throw invalidType(visitor, 'bytes');
	}

	export function borrowedBytes<T>(visitor: IVisitor<T>, value: Uint8Array): T {
		return visitor.visitBorrowedBytes
			? visitor.visitBorrowedBytes(value)
			: bytes(visitor, value);
	}

	export function byteBuf<T>(visitor: IVisitor<T>, value: Uint8Array): T {
		return visitor.visitByteBuf ? visitor.visitByteBuf(value) : bytes(visitor, value);
	}

	export function none<T>(visitor: IVisitor<T>): T {
		if (visitor.visitNone) {
			return visitor.visitNone();
		}

		throw invalidType(visitor, 'option', 'none');
	}

	export function some<T>(visitor: IVisitor<T>, deserializer: IDeserializer): T {
		if (visitor.visitSome) {
			return visitor.visitSome(deserializer);
		}

		throw invalidType(visitor, 'option', 'some');
	}

	export function unit<T>(visitor: IVisitor<T>): T {
		if (visitor.visitUnit) {
			return visitor.visitUnit();
		}

		throw invalidType(visitor, 'unit');
	}

	export function newtypeStruct<T>(visitor: IVisitor<T>, deserializer: IDeserializer): T {
		if (visitor.visitNewtypeStruct) {
			return visitor.visitNewtypeStruct(deserializer);
		}

		throw invalidType(visitor, 'newtype_struct');
	}

	export function seq<T>(visitor: IVisitor<T>, access: ISeqAccess): T {
		if (visitor.visitSeq) {
			return visitor.visitSeq(access);
		}

		throw invalidType(visitor, 'seq');
	}

	export function map<T>(visitor: IVisitor<T>, access: IMapAccess): T {
		if (visitor.visitMap) {
			return visitor.visitMap(access);
		}

		throw invalidType(visitor, 'map');
	}

	export function enumeration<T>(visitor: IVisitor<T>, access: IEnumAccess): T {
		if (visitor.visitEnum) {
			return visitor.visitEnum(access);
		}

		throw invalidType(visitor, 'enum');
	}
}
