/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { IDeserialize, IVariantAccess } from '../de';
import { InvalidTypeError } from '../errors';
import { IVisitor } from '../visitor';

const skip = () => undefined;

const visitor: IVisitor<undefined> = {
	expecting: 'anything at all',
	visitBool: skip,
	visitI64: skip,
	visitI128: skip,
	visitU64: skip,
	visitU128: skip,
	visitF64: skip,
	visitStr: skip,
	visitBytes: skip,
	visitNone: skip,
	visitUnit: skip,
	visitSome: deserializer => ignoredAny.deserialize(deserializer),
	visitNewtypeStruct: deserializer => ignoredAny.deserialize(deserializer),
	visitSeq(seq) {
		while (!seq.nextElement(ignoredAny).done) {
			// drain
		}
		return undefined;
	},
	visitMap(map) {
		while (!map.nextKey(ignoredAny).done) {
			map.nextValue(ignoredAny);
		}
		return undefined;
	},
	visitEnum(data) {
		const [, variant] = data.variant(ignoredAny);
		switch (variant.hint?.kind) {
			case 'unit_variant':
				variant.unitVariant();
				break;
			case 'tuple_variant':
				variant.tupleVariant(variant.hint?.len ?? 0, visitor);
				break;
			case 'struct_variant':
				variant.structVariant([], visitor);
				break;
			default:
				skipPayload(variant);
		}
		return undefined;
	},
};

/**
 * Skips the payload of a variant whose form the format does not record.
 */
function skipPayload(variant: IVariantAccess) {
	try {
		variant.newtypeVariant(ignoredAny);
		return;
	} catch (e) {
		if (!(e instanceof InvalidTypeError)) {
			throw e;
		}
	}

	variant.unitVariant();
}

/**
 * Consumes one value of any shape and discards it. Only self-describing
 * formats can skip a value without knowing its shape.
 */
export const ignoredAny: IDeserialize<undefined> = {
	deserialize: deserializer => deserializer.deserializeIgnoredAny(visitor),
};
