/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { BorrowUnavailableError } from './errors';
import { IVisitor, Visit } from './visitor';

/**
 * How long extracted string or byte data stays valid:
 *  - transient: only during the visitor call that receives it
 *  - owned: an independent copy the receiver now owns
 *  - borrowed: as long as the input buffer the decode started from
 *
 * Strings are immutable in JavaScript, so for them the flavor is a contract
 * the visitor relies on (copy before retaining a transient value) rather
 * than something the runtime can get wrong. For bytes it is observable: a
 * transient view may be overwritten by the next read.
 */
export type Flavor = 'transient' | 'owned' | 'borrowed';

/**
 * A string or byte value a consumer extracted, labelled with the flavor it
 * can vouch for.
 */
export interface IExtracted<T> {
	readonly flavor: Flavor;
	readonly value: T;
}

export const transient = <T>(value: T): IExtracted<T> => ({ flavor: 'transient', value });
export const owned = <T>(value: T): IExtracted<T> => ({ flavor: 'owned', value });
export const borrowed = <T>(value: T): IExtracted<T> => ({ flavor: 'borrowed', value });

export interface IAcceptedFlavors {
	str: Flavor[];
	bytes: Flavor[];
}

/**
 * @returns the flavors a visitor accepts for strings and for bytes, taking
 * the default fallbacks into account
 */
export function acceptedFlavors(visitor: IVisitor<unknown>): IAcceptedFlavors {
	const str: Flavor[] = [];
	if (visitor.visitStr) {
		str.push('transient');
	}
	if (visitor.visitStr || visitor.visitString) {
		str.push('owned');
	}
	if (visitor.visitStr || visitor.visitBorrowedStr) {
		str.push('borrowed');
	}

	const bytes: Flavor[] = [];
	if (visitor.visitBytes) {
		bytes.push('transient');
	}
	if (visitor.visitBytes || visitor.visitByteBuf) {
		bytes.push('owned');
	}
	if (visitor.visitBytes || visitor.visitBorrowedBytes) {
		bytes.push('borrowed');
	}

	return { str, bytes };
}

const checkBorrow = (accepted: Flavor[], offered: Flavor, what: string) => {
	// A visitor that takes borrowed data only must not be handed anything
	// that may be invalidated before the input buffer is.
	if (offered !== 'borrowed' && accepted.length === 1 && accepted[0] === 'borrowed') {
		throw new BorrowUnavailableError(offered, what);
	}
};

/**
 * Hands an extracted string to the visitor method matching its flavor.
 */
export function deliverStr<T>(visitor: IVisitor<T>, extracted: IExtracted<string>): T {
	checkBorrow(acceptedFlavors(visitor).str, extracted.flavor, 'string');
	switch (extracted.flavor) {
		case 'borrowed':
			return Visit.borrowedStr(visitor, extracted.value);
		case 'owned':
			return Visit.ownedStr(visitor, extracted.value);
		case 'transient':
			return Visit.str(visitor, extracted.value);
	}
}

/**
 * Hands extracted bytes to the visitor method matching their flavor.
 */
export function deliverBytes<T>(visitor: IVisitor<T>, extracted: IExtracted<Uint8Array>): T {
	checkBorrow(acceptedFlavors(visitor).bytes, extracted.flavor, 'bytes');
	switch (extracted.flavor) {
		case 'borrowed':
			return Visit.borrowedBytes(visitor, extracted.value);
		case 'owned':
			return Visit.byteBuf(visitor, extracted.value);
		case 'transient':
			return Visit.bytes(visitor, extracted.value);
	}
}
