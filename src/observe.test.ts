/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { ValueDeserializer, ValueFormat, ValueSerializer } from './format/value';
import { array, i32, string, struct, tuple, u8 } from './mapping';
import { ObservedDeserializer, ObservedSerializer } from './observe';
import { capabilities, IVisitor } from './visitor';

describe('ObservedSerializer', () => {
	it('reports every shape with its depth', () => {
		const point = struct('Point', { x: i32, y: i32 });
		const observed = new ObservedSerializer(new ValueSerializer());
		const listener = jest.fn();
		observed.onDidSerialize(listener);

		const tree = point.serialize({ x: 1, y: 2 }, observed);

		expect(tree).toEqual(new ValueFormat().serialize({ x: 1, y: 2 }, point));
		expect(listener.mock.calls.map(([event]) => event)).toEqual([
			{ kind: 'struct', depth: 0, name: 'Point', len: 2 },
			{ kind: 'i32', depth: 1, value: 1 },
			{ kind: 'i32', depth: 1, value: 2 },
		]);
	});

	it('stops reporting once the listener is disposed', () => {
		const observed = new ObservedSerializer(new ValueSerializer());
		const listener = jest.fn();
		observed.onDidSerialize(listener).dispose();

		u8.serialize(1, observed);
		expect(listener).not.toHaveBeenCalled();
	});
});

describe('ObservedDeserializer', () => {
	const record = tuple(u8, string, array(u8));
	const tree = new ValueFormat().serialize([7, 'a', [1, 2]], record);

	it('reports requests and visits in order', () => {
		const observed = new ObservedDeserializer(new ValueDeserializer(tree));
		const log: string[] = [];
		observed.onDidRequest(e => log.push(`${e.operation}@${e.depth}`));
		observed.onDidVisit(e => log.push(`${e.method}@${e.depth}`));

		expect(record.deserialize(observed)).toEqual([7, 'a', [1, 2]]);
		expect(log).toEqual([
			'deserializeTuple@0',
			'visitSeq@0',
			'deserializeU8@1',
			'visitU64@1',
			'deserializeString@1',
			'visitStr@1',
			'deserializeSeq@1',
			'visitSeq@1',
			'deserializeU8@2',
			'visitU64@2',
			'deserializeU8@2',
			'visitU64@2',
		]);
	});

	it('includes what the request declared', () => {
		const observed = new ObservedDeserializer(new ValueDeserializer(tree));
		const listener = jest.fn();
		observed.onDidRequest(listener);

		record.deserialize(observed);
		expect(listener).toHaveBeenCalledWith({ operation: 'deserializeTuple', depth: 0, len: 3 });
	});

	it('keeps the capabilities of observed visitors', () => {
		const observed = new ObservedDeserializer(new ValueDeserializer(tree));
		const visitor: IVisitor<number> = {
			expecting: 'a count',
			visitU64: () => 1,
			visitSeq: () => 2,
		};

		expect(capabilities(observed.observe(visitor))).toEqual(['u64', 'seq']);
	});
});
