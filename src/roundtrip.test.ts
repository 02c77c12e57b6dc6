/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { IDeserialize, IDeserializer } from './de';
import { BinaryDeserializer, BinaryFormat } from './format/binary';
import { JsonDeserializer, JsonFormat, JsonSerializer } from './format/json';
import { ValueFormat, ValueSerializer } from './format/value';
import {
	array,
	bool,
	bytes,
	char,
	enumeration,
	f32,
	f64,
	i128,
	i16,
	i32,
	i64,
	i8,
	map,
	newtypeStruct,
	option,
	string,
	struct,
	tuple,
	tupleStruct,
	tupleVariant,
	u128,
	u16,
	u32,
	u64,
	u8,
	unit,
	unitStruct,
	unitVariant,
} from './mapping';
import { TypeOf } from './mapping/types';
import { ISerializeEvent, ObservedDeserializer, ObservedSerializer } from './observe';
import { SliceReader } from './reader';

const everything = struct('Everything', {
	flag: bool,
	tiny: i8,
	short: i16,
	int: i32,
	long: i64,
	huge: i128,
	byte: u8,
	word: u16,
	dword: u32,
	qword: u64,
	oword: u128,
	single: f32,
	double: f64,
	letter: char,
	text: string,
	blob: bytes,
	maybe: option(u8),
	nothing: unit,
	marker: unitStruct('Marker', 'marker'),
	id: newtypeStruct('Id', u32),
	list: array(string),
	table: map(string, u8),
	pair: tuple(u8, bool),
	point: tupleStruct('Point', i32, i32),
	color: enumeration('Color', { Red: unitVariant(), Rgb: tupleVariant(u8, u8, u8) }),
});

const sample: TypeOf<typeof everything> = {
	flag: true,
	tiny: -5,
	short: -300,
	int: -70000,
	long: -5n,
	huge: -(2n ** 100n),
	byte: 255,
	word: 300,
	dword: 70000,
	qword: 2n ** 64n - 1n,
	oword: 2n ** 100n,
	single: 1.5,
	double: 0.1,
	letter: 'λ',
	text: 'hello "world"',
	blob: Uint8Array.of(0, 1, 255),
	maybe: 3,
	nothing: undefined,
	marker: 'marker',
	id: 42,
	list: ['a', 'b'],
	table: new Map([['k', 1]]),
	pair: [1, false],
	point: [-1, 1],
	color: { variant: 'Rgb', value: [1, 2, 3] },
};

describe('round trips', () => {
	it('preserves every shape through the value format', () => {
		const format = new ValueFormat();
		expect(format.deserialize(format.serialize(sample, everything), everything)).toEqual(sample);
	});

	it('preserves every shape through JSON', () => {
		const format = new JsonFormat();
		expect(format.deserialize(format.serialize(sample, everything), everything)).toEqual(sample);
	});

	it('preserves every shape through the binary format', () => {
		const format = new BinaryFormat();
		expect(format.deserialize(format.serialize(sample, everything), everything)).toEqual(sample);
	});

	it('hands each field to the producer as its declared shape', () => {
		const observed = new ObservedSerializer(new ValueSerializer());
		const events: ISerializeEvent[] = [];
		observed.onDidSerialize(e => events.push(e));

		everything.serialize(sample, observed);
		expect(events.filter(e => e.depth === 1).map(e => e.kind)).toEqual([
			'bool',
			'i8',
			'i16',
			'i32',
			'i64',
			'i128',
			'u8',
			'u16',
			'u32',
			'u64',
			'u128',
			'f32',
			'f64',
			'char',
			'string',
			'bytes',
			'option',
			'unit',
			'unit_struct',
			'newtype_struct',
			'seq',
			'map',
			'tuple',
			'tuple_struct',
			'tuple_variant',
		]);
	});
});

describe('scenarios', () => {
	it('writes a single bool as one operation', () => {
		const json = new JsonSerializer();
		const observed = new ObservedSerializer(json);
		const listener = jest.fn();
		observed.onDidSerialize(listener);

		bool.serialize(true, observed);
		expect(json.output()).toBe('true');
		expect(listener.mock.calls).toEqual([[{ kind: 'bool', depth: 0, value: true }]]);
		expect(new JsonFormat().deserialize('true', bool)).toBe(true);
	});

	it('visits none exactly once for an absent option', () => {
		const visitNone = jest.fn(() => 'none');
		const visitSome = jest.fn(() => 'some');
		const absent: IDeserialize<string> = {
			deserialize: deserializer =>
				deserializer.deserializeOption({ expecting: 'an option', visitNone, visitSome }),
		};

		expect(new JsonFormat().deserialize('null', absent)).toBe('none');
		expect(new BinaryFormat().deserialize(Uint8Array.of(0), absent)).toBe('none');
		expect(visitNone).toHaveBeenCalledTimes(2);
		expect(visitSome).not.toHaveBeenCalled();
	});

	it('declares a tuple length before reading its elements', () => {
		const record = tuple(u8, string, array(u8));
		const input = new BinaryFormat().serialize([7, 'a', [1, 2]], record);
		expect(input).toEqual(Uint8Array.of(7, 1, 0x61, 2, 1, 2));

		const observed = new ObservedDeserializer(new BinaryDeserializer(new SliceReader(input)));
		const requests = jest.fn();
		observed.onDidRequest(requests);

		expect(record.deserialize(observed)).toEqual([7, 'a', [1, 2]]);
		expect(requests).toHaveBeenNthCalledWith(1, {
			operation: 'deserializeTuple',
			depth: 0,
			len: 3,
		});
		expect(requests.mock.calls.map(([e]) => e.operation)).toEqual([
			'deserializeTuple',
			'deserializeU8',
			'deserializeString',
			'deserializeSeq',
			'deserializeU8',
			'deserializeU8',
		]);
	});

	it('pulls map entries until the session is exhausted', () => {
		const pulls: boolean[] = [];
		const entries: IDeserialize<[string, number][]> = {
			deserialize: deserializer =>
				deserializer.deserializeAny({
					expecting: 'a map',
					visitMap(access) {
						const out: [string, number][] = [];
						for (;;) {
							const key = access.nextKey(string);
							pulls.push(key.done);
							if (key.done) {
								return out;
							}

							out.push([key.value, access.nextValue(u8)]);
						}
					},
				}),
		};

		expect(new JsonFormat().deserialize('{"a":1,"b":2}', entries)).toEqual([
			['a', 1],
			['b', 2],
		]);
		expect(pulls).toEqual([false, false, true]);
	});
});

describe('visitor calls', () => {
	const rootVisits = (deserializer: IDeserializer) => {
		const observed = new ObservedDeserializer(deserializer);
		const methods: string[] = [];
		observed.onDidVisit(e => {
			if (e.depth === 0) {
				methods.push(e.method);
			}
		});

		expect(everything.deserialize(observed)).toEqual(sample);
		return methods;
	};

	it('makes exactly one visitor call per value', () => {
		const text = new JsonFormat().serialize(sample, everything);
		expect(rootVisits(new JsonDeserializer(text))).toEqual(['visitMap']);

		const data = new BinaryFormat().serialize(sample, everything);
		expect(rootVisits(new BinaryDeserializer(new SliceReader(data)))).toEqual(['visitSeq']);
	});
});
