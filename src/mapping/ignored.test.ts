/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { IDeserialize } from '../de';
import { BinaryFormat } from '../format/binary';
import { JsonFormat } from '../format/json';
import { Value, ValueFormat } from '../format/value';
import { ignoredAny } from './ignored';
import { string } from './primitives';

describe('ignoredAny', () => {
	const json = new JsonFormat();

	const keys: IDeserialize<string[]> = {
		deserialize: deserializer =>
			deserializer.deserializeMap({
				expecting: 'a map',
				visitMap(map) {
					const out: string[] = [];
					for (let n = map.nextKey(string); !n.done; n = map.nextKey(string)) {
						out.push(n.value);
						map.nextValue(ignoredAny);
					}

					return out;
				},
			}),
	};

	it('skips a whole value', () => {
		expect(json.deserialize('{"a":[1,{"b":null}],"c":"x"}', ignoredAny)).toBeUndefined();
	});

	it('drops values a visitor does not need', () => {
		expect(json.deserialize('{"a":[1,2],"b":{"c":true},"d":"\\n"}', keys)).toEqual(['a', 'b', 'd']);

		const tree: Value = {
			kind: 'map',
			entries: [
				[
					{ kind: 'string', value: 'a' },
					{ kind: 'seq', elements: [{ kind: 'u8', value: 1 }] },
				],
			],
		};
		expect(new ValueFormat().deserialize(tree, keys)).toEqual(['a']);
	});

	it('skips every shape of a value tree', () => {
		const header = { name: 'Event', variantIndex: 0, variant: 'Moved' };
		const entry = (key: string, value: Value): [Value, Value] => [
			{ kind: 'string', value: key },
			value,
		];
		const tree: Value = {
			kind: 'map',
			entries: [
				entry('some', { kind: 'option', value: { kind: 'u8', value: 1 } }),
				entry('newtype', {
					kind: 'newtype_struct',
					name: 'Id',
					value: { kind: 'char', value: 'c' },
				}),
				entry('struct', {
					kind: 'struct',
					name: 'Point',
					fields: [['x', { kind: 'bytes', value: Uint8Array.of(1) }]],
				}),
				entry('unit', { kind: 'unit_variant', ...header }),
				entry('wrapped', { kind: 'newtype_variant', ...header, value: { kind: 'f32', value: 1 } }),
				entry('tuple', {
					kind: 'tuple_variant',
					...header,
					elements: [{ kind: 'i16', value: -1 }],
				}),
				entry('fields', { kind: 'struct_variant', ...header, fields: [['y', { kind: 'unit' }]] }),
			],
		};

		expect(new ValueFormat().deserialize(tree, keys)).toEqual([
			'some',
			'newtype',
			'struct',
			'unit',
			'wrapped',
			'tuple',
			'fields',
		]);
	});

	it('skips map keys', () => {
		const count: IDeserialize<number> = {
			deserialize: deserializer =>
				deserializer.deserializeMap({
					expecting: 'a map',
					visitMap(map) {
						let entries = 0;
						while (!map.nextKey(ignoredAny).done) {
							map.nextValue(ignoredAny);
							entries++;
						}

						return entries;
					},
				}),
		};

		expect(json.deserialize('{"a":1,"b":2}', count)).toBe(2);
	});

	it('cannot skip input that does not describe itself', () => {
		expect(() => new BinaryFormat().deserialize(Uint8Array.of(1), ignoredAny)).toThrow(
			'the binary format is not self-describing and cannot skip a value of unknown shape at offset 0',
		);
	});
});
