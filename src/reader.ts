/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

import { EndOfInputError } from './errors';
import { borrowed, Flavor, IExtracted, owned, transient } from './lifetime';

/**
 * Byte source a binary consumer reads from.
 */
export interface IReader {
	/**
	 * Number of bytes consumed so far.
	 */
	readonly offset: number;

	/**
	 * The flavor `readBytes` extractions have.
	 */
	readonly flavor: Flavor;

	/**
	 * Reads a single byte. `expected` names what is being read, for errors.
	 */
	readByte(expected: string): number;

	/**
	 * Reads `length` bytes.
	 */
	readBytes(length: number, expected: string): IExtracted<Uint8Array>;

	/**
	 * @returns true if all input has been consumed
	 */
	isEnd(): boolean;
}

export interface ISliceReaderOptions {
	/**
	 * Hand out views into the input rather than copies. The caller must then
	 * leave the input unmodified for as long as decoded values are in use.
	 * Defaults to true.
	 */
	borrow?: boolean;
}

/**
 * Reads from a contiguous in-memory buffer. Extractions are borrowed views
 * into the buffer, or owned copies when borrowing is off.
 */
export class SliceReader implements IReader {
	private position = 0;
	public readonly flavor: Flavor;

	public get offset() {
		return this.position;
	}

	constructor(private readonly input: Uint8Array, { borrow = true }: ISliceReaderOptions = {}) {
		this.flavor = borrow ? 'borrowed' : 'owned';
	}

	public readByte(expected: string) {
		if (this.position >= this.input.length) {
			throw new EndOfInputError(expected, this.position);
		}

		return this.input[this.position++];
	}

	public readBytes(length: number, expected: string): IExtracted<Uint8Array> {
		if (this.input.length - this.position < length) {
			throw new EndOfInputError(expected, this.position);
		}

		const view = this.input.subarray(this.position, this.position + length);
		this.position += length;
		return this.flavor === 'borrowed' ? borrowed(view) : owned(view.slice());
	}

	public isEnd() {
		return this.position >= this.input.length;
	}
}

/**
 * Reads from a sequence of chunks, dropping each chunk once it has been
 * consumed. Extractions are transient: they are views into a scratch buffer
 * that the next read reuses.
 */
export class StreamReader implements IReader {
	public readonly flavor: Flavor = 'transient';
	private readonly chunks: Iterator<Uint8Array>;
	private chunk: Uint8Array = new Uint8Array(0);
	private chunkPosition = 0;
	private consumed = 0;
	private scratch: Uint8Array = new Uint8Array(64);

	public get offset() {
		return this.consumed;
	}

	constructor(chunks: Iterable<Uint8Array>) {
		this.chunks = chunks[Symbol.iterator]();
	}

	public readByte(expected: string) {
		if (!this.fill()) {
			throw new EndOfInputError(expected, this.consumed);
		}

		this.consumed++;
		return this.chunk[this.chunkPosition++];
	}

	public readBytes(length: number, expected: string): IExtracted<Uint8Array> {
		if (this.scratch.length < length) {
			this.scratch = new Uint8Array(Math.max(length, this.scratch.length * 2));
		}

		let written = 0;
		while (written < length) {
			if (!this.fill()) {
				throw new EndOfInputError(expected, this.consumed);
			}

			const take = Math.min(length - written, this.chunk.length - this.chunkPosition);
			this.scratch.set(
				this.chunk.subarray(this.chunkPosition, this.chunkPosition + take),
				written,
			);
			this.chunkPosition += take;
			this.consumed += take;
			written += take;
		}

		return transient(this.scratch.subarray(0, length));
	}

	public isEnd() {
		return !this.fill();
	}

	/**
	 * Makes sure the current chunk has unread bytes.
	 * @returns false once the input is exhausted
	 */
	private fill() {
		while (this.chunkPosition >= this.chunk.length) {
			const result = this.chunks.next();
			if (result.done) {
				return false;
			}

			this.chunk = result.value;
			this.chunkPosition = 0;
		}

		return true;
	}
}
