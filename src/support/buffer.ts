import { BufferFullError, InvalidFieldError } from "../exceptions.js";

/** Destination for marshaled packets. A Node `Writable` satisfies this. */
export interface PacketWriter {
	write(chunk: Buffer): void;
}

/**
 * Collects written chunks into one buffer.
 *
 * With a finite capacity (for instance a path MTU) a write that would not fit
 * throws BufferFullError and is not stored.
 */
export class BufferWriter implements PacketWriter {
	private _chunks: Buffer[];
	private _length: number;
	private _capacity: number;

	constructor(capacity: number = Number.POSITIVE_INFINITY) {
		if (!(capacity >= 0)) {
			throw new InvalidFieldError("capacity must not be negative");
		}
		this._chunks = [];
		this._length = 0;
		this._capacity = capacity;
	}

	get length(): number {
		return this._length;
	}

	get capacity(): number {
		return this._capacity;
	}

	get remaining(): number {
		return this._capacity - this._length;
	}

	fits(data: Buffer | number): boolean {
		const inSize = typeof data === "number" ? data : data.length;
		return this._length + inSize <= this._capacity;
	}

	write(chunk: Buffer): void {
		if (!this.fits(chunk)) {
			throw new BufferFullError(
				`cannot write ${chunk.length} bytes, ${this.remaining} left`,
			);
		}
		this._chunks.push(chunk);
		this._length += chunk.length;
	}

	toBuffer(): Buffer {
		return Buffer.concat(this._chunks, this._length);
	}
}
