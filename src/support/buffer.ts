import { InvalidValueError, OutOfBoundsError } from "../exceptions.js";

export const INITIAL_CAPACITY = 1500;

const MAX_FIELD_BITS = 32;

function checkWidth(bits: number): void {
	if (!Number.isInteger(bits) || bits < 1 || bits > MAX_FIELD_BITS) {
		throw new InvalidValueError(`bit width must be 1..32, got ${bits}`);
	}
}

/**
 * Read cursor over a byte region with bit granularity.
 *
 * Positions are absolute bit offsets into the region. Byte reads return views
 * into the backing buffer, so they stay valid only as long as the caller keeps
 * that buffer unchanged.
 */
export class BitBuffer {
	private readonly _data: Buffer;
	private readonly _bitLength: number;
	private _position: number;

	constructor(data: Buffer, byteLength: number = data.length) {
		if (byteLength > data.length) {
			throw new OutOfBoundsError(
				`region of ${byteLength} bytes exceeds buffer of ${data.length} bytes`,
			);
		}
		this._data = data;
		this._bitLength = byteLength * 8;
		this._position = 0;
	}

	get position(): number {
		return this._position;
	}

	get bitLength(): number {
		return this._bitLength;
	}

	get byteLength(): number {
		return this._bitLength / 8;
	}

	get bitsRemaining(): number {
		return this._bitLength - this._position;
	}

	get bytesRemaining(): number {
		return Math.floor(this.bitsRemaining / 8);
	}

	isByteAligned(): boolean {
		return this._position % 8 === 0;
	}

	bitsConsumedSince(mark: number): number {
		return this._position - mark;
	}

	bytesConsumedSince(mark: number): number {
		return Math.ceil((this._position - mark) / 8);
	}

	seek(position: number): void {
		if (
			!Number.isInteger(position) ||
			position < 0 ||
			position > this._bitLength
		) {
			throw new OutOfBoundsError(
				`cannot seek to bit ${position}, region has ${this._bitLength} bits`,
			);
		}
		this._position = position;
	}

	private ensure(bits: number): void {
		if (bits > this.bitsRemaining) {
			throw new OutOfBoundsError(
				`need ${bits} bits at bit ${this._position}, ` +
					`only ${this.bitsRemaining} remaining`,
			);
		}
	}

	peekBits(bits: number): number {
		checkWidth(bits);
		this.ensure(bits);
		let value = 0;
		let position = this._position;
		let remaining = bits;
		while (remaining > 0) {
			const byte = this._data[position >> 3];
			const bitInByte = position & 7;
			const available = 8 - bitInByte;
			const take = remaining < available ? remaining : available;
			const part = (byte >> (available - take)) & ((1 << take) - 1);
			value = value * 2 ** take + part;
			position += take;
			remaining -= take;
		}
		return value;
	}

	readBits(bits: number): number {
		const value = this.peekBits(bits);
		this._position += bits;
		return value;
	}

	readBool(): boolean {
		return this.readBits(1) === 1;
	}

	peekU8(): number {
		return this.peekBits(8);
	}

	readU8(): number {
		return this.readBits(8);
	}

	readU16(): number {
		return this.readBits(16);
	}

	readU24(): number {
		return this.readBits(24);
	}

	readU32(): number {
		return this.readBits(32);
	}

	readI16(): number {
		const value = this.readBits(16);
		return value & 0x8000 ? value - 0x10000 : value;
	}

	readBytes(length: number): Buffer {
		if (!Number.isInteger(length) || length < 0) {
			throw new InvalidValueError(`invalid byte count ${length}`);
		}
		this.ensure(length * 8);
		if (this.isByteAligned()) {
			const start = this._position >> 3;
			this._position += length * 8;
			return this._data.subarray(start, start + length);
		}
		const out = Buffer.alloc(length);
		for (let i = 0; i < length; i++) {
			out[i] = this.readBits(8);
		}
		return out;
	}

	skip(length: number): void {
		this.ensure(length * 8);
		this._position += length * 8;
	}

	/**
	 * Split off the next `length` bytes as an independent cursor and advance
	 * past them. The child shares memory with this buffer.
	 */
	subBuffer(length: number): BitBuffer {
		if (!this.isByteAligned()) {
			throw new InvalidValueError("sub buffer must start on a byte boundary");
		}
		return new BitBuffer(this.readBytes(length));
	}

	/** Everything from the current byte aligned position on, not consumed. */
	rest(): Buffer {
		const start = Math.ceil(this._position / 8);
		return this._data.subarray(start, this._bitLength / 8);
	}
}

/**
 * Write cursor. Grows on demand unless created over a fixed target with
 * `BitBufferMut.wrap`, in which case overflowing throws OutOfBoundsError.
 */
export class BitBufferMut {
	private _data: Buffer;
	private _position: number;
	private _bitLength: number;
	private readonly _growable: boolean;

	constructor(capacity: number = INITIAL_CAPACITY, target?: Buffer) {
		this._data = target ?? Buffer.alloc(Math.max(capacity, 1));
		this._position = 0;
		this._bitLength = 0;
		this._growable = target === undefined;
	}

	static wrap(target: Buffer): BitBufferMut {
		return new BitBufferMut(target.length, target);
	}

	get position(): number {
		return this._position;
	}

	/** Number of whole bytes written so far (highest position reached). */
	get length(): number {
		return Math.ceil(this._bitLength / 8);
	}

	get capacity(): number {
		return this._data.length;
	}

	isByteAligned(): boolean {
		return this._position % 8 === 0;
	}

	bitsWrittenSince(mark: number): number {
		return this._position - mark;
	}

	bytesWrittenSince(mark: number): number {
		return Math.ceil((this._position - mark) / 8);
	}

	private reserve(bits: number): void {
		const neededBytes = Math.ceil((this._position + bits) / 8);
		if (neededBytes <= this._data.length) return;
		if (!this._growable) {
			throw new OutOfBoundsError(
				`write of ${bits} bits at bit ${this._position} exceeds ` +
					`capacity of ${this._data.length} bytes`,
			);
		}
		let capacity = this._data.length * 2;
		while (capacity < neededBytes) capacity *= 2;
		const grown = Buffer.alloc(capacity);
		this._data.copy(grown);
		this._data = grown;
	}

	private advance(bits: number): void {
		this._position += bits;
		if (this._position > this._bitLength) this._bitLength = this._position;
	}

	writeBits(bits: number, value: number): void {
		checkWidth(bits);
		if (!Number.isInteger(value) || value < 0 || value >= 2 ** bits) {
			throw new InvalidValueError(
				`value ${value} does not fit in ${bits} unsigned bits`,
			);
		}
		this.reserve(bits);
		let remaining = bits;
		while (remaining > 0) {
			const index = this._position >> 3;
			const bitInByte = this._position & 7;
			const available = 8 - bitInByte;
			const take = remaining < available ? remaining : available;
			const part =
				Math.floor(value / 2 ** (remaining - take)) & ((1 << take) - 1);
			const shift = available - take;
			const mask = ((1 << take) - 1) << shift;
			this._data[index] = (this._data[index] & ~mask) | (part << shift);
			this.advance(take);
			remaining -= take;
		}
	}

	writeBool(value: boolean): void {
		this.writeBits(1, value ? 1 : 0);
	}

	writeU8(value: number): void {
		this.writeBits(8, value);
	}

	writeU16(value: number): void {
		this.writeBits(16, value);
	}

	writeU24(value: number): void {
		this.writeBits(24, value);
	}

	writeU32(value: number): void {
		this.writeBits(32, value);
	}

	writeI16(value: number): void {
		if (!Number.isInteger(value) || value < -0x8000 || value > 0x7fff) {
			throw new InvalidValueError(
				`value ${value} does not fit in 16 signed bits`,
			);
		}
		this.writeBits(16, value < 0 ? value + 0x10000 : value);
	}

	writeBytes(data: Buffer): void {
		if (this.isByteAligned()) {
			this.reserve(data.length * 8);
			data.copy(this._data, this._position >> 3);
			this.advance(data.length * 8);
			return;
		}
		for (const byte of data) {
			this.writeBits(8, byte);
		}
	}

	writeZeros(length: number): void {
		this.writeBytes(Buffer.alloc(length));
	}

	/** Overwrite an already written byte without moving the cursor. */
	setU8(byteOffset: number, value: number): void {
		if (byteOffset < 0 || byteOffset >= this.length) {
			throw new OutOfBoundsError(
				`cannot patch byte ${byteOffset}, only ${this.length} bytes written`,
			);
		}
		if (!Number.isInteger(value) || value < 0 || value > 0xff) {
			throw new InvalidValueError(`value ${value} does not fit in a byte`);
		}
		this._data[byteOffset] = value;
	}

	setU16(byteOffset: number, value: number): void {
		if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
			throw new InvalidValueError(`value ${value} does not fit in 16 bits`);
		}
		this.setU8(byteOffset, value >> 8);
		this.setU8(byteOffset + 1, value & 0xff);
	}

	/** Copy of the written bytes. */
	toBuffer(): Buffer {
		return Buffer.from(this._data.subarray(0, this.length));
	}
}
