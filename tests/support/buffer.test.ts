import { describe, expect, it } from "vitest";
import { InvalidValueError, OutOfBoundsError } from "../../src/exceptions.js";
import {
	BitBuffer,
	BitBufferMut,
	INITIAL_CAPACITY,
} from "../../src/support/buffer.js";

describe("BitBuffer", () => {
	it("reads bits most significant first", () => {
		const buf = new BitBuffer(Buffer.from([0b10110010, 0xff]));
		expect(buf.readBits(2)).toBe(0b10);
		expect(buf.readBool()).toBe(true);
		expect(buf.readBits(5)).toBe(0b10010);
		expect(buf.position).toBe(8);
		expect(buf.readU8()).toBe(0xff);
	});

	it("reads fields spanning bytes", () => {
		const buf = new BitBuffer(Buffer.from([0x0f, 0xf0]));
		buf.readBits(4);
		expect(buf.readU8()).toBe(0xff);
		expect(buf.bitsRemaining).toBe(4);
	});

	it("reads 32 bit values without sign issues", () => {
		const buf = new BitBuffer(Buffer.from([0xff, 0xff, 0xff, 0xfe]));
		expect(buf.readU32()).toBe(0xfffffffe);
	});

	it("reads signed 16 bit values", () => {
		const buf = new BitBuffer(Buffer.from([0xff, 0xfe, 0x7f, 0xff]));
		expect(buf.readI16()).toBe(-2);
		expect(buf.readI16()).toBe(0x7fff);
	});

	it("peeks without consuming", () => {
		const buf = new BitBuffer(Buffer.from([0xab, 0xcd]));
		expect(buf.peekU8()).toBe(0xab);
		expect(buf.position).toBe(0);
		expect(buf.readU16()).toBe(0xabcd);
	});

	it("seeks back and re-reads", () => {
		const buf = new BitBuffer(Buffer.from([0x12, 0x34]));
		const mark = buf.position;
		buf.readU16();
		buf.seek(mark);
		expect(buf.readU8()).toBe(0x12);
	});

	it("tracks consumed bytes since a mark", () => {
		const buf = new BitBuffer(Buffer.alloc(8));
		buf.readU8();
		const mark = buf.position;
		buf.readBits(12);
		expect(buf.bitsConsumedSince(mark)).toBe(12);
		expect(buf.bytesConsumedSince(mark)).toBe(2);
	});

	it("throws when reading past the end", () => {
		const buf = new BitBuffer(Buffer.from([0x01]));
		expect(() => buf.readU16()).toThrow(OutOfBoundsError);
		expect(buf.position).toBe(0);
	});

	it("throws when seeking past the end", () => {
		const buf = new BitBuffer(Buffer.from([0x01]));
		expect(() => buf.seek(9)).toThrow(OutOfBoundsError);
	});

	it("limits the region to the given length", () => {
		const buf = new BitBuffer(Buffer.from([1, 2, 3, 4]), 2);
		expect(buf.bytesRemaining).toBe(2);
		buf.readU16();
		expect(() => buf.readU8()).toThrow(OutOfBoundsError);
		expect(buf.rest()).toEqual(Buffer.alloc(0));
	});

	it("returns byte views sharing memory", () => {
		const data = Buffer.from([1, 2, 3, 4]);
		const buf = new BitBuffer(data);
		buf.readU8();
		const view = buf.readBytes(2);
		data[1] = 9;
		expect(view).toEqual(Buffer.from([9, 3]));
	});

	it("copies bytes read off a byte boundary", () => {
		const buf = new BitBuffer(Buffer.from([0x0a, 0xbc, 0xd0]));
		buf.readBits(4);
		expect(buf.readBytes(2)).toEqual(Buffer.from([0xab, 0xcd]));
	});

	it("splits off a bounded sub buffer", () => {
		const buf = new BitBuffer(Buffer.from([1, 2, 3, 4, 5]));
		buf.readU8();
		const sub = buf.subBuffer(2);
		expect(buf.position).toBe(24);
		expect(sub.readU16()).toBe(0x0203);
		expect(() => sub.readU8()).toThrow(OutOfBoundsError);
	});

	it("rejects invalid widths", () => {
		const buf = new BitBuffer(Buffer.alloc(8));
		expect(() => buf.readBits(0)).toThrow(InvalidValueError);
		expect(() => buf.readBits(33)).toThrow(InvalidValueError);
	});
});

describe("BitBufferMut", () => {
	it("starts with default capacity", () => {
		const buf = new BitBufferMut();
		expect(buf.capacity).toBe(INITIAL_CAPACITY);
		expect(buf.length).toBe(0);
	});

	it("writes bits most significant first", () => {
		const buf = new BitBufferMut();
		buf.writeBits(2, 0b10);
		buf.writeBool(true);
		buf.writeBits(5, 0b10010);
		buf.writeU16(0xabcd);
		expect(buf.toBuffer()).toEqual(Buffer.from([0b10110010, 0xab, 0xcd]));
	});

	it("writes 24 and 32 bit values", () => {
		const buf = new BitBufferMut();
		buf.writeU24(0x123456);
		buf.writeU32(0xfedcba98);
		expect(buf.toBuffer()).toEqual(
			Buffer.from([0x12, 0x34, 0x56, 0xfe, 0xdc, 0xba, 0x98]),
		);
	});

	it("writes signed 16 bit values", () => {
		const buf = new BitBufferMut();
		buf.writeI16(-2);
		expect(buf.toBuffer()).toEqual(Buffer.from([0xff, 0xfe]));
	});

	it("rejects values wider than the field", () => {
		const buf = new BitBufferMut();
		expect(() => buf.writeBits(4, 16)).toThrow(InvalidValueError);
		expect(() => buf.writeU8(-1)).toThrow(InvalidValueError);
		expect(() => buf.writeI16(0x8000)).toThrow(InvalidValueError);
	});

	it("grows past its initial capacity", () => {
		const buf = new BitBufferMut(2);
		buf.writeU32(0x01020304);
		buf.writeBytes(Buffer.from([5, 6, 7]));
		expect(buf.capacity).toBe(8);
		expect(buf.toBuffer()).toEqual(Buffer.from([1, 2, 3, 4, 5, 6, 7]));
	});

	it("throws when a wrapped target overflows", () => {
		const target = Buffer.alloc(3);
		const buf = BitBufferMut.wrap(target);
		buf.writeU16(0xaabb);
		expect(() => buf.writeU16(0xccdd)).toThrow(OutOfBoundsError);
		buf.writeU8(0xcc);
		expect(target).toEqual(Buffer.from([0xaa, 0xbb, 0xcc]));
	});

	it("back-patches written bytes", () => {
		const buf = new BitBufferMut();
		buf.writeU16(0);
		buf.writeU8(0x33);
		buf.setU16(0, 0x1122);
		expect(buf.position).toBe(24);
		expect(buf.toBuffer()).toEqual(Buffer.from([0x11, 0x22, 0x33]));
	});

	it("refuses to patch bytes not yet written", () => {
		const buf = new BitBufferMut();
		buf.writeU8(1);
		expect(() => buf.setU8(1, 2)).toThrow(OutOfBoundsError);
	});

	it("counts bytes written since a mark", () => {
		const buf = new BitBufferMut();
		buf.writeU8(1);
		const mark = buf.position;
		buf.writeBits(9, 0);
		expect(buf.bitsWrittenSince(mark)).toBe(9);
		expect(buf.bytesWrittenSince(mark)).toBe(2);
	});

	it("writes bytes off a byte boundary", () => {
		const buf = new BitBufferMut();
		buf.writeBits(4, 0x0);
		buf.writeBytes(Buffer.from([0xab, 0xcd]));
		buf.writeBits(4, 0x0);
		expect(buf.toBuffer()).toEqual(Buffer.from([0x0a, 0xbc, 0xd0]));
	});
});
