/**
 * Word alignment and packet padding.
 *
 * Two rules live here. Alignment padding is a run of zero bytes that brings
 * a region, measured from a mark, up to a multiple of four bytes. Packet
 * padding (the RTP/RTCP P bit) is a run of bytes at the very end of a packet
 * whose last byte holds the length of the run, itself included.
 */

import { InvalidValueError, MalformedHeaderError } from "../exceptions.js";
import type { BitBuffer, BitBufferMut } from "./buffer.js";

export const WORD_SIZE = 4;
export const MAX_PADDING_LENGTH = 0xff;

export function paddingNeeded(length: number, alignment = WORD_SIZE): number {
	return (alignment - (length % alignment)) % alignment;
}

/**
 * Consume alignment bytes up to the next word boundary relative to `mark`
 * (a bit position). Stops early at the end of the buffer, since a P-bit
 * padding run may already have been cut off the region.
 */
export function consumeAlignment(buf: BitBuffer, mark: number): number {
	const needed = paddingNeeded(buf.bytesConsumedSince(mark));
	const count = Math.min(needed, buf.bytesRemaining);
	const bytes = buf.readBytes(count);
	if (bytes.some((b) => b !== 0)) {
		throw new MalformedHeaderError(
			`alignment padding must be zero, got ${bytes.toString("hex")}`,
		);
	}
	return count;
}

export function writeAlignment(buf: BitBufferMut, mark: number): number {
	const count = paddingNeeded(buf.bytesWrittenSince(mark));
	buf.writeZeros(count);
	return count;
}

/**
 * Return the P-bit padding length of the region held by `buf`, read from its
 * last byte. The cursor is left where it was.
 */
export function readPacketPadding(buf: BitBuffer): number {
	const start = buf.position;
	if (buf.bytesRemaining === 0) {
		throw new MalformedHeaderError("padding flag set on an empty packet body");
	}
	buf.seek(buf.bitLength - 8);
	const length = buf.readU8();
	buf.seek(start);
	if (length === 0) {
		throw new MalformedHeaderError("padding flag set but padding length is 0");
	}
	if (length > buf.bytesRemaining) {
		throw new MalformedHeaderError(
			`padding length ${length} exceeds the ` +
				`${buf.bytesRemaining} bytes available`,
		);
	}
	return length;
}

/**
 * Write a P-bit padding run. With "align" the run ends the packet on a word
 * boundary relative to `mark`; a full word is used when the content is
 * already aligned, since the run needs room for its length byte.
 */
export function writePacketPadding(
	buf: BitBufferMut,
	mark: number,
	length: number | "align",
): number {
	const count =
		length === "align"
			? paddingNeeded(buf.bytesWrittenSince(mark)) || WORD_SIZE
			: length;
	if (!Number.isInteger(count) || count < 1 || count > MAX_PADDING_LENGTH) {
		throw new InvalidValueError(`invalid padding length ${count}`);
	}
	buf.writeZeros(count - 1);
	buf.writeU8(count);
	return count;
}
