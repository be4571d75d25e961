/**
 * Goodbye, PT 203 (RFC 3550 section 6.6).
 *
 *  0                   1                   2                   3
 *  0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |V=2|P|    SC   |   PT=BYE=203  |             length            |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                           SSRC/CSRC                           |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * :                              ...                              :
 * +=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+
 * |     length    |               reason for leaving             ...
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *
 * The body written here ends right after the reason; word alignment is
 * added by the packet layer.
 */

import { InvalidValueError, MalformedHeaderError } from "../exceptions.js";
import type { BitBuffer, BitBufferMut } from "../support/buffer.js";
import { withContext } from "../support/utils.js";
import type { RtcpHeader } from "./header.js";

export const MAX_BYE_SOURCES = 31;
export const MAX_REASON_LENGTH = 255;

export interface Goodbye {
	type: "bye";
	ssrcs: number[];
	reason?: string;
	paddingLength: number;
}

const reasonDecoder = new TextDecoder("utf-8", { fatal: true });

function decodeReason(data: Buffer): string {
	try {
		return reasonDecoder.decode(data);
	} catch (ex) {
		if (ex instanceof TypeError) {
			throw new MalformedHeaderError("reason is not valid UTF-8");
		}
		throw ex;
	}
}

export function readGoodbye(
	buf: BitBuffer,
	header: RtcpHeader,
): Omit<Goodbye, "paddingLength"> {
	const ssrcs: number[] = [];
	for (let i = 0; i < header.count; i++) {
		ssrcs.push(withContext(`ssrc-${i}`, () => buf.readU32()));
	}
	// A reason is present when a non-zero length byte follows the sources.
	if (buf.bytesRemaining > 0 && buf.peekU8() !== 0) {
		const reason = withContext("reason", () => {
			const length = buf.readU8();
			return decodeReason(buf.readBytes(length));
		});
		return { type: "bye", ssrcs, reason };
	}
	return { type: "bye", ssrcs };
}

export function writeGoodbye(buf: BitBufferMut, packet: Goodbye): void {
	if (packet.ssrcs.length > MAX_BYE_SOURCES) {
		throw new InvalidValueError(
			`${packet.ssrcs.length} sources exceed the limit of ${MAX_BYE_SOURCES}`,
		);
	}
	packet.ssrcs.forEach((ssrc, i) => {
		withContext(`ssrc-${i}`, () => buf.writeU32(ssrc));
	});
	if (packet.reason !== undefined && packet.reason.length > 0) {
		const reason = Buffer.from(packet.reason, "utf8");
		if (reason.length > MAX_REASON_LENGTH) {
			throw new InvalidValueError(
				`reason of ${reason.length} bytes exceeds ${MAX_REASON_LENGTH}`,
			);
		}
		withContext("reason", () => {
			buf.writeU8(reason.length);
			buf.writeBytes(reason);
		});
	}
}
