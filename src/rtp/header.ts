/**
 * RTP fixed header (RFC 3550 section 5.1).
 *
 *  0                   1                   2                   3
 *  0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |V=2|P|X|  CC   |M|     PT      |       sequence number         |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                           timestamp                           |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |           synchronization source (SSRC) identifier            |
 * +=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+
 * |            contributing source (CSRC) identifiers             |
 * |                             ....                              |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 */

import { RTP_HEADER_LENGTH, RTP_VERSION } from "../const.js";
import { MalformedHeaderError } from "../exceptions.js";
import type { BitBuffer, BitBufferMut } from "../support/buffer.js";
import { defpacket } from "../support/packet.js";
import { withContext } from "../support/utils.js";
import { finalizeRtpHeader } from "../sync.js";
import {
	extensionBlockLength,
	findExtension,
	type HeaderExtensionBlock,
	readExtensionBlock,
	withExtension,
	withoutExtension,
	writeExtensionBlock,
} from "./extensions.js";

export const RtpFixedHeader = defpacket("RtpFixedHeader", {
	version: "u2",
	hasPadding: "bool",
	hasExtension: "bool",
	csrcCount: "u4",
	marker: "bool",
	payloadType: "u7",
	sequenceNumber: "u16",
	timestamp: "u32",
	ssrc: "u32",
});

/** Header fields a caller chooses. Flags and counts are derived from them. */
export interface RtpHeaderInit {
	marker: boolean;
	payloadType: number;
	sequenceNumber: number;
	timestamp: number;
	ssrc: number;
	csrcs: number[];
	extensions?: HeaderExtensionBlock;
}

export interface RtpHeader extends RtpHeaderInit {
	version: number;
	hasPadding: boolean;
	hasExtension: boolean;
	csrcCount: number;
}

export function readRtpHeader(buf: BitBuffer): RtpHeader {
	return withContext("RtpHeader", () => {
		const fixed = RtpFixedHeader.read(buf);
		if (fixed.version !== RTP_VERSION) {
			throw new MalformedHeaderError(
				`unsupported RTP version ${fixed.version}`,
			);
		}
		const csrcs: number[] = [];
		for (let i = 0; i < fixed.csrcCount; i++) {
			csrcs.push(withContext(`csrc-${i}`, () => buf.readU32()));
		}
		const header: RtpHeader = { ...fixed, csrcs };
		if (fixed.hasExtension) {
			header.extensions = readExtensionBlock(buf);
		}
		return header;
	});
}

/**
 * Write the header for `init`. Flags and counts are computed here, so the
 * written header always agrees with the CSRC list and extension block.
 */
export function writeRtpHeader(
	buf: BitBufferMut,
	init: RtpHeaderInit,
	paddingLength = 0,
): void {
	withContext("RtpHeader", () => {
		const header = finalizeRtpHeader(init, { paddingLength });
		RtpFixedHeader.write(buf, header);
		header.csrcs.forEach((csrc, i) => {
			withContext(`csrc-${i}`, () => buf.writeU32(csrc));
		});
		if (header.extensions !== undefined) {
			writeExtensionBlock(buf, header.extensions);
		}
	});
}

/** Serialized size of the header, CSRCs and extension block included. */
export function rtpHeaderLength(init: RtpHeaderInit): number {
	const extensionLength =
		init.extensions === undefined ? 0 : extensionBlockLength(init.extensions);
	return RTP_HEADER_LENGTH + init.csrcs.length * 4 + extensionLength;
}

export function getExtension(
	header: RtpHeaderInit,
	id: number,
): Buffer | undefined {
	if (header.extensions === undefined) return undefined;
	return findExtension(header.extensions, id)?.data;
}

export function setExtension<H extends RtpHeaderInit>(
	header: H,
	id: number,
	data: Buffer,
): H {
	return { ...header, extensions: withExtension(header.extensions, id, data) };
}

/** Remove element `id`; the block itself goes away once it holds nothing. */
export function removeExtension<H extends RtpHeaderInit>(
	header: H,
	id: number,
): H {
	if (header.extensions === undefined) return header;
	const extensions = withoutExtension(header.extensions, id);
	if (
		extensions.kind !== "opaque" &&
		extensions.elements.length === 0 &&
		(extensions.kind !== "one-byte" || extensions.trailer === undefined)
	) {
		return { ...header, extensions: undefined };
	}
	return { ...header, extensions };
}
