/**
 * RTP packets: header, payload and optional padding (RFC 3550 section 5.1).
 *
 * A parsed payload is a view into the datagram it was parsed from unless the
 * `rtp.copyPayload` setting is on. Such a packet must not outlive changes to
 * that datagram; `copyRtpPacket` detaches it.
 */

import { MalformedHeaderError } from "../exceptions.js";
import { DEFAULT_SETTINGS, type Settings } from "../settings.js";
import { BitBuffer, BitBufferMut } from "../support/buffer.js";
import { readPacketPadding, writePacketPadding } from "../support/padding.js";
import { createLogger, logBinary, withContext } from "../support/utils.js";
import type { ExtensionElement, HeaderExtensionBlock } from "./extensions.js";
import {
	type RtpHeader,
	type RtpHeaderInit,
	readRtpHeader,
	rtpHeaderLength,
	writeRtpHeader,
} from "./header.js";

const logger = createLogger("rtp");

export interface RtpPacket {
	header: RtpHeader;
	payload: Buffer;
	paddingLength: number;
}

/** What a caller provides to build a packet; the rest is derived. */
export interface RtpPacketInit {
	header: RtpHeaderInit;
	payload: Buffer;
	paddingLength?: number;
}

export interface RtpPacketOptions {
	payloadType: number;
	sequenceNumber: number;
	timestamp: number;
	ssrc: number;
	marker?: boolean;
	csrcs?: number[];
	extensions?: HeaderExtensionBlock;
	payload?: Buffer;
	paddingLength?: number;
}

export interface ByteRange {
	start: number;
	end: number;
}

export interface RtpByteRanges {
	header: ByteRange;
	payload: ByteRange;
	padding: ByteRange;
}

export interface RtcpByteRanges {
	/** Common header and sender SSRC, never encrypted. */
	header: ByteRange;
	encrypted: ByteRange;
}

/** Read a packet spanning the rest of `buf`. */
export function readRtpPacket(
	buf: BitBuffer,
	settings: Settings = DEFAULT_SETTINGS,
): RtpPacket {
	return withContext("RtpPacket", () => {
		const header = readRtpHeader(buf);
		const paddingLength = header.hasPadding
			? withContext("padding", () => readPacketPadding(buf))
			: 0;
		const view = buf.readBytes(buf.bytesRemaining - paddingLength);
		buf.skip(paddingLength);
		const payload = settings.rtp.copyPayload ? Buffer.from(view) : view;
		return { header, payload, paddingLength };
	});
}

export function parseRtpPacket(
	data: Buffer,
	settings: Settings = DEFAULT_SETTINGS,
): RtpPacket {
	return readRtpPacket(new BitBuffer(data), settings);
}

export function writeRtpPacket(buf: BitBufferMut, init: RtpPacketInit): void {
	withContext("RtpPacket", () => {
		const paddingLength = init.paddingLength ?? 0;
		const mark = buf.position;
		writeRtpHeader(buf, init.header, paddingLength);
		buf.writeBytes(init.payload);
		if (paddingLength > 0) {
			writePacketPadding(buf, mark, paddingLength);
		}
	});
}

export function buildRtpPacket(init: RtpPacketInit): Buffer {
	const paddingLength = init.paddingLength ?? 0;
	const buf = new BitBufferMut(
		rtpHeaderLength(init.header) + init.payload.length + paddingLength,
	);
	writeRtpPacket(buf, init);
	const data = buf.toBuffer();
	logBinary(logger, "Built RTP packet", {
		seq: init.header.sequenceNumber,
		data,
	});
	return data;
}

/** Fill in defaults for a new outgoing packet. */
export function createRtpPacket(options: RtpPacketOptions): RtpPacketInit {
	const header: RtpHeaderInit = {
		marker: options.marker ?? false,
		payloadType: options.payloadType,
		sequenceNumber: options.sequenceNumber,
		timestamp: options.timestamp,
		ssrc: options.ssrc,
		csrcs: options.csrcs ?? [],
	};
	if (options.extensions !== undefined) {
		header.extensions = options.extensions;
	}
	return {
		header,
		payload: options.payload ?? Buffer.alloc(0),
		paddingLength: options.paddingLength ?? 0,
	};
}

function copyElements(elements: ExtensionElement[]): ExtensionElement[] {
	return elements.map((e) => ({ id: e.id, data: Buffer.from(e.data) }));
}

function copyExtensions(block: HeaderExtensionBlock): HeaderExtensionBlock {
	switch (block.kind) {
		case "one-byte":
			return {
				kind: "one-byte",
				elements: copyElements(block.elements),
				trailer:
					block.trailer === undefined ? undefined : Buffer.from(block.trailer),
			};
		case "two-byte":
			return {
				kind: "two-byte",
				appBits: block.appBits,
				elements: copyElements(block.elements),
			};
		case "opaque":
			return {
				kind: "opaque",
				profile: block.profile,
				data: Buffer.from(block.data),
			};
	}
}

/** Deep copy of `packet` that owns all of its bytes. */
export function copyRtpPacket(packet: RtpPacket): RtpPacket {
	const header: RtpHeader = {
		...packet.header,
		csrcs: [...packet.header.csrcs],
	};
	if (packet.header.extensions !== undefined) {
		header.extensions = copyExtensions(packet.header.extensions);
	}
	return {
		header,
		payload: Buffer.from(packet.payload),
		paddingLength: packet.paddingLength,
	};
}

/**
 * Byte ranges of `data` that an SRTP layer protects: the header is
 * authenticated, the payload encrypted, padding is part of the payload
 * for encryption purposes but reported apart.
 */
export function rtpByteRanges(data: Buffer): RtpByteRanges {
	const buf = new BitBuffer(data);
	const header = readRtpHeader(buf);
	const headerEnd = buf.position / 8;
	const paddingLength = header.hasPadding ? readPacketPadding(buf) : 0;
	const paddingStart = data.length - paddingLength;
	return {
		header: { start: 0, end: headerEnd },
		payload: { start: headerEnd, end: paddingStart },
		padding: { start: paddingStart, end: data.length },
	};
}

const SRTCP_CLEARTEXT_LENGTH = 8;

/** SRTCP ranges of an RTCP datagram: 8 bytes in the clear, rest encrypted. */
export function rtcpByteRanges(data: Buffer): RtcpByteRanges {
	if (data.length < SRTCP_CLEARTEXT_LENGTH) {
		throw new MalformedHeaderError(
			`RTCP datagram of ${data.length} bytes is shorter than ` +
				`${SRTCP_CLEARTEXT_LENGTH}`,
		);
	}
	return {
		header: { start: 0, end: SRTCP_CLEARTEXT_LENGTH },
		encrypted: { start: SRTCP_CLEARTEXT_LENGTH, end: data.length },
	};
}
