/**
 * RTCP common header (RFC 3550 section 6.4.1).
 *
 *  0                   1                   2                   3
 *  0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |V=2|P| RC/FMT  |      PT       |             length            |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *
 * The length is the packet size in 32 bit words minus one, header included.
 */

import { RTCP_HEADER_LENGTH, RTCP_VERSION } from "../const.js";
import { MalformedHeaderError } from "../exceptions.js";
import type { BitBuffer, BitBufferMut } from "../support/buffer.js";
import { type DecodedPacket, defpacket } from "../support/packet.js";

const rtcpHeaderFields = {
	version: "u2",
	hasPadding: "bool",
	count: "u5",
	packetType: "u8",
	length: "u16",
} as const;

export const RtcpHeaderPacket = defpacket("RtcpHeader", rtcpHeaderFields);

export type RtcpHeader = DecodedPacket<typeof rtcpHeaderFields>;

export function readRtcpHeader(buf: BitBuffer): RtcpHeader {
	const header = RtcpHeaderPacket.read(buf);
	if (header.version !== RTCP_VERSION) {
		throw new MalformedHeaderError(
			`unsupported RTCP version ${header.version}`,
		);
	}
	return header;
}

export function writeRtcpHeader(buf: BitBufferMut, header: RtcpHeader): void {
	RtcpHeaderPacket.write(buf, header);
}

/** Size of the whole packet described by `header`, in bytes. */
export function rtcpPacketLength(header: RtcpHeader): number {
	return (header.length + 1) * 4;
}

export function rtcpBodyLength(header: RtcpHeader): number {
	return rtcpPacketLength(header) - RTCP_HEADER_LENGTH;
}
