/**
 * RTP/RTCP demultiplexing of datagrams sharing one transport (RFC 5761).
 *
 * The second byte holds the RTCP packet type, or the RTP marker bit and
 * payload type. Values in the configured RTCP range are RTCP; values in the
 * surrounding conflict band are rejected, since either protocol could have
 * produced them; everything else is RTP.
 */

import { RTP_VERSION } from "./const.js";
import { AmbiguousPacketTypeError } from "./exceptions.js";
import { parseRtcpPackets, type RtcpPacket } from "./rtcp/packet.js";
import { parseRtpPacket, type RtpPacket } from "./rtp/packet.js";
import { DEFAULT_SETTINGS, type Settings } from "./settings.js";
import { createLogger } from "./support/utils.js";

const logger = createLogger("demux");

const MIN_DATAGRAM_LENGTH = 4;

export type DatagramKind = "rtp" | "rtcp";

export type DemuxedDatagram =
	| { kind: "rtp"; packet: RtpPacket }
	| { kind: "rtcp"; packets: RtcpPacket[] };

export function classifyDatagram(
	data: Buffer,
	settings: Settings = DEFAULT_SETTINGS,
): DatagramKind {
	if (data.length < MIN_DATAGRAM_LENGTH) {
		throw new AmbiguousPacketTypeError(
			`datagram of ${data.length} bytes is too short to classify`,
		);
	}
	const version = data[0] >> 6;
	if (version !== RTP_VERSION) {
		throw new AmbiguousPacketTypeError(`unknown version ${version}`);
	}
	const value = data[1];
	const { rtcpPacketTypes, conflictRange } = settings.demux;
	if (value >= rtcpPacketTypes.min && value <= rtcpPacketTypes.max) {
		logger.debug("Classified datagram as RTCP (type %d)", value);
		return "rtcp";
	}
	if (value >= conflictRange.min && value <= conflictRange.max) {
		throw new AmbiguousPacketTypeError(
			`second byte ${value} is neither a known RTCP type ` +
				"nor a usable RTP payload type",
		);
	}
	logger.debug("Classified datagram as RTP (second byte %d)", value);
	return "rtp";
}

export function demuxDatagram(
	data: Buffer,
	settings: Settings = DEFAULT_SETTINGS,
): DemuxedDatagram {
	if (classifyDatagram(data, settings) === "rtcp") {
		return { kind: "rtcp", packets: parseRtcpPackets(data) };
	}
	return { kind: "rtp", packet: parseRtpPacket(data, settings) };
}
