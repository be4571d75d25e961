/**
 * Derivation of the header fields that depend on the packet content.
 *
 * Callers describe a packet by its static fields only. Right before a header
 * is written, the functions here compute lengths, counts and flags from the
 * serialized body, so a written header cannot disagree with its body.
 */

import {
	MAX_CSRC_COUNT,
	PayloadFeedbackFormat,
	RTCP_HEADER_LENGTH,
	RTCP_VERSION,
	RTP_VERSION,
	RtcpPacketType,
	TransportFeedbackFormat,
} from "./const.js";
import { InvalidValueError } from "./exceptions.js";
import type { RtcpHeader } from "./rtcp/header.js";
import type { RtcpPacket } from "./rtcp/packet.js";
import type { RtpHeader, RtpHeaderInit } from "./rtp/header.js";
import { MAX_PADDING_LENGTH } from "./support/padding.js";

const MAX_RTCP_COUNT = 0x1f;
const MAX_RTCP_WORDS = 0x10000;

export interface RtpDynamicFields {
	paddingLength: number;
}

function checkPaddingLength(paddingLength: number): void {
	if (
		!Number.isInteger(paddingLength) ||
		paddingLength < 0 ||
		paddingLength > MAX_PADDING_LENGTH
	) {
		throw new InvalidValueError(`invalid padding length ${paddingLength}`);
	}
}

export function finalizeRtpHeader(
	init: RtpHeaderInit,
	dynamic: RtpDynamicFields = { paddingLength: 0 },
): RtpHeader {
	checkPaddingLength(dynamic.paddingLength);
	if (init.csrcs.length > MAX_CSRC_COUNT) {
		throw new InvalidValueError(
			`${init.csrcs.length} CSRCs exceed the limit of ${MAX_CSRC_COUNT}`,
		);
	}
	return {
		...init,
		version: RTP_VERSION,
		hasPadding: dynamic.paddingLength > 0,
		hasExtension: init.extensions !== undefined,
		csrcCount: init.csrcs.length,
	};
}

/** Packet type of `packet`; fixed per variant except for generic packets. */
export function rtcpPacketType(packet: RtcpPacket): number {
	switch (packet.type) {
		case "sr":
			return RtcpPacketType.SenderReport;
		case "rr":
			return RtcpPacketType.ReceiverReport;
		case "sdes":
			return RtcpPacketType.SourceDescription;
		case "bye":
			return RtcpPacketType.Goodbye;
		case "nack":
		case "tcc":
			return RtcpPacketType.TransportFeedback;
		case "pli":
		case "fir":
			return RtcpPacketType.PayloadFeedback;
		case "generic":
			return packet.packetType;
	}
}

/** The RC/SC/FMT field: a count of body items, or the feedback format. */
export function rtcpCount(packet: RtcpPacket): number {
	switch (packet.type) {
		case "sr":
		case "rr":
			return packet.reportBlocks.length;
		case "sdes":
			return packet.chunks.length;
		case "bye":
			return packet.ssrcs.length;
		case "nack":
			return TransportFeedbackFormat.Nack;
		case "tcc":
			return TransportFeedbackFormat.TransportWideCc;
		case "pli":
			return PayloadFeedbackFormat.PictureLossIndication;
		case "fir":
			return PayloadFeedbackFormat.FullIntraRequest;
		case "generic":
			return packet.count;
	}
}

/**
 * Compute the header for `packet` whose serialized body (alignment included,
 * packet padding excluded) is `body`.
 */
export function finalizeRtcpHeader(
	packet: RtcpPacket,
	body: Buffer,
	paddingLength: number,
): RtcpHeader {
	checkPaddingLength(paddingLength);
	const count = rtcpCount(packet);
	if (count < 0 || count > MAX_RTCP_COUNT) {
		throw new InvalidValueError(`count ${count} does not fit in 5 bits`);
	}
	const total = RTCP_HEADER_LENGTH + body.length + paddingLength;
	if (total % 4 !== 0) {
		throw new InvalidValueError(
			`packet of ${total} bytes does not end on a word boundary`,
		);
	}
	if (total / 4 > MAX_RTCP_WORDS) {
		throw new InvalidValueError(`packet of ${total} bytes is too long`);
	}
	const hasPadding =
		packet.type === "generic" ? packet.hasPadding : paddingLength > 0;
	return {
		version: RTCP_VERSION,
		hasPadding,
		count,
		packetType: rtcpPacketType(packet),
		length: total / 4 - 1,
	};
}
