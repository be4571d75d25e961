/**
 * RTCP packets and compound datagrams.
 *
 * A datagram is a sequence of packets, each starting with the common header.
 * Modeled packet types are decoded into typed values; everything else is
 * kept as a generic packet holding the raw body, so it is written back
 * byte for byte.
 */

import {
	PayloadFeedbackFormat,
	RtcpPacketType,
	TransportFeedbackFormat,
} from "../const.js";
import { feedbackFormatStr, rtcpPacketTypeStr } from "../convert.js";
import { MalformedHeaderError, TrailingDataError } from "../exceptions.js";
import { BitBuffer, BitBufferMut } from "../support/buffer.js";
import {
	paddingNeeded,
	readPacketPadding,
	writeAlignment,
	writePacketPadding,
} from "../support/padding.js";
import { createLogger, logBinary, withContext } from "../support/utils.js";
import { finalizeRtcpHeader } from "../sync.js";
import { type Goodbye, readGoodbye, writeGoodbye } from "./bye.js";
import {
	type FullIntraRequest,
	type GenericNack,
	type PictureLossIndication,
	readFullIntraRequest,
	readGenericNack,
	readPictureLossIndication,
	writeFullIntraRequest,
	writeGenericNack,
	writePictureLossIndication,
} from "./feedback.js";
import {
	type RtcpHeader,
	readRtcpHeader,
	rtcpBodyLength,
	writeRtcpHeader,
} from "./header.js";
import {
	type ReceiverReport,
	readReceiverReport,
	writeReceiverReport,
} from "./receiverReport.js";
import {
	readSourceDescription,
	type SourceDescription,
	writeSourceDescription,
} from "./sdes.js";
import {
	readSenderReport,
	type SenderReport,
	writeSenderReport,
} from "./senderReport.js";
import {
	readTccFeedback,
	type TccFeedbackPacket,
	writeTccFeedback,
} from "./tcc/feedback.js";

const logger = createLogger("rtcp");

/** Any packet type (or feedback format) without a dedicated model. */
export interface GenericRtcpPacket {
	type: "generic";
	packetType: number;
	count: number;
	hasPadding: boolean;
	/** Everything after the common header, packet padding included. */
	payload: Buffer;
}

export type ModeledRtcpPacket =
	| SenderReport
	| ReceiverReport
	| SourceDescription
	| Goodbye
	| PictureLossIndication
	| FullIntraRequest
	| GenericNack
	| TccFeedbackPacket;

export type RtcpPacket = ModeledRtcpPacket | GenericRtcpPacket;

type WithoutPadding<P> = P extends unknown ? Omit<P, "paddingLength"> : never;

export type RtcpBody = WithoutPadding<ModeledRtcpPacket>;

type BodyReader = (buf: BitBuffer, header: RtcpHeader) => RtcpBody;

function bodyReader(header: RtcpHeader): BodyReader | undefined {
	switch (header.packetType) {
		case RtcpPacketType.SenderReport:
			return readSenderReport;
		case RtcpPacketType.ReceiverReport:
			return readReceiverReport;
		case RtcpPacketType.SourceDescription:
			return readSourceDescription;
		case RtcpPacketType.Goodbye:
			return readGoodbye;
		case RtcpPacketType.TransportFeedback:
			if (header.count === TransportFeedbackFormat.Nack) return readGenericNack;
			if (header.count === TransportFeedbackFormat.TransportWideCc) {
				return readTccFeedback;
			}
			return undefined;
		case RtcpPacketType.PayloadFeedback:
			if (header.count === PayloadFeedbackFormat.PictureLossIndication) {
				return readPictureLossIndication;
			}
			if (header.count === PayloadFeedbackFormat.FullIntraRequest) {
				return readFullIntraRequest;
			}
			return undefined;
		default:
			return undefined;
	}
}

function describe(header: RtcpHeader): string {
	const name = rtcpPacketTypeStr(header.packetType);
	if (
		header.packetType === RtcpPacketType.TransportFeedback ||
		header.packetType === RtcpPacketType.PayloadFeedback
	) {
		return `${name}/${feedbackFormatStr(header.packetType, header.count)}`;
	}
	return name;
}

function readBody(
	region: BitBuffer,
	header: RtcpHeader,
	reader: BodyReader,
): ModeledRtcpPacket {
	const paddingLength = header.hasPadding ? readPacketPadding(region) : 0;
	const content = new BitBuffer(
		region.rest(),
		region.byteLength - paddingLength,
	);
	const body = reader(content, header);

	// Zero bytes up to the next word boundary may follow the content.
	const leftover = content.rest();
	const alignment = paddingNeeded(content.bytesConsumedSince(0));
	if (leftover.length > alignment || leftover.some((b) => b !== 0)) {
		throw new TrailingDataError(
			`${leftover.length} bytes left after body`,
			leftover.length,
		);
	}
	return { ...body, paddingLength };
}

/** Read one packet; the header is returned alongside for inspection. */
export function readRtcpPacket(buf: BitBuffer): {
	header: RtcpHeader;
	packet: RtcpPacket;
} {
	const header = readRtcpHeader(buf);
	return withContext(describe(header), () => {
		const bodyLength = rtcpBodyLength(header);
		if (bodyLength > buf.bytesRemaining) {
			throw new MalformedHeaderError(
				`length field claims ${bodyLength} body bytes, ` +
					`only ${buf.bytesRemaining} available`,
			);
		}
		const region = buf.subBuffer(bodyLength);
		const reader = bodyReader(header);
		if (reader === undefined) {
			logger.debug("Keeping %s as generic packet", describe(header));
			const packet: GenericRtcpPacket = {
				type: "generic",
				packetType: header.packetType,
				count: header.count,
				hasPadding: header.hasPadding,
				payload: Buffer.from(region.rest()),
			};
			return { header, packet };
		}
		return { header, packet: readBody(region, header, reader) };
	});
}

/** Parse a compound datagram into its packets, in order. */
export function parseRtcpPackets(data: Buffer): RtcpPacket[] {
	if (data.length === 0) {
		throw new MalformedHeaderError("empty RTCP datagram");
	}
	const buf = new BitBuffer(data);
	const packets: RtcpPacket[] = [];
	while (buf.bytesRemaining > 0) {
		const { packet } = withContext(`packet-${packets.length}`, () =>
			readRtcpPacket(buf),
		);
		packets.push(packet);
	}
	return packets;
}

function writeBody(buf: BitBufferMut, packet: ModeledRtcpPacket): void {
	switch (packet.type) {
		case "sr":
			writeSenderReport(buf, packet);
			return;
		case "rr":
			writeReceiverReport(buf, packet);
			return;
		case "sdes":
			writeSourceDescription(buf, packet);
			return;
		case "bye":
			writeGoodbye(buf, packet);
			return;
		case "pli":
			writePictureLossIndication(buf, packet);
			return;
		case "fir":
			writeFullIntraRequest(buf, packet);
			return;
		case "nack":
			writeGenericNack(buf, packet);
			return;
		case "tcc":
			writeTccFeedback(buf, packet);
			return;
	}
}

/**
 * Serialize the body of `packet` ahead of its header. Alignment is added
 * unless the packet padding alone ends the packet on a word boundary.
 */
function serializeBody(packet: ModeledRtcpPacket): Buffer {
	const scratch = new BitBufferMut();
	writeBody(scratch, packet);
	if (
		packet.paddingLength === 0 ||
		(scratch.length + packet.paddingLength) % 4 !== 0
	) {
		writeAlignment(scratch, 0);
	}
	return scratch.toBuffer();
}

export function writeRtcpPacket(buf: BitBufferMut, packet: RtcpPacket): void {
	withContext(packet.type, () => {
		if (packet.type === "generic") {
			if (packet.hasPadding) {
				withContext("padding", () =>
					readPacketPadding(new BitBuffer(packet.payload)),
				);
			}
			const header = finalizeRtcpHeader(packet, packet.payload, 0);
			writeRtcpHeader(buf, header);
			buf.writeBytes(packet.payload);
			return;
		}
		const body = serializeBody(packet);
		const header = finalizeRtcpHeader(packet, body, packet.paddingLength);
		writeRtcpHeader(buf, header);
		buf.writeBytes(body);
		if (packet.paddingLength > 0) {
			writePacketPadding(buf, buf.position, packet.paddingLength);
		}
	});
}

export function buildRtcpPacket(packet: RtcpPacket): Buffer {
	return buildRtcpPackets([packet]);
}

/** Serialize `packets` back to back into one compound datagram. */
export function buildRtcpPackets(packets: RtcpPacket[]): Buffer {
	const buf = new BitBufferMut();
	packets.forEach((packet, i) => {
		withContext(`packet-${i}`, () => writeRtcpPacket(buf, packet));
	});
	const data = buf.toBuffer();
	logBinary(logger, "Built RTCP datagram", {
		packets: packets.map((p) => p.type).join(","),
		data,
	});
	return data;
}
