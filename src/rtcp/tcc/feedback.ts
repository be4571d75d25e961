/**
 * Transport-wide congestion control feedback, PT 205 FMT 15
 * (draft-holmer-rmcat-transport-wide-cc-extensions-01 section 3.1).
 *
 *  0                   1                   2                   3
 *  0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |V=2|P|  FMT=15 |    PT=205     |           length              |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                     SSRC of packet sender                     |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                      SSRC of media source                     |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |      base sequence number     |      packet status count      |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                 reference time                | fb pkt. count |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |          packet chunk         |         packet chunk          |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * .                                                               .
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |         packet chunk          |  recv delta   |  recv delta   |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * .                                                               .
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |           recv delta          |  recv delta   | zero padding  |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *
 * Small deltas are one unsigned byte, large or negative deltas two signed
 * bytes, both in 250 µs ticks.
 */

import { PacketStatus } from "../../const.js";
import { InvalidValueError } from "../../exceptions.js";
import type { BitBuffer, BitBufferMut } from "../../support/buffer.js";
import { type DecodedPacket, defpacket } from "../../support/packet.js";
import { withContext } from "../../support/utils.js";
import {
	readFeedbackSources,
	type FeedbackSources,
	writeFeedbackSources,
} from "../feedback.js";
import {
	chunkSymbolCount,
	decodePacketStatuses,
	encodePacketStatuses,
	isReceived,
	type PacketStatusChunk,
	readStatusChunk,
	writeStatusChunk,
} from "./statusChunk.js";

export const TICK_MICROSECONDS = 250;
export const REFERENCE_TIME_MILLISECONDS = 64;
export const MAX_SMALL_DELTA = 0xff;
export const MIN_LARGE_DELTA = -0x8000;
export const MAX_LARGE_DELTA = 0x7fff;

const tccFieldsLayout = {
	baseSequenceNumber: "u16",
	packetStatusCount: "u16",
	referenceTime: "u24",
	feedbackPacketCount: "u8",
} as const;

export const TccFields = defpacket("TccFields", tccFieldsLayout);

export interface TccFeedbackPacket
	extends FeedbackSources,
		DecodedPacket<typeof tccFieldsLayout> {
	type: "tcc";
	chunks: PacketStatusChunk[];
	/** Receive deltas in ticks, one per received packet, in packet order. */
	deltas: number[];
	paddingLength: number;
}

export interface PacketReport {
	sequenceNumber: number;
	status: PacketStatus;
	/** Ticks since the previous received packet (or the reference time). */
	delta?: number;
}

export function readDelta(buf: BitBuffer, status: PacketStatus): number {
	return status === PacketStatus.ReceivedSmallDelta
		? buf.readU8()
		: buf.readI16();
}

export function writeDelta(
	buf: BitBufferMut,
	status: PacketStatus,
	delta: number,
): void {
	if (status === PacketStatus.ReceivedSmallDelta) {
		if (!Number.isInteger(delta) || delta < 0 || delta > MAX_SMALL_DELTA) {
			throw new InvalidValueError(`delta ${delta} does not fit a small delta`);
		}
		buf.writeU8(delta);
		return;
	}
	buf.writeI16(delta);
}

export function readTccFeedback(
	buf: BitBuffer,
): Omit<TccFeedbackPacket, "paddingLength"> {
	const sources = readFeedbackSources(buf);
	const fields = TccFields.read(buf);
	const chunks: PacketStatusChunk[] = [];
	let described = 0;
	while (described < fields.packetStatusCount) {
		const chunk = withContext(`chunk-${chunks.length}`, () =>
			readStatusChunk(buf),
		);
		described += chunkSymbolCount(chunk);
		chunks.push(chunk);
	}
	const statuses = decodePacketStatuses(chunks, fields.packetStatusCount);
	const deltas: number[] = [];
	for (const status of statuses) {
		if (isReceived(status)) {
			deltas.push(
				withContext(`delta-${deltas.length}`, () => readDelta(buf, status)),
			);
		}
	}
	return { type: "tcc", ...sources, ...fields, chunks, deltas };
}

function validateTccFeedback(packet: TccFeedbackPacket): PacketStatus[] {
	const statuses = decodePacketStatuses(
		packet.chunks,
		packet.packetStatusCount,
	);
	const lastChunk = packet.chunks.at(-1);
	if (lastChunk !== undefined) {
		const beforeLast = packet.chunks
			.slice(0, -1)
			.reduce((sum, chunk) => sum + chunkSymbolCount(chunk), 0);
		if (beforeLast >= packet.packetStatusCount) {
			throw new InvalidValueError("chunks describe more packets than reported");
		}
	}
	const received = statuses.filter(isReceived).length;
	if (received !== packet.deltas.length) {
		throw new InvalidValueError(
			`${received} received packets but ${packet.deltas.length} deltas`,
		);
	}
	return statuses;
}

export function writeTccFeedback(
	buf: BitBufferMut,
	packet: TccFeedbackPacket,
): void {
	const statuses = validateTccFeedback(packet);
	writeFeedbackSources(buf, packet);
	TccFields.write(buf, packet);
	packet.chunks.forEach((chunk, i) => {
		withContext(`chunk-${i}`, () => writeStatusChunk(buf, chunk));
	});
	let index = 0;
	for (const status of statuses) {
		if (!isReceived(status)) continue;
		const delta = packet.deltas[index];
		withContext(`delta-${index}`, () => writeDelta(buf, status, delta));
		index++;
	}
}

/** Per-packet view of `packet`, sequence numbers wrapping at 16 bits. */
export function tccPacketReports(packet: TccFeedbackPacket): PacketReport[] {
	const statuses = decodePacketStatuses(
		packet.chunks,
		packet.packetStatusCount,
	);
	let deltaIndex = 0;
	return statuses.map((status, i) => {
		const sequenceNumber = (packet.baseSequenceNumber + i) & 0xffff;
		if (!isReceived(status)) return { sequenceNumber, status };
		const delta = packet.deltas[deltaIndex++];
		return { sequenceNumber, status, delta };
	});
}

export interface TccFeedbackInit extends FeedbackSources {
	baseSequenceNumber: number;
	referenceTime: number;
	feedbackPacketCount: number;
	/** One entry per packet starting at the base sequence number. */
	packets: { status?: PacketStatus; delta?: number }[];
}

export function statusForDelta(delta: number | undefined): PacketStatus {
	if (delta === undefined) return PacketStatus.NotReceived;
	return delta >= 0 && delta <= MAX_SMALL_DELTA
		? PacketStatus.ReceivedSmallDelta
		: PacketStatus.ReceivedLargeOrNegativeDelta;
}

/**
 * Create a feedback packet from per-packet entries. A missing status is
 * derived from the delta: none means not received, otherwise the delta's
 * size decides between small and large.
 */
export function createTccFeedback(init: TccFeedbackInit): TccFeedbackPacket {
	if (init.packets.length > 0xffff) {
		throw new InvalidValueError(`${init.packets.length} packets exceed 65535`);
	}
	const statuses: PacketStatus[] = [];
	const deltas: number[] = [];
	init.packets.forEach((packet, i) => {
		const status = packet.status ?? statusForDelta(packet.delta);
		if (isReceived(status)) {
			if (packet.delta === undefined) {
				throw new InvalidValueError(`received packet ${i} has no delta`);
			}
			deltas.push(packet.delta);
		} else if (packet.delta !== undefined) {
			throw new InvalidValueError(
				`packet ${i} was not received but has a delta`,
			);
		}
		statuses.push(status);
	});
	return {
		type: "tcc",
		senderSsrc: init.senderSsrc,
		mediaSsrc: init.mediaSsrc,
		baseSequenceNumber: init.baseSequenceNumber,
		packetStatusCount: statuses.length,
		referenceTime: init.referenceTime,
		feedbackPacketCount: init.feedbackPacketCount,
		chunks: encodePacketStatuses(statuses),
		deltas,
		paddingLength: 0,
	};
}
