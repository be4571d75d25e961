/**
 * Feedback messages (RFC 4585 section 6, RFC 5104 section 4.3.1).
 *
 *  0                   1                   2                   3
 *  0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |V=2|P|   FMT   |       PT      |          length               |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                  SSRC of packet sender                        |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                  SSRC of media source                         |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * :            Feedback Control Information (FCI)                 :
 *
 * PLI carries no FCI. FIR carries (SSRC, seq nr, 24 reserved bits) entries
 * and generic NACK carries (PID, BLP) pairs.
 */

import { InvalidValueError } from "../exceptions.js";
import type { BitBuffer, BitBufferMut } from "../support/buffer.js";
import { type DecodedPacket, defpacket } from "../support/packet.js";
import { withContext } from "../support/utils.js";

const feedbackHeaderFields = {
	senderSsrc: "u32",
	mediaSsrc: "u32",
} as const;

export const FeedbackHeader = defpacket("FeedbackHeader", feedbackHeaderFields);

export type FeedbackSources = DecodedPacket<typeof feedbackHeaderFields>;

const firEntryFields = {
	ssrc: "u32",
	sequenceNumber: "u8",
	reserved: "u24",
} as const;

const FirEntryPacket = defpacket("FirEntry", firEntryFields);

const nackPairFields = {
	pid: "u16",
	blp: "u16",
} as const;

const NackPairPacket = defpacket("NackPair", nackPairFields);

export interface PictureLossIndication extends FeedbackSources {
	type: "pli";
	paddingLength: number;
}

export interface FirEntry {
	ssrc: number;
	sequenceNumber: number;
}

export interface FullIntraRequest extends FeedbackSources {
	type: "fir";
	entries: FirEntry[];
	paddingLength: number;
}

export type NackPair = DecodedPacket<typeof nackPairFields>;

export interface GenericNack extends FeedbackSources {
	type: "nack";
	pairs: NackPair[];
	paddingLength: number;
}

export function readFeedbackSources(buf: BitBuffer): FeedbackSources {
	return FeedbackHeader.read(buf);
}

export function writeFeedbackSources(
	buf: BitBufferMut,
	sources: FeedbackSources,
): void {
	FeedbackHeader.write(buf, sources);
}

export function readPictureLossIndication(
	buf: BitBuffer,
): Omit<PictureLossIndication, "paddingLength"> {
	const { senderSsrc, mediaSsrc } = readFeedbackSources(buf);
	return { type: "pli", senderSsrc, mediaSsrc };
}

export function writePictureLossIndication(
	buf: BitBufferMut,
	packet: PictureLossIndication,
): void {
	writeFeedbackSources(buf, packet);
}

export function readFullIntraRequest(
	buf: BitBuffer,
): Omit<FullIntraRequest, "paddingLength"> {
	const { senderSsrc, mediaSsrc } = readFeedbackSources(buf);
	const entries: FirEntry[] = [];
	while (buf.bytesRemaining >= FirEntryPacket.length) {
		const { ssrc, sequenceNumber } = withContext(
			`entry-${entries.length}`,
			() => FirEntryPacket.read(buf),
		);
		entries.push({ ssrc, sequenceNumber });
	}
	return { type: "fir", senderSsrc, mediaSsrc, entries };
}

export function writeFullIntraRequest(
	buf: BitBufferMut,
	packet: FullIntraRequest,
): void {
	writeFeedbackSources(buf, packet);
	packet.entries.forEach((entry, i) => {
		withContext(`entry-${i}`, () =>
			FirEntryPacket.write(buf, { ...entry, reserved: 0 }),
		);
	});
}

export function readGenericNack(
	buf: BitBuffer,
): Omit<GenericNack, "paddingLength"> {
	const { senderSsrc, mediaSsrc } = readFeedbackSources(buf);
	const pairs: NackPair[] = [];
	while (buf.bytesRemaining >= NackPairPacket.length) {
		pairs.push(
			withContext(`pair-${pairs.length}`, () => NackPairPacket.read(buf)),
		);
	}
	return { type: "nack", senderSsrc, mediaSsrc, pairs };
}

export function writeGenericNack(buf: BitBufferMut, packet: GenericNack): void {
	writeFeedbackSources(buf, packet);
	packet.pairs.forEach((pair, i) => {
		withContext(`pair-${i}`, () => NackPairPacket.write(buf, pair));
	});
}

/** Every sequence number reported lost by `packet`, in pair order. */
export function nackSequenceNumbers(packet: GenericNack): number[] {
	const lost: number[] = [];
	for (const { pid, blp } of packet.pairs) {
		lost.push(pid);
		for (let bit = 0; bit < 16; bit++) {
			if ((blp >> bit) & 1) {
				lost.push((pid + bit + 1) & 0xffff);
			}
		}
	}
	return lost;
}

/**
 * Build a NACK for `sequenceNumbers`. Each number either lands in the bitmask
 * of the current pair (when it follows its PID by 1 to 16) or opens a new one.
 */
export function createNack(
	senderSsrc: number,
	mediaSsrc: number,
	sequenceNumbers: number[],
): GenericNack {
	const pairs: NackPair[] = [];
	let current: NackPair | undefined;
	for (const seq of sequenceNumbers) {
		if (!Number.isInteger(seq) || seq < 0 || seq > 0xffff) {
			throw new InvalidValueError(`invalid sequence number ${seq}`);
		}
		if (current !== undefined) {
			const distance = (seq - current.pid) & 0xffff;
			if (distance === 0) continue;
			if (distance <= 16) {
				current.blp |= 1 << (distance - 1);
				continue;
			}
		}
		current = { pid: seq, blp: 0 };
		pairs.push(current);
	}
	return { type: "nack", senderSsrc, mediaSsrc, pairs, paddingLength: 0 };
}
