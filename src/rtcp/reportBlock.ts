/**
 * Report blocks and sender info shared by SR and RR (RFC 3550 section 6.4).
 *
 *  0                   1                   2                   3
 *  0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 * +=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+
 * |                 SSRC_1 (SSRC of first source)                 |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * | fraction lost |       cumulative number of packets lost       |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |           extended highest sequence number received           |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                      interarrival jitter                      |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                         last SR (LSR)                         |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                   delay since last SR (DLSR)                  |
 * +=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+
 */

import { InvalidValueError } from "../exceptions.js";
import type { BitBuffer, BitBufferMut } from "../support/buffer.js";
import { type DecodedPacket, defpacket } from "../support/packet.js";
import { withContext } from "../support/utils.js";

export const MAX_REPORT_BLOCKS = 31;

const reportBlockFields = {
	ssrc: "u32",
	fractionLost: "u8",
	cumulativeLost: "i24",
	highestSequenceNumber: "u32",
	jitter: "u32",
	lastSenderReport: "u32",
	delaySinceLastSenderReport: "u32",
} as const;

export const ReportBlockPacket = defpacket("ReportBlock", reportBlockFields);

export type ReportBlock = DecodedPacket<typeof reportBlockFields>;

const senderInfoFields = {
	ntpTimestampMsw: "u32",
	ntpTimestampLsw: "u32",
	rtpTimestamp: "u32",
	packetCount: "u32",
	octetCount: "u32",
} as const;

export const SenderInfoPacket = defpacket("SenderInfo", senderInfoFields);

export type SenderInfo = DecodedPacket<typeof senderInfoFields>;

export function readReportBlocks(buf: BitBuffer, count: number): ReportBlock[] {
	const blocks: ReportBlock[] = [];
	for (let i = 0; i < count; i++) {
		blocks.push(
			withContext(`report-block-${i}`, () => ReportBlockPacket.read(buf)),
		);
	}
	return blocks;
}

export function writeReportBlocks(
	buf: BitBufferMut,
	blocks: ReportBlock[],
): void {
	if (blocks.length > MAX_REPORT_BLOCKS) {
		throw new InvalidValueError(
			`${blocks.length} report blocks exceed the limit of ${MAX_REPORT_BLOCKS}`,
		);
	}
	blocks.forEach((block, i) => {
		withContext(`report-block-${i}`, () => ReportBlockPacket.write(buf, block));
	});
}
