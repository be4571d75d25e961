/**
 * Receiver report, PT 201 (RFC 3550 section 6.4.2).
 *
 *  0                   1                   2                   3
 *  0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |V=2|P|    RC   |   PT=RR=201   |             length            |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                     SSRC of packet sender                     |
 * +=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+
 * |                  report blocks (RC of them)                   |
 */

import type { BitBuffer, BitBufferMut } from "../support/buffer.js";
import { withContext } from "../support/utils.js";
import type { RtcpHeader } from "./header.js";
import {
	type ReportBlock,
	readReportBlocks,
	writeReportBlocks,
} from "./reportBlock.js";

export interface ReceiverReport {
	type: "rr";
	senderSsrc: number;
	reportBlocks: ReportBlock[];
	paddingLength: number;
}

export function readReceiverReport(
	buf: BitBuffer,
	header: RtcpHeader,
): Omit<ReceiverReport, "paddingLength"> {
	const senderSsrc = withContext("sender-ssrc", () => buf.readU32());
	const reportBlocks = readReportBlocks(buf, header.count);
	return { type: "rr", senderSsrc, reportBlocks };
}

export function writeReceiverReport(
	buf: BitBufferMut,
	packet: ReceiverReport,
): void {
	withContext("sender-ssrc", () => buf.writeU32(packet.senderSsrc));
	writeReportBlocks(buf, packet.reportBlocks);
}
