/**
 * Sender report, PT 200 (RFC 3550 section 6.4.1).
 *
 *  0                   1                   2                   3
 *  0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |V=2|P|    RC   |   PT=SR=200   |             length            |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                         SSRC of sender                        |
 * +=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+
 * |              NTP timestamp, most significant word             |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |             NTP timestamp, least significant word             |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                         RTP timestamp                         |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                     sender's packet count                     |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                      sender's octet count                     |
 * +=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+=+
 * |                  report blocks (RC of them)                   |
 */

import type { BitBuffer, BitBufferMut } from "../support/buffer.js";
import { withContext } from "../support/utils.js";
import type { RtcpHeader } from "./header.js";
import {
	type ReportBlock,
	readReportBlocks,
	type SenderInfo,
	SenderInfoPacket,
	writeReportBlocks,
} from "./reportBlock.js";

export interface SenderReport {
	type: "sr";
	senderSsrc: number;
	senderInfo: SenderInfo;
	reportBlocks: ReportBlock[];
	paddingLength: number;
}

export function readSenderReport(
	buf: BitBuffer,
	header: RtcpHeader,
): Omit<SenderReport, "paddingLength"> {
	const senderSsrc = withContext("sender-ssrc", () => buf.readU32());
	const senderInfo = SenderInfoPacket.read(buf);
	const reportBlocks = readReportBlocks(buf, header.count);
	return { type: "sr", senderSsrc, senderInfo, reportBlocks };
}

export function writeSenderReport(
	buf: BitBufferMut,
	packet: SenderReport,
): void {
	withContext("sender-ssrc", () => buf.writeU32(packet.senderSsrc));
	SenderInfoPacket.write(buf, packet.senderInfo);
	writeReportBlocks(buf, packet.reportBlocks);
}
