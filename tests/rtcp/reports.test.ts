import { describe, expect, it } from "vitest";
import {
	InvalidValueError,
	MalformedHeaderError,
} from "../../src/exceptions.js";
import {
	readRtcpHeader,
	rtcpBodyLength,
	rtcpPacketLength,
} from "../../src/rtcp/header.js";
import { buildRtcpPacket, parseRtcpPackets } from "../../src/rtcp/packet.js";
import type { ReceiverReport } from "../../src/rtcp/receiverReport.js";
import type { ReportBlock } from "../../src/rtcp/reportBlock.js";
import type { SenderReport } from "../../src/rtcp/senderReport.js";
import { BitBuffer } from "../../src/support/buffer.js";

const BLOCK: ReportBlock = {
	ssrc: 0xaabbccdd,
	fractionLost: 0x10,
	cumulativeLost: -1,
	highestSequenceNumber: 0x00010002,
	jitter: 5,
	lastSenderReport: 0x12345678,
	delaySinceLastSenderReport: 0x00010000,
};

const BLOCK_BYTES = [
	0xaa, 0xbb, 0xcc, 0xdd, 0x10, 0xff, 0xff, 0xff, 0x00, 0x01, 0x00, 0x02, 0x00,
	0x00, 0x00, 0x05, 0x12, 0x34, 0x56, 0x78, 0x00, 0x01, 0x00, 0x00,
];

const RR: ReceiverReport = {
	type: "rr",
	senderSsrc: 0x11223344,
	reportBlocks: [BLOCK],
	paddingLength: 0,
};

const RR_BYTES = Buffer.from([
	0x81, 0xc9, 0x00, 0x07, 0x11, 0x22, 0x33, 0x44, ...BLOCK_BYTES,
]);

describe("RTCP header", () => {
	it("reads the common header", () => {
		const header = readRtcpHeader(new BitBuffer(RR_BYTES));
		expect(header).toEqual({
			version: 2,
			hasPadding: false,
			count: 1,
			packetType: 201,
			length: 7,
		});
		expect(rtcpPacketLength(header)).toBe(32);
		expect(rtcpBodyLength(header)).toBe(28);
	});

	it("rejects other versions", () => {
		const buf = new BitBuffer(Buffer.from([0x41, 0xc9, 0, 7]));
		expect(() => readRtcpHeader(buf)).toThrow("unsupported RTCP version 1");
	});
});

describe("receiver report", () => {
	it("writes a thirty two byte packet for one block", () => {
		const data = buildRtcpPacket(RR);
		expect(data.length).toBe(32);
		expect(data.readUInt16BE(2)).toBe(7);
		expect(data).toEqual(RR_BYTES);
	});

	it("reads the report back", () => {
		expect(parseRtcpPackets(RR_BYTES)).toEqual([RR]);
	});

	it("writes an empty report", () => {
		const data = buildRtcpPacket({ ...RR, reportBlocks: [] });
		expect(data).toEqual(
			Buffer.from([0x80, 0xc9, 0x00, 0x01, 0x11, 0x22, 0x33, 0x44]),
		);
	});

	it("appends packet padding", () => {
		const packet: ReceiverReport = {
			...RR,
			reportBlocks: [],
			paddingLength: 4,
		};
		const data = buildRtcpPacket(packet);
		expect(data).toEqual(
			Buffer.from([
				0xa0, 0xc9, 0x00, 0x02, 0x11, 0x22, 0x33, 0x44, 0x00, 0x00, 0x00, 0x04,
			]),
		);
		expect(parseRtcpPackets(data)).toEqual([packet]);
	});

	it("rejects padding that breaks word alignment", () => {
		const packet: ReceiverReport = {
			...RR,
			reportBlocks: [],
			paddingLength: 2,
		};
		expect(() => buildRtcpPacket(packet)).toThrow(InvalidValueError);
	});

	it("rejects more than thirty one blocks", () => {
		const reportBlocks = new Array<ReportBlock>(32).fill(BLOCK);
		expect(() => buildRtcpPacket({ ...RR, reportBlocks })).toThrow(
			"32 report blocks exceed the limit of 31",
		);
	});

	it("rejects a count beyond the body", () => {
		const data = Buffer.from(RR_BYTES);
		data[0] = 0x82;
		expect(() => parseRtcpPackets(data)).toThrow(
			/^packet-0: RR: report-block-1: /,
		);
	});
});

describe("sender report", () => {
	const SR: SenderReport = {
		type: "sr",
		senderSsrc: 1,
		senderInfo: {
			ntpTimestampMsw: 0x83aa7e80,
			ntpTimestampLsw: 0x80000000,
			rtpTimestamp: 0x1000,
			packetCount: 10,
			octetCount: 1600,
		},
		reportBlocks: [],
		paddingLength: 0,
	};

	it("writes sender info", () => {
		expect(buildRtcpPacket(SR)).toEqual(
			Buffer.from([
				0x80, 0xc8, 0x00, 0x06, 0x00, 0x00, 0x00, 0x01, 0x83, 0xaa, 0x7e, 0x80,
				0x80, 0x00, 0x00, 0x00, 0x00, 0x00, 0x10, 0x00, 0x00, 0x00, 0x00, 0x0a,
				0x00, 0x00, 0x06, 0x40,
			]),
		);
	});

	it("round trips report blocks", () => {
		const packet: SenderReport = {
			...SR,
			reportBlocks: [BLOCK, { ...BLOCK, ssrc: 2 }],
		};
		const data = buildRtcpPacket(packet);
		expect(data.length).toBe(76);
		expect(data[0]).toBe(0x82);
		expect(parseRtcpPackets(data)).toEqual([packet]);
	});

	it("rejects a truncated sender info", () => {
		const data = buildRtcpPacket(SR).subarray(0, 20);
		data.writeUInt16BE(4, 2);
		expect(() => parseRtcpPackets(data)).toThrow(/^packet-0: SR: SenderInfo: /);
	});

	it("rejects a length beyond the datagram", () => {
		const data = buildRtcpPacket(SR).subarray(0, 20);
		expect(() => parseRtcpPackets(data)).toThrow(MalformedHeaderError);
	});
});
