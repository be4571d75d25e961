import { describe, expect, it } from "vitest";
import { InvalidValueError } from "../../src/exceptions.js";
import {
	createNack,
	type FullIntraRequest,
	type GenericNack,
	nackSequenceNumbers,
	type PictureLossIndication,
} from "../../src/rtcp/feedback.js";
import { buildRtcpPacket, parseRtcpPackets } from "../../src/rtcp/packet.js";

describe("picture loss indication", () => {
	const PLI: PictureLossIndication = {
		type: "pli",
		senderSsrc: 1,
		mediaSsrc: 0x0a0b0c0d,
		paddingLength: 0,
	};

	it("writes the sources only", () => {
		const data = buildRtcpPacket(PLI);
		expect(data).toEqual(
			Buffer.from([
				0x81, 0xce, 0x00, 0x02, 0x00, 0x00, 0x00, 0x01, 0x0a, 0x0b, 0x0c, 0x0d,
			]),
		);
		expect(parseRtcpPackets(data)).toEqual([PLI]);
	});
});

describe("full intra request", () => {
	const FIR: FullIntraRequest = {
		type: "fir",
		senderSsrc: 1,
		mediaSsrc: 0,
		entries: [{ ssrc: 0xaabbccdd, sequenceNumber: 7 }],
		paddingLength: 0,
	};

	it("writes entries with zero reserved bits", () => {
		const data = buildRtcpPacket(FIR);
		expect(data).toEqual(
			Buffer.from([
				0x84, 0xce, 0x00, 0x04, 0x00, 0x00, 0x00, 0x01, 0x00, 0x00, 0x00, 0x00,
				0xaa, 0xbb, 0xcc, 0xdd, 0x07, 0x00, 0x00, 0x00,
			]),
		);
		expect(parseRtcpPackets(data)).toEqual([FIR]);
	});

	it("ignores reserved bits on read", () => {
		const data = buildRtcpPacket(FIR);
		data[19] = 0x55;
		expect(parseRtcpPackets(data)).toEqual([FIR]);
	});
});

describe("generic NACK", () => {
	it("groups sequence numbers into pairs", () => {
		const nack = createNack(1, 2, [100, 101, 103, 200]);
		expect(nack.pairs).toEqual([
			{ pid: 100, blp: 0b101 },
			{ pid: 200, blp: 0 },
		]);
		expect(nackSequenceNumbers(nack)).toEqual([100, 101, 103, 200]);
	});

	it("wraps around sequence number zero", () => {
		const nack = createNack(1, 2, [65535, 0, 15]);
		expect(nack.pairs).toEqual([{ pid: 65535, blp: 0x8001 }]);
		expect(nackSequenceNumbers(nack)).toEqual([65535, 0, 15]);
	});

	it("skips duplicates", () => {
		expect(createNack(1, 2, [5, 5]).pairs).toEqual([{ pid: 5, blp: 0 }]);
	});

	it("rejects invalid sequence numbers", () => {
		expect(() => createNack(1, 2, [70000])).toThrow(InvalidValueError);
	});

	it("writes pairs after the sources", () => {
		const nack: GenericNack = createNack(1, 2, [100, 101, 103, 200]);
		const data = buildRtcpPacket(nack);
		expect(data).toEqual(
			Buffer.from([
				0x81, 0xcd, 0x00, 0x04, 0x00, 0x00, 0x00, 0x01, 0x00, 0x00, 0x00, 0x02,
				0x00, 0x64, 0x00, 0x05, 0x00, 0xc8, 0x00, 0x00,
			]),
		);
		expect(parseRtcpPackets(data)).toEqual([nack]);
	});
});
