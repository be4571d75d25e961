import { describe, expect, it } from "vitest";
import {
	InvalidValueError,
	MalformedHeaderError,
} from "../../src/exceptions.js";
import type { RtpHeaderInit } from "../../src/rtp/header.js";
import {
	type AudioLevel,
	decodeAudioLevel,
	decodeTransportSequenceNumber,
	encodeAudioLevel,
	encodeTransportSequenceNumber,
	getAudioLevel,
	getTransportSequenceNumber,
	isMuted,
	setAudioLevel,
	setTransportSequenceNumber,
} from "../../src/rtp/wellKnown.js";

const HEADER: RtpHeaderInit = {
	marker: false,
	payloadType: 111,
	sequenceNumber: 1,
	timestamp: 960,
	ssrc: 0x01020304,
	csrcs: [],
};

describe("audio level", () => {
	it.each([
		[0x80, { voiceActivity: true, level: 0 }],
		[0x7f, { voiceActivity: false, level: 127 }],
		[0xaa, { voiceActivity: true, level: 42 }],
	])("decodes %d", (byte, expected) => {
		expect(decodeAudioLevel(Buffer.from([byte]))).toEqual(expected);
		expect(encodeAudioLevel(expected)).toEqual(Buffer.from([byte]));
	});

	it("detects muted audio", () => {
		expect(isMuted({ voiceActivity: false, level: 127 })).toBe(true);
		expect(isMuted({ voiceActivity: true, level: 126 })).toBe(false);
	});

	it("rejects invalid levels", () => {
		const level: AudioLevel = { voiceActivity: false, level: 128 };
		expect(() => encodeAudioLevel(level)).toThrow(InvalidValueError);
		expect(() => decodeAudioLevel(Buffer.alloc(0))).toThrow(
			MalformedHeaderError,
		);
	});

	it("reads and writes through the header", () => {
		const header = setAudioLevel(HEADER, 1, { voiceActivity: true, level: 30 });
		expect(header.extensions).toEqual({
			kind: "one-byte",
			elements: [{ id: 1, data: Buffer.from([0x9e]) }],
		});
		expect(getAudioLevel(header, 1)).toEqual({
			voiceActivity: true,
			level: 30,
		});
		expect(getAudioLevel(HEADER, 1)).toBeUndefined();
	});
});

describe("transport sequence number", () => {
	it("encodes big endian", () => {
		expect(encodeTransportSequenceNumber(0x1234)).toEqual(
			Buffer.from([0x12, 0x34]),
		);
		const data = Buffer.from([0xff, 0xfe]);
		expect(decodeTransportSequenceNumber(data)).toBe(0xfffe);
	});

	it("rejects invalid values", () => {
		expect(() => encodeTransportSequenceNumber(0x10000)).toThrow(
			InvalidValueError,
		);
		expect(() => decodeTransportSequenceNumber(Buffer.from([1]))).toThrow(
			MalformedHeaderError,
		);
	});

	it("reads and writes through the header", () => {
		const header = setTransportSequenceNumber(HEADER, 3, 513);
		expect(getTransportSequenceNumber(header, 3)).toBe(513);
		expect(getTransportSequenceNumber(header, 4)).toBeUndefined();
	});
});
