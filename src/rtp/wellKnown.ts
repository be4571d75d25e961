/**
 * Payloads of commonly negotiated header extension elements.
 *
 * Audio level (RFC 6464 section 3):
 *
 *  0                   1
 *  0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |  ID   | len=0 |V| level       |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *
 * Transport-wide sequence number
 * (draft-holmer-rmcat-transport-wide-cc-extensions-01 section 2):
 *
 *  0                   1                   2
 *  0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |  ID   | L=1   |transport-wide sequence number |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 */

import { InvalidValueError, MalformedHeaderError } from "../exceptions.js";
import { getExtension, type RtpHeaderInit, setExtension } from "./header.js";

const VOICE_ACTIVITY_MASK = 0x80;
const LEVEL_MASK = 0x7f;
export const MUTED_LEVEL = 127;

export interface AudioLevel {
	voiceActivity: boolean;
	/** Level in -dBov, 0 (loudest) to 127 (muted). */
	level: number;
}

export function decodeAudioLevel(data: Buffer): AudioLevel {
	if (data.length < 1) {
		throw new MalformedHeaderError("audio level element needs 1 byte");
	}
	return {
		voiceActivity: (data[0] & VOICE_ACTIVITY_MASK) !== 0,
		level: data[0] & LEVEL_MASK,
	};
}

export function encodeAudioLevel(value: AudioLevel): Buffer {
	if (
		!Number.isInteger(value.level) ||
		value.level < 0 ||
		value.level > LEVEL_MASK
	) {
		throw new InvalidValueError(`audio level ${value.level} out of range`);
	}
	const flag = value.voiceActivity ? VOICE_ACTIVITY_MASK : 0;
	return Buffer.from([flag | value.level]);
}

export function isMuted(value: AudioLevel): boolean {
	return value.level === MUTED_LEVEL;
}

export function decodeTransportSequenceNumber(data: Buffer): number {
	if (data.length < 2) {
		throw new MalformedHeaderError(
			"transport sequence number element needs 2 bytes",
		);
	}
	return data.readUInt16BE(0);
}

export function encodeTransportSequenceNumber(sequenceNumber: number): Buffer {
	if (
		!Number.isInteger(sequenceNumber) ||
		sequenceNumber < 0 ||
		sequenceNumber > 0xffff
	) {
		throw new InvalidValueError(`invalid sequence number ${sequenceNumber}`);
	}
	const data = Buffer.alloc(2);
	data.writeUInt16BE(sequenceNumber, 0);
	return data;
}

export function getAudioLevel(
	header: RtpHeaderInit,
	id: number,
): AudioLevel | undefined {
	const data = getExtension(header, id);
	return data === undefined ? undefined : decodeAudioLevel(data);
}

export function setAudioLevel<H extends RtpHeaderInit>(
	header: H,
	id: number,
	value: AudioLevel,
): H {
	return setExtension(header, id, encodeAudioLevel(value));
}

export function getTransportSequenceNumber(
	header: RtpHeaderInit,
	id: number,
): number | undefined {
	const data = getExtension(header, id);
	return data === undefined ? undefined : decodeTransportSequenceNumber(data);
}

export function setTransportSequenceNumber<H extends RtpHeaderInit>(
	header: H,
	id: number,
	sequenceNumber: number,
): H {
	return setExtension(
		header,
		id,
		encodeTransportSequenceNumber(sequenceNumber),
	);
}
