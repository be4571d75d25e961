/**
 * RTP header extension blocks (RFC 3550 section 5.3.1, RFC 8285).
 *
 *  0                   1                   2                   3
 *  0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |      defined by profile       |           length              |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                        header extension                       |
 * |                             ....                              |
 *
 * The length counts 32 bit words after the four byte preamble. Profile
 * 0xBEDE holds one-byte elements (4 bit id, 4 bit length minus one), profiles
 * 0x1000-0x100F hold two-byte elements (8 bit id, 8 bit length) with the low
 * nibble carried as app bits. Any other profile is kept as raw words.
 */

import {
	ONE_BYTE_PROFILE,
	TWO_BYTE_PROFILE,
	TWO_BYTE_PROFILE_MASK,
} from "../const.js";
import {
	InvalidValueError,
	MalformedHeaderError,
	UnsupportedExtensionProfileError,
} from "../exceptions.js";
import type { BitBuffer, BitBufferMut } from "../support/buffer.js";
import { paddingNeeded, writeAlignment } from "../support/padding.js";
import { createLogger, hex, withContext } from "../support/utils.js";

const logger = createLogger("rtp.extensions");

export const ONE_BYTE_MAX_ID = 14;
export const ONE_BYTE_MAX_LENGTH = 16;
export const ONE_BYTE_STOP_ID = 15;
export const TWO_BYTE_MAX_ID = 255;
export const TWO_BYTE_MAX_LENGTH = 255;

/** An element with `id` 0 stands for a single padding byte between elements. */
export interface ExtensionElement {
	id: number;
	data: Buffer;
}

export interface OneByteExtensionBlock {
	kind: "one-byte";
	elements: ExtensionElement[];
	/** Bytes from an id 15 element to the end of the block, kept verbatim. */
	trailer?: Buffer;
}

export interface TwoByteExtensionBlock {
	kind: "two-byte";
	appBits: number;
	elements: ExtensionElement[];
}

export interface OpaqueExtensionBlock {
	kind: "opaque";
	profile: number;
	data: Buffer;
}

export type HeaderExtensionBlock =
	| OneByteExtensionBlock
	| TwoByteExtensionBlock
	| OpaqueExtensionBlock;

export function isPaddingElement(element: ExtensionElement): boolean {
	return element.id === 0;
}

export function extensionProfile(block: HeaderExtensionBlock): number {
	switch (block.kind) {
		case "one-byte":
			return ONE_BYTE_PROFILE;
		case "two-byte":
			return TWO_BYTE_PROFILE | block.appBits;
		case "opaque":
			return block.profile;
	}
}

function fitsOneByte(element: ExtensionElement): boolean {
	if (isPaddingElement(element)) return element.data.length === 0;
	return (
		element.id >= 1 &&
		element.id <= ONE_BYTE_MAX_ID &&
		element.data.length >= 1 &&
		element.data.length <= ONE_BYTE_MAX_LENGTH
	);
}

/**
 * Build a block holding `elements`, using the one-byte form when every
 * element fits it and the two-byte form otherwise.
 */
export function createExtensionBlock(
	elements: ExtensionElement[],
): HeaderExtensionBlock {
	if (elements.every(fitsOneByte)) {
		return { kind: "one-byte", elements };
	}
	return { kind: "two-byte", appBits: 0, elements };
}

/** Trailing padding elements that the writer would add back on its own. */
function dropImplicitPadding(
	elements: ExtensionElement[],
	elementSize: (element: ExtensionElement) => number,
): ExtensionElement[] {
	let end = elements.length;
	while (end > 0 && isPaddingElement(elements[end - 1])) end--;
	const trailing = elements.length - end;
	if (trailing === 0) return elements;
	const contentLength = elements
		.slice(0, end)
		.reduce((sum, element) => sum + elementSize(element), 0);
	return paddingNeeded(contentLength) === trailing
		? elements.slice(0, end)
		: elements;
}

function oneByteSize(element: ExtensionElement): number {
	return isPaddingElement(element) ? 1 : 1 + element.data.length;
}

function twoByteSize(element: ExtensionElement): number {
	return isPaddingElement(element) ? 1 : 2 + element.data.length;
}

function readOneByteElements(region: BitBuffer): OneByteExtensionBlock {
	const elements: ExtensionElement[] = [];
	let index = 0;
	while (region.bytesRemaining > 0) {
		const idLength = region.peekU8();
		const id = idLength >> 4;
		if (id === ONE_BYTE_STOP_ID) {
			// Padding ahead of the trailer stays in the element list.
			return {
				kind: "one-byte",
				elements,
				trailer: Buffer.from(region.rest()),
			};
		}
		region.skip(1);
		if (id === 0) {
			elements.push({ id: 0, data: Buffer.alloc(0) });
		} else {
			const length = (idLength & 0x0f) + 1;
			const data = withContext(`element-${index}`, () =>
				region.readBytes(length),
			);
			elements.push({ id, data: Buffer.from(data) });
		}
		index++;
	}
	return {
		kind: "one-byte",
		elements: dropImplicitPadding(elements, oneByteSize),
	};
}

function readTwoByteElements(
	region: BitBuffer,
	appBits: number,
): TwoByteExtensionBlock {
	const elements: ExtensionElement[] = [];
	let index = 0;
	while (region.bytesRemaining > 0) {
		const id = region.readU8();
		if (id === 0) {
			elements.push({ id: 0, data: Buffer.alloc(0) });
		} else {
			const data = withContext(`element-${index}`, () => {
				const length = region.readU8();
				return region.readBytes(length);
			});
			elements.push({ id, data: Buffer.from(data) });
		}
		index++;
	}
	return {
		kind: "two-byte",
		appBits,
		elements: dropImplicitPadding(elements, twoByteSize),
	};
}

/** Read the extension block that follows the CSRC list. */
export function readExtensionBlock(buf: BitBuffer): HeaderExtensionBlock {
	return withContext("extensions", () => {
		const profile = buf.readU16();
		const words = buf.readU16();
		if (words * 4 > buf.bytesRemaining) {
			throw new MalformedHeaderError(
				`extension block of ${words} words exceeds the ` +
					`${buf.bytesRemaining} bytes left`,
			);
		}
		const region = buf.subBuffer(words * 4);
		if (profile === ONE_BYTE_PROFILE) {
			return withContext("one-byte", () => readOneByteElements(region));
		}
		if ((profile & TWO_BYTE_PROFILE_MASK) === TWO_BYTE_PROFILE) {
			return withContext("two-byte", () =>
				readTwoByteElements(region, profile & 0x0f),
			);
		}
		logger.debug("Keeping extension profile %s as opaque", hex(profile, 4));
		return { kind: "opaque", profile, data: Buffer.from(region.rest()) };
	});
}

function writeOneByteElements(
	buf: BitBufferMut,
	block: OneByteExtensionBlock,
): void {
	block.elements.forEach((element, index) => {
		withContext(`element-${index}`, () => {
			if (!fitsOneByte(element)) {
				throw new InvalidValueError(
					`element id ${element.id} with ${element.data.length} bytes ` +
						"does not fit the one-byte form",
				);
			}
			if (isPaddingElement(element)) {
				buf.writeU8(0);
				return;
			}
			buf.writeU8((element.id << 4) | (element.data.length - 1));
			buf.writeBytes(element.data);
		});
	});
	if (block.trailer !== undefined) {
		if (
			block.trailer.length > 0 &&
			block.trailer[0] >> 4 !== ONE_BYTE_STOP_ID
		) {
			throw new InvalidValueError("trailer must start with an id 15 element");
		}
		buf.writeBytes(block.trailer);
	}
}

function writeTwoByteElements(
	buf: BitBufferMut,
	block: TwoByteExtensionBlock,
): void {
	block.elements.forEach((element, index) => {
		withContext(`element-${index}`, () => {
			if (isPaddingElement(element)) {
				if (element.data.length > 0) {
					throw new InvalidValueError("padding element cannot carry data");
				}
				buf.writeU8(0);
				return;
			}
			if (element.id > TWO_BYTE_MAX_ID || element.id < 1) {
				throw new InvalidValueError(`invalid element id ${element.id}`);
			}
			if (element.data.length > TWO_BYTE_MAX_LENGTH) {
				throw new InvalidValueError(
					`element data of ${element.data.length} bytes is too long`,
				);
			}
			buf.writeU8(element.id);
			buf.writeU8(element.data.length);
			buf.writeBytes(element.data);
		});
	});
}

/**
 * Write `block` including its preamble. The length field is back-patched
 * once the padded element region is known.
 */
export function writeExtensionBlock(
	buf: BitBufferMut,
	block: HeaderExtensionBlock,
): void {
	withContext("extensions", () => {
		if (
			block.kind === "two-byte" &&
			(block.appBits < 0 || block.appBits > 0x0f)
		) {
			throw new InvalidValueError(`app bits ${block.appBits} exceed 4 bits`);
		}
		if (
			block.kind === "opaque" &&
			(block.profile < 0 || block.profile > 0xffff)
		) {
			throw new InvalidValueError(`profile ${block.profile} exceeds 16 bits`);
		}
		buf.writeU16(extensionProfile(block));
		const lengthOffset = buf.position / 8;
		buf.writeU16(0);
		const mark = buf.position;
		switch (block.kind) {
			case "one-byte":
				writeOneByteElements(buf, block);
				break;
			case "two-byte":
				writeTwoByteElements(buf, block);
				break;
			case "opaque":
				buf.writeBytes(block.data);
				break;
		}
		writeAlignment(buf, mark);
		const words = buf.bytesWrittenSince(mark) / 4;
		if (words > 0xffff) {
			throw new InvalidValueError(
				`extension block of ${words} words is too long`,
			);
		}
		buf.setU16(lengthOffset, words);
	});
}

/** Serialized size of `block`, preamble included. */
export function extensionBlockLength(block: HeaderExtensionBlock): number {
	let content: number;
	switch (block.kind) {
		case "one-byte":
			content =
				block.elements.reduce((sum, e) => sum + oneByteSize(e), 0) +
				(block.trailer?.length ?? 0);
			break;
		case "two-byte":
			content = block.elements.reduce((sum, e) => sum + twoByteSize(e), 0);
			break;
		case "opaque":
			content = block.data.length;
			break;
	}
	return 4 + content + paddingNeeded(content);
}

function elementsOf(block: HeaderExtensionBlock): ExtensionElement[] {
	if (block.kind === "opaque") {
		throw new UnsupportedExtensionProfileError(
			`elements of profile ${hex(block.profile, 4)} cannot be interpreted`,
			block.profile,
		);
	}
	return block.elements;
}

export function findExtension(
	block: HeaderExtensionBlock,
	id: number,
): ExtensionElement | undefined {
	if (id === 0) return undefined;
	return elementsOf(block).find((element) => element.id === id);
}

/**
 * Return a copy of `block` with element `id` set to `data`. A one-byte block
 * is converted to the two-byte form when the element does not fit.
 */
export function withExtension(
	block: HeaderExtensionBlock | undefined,
	id: number,
	data: Buffer,
): HeaderExtensionBlock {
	if (id < 1 || id > TWO_BYTE_MAX_ID) {
		throw new InvalidValueError(`invalid element id ${id}`);
	}
	const element = { id, data };
	if (block === undefined) return createExtensionBlock([element]);
	const current = elementsOf(block);
	const elements = current.some((e) => e.id === id)
		? current.map((e) => (e.id === id ? element : e))
		: [...current, element];
	if (block.kind === "two-byte") {
		return { ...block, elements };
	}
	if (elements.every(fitsOneByte)) {
		return { kind: "one-byte", elements, trailer: trailerOf(block) };
	}
	return { kind: "two-byte", appBits: 0, elements };
}

function trailerOf(block: HeaderExtensionBlock): Buffer | undefined {
	return block.kind === "one-byte" ? block.trailer : undefined;
}

/** Return a copy of `block` without element `id`. */
export function withoutExtension(
	block: HeaderExtensionBlock,
	id: number,
): HeaderExtensionBlock {
	const elements = elementsOf(block).filter((e) => e.id !== id || id === 0);
	if (block.kind === "two-byte") {
		return { ...block, elements };
	}
	return { kind: "one-byte", elements, trailer: trailerOf(block) };
}
