/**
 * Source description, PT 202 (RFC 3550 section 6.5).
 *
 * Each chunk holds an SSRC followed by items (type, length, text) and ends
 * with a null octet plus zero padding up to the next word boundary.
 */

import { SdesItemType } from "../const.js";
import { InvalidValueError } from "../exceptions.js";
import type { BitBuffer, BitBufferMut } from "../support/buffer.js";
import { consumeAlignment, writeAlignment } from "../support/padding.js";
import { withContext } from "../support/utils.js";
import type { RtcpHeader } from "./header.js";

export const MAX_SDES_CHUNKS = 31;
export const MAX_SDES_ITEM_LENGTH = 255;

export interface SdesItem {
	type: number;
	data: Buffer;
}

export interface SdesChunk {
	ssrc: number;
	items: SdesItem[];
}

export interface SourceDescription {
	type: "sdes";
	chunks: SdesChunk[];
	paddingLength: number;
}

export function sdesText(item: SdesItem): string {
	return item.data.toString("utf8");
}

export function sdesItem(type: SdesItemType, text: string): SdesItem {
	return { type, data: Buffer.from(text, "utf8") };
}

/** The CNAME of `chunk`, if it carries one. */
export function sdesCname(chunk: SdesChunk): string | undefined {
	const item = chunk.items.find((i) => i.type === SdesItemType.Cname);
	return item === undefined ? undefined : sdesText(item);
}

function readChunk(buf: BitBuffer): SdesChunk {
	const mark = buf.position;
	const ssrc = withContext("ssrc", () => buf.readU32());
	const items: SdesItem[] = [];
	for (;;) {
		const type = buf.readU8();
		if (type === SdesItemType.End) break;
		const data = withContext(`item-${items.length}`, () => {
			const length = buf.readU8();
			return buf.readBytes(length);
		});
		items.push({ type, data: Buffer.from(data) });
	}
	consumeAlignment(buf, mark);
	return { ssrc, items };
}

export function readSourceDescription(
	buf: BitBuffer,
	header: RtcpHeader,
): Omit<SourceDescription, "paddingLength"> {
	const chunks: SdesChunk[] = [];
	for (let i = 0; i < header.count; i++) {
		chunks.push(withContext(`chunk-${i}`, () => readChunk(buf)));
	}
	return { type: "sdes", chunks };
}

function writeChunk(buf: BitBufferMut, chunk: SdesChunk): void {
	const mark = buf.position;
	withContext("ssrc", () => buf.writeU32(chunk.ssrc));
	chunk.items.forEach((item, i) => {
		withContext(`item-${i}`, () => {
			if (item.type === SdesItemType.End || item.type > 0xff || item.type < 0) {
				throw new InvalidValueError(`invalid item type ${item.type}`);
			}
			if (item.data.length > MAX_SDES_ITEM_LENGTH) {
				throw new InvalidValueError(
					`item of ${item.data.length} bytes exceeds ${MAX_SDES_ITEM_LENGTH}`,
				);
			}
			buf.writeU8(item.type);
			buf.writeU8(item.data.length);
			buf.writeBytes(item.data);
		});
	});
	buf.writeU8(SdesItemType.End);
	writeAlignment(buf, mark);
}

export function writeSourceDescription(
	buf: BitBufferMut,
	packet: SourceDescription,
): void {
	if (packet.chunks.length > MAX_SDES_CHUNKS) {
		throw new InvalidValueError(
			`${packet.chunks.length} chunks exceed the limit of ${MAX_SDES_CHUNKS}`,
		);
	}
	packet.chunks.forEach((chunk, i) => {
		withContext(`chunk-${i}`, () => writeChunk(buf, chunk));
	});
}
