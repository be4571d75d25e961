/**
 * Packet status chunks of transport-wide congestion control feedback
 * (draft-holmer-rmcat-transport-wide-cc-extensions-01 section 3.1).
 *
 * Run length chunk:
 *
 *     0                   1
 *     0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5
 *    +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *    |T| S |       Run Length        |
 *    +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *
 * Status vector chunk, 14 one bit symbols (S=0) or 7 two bit symbols (S=1):
 *
 *     0                   1
 *     0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5
 *    +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *    |T|S|       symbol list         |
 *    +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 */

import { PacketStatus } from "../../const.js";
import { InvalidValueError, MalformedHeaderError } from "../../exceptions.js";
import type { BitBuffer, BitBufferMut } from "../../support/buffer.js";

export const ONE_BIT_CAPACITY = 14;
export const TWO_BIT_CAPACITY = 7;
export const MAX_RUN_LENGTH = 0x1fff;

export interface RunLengthChunk {
	kind: "run-length";
	status: PacketStatus;
	runLength: number;
}

/** Always 14 symbols, each NotReceived or ReceivedSmallDelta. */
export interface OneBitVectorChunk {
	kind: "one-bit";
	symbols: PacketStatus[];
}

/** Always 7 symbols. */
export interface TwoBitVectorChunk {
	kind: "two-bit";
	symbols: PacketStatus[];
}

export type PacketStatusChunk =
	| RunLengthChunk
	| OneBitVectorChunk
	| TwoBitVectorChunk;

function toStatus(value: number): PacketStatus {
	switch (value) {
		case PacketStatus.NotReceived:
			return PacketStatus.NotReceived;
		case PacketStatus.ReceivedSmallDelta:
			return PacketStatus.ReceivedSmallDelta;
		case PacketStatus.ReceivedLargeOrNegativeDelta:
			return PacketStatus.ReceivedLargeOrNegativeDelta;
		case PacketStatus.Reserved:
			return PacketStatus.Reserved;
		default:
			throw new InvalidValueError(`invalid packet status ${value}`);
	}
}

/** Symbols that cannot be expressed in a one bit vector. */
function isWide(status: PacketStatus): boolean {
	return (
		status !== PacketStatus.NotReceived &&
		status !== PacketStatus.ReceivedSmallDelta
	);
}

export function isReceived(status: PacketStatus): boolean {
	return (
		status === PacketStatus.ReceivedSmallDelta ||
		status === PacketStatus.ReceivedLargeOrNegativeDelta
	);
}

export function chunkSymbolCount(chunk: PacketStatusChunk): number {
	return chunk.kind === "run-length" ? chunk.runLength : chunk.symbols.length;
}

export function chunkSymbols(chunk: PacketStatusChunk): PacketStatus[] {
	if (chunk.kind === "run-length") {
		return new Array<PacketStatus>(chunk.runLength).fill(chunk.status);
	}
	return chunk.symbols;
}

export function readStatusChunk(buf: BitBuffer): PacketStatusChunk {
	const isVector = buf.readBool();
	if (!isVector) {
		const status = toStatus(buf.readBits(2));
		const runLength = buf.readBits(13);
		if (runLength === 0) {
			throw new MalformedHeaderError("run length chunk with a run of 0");
		}
		return { kind: "run-length", status, runLength };
	}
	const twoBit = buf.readBool();
	const symbols: PacketStatus[] = [];
	if (twoBit) {
		for (let i = 0; i < TWO_BIT_CAPACITY; i++) {
			symbols.push(toStatus(buf.readBits(2)));
		}
		return { kind: "two-bit", symbols };
	}
	for (let i = 0; i < ONE_BIT_CAPACITY; i++) {
		symbols.push(toStatus(buf.readBits(1)));
	}
	return { kind: "one-bit", symbols };
}

export function writeStatusChunk(
	buf: BitBufferMut,
	chunk: PacketStatusChunk,
): void {
	switch (chunk.kind) {
		case "run-length":
			if (chunk.runLength < 1 || chunk.runLength > MAX_RUN_LENGTH) {
				throw new InvalidValueError(`invalid run length ${chunk.runLength}`);
			}
			buf.writeBool(false);
			buf.writeBits(2, chunk.status);
			buf.writeBits(13, chunk.runLength);
			return;
		case "one-bit":
			if (chunk.symbols.length !== ONE_BIT_CAPACITY) {
				throw new InvalidValueError(
					`one bit vector needs ${ONE_BIT_CAPACITY} symbols, ` +
						`got ${chunk.symbols.length}`,
				);
			}
			if (chunk.symbols.some(isWide)) {
				throw new InvalidValueError(
					"one bit vector holds only NotReceived and ReceivedSmallDelta",
				);
			}
			buf.writeBool(true);
			buf.writeBool(false);
			for (const symbol of chunk.symbols) buf.writeBits(1, symbol);
			return;
		case "two-bit":
			if (chunk.symbols.length !== TWO_BIT_CAPACITY) {
				throw new InvalidValueError(
					`two bit vector needs ${TWO_BIT_CAPACITY} symbols, ` +
						`got ${chunk.symbols.length}`,
				);
			}
			buf.writeBool(true);
			buf.writeBool(true);
			for (const symbol of chunk.symbols) buf.writeBits(2, symbol);
			return;
	}
}

/**
 * Greedy chunk accumulator. Symbols are collected until the next one no
 * longer fits any chunk form, then the most compact chunk is emitted.
 */
export class ChunkAccumulator {
	private symbols: PacketStatus[] = [];
	private allSame = true;
	private hasWide = false;

	get size(): number {
		return this.symbols.length;
	}

	isEmpty(): boolean {
		return this.symbols.length === 0;
	}

	canAdd(status: PacketStatus): boolean {
		const size = this.symbols.length;
		if (size < TWO_BIT_CAPACITY) {
			return true;
		}
		if (size < ONE_BIT_CAPACITY && !this.hasWide && !isWide(status)) {
			return true;
		}
		if (size < MAX_RUN_LENGTH && this.allSame && this.symbols[0] === status) {
			return true;
		}
		return false;
	}

	add(status: PacketStatus): void {
		this.symbols.push(status);
		this.allSame = this.allSame && this.symbols[0] === status;
		this.hasWide = this.hasWide || isWide(status);
	}

	/**
	 * Emit a full chunk. A run becomes a run length chunk, 14 narrow symbols a
	 * one bit vector, and otherwise the first 7 symbols go into a two bit
	 * vector while the rest stay queued.
	 */
	emit(): PacketStatusChunk {
		if (this.allSame) {
			const chunk: RunLengthChunk = {
				kind: "run-length",
				status: this.symbols[0],
				runLength: this.symbols.length,
			};
			this.reset([]);
			return chunk;
		}
		if (this.symbols.length === ONE_BIT_CAPACITY) {
			const chunk: OneBitVectorChunk = {
				kind: "one-bit",
				symbols: this.symbols,
			};
			this.reset([]);
			return chunk;
		}
		return this.emitTwoBit();
	}

	/**
	 * Emit the final chunk(s). The last chunk is padded with NotReceived,
	 * which decoders drop past the packet status count.
	 */
	flush(): PacketStatusChunk[] {
		const chunks: PacketStatusChunk[] = [];
		while (!this.isEmpty()) {
			if (this.allSame) {
				chunks.push(this.emit());
			} else if (!this.hasWide && this.symbols.length <= ONE_BIT_CAPACITY) {
				chunks.push({
					kind: "one-bit",
					symbols: pad(this.symbols, ONE_BIT_CAPACITY),
				});
				this.reset([]);
			} else {
				chunks.push(this.emitTwoBit());
			}
		}
		return chunks;
	}

	private emitTwoBit(): TwoBitVectorChunk {
		const head = this.symbols.slice(0, TWO_BIT_CAPACITY);
		this.reset(this.symbols.slice(TWO_BIT_CAPACITY));
		return { kind: "two-bit", symbols: pad(head, TWO_BIT_CAPACITY) };
	}

	private reset(symbols: PacketStatus[]): void {
		this.symbols = symbols;
		this.allSame = symbols.every((s) => s === symbols[0]);
		this.hasWide = symbols.some(isWide);
	}
}

function pad(symbols: PacketStatus[], capacity: number): PacketStatus[] {
	const padded = [...symbols];
	while (padded.length < capacity) padded.push(PacketStatus.NotReceived);
	return padded;
}

/** Encode `statuses` into chunks; every chunk but the last is exactly full. */
export function encodePacketStatuses(
	statuses: readonly PacketStatus[],
): PacketStatusChunk[] {
	const accumulator = new ChunkAccumulator();
	const chunks: PacketStatusChunk[] = [];
	for (const status of statuses) {
		while (!accumulator.canAdd(status)) {
			chunks.push(accumulator.emit());
		}
		accumulator.add(status);
	}
	chunks.push(...accumulator.flush());
	return chunks;
}

/** Expand `chunks` into the first `count` statuses. */
export function decodePacketStatuses(
	chunks: readonly PacketStatusChunk[],
	count: number,
): PacketStatus[] {
	const statuses: PacketStatus[] = [];
	for (const chunk of chunks) {
		if (statuses.length >= count) break;
		for (const symbol of chunkSymbols(chunk)) {
			if (statuses.length >= count) break;
			statuses.push(symbol);
		}
	}
	if (statuses.length < count) {
		throw new InvalidValueError(
			`chunks describe ${statuses.length} packets, ${count} expected`,
		);
	}
	return statuses;
}
