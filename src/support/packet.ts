import { InvalidValueError } from "../exceptions.js";
import { BitBuffer, BitBufferMut } from "./buffer.js";
import { withContext } from "./utils.js";

/**
 * Field formats: "bool" is a single bit, "uN" an unsigned N bit integer and
 * "iN" a two's complement N bit integer (N up to 32). Fields are packed
 * most significant bit first, without any alignment between them.
 */
export type FieldFormat = "bool" | `u${number}` | `i${number}`;

export type PacketFields = Record<string, FieldFormat>;

type FieldValue<F extends FieldFormat> = F extends "bool" ? boolean : number;

export type DecodedPacket<F extends PacketFields> = {
	-readonly [K in keyof F]: FieldValue<F[K]>;
};

export interface PacketType<F extends PacketFields> {
	name: string;
	bitLength: number;
	/** Encoded size in whole bytes. */
	length: number;
	read(buf: BitBuffer): DecodedPacket<F>;
	write(buf: BitBufferMut, values: DecodedPacket<F>): void;
	decode(data: Buffer, allowExcessive?: boolean): DecodedPacket<F>;
	encode(values: DecodedPacket<F>): Buffer;
	extend<E extends PacketFields>(
		extName: string,
		extFields: E,
	): PacketType<F & E>;
}

interface ParsedFormat {
	signed: boolean;
	bits: number;
	bool: boolean;
}

function parseFormat(fmt: FieldFormat): ParsedFormat {
	if (fmt === "bool") {
		return { signed: false, bits: 1, bool: true };
	}
	const match = /^([ui])(\d+)$/.exec(fmt);
	const bits = match ? Number.parseInt(match[2], 10) : 0;
	const signed = match?.[1] === "i";
	if (!match || bits < (signed ? 2 : 1) || bits > 32) {
		throw new Error(`unsupported format: ${fmt}`);
	}
	return { signed, bits, bool: false };
}

function readField(buf: BitBuffer, fmt: ParsedFormat): number | boolean {
	const raw = buf.readBits(fmt.bits);
	if (fmt.bool) return raw === 1;
	if (fmt.signed && raw >= 2 ** (fmt.bits - 1)) {
		return raw - 2 ** fmt.bits;
	}
	return raw;
}

function writeField(
	buf: BitBufferMut,
	fmt: ParsedFormat,
	value: number | boolean,
): void {
	if (fmt.bool) {
		if (typeof value !== "boolean") {
			throw new InvalidValueError(`expected boolean, got ${value}`);
		}
		buf.writeBool(value);
		return;
	}
	if (typeof value !== "number") {
		throw new InvalidValueError(`expected number, got ${value}`);
	}
	if (fmt.signed) {
		const limit = 2 ** (fmt.bits - 1);
		if (!Number.isInteger(value) || value < -limit || value >= limit) {
			throw new InvalidValueError(
				`value ${value} does not fit in ${fmt.bits} signed bits`,
			);
		}
		buf.writeBits(fmt.bits, value < 0 ? value + 2 ** fmt.bits : value);
		return;
	}
	buf.writeBits(fmt.bits, value);
}

function isDecoded<F extends PacketFields>(
	result: Record<string, number | boolean>,
	fieldNames: string[],
): result is DecodedPacket<F> {
	return fieldNames.every((name) => name in result);
}

export function defpacket<F extends PacketFields>(
	name: string,
	fields: F,
): PacketType<F> {
	const fieldNames = Object.keys(fields);
	const formats = fieldNames.map((f) => parseFormat(fields[f]));
	const bitLength = formats.reduce((sum, f) => sum + f.bits, 0);

	const packet: PacketType<F> = {
		name,
		bitLength,
		length: Math.ceil(bitLength / 8),

		read(buf: BitBuffer): DecodedPacket<F> {
			return withContext(name, () => {
				const result: Record<string, number | boolean> = {};
				for (let i = 0; i < fieldNames.length; i++) {
					result[fieldNames[i]] = withContext(fieldNames[i], () =>
						readField(buf, formats[i]),
					);
				}
				if (!isDecoded<F>(result, fieldNames)) {
					throw new Error(`incomplete ${name}`);
				}
				return result;
			});
		},

		write(buf: BitBufferMut, values: DecodedPacket<F>): void {
			const record: Record<string, number | boolean> = values;
			withContext(name, () => {
				for (let i = 0; i < fieldNames.length; i++) {
					const fieldName = fieldNames[i];
					withContext(fieldName, () =>
						writeField(buf, formats[i], record[fieldName]),
					);
				}
			});
		},

		decode(data: Buffer, allowExcessive = false): DecodedPacket<F> {
			const buf = new BitBuffer(data);
			const decoded = packet.read(buf);
			if (!allowExcessive && buf.bitsRemaining >= 8) {
				throw new InvalidValueError(
					`${name}: ${buf.bytesRemaining} excess bytes`,
				);
			}
			return decoded;
		},

		encode(values: DecodedPacket<F>): Buffer {
			const buf = new BitBufferMut(packet.length);
			packet.write(buf, values);
			return buf.toBuffer();
		},

		extend<E extends PacketFields>(
			extName: string,
			extFields: E,
		): PacketType<F & E> {
			return defpacket(extName, { ...fields, ...extFields });
		},
	};
	return packet;
}
