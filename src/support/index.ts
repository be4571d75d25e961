export { BitBuffer, BitBufferMut, INITIAL_CAPACITY } from "./buffer.js";
export {
	type DecodedPacket,
	defpacket,
	type FieldFormat,
	type PacketFields,
	type PacketType,
} from "./packet.js";
export {
	consumeAlignment,
	MAX_PADDING_LENGTH,
	paddingNeeded,
	readPacketPadding,
	WORD_SIZE,
	writeAlignment,
	writePacketPadding,
} from "./padding.js";
export {
	createLogger,
	hex,
	type Logger,
	logBinary,
	withContext,
} from "./utils.js";
